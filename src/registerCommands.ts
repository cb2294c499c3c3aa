import {
  REST,
  Routes,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
} from 'discord.js';

import { env } from './core/config.js';
import { logger } from './core/logger.js';
import type { SlashCommand } from './core/types/commands.js';
import garden from './features/garden/commands/garden/index.js';

// Determine registration scope
const isGlobal = process.argv.includes('--global');
const isGuild = process.argv.includes('--guild');
if (!isGlobal && !isGuild) {
  logger.error('Specify --guild (dev) or --global (prod) when running this script.');
  process.exit(1);
}

// Collect commands to register. Add new commands here.
const commands: SlashCommand[] = [garden];

const toJSON = (data: SlashCommand['data']): RESTPostAPIChatInputApplicationCommandsJSONBody =>
  'toJSON' in data ? data.toJSON() : data;

const body = commands.map((command) => toJSON(command.data));

const rest = new REST({ version: '10' }).setToken(env.DISCORD_TOKEN);

async function main() {
  if (isGuild) {
    if (!env.DISCORD_GUILD_ID) {
      logger.error('DISCORD_GUILD_ID is required for guild registration. Set it in your .env');
      process.exit(1);
    }
    const route = Routes.applicationGuildCommands(env.DISCORD_CLIENT_ID, env.DISCORD_GUILD_ID);
    await rest.put(route, { body });
    logger.info(`✅ Registered ${commands.length} command(s) to guild ${env.DISCORD_GUILD_ID}`);
  } else if (isGlobal) {
    const route = Routes.applicationCommands(env.DISCORD_CLIENT_ID);
    const response = await rest.put(route, { body });
    const count = Array.isArray(response) ? response.length : commands.length;
    logger.info(`🌍 Registered ${count} global command(s)`);
    logger.info('Note: global commands can take up to an hour to propagate.');
  }
}

main().catch((e: unknown) => {
  logger.error({ err: e }, 'Command registration failed');
  process.exit(1);
});
