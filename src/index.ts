import { Client, Collection, GatewayIntentBits } from 'discord.js';

import { env } from './core/config.js';
import interactionCreate from './core/events/interactionCreate.js';
import registerReadyHandler from './core/events/ready.js';
import { logger } from './core/logger.js';
import { end } from './core/services/database.service.js';
import type { SlashCommand } from './core/types/commands.js';
import garden from './features/garden/commands/garden/index.js';
import { initGardenJob } from './features/garden/jobs/dailyTick.js';

const client = new Client({ intents: [GatewayIntentBits.Guilds] });

// Register commands into a collection for easy lookup
const commands = new Collection<string, SlashCommand>();
commands.set(garden.data.name, garden);

let stopGardenJob: (() => void) | undefined;

// Wire up event handlers
registerReadyHandler(client, [
  (readyClient) => {
    stopGardenJob = initGardenJob(readyClient);
  },
]);
interactionCreate(client, commands);

async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  stopGardenJob?.();
  await client.destroy();
  await end();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((e: unknown) => {
      logger.error({ err: e }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

// Log in
client.login(env.DISCORD_TOKEN).catch((e: unknown) => {
  logger.error({ err: e }, 'Failed to login');
  process.exit(1);
});
