import {
  Events,
  MessageFlags,
  type ChatInputCommandInteraction,
  type Client,
  type Collection,
} from 'discord.js';

import { logger } from '../logger.js';
import type { SlashCommand } from '../types/commands.js';
import { getErrorMessage } from '../utils/errors.js';

type CommandMap = Collection<string, SlashCommand>;

export const handleChatInput = async (
  i: ChatInputCommandInteraction,
  commands: CommandMap,
): Promise<void> => {
  const cmd = commands.get(i.commandName);
  if (!cmd) {
    await i.reply({ content: 'Unknown command.', flags: MessageFlags.Ephemeral });
    return;
  }

  try {
    await cmd.execute(i);
  } catch (error) {
    logger.error({ err: error, command: i.commandName }, 'Command failed');
    const content = `❌ ${getErrorMessage(error)}`;
    if (i.deferred || i.replied) {
      await i.editReply(content);
    } else {
      await i.reply({ content, flags: MessageFlags.Ephemeral });
    }
  }
};

export default (client: Client, commands: CommandMap) => {
  client.on(Events.InteractionCreate, (interaction) => {
    if (!interaction.isChatInputCommand()) return;

    // Keep listener type as void; run async logic in a thrown-away task
    void handleChatInput(interaction, commands).catch((err: unknown) => {
      logger.error({ err }, 'InteractionCreate handler error');
    });
  });
};
