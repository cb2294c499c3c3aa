import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type SlashCommandSubcommandBuilder,
} from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';

import { formatHistoryLines } from './format.js';

export const HISTORY_SUBCOMMAND_NAME = 'history';

export function configureHistorySubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(HISTORY_SUBCOMMAND_NAME)
    .setDescription('List recent waterings')
    .addStringOption((option) =>
      option.setName('plant').setDescription('Only show this plant (name or id)'),
    )
    .addIntegerOption((option) =>
      option
        .setName('limit')
        .setDescription('How many entries to show (default 20)')
        .setMinValue(1)
        .setMaxValue(100),
    );
}

export async function handleHistorySubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  const plant = interaction.options.getString('plant')?.trim() || undefined;
  const limit = interaction.options.getInteger('limit') ?? undefined;
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const events = await service.getWateringHistory({ plant, limit });
    const title = plant ? `💧 Waterings of ${plant}` : '💧 Recent waterings';
    await interaction.editReply(`${title}\n${formatHistoryLines(events)}`);
  } catch (error: unknown) {
    logger.warn({ err: error, userId: interaction.user.id, plant }, 'Failed to load history');
    await interaction.editReply(`❌ Failed to load history: ${getErrorMessage(error)}`);
  }
}
