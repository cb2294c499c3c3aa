import type { ChatInputCommandInteraction, SlashCommandSubcommandBuilder } from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';

import { buildStatsEmbed } from './format.js';

export const STATS_SUBCOMMAND_NAME = 'stats';

export function configureStatsSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(STATS_SUBCOMMAND_NAME)
    .setDescription("Show today's watering capacity and the plants that need water");
}

export async function handleStatsSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  await interaction.deferReply();

  try {
    const stats = await service.getWateringStats(service.today());
    await interaction.editReply({ embeds: [buildStatsEmbed(stats)] });
  } catch (error: unknown) {
    logger.error({ err: error, userId: interaction.user.id }, 'Failed to load watering stats');
    await interaction.editReply(`❌ Failed to load watering stats: ${getErrorMessage(error)}`);
  }
}
