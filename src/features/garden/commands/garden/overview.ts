import type { ChatInputCommandInteraction, SlashCommandSubcommandBuilder } from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';

import { buildOverviewEmbed } from './format.js';

export const OVERVIEW_SUBCOMMAND_NAME = 'overview';

export function configureOverviewSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(OVERVIEW_SUBCOMMAND_NAME)
    .setDescription('Show every areal with its plants');
}

export async function handleOverviewSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  await interaction.deferReply();

  try {
    // Settle first so the overview shows decay of days that already ended
    await service.tick(service.today());
    const [areals, stats] = await Promise.all([service.getGarden(), service.getGardenStats()]);
    if (!areals.length) {
      await interaction.editReply(
        '🌱 Your garden is empty. Start with `/garden areal-add id:sport name:Sport`.',
      );
      return;
    }
    await interaction.editReply({ embeds: [buildOverviewEmbed(areals, stats)] });
  } catch (error: unknown) {
    logger.error({ err: error, userId: interaction.user.id }, 'Failed to load garden overview');
    await interaction.editReply(`❌ Failed to load the garden: ${getErrorMessage(error)}`);
  }
}
