import type { ChatInputCommandInteraction, SlashCommandSubcommandBuilder } from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import { parsePlantList, type GardenService } from '../../services/gardenService.js';

import { buildWaterResultEmbed } from './format.js';

export const WATER_SUBCOMMAND_NAME = 'water';

export function configureWaterSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(WATER_SUBCOMMAND_NAME)
    .setDescription('Water plants for today')
    .addStringOption((option) =>
      option
        .setName('plants')
        .setDescription('Plant names or ids, separated by commas')
        .setRequired(true)
        .setMaxLength(1000),
    );
}

export async function handleWaterSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  const entries = parsePlantList(interaction.options.getString('plants', true));
  await interaction.deferReply();

  if (!entries.length) {
    await interaction.editReply(
      '🌱 Name at least one plant, e.g. `/garden water plants:Yoga, Reading`.',
    );
    return;
  }

  const date = service.today();
  logger.debug({ userId: interaction.user.id, date, entries }, 'Processing /garden water');

  try {
    const result = await service.waterPlants(date, entries);
    await interaction.editReply({ embeds: [buildWaterResultEmbed(result)] });
  } catch (error: unknown) {
    logger.error({ err: error, userId: interaction.user.id, date }, 'Failed to water plants');
    await interaction.editReply(`❌ Failed to water plants: ${getErrorMessage(error)}`);
  }
}
