import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type SlashCommandSubcommandBuilder,
} from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';

export const PLANT_REMOVE_SUBCOMMAND_NAME = 'plant-remove';

export function configurePlantRemoveSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(PLANT_REMOVE_SUBCOMMAND_NAME)
    .setDescription('Remove a plant and its watering history')
    .addStringOption((option) =>
      option.setName('plant').setDescription('Plant name or id').setRequired(true),
    );
}

export async function handlePlantRemoveSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  const entry = interaction.options.getString('plant', true);
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const removed = await service.removePlant(entry);
    await interaction.editReply(`🗑️ Removed **${removed.name}** (id ${removed.id}).`);
  } catch (error: unknown) {
    logger.warn({ err: error, userId: interaction.user.id, entry }, 'Failed to remove plant');
    await interaction.editReply(`❌ Failed to remove plant: ${getErrorMessage(error)}`);
  }
}
