import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type SlashCommandSubcommandBuilder,
} from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';
import { HEALTH_LEVELS, type Health } from '../../types/garden.js';

import { healthIcon } from './format.js';

export const PLANT_ADD_SUBCOMMAND_NAME = 'plant-add';

const isHealth = (value: string | null): value is Health =>
  HEALTH_LEVELS.some((level) => level === value);

export function configurePlantAddSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(PLANT_ADD_SUBCOMMAND_NAME)
    .setDescription('Plant something new in an areal')
    .addStringOption((option) =>
      option.setName('areal').setDescription('Areal id').setRequired(true),
    )
    .addStringOption((option) =>
      option.setName('name').setDescription('Plant name').setRequired(true).setMaxLength(80),
    )
    .addStringOption((option) =>
      option.setName('image').setDescription('Image path or URL shown for the plant'),
    )
    .addStringOption((option) =>
      option.setName('position').setDescription('Position inside the areal'),
    )
    .addStringOption((option) =>
      option
        .setName('health')
        .setDescription('Starting health (default healthy)')
        .addChoices(...HEALTH_LEVELS.map((level) => ({ name: level, value: level }))),
    );
}

export async function handlePlantAddSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  const arealId = interaction.options.getString('areal', true).trim();
  const name = interaction.options.getString('name', true);
  const healthInput = interaction.options.getString('health');
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const plant = await service.addPlant({
      arealId,
      name,
      imagePath: interaction.options.getString('image')?.trim() || undefined,
      position: interaction.options.getString('position')?.trim() || undefined,
      health: isHealth(healthInput) ? healthInput : undefined,
    });
    await interaction.editReply(
      `${healthIcon(plant.health)} Planted **${plant.name}** (id ${plant.id}) in \`${plant.arealId}\`.`,
    );
  } catch (error: unknown) {
    logger.warn({ err: error, userId: interaction.user.id, arealId }, 'Failed to add plant');
    await interaction.editReply(`❌ Failed to add plant: ${getErrorMessage(error)}`);
  }
}
