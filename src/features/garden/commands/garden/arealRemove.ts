import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type SlashCommandSubcommandBuilder,
} from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';

export const AREAL_REMOVE_SUBCOMMAND_NAME = 'areal-remove';

export function configureArealRemoveSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(AREAL_REMOVE_SUBCOMMAND_NAME)
    .setDescription('Remove an areal together with all of its plants')
    .addStringOption((option) =>
      option.setName('id').setDescription('Areal id (from /garden overview)').setRequired(true),
    );
}

export async function handleArealRemoveSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  const id = interaction.options.getString('id', true).trim();
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    await service.removeAreal(id);
    await interaction.editReply(`🗑️ Removed areal \`${id}\` and its plants.`);
  } catch (error: unknown) {
    logger.warn({ err: error, userId: interaction.user.id, id }, 'Failed to remove areal');
    await interaction.editReply(`❌ Failed to remove areal: ${getErrorMessage(error)}`);
  }
}
