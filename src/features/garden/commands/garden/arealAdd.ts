import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type SlashCommandSubcommandBuilder,
} from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';

export const AREAL_ADD_SUBCOMMAND_NAME = 'areal-add';

export function configureArealAddSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(AREAL_ADD_SUBCOMMAND_NAME)
    .setDescription('Add a life area to the garden')
    .addStringOption((option) =>
      option.setName('id').setDescription('Short id, e.g. sport').setRequired(true),
    )
    .addStringOption((option) =>
      option.setName('name').setDescription('Display name').setRequired(true),
    )
    .addStringOption((option) =>
      option
        .setName('horizontal')
        .setDescription('Horizontal position')
        .addChoices(
          { name: 'Left', value: 'left' },
          { name: 'Center', value: 'center' },
          { name: 'Right', value: 'right' },
        ),
    )
    .addStringOption((option) =>
      option
        .setName('vertical')
        .setDescription('Vertical position')
        .addChoices(
          { name: 'Top', value: 'top' },
          { name: 'Middle', value: 'middle' },
          { name: 'Bottom', value: 'bottom' },
        ),
    )
    .addStringOption((option) =>
      option
        .setName('size')
        .setDescription('Area size')
        .addChoices(
          { name: 'Small', value: 'small' },
          { name: 'Medium', value: 'medium' },
          { name: 'Large', value: 'large' },
        ),
    );
}

export async function handleArealAddSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  const id = interaction.options.getString('id', true);
  const name = interaction.options.getString('name', true).trim();
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const areal = await service.addAreal({
      id,
      name,
      horizontalPos: interaction.options.getString('horizontal') ?? undefined,
      verticalPos: interaction.options.getString('vertical') ?? undefined,
      size: interaction.options.getString('size') ?? undefined,
    });
    await interaction.editReply(`🪴 Added areal **${areal.name}** (\`${areal.id}\`).`);
  } catch (error: unknown) {
    logger.warn({ err: error, userId: interaction.user.id, id }, 'Failed to add areal');
    await interaction.editReply(`❌ Failed to add areal: ${getErrorMessage(error)}`);
  }
}
