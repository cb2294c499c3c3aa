import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type SlashCommandSubcommandBuilder,
} from 'discord.js';

import { logger } from '../../../../core/logger.js';
import { getErrorMessage } from '../../../../core/utils/errors.js';
import type { GardenService } from '../../services/gardenService.js';
import { MAX_DAILY_LIMIT, MIN_DAILY_LIMIT } from '../../types/garden.js';

export const LIMIT_SUBCOMMAND_NAME = 'limit';

export function configureLimitSubcommand(
  subcommand: SlashCommandSubcommandBuilder,
): SlashCommandSubcommandBuilder {
  return subcommand
    .setName(LIMIT_SUBCOMMAND_NAME)
    .setDescription('Change how many plants may be watered per day')
    .addIntegerOption((option) =>
      option
        .setName('value')
        .setDescription(`New daily limit (${MIN_DAILY_LIMIT}-${MAX_DAILY_LIMIT})`)
        .setRequired(true)
        .setMinValue(MIN_DAILY_LIMIT)
        .setMaxValue(MAX_DAILY_LIMIT),
    );
}

export async function handleLimitSubcommand(
  service: GardenService,
  interaction: ChatInputCommandInteraction,
): Promise<void> {
  const value = interaction.options.getInteger('value', true);
  await interaction.deferReply({ flags: MessageFlags.Ephemeral });

  try {
    const config = await service.updateDailyLimit(value);
    await interaction.editReply(
      `✅ Daily watering limit set to **${config.maxPlantsPerDay}** plant(s).`,
    );
    logger.info({ userId: interaction.user.id, limit: config.maxPlantsPerDay }, 'Limit changed');
  } catch (error: unknown) {
    logger.warn({ err: error, userId: interaction.user.id, value }, 'Failed to update limit');
    await interaction.editReply(`❌ Failed to update limit: ${getErrorMessage(error)}`);
  }
}
