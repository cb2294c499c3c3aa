import {
  MessageFlags,
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type SlashCommandSubcommandsOnlyBuilder,
} from 'discord.js';

import type { SlashCommand } from '../../../../core/types/commands.js';
import type { GardenService } from '../../services/gardenService.js';
import { getGardenService } from '../../services/index.js';

import {
  AREAL_ADD_SUBCOMMAND_NAME,
  configureArealAddSubcommand,
  handleArealAddSubcommand,
} from './arealAdd.js';
import {
  AREAL_REMOVE_SUBCOMMAND_NAME,
  configureArealRemoveSubcommand,
  handleArealRemoveSubcommand,
} from './arealRemove.js';
import {
  configureHistorySubcommand,
  handleHistorySubcommand,
  HISTORY_SUBCOMMAND_NAME,
} from './history.js';
import { configureLimitSubcommand, handleLimitSubcommand, LIMIT_SUBCOMMAND_NAME } from './limit.js';
import {
  configureOverviewSubcommand,
  handleOverviewSubcommand,
  OVERVIEW_SUBCOMMAND_NAME,
} from './overview.js';
import {
  configurePlantAddSubcommand,
  handlePlantAddSubcommand,
  PLANT_ADD_SUBCOMMAND_NAME,
} from './plantAdd.js';
import {
  configurePlantRemoveSubcommand,
  handlePlantRemoveSubcommand,
  PLANT_REMOVE_SUBCOMMAND_NAME,
} from './plantRemove.js';
import { configureStatsSubcommand, handleStatsSubcommand, STATS_SUBCOMMAND_NAME } from './stats.js';
import { configureWaterSubcommand, handleWaterSubcommand, WATER_SUBCOMMAND_NAME } from './water.js';

const data: SlashCommandSubcommandsOnlyBuilder = new SlashCommandBuilder()
  .setName('garden')
  .setDescription('Water and tend your life garden')
  .addSubcommand((sub) => configureWaterSubcommand(sub))
  .addSubcommand((sub) => configureStatsSubcommand(sub))
  .addSubcommand((sub) => configureOverviewSubcommand(sub))
  .addSubcommand((sub) => configureHistorySubcommand(sub))
  .addSubcommand((sub) => configureLimitSubcommand(sub))
  .addSubcommand((sub) => configureArealAddSubcommand(sub))
  .addSubcommand((sub) => configureArealRemoveSubcommand(sub))
  .addSubcommand((sub) => configurePlantAddSubcommand(sub))
  .addSubcommand((sub) => configurePlantRemoveSubcommand(sub));

const SUBCOMMAND_HANDLERS: Record<
  string,
  (service: GardenService, interaction: ChatInputCommandInteraction) => Promise<void>
> = {
  [WATER_SUBCOMMAND_NAME]: handleWaterSubcommand,
  [STATS_SUBCOMMAND_NAME]: handleStatsSubcommand,
  [OVERVIEW_SUBCOMMAND_NAME]: handleOverviewSubcommand,
  [HISTORY_SUBCOMMAND_NAME]: handleHistorySubcommand,
  [LIMIT_SUBCOMMAND_NAME]: handleLimitSubcommand,
  [AREAL_ADD_SUBCOMMAND_NAME]: handleArealAddSubcommand,
  [AREAL_REMOVE_SUBCOMMAND_NAME]: handleArealRemoveSubcommand,
  [PLANT_ADD_SUBCOMMAND_NAME]: handlePlantAddSubcommand,
  [PLANT_REMOVE_SUBCOMMAND_NAME]: handlePlantRemoveSubcommand,
};

const garden: SlashCommand = {
  data,
  async execute(interaction) {
    const subcommand = interaction.options.getSubcommand(true);
    const handler = SUBCOMMAND_HANDLERS[subcommand];

    if (!handler) {
      await interaction.reply({
        content: 'Unsupported garden subcommand.',
        flags: MessageFlags.Ephemeral,
      });
      return;
    }

    await handler(getGardenService(), interaction);
  },
};

export default garden;
