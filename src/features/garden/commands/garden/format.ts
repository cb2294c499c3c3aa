import { EmbedBuilder } from 'discord.js';

import type {
  ArealWithPlants,
  GardenStats,
  Health,
  PlantRecord,
  PlantRef,
  WateringEvent,
  WaterPlantsResult,
  WateringStats,
} from '../../types/garden.js';

export const GARDEN_COLORS = {
  primary: 0x16a34a,
  warning: 0xf59e0b,
  danger: 0xef4444,
} as const;

const HEALTH_ICONS: Record<Health, string> = {
  healthy: '🌿',
  okay: '🍂',
  dead: '🥀',
};

// Discord caps embed field values at 1024 characters
const FIELD_LIMIT = 1024;

export const healthIcon = (health: Health): string => HEALTH_ICONS[health];

export function formatPlantLine(plant: PlantRecord): string {
  const parts = [
    plant.health,
    plant.size,
    `stage ${plant.growthStage}`,
    `streak ${plant.waterStreak}`,
  ];
  if (plant.daysWithoutWater > 0) parts.push(`${plant.daysWithoutWater}d dry`);
  return `${healthIcon(plant.health)} **${plant.name}** · ${parts.join(' · ')}`;
}

const formatRefs = (refs: readonly PlantRef[]): string =>
  refs.map((p) => `**${p.name}**`).join(', ');

function clampField(lines: string[]): string {
  let value = '';
  for (const [index, line] of lines.entries()) {
    const next = value ? `${value}\n${line}` : line;
    if (next.length > FIELD_LIMIT - 20) {
      return `${value}\n…and ${lines.length - index} more`;
    }
    value = next;
  }
  return value || '—';
}

export function buildWaterResultEmbed(result: WaterPlantsResult): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle(`💧 Watering for ${result.date}`)
    .setColor(result.watered.length ? GARDEN_COLORS.primary : GARDEN_COLORS.warning)
    .setFooter({
      text: `${result.remainingCapacity} of ${result.dailyLimit} waterings left today`,
    });

  if (result.watered.length) {
    embed.addFields({
      name: `Watered (${result.watered.length})`,
      value: clampField(result.watered.map(formatPlantLine)),
    });
  }
  if (result.alreadyWatered.length) {
    embed.addFields({
      name: 'Already watered today',
      value: formatRefs(result.alreadyWatered),
    });
  }
  if (result.rejectedDueToCapacity.length) {
    embed.addFields({
      name: '⛔ Daily limit reached',
      value: formatRefs(result.rejectedDueToCapacity),
    });
  }
  if (result.closedDay.length) {
    embed.addFields({
      name: '🔒 Day already closed',
      value: formatRefs(result.closedDay),
    });
  }
  if (result.unknown.length) {
    embed.addFields({
      name: '❓ Unknown plants',
      value: result.unknown.map((entry) => `\`${entry}\``).join(', '),
    });
  }
  if (!embed.data.fields?.length) {
    embed.setDescription('Nothing to water.');
  }
  return embed;
}

export function buildStatsEmbed(stats: WateringStats): EmbedBuilder {
  return new EmbedBuilder()
    .setTitle(`📊 Garden on ${stats.date}`)
    .setColor(stats.remaining > 0 ? GARDEN_COLORS.primary : GARDEN_COLORS.warning)
    .setDescription(
      `Watered **${stats.wateredToday}** of **${stats.maxPerDay}** · ${stats.remaining} left`,
    )
    .addFields(
      {
        name: 'Watered today',
        value: clampField(stats.wateredPlants.map(formatPlantLine)),
      },
      {
        name: 'Needs water',
        value: clampField(stats.plantsNeedingWater.map(formatPlantLine)),
      },
    );
}

export function buildOverviewEmbed(areals: ArealWithPlants[], stats: GardenStats): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setTitle('🌱 Life garden')
    .setColor(GARDEN_COLORS.primary)
    .setDescription(
      `${stats.totalAreals} areal(s) · ${stats.totalPlants} plant(s) · ` +
        `🌿 ${stats.healthyPlants} · 🍂 ${stats.okayPlants} · 🥀 ${stats.deadPlants}`,
    );

  // Discord allows 25 fields per embed
  for (const areal of areals.slice(0, 25)) {
    embed.addFields({
      name: `${areal.name} (\`${areal.id}\`)`,
      value: areal.plants.length ? clampField(areal.plants.map(formatPlantLine)) : 'No plants yet',
    });
  }
  return embed;
}

export function formatHistoryLines(events: readonly WateringEvent[]): string {
  if (!events.length) return 'No waterings recorded yet.';
  return events.map((event) => `\`${event.date}\` 💧 **${event.plantName}**`).join('\n');
}
