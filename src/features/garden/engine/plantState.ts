import {
  MAX_GROWTH_STAGE,
  MIN_GROWTH_STAGE,
  type Health,
  type PlantSize,
  type PlantVitals,
} from '../types/garden.js';

/** Days without water after which the streak counts as broken. */
export const STREAK_BREAK_DAYS = 2;

export const RECOVERY_STREAK = { dead: 5, okay: 7 } as const;

/** Streak a healthy plant needs after watering to stay healthy. */
export const HEALTHY_MIN_STREAK = 2;

export const DECLINE_DAYS = {
  healthyToDead: 8,
  healthyToOkay: 5,
  okayToDead: 3,
} as const;

export const NEGLECT_DAYS = { capMedium: 4, capSmall: 6 } as const;

/** Growth stage a plant falls back to once neglect caps it at small. */
const NEGLECTED_GROWTH_STAGE = 2;

const SIZE_RANK: Record<PlantSize, number> = { small: 0, medium: 1, big: 2 };

const clamp = (value: number, min: number, max: number) => Math.min(max, Math.max(min, value));

const counter = (value: number) => (Number.isFinite(value) ? Math.max(0, Math.floor(value)) : 0);

function smallerSize(a: PlantSize, b: PlantSize): PlantSize {
  return SIZE_RANK[a] <= SIZE_RANK[b] ? a : b;
}

function recoveredHealth(health: Health, waterStreak: number): Health {
  if (health === 'dead') return waterStreak >= RECOVERY_STREAK.dead ? 'okay' : 'dead';
  if (health === 'okay') return waterStreak >= RECOVERY_STREAK.okay ? 'healthy' : 'okay';
  // A restarted streak (first watering, or back after a gap) only counts as okay
  return waterStreak >= HEALTHY_MIN_STREAK ? 'healthy' : 'okay';
}

function declinedHealth(health: Health, daysWithoutWater: number): Health {
  if (health === 'healthy') {
    // Larger threshold first so a skipped evaluation lands on the most severe outcome
    if (daysWithoutWater >= DECLINE_DAYS.healthyToDead) return 'dead';
    if (daysWithoutWater >= DECLINE_DAYS.healthyToOkay) return 'okay';
    return 'healthy';
  }
  if (health === 'okay') {
    return daysWithoutWater >= DECLINE_DAYS.okayToDead ? 'dead' : 'okay';
  }
  return 'dead';
}

/** Consistency (streak) contributes up to 3 stages, lifetime care up to 2. */
export function growthStageFor(waterStreak: number, totalWaterCount: number): number {
  const fromStreak = Math.min(3, Math.floor(waterStreak / 2));
  const fromTotal = Math.min(2, Math.floor(totalWaterCount / 5));
  return clamp(MIN_GROWTH_STAGE + fromStreak + fromTotal, MIN_GROWTH_STAGE, MAX_GROWTH_STAGE);
}

export function sizeFor(health: Health, growthStage: number, daysWithoutWater: number): PlantSize {
  let size: PlantSize;
  if (health === 'dead') {
    size = 'small';
  } else if (health === 'okay') {
    size = growthStage >= 4 ? 'medium' : 'small';
  } else if (growthStage >= 4) {
    size = 'big';
  } else {
    size = growthStage === 3 ? 'medium' : 'small';
  }

  if (daysWithoutWater >= NEGLECT_DAYS.capSmall) return 'small';
  if (daysWithoutWater >= NEGLECT_DAYS.capMedium) return smallerSize(size, 'medium');
  return size;
}

/**
 * Advances a plant by one evaluated day. Total over its inputs: counters are
 * floored at zero and the growth stage is clamped to 1..5 before use.
 */
export function nextPlantVitals(current: PlantVitals, wateredToday: boolean): PlantVitals {
  const priorStreak = counter(current.waterStreak);
  const priorDays = counter(current.daysWithoutWater);
  const priorTotal = counter(current.totalWaterCount);
  const priorStage = clamp(
    Math.floor(current.growthStage) || MIN_GROWTH_STAGE,
    MIN_GROWTH_STAGE,
    MAX_GROWTH_STAGE,
  );

  if (wateredToday) {
    const waterStreak = priorDays >= STREAK_BREAK_DAYS ? 1 : priorStreak + 1;
    const totalWaterCount = priorTotal + 1;
    const health = recoveredHealth(current.health, waterStreak);
    const growthStage = growthStageFor(waterStreak, totalWaterCount);
    return {
      health,
      growthStage,
      waterStreak,
      totalWaterCount,
      daysWithoutWater: 0,
      size: sizeFor(health, growthStage, 0),
    };
  }

  const daysWithoutWater = priorDays + 1;
  const waterStreak = daysWithoutWater >= STREAK_BREAK_DAYS ? 0 : priorStreak;
  const health = declinedHealth(current.health, daysWithoutWater);
  const growthStage =
    daysWithoutWater >= NEGLECT_DAYS.capSmall
      ? Math.min(priorStage, NEGLECTED_GROWTH_STAGE)
      : priorStage;
  return {
    health,
    growthStage,
    waterStreak,
    totalWaterCount: priorTotal,
    daysWithoutWater,
    size: sizeFor(health, growthStage, daysWithoutWater),
  };
}
