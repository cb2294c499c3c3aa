import { addDays, type DateKey } from '../../../core/utils/dates.js';
import type { PlantState, PlantVitals } from '../types/garden.js';

import { nextPlantVitals } from './plantState.js';

function vitalsOf(plant: PlantVitals): PlantVitals {
  return {
    health: plant.health,
    size: plant.size,
    growthStage: plant.growthStage,
    waterStreak: plant.waterStreak,
    daysWithoutWater: plant.daysWithoutWater,
    totalWaterCount: plant.totalWaterCount,
  };
}

/**
 * Applies every day after `lastEvaluated` up to and including `through`.
 * The watered day already went through the calculator when it was recorded,
 * so only the days without water are evaluated here. A plant that has never
 * been evaluated is stamped without decay.
 */
export function settlePlant<T extends PlantState>(plant: T, through: DateKey): T {
  if (plant.lastEvaluated === null) return { ...plant, lastEvaluated: through };
  if (plant.lastEvaluated >= through) return plant;

  let vitals = vitalsOf(plant);
  for (let day = addDays(plant.lastEvaluated, 1); day <= through; day = addDays(day, 1)) {
    if (day === plant.lastWatered) continue;
    vitals = nextPlantVitals(vitals, false);
  }
  return { ...plant, ...vitals, lastEvaluated: through };
}

/** Settles the days before `date`, then applies the watered branch once for `date`. */
export function waterPlantOn<T extends PlantState>(plant: T, date: DateKey): T {
  const settled = settlePlant(plant, addDays(date, -1));
  if (settled.lastWatered === date) return settled;
  return { ...settled, ...nextPlantVitals(vitalsOf(settled), true), lastWatered: date };
}

export function isSettledDay(plant: PlantState, date: DateKey): boolean {
  return plant.lastEvaluated !== null && date <= plant.lastEvaluated;
}

export function sameState(a: PlantState, b: PlantState): boolean {
  return (
    a.health === b.health &&
    a.size === b.size &&
    a.growthStage === b.growthStage &&
    a.waterStreak === b.waterStreak &&
    a.daysWithoutWater === b.daysWithoutWater &&
    a.totalWaterCount === b.totalWaterCount &&
    a.lastWatered === b.lastWatered &&
    a.lastEvaluated === b.lastEvaluated
  );
}
