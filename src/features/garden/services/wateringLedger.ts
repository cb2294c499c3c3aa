import { logger } from '../../../core/logger.js';
import type { DateKey } from '../../../core/utils/dates.js';
import type { RecordWateringResult } from '../types/garden.js';

import type { GardenRepository } from './gardenRepository.js';

export interface WateringLedger {
  recordWatering(plantId: number, date: DateKey): Promise<RecordWateringResult>;
  countDistinctPlantsWateredOn(date: DateKey): Promise<number>;
  wasWateredOn(plantId: number, date: DateKey): Promise<boolean>;
}

/** Append-only (plant, date) log; a second watering of a plant on one day is a no-op. */
export function createWateringLedger(repo: GardenRepository): WateringLedger {
  return {
    async recordWatering(plantId, date) {
      const inserted = await repo.recordWateringEvent(plantId, date);
      if (!inserted) {
        logger.debug({ plantId, date }, 'Plant already watered on date');
      }
      return { accepted: inserted, alreadyWateredToday: !inserted };
    },
    countDistinctPlantsWateredOn: (date) => repo.countWateredOn(date),
    wasWateredOn: (plantId, date) => repo.wasWateredOn(plantId, date),
  };
}
