import { logger } from '../../../core/logger.js';
import type { DateKey } from '../../../core/utils/dates.js';
import { admitRequests } from '../engine/admission.js';
import { InvalidConfigError } from '../errors.js';
import {
  MAX_DAILY_LIMIT,
  MIN_DAILY_LIMIT,
  type AdmissionResult,
  type DailyWateringConfig,
} from '../types/garden.js';

import type { GardenRepository } from './gardenRepository.js';
import type { WateringLedger } from './wateringLedger.js';

export interface AdmissionController {
  tryAdmit(date: DateKey, requestedPlantIds: readonly number[]): Promise<AdmissionResult>;
  updateDailyLimit(newLimit: number): Promise<DailyWateringConfig>;
}

export function assertDailyLimit(newLimit: number): void {
  if (!Number.isInteger(newLimit) || newLimit < MIN_DAILY_LIMIT || newLimit > MAX_DAILY_LIMIT) {
    throw new InvalidConfigError(
      `Daily limit must be a whole number between ${MIN_DAILY_LIMIT} and ${MAX_DAILY_LIMIT}, got ${newLimit}`,
    );
  }
}

export function createAdmissionController(
  repo: GardenRepository,
  ledger: WateringLedger,
): AdmissionController {
  return {
    async tryAdmit(date, requestedPlantIds) {
      const { maxPlantsPerDay } = await repo.getDailyConfig();
      const wateredCount = await ledger.countDistinctPlantsWateredOn(date);

      const wateredOnDate = new Set<number>();
      for (const id of new Set(requestedPlantIds)) {
        if (await ledger.wasWateredOn(id, date)) wateredOnDate.add(id);
      }

      const result = admitRequests({
        requested: requestedPlantIds,
        wateredOnDate,
        maxPlantsPerDay,
        wateredCount,
      });
      if (result.rejected.length > 0) {
        logger.info(
          { date, maxPlantsPerDay, wateredCount, rejected: result.rejected },
          'Daily watering limit reached',
        );
      }
      return result;
    },

    async updateDailyLimit(newLimit) {
      assertDailyLimit(newLimit);
      const config = await repo.setDailyConfig(newLimit);
      logger.info({ maxPlantsPerDay: config.maxPlantsPerDay }, 'Daily watering limit updated');
      return config;
    },
  };
}
