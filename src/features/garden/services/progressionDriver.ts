import { logger } from '../../../core/logger.js';
import { addDays, isDateKey, type DateKey } from '../../../core/utils/dates.js';
import { isSettledDay, sameState, settlePlant, waterPlantOn } from '../engine/progression.js';
import { InvalidWateringDateError } from '../errors.js';
import type { DailyWateringResult, PlantRecord } from '../types/garden.js';

import { createAdmissionController } from './admissionController.js';
import type { GardenRepository } from './gardenRepository.js';
import { createWateringLedger } from './wateringLedger.js';

export interface ProgressionDriver {
  /** Settles elapsed days, admits and records the waterings for `date`, persists the result. */
  applyDailyWatering(date: DateKey, plantIds: readonly number[]): Promise<DailyWateringResult>;
  /** Applies decay for every day before `date` that has not been evaluated yet. */
  tick(date: DateKey): Promise<PlantRecord[]>;
}

async function settleAll(
  tx: GardenRepository,
  plants: PlantRecord[],
  through: DateKey,
): Promise<PlantRecord[]> {
  const settled: PlantRecord[] = [];
  for (const plant of plants) {
    const next = settlePlant(plant, through);
    if (!sameState(plant, next)) await tx.savePlantState(plant.id, next);
    settled.push(next);
  }
  return settled;
}

export function createProgressionDriver(repo: GardenRepository): ProgressionDriver {
  return {
    async applyDailyWatering(date, plantIds) {
      if (!isDateKey(date)) {
        throw new InvalidWateringDateError(`'${date}' is not a calendar day, expected YYYY-MM-DD`);
      }

      return repo.transaction(async (tx) => {
        const ledger = createWateringLedger(tx);
        const admission = createAdmissionController(tx, ledger);

        const loaded = await tx.loadAllPlants();
        const byId = new Map(loaded.map((p) => [p.id, p]));
        const open: number[] = [];
        const closedDay: number[] = [];
        for (const id of new Set(plantIds)) {
          const plant = byId.get(id);
          if (!plant) continue;
          // A ledger entry means the watering already counted, even on a closed day
          if (isSettledDay(plant, date) && !(await ledger.wasWateredOn(id, date))) {
            closedDay.push(id);
          } else {
            open.push(id);
          }
        }
        if (closedDay.length > 0) {
          logger.info({ date, closedDay }, 'Day already closed for requested plants');
        }

        const plants = await settleAll(tx, loaded, addDays(date, -1));
        const result = await admission.tryAdmit(date, open);
        const already = new Set(result.alreadyWatered);
        const fresh = new Set(result.admitted.filter((id) => !already.has(id)));

        const updated: PlantRecord[] = [];
        for (const plant of plants) {
          if (!fresh.has(plant.id)) {
            updated.push(plant);
            continue;
          }
          await ledger.recordWatering(plant.id, date);
          const next = waterPlantOn(plant, date);
          if (!sameState(plant, next)) {
            await tx.savePlantState(plant.id, next);
            logger.debug(
              {
                plantId: plant.id,
                health: next.health,
                size: next.size,
                growthStage: next.growthStage,
                waterStreak: next.waterStreak,
              },
              'Plant watered',
            );
          }
          updated.push(next);
        }

        return { admission: result, closedDay, plants: updated };
      });
    },

    tick(date) {
      return repo.transaction(async (tx) => {
        const plants = await tx.loadAllPlants();
        const through = addDays(date, -1);
        const settled = await settleAll(tx, plants, through);
        const changed = settled.filter((plant, index) => !sameState(plants[index], plant));
        if (changed.length > 0) {
          logger.info({ date, changed: changed.length }, 'Garden settled');
        }
        return settled;
      });
    },
  };
}
