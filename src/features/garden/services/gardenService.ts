import { logger } from '../../../core/logger.js';
import type { DateKey } from '../../../core/utils/dates.js';
import {
  DuplicateNameError,
  GardenError,
  UnknownArealError,
  UnknownPlantError,
} from '../errors.js';
import type {
  Areal,
  ArealWithPlants,
  DailyWateringConfig,
  GardenStats,
  NewAreal,
  NewPlant,
  PlantRecord,
  PlantRef,
  WateringEvent,
  WaterPlantsResult,
  WateringStats,
} from '../types/garden.js';

import { createAdmissionController, type AdmissionController } from './admissionController.js';
import type { GardenRepository } from './gardenRepository.js';
import { createProgressionDriver } from './progressionDriver.js';
import { createWateringLedger } from './wateringLedger.js';

const DEFAULT_HISTORY_LIMIT = 20;
const MAX_HISTORY_LIMIT = 100;

export interface GardenService {
  /** Current calendar day of the garden's clock. */
  today(): DateKey;
  waterPlants(date: DateKey, plantNameOrIdList: readonly string[]): Promise<WaterPlantsResult>;
  getWateringStats(date: DateKey): Promise<WateringStats>;
  updateDailyLimit(newLimit: number): Promise<DailyWateringConfig>;
  tick(date: DateKey): Promise<PlantRecord[]>;

  getGarden(): Promise<ArealWithPlants[]>;
  getGardenStats(): Promise<GardenStats>;
  getWateringHistory(options?: { plant?: string; limit?: number }): Promise<WateringEvent[]>;

  addAreal(areal: NewAreal): Promise<Areal>;
  removeAreal(id: string): Promise<void>;
  addPlant(plant: NewPlant): Promise<PlantRecord>;
  removePlant(plant: string): Promise<PlantRef>;
}

export interface GardenServiceOptions {
  today: () => DateKey;
}

const ref = (plant: PlantRecord): PlantRef => ({ id: plant.id, name: plant.name });

/**
 * Splits a free-form list ("Yoga, 3\nLesen") into plant names or ids.
 * Commas and line breaks separate entries; blanks are dropped.
 */
export function parsePlantList(input: string): string[] {
  return input
    .split(/[,\n]/)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Plants that are struggling (okay/dead) or have gone two or more days
 * without water, excluding the ones already watered on `date`. Most days
 * without water first, dead before alive, shortest streak first.
 */
export function plantsNeedingWater(plants: readonly PlantRecord[], date: DateKey): PlantRecord[] {
  return plants
    .filter((p) => p.lastWatered !== date)
    .filter((p) => p.health !== 'healthy' || p.daysWithoutWater >= 2)
    .sort(
      (a, b) =>
        b.daysWithoutWater - a.daysWithoutWater ||
        Number(b.health === 'dead') - Number(a.health === 'dead') ||
        a.waterStreak - b.waterStreak ||
        a.name.localeCompare(b.name),
    );
}

export function slugify(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

async function findPlant(repo: GardenRepository, entry: string): Promise<PlantRecord | null> {
  if (/^\d+$/.test(entry)) {
    const byId = await repo.loadPlant(Number(entry));
    if (byId) return byId;
  }
  return repo.findPlantByName(entry);
}

export function createGardenService(
  repo: GardenRepository,
  options: GardenServiceOptions,
): GardenService {
  const driver = createProgressionDriver(repo);
  const admission: AdmissionController = createAdmissionController(
    repo,
    createWateringLedger(repo),
  );

  return {
    today: options.today,

    async waterPlants(date, plantNameOrIdList) {
      const unknown: string[] = [];
      const entryById = new Map<number, string>();
      for (const raw of plantNameOrIdList) {
        const entry = raw.trim();
        if (!entry) continue;
        const plant = await findPlant(repo, entry);
        if (!plant) {
          unknown.push(entry);
        } else if (!entryById.has(plant.id)) {
          entryById.set(plant.id, entry);
        }
      }

      const {
        admission: result,
        closedDay,
        plants,
      } = await driver.applyDailyWatering(date, [
        ...entryById.keys(),
      ]);
      const byId = new Map(plants.map((p) => [p.id, p]));

      // Removed between lookup and transaction
      for (const [id, entry] of entryById) {
        if (!byId.has(id)) unknown.push(entry);
      }

      const pick = (ids: number[]) =>
        ids.flatMap((id) => {
          const plant = byId.get(id);
          return plant ? [plant] : [];
        });

      const already = new Set(result.alreadyWatered);
      const outcome: WaterPlantsResult = {
        date,
        dailyLimit: result.maxPlantsPerDay,
        watered: pick(result.admitted.filter((id) => !already.has(id))),
        alreadyWatered: pick(result.alreadyWatered).map(ref),
        rejectedDueToCapacity: pick(result.rejected).map(ref),
        closedDay: pick(closedDay).map(ref),
        unknown,
        remainingCapacity: result.remainingCapacity,
      };

      logger.info(
        {
          date,
          watered: outcome.watered.length,
          alreadyWatered: outcome.alreadyWatered.length,
          rejected: outcome.rejectedDueToCapacity.length,
          closedDay: outcome.closedDay.length,
          unknown: unknown.length,
          remainingCapacity: outcome.remainingCapacity,
        },
        'Watering request processed',
      );
      return outcome;
    },

    async getWateringStats(date) {
      const plants = await driver.tick(date);
      const { maxPlantsPerDay } = await repo.getDailyConfig();
      const wateredIds = new Set(await repo.listWateredOn(date));
      return {
        date,
        maxPerDay: maxPlantsPerDay,
        wateredToday: wateredIds.size,
        remaining: Math.max(0, maxPlantsPerDay - wateredIds.size),
        wateredPlants: plants.filter((p) => wateredIds.has(p.id)),
        plantsNeedingWater: plantsNeedingWater(plants, date),
      };
    },

    updateDailyLimit: (newLimit) => admission.updateDailyLimit(newLimit),

    tick: (date) => driver.tick(date),

    async getGarden() {
      const [areals, plants] = await Promise.all([repo.listAreals(), repo.loadAllPlants()]);
      return areals.map((areal) => ({
        ...areal,
        plants: plants.filter((p) => p.arealId === areal.id),
      }));
    },

    async getGardenStats() {
      const [areals, plants] = await Promise.all([repo.listAreals(), repo.loadAllPlants()]);
      const count = (health: PlantRecord['health']) =>
        plants.filter((p) => p.health === health).length;
      return {
        totalAreals: areals.length,
        totalPlants: plants.length,
        healthyPlants: count('healthy'),
        okayPlants: count('okay'),
        deadPlants: count('dead'),
      };
    },

    async getWateringHistory({ plant, limit } = {}) {
      let plantId: number | undefined;
      if (plant) {
        const found = await findPlant(repo, plant.trim());
        if (!found) throw new UnknownPlantError(plant);
        plantId = found.id;
      }
      const bounded = Math.min(Math.max(limit ?? DEFAULT_HISTORY_LIMIT, 1), MAX_HISTORY_LIMIT);
      return repo.listWateringHistory({ plantId, limit: bounded });
    },

    async addAreal(areal) {
      const id = slugify(areal.id);
      if (!id) throw new GardenError('InvalidInput', 'Areal id must contain letters or digits');
      const existing = await repo.listAreals();
      if (existing.some((a) => a.id === id)) throw new DuplicateNameError('areal', id);
      const created = await repo.insertAreal({ ...areal, id });
      logger.info({ arealId: created.id }, 'Areal added');
      return created;
    },

    async removeAreal(id) {
      const deleted = await repo.deleteAreal(id);
      if (!deleted) throw new UnknownArealError(id);
      logger.info({ arealId: id }, 'Areal removed with its plants');
    },

    async addPlant(plant) {
      const name = plant.name.trim();
      const areals = await repo.listAreals();
      if (!areals.some((a) => a.id === plant.arealId)) throw new UnknownArealError(plant.arealId);
      if (await repo.findPlantByName(name)) throw new DuplicateNameError('plant', name);
      const created = await repo.insertPlant({ ...plant, name });
      logger.info({ plantId: created.id, arealId: created.arealId }, 'Plant added');
      return created;
    },

    async removePlant(entry) {
      const plant = await findPlant(repo, entry.trim());
      if (!plant) throw new UnknownPlantError(entry);
      await repo.deletePlant(plant.id);
      logger.info({ plantId: plant.id }, 'Plant removed');
      return ref(plant);
    },
  };
}
