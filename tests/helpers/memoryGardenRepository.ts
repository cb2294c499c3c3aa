import type { DateKey } from '../../src/core/utils/dates.js';
import { sizeFor } from '../../src/features/garden/engine/plantState.js';
import { GardenError, PersistenceError } from '../../src/features/garden/errors.js';
import type { GardenRepository } from '../../src/features/garden/services/gardenRepository.js';
import type {
  Areal,
  DailyWateringConfig,
  NewAreal,
  NewPlant,
  PlantRecord,
  PlantState,
  WateringEvent,
  WateringHistoryOptions,
} from '../../src/features/garden/types/garden.js';

interface StoredWatering {
  id: number;
  plantId: number;
  date: DateKey;
}

interface MemoryData {
  areals: Areal[];
  plants: PlantRecord[];
  waterings: StoredWatering[];
  config: DailyWateringConfig;
  nextPlantId: number;
  nextWateringId: number;
}

type RepositoryMethod = Exclude<keyof GardenRepository, 'transaction'>;

export class MemoryStore {
  data: MemoryData;
  queue: Promise<unknown> = Promise.resolve();
  readonly failures = new Map<RepositoryMethod, Error>();
  transactions = 0;
  rollbacks = 0;

  constructor(maxPlantsPerDay: number) {
    this.data = {
      areals: [],
      plants: [],
      waterings: [],
      config: { maxPlantsPerDay, updatedAt: '2026-01-01T00:00:00.000Z' },
      nextPlantId: 1,
      nextWateringId: 1,
    };
  }
}

/**
 * In-process GardenRepository. Transactions are serialized through a promise
 * queue and roll back to a snapshot when `work` throws, mirroring the pg
 * implementation's error wrapping.
 */
export class MemoryGardenRepository implements GardenRepository {
  constructor(
    readonly store: MemoryStore = new MemoryStore(4),
    private readonly inTransaction = false,
  ) {}

  static create(maxPlantsPerDay = 4): MemoryGardenRepository {
    return new MemoryGardenRepository(new MemoryStore(maxPlantsPerDay));
  }

  /** The next call of `method` throws `error`. */
  failOn(method: RepositoryMethod, error: Error): void {
    this.store.failures.set(method, error);
  }

  seedAreal(areal: Partial<Areal> & { id: string }): Areal {
    const created: Areal = {
      name: areal.id,
      horizontalPos: 'left',
      verticalPos: 'top',
      size: 'medium',
      ...areal,
    };
    this.store.data.areals.push(created);
    return { ...created };
  }

  seedPlant(plant: Partial<PlantRecord> & { name: string }): PlantRecord {
    const { data } = this.store;
    const created: PlantRecord = {
      id: data.nextPlantId,
      arealId: 'life',
      imagePath: '',
      position: 'center',
      health: 'healthy',
      size: 'small',
      growthStage: 1,
      waterStreak: 0,
      daysWithoutWater: 0,
      totalWaterCount: 0,
      lastWatered: null,
      lastEvaluated: null,
      ...plant,
    };
    data.nextPlantId = Math.max(data.nextPlantId, created.id) + 1;
    data.plants.push(created);
    return { ...created };
  }

  seedWatering(plantId: number, date: DateKey): void {
    this.store.data.waterings.push({ id: this.store.data.nextWateringId++, plantId, date });
  }

  plant(id: number): PlantRecord | undefined {
    const found = this.store.data.plants.find((p) => p.id === id);
    return found ? this.withArealName(found) : undefined;
  }

  wateringDates(plantId: number): DateKey[] {
    return this.store.data.waterings.filter((w) => w.plantId === plantId).map((w) => w.date);
  }

  transaction<T>(work: (tx: GardenRepository) => Promise<T>): Promise<T> {
    if (this.inTransaction) return work(this);
    const run = this.store.queue.then(() => this.runTransaction(work));
    this.store.queue = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(work: (tx: GardenRepository) => Promise<T>): Promise<T> {
    const { store } = this;
    store.transactions += 1;
    const snapshot = structuredClone(store.data);
    try {
      return await work(new MemoryGardenRepository(store, true));
    } catch (error) {
      store.data = snapshot;
      store.rollbacks += 1;
      if (error instanceof GardenError) throw error;
      throw new PersistenceError('Garden storage is unavailable, nothing was changed', error);
    }
  }

  private check(method: RepositoryMethod): void {
    const failure = this.store.failures.get(method);
    if (failure) {
      this.store.failures.delete(method);
      throw failure;
    }
  }

  private withArealName(plant: PlantRecord): PlantRecord {
    const areal = this.store.data.areals.find((a) => a.id === plant.arealId);
    return { ...plant, arealName: areal?.name };
  }

  async loadPlant(id: number): Promise<PlantRecord | null> {
    this.check('loadPlant');
    return this.plant(id) ?? null;
  }

  async findPlantByName(name: string): Promise<PlantRecord | null> {
    this.check('findPlantByName');
    const needle = name.trim().toLowerCase();
    const found = this.store.data.plants.find((p) => p.name.toLowerCase() === needle);
    return found ? this.withArealName(found) : null;
  }

  async loadAllPlants(): Promise<PlantRecord[]> {
    this.check('loadAllPlants');
    const plants = this.store.data.plants.map((p) => this.withArealName(p));
    return this.inTransaction
      ? plants.sort((a, b) => a.id - b.id)
      : plants.sort((a, b) => a.name.localeCompare(b.name));
  }

  async savePlantState(id: number, state: PlantState): Promise<void> {
    this.check('savePlantState');
    const plant = this.store.data.plants.find((p) => p.id === id);
    if (!plant) return;
    Object.assign(plant, {
      health: state.health,
      size: state.size,
      growthStage: state.growthStage,
      waterStreak: state.waterStreak,
      daysWithoutWater: state.daysWithoutWater,
      totalWaterCount: state.totalWaterCount,
      lastWatered: state.lastWatered,
      lastEvaluated: state.lastEvaluated,
    });
  }

  async insertPlant(plant: NewPlant): Promise<PlantRecord> {
    this.check('insertPlant');
    const health = plant.health ?? 'healthy';
    return this.seedPlant({
      arealId: plant.arealId,
      name: plant.name,
      imagePath: plant.imagePath ?? '',
      position: plant.position ?? 'center',
      health,
      size: sizeFor(health, 1, 0),
    });
  }

  async deletePlant(id: number): Promise<boolean> {
    this.check('deletePlant');
    const { data } = this.store;
    const before = data.plants.length;
    data.plants = data.plants.filter((p) => p.id !== id);
    data.waterings = data.waterings.filter((w) => w.plantId !== id);
    return data.plants.length < before;
  }

  async listAreals(): Promise<Areal[]> {
    this.check('listAreals');
    return this.store.data.areals
      .map((a) => ({ ...a }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async insertAreal(areal: NewAreal): Promise<Areal> {
    this.check('insertAreal');
    return this.seedAreal({
      id: areal.id,
      name: areal.name,
      horizontalPos: areal.horizontalPos ?? 'left',
      verticalPos: areal.verticalPos ?? 'top',
      size: areal.size ?? 'medium',
    });
  }

  async deleteAreal(id: string): Promise<boolean> {
    this.check('deleteAreal');
    const { data } = this.store;
    if (!data.areals.some((a) => a.id === id)) return false;
    const removed = new Set(data.plants.filter((p) => p.arealId === id).map((p) => p.id));
    data.areals = data.areals.filter((a) => a.id !== id);
    data.plants = data.plants.filter((p) => !removed.has(p.id));
    data.waterings = data.waterings.filter((w) => !removed.has(w.plantId));
    return true;
  }

  async recordWateringEvent(plantId: number, date: DateKey): Promise<boolean> {
    this.check('recordWateringEvent');
    const { data } = this.store;
    if (data.waterings.some((w) => w.plantId === plantId && w.date === date)) return false;
    data.waterings.push({ id: data.nextWateringId++, plantId, date });
    return true;
  }

  async wasWateredOn(plantId: number, date: DateKey): Promise<boolean> {
    this.check('wasWateredOn');
    return this.store.data.waterings.some((w) => w.plantId === plantId && w.date === date);
  }

  async countWateredOn(date: DateKey): Promise<number> {
    this.check('countWateredOn');
    return (await this.listWateredOn(date)).length;
  }

  async listWateredOn(date: DateKey): Promise<number[]> {
    this.check('listWateredOn');
    const ids = this.store.data.waterings.filter((w) => w.date === date).map((w) => w.plantId);
    return [...new Set(ids)];
  }

  async listWateringHistory(options: WateringHistoryOptions = {}): Promise<WateringEvent[]> {
    this.check('listWateringHistory');
    const { data } = this.store;
    return data.waterings
      .filter((w) => options.plantId === undefined || w.plantId === options.plantId)
      .sort((a, b) => b.date.localeCompare(a.date) || b.id - a.id)
      .slice(0, options.limit ?? 20)
      .flatMap((w) => {
        const plant = data.plants.find((p) => p.id === w.plantId);
        return plant ? [{ id: w.id, plantId: w.plantId, plantName: plant.name, date: w.date }] : [];
      });
  }

  async getDailyConfig(): Promise<DailyWateringConfig> {
    this.check('getDailyConfig');
    return { ...this.store.data.config };
  }

  async setDailyConfig(maxPlantsPerDay: number): Promise<DailyWateringConfig> {
    this.check('setDailyConfig');
    this.store.data.config = { maxPlantsPerDay, updatedAt: new Date().toISOString() };
    return { ...this.store.data.config };
  }
}
