import type { DateKey } from '../../../core/utils/dates.js';
import type {
  Areal,
  DailyWateringConfig,
  NewAreal,
  NewPlant,
  PlantRecord,
  PlantState,
  WateringEvent,
  WateringHistoryOptions,
} from '../types/garden.js';

/**
 * Persistence seam of the garden. `transaction` runs `work` against a
 * repository bound to one transaction: everything it writes commits together
 * or not at all, and concurrent transactions are serialized.
 */
export interface GardenRepository {
  transaction<T>(work: (tx: GardenRepository) => Promise<T>): Promise<T>;

  loadPlant(id: number): Promise<PlantRecord | null>;
  findPlantByName(name: string): Promise<PlantRecord | null>;
  loadAllPlants(): Promise<PlantRecord[]>;
  savePlantState(id: number, state: PlantState): Promise<void>;
  insertPlant(plant: NewPlant): Promise<PlantRecord>;
  deletePlant(id: number): Promise<boolean>;

  listAreals(): Promise<Areal[]>;
  insertAreal(areal: NewAreal): Promise<Areal>;
  /** Removes the areal and, by cascade, its plants. */
  deleteAreal(id: string): Promise<boolean>;

  /** Inserts the (plant, date) event if absent; `false` when it already existed. */
  recordWateringEvent(plantId: number, date: DateKey): Promise<boolean>;
  wasWateredOn(plantId: number, date: DateKey): Promise<boolean>;
  countWateredOn(date: DateKey): Promise<number>;
  listWateredOn(date: DateKey): Promise<number[]>;
  listWateringHistory(options?: WateringHistoryOptions): Promise<WateringEvent[]>;

  getDailyConfig(): Promise<DailyWateringConfig>;
  setDailyConfig(maxPlantsPerDay: number): Promise<DailyWateringConfig>;
}
