import type { DateKey } from '../../../core/utils/dates.js';

export const HEALTH_LEVELS = ['dead', 'okay', 'healthy'] as const;
export const PLANT_SIZES = ['small', 'medium', 'big'] as const;

export type Health = (typeof HEALTH_LEVELS)[number];
export type PlantSize = (typeof PLANT_SIZES)[number];

export const MIN_GROWTH_STAGE = 1;
export const MAX_GROWTH_STAGE = 5;
export const MIN_DAILY_LIMIT = 1;
export const MAX_DAILY_LIMIT = 50;

/** The fields the state calculator reads and writes. */
export interface PlantVitals {
  health: Health;
  size: PlantSize;
  growthStage: number;
  waterStreak: number;
  daysWithoutWater: number;
  totalWaterCount: number;
}

/** Watering-relevant persisted state of one plant. */
export interface PlantState extends PlantVitals {
  lastWatered: DateKey | null;
  /** Last calendar day whose outcome has been applied to the plant. */
  lastEvaluated: DateKey | null;
}

export interface PlantRecord extends PlantState {
  id: number;
  arealId: string;
  arealName?: string;
  name: string;
  imagePath: string;
  position: string;
}

export interface Areal {
  id: string;
  name: string;
  horizontalPos: string;
  verticalPos: string;
  size: string;
}

export interface ArealWithPlants extends Areal {
  plants: PlantRecord[];
}

export interface NewAreal {
  id: string;
  name: string;
  horizontalPos?: string;
  verticalPos?: string;
  size?: string;
}

export interface NewPlant {
  arealId: string;
  name: string;
  imagePath?: string;
  position?: string;
  health?: Health;
}

export interface DailyWateringConfig {
  maxPlantsPerDay: number;
  updatedAt: string;
}

export interface WateringEvent {
  id: number;
  plantId: number;
  plantName: string;
  date: DateKey;
}

export interface WateringHistoryOptions {
  plantId?: number;
  limit?: number;
}

export interface RecordWateringResult {
  accepted: boolean;
  alreadyWateredToday: boolean;
}

export interface AdmissionResult {
  /** Every admitted plant, in request order (already watered ones included). */
  admitted: number[];
  /** Admitted plants that had been watered on the date before this request. */
  alreadyWatered: number[];
  rejected: number[];
  remainingCapacity: number;
  /** Limit the admission was decided against. */
  maxPlantsPerDay: number;
}

export interface DailyWateringResult {
  admission: AdmissionResult;
  /** Requested plants whose day was already settled without a watering. */
  closedDay: number[];
  plants: PlantRecord[];
}

export interface PlantRef {
  id: number;
  name: string;
}

export interface WaterPlantsResult {
  date: DateKey;
  dailyLimit: number;
  watered: PlantRecord[];
  alreadyWatered: PlantRef[];
  rejectedDueToCapacity: PlantRef[];
  closedDay: PlantRef[];
  unknown: string[];
  remainingCapacity: number;
}

export interface WateringStats {
  date: DateKey;
  maxPerDay: number;
  wateredToday: number;
  remaining: number;
  wateredPlants: PlantRecord[];
  plantsNeedingWater: PlantRecord[];
}

export interface GardenStats {
  totalAreals: number;
  totalPlants: number;
  healthyPlants: number;
  okayPlants: number;
  deadPlants: number;
}
