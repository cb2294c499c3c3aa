import type pg from 'pg';

import { logger } from '../../../core/logger.js';
import { getClient, query } from '../../../core/services/database.service.js';
import { readSqlFile } from '../../../core/utils/sql.js';
import { sizeFor } from '../engine/plantState.js';
import { GardenError, PersistenceError } from '../errors.js';
import {
  HEALTH_LEVELS,
  MIN_GROWTH_STAGE,
  PLANT_SIZES,
  type Areal,
  type DailyWateringConfig,
  type Health,
  type PlantRecord,
  type PlantSize,
  type WateringEvent,
} from '../types/garden.js';

import type { GardenRepository } from './gardenRepository.js';

type SqlMap = Record<string, string>;

const SQL_FILES: [string, string][] = [
  ['ensureSchema', 'garden_schema_ensure.sql'],
  ['ensureConfig', 'garden_config_ensure.sql'],
  ['getConfig', 'garden_config_get.sql'],
  ['lockConfig', 'garden_config_lock.sql'],
  ['setConfig', 'garden_config_set.sql'],
  ['allPlants', 'garden_plants_all.sql'],
  ['allPlantsForUpdate', 'garden_plants_all_for_update.sql'],
  ['plantById', 'garden_plants_by_id.sql'],
  ['plantByName', 'garden_plants_by_name.sql'],
  ['updatePlantState', 'garden_plants_update_state.sql'],
  ['insertPlant', 'garden_plants_insert.sql'],
  ['deletePlant', 'garden_plants_delete.sql'],
  ['allAreals', 'garden_areals_all.sql'],
  ['insertAreal', 'garden_areals_insert.sql'],
  ['deleteAreal', 'garden_areals_delete.sql'],
  ['insertWatering', 'garden_watering_insert.sql'],
  ['wateringExists', 'garden_watering_exists.sql'],
  ['wateredCountOn', 'garden_watering_count_on.sql'],
  ['wateredPlantsOn', 'garden_watering_plants_on.sql'],
  ['wateringHistory', 'garden_watering_history.sql'],
];

function loadSqlFiles(): SqlMap {
  const result: SqlMap = {};
  for (const [key, file] of SQL_FILES) {
    result[key] = readSqlFile(`features/garden/sql/${file}`);
  }
  return result;
}

const SQL = loadSqlFiles();

interface PlantRow {
  id: number;
  areal_id: string;
  areal_name: string | null;
  name: string;
  image_path: string;
  position: string;
  health: string;
  size: string;
  growth_stage: number;
  water_streak: number;
  days_without_water: number;
  total_water_count: number;
  last_watered: string | null;
  last_evaluated: string | null;
}

interface ArealRow {
  id: string;
  name: string;
  horizontal_pos: string;
  vertical_pos: string;
  size: string;
}

interface ConfigRow {
  max_plants_per_day: number;
  updated_at: string | Date;
}

interface WateringRow {
  id: number;
  plant_id: number;
  plant_name: string;
  watering_date: string;
}

type Runner = <T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<pg.QueryResult<T>>;

const isHealth = (value: string): value is Health => HEALTH_LEVELS.some((h) => h === value);
const isSize = (value: string): value is PlantSize => PLANT_SIZES.some((s) => s === value);

function mapPlant(row: PlantRow): PlantRecord {
  if (!isHealth(row.health) || !isSize(row.size)) {
    throw new Error(`Plant ${row.id} has invalid state ${row.health}/${row.size}`);
  }
  return {
    id: Number(row.id),
    arealId: row.areal_id,
    arealName: row.areal_name ?? undefined,
    name: row.name,
    imagePath: row.image_path,
    position: row.position,
    health: row.health,
    size: row.size,
    growthStage: Number(row.growth_stage),
    waterStreak: Number(row.water_streak),
    daysWithoutWater: Number(row.days_without_water),
    totalWaterCount: Number(row.total_water_count),
    lastWatered: row.last_watered,
    lastEvaluated: row.last_evaluated,
  };
}

function mapAreal(row: ArealRow): Areal {
  return {
    id: row.id,
    name: row.name,
    horizontalPos: row.horizontal_pos,
    verticalPos: row.vertical_pos,
    size: row.size,
  };
}

function mapConfig(row: ConfigRow): DailyWateringConfig {
  return {
    maxPlantsPerDay: Number(row.max_plants_per_day),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

function mapWatering(row: WateringRow): WateringEvent {
  return {
    id: Number(row.id),
    plantId: Number(row.plant_id),
    plantName: row.plant_name,
    date: row.watering_date,
  };
}

function bindRepository(
  run: Runner,
  transaction: GardenRepository['transaction'],
  inTransaction: boolean,
): GardenRepository {
  const repo: GardenRepository = {
    transaction,

    async loadPlant(id) {
      const { rows } = await run<PlantRow>(SQL.plantById, [id]);
      return rows[0] ? mapPlant(rows[0]) : null;
    },

    async findPlantByName(name) {
      const { rows } = await run<PlantRow>(SQL.plantByName, [name.trim()]);
      return rows[0] ? mapPlant(rows[0]) : null;
    },

    async loadAllPlants() {
      const { rows } = await run<PlantRow>(inTransaction ? SQL.allPlantsForUpdate : SQL.allPlants);
      return rows.map((row) => mapPlant(row));
    },

    async savePlantState(id, state) {
      await run(SQL.updatePlantState, [
        id,
        state.health,
        state.size,
        state.growthStage,
        state.waterStreak,
        state.daysWithoutWater,
        state.totalWaterCount,
        state.lastWatered,
        state.lastEvaluated,
      ]);
    },

    async insertPlant(plant) {
      const health = plant.health ?? 'healthy';
      const { rows } = await run<{ id: number }>(SQL.insertPlant, [
        plant.arealId,
        plant.name,
        plant.imagePath ?? '',
        plant.position ?? 'center',
        health,
        sizeFor(health, MIN_GROWTH_STAGE, 0),
      ]);
      const inserted = rows[0] ? await repo.loadPlant(Number(rows[0].id)) : null;
      if (!inserted) throw new Error('Failed to insert plant');
      return inserted;
    },

    async deletePlant(id) {
      const result = await run(SQL.deletePlant, [id]);
      return (result.rowCount ?? 0) > 0;
    },

    async listAreals() {
      const { rows } = await run<ArealRow>(SQL.allAreals);
      return rows.map((row) => mapAreal(row));
    },

    async insertAreal(areal) {
      const { rows } = await run<ArealRow>(SQL.insertAreal, [
        areal.id,
        areal.name,
        areal.horizontalPos ?? 'left',
        areal.verticalPos ?? 'top',
        areal.size ?? 'medium',
      ]);
      const row = rows[0];
      if (!row) throw new Error('Failed to insert areal');
      return mapAreal(row);
    },

    async deleteAreal(id) {
      const result = await run(SQL.deleteAreal, [id]);
      return (result.rowCount ?? 0) > 0;
    },

    async recordWateringEvent(plantId, date) {
      const result = await run(SQL.insertWatering, [plantId, date]);
      return (result.rowCount ?? 0) > 0;
    },

    async wasWateredOn(plantId, date) {
      const { rows } = await run<{ watered: boolean }>(SQL.wateringExists, [plantId, date]);
      return Boolean(rows[0]?.watered);
    },

    async countWateredOn(date) {
      const { rows } = await run<{ count: number }>(SQL.wateredCountOn, [date]);
      return Number(rows[0]?.count ?? 0);
    },

    async listWateredOn(date) {
      const { rows } = await run<{ plant_id: number }>(SQL.wateredPlantsOn, [date]);
      return rows.map((row) => Number(row.plant_id));
    },

    async listWateringHistory(options = {}) {
      const { rows } = await run<WateringRow>(SQL.wateringHistory, [
        options.plantId ?? null,
        options.limit ?? 20,
      ]);
      return rows.map((row) => mapWatering(row));
    },

    async getDailyConfig() {
      const { rows } = await run<ConfigRow>(SQL.getConfig);
      const row = rows[0];
      if (!row) throw new Error('Daily watering config is missing');
      return mapConfig(row);
    },

    async setDailyConfig(maxPlantsPerDay) {
      const { rows } = await run<ConfigRow>(SQL.setConfig, [maxPlantsPerDay]);
      const row = rows[0];
      if (!row) throw new Error('Daily watering config is missing');
      return mapConfig(row);
    },
  };
  return repo;
}

export interface PgGardenRepositoryOptions {
  /** Limit written into the config row when the table is first created. */
  defaultDailyLimit: number;
}

/**
 * GardenRepository over the shared pg pool. Tables are created on first use.
 * Transactions lock the config row first, which serializes every watering
 * and settling transaction.
 */
export function createPgGardenRepository(options: PgGardenRepositoryOptions): GardenRepository {
  let ensured: Promise<void> | null = null;

  const ensureTables = (): Promise<void> => {
    ensured ??= (async () => {
      logger.debug('Ensuring garden tables exist');
      await query(SQL.ensureSchema);
      await query(SQL.ensureConfig, [options.defaultDailyLimit]);
    })().catch((error: unknown) => {
      ensured = null;
      throw error;
    });
    return ensured;
  };

  const poolRunner: Runner = async (text, params) => {
    await ensureTables();
    return query(text, params);
  };

  const transaction: GardenRepository['transaction'] = async (work) => {
    await ensureTables();
    const client = await getClient();
    const clientRunner: Runner = (text, params) => client.query(text, params);
    const inner = bindRepository(clientRunner, (nested) => nested(inner), true);
    try {
      await client.query('BEGIN');
      await client.query(SQL.lockConfig);
      const result = await work(inner);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error({ err: rollbackError }, 'Garden transaction rollback failed');
      });
      if (error instanceof GardenError) throw error;
      logger.error({ err: error }, 'Garden transaction failed');
      throw new PersistenceError('Garden storage is unavailable, nothing was changed', error);
    } finally {
      client.release();
    }
  };

  return bindRepository(poolRunner, transaction, false);
}
