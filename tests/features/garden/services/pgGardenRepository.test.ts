import { beforeEach, describe, expect, it, vi } from 'vitest';

import { PersistenceError, UnknownPlantError } from '../../../../src/features/garden/errors.js';
import { createPgGardenRepository } from '../../../../src/features/garden/services/pgGardenRepository.js';

interface FakeResult {
  rows: Record<string, unknown>[];
  rowCount: number;
}

const db = vi.hoisted(() => {
  const respond = (text: string): FakeResult => {
    if (text.includes('COUNT(DISTINCT plant_id)')) return { rows: [{ count: 2 }], rowCount: 1 };
    return { rows: [], rowCount: 0 };
  };
  const client = {
    query: vi.fn(async (text: string) => respond(text)),
    release: vi.fn(),
  };
  return {
    respond,
    client,
    query: vi.fn(async (text: string) => respond(text)),
    getClient: vi.fn(async () => client),
  };
});

vi.mock('../../../../src/core/services/database.service.js', () => ({
  query: db.query,
  getClient: db.getClient,
}));

const plantRow = (overrides: Record<string, unknown> = {}) => ({
  id: 3,
  areal_id: 'life',
  areal_name: 'Life',
  name: 'Yoga',
  image_path: '',
  position: 'center',
  health: 'okay',
  size: 'medium',
  growth_stage: 4,
  water_streak: 2,
  days_without_water: 0,
  total_water_count: 9,
  last_watered: '2026-03-09',
  last_evaluated: '2026-03-08',
  ...overrides,
});

const clientStatements = () =>
  db.client.query.mock.calls.map(([text]) => {
    if (text === 'BEGIN' || text === 'COMMIT' || text === 'ROLLBACK') return text;
    if (text.includes('FOR UPDATE')) return 'LOCK';
    return 'QUERY';
  });

describe('garden/pgGardenRepository', () => {
  beforeEach(() => {
    db.query.mockReset().mockImplementation(async (text: string) => db.respond(text));
    db.client.query.mockReset().mockImplementation(async (text: string) => db.respond(text));
    db.client.release.mockClear();
  });

  it('creates the tables once with the default limit', async () => {
    const repo = createPgGardenRepository({ defaultDailyLimit: 6 });

    await repo.countWateredOn('2026-03-10');
    await repo.countWateredOn('2026-03-11');

    const ensureCalls = db.query.mock.calls.filter(([text]) =>
      text.includes('garden_daily_config'),
    );
    expect(db.query.mock.calls[0][0]).toContain('CREATE TABLE IF NOT EXISTS garden_areals');
    expect(ensureCalls).toHaveLength(2);
    expect(db.query).toHaveBeenCalledWith(expect.stringContaining('ON CONFLICT'), [6]);
    expect(db.query).toHaveBeenCalledTimes(4);
  });

  it('runs work inside a locked transaction', async () => {
    const repo = createPgGardenRepository({ defaultDailyLimit: 4 });

    const count = await repo.transaction((tx) => tx.countWateredOn('2026-03-10'));

    expect(count).toBe(2);
    expect(clientStatements()).toEqual(['BEGIN', 'LOCK', 'QUERY', 'COMMIT']);
    expect(db.client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and wraps storage failures', async () => {
    const repo = createPgGardenRepository({ defaultDailyLimit: 4 });
    const broken = new Error('connection reset');

    const error = await repo
      .transaction(async () => {
        throw broken;
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PersistenceError);
    expect(error).toHaveProperty('cause', broken);
    expect(clientStatements()).toEqual(['BEGIN', 'LOCK', 'ROLLBACK']);
    expect(db.client.release).toHaveBeenCalledTimes(1);
  });

  it('rethrows garden errors unchanged', async () => {
    const repo = createPgGardenRepository({ defaultDailyLimit: 4 });
    const unknown = new UnknownPlantError('Cactus');

    await expect(
      repo.transaction(async () => {
        throw unknown;
      }),
    ).rejects.toBe(unknown);
    expect(clientStatements()).toEqual(['BEGIN', 'LOCK', 'ROLLBACK']);
  });

  it('maps plant rows', async () => {
    const repo = createPgGardenRepository({ defaultDailyLimit: 4 });
    db.query.mockImplementation(async (text: string) =>
      text.includes('WHERE p.id = $1') ? { rows: [plantRow()], rowCount: 1 } : db.respond(text),
    );

    expect(await repo.loadPlant(3)).toEqual({
      id: 3,
      arealId: 'life',
      arealName: 'Life',
      name: 'Yoga',
      imagePath: '',
      position: 'center',
      health: 'okay',
      size: 'medium',
      growthStage: 4,
      waterStreak: 2,
      daysWithoutWater: 0,
      totalWaterCount: 9,
      lastWatered: '2026-03-09',
      lastEvaluated: '2026-03-08',
    });
    expect(db.query).toHaveBeenLastCalledWith(expect.stringContaining('WHERE p.id = $1'), [3]);
  });

  it('refuses rows with an unknown health', async () => {
    const repo = createPgGardenRepository({ defaultDailyLimit: 4 });
    db.query.mockImplementation(async (text: string) =>
      text.includes('WHERE p.id = $1')
        ? { rows: [plantRow({ health: 'wilted' })], rowCount: 1 }
        : db.respond(text),
    );

    await expect(repo.loadPlant(3)).rejects.toThrow('Plant 3 has invalid state wilted/medium');
  });

  it('writes plant state in one statement', async () => {
    const repo = createPgGardenRepository({ defaultDailyLimit: 4 });

    await repo.transaction((tx) =>
      tx.savePlantState(3, {
        health: 'healthy',
        size: 'big',
        growthStage: 5,
        waterStreak: 7,
        daysWithoutWater: 0,
        totalWaterCount: 17,
        lastWatered: '2026-03-10',
        lastEvaluated: '2026-03-09',
      }),
    );

    expect(db.client.query).toHaveBeenCalledWith(expect.stringContaining('UPDATE garden_plants'), [
      3,
      'healthy',
      'big',
      5,
      7,
      0,
      17,
      '2026-03-10',
      '2026-03-09',
    ]);
  });
});
