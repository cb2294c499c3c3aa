import { describe, expect, it } from 'vitest';

import {
  isSettledDay,
  sameState,
  settlePlant,
  waterPlantOn,
} from '../../../../src/features/garden/engine/progression.js';
import type { PlantState } from '../../../../src/features/garden/types/garden.js';

const state = (overrides: Partial<PlantState> = {}): PlantState => ({
  health: 'healthy',
  size: 'small',
  growthStage: 1,
  waterStreak: 0,
  daysWithoutWater: 0,
  totalWaterCount: 0,
  lastWatered: null,
  lastEvaluated: '2026-03-01',
  ...overrides,
});

describe('garden/progression', () => {
  it('baselines a plant that was never evaluated', () => {
    const plant = state({ lastEvaluated: null, daysWithoutWater: 1 });

    expect(settlePlant(plant, '2026-03-09')).toEqual({ ...plant, lastEvaluated: '2026-03-09' });
  });

  it('applies one dry day per elapsed day', () => {
    const settled = settlePlant(state({ waterStreak: 4 }), '2026-03-04');

    expect(settled).toMatchObject({
      daysWithoutWater: 3,
      waterStreak: 0,
      health: 'healthy',
      lastEvaluated: '2026-03-04',
    });
  });

  it('skips the day whose watering was already applied', () => {
    const settled = settlePlant(
      state({ lastWatered: '2026-03-02', waterStreak: 2, totalWaterCount: 2 }),
      '2026-03-03',
    );

    expect(settled).toMatchObject({ daysWithoutWater: 1, waterStreak: 2, totalWaterCount: 2 });
  });

  it('is idempotent for the same day', () => {
    const once = settlePlant(state(), '2026-03-05');

    expect(settlePlant(once, '2026-03-05')).toBe(once);
  });

  it('kills a healthy plant left dry for eight days', () => {
    const settled = settlePlant(
      state({ growthStage: 4, size: 'big', waterStreak: 4 }),
      '2026-03-09',
    );

    expect(settled).toMatchObject({
      health: 'dead',
      size: 'small',
      daysWithoutWater: 8,
      growthStage: 2,
    });
  });

  it('applies the watered branch once per day', () => {
    const plant = state({ waterStreak: 1, totalWaterCount: 1 });
    const watered = waterPlantOn(plant, '2026-03-02');

    expect(watered).toMatchObject({
      waterStreak: 2,
      totalWaterCount: 2,
      lastWatered: '2026-03-02',
      lastEvaluated: '2026-03-01',
    });
    expect(sameState(watered, waterPlantOn(watered, '2026-03-02'))).toBe(true);
  });

  it('settles missed days before watering', () => {
    const watered = waterPlantOn(state({ waterStreak: 3, totalWaterCount: 3 }), '2026-03-04');

    // Two dry days (03-02, 03-03) break the streak
    expect(watered).toMatchObject({
      waterStreak: 1,
      daysWithoutWater: 0,
      totalWaterCount: 4,
      lastEvaluated: '2026-03-03',
    });
  });

  it('knows which days are closed', () => {
    const plant = state({ lastEvaluated: '2026-03-05' });

    expect(isSettledDay(plant, '2026-03-05')).toBe(true);
    expect(isSettledDay(plant, '2026-03-06')).toBe(false);
    expect(isSettledDay(state({ lastEvaluated: null }), '2026-03-05')).toBe(false);
  });
});
