import type { AdmissionResult } from '../types/garden.js';

export interface AdmissionInput {
  /** Requested plant ids in caller order. */
  requested: readonly number[];
  /** Requested plants that already have a watering on the date. */
  wateredOnDate: ReadonlySet<number>;
  maxPlantsPerDay: number;
  /** Distinct plants watered on the date so far. */
  wateredCount: number;
}

/**
 * First requested, first admitted. Plants already watered on the date pass
 * without consuming capacity; duplicates in the request count once.
 */
export function admitRequests(input: AdmissionInput): AdmissionResult {
  let remaining = Math.max(0, input.maxPlantsPerDay - input.wateredCount);
  const result: AdmissionResult = {
    admitted: [],
    alreadyWatered: [],
    rejected: [],
    remainingCapacity: 0,
    maxPlantsPerDay: input.maxPlantsPerDay,
  };

  const seen = new Set<number>();
  for (const id of input.requested) {
    if (seen.has(id)) continue;
    seen.add(id);

    if (input.wateredOnDate.has(id)) {
      result.admitted.push(id);
      result.alreadyWatered.push(id);
    } else if (remaining > 0) {
      result.admitted.push(id);
      remaining -= 1;
    } else {
      result.rejected.push(id);
    }
  }

  result.remainingCapacity = remaining;
  return result;
}
