export type GardenErrorCode =
  | 'InvalidConfig'
  | 'InvalidWateringDate'
  | 'UnknownPlant'
  | 'UnknownAreal'
  | 'DuplicateName'
  | 'InvalidInput'
  | 'Persistence';

export class GardenError extends Error {
  constructor(
    readonly code: GardenErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidConfigError extends GardenError {
  constructor(message: string) {
    super('InvalidConfig', message);
  }
}

export class InvalidWateringDateError extends GardenError {
  constructor(message: string) {
    super('InvalidWateringDate', message);
  }
}

export class UnknownPlantError extends GardenError {
  constructor(readonly plant: string) {
    super('UnknownPlant', `Plant '${plant}' not found`);
  }
}

export class UnknownArealError extends GardenError {
  constructor(readonly arealId: string) {
    super('UnknownAreal', `Areal '${arealId}' not found`);
  }
}

export class DuplicateNameError extends GardenError {
  constructor(kind: 'plant' | 'areal', name: string) {
    super(
      'DuplicateName',
      `${kind === 'areal' ? 'An' : 'A'} ${kind} named '${name}' already exists`,
    );
  }
}

/** Storage failed; the surrounding transaction has been rolled back. */
export class PersistenceError extends GardenError {
  constructor(message: string, cause: unknown) {
    super('Persistence', message, { cause });
  }
}

export function isGardenError(value: unknown): value is GardenError {
  return value instanceof GardenError;
}
