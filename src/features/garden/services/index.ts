import { env } from '../../../core/config.js';
import { toDateKey } from '../../../core/utils/dates.js';

import { createGardenService, type GardenService } from './gardenService.js';
import { createPgGardenRepository } from './pgGardenRepository.js';

let service: GardenService | null = null;

/** Garden service over Postgres, created on first use. */
export function getGardenService(): GardenService {
  service ??= createGardenService(
    createPgGardenRepository({ defaultDailyLimit: env.GARDEN_DEFAULT_DAILY_LIMIT }),
    { today: () => toDateKey(new Date(), env.GARDEN_TIMEZONE) },
  );
  return service;
}
