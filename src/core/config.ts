import 'dotenv/config';
import { z } from 'zod';

const booleanish = z
  .string()
  .optional()
  .transform((value) => /^\s*(true|1|yes|on)\s*$/i.test(value ?? ''));

const hostTimeZone = Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC';

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate and parse environment variables using zod. Required variables
 * cause the process to exit early with the offending fields listed; optional
 * ones fall back to the defaults below.
 */
const EnvSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  DISCORD_CLIENT_ID: z.string().min(1, 'DISCORD_CLIENT_ID is required'),
  DISCORD_GUILD_ID: z.string().optional(),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Postgres
  PGHOST: z.string().optional(),
  PGPORT: z.coerce.number().int().positive().default(5432),
  PGDATABASE: z.string().optional(),
  PGUSER: z.string().optional(),
  PGPASSWORD: z.string().optional(),
  PGSSL: booleanish,

  // Garden
  GARDEN_TIMEZONE: z
    .string()
    .default(hostTimeZone)
    .refine(isTimeZone, 'GARDEN_TIMEZONE must be an IANA time zone'),
  GARDEN_DEFAULT_DAILY_LIMIT: z.coerce.number().int().min(1).max(50).default(4),
  GARDEN_REMINDER_CHANNEL_ID: z.string().optional(),
  GARDEN_REMINDER_TIME: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'GARDEN_REMINDER_TIME must look like 09:00')
    .default('09:00'),
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
