import type { Client } from 'discord.js';

import { env } from '../../../core/config.js';
import { logger } from '../../../core/logger.js';
import { localHHmm, type DateKey } from '../../../core/utils/dates.js';
import { buildStatsEmbed } from '../commands/garden/format.js';
import type { GardenService } from '../services/gardenService.js';
import { getGardenService } from '../services/index.js';
import type { WateringStats } from '../types/garden.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

export interface GardenJobOptions {
  service?: GardenService;
  /** Local `HH:mm` after which the daily reminder goes out. */
  reminderTime?: string;
  reminderChannelId?: string;
  timeZone?: string;
}

async function sendReminder(
  client: Client,
  channelId: string,
  stats: WateringStats,
): Promise<boolean> {
  const channel = await client.channels.fetch(channelId).catch((error: unknown) => {
    logger.warn({ err: error, channelId }, '[garden] reminder channel fetch failed');
    return null;
  });
  if (!channel?.isSendable()) {
    logger.warn({ channelId }, '[garden] reminder channel is not sendable');
    return false;
  }

  const names = stats.plantsNeedingWater.map((p) => p.name);
  let content = `🌱 ${names.length} plant(s) need water today: ${names.join(', ')}.`;
  if (stats.remaining > 0) {
    content += ` Use \`/garden water plants:${names.slice(0, stats.remaining).join(', ')}\`.`;
  }
  await channel.send({ content, embeds: [buildStatsEmbed(stats)] });
  return true;
}

/**
 * Starts the garden schedule: an hourly settle of elapsed days, and a
 * once-a-day reminder listing the plants that need water. Returns a function
 * that stops both timers.
 */
export function initGardenJob(client: Client, options: GardenJobOptions = {}): () => void {
  const service = options.service ?? getGardenService();
  const reminderTime = options.reminderTime ?? env.GARDEN_REMINDER_TIME;
  const channelId = options.reminderChannelId ?? env.GARDEN_REMINDER_CHANNEL_ID;
  const timeZone = options.timeZone ?? env.GARDEN_TIMEZONE;

  // Days on which the reminder already went out
  const remindedOn = new Set<DateKey>();
  const timers: NodeJS.Timeout[] = [];

  const settle = async () => {
    const date = service.today();
    const plants = await service.tick(date);
    logger.info({ date, plants: plants.length }, '[garden] settled elapsed days');
  };

  const remind = async () => {
    if (!channelId) return;
    const date = service.today();
    if (remindedOn.has(date)) return;
    const hhmm = localHHmm(new Date(), timeZone);
    if (hhmm < reminderTime) return;

    const stats = await service.getWateringStats(date);
    if (!stats.plantsNeedingWater.length) {
      remindedOn.add(date);
      logger.info({ date }, '[garden] no plants need water, reminder skipped');
      return;
    }
    if (await sendReminder(client, channelId, stats)) {
      remindedOn.clear();
      remindedOn.add(date);
      logger.info(
        { date, time: hhmm, plants: stats.plantsNeedingWater.length },
        '[garden] reminder sent',
      );
    }
  };

  const runSettle = (label: string) => {
    settle().catch((error: unknown) => logger.warn({ err: error }, `[garden] ${label} error`));
  };
  const runRemind = () => {
    remind().catch((error: unknown) => logger.warn({ err: error }, '[garden] reminder error'));
  };

  logger.info({ reminderTime, channelId, timeZone }, '[garden] starting daily job');
  runSettle('initial settle');
  runRemind();

  // Settle at the top of every hour
  const now = Date.now();
  timers.push(
    setTimeout(() => {
      runSettle('scheduled settle');
      timers.push(setInterval(() => runSettle('hourly settle'), HOUR_MS));
    }, HOUR_MS - (now % HOUR_MS)),
  );

  // Reminder check at the start of every minute
  timers.push(
    setTimeout(() => {
      runRemind();
      timers.push(setInterval(runRemind, MINUTE_MS));
    }, MINUTE_MS - (now % MINUTE_MS)),
  );

  return () => {
    for (const timer of timers) clearTimeout(timer);
    timers.length = 0;
  };
}
