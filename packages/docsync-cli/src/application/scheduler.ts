/**
 * Daily trigger for unattended syncs
 */

import { createDocSyncError, formatErrorWithStack, SilentLogger, sleep, type Logger } from '@docsync/core';

const DAILY_AT_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * First local time strictly after `from` whose clock reads `dailyAt` (HH:MM)
 */
export function nextDailyRun(from: Date, dailyAt: string): Date {
  const match = DAILY_AT_PATTERN.exec(dailyAt);
  if (!match) {
    throw createDocSyncError('DOCSYNC_CONFIG_INVALID', `Invalid daily time "${dailyAt}", expected HH:MM`);
  }

  const next = new Date(from.getTime());
  next.setHours(Number(match[1]), Number(match[2]), 0, 0);
  if (next.getTime() <= from.getTime()) {
    next.setDate(next.getDate() + 1);
  }
  return next;
}

export interface DailyScheduleOptions {
  dailyAt: string;
  signal: AbortSignal;
  logger?: Logger;
  onScheduled?: (next: Date) => void;
}

/**
 * Run `task` every day at `dailyAt` until the signal aborts. A failing run is
 * logged and the next one is scheduled as usual.
 */
export async function runDaily(task: () => Promise<void>, options: DailyScheduleOptions): Promise<void> {
  const logger = options.logger ?? new SilentLogger();

  while (!options.signal.aborted) {
    const next = nextDailyRun(new Date(), options.dailyAt);
    options.onScheduled?.(next);

    try {
      await sleep(next.getTime() - Date.now(), options.signal);
    } catch (error) {
      if (options.signal.aborted) {
        return;
      }
      throw error;
    }

    try {
      await task();
    } catch (error) {
      logger.error(`Scheduled run failed: ${formatErrorWithStack(error)}`);
    }
  }
}
