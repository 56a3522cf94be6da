/**
 * @module @docsync/engine/upload/batch-poller
 * Submit a file batch and wait for it to reach a terminal status
 */

import { sleep, SilentLogger, type Logger } from '@docsync/core';
import type { AssistantPlatform, UploadBatch } from '../platform/types.js';

export interface PollOptions {
  /** Delay between status checks (ms). Default: 1000 */
  intervalMs?: number;
  /** Give up after this long (ms); the batch is cancelled. Default: 10 minutes */
  timeoutMs?: number;
  logger?: Logger;
  /** Clock, for tests */
  now?: () => number;
}

export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_POLL_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * Create a batch registering `fileIds` into the index and poll until it is
 * no longer in progress. Past the deadline the batch is cancelled and
 * returned with status `cancelled`.
 */
export async function createAndPollBatch(
  platform: AssistantPlatform,
  indexId: string,
  fileIds: string[],
  options: PollOptions = {},
): Promise<UploadBatch> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_POLL_TIMEOUT_MS;
  const logger = options.logger ?? new SilentLogger();
  const now = options.now ?? Date.now;
  const deadline = now() + timeoutMs;

  let batch = await platform.vectorIndexes.createFileBatch(indexId, fileIds);

  while (batch.status === 'in_progress') {
    if (now() >= deadline) {
      logger.warn(`File batch '${batch.id}' still in progress after ${timeoutMs}ms, cancelling`);
      try {
        batch = await platform.vectorIndexes.cancelFileBatch(indexId, batch.id);
      } catch (error) {
        logger.error(`Failed to cancel file batch '${batch.id}'`, { error });
      }
      return { ...batch, status: batch.status === 'completed' ? 'completed' : 'cancelled' };
    }
    await sleep(intervalMs);
    batch = await platform.vectorIndexes.retrieveFileBatch(indexId, batch.id);
  }

  return batch;
}
