/**
 * docsync schedule [keys...]: sync assistants every day at schedule.dailyAt
 */

import { getAssistant } from '@docsync/core';
import { syncAssistantFiles } from '@docsync/engine';
import { createRuntime, resolveSyncOptions } from '../../application/runtime.js';
import { runDaily } from '../../application/scheduler.js';
import type { CommandModule } from '../types.js';
import { reportError, safeSymbols } from '../utils.js';

/**
 * The caller's signal when given, otherwise one that aborts on SIGINT/SIGTERM
 */
function interruptSignal(external?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  if (external) {
    return { signal: external, dispose: () => undefined };
  }
  const controller = new AbortController();
  const stop = (): void => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    },
  };
}

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  try {
    const runtime = await createRuntime(ctx, flags, 'schedule');
    const keys = argv.length > 0 ? argv : Object.keys(runtime.config.assistants);
    const targets = keys.map((key) => ({ key, assistant: getAssistant(runtime.config, key) }));
    if (targets.length === 0) {
      ctx.presenter.warn(`${safeSymbols.warning} No assistants configured, nothing to schedule`);
      return 0;
    }
    const syncOptions = resolveSyncOptions(runtime, flags);
    const interrupt = interruptSignal(ctx.signal);

    try {
      await runDaily(
        async () => {
          for (const { key, assistant } of targets) {
            const report = await syncAssistantFiles(runtime.platform, assistant, { ...syncOptions, fetch: ctx.fetch });
            const symbol = report.ok ? safeSymbols.check : safeSymbols.cross;
            ctx.presenter.info(`${symbol} ${key}: ${report.message}`);
          }
        },
        {
          dailyAt: runtime.config.schedule.dailyAt,
          signal: interrupt.signal,
          logger: runtime.logger,
          onScheduled: (next) => {
            if (!flags.quiet) {
              ctx.presenter.info(`${safeSymbols.info} Next sync of ${keys.join(', ')} at ${next.toLocaleString()}`);
            }
          },
        },
      );
    } finally {
      interrupt.dispose();
    }

    return 0;
  } catch (error) {
    return reportError(ctx, error);
  }
};
