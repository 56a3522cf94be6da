/**
 * docsync sync <key>: refresh an assistant's documents from its manifest
 */

import { getAssistant } from '@docsync/core';
import { syncAssistantFiles } from '@docsync/engine';
import { createRuntime, resolveSyncOptions } from '../../application/runtime.js';
import type { CommandModule } from '../types.js';
import { box, colors, formatTiming, keyValue, reportError, safeSymbols, TimingTracker } from '../utils.js';

export const run: CommandModule['run'] = async (ctx, argv, flags) => {
  const key = argv[0];
  if (!key) {
    ctx.presenter.error(`${safeSymbols.cross} Missing assistant key`);
    return 2;
  }

  const tracker = new TimingTracker();
  const verbose = !flags.json && !flags.quiet;

  try {
    const runtime = await createRuntime(ctx, flags, 'sync');
    const assistant = getAssistant(runtime.config, key);

    const report = await syncAssistantFiles(runtime.platform, assistant, {
      ...resolveSyncOptions(runtime, flags),
      fetch: ctx.fetch,
      onProgress: verbose
        ? (stage, message) => ctx.presenter.info(`${colors.dim(`[${stage}]`)} ${message}`)
        : undefined,
    });
    const duration = tracker.total();

    if (flags.json) {
      ctx.presenter.json({
        ok: report.ok,
        key,
        assistantId: report.assistantId,
        message: report.message,
        stage: report.stage,
        documents: report.documents,
        upload: report.upload,
        timing: duration,
      });
    } else if (!flags.quiet || !report.ok) {
      const status = report.ok
        ? `${safeSymbols.check} ${colors.green(report.message)}`
        : `${safeSymbols.cross} ${colors.red(report.message)}`;
      const summary = [
        ...keyValue({
          Assistant: `${assistant.title} (${assistant.id})`,
          Documents: report.documents,
          Indexed: report.upload ? `${report.upload.successful}/${report.upload.total}` : 'none',
        }),
        '',
        `${status} · ${colors.gray(formatTiming(duration))}`,
      ];
      ctx.presenter.write(`\n${box('Sync', summary)}\n`);
    }

    return report.ok ? 0 : 1;
  } catch (error) {
    return reportError(ctx, error);
  }
};
