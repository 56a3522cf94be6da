/**
 * docsync assistants: list the configured assistants
 */

import { loadConfig } from '@docsync/core';
import type { CommandModule } from '../types.js';
import { box, colors, keyValue, reportError } from '../utils.js';

export const run: CommandModule['run'] = async (ctx, _argv, flags) => {
  try {
    const { config, path } = await loadConfig({ cwd: ctx.cwd, configPath: flags.config });
    const entries = Object.entries(config.assistants);

    if (flags.json) {
      ctx.presenter.json({
        ok: true,
        config: path,
        assistants: entries.map(([key, assistant]) => ({ key, ...assistant })),
      });
      return 0;
    }

    if (entries.length === 0) {
      ctx.presenter.info(`No assistants configured in ${path}`);
      return 0;
    }

    const lines = entries.flatMap(([key, assistant]) => [
      ...keyValue({ [`${assistant.icon} ${key}`]: `${assistant.title} (${assistant.id})` }),
      ...(assistant.description ? [colors.dim(`  ${assistant.description}`)] : []),
      ...(assistant.manifestUrl ? [] : [colors.yellow('  no manifest URL, sync disabled')]),
    ]);
    ctx.presenter.write(`${box('Assistants', lines)}\n`);
    return 0;
  } catch (error) {
    return reportError(ctx, error);
  }
};
