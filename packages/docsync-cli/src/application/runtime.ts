/**
 * Shared setup for commands that talk to the assistant service
 */

import path from 'node:path';
import {
  createLogger,
  loadConfig,
  readEnv,
  requireApiKey,
  type DocSyncConfig,
  type DocSyncEnv,
  type Logger,
} from '@docsync/core';
import { createOpenAIPlatform, type AssistantPlatform, type SyncOptions } from '@docsync/engine';
import type { CommandContext, CommandFlags } from '../cli/types.js';

export interface Runtime {
  config: DocSyncConfig;
  /** Directory of the config file */
  root: string;
  env: DocSyncEnv;
  logger: Logger;
  platform: AssistantPlatform;
}

function createDefaultPlatform(env: DocSyncEnv): AssistantPlatform {
  return createOpenAIPlatform({
    apiKey: requireApiKey(env),
    project: env.OPENAI_PROJECT,
    baseURL: env.OPENAI_BASE_URL,
  });
}

/**
 * `<logging.dir>/<name>_YYYY-MM-DD.log`, relative to the config file
 */
export function logFilePath(config: DocSyncConfig, root: string, name: string, date = new Date()): string | undefined {
  if (!config.logging.dir) {
    return undefined;
  }
  const day = [
    date.getFullYear(),
    String(date.getMonth() + 1).padStart(2, '0'),
    String(date.getDate()).padStart(2, '0'),
  ].join('-');
  return path.resolve(root, config.logging.dir, `${name}_${day}.log`);
}

export async function createRuntime(ctx: CommandContext, flags: CommandFlags, name: string): Promise<Runtime> {
  const { config, root } = await loadConfig({ cwd: ctx.cwd, configPath: flags.config });
  const env = readEnv(ctx.env);
  const logger = createLogger({ logFile: logFilePath(config, root, name) });
  const platform = (ctx.createPlatform ?? createDefaultPlatform)(env);
  return { config, root, env, logger, platform };
}

/**
 * Sync settings from the config file, scratch paths resolved against it
 */
export function resolveSyncOptions(runtime: Runtime, flags: CommandFlags): SyncOptions {
  const sync = runtime.config.sync;
  return {
    scratchRoot: path.resolve(runtime.root, sync.scratchRoot),
    keepScratch: flags.keepScratch ?? sync.keepScratch,
    concurrency: sync.concurrency,
    batchSize: sync.batchSize,
    maxAttempts: sync.maxAttempts,
    pollIntervalMs: sync.pollIntervalMs,
    pollTimeoutMs: sync.pollTimeoutMs,
    logger: runtime.logger,
  };
}
