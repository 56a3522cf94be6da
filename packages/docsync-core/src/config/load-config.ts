/**
 * @module @docsync/core/config/load-config
 * Locate, read and validate docsync.config.json
 */

import path from 'node:path';
import fs from 'fs-extra';
import type { ZodError } from 'zod';
import { createDocSyncError } from '../error/docsync-error.js';
import {
  DocSyncConfigSchema,
  EnvSchema,
  type AssistantConfig,
  type DocSyncConfig,
  type DocSyncEnv,
} from './schema.js';

export const CONFIG_FILENAME = 'docsync.config.json';

/**
 * Walk up from cwd looking for docsync.config.json
 */
export async function findNearestConfig(cwd: string): Promise<string | null> {
  let current = path.resolve(cwd);

  while (true) {
    const candidate = path.join(current, CONFIG_FILENAME);
    if (await fs.pathExists(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw config object
 */
export function parseConfig(raw: unknown, source = CONFIG_FILENAME): DocSyncConfig {
  const result = DocSyncConfigSchema.safeParse(raw);
  if (!result.success) {
    throw createDocSyncError(
      'DOCSYNC_CONFIG_INVALID',
      `Invalid configuration in ${source}: ${describeIssues(result.error)}`,
      { source },
    );
  }
  return result.data;
}

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit path; skips the upward search */
  configPath?: string;
}

export interface LoadedConfig {
  config: DocSyncConfig;
  path: string;
  /** Directory of the config file; relative paths in the config resolve against it */
  root: string;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : await findNearestConfig(cwd);

  if (!configPath || !(await fs.pathExists(configPath))) {
    throw createDocSyncError(
      'DOCSYNC_CONFIG_NOT_FOUND',
      `Configuration file not found${configPath ? `: ${configPath}` : ` from ${cwd}`}`,
    );
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw createDocSyncError(
      'DOCSYNC_CONFIG_INVALID',
      `Cannot parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return {
    config: parseConfig(raw, configPath),
    path: configPath,
    root: path.dirname(configPath),
  };
}

export function getAssistant(config: DocSyncConfig, key: string): AssistantConfig {
  const assistant = config.assistants[key];
  if (!assistant) {
    throw createDocSyncError(
      'DOCSYNC_ASSISTANT_NOT_FOUND',
      `Assistant "${key}" is not configured (known: ${Object.keys(config.assistants).join(', ') || 'none'})`,
      { key },
    );
  }
  return assistant;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): DocSyncEnv {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw createDocSyncError('DOCSYNC_CONFIG_INVALID', `Invalid environment: ${describeIssues(result.error)}`);
  }
  return result.data;
}

export function requireApiKey(env: DocSyncEnv): string {
  if (!env.OPENAI_API_KEY) {
    throw createDocSyncError('DOCSYNC_MISSING_API_KEY', 'OPENAI_API_KEY is not set');
  }
  return env.OPENAI_API_KEY;
}
