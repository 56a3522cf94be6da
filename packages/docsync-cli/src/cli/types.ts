/**
 * CLI command module type definition
 */

import type { DocSyncEnv } from '@docsync/core';
import type { AssistantPlatform, FetchLike } from '@docsync/engine';

export interface Presenter {
  /** Raw text, no newline added */
  write(text: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  json(payload: unknown): void;
}

/**
 * Everything a command reads from its surroundings
 */
export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  presenter: Presenter;
  stdin: NodeJS.ReadableStream;
  /** Remote service factory; the OpenAI platform unless given */
  createPlatform?: (env: DocSyncEnv) => AssistantPlatform;
  fetch?: FetchLike;
  /** Stops long-running commands; SIGINT/SIGTERM unless given */
  signal?: AbortSignal;
}

export interface CommandFlags {
  config?: string;
  json?: boolean;
  quiet?: boolean;
  keepScratch?: boolean;
}

export type CommandModule = {
  run: (ctx: CommandContext, argv: string[], flags: CommandFlags) => Promise<number>;
};
