import { Readable } from 'node:stream';
import { FakePlatform } from '@docsync/engine/testing';
import type { FetchLike } from '@docsync/engine';
import type { CommandContext, Presenter } from '../cli/types.js';

export interface RecordingPresenter extends Presenter {
  output: string[];
  errors: string[];
  payloads: unknown[];
  /** Everything written or printed to stdout, joined */
  text(): string;
}

export function createRecordingPresenter(): RecordingPresenter {
  const output: string[] = [];
  const errors: string[] = [];
  const payloads: unknown[] = [];
  return {
    output,
    errors,
    payloads,
    write: (text) => {
      output.push(text);
    },
    info: (message) => {
      output.push(`${message}\n`);
    },
    warn: (message) => {
      errors.push(message);
    },
    error: (message) => {
      errors.push(message);
    },
    json: (payload) => {
      payloads.push(payload);
    },
    text: () => output.join(''),
  };
}

export interface TestContext extends CommandContext {
  presenter: RecordingPresenter;
  platform: FakePlatform;
}

export function createTestContext(
  cwd: string,
  options: { platform?: FakePlatform; input?: string[]; fetch?: FetchLike; signal?: AbortSignal } = {},
): TestContext {
  const platform = options.platform ?? new FakePlatform();
  return {
    cwd,
    env: {},
    presenter: createRecordingPresenter(),
    stdin: Readable.from(options.input ?? []),
    createPlatform: () => platform,
    fetch: options.fetch,
    signal: options.signal,
    platform,
  };
}
