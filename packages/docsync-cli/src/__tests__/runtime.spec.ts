import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'fs-extra';
import { parseConfig } from '@docsync/core';
import { createRuntime, logFilePath, resolveSyncOptions } from '../application/runtime.js';
import { run as runSchedule } from '../cli/commands/schedule.js';
import { createTestContext } from './helpers.js';
import { CONFIG, writeConfig } from './fixtures.js';

describe('logFilePath', () => {
  it('should name the file after the command and the day', () => {
    const config = parseConfig({ ...CONFIG, logging: { dir: 'logs' } });

    expect(logFilePath(config, '/srv/docsync', 'chat', new Date(2026, 0, 5, 14, 30))).toBe(
      path.resolve('/srv/docsync', 'logs', 'chat_2026-01-05.log'),
    );
  });

  it('should not log to a file without a logging dir', () => {
    expect(logFilePath(parseConfig(CONFIG), '/srv/docsync', 'chat')).toBeUndefined();
  });
});

describe('createRuntime', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsync-cli-'));
    await writeConfig(tempDir);
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should resolve sync settings against the config directory', async () => {
    const ctx = createTestContext(tempDir);
    const runtime = await createRuntime(ctx, {}, 'sync');

    expect(runtime.platform).toBe(ctx.platform);
    expect(resolveSyncOptions(runtime, {})).toMatchObject({
      scratchRoot: path.join(tempDir, 'scratch'),
      keepScratch: false,
      concurrency: 5,
      batchSize: 100,
      maxAttempts: 3,
      pollIntervalMs: 0,
    });
    expect(resolveSyncOptions(runtime, { keepScratch: true }).keepScratch).toBe(true);
  });

  it('should validate schedule keys before waiting', async () => {
    const controller = new AbortController();
    const ctx = createTestContext(tempDir, { signal: controller.signal });

    expect(await runSchedule(ctx, ['docs', 'nope'], {})).toBe(2);
    expect(ctx.presenter.errors[0]).toBe('✗ Assistant "nope" is not configured (known: docs, support)');
  });

  it('should return once the schedule is cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const ctx = createTestContext(tempDir, { signal: controller.signal });

    expect(await runSchedule(ctx, [], {})).toBe(0);
    expect(ctx.presenter.text()).toBe('');
  });
});
