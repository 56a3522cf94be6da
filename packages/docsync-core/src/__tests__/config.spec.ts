import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import os from 'node:os';
import fs from 'fs-extra';
import {
  CONFIG_FILENAME,
  findNearestConfig,
  getAssistant,
  loadConfig,
  parseConfig,
  readEnv,
  requireApiKey,
} from '../config/load-config.js';

const RAW_CONFIG = {
  assistants: {
    docs: {
      id: 'asst_1',
      title: 'Product docs',
      manifestUrl: 'https://docs.test/llms.txt',
    },
  },
  sync: { concurrency: 3 },
};

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsync-config-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should find the config in a parent directory and apply defaults', async () => {
    await fs.writeJson(path.join(tempDir, CONFIG_FILENAME), RAW_CONFIG);
    const nested = path.join(tempDir, 'a', 'b');
    await fs.ensureDir(nested);

    const loaded = await loadConfig({ cwd: nested });

    expect(loaded.path).toBe(path.join(tempDir, CONFIG_FILENAME));
    expect(loaded.root).toBe(tempDir);
    expect(loaded.config.assistants.docs).toEqual({
      id: 'asst_1',
      title: 'Product docs',
      icon: '💬',
      description: '',
      manifestUrl: 'https://docs.test/llms.txt',
    });
    expect(loaded.config.sync).toEqual({
      scratchRoot: 'tmp',
      concurrency: 3,
      batchSize: 100,
      maxAttempts: 3,
      pollIntervalMs: 1000,
      pollTimeoutMs: 600000,
      keepScratch: false,
    });
    expect(loaded.config.schedule.dailyAt).toBe('03:00');
    expect(loaded.config.feedback.dir).toBe('.docsync/feedback');
  });

  it('should load an explicit config path', async () => {
    await fs.writeJson(path.join(tempDir, 'custom.json'), RAW_CONFIG);

    const loaded = await loadConfig({ cwd: tempDir, configPath: 'custom.json' });

    expect(loaded.path).toBe(path.join(tempDir, 'custom.json'));
  });

  it('should find the nearest config walking up', async () => {
    await fs.writeJson(path.join(tempDir, CONFIG_FILENAME), RAW_CONFIG);
    const nested = path.join(tempDir, 'nested');
    await fs.ensureDir(nested);
    await fs.writeJson(path.join(nested, CONFIG_FILENAME), RAW_CONFIG);

    expect(await findNearestConfig(path.join(nested, 'deeper'))).toBe(path.join(nested, CONFIG_FILENAME));
  });

  it('should fail when an explicit config path does not exist', async () => {
    const missing = path.join(tempDir, 'missing.json');

    await expect(loadConfig({ cwd: tempDir, configPath: 'missing.json' })).rejects.toMatchObject({
      code: 'DOCSYNC_CONFIG_NOT_FOUND',
      message: `Configuration file not found: ${missing}`,
    });
  });

  it('should fail on malformed JSON', async () => {
    await fs.writeFile(path.join(tempDir, CONFIG_FILENAME), '{ "assistants": ');

    await expect(loadConfig({ cwd: tempDir })).rejects.toMatchObject({ code: 'DOCSYNC_CONFIG_INVALID' });
  });
});

describe('parseConfig', () => {
  it('should report the offending field', () => {
    expect(() => parseConfig({ assistants: {}, schedule: { dailyAt: '25:00' } })).toThrow(
      'Invalid configuration in docsync.config.json: schedule.dailyAt: expected HH:MM (24h)',
    );
  });

  it('should reject an assistant without id', () => {
    expect(() => parseConfig({ assistants: { docs: { id: '', title: 'Docs' } } }, 'inline')).toThrow(
      /^Invalid configuration in inline: assistants\.docs\.id: /,
    );
  });

  it('should reject a batch size above the service limit', () => {
    expect(() => parseConfig({ assistants: {}, sync: { batchSize: 501 } })).toThrow(/sync\.batchSize/);
  });
});

describe('getAssistant', () => {
  const config = parseConfig(RAW_CONFIG);

  it('should return the configured assistant', () => {
    expect(getAssistant(config, 'docs').id).toBe('asst_1');
  });

  it('should list known keys for an unknown one', () => {
    expect(() => getAssistant(config, 'nope')).toThrow('Assistant "nope" is not configured (known: docs)');
  });
});

describe('environment', () => {
  it('should read the API settings', () => {
    expect(readEnv({ OPENAI_API_KEY: 'test-secret', OPENAI_PROJECT: 'proj_test', PATH: '/usr/bin' })).toEqual({
      OPENAI_API_KEY: 'test-secret',
      OPENAI_PROJECT: 'proj_test',
    });
  });

  it('should reject an invalid base URL', () => {
    expect(() => readEnv({ OPENAI_BASE_URL: 'not a url' })).toThrow(/^Invalid environment: OPENAI_BASE_URL: /);
  });

  it('should require the API key', () => {
    expect(requireApiKey({ OPENAI_API_KEY: 'test-secret' })).toBe('test-secret');
    expect(() => requireApiKey({})).toThrow('OPENAI_API_KEY is not set');
  });
});
