// Terminal helpers for the docsync CLI
import { getExitCode, isDocSyncError } from '@docsync/core';
import type { CommandContext, Presenter } from './types.js';

const paint = (code: string) => (text: string): string =>
  process.env.NO_COLOR ? text : `\x1b[${code}m${text}\x1b[0m`;

export const colors = {
  red: paint('31'),
  green: paint('32'),
  yellow: paint('33'),
  cyan: paint('36'),
  gray: paint('90'),
  bold: paint('1'),
  dim: paint('2'),
};

export const safeSymbols = {
  check: '✓',
  cross: '✗',
  arrow: '→',
  bullet: '•',
  info: 'ℹ',
  warning: '⚠',
};

export class TimingTracker {
  private readonly startTime: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  total(): number {
    return this.now() - this.startTime;
  }
}

export function formatTiming(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

export function box(title: string, lines: string[] = []): string {
  const rows = [title, ...lines, ''];
  return rows
    .map(line => (line.length > 0 ? `│ ${line}` : '│'))
    .join('\n');
}

export function keyValue(entries: Record<string, string | number>): string[] {
  return Object.entries(entries).map(([key, value]) => `${colors.cyan(key)}: ${value}`);
}

export function createConsolePresenter(): Presenter {
  return {
    write: (text) => {
      process.stdout.write(text);
    },
    info: (message) => console.log(message),
    warn: (message) => console.warn(colors.yellow(message)),
    error: (message) => console.error(colors.red(message)),
    json: (payload) => console.log(JSON.stringify(payload, null, 2)),
  };
}

/**
 * Print an error (with its hint, for DocSyncErrors) and return the exit code
 */
export function reportError(ctx: CommandContext, error: unknown): number {
  if (isDocSyncError(error)) {
    ctx.presenter.error(`${safeSymbols.cross} ${error.message}`);
    if (error.hint) {
      ctx.presenter.info(colors.dim(`  ${error.hint}`));
    }
    return getExitCode(error);
  }
  ctx.presenter.error(`${safeSymbols.cross} ${error instanceof Error ? error.message : String(error)}`);
  return 1;
}
