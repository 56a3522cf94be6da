/**
 * Base class for JSONL stores with date-segmented files and rotation
 */

import path from 'node:path';
import fs from 'fs-extra';

export interface FileRotationOptions {
  /**
   * Directory holding the segment files
   * @default '.docsync/store'
   */
  basePath?: string;

  /**
   * Prefix for generated filenames
   * @default 'store-'
   */
  filePrefix?: string;

  /**
   * Maximum number of records per file before rotation
   * @default 1000
   */
  maxRecordsPerFile?: number;

  /**
   * Maximum number of files to keep (oldest deleted first)
   * @default 30
   */
  maxFiles?: number;

  /** Clock, for tests */
  now?: () => number;
}

/**
 * File layout: `{filePrefix}YYYYMMDD-{timestamp}.jsonl`, one `{ v: 1, record }`
 * object per line. A new segment starts when the latest one is full; the
 * oldest segments are removed beyond `maxFiles`.
 */
export abstract class FileRotationStore<TRecord> {
  protected readonly basePath: string;
  protected readonly filePrefix: string;
  protected readonly maxRecordsPerFile: number;
  protected readonly maxFiles: number;
  protected readonly now: () => number;

  constructor(options: FileRotationOptions = {}) {
    this.basePath = options.basePath ?? '.docsync/store';
    this.filePrefix = options.filePrefix ?? 'store-';
    this.maxRecordsPerFile = options.maxRecordsPerFile ?? 1000;
    this.maxFiles = options.maxFiles ?? 30;
    this.now = options.now ?? Date.now;
  }

  protected async appendRecord(record: TRecord): Promise<void> {
    const target = await this.getWritableFile();
    await fs.ensureDir(this.basePath);
    await fs.appendFile(target, `${JSON.stringify({ v: 1, record })}\n`, 'utf8');
    await this.enforceRotation();
  }

  protected async readRecords(
    filter?: (record: TRecord) => boolean,
    limit?: number,
  ): Promise<TRecord[]> {
    const files = await this.getFilesSorted();
    const results: TRecord[] = [];

    for (const file of files) {
      const lines = (await fs.readFile(file, 'utf8')).split('\n').filter(Boolean);
      for (const line of lines) {
        if (limit !== undefined && results.length >= limit) {
          return results;
        }

        let parsed: { v: number; record: TRecord };
        try {
          parsed = JSON.parse(line) as { v: number; record: TRecord };
        } catch {
          // Torn line from an interrupted write
          continue;
        }
        if (!filter || filter(parsed.record)) {
          results.push(parsed.record);
        }
      }
    }

    return results;
  }

  protected async getWritableFile(): Promise<string> {
    const files = await this.getFilesSorted();
    const latest = files[files.length - 1];

    if (!latest) {
      return this.segmentPath(this.now());
    }

    const count = (await fs.readFile(latest, 'utf8')).split('\n').filter(Boolean).length;
    return count >= this.maxRecordsPerFile ? this.segmentPath(this.now()) : latest;
  }

  /**
   * Segment files, oldest first
   */
  protected async getFilesSorted(): Promise<string[]> {
    if (!(await fs.pathExists(this.basePath))) {
      return [];
    }
    const names = await fs.readdir(this.basePath);
    return names
      .filter((name) => name.startsWith(this.filePrefix) && name.endsWith('.jsonl'))
      .sort()
      .map((name) => path.join(this.basePath, name));
  }

  protected segmentPath(ts: number): string {
    const date = new Date(ts);
    const day = String(date.getDate()).padStart(2, '0');
    const month = String(date.getMonth() + 1).padStart(2, '0');
    const year = date.getFullYear();
    return path.join(this.basePath, `${this.filePrefix}${year}${month}${day}-${ts}.jsonl`);
  }

  protected async enforceRotation(): Promise<void> {
    const files = await this.getFilesSorted();
    if (files.length <= this.maxFiles) {return;}

    const toDelete = files.slice(0, files.length - this.maxFiles);
    await Promise.all(toDelete.map((file) => fs.remove(file)));
  }
}
