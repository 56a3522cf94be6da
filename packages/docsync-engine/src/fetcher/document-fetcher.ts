/**
 * @module @docsync/engine/fetcher/document-fetcher
 * Downloads the markdown documents a manifest links to into a scratch directory
 */

import path from 'node:path';
import { randomInt } from 'node:crypto';
import fs from 'fs-extra';
import fg from 'fast-glob';
import { createDocSyncError, SilentLogger, type Logger } from '@docsync/core';
import { extractMarkdownLinks, sanitizeFilename } from './manifest.js';

export interface FetchResponseLike {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
  arrayBuffer(): Promise<ArrayBuffer>;
}

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<FetchResponseLike>;

export interface FetchedDocument {
  label: string;
  url: string;
  localPath: string;
}

export interface DocumentFetcherOptions {
  /** HTTP client; global fetch unless given */
  fetch?: FetchLike;
  logger?: Logger;
  onProgress?: (message: string) => void;
  signal?: AbortSignal;
}

const SUFFIX_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

/**
 * Per-run scratch directory: `<root>/sync_<assistantId>_<6 random chars>`
 */
export async function createScratchDir(root: string, assistantId: string): Promise<string> {
  let suffix = '';
  for (let i = 0; i < 6; i++) {
    suffix += SUFFIX_ALPHABET.charAt(randomInt(SUFFIX_ALPHABET.length));
  }
  const dir = path.join(root, `sync_${assistantId}_${suffix}`);
  await fs.ensureDir(dir);
  return dir;
}

/**
 * Markdown files present in a scratch directory, sorted by name
 */
export async function listMarkdownFiles(dir: string): Promise<string[]> {
  const names = await fg('*.md', { cwd: dir, onlyFiles: true, dot: true });
  return names.sort().map((name) => path.join(dir, name));
}

export class DocumentFetcher {
  private readonly fetch: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly options: DocumentFetcherOptions = {}) {
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? new SilentLogger();
  }

  /**
   * Download every markdown document listed in the manifest into scratchDir.
   * Any failed download aborts the whole fetch.
   */
  async fetchAll(manifestUrl: string, scratchDir: string): Promise<FetchedDocument[]> {
    this.options.onProgress?.(`Downloading manifest from ${manifestUrl}`);
    const manifest = (await (await this.request(manifestUrl)).text()).trim();

    const links = extractMarkdownLinks(manifest);
    this.logger.info(`Found ${links.length} markdown files to download`, { manifestUrl });

    await fs.ensureDir(scratchDir);
    const documents: FetchedDocument[] = [];

    for (const [i, link] of links.entries()) {
      if (!link.url.trim()) {
        continue;
      }
      this.options.onProgress?.(`Downloading file ${i + 1}/${links.length}: ${link.url}`);

      const localPath = path.join(scratchDir, `${sanitizeFilename(link.label)}.md`);
      // Raw bytes, documents are not required to be UTF-8
      const response = await this.request(link.url);
      await fs.writeFile(localPath, Buffer.from(await response.arrayBuffer()));

      this.logger.info(`Downloaded ${localPath}`);
      documents.push({ label: link.label, url: link.url, localPath });
    }

    return documents;
  }

  private async request(url: string): Promise<FetchResponseLike> {
    let response: FetchResponseLike;
    try {
      response = await this.fetch(url, this.options.signal ? { signal: this.options.signal } : undefined);
    } catch (error) {
      throw createDocSyncError(
        'DOCSYNC_DOWNLOAD_FAILED',
        `Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
        { url },
      );
    }

    if (!response.ok) {
      throw createDocSyncError(
        'DOCSYNC_DOWNLOAD_FAILED',
        `Download of ${url} failed: ${response.status} ${response.statusText}`,
        { url, status: response.status },
      );
    }

    return response;
  }
}
