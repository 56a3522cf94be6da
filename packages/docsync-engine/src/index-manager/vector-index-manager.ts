/**
 * @module @docsync/engine/index-manager/vector-index-manager
 * Lifecycle of the single vector index attached to an assistant
 */

import { formatErrorWithStack, SilentLogger, type Logger } from '@docsync/core';
import { RemoteFileStore } from '../remote/remote-file-store.js';
import type { AssistantPlatform, ExpiryPolicy } from '../platform/types.js';

/** Expiry applied when an existing index is refreshed after clearing */
export const REFRESHED_INDEX_EXPIRY: ExpiryPolicy = { anchor: 'last_active_at', days: 30 };
/** Expiry of a freshly created index */
export const NEW_INDEX_EXPIRY: ExpiryPolicy = { anchor: 'last_active_at', days: 7 };

export interface EmptyFilesReport {
  /** False only when an unexpected error escaped */
  ok: boolean;
  /** Canonical index that was cleared, if any */
  indexId?: string;
  listed: number;
  cleared: number;
  /** The canonical index was deleted outright */
  indexDeleted: boolean;
  /** Extra indexes removed during consolidation */
  removedExtraIndexes: string[];
  failedIndexEntries: string[];
  failedRemoteFiles: string[];
  error?: string;
}

export function canonicalIndexName(assistantId: string): string {
  return `${assistantId}_vector_store`;
}

export class VectorIndexManager {
  readonly topic: string;
  private readonly store: RemoteFileStore;

  constructor(
    private readonly platform: AssistantPlatform,
    readonly assistantId: string,
    private readonly logger: Logger = new SilentLogger(),
    store?: RemoteFileStore,
  ) {
    this.topic = canonicalIndexName(assistantId);
    this.store = store ?? new RemoteFileStore(platform, logger);
  }

  /**
   * Index ids attached to the assistant's search tool. A missing capability
   * or a failed lookup is logged and yields an empty list.
   */
  async discoverIndexes(): Promise<string[]> {
    try {
      const ids = await this.platform.assistants.retrieveSearchIndexIds(this.assistantId);
      if (ids === null) {
        this.logger.error('Assistant has no file_search tool enabled');
        return [];
      }
      return ids;
    } catch (error) {
      this.logger.error('Failed to read vector stores of assistant', { error });
      return [];
    }
  }

  async emptyFiles(): Promise<boolean> {
    return (await this.emptyFilesDetailed()).ok;
  }

  /**
   * Clear every document from the assistant's canonical index.
   *
   * Extra indexes are deleted first. Each indexed file is removed from the
   * index and from storage, best-effort. The index itself is deleted when a
   * file was still processing, any removal failed, or the index expired;
   * otherwise it is renamed and its expiry reset.
   */
  async emptyFilesDetailed(): Promise<EmptyFilesReport> {
    const report: EmptyFilesReport = {
      ok: true,
      listed: 0,
      cleared: 0,
      indexDeleted: false,
      removedExtraIndexes: [],
      failedIndexEntries: [],
      failedRemoteFiles: [],
    };

    try {
      const indexIds = await this.discoverIndexes();
      const [indexId, ...extras] = indexIds;
      if (!indexId) {
        this.logger.info('Assistant has no vector store attached');
        return report;
      }
      report.indexId = indexId;

      for (const extraId of extras) {
        if (await this.store.deleteIndex(extraId)) {
          report.removedExtraIndexes.push(extraId);
          this.logger.info(`Deleted extra vector store '${extraId}'`);
        } else {
          this.logger.error(`Failed to delete vector store '${extraId}', delete it manually and sync again`);
        }
      }

      const files = await this.store.listIndexedFiles(indexId);
      report.listed = files.length;
      const isProcessing = files.some((file) => file.status === 'in_progress');

      for (const file of files) {
        if (!(await this.store.deleteIndexedFile(indexId, file.id))) {
          report.failedIndexEntries.push(file.id);
        }
        if (!(await this.store.delete(file.id))) {
          report.failedRemoteFiles.push(file.id);
        }
      }

      const current = await this.platform.vectorIndexes.retrieve(indexId);
      const isExpired = current.status === 'expired';
      if (!isExpired) {
        await this.platform.vectorIndexes.update(indexId, {
          name: this.topic,
          expiresAfter: REFRESHED_INDEX_EXPIRY,
        });
      }

      report.cleared = files.length - report.failedIndexEntries.length;

      const hasFailures = report.failedIndexEntries.length > 0 || report.failedRemoteFiles.length > 0;
      if (isProcessing || hasFailures || isExpired) {
        this.logger.info(
          `Vector store '${indexId}' has processing or undeletable files or has expired, deleting the whole store`,
          { isProcessing, isExpired, failed: report.failedIndexEntries.length + report.failedRemoteFiles.length },
        );
        if (await this.store.deleteIndex(indexId)) {
          report.indexDeleted = true;
          report.cleared = files.length;
        } else {
          this.logger.error(`Failed to delete vector store '${indexId}', delete it manually and sync again`);
        }
      }

      this.logger.info(`Cleared assistant files: ${report.cleared}/${report.listed}`);
      return report;
    } catch (error) {
      this.logger.error(`Failed to empty assistant files: ${formatErrorWithStack(error)}`);
      return {
        ...report,
        ok: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * Make sure exactly one index is attached and return its id: create and
   * attach one when there is none, narrow the attachment to the first when
   * there are several.
   */
  async ensureCanonicalIndex(): Promise<string> {
    const indexIds = await this.discoverIndexes();
    const [first, ...extras] = indexIds;

    if (!first) {
      const created = await this.platform.vectorIndexes.create({
        name: this.topic,
        expiresAfter: NEW_INDEX_EXPIRY,
      });
      await this.platform.assistants.setSearchIndexIds(this.assistantId, [created.id]);
      this.logger.info(`Created vector store '${created.id}' and attached it to the assistant`);
      return created.id;
    }

    if (extras.length > 0) {
      await this.platform.assistants.setSearchIndexIds(this.assistantId, [first]);
      this.logger.info(`Narrowed assistant vector stores to '${first}'`);
    }
    return first;
  }
}
