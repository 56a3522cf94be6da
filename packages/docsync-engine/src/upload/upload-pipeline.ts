/**
 * @module @docsync/engine/upload/upload-pipeline
 * Concurrent upload of local documents followed by batched indexing with retries
 */

import {
  chunk,
  createDocSyncError,
  isDocSyncError,
  runWithConcurrency,
  SilentLogger,
  wrapError,
  type Logger,
} from '@docsync/core';
import { RemoteFileStore } from '../remote/remote-file-store.js';
import { VectorIndexManager } from '../index-manager/vector-index-manager.js';
import { createAndPollBatch } from './batch-poller.js';
import type { AssistantPlatform, RemoteFile } from '../platform/types.js';

export interface UploadItem {
  /** Human-readable origin of the document (link label or url); may be empty */
  label: string;
  localPath: string;
}

export interface UploadPipelineOptions {
  /** Parallel storage uploads. Default: 5 */
  concurrency?: number;
  /** File ids per indexing batch. Default: 100 */
  batchSize?: number;
  /** Indexing attempts, the first one included. Default: 3 */
  maxAttempts?: number;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  logger?: Logger;
}

export interface UploadReport {
  ok: boolean;
  total: number;
  successful: number;
  /** total - successful */
  failed: number;
  /** Indexing attempts made */
  attempts: number;
  /** Storage ids of the uploaded documents */
  fileIds: string[];
}

export const DEFAULT_UPLOAD_CONCURRENCY = 5;
export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_MAX_ATTEMPTS = 3;

export class UploadPipeline {
  private readonly store: RemoteFileStore;
  private readonly logger: Logger;
  private readonly concurrency: number;
  private readonly batchSize: number;
  private readonly maxAttempts: number;

  constructor(
    private readonly platform: AssistantPlatform,
    private readonly manager: VectorIndexManager,
    private readonly options: UploadPipelineOptions = {},
  ) {
    this.logger = options.logger ?? new SilentLogger();
    this.store = new RemoteFileStore(platform, this.logger);
    this.concurrency = options.concurrency ?? DEFAULT_UPLOAD_CONCURRENCY;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  async createVectorStoreAndUpload(files: UploadItem[]): Promise<boolean> {
    return (await this.createVectorStoreAndUploadDetailed(files)).ok;
  }

  async createVectorStoreAndUploadDetailed(files: UploadItem[]): Promise<UploadReport> {
    let indexId: string;
    try {
      indexId = await this.manager.ensureCanonicalIndex();
    } catch (error) {
      throw wrapError(error, 'DOCSYNC_INDEX_ERROR');
    }
    return this.uploadFilesDetailed(files, indexId);
  }

  async uploadFiles(files: UploadItem[], indexId: string): Promise<boolean> {
    return (await this.uploadFilesDetailed(files, indexId)).ok;
  }

  /**
   * Upload every file to storage, then register the ids into the index.
   *
   * A failed storage upload throws and nothing is indexed. An empty file list
   * and a batch that does not complete both end the run with ok=false. Files the index reports as
   * failed are removed from it and resubmitted, up to maxAttempts in total.
   */
  async uploadFilesDetailed(files: UploadItem[], indexId: string): Promise<UploadReport> {
    this.logger.debug(`Uploading ${files.length} files to vector store '${indexId}'`);

    const uploaded = await this.uploadToStorage(files);
    const total = uploaded.length;
    const report: UploadReport = {
      ok: false,
      total,
      successful: 0,
      failed: total,
      attempts: 0,
      fileIds: uploaded.map((file) => file.id),
    };
    const finish = (ok: boolean): UploadReport => ({ ...report, ok, failed: total - report.successful });

    if (total === 0) {
      this.logger.error('No files to index');
      return finish(false);
    }

    let fileIds = report.fileIds;
    while (report.attempts < this.maxAttempts && fileIds.length > 0) {
      for (const [n, batchIds] of chunk(fileIds, this.batchSize).entries()) {
        const batch = await createAndPollBatch(this.platform, indexId, batchIds, {
          intervalMs: this.options.pollIntervalMs,
          timeoutMs: this.options.pollTimeoutMs,
          logger: this.logger,
        });

        if (batch.status !== 'completed') {
          this.logger.error(
            `Batch ${n + 1} failed with status '${batch.status}', aborting upload`,
            { fileCounts: batch.fileCounts },
          );
          report.attempts += 1;
          return finish(false);
        }

        report.successful += batch.fileCounts.completed;
        this.logger.info(`Indexed batch ${n + 1}`, { fileCounts: batch.fileCounts });
      }

      report.attempts += 1;
      this.logger.info(`Attempt ${report.attempts}: indexed ${report.successful}/${total}`);

      const failedIds = await this.listFailedIds(indexId);
      if (failedIds.length === 0 && report.successful === total) {
        this.logger.info('All files indexed');
        return finish(true);
      }

      if (report.attempts >= this.maxAttempts) {
        this.logger.error(
          `Reached ${this.maxAttempts} attempts, ${total - report.successful} files failed to index`,
        );
        return finish(false);
      }

      this.logger.info(
        `${total - report.successful} files failed to index, retrying (attempt ${report.attempts + 1})`,
      );
      // Drop the failed entries so the resubmission does not register them twice
      for (const failedId of failedIds) {
        await this.store.deleteIndexedFile(indexId, failedId);
      }
      fileIds = failedIds;
    }

    return finish(false);
  }

  private async uploadToStorage(files: UploadItem[]): Promise<RemoteFile[]> {
    return runWithConcurrency(
      files,
      async (file, _index, signal) => {
        try {
          return await this.store.create(file.localPath, signal);
        } catch (error) {
          if (isDocSyncError(error)) {throw error;}
          throw createDocSyncError(
            'DOCSYNC_UPLOAD_FAILED',
            `Upload of ${file.localPath} failed: ${error instanceof Error ? error.message : String(error)}`,
            { localPath: file.localPath, label: file.label },
          );
        }
      },
      { concurrency: this.concurrency },
    );
  }

  /**
   * Ids the index reports as failed; a listing error counts as none
   */
  private async listFailedIds(indexId: string): Promise<string[]> {
    try {
      const failed = await this.store.listIndexedFiles(indexId, { status: 'failed' });
      return failed.map((file) => file.id);
    } catch (error) {
      this.logger.error('Failed to list failed files', { error });
      return [];
    }
  }
}
