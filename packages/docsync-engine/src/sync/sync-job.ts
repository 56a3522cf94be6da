/**
 * @module @docsync/engine/sync/sync-job
 * Full refresh of an assistant's documents: download, clear, upload, index
 */

import path from 'node:path';
import fs from 'fs-extra';
import {
  childLogger,
  createDocSyncError,
  formatErrorWithStack,
  SilentLogger,
  type AssistantConfig,
  type Logger,
} from '@docsync/core';
import {
  createScratchDir,
  DocumentFetcher,
  listMarkdownFiles,
  type FetchLike,
} from '../fetcher/document-fetcher.js';
import { VectorIndexManager, type EmptyFilesReport } from '../index-manager/vector-index-manager.js';
import { UploadPipeline, type UploadItem, type UploadReport } from '../upload/upload-pipeline.js';
import type { AssistantPlatform } from '../platform/types.js';

export type SyncStage = 'prepare' | 'download' | 'clear' | 'upload' | 'done';

export interface SyncOptions {
  /** Parent of the per-run scratch directory. Default: "tmp" */
  scratchRoot?: string;
  /** Leave the downloaded documents on disk */
  keepScratch?: boolean;
  concurrency?: number;
  batchSize?: number;
  maxAttempts?: number;
  pollIntervalMs?: number;
  pollTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
  onProgress?: (stage: SyncStage, message: string) => void;
}

export interface SyncReport {
  ok: boolean;
  assistantId: string;
  /** Human-readable outcome, safe to show to end users */
  message: string;
  stage: SyncStage;
  documents: number;
  emptied?: EmptyFilesReport;
  upload?: UploadReport;
}

/**
 * Run-scoped state, discarded when the run ends
 */
interface SyncJobState {
  scratchDir?: string;
  documents: number;
  stage: SyncStage;
}

export async function syncAssistantFiles(
  platform: AssistantPlatform,
  assistant: AssistantConfig,
  options: SyncOptions = {},
): Promise<SyncReport> {
  const logger = childLogger(options.logger ?? new SilentLogger(), `asst_id=${assistant.id}`);
  const state: SyncJobState = { documents: 0, stage: 'prepare' };
  const progress = (stage: SyncStage, message: string): void => {
    state.stage = stage;
    logger.info(message);
    options.onProgress?.(stage, message);
  };
  const fail = (message: string, extra: Partial<SyncReport> = {}): SyncReport => ({
    ok: false,
    assistantId: assistant.id,
    message,
    stage: state.stage,
    documents: state.documents,
    ...extra,
  });

  try {
    if (!assistant.manifestUrl) {
      const error = createDocSyncError('DOCSYNC_CONFIG_INVALID', 'No manifest URL configured for this assistant');
      logger.error(error.message);
      return fail(error.message);
    }

    state.scratchDir = await createScratchDir(options.scratchRoot ?? 'tmp', assistant.id);
    progress('prepare', `Created scratch directory ${state.scratchDir}`);

    const fetcher = new DocumentFetcher({
      fetch: options.fetch,
      logger,
      onProgress: (message) => options.onProgress?.('download', message),
    });
    state.stage = 'download';
    const fetched = await fetcher.fetchAll(assistant.manifestUrl, state.scratchDir);
    state.documents = fetched.length;

    const manager = new VectorIndexManager(platform, assistant.id, logger);
    progress('clear', 'Deleting existing files from assistant');
    const emptied = await manager.emptyFilesDetailed();
    if (!emptied.ok) {
      return fail('Failed to empty existing files', { emptied });
    }

    const files: UploadItem[] = (await listMarkdownFiles(state.scratchDir)).map((localPath) => ({
      label: path.basename(localPath, '.md'),
      localPath,
    }));

    progress('upload', `Uploading ${files.length} files to assistant`);
    const pipeline = new UploadPipeline(platform, manager, {
      concurrency: options.concurrency,
      batchSize: options.batchSize,
      maxAttempts: options.maxAttempts,
      pollIntervalMs: options.pollIntervalMs,
      pollTimeoutMs: options.pollTimeoutMs,
      logger,
    });
    const upload = await pipeline.createVectorStoreAndUploadDetailed(files);
    if (!upload.ok) {
      return fail(
        `Failed to create vector store and upload files (${upload.failed}/${upload.total} not indexed)`,
        { emptied, upload },
      );
    }

    progress('done', 'All files updated successfully');
    return {
      ok: true,
      assistantId: assistant.id,
      message: `All files updated successfully (${upload.successful}/${upload.total})`,
      stage: 'done',
      documents: state.documents,
      emptied,
      upload,
    };
  } catch (error) {
    logger.error(`Sync failed: ${formatErrorWithStack(error)}`);
    return fail(`Error updating files: ${error instanceof Error ? error.message : String(error)}`);
  } finally {
    if (state.scratchDir && !options.keepScratch) {
      await fs.remove(state.scratchDir).catch((error: unknown) => {
        logger.warn(`Could not remove scratch directory ${state.scratchDir}`, { error });
      });
    }
  }
}
