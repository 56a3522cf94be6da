/**
 * @module @docsync/engine/remote/remote-file-store
 * Remote storage and index-entry operations with idempotent deletes
 */

import { SilentLogger, type Logger } from '@docsync/core';
import { isNotFoundError } from '../platform/errors.js';
import type {
  AssistantPlatform,
  IndexedFile,
  IndexedFileStatus,
  RemoteFile,
} from '../platform/types.js';

export const DEFAULT_PAGE_SIZE = 100;

export interface ListIndexedFilesOptions {
  status?: IndexedFileStatus;
  pageSize?: number;
}

export class RemoteFileStore {
  constructor(
    private readonly platform: AssistantPlatform,
    private readonly logger: Logger = new SilentLogger(),
  ) {}

  create(localPath: string, signal?: AbortSignal): Promise<RemoteFile> {
    return this.platform.files.create(localPath, signal);
  }

  /**
   * Delete a storage file. "Not found" counts as deleted; other failures are
   * logged and reported as false.
   */
  async delete(fileId: string): Promise<boolean> {
    try {
      const result = await this.platform.files.delete(fileId);
      if (result.deleted) {
        this.logger.debug(`Deleted storage file '${fileId}'`);
        return true;
      }
      this.logger.error(`Storage file '${fileId}' was not deleted`, { result });
      return false;
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.info(`Storage file '${fileId}' does not exist, skipped`);
        return true;
      }
      this.logger.error(`Failed to delete storage file '${fileId}'`, { error });
      return false;
    }
  }

  /**
   * Remove a file entry from a vector index, same policy as delete()
   */
  async deleteIndexedFile(indexId: string, fileId: string): Promise<boolean> {
    try {
      const result = await this.platform.vectorIndexes.deleteFile(indexId, fileId);
      if (result.deleted) {
        this.logger.debug(`Deleted file '${fileId}' from vector store '${indexId}'`);
        return true;
      }
      this.logger.error(`File '${fileId}' was not deleted from vector store '${indexId}'`, { result });
      return false;
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.info(`Vector store '${indexId}' has no file '${fileId}', skipped`);
        return true;
      }
      this.logger.error(`Failed to delete file '${fileId}' from vector store '${indexId}'`, { error });
      return false;
    }
  }

  /**
   * Delete a whole vector index, same policy as delete()
   */
  async deleteIndex(indexId: string): Promise<boolean> {
    try {
      const result = await this.platform.vectorIndexes.delete(indexId);
      if (result.deleted) {
        this.logger.debug(`Deleted vector store '${indexId}'`);
        return true;
      }
      this.logger.error(`Vector store '${indexId}' was not deleted`, { result });
      return false;
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.info(`Vector store '${indexId}' does not exist, skipped`);
        return true;
      }
      this.logger.error(`Failed to delete vector store '${indexId}'`, { error });
      return false;
    }
  }

  /**
   * All entries of an index, paging with the last seen id as cursor until a
   * short page comes back
   */
  async listIndexedFiles(indexId: string, options: ListIndexedFilesOptions = {}): Promise<IndexedFile[]> {
    const limit = options.pageSize ?? DEFAULT_PAGE_SIZE;
    const files: IndexedFile[] = [];
    let after: string | undefined;

    while (true) {
      const page = await this.platform.vectorIndexes.listFiles(indexId, {
        limit,
        ...(after ? { after } : {}),
        ...(options.status ? { filter: options.status } : {}),
      });
      files.push(...page);

      const last = page[page.length - 1];
      if (page.length < limit || !last) {
        break;
      }
      after = last.id;
    }

    return files;
  }
}
