/**
 * @module @docsync/engine/platform/types
 * Port over the hosted assistant platform: assistants, file storage,
 * vector indexes and conversations
 */

export type VectorIndexStatus = 'expired' | 'in_progress' | 'completed';

export interface ExpiryPolicy {
  anchor: 'last_active_at';
  days: number;
}

export interface VectorIndex {
  id: string;
  name: string | null;
  status: VectorIndexStatus;
  expiresAfter?: ExpiryPolicy | null;
}

export type IndexedFileStatus = 'in_progress' | 'completed' | 'failed' | 'cancelled';

/**
 * A storage file registered into a vector index (same id as the storage file)
 */
export interface IndexedFile {
  id: string;
  status: IndexedFileStatus;
}

export interface RemoteFile {
  id: string;
  filename?: string;
}

export type BatchStatus = 'in_progress' | 'completed' | 'cancelled' | 'failed';

export interface FileCounts {
  inProgress: number;
  completed: number;
  failed: number;
  cancelled: number;
  total: number;
}

export interface UploadBatch {
  id: string;
  status: BatchStatus;
  fileCounts: FileCounts;
}

export interface DeleteResult {
  id: string;
  deleted: boolean;
}

export interface ListIndexedFilesQuery {
  limit: number;
  /** Cursor: id of the last entry already seen */
  after?: string;
  filter?: IndexedFileStatus;
}

export interface IndexUpdate {
  name: string;
  expiresAfter: ExpiryPolicy;
}

export type ConversationEvent =
  | { type: 'text-delta'; value: string }
  | { type: 'tool-call-created'; toolType: string; id?: string }
  | { type: 'tool-call-delta'; toolType: string; input?: string; logs?: string[] }
  | { type: 'done'; text: string };

/** Events the platform produces; `done` is added by the session */
export type PlatformStreamEvent = Exclude<ConversationEvent, { type: 'done' }>;

export interface AssistantsApi {
  /**
   * Vector index ids attached to the assistant's file search tool,
   * or null when the assistant has no file search capability
   */
  retrieveSearchIndexIds(assistantId: string): Promise<string[] | null>;
  setSearchIndexIds(assistantId: string, indexIds: string[]): Promise<void>;
}

export interface FilesApi {
  /** An aborted signal cancels the upload */
  create(localPath: string, signal?: AbortSignal): Promise<RemoteFile>;
  /** Throws PlatformNotFoundError when the file does not exist */
  delete(fileId: string): Promise<DeleteResult>;
}

export interface VectorIndexesApi {
  create(params: IndexUpdate): Promise<VectorIndex>;
  retrieve(indexId: string): Promise<VectorIndex>;
  update(indexId: string, params: IndexUpdate): Promise<VectorIndex>;
  delete(indexId: string): Promise<DeleteResult>;
  listFiles(indexId: string, query: ListIndexedFilesQuery): Promise<IndexedFile[]>;
  /** Throws PlatformNotFoundError when the entry does not exist */
  deleteFile(indexId: string, fileId: string): Promise<DeleteResult>;
  createFileBatch(indexId: string, fileIds: string[]): Promise<UploadBatch>;
  retrieveFileBatch(indexId: string, batchId: string): Promise<UploadBatch>;
  cancelFileBatch(indexId: string, batchId: string): Promise<UploadBatch>;
}

export interface ConversationsApi {
  create(): Promise<{ id: string }>;
  postMessage(threadId: string, text: string): Promise<void>;
  streamRun(
    threadId: string,
    assistantId: string,
    signal?: AbortSignal,
  ): AsyncIterable<PlatformStreamEvent>;
}

/**
 * Injected service handle; every component receives it explicitly
 */
export interface AssistantPlatform {
  assistants: AssistantsApi;
  files: FilesApi;
  vectorIndexes: VectorIndexesApi;
  conversations: ConversationsApi;
}
