/**
 * @module @docsync/engine/platform/openai-platform
 * AssistantPlatform backed by the OpenAI Assistants and Vector Stores APIs
 */

import fs from 'fs-extra';
import OpenAI, { NotFoundError } from 'openai';
import { PlatformNotFoundError } from './errors.js';
import type {
  AssistantPlatform,
  BatchStatus,
  FileCounts,
  PlatformStreamEvent,
  UploadBatch,
  VectorIndex,
} from './types.js';

export interface OpenAIPlatformOptions {
  /**
   * OpenAI API key (required unless `client` is given)
   */
  apiKey?: string;

  /**
   * Project the assistants and vector stores belong to
   */
  project?: string;

  /**
   * Base URL for API (optional, for custom endpoints)
   */
  baseURL?: string;

  /**
   * Maximum retries for API calls
   * Default: 3
   */
  maxRetries?: number;

  /**
   * Timeout in milliseconds
   * Default: 60000
   */
  timeout?: number;

  /**
   * Preconfigured client
   */
  client?: OpenAI;
}

interface RawFileBatch {
  id: string;
  status: BatchStatus;
  file_counts: {
    cancelled: number;
    completed: number;
    failed: number;
    in_progress: number;
    total: number;
  };
}

interface RawVectorStore {
  id: string;
  name: string | null;
  status: VectorIndex['status'];
  expires_after?: { anchor: 'last_active_at'; days: number } | null;
}

function toFileCounts(counts: RawFileBatch['file_counts']): FileCounts {
  return {
    inProgress: counts.in_progress,
    completed: counts.completed,
    failed: counts.failed,
    cancelled: counts.cancelled,
    total: counts.total,
  };
}

function toBatch(batch: RawFileBatch): UploadBatch {
  return { id: batch.id, status: batch.status, fileCounts: toFileCounts(batch.file_counts) };
}

function toIndex(store: RawVectorStore): VectorIndex {
  return {
    id: store.id,
    name: store.name,
    status: store.status,
    expiresAfter: store.expires_after ?? null,
  };
}

/**
 * Re-throw 404s as PlatformNotFoundError so callers stay SDK-agnostic
 */
async function translateNotFound<T>(resourceId: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof NotFoundError) {
      throw new PlatformNotFoundError(error.message, resourceId);
    }
    throw error;
  }
}

/**
 * Create the OpenAI-backed platform
 */
export function createOpenAIPlatform(options: OpenAIPlatformOptions): AssistantPlatform {
  const client =
    options.client ??
    new OpenAI({
      apiKey: options.apiKey,
      project: options.project,
      baseURL: options.baseURL,
      maxRetries: options.maxRetries ?? 3,
      timeout: options.timeout ?? 60000,
    });

  return {
    assistants: {
      async retrieveSearchIndexIds(assistantId) {
        const assistant = await client.beta.assistants.retrieve(assistantId);
        const fileSearch = assistant.tool_resources?.file_search;
        if (!fileSearch) {
          return null;
        }
        return fileSearch.vector_store_ids ?? [];
      },

      async setSearchIndexIds(assistantId, indexIds) {
        await client.beta.assistants.update(assistantId, {
          tool_resources: { file_search: { vector_store_ids: indexIds } },
        });
      },
    },

    files: {
      async create(localPath, signal) {
        const file = await client.files.create(
          { file: fs.createReadStream(localPath), purpose: 'assistants' },
          signal ? { signal } : undefined,
        );
        return { id: file.id, filename: file.filename };
      },

      delete(fileId) {
        return translateNotFound(fileId, async () => {
          const deleted = await client.files.del(fileId);
          return { id: deleted.id, deleted: deleted.deleted };
        });
      },
    },

    vectorIndexes: {
      async create(params) {
        const store = await client.vectorStores.create({
          name: params.name,
          expires_after: params.expiresAfter,
        });
        return toIndex(store);
      },

      async retrieve(indexId) {
        return toIndex(await translateNotFound(indexId, () => client.vectorStores.retrieve(indexId)));
      },

      async update(indexId, params) {
        const store = await client.vectorStores.update(indexId, {
          name: params.name,
          expires_after: params.expiresAfter,
        });
        return toIndex(store);
      },

      delete(indexId) {
        return translateNotFound(indexId, async () => {
          const deleted = await client.vectorStores.del(indexId);
          return { id: deleted.id, deleted: deleted.deleted };
        });
      },

      async listFiles(indexId, query) {
        const page = await client.vectorStores.files.list(indexId, {
          limit: query.limit,
          ...(query.after ? { after: query.after } : {}),
          ...(query.filter ? { filter: query.filter } : {}),
        });
        return page.data.map((file) => ({ id: file.id, status: file.status }));
      },

      deleteFile(indexId, fileId) {
        return translateNotFound(fileId, async () => {
          const deleted = await client.vectorStores.files.del(indexId, fileId);
          return { id: deleted.id, deleted: deleted.deleted };
        });
      },

      async createFileBatch(indexId, fileIds) {
        return toBatch(await client.vectorStores.fileBatches.create(indexId, { file_ids: fileIds }));
      },

      async retrieveFileBatch(indexId, batchId) {
        return toBatch(await client.vectorStores.fileBatches.retrieve(indexId, batchId));
      },

      async cancelFileBatch(indexId, batchId) {
        return toBatch(await client.vectorStores.fileBatches.cancel(indexId, batchId));
      },
    },

    conversations: {
      async create() {
        const thread = await client.beta.threads.create();
        return { id: thread.id };
      },

      async postMessage(threadId, text) {
        await client.beta.threads.messages.create(threadId, { role: 'user', content: text });
      },

      async *streamRun(threadId, assistantId, signal): AsyncGenerator<PlatformStreamEvent> {
        const stream = client.beta.threads.runs.stream(
          threadId,
          { assistant_id: assistantId },
          signal ? { signal } : undefined,
        );

        for await (const event of stream) {
          switch (event.event) {
            case 'thread.message.delta':
              for (const part of event.data.delta.content ?? []) {
                if (part.type === 'text' && part.text?.value) {
                  yield { type: 'text-delta', value: part.text.value };
                }
              }
              break;

            case 'thread.run.step.created': {
              const details = event.data.step_details;
              if (details.type === 'tool_calls') {
                for (const call of details.tool_calls) {
                  yield { type: 'tool-call-created', toolType: call.type, id: call.id };
                }
              }
              break;
            }

            case 'thread.run.step.delta': {
              const details = event.data.delta.step_details;
              if (details?.type !== 'tool_calls') {break;}
              for (const call of details.tool_calls ?? []) {
                if (call.type === 'code_interpreter') {
                  const logs = (call.code_interpreter?.outputs ?? []).flatMap((output) =>
                    output.type === 'logs' && output.logs ? [output.logs] : [],
                  );
                  yield {
                    type: 'tool-call-delta',
                    toolType: call.type,
                    ...(call.code_interpreter?.input ? { input: call.code_interpreter.input } : {}),
                    ...(logs.length > 0 ? { logs } : {}),
                  };
                } else {
                  yield { type: 'tool-call-delta', toolType: call.type };
                }
              }
              break;
            }

            case 'thread.run.failed':
            case 'thread.run.cancelled':
            case 'thread.run.expired':
              throw new Error(
                `Run ${event.data.id} ended with status '${event.data.status}'` +
                  (event.data.last_error ? `: ${event.data.last_error.message}` : ''),
              );

            case 'error':
              throw new Error(`Stream error: ${event.data.message}`);

            default:
              break;
          }
        }
      },
    },
  };
}
