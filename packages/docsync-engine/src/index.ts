/**
 * @docsync/engine
 * Vector store sync pipeline and conversation session for hosted assistants
 */

// Platform
export * from './platform/types.js';
export * from './platform/errors.js';
export * from './platform/openai-platform.js';

// Documents
export * from './fetcher/manifest.js';
export * from './fetcher/document-fetcher.js';

// Remote storage and index
export * from './remote/remote-file-store.js';
export * from './index-manager/vector-index-manager.js';

// Upload
export * from './upload/batch-poller.js';
export * from './upload/upload-pipeline.js';

// Sync
export * from './sync/sync-job.js';

// Chat
export * from './chat/conversation-session.js';
