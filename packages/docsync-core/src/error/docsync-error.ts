/**
 * @module @docsync/core/error
 * Standardized error class for docsync
 */

export class DocSyncError extends Error {
  constructor(
    public code: string,
    message: string,
    public hint?: string,
    public meta?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DocSyncError';
  }
}

/**
 * Maps DocSyncError codes to CLI exit codes
 */
export function getExitCode(err: DocSyncError): number {
  if (err.code === 'DOCSYNC_MISSING_API_KEY') {return 3;}
  if (err.code === 'DOCSYNC_CONFIG_NOT_FOUND') {return 2;}
  if (err.code === 'DOCSYNC_CONFIG_INVALID') {return 2;}
  if (err.code === 'DOCSYNC_ASSISTANT_NOT_FOUND') {return 2;}
  return 1;
}

/**
 * Error codes with their standard hints
 */
export const ERROR_HINTS = {
  DOCSYNC_CONFIG_NOT_FOUND: 'No docsync.config.json found - create one or pass --config <path>',
  DOCSYNC_CONFIG_INVALID: 'Configuration failed validation - check the reported fields',
  DOCSYNC_ASSISTANT_NOT_FOUND: 'Unknown assistant key - run "docsync assistants" to list configured keys',
  DOCSYNC_MISSING_API_KEY: 'Set OPENAI_API_KEY in the environment',
  DOCSYNC_DOWNLOAD_FAILED: 'Manifest or document download failed - check the manifest URL and network access',
  DOCSYNC_UPLOAD_FAILED: 'Uploading a document to remote storage failed - nothing was indexed, rerun the sync',
  DOCSYNC_INDEX_ERROR: 'Vector store operation failed - check the assistant in the platform dashboard',
  DOCSYNC_CONVERSATION_FAILED: 'Assistant run did not complete - retry the message',
} as const;

export type ErrorCode = keyof typeof ERROR_HINTS;

/**
 * Create a DocSyncError with standardized code and hint
 */
export function createDocSyncError(
  code: ErrorCode,
  message: string,
  meta?: Record<string, unknown>,
): DocSyncError {
  return new DocSyncError(code, message, ERROR_HINTS[code], meta);
}

/**
 * Create a DocSyncError from a generic error
 */
export function wrapError(error: unknown, code: ErrorCode = 'DOCSYNC_INDEX_ERROR'): DocSyncError {
  if (error instanceof DocSyncError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return createDocSyncError(code, message, { originalError: error });
}

/**
 * Check if an error is a DocSyncError
 */
export function isDocSyncError(error: unknown): error is DocSyncError {
  return error instanceof DocSyncError;
}

/**
 * Message plus stack, for log lines that need the full trace
 */
export function formatErrorWithStack(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}
