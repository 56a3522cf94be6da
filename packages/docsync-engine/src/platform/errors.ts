/**
 * @module @docsync/engine/platform/errors
 */

export class PlatformNotFoundError extends Error {
  constructor(
    message: string,
    public readonly resourceId?: string,
  ) {
    super(message);
    this.name = 'PlatformNotFoundError';
  }
}

export function isNotFoundError(error: unknown): error is PlatformNotFoundError {
  return error instanceof PlatformNotFoundError;
}
