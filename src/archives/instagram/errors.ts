import type { ArchiveProgress } from './types.js';

/**
 * Base class for everything the archiver throws on purpose.
 */
export class ArchiveError extends Error {
  retryable: boolean;

  constructor(message: string, options: { cause?: unknown, retryable?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ArchiveError';
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Bad credentials, or a second-factor code the service refused.
 */
export class AuthenticationError extends ArchiveError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { ...options, retryable: false });
    this.name = 'AuthenticationError';
  }
}

/**
 * Network trouble, rate limits, timeouts and other failures that might work
 * if the caller tries again later.
 */
export class TransportError extends ArchiveError {
  status?: number;

  constructor(message: string, options: { cause?: unknown, status?: number } = {}) {
    super(message, { cause: options.cause, retryable: true });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

/**
 * The remote service returned data we don't know how to read.
 */
export class ResponseShapeError extends ArchiveError {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { ...options, retryable: false });
    this.name = 'ResponseShapeError';
  }
}

/**
 * A timeline request failed partway through paging.
 */
export class TimelineError extends ArchiveError {
  postsCollected: number;
  pagesFetched: number;

  constructor(cause: unknown, postsCollected: number, pagesFetched: number) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Timeline request ${pagesFetched + 1} failed after ${postsCollected} posts: ${reason}`,
      { cause, retryable: cause instanceof ArchiveError ? cause.retryable : true }
    );
    this.name = 'TimelineError';
    this.postsCollected = postsCollected;
    this.pagesFetched = pagesFetched;
  }
}

/**
 * An archive run stopped early; carries whatever it managed before that.
 */
export class ArchiveAbortedError extends ArchiveError {
  progress: ArchiveProgress;

  constructor(cause: unknown, progress: ArchiveProgress) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Archive aborted after collecting ${progress.collected} posts (${progress.processed} processed): ${reason}`,
      { cause, retryable: cause instanceof ArchiveError ? cause.retryable : false }
    );
    this.name = 'ArchiveAbortedError';
    this.progress = progress;
  }
}
