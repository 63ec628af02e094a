/**
 * Error taxonomy shared by the scheduling core and the provider clients.
 *
 * Validation errors go back to the caller and are never retried. Transient
 * provider errors are retried by the publish pipeline; once its attempts run
 * out the failure surfaces as RetryExhaustedError. Permanent provider errors
 * fail the entry immediately.
 */

export type ScheduleValidationReason =
  | 'invalid_time'
  | 'past_time'
  | 'conflict'
  | 'not_found'
  | 'duplicate'
  | 'invalid_image';

export class ScheduleValidationError extends Error {
  constructor(
    public readonly reason: ScheduleValidationReason,
    message: string,
    public readonly filename?: string
  ) {
    super(message);
    this.name = 'ScheduleValidationError';
  }
}

/** No free template slot exists inside the allocation horizon. */
export class AllocationError extends Error {
  constructor(message: string, public readonly horizonDays: number) {
    super(message);
    this.name = 'AllocationError';
  }
}

export class LedgerCorruptionError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'LedgerCorruptionError';
  }
}

export class TransientProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    public readonly code?: number
  ) {
    super(message);
    this.name = 'TransientProviderError';
  }
}

/** The provider has not finished fetching the media behind a container. */
export class MediaNotReadyError extends TransientProviderError {
  constructor(message: string, provider: string, status?: number, code?: number) {
    super(message, provider, status, code);
    this.name = 'MediaNotReadyError';
  }
}

export class PermanentProviderError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly status?: number,
    public readonly code?: number
  ) {
    super(message);
    this.name = 'PermanentProviderError';
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed after ${attempts} attempts: ${reason}`);
    this.name = 'RetryExhaustedError';
  }
}

export class UploadError extends Error {
  constructor(message: string, public readonly cause: unknown) {
    super(message);
    this.name = 'UploadError';
  }
}

export class TimeoutError extends Error {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export class InstanceAlreadyRunningError extends Error {
  constructor(public readonly role: string, public readonly pid: number) {
    super(`Another ${role} instance is already running (pid ${pid})`);
    this.name = 'InstanceAlreadyRunningError';
  }
}
