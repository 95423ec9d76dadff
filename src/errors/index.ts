export type FetchFailureKind = 'not_found' | 'http' | 'dns' | 'timeout' | 'network';

/**
 * A listing page could not be fetched. Terminal for the spider run.
 */
export class FetchFailedError extends Error {
  readonly name = 'FetchFailedError';

  constructor(
    readonly kind: FetchFailureKind,
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * A work-unit field group is not a flat record. Signals an extraction bug.
 */
export class MalformedWorkUnitError extends Error {
  readonly name = 'MalformedWorkUnitError';

  constructor(readonly group: string, detail: string) {
    super(`Malformed work unit: ${group} ${detail}`);
  }
}

export class PersistenceError extends Error {
  readonly name = 'PersistenceError';

  constructor(
    readonly collection: string,
    readonly operation: 'find' | 'insert' | 'update',
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} in ${collection}: ${reason}`, { cause });
  }
}

/**
 * Bad status, wrong content type or an undecodable/too small image.
 * Never retried.
 */
export class ImageValidationError extends Error {
  readonly name = 'ImageValidationError';
}

/**
 * Network-level failure while downloading an image. Retried up to the
 * configured bound.
 */
export class ImageTransientError extends Error {
  readonly name = 'ImageTransientError';
}

export class JobTimeoutError extends Error {
  readonly name = 'JobTimeoutError';

  constructor(readonly timeoutMs: number, url: string) {
    super(`Job for ${url} timed out after ${timeoutMs}ms`);
  }
}

export class InvalidJobDataError extends Error {
  readonly name = 'InvalidJobDataError';
}
