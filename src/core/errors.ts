/** Base class for errors that end a run as `failed`. */
export class FatalPipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "FatalPipelineError";
  }
}

/** No seed produced a single listing page. */
export class DiscoveryError extends FatalPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DiscoveryError";
  }
}

/** The sink stayed unwritable after the writer's retry budget. */
export class PersistFailure extends FatalPipelineError {
  readonly recordsWritten: number;

  constructor(message: string, recordsWritten: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistFailure";
    this.recordsWritten = recordsWritten;
  }
}

/**
 * Thrown by a sink when one record can never be stored (bad key, constraint).
 * The writer skips that record instead of retrying or escalating.
 */
export class RecordRejectedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecordRejectedError";
  }
}

/** Invalid CLI flags or environment. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
