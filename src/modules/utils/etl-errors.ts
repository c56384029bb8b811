/**
 * Base class for every failure raised by the ETL chain.
 * Components never recover from these; they propagate up to the pipeline.
 */
export class EtlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing configuration: environment, locations file, snapshot time. */
export class ConfigurationError extends EtlError {}

export class UpstreamError extends EtlError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The provider answered, but not with the shape we expect. */
export class SchemaError extends EtlError {}

/** Snapshot file could not be written or read back. */
export class SnapshotIOError extends EtlError {}

export class UpsertError extends EtlError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
