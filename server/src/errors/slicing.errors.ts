export type SlicingErrorKind =
  | 'InvalidDimension'
  | 'InvalidPadding'
  | 'ExportIOError'
  | 'SessionNotFound';

export type ExportKind = 'stitched' | 'slices' | 'atlas' | 'coordinates';

export class SlicingError extends Error {
  kind: SlicingErrorKind;
  constructor(kind: SlicingErrorKind, message: string) {
    super(message);
    this.name = 'SlicingError';
    this.kind = kind;
  }
}

export class InvalidDimensionError extends SlicingError {
  width: number;
  height: number;
  constructor(width: number, height: number) {
    super('InvalidDimension', `Image dimensions must be positive integers (got ${width}x${height})`);
    this.name = 'InvalidDimensionError';
    this.width = width;
    this.height = height;
  }
}

export class InvalidPaddingError extends SlicingError {
  padding: number;
  constructor(padding: number) {
    super('InvalidPadding', `Atlas padding must be a non-negative integer (got ${padding})`);
    this.name = 'InvalidPaddingError';
    this.padding = padding;
  }
}

/**
 * A write delegated to the output writer failed.
 * Carries the export and destination so the caller can retry or report.
 */
export class ExportIOError extends SlicingError {
  exportKind: ExportKind;
  destination: string;
  cause: unknown;
  constructor(exportKind: ExportKind, destination: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('ExportIOError', `Failed to export ${exportKind} to ${destination}: ${reason}`);
    this.name = 'ExportIOError';
    this.exportKind = exportKind;
    this.destination = destination;
    this.cause = cause;
  }
}

export class SessionNotFoundError extends SlicingError {
  sessionId: string;
  constructor(sessionId: string) {
    super('SessionNotFound', `Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}
