// Error types for EDM flight log decoding
// Every fatal condition carries enough context to find the bad bytes

export interface ErrorContext {
  /** 1-based line number inside the text header */
  lineNumber?: number;
  flightId?: number;
  /** Byte offset from the start of the file */
  offset?: number;
  /** Record sequence number inside the flight */
  record?: number;
}

function describe(context: ErrorContext): string {
  const parts: string[] = [];
  if (context.lineNumber !== undefined) parts.push(`line ${context.lineNumber}`);
  if (context.flightId !== undefined) parts.push(`flight ${context.flightId}`);
  if (context.record !== undefined) parts.push(`record ${context.record}`);
  if (context.offset !== undefined) parts.push(`offset 0x${context.offset.toString(16)}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

export class FlightLogError extends Error {
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message + describe(context), options);
    this.name = 'FlightLogError';
    this.context = context;
  }
}

export class ChecksumMismatchError extends FlightLogError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'ChecksumMismatchError';
  }
}

export class MalformedHeaderLineError extends FlightLogError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'MalformedHeaderLineError';
  }
}

export class FlightIdMismatchError extends FlightLogError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context: ErrorContext = {}) {
    super(`Flight IDs don't match: expected ${expected}, found ${actual}`, context);
    this.name = 'FlightIdMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class PopulationBitmapMismatchError extends FlightLogError {
  constructor(first: number, second: number, context: ErrorContext = {}) {
    super(
      `Population bitmaps don't match: 0x${first.toString(16)} vs 0x${second.toString(16)}`,
      context
    );
    this.name = 'PopulationBitmapMismatchError';
  }
}

export class StreamTruncatedError extends FlightLogError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = 'StreamTruncatedError';
  }
}

export class UnresolvableHeaderSizeError extends FlightLogError {
  constructor(context: ErrorContext = {}) {
    super('No flight header size passes checksum probing', context);
    this.name = 'UnresolvableHeaderSizeError';
  }
}

export class FlightLengthMismatchError extends FlightLogError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, context);
    this.name = 'FlightLengthMismatchError';
  }
}

export class FlightNotFoundError extends FlightLogError {
  constructor(flightId: number) {
    super(`Flight ${flightId} not found in file`, { flightId });
    this.name = 'FlightNotFoundError';
  }
}

export class MetricTableError extends FlightLogError {
  constructor(message: string) {
    super(message);
    this.name = 'MetricTableError';
  }
}
