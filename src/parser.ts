// EDM flight log decoder
// Orchestrates header, flight header and record decoding over one file

import { ByteReader } from './byte-reader';
import { DecodedFlight } from './decoded-flight';
import {
  FlightLengthMismatchError,
  FlightNotFoundError,
  StreamTruncatedError,
} from './errors';
import { decodeFlightHeader } from './flight-header';
import { decodeRecord, Flight } from './flight';
import { parseHeader } from './header-parser';
import { createLogger } from './logger';
import { Metadata } from './metadata';
import type {
  DecodeEvent,
  DecodeHandlers,
  DecodeScope,
  DecoderOptions,
  FlightDescriptor,
  FlightInfo,
  ResolvedOptions,
  TemperatureUnit,
} from './types';

const TEMPERATURE_UNITS: readonly TemperatureUnit[] = ['original', 'celsius', 'fahrenheit'];

export function resolveOptions(options: DecoderOptions = {}): ResolvedOptions {
  const temperatureUnit = options.temperatureUnit ?? 'original';
  if (!TEMPERATURE_UNITS.includes(temperatureUnit)) {
    throw new TypeError(`Unknown temperature unit "${String(temperatureUnit)}"`);
  }
  return {
    temperatureUnit,
    strictHeaderChecksums: options.strictHeaderChecksums ?? true,
    logger: options.logger ?? createLogger('Decoder'),
  };
}

type Phase =
  | { kind: 'start' }
  | { kind: 'flightHeader'; index: number; offset: number }
  | { kind: 'records'; index: number; offset: number; flight: Flight }
  | { kind: 'footer' }
  | { kind: 'done' };

/**
 * Single-owner decode cursor. Each call to next() advances the decode
 * state machine by one event; null marks the end. reset() rewinds to
 * the beginning of the file.
 */
export class DecodeCursor {
  private reader: ByteReader;
  private phase: Phase = { kind: 'start' };

  constructor(
    private readonly bytes: Uint8Array,
    private readonly metadata: Metadata,
    private readonly binaryOffset: number,
    private readonly options: ResolvedOptions,
    private readonly scope: DecodeScope = {}
  ) {
    const target = scope.flightId;
    if (target !== undefined && !metadata.flights.some(f => f.id === target)) {
      throw new FlightNotFoundError(target);
    }
    this.reader = new ByteReader(bytes, binaryOffset);
  }

  get done(): boolean {
    return this.phase.kind === 'done';
  }

  reset(): void {
    this.reader = new ByteReader(this.bytes, this.binaryOffset);
    this.phase = { kind: 'start' };
  }

  next(): DecodeEvent | null {
    try {
      return this.step();
    } catch (e) {
      // A failed decode cannot be resumed
      this.phase = { kind: 'done' };
      throw e;
    }
  }

  private step(): DecodeEvent | null {
    for (;;) {
      const phase = this.phase;
      switch (phase.kind) {
        case 'start':
          this.phase = this.firstFlightPhase();
          return { type: 'metadata', metadata: this.metadata };

        case 'flightHeader': {
          const descriptor = this.metadata.flights[phase.index];
          const header = withFlightContext(descriptor.id, undefined, () => {
            this.reader.seek(phase.offset);
            return decodeFlightHeader(this.reader, descriptor.id);
          });
          this.options.logger.debug(
            `Flight ${header.flightId}: ${header.headerSize}-byte header at 0x${phase.offset.toString(16)}`
          );

          if (this.scope.flightId !== undefined && this.scope.flightId !== descriptor.id) {
            // Earlier flights are only checked for framing
            this.phase = this.afterFlight(phase.index, phase.offset);
            continue;
          }

          const flight = new Flight(this.metadata, header, this.options.temperatureUnit);
          this.phase = { kind: 'records', index: phase.index, offset: phase.offset, flight };
          return { type: 'flightHeader', header };
        }

        case 'records': {
          const { flight, index, offset } = phase;
          const descriptor = this.metadata.flights[index];

          if (this.reader.offset - offset < (descriptor.wordCount - 1) * 2) {
            const record = withFlightContext(descriptor.id, flight.sequence + 1, () =>
              decodeRecord(this.reader, flight)
            );
            return { type: 'record', record };
          }

          this.finishFlight(descriptor, offset);
          this.phase = this.scope.flightId !== undefined
            ? { kind: 'footer' }
            : this.afterFlight(index, offset);

          this.options.logger.debug(
            `Flight ${descriptor.id}: ${flight.standardRecords} standard, ${flight.fastRecords} fast records`
          );
          return {
            type: 'flightComplete',
            completion: {
              flightId: descriptor.id,
              standardRecords: flight.standardRecords,
              fastRecords: flight.fastRecords,
            },
          };
        }

        case 'footer':
          this.phase = { kind: 'done' };
          return { type: 'footer' };

        case 'done':
          return null;
      }
    }
  }

  private firstFlightPhase(): Phase {
    if (this.metadata.flights.length === 0) {
      return { kind: 'footer' };
    }
    return { kind: 'flightHeader', index: 0, offset: this.binaryOffset };
  }

  private afterFlight(index: number, offset: number): Phase {
    const next = index + 1;
    if (next >= this.metadata.flights.length) {
      return { kind: 'footer' };
    }
    return {
      kind: 'flightHeader',
      index: next,
      offset: offset + this.metadata.flights[index].wordCount * 2,
    };
  }

  // Consume the pad byte that closes the declared region
  private finishFlight(descriptor: FlightDescriptor, offset: number): void {
    const regionEnd = offset + descriptor.wordCount * 2;
    const pos = this.reader.offset;

    if (pos > regionEnd) {
      throw new FlightLengthMismatchError(
        `Records run ${pos - regionEnd} byte(s) past the declared flight length`,
        { flightId: descriptor.id, offset: pos }
      );
    }
    if (pos < regionEnd) {
      withFlightContext(descriptor.id, undefined, () => this.reader.readUint8());
    }
  }
}

function withFlightContext<T>(flightId: number, record: number | undefined, decode: () => T): T {
  try {
    return decode();
  } catch (e) {
    if (e instanceof StreamTruncatedError && e.context.flightId === undefined) {
      throw new StreamTruncatedError('File ended inside flight data', { ...e.context, flightId, record }, { cause: e });
    }
    throw e;
  }
}

function dispatch(event: DecodeEvent, handlers: DecodeHandlers): void {
  switch (event.type) {
    case 'metadata':
      handlers.onMetadata?.(event.metadata);
      break;
    case 'flightHeader':
      handlers.onFlightHeader?.(event.header);
      break;
    case 'record':
      handlers.onRecord?.(event.record);
      break;
    case 'flightComplete':
      handlers.onFlightComplete?.(event.completion);
      break;
    case 'footer':
      handlers.onFooter?.();
      break;
  }
}

export class FlightLogDecoder {
  readonly metadata: Metadata;
  private data: Uint8Array;
  private binaryOffset: number;
  private options: ResolvedOptions;
  private flightsCache: Map<number, DecodedFlight> = new Map();

  private constructor(data: Uint8Array, metadata: Metadata, binaryOffset: number, options: ResolvedOptions) {
    this.data = data;
    this.metadata = metadata;
    this.binaryOffset = binaryOffset;
    this.options = options;
  }

  /**
   * Parse the text header of an EDM file; flight data is decoded on demand
   */
  static fromBytes(data: Uint8Array, options: DecoderOptions = {}): FlightLogDecoder {
    const resolved = resolveOptions(options);
    const header = parseHeader(data, {
      strictChecksums: resolved.strictHeaderChecksums,
      logger: resolved.logger,
    });
    const metadata = Metadata.fromHeader(header);
    resolved.logger.debug(
      `${metadata.modelString} ${metadata.protocolVersion}, ${metadata.flights.length} flight(s), data at 0x${header.binaryOffset.toString(16)}`
    );
    return new FlightLogDecoder(data, metadata, header.binaryOffset, resolved);
  }

  static fromArrayBuffer(buffer: ArrayBuffer, options: DecoderOptions = {}): FlightLogDecoder {
    return FlightLogDecoder.fromBytes(new Uint8Array(buffer), options);
  }

  /**
   * Get aircraft tail number
   */
  get tailNumber(): string | null {
    return this.metadata.tailNumber;
  }

  /**
   * Get model string (e.g., "EDM-830")
   */
  get modelString(): string {
    return this.metadata.modelString;
  }

  /**
   * Get download timestamp
   */
  get downloadTime(): Date | null {
    return this.metadata.downloadTime;
  }

  get flightCount(): number {
    return this.metadata.flights.length;
  }

  /**
   * List the flights declared in the header without decoding them
   */
  detectFlights(): FlightInfo[] {
    return this.metadata.flights.map(f => ({
      flightId: f.id,
      wordCount: f.wordCount,
      dataSize: f.wordCount * 2,
    }));
  }

  /** A fresh cursor at the start of the file */
  cursor(scope: DecodeScope = {}): DecodeCursor {
    return new DecodeCursor(this.data, this.metadata, this.binaryOffset, this.options, scope);
  }

  /**
   * Pull view: events in file order. Every call starts from the beginning.
   */
  *events(scope: DecodeScope = {}): Generator<DecodeEvent, void, undefined> {
    const cursor = this.cursor(scope);
    for (let event = cursor.next(); event !== null; event = cursor.next()) {
      yield event;
    }
  }

  /**
   * Push view: runs the whole decode, calling a handler for each event
   */
  decode(handlers: DecodeHandlers, scope: DecodeScope = {}): void {
    const cursor = this.cursor(scope);
    for (let event = cursor.next(); event !== null; event = cursor.next()) {
      dispatch(event, handlers);
    }
  }

  /**
   * Get all flights (decoded in one pass and cached)
   */
  get flights(): DecodedFlight[] {
    if (this.flightsCache.size < this.flightCount) {
      this.collect({});
    }
    const flights: DecodedFlight[] = [];
    for (const descriptor of this.metadata.flights) {
      const flight = this.flightsCache.get(descriptor.id);
      if (flight) flights.push(flight);
    }
    return flights;
  }

  /**
   * Get a specific flight by number
   */
  flight(flightId: number): DecodedFlight | null {
    const cached = this.flightsCache.get(flightId);
    if (cached) return cached;

    if (!this.metadata.flights.some(f => f.id === flightId)) return null;

    this.collect({ flightId });
    return this.flightsCache.get(flightId) ?? null;
  }

  private collect(scope: DecodeScope): void {
    let current: DecodedFlight | null = null;
    this.decode({
      onFlightHeader: (header) => {
        current = new DecodedFlight(header);
      },
      onRecord: (record) => {
        current?.records.push(record);
      },
      onFlightComplete: (completion) => {
        if (current) {
          current.complete(completion);
          this.flightsCache.set(completion.flightId, current);
        }
        current = null;
      },
    }, scope);
  }

  /**
   * Get summary information
   */
  get summary(): {
    tailNumber: string | null;
    model: string;
    protocolVersion: string;
    downloadTime: Date | null;
    flightCount: number;
    flights: FlightInfo[];
  } {
    return {
      tailNumber: this.tailNumber,
      model: this.modelString,
      protocolVersion: this.metadata.protocolVersion,
      downloadTime: this.downloadTime,
      flightCount: this.flightCount,
      flights: this.detectFlights(),
    };
  }
}
