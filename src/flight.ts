// Flight decode state and differential record decoder
// Each record carries byte deltas against a persistent 128-slot state table

import type { ByteReader } from './byte-reader';
import { validateBinaryChecksum } from './checksum';
import { ChecksumMismatchError, PopulationBitmapMismatchError } from './errors';
import type { Metadata } from './metadata';
import {
  bitToMetricMap,
  metricValue,
  SLOT_COUNT,
  TEMPERATURE_METRICS,
  TEMPERATURE_RATE_METRICS,
} from './metrics';
import type { Metric, MetricId } from './metrics';
import type { FlightHeader, FlightMetricsRecord, MetricValues, TemperatureUnit } from './types';

const DEFAULT_VALUE = 0xF0; // 240

// High bytes and GPS slots start from zero
const ZERO_INIT_SLOTS = [
  30, 42, 44,
  48, 49, 50, 51, 52, 53, 54, 55, 56, 57, 58, 59, 60, 61, 62, 63,
  76, 77, 79, 86, 87, 100, 101, 103, 108, 109, 110, 116, 117, 118,
];

export const MARK_SLOT = 16;
const MARK_FAST = 2;
const MARK_STANDARD = 3;

const POPULATION_BITS = 16;
const BITS_PER_BYTE = 8;

// Bytes 6 and 7 hold EGT high bytes, signed by their low bytes
const UNSIGNED_FIELD_BYTES = [6, 7];

const ENGINE_EGTS: Record<1 | 2, MetricId[]> = {
  1: ['EGT11', 'EGT12', 'EGT13', 'EGT14', 'EGT15', 'EGT16', 'EGT17', 'EGT18', 'EGT19'],
  2: ['EGT21', 'EGT22', 'EGT23', 'EGT24', 'EGT25', 'EGT26', 'EGT27', 'EGT28', 'EGT29'],
};

export function initialState(bitMap: ReadonlyMap<number, Metric>): number[] {
  const state = new Array<number>(SLOT_COUNT).fill(DEFAULT_VALUE);
  for (const slot of ZERO_INIT_SLOTS) {
    state[slot] = 0;
  }
  for (const metric of bitMap.values()) {
    if (metric.init === 'ZERO') {
      state[metric.lowBit] = 0;
      if (metric.highBit !== null) state[metric.highBit] = 0;
    }
  }
  return state;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export class Flight {
  readonly header: FlightHeader;
  readonly metadata: Metadata;
  readonly bitMap: ReadonlyMap<number, Metric>;

  sequence: number = 0;
  isFast: boolean = false;
  standardRecords: number = 0;
  fastRecords: number = 0;

  private state: number[];
  private temperatureUnit: TemperatureUnit;

  constructor(metadata: Metadata, header: FlightHeader, temperatureUnit: TemperatureUnit = 'original') {
    this.metadata = metadata;
    this.header = header;
    this.temperatureUnit = temperatureUnit;
    this.bitMap = bitToMetricMap(metadata.protocolVersion);
    this.state = initialState(this.bitMap);
  }

  get flightId(): number {
    return this.header.flightId;
  }

  /** Current absolute value of a slot */
  slot(index: number): number {
    return this.state[index];
  }

  nextSequence(): number {
    return ++this.sequence;
  }

  /**
   * Accumulate signed deltas into the state table. A delta of 2 on the
   * MARK slot latches fast mode, 3 latches standard mode.
   */
  applyDeltas(deltas: ReadonlyMap<number, number>): void {
    for (const [slot, delta] of deltas) {
      this.state[slot] += delta;

      if (slot === MARK_SLOT) {
        if (delta === MARK_FAST) this.isFast = true;
        else if (delta === MARK_STANDARD) this.isFast = false;
      }
    }
  }

  countRecord(): void {
    if (this.isFast) this.fastRecords++;
    else this.standardRecords++;
  }

  metricsRecord(): FlightMetricsRecord {
    const metrics: MetricValues = {};
    const isGph = this.metadata.isGph;

    for (const metric of this.bitMap.values()) {
      metrics[metric.id] = this.convertTemperature(metric.id, metricValue(metric, this.state, isGph));
    }

    metrics.DIF1 = this.egtSpread(metrics, 1);
    if (this.metadata.isTwinEngine) {
      metrics.DIF2 = this.egtSpread(metrics, 2);
    }

    return {
      flightId: this.flightId,
      sequence: this.sequence,
      isFast: this.isFast,
      metrics,
    };
  }

  // Hottest minus coldest EGT over the engine's configured cylinders
  private egtSpread(metrics: MetricValues, engine: 1 | 2): number {
    const values: number[] = [];
    for (const id of ENGINE_EGTS[engine].slice(0, this.metadata.cylinderCount)) {
      const value = metrics[id];
      if (value !== undefined) values.push(value);
    }
    if (values.length === 0) return 0;
    return round1(Math.max(...values) - Math.min(...values));
  }

  private convertTemperature(id: MetricId, value: number): number {
    if (this.temperatureUnit === 'original') {
      return value;
    }

    const sourceCelsius = this.metadata.tempInCelsius;
    const toCelsius = this.temperatureUnit === 'celsius' && !sourceCelsius;
    const toFahrenheit = this.temperatureUnit === 'fahrenheit' && sourceCelsius;

    if (TEMPERATURE_METRICS.has(id)) {
      if (toCelsius) return round1((value - 32) * 5 / 9);
      if (toFahrenheit) return round1(value * 9 / 5 + 32);
    } else if (TEMPERATURE_RATE_METRICS.has(id)) {
      if (toCelsius) return round1(value * 5 / 9);
      if (toFahrenheit) return round1(value * 9 / 5);
    }
    return value;
  }
}

/**
 * Decode one record at the reader's position and fold it into the flight.
 * Layout: two copies of the population bitmap, a reserved repeat-count
 * byte, field bytes, sign bytes, deltas, then the checksum byte.
 */
export function decodeRecord(reader: ByteReader, flight: Flight): FlightMetricsRecord {
  const record = flight.nextSequence();
  const start = reader.offset;

  const population = reader.readUint16();
  const populationCopy = reader.readUint16();
  if (population !== populationCopy) {
    throw new PopulationBitmapMismatchError(population, populationCopy, {
      flightId: flight.flightId,
      record,
      offset: start,
    });
  }

  reader.readUint8(); // repeat count, reserved

  const fieldBytes = new Array<number>(POPULATION_BITS).fill(0);
  for (let i = 0; i < POPULATION_BITS; i++) {
    if ((population & (1 << i)) !== 0) {
      fieldBytes[i] = reader.readUint8();
    }
  }

  const signBytes = new Array<number>(POPULATION_BITS).fill(0);
  for (let i = 0; i < POPULATION_BITS; i++) {
    if ((population & (1 << i)) !== 0 && !UNSIGNED_FIELD_BYTES.includes(i)) {
      signBytes[i] = reader.readUint8();
    }
  }

  const deltas = new Map<number, number>();
  for (let slot = 0; slot < SLOT_COUNT; slot++) {
    const byteIndex = Math.floor(slot / BITS_PER_BYTE);
    const mask = 1 << (slot % BITS_PER_BYTE);
    if ((fieldBytes[byteIndex] & mask) === 0) continue;

    const raw = reader.readUint8();
    deltas.set(slot, (signBytes[byteIndex] & mask) !== 0 ? -raw : raw);
  }

  flight.applyDeltas(deltas);
  const end = reader.offset;

  const checksum = reader.readUint8();
  if (!validateBinaryChecksum(reader.bytes, start, end, checksum)) {
    throw new ChecksumMismatchError('Checksum failure in record', {
      flightId: flight.flightId,
      record,
      offset: start,
    });
  }

  const result = flight.metricsRecord();
  flight.countRecord();
  return result;
}
