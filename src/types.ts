// Type definitions for the EDM flight log decoder

import type { Metadata } from './metadata';
import type { MetricId } from './metrics';
import type { Logger } from './logger';

export type ProtocolVersion = 'V1' | 'V2' | 'V3' | 'V4' | 'V5';

export type HeaderVersion = 'HEADER_V1' | 'HEADER_V2' | 'HEADER_V3' | 'HEADER_V4';

export interface ConfigLimits {
  voltsHigh: number;
  voltsLow: number;
  egtDiff: number;
  chtHigh: number;
  shockCooling: number;
  turboInletHigh: number;
  oilHigh: number;
  oilLow: number;
}

export interface ConfigInfo {
  model: number;
  flags: number;
  firmwareVersion: number;
  buildMajor: number;
  buildMinor: number;
  values: number[]; // as written on the $C line
}

export interface FuelLimits {
  units: number; // 0 = gallons per hour
  mainTank: number;
  auxTank: number;
  kFactor1: number;
  kFactor2: number;
}

export interface ProtocolHeader {
  value: number;
}

export interface Timestamp {
  month: number;
  day: number;
  year: number;
  hour: number;
  minute: number;
  sequence: number;
}

export interface FlightDescriptor {
  id: number;
  wordCount: number;
}

export type HeaderRecord =
  | { tag: 'A'; configLimits: ConfigLimits }
  | { tag: 'C'; configInfo: ConfigInfo }
  | { tag: 'D'; descriptor: FlightDescriptor }
  | { tag: 'F'; fuelLimits: FuelLimits }
  | { tag: 'P'; protocolHeader: ProtocolHeader }
  | { tag: 'T'; timestamp: Timestamp }
  | { tag: 'U'; tailNumber: string }
  | { tag: 'L'; value: number };

export type HeaderTag = HeaderRecord['tag'];

export interface ParsedHeader {
  records: HeaderRecord[];
  warnings: string[];
  binaryOffset: number;
}

/** Date and time fields as packed in the flight header */
export interface PackedDate {
  year: number; // years since 1900
  month: number; // 0-based
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface FlightHeader {
  flightId: number;
  flags: number;
  interval: number;
  /** Fixed-point origin, present only in 28-byte headers */
  startLat: number | null;
  startLng: number | null;
  startDate: PackedDate;
  headerSize: number;
  offset: number;
}

export type MetricValues = Partial<Record<MetricId, number>>;

export interface FlightMetricsRecord {
  flightId: number;
  sequence: number;
  isFast: boolean;
  metrics: MetricValues;
}

export interface FlightCompletion {
  flightId: number;
  standardRecords: number;
  fastRecords: number;
}

export type DecodeEvent =
  | { type: 'metadata'; metadata: Metadata }
  | { type: 'flightHeader'; header: FlightHeader }
  | { type: 'record'; record: FlightMetricsRecord }
  | { type: 'flightComplete'; completion: FlightCompletion }
  | { type: 'footer' };

export interface DecodeHandlers {
  onMetadata?: (metadata: Metadata) => void;
  onFlightHeader?: (header: FlightHeader) => void;
  onRecord?: (record: FlightMetricsRecord) => void;
  onFlightComplete?: (completion: FlightCompletion) => void;
  onFooter?: () => void;
}

export interface DecodeScope {
  /** Decode only this flight; earlier flights contribute their headers only */
  flightId?: number;
}

export type TemperatureUnit = 'original' | 'celsius' | 'fahrenheit';

export interface DecoderOptions {
  temperatureUnit?: TemperatureUnit;
  strictHeaderChecksums?: boolean;
  logger?: Logger;
}

export interface ResolvedOptions {
  temperatureUnit: TemperatureUnit;
  strictHeaderChecksums: boolean;
  logger: Logger;
}

export interface FlightInfo {
  flightId: number;
  wordCount: number;
  dataSize: number; // wordCount * 2
}
