// EDM flight log decoder
// Decode engine monitor flight logs from an in-memory buffer

export { FlightLogDecoder, DecodeCursor, resolveOptions } from './parser';
export { DecodedFlight } from './decoded-flight';
export { Metadata, ConfigFlag } from './metadata';
export type { ConfigFlagName } from './metadata';
export { parseHeader, parseHeaderLine, formatRecord, withChecksum } from './header-parser';
export { textChecksum, validateTextChecksum, binaryChecksums, validateBinaryChecksum } from './checksum';
export { decodeFlightHeader, detectHeaderSize } from './flight-header';
export { decodeRecord, Flight } from './flight';
export { bitToMetricMap, metricTable, METRIC_IDS } from './metrics';
export type { Metric, MetricId, ScaleFactor } from './metrics';
export { coordinateToDegrees, formatCoordinate, formatFlightHeader, packedDateToDate } from './format';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export {
  FlightLogError,
  ChecksumMismatchError,
  MalformedHeaderLineError,
  FlightIdMismatchError,
  PopulationBitmapMismatchError,
  StreamTruncatedError,
  UnresolvableHeaderSizeError,
  FlightLengthMismatchError,
  FlightNotFoundError,
  MetricTableError,
} from './errors';
export type { ErrorContext } from './errors';
export type {
  ConfigInfo,
  ConfigLimits,
  DecodeEvent,
  DecodeHandlers,
  DecodeScope,
  DecoderOptions,
  FlightCompletion,
  FlightDescriptor,
  FlightHeader,
  FlightInfo,
  FlightMetricsRecord,
  FuelLimits,
  HeaderRecord,
  HeaderVersion,
  MetricValues,
  PackedDate,
  ParsedHeader,
  ProtocolVersion,
  TemperatureUnit,
  Timestamp,
} from './types';
