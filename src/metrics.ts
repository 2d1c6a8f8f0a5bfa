// Metric table for EDM flight records
// Maps the 128 record slots to named, scaled metrics per protocol version

import rawTable from './metrics.json';
import { MetricTableError } from './errors';
import type { ProtocolVersion } from './types';

export const METRIC_IDS = [
  'EGT11', 'EGT12', 'EGT13', 'EGT14', 'EGT15', 'EGT16', 'EGT17', 'EGT18', 'EGT19',
  'EGT21', 'EGT22', 'EGT23', 'EGT24', 'EGT25', 'EGT26', 'EGT27', 'EGT28', 'EGT29',
  'CHT11', 'CHT12', 'CHT13', 'CHT14', 'CHT15', 'CHT16', 'CHT17', 'CHT18', 'CHT19',
  'CHT21', 'CHT22', 'CHT23', 'CHT24', 'CHT25', 'CHT26', 'CHT27', 'CHT28', 'CHT29',
  'CLD1', 'CLD2',
  'TIT11', 'TIT12', 'TIT21', 'TIT22',
  'OILT1', 'OILT2', 'OILP1', 'OILP2',
  'CRB1', 'CRB2', 'IAT1', 'IAT2',
  'MAP1', 'MAP2', 'RPM1', 'RPM2', 'HP1', 'HP2',
  'VOLT1', 'VOLT2', 'AMP1', 'AMP2',
  'FF11', 'FF12', 'FF21', 'FF22',
  'FUSD11', 'FUSD12', 'FUSD21',
  'FLVL11', 'FLVL12', 'FLVL13', 'FLVL21', 'FLVL22', 'FLVL23',
  'LMAIN', 'RMAIN', 'LAUX', 'RAUX',
  'FP1', 'FP2', 'HRS1', 'HRS2', 'TORQ1', 'TORQ2',
  'HYDP11', 'HYDP12', 'HYDP21', 'HYDP22',
  'MARK', 'OAT', 'SPD', 'ALT', 'LAT', 'LNG',
  'DIF1', 'DIF2',
] as const;

export type MetricId = (typeof METRIC_IDS)[number];

export type ScaleFactor = 'NONE' | 'TEN' | 'TEN_IF_GPH';

/** Starting slot value: DEFAULT is 0xF0, ZERO is 0 */
export type InitValue = 'DEFAULT' | 'ZERO';

export const VERSION_MASK: Record<ProtocolVersion, number> = {
  V1: 0x01,
  V2: 0x02,
  V3: 0x04,
  V4: 0x08,
  V5: 0x10,
};

export const SLOT_COUNT = 128;

export interface Metric {
  versionMask: number;
  lowBit: number;
  highBit: number | null;
  id: MetricId;
  name: string;
  scale: ScaleFactor;
  init: InitValue;
}

/** Absolute temperatures, converted with an offset */
export const TEMPERATURE_METRICS: ReadonlySet<MetricId> = new Set<MetricId>([
  'EGT11', 'EGT12', 'EGT13', 'EGT14', 'EGT15', 'EGT16', 'EGT17', 'EGT18', 'EGT19',
  'EGT21', 'EGT22', 'EGT23', 'EGT24', 'EGT25', 'EGT26', 'EGT27', 'EGT28', 'EGT29',
  'CHT11', 'CHT12', 'CHT13', 'CHT14', 'CHT15', 'CHT16', 'CHT17', 'CHT18', 'CHT19',
  'CHT21', 'CHT22', 'CHT23', 'CHT24', 'CHT25', 'CHT26', 'CHT27', 'CHT28', 'CHT29',
  'TIT11', 'TIT12', 'TIT21', 'TIT22',
  'OILT1', 'OILT2', 'CRB1', 'CRB2', 'IAT1', 'IAT2', 'OAT',
]);

/** Temperature rates, converted by scale only */
export const TEMPERATURE_RATE_METRICS: ReadonlySet<MetricId> = new Set<MetricId>(['CLD1', 'CLD2']);

const METRIC_ID_SET: ReadonlySet<string> = new Set<string>(METRIC_IDS);
const SCALES: ReadonlySet<string> = new Set<ScaleFactor>(['NONE', 'TEN', 'TEN_IF_GPH']);
const INITS: ReadonlySet<string> = new Set<InitValue>(['DEFAULT', 'ZERO']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isMetricId(value: unknown): value is MetricId {
  return typeof value === 'string' && METRIC_ID_SET.has(value);
}

function isScaleFactor(value: unknown): value is ScaleFactor {
  return typeof value === 'string' && SCALES.has(value);
}

function isInitValue(value: unknown): value is InitValue {
  return typeof value === 'string' && INITS.has(value);
}

function isProtocolVersion(value: unknown): value is ProtocolVersion {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(VERSION_MASK, value);
}

function isSlot(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < SLOT_COUNT;
}

function parseEntry(entry: unknown, index: number): Metric {
  if (!isRecord(entry)) {
    throw new MetricTableError(`Metric entry ${index} is not an object`);
  }

  const { versions, lowBit, highBit, id, name } = entry;
  const scale = entry.scale ?? 'NONE';
  const init = entry.init ?? 'DEFAULT';

  if (!Array.isArray(versions) || versions.length === 0) {
    throw new MetricTableError(`Metric entry ${index} has no versions`);
  }
  const versionList: readonly unknown[] = versions;
  let versionMask = 0;
  for (const version of versionList) {
    if (!isProtocolVersion(version)) {
      throw new MetricTableError(`Metric entry ${index} has unknown version ${String(version)}`);
    }
    versionMask |= VERSION_MASK[version];
  }

  if (!isSlot(lowBit)) {
    throw new MetricTableError(`Metric entry ${index} has invalid lowBit ${String(lowBit)}`);
  }
  let high: number | null = null;
  if (highBit !== undefined) {
    if (!isSlot(highBit)) {
      throw new MetricTableError(`Metric entry ${index} has invalid highBit ${String(highBit)}`);
    }
    high = highBit;
  }
  if (!isMetricId(id)) {
    throw new MetricTableError(`Metric entry ${index} has unknown id ${String(id)}`);
  }
  if (typeof name !== 'string') {
    throw new MetricTableError(`Metric entry ${index} (${id}) has no name`);
  }
  if (!isScaleFactor(scale)) {
    throw new MetricTableError(`Metric entry ${index} (${id}) has unknown scale ${String(scale)}`);
  }
  if (!isInitValue(init)) {
    throw new MetricTableError(`Metric entry ${index} (${id}) has unknown init ${String(init)}`);
  }

  return {
    versionMask,
    lowBit,
    highBit: high,
    id,
    name,
    scale,
    init,
  };
}

export function parseMetricTable(raw: unknown): Metric[] {
  if (!Array.isArray(raw)) {
    throw new MetricTableError('Metric table is not an array');
  }
  return raw.map((entry: unknown, index) => parseEntry(entry, index));
}

let defaultTable: readonly Metric[] | null = null;

/** The built-in table, validated on first use */
export function metricTable(): readonly Metric[] {
  if (defaultTable === null) {
    defaultTable = Object.freeze(parseMetricTable(rawTable));
  }
  return defaultTable;
}

export function appliesTo(metric: Metric, version: ProtocolVersion): boolean {
  return (metric.versionMask & VERSION_MASK[version]) !== 0;
}

/**
 * Slot-to-metric map for one protocol version, keyed by low-byte slot.
 * Two entries claiming the same slot for one version is a table defect.
 */
export function buildBitToMetricMap(table: readonly Metric[], version: ProtocolVersion): ReadonlyMap<number, Metric> {
  const result = new Map<number, Metric>();
  for (const metric of table) {
    if (!appliesTo(metric, version)) continue;

    const existing = result.get(metric.lowBit);
    if (existing !== undefined) {
      throw new MetricTableError(
        `Duplicate metric for slot ${metric.lowBit} in ${version}: ${existing.id} and ${metric.id}`
      );
    }
    result.set(metric.lowBit, metric);
  }
  return new Map([...result].sort(([a], [b]) => a - b));
}

const bitMapCache = new Map<ProtocolVersion, ReadonlyMap<number, Metric>>();

export function bitToMetricMap(version: ProtocolVersion): ReadonlyMap<number, Metric> {
  let map = bitMapCache.get(version);
  if (map === undefined) {
    map = buildBitToMetricMap(metricTable(), version);
    bitMapCache.set(version, map);
  }
  return map;
}

export function scaleValue(raw: number, scale: ScaleFactor, isGph: boolean): number {
  if (scale === 'TEN' || (scale === 'TEN_IF_GPH' && isGph)) {
    return raw / 10;
  }
  return raw;
}

/** Combined low/high slot value, scaled */
export function metricValue(metric: Metric, state: ArrayLike<number>, isGph: boolean): number {
  const low = state[metric.lowBit];
  const raw = metric.highBit === null ? low : low + (state[metric.highBit] << 8);
  return scaleValue(raw, metric.scale, isGph);
}
