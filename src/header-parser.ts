// Header parser for EDM flight logs
// Parses the ASCII header section that precedes binary flight data

import { textChecksum, validateTextChecksum } from './checksum';
import {
  ChecksumMismatchError,
  MalformedHeaderLineError,
  StreamTruncatedError,
} from './errors';
import type { Logger } from './logger';
import type { ConfigInfo, HeaderRecord, HeaderTag, ParsedHeader } from './types';

/** Tags whose fields are comma-separated integers */
export type NumericTag = Exclude<HeaderTag, 'U'>;

const NUMERIC_TAGS: ReadonlySet<string> = new Set<NumericTag>(['A', 'C', 'D', 'F', 'P', 'T', 'L']);

const MIN_FIELD_COUNT: Record<NumericTag, number> = {
  A: 8,
  C: 5,
  D: 2,
  F: 5,
  P: 1,
  T: 6,
  L: 0,
};

// $A lines write 999999999 for "no limit"
const SENTINEL_VALUE = 999999999;
const SENTINEL_REPLACEMENT = 0xFFFF;

const MAX_LINE_LENGTH = 256;

export interface HeaderParseOptions {
  strictChecksums?: boolean;
  logger?: Logger;
}

export interface HeaderLineOptions {
  strictChecksums?: boolean;
  onWarning?: (message: string) => void;
}

function isNumericTag(tag: string): tag is NumericTag {
  return NUMERIC_TAGS.has(tag);
}

export function parseHeader(data: Uint8Array, options: HeaderParseOptions = {}): ParsedHeader {
  const result: ParsedHeader = {
    records: [],
    warnings: [],
    binaryOffset: 0,
  };

  const lineOptions: HeaderLineOptions = {
    strictChecksums: options.strictChecksums ?? true,
    onWarning: (message) => {
      result.warnings.push(message);
      options.logger?.warn(message);
    },
  };

  let pos = 0;
  let lineNumber = 0;

  for (;;) {
    lineNumber++;

    // Lines end in CR+LF; a bare LF is tolerated
    const newline = data.indexOf(0x0A, pos);
    if (newline === -1) {
      throw new StreamTruncatedError('File ended before the $L header line', { lineNumber, offset: pos });
    }
    let lineEnd = newline;
    if (lineEnd > pos && data[lineEnd - 1] === 0x0D) lineEnd--;

    if (lineEnd - pos > MAX_LINE_LENGTH) {
      throw new MalformedHeaderLineError(`Header line longer than ${MAX_LINE_LENGTH} bytes`, { lineNumber, offset: pos });
    }

    const line = String.fromCharCode(...data.subarray(pos, lineEnd));
    pos = newline + 1;

    const record = parseHeaderLine(line, lineNumber, lineOptions);
    if (record === null) continue;

    result.records.push(record);
    options.logger?.debug(`Header line ${lineNumber}: ${record.tag}`);

    // $L marks end of headers
    if (record.tag === 'L') {
      result.binaryOffset = pos;
      return result;
    }
  }
}

/**
 * Parse one header line. Returns null for lines that carry nothing
 * (the $H line and unknown tags, which are reported as warnings).
 */
export function parseHeaderLine(line: string, lineNumber: number = 1, options: HeaderLineOptions = {}): HeaderRecord | null {
  if (!line.startsWith('$')) {
    throw new MalformedHeaderLineError('Expected a header line starting with $', { lineNumber });
  }

  verifyChecksum(line, lineNumber, options);

  const tag = line.charAt(1);
  if (tag === 'U') {
    return { tag: 'U', tailNumber: extractTailNumber(line) };
  }
  if (tag === 'H') {
    return null;
  }
  if (isNumericTag(tag)) {
    return parseFields(tag, splitFields(line, lineNumber), lineNumber);
  }

  options.onWarning?.(`Unknown header tag "${tag}" on line ${lineNumber}`);
  return null;
}

function verifyChecksum(line: string, lineNumber: number, options: HeaderLineOptions): void {
  if (options.strictChecksums ?? true) {
    validateTextChecksum(line, lineNumber);
    return;
  }

  try {
    validateTextChecksum(line, lineNumber);
  } catch (e) {
    if (e instanceof ChecksumMismatchError || e instanceof MalformedHeaderLineError) {
      options.onWarning?.(`${e.message} (ignored)`);
      return;
    }
    throw e;
  }
}

/**
 * Integer fields of a header line. The line is split on "," and "*";
 * the "$X" token and the checksum trailer are not fields.
 */
export function splitFields(line: string, lineNumber?: number): number[] {
  const values: number[] = [];
  let rest = line;
  let cut = rest.search(/[,*]/);

  while (cut !== -1) {
    const token = rest.slice(0, cut);
    if (!token.startsWith('$')) {
      values.push(parseValue(token, lineNumber));
    }
    rest = rest.slice(cut + 1);
    cut = rest.search(/[,*]/);
  }

  return values;
}

function parseValue(token: string, lineNumber?: number): number {
  const match = /^\s*(\d+)/.exec(token);
  if (match === null) {
    throw new MalformedHeaderLineError(`Invalid value "${token}" in header`, { lineNumber });
  }
  const value = Number(match[1]);
  return value === SENTINEL_VALUE ? SENTINEL_REPLACEMENT : value;
}

function extractTailNumber(line: string): string {
  const comma = line.indexOf(',');
  if (comma === -1) return '';
  const star = line.indexOf('*', comma + 1);
  return line.slice(comma + 1, star === -1 ? undefined : star);
}

export function parseFields(tag: NumericTag, values: number[], lineNumber?: number): HeaderRecord {
  if (values.length < MIN_FIELD_COUNT[tag]) {
    throw new MalformedHeaderLineError(
      `Incorrect number of arguments in $${tag} line: expected at least ${MIN_FIELD_COUNT[tag]}, got ${values.length}`,
      { lineNumber }
    );
  }

  switch (tag) {
    case 'A':
      return {
        tag,
        configLimits: {
          voltsHigh: values[0],
          voltsLow: values[1],
          egtDiff: values[2],
          chtHigh: values[3],
          shockCooling: values[4],
          turboInletHigh: values[5],
          oilHigh: values[6],
          oilLow: values[7],
        },
      };
    case 'C':
      return { tag, configInfo: parseConfigInfo(values) };
    case 'D':
      if (values[1] < 1) {
        throw new MalformedHeaderLineError(`Invalid word count ${values[1]} for flight ${values[0]}`, { lineNumber });
      }
      return { tag, descriptor: { id: values[0], wordCount: values[1] } };
    case 'F':
      return {
        tag,
        fuelLimits: {
          units: values[0],
          mainTank: values[1],
          auxTank: values[2],
          kFactor1: values[3],
          kFactor2: values[4],
        },
      };
    case 'P':
      return { tag, protocolHeader: { value: values[0] } };
    case 'T':
      return {
        tag,
        timestamp: {
          month: values[0],
          day: values[1],
          year: values[2],
          hour: values[3],
          minute: values[4],
          sequence: values[5],
        },
      };
    case 'L':
      return { tag, value: values[0] ?? 0 };
  }
}

function parseConfigInfo(values: number[]): ConfigInfo {
  const model = values[0];
  const flags = ((values[2] << 16) | (values[1] & 0xFFFF)) >>> 0;

  // Newer firmware appends fields; firmware and build numbers are always last
  if (values.length < 8) {
    return { model, flags, firmwareVersion: values[4], buildMajor: 0, buildMinor: 0, values: [...values] };
  }
  const n = values.length;
  return {
    model,
    flags,
    firmwareVersion: values[n - 3],
    buildMajor: values[n - 2],
    buildMinor: values[n - 1],
    values: [...values],
  };
}

/** `$<payload>*HH` with the checksum computed */
export function withChecksum(payload: string): string {
  const cs = textChecksum(payload).toString(16).toUpperCase().padStart(2, '0');
  return `$${payload}*${cs}`;
}

/** Canonical header line for a record */
export function formatRecord(record: HeaderRecord): string {
  return withChecksum(`${record.tag},${recordFields(record).join(',')}`);
}

function recordFields(record: HeaderRecord): Array<string | number> {
  switch (record.tag) {
    case 'A': {
      const l = record.configLimits;
      return [l.voltsHigh, l.voltsLow, l.egtDiff, l.chtHigh, l.shockCooling, l.turboInletHigh, l.oilHigh, l.oilLow];
    }
    case 'C':
      return record.configInfo.values;
    case 'D':
      return [record.descriptor.id, record.descriptor.wordCount];
    case 'F': {
      const f = record.fuelLimits;
      return [f.units, f.mainTank, f.auxTank, f.kFactor1, f.kFactor2];
    }
    case 'P':
      return [record.protocolHeader.value];
    case 'T': {
      const t = record.timestamp;
      return [t.month, t.day, t.year, t.hour, t.minute, t.sequence];
    }
    case 'U':
      return [record.tailNumber];
    case 'L':
      return [record.value];
  }
}
