// Byte builders for synthetic EDM files used by the tests

import { withChecksum } from './header-parser';

export function ascii(text: string): Uint8Array {
  return Uint8Array.from(text, (c) => c.charCodeAt(0));
}

/** Header lines with valid checksums, each ending in CR+LF */
export function headerText(payloads: string[]): string {
  return payloads.map((p) => `${withChecksum(p)}\r\n`).join('');
}

function xorOf(bytes: number[]): number {
  return bytes.reduce((acc, b) => acc ^ b, 0);
}

function pushWord(out: number[], word: number): void {
  out.push((word >> 8) & 0xFF, word & 0xFF);
}

export interface FlightHeaderFields {
  flightId: number;
  flags?: number;
  interval?: number;
  date?: { year: number; month: number; day: number };
  time?: { hour: number; minute: number; second: number };
  /** 14 or 28; only 28-byte headers carry the origin */
  size?: number;
  lat?: number;
  lng?: number;
}

export function packDate(year: number, month: number, day: number): number {
  return ((year - 2000) << 9) | (month << 5) | day;
}

export function packTime(hour: number, minute: number, second: number): number {
  return (hour << 11) | (minute << 5) | Math.floor(second / 2);
}

/** Flight header followed by its XOR checksum byte */
export function flightHeaderBytes(fields: FlightHeaderFields): number[] {
  const size = fields.size ?? 28;
  const flags = fields.flags ?? 0;
  const date = fields.date ?? { year: 2024, month: 6, day: 15 };
  const time = fields.time ?? { hour: 10, minute: 30, second: 0 };

  const out: number[] = [];
  pushWord(out, fields.flightId);
  pushWord(out, flags & 0xFFFF);
  pushWord(out, (flags >>> 16) & 0xFFFF);

  const extraWords = (size - 12) / 2;
  for (let i = 0; i < extraWords; i++) {
    let word = 0;
    if (size >= 28) {
      const lat = (fields.lat ?? 0) >>> 0;
      const lng = (fields.lng ?? 0) >>> 0;
      if (i === 3) word = lat >>> 16;
      if (i === 4) word = lat & 0xFFFF;
      if (i === 5) word = lng >>> 16;
      if (i === 6) word = lng & 0xFFFF;
    }
    pushWord(out, word);
  }

  pushWord(out, fields.interval ?? 6);
  pushWord(out, packDate(date.year, date.month, date.day));
  pushWord(out, packTime(time.hour, time.minute, time.second));
  out.push(xorOf(out));
  return out;
}

export interface RecordOptions {
  /** Overrides the second copy of the population bitmap */
  populationCopy?: number;
  corruptChecksum?: boolean;
}

/**
 * One differential record from slot deltas. Slots 48..63 take only
 * positive deltas since their field bytes have no sign byte.
 */
export function recordBytes(deltas: Record<number, number>, options: RecordOptions = {}): number[] {
  const slots = Object.keys(deltas).map(Number).filter((s) => deltas[s] !== 0).sort((a, b) => a - b);

  const fieldBytes = new Array<number>(16).fill(0);
  const signBytes = new Array<number>(16).fill(0);
  for (const slot of slots) {
    const bit = 1 << (slot % 8);
    fieldBytes[Math.floor(slot / 8)] |= bit;
    if (deltas[slot] < 0) signBytes[Math.floor(slot / 8)] |= bit;
  }

  let population = 0;
  for (let i = 0; i < 16; i++) {
    if (fieldBytes[i] !== 0) population |= 1 << i;
  }

  const out: number[] = [];
  pushWord(out, population);
  pushWord(out, options.populationCopy ?? population);
  out.push(1);
  for (let i = 0; i < 16; i++) {
    if (fieldBytes[i] !== 0) out.push(fieldBytes[i]);
  }
  for (let i = 0; i < 16; i++) {
    if (fieldBytes[i] !== 0 && i !== 6 && i !== 7) out.push(signBytes[i]);
  }
  for (const slot of slots) {
    out.push(Math.abs(deltas[slot]));
  }
  const checksum = xorOf(out);
  out.push(options.corruptChecksum ? checksum ^ 0xFF : checksum);
  return out;
}

export interface FlightFixture {
  header: FlightHeaderFields;
  records?: number[][];
  /** Overrides the word count written on the $D line */
  wordCount?: number;
}

/**
 * Declared size of a flight region: records are read while the offset is
 * below (wordCount - 1) * 2, and the region is padded out to wordCount * 2.
 */
export function regionWordCount(length: number): number {
  return Math.ceil((length + 1) / 2);
}

export function flightRegion(flight: FlightFixture): { bytes: number[]; wordCount: number } {
  const bytes = [...flightHeaderBytes(flight.header)];
  for (const record of flight.records ?? []) {
    bytes.push(...record);
  }
  const wordCount = regionWordCount(bytes.length);
  while (bytes.length < wordCount * 2) bytes.push(0);
  return { bytes, wordCount };
}

/**
 * A whole file: the given header lines, one $D line per flight,
 * the $L line, then the flight regions.
 */
export function buildFile(payloads: string[], flights: FlightFixture[] = []): Uint8Array {
  const regions = flights.map(flightRegion);
  const lines = [
    ...payloads,
    ...flights.map((f, i) => `D,${f.header.flightId},${f.wordCount ?? regions[i].wordCount}`),
    'L,49',
  ];
  const text = ascii(headerText(lines));
  const out = new Uint8Array(text.length + regions.reduce((n, r) => n + r.bytes.length, 0));
  out.set(text, 0);
  let pos = text.length;
  for (const region of regions) {
    out.set(region.bytes, pos);
    pos += region.bytes.length;
  }
  return out;
}

/** Single-engine EDM-830 with six cylinders, Fahrenheit, GPH */
export const SINGLE_ENGINE_HEADER = [
  'U,N12345',
  'A,305,230,500,415,60,1650,230,90',
  'C,830,252,4096,1552,292',
  'F,0,49,0,2950,2950',
  'P,2',
  'T,5,13,5,23,2,2222',
];
