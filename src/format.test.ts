import { describe, it, expect } from 'vitest';
import {
  coordinateToDegrees,
  formatCoordinate,
  formatFlightHeader,
  packedDateToDate,
} from './format';
import type { FlightHeader } from './types';

describe('coordinateToDegrees', () => {
  it('converts hundredths of a minute to degrees', () => {
    expect(coordinateToDegrees(223830)).toBeCloseTo(37.305, 9);
  });

  it('keeps the sign for the southern and western hemispheres', () => {
    expect(coordinateToDegrees(-733530)).toBeCloseTo(-122.255, 9);
  });

  it('returns null without a fix', () => {
    expect(coordinateToDegrees(0)).toBeNull();
  });
});

describe('formatCoordinate', () => {
  it('formats degrees and decimal minutes', () => {
    expect(formatCoordinate(223830, 'lat')).toBe('N37 18.30');
    expect(formatCoordinate(-733530, 'lng')).toBe('W122 15.30');
    expect(formatCoordinate(-223830, 'lat')).toBe('S37 18.30');
  });

  it('pads minutes and hundredths', () => {
    expect(formatCoordinate(6005, 'lng')).toBe('E1 00.05');
  });

  it('is empty without a fix', () => {
    expect(formatCoordinate(0, 'lat')).toBe('');
  });
});

describe('packedDateToDate', () => {
  it('builds a UTC date', () => {
    const date = packedDateToDate({ year: 124, month: 5, day: 15, hour: 10, minute: 30, second: 0 });
    expect(date?.toISOString()).toBe('2024-06-15T10:30:00.000Z');
  });

  it('rejects out-of-range months and days', () => {
    expect(packedDateToDate({ year: 124, month: 12, day: 1, hour: 0, minute: 0, second: 0 })).toBeNull();
    expect(packedDateToDate({ year: 124, month: -1, day: 1, hour: 0, minute: 0, second: 0 })).toBeNull();
    expect(packedDateToDate({ year: 124, month: 0, day: 0, hour: 0, minute: 0, second: 0 })).toBeNull();
  });
});

describe('formatFlightHeader', () => {
  const header: FlightHeader = {
    flightId: 1,
    flags: 0x100000FC,
    interval: 6,
    startLat: 223830,
    startLng: -733530,
    startDate: { year: 105, month: 4, day: 13, hour: 22, minute: 30, second: 10 },
    headerSize: 28,
    offset: 172,
  };

  it('lists the header fields', () => {
    expect(formatFlightHeader(header)).toBe([
      'Flight 1',
      '  flags: 0x100000fc',
      '  interval: 6s',
      '  start: 2005-05-13T22:30:10.000Z',
      '  origin: N37 18.30 W122 15.30',
    ].join('\n'));
  });

  it('leaves out the origin when the header has none', () => {
    const text = formatFlightHeader({ ...header, startLat: null, startLng: null, flags: 0 });
    expect(text.split('\n')).toEqual([
      'Flight 1',
      '  flags: 0x00000000',
      '  interval: 6s',
      '  start: 2005-05-13T22:30:10.000Z',
    ]);
  });
});
