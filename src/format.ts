// Display helpers for decoded flight data

import type { FlightHeader, PackedDate } from './types';

// Coordinates are hundredths of a minute: 60 minutes x 100
const COORD_SCALE = 6000;
const MINUTE_DIVISOR = 100;

interface CoordinateParts {
  negative: boolean;
  degrees: number;
  minutes: number;
  hundredths: number;
}

function splitCoordinate(raw: number): CoordinateParts | null {
  const scaled = Math.round(raw);
  if (scaled === 0) return null;

  const abs = Math.abs(scaled);
  const remainder = abs % COORD_SCALE;
  return {
    negative: scaled < 0,
    degrees: Math.floor(abs / COORD_SCALE),
    minutes: Math.floor(remainder / MINUTE_DIVISOR),
    hundredths: remainder % MINUTE_DIVISOR,
  };
}

/** Fixed-point coordinate to signed decimal degrees; null for 0 (no fix) */
export function coordinateToDegrees(raw: number): number | null {
  const parts = splitCoordinate(raw);
  if (parts === null) return null;

  const minutes = parts.minutes + parts.hundredths / MINUTE_DIVISOR;
  const degrees = parts.degrees + minutes / 60;
  return parts.negative ? -degrees : degrees;
}

/**
 * Degrees and decimal minutes with a hemisphere letter,
 * e.g. `N37 18.30` for latitude 223830.
 */
export function formatCoordinate(raw: number, axis: 'lat' | 'lng'): string {
  const parts = splitCoordinate(raw);
  if (parts === null) return '';

  const hemisphere = axis === 'lat'
    ? (parts.negative ? 'S' : 'N')
    : (parts.negative ? 'W' : 'E');
  const pad = (n: number) => n.toString().padStart(2, '0');
  return `${hemisphere}${parts.degrees} ${pad(parts.minutes)}.${pad(parts.hundredths)}`;
}

/** Packed header date as a UTC Date, or null when the fields are out of range */
export function packedDateToDate(packed: PackedDate): Date | null {
  if (packed.month < 0 || packed.month > 11 || packed.day < 1 || packed.day > 31) {
    return null;
  }
  const date = new Date(Date.UTC(
    packed.year + 1900, packed.month, packed.day,
    packed.hour, packed.minute, packed.second
  ));
  return isNaN(date.getTime()) ? null : date;
}

export function startTime(header: FlightHeader): Date | null {
  return packedDateToDate(header.startDate);
}

export function formatFlightHeader(header: FlightHeader): string {
  const start = startTime(header);
  const lines = [
    `Flight ${header.flightId}`,
    `  flags: 0x${header.flags.toString(16).padStart(8, '0')}`,
    `  interval: ${header.interval}s`,
    `  start: ${start ? start.toISOString() : 'invalid'}`,
  ];
  if (header.startLat !== null && header.startLng !== null) {
    lines.push(`  origin: ${formatCoordinate(header.startLat, 'lat')} ${formatCoordinate(header.startLng, 'lng')}`);
  }
  return lines.join('\n');
}
