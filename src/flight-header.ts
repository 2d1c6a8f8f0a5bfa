// Flight header decoder
// Each flight opens with a binary header whose size depends on the firmware

import type { ByteReader } from './byte-reader';
import { validateBinaryChecksum } from './checksum';
import {
  ChecksumMismatchError,
  FlightIdMismatchError,
  UnresolvableHeaderSizeError,
} from './errors';
import type { FlightHeader, PackedDate } from './types';

export const MAX_FLIGHT_HEADER_SIZE = 28;
export const MIN_FLIGHT_HEADER_SIZE = 14;
const HEADER_SIZE_STEP = 2;

// interval, date and time words close every header
const TRAILING_WORDS_SIZE = 6;

const LAT_HIGH_WORD = 3;
const LAT_LOW_WORD = 4;
const LNG_HIGH_WORD = 5;
const LNG_LOW_WORD = 6;

/**
 * Find the header size by checksum probing: for each candidate size the
 * byte right after the header must checksum the bytes before it.
 * Returns null when no candidate fits.
 */
export function detectHeaderSize(bytes: Uint8Array, start: number): number | null {
  for (let size = MAX_FLIGHT_HEADER_SIZE; size >= MIN_FLIGHT_HEADER_SIZE; size -= HEADER_SIZE_STEP) {
    const trailerOffset = start + size;
    if (trailerOffset >= bytes.length) continue;

    if (validateBinaryChecksum(bytes, start, trailerOffset, bytes[trailerOffset])) {
      return size;
    }
  }
  return null;
}

export function unpackDate(dateWord: number, timeWord: number): PackedDate {
  return {
    day: dateWord & 0x1F,
    month: ((dateWord & 0x1FF) >> 5) - 1,
    year: (dateWord >> 9) + 100,
    second: (timeWord & 0x1F) * 2,
    minute: (timeWord & 0x7FF) >> 5,
    hour: timeWord >> 11,
  };
}

/**
 * Decode the header of flight `expectedId` at the reader's position.
 * Leaves the reader just past the header checksum byte.
 */
export function decodeFlightHeader(reader: ByteReader, expectedId: number): FlightHeader {
  const start = reader.offset;
  const headerSize = detectHeaderSize(reader.bytes, start);
  if (headerSize === null) {
    throw new UnresolvableHeaderSizeError({ flightId: expectedId, offset: start });
  }

  const flightId = reader.readUint16();
  if (flightId !== expectedId) {
    throw new FlightIdMismatchError(expectedId, flightId, { flightId: expectedId, offset: start });
  }

  const flagsLow = reader.readUint16();
  const flagsHigh = reader.readUint16();
  const flags = (flagsLow | (flagsHigh << 16)) >>> 0;

  let startLat: number | null = null;
  let startLng: number | null = null;
  const intervalOffset = start + headerSize - TRAILING_WORDS_SIZE;

  if (headerSize >= MAX_FLIGHT_HEADER_SIZE) {
    // Word indices count from the first word after the flags
    let high = 0;
    for (let i = 0; reader.offset < intervalOffset; i++) {
      const word = reader.readUint16();
      switch (i) {
        case LAT_HIGH_WORD:
        case LNG_HIGH_WORD:
          high = word;
          break;
        case LAT_LOW_WORD:
          startLat = ((high << 16) | word) | 0;
          break;
        case LNG_LOW_WORD:
          startLng = ((high << 16) | word) | 0;
          break;
      }
    }
  } else {
    reader.seek(intervalOffset);
  }

  const interval = reader.readUint16();
  const dateWord = reader.readUint16();
  const timeWord = reader.readUint16();
  const end = reader.offset;

  const checksum = reader.readUint8();
  if (!validateBinaryChecksum(reader.bytes, start, end, checksum)) {
    throw new ChecksumMismatchError('Checksum failure in flight header', { flightId, offset: start });
  }

  return {
    flightId,
    flags,
    interval,
    startLat,
    startLng,
    startDate: unpackDate(dateWord, timeWord),
    headerSize,
    offset: start,
  };
}
