// Checksums guarding the text header lines and the binary flight data

import { ChecksumMismatchError, MalformedHeaderLineError } from './errors';

/** XOR of every character code in the payload */
export function textChecksum(payload: string): number {
  let cs = 0;
  for (let i = 0; i < payload.length; i++) {
    cs ^= payload.charCodeAt(i) & 0xFF;
  }
  return cs;
}

/**
 * Validate a `$<payload>*<HH>` header line.
 * The checksum covers everything between `$` and the last `*`.
 */
export function validateTextChecksum(line: string, lineNumber?: number): void {
  const starIndex = line.lastIndexOf('*');
  if (starIndex <= 0) {
    throw new MalformedHeaderLineError('Header line has no checksum', { lineNumber });
  }

  const expectedHex = line.slice(starIndex + 1).trim();
  if (!/^[0-9A-Fa-f]+$/.test(expectedHex)) {
    throw new MalformedHeaderLineError(`Invalid header checksum format "${expectedHex}"`, { lineNumber });
  }
  const expected = parseInt(expectedHex, 16);
  if (expected > 0xFF) {
    throw new MalformedHeaderLineError(`Header checksum out of range "${expectedHex}"`, { lineNumber });
  }

  const calculated = textChecksum(line.slice(1, starIndex));
  if (calculated !== expected) {
    throw new ChecksumMismatchError(
      `Header checksum mismatch: expected ${expected.toString(16)}, got ${calculated.toString(16)}`,
      { lineNumber }
    );
  }
}

/** Two's-complement negated 8-bit sum and 8-bit XOR over [start, end) */
export function binaryChecksums(bytes: Uint8Array, start: number, end: number): { sum: number; xor: number } {
  let sum = 0;
  let xor = 0;
  for (let i = start; i < end; i++) {
    sum = (sum + bytes[i]) & 0xFF;
    xor ^= bytes[i];
  }
  return { sum: -sum & 0xFF, xor };
}

/** True when the trailer matches either the negated sum or the XOR */
export function validateBinaryChecksum(bytes: Uint8Array, start: number, end: number, trailer: number): boolean {
  const { sum, xor } = binaryChecksums(bytes, start, end);
  return trailer === sum || trailer === xor;
}
