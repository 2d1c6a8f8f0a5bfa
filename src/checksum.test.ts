import { describe, it, expect } from 'vitest';
import {
  binaryChecksums,
  textChecksum,
  validateBinaryChecksum,
  validateTextChecksum,
} from './checksum';
import { ChecksumMismatchError, MalformedHeaderLineError } from './errors';

describe('textChecksum', () => {
  it('XORs every character of the payload', () => {
    expect(textChecksum('L,0')).toBe(0x50);
    expect(textChecksum('U,N12345')).toBe(0x06);
  });

  it('is zero for an empty payload', () => {
    expect(textChecksum('')).toBe(0);
  });
});

describe('validateTextChecksum', () => {
  it('accepts a matching trailer in either case', () => {
    expect(() => validateTextChecksum('$L,49*6D')).not.toThrow();
    expect(() => validateTextChecksum('$L,49*6d')).not.toThrow();
  });

  it('rejects a mismatching trailer', () => {
    expect(() => validateTextChecksum('$L,49*6C', 2)).toThrow(ChecksumMismatchError);
    expect(() => validateTextChecksum('$L,49*6C', 2)).toThrow(
      'Header checksum mismatch: expected 6c, got 6d (line 2)'
    );
  });

  it('rejects a line without a checksum', () => {
    expect(() => validateTextChecksum('$L,49', 3)).toThrow(MalformedHeaderLineError);
    expect(() => validateTextChecksum('$L,49', 3)).toThrow('Header line has no checksum (line 3)');
  });

  it('rejects a non-hex checksum', () => {
    expect(() => validateTextChecksum('$L,49*ZZ')).toThrow(MalformedHeaderLineError);
  });

  it('rejects a checksum wider than one byte', () => {
    expect(() => validateTextChecksum('$L,49*16D')).toThrow(MalformedHeaderLineError);
  });
});

describe('binaryChecksums', () => {
  it('returns the negated sum and the XOR', () => {
    const bytes = new Uint8Array([1, 2, 3]);
    expect(binaryChecksums(bytes, 0, 3)).toEqual({ sum: 250, xor: 0 });
  });

  it('covers only the requested range', () => {
    const bytes = new Uint8Array([0xFF, 0x10, 0x20, 0xFF]);
    expect(binaryChecksums(bytes, 1, 3)).toEqual({ sum: 0xD0, xor: 0x30 });
  });

  it('wraps the sum at 8 bits', () => {
    const bytes = new Uint8Array([0x80, 0x80, 0x01]);
    expect(binaryChecksums(bytes, 0, 3).sum).toBe(0xFF);
  });
});

describe('validateBinaryChecksum', () => {
  const bytes = new Uint8Array([0x10, 0x20]);

  it('accepts a sum-only match', () => {
    expect(validateBinaryChecksum(bytes, 0, 2, 0xD0)).toBe(true);
  });

  it('accepts an XOR-only match', () => {
    expect(validateBinaryChecksum(bytes, 0, 2, 0x30)).toBe(true);
  });

  it('rejects a trailer matching neither', () => {
    expect(validateBinaryChecksum(bytes, 0, 2, 0x31)).toBe(false);
  });
});
