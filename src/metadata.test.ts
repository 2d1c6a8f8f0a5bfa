import { describe, it, expect } from 'vitest';
import { ConfigFlag, Metadata } from './metadata';
import { parseHeader } from './header-parser';
import type { ConfigInfo, ProtocolVersion } from './types';
import { ascii, headerText, SINGLE_ENGINE_HEADER } from './test-helpers';

function configInfo(model: number, flags = 0, firmwareVersion = 0, buildMajor = 0): ConfigInfo {
  return { model, flags, firmwareVersion, buildMajor, buildMinor: 0, values: [] };
}

describe('Metadata.fromHeader', () => {
  const header = parseHeader(ascii(headerText([...SINGLE_ENGINE_HEADER, 'D,1,40', 'D,2,20', 'L,49'])));
  const metadata = Metadata.fromHeader(header);

  it('collects the records', () => {
    expect(metadata.tailNumber).toBe('N12345');
    expect(metadata.model).toBe(830);
    expect(metadata.flags).toBe(0x100000FC);
    expect(metadata.firmwareVersion).toBe(292);
    expect(metadata.configLimits?.egtDiff).toBe(500);
    expect(metadata.fuelLimits?.mainTank).toBe(49);
    expect(metadata.protocolHeaderValue).toBe(2);
  });

  it('keeps flight descriptors in header order', () => {
    expect(metadata.flights).toEqual([
      { id: 1, wordCount: 40 },
      { id: 2, wordCount: 20 },
    ]);
  });

  it('derives the engine configuration', () => {
    expect(metadata.protocolVersion).toBe('V4');
    expect(metadata.cylinderCount).toBe(6);
    expect(metadata.tempInCelsius).toBe(false);
    expect(metadata.isTwinEngine).toBe(false);
    expect(metadata.isGph).toBe(true);
    expect(metadata.modelString).toBe('EDM-830');
  });

  it('reads the download time as UTC', () => {
    expect(metadata.downloadTime?.toISOString()).toBe('2005-05-13T23:02:00.000Z');
  });
});

describe('Metadata.protocolVersion', () => {
  const cases: Array<[number, number, number, ProtocolVersion]> = [
    [760, 0, 0, 'V2'],
    [960, 0, 0, 'V5'],
    [830, 2, 0, 'V4'],
    [830, 1, 0, 'V1'],
    [700, 0, 0, 'V1'],
    [930, 0, 200, 'V4'],
    [930, 0, 108, 'V1'],
  ];

  it.each(cases)('model %i with protocol header %i and firmware %i is %s', (model, protocol, firmware, expected) => {
    const metadata = new Metadata({
      configInfo: configInfo(model, 0, firmware),
      protocolHeader: { value: protocol },
    });
    expect(metadata.protocolVersion).toBe(expected);
  });

  it('falls back to V1 without a $C line', () => {
    expect(new Metadata().protocolVersion).toBe('V1');
  });

  it('marks V1 and V2 as the old record format', () => {
    expect(new Metadata({ configInfo: configInfo(760) }).isOldRecordFormat).toBe(true);
    expect(new Metadata({ configInfo: configInfo(960) }).isOldRecordFormat).toBe(false);
  });
});

describe('Metadata.flightHeaderVersion', () => {
  it('is HEADER_V1 for old single-engine files', () => {
    expect(new Metadata({ configInfo: configInfo(830) }).flightHeaderVersion).toBe('HEADER_V1');
  });

  it('follows the build number otherwise', () => {
    const v = (buildMajor: number) =>
      new Metadata({ configInfo: configInfo(930, 0, 200, buildMajor) }).flightHeaderVersion;
    expect(v(0)).toBe('HEADER_V2');
    expect(v(900)).toBe('HEADER_V3');
    expect(v(2013)).toBe('HEADER_V4');
  });
});

describe('Metadata flags', () => {
  it('counts configured cylinders', () => {
    const flags = ConfigFlag.C1 | ConfigFlag.C2 | ConfigFlag.C3 | ConfigFlag.C4;
    expect(new Metadata({ configInfo: configInfo(830, flags) }).cylinderCount).toBe(4);
    expect(new Metadata({ configInfo: configInfo(830, 0x7FC) }).cylinderCount).toBe(9);
  });

  it('defaults to four cylinders when none are flagged', () => {
    expect(new Metadata().cylinderCount).toBe(4);
  });

  it('reports features by name', () => {
    const metadata = new Metadata({ configInfo: configInfo(830, ConfigFlag.OIL | ConfigFlag.RPM) });
    expect(metadata.hasFeature('OIL')).toBe(true);
    expect(metadata.hasFeature('RPM')).toBe(true);
    expect(metadata.hasFeature('MAP')).toBe(false);
    expect(metadata.tempInCelsius).toBe(true);
  });
});

describe('Metadata defaults', () => {
  const metadata = new Metadata();

  it('has no model or download time', () => {
    expect(metadata.modelString).toBe('Unknown');
    expect(metadata.downloadTime).toBeNull();
    expect(metadata.tailNumber).toBeNull();
    expect(metadata.flights).toEqual([]);
  });

  it('treats missing fuel limits as GPH', () => {
    expect(metadata.isGph).toBe(true);
    expect(new Metadata({
      fuelLimits: { units: 1, mainTank: 0, auxTank: 0, kFactor1: 0, kFactor2: 0 },
    }).isGph).toBe(false);
  });

  it('places two-digit years before 50 in this century', () => {
    const at = (year: number) => new Metadata({
      timestamp: { month: 1, day: 2, year, hour: 3, minute: 4, sequence: 0 },
    }).downloadTime?.toISOString();
    expect(at(24)).toBe('2024-01-02T03:04:00.000Z');
    expect(at(99)).toBe('1999-01-02T03:04:00.000Z');
  });
});
