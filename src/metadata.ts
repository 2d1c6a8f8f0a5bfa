// File-level metadata for EDM flight logs
// Aggregates the text header records and derives the protocol details from them

import type {
  ConfigInfo,
  ConfigLimits,
  FlightDescriptor,
  FuelLimits,
  HeaderVersion,
  ParsedHeader,
  ProtocolHeader,
  ProtocolVersion,
  Timestamp,
} from './types';

/** Feature bits of the $C flags word */
export const ConfigFlag = {
  BAT: 0x00000001,
  C1: 0x00000004,
  C2: 0x00000008,
  C3: 0x00000010,
  C4: 0x00000020,
  C5: 0x00000040,
  C6: 0x00000080,
  C7: 0x00000100,
  C8: 0x00000200,
  C9: 0x00000400,
  E1: 0x00000800,
  E2: 0x00001000,
  E3: 0x00002000,
  E4: 0x00004000,
  E5: 0x00008000,
  E6: 0x00010000,
  E7: 0x00020000,
  E8: 0x00040000,
  E9: 0x00080000,
  OIL: 0x00100000,
  T1: 0x00200000,
  T2: 0x00400000,
  CDT: 0x00800000,
  IAT: 0x01000000,
  OAT: 0x02000000,
  RPM: 0x04000000,
  FF: 0x08000000,
  TEMP_IN_F: 0x10000000,
  MAP: 0x40000000,
} as const;

export type ConfigFlagName = keyof typeof ConfigFlag;

const CYLINDER_FLAGS = [
  ConfigFlag.C1, ConfigFlag.C2, ConfigFlag.C3,
  ConfigFlag.C4, ConfigFlag.C5, ConfigFlag.C6,
  ConfigFlag.C7, ConfigFlag.C8, ConfigFlag.C9,
];

const DEFAULT_CYLINDER_COUNT = 4;

const TWIN_MODELS = [760, 960];
const SINGLE_ENGINE_MODEL_LIMIT = 900;
const LAST_V1_FIRMWARE = 108;

export interface MetadataInit {
  configLimits?: ConfigLimits | null;
  configInfo?: ConfigInfo | null;
  fuelLimits?: FuelLimits | null;
  protocolHeader?: ProtocolHeader | null;
  timestamp?: Timestamp | null;
  tailNumber?: string | null;
  flights?: FlightDescriptor[];
  warnings?: string[];
}

export class Metadata {
  readonly configLimits: ConfigLimits | null;
  readonly configInfo: ConfigInfo | null;
  readonly fuelLimits: FuelLimits | null;
  readonly protocolHeader: ProtocolHeader | null;
  readonly timestamp: Timestamp | null;
  readonly tailNumber: string | null;
  readonly flights: readonly FlightDescriptor[];
  /** Non-fatal problems met while reading the header */
  readonly warnings: readonly string[];

  constructor(init: MetadataInit = {}) {
    this.configLimits = init.configLimits ?? null;
    this.configInfo = init.configInfo ?? null;
    this.fuelLimits = init.fuelLimits ?? null;
    this.protocolHeader = init.protocolHeader ?? null;
    this.timestamp = init.timestamp ?? null;
    this.tailNumber = init.tailNumber ?? null;
    this.flights = Object.freeze([...(init.flights ?? [])]);
    this.warnings = Object.freeze([...(init.warnings ?? [])]);
  }

  static fromHeader(header: ParsedHeader): Metadata {
    const init: MetadataInit = { flights: [], warnings: [...header.warnings] };
    const flights: FlightDescriptor[] = [];

    for (const record of header.records) {
      switch (record.tag) {
        case 'A':
          init.configLimits = record.configLimits;
          break;
        case 'C':
          init.configInfo = record.configInfo;
          break;
        case 'D':
          flights.push(record.descriptor);
          break;
        case 'F':
          init.fuelLimits = record.fuelLimits;
          break;
        case 'P':
          init.protocolHeader = record.protocolHeader;
          break;
        case 'T':
          init.timestamp = record.timestamp;
          break;
        case 'U':
          init.tailNumber = record.tailNumber;
          break;
        case 'L':
          break;
      }
    }

    init.flights = flights;
    return new Metadata(init);
  }

  get model(): number {
    return this.configInfo?.model ?? 0;
  }

  get flags(): number {
    return this.configInfo?.flags ?? 0;
  }

  get firmwareVersion(): number {
    return this.configInfo?.firmwareVersion ?? 0;
  }

  get protocolHeaderValue(): number {
    return this.protocolHeader?.value ?? 0;
  }

  /**
   * Record layout generation. V3 is a known layout that no
   * combination of header fields selects.
   */
  get protocolVersion(): ProtocolVersion {
    if (this.model === 760) return 'V2';
    if (this.model === 960) return 'V5';

    if (this.model < SINGLE_ENGINE_MODEL_LIMIT) {
      return this.protocolHeaderValue < 2 ? 'V1' : 'V4';
    }

    return this.firmwareVersion <= LAST_V1_FIRMWARE ? 'V1' : 'V4';
  }

  get isOldRecordFormat(): boolean {
    const version = this.protocolVersion;
    return version === 'V1' || version === 'V2';
  }

  get flightHeaderVersion(): HeaderVersion {
    if (this.protocolHeaderValue > 1 || this.model >= SINGLE_ENGINE_MODEL_LIMIT) {
      const buildMajor = this.configInfo?.buildMajor ?? 0;
      if (buildMajor > 2010) return 'HEADER_V4';
      if (buildMajor > 880) return 'HEADER_V3';
      return 'HEADER_V2';
    }
    return 'HEADER_V1';
  }

  get tempInCelsius(): boolean {
    return !this.hasFeature('TEMP_IN_F');
  }

  get isTwinEngine(): boolean {
    return TWIN_MODELS.includes(this.model);
  }

  /** Fuel figures are in gallons per hour */
  get isGph(): boolean {
    return (this.fuelLimits?.units ?? 0) === 0;
  }

  get cylinderCount(): number {
    const count = CYLINDER_FLAGS.filter((flag) => (this.flags & flag) !== 0).length;
    return count === 0 ? DEFAULT_CYLINDER_COUNT : count;
  }

  hasFeature(name: ConfigFlagName): boolean {
    return (this.flags & ConfigFlag[name]) !== 0;
  }

  /** Get model string (e.g., "EDM-830") */
  get modelString(): string {
    return this.model ? `EDM-${this.model}` : 'Unknown';
  }

  /** When the file was downloaded from the instrument, in UTC */
  get downloadTime(): Date | null {
    const ts = this.timestamp;
    if (!ts) return null;

    const year = ts.year < 50 ? 2000 + ts.year : 1900 + ts.year;
    const date = new Date(Date.UTC(year, ts.month - 1, ts.day, ts.hour, ts.minute, 0));
    return isNaN(date.getTime()) ? null : date;
  }
}
