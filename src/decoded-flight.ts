// A fully decoded flight: header, records and record counts

import { startTime } from './format';
import type { MetricId } from './metrics';
import type { FlightCompletion, FlightHeader, FlightMetricsRecord } from './types';

const DEFAULT_INTERVAL_SECS = 6;

export class DecodedFlight {
  readonly header: FlightHeader;
  readonly records: FlightMetricsRecord[] = [];
  standardRecords: number = 0;
  fastRecords: number = 0;

  constructor(header: FlightHeader) {
    this.header = header;
  }

  complete(completion: FlightCompletion): void {
    this.standardRecords = completion.standardRecords;
    this.fastRecords = completion.fastRecords;
  }

  get flightId(): number {
    return this.header.flightId;
  }

  get startTime(): Date | null {
    return startTime(this.header);
  }

  /** Standard-rate interval in seconds; 6 when the header holds none */
  get interval(): number {
    return this.header.interval <= 0 ? DEFAULT_INTERVAL_SECS : this.header.interval;
  }

  /** Fast records are taken once per second */
  get durationSeconds(): number {
    return this.standardRecords * this.interval + this.fastRecords;
  }

  get empty(): boolean {
    return this.records.length === 0;
  }

  /** Record times; the first record is at the start time */
  timestamps(): Date[] {
    const start = this.startTime;
    if (start === null) return [];

    const times: Date[] = [];
    let at = start.getTime();
    for (const record of this.records) {
      times.push(new Date(at));
      at += (record.isFast ? 1 : this.interval) * 1000;
    }
    return times;
  }

  /** Values of one metric across the flight */
  series(id: MetricId): number[] {
    const values: number[] = [];
    for (const record of this.records) {
      const value = record.metrics[id];
      if (value !== undefined) values.push(value);
    }
    return values;
  }
}
