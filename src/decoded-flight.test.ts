import { describe, it, expect } from 'vitest';
import { DecodedFlight } from './decoded-flight';
import type { FlightHeader, FlightMetricsRecord } from './types';

const HEADER: FlightHeader = {
  flightId: 4,
  flags: 0,
  interval: 6,
  startLat: null,
  startLng: null,
  startDate: { year: 124, month: 5, day: 15, hour: 10, minute: 30, second: 0 },
  headerSize: 28,
  offset: 0,
};

function record(sequence: number, isFast: boolean, egt?: number): FlightMetricsRecord {
  return { flightId: 4, sequence, isFast, metrics: egt === undefined ? {} : { EGT11: egt } };
}

function flightWith(header: FlightHeader, records: FlightMetricsRecord[]): DecodedFlight {
  const flight = new DecodedFlight(header);
  flight.records.push(...records);
  flight.complete({
    flightId: header.flightId,
    standardRecords: records.filter((r) => !r.isFast).length,
    fastRecords: records.filter((r) => r.isFast).length,
  });
  return flight;
}

describe('DecodedFlight', () => {
  const flight = flightWith(HEADER, [
    record(1, false, 1300),
    record(2, true, 1310),
    record(3, true),
    record(4, false, 1290),
  ]);

  it('exposes the header fields', () => {
    expect(flight.flightId).toBe(4);
    expect(flight.interval).toBe(6);
    expect(flight.startTime?.toISOString()).toBe('2024-06-15T10:30:00.000Z');
    expect(flight.empty).toBe(false);
  });

  it('counts fast records as one second each', () => {
    expect(flight.standardRecords).toBe(2);
    expect(flight.fastRecords).toBe(2);
    expect(flight.durationSeconds).toBe(14);
  });

  it('times each record from the start', () => {
    expect(flight.timestamps().map((t) => t.toISOString())).toEqual([
      '2024-06-15T10:30:00.000Z',
      '2024-06-15T10:30:06.000Z',
      '2024-06-15T10:30:07.000Z',
      '2024-06-15T10:30:08.000Z',
    ]);
  });

  it('collects one metric across records', () => {
    expect(flight.series('EGT11')).toEqual([1300, 1310, 1290]);
    expect(flight.series('RPM1')).toEqual([]);
  });

  it('falls back to a six-second interval', () => {
    expect(flightWith({ ...HEADER, interval: 0 }, []).interval).toBe(6);
  });

  it('has no timestamps without a valid start date', () => {
    const undated = flightWith(
      { ...HEADER, startDate: { ...HEADER.startDate, month: 13 } },
      [record(1, false)]
    );
    expect(undated.startTime).toBeNull();
    expect(undated.timestamps()).toEqual([]);
  });

  it('is empty before any record arrives', () => {
    const pending = new DecodedFlight(HEADER);
    expect(pending.empty).toBe(true);
    expect(pending.durationSeconds).toBe(0);
  });
});
