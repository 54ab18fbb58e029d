/**
 * Heart-rate notification parsing and RMSSD coherence.
 */

import { describe, it, expect } from '@jest/globals';
import { parseHeartRateMeasurement, rrUnitsToMs } from '../../src/algorithms/biometrics/heartRateMeasurement';
import { coherenceFromRmssd, computeCoherence, rmssd } from '../../src/algorithms/biometrics/rmssdCoherence';
import { ParseError } from '../../src/errors';

const parse = (bytes: number[]) => parseHeartRateMeasurement(Uint8Array.from(bytes));

describe('parseHeartRateMeasurement', () => {
  it('parses an 8-bit heart rate without RR intervals', () => {
    expect(parse([0x00, 0x46])).toEqual({
      heartRateBpm: 70,
      rrIntervalsMs: [],
      sensorContact: 'unsupported',
      energyExpendedKj: null,
    });
  });

  it('converts RR values from 1/1024 s to milliseconds', () => {
    const result = parse([0x10, 0x46, 0x00, 0x04]);
    expect(result.rrIntervalsMs).toEqual([1000]);
  });

  it('reads several RR values and ignores a trailing odd byte', () => {
    const result = parse([0x10, 0x3c, 0x00, 0x04, 0x00, 0x02, 0x07]);
    expect(result.rrIntervalsMs).toEqual([1000, 500]);
  });

  it('parses a 16-bit heart rate', () => {
    expect(parse([0x01, 0x2c, 0x01]).heartRateBpm).toBe(300);
  });

  it('skips the energy-expended field before RR values', () => {
    const result = parse([0x18, 0x3c, 0x10, 0x00, 0x00, 0x02]);
    expect(result.energyExpendedKj).toBe(16);
    expect(result.rrIntervalsMs).toEqual([500]);
  });

  it('reports sensor contact when supported', () => {
    expect(parse([0x06, 0x3c]).sensorContact).toBe('detected');
    expect(parse([0x04, 0x3c]).sensorContact).toBe('not_detected');
  });

  it('rejects payloads shorter than their flags announce', () => {
    expect(() => parse([0x00])).toThrow(ParseError);
    expect(() => parse([0x01, 0x46])).toThrow(ParseError);
    expect(() => parse([0x08, 0x3c, 0x01])).toThrow(ParseError);
  });

  it('converts raw RR units', () => {
    expect(rrUnitsToMs(512)).toBe(500);
  });
});

describe('RMSSD coherence', () => {
  it('returns null RMSSD with fewer than two values', () => {
    expect(rmssd([800])).toBeNull();
    expect(rmssd([800, 830])).toBeCloseTo(30, 10);
  });

  it('scores a perfectly steady rhythm as 1', () => {
    expect(computeCoherence(Array(10).fill(800))).toBe(1);
  });

  it('scores a 50ms alternation as 0.5', () => {
    const rr = Array.from({ length: 10 }, (_, i) => (i % 2 === 0 ? 800 : 850));
    expect(computeCoherence(rr)).toBeCloseTo(0.5, 10);
  });

  it('returns 0 below the minimum sample count', () => {
    expect(computeCoherence(Array(9).fill(800))).toBe(0);
    expect(computeCoherence([800, 800, 800], { minSamples: 3 })).toBe(1);
  });

  it('uses the normalization constant', () => {
    expect(coherenceFromRmssd(100, 50)).toBeCloseTo(1 / 3, 10);
    expect(coherenceFromRmssd(100, 100)).toBeCloseTo(0.5, 10);
  });
});
