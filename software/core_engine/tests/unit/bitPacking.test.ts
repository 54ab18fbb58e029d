import { describe, it, expect } from '@jest/globals';
import { extractIqBits, packBits, quantizeInt8, unpackBytes } from '../../src/algorithms/entropy/bitPacking';
import { bitMean, effectPercent, fairCoinZScore } from '../../src/algorithms/statistics/bitStatistics';

describe('quantizeInt8', () => {
  it('scales normalized samples to signed bytes', () => {
    expect(quantizeInt8(1)).toBe(127);
    expect(quantizeInt8(-1)).toBe(-127);
    expect(quantizeInt8(0.5)).toBe(64);
  });

  it('clamps out-of-range and non-finite input', () => {
    expect(quantizeInt8(2)).toBe(127);
    expect(quantizeInt8(-2)).toBe(-128);
    expect(quantizeInt8(Number.NaN)).toBe(0);
  });
});

describe('extractIqBits', () => {
  it('interleaves I and Q least-significant bits', () => {
    const bits = extractIqBits({ inPhase: [0.5, -1], quadrature: [1 / 127, 0, 0.9] });
    // I0=64, Q0=1, I1=-127, Q1=0; the third Q value has no I partner
    expect(bits).toEqual([0, 1, 1, 0]);
  });
});

describe('packBits / unpackBytes', () => {
  it('packs MSB-first by default and zero-pads', () => {
    expect(Array.from(packBits([1, 0, 1, 1]))).toEqual([0xb0]);
    expect(Array.from(packBits([1, 1, 1, 1, 1, 1, 1, 1, 1]))).toEqual([0xff, 0x80]);
  });

  it('packs LSB-first on request', () => {
    expect(Array.from(packBits([1, 0, 1, 1], 'lsb-first'))).toEqual([13]);
  });

  it('unpacks in either bit order', () => {
    const bytes = Uint8Array.from([0x01]);
    expect(unpackBytes(bytes)).toEqual([0, 0, 0, 0, 0, 0, 0, 1]);
    expect(unpackBytes(bytes, 'lsb-first')).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('unpacking reverses packing', () => {
    const bits = unpackBytes(Uint8Array.from([0xc3, 0x5a]));
    expect(Array.from(packBits(bits))).toEqual([0xc3, 0x5a]);
  });
});

describe('bit statistics', () => {
  it('treats an empty stream as a fair coin', () => {
    expect(bitMean([])).toBe(0.5);
  });

  it('computes the mean of ones', () => {
    expect(bitMean([1, 1, 0, 0, 1])).toBeCloseTo(0.6, 10);
  });

  it('computes the fair-coin z-score', () => {
    expect(fairCoinZScore(0.6, 100)).toBeCloseTo(2, 10);
    expect(fairCoinZScore(0.7, 0)).toBe(0);
  });

  it('expresses baseline deviation in percent of 0.5', () => {
    expect(effectPercent(0.55, 0.5)).toBeCloseTo(10, 10);
    expect(effectPercent(0.45, 0.5)).toBeCloseTo(-10, 10);
  });
});
