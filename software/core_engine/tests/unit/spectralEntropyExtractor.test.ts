import { describe, it, expect, jest } from '@jest/globals';
import { createHash } from 'node:crypto';
import { extractIqBits, packBits, type IqSamples } from '../../src/algorithms/entropy/bitPacking';
import { SourceUnavailableError } from '../../src/errors';
import {
  SpectralEntropyExtractor,
  type RadioFactory,
  type SpectralRadio,
} from '../../src/sources/SpectralEntropyExtractor';
import { FakeClock, testContext } from '../helpers/fakes';

const SAMPLES: IqSamples = {
  inPhase: [0.5, -1, 0.25, 0.1],
  quadrature: [1 / 127, 0, -0.3, 0.7],
};

function fakeRadio(options: { readFails?: boolean; closeFails?: boolean } = {}) {
  const calls = { created: 0, opened: 0, closed: 0 };
  const factory: RadioFactory = () => {
    calls.created++;
    const radio: SpectralRadio = {
      open: async () => {
        calls.opened++;
      },
      readSamples: async () => {
        if (options.readFails) throw new Error('usb transfer error');
        return SAMPLES;
      },
      close: async () => {
        calls.closed++;
        if (options.closeFails) throw new Error('busy');
      },
    };
    return radio;
  };
  return { factory, calls };
}

const missingRadio: RadioFactory = () => {
  throw new Error('no device');
};

describe('SpectralEntropyExtractor', () => {
  it('hashes timestamp, counter and raw IQ bits into each block', async () => {
    const clock = new FakeClock(1_700_000_000_000);
    const { factory } = fakeRadio();
    const extractor = new SpectralEntropyExtractor(factory, { samplesPerHash: 4 }, testContext({ clock }));

    const header = Buffer.alloc(12);
    header.writeBigUInt64BE(BigInt(clock.now()), 0);
    header.writeUInt32BE(0, 8);
    const expected = createHash('sha256').update(header).update(packBits(extractIqBits(SAMPLES))).digest();

    expect(Array.from(await extractor.whiten(32))).toEqual(Array.from(expected));
  });

  it('runs as many cycles as needed and truncates', async () => {
    const { factory, calls } = fakeRadio();
    const extractor = new SpectralEntropyExtractor(factory, {}, testContext());

    const bytes = await extractor.whiten(70);

    expect(bytes).toHaveLength(70);
    expect(calls).toEqual({ created: 3, opened: 3, closed: 3 });
    expect(extractor.getHealth().totalCycles).toBe(3);
  });

  it('gives up after maxCycles', async () => {
    const { factory } = fakeRadio();
    const extractor = new SpectralEntropyExtractor(factory, { maxCycles: 1 }, testContext());

    await expect(extractor.whiten(33)).rejects.toThrow('[spectral] Only 32/33 bytes after 1 cycles');
  });

  it('returns an explicit failure when no radio is present', async () => {
    const extractor = new SpectralEntropyExtractor(missingRadio, {}, testContext());

    const result = await extractor.fetch(16);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(SourceUnavailableError);
      expect(result.error.message).toBe('[spectral] Radio unavailable: no device');
    }
  });

  it('closes the radio even when sampling fails', async () => {
    const { factory, calls } = fakeRadio({ readFails: true });
    const extractor = new SpectralEntropyExtractor(factory, {}, testContext());

    await expect(extractor.collectRaw()).rejects.toThrow('[spectral] Sampling failed: usb transfer error');
    expect(calls.closed).toBe(1);
  });

  it('logs close errors without failing the read', async () => {
    const warn = jest.fn();
    const { factory } = fakeRadio({ closeFails: true });
    const extractor = new SpectralEntropyExtractor(factory, {}, testContext({
      logger: { debug: jest.fn(), info: jest.fn(), warn, error: jest.fn() },
    }));

    await expect(extractor.collectRaw()).resolves.toHaveLength(1);
    expect(warn).toHaveBeenCalledWith('[SDR] Close failed:', 'busy');
  });

  it('fails fast during the cool-down window', async () => {
    const clock = new FakeClock(1_000);
    const factory = jest.fn(missingRadio);
    const extractor = new SpectralEntropyExtractor(factory, { failureThreshold: 3, cooldownBaseMs: 30_000 }, testContext({ clock }));

    for (let i = 0; i < 3; i++) await extractor.fetch(8);
    expect(extractor.isAvailable()).toBe(false);
    expect(extractor.getHealth()).toEqual({
      consecutiveFailures: 3,
      cooldownTrips: 1,
      coolingDownUntil: 31_000,
      totalCycles: 0,
    });

    await expect(extractor.whiten(8)).rejects.toThrow('Cooling down');
    expect(factory).toHaveBeenCalledTimes(3);
  });

  it('re-trips with a doubled window after the cool-down ends', async () => {
    const clock = new FakeClock(1_000);
    const extractor = new SpectralEntropyExtractor(missingRadio, { failureThreshold: 3, cooldownBaseMs: 30_000 }, testContext({ clock }));

    for (let i = 0; i < 3; i++) await extractor.fetch(8);
    clock.advance(30_000);
    expect(extractor.isAvailable()).toBe(true);

    await extractor.fetch(8);

    expect(extractor.getHealth()).toEqual({
      consecutiveFailures: 4,
      cooldownTrips: 2,
      coolingDownUntil: 91_000,
      totalCycles: 0,
    });
  });

  it('caps the cool-down window', async () => {
    const clock = new FakeClock(0);
    const extractor = new SpectralEntropyExtractor(
      missingRadio,
      { failureThreshold: 1, cooldownBaseMs: 1_000, cooldownMaxMs: 3_000 },
      testContext({ clock }),
    );

    // windows: 1000, 2000, 3000 (capped from 4000)
    for (const window of [1_000, 2_000, 3_000]) {
      const before = clock.now();
      await extractor.fetch(8);
      expect(extractor.getHealth().coolingDownUntil).toBe(before + window);
      clock.advance(window);
    }
  });

  it('resets failure counters after a success', async () => {
    const clock = new FakeClock(1_000);
    let present = false;
    const { factory: working } = fakeRadio();
    const factory: RadioFactory = () => (present ? working() : missingRadio());
    const extractor = new SpectralEntropyExtractor(factory, { failureThreshold: 3 }, testContext({ clock }));

    await extractor.fetch(8);
    await extractor.fetch(8);
    present = true;
    const result = await extractor.fetch(8);

    expect(result.ok).toBe(true);
    expect(extractor.getHealth().consecutiveFailures).toBe(0);
    expect(extractor.getHealth().cooldownTrips).toBe(0);
  });
});
