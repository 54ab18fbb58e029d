/**
 * Software-defined-radio entropy extractor.
 *
 * Treats the radio as an entropy sensor: reads IQ samples, keeps the LSB of
 * each quantized component, and whitens raw blocks with SHA-256 (timestamp +
 * counter + block). Output is meant to seed a DRBG or feed the collector, not
 * to be used as certified randomness.
 *
 * Consecutive failures trip a cool-down window during which calls fail fast
 * without touching the hardware. The window doubles on each further trip.
 */

import { createHash } from 'node:crypto';
import { extractIqBits, packBits, type IqSamples } from '../algorithms/entropy/bitPacking';
import { createEngineContext, type EngineContext } from '../context';
import { ENGINE_CONSTANTS } from '../engineConstants';
import { SourceUnavailableError, describeError } from '../errors';
import type { EntropyResult, EntropySource } from './types';

export type RadioSettings = {
	sampleRateHz: number;
	centerFrequencyHz: number;
	gain: number | 'auto';
};

/** Lower-layer radio handle (RTL-SDR class device). */
export interface SpectralRadio {
	open(settings: RadioSettings): Promise<void>;
	readSamples(count: number): Promise<IqSamples>;
	close(): Promise<void>;
}

/** Creates a radio handle; throws when no device or driver is present. */
export type RadioFactory = () => SpectralRadio;

export type SpectralConfig = RadioSettings & {
	/** Complex samples read per hash cycle (default: 65536) */
	samplesPerHash: number;
	/** Collection cycles allowed per whiten() call (default: 64) */
	maxCycles: number;
	/** Consecutive failures before cooling down (default: 3) */
	failureThreshold: number;
	/** First cool-down window (default: 30s) */
	cooldownBaseMs: number;
	/** Cool-down cap (default: 5min) */
	cooldownMaxMs: number;
};

export type SpectralHealth = {
	consecutiveFailures: number;
	cooldownTrips: number;
	coolingDownUntil: number | null;
	totalCycles: number;
};

const DIGEST_BYTES = 32;

export class SpectralEntropyExtractor implements EntropySource {
	readonly id = 'spectral' as const;
	private readonly config: SpectralConfig;
	private consecutiveFailures = 0;
	private cooldownTrips = 0;
	private cooldownUntil = 0;
	private counter = 0;
	private totalCycles = 0;

	constructor(
		private readonly radioFactory: RadioFactory,
		config: Partial<SpectralConfig> = {},
		private readonly context: EngineContext = createEngineContext(),
	) {
		const { SPECTRAL } = ENGINE_CONSTANTS;
		this.config = {
			sampleRateHz: config.sampleRateHz ?? SPECTRAL.SAMPLE_RATE_HZ,
			centerFrequencyHz: config.centerFrequencyHz ?? SPECTRAL.CENTER_FREQUENCY_HZ,
			gain: config.gain ?? SPECTRAL.GAIN,
			samplesPerHash: config.samplesPerHash ?? SPECTRAL.SAMPLES_PER_HASH,
			maxCycles: config.maxCycles ?? SPECTRAL.MAX_CYCLES,
			failureThreshold: config.failureThreshold ?? SPECTRAL.FAILURE_THRESHOLD,
			cooldownBaseMs: config.cooldownBaseMs ?? SPECTRAL.COOLDOWN_BASE_MS,
			cooldownMaxMs: config.cooldownMaxMs ?? SPECTRAL.COOLDOWN_MAX_MS,
		};
	}

	isAvailable(): boolean {
		return !this.isCoolingDown();
	}

	isCoolingDown(): boolean {
		return this.context.clock.now() < this.cooldownUntil;
	}

	getHealth(): SpectralHealth {
		return {
			consecutiveFailures: this.consecutiveFailures,
			cooldownTrips: this.cooldownTrips,
			coolingDownUntil: this.isCoolingDown() ? this.cooldownUntil : null,
			totalCycles: this.totalCycles,
		};
	}

	async fetch(byteCount: number): Promise<EntropyResult> {
		try {
			return { ok: true, source: this.id, bytes: await this.whiten(byteCount) };
		} catch (error) {
			if (error instanceof SourceUnavailableError) {
				return { ok: false, source: this.id, error };
			}
			throw error;
		}
	}

	/**
	 * Read one block of samples and return the packed IQ LSBs (MSB-first).
	 */
	async collectRaw(): Promise<Uint8Array> {
		let radio: SpectralRadio;
		try {
			radio = this.radioFactory();
		} catch (error) {
			throw new SourceUnavailableError(this.id, `Radio unavailable: ${describeError(error)}`, { cause: error });
		}

		try {
			await radio.open({
				sampleRateHz: this.config.sampleRateHz,
				centerFrequencyHz: this.config.centerFrequencyHz,
				gain: this.config.gain,
			});
			const samples = await radio.readSamples(this.config.samplesPerHash);
			return packBits(extractIqBits(samples));
		} catch (error) {
			throw new SourceUnavailableError(this.id, `Sampling failed: ${describeError(error)}`, { cause: error });
		} finally {
			await radio.close().catch((error: unknown) => {
				this.context.logger.warn('[SDR] Close failed:', describeError(error));
			});
		}
	}

	/**
	 * Produce exactly `byteCount` whitened bytes.
	 *
	 * @throws SourceUnavailableError when cooling down, when the radio fails, or
	 *   when `maxCycles` cycles did not yield enough output
	 */
	async whiten(byteCount: number): Promise<Uint8Array> {
		if (this.isCoolingDown()) {
			throw new SourceUnavailableError(
				this.id,
				`Cooling down for another ${this.cooldownUntil - this.context.clock.now()}ms`,
			);
		}

		try {
			const out = await this.whitenBlocks(Math.max(0, byteCount));
			this.consecutiveFailures = 0;
			this.cooldownTrips = 0;
			return out;
		} catch (error) {
			if (error instanceof SourceUnavailableError) this.recordFailure(error);
			throw error;
		}
	}

	private async whitenBlocks(byteCount: number): Promise<Uint8Array> {
		const out = new Uint8Array(byteCount);
		let filled = 0;
		let cycles = 0;

		while (filled < byteCount) {
			if (cycles >= this.config.maxCycles) {
				throw new SourceUnavailableError(
					this.id,
					`Only ${filled}/${byteCount} bytes after ${cycles} cycles`,
				);
			}

			const raw = await this.collectRaw();
			if (raw.length === 0) {
				throw new SourceUnavailableError(this.id, 'No raw bytes collected');
			}

			const header = Buffer.alloc(12);
			header.writeBigUInt64BE(BigInt(Math.max(0, Math.floor(this.context.clock.now()))), 0);
			header.writeUInt32BE(this.counter >>> 0, 8);
			const digest = createHash('sha256').update(header).update(raw).digest();

			const take = Math.min(DIGEST_BYTES, byteCount - filled);
			out.set(digest.subarray(0, take), filled);
			filled += take;
			this.counter = (this.counter + 1) >>> 0;
			cycles++;
			this.totalCycles++;
		}

		return out;
	}

	private recordFailure(error: SourceUnavailableError): void {
		this.consecutiveFailures++;
		this.context.logger.warn(`[SDR] Failure ${this.consecutiveFailures}: ${error.message}`);

		if (this.consecutiveFailures >= this.config.failureThreshold) {
			const window = Math.min(
				this.config.cooldownBaseMs * 2 ** this.cooldownTrips,
				this.config.cooldownMaxMs,
			);
			this.cooldownTrips++;
			this.cooldownUntil = this.context.clock.now() + window;
			this.context.logger.warn(`[SDR] Cooling down for ${window}ms after ${this.consecutiveFailures} failures`);
		}
	}
}
