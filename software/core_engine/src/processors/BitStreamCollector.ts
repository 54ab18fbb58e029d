/**
 * Live bit-collection engine.
 *
 * Owns two bounded bit buffers (baseline / experiment), the producer task that
 * fills them, event markers, and the statistics the UI polls.
 *
 * Features:
 * - Periodic producer: one bit per tick from the DRBG (if seeded) or the CSPRNG
 * - Continuous producer: unpacks whatever byte blocks a provider yields
 * - Rolling mean / z-score against the fair-coin null hypothesis
 * - Baseline-vs-experiment effect size
 * - Baseline import from bit lists or packed bytes
 *
 * @example
 * ```typescript
 * const collector = new BitStreamCollector({ intervalMs: 10 }, { generator: drbg });
 * collector.start('baseline');
 * // ...
 * await collector.stop();
 * collector.start('experiment');
 * const stats = collector.getStats();
 * ```
 */

import { unpackBytes } from '../algorithms/entropy/bitPacking';
import { bitMean, effectPercent, fairCoinZScore, FAIR_COIN_MEAN } from '../algorithms/statistics/bitStatistics';
import { createEngineContext, settlesWithin, type EngineContext } from '../context';
import { ENGINE_CONSTANTS } from '../engineConstants';
import { describeError } from '../errors';
import type { DeterministicBitGenerator } from '../generators/DeterministicBitGenerator';
import { SecureFallbackSource } from '../sources/SecureFallbackSource';
import type {
	BaselineComparison,
	Bit,
	BitOrder,
	CoherenceSnapshot,
	CollectorMode,
	Marker,
	MarkerKind,
	MarkerMeta,
	SessionStats,
} from '../types/session.types';
import { RingBuffer } from '../utils/RingBuffer';

export type CollectorConfig = {
	/** Bits kept per buffer before FIFO eviction (default: 100000) */
	bufferCapacity: number;
	/** Periodic producer cadence (default: 10ms) */
	intervalMs: number;
	/** Bounded join on stop() (default: 1000ms) */
	stopTimeoutMs: number;
	/** Default trailing window for getStats() (default: 1000) */
	statsWindow: number;
	/** Below this many bits, stats are neutral (default: 10) */
	minBitsForStats: number;
	/** Both buffers need this many bits for a comparison (default: 100) */
	minBitsForComparison: number;
	/** Pause after a continuous-provider error (default: 500ms) */
	continuousRetryDelayMs: number;
	/** Pause between continuous blocks (default: 0ms, yields the event loop) */
	continuousPollMs: number;
};

export type CollectorSources = {
	generator?: DeterministicBitGenerator;
	fallback?: SecureFallbackSource;
};

export type BitBlockProvider = () => Promise<Uint8Array> | Uint8Array;

export type ProducerKind = 'periodic' | 'continuous';

export type ImportResult = {
	imported: number;
	skipped: number;
};

export type CollectorSnapshot = {
	mode: CollectorMode;
	running: boolean;
	experimentBits: Bit[];
	baselineBits: Bit[];
	markers: readonly Marker[];
};

/** Ring buffer of bits with a running count of ones. */
class BitBuffer {
	private readonly ring: RingBuffer<Bit>;
	private ones = 0;

	constructor(capacity: number) {
		this.ring = new RingBuffer<Bit>(capacity);
	}

	get size(): number {
		return this.ring.size;
	}

	push(bit: Bit): void {
		const evicted = this.ring.push(bit);
		this.ones += bit - (evicted ?? 0);
	}

	/** Size and ones taken together, so the mean is consistent. */
	summary(): { size: number; ones: number } {
		return { size: this.ring.size, ones: this.ones };
	}

	tail(n: number): Bit[] {
		return this.ring.tail(n);
	}

	toArray(): Bit[] {
		return this.ring.toArray();
	}

	clear(): void {
		this.ring.clear();
		this.ones = 0;
	}
}

export class BitStreamCollector {
	private readonly config: CollectorConfig;
	private readonly experiment: BitBuffer;
	private readonly baseline: BitBuffer;
	private readonly markers: Marker[] = [];
	private readonly generator: DeterministicBitGenerator | null;
	private readonly fallback: SecureFallbackSource;

	private currentMode: CollectorMode = 'experiment';
	private running = false;
	private generation = 0;
	private producer: Promise<void> | null = null;
	private producerKind: ProducerKind | null = null;

	constructor(
		config: Partial<CollectorConfig> = {},
		sources: CollectorSources = {},
		private readonly context: EngineContext = createEngineContext(),
	) {
		const { COLLECTOR } = ENGINE_CONSTANTS;
		this.config = {
			bufferCapacity: config.bufferCapacity ?? COLLECTOR.BUFFER_CAPACITY,
			intervalMs: config.intervalMs ?? COLLECTOR.INTERVAL_MS,
			stopTimeoutMs: config.stopTimeoutMs ?? COLLECTOR.STOP_TIMEOUT_MS,
			statsWindow: config.statsWindow ?? COLLECTOR.STATS_WINDOW,
			minBitsForStats: config.minBitsForStats ?? COLLECTOR.MIN_BITS_FOR_STATS,
			minBitsForComparison: config.minBitsForComparison ?? COLLECTOR.MIN_BITS_FOR_COMPARISON,
			continuousRetryDelayMs: config.continuousRetryDelayMs ?? COLLECTOR.CONTINUOUS_RETRY_DELAY_MS,
			continuousPollMs: config.continuousPollMs ?? COLLECTOR.CONTINUOUS_POLL_MS,
		};
		this.experiment = new BitBuffer(this.config.bufferCapacity);
		this.baseline = new BitBuffer(this.config.bufferCapacity);
		this.generator = sources.generator ?? null;
		this.fallback = sources.fallback ?? new SecureFallbackSource();
	}

	// ==========================================================================
	// LIFECYCLE
	// ==========================================================================

	/**
	 * Start the periodic producer.
	 *
	 * @returns false if a producer is already running
	 */
	start(mode: CollectorMode = 'experiment'): boolean {
		if (this.running) return false;
		this.currentMode = mode;
		this.launch('periodic', (generation) => this.runPeriodic(generation));
		return true;
	}

	/**
	 * Start a producer that unpacks every block `provider` yields into the
	 * active buffer. Provider errors pause the loop briefly, never end it.
	 *
	 * Bits are unpacked MSB-first unless `bitOrder` says otherwise.
	 */
	startContinuousSource(
		provider: BitBlockProvider,
		options: { mode?: CollectorMode; bitOrder?: BitOrder } = {},
	): boolean {
		if (this.running) return false;
		if (options.mode) this.currentMode = options.mode;
		const order = options.bitOrder ?? 'msb-first';
		this.launch('continuous', (generation) => this.runContinuous(generation, provider, order));
		return true;
	}

	/**
	 * Clear the run flag and wait (bounded) for the producer to finish.
	 *
	 * @returns true if the producer exited within `stopTimeoutMs`
	 */
	async stop(): Promise<boolean> {
		if (!this.producer) return true;
		this.running = false;
		const producer = this.producer;
		this.producer = null;
		this.producerKind = null;

		const joined = await settlesWithin(producer, this.config.stopTimeoutMs);
		if (!joined) {
			this.context.logger.warn(`[Collector] Producer did not stop within ${this.config.stopTimeoutMs}ms`);
		}
		return joined;
	}

	isRunning(): boolean {
		return this.running;
	}

	getProducerKind(): ProducerKind | null {
		return this.producerKind;
	}

	get mode(): CollectorMode {
		return this.currentMode;
	}

	/** Route subsequent bits to another buffer without restarting the producer. */
	setMode(mode: CollectorMode): void {
		this.currentMode = mode;
	}

	get experimentBitCount(): number {
		return this.experiment.size;
	}

	get baselineBitCount(): number {
		return this.baseline.size;
	}

	// ==========================================================================
	// MARKERS
	// ==========================================================================

	/**
	 * Append a marker at the current experiment-bit count.
	 */
	markEvent(kind: MarkerKind, coherence?: CoherenceSnapshot, meta?: MarkerMeta): Marker {
		const marker: Marker = Object.freeze({
			timestamp: this.context.clock.now(),
			bitIndex: this.experiment.size,
			eventKind: kind,
			...(coherence
				? { coherence: Object.freeze({ meanCoherence: coherence.meanCoherence, samples: Object.freeze([...coherence.samples]) }) }
				: {}),
			...(meta ? { meta: Object.freeze({ ...meta }) } : {}),
		});
		this.markers.push(marker);
		return marker;
	}

	getMarkers(): readonly Marker[] {
		return [...this.markers];
	}

	// ==========================================================================
	// STATISTICS
	// ==========================================================================

	/**
	 * Mean and z-score of the trailing `window` bits of the active buffer.
	 * Neutral (0.5, 0) while fewer than `minBitsForStats` bits exist.
	 */
	getStats(window: number = this.config.statsWindow): SessionStats {
		const mode = this.currentMode;
		const buffer = mode === 'baseline' ? this.baseline : this.experiment;
		const count = buffer.size;
		const markerCount = this.markers.length;

		if (count < this.config.minBitsForStats) {
			return { mean: FAIR_COIN_MEAN, zScore: 0, count, markerCount, mode };
		}

		const recent = buffer.tail(Math.min(Math.max(1, Math.floor(window)), count));
		const mean = bitMean(recent);
		return { mean, zScore: fairCoinZScore(mean, recent.length), count, markerCount, mode };
	}

	getBaselineComparison(): BaselineComparison | null {
		const base = this.baseline.summary();
		const exp = this.experiment.summary();
		const min = this.config.minBitsForComparison;
		if (base.size < min || exp.size < min) return null;

		const baselineMean = base.ones / base.size;
		const experimentMean = exp.ones / exp.size;
		return {
			baselineMean,
			experimentMean,
			effectPercent: effectPercent(experimentMean, baselineMean),
			baselineBits: base.size,
			experimentBits: exp.size,
		};
	}

	// ==========================================================================
	// IMPORT / EXPORT
	// ==========================================================================

	/**
	 * Append externally recorded baseline data.
	 *
	 * Number lists keep only 0/1 entries; packed bytes are unpacked bit by bit
	 * (MSB-first by default).
	 */
	importBaselineBits(
		input: readonly number[] | Uint8Array,
		options: { bitOrder?: BitOrder } = {},
	): ImportResult {
		if (input instanceof Uint8Array) {
			const bits = unpackBytes(input, options.bitOrder ?? 'msb-first');
			for (const bit of bits) this.baseline.push(bit);
			return { imported: bits.length, skipped: 0 };
		}

		let imported = 0;
		let skipped = 0;
		for (const value of input) {
			if (value === 0 || value === 1) {
				this.baseline.push(value === 1 ? 1 : 0);
				imported++;
			} else {
				skipped++;
			}
		}
		if (skipped > 0) {
			this.context.logger.warn(`[Collector] Skipped ${skipped} invalid baseline value(s)`);
		}
		return { imported, skipped };
	}

	/** Point-in-time copy of both buffers and the markers. */
	snapshot(): CollectorSnapshot {
		return {
			mode: this.currentMode,
			running: this.running,
			experimentBits: this.experiment.toArray(),
			baselineBits: this.baseline.toArray(),
			markers: [...this.markers],
		};
	}

	/** Last `n` experiment bits, oldest first. */
	recentExperimentBits(n: number): Bit[] {
		return this.experiment.tail(n);
	}

	clear(): void {
		this.experiment.clear();
		this.baseline.clear();
		this.markers.length = 0;
	}

	// ==========================================================================
	// PRODUCERS
	// ==========================================================================

	private launch(kind: ProducerKind, loop: (generation: number) => Promise<void>): void {
		this.running = true;
		this.producerKind = kind;
		const generation = ++this.generation;
		this.producer = loop(generation).catch((error: unknown) => {
			this.context.logger.error(`[Collector] ${kind} producer crashed:`, error);
			if (this.generation === generation) this.running = false;
		});
		this.context.logger.debug(`[Collector] ${kind} producer started (${this.currentMode})`);
	}

	private isCurrent(generation: number): boolean {
		return this.running && this.generation === generation;
	}

	private async runPeriodic(generation: number): Promise<void> {
		while (this.isCurrent(generation)) {
			this.append(this.drawBit());
			await this.context.clock.sleep(this.config.intervalMs);
		}
	}

	private async runContinuous(generation: number, provider: BitBlockProvider, order: BitOrder): Promise<void> {
		while (this.isCurrent(generation)) {
			let block: Uint8Array;
			try {
				block = await provider();
			} catch (error) {
				this.context.logger.warn('[Collector] Continuous source error, retrying:', describeError(error));
				await this.context.clock.sleep(this.config.continuousRetryDelayMs);
				continue;
			}

			if (!this.isCurrent(generation)) break;
			for (const bit of unpackBytes(block, order)) this.append(bit);
			await this.context.clock.sleep(this.config.continuousPollMs);
		}
	}

	private drawBit(): Bit {
		if (this.generator?.isSeeded()) return this.generator.getBit();
		return this.fallback.randomBit();
	}

	private append(bit: Bit): void {
		if (this.currentMode === 'baseline') {
			this.baseline.push(bit);
		} else {
			this.experiment.push(bit);
		}
	}
}
