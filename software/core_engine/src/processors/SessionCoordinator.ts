/**
 * Session coordinator.
 *
 * Wires the entropy chain, DRBG, bit collector, heart-rate monitor, recorder
 * and group metadata around one EngineContext. The UI drives it with a
 * periodic poll():
 *
 *   monitor samples → recorder (bit-index stamped)
 *                   → average coherence → auto "high_coherence" marker
 *   collector       → stats + baseline comparison
 *
 * @example
 * ```typescript
 * const session = new SessionCoordinator({ transport, radio: openRadio }, parseEngineConfig(json));
 * await session.seedGenerator();
 * session.startSession('experiment');
 * setInterval(() => render(session.poll()), 100);
 * ```
 */

import type { EngineConfig } from '../config';
import { createEngineContext, type EngineContext } from '../context';
import type { BleTransport } from '../devices/bleTransport';
import { BiometricDeviceMonitor } from '../devices/BiometricDeviceMonitor';
import { ENGINE_CONSTANTS } from '../engineConstants';
import type { EntropySourceId } from '../errors';
import { DeterministicBitGenerator } from '../generators/DeterministicBitGenerator';
import { EntropySourceChain, type SourceStats } from '../sources/EntropySourceChain';
import { OnlineEntropyFetcher, type FetchFn } from '../sources/OnlineEntropyFetcher';
import { SecureFallbackSource } from '../sources/SecureFallbackSource';
import { SpectralEntropyExtractor, type RadioFactory } from '../sources/SpectralEntropyExtractor';
import type {
	BaselineComparison,
	Bit,
	CollectorMode,
	CorrelatedSample,
	HrvMeasurement,
	HrvSample,
	Marker,
	SessionStats,
} from '../types/session.types';
import { BitStreamCollector } from './BitStreamCollector';
import { CorrelationRecorder } from './CorrelationRecorder';
import { GroupSession, type GroupSessionInfo } from './GroupSession';

export type SessionConfig = {
	/** Average coherence above which a high_coherence marker is added (default: 0.8) */
	autoMarkThreshold: number;
	/** Minimum gap between automatic markers (default: 1000ms) */
	autoMarkCooldownMs: number;
	/** Experiment bits included in exportSession() (default: 10000) */
	exportBitLimit: number;
	/** DRBG seed length (default: 32) */
	seedBytes: number;
	/** Bytes per spectral block in continuous mode (default: 256) */
	spectralBlockBytes: number;
};

export type SessionHardware = {
	/** Opens the SDR; omit when no radio is attached */
	radio?: RadioFactory;
	/** BLE adapter; omit to run without heart-rate devices */
	transport?: BleTransport;
	/** Set false to skip the online quantum source */
	online?: boolean;
	fetchImpl?: FetchFn;
};

export type PollResult = {
	stats: SessionStats;
	comparison: BaselineComparison | null;
	samples: HrvSample[];
	/** Mean coherence of the measurements drained this poll, null if none */
	averageCoherence: number | null;
	deviceCount: number;
	autoMarker: Marker | null;
};

export type SeedReport = {
	source: EntropySourceId;
	byteCount: number;
	seedGeneration: number;
};

export type SessionExport = {
	session: {
		exportedAt: number;
		mode: CollectorMode;
		running: boolean;
		generatorSeeded: boolean;
		seedGeneration: number;
		group: GroupSessionInfo;
	};
	stats: SessionStats;
	comparison: BaselineComparison | null;
	markers: readonly Marker[];
	experimentBits: Bit[];
	experimentBitCount: number;
	baselineBitCount: number;
	hrvSnapshots: CorrelatedSample[];
	sourceStats: SourceStats;
};

export class SessionCoordinator {
	readonly chain: EntropySourceChain;
	readonly generator = new DeterministicBitGenerator();
	readonly collector: BitStreamCollector;
	readonly monitor: BiometricDeviceMonitor | null;
	readonly recorder: CorrelationRecorder;
	readonly group = new GroupSession();
	readonly spectral: SpectralEntropyExtractor | null;

	private readonly config: SessionConfig;
	private readonly latestByDevice = new Map<string, HrvMeasurement>();
	private lastAutoMarkAt: number | null = null;

	constructor(
		hardware: SessionHardware = {},
		config: EngineConfig = {},
		private readonly context: EngineContext = createEngineContext(),
	) {
		const { SESSION } = ENGINE_CONSTANTS;
		this.config = {
			autoMarkThreshold: config.session?.autoMarkThreshold ?? SESSION.AUTO_MARK_THRESHOLD,
			autoMarkCooldownMs: config.session?.autoMarkCooldownMs ?? SESSION.AUTO_MARK_COOLDOWN_MS,
			exportBitLimit: config.session?.exportBitLimit ?? SESSION.EXPORT_BIT_LIMIT,
			seedBytes: config.session?.seedBytes ?? SESSION.DRBG_SEED_BYTES,
			spectralBlockBytes: config.session?.spectralBlockBytes ?? SESSION.SPECTRAL_BLOCK_BYTES,
		};

		const fallback = new SecureFallbackSource();
		this.spectral = hardware.radio ? new SpectralEntropyExtractor(hardware.radio, config.spectral, context) : null;
		const online = hardware.online === false ? null : new OnlineEntropyFetcher(config.online, context, hardware.fetchImpl);

		this.chain = new EntropySourceChain({ spectral: this.spectral, online, fallback }, context);
		this.collector = new BitStreamCollector(config.collector, { generator: this.generator, fallback }, context);
		this.monitor = hardware.transport ? new BiometricDeviceMonitor(hardware.transport, config.monitor, context) : null;
		this.recorder = new CorrelationRecorder(this.collector, config.recorder, context);
	}

	// ==========================================================================
	// SESSION CONTROL
	// ==========================================================================

	/**
	 * Start collecting into `mode`. A running collector switches buffers
	 * without restarting.
	 */
	startSession(mode: CollectorMode = 'experiment'): void {
		if (this.collector.isRunning()) {
			this.collector.setMode(mode);
		} else {
			this.collector.start(mode);
		}
		this.lastAutoMarkAt = null;
		this.context.logger.info(`[Session] ${mode} collection started`);
	}

	async stopSession(): Promise<boolean> {
		const joined = await this.collector.stop();
		this.context.logger.info('[Session] Collection stopped');
		return joined;
	}

	/** Stop collection and every device task. */
	async shutdown(): Promise<boolean> {
		const [collectorJoined, monitorJoined] = await Promise.all([
			this.collector.stop(),
			this.monitor ? this.monitor.disconnect() : Promise.resolve(true),
		]);
		return collectorJoined && monitorJoined;
	}

	isExperimentRunning(): boolean {
		return this.collector.isRunning() && this.collector.mode === 'experiment';
	}

	// ==========================================================================
	// UPDATE LOOP
	// ==========================================================================

	poll(): PollResult {
		const samples = this.monitor ? this.monitor.drainSamples() : [];
		const measurements: HrvMeasurement[] = [];

		for (const sample of samples) {
			this.recorder.record(sample);
			if (sample.kind === 'measurement') {
				measurements.push(sample);
				this.latestByDevice.set(sample.deviceId, sample);
			} else {
				this.latestByDevice.delete(sample.deviceId);
			}
		}

		const averageCoherence = measurements.length ? meanCoherence(measurements) : null;
		let autoMarker: Marker | null = null;
		if (averageCoherence !== null && averageCoherence > this.config.autoMarkThreshold && this.isExperimentRunning()) {
			autoMarker = this.autoMark(averageCoherence, measurements);
		}

		return {
			stats: this.collector.getStats(),
			comparison: this.collector.getBaselineComparison(),
			samples,
			averageCoherence,
			deviceCount: this.monitor ? this.monitor.getActiveDevices().length : 0,
			autoMarker,
		};
	}

	private autoMark(averageCoherence: number, measurements: HrvMeasurement[]): Marker | null {
		const now = this.context.clock.now();
		if (this.lastAutoMarkAt !== null && now - this.lastAutoMarkAt < this.config.autoMarkCooldownMs) {
			return null;
		}
		this.lastAutoMarkAt = now;
		return this.collector.markEvent(
			'high_coherence',
			{ meanCoherence: averageCoherence, samples: measurements },
			{ type: 'auto-threshold', threshold: this.config.autoMarkThreshold, observedCoherence: averageCoherence },
		);
	}

	// ==========================================================================
	// ACTIONS
	// ==========================================================================

	/**
	 * Mark a user intention, with the latest sample of each device.
	 *
	 * @returns null unless an experiment is running
	 */
	markIntention(note?: string): Marker | null {
		if (!this.isExperimentRunning()) return null;

		const latest = [...this.latestByDevice.values()];
		const text = note?.trim();
		return this.collector.markEvent(
			'intention',
			{ meanCoherence: latest.length ? meanCoherence(latest) : 0, samples: latest },
			text ? { type: 'note', text } : undefined,
		);
	}

	/**
	 * Seed the DRBG from the entropy chain and report which source served it.
	 */
	async seedGenerator(byteCount: number = this.config.seedBytes): Promise<SeedReport> {
		let source: EntropySourceId = 'secure-fallback';
		const material = await this.generator.seedFrom(
			{
				fetch: async (n) => {
					const result = await this.chain.fetchWithProvenance(n);
					source = result.source;
					return result.bytes;
				},
			},
			byteCount,
		);
		this.context.logger.info(`[Session] Generator seeded with ${material.length} bytes from ${source}`);
		return { source, byteCount: material.length, seedGeneration: this.generator.seedGeneration };
	}

	/**
	 * Feed the collector directly from whitened SDR blocks.
	 *
	 * @returns false without a radio or while another producer runs
	 */
	startSpectralStream(blockSize: number = this.config.spectralBlockBytes, mode: CollectorMode = 'experiment'): boolean {
		const spectral = this.spectral;
		if (!spectral) {
			this.context.logger.warn('[Session] No radio configured for spectral streaming');
			return false;
		}
		return this.collector.startContinuousSource(() => spectral.whiten(blockSize), { mode });
	}

	exportSession(): SessionExport {
		const snapshot = this.collector.snapshot();
		return {
			session: {
				exportedAt: this.context.clock.now(),
				mode: snapshot.mode,
				running: snapshot.running,
				generatorSeeded: this.generator.isSeeded(),
				seedGeneration: this.generator.seedGeneration,
				group: this.group.toJSON(),
			},
			stats: this.collector.getStats(),
			comparison: this.collector.getBaselineComparison(),
			markers: snapshot.markers,
			experimentBits: this.collector.recentExperimentBits(this.config.exportBitLimit),
			experimentBitCount: snapshot.experimentBits.length,
			baselineBitCount: snapshot.baselineBits.length,
			hrvSnapshots: this.recorder.getSnapshots(),
			sourceStats: this.chain.getSourceStats(),
		};
	}
}

function meanCoherence(samples: readonly HrvMeasurement[]): number {
	let sum = 0;
	for (const sample of samples) sum += sample.coherence;
	return sum / samples.length;
}
