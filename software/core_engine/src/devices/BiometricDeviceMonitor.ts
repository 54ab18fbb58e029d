/**
 * Multi-device BLE heart-rate monitor.
 *
 * One task per device address runs the connection state machine:
 *
 *   disconnected → connecting → connected → (disconnected | failed)
 *
 * Failed or dropped connections are retried with exponential delay; flaky
 * chest straps get more attempts and an adapter reset between them. When the
 * attempts run out the device emits one synthetic zero-coherence sample and
 * leaves the active set. Devices never affect each other.
 *
 * Every notification is parsed into an HrvSample carrying the device's RMSSD
 * coherence over its last ~2 minutes of RR intervals, and queued for the UI.
 *
 * @example
 * ```typescript
 * const monitor = new BiometricDeviceMonitor(transport);
 * const found = await monitor.scan();
 * monitor.connect(found.map((d) => d.address));
 * setInterval(() => render(monitor.getRecentSamples()), 100);
 * ```
 */

import { parseHeartRateMeasurement, type HeartRateMeasurement } from '../algorithms/biometrics/heartRateMeasurement';
import { computeCoherence } from '../algorithms/biometrics/rmssdCoherence';
import { createEngineContext, settlesWithin, type EngineContext } from '../context';
import { ENGINE_CONSTANTS } from '../engineConstants';
import { DeviceConnectFailedError, ParseError, describeError } from '../errors';
import type {
	DeviceConnectionSnapshot,
	DeviceErrorSample,
	DeviceStatus,
	DiscoveredDevice,
	HrvMeasurement,
	HrvSample,
} from '../types/session.types';
import { RingBuffer } from '../utils/RingBuffer';
import {
	HEART_RATE_MEASUREMENT_UUID,
	HEART_RATE_SERVICE_UUID,
	type BleConnection,
	type BleTransport,
	type NotificationSubscription,
} from './bleTransport';
import { FLAKY_DEVICE_PATTERNS, HEART_RATE_DEVICE_PATTERNS, matchesAnyPattern } from './deviceCatalog';

export type MonitorConfig = {
	/** Connection attempts per device (default: 3) */
	maxRetries: number;
	/** Attempts for devices matching flakyDevicePatterns (default: 6) */
	flakyMaxRetries: number;
	/** First retry delay, doubled per attempt (default: 2000ms) */
	retryBaseDelayMs: number;
	/** Retry delay cap (default: 15000ms) */
	retryMaxDelayMs: number;
	connectTimeoutMs: number;
	/** Liveness / stop-flag poll interval while connected (default: 1000ms) */
	livenessPollMs: number;
	/** Bounded join on disconnect() (default: 2000ms) */
	stopTimeoutMs: number;
	scanTimeoutMs: number;
	/** RR intervals kept per device (default: 120) */
	rrBufferSize: number;
	/** Samples queued for the UI before the oldest is dropped (default: 1000) */
	sampleQueueCapacity: number;
	minRrForCoherence: number;
	coherenceNormalizationMs: number;
	devicePatterns: readonly string[];
	flakyDevicePatterns: readonly string[];
};

export type MonitorEvent =
	| { type: 'status'; address: string; status: DeviceStatus; attempt: number }
	| { type: 'sample'; sample: HrvSample }
	| { type: 'parse-error'; address: string; reason: string };

export type MonitorEventHandler = (event: MonitorEvent) => void;

type DeviceTask = {
	address: string;
	name: string | null;
	status: DeviceStatus;
	attempt: number;
	maxAttempts: number;
	flaky: boolean;
	rrBuffer: RingBuffer<number>;
	lastCoherence: number;
	parseErrors: number;
	stopRequested: boolean;
	/** connect() arrived while the task was stopping; start a fresh one once it ends */
	restartRequested: boolean;
	task: Promise<void> | null;
};

type SessionEnd = 'stopped' | 'dropped';

export class BiometricDeviceMonitor {
	private readonly config: MonitorConfig;
	private readonly devices = new Map<string, DeviceTask>();
	private readonly knownNames = new Map<string, string>();
	private readonly queue: RingBuffer<HrvSample>;
	private readonly listeners = new Set<MonitorEventHandler>();

	constructor(
		private readonly transport: BleTransport,
		config: Partial<MonitorConfig> = {},
		private readonly context: EngineContext = createEngineContext(),
	) {
		const { MONITOR, COHERENCE } = ENGINE_CONSTANTS;
		this.config = {
			maxRetries: config.maxRetries ?? MONITOR.MAX_RETRIES,
			flakyMaxRetries: config.flakyMaxRetries ?? MONITOR.FLAKY_MAX_RETRIES,
			retryBaseDelayMs: config.retryBaseDelayMs ?? MONITOR.RETRY_BASE_DELAY_MS,
			retryMaxDelayMs: config.retryMaxDelayMs ?? MONITOR.RETRY_MAX_DELAY_MS,
			connectTimeoutMs: config.connectTimeoutMs ?? MONITOR.CONNECT_TIMEOUT_MS,
			livenessPollMs: config.livenessPollMs ?? MONITOR.LIVENESS_POLL_MS,
			stopTimeoutMs: config.stopTimeoutMs ?? MONITOR.STOP_TIMEOUT_MS,
			scanTimeoutMs: config.scanTimeoutMs ?? MONITOR.SCAN_TIMEOUT_MS,
			rrBufferSize: config.rrBufferSize ?? MONITOR.RR_BUFFER_SIZE,
			sampleQueueCapacity: config.sampleQueueCapacity ?? MONITOR.SAMPLE_QUEUE_CAPACITY,
			minRrForCoherence: config.minRrForCoherence ?? COHERENCE.MIN_RR_SAMPLES,
			coherenceNormalizationMs: config.coherenceNormalizationMs ?? COHERENCE.NORMALIZATION_MS,
			devicePatterns: config.devicePatterns ?? HEART_RATE_DEVICE_PATTERNS,
			flakyDevicePatterns: config.flakyDevicePatterns ?? FLAKY_DEVICE_PATTERNS,
		};
		this.queue = new RingBuffer<HrvSample>(this.config.sampleQueueCapacity);
	}

	// ==========================================================================
	// DISCOVERY & CONNECTION
	// ==========================================================================

	/**
	 * Scan for heart-rate devices, strongest signal first.
	 */
	async scan(timeoutMs: number = this.config.scanTimeoutMs): Promise<DiscoveredDevice[]> {
		this.context.logger.info(`[BLE] Scanning for ${timeoutMs}ms...`);
		const peripherals = await this.transport.scan(timeoutMs);

		const found = new Map<string, DiscoveredDevice>();
		for (const peripheral of peripherals) {
			if (!peripheral.name || !matchesAnyPattern(peripheral.name, this.config.devicePatterns)) continue;
			if (found.has(peripheral.address)) continue;
			found.set(peripheral.address, {
				name: peripheral.name,
				address: peripheral.address,
				signalStrength: peripheral.rssi ?? -100,
			});
			this.knownNames.set(peripheral.address, peripheral.name);
		}

		const devices = [...found.values()].sort((a, b) => b.signalStrength - a.signalStrength);
		this.context.logger.info(`[BLE] Scan complete. Found ${devices.length} heart-rate device(s).`);
		return devices;
	}

	/**
	 * Start one monitoring task per address not already active. An address
	 * whose task is still stopping is restarted as soon as that task ends.
	 */
	connect(addresses: readonly string[]): void {
		for (const address of addresses) {
			const existing = this.devices.get(address);
			if (existing) {
				if (existing.stopRequested) existing.restartRequested = true;
				continue;
			}

			const name = this.knownNames.get(address) ?? null;
			const flaky = matchesAnyPattern(name, this.config.flakyDevicePatterns);
			const device: DeviceTask = {
				address,
				name,
				status: 'disconnected',
				attempt: 0,
				maxAttempts: Math.max(1, flaky ? this.config.flakyMaxRetries : this.config.maxRetries),
				flaky,
				rrBuffer: new RingBuffer<number>(this.config.rrBufferSize),
				lastCoherence: 0,
				parseErrors: 0,
				stopRequested: false,
				restartRequested: false,
				task: null,
			};
			this.devices.set(address, device);
			device.task = this.runDevice(device).catch((error: unknown) => {
				this.context.logger.error(`[BLE] Monitor task for ${address} crashed:`, error);
				this.fail(device, describeError(error));
			});
		}
	}

	/**
	 * Ask device tasks to stop (observed at the next liveness poll) and wait,
	 * bounded, for them to finish. Without an address, stops every device.
	 *
	 * @returns true if every task finished within `stopTimeoutMs`
	 */
	async disconnect(address?: string): Promise<boolean> {
		const targets = address
			? [this.devices.get(address)].filter((d): d is DeviceTask => d !== undefined)
			: [...this.devices.values()];

		const tasks: Promise<void>[] = [];
		for (const device of targets) {
			device.stopRequested = true;
			device.restartRequested = false;
			if (device.task) tasks.push(device.task);
		}
		if (tasks.length === 0) return true;

		const joined = await settlesWithin(Promise.all(tasks), this.config.stopTimeoutMs);
		if (!joined) {
			this.context.logger.warn(`[BLE] ${tasks.length} device task(s) still finishing after ${this.config.stopTimeoutMs}ms`);
		}
		return joined;
	}

	// ==========================================================================
	// OUTPUT
	// ==========================================================================

	/** Drain queued measurements (device-error samples are dropped). */
	getRecentSamples(): HrvMeasurement[] {
		return this.drainSamples().filter((s): s is HrvMeasurement => s.kind === 'measurement');
	}

	/** Drain everything queued, including device-error samples. */
	drainSamples(): HrvSample[] {
		return this.queue.drain();
	}

	onEvent(handler: MonitorEventHandler): () => void {
		this.listeners.add(handler);
		return () => {
			this.listeners.delete(handler);
		};
	}

	onSample(listener: (sample: HrvSample) => void): () => void {
		return this.onEvent((event) => {
			if (event.type === 'sample') listener(event.sample);
		});
	}

	getActiveDevices(): string[] {
		return [...this.devices.keys()];
	}

	getDeviceState(address: string): DeviceConnectionSnapshot | undefined {
		const device = this.devices.get(address);
		if (!device) return undefined;
		return {
			address: device.address,
			name: device.name,
			status: device.status,
			attempt: device.attempt,
			maxAttempts: device.maxAttempts,
			rrBuffered: device.rrBuffer.size,
			lastCoherence: device.lastCoherence,
			parseErrors: device.parseErrors,
		};
	}

	// ==========================================================================
	// DEVICE TASK
	// ==========================================================================

	private async runDevice(device: DeviceTask): Promise<void> {
		while (!device.stopRequested) {
			device.attempt++;
			this.setStatus(device, 'connecting');
			this.context.logger.info(`[BLE] Connecting to ${device.address} (attempt ${device.attempt}/${device.maxAttempts})...`);

			let cause: unknown;
			try {
				const end = await this.runConnection(device);
				if (end === 'stopped') break;
				cause = new Error('Link dropped');
				this.context.logger.warn(`[BLE] ${device.address} disconnected unexpectedly`);
			} catch (error) {
				cause = error;
				this.context.logger.warn(`[BLE] ${device.address} connection failed:`, describeError(error));
			}

			if (device.stopRequested) break;

			if (device.attempt >= device.maxAttempts) {
				const failure = new DeviceConnectFailedError(device.address, device.attempt, { cause });
				this.context.logger.error(`[BLE] ${failure.message}`);
				this.fail(device, failure.message);
				return;
			}

			if (device.flaky && this.transport.resetAdapter) {
				try {
					await this.transport.resetAdapter();
				} catch (error) {
					this.context.logger.warn('[BLE] Adapter reset failed:', describeError(error));
				}
			}
			await this.context.clock.sleep(this.retryDelay(device.attempt));
		}

		this.setStatus(device, 'disconnected');
		this.release(device);
		this.context.logger.info(`[BLE] ${device.address} disconnected`);
		if (device.restartRequested) {
			this.context.logger.info(`[BLE] Restarting ${device.address}`);
			this.connect([device.address]);
		}
	}

	private release(device: DeviceTask): void {
		if (this.devices.get(device.address) === device) this.devices.delete(device.address);
	}

	/**
	 * One connected session: subscribe, then poll liveness until the link drops
	 * or a stop is requested.
	 */
	private async runConnection(device: DeviceTask): Promise<SessionEnd> {
		const connection: BleConnection = await this.transport.connect(device.address, {
			timeoutMs: this.config.connectTimeoutMs,
		});

		let subscription: NotificationSubscription | null = null;
		try {
			subscription = await connection.subscribe(
				HEART_RATE_SERVICE_UUID,
				HEART_RATE_MEASUREMENT_UUID,
				(payload) => this.handleNotification(device, payload),
			);

			device.attempt = 0;
			this.setStatus(device, 'connected');
			this.context.logger.info(`[BLE] Connected to ${device.address}`);

			while (!device.stopRequested && connection.isConnected()) {
				await this.context.clock.sleep(this.config.livenessPollMs);
			}
			return device.stopRequested ? 'stopped' : 'dropped';
		} finally {
			subscription?.remove();
			if (connection.isConnected()) {
				await connection.disconnect().catch((error: unknown) => {
					this.context.logger.warn('[BLE] Disconnect warning:', describeError(error));
				});
			}
		}
	}

	private handleNotification(device: DeviceTask, payload: Uint8Array): void {
		let parsed: HeartRateMeasurement;
		try {
			parsed = parseHeartRateMeasurement(payload);
		} catch (error) {
			if (!(error instanceof ParseError)) throw error;
			device.parseErrors++;
			this.context.logger.warn(`[BLE] ${device.address} parse error:`, error.message);
			this.emit({ type: 'parse-error', address: device.address, reason: error.message });
			return;
		}

		for (const rr of parsed.rrIntervalsMs) device.rrBuffer.push(rr);
		device.lastCoherence = computeCoherence(device.rrBuffer.toArray(), {
			minSamples: this.config.minRrForCoherence,
			normalizationMs: this.config.coherenceNormalizationMs,
		});

		const sample: HrvMeasurement = Object.freeze({
			kind: 'measurement' as const,
			timestamp: this.context.clock.now(),
			deviceId: device.address,
			heartRateBpm: parsed.heartRateBpm,
			rrIntervalsMs: Object.freeze(parsed.rrIntervalsMs),
			coherence: device.lastCoherence,
		});
		this.enqueue(sample);
	}

	private fail(device: DeviceTask, reason: string): void {
		if (this.devices.get(device.address) !== device) return;

		this.setStatus(device, 'failed');
		this.release(device);

		const sample: DeviceErrorSample = Object.freeze({
			kind: 'device-error' as const,
			timestamp: this.context.clock.now(),
			deviceId: device.address,
			heartRateBpm: 0,
			rrIntervalsMs: Object.freeze([]),
			coherence: 0,
			error: reason,
		});
		this.enqueue(sample);
	}

	private enqueue(sample: HrvSample): void {
		const dropped = this.queue.push(sample);
		if (dropped) {
			this.context.logger.debug(`[BLE] Sample queue full, dropped sample from ${dropped.deviceId}`);
		}
		this.emit({ type: 'sample', sample });
	}

	private setStatus(device: DeviceTask, status: DeviceStatus): void {
		device.status = status;
		this.emit({ type: 'status', address: device.address, status, attempt: device.attempt });
	}

	private retryDelay(attempt: number): number {
		return Math.min(this.config.retryBaseDelayMs * 2 ** Math.max(0, attempt - 1), this.config.retryMaxDelayMs);
	}

	private emit(event: MonitorEvent): void {
		this.listeners.forEach((handler) => {
			try {
				handler(event);
			} catch (e) {
				this.context.logger.error('[BLE] Event handler error:', e);
			}
		});
	}
}
