/**
 * Correlation recorder.
 *
 * Stamps each HRV sample with the experiment-bit count at the moment it is
 * recorded, so physiology can be lined up against the bit stream afterwards.
 * Read-only with respect to the collector: recording never affects bit
 * generation, and stored entries are frozen.
 */

import { createEngineContext, type EngineContext } from '../context';
import { ENGINE_CONSTANTS } from '../engineConstants';
import type { CorrelatedSample, HrvSample } from '../types/session.types';
import { RingBuffer } from '../utils/RingBuffer';

export type RecorderConfig = {
	/** Snapshots kept before the oldest is evicted (default: 10000) */
	capacity: number;
};

/** Anything exposing the current experiment-bit count. */
export type BitIndexSource = {
	readonly experimentBitCount: number;
};

export type DeviceCorrelationSummary = {
	deviceId: string;
	count: number;
	errorCount: number;
	meanCoherence: number;
	meanHeartRate: number;
	firstBitIndex: number;
	lastBitIndex: number;
};

export class CorrelationRecorder {
	private readonly snapshots: RingBuffer<CorrelatedSample>;

	constructor(
		private readonly bitSource: BitIndexSource,
		config: Partial<RecorderConfig> = {},
		private readonly context: EngineContext = createEngineContext(),
	) {
		this.snapshots = new RingBuffer<CorrelatedSample>(config.capacity ?? ENGINE_CONSTANTS.RECORDER.SNAPSHOT_CAPACITY);
	}

	record(sample: HrvSample): CorrelatedSample {
		const entry: CorrelatedSample = Object.freeze({ ...sample, bitIndex: this.bitSource.experimentBitCount });
		const evicted = this.snapshots.push(entry);
		if (evicted && this.snapshots.size === this.snapshots.capacity) {
			this.context.logger.debug(`[Recorder] Buffer full, evicted snapshot at bit ${evicted.bitIndex}`);
		}
		return entry;
	}

	getSnapshots(): CorrelatedSample[] {
		return this.snapshots.toArray();
	}

	get size(): number {
		return this.snapshots.size;
	}

	clear(): void {
		this.snapshots.clear();
	}

	/**
	 * Per-device aggregates. Means cover measurement samples only; device-error
	 * samples are counted separately.
	 */
	summarizeByDevice(): DeviceCorrelationSummary[] {
		const acc = new Map<string, DeviceCorrelationSummary & { coherenceSum: number; heartRateSum: number }>();

		for (const entry of this.snapshots.toArray()) {
			let row = acc.get(entry.deviceId);
			if (!row) {
				row = {
					deviceId: entry.deviceId,
					count: 0,
					errorCount: 0,
					meanCoherence: 0,
					meanHeartRate: 0,
					firstBitIndex: entry.bitIndex,
					lastBitIndex: entry.bitIndex,
					coherenceSum: 0,
					heartRateSum: 0,
				};
				acc.set(entry.deviceId, row);
			}

			row.lastBitIndex = entry.bitIndex;
			if (entry.kind === 'device-error') {
				row.errorCount++;
				continue;
			}
			row.count++;
			row.coherenceSum += entry.coherence;
			row.heartRateSum += entry.heartRateBpm;
		}

		return [...acc.values()].map(({ coherenceSum, heartRateSum, ...row }) => ({
			...row,
			meanCoherence: row.count ? coherenceSum / row.count : 0,
			meanHeartRate: row.count ? heartRateSum / row.count : 0,
		}));
	}
}
