/**
 * Core session types shared by the bit collector, HRV monitor and recorder.
 */

// ============================================================================
// BITS & MODES
// ============================================================================

export type Bit = 0 | 1;
export type CollectorMode = 'baseline' | 'experiment';
export type BitOrder = 'msb-first' | 'lsb-first';

// ============================================================================
// HRV SAMPLES
// ============================================================================

type HrvSampleFields = {
	timestamp: number;        // unix ms
	deviceId: string;         // device address
	heartRateBpm: number;
	rrIntervalsMs: readonly number[];
	coherence: number;        // 0-1
};

export type HrvMeasurement = HrvSampleFields & { kind: 'measurement' };

/** Synthetic zero-coherence sample emitted when a device exhausts its retries. */
export type DeviceErrorSample = HrvSampleFields & { kind: 'device-error'; error: string };

export type HrvSample = HrvMeasurement | DeviceErrorSample;

/** HRV sample tagged with the experiment bit position at which it was observed. */
export type CorrelatedSample = HrvSample & { bitIndex: number };

// ============================================================================
// MARKERS
// ============================================================================

export type MarkerKind = 'intention' | 'high_coherence' | 'note';

export type CoherenceSnapshot = {
	meanCoherence: number;
	samples: readonly HrvMeasurement[];
};

export type MarkerMeta =
	| { type: 'note'; text: string }
	| { type: 'auto-threshold'; threshold: number; observedCoherence: number };

export type Marker = {
	timestamp: number;
	bitIndex: number;
	eventKind: MarkerKind;
	coherence?: CoherenceSnapshot;
	meta?: MarkerMeta;
};

// ============================================================================
// STATISTICS
// ============================================================================

export type SessionStats = {
	mean: number;
	zScore: number;
	count: number;        // bits in the active buffer
	markerCount: number;
	mode: CollectorMode;
};

export type BaselineComparison = {
	baselineMean: number;
	experimentMean: number;
	effectPercent: number; // deviation from fair-coin mean, in percent
	baselineBits: number;
	experimentBits: number;
};

// ============================================================================
// DEVICES
// ============================================================================

export type DeviceStatus = 'connecting' | 'connected' | 'disconnected' | 'failed';

export type DiscoveredDevice = {
	name: string;
	address: string;
	signalStrength: number; // RSSI, dBm
};

export type DeviceConnectionSnapshot = {
	address: string;
	name: string | null;
	status: DeviceStatus;
	attempt: number;
	maxAttempts: number;
	rrBuffered: number;
	lastCoherence: number;
	parseErrors: number;
};
