/**
 * Entropy / HRV Experiment Core
 *
 * Exports all public APIs for:
 * - Entropy sources (SDR, online quantum API, secure fallback) and their chain
 * - HMAC-DRBG bit generation
 * - Bit collection, markers and baseline comparison
 * - BLE heart-rate monitoring with RMSSD coherence
 * - Correlation recording and session orchestration
 *
 * @example
 * ```typescript
 * import { SessionCoordinator, parseEngineConfig } from 'entropy-hrv-core';
 *
 * const session = new SessionCoordinator({ transport }, parseEngineConfig(json));
 * const { source } = await session.seedGenerator();
 * session.startSession('experiment');
 * console.log(session.poll().stats);
 * ```
 */

// ============================================================================
// TYPES, CONTEXT & ERRORS
// ============================================================================
export * from './types/session.types';

export {
	createEngineContext,
	settlesWithin,
	silentLogger,
	systemClock,
	type Clock,
	type EngineContext,
	type Logger,
} from './context';

export {
	EngineError,
	SourceUnavailableError,
	MalformedResponseError,
	DeviceConnectFailedError,
	ParseError,
	ConfigurationError,
	isEntropyFailure,
	describeError,
	type EngineErrorCode,
	type EntropyFailure,
	type EntropySourceId,
} from './errors';

export { ENGINE_CONSTANTS } from './engineConstants';

export {
	EngineConfigSchema,
	parseEngineConfig,
	loadEngineConfigFile,
	type EngineConfig,
} from './config';

// ============================================================================
// ENTROPY
// ============================================================================
export * from './sources';

export {
	extractIqBits,
	packBits,
	quantizeInt8,
	unpackBytes,
	type IqSamples,
} from './algorithms/entropy/bitPacking';

export { DeterministicBitGenerator } from './generators/DeterministicBitGenerator';

// ============================================================================
// STATISTICS
// ============================================================================
export {
	FAIR_COIN_MEAN,
	bitMean,
	effectPercent,
	fairCoinZScore,
} from './algorithms/statistics/bitStatistics';

// ============================================================================
// BIOMETRICS
// ============================================================================
export {
	parseHeartRateMeasurement,
	rrUnitsToMs,
	HEART_RATE_FLAGS,
	type HeartRateMeasurement,
	type SensorContact,
} from './algorithms/biometrics/heartRateMeasurement';

export {
	computeCoherence,
	coherenceFromRmssd,
	rmssd,
	type CoherenceOptions,
} from './algorithms/biometrics/rmssdCoherence';

export * from './devices';

// ============================================================================
// PROCESSORS
// ============================================================================
export * from './processors';

// ============================================================================
// UTILITIES
// ============================================================================
export { RingBuffer } from './utils/RingBuffer';
export { Mutex } from './utils/Mutex';
