// RMSSD-based coherence: a [0,1] regularity score for short RR windows.
// Lower beat-to-beat volatility -> value closer to 1. Not a clinical metric.

import { mean, sqrt } from 'mathjs';
import { ENGINE_CONSTANTS } from '../../engineConstants';

export type CoherenceOptions = {
	/** Below this many RR values, coherence is 0 (default: 10) */
	minSamples: number;
	/** k in 1 / (1 + RMSSD / k), ms (default: 50) */
	normalizationMs: number;
};

const clamp01 = (v: number) => Math.min(1, Math.max(0, v));

/**
 * Root mean square of successive RR differences, or null with fewer than 2 values.
 */
export function rmssd(rrMs: readonly number[]): number | null {
	if (rrMs.length < 2) return null;
	const squaredDiffs: number[] = [];
	for (let i = 1; i < rrMs.length; i++) {
		const diff = rrMs[i] - rrMs[i - 1];
		squaredDiffs.push(diff * diff);
	}
	const root = sqrt(mean(...squaredDiffs));
	return typeof root === 'number' ? root : null;
}

export function coherenceFromRmssd(rmssdMs: number, normalizationMs: number = ENGINE_CONSTANTS.COHERENCE.NORMALIZATION_MS): number {
	return clamp01(1 / (1 + rmssdMs / normalizationMs));
}

export function computeCoherence(rrMs: readonly number[], options: Partial<CoherenceOptions> = {}): number {
	const minSamples = Math.max(2, options.minSamples ?? ENGINE_CONSTANTS.COHERENCE.MIN_RR_SAMPLES);
	if (rrMs.length < minSamples) return 0;

	const value = rmssd(rrMs);
	if (value === null) return 0;
	return coherenceFromRmssd(value, options.normalizationMs);
}
