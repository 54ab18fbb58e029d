// Fair-coin statistics for bit streams: mean, z-score, baseline effect size.

import { sqrt } from 'mathjs';
import type { Bit } from '../../types/session.types';

export const FAIR_COIN_MEAN = 0.5;

export function bitMean(bits: readonly Bit[]): number {
	if (bits.length === 0) return FAIR_COIN_MEAN;
	let ones = 0;
	for (const bit of bits) ones += bit;
	return ones / bits.length;
}

/**
 * Standardized deviation of an observed mean from 0.5 over `n` fair-coin
 * trials: (mean - 0.5) / (0.5 / sqrt(n)).
 */
export function fairCoinZScore(mean: number, n: number): number {
	if (n <= 0) return 0;
	const root = sqrt(n);
	if (typeof root !== 'number') return 0;
	return (mean - FAIR_COIN_MEAN) / (FAIR_COIN_MEAN / root);
}

/** Experiment-vs-baseline deviation in percent of the fair-coin mean. */
export function effectPercent(experimentMean: number, baselineMean: number): number {
	return ((experimentMean - baselineMean) / FAIR_COIN_MEAN) * 100;
}
