// Bit <-> byte packing and IQ least-significant-bit extraction.

import type { Bit, BitOrder } from '../../types/session.types';

export type IqSamples = {
	inPhase: ArrayLike<number>;    // normalized to [-1, 1]
	quadrature: ArrayLike<number>; // normalized to [-1, 1]
};

/** Quantize a normalized sample to a signed 8-bit integer. */
export function quantizeInt8(x: number): number {
	if (!Number.isFinite(x)) return 0;
	return Math.min(127, Math.max(-128, Math.round(x * 127)));
}

/**
 * Interleave the LSB of each quantized I and Q component: i0 q0 i1 q1 ...
 * Pairs beyond the shorter of the two arrays are ignored.
 */
export function extractIqBits(samples: IqSamples): Bit[] {
	const pairs = Math.min(samples.inPhase.length, samples.quadrature.length);
	const bits: Bit[] = [];
	for (let k = 0; k < pairs; k++) {
		// two's complement: (-3 & 1) === 1
		bits.push((quantizeInt8(samples.inPhase[k]) & 1) === 1 ? 1 : 0);
		bits.push((quantizeInt8(samples.quadrature[k]) & 1) === 1 ? 1 : 0);
	}
	return bits;
}

/** Pack bits into bytes, zero-padding the last byte. */
export function packBits(bits: readonly Bit[], order: BitOrder = 'msb-first'): Uint8Array {
	const out = new Uint8Array(Math.ceil(bits.length / 8));
	for (let i = 0; i < bits.length; i++) {
		if (bits[i] !== 1) continue;
		const shift = order === 'msb-first' ? 7 - (i % 8) : i % 8;
		out[i >> 3] |= 1 << shift;
	}
	return out;
}

export function unpackBytes(bytes: Uint8Array, order: BitOrder = 'msb-first'): Bit[] {
	const bits: Bit[] = [];
	for (const byte of bytes) {
		for (let i = 0; i < 8; i++) {
			const shift = order === 'msb-first' ? 7 - i : i;
			bits.push(((byte >> shift) & 1) === 1 ? 1 : 0);
		}
	}
	return bits;
}
