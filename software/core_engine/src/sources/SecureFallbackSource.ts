/**
 * Platform CSPRNG (node:crypto). Always available, never fails; the trust
 * floor of the entropy chain.
 */

import { randomBytes } from 'node:crypto';
import type { Bit } from '../types/session.types';
import type { EntropyResult, EntropySource } from './types';

export class SecureFallbackSource implements EntropySource {
	readonly id = 'secure-fallback' as const;

	isAvailable(): boolean {
		return true;
	}

	async fetch(byteCount: number): Promise<EntropyResult> {
		return { ok: true, source: this.id, bytes: this.bytes(byteCount) };
	}

	/** Synchronous draw for the collector's per-bit loop. */
	bytes(byteCount: number): Uint8Array {
		return new Uint8Array(randomBytes(Math.max(0, byteCount)));
	}

	randomBit(): Bit {
		return (randomBytes(1)[0] & 1) === 1 ? 1 : 0;
	}
}
