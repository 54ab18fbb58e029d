// Shared contracts for entropy sources.

import type { EntropyFailure, EntropySourceId } from '../errors';

export type EntropyResult =
	| { ok: true; source: EntropySourceId; bytes: Uint8Array }
	| { ok: false; source: EntropySourceId; error: EntropyFailure };

/**
 * An entropy source reports expected failures as values; it only throws for
 * programming errors.
 */
export interface EntropySource {
	readonly id: EntropySourceId;
	fetch(byteCount: number): Promise<EntropyResult>;
	isAvailable(): boolean;
}

/** Anything that can hand out bytes, e.g. the source chain. Used for DRBG seeding. */
export interface ByteProvider {
	fetch(byteCount: number): Promise<Uint8Array>;
}
