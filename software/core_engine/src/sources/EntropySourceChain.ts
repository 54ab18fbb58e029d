/**
 * Fixed-priority entropy orchestration.
 *
 * Order: spectral radio (physical entropy) → online quantum API → secure
 * software RNG. The first source returning `ok` wins. Expected failures come
 * back as result values and fall through; anything thrown by a source is a
 * programming error and propagates.
 *
 * @example
 * ```typescript
 * const chain = new EntropySourceChain({
 *   spectral: new SpectralEntropyExtractor(openRadio),
 *   online: new OnlineEntropyFetcher(),
 * });
 * const seed = await chain.fetch(32); // always 32 bytes
 * ```
 */

import { createEngineContext, type EngineContext } from '../context';
import type { EntropySourceId } from '../errors';
import { SecureFallbackSource } from './SecureFallbackSource';
import type { ByteProvider, EntropySource } from './types';

export type EntropyChainSources = {
	spectral?: EntropySource | null;
	online?: EntropySource | null;
	fallback?: SecureFallbackSource;
};

export type ProvenancedBytes = {
	bytes: Uint8Array;
	source: EntropySourceId;
};

export type SourceStats = Record<EntropySourceId, { successes: number; failures: number }>;

export class EntropySourceChain implements ByteProvider {
	private readonly spectral: EntropySource | null;
	private readonly online: EntropySource | null;
	private readonly fallback: SecureFallbackSource;
	private readonly stats: SourceStats = {
		spectral: { successes: 0, failures: 0 },
		online: { successes: 0, failures: 0 },
		'secure-fallback': { successes: 0, failures: 0 },
	};

	constructor(
		sources: EntropyChainSources = {},
		private readonly context: EngineContext = createEngineContext(),
	) {
		this.spectral = sources.spectral ?? null;
		this.online = sources.online ?? null;
		this.fallback = sources.fallback ?? new SecureFallbackSource();
	}

	/** Exactly `byteCount` bytes from the highest-priority source that succeeds. */
	async fetch(byteCount: number): Promise<Uint8Array> {
		return (await this.fetchWithProvenance(byteCount)).bytes;
	}

	async fetchWithProvenance(byteCount: number): Promise<ProvenancedBytes> {
		if (!Number.isInteger(byteCount) || byteCount < 0) {
			throw new RangeError(`byteCount must be a non-negative integer, got ${byteCount}`);
		}
		if (byteCount === 0) {
			return { bytes: new Uint8Array(0), source: this.fallback.id };
		}

		for (const source of [this.spectral, this.online]) {
			if (!source || !source.isAvailable()) continue;

			const result = await source.fetch(byteCount);
			if (result.ok && result.bytes.length >= byteCount) {
				this.stats[source.id].successes++;
				return { bytes: result.bytes.slice(0, byteCount), source: source.id };
			}

			this.stats[source.id].failures++;
			const reason = result.ok
				? `short read (${result.bytes.length}/${byteCount})`
				: `${result.error.code}: ${result.error.message}`;
			this.context.logger.info(`[Entropy] ${source.id} fell through: ${reason}`);
		}

		this.stats[this.fallback.id].successes++;
		return { bytes: this.fallback.bytes(byteCount), source: this.fallback.id };
	}

	getSourceStats(): SourceStats {
		return {
			spectral: { ...this.stats.spectral },
			online: { ...this.stats.online },
			'secure-fallback': { ...this.stats['secure-fallback'] },
		};
	}
}
