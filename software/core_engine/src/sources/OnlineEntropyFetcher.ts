/**
 * Online quantum-randomness fetcher.
 *
 * Requests `?length=<n>&type=uint8` in chunks of at most `maxChunkBytes`,
 * pausing between chunks to respect the API's rate limit. Any failure aborts
 * the whole fetch: partial output is never returned.
 *
 * @example
 * ```typescript
 * const online = new OnlineEntropyFetcher({ timeoutMs: 3000 });
 * const result = await online.fetch(64);
 * if (result.ok) useBytes(result.bytes);
 * ```
 */

import { z } from 'zod';
import { createEngineContext, type EngineContext } from '../context';
import { ENGINE_CONSTANTS } from '../engineConstants';
import { MalformedResponseError, SourceUnavailableError, describeError, isEntropyFailure } from '../errors';
import type { EntropyResult, EntropySource } from './types';

export type OnlineFetcherConfig = {
	/** JSON endpoint (default: ANU QRNG) */
	endpoint: string;
	/** Largest `length` requested per call (default: 1024) */
	maxChunkBytes: number;
	/** Per-request timeout (default: 5000ms) */
	timeoutMs: number;
	/** Pause between chunks (default: 50ms) */
	chunkDelayMs: number;
};

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

const QrngResponseSchema = z.object({
	data: z.array(z.number().int().min(0).max(255)).nonempty(),
	success: z.boolean().optional(),
});

export class OnlineEntropyFetcher implements EntropySource {
	readonly id = 'online' as const;
	private readonly config: OnlineFetcherConfig;
	private readonly fetchImpl: FetchFn;

	constructor(
		config: Partial<OnlineFetcherConfig> = {},
		private readonly context: EngineContext = createEngineContext(),
		fetchImpl?: FetchFn,
	) {
		const { ONLINE } = ENGINE_CONSTANTS;
		this.config = {
			endpoint: config.endpoint ?? ONLINE.ENDPOINT,
			maxChunkBytes: Math.min(config.maxChunkBytes ?? ONLINE.MAX_CHUNK_BYTES, ONLINE.MAX_CHUNK_BYTES),
			timeoutMs: config.timeoutMs ?? ONLINE.TIMEOUT_MS,
			chunkDelayMs: config.chunkDelayMs ?? ONLINE.CHUNK_DELAY_MS,
		};
		this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
	}

	isAvailable(): boolean {
		return true;
	}

	async fetch(byteCount: number): Promise<EntropyResult> {
		try {
			return { ok: true, source: this.id, bytes: await this.fetchBytes(byteCount) };
		} catch (error) {
			if (isEntropyFailure(error)) {
				this.context.logger.warn('[Entropy] Online source failed:', error.message);
				return { ok: false, source: this.id, error };
			}
			throw error;
		}
	}

	/**
	 * Fetch exactly `byteCount` bytes or reject with SourceUnavailableError /
	 * MalformedResponseError.
	 */
	async fetchBytes(byteCount: number): Promise<Uint8Array> {
		const out = new Uint8Array(Math.max(0, byteCount));
		let filled = 0;

		while (filled < out.length) {
			const ask = Math.min(out.length - filled, this.config.maxChunkBytes);
			const chunk = await this.fetchChunk(ask);
			const take = Math.min(chunk.length, out.length - filled);
			out.set(chunk.subarray(0, take), filled);
			filled += take;

			if (filled < out.length) {
				await this.context.clock.sleep(this.config.chunkDelayMs);
			}
		}

		return out;
	}

	private async fetchChunk(length: number): Promise<Uint8Array> {
		const params = new URLSearchParams({ length: String(length), type: 'uint8' });
		const url = `${this.config.endpoint}?${params.toString()}`;

		const controller = new AbortController();
		const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

		let body: unknown;
		try {
			const response = await this.fetchImpl(url, { signal: controller.signal });
			if (!response.ok) {
				throw new SourceUnavailableError(this.id, `HTTP ${response.status}`);
			}
			try {
				body = await response.json();
			} catch (error) {
				if (controller.signal.aborted) throw error;
				throw new MalformedResponseError(this.id, 'Response body is not JSON', { cause: error });
			}
		} catch (error) {
			if (isEntropyFailure(error)) {
				throw error;
			}
			if (controller.signal.aborted) {
				throw new SourceUnavailableError(this.id, `Request timed out after ${this.config.timeoutMs}ms`, {
					cause: error,
				});
			}
			throw new SourceUnavailableError(this.id, describeError(error), { cause: error });
		} finally {
			clearTimeout(timeout);
		}

		const parsed = QrngResponseSchema.safeParse(body);
		if (!parsed.success) {
			const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
			throw new MalformedResponseError(this.id, `Unexpected response shape (${issues.join('; ')})`);
		}

		return Uint8Array.from(parsed.data.data);
	}
}
