/**
 * HMAC-DRBG (SHA-256) for reproducible, auditable bit streams.
 *
 * Seeded once from physical entropy, it replays the identical sequence for the
 * same seed material. State is a single frozen {key, value} object swapped in
 * one assignment, so a draw always sees either the old or the new state.
 *
 * @example
 * ```typescript
 * const drbg = new DeterministicBitGenerator();
 * await drbg.seedFrom(chain, 32);
 * const bit = drbg.getBit();
 * ```
 */

import { createHmac } from 'node:crypto';
import type { Bit } from '../types/session.types';
import type { ByteProvider } from '../sources/types';
import { Mutex } from '../utils/Mutex';

type DrbgState = Readonly<{ key: Buffer; value: Buffer }>;

const OUTLEN = 32;

function hmac(key: Buffer, ...parts: Uint8Array[]): Buffer {
	const mac = createHmac('sha256', key);
	for (const part of parts) mac.update(part);
	return mac.digest();
}

export class DeterministicBitGenerator {
	private state: DrbgState | null = null;
	private readonly mutex = new Mutex();
	private reseedCount = 0;

	/**
	 * Instantiate from seed material, replacing any previous state.
	 */
	seed(material: Uint8Array): void {
		const data = Buffer.from(material);
		let key: Buffer = Buffer.alloc(OUTLEN, 0x00);
		let value: Buffer = Buffer.alloc(OUTLEN, 0x01);

		key = hmac(key, value, Buffer.of(0x00), data);
		value = hmac(key, value);
		key = hmac(key, value, Buffer.of(0x01), data);
		value = hmac(key, value);

		this.state = Object.freeze({ key, value });
		this.reseedCount++;
	}

	/**
	 * Seed from a byte provider. Overlapping calls are serialized so the last
	 * caller's material is the one that sticks.
	 */
	seedFrom(provider: ByteProvider, byteCount = OUTLEN): Promise<Uint8Array> {
		return this.mutex.lock(async () => {
			const material = await provider.fetch(byteCount);
			this.seed(material);
			return material;
		});
	}

	isSeeded(): boolean {
		return this.state !== null;
	}

	get seedGeneration(): number {
		return this.reseedCount;
	}

	generate(byteCount: number): Uint8Array {
		const current = this.state;
		if (!current) {
			throw new Error('DeterministicBitGenerator used before seed()');
		}

		const out = new Uint8Array(Math.max(0, byteCount));
		let value = current.value;
		let filled = 0;
		while (filled < out.length) {
			value = hmac(current.key, value);
			const take = Math.min(OUTLEN, out.length - filled);
			out.set(value.subarray(0, take), filled);
			filled += take;
		}

		this.state = Object.freeze({ key: current.key, value });
		return out;
	}

	/**
	 * Low-order `n` bits (1-32) of a big-endian 4-byte draw.
	 */
	getBits(n: number): number {
		if (!Number.isInteger(n) || n < 1 || n > 32) {
			throw new RangeError(`getBits expects 1-32 bits, got ${n}`);
		}
		const draw = Buffer.from(this.generate(4)).readUInt32BE(0);
		return draw % 2 ** n;
	}

	getBit(): Bit {
		return this.getBits(1) === 1 ? 1 : 0;
	}
}
