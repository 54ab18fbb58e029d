/**
 * Fixed-capacity FIFO buffer; the oldest entry is evicted on overflow.
 *
 * Single writer. Readers take copies (toArray/tail), so a reader never sees a
 * half-applied push. Length may change between two calls: snapshot `size` once
 * per operation.
 */
export class RingBuffer<T> {
	private readonly items: (T | undefined)[];
	private head = 0;
	private count = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`RingBuffer capacity must be a positive integer, got ${capacity}`);
		}
		this.items = new Array<T | undefined>(capacity);
	}

	get size(): number {
		return this.count;
	}

	/**
	 * Append an item. Returns the evicted item when the buffer was full.
	 */
	push(item: T): T | undefined {
		const evicted = this.count === this.capacity ? this.items[this.head] : undefined;
		this.items[this.head] = item;
		this.head = (this.head + 1) % this.capacity;
		if (this.count < this.capacity) {
			this.count++;
		}
		return evicted;
	}

	/** Remove and return every item, oldest first. */
	drain(): T[] {
		const result = this.toArray();
		this.clear();
		return result;
	}

	toArray(): T[] {
		return this.tail(this.count);
	}

	/** Copy of the newest `n` items, oldest first. */
	tail(n: number): T[] {
		const take = Math.max(0, Math.min(Math.floor(n), this.count));
		const result: T[] = [];
		const start = (this.head - take + this.capacity) % this.capacity;
		for (let i = 0; i < take; i++) {
			const item = this.items[(start + i) % this.capacity];
			if (item !== undefined) result.push(item);
		}
		return result;
	}

	clear(): void {
		this.items.fill(undefined);
		this.head = 0;
		this.count = 0;
	}
}
