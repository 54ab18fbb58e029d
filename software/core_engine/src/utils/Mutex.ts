// Promise-chain mutex: critical sections run one at a time, in call order.
// A rejected section does not poison the chain.

export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private pending = 0;

	lock<T>(fn: () => Promise<T> | T): Promise<T> {
		this.pending++;
		const run = this.tail.then(fn, fn);
		this.tail = run.then(
			() => {
				this.pending--;
			},
			() => {
				this.pending--;
			},
		);
		return run;
	}

	get isLocked(): boolean {
		return this.pending > 0;
	}
}
