/**
 * Engine context: the logger and clock every component receives at construction.
 *
 * Replaces module-level loggers and shared queue instances. Build one context per
 * session with createEngineContext() and pass it down; tests inject a silent
 * logger and a fake clock.
 */

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export interface Clock {
	now(): number;
	sleep(ms: number): Promise<void>;
}

export interface EngineContext {
	readonly logger: Logger;
	readonly clock: Clock;
}

export const systemClock: Clock = {
	now: () => Date.now(),
	sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
};

const noop = (): void => undefined;

export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
};

export function createEngineContext(overrides: Partial<EngineContext> = {}): EngineContext {
	return {
		logger: overrides.logger ?? console,
		clock: overrides.clock ?? systemClock,
	};
}

/**
 * Race a promise against a deadline. Resolves true if the promise settled in
 * time; the timer is always cleared so nothing is left pending.
 */
export async function settlesWithin(promise: Promise<unknown>, timeoutMs: number): Promise<boolean> {
	let timer: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<false>((resolve) => {
		timer = setTimeout(() => resolve(false), timeoutMs);
	});
	try {
		return await Promise.race([
			promise.then(
				() => true as const,
				() => true as const,
			),
			deadline,
		]);
	} finally {
		clearTimeout(timer);
	}
}
