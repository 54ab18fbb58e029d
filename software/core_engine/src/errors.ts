/**
 * Error taxonomy for the experiment core.
 *
 * Entropy errors are always recoverable by the source chain falling through.
 * Device errors are isolated per address. Anything that is not an EngineError
 * is treated as a programming error and propagates.
 */

export type EngineErrorCode =
	| 'SOURCE_UNAVAILABLE'
	| 'MALFORMED_RESPONSE'
	| 'DEVICE_CONNECT_FAILED'
	| 'PARSE_ERROR'
	| 'INVALID_CONFIGURATION';

export type EntropySourceId = 'spectral' | 'online' | 'secure-fallback';

export abstract class EngineError extends Error {
	abstract readonly code: EngineErrorCode;

	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Hardware or network entropy source absent, misconfigured or cooling down. */
export class SourceUnavailableError extends EngineError {
	readonly code = 'SOURCE_UNAVAILABLE' as const;

	constructor(readonly source: EntropySourceId, message: string, options?: ErrorOptions) {
		super(`[${source}] ${message}`, options);
	}
}

/** Remote API answered with something other than the documented JSON shape. */
export class MalformedResponseError extends EngineError {
	readonly code = 'MALFORMED_RESPONSE' as const;

	constructor(readonly source: EntropySourceId, message: string, options?: ErrorOptions) {
		super(`[${source}] ${message}`, options);
	}
}

export class DeviceConnectFailedError extends EngineError {
	readonly code = 'DEVICE_CONNECT_FAILED' as const;

	constructor(readonly address: string, readonly attempts: number, options?: ErrorOptions) {
		super(`Device ${address} failed after ${attempts} connection attempt(s)`, options);
	}
}

/** BLE payload shorter than the fields its flags announce. */
export class ParseError extends EngineError {
	readonly code = 'PARSE_ERROR' as const;

	constructor(message: string, readonly payload?: Uint8Array) {
		super(message);
	}
}

export class ConfigurationError extends EngineError {
	readonly code = 'INVALID_CONFIGURATION' as const;

	constructor(message: string, readonly issues: readonly string[] = []) {
		super(issues.length ? `${message}: ${issues.join('; ')}` : message);
	}
}

export type EntropyFailure = SourceUnavailableError | MalformedResponseError;

export function isEntropyFailure(error: unknown): error is EntropyFailure {
	return error instanceof SourceUnavailableError || error instanceof MalformedResponseError;
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
