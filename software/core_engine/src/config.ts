/**
 * Whole-engine configuration.
 *
 * Every section is optional and partial: omitted values fall back to
 * ENGINE_CONSTANTS inside each component. Unknown keys are rejected so a typo
 * in a config file surfaces instead of being ignored.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError, describeError } from './errors';

const positiveInt = z.number().int().positive();
const nonNegativeMs = z.number().nonnegative();

export const CollectorConfigSchema = z
	.object({
		bufferCapacity: positiveInt,
		intervalMs: nonNegativeMs,
		stopTimeoutMs: nonNegativeMs,
		statsWindow: positiveInt,
		minBitsForStats: positiveInt,
		minBitsForComparison: positiveInt,
		continuousRetryDelayMs: nonNegativeMs,
		continuousPollMs: nonNegativeMs,
	})
	.partial()
	.strict();

export const SpectralConfigSchema = z
	.object({
		sampleRateHz: z.number().positive(),
		centerFrequencyHz: z.number().positive(),
		gain: z.union([z.number(), z.literal('auto')]),
		samplesPerHash: positiveInt,
		maxCycles: positiveInt,
		failureThreshold: positiveInt,
		cooldownBaseMs: nonNegativeMs,
		cooldownMaxMs: nonNegativeMs,
	})
	.partial()
	.strict();

export const OnlineConfigSchema = z
	.object({
		endpoint: z.string().url(),
		maxChunkBytes: positiveInt.max(1024),
		timeoutMs: z.number().positive(),
		chunkDelayMs: nonNegativeMs,
	})
	.partial()
	.strict();

export const MonitorConfigSchema = z
	.object({
		maxRetries: positiveInt,
		flakyMaxRetries: positiveInt,
		retryBaseDelayMs: nonNegativeMs,
		retryMaxDelayMs: nonNegativeMs,
		connectTimeoutMs: z.number().positive(),
		livenessPollMs: z.number().positive(),
		stopTimeoutMs: nonNegativeMs,
		scanTimeoutMs: z.number().positive(),
		rrBufferSize: positiveInt,
		sampleQueueCapacity: positiveInt,
		minRrForCoherence: positiveInt,
		coherenceNormalizationMs: z.number().positive(),
		devicePatterns: z.array(z.string().min(1)),
		flakyDevicePatterns: z.array(z.string().min(1)),
	})
	.partial()
	.strict();

export const RecorderConfigSchema = z
	.object({
		capacity: positiveInt,
	})
	.partial()
	.strict();

export const SessionConfigSchema = z
	.object({
		autoMarkThreshold: z.number().min(0).max(1),
		autoMarkCooldownMs: nonNegativeMs,
		exportBitLimit: positiveInt,
		seedBytes: positiveInt,
		spectralBlockBytes: positiveInt,
	})
	.partial()
	.strict();

export const EngineConfigSchema = z
	.object({
		collector: CollectorConfigSchema,
		spectral: SpectralConfigSchema,
		online: OnlineConfigSchema,
		monitor: MonitorConfigSchema,
		recorder: RecorderConfigSchema,
		session: SessionConfigSchema,
	})
	.partial()
	.strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Validate an engine configuration object.
 *
 * @throws ConfigurationError listing every issue as `path: message`
 */
export function parseEngineConfig(input: unknown): EngineConfig {
	const parsed = EngineConfigSchema.safeParse(input);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
		throw new ConfigurationError('Invalid engine configuration', issues);
	}
	return parsed.data;
}

export async function loadEngineConfigFile(path: string): Promise<EngineConfig> {
	let raw: string;
	try {
		raw = await readFile(path, 'utf8');
	} catch (error) {
		throw new ConfigurationError(`Cannot read config file ${path}: ${describeError(error)}`);
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch (error) {
		throw new ConfigurationError(`Config file ${path} is not valid JSON: ${describeError(error)}`);
	}
	return parseEngineConfig(json);
}
