export { SecureFallbackSource } from './SecureFallbackSource';
export {
	OnlineEntropyFetcher,
	type OnlineFetcherConfig,
	type FetchFn,
} from './OnlineEntropyFetcher';
export {
	SpectralEntropyExtractor,
	type SpectralConfig,
	type SpectralHealth,
	type SpectralRadio,
	type RadioFactory,
	type RadioSettings,
} from './SpectralEntropyExtractor';
export {
	EntropySourceChain,
	type EntropyChainSources,
	type ProvenancedBytes,
	type SourceStats,
} from './EntropySourceChain';
export type { EntropyResult, EntropySource, ByteProvider } from './types';
