/**
 * Federated hybrid search engine.
 */

export {
	createConfig,
	loadConfig,
	overridesFromEnv,
	DEFAULT_CONFIG,
	type ConfigOverrides,
	type LoadConfigOptions,
	type SearchConfig,
} from './lib/config.js';
export {
	createConsoleLogger,
	createLogger,
	createNullLogger,
	type Logger,
	type LogLevel,
} from './lib/logger.js';
export * from './lib/errors.js';
export {LANGUAGE_CODES, type LanguageCode} from './lib/constants.js';

export {
	createConfiguredLogger,
	createSearchEngine,
	type SearchEngine,
	type SearchEngineOptions,
} from './engine.js';

export * from './tenancy/index.js';
export * from './indexing/index.js';
export * from './search/index.js';
export * from './eval/index.js';
export * from './api/index.js';
export * from './rerank/index.js';
export {
	DEFAULT_VECTOR_FIELD,
	HashingEmbeddingProvider,
	OpenAICompatibleEmbeddingProvider,
	createEmbeddingEncoders,
	type EmbeddingEncoder,
	type EmbeddingProvider,
	type OpenAICompatibleOptions,
} from './embeddings/index.js';
export {
	MemoryStore,
	OpenSearchStore,
	type OpenSearchStoreOptions,
} from './store/index.js';
export type * from './store/types.js';
export {
	analyze,
	buildIndexSettings,
	chunk,
	createLanguageDetector,
	detectLanguage,
	resolveLanguage,
	type LanguageDetector,
} from './text/index.js';
