/**
 * Engine - wires the components from one configuration.
 */

import type {SearchConfig} from './lib/config.js';
import {
	createConsoleLogger,
	createLogger,
	type Logger,
} from './lib/logger.js';
import {createEmbeddingEncoders} from './embeddings/index.js';
import type {EmbeddingEncoder} from './embeddings/types.js';
import {EvaluationHarness} from './eval/harness.js';
import {IndexingOrchestrator} from './indexing/indexer.js';
import {HybridQueryPlanner} from './search/index.js';
import {createReranker, type Reranker} from './rerank/index.js';
import {OpenSearchStore} from './store/opensearch.js';
import type {SearchStore} from './store/types.js';
import {InMemoryServiceRepository} from './tenancy/memory-repository.js';
import {TenancyRegistry} from './tenancy/registry.js';
import type {ServiceRepository} from './tenancy/types.js';
import {createLanguageDetector} from './text/detect.js';

export interface SearchEngineOptions {
	config: SearchConfig;
	/** Service registrations; empty in-memory repository by default */
	repository?: ServiceRepository;
	/** Defaults to an OpenSearchStore on `config.store` */
	store?: SearchStore;
	/** Defaults to the configured embedding API (none while hybrid is off) */
	encoders?: EmbeddingEncoder[];
	/** Defaults to the configured rerank API (none while reranking is off) */
	reranker?: Reranker;
	logger?: Logger;
}

export interface SearchEngine {
	config: SearchConfig;
	logger: Logger;
	store: SearchStore;
	encoders: EmbeddingEncoder[];
	registry: TenancyRegistry;
	indexer: IndexingOrchestrator;
	planner: HybridQueryPlanner;
	harness: EvaluationHarness;
	/** Release provider and store resources */
	close(): Promise<void>;
}

/**
 * Logger described by `config.logging`: daily files when a directory is
 * set, stderr otherwise.
 */
export function createConfiguredLogger(config: SearchConfig): Logger {
	const {dir, level} = config.logging;
	return dir ? createLogger(dir, level) : createConsoleLogger(level);
}

export function createSearchEngine(options: SearchEngineOptions): SearchEngine {
	const {config} = options;
	const logger = options.logger ?? createConfiguredLogger(config);
	const store =
		options.store ??
		new OpenSearchStore({
			url: config.store.url,
			username: config.store.username,
			password: config.store.password,
			timeoutMs: config.store.timeoutMs,
			logger,
		});
	const encoders = options.encoders ?? createEmbeddingEncoders(config, logger);
	const registry = new TenancyRegistry(
		options.repository ?? new InMemoryServiceRepository(),
		logger,
	);
	const indexer = new IndexingOrchestrator({
		config,
		store,
		encoders,
		logger,
		detectLanguage: createLanguageDetector(config) ?? undefined,
	});
	const planner = new HybridQueryPlanner({
		config,
		store,
		registry,
		encoders,
		reranker: options.reranker ?? createReranker(config, logger),
		logger,
	});
	const harness = new EvaluationHarness({
		config,
		store,
		indexer,
		planner,
		logger,
	});

	return {
		config,
		logger,
		store,
		encoders,
		registry,
		indexer,
		planner,
		harness,
		async close() {
			for (const encoder of encoders) {
				encoder.provider.close();
			}
			await store.close?.();
		},
	};
}
