/**
 * Embeddings module - providers and encoder wiring.
 */

import type {SearchConfig} from '../lib/config.js';
import type {Logger} from '../lib/logger.js';
import {HashingEmbeddingProvider} from './hashing.js';
import {OpenAICompatibleEmbeddingProvider} from './openai-compatible.js';
import type {EmbeddingEncoder, EmbeddingProvider} from './types.js';

export type {EmbeddingEncoder, EmbeddingProvider} from './types.js';
export {
	OpenAICompatibleEmbeddingProvider,
	type OpenAICompatibleOptions,
} from './openai-compatible.js';
export {HashingEmbeddingProvider, fnv1a} from './hashing.js';
export {
	RateLimitError,
	chunk,
	processBatchesWithLimit,
	withRetry,
} from './api-utils.js';

/** Vector field of the primary encoder */
export const DEFAULT_VECTOR_FIELD = 'embedding';

/**
 * Encoders for the configured embedding API; none when hybrid search is off.
 */
export function createEmbeddingEncoders(
	config: SearchConfig,
	logger?: Logger,
): EmbeddingEncoder[] {
	if (!config.hybrid.enabled) return [];

	const {embedding} = config;
	let provider: EmbeddingProvider;
	let model: string;
	if (embedding.provider === 'hashing') {
		provider = new HashingEmbeddingProvider(embedding.dimension);
		model = `hashing-${embedding.dimension}`;
	} else {
		provider = new OpenAICompatibleEmbeddingProvider({
			apiUrl: embedding.apiUrl,
			apiKey: embedding.apiKey,
			model: embedding.model,
			dimensions: embedding.dimension,
			timeoutMs: embedding.timeoutMs,
			batchSize: embedding.batchSize,
			maxRetries: embedding.maxRetries,
			logger,
		});
		model = embedding.model;
	}
	return [{field: DEFAULT_VECTOR_FIELD, model, provider}];
}
