/**
 * Rerank module - cross-encoder reordering of search hits.
 */

import type {SearchConfig} from '../lib/config.js';
import type {Logger} from '../lib/logger.js';
import {CohereReranker} from './cohere.js';
import type {Reranker} from './types.js';

export type {Reranker} from './types.js';
export {
	CohereReranker,
	type CohereRerankerOptions,
	type RerankClient,
} from './cohere.js';

/**
 * Reranker for `config.rerank`; none while reranking is disabled.
 */
export function createReranker(
	config: SearchConfig,
	logger?: Logger,
): Reranker | undefined {
	const {rerank} = config;
	if (!rerank.enabled) return undefined;

	return new CohereReranker({
		apiKey: rerank.apiKey,
		model: rerank.model,
		baseUrl: rerank.baseUrl,
		timeoutMs: rerank.timeoutMs,
		logger,
	});
}
