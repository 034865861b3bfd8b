/**
 * Reranker on the Cohere rerank API (or a gateway exposing it).
 */

import {CohereClient} from 'cohere-ai';
import {RerankUnavailableError, errorMessage} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {Reranker} from './types.js';

const COMPONENT = 'Rerank';

/**
 * The part of the Cohere v2 client the reranker calls.
 */
export interface RerankClient {
	rerank(
		request: {model: string; query: string; documents: string[]; topN?: number},
		requestOptions?: {timeoutInSeconds?: number; maxRetries?: number},
	): Promise<{results: Array<{index: number; relevanceScore: number}>}>;
}

export interface CohereRerankerOptions {
	apiKey: string;
	model: string;
	/** API base URL; the Cohere endpoint when unset */
	baseUrl?: string;
	timeoutMs: number;
	logger?: Logger;
	/** Injected for tests */
	client?: RerankClient;
}

export class CohereReranker implements Reranker {
	private readonly client: RerankClient;
	private readonly model: string;
	private readonly timeoutMs: number;
	private readonly logger: Logger;

	constructor(options: CohereRerankerOptions) {
		this.client =
			options.client ??
			new CohereClient({
				token: options.apiKey,
				...(options.baseUrl ? {environment: options.baseUrl} : {}),
			}).v2;
		this.model = options.model;
		this.timeoutMs = options.timeoutMs;
		this.logger = options.logger ?? createNullLogger();
	}

	async rerank(query: string, documents: string[]): Promise<number[]> {
		if (documents.length === 0) return [];

		let results: Array<{index: number; relevanceScore: number}>;
		try {
			const response = await this.client.rerank(
				{model: this.model, query, documents, topN: documents.length},
				{timeoutInSeconds: this.timeoutMs / 1000, maxRetries: 0},
			);
			results = response.results;
		} catch (error) {
			throw new RerankUnavailableError(
				`Rerank API unavailable: ${errorMessage(error)}`,
				{cause: error},
			);
		}

		const scores: Array<number | undefined> = documents.map(() => undefined);
		for (const {index, relevanceScore} of results) {
			if (index >= 0 && index < scores.length) {
				scores[index] = relevanceScore;
			}
		}
		const complete = scores.filter(
			(score): score is number => score !== undefined,
		);
		if (complete.length !== documents.length) {
			throw new RerankUnavailableError(
				`Rerank API scored ${complete.length} of ${documents.length} documents`,
			);
		}

		this.logger.debug(COMPONENT, 'Reranked documents', {
			model: this.model,
			documents: documents.length,
		});
		return complete;
	}
}
