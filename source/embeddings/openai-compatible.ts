/**
 * Embedding provider for OpenAI-compatible `/embeddings` endpoints.
 *
 * Works with OpenAI and self-hosted gateways exposing the same API. The
 * model and reduced dimension come from configuration and must match the
 * vector fields of the indices.
 */

import {z} from 'zod';
import {EmbeddingUnavailableError, errorMessage} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {
	chunk,
	processBatchesWithLimit,
	RateLimitError,
	withRetry,
} from './api-utils.js';
import type {EmbeddingProvider} from './types.js';

const COMPONENT = 'Embeddings';

export interface OpenAICompatibleOptions {
	/** Full endpoint URL, e.g. https://api.openai.com/v1/embeddings */
	apiUrl: string;
	apiKey: string;
	model: string;
	dimensions: number;
	timeoutMs: number;
	batchSize: number;
	/** Retries of rate-limited (429) requests */
	maxRetries: number;
	/** First backoff delay; doubles on each retry */
	retryDelayMs?: number;
	logger?: Logger;
	/** Injected for tests */
	fetch?: typeof fetch;
}

const responseSchema = z.object({
	data: z.array(
		z.object({
			embedding: z.array(z.number()),
			index: z.number().int(),
		}),
	),
});

const errorSchema = z.object({
	error: z.union([z.string(), z.object({message: z.string()})]),
});

/**
 * OpenAI-compatible embedding provider.
 *
 * Every call is bounded by `timeoutMs`, retries included. Any failure (timeout, network,
 * non-2xx, malformed body, wrong dimension) becomes EmbeddingUnavailableError.
 */
export class OpenAICompatibleEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	private readonly options: OpenAICompatibleOptions;
	private readonly logger: Logger;
	private readonly fetchFn: typeof fetch;

	constructor(options: OpenAICompatibleOptions) {
		this.options = {...options, apiKey: options.apiKey.trim()};
		this.dimensions = options.dimensions;
		this.logger = options.logger ?? createNullLogger();
		this.fetchFn = options.fetch ?? fetch;
	}

	async embed(texts: string[]): Promise<Array<number[] | null>> {
		if (texts.length === 0) {
			return [];
		}

		return processBatchesWithLimit(
			chunk(texts, this.options.batchSize),
			batch => this.embedWithRetry(batch),
			{logger: this.logger, component: COMPONENT},
		);
	}

	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embedWithRetry([text]);
		if (!vector) {
			throw new EmbeddingUnavailableError('Embedding API returned no vector');
		}
		return vector;
	}

	close(): void {
		// Stateless HTTP client
	}

	/**
	 * One batch, attempts and backoffs included, within `timeoutMs`.
	 */
	private async embedWithRetry(texts: string[]): Promise<number[][]> {
		const deadline = Date.now() + this.options.timeoutMs;
		try {
			return await withRetry(() => this.embedBatch(texts, deadline), {
				maxRetries: this.options.maxRetries,
				initialBackoffMs: this.options.retryDelayMs,
				deadline,
				onRetry: (attempt, delayMs) => {
					this.logger.debug(COMPONENT, 'Rate limited, backing off', {
						attempt,
						delayMs,
					});
				},
			});
		} catch (error) {
			if (error instanceof EmbeddingUnavailableError) throw error;
			throw new EmbeddingUnavailableError(
				`Embedding API unavailable: ${errorMessage(error)}`,
				{cause: error},
			);
		}
	}

	private async embedBatch(
		texts: string[],
		deadline: number,
	): Promise<number[][]> {
		const {apiUrl, apiKey, model, dimensions} = this.options;
		if (!apiUrl) {
			throw new EmbeddingUnavailableError('Embedding API URL is not configured');
		}

		let response: Response;
		try {
			response = await this.fetchFn(apiUrl, {
				method: 'POST',
				headers: {
					'Content-Type': 'application/json',
					Authorization: `Bearer ${apiKey}`,
				},
				body: JSON.stringify({
					input: texts,
					model,
					dimensions,
					encoding_format: 'float',
				}),
				signal: AbortSignal.timeout(Math.max(1, deadline - Date.now())),
			});
		} catch (error) {
			throw new EmbeddingUnavailableError(
				`Embedding request failed: ${errorMessage(error)}`,
				{cause: error},
			);
		}

		if (!response.ok) {
			const errorText = await response.text();
			let body: unknown;
			try {
				body = JSON.parse(errorText);
			} catch {
				body = errorText;
			}
			const parsed = errorSchema.safeParse(body);
			let message = errorText;
			if (parsed.success) {
				message =
					typeof parsed.data.error === 'string'
						? parsed.data.error
						: parsed.data.error.message;
			}

			if (response.status === 429) {
				throw new RateLimitError(`Embedding API rate limited (429): ${message}`);
			}
			throw new EmbeddingUnavailableError(
				`Embedding API error (${response.status}): ${message}`,
			);
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (error) {
			throw new EmbeddingUnavailableError(
				`Embedding API returned invalid JSON: ${errorMessage(error)}`,
			);
		}

		const parsed = responseSchema.safeParse(body);
		if (!parsed.success || parsed.data.data.length !== texts.length) {
			throw new EmbeddingUnavailableError('Malformed embedding API response');
		}

		// Sort by index to ensure correct order
		const vectors = [...parsed.data.data]
			.sort((a, b) => a.index - b.index)
			.map(d => d.embedding);
		if (vectors.some(v => v.length !== dimensions)) {
			throw new EmbeddingUnavailableError(
				`Embedding dimension mismatch: expected ${dimensions}`,
			);
		}
		return vectors;
	}
}
