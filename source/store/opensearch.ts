/**
 * OpenSearch store on the official client.
 *
 * Every call is bounded by the configured timeout, body transfer included.
 * Connection failures, timeouts and 5xx responses become
 * SearchStoreUnavailableError (retryable); other rejections become
 * SearchStoreError carrying the store's error type. The client does not
 * retry.
 */

import {Client, errors} from '@opensearch-project/opensearch';
import {z} from 'zod';
import {
	FindError,
	SearchStoreError,
	SearchStoreUnavailableError,
	errorMessage,
} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {
	BulkIndexOperation,
	BulkItemError,
	IndexSettings,
	Query,
	SearchHit,
	SearchOptions,
	SearchPipelineDefinition,
	SearchRequest,
	SearchStore,
	WriteOptions,
} from './types.js';

const COMPONENT = 'OpenSearch';

export interface OpenSearchStoreOptions {
	url: string;
	username?: string;
	password?: string;
	timeoutMs: number;
	logger?: Logger;
}

// ============================================================================
// Response schemas
// ============================================================================

const errorBodySchema = z.object({
	error: z
		.union([
			z.string(),
			z.object({
				type: z.string().optional(),
				reason: z.string().optional(),
			}),
		])
		.optional(),
});

const bulkResponseSchema = z.object({
	errors: z.boolean(),
	items: z.array(
		z.record(
			z.object({
				_index: z.string(),
				_id: z.string(),
				status: z.number(),
				error: z
					.object({type: z.string(), reason: z.string().optional()})
					.optional(),
			}),
		),
	),
});

const deleteByQueryResponseSchema = z.object({deleted: z.number()});

const searchResponseSchema = z.object({
	hits: z.object({
		hits: z.array(
			z.object({
				_index: z.string(),
				_id: z.string(),
				_score: z.number().nullable(),
				_source: z.record(z.unknown()).optional(),
			}),
		),
	}),
});

// ============================================================================
// Store
// ============================================================================

/** What the client's request promises expose */
type AbortableRequest<T> = Promise<T> & {abort(): void};

export class OpenSearchStore implements SearchStore {
	private readonly client: Client;
	private readonly timeoutMs: number;
	private readonly logger: Logger;

	constructor(options: OpenSearchStoreOptions) {
		this.client = new Client({
			node: options.url,
			auth:
				options.username !== undefined
					? {username: options.username, password: options.password ?? ''}
					: undefined,
			requestTimeout: options.timeoutMs,
			maxRetries: 0,
		});
		this.timeoutMs = options.timeoutMs;
		this.logger = options.logger ?? createNullLogger();
	}

	async indexExists(index: string): Promise<boolean> {
		const response = await this.call(`HEAD ${index}`, () =>
			this.client.indices.exists({index}),
		);
		return response.body;
	}

	async createIndex(index: string, settings: IndexSettings): Promise<boolean> {
		const response = await this.call(`PUT ${index}`, () =>
			this.client.indices.create(
				{index, body: {...settings}},
				{ignore: [400]},
			),
		);
		if (response.statusCode === 400) {
			const {type, reason} = readError(response.body);
			if (type === 'resource_already_exists_exception') {
				return false;
			}
			throw new SearchStoreError({
				status: 400,
				type,
				message: `Cannot create index ${index}: ${reason}`,
			});
		}
		this.logger.info(COMPONENT, 'Created index', {index});
		return true;
	}

	async deleteIndex(index: string): Promise<boolean> {
		const response = await this.call(`DELETE ${index}`, () =>
			this.client.indices.delete({index}, {ignore: [404]}),
		);
		return response.statusCode !== 404;
	}

	async refresh(indices: string[]): Promise<void> {
		if (indices.length === 0) return;
		await this.call('refresh', () =>
			this.client.indices.refresh({index: indices, ignore_unavailable: true}),
		);
	}

	async putPipeline(
		id: string,
		definition: SearchPipelineDefinition,
	): Promise<void> {
		await this.call(`PUT pipeline ${id}`, () =>
			this.client.transport.request({
				method: 'PUT',
				path: `/_search/pipeline/${encodeURIComponent(id)}`,
				body: {...definition},
			}),
		);
		this.logger.info(COMPONENT, 'Stored search pipeline', {id});
	}

	async deletePipeline(id: string): Promise<boolean> {
		const response = await this.call(`DELETE pipeline ${id}`, () =>
			this.client.transport.request(
				{
					method: 'DELETE',
					path: `/_search/pipeline/${encodeURIComponent(id)}`,
				},
				{ignore: [404]},
			),
		);
		return response.statusCode !== 404;
	}

	async bulkUpsert(
		operations: BulkIndexOperation[],
		options: WriteOptions = {},
	): Promise<BulkItemError[]> {
		if (operations.length === 0) return [];

		const body = operations.flatMap(op => [
			{index: {_index: op.index, _id: op.id}},
			op.document,
		]);
		const response = await this.call('bulk', () =>
			this.client.bulk({
				body,
				refresh: options.refresh ? 'wait_for' : undefined,
			}),
		);

		const parsed = bulkResponseSchema.safeParse(response.body);
		if (!parsed.success) {
			throw new SearchStoreUnavailableError('Malformed bulk response');
		}

		const failures: BulkItemError[] = [];
		for (const item of parsed.data.items) {
			for (const result of Object.values(item)) {
				if (!result.error) continue;
				failures.push({
					index: result._index,
					id: result._id,
					status: result.status,
					type: result.error.type,
					reason: result.error.reason ?? result.error.type,
				});
			}
		}
		return failures;
	}

	async deleteByQuery(
		indices: string[],
		query: Query,
		options: WriteOptions = {},
	): Promise<number> {
		if (indices.length === 0) return 0;

		const response = await this.call('delete_by_query', () =>
			this.client.deleteByQuery(
				{
					index: indices,
					body: {query},
					ignore_unavailable: true,
					refresh: options.refresh ? true : undefined,
				},
				{ignore: [404]},
			),
		);
		if (response.statusCode === 404) return 0;

		const parsed = deleteByQueryResponseSchema.safeParse(response.body);
		if (!parsed.success) {
			throw new SearchStoreUnavailableError(
				'Malformed delete_by_query response',
			);
		}
		return parsed.data.deleted;
	}

	async search(
		indices: string[],
		request: SearchRequest,
		options: SearchOptions = {},
	): Promise<SearchHit[]> {
		if (indices.length === 0) return [];

		const response = await this.call('search', () =>
			this.client.search(
				{index: indices, body: {...request}, ignore_unavailable: true},
				{
					ignore: [404],
					querystring: options.pipeline
						? {search_pipeline: options.pipeline}
						: undefined,
				},
			),
		);
		if (response.statusCode === 404) return [];

		const parsed = searchResponseSchema.safeParse(response.body);
		if (!parsed.success) {
			throw new SearchStoreUnavailableError('Malformed search response');
		}
		return parsed.data.hits.hits.map(hit => ({
			index: hit._index,
			id: hit._id,
			score: hit._score ?? 0,
			source: hit._source ?? {},
		}));
	}

	async close(): Promise<void> {
		await this.client.close();
	}

	// ==========================================================================
	// Transport
	// ==========================================================================

	/**
	 * Run one client call under the store deadline and translate its
	 * failures. The deadline aborts the request even once headers arrived.
	 */
	private async call<T>(
		operation: string,
		send: () => AbortableRequest<T>,
	): Promise<T> {
		const request = send();
		let timer: NodeJS.Timeout | undefined;
		const deadline = new Promise<never>((_resolve, reject) => {
			timer = setTimeout(() => {
				request.abort();
				reject(
					new SearchStoreUnavailableError(
						`Search store timed out after ${this.timeoutMs}ms on ${operation}`,
					),
				);
			}, this.timeoutMs);
		});

		try {
			return await Promise.race([request, deadline]);
		} catch (error) {
			throw this.translate(operation, error);
		} finally {
			clearTimeout(timer);
		}
	}

	private translate(operation: string, error: unknown): unknown {
		if (error instanceof FindError) {
			this.logger.error(COMPONENT, `${operation} failed`, error);
			return error;
		}

		if (error instanceof errors.ResponseError) {
			const status = error.statusCode;
			const {type, reason} = readError(error.body);
			if (status >= 500) {
				this.logger.error(COMPONENT, `${operation} failed`, error);
				return new SearchStoreUnavailableError(
					`Search store error (${status}) on ${operation}: ${reason}`,
					{cause: error},
				);
			}
			return new SearchStoreError({
				status,
				type,
				message: `Search store rejected ${operation} (${status}): ${reason}`,
			});
		}

		if (error instanceof errors.OpenSearchClientError) {
			this.logger.error(COMPONENT, `${operation} failed`, error);
			return new SearchStoreUnavailableError(
				`Search store unreachable: ${errorMessage(error)}`,
				{cause: error},
			);
		}

		return error;
	}
}

function readError(body: unknown): {type: string | null; reason: string} {
	const parsed = errorBodySchema.safeParse(body);
	if (!parsed.success || parsed.data.error === undefined) {
		return {
			type: null,
			reason: typeof body === 'string' && body ? body : 'unknown error',
		};
	}
	const {error} = parsed.data;
	if (typeof error === 'string') {
		return {type: null, reason: error};
	}
	return {
		type: error.type ?? null,
		reason: error.reason ?? error.type ?? 'unknown error',
	};
}
