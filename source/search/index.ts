/**
 * Hybrid Query Planner - one search request to one store query across the
 * services a caller may search.
 */

import {z} from 'zod';
import {
	CANDIDATES_PER_RESULT,
	FIELDS,
	MATCH_ALL_QUERY,
	MAX_CANDIDATES,
	isLanguageCode,
} from '../lib/constants.js';
import type {SearchConfig} from '../lib/config.js';
import {
	EmbeddingUnavailableError,
	RerankUnavailableError,
	ValidationError,
	errorMessage,
} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {EmbeddingEncoder} from '../embeddings/types.js';
import {serviceIndexName} from '../indexing/indexer.js';
import {formatIssues} from '../indexing/schema.js';
import {REACH_VALUES} from '../indexing/types.js';
import type {Reranker} from '../rerank/types.js';
import type {
	Query,
	SearchHit,
	SearchStore,
	SortClause,
} from '../store/types.js';
import type {TenancyRegistry} from '../tenancy/registry.js';
import type {Service} from '../tenancy/types.js';
import {formatEmbeddingInput} from '../text/chunker.js';
import {resolveLanguage} from '../text/language.js';
import {buildSearchFilters} from './filters.js';
import {FusionPipeline} from './hybrid.js';
import {buildLexicalQuery, buildMatchAllQuery} from './lexical.js';
import {
	ORDER_BY_VALUES,
	type OrderBy,
	type OrderDirection,
	type SearchMode,
	type SearchQuery,
	type SearchResponse,
	type SearchResultHit,
} from './types.js';
import {buildKnnQuery} from './vector.js';

export {ORDER_BY_VALUES} from './types.js';
export type {
	OrderBy,
	OrderDirection,
	SearchMode,
	SearchQuery,
	SearchResponse,
	SearchResultHit,
	SearchUser,
} from './types.js';
export {buildSearchFilters, buildVisibilityFilter} from './filters.js';
export {buildLexicalQuery, buildMatchAllQuery} from './lexical.js';
export {buildKnnQuery} from './vector.js';
export {FusionPipeline, withFusionPipeline} from './hybrid.js';
export type {FusionWeights} from './hybrid.js';

const COMPONENT = 'Search';

const searchQuerySchema = z.object({
	q: z.string().trim().min(1, 'This field may not be blank.'),
	languageCode: z.string().trim().min(1).optional(),
	path: z.string().trim().min(1).optional(),
	tags: z.array(z.string().trim().min(1)).optional(),
	reach: z.enum(REACH_VALUES).optional(),
	services: z.array(z.string().trim().min(1)).optional(),
	user: z
		.object({
			sub: z.string().trim().min(1).optional(),
			groups: z.array(z.string().trim().min(1)).optional(),
			visited: z.array(z.string()).optional(),
		})
		.optional(),
	minScore: z.number().nonnegative().optional(),
	size: z.number().int().positive().optional(),
	orderBy: z.enum(ORDER_BY_VALUES).optional(),
	orderDirection: z.enum(['asc', 'desc']).optional(),
	rerank: z.boolean().optional(),
});

/** Chunk entry fields read back from the store */
const chunkSourceSchema = z.object({
	[FIELDS.DOCUMENT_ID]: z.string(),
	[FIELDS.CHUNK_INDEX]: z.number().int(),
	[FIELDS.TITLE]: z.record(z.string()).default({}),
	[FIELDS.CONTENT]: z.record(z.string()).default({}),
	[FIELDS.LANGUAGE]: z.string(),
	[FIELDS.REACH]: z.enum(REACH_VALUES),
	[FIELDS.TAGS]: z.array(z.string()).default([]),
	[FIELDS.PATH]: z.string().optional(),
	[FIELDS.CREATED_AT]: z.string(),
	[FIELDS.UPDATED_AT]: z.string(),
	[FIELDS.SIZE]: z.number(),
	[FIELDS.INDEXED_AT]: z.string(),
});

export interface HybridQueryPlannerOptions {
	config: SearchConfig;
	store: SearchStore;
	registry: TenancyRegistry;
	/** Vector encoders; the first one embeds queries */
	encoders?: EmbeddingEncoder[];
	/** Reorders relevance-ordered hits when reranking is requested */
	reranker?: Reranker;
	logger?: Logger;
}

export interface PlannerSearchOptions {
	/**
	 * Fusion pipeline whose lifecycle the caller manages. When omitted the
	 * planner provisions the configured one on first hybrid search.
	 */
	pipeline?: FusionPipeline;
}

/**
 * Search engine over tenant indices.
 *
 * Plans a lexical (language analyzer + trigram) query, a hybrid
 * lexical + k-NN query fused by a search pipeline, or a match-all listing;
 * then collapses chunk hits to one hit per document, orders them and
 * optionally reranks them.
 */
export class HybridQueryPlanner {
	private readonly config: SearchConfig;
	private readonly store: SearchStore;
	private readonly registry: TenancyRegistry;
	private readonly encoders: EmbeddingEncoder[];
	private readonly reranker: Reranker | undefined;
	private readonly logger: Logger;
	private readonly pipeline: FusionPipeline;
	private pipelineReady: Promise<void> | null = null;

	constructor(options: HybridQueryPlannerOptions) {
		this.config = options.config;
		this.store = options.store;
		this.registry = options.registry;
		this.encoders = options.encoders ?? [];
		this.reranker = options.reranker;
		this.logger = options.logger ?? createNullLogger();
		this.pipeline = new FusionPipeline(
			this.config.indexPrefix,
			this.config.hybrid.weights,
		);
	}

	/**
	 * Search on behalf of `caller`.
	 *
	 * Throws ValidationError on a malformed query and ForbiddenError when an
	 * explicitly requested service is not an allowed, active partner. An
	 * unavailable embedding service degrades the search to lexical, an
	 * unavailable reranker leaves the hits in their original order.
	 */
	async search(
		caller: Service,
		input: SearchQuery,
		options: PlannerSearchOptions = {},
	): Promise<SearchResponse> {
		const start = Date.now();
		const query = this.parseQuery(input);
		const size = query.size ?? this.config.search.defaultSize;
		const minScore = query.minScore ?? 0;
		const orderBy = query.orderBy ?? 'relevance';
		const direction = query.orderDirection ?? 'desc';

		const targets = await this.registry.authorizeSearchTargets(
			caller,
			query.services,
		);
		const serviceByIndex = new Map(
			targets.map(t => [serviceIndexName(this.config, t.name), t.name]),
		);

		const filters = buildSearchFilters({
			user: query.user,
			reach: query.reach,
			path: query.path,
			tags: query.tags,
		});
		const candidates = Math.min(size * CANDIDATES_PER_RESULT, MAX_CANDIDATES);

		const plan = await this.plan(query, filters, candidates, options);
		// Fused scores only exist after the pipeline: hybrid candidates are
		// ranked by score and ordered here
		const sort =
			plan.mode === 'hybrid' ? undefined : storeSort(orderBy, direction);
		const hits = await this.store.search(
			[...serviceByIndex.keys()],
			{
				query: plan.query,
				size: candidates,
				_source: {excludes: this.encoders.map(e => e.field)},
				...(sort ? {sort, track_scores: true} : {}),
			},
			plan.pipeline ? {pipeline: plan.pipeline} : {},
		);

		const ordered = this.collapse(hits, serviceByIndex)
			.filter(hit => hit.score >= minScore)
			.sort(hitComparator(orderBy, direction))
			.slice(0, size);

		const rerank =
			orderBy === 'relevance' &&
			plan.mode !== 'match_all' &&
			(query.rerank ?? this.config.rerank.enabled);
		const {hits: results, reranked} = rerank
			? await this.rerank(query.q, ordered)
			: {hits: ordered, reranked: false};

		const elapsedMs = Date.now() - start;
		this.logger.debug(COMPONENT, 'Search completed', {
			caller: caller.name,
			mode: plan.mode,
			services: targets.length,
			candidates: hits.length,
			hits: results.length,
			reranked,
			elapsedMs,
		});

		return {
			hits: results,
			mode: plan.mode,
			reranked,
			services: targets.map(t => t.name),
			elapsedMs,
		};
	}

	// ==========================================================================
	// Planning
	// ==========================================================================

	private parseQuery(input: SearchQuery): SearchQuery {
		const parsed = searchQuerySchema.safeParse(input);
		if (!parsed.success) {
			throw new ValidationError(formatIssues(parsed.error));
		}
		const {size} = parsed.data;
		const {maxSize} = this.config.search;
		if (size !== undefined && size > maxSize) {
			throw new ValidationError([
				`size: Ensure this value is less than or equal to ${maxSize}.`,
			]);
		}
		return parsed.data;
	}

	private async plan(
		query: SearchQuery,
		filters: Query[],
		candidates: number,
		options: PlannerSearchOptions,
	): Promise<{query: Query; mode: SearchMode; pipeline?: string}> {
		if (query.q === MATCH_ALL_QUERY) {
			return {query: buildMatchAllQuery(filters), mode: 'match_all'};
		}

		const lexical = buildLexicalQuery({
			text: query.q,
			languages: this.config.supportedLanguages,
			queryLanguage: query.languageCode
				? resolveLanguage(query.languageCode, this.config)
				: undefined,
			trigrams: this.config.trigrams,
			filters,
		});

		const encoder = this.config.hybrid.enabled ? this.encoders[0] : undefined;
		if (!encoder) {
			return {query: lexical, mode: 'lexical'};
		}

		let vector: number[];
		try {
			vector = await encoder.provider.embedSingle(query.q);
		} catch (error) {
			if (!(error instanceof EmbeddingUnavailableError)) throw error;
			this.logger.warn(
				COMPONENT,
				'Embedding unavailable, searching lexically',
				{error: errorMessage(error)},
			);
			return {query: lexical, mode: 'lexical'};
		}

		const pipeline = options.pipeline ?? this.pipeline;
		if (!options.pipeline) {
			await this.ensurePipeline();
		}

		return {
			query: {
				hybrid: {
					queries: [
						lexical,
						buildKnnQuery({
							field: encoder.field,
							vector,
							k: candidates,
							filters,
						}),
					],
				},
			},
			mode: 'hybrid',
			pipeline: pipeline.id,
		};
	}

	/**
	 * Install the configured fusion pipeline once; retried after a failure.
	 */
	private ensurePipeline(): Promise<void> {
		if (!this.pipelineReady) {
			const {id} = this.pipeline;
			this.pipelineReady = this.store
				.putPipeline(id, this.pipeline.definition())
				.then(() => {
					this.logger.info(COMPONENT, 'Installed fusion pipeline', {id});
				})
				.catch((error: unknown) => {
					this.pipelineReady = null;
					throw error;
				});
		}
		return this.pipelineReady;
	}

	// ==========================================================================
	// Results
	// ==========================================================================

	/**
	 * Reorder hits by reranker relevance, keeping their order when no
	 * reranker answers.
	 */
	private async rerank(
		text: string,
		hits: SearchResultHit[],
	): Promise<{hits: SearchResultHit[]; reranked: boolean}> {
		if (hits.length === 0) return {hits, reranked: false};
		if (!this.reranker) {
			this.logger.warn(COMPONENT, 'Reranking requested without a reranker');
			return {hits, reranked: false};
		}

		let scores: number[];
		try {
			scores = await this.reranker.rerank(
				text,
				hits.map(hit => formatEmbeddingInput(hit.title, hit.chunk)),
			);
		} catch (error) {
			if (!(error instanceof RerankUnavailableError)) throw error;
			this.logger.warn(COMPONENT, 'Rerank unavailable, keeping order', {
				error: errorMessage(error),
			});
			return {hits, reranked: false};
		}

		const rescored = hits.map((hit, i) => ({
			...hit,
			rerankScore: scores[i] ?? null,
		}));
		rescored.sort(
			(a, b) =>
				(b.rerankScore ?? -Infinity) - (a.rerankScore ?? -Infinity),
		);
		return {hits: rescored, reranked: true};
	}

	/**
	 * Keep the best chunk of each document.
	 */
	private collapse(
		hits: SearchHit[],
		serviceByIndex: Map<string, string>,
	): SearchResultHit[] {
		const best = new Map<string, SearchResultHit>();

		for (const hit of hits) {
			const service = serviceByIndex.get(hit.index);
			const parsed = chunkSourceSchema.safeParse(hit.source);
			const language = parsed.success ? parsed.data[FIELDS.LANGUAGE] : '';
			if (!service || !parsed.success || !isLanguageCode(language)) {
				this.logger.warn(COMPONENT, 'Skipping unreadable hit', {
					index: hit.index,
					id: hit.id,
				});
				continue;
			}

			const source = parsed.data;

			const key = `${service}\u0000${source[FIELDS.DOCUMENT_ID]}`;
			const current = best.get(key);
			if (current && current.score >= hit.score) continue;

			best.set(key, {
				id: source[FIELDS.DOCUMENT_ID],
				service,
				score: hit.score,
				title: source[FIELDS.TITLE][language] ?? '',
				chunk: source[FIELDS.CONTENT][language] ?? '',
				chunkIndex: source[FIELDS.CHUNK_INDEX],
				reach: source[FIELDS.REACH],
				tags: source[FIELDS.TAGS],
				path: source[FIELDS.PATH] ?? null,
				language,
				createdAt: source[FIELDS.CREATED_AT],
				updatedAt: source[FIELDS.UPDATED_AT],
				size: source[FIELDS.SIZE],
				indexedAt: source[FIELDS.INDEXED_AT],
				rerankScore: null,
			});
		}

		return [...best.values()];
	}
}

/**
 * Store-side sort for non-hybrid queries; none for the store's own
 * relevance order.
 */
function storeSort(
	orderBy: OrderBy,
	direction: OrderDirection,
): SortClause[] | undefined {
	if (orderBy === 'relevance') {
		return direction === 'desc' ? undefined : [{_score: {order: 'asc'}}];
	}
	return [{[orderBy]: {order: direction}}];
}

function orderKey(
	a: SearchResultHit,
	b: SearchResultHit,
	orderBy: OrderBy,
): number {
	switch (orderBy) {
		case 'relevance':
			return a.score - b.score;
		case 'created_at':
			return a.createdAt.localeCompare(b.createdAt);
		case 'updated_at':
			return a.updatedAt.localeCompare(b.updatedAt);
		case 'size':
			return a.size - b.size;
	}
}

/**
 * The requested order, ties broken by compareHits.
 */
function hitComparator(orderBy: OrderBy, direction: OrderDirection) {
	return (a: SearchResultHit, b: SearchResultHit): number => {
		const key = orderKey(a, b, orderBy);
		if (key !== 0) return direction === 'asc' ? key : -key;
		return compareHits(a, b);
	};
}

/**
 * Score descending, then most recently indexed, then id and service.
 */
function compareHits(a: SearchResultHit, b: SearchResultHit): number {
	if (a.score !== b.score) return b.score - a.score;
	if (a.indexedAt !== b.indexedAt) return a.indexedAt < b.indexedAt ? 1 : -1;
	if (a.id !== b.id) return a.id < b.id ? -1 : 1;
	if (a.service !== b.service) return a.service < b.service ? -1 : 1;
	return 0;
}
