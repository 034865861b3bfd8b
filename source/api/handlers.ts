/**
 * API Handlers
 *
 * Transport-agnostic implementations of the ingest, delete and search
 * endpoints. Each handler receives the raw Authorization value and body
 * (JSON body or query-string object, snake_case) and a context with the
 * engine components.
 */

import {z} from 'zod';
import {
	FindError,
	UnauthenticatedError,
	ValidationError,
	errorMessage,
} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {IndexingOrchestrator} from '../indexing/indexer.js';
import {formatIssues} from '../indexing/schema.js';
import {REACH_VALUES} from '../indexing/types.js';
import {
	ORDER_BY_VALUES,
	type HybridQueryPlanner,
	type SearchResultHit,
} from '../search/index.js';
import type {TenancyRegistry} from '../tenancy/registry.js';
import {extractToken} from '../tenancy/registry.js';
import type {UserClaims, UserTokenVerifier} from '../tenancy/types.js';
import {toErrorResponse, type ApiResponse} from './responses.js';

export interface ApiRequest {
	/** Authorization header value (service token, or user token for search) */
	authorization?: string | null;
	body?: unknown;
}

export interface HandlerContext {
	registry: TenancyRegistry;
	indexer: IndexingOrchestrator;
	planner: HybridQueryPlanner;
	verifier: UserTokenVerifier;
	logger?: Logger;
}

export type Handler = (
	request: ApiRequest,
	ctx: HandlerContext,
) => Promise<ApiResponse>;

// ============================================================================
// Parameter Schemas
// ============================================================================

/**
 * List parameter: a comma-separated string, a list, or nothing.
 */
function cleanList(value: unknown): unknown {
	if (value === undefined || value === null) return [];
	if (typeof value === 'string') {
		return value
			.split(',')
			.map(s => s.trim())
			.filter(Boolean);
	}
	if (Array.isArray(value)) {
		return value
			.filter(v => v !== null && v !== undefined)
			.map(v => String(v).trim())
			.filter(Boolean);
	}
	return value;
}

const stringList = z.preprocess(cleanList, z.array(z.string()));

/** Query-string booleans arrive as "true" / "false" */
const booleanParam = z.preprocess(
	value => (value === 'true' ? true : value === 'false' ? false : value),
	z.boolean().optional(),
);

const documentBodySchema = z
	.object({
		language_code: z.unknown(),
		is_active: z.unknown(),
		created_at: z.unknown(),
		updated_at: z.unknown(),
	})
	.passthrough()
	.transform(
		({language_code, is_active, created_at, updated_at, ...rest}) => ({
			...rest,
			languageCode: language_code,
			isActive: is_active,
			createdAt: created_at,
			updatedAt: updated_at,
		}),
	);

const deleteParamsSchema = z.object({
	document_ids: stringList,
	tags: stringList,
});

const searchParamsSchema = z.object({
	q: z.string(),
	language_code: z.string().optional(),
	path: z.string().optional(),
	tags: stringList,
	reach: z.enum(REACH_VALUES).optional(),
	services: stringList,
	visited: stringList,
	min_score: z.coerce.number().nonnegative().optional(),
	size: z.coerce.number().int().min(1).max(300).optional(),
	order_by: z.enum(ORDER_BY_VALUES).optional(),
	order_direction: z.enum(['asc', 'desc']).optional(),
	rerank: booleanParam,
});

function parseParams<T extends z.ZodTypeAny>(
	schema: T,
	value: unknown,
	prefix = '',
): z.output<T> {
	const parsed = schema.safeParse(value ?? {});
	if (!parsed.success) {
		throw new ValidationError(formatIssues(parsed.error, prefix));
	}
	return parsed.data;
}

// ============================================================================
// Handlers
// ============================================================================

/**
 * Index handler.
 * A single document answers 201; a list is validated as a whole first
 * (any invalid entry rejects the batch) and answers 207 with a status per
 * document.
 */
const indexHandler: Handler = async (request, ctx) => {
	const service = await ctx.registry.resolve(request.authorization);

	if (!Array.isArray(request.body)) {
		const submission = parseParams(documentBodySchema, request.body);
		const result = await ctx.indexer.index(service, submission);
		return {
			status: 201,
			body: {
				status: 'created',
				id: result.id,
				chunks: result.chunks,
				embedded: result.embedded,
				language_code: result.language,
				indexed_at: result.indexedAt,
			},
		};
	}

	const issues: string[] = [];
	const submissions = request.body.map((item: unknown, i) => {
		const parsed = documentBodySchema.safeParse(item);
		if (!parsed.success) {
			issues.push(...formatIssues(parsed.error, `[${i}] `));
			return null;
		}
		const checked = ctx.indexer.submissionSchema().safeParse(parsed.data);
		if (!checked.success) {
			issues.push(...formatIssues(checked.error, `[${i}] `));
		}
		return parsed.data;
	});
	if (issues.length > 0) {
		throw new ValidationError(issues);
	}

	const results = await ctx.indexer.indexMany(service, submissions);
	return {
		status: 207,
		body: results.map(result =>
			result.status === 'success'
				? {index: result.index, id: result.id, status: 'success'}
				: {
						index: result.index,
						id: result.id,
						status: 'error',
						message: result.message,
					},
		),
	};
};

/**
 * Delete handler.
 */
const deleteHandler: Handler = async (request, ctx) => {
	const service = await ctx.registry.resolve(request.authorization);
	const params = parseParams(deleteParamsSchema, request.body);

	const result = await ctx.indexer.delete(service, {
		documentIds: params.document_ids,
		tags: params.tags,
	});
	return {
		status: 200,
		body: {deleted: result.deleted, chunks_deleted: result.chunksDeleted},
	};
};

/**
 * Search handler.
 * The end-user token decides both the user (`sub`) and, through its
 * audience, the calling service.
 */
const searchHandler: Handler = async (request, ctx) => {
	const token = extractToken(request.authorization);
	if (!token) {
		throw new UnauthenticatedError(
			'Authentication credentials were not provided.',
		);
	}

	let claims: UserClaims;
	try {
		claims = await ctx.verifier.verify(token);
	} catch (error) {
		if (error instanceof FindError) throw error;
		ctx.logger?.debug('Api', 'User token rejected', {
			error: errorMessage(error),
		});
		throw new UnauthenticatedError();
	}

	const service = await ctx.registry.resolveAudience(claims.audience);
	const params = parseParams(searchParamsSchema, request.body);

	const response = await ctx.planner.search(service, {
		q: params.q,
		languageCode: params.language_code,
		path: params.path,
		tags: params.tags,
		reach: params.reach,
		services: params.services,
		user: {sub: claims.sub, groups: claims.groups, visited: params.visited},
		minScore: params.min_score,
		size: params.size,
		orderBy: params.order_by,
		orderDirection: params.order_direction,
		rerank: params.rerank,
	});

	return {
		status: 200,
		body: {
			mode: response.mode,
			reranked: response.reranked,
			services: response.services,
			elapsed_ms: response.elapsedMs,
			hits: response.hits.map(serializeHit),
		},
	};
};

function serializeHit(hit: SearchResultHit) {
	return {
		id: hit.id,
		service: hit.service,
		score: hit.score,
		title: hit.title,
		chunk: hit.chunk,
		chunk_index: hit.chunkIndex,
		reach: hit.reach,
		tags: hit.tags,
		path: hit.path,
		language_code: hit.language,
		created_at: hit.createdAt,
		updated_at: hit.updatedAt,
		size: hit.size,
		indexed_at: hit.indexedAt,
		rerank_score: hit.rerankScore,
	};
}

// ============================================================================
// Registry
// ============================================================================

export const handlers = {
	index: indexHandler,
	delete: deleteHandler,
	search: searchHandler,
} satisfies Record<string, Handler>;

export type HandlerName = keyof typeof handlers;

/**
 * Run a handler, turning any failure into an error response.
 */
export async function dispatch(
	name: HandlerName,
	request: ApiRequest,
	ctx: HandlerContext,
): Promise<ApiResponse> {
	const logger = ctx.logger ?? createNullLogger();
	try {
		return await handlers[name](request, ctx);
	} catch (error) {
		return toErrorResponse(error, logger);
	}
}
