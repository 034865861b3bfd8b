/**
 * Tests for the API handlers and error mapping.
 */

import {describe, it, expect, beforeEach} from 'vitest';
import {createConfig} from '../../lib/config.js';
import {
	SearchStoreError,
	SearchStoreUnavailableError,
	UnauthenticatedError,
} from '../../lib/errors.js';
import {IndexingOrchestrator} from '../../indexing/indexer.js';
import {HybridQueryPlanner} from '../../search/index.js';
import {MemoryStore} from '../../store/memory.js';
import {InMemoryServiceRepository} from '../../tenancy/memory-repository.js';
import {TenancyRegistry} from '../../tenancy/registry.js';
import type {UserClaims, UserTokenVerifier} from '../../tenancy/types.js';
import {dispatch, type HandlerContext} from '../handlers.js';
import {toErrorResponse} from '../responses.js';

const SERVICE_AUTH = 'Bearer docs-token';

class FakeVerifier implements UserTokenVerifier {
	private readonly tokens: Record<string, UserClaims> = {
		'user-token': {sub: 'alice', audience: 'docs-client'},
		'anonymous-token': {audience: 'docs-client'},
		'member-token': {sub: 'carol', groups: ['team-a'], audience: 'docs-client'},
		'foreign-token': {sub: 'alice', audience: 'nobody'},
	};

	async verify(token: string): Promise<UserClaims> {
		const claims = this.tokens[token];
		if (!claims) throw new Error('bad signature');
		return claims;
	}
}

function document(overrides: Record<string, unknown> = {}) {
	return {
		id: 'd1',
		title: 'Rapport annuel',
		content: 'Le rapport annuel du service',
		owner: 'alice',
		reach: 'public',
		language_code: 'fr',
		...overrides,
	};
}

function setup() {
	const config = createConfig();
	const store = new MemoryStore();
	const registry = new TenancyRegistry(
		new InMemoryServiceRepository([
			{
				name: 'docs',
				clientId: 'docs-client',
				isActive: true,
				token: 'docs-token',
				allowedPartners: ['drive'],
			},
			{
				name: 'drive',
				clientId: 'drive-client',
				isActive: true,
				token: 'drive-token',
				allowedPartners: [],
			},
		]),
	);
	const ctx: HandlerContext = {
		registry,
		indexer: new IndexingOrchestrator({config, store}),
		planner: new HybridQueryPlanner({config, store, registry}),
		verifier: new FakeVerifier(),
	};
	return {store, ctx};
}

describe('index handler', () => {
	let env: ReturnType<typeof setup>;

	beforeEach(() => {
		env = setup();
	});

	it('indexes a single document', async () => {
		const response = await dispatch(
			'index',
			{authorization: SERVICE_AUTH, body: document()},
			env.ctx,
		);

		expect(response.status).toBe(201);
		expect(response.body).toMatchObject({
			status: 'created',
			id: 'd1',
			chunks: 1,
			embedded: 0,
			language_code: 'fr',
		});
		expect(env.store.listIds('find-docs')).toEqual(['d1', 'd1#chunk-0']);
	});

	it('maps snake_case metadata onto the stored document', async () => {
		await dispatch(
			'index',
			{
				authorization: SERVICE_AUTH,
				body: document({
					is_active: false,
					created_at: '2024-01-01T00:00:00+01:00',
					users: ['bob'],
					groups: ['team-a'],
					size: 10,
				}),
			},
			env.ctx,
		);

		expect(env.store.getSource('find-docs', 'd1')).toMatchObject({
			is_active: false,
			created_at: '2023-12-31T23:00:00.000Z',
			users: ['bob'],
			groups: ['team-a'],
			size: 10,
		});
	});

	it('requires a service token', async () => {
		const response = await dispatch('index', {body: document()}, env.ctx);

		expect(response).toEqual({
			status: 401,
			body: {
				detail: 'Authentication credentials were not provided.',
				code: 'unauthenticated',
			},
		});
	});

	it('rejects an unknown service token', async () => {
		const response = await dispatch(
			'index',
			{authorization: 'Bearer nope', body: document()},
			env.ctx,
		);
		expect(response.status).toBe(401);
		expect(response.body).toMatchObject({detail: 'Invalid token.'});
	});

	it('reports a status per document for a batch', async () => {
		const response = await dispatch(
			'index',
			{
				authorization: SERVICE_AUTH,
				body: [document({id: 'a'}), document({id: 'b'})],
			},
			env.ctx,
		);

		expect(response).toEqual({
			status: 207,
			body: [
				{index: 0, id: 'a', status: 'success'},
				{index: 1, id: 'b', status: 'success'},
			],
		});
	});

	it('rejects the whole batch when one document is invalid', async () => {
		const response = await dispatch(
			'index',
			{
				authorization: SERVICE_AUTH,
				body: [document({id: 'a'}), {id: 'b', content: 'x'}],
			},
			env.ctx,
		);

		expect(response.status).toBe(400);
		expect(response.body).toMatchObject({issues: ['[1] owner: Required']});
		expect(await env.store.indexExists('find-docs')).toBe(false);
	});

	it('rejects batch documents dated in the future', async () => {
		const response = await dispatch(
			'index',
			{
				authorization: SERVICE_AUTH,
				body: [document({created_at: '2999-01-01T00:00:00Z'})],
			},
			env.ctx,
		);

		expect(response.status).toBe(400);
		expect(response.body).toMatchObject({
			issues: ['[0] createdAt: must be earlier than now'],
		});
	});
});

describe('delete handler', () => {
	it('deletes documents listed as a comma-separated string', async () => {
		const {ctx} = setup();
		await dispatch(
			'index',
			{
				authorization: SERVICE_AUTH,
				body: [document({id: 'a'}), document({id: 'b'}), document({id: 'c'})],
			},
			ctx,
		);

		const response = await dispatch(
			'delete',
			{authorization: SERVICE_AUTH, body: {document_ids: 'a, b'}},
			ctx,
		);
		expect(response).toEqual({
			status: 200,
			body: {deleted: 2, chunks_deleted: 2},
		});
	});

	it('requires a selector', async () => {
		const {ctx} = setup();
		const response = await dispatch(
			'delete',
			{authorization: SERVICE_AUTH, body: {}},
			ctx,
		);

		expect(response).toEqual({
			status: 400,
			body: {
				detail: "At least one of 'document_ids' or 'tags' must be provided",
				code: 'validation_error',
				issues: ["At least one of 'document_ids' or 'tags' must be provided"],
			},
		});
	});
});

describe('search handler', () => {
	let env: ReturnType<typeof setup>;

	beforeEach(async () => {
		env = setup();
		await dispatch('index', {authorization: SERVICE_AUTH, body: document()}, env.ctx);
		await dispatch(
			'index',
			{
				authorization: 'Bearer drive-token',
				body: document({id: 'd2', title: 'Photos', content: 'Vacances'}),
			},
			env.ctx,
		);
	});

	it('searches on behalf of the token audience', async () => {
		const response = await dispatch(
			'search',
			{authorization: 'Bearer user-token', body: {q: 'rapport'}},
			env.ctx,
		);

		expect(response.status).toBe(200);
		expect(response.body).toMatchObject({
			mode: 'lexical',
			reranked: false,
			services: ['docs', 'drive'],
			hits: [
				{
					id: 'd1',
					service: 'docs',
					title: 'Rapport annuel',
					chunk: 'Le rapport annuel du service',
					chunk_index: 0,
					reach: 'public',
					path: null,
					language_code: 'fr',
					size: 28,
					rerank_score: null,
				},
			],
		});
	});

	it('attributes partner hits to their service', async () => {
		const response = await dispatch(
			'search',
			{authorization: 'Bearer anonymous-token', body: {q: 'vacances'}},
			env.ctx,
		);
		expect(response.body).toMatchObject({
			hits: [{id: 'd2', service: 'drive'}],
		});
	});

	it('accepts query-string style parameters', async () => {
		const response = await dispatch(
			'search',
			{
				authorization: 'Bearer user-token',
				body: {q: '*', services: 'drive', size: '1', min_score: '0'},
			},
			env.ctx,
		);

		expect(response.status).toBe(200);
		expect(response.body).toMatchObject({mode: 'match_all'});
	});

	it('orders and narrows from query-string parameters', async () => {
		const response = await dispatch(
			'search',
			{
				authorization: 'Bearer user-token',
				body: {
					q: '*',
					reach: 'public',
					order_by: 'size',
					order_direction: 'asc',
					rerank: 'false',
				},
			},
			env.ctx,
		);

		expect(response.status).toBe(200);
		expect(response.body).toMatchObject({
			reranked: false,
			hits: [
				{id: 'd2', size: 8},
				{id: 'd1', size: 28},
			],
		});
	});

	it('rejects unknown orderings', async () => {
		const response = await dispatch(
			'search',
			{authorization: 'Bearer user-token', body: {q: '*', order_by: 'title'}},
			env.ctx,
		);

		expect(response.status).toBe(400);
		expect(response.body).toMatchObject({
			issues: [
				"order_by: Invalid enum value. Expected 'relevance' | 'created_at' | 'updated_at' | 'size', received 'title'",
			],
		});
	});

	it('grants access through the groups of the user token', async () => {
		await dispatch(
			'index',
			{
				authorization: SERVICE_AUTH,
				body: document({
					id: 'd3',
					title: 'Budget',
					content: "Budget de l'équipe",
					reach: 'restricted',
					groups: ['team-a'],
				}),
			},
			env.ctx,
		);

		const member = await dispatch(
			'search',
			{authorization: 'Bearer member-token', body: {q: 'budget'}},
			env.ctx,
		);
		const anonymous = await dispatch(
			'search',
			{authorization: 'Bearer anonymous-token', body: {q: 'budget'}},
			env.ctx,
		);

		expect(member.body).toMatchObject({hits: [{id: 'd3'}]});
		expect(anonymous.body).toMatchObject({hits: []});
	});

	it('rejects invalid and unknown user tokens', async () => {
		const missing = await dispatch('search', {body: {q: 'x'}}, env.ctx);
		expect(missing.status).toBe(401);

		const invalid = await dispatch(
			'search',
			{authorization: 'Bearer forged', body: {q: 'x'}},
			env.ctx,
		);
		expect(invalid.body).toMatchObject({detail: 'Invalid token.'});

		const foreign = await dispatch(
			'search',
			{authorization: 'Bearer foreign-token', body: {q: 'x'}},
			env.ctx,
		);
		expect(foreign.body).toMatchObject({
			detail: 'No active service for audience "nobody".',
		});
	});

	it('answers 403 for services outside the allow-list', async () => {
		const response = await dispatch(
			'search',
			{authorization: 'Bearer user-token', body: {q: 'x', services: ['other']}},
			env.ctx,
		);

		expect(response.status).toBe(403);
		expect(response.body).toMatchObject({services: ['other']});
	});

	it('validates the page size', async () => {
		const response = await dispatch(
			'search',
			{authorization: 'Bearer user-token', body: {q: 'x', size: 500}},
			env.ctx,
		);

		expect(response.status).toBe(400);
		expect(response.body).toMatchObject({
			issues: ['size: Number must be less than or equal to 300'],
		});
	});
});

describe('toErrorResponse', () => {
	it('maps retryable failures to 503', () => {
		expect(
			toErrorResponse(new SearchStoreUnavailableError('store down')),
		).toEqual({
			status: 503,
			body: {detail: 'store down', code: 'store_unavailable'},
		});
	});

	it('maps other engine errors to 500', () => {
		const response = toErrorResponse(
			new SearchStoreError({status: 400, type: 'parsing_exception', message: 'bad'}),
		);
		expect(response).toEqual({
			status: 500,
			body: {detail: 'bad', code: 'store_error'},
		});
	});

	it('hides unexpected errors', () => {
		expect(toErrorResponse(new TypeError('x is undefined'))).toEqual({
			status: 500,
			body: {detail: 'Internal server error', code: 'internal_error'},
		});
		expect(toErrorResponse(new UnauthenticatedError()).status).toBe(401);
	});
});
