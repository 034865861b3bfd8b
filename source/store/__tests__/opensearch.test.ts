/**
 * Tests for the OpenSearch store against an in-process HTTP stand-in.
 */

import http from 'node:http';
import {afterEach, describe, it, expect} from 'vitest';
import {
	SearchStoreError,
	SearchStoreUnavailableError,
} from '../../lib/errors.js';
import {OpenSearchStore} from '../opensearch.js';

interface ReceivedRequest {
	method: string;
	url: URL;
	authorization: string | undefined;
	body: string;
}

/** A status with an optional JSON body, or headers then a body that never ends */
type Reply = {status: number; body?: unknown} | 'stall';

interface FakeCluster {
	url: string;
	requests: ReceivedRequest[];
	close(): Promise<void>;
}

async function startCluster(replies: Reply[]): Promise<FakeCluster> {
	const requests: ReceivedRequest[] = [];
	const server = http.createServer((req, res) => {
		const chunks: Buffer[] = [];
		req.on('data', (chunk: Buffer) => chunks.push(chunk));
		req.on('end', () => {
			requests.push({
				method: req.method ?? '',
				url: new URL(req.url ?? '/', 'http://cluster.test'),
				authorization: req.headers.authorization,
				body: Buffer.concat(chunks).toString('utf-8'),
			});
			const reply = replies.shift() ?? {status: 500};
			if (reply === 'stall') {
				res.writeHead(200, {'content-type': 'application/json'});
				res.write('{"hits":');
				return;
			}
			if (reply.body === undefined) {
				res.writeHead(reply.status);
				res.end();
				return;
			}
			res.writeHead(reply.status, {'content-type': 'application/json'});
			res.end(JSON.stringify(reply.body));
		});
	});

	await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
	const address = server.address();
	if (address === null || typeof address === 'string') {
		throw new Error('Fake cluster has no port');
	}

	return {
		url: `http://127.0.0.1:${address.port}`,
		requests,
		close: () =>
			new Promise<void>(resolve => {
				server.closeAllConnections();
				server.close(() => resolve());
			}),
	};
}

const cleanups: Array<() => Promise<void>> = [];

afterEach(async () => {
	for (const cleanup of cleanups.splice(0)) {
		await cleanup();
	}
});

async function setup(replies: Reply[], timeoutMs = 2000) {
	const cluster = await startCluster(replies);
	const store = new OpenSearchStore({
		url: cluster.url,
		username: 'admin',
		password: 'test-secret',
		timeoutMs,
	});
	cleanups.push(
		() => store.close(),
		() => cluster.close(),
	);
	return {cluster, store};
}

describe('OpenSearchStore', () => {
	it('checks index existence with basic auth', async () => {
		const {cluster, store} = await setup([{status: 200}, {status: 404}]);

		expect(await store.indexExists('find-docs')).toBe(true);
		expect(await store.indexExists('find-docs')).toBe(false);

		const [request] = cluster.requests;
		expect(request?.method).toBe('HEAD');
		expect(request?.url.pathname).toBe('/find-docs');
		expect(request?.authorization).toBe(
			`Basic ${Buffer.from('admin:test-secret').toString('base64')}`,
		);
	});

	it('treats an existing index as not created', async () => {
		const {cluster, store} = await setup([
			{status: 200, body: {acknowledged: true}},
			{
				status: 400,
				body: {
					error: {type: 'resource_already_exists_exception', reason: 'exists'},
				},
			},
			{
				status: 400,
				body: {error: {type: 'mapper_parsing_exception', reason: 'bad mapping'}},
			},
		]);
		const settings = {settings: {}, mappings: {properties: {}}};

		expect(await store.createIndex('find-docs', settings)).toBe(true);
		expect(await store.createIndex('find-docs', settings)).toBe(false);
		await expect(store.createIndex('find-docs', settings)).rejects.toMatchObject(
			{
				status: 400,
				type: 'mapper_parsing_exception',
				message: 'Cannot create index find-docs: bad mapping',
			},
		);
		expect(cluster.requests[0]?.method).toBe('PUT');
		expect(JSON.parse(cluster.requests[0]?.body ?? '')).toEqual(settings);
	});

	it('writes bulk operations as NDJSON and reports rejected items', async () => {
		const {cluster, store} = await setup([
			{
				status: 200,
				body: {
					errors: true,
					items: [
						{index: {_index: 'find-docs', _id: 'a', status: 201}},
						{
							index: {
								_index: 'find-docs',
								_id: 'b',
								status: 400,
								error: {type: 'mapper_parsing_exception', reason: 'bad'},
							},
						},
					],
				},
			},
		]);

		const failures = await store.bulkUpsert(
			[
				{index: 'find-docs', id: 'a', document: {kind: 'document'}},
				{index: 'find-docs', id: 'b', document: {kind: 'chunk'}},
			],
			{refresh: true},
		);

		expect(failures).toEqual([
			{
				index: 'find-docs',
				id: 'b',
				status: 400,
				type: 'mapper_parsing_exception',
				reason: 'bad',
			},
		]);
		const [request] = cluster.requests;
		expect(request?.url.pathname).toBe('/_bulk');
		expect(request?.url.searchParams.get('refresh')).toBe('wait_for');
		expect(request?.body).toBe(
			[
				'{"index":{"_index":"find-docs","_id":"a"}}',
				'{"kind":"document"}',
				'{"index":{"_index":"find-docs","_id":"b"}}',
				'{"kind":"chunk"}',
				'',
			].join('\n'),
		);
	});

	it('searches several indices through a pipeline', async () => {
		const {cluster, store} = await setup([
			{
				status: 200,
				body: {
					hits: {
						hits: [
							{
								_index: 'find-a',
								_id: 'x#chunk-0',
								_score: 2.5,
								_source: {kind: 'chunk'},
							},
							{_index: 'find-b', _id: 'y#chunk-0', _score: null},
						],
					},
				},
			},
		]);

		const hits = await store.search(
			['find-a', 'find-b'],
			{query: {match_all: {}}, size: 10},
			{pipeline: 'find-hybrid-v1-l30-s70'},
		);

		expect(hits).toEqual([
			{index: 'find-a', id: 'x#chunk-0', score: 2.5, source: {kind: 'chunk'}},
			{index: 'find-b', id: 'y#chunk-0', score: 0, source: {}},
		]);
		const [request] = cluster.requests;
		expect(request?.url.pathname).toBe('/find-a,find-b/_search');
		expect(request?.url.searchParams.get('ignore_unavailable')).toBe('true');
		expect(request?.url.searchParams.get('search_pipeline')).toBe(
			'find-hybrid-v1-l30-s70',
		);
		expect(JSON.parse(request?.body ?? '')).toEqual({
			query: {match_all: {}},
			size: 10,
		});
	});

	it('returns the deleted count and ignores missing indices', async () => {
		const {cluster, store} = await setup([
			{status: 200, body: {deleted: 3}},
			{status: 404, body: {error: 'no such index'}},
		]);
		const query = {term: {document_id: 'a'}};

		expect(
			await store.deleteByQuery(['find-docs'], query, {refresh: true}),
		).toBe(3);
		expect(await store.deleteByQuery(['find-docs'], query)).toBe(0);

		const [request] = cluster.requests;
		expect(request?.method).toBe('POST');
		expect(request?.url.pathname).toBe('/find-docs/_delete_by_query');
		expect(request?.url.searchParams.get('ignore_unavailable')).toBe('true');
		expect(request?.url.searchParams.get('refresh')).toBe('true');
		expect(JSON.parse(request?.body ?? '')).toEqual({query});
	});

	it('stores and removes search pipelines', async () => {
		const {cluster, store} = await setup([
			{status: 200, body: {acknowledged: true}},
			{status: 404, body: {error: {type: 'resource_not_found_exception'}}},
		]);
		const definition = {
			description: 'hybrid',
			phase_results_processors: [],
		};

		await store.putPipeline('p', definition);
		expect(await store.deletePipeline('p')).toBe(false);

		expect(cluster.requests.map(r => `${r.method} ${r.url.pathname}`)).toEqual([
			'PUT /_search/pipeline/p',
			'DELETE /_search/pipeline/p',
		]);
		expect(JSON.parse(cluster.requests[0]?.body ?? '')).toEqual(definition);
	});

	it('reports server errors as retryable', async () => {
		const {store} = await setup([
			{
				status: 503,
				body: {error: {type: 'cluster_block_exception', reason: 'blocked'}},
			},
		]);

		const attempt = store.search(['find-a'], {query: {match_all: {}}, size: 1});
		await expect(attempt).rejects.toBeInstanceOf(SearchStoreUnavailableError);
		await expect(attempt).rejects.toMatchObject({
			retryable: true,
			message: 'Search store error (503) on search: blocked',
		});
	});

	it('reports an unreachable cluster as retryable', async () => {
		const cluster = await startCluster([]);
		await cluster.close();
		const store = new OpenSearchStore({url: cluster.url, timeoutMs: 2000});
		cleanups.push(() => store.close());

		const attempt = store.indexExists('find-docs');
		await expect(attempt).rejects.toBeInstanceOf(SearchStoreUnavailableError);
		await expect(attempt).rejects.toMatchObject({retryable: true});
	});

	it('gives up on a response body that stops arriving', async () => {
		const {store} = await setup(['stall'], 100);
		const started = Date.now();

		const attempt = store.search(['find-a'], {query: {match_all: {}}, size: 1});
		await expect(attempt).rejects.toBeInstanceOf(SearchStoreUnavailableError);
		await expect(attempt).rejects.toMatchObject({
			code: 'store_unavailable',
			retryable: true,
		});
		expect(Date.now() - started).toBeLessThan(2000);
	});

	it('reports client errors as store errors', async () => {
		const {store} = await setup([
			{
				status: 400,
				body: {
					error: {type: 'parsing_exception', reason: 'unknown query [foo]'},
				},
			},
		]);

		const attempt = store.search(['find-a'], {query: {match_all: {}}, size: 1});
		await expect(attempt).rejects.toBeInstanceOf(SearchStoreError);
		await expect(attempt).rejects.toMatchObject({
			status: 400,
			type: 'parsing_exception',
			retryable: false,
			message: 'Search store rejected search (400): unknown query [foo]',
		});
	});

	it('rejects malformed responses', async () => {
		const {store} = await setup([{status: 200, body: {ok: 1}}]);

		await expect(
			store.search(['find-a'], {query: {match_all: {}}, size: 1}),
		).rejects.toThrow('Malformed search response');
	});
});
