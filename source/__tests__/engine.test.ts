/**
 * Tests for engine wiring.
 */

import {describe, it, expect, vi} from 'vitest';
import {createSearchEngine} from '../engine.js';
import {
	HashingEmbeddingProvider,
	OpenAICompatibleEmbeddingProvider,
} from '../embeddings/index.js';
import {createConfig} from '../lib/config.js';
import {createNullLogger} from '../lib/logger.js';
import {MemoryStore} from '../store/memory.js';
import {OpenSearchStore} from '../store/opensearch.js';
import {InMemoryServiceRepository} from '../tenancy/memory-repository.js';

const DOCS = {
	name: 'docs',
	clientId: 'docs-client',
	isActive: true,
	token: 'docs-token',
	allowedPartners: [],
};

describe('createSearchEngine', () => {
	it('indexes and searches through the wired components', async () => {
		const engine = createSearchEngine({
			config: createConfig(),
			repository: new InMemoryServiceRepository([DOCS]),
			store: new MemoryStore(),
			logger: createNullLogger(),
		});

		const service = await engine.registry.resolve('Bearer docs-token');
		await engine.indexer.index(service, {
			id: 'd1',
			title: 'Rapport annuel',
			content: 'Le rapport annuel du service',
			owner: 'alice',
			reach: 'public',
			languageCode: 'fr',
		});
		const response = await engine.planner.search(service, {q: 'rapport'});

		expect(engine.encoders).toEqual([]);
		expect(response.mode).toBe('lexical');
		expect(response.hits.map(hit => hit.id)).toEqual(['d1']);
	});

	it('detects the language of documents that name none', async () => {
		const engine = createSearchEngine({
			config: createConfig(),
			store: new MemoryStore(),
			logger: createNullLogger(),
		});

		const result = await engine.indexer.index(DOCS, {
			id: 'd1',
			title: 'Annual report',
			content:
				'The city council will meet on Thursday evening at the town hall to review the budget for next year.',
			owner: 'alice',
			reach: 'public',
		});

		expect(result.language).toBe('en');
	});

	it('passes an injected reranker to the planner', async () => {
		const rerank = vi.fn(async (_query: string, documents: string[]) =>
			documents.map((_, i) => i),
		);
		const engine = createSearchEngine({
			config: createConfig({rerank: {enabled: true}}),
			store: new MemoryStore(),
			repository: new InMemoryServiceRepository([DOCS]),
			reranker: {rerank},
			logger: createNullLogger(),
		});
		for (const id of ['d1', 'd2']) {
			await engine.indexer.index(DOCS, {
				id,
				title: 'Rapport',
				owner: 'alice',
				reach: 'public',
				languageCode: 'fr',
			});
		}

		const response = await engine.planner.search(DOCS, {q: 'rapport'});

		expect(rerank).toHaveBeenCalledTimes(1);
		expect(response.reranked).toBe(true);
		expect(response.hits.map(hit => hit.rerankScore)).toEqual([1, 0]);
	});

	it('defaults to the OpenSearch store and the configured encoder', () => {
		const engine = createSearchEngine({
			config: createConfig({
				hybrid: {enabled: true},
				embedding: {apiUrl: 'http://embeddings.test/v1/embeddings'},
			}),
			logger: createNullLogger(),
		});

		expect(engine.store).toBeInstanceOf(OpenSearchStore);
		expect(engine.encoders).toHaveLength(1);
		expect(engine.encoders[0]?.field).toBe('embedding');
		expect(engine.encoders[0]?.provider).toBeInstanceOf(
			OpenAICompatibleEmbeddingProvider,
		);
	});

	it('searches hybridly with locally hashed embeddings', async () => {
		const engine = createSearchEngine({
			config: createConfig({
				hybrid: {enabled: true},
				embedding: {provider: 'hashing', dimension: 8},
			}),
			repository: new InMemoryServiceRepository([DOCS]),
			store: new MemoryStore(),
			logger: createNullLogger(),
		});

		const service = await engine.registry.resolve('Bearer docs-token');
		await engine.indexer.index(service, {
			id: 'd1',
			title: 'Rapport annuel',
			content: 'Le rapport annuel du service',
			owner: 'alice',
			reach: 'public',
			languageCode: 'fr',
		});
		const response = await engine.planner.search(service, {q: 'rapport'});

		expect(engine.encoders[0]?.provider).toBeInstanceOf(
			HashingEmbeddingProvider,
		);
		expect(engine.encoders[0]?.model).toBe('hashing-8');
		expect(response.mode).toBe('hybrid');
		expect(response.hits.map(hit => hit.id)).toEqual(['d1']);
	});

	it('closes every encoder provider', async () => {
		const provider = new HashingEmbeddingProvider(4);
		const close = vi.spyOn(provider, 'close');
		const engine = createSearchEngine({
			config: createConfig(),
			store: new MemoryStore(),
			encoders: [{field: 'embedding', model: 'hashing-4', provider}],
			logger: createNullLogger(),
		});

		await engine.close();

		expect(close).toHaveBeenCalledTimes(1);
	});
});
