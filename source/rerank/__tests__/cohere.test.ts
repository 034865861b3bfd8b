/**
 * Tests for the Cohere reranker (the API client is faked).
 */

import {describe, it, expect, vi} from 'vitest';
import {createConfig} from '../../lib/config.js';
import {RerankUnavailableError} from '../../lib/errors.js';
import {CohereReranker, type RerankClient} from '../cohere.js';
import {createReranker} from '../index.js';

type RerankResults = Awaited<ReturnType<RerankClient['rerank']>>;

function fakeClient(respond: () => Promise<RerankResults>) {
	return {rerank: vi.fn<RerankClient['rerank']>(respond)};
}

function createRerankerWith(client: RerankClient) {
	return new CohereReranker({
		apiKey: 'test-secret',
		model: 'rerank-test',
		timeoutMs: 2500,
		client,
	});
}

describe('CohereReranker', () => {
	it('returns relevance scores in input order', async () => {
		const client = fakeClient(async () => ({
			results: [
				{index: 2, relevanceScore: 0.9},
				{index: 0, relevanceScore: 0.4},
				{index: 1, relevanceScore: 0.1},
			],
		}));
		const reranker = createRerankerWith(client);

		const scores = await reranker.rerank('budget', ['a', 'b', 'c']);

		expect(scores).toEqual([0.4, 0.1, 0.9]);
		expect(client.rerank).toHaveBeenCalledWith(
			{
				model: 'rerank-test',
				query: 'budget',
				documents: ['a', 'b', 'c'],
				topN: 3,
			},
			{timeoutInSeconds: 2.5, maxRetries: 0},
		);
	});

	it('does not call the API without documents', async () => {
		const client = fakeClient(async () => ({results: []}));
		const reranker = createRerankerWith(client);

		expect(await reranker.rerank('budget', [])).toEqual([]);
		expect(client.rerank).not.toHaveBeenCalled();
	});

	it('reports API failures as unavailable', async () => {
		const client = fakeClient(async () => {
			throw new Error('Status code: 503');
		});
		const reranker = createRerankerWith(client);

		const rejection = reranker.rerank('budget', ['a']);
		await expect(rejection).rejects.toBeInstanceOf(RerankUnavailableError);
		await expect(rejection).rejects.toThrow(
			'Rerank API unavailable: Status code: 503',
		);
	});

	it('rejects answers that leave documents unscored', async () => {
		const client = fakeClient(async () => ({
			results: [
				{index: 0, relevanceScore: 0.4},
				{index: 7, relevanceScore: 0.2},
			],
		}));
		const reranker = createRerankerWith(client);

		await expect(reranker.rerank('budget', ['a', 'b'])).rejects.toThrow(
			'Rerank API scored 1 of 2 documents',
		);
	});
});

describe('createReranker', () => {
	it('creates no reranker while reranking is disabled', () => {
		expect(createReranker(createConfig({}))).toBeUndefined();
	});

	it('creates a Cohere reranker when enabled', () => {
		const config = createConfig({
			rerank: {enabled: true, apiKey: 'test-secret'},
		});
		expect(createReranker(config)).toBeInstanceOf(CohereReranker);
	});
});
