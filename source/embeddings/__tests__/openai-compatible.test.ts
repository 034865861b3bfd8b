/**
 * Tests for the OpenAI-compatible embedding client (fetch is mocked).
 */

import {describe, it, expect, vi} from 'vitest';
import {EmbeddingUnavailableError} from '../../lib/errors.js';
import {RateLimitError, withRetry} from '../api-utils.js';
import {
	OpenAICompatibleEmbeddingProvider,
	type OpenAICompatibleOptions,
} from '../openai-compatible.js';

const API_URL = 'http://embeddings.test/v1/embeddings';

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: {'Content-Type': 'application/json'},
	});
}

function requestInputs(init: RequestInit | undefined): string[] {
	const body: unknown = JSON.parse(String(init?.body));
	if (
		typeof body === 'object' &&
		body !== null &&
		'input' in body &&
		Array.isArray(body.input)
	) {
		return body.input.map(String);
	}
	return [];
}

/** Vector [length, 0] for each input, returned in reverse order */
function lengthVectors(init: RequestInit | undefined): Response {
	const inputs = requestInputs(init);
	return jsonResponse({
		data: inputs
			.map((text, index) => ({embedding: [text.length, 0], index}))
			.reverse(),
	});
}

function createProvider(
	fetchMock: typeof fetch,
	overrides: Partial<OpenAICompatibleOptions> = {},
) {
	return new OpenAICompatibleEmbeddingProvider({
		apiUrl: API_URL,
		apiKey: ' test-secret ',
		model: 'test-model',
		dimensions: 2,
		timeoutMs: 1000,
		batchSize: 2,
		maxRetries: 2,
		retryDelayMs: 0,
		fetch: fetchMock,
		...overrides,
	});
}

describe('OpenAICompatibleEmbeddingProvider', () => {
	it('posts the model, dimensions and inputs with a bearer key', async () => {
		const fetchMock = vi.fn<typeof fetch>(async () =>
			jsonResponse({data: [{embedding: [0.1, 0.2], index: 0}]}),
		);
		const provider = createProvider(fetchMock);

		expect(await provider.embedSingle('hello')).toEqual([0.1, 0.2]);

		expect(fetchMock).toHaveBeenCalledTimes(1);
		const [url, init] = fetchMock.mock.calls[0] ?? [];
		expect(url).toBe(API_URL);
		expect(init?.method).toBe('POST');
		expect(init?.headers).toEqual({
			'Content-Type': 'application/json',
			Authorization: 'Bearer test-secret',
		});
		expect(JSON.parse(String(init?.body))).toEqual({
			input: ['hello'],
			model: 'test-model',
			dimensions: 2,
			encoding_format: 'float',
		});
	});

	it('batches inputs and restores their order', async () => {
		const fetchMock = vi.fn<typeof fetch>(async (_url, init) =>
			lengthVectors(init),
		);
		const provider = createProvider(fetchMock);

		const vectors = await provider.embed(['a', 'bb', 'ccc']);

		expect(fetchMock).toHaveBeenCalledTimes(2);
		expect(vectors).toEqual([
			[1, 0],
			[2, 0],
			[3, 0],
		]);
	});

	it('returns null for the inputs of a failed batch only', async () => {
		const fetchMock = vi.fn<typeof fetch>(async (_url, init) =>
			requestInputs(init).includes('bad')
				? jsonResponse({error: {message: 'boom'}}, 500)
				: lengthVectors(init),
		);
		const provider = createProvider(fetchMock);

		expect(await provider.embed(['a', 'bb', 'bad'])).toEqual([
			[1, 0],
			[2, 0],
			null,
		]);
	});

	it('returns an empty list without calling the API', async () => {
		const fetchMock = vi.fn<typeof fetch>();
		const provider = createProvider(fetchMock);

		expect(await provider.embed([])).toEqual([]);
		expect(fetchMock).not.toHaveBeenCalled();
	});

	it('retries rate-limited requests', async () => {
		const fetchMock = vi
			.fn<typeof fetch>()
			.mockResolvedValueOnce(jsonResponse({error: 'slow down'}, 429))
			.mockImplementation(async (_url, init) => lengthVectors(init));
		const provider = createProvider(fetchMock);

		expect(await provider.embedSingle('abcd')).toEqual([4, 0]);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it('gives up after maxRetries rate-limited attempts', async () => {
		const fetchMock = vi.fn<typeof fetch>(async () =>
			jsonResponse({error: 'slow down'}, 429),
		);
		const provider = createProvider(fetchMock);

		await expect(provider.embedSingle('x')).rejects.toBeInstanceOf(
			EmbeddingUnavailableError,
		);
		expect(fetchMock).toHaveBeenCalledTimes(3);
	});

	it('keeps rate-limit backoff within the timeout', async () => {
		const fetchMock = vi.fn<typeof fetch>(async () =>
			jsonResponse({error: 'slow down'}, 429),
		);
		const provider = createProvider(fetchMock, {
			timeoutMs: 200,
			retryDelayMs: 10_000,
		});
		const started = Date.now();

		await expect(provider.embedSingle('x')).rejects.toThrow(
			'Embedding API unavailable: Embedding API rate limited (429): slow down',
		);
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(Date.now() - started).toBeLessThan(1000);
	});

	it('does not retry other API errors', async () => {
		const fetchMock = vi.fn<typeof fetch>(async () =>
			jsonResponse({error: {message: 'bad key'}}, 401),
		);
		const provider = createProvider(fetchMock);

		await expect(provider.embedSingle('x')).rejects.toThrow(
			'Embedding API error (401): bad key',
		);
		expect(fetchMock).toHaveBeenCalledTimes(1);
	});

	it('rejects vectors of the wrong dimension', async () => {
		const fetchMock = vi.fn<typeof fetch>(async () =>
			jsonResponse({data: [{embedding: [1, 2, 3], index: 0}]}),
		);
		const provider = createProvider(fetchMock);

		await expect(provider.embedSingle('x')).rejects.toThrow(
			'Embedding dimension mismatch: expected 2',
		);
	});

	it('turns network failures into EmbeddingUnavailableError', async () => {
		const fetchMock = vi.fn<typeof fetch>(async () => {
			throw new TypeError('fetch failed');
		});
		const provider = createProvider(fetchMock);

		await expect(provider.embedSingle('x')).rejects.toThrow(
			'Embedding request failed: fetch failed',
		);
	});

	it('bounds every request with the timeout', async () => {
		const fetchMock = vi.fn<typeof fetch>(
			(_url, init) =>
				new Promise<Response>((_resolve, reject) => {
					init?.signal?.addEventListener('abort', () => {
						reject(new Error('The operation was aborted due to timeout'));
					});
				}),
		);
		const provider = createProvider(fetchMock, {timeoutMs: 20});

		await expect(provider.embedSingle('x')).rejects.toBeInstanceOf(
			EmbeddingUnavailableError,
		);
	});

	it('fails fast when no API URL is configured', async () => {
		const fetchMock = vi.fn<typeof fetch>();
		const provider = createProvider(fetchMock, {apiUrl: ''});

		await expect(provider.embedSingle('x')).rejects.toThrow(
			'Embedding API URL is not configured',
		);
		expect(fetchMock).not.toHaveBeenCalled();
	});
});

describe('withRetry', () => {
	it('only retries errors the predicate accepts', async () => {
		let attempts = 0;
		const promise = withRetry(
			async () => {
				attempts += 1;
				throw new Error('boom');
			},
			{maxRetries: 3, initialBackoffMs: 0},
		);

		await expect(promise).rejects.toThrow('boom');
		expect(attempts).toBe(1);
	});

	it('stops after maxRetries and rethrows the last error', async () => {
		let attempts = 0;
		const promise = withRetry(
			async () => {
				attempts += 1;
				throw new RateLimitError(`limited ${attempts}`);
			},
			{maxRetries: 2, initialBackoffMs: 0},
		);

		await expect(promise).rejects.toThrow('limited 3');
		expect(attempts).toBe(3);
	});

	it('does not start a backoff that would end past the deadline', async () => {
		let attempts = 0;
		const promise = withRetry(
			async () => {
				attempts += 1;
				throw new RateLimitError(`limited ${attempts}`);
			},
			{maxRetries: 5, initialBackoffMs: 400, deadline: Date.now() + 1000},
		);

		// 400ms fits, the following 800ms does not
		await expect(promise).rejects.toThrow('limited 2');
		expect(attempts).toBe(2);
	});
});
