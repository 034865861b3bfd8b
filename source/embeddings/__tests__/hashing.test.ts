import {describe, it, expect} from 'vitest';
import {HashingEmbeddingProvider, fnv1a} from '../hashing.js';

describe('fnv1a', () => {
	it('matches the reference 32-bit hash', () => {
		expect(fnv1a('a')).toBe(0xe40c292c);
		expect(fnv1a('alpha')).toBe(0x5d8b6dab);
	});
});

describe('HashingEmbeddingProvider', () => {
	it('counts folded tokens into signed slots', async () => {
		const provider = new HashingEmbeddingProvider(8);

		// alpha -> slot 3 (+), beta -> slot 7 (-)
		const vector = await provider.embedSingle('Alpha, BETA álpha');

		expect(vector).toHaveLength(8);
		expect(vector[3]).toBeCloseTo(2 / Math.sqrt(5), 12);
		expect(vector[7]).toBeCloseTo(-1 / Math.sqrt(5), 12);
		expect(vector.filter(v => v !== 0)).toHaveLength(2);
	});

	it('embeds texts sharing words closer than unrelated ones', async () => {
		const provider = new HashingEmbeddingProvider(8);
		const [query, related, unrelated] = await provider.embed([
			'alpha',
			'alpha beta',
			'café chat',
		]);
		const dot = (a: number[] = [], b: number[] = []) =>
			a.reduce((sum, v, i) => sum + v * (b[i] ?? 0), 0);

		// café -> slot 0 (-), chat -> slot 3 (-)
		expect(dot(query, related)).toBeCloseTo(1 / Math.sqrt(2), 12);
		expect(dot(query, unrelated)).toBeCloseTo(-1 / Math.sqrt(2), 12);
	});

	it('embeds text without tokens to the zero vector', async () => {
		const provider = new HashingEmbeddingProvider(4);
		expect(await provider.embedSingle(' ,;! ')).toEqual([0, 0, 0, 0]);
	});
});
