import {describe, it, expect} from 'vitest';
import {averageMetrics, computeMetrics, dcg, ndcg} from '../metrics.js';

describe('dcg', () => {
	it('discounts relevant results by rank', () => {
		expect(dcg(['a', 'b'], ['a', 'x', 'b'])).toBeCloseTo(1.5);
		expect(dcg(['a'], ['x', 'y'])).toBe(0);
	});
});

describe('ndcg', () => {
	it('is 1 for the ideal ranking', () => {
		expect(ndcg(['a', 'b'], ['b', 'a'])).toBeCloseTo(1);
	});

	it('is 0 without expected documents', () => {
		expect(ndcg([], ['a'])).toBe(0);
	});
});

describe('computeMetrics', () => {
	it('scores a partially correct ranking', () => {
		const metrics = computeMetrics(['a', 'b'], ['a', 'x', 'b']);

		expect(metrics.truePositives).toBe(2);
		expect(metrics.precision).toBeCloseTo(2 / 3);
		expect(metrics.recall).toBe(1);
		expect(metrics.f1).toBeCloseTo(0.8);
		expect(metrics.ndcg).toBeCloseTo(1.5 / (1 + 1 / Math.log2(3)));
	});

	it('scores empty result sets as zero', () => {
		expect(computeMetrics(['a'], [])).toEqual({
			ndcg: 0,
			precision: 0,
			recall: 0,
			f1: 0,
			truePositives: 0,
		});
		expect(computeMetrics([], ['a'])).toMatchObject({precision: 0, recall: 0});
	});
});

describe('averageMetrics', () => {
	it('averages each metric', () => {
		const average = averageMetrics([
			computeMetrics(['a'], ['a']),
			computeMetrics(['a'], ['b']),
		]);
		expect(average).toEqual({ndcg: 0.5, precision: 0.5, recall: 0.5, f1: 0.5});
	});

	it('is all zero for no queries', () => {
		expect(averageMetrics([])).toEqual({
			ndcg: 0,
			precision: 0,
			recall: 0,
			f1: 0,
		});
	});
});
