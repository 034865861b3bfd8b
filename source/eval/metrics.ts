/**
 * Ranking quality metrics with binary relevance.
 */

export interface QueryMetrics {
	ndcg: number;
	precision: number;
	recall: number;
	f1: number;
	truePositives: number;
}

export type AverageMetrics = Omit<QueryMetrics, 'truePositives'>;

/**
 * Discounted cumulative gain: each relevant result at 0-based rank `r`
 * contributes 1 / log2(r + 2).
 */
export function dcg(
	expected: readonly string[],
	retrieved: readonly string[],
): number {
	const relevant = new Set(expected);
	return retrieved.reduce(
		(sum, id, rank) => sum + (relevant.has(id) ? 1 / Math.log2(rank + 2) : 0),
		0,
	);
}

/**
 * DCG normalised by the ideal ranking (every expected document first).
 */
export function ndcg(
	expected: readonly string[],
	retrieved: readonly string[],
): number {
	const ideal = dcg(expected, expected);
	return ideal > 0 ? dcg(expected, retrieved) / ideal : 0;
}

export function computeMetrics(
	expected: readonly string[],
	retrieved: readonly string[],
): QueryMetrics {
	const relevant = new Set(expected);
	const truePositives = new Set(retrieved.filter(id => relevant.has(id))).size;

	const precision =
		retrieved.length > 0 ? truePositives / retrieved.length : 0;
	const recall = relevant.size > 0 ? truePositives / relevant.size : 0;
	const f1 =
		precision + recall > 0
			? (2 * precision * recall) / (precision + recall)
			: 0;

	return {
		ndcg: ndcg([...relevant], retrieved),
		precision,
		recall,
		f1,
		truePositives,
	};
}

/**
 * Arithmetic mean of each metric; all zero for no queries.
 */
export function averageMetrics(
	metrics: readonly QueryMetrics[],
): AverageMetrics {
	const mean = (pick: (m: QueryMetrics) => number) =>
		metrics.length > 0
			? metrics.reduce((sum, m) => sum + pick(m), 0) / metrics.length
			: 0;

	return {
		ndcg: mean(m => m.ndcg),
		precision: mean(m => m.precision),
		recall: mean(m => m.recall),
		f1: mean(m => m.f1),
	};
}
