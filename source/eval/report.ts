/**
 * Plain-text rendering of an evaluation report.
 */

import type {EvaluationReport} from './harness.js';

const RULE = '='.repeat(60);

function percent(value: number): string {
	return `${(value * 100).toFixed(2)}%`;
}

export function formatReport(
	report: EvaluationReport,
	options: {details?: boolean} = {},
): string {
	const lines: string[] = [
		`Evaluation of "${report.dataset}": ${report.documents} documents, ${report.queries.length} queries` +
			(report.reindexed ? '' : ' (reused index)'),
	];

	if (options.details) {
		for (const query of report.queries) {
			lines.push(
				'',
				`q: ${query.q} [${query.mode}]`,
				`  expect: ${query.expected.join(', ')}`,
				`  result: ${query.retrieved.join(', ')}`,
				`  NDCG: ${percent(query.metrics.ndcg)}`,
				`  Precision: ${percent(query.metrics.precision)}`,
				`  Recall: ${percent(query.metrics.recall)}`,
				`  F1-score: ${percent(query.metrics.f1)}`,
			);
		}
	}

	lines.push(
		'',
		RULE,
		'Average performance',
		RULE,
		`  NDCG: ${percent(report.average.ndcg)}`,
		`  Precision: ${percent(report.average.precision)}`,
		`  Recall: ${percent(report.average.recall)}`,
		`  F1-score: ${percent(report.average.f1)}`,
	);

	return lines.join('\n');
}
