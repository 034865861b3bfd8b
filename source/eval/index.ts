export {
	EVALUATION_WEIGHTS,
	EvaluationHarness,
	type EvaluateOptions,
	type EvaluationHarnessOptions,
	type EvaluationReport,
	type QueryEvaluation,
} from './harness.js';
export {
	loadDataset,
	parseDataset,
	type DatasetDocument,
	type DatasetQuery,
	type EvaluationDataset,
} from './dataset.js';
export {
	averageMetrics,
	computeMetrics,
	dcg,
	ndcg,
	type AverageMetrics,
	type QueryMetrics,
} from './metrics.js';
export {formatReport} from './report.js';
