export {IndexingOrchestrator, serviceIndexName} from './indexer.js';
export type {IndexingOrchestratorOptions} from './indexer.js';
export {
	MAX_DOCUMENT_SIZE,
	createSubmissionSchema,
	formatIssues,
	parseSubmission,
	type DocumentSubmissionInput,
} from './schema.js';
export * from './types.js';
