/**
 * Evaluation Harness - measures ranking quality on a labelled dataset.
 *
 * Documents go into a dedicated evaluation index through the regular
 * indexing path; each query runs through the regular planner, then the
 * returned ids are scored against the expected ones.
 */

import type {SearchConfig} from '../lib/config.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {IndexingOrchestrator} from '../indexing/indexer.js';
import type {HybridQueryPlanner} from '../search/index.js';
import {
	FusionPipeline,
	withFusionPipeline,
	type FusionWeights,
} from '../search/hybrid.js';
import type {SearchMode} from '../search/types.js';
import type {SearchStore} from '../store/types.js';
import type {Service} from '../tenancy/types.js';
import {loadDataset, type EvaluationDataset} from './dataset.js';
import {
	averageMetrics,
	computeMetrics,
	type AverageMetrics,
	type QueryMetrics,
} from './metrics.js';

const COMPONENT = 'Evaluation';

/** Weights used for evaluation runs unless overridden */
export const EVALUATION_WEIGHTS: FusionWeights = {lexical: 0.2, semantic: 0.8};

const EVALUATION_OWNER = 'evaluation';
const EVALUATION_USER = 'evaluation-user';

export interface EvaluateOptions {
	/** Dataset directory name, or an already loaded dataset */
	dataset: string | EvaluationDataset;
	/** Hits scoring below this do not count as retrieved (default 0) */
	minScore?: number;
	/** Rebuild the index even when it already exists */
	forceReindex?: boolean;
	/** Leave the index in place after the run */
	keepIndex?: boolean;
	weights?: FusionWeights;
	/** Results fetched per query (default: configured page size) */
	size?: number;
}

export interface QueryEvaluation {
	q: string;
	expected: string[];
	/** Ids returned with a score at or above `minScore`, in rank order */
	retrieved: string[];
	mode: SearchMode;
	metrics: QueryMetrics;
}

export interface EvaluationReport {
	dataset: string;
	documents: number;
	/** Whether this run (re)built the index */
	reindexed: boolean;
	minScore: number;
	queries: QueryEvaluation[];
	average: AverageMetrics;
	elapsedMs: number;
}

export interface EvaluationHarnessOptions {
	config: SearchConfig;
	store: SearchStore;
	indexer: IndexingOrchestrator;
	planner: HybridQueryPlanner;
	logger?: Logger;
	datasetsDir?: string;
}

export class EvaluationHarness {
	private readonly config: SearchConfig;
	private readonly store: SearchStore;
	private readonly indexer: IndexingOrchestrator;
	private readonly planner: HybridQueryPlanner;
	private readonly logger: Logger;
	private readonly datasetsDir: string | undefined;
	/** Service owning the evaluation index (`<prefix>evaluation`) */
	readonly service: Service = {
		name: 'evaluation',
		clientId: 'evaluation',
		isActive: true,
		token: '',
		allowedPartners: [],
	};

	constructor(options: EvaluationHarnessOptions) {
		this.config = options.config;
		this.store = options.store;
		this.indexer = options.indexer;
		this.planner = options.planner;
		this.logger = options.logger ?? createNullLogger();
		this.datasetsDir = options.datasetsDir;
	}

	async evaluate(options: EvaluateOptions): Promise<EvaluationReport> {
		const start = Date.now();
		const dataset =
			typeof options.dataset === 'string'
				? await loadDataset(options.dataset, this.datasetsDir)
				: options.dataset;
		const minScore = options.minScore ?? 0;
		const pipeline = new FusionPipeline(
			this.config.indexPrefix,
			options.weights ?? EVALUATION_WEIGHTS,
			'evaluation-hybrid',
		);

		this.logger.info(COMPONENT, 'Starting evaluation', {
			dataset: dataset.name,
			documents: dataset.documents.length,
			queries: dataset.queries.length,
		});

		try {
			const reindexed = await this.prepareIndex(
				dataset,
				options.forceReindex ?? false,
			);

			const queries = await withFusionPipeline(this.store, pipeline, () =>
				this.runQueries(dataset, {
					minScore,
					size: options.size,
					pipeline,
				}),
			);

			const report: EvaluationReport = {
				dataset: dataset.name,
				documents: dataset.documents.length,
				reindexed,
				minScore,
				queries,
				average: averageMetrics(queries.map(q => q.metrics)),
				elapsedMs: Date.now() - start,
			};
			this.logger.info(COMPONENT, 'Evaluation completed', {
				dataset: dataset.name,
				...report.average,
			});
			return report;
		} finally {
			if (!options.keepIndex) {
				await this.indexer.dropIndex(this.service);
			}
		}
	}

	/**
	 * Index the dataset unless a previous run left the index in place.
	 */
	private async prepareIndex(
		dataset: EvaluationDataset,
		forceReindex: boolean,
	): Promise<boolean> {
		const exists = await this.indexer.hasIndex(this.service);
		if (exists && !forceReindex) {
			this.logger.info(COMPONENT, 'Reusing evaluation index');
			return false;
		}
		if (exists) {
			await this.indexer.dropIndex(this.service);
		}

		const results = await this.indexer.indexMany(
			this.service,
			dataset.documents.map(doc => ({
				...doc,
				reach: 'public',
				owner: EVALUATION_OWNER,
			})),
		);
		const failed = results.filter(r => r.status === 'error');
		if (failed.length > 0) {
			this.logger.warn(COMPONENT, 'Some documents were not indexed', {
				failed: failed.length,
				ids: failed.map(r => r.id),
			});
		}
		return true;
	}

	private async runQueries(
		dataset: EvaluationDataset,
		args: {minScore: number; size?: number; pipeline: FusionPipeline},
	): Promise<QueryEvaluation[]> {
		const evaluations: QueryEvaluation[] = [];

		for (const query of dataset.queries) {
			const response = await this.planner.search(
				this.service,
				{
					q: query.q,
					user: {sub: EVALUATION_USER},
					minScore: args.minScore,
					size: args.size,
				},
				{pipeline: args.pipeline},
			);
			const retrieved = response.hits.map(hit => hit.id);
			const metrics = computeMetrics(query.expected, retrieved);

			this.logger.debug(COMPONENT, 'Evaluated query', {
				q: query.q,
				expected: query.expected,
				retrieved,
				...metrics,
			});
			evaluations.push({
				q: query.q,
				expected: query.expected,
				retrieved,
				mode: response.mode,
				metrics,
			});
		}

		return evaluations;
	}
}
