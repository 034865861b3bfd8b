/**
 * Hybrid fusion pipeline.
 *
 * Lexical and semantic sub-query scores are min-max normalized per query,
 * then combined with a weighted arithmetic mean. The store runs the fusion
 * through a named search pipeline; its id encodes the weights so that two
 * weightings never share one.
 */

import {ValidationError} from '../lib/errors.js';
import type {SearchPipelineDefinition, SearchStore} from '../store/types.js';

export interface FusionWeights {
	lexical: number;
	semantic: number;
}

const PIPELINE_VERSION = 'v1';

export class FusionPipeline {
	readonly id: string;
	readonly weights: Readonly<FusionWeights>;

	/**
	 * @param prefix - Index prefix of the deployment
	 * @param weights - Must sum to 1
	 * @param name - Distinguishes pipelines with a separate lifecycle
	 */
	constructor(prefix: string, weights: FusionWeights, name = 'hybrid') {
		const {lexical, semantic} = weights;
		if (
			lexical < 0 ||
			semantic < 0 ||
			Math.abs(lexical + semantic - 1) > 1e-6
		) {
			throw new ValidationError(
				[`weights: lexical + semantic must equal 1 (got ${lexical + semantic})`],
				'Invalid fusion weights',
			);
		}
		this.weights = Object.freeze({lexical, semantic});
		this.id =
			`${prefix}${name}-${PIPELINE_VERSION}` +
			`-l${percent(lexical)}-s${percent(semantic)}`;
	}

	/**
	 * Pipeline body. Weights follow sub-query order: lexical, then semantic.
	 */
	definition(): SearchPipelineDefinition {
		return {
			description: `Hybrid fusion (lexical ${this.weights.lexical}, semantic ${this.weights.semantic})`,
			phase_results_processors: [
				{
					'normalization-processor': {
						normalization: {technique: 'min_max'},
						combination: {
							technique: 'arithmetic_mean',
							parameters: {
								weights: [this.weights.lexical, this.weights.semantic],
							},
						},
					},
				},
			],
		};
	}
}

function percent(weight: number): number {
	return Math.round(weight * 100);
}

/**
 * Run `fn` with the pipeline installed, removing it afterwards even when
 * `fn` throws.
 */
export async function withFusionPipeline<T>(
	store: SearchStore,
	pipeline: FusionPipeline,
	fn: () => Promise<T>,
): Promise<T> {
	await store.putPipeline(pipeline.id, pipeline.definition());
	try {
		return await fn();
	} finally {
		await store.deletePipeline(pipeline.id);
	}
}
