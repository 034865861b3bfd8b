/**
 * Semantic clause: k-NN over a vector field.
 */

import type {Query} from '../store/types.js';

/**
 * Build the k-NN clause. Filters go inside the knn query so the store
 * picks the k neighbours among visible chunks only.
 */
export function buildKnnQuery(args: {
	field: string;
	vector: number[];
	k: number;
	filters: Query[];
}): Query {
	return {
		knn: {
			[args.field]: {
				vector: args.vector,
				k: args.k,
				filter: {bool: {filter: args.filters}},
			},
		},
	};
}
