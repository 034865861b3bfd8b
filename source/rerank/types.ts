/**
 * Reranker types.
 */

/**
 * Scores documents against a query with a cross-encoder model.
 */
export interface Reranker {
	/**
	 * Relevance of each document, in input order.
	 * Throws RerankUnavailableError when the model cannot be reached.
	 */
	rerank(query: string, documents: string[]): Promise<number[]>;
}
