/**
 * Embedding Provider Types.
 *
 * Types for providers that turn text (queries or chunks) into vectors.
 */

/**
 * Embedding provider interface for generating vector embeddings.
 */
export interface EmbeddingProvider {
	/** Number of dimensions in the embedding vectors */
	readonly dimensions: number;

	/**
	 * Generate embeddings for multiple texts.
	 * @returns One vector per text, null where its batch failed
	 */
	embed(texts: string[]): Promise<Array<number[] | null>>;

	/**
	 * Generate embedding for a single text (queries).
	 * Rejects with EmbeddingUnavailableError on any failure.
	 */
	embedSingle(text: string): Promise<number[]>;

	/**
	 * Close the provider and free resources.
	 */
	close(): void;
}

/**
 * A provider bound to the vector field it fills. Documents may carry several
 * independent embeddings; the first encoder is the one queries use.
 */
export interface EmbeddingEncoder {
	field: string;
	/** Recorded on indexed chunks */
	model: string;
	provider: EmbeddingProvider;
}
