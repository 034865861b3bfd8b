/**
 * Search store boundary.
 *
 * The engine talks to an OpenSearch-compatible store through this interface.
 * Queries use the subset of the OpenSearch query DSL the engine emits; both
 * OpenSearchStore (client) and MemoryStore (in process) accept it.
 */

// ============================================================================
// Index settings
// ============================================================================

export type MappingFieldType =
	| 'text'
	| 'keyword'
	| 'integer'
	| 'long'
	| 'date'
	| 'boolean'
	| 'knn_vector';

export interface MappingProperty {
	type?: MappingFieldType;
	analyzer?: string;
	/** Multi-fields indexing the same source value differently */
	fields?: Record<string, MappingProperty>;
	/** Object fields */
	properties?: Record<string, MappingProperty>;
	/** knn_vector only */
	dimension?: number;
	method?: Record<string, unknown>;
}

export interface IndexSettings {
	settings: Record<string, unknown>;
	mappings: {
		dynamic?: 'strict' | boolean;
		properties: Record<string, MappingProperty>;
	};
}

// ============================================================================
// Query DSL
// ============================================================================

export type TermValue = string | number | boolean;

export interface RangeCondition {
	gt?: number | string;
	gte?: number | string;
	lt?: number | string;
	lte?: number | string;
}

export interface BoolQuery {
	must?: Query[];
	should?: Query[];
	filter?: Query[];
	must_not?: Query[];
	minimum_should_match?: number;
}

export interface MultiMatchQuery {
	query: string;
	/** Field names, optionally boosted: `title.fr^3` */
	fields: string[];
	type?: 'best_fields';
	/** Query-time analyzer overriding the fields' own */
	analyzer?: string;
	boost?: number;
	/** Per-field threshold: count ("2", "-1") or percentage ("60%") */
	minimum_should_match?: string | number;
}

export interface KnnQuery {
	vector: number[];
	k: number;
	filter?: Query;
}

export type Query =
	| {match_all: Record<string, never>}
	| {term: Record<string, TermValue>}
	| {terms: Record<string, TermValue[]>}
	| {prefix: Record<string, string>}
	| {range: Record<string, RangeCondition>}
	| {bool: BoolQuery}
	| {multi_match: MultiMatchQuery}
	| {knn: Record<string, KnnQuery>}
	| {hybrid: {queries: Query[]}};

export type SortOrder = 'asc' | 'desc';

/** `_score` or a field; entries without the field sort last */
export type SortClause = Record<string, {order: SortOrder}>;

export interface SearchRequest {
	query: Query;
	size: number;
	/** Relevance when omitted; ignored by hybrid queries */
	sort?: SortClause[];
	/** Keep computing scores when sorting on a field */
	track_scores?: boolean;
	_source?: {excludes: string[]};
}

export interface SearchHit {
	/** Index the hit came from */
	index: string;
	id: string;
	score: number;
	source: Record<string, unknown>;
}

// ============================================================================
// Writes and pipelines
// ============================================================================

export interface BulkIndexOperation {
	index: string;
	id: string;
	/** Full replacement of any existing entry with the same id */
	document: Record<string, unknown>;
}

export interface BulkItemError {
	index: string;
	id: string;
	status: number;
	type: string;
	reason: string;
}

export interface WriteOptions {
	/** Make the change visible to searches before resolving */
	refresh?: boolean;
}

/**
 * Search pipeline body with a normalization phase processor.
 */
export interface SearchPipelineDefinition {
	description?: string;
	phase_results_processors: Array<{
		'normalization-processor': {
			normalization: {technique: 'min_max' | 'l2'};
			combination: {
				technique: 'arithmetic_mean' | 'geometric_mean' | 'harmonic_mean';
				parameters?: {weights: number[]};
			};
		};
	}>;
}

export interface SearchOptions {
	/** Search pipeline to run the request through (required by hybrid queries) */
	pipeline?: string;
}

// ============================================================================
// Store
// ============================================================================

export interface SearchStore {
	indexExists(index: string): Promise<boolean>;
	/** Resolves false when the index already existed */
	createIndex(index: string, settings: IndexSettings): Promise<boolean>;
	/** Resolves false when there was nothing to delete */
	deleteIndex(index: string): Promise<boolean>;
	refresh(indices: string[]): Promise<void>;

	putPipeline(id: string, definition: SearchPipelineDefinition): Promise<void>;
	/** Resolves false when there was nothing to delete */
	deletePipeline(id: string): Promise<boolean>;

	/** Resolves with the items the store rejected (empty on full success) */
	bulkUpsert(
		operations: BulkIndexOperation[],
		options?: WriteOptions,
	): Promise<BulkItemError[]>;
	/** Missing indices are ignored; resolves with the number of deleted entries */
	deleteByQuery(
		indices: string[],
		query: Query,
		options?: WriteOptions,
	): Promise<number>;
	/** Missing indices are ignored */
	search(
		indices: string[],
		request: SearchRequest,
		options?: SearchOptions,
	): Promise<SearchHit[]>;

	/** Release connections, where the store holds any */
	close?(): Promise<void>;
}
