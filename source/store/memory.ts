/**
 * MemoryStore - in-process SearchStore for tests and local runs.
 *
 * Evaluates the query subset the engine emits: bool, term, terms, prefix,
 * range, match_all, best_fields multi_match (BM25), knn (l2) and hybrid
 * queries run through a min-max / arithmetic-mean search pipeline, sorted
 * by score or by fields. Text is analyzed with the in-process analyzers
 * named in the index mapping.
 *
 * Not a general search engine: no shards, no relevance tuning knobs, and
 * filters score as constants.
 */

import {z} from 'zod';
import {analyze, isKnownAnalyzer} from '../text/analysis.js';
import {SearchStoreError} from '../lib/errors.js';
import type {
	BulkIndexOperation,
	BulkItemError,
	IndexSettings,
	KnnQuery,
	MappingFieldType,
	MappingProperty,
	MultiMatchQuery,
	Query,
	RangeCondition,
	SearchHit,
	SearchOptions,
	SearchPipelineDefinition,
	SearchRequest,
	SearchStore,
	SortClause,
	TermValue,
} from './types.js';

// BM25 parameters (Lucene defaults)
const K1 = 1.2;
const B = 0.75;

/** Floor OpenSearch gives the lowest min-max normalised score */
const MIN_NORMALIZED_SCORE = 0.001;

// ============================================================================
// Types
// ============================================================================

interface FieldDef {
	type: MappingFieldType;
	analyzer: string | undefined;
	/** Path of the source value; differs from the field path for multi-fields */
	sourcePath: string;
	dimension: number | undefined;
}

interface StoredEntry {
	id: string;
	seq: number;
	source: Record<string, unknown>;
	/** Text field -> term -> frequency */
	terms: Map<string, Map<string, number>>;
	lengths: Map<string, number>;
}

interface FieldStats {
	docCount: number;
	avgLength: number;
	docFreq: Map<string, number>;
}

interface MemoryIndex {
	settings: IndexSettings;
	fields: Map<string, FieldDef>;
	entries: Map<string, StoredEntry>;
	/** Lazily rebuilt after writes */
	stats: Map<string, FieldStats> | null;
}

interface ScoredEntry {
	indexName: string;
	indexOrder: number;
	entry: StoredEntry;
	score: number;
}

const pipelineWeightsSchema = z.object({
	phase_results_processors: z
		.array(
			z.object({
				'normalization-processor': z.object({
					combination: z.object({
						parameters: z.object({weights: z.array(z.number())}).optional(),
					}),
				}),
			}),
		)
		.min(1),
});

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flattenMapping(
	properties: Record<string, MappingProperty>,
	prefix = '',
	fields = new Map<string, FieldDef>(),
): Map<string, FieldDef> {
	for (const [name, property] of Object.entries(properties)) {
		const path = prefix + name;
		if (property.properties) {
			flattenMapping(property.properties, `${path}.`, fields);
		}
		if (!property.type) continue;

		fields.set(path, {
			type: property.type,
			analyzer: property.analyzer,
			sourcePath: path,
			dimension: property.dimension,
		});
		for (const [subName, sub] of Object.entries(property.fields ?? {})) {
			fields.set(`${path}.${subName}`, {
				type: sub.type ?? property.type,
				analyzer: sub.analyzer,
				sourcePath: path,
				dimension: undefined,
			});
		}
	}
	return fields;
}

function getPath(source: Record<string, unknown>, path: string): unknown {
	let current: unknown = source;
	for (const key of path.split('.')) {
		if (!isPlainObject(current)) return undefined;
		current = current[key];
	}
	return current;
}

function deletePath(source: Record<string, unknown>, path: string): void {
	const keys = path.split('.');
	const last = keys.pop();
	if (last === undefined) return;
	let current: unknown = source;
	for (const key of keys) {
		if (!isPlainObject(current)) return;
		current = current[key];
	}
	if (isPlainObject(current)) {
		delete current[last];
	}
}

/**
 * Leaf values of a source document, keyed by dotted path.
 */
function flattenSource(
	source: Record<string, unknown>,
	prefix = '',
	leaves: Array<[string, unknown]> = [],
): Array<[string, unknown]> {
	for (const [key, value] of Object.entries(source)) {
		const path = prefix + key;
		if (isPlainObject(value)) {
			flattenSource(value, `${path}.`, leaves);
		} else {
			leaves.push([path, value]);
		}
	}
	return leaves;
}

function toValues(value: unknown): unknown[] {
	if (value === undefined || value === null) return [];
	return Array.isArray(value) ? value : [value];
}

function sameValue(stored: unknown, expected: TermValue): boolean {
	return stored === expected || String(stored) === String(expected);
}

function compareValues(a: unknown, b: number | string): number {
	if (typeof a === 'number' && typeof b === 'number') return a - b;
	const left = String(a);
	const right = String(b);
	return left < right ? -1 : left > right ? 1 : 0;
}

function inRange(value: unknown, condition: RangeCondition): boolean {
	const {gt, gte, lt, lte} = condition;
	if (gt !== undefined && !(compareValues(value, gt) > 0)) return false;
	if (gte !== undefined && !(compareValues(value, gte) >= 0)) return false;
	if (lt !== undefined && !(compareValues(value, lt) < 0)) return false;
	if (lte !== undefined && !(compareValues(value, lte) <= 0)) return false;
	return true;
}

function parseBoostedField(field: string): {name: string; boost: number} {
	const caret = field.lastIndexOf('^');
	if (caret === -1) return {name: field, boost: 1};
	const boost = Number(field.slice(caret + 1));
	return {
		name: field.slice(0, caret),
		boost: Number.isFinite(boost) ? boost : 1,
	};
}

/**
 * Number of optional clauses that must match, OpenSearch style:
 * "60%" rounds down, negative values count the clauses allowed to miss.
 * At least one clause must always match.
 */
export function requiredMatches(
	minimumShouldMatch: string | number | undefined,
	optionalClauses: number,
): number {
	if (minimumShouldMatch === undefined) return 1;
	const text = String(minimumShouldMatch).trim();
	let result: number;
	if (text.endsWith('%')) {
		const percent = Number(text.slice(0, -1));
		const computed = Math.trunc((optionalClauses * percent) / 100);
		result = percent < 0 ? optionalClauses + computed : computed;
	} else {
		const count = Number(text);
		result = count < 0 ? optionalClauses + count : count;
	}
	return Math.max(1, result);
}

function l2Score(a: readonly number[], b: readonly number[]): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) {
		const diff = (a[i] ?? 0) - (b[i] ?? 0);
		sum += diff * diff;
	}
	return 1 / (1 + sum);
}

function isVector(value: unknown): value is number[] {
	return (
		Array.isArray(value) && value.every(item => typeof item === 'number')
	);
}

function byScore(a: ScoredEntry, b: ScoredEntry): number {
	return (
		b.score - a.score ||
		a.indexOrder - b.indexOrder ||
		a.entry.seq - b.entry.seq
	);
}

function sortValue(entry: ScoredEntry, field: string): unknown {
	if (field === '_score') return entry.score;
	return toValues(getPath(entry.entry.source, field))[0];
}

/**
 * Comparator for explicit sort clauses. Missing values go last in either
 * direction; full ties keep index then insertion order.
 */
function bySort(sort: SortClause[]) {
	return (a: ScoredEntry, b: ScoredEntry): number => {
		for (const clause of sort) {
			for (const [field, {order}] of Object.entries(clause)) {
				const left = sortValue(a, field);
				const right = sortValue(b, field);
				if (left === undefined || right === undefined) {
					if (left !== right) return left === undefined ? 1 : -1;
					continue;
				}
				const result =
					typeof left === 'number' && typeof right === 'number'
						? left - right
						: compareValues(left, String(right));
				if (result !== 0) return order === 'asc' ? result : -result;
			}
		}
		return a.indexOrder - b.indexOrder || a.entry.seq - b.entry.seq;
	};
}

// ============================================================================
// Query evaluation
// ============================================================================

/**
 * Evaluates queries against one index. Holds per-request caches (knn
 * neighbour sets), so create one per search.
 */
class IndexEvaluator {
	private readonly knnResults = new Map<KnnQuery, Map<string, number>>();

	constructor(private readonly index: MemoryIndex) {}

	/**
	 * Score of `entry` for `query`, or null when it does not match.
	 */
	score(query: Query, entry: StoredEntry): number | null {
		if ('match_all' in query) return 1;

		if ('term' in query) {
			return Object.entries(query.term).every(([field, expected]) =>
				this.values(entry, field).some(v => sameValue(v, expected)),
			)
				? 1
				: null;
		}

		if ('terms' in query) {
			return Object.entries(query.terms).every(([field, expected]) =>
				this.values(entry, field).some(v =>
					expected.some(e => sameValue(v, e)),
				),
			)
				? 1
				: null;
		}

		if ('prefix' in query) {
			return Object.entries(query.prefix).every(([field, prefix]) =>
				this.values(entry, field).some(
					v => typeof v === 'string' && v.startsWith(prefix),
				),
			)
				? 1
				: null;
		}

		if ('range' in query) {
			return Object.entries(query.range).every(([field, condition]) =>
				this.values(entry, field).some(v => inRange(v, condition)),
			)
				? 1
				: null;
		}

		if ('bool' in query) {
			const {must = [], should = [], filter = [], must_not = []} = query.bool;
			let total = 0;

			for (const clause of must) {
				const score = this.score(clause, entry);
				if (score === null) return null;
				total += score;
			}
			for (const clause of filter) {
				if (this.score(clause, entry) === null) return null;
			}
			for (const clause of must_not) {
				if (this.score(clause, entry) !== null) return null;
			}

			let matchedShould = 0;
			for (const clause of should) {
				const score = this.score(clause, entry);
				if (score === null) continue;
				matchedShould++;
				total += score;
			}
			const required =
				query.bool.minimum_should_match ??
				(should.length > 0 && must.length === 0 && filter.length === 0
					? 1
					: 0);
			return matchedShould < required ? null : total;
		}

		if ('multi_match' in query) {
			return this.multiMatch(query.multi_match, entry);
		}

		if ('knn' in query) {
			let best: number | null = null;
			for (const [field, knn] of Object.entries(query.knn)) {
				const score = this.neighbours(field, knn).get(entry.id);
				if (score === undefined) return null;
				best = Math.max(best ?? 0, score);
			}
			return best;
		}

		throw new SearchStoreError({
			status: 400,
			type: 'parsing_exception',
			message: 'hybrid queries are only allowed at the top level',
		});
	}

	private values(entry: StoredEntry, field: string): unknown[] {
		if (field === '_id') return [entry.id];
		return toValues(getPath(entry.source, field));
	}

	/**
	 * best_fields: the best scoring field wins; each field must match at
	 * least `minimum_should_match` of the query terms on its own.
	 */
	private multiMatch(query: MultiMatchQuery, entry: StoredEntry): number | null {
		let best: number | null = null;

		for (const raw of query.fields) {
			const {name, boost} = parseBoostedField(raw);
			const def = this.index.fields.get(name);
			if (!def || def.type !== 'text') continue;

			const analyzer = query.analyzer ?? def.analyzer ?? 'standard';
			const queryTerms = [...new Set(analyze(analyzer, query.query))];
			if (queryTerms.length === 0) continue;

			const termFreqs = entry.terms.get(name);
			const length = entry.lengths.get(name) ?? 0;
			if (!termFreqs || length === 0) continue;

			const stats = this.fieldStats(name);
			let matched = 0;
			let score = 0;
			for (const term of queryTerms) {
				const tf = termFreqs.get(term) ?? 0;
				if (tf === 0) continue;
				matched++;
				const df = stats.docFreq.get(term) ?? 0;
				const idf = Math.log(
					1 + (stats.docCount - df + 0.5) / (df + 0.5),
				);
				const norm = K1 * (1 - B + (B * length) / stats.avgLength);
				score += idf * (tf / (tf + norm));
			}

			const required = requiredMatches(
				query.minimum_should_match,
				queryTerms.length,
			);
			if (matched < required) {
				continue;
			}
			best = Math.max(best ?? 0, score * boost);
		}

		return best === null ? null : best * (query.boost ?? 1);
	}

	private neighbours(field: string, knn: KnnQuery): Map<string, number> {
		const cached = this.knnResults.get(knn);
		if (cached) return cached;

		const candidates: Array<{id: string; score: number; seq: number}> = [];
		for (const entry of this.index.entries.values()) {
			const vector = getPath(entry.source, field);
			if (!isVector(vector)) continue;
			if (knn.filter && this.score(knn.filter, entry) === null) continue;
			candidates.push({
				id: entry.id,
				score: l2Score(knn.vector, vector),
				seq: entry.seq,
			});
		}
		candidates.sort((a, b) => b.score - a.score || a.seq - b.seq);

		const result = new Map(
			candidates.slice(0, knn.k).map(c => [c.id, c.score] as const),
		);
		this.knnResults.set(knn, result);
		return result;
	}

	private fieldStats(field: string): FieldStats {
		if (!this.index.stats) {
			this.index.stats = new Map();
		}
		const cached = this.index.stats.get(field);
		if (cached) return cached;

		let docCount = 0;
		let totalLength = 0;
		const docFreq = new Map<string, number>();
		for (const entry of this.index.entries.values()) {
			const length = entry.lengths.get(field) ?? 0;
			if (length === 0) continue;
			docCount++;
			totalLength += length;
			for (const term of entry.terms.get(field)?.keys() ?? []) {
				docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
			}
		}

		const stats: FieldStats = {
			docCount,
			avgLength: docCount > 0 ? totalLength / docCount : 1,
			docFreq,
		};
		this.index.stats.set(field, stats);
		return stats;
	}
}

// ============================================================================
// Store
// ============================================================================

export class MemoryStore implements SearchStore {
	private readonly indices = new Map<string, MemoryIndex>();
	private readonly pipelines = new Map<string, SearchPipelineDefinition>();
	private seq = 0;

	async indexExists(index: string): Promise<boolean> {
		return this.indices.has(index);
	}

	async createIndex(index: string, settings: IndexSettings): Promise<boolean> {
		if (this.indices.has(index)) return false;

		const fields = flattenMapping(settings.mappings.properties);
		for (const [path, def] of fields) {
			if (def.analyzer && !isKnownAnalyzer(def.analyzer)) {
				throw new SearchStoreError({
					status: 400,
					type: 'mapper_parsing_exception',
					message: `analyzer [${def.analyzer}] has not been configured in mappings (field ${path})`,
				});
			}
		}

		this.indices.set(index, {
			settings: structuredClone(settings),
			fields,
			entries: new Map(),
			stats: null,
		});
		return true;
	}

	async deleteIndex(index: string): Promise<boolean> {
		return this.indices.delete(index);
	}

	async refresh(_indices: string[]): Promise<void> {
		// Writes are visible immediately
	}

	async putPipeline(
		id: string,
		definition: SearchPipelineDefinition,
	): Promise<void> {
		this.pipelines.set(id, structuredClone(definition));
	}

	async deletePipeline(id: string): Promise<boolean> {
		return this.pipelines.delete(id);
	}

	async bulkUpsert(operations: BulkIndexOperation[]): Promise<BulkItemError[]> {
		const failures: BulkItemError[] = [];

		for (const op of operations) {
			const index = this.indices.get(op.index);
			if (!index) {
				failures.push({
					index: op.index,
					id: op.id,
					status: 404,
					type: 'index_not_found_exception',
					reason: `no such index [${op.index}]`,
				});
				continue;
			}

			const problem = this.checkDocument(index, op.document);
			if (problem) {
				failures.push({index: op.index, id: op.id, status: 400, ...problem});
				continue;
			}

			index.entries.set(op.id, this.buildEntry(index, op.id, op.document));
			index.stats = null;
		}

		return failures;
	}

	async deleteByQuery(indices: string[], query: Query): Promise<number> {
		let deleted = 0;
		for (const name of indices) {
			const index = this.indices.get(name);
			if (!index) continue;

			const evaluator = new IndexEvaluator(index);
			for (const entry of [...index.entries.values()]) {
				if (evaluator.score(query, entry) === null) continue;
				index.entries.delete(entry.id);
				deleted++;
			}
			index.stats = null;
		}
		return deleted;
	}

	async search(
		indices: string[],
		request: SearchRequest,
		options: SearchOptions = {},
	): Promise<SearchHit[]> {
		const {query, size, sort} = request;
		const ranked =
			'hybrid' in query
				? this.searchHybrid(indices, query.hybrid.queries, size, options)
				: this.collect(indices, query)
						.sort(sort ? bySort(sort) : byScore)
						.slice(0, size);

		const excludes = request._source?.excludes ?? [];
		return ranked.map(({indexName, entry, score}) => {
			const source = structuredClone(entry.source);
			for (const path of excludes) {
				deletePath(source, path);
			}
			return {index: indexName, id: entry.id, score, source};
		});
	}

	// ==========================================================================
	// Inspection (tests)
	// ==========================================================================

	/** Ids stored in an index, in insertion order */
	listIds(index: string): string[] {
		return [...(this.indices.get(index)?.entries.keys() ?? [])];
	}

	getSource(index: string, id: string): Record<string, unknown> | undefined {
		const entry = this.indices.get(index)?.entries.get(id);
		return entry ? structuredClone(entry.source) : undefined;
	}

	getIndexSettings(index: string): IndexSettings | undefined {
		return this.indices.get(index)?.settings;
	}

	getPipeline(id: string): SearchPipelineDefinition | undefined {
		return this.pipelines.get(id);
	}

	listPipelines(): string[] {
		return [...this.pipelines.keys()];
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	private checkDocument(
		index: MemoryIndex,
		document: Record<string, unknown>,
	): {type: string; reason: string} | null {
		for (const [path, value] of flattenSource(document)) {
			const def = index.fields.get(path);
			if (!def || def.sourcePath !== path) {
				return {
					type: 'strict_dynamic_mapping_exception',
					reason: `mapping set to strict, dynamic introduction of [${path}] is not allowed`,
				};
			}
			if (def.type === 'knn_vector') {
				if (!isVector(value) || value.length !== def.dimension) {
					return {
						type: 'mapper_parsing_exception',
						reason: `Vector dimension mismatch for [${path}]: expected ${def.dimension}`,
					};
				}
			}
		}
		return null;
	}

	private buildEntry(
		index: MemoryIndex,
		id: string,
		document: Record<string, unknown>,
	): StoredEntry {
		const source = structuredClone(document);
		const terms = new Map<string, Map<string, number>>();
		const lengths = new Map<string, number>();

		for (const [path, def] of index.fields) {
			if (def.type !== 'text') continue;
			const texts = toValues(getPath(source, def.sourcePath)).filter(
				(v): v is string => typeof v === 'string',
			);
			if (texts.length === 0) continue;

			const freqs = new Map<string, number>();
			let length = 0;
			for (const text of texts) {
				for (const token of analyze(def.analyzer ?? 'standard', text)) {
					freqs.set(token, (freqs.get(token) ?? 0) + 1);
					length++;
				}
			}
			terms.set(path, freqs);
			lengths.set(path, length);
		}

		return {id, seq: this.seq++, source, terms, lengths};
	}

	private collect(indices: string[], query: Query): ScoredEntry[] {
		const results: ScoredEntry[] = [];
		indices.forEach((indexName, indexOrder) => {
			const index = this.indices.get(indexName);
			if (!index) return;

			const evaluator = new IndexEvaluator(index);
			for (const entry of index.entries.values()) {
				const score = evaluator.score(query, entry);
				if (score === null) continue;
				results.push({indexName, indexOrder, entry, score});
			}
		});
		return results;
	}

	/**
	 * Each sub-query keeps its top `size` hits; scores are min-max
	 * normalised per sub-query, then combined as a weighted arithmetic mean
	 * (a hit missing from a sub-query scores 0 there).
	 */
	private searchHybrid(
		indices: string[],
		queries: Query[],
		size: number,
		options: SearchOptions,
	): ScoredEntry[] {
		if (!options.pipeline) {
			throw new SearchStoreError({
				status: 400,
				type: 'illegal_argument_exception',
				message: 'hybrid query must be executed through a search pipeline',
			});
		}
		const pipeline = this.pipelines.get(options.pipeline);
		if (!pipeline) {
			throw new SearchStoreError({
				status: 404,
				type: 'resource_not_found_exception',
				message: `Pipeline ${options.pipeline} is not defined`,
			});
		}
		const weights = this.pipelineWeights(pipeline, queries.length);
		const totalWeight = weights.reduce((sum, w) => sum + w, 0) || 1;

		const combined = new Map<string, ScoredEntry>();
		queries.forEach((query, queryIndex) => {
			const top = this.collect(indices, query).sort(byScore).slice(0, size);
			if (top.length === 0) return;

			const scores = top.map(hit => hit.score);
			const max = Math.max(...scores);
			const min = Math.min(...scores);
			const weight = weights[queryIndex] ?? 0;

			for (const hit of top) {
				const normalized =
					max === min
						? 1
						: Math.max((hit.score - min) / (max - min), MIN_NORMALIZED_SCORE);
				const key = `${hit.indexName}\u0000${hit.entry.id}`;
				const current = combined.get(key) ?? {...hit, score: 0};
				current.score += (weight * normalized) / totalWeight;
				combined.set(key, current);
			}
		});

		return [...combined.values()].sort(byScore).slice(0, size);
	}

	private pipelineWeights(
		pipeline: SearchPipelineDefinition,
		queryCount: number,
	): number[] {
		const parsed = pipelineWeightsSchema.safeParse(pipeline);
		const weights = parsed.success
			? parsed.data.phase_results_processors[0]?.['normalization-processor']
					.combination.parameters?.weights
			: undefined;
		if (weights && weights.length === queryCount) return weights;
		return Array.from({length: queryCount}, () => 1 / queryCount);
	}
}
