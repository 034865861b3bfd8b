/**
 * Indexing Orchestrator - turns submissions into tenant-scoped index entries.
 *
 * Per document: one document entry (filters, bulk deletes) plus one chunk
 * entry per chunk, written with deterministic ids so that re-indexing
 * replaces rather than duplicates. Chunks left over from a longer previous
 * version are deleted afterwards.
 *
 * Embedding failures are soft: the chunk is stored without a vector.
 * Store failures surface as SearchStoreUnavailableError for the whole
 * document; the caller resubmits.
 */

import {chunkUnitId, FIELDS, type LanguageCode} from '../lib/constants.js';
import type {SearchConfig} from '../lib/config.js';
import {
	EmbeddingUnavailableError,
	FindError,
	SearchStoreUnavailableError,
	ValidationError,
	errorMessage,
} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import type {EmbeddingEncoder} from '../embeddings/types.js';
import type {BulkIndexOperation, Query, SearchStore} from '../store/types.js';
import type {Service} from '../tenancy/types.js';
import {chunk, formatEmbeddingInput} from '../text/chunker.js';
import type {LanguageDetector} from '../text/detect.js';
import {
	buildIndexSettings,
	resolveLanguage,
	type VectorFieldSpec,
} from '../text/language.js';
import {createSubmissionSchema, parseSubmission} from './schema.js';
import type {
	BulkIndexResult,
	DeleteResult,
	DeleteSelector,
	DocumentSubmission,
	IndexResult,
} from './types.js';

const COMPONENT = 'Indexer';

export interface IndexingOrchestratorOptions {
	config: SearchConfig;
	store: SearchStore;
	/** Vector encoders; empty for lexical-only indexing */
	encoders?: EmbeddingEncoder[];
	logger?: Logger;
	/** Clock used for `indexed_at` and timestamp validation */
	now?: () => Date;
	/** Language of submissions that name none; defaultLanguage when absent */
	detectLanguage?: LanguageDetector;
}

/**
 * Index name of a service.
 */
export function serviceIndexName(
	config: Pick<SearchConfig, 'indexPrefix'>,
	serviceName: string,
): string {
	return `${config.indexPrefix}${serviceName}`;
}

export class IndexingOrchestrator {
	private readonly config: SearchConfig;
	private readonly store: SearchStore;
	private readonly encoders: EmbeddingEncoder[];
	private readonly logger: Logger;
	private readonly now: () => Date;
	private readonly detectLanguage: LanguageDetector | undefined;
	/** Index name -> provisioning promise; dropped on failure */
	private readonly ensuredIndices = new Map<string, Promise<void>>();

	constructor(options: IndexingOrchestratorOptions) {
		this.config = options.config;
		this.store = options.store;
		this.encoders = options.encoders ?? [];
		this.logger = options.logger ?? createNullLogger();
		this.now = options.now ?? (() => new Date());
		this.detectLanguage = options.detectLanguage;
	}

	/**
	 * Submission schema at the orchestrator's clock.
	 */
	submissionSchema() {
		return createSubmissionSchema(this.now());
	}

	indexName(service: Pick<Service, 'name'>): string {
		return serviceIndexName(this.config, service.name);
	}

	/**
	 * Index (or re-index) one document.
	 */
	async index(
		service: Pick<Service, 'name'>,
		submission: unknown,
	): Promise<IndexResult> {
		const now = this.now();
		const doc = parseSubmission(submission, now);
		const indexName = this.indexName(service);
		await this.ensureIndex(indexName);

		const language = this.languageOf(doc);
		const chunks = chunk(
			doc.content,
			language,
			this.config.chunking.maxTokens,
			this.config.chunking.overlapTokens,
		);
		const vectors = await this.embedChunks(doc, chunks);
		const indexedAt = now.toISOString();

		const operations: BulkIndexOperation[] = [
			{
				index: indexName,
				id: doc.id,
				document: this.documentEntry(doc, language, chunks.length, indexedAt),
			},
			...chunks.map((text, chunkIndex) => ({
				index: indexName,
				id: chunkUnitId(doc.id, chunkIndex),
				document: this.chunkEntry(doc, language, {
					text,
					chunkIndex,
					chunkCount: chunks.length,
					indexedAt,
					vectors: vectors.map(v => v[chunkIndex] ?? null),
				}),
			})),
		];

		const failures = await this.store.bulkUpsert(operations, {refresh: true});
		if (failures.length > 0) {
			const first = failures[0];
			const rejected = `${failures.length} of ${operations.length} entries`;
			const reason = first ? `${first.type}: ${first.reason}` : 'unknown';
			this.logger.error(
				COMPONENT,
				`Bulk write rejected ${rejected} for ${doc.id}`,
				new Error(reason),
			);
			throw new SearchStoreUnavailableError(
				`Failed to index document ${doc.id}: ${rejected} rejected` +
					(first ? ` (${reason})` : ''),
			);
		}

		const chunksRemoved = await this.store.deleteByQuery(
			[indexName],
			{
				bool: {
					filter: [
						{term: {[FIELDS.DOCUMENT_ID]: doc.id}},
						{term: {[FIELDS.KIND]: 'chunk'}},
						{range: {[FIELDS.CHUNK_INDEX]: {gte: chunks.length}}},
					],
				},
			},
			{refresh: true},
		);

		const embedded = chunks.filter((_, i) => vectors.some(v => v[i])).length;

		this.logger.debug(COMPONENT, 'Indexed document', {
			index: indexName,
			id: doc.id,
			chunks: chunks.length,
			chunksRemoved,
			embedded,
		});

		return {
			id: doc.id,
			chunks: chunks.length,
			chunksRemoved,
			embedded,
			language,
			indexedAt,
		};
	}

	/**
	 * Index several documents, reporting a status per document.
	 * Unexpected (non-engine) errors still propagate.
	 */
	async indexMany(
		service: Pick<Service, 'name'>,
		submissions: unknown[],
	): Promise<BulkIndexResult[]> {
		const results: BulkIndexResult[] = [];
		for (const [index, submission] of submissions.entries()) {
			try {
				const result = await this.index(service, submission);
				results.push({index, id: result.id, status: 'success', result});
			} catch (error) {
				if (!(error instanceof FindError)) throw error;
				results.push({
					index,
					id: submissionId(submission),
					status: 'error',
					message: error.message,
				});
			}
		}
		return results;
	}

	/**
	 * Delete documents (and their chunks) matching every given selector.
	 */
	async delete(
		service: Pick<Service, 'name'>,
		selector: DeleteSelector,
	): Promise<DeleteResult> {
		const filters: Query[] = [];
		if (selector.documentIds && selector.documentIds.length > 0) {
			filters.push({terms: {[FIELDS.DOCUMENT_ID]: selector.documentIds}});
		}
		if (selector.tags && selector.tags.length > 0) {
			filters.push({terms: {[FIELDS.TAGS]: selector.tags}});
		}
		if (filters.length === 0) {
			throw new ValidationError([
				"At least one of 'document_ids' or 'tags' must be provided",
			]);
		}

		const indexName = this.indexName(service);
		const scoped = (kind: 'document' | 'chunk'): Query => ({
			bool: {filter: [...filters, {term: {[FIELDS.KIND]: kind}}]},
		});

		// Chunks first: a failure in between leaves documents to retry against
		const chunksDeleted = await this.store.deleteByQuery(
			[indexName],
			scoped('chunk'),
			{refresh: true},
		);
		const deleted = await this.store.deleteByQuery(
			[indexName],
			scoped('document'),
			{refresh: true},
		);

		this.logger.info(COMPONENT, 'Deleted documents', {
			index: indexName,
			deleted,
			chunksDeleted,
		});
		return {deleted, chunksDeleted};
	}

	/**
	 * Whether the service index exists in the store.
	 */
	async hasIndex(service: Pick<Service, 'name'>): Promise<boolean> {
		return this.store.indexExists(this.indexName(service));
	}

	/**
	 * Drop a service index entirely (evaluation runs).
	 */
	async dropIndex(service: Pick<Service, 'name'>): Promise<boolean> {
		const indexName = this.indexName(service);
		this.ensuredIndices.delete(indexName);
		return this.store.deleteIndex(indexName);
	}

	// ==========================================================================
	// Internals
	// ==========================================================================

	/**
	 * Create the index on first use. Concurrent callers share one attempt;
	 * "already exists" counts as success.
	 */
	private ensureIndex(indexName: string): Promise<void> {
		const existing = this.ensuredIndices.get(indexName);
		if (existing) return existing;

		const pending = this.createIndexIfMissing(indexName).catch(
			(error: unknown) => {
				this.ensuredIndices.delete(indexName);
				throw error;
			},
		);
		this.ensuredIndices.set(indexName, pending);
		return pending;
	}

	private async createIndexIfMissing(indexName: string): Promise<void> {
		if (await this.store.indexExists(indexName)) return;

		const vectorFields: VectorFieldSpec[] = this.encoders.map(encoder => ({
			field: encoder.field,
			dimensions: encoder.provider.dimensions,
		}));
		const created = await this.store.createIndex(
			indexName,
			buildIndexSettings(this.config.supportedLanguages, vectorFields),
		);
		this.logger.info(
			COMPONENT,
			created ? 'Created index' : 'Index already exists',
			{index: indexName},
		);
	}

	/**
	 * The submitted language when given, else the detected one, else the
	 * default.
	 */
	private languageOf(doc: DocumentSubmission): LanguageCode {
		if (doc.languageCode !== undefined || !this.detectLanguage) {
			return resolveLanguage(doc.languageCode, this.config);
		}
		const detected = this.detectLanguage(`${doc.title}\n${doc.content}`);
		this.logger.debug(COMPONENT, 'Detected document language', {
			id: doc.id,
			language: detected ?? 'undetermined',
		});
		return detected ?? this.config.defaultLanguage;
	}

	/**
	 * One vector list per encoder, aligned with `chunks`.
	 */
	private async embedChunks(
		doc: DocumentSubmission,
		chunks: string[],
	): Promise<Array<Array<number[] | null>>> {
		const inputs = chunks.map(text => formatEmbeddingInput(doc.title, text));

		return Promise.all(
			this.encoders.map(async encoder => {
				try {
					return await encoder.provider.embed(inputs);
				} catch (error) {
					if (!(error instanceof EmbeddingUnavailableError)) throw error;
					this.logger.warn(
						COMPONENT,
						'Embedding unavailable, indexing without vectors',
						{id: doc.id, field: encoder.field, error: errorMessage(error)},
					);
					return inputs.map(() => null);
				}
			}),
		);
	}

	private baseEntry(
		doc: DocumentSubmission,
		language: LanguageCode,
		chunkCount: number,
		indexedAt: string,
	): Record<string, unknown> {
		const entry: Record<string, unknown> = {
			[FIELDS.DOCUMENT_ID]: doc.id,
			[FIELDS.CHUNK_COUNT]: chunkCount,
			[FIELDS.TITLE]: {[language]: doc.title},
			[FIELDS.LANGUAGE]: language,
			[FIELDS.REACH]: doc.reach,
			[FIELDS.OWNER]: doc.owner,
			[FIELDS.USERS]: doc.users,
			[FIELDS.GROUPS]: doc.groups,
			[FIELDS.IS_ACTIVE]: doc.isActive,
			[FIELDS.TAGS]: doc.tags,
			[FIELDS.CREATED_AT]: doc.createdAt ?? doc.updatedAt ?? indexedAt,
			[FIELDS.UPDATED_AT]: doc.updatedAt ?? indexedAt,
			[FIELDS.SIZE]: doc.size ?? Buffer.byteLength(doc.content, 'utf-8'),
			[FIELDS.INDEXED_AT]: indexedAt,
		};
		if (doc.path !== undefined) {
			entry[FIELDS.PATH] = doc.path;
		}
		return entry;
	}

	private documentEntry(
		doc: DocumentSubmission,
		language: LanguageCode,
		chunkCount: number,
		indexedAt: string,
	): Record<string, unknown> {
		return {
			[FIELDS.KIND]: 'document',
			...this.baseEntry(doc, language, chunkCount, indexedAt),
		};
	}

	private chunkEntry(
		doc: DocumentSubmission,
		language: LanguageCode,
		args: {
			text: string;
			chunkIndex: number;
			chunkCount: number;
			indexedAt: string;
			vectors: Array<number[] | null>;
		},
	): Record<string, unknown> {
		const entry: Record<string, unknown> = {
			[FIELDS.KIND]: 'chunk',
			...this.baseEntry(doc, language, args.chunkCount, args.indexedAt),
			[FIELDS.CHUNK_INDEX]: args.chunkIndex,
			[FIELDS.CONTENT]: {[language]: args.text},
		};

		this.encoders.forEach((encoder, i) => {
			const vector = args.vectors[i];
			if (!vector) return;
			entry[encoder.field] = vector;
			if (i === 0) {
				entry[FIELDS.EMBEDDING_MODEL] = encoder.model;
			}
		});
		return entry;
	}
}

function submissionId(submission: unknown): string | null {
	if (
		typeof submission === 'object' &&
		submission !== null &&
		'id' in submission &&
		typeof submission.id === 'string'
	) {
		return submission.id;
	}
	return null;
}
