/**
 * Constants - Languages, field names, data paths and defaults.
 */

import {fileURLToPath} from 'node:url';

// ============================================================================
// Languages
// ============================================================================

/**
 * Languages with a dedicated analyzer in every index.
 */
export const LANGUAGE_CODES = ['fr', 'en', 'de', 'nl'] as const;

export type LanguageCode = (typeof LANGUAGE_CODES)[number];

/**
 * Analyzer name per language, as declared in the index settings.
 */
export const LANGUAGE_ANALYZERS: Record<LanguageCode, string> = {
	fr: 'french_analyzer',
	en: 'english_analyzer',
	de: 'german_analyzer',
	nl: 'dutch_analyzer',
};

export const TRIGRAM_ANALYZER = 'trigram_analyzer';

export function isLanguageCode(value: string): value is LanguageCode {
	return (LANGUAGE_CODES as readonly string[]).includes(value);
}

// ============================================================================
// Index fields
// ============================================================================

/**
 * Field names of indexed units. Text fields are objects keyed by language
 * (`title.fr`, `content.en`), each with a `.trigrams` sub-field.
 */
export const FIELDS = {
	KIND: 'kind',
	DOCUMENT_ID: 'document_id',
	CHUNK_INDEX: 'chunk_index',
	CHUNK_COUNT: 'chunk_count',
	TITLE: 'title',
	CONTENT: 'content',
	LANGUAGE: 'language',
	REACH: 'reach',
	OWNER: 'owner',
	USERS: 'users',
	GROUPS: 'groups',
	IS_ACTIVE: 'is_active',
	TAGS: 'tags',
	PATH: 'path',
	CREATED_AT: 'created_at',
	UPDATED_AT: 'updated_at',
	SIZE: 'size',
	INDEXED_AT: 'indexed_at',
	EMBEDDING_MODEL: 'embedding_model',
} as const;

export type UnitKind = 'document' | 'chunk';

/**
 * Id of the chunk entry for a document.
 */
export function chunkUnitId(documentId: string, chunkIndex: number): string {
	return `${documentId}#chunk-${chunkIndex}`;
}

// ============================================================================
// Paths
// ============================================================================

/**
 * Directory holding analyzer word lists. Resolved relative to this module so
 * it works from both `source/` and the compiled `dist/`.
 */
export function getAnalysisDataDir(): string {
	return fileURLToPath(new URL('../../data/analysis/', import.meta.url));
}

/**
 * Directory holding evaluation datasets.
 */
export function getDatasetsDir(): string {
	return fileURLToPath(new URL('../../datasets/', import.meta.url));
}

// ============================================================================
// Search
// ============================================================================

/** Query text that matches every visible document */
export const MATCH_ALL_QUERY = '*';

/** Chunk hits fetched per requested document, before collapsing */
export const CANDIDATES_PER_RESULT = 4;

/** Hard cap on hits fetched from the store in one request */
export const MAX_CANDIDATES = 1000;
