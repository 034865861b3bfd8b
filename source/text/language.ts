/**
 * Language resolution and index settings.
 *
 * Every index carries one analyzer per supported language plus a trigram
 * analyzer. Text fields are objects keyed by language (`title.fr`,
 * `content.en`); each language field has a `.trigrams` sub-field.
 */

import {
	FIELDS,
	LANGUAGE_ANALYZERS,
	TRIGRAM_ANALYZER,
	isLanguageCode,
	type LanguageCode,
} from '../lib/constants.js';
import type {SearchConfig} from '../lib/config.js';
import type {IndexSettings, MappingProperty} from '../store/types.js';

/**
 * Pick the language of a document or query.
 *
 * An explicit code wins (case-insensitive, region suffix dropped: `fr-FR`
 * gives `fr`); anything missing or outside the supported set falls back to
 * the configured default.
 */
export function resolveLanguage(
	code: string | null | undefined,
	config: Pick<SearchConfig, 'defaultLanguage' | 'supportedLanguages'>,
): LanguageCode {
	const base = code?.trim().toLowerCase().split(/[-_]/)[0] ?? '';
	if (isLanguageCode(base) && config.supportedLanguages.includes(base)) {
		return base;
	}
	return config.defaultLanguage;
}

export function languageField(
	field: typeof FIELDS.TITLE | typeof FIELDS.CONTENT,
	language: LanguageCode,
): string {
	return `${field}.${language}`;
}

export function trigramField(
	field: typeof FIELDS.TITLE | typeof FIELDS.CONTENT,
	language: LanguageCode,
): string {
	return `${field}.${language}.trigrams`;
}

// ============================================================================
// Index settings
// ============================================================================

/**
 * A vector field to declare in the mapping, one per configured encoder.
 */
export interface VectorFieldSpec {
	field: string;
	dimensions: number;
}

const ANALYZER_FILTERS: Record<LanguageCode, string[]> = {
	fr: [
		'lowercase',
		'asciifolding',
		'french_elision',
		'french_stop',
		'french_stemmer',
	],
	en: ['lowercase', 'asciifolding', 'english_stop', 'english_stemmer'],
	de: ['lowercase', 'asciifolding', 'german_stop', 'german_stemmer'],
	nl: ['lowercase', 'asciifolding', 'dutch_stop', 'dutch_stemmer'],
};

const TOKEN_FILTERS: Record<string, Record<string, unknown>> = {
	french_elision: {
		type: 'elision',
		articles_case: true,
		articles: [
			'l',
			'm',
			't',
			'qu',
			'n',
			's',
			'j',
			'd',
			'c',
			'jusqu',
			'quoiqu',
			'lorsqu',
			'puisqu',
		],
	},
	french_stop: {type: 'stop', stopwords: '_french_'},
	french_stemmer: {type: 'stemmer', language: 'light_french'},
	english_stop: {type: 'stop', stopwords: '_english_'},
	english_stemmer: {type: 'stemmer', language: 'english'},
	german_stop: {type: 'stop', stopwords: '_german_'},
	german_stemmer: {type: 'stemmer', language: 'light_german'},
	dutch_stop: {type: 'stop', stopwords: '_dutch_'},
	dutch_stemmer: {type: 'stemmer', language: 'dutch'},
	trigram_filter: {type: 'ngram', min_gram: 3, max_gram: 3},
};

function languageTextField(language: LanguageCode): MappingProperty {
	return {
		type: 'text',
		analyzer: LANGUAGE_ANALYZERS[language],
		fields: {
			trigrams: {type: 'text', analyzer: TRIGRAM_ANALYZER},
		},
	};
}

/**
 * Settings and mapping for a service index.
 */
export function buildIndexSettings(
	languages: readonly LanguageCode[],
	vectorFields: readonly VectorFieldSpec[],
): IndexSettings {
	const analyzer: Record<string, Record<string, unknown>> = {};
	for (const language of languages) {
		analyzer[LANGUAGE_ANALYZERS[language]] = {
			type: 'custom',
			tokenizer: 'standard',
			filter: ANALYZER_FILTERS[language],
		};
	}
	analyzer[TRIGRAM_ANALYZER] = {
		type: 'custom',
		tokenizer: 'standard',
		filter: ['lowercase', 'asciifolding', 'trigram_filter'],
	};

	const title: Record<string, MappingProperty> = {};
	const content: Record<string, MappingProperty> = {};
	for (const language of languages) {
		title[language] = languageTextField(language);
		content[language] = languageTextField(language);
	}

	const properties: Record<string, MappingProperty> = {
		[FIELDS.KIND]: {type: 'keyword'},
		[FIELDS.DOCUMENT_ID]: {type: 'keyword'},
		[FIELDS.CHUNK_INDEX]: {type: 'integer'},
		[FIELDS.CHUNK_COUNT]: {type: 'integer'},
		[FIELDS.TITLE]: {properties: title},
		[FIELDS.CONTENT]: {properties: content},
		[FIELDS.LANGUAGE]: {type: 'keyword'},
		[FIELDS.REACH]: {type: 'keyword'},
		[FIELDS.OWNER]: {type: 'keyword'},
		[FIELDS.USERS]: {type: 'keyword'},
		[FIELDS.GROUPS]: {type: 'keyword'},
		[FIELDS.IS_ACTIVE]: {type: 'boolean'},
		[FIELDS.TAGS]: {type: 'keyword'},
		[FIELDS.PATH]: {type: 'keyword'},
		[FIELDS.CREATED_AT]: {type: 'date'},
		[FIELDS.UPDATED_AT]: {type: 'date'},
		[FIELDS.SIZE]: {type: 'long'},
		[FIELDS.INDEXED_AT]: {type: 'date'},
		[FIELDS.EMBEDDING_MODEL]: {type: 'keyword'},
	};
	for (const {field, dimensions} of vectorFields) {
		properties[field] = {
			type: 'knn_vector',
			dimension: dimensions,
			method: {engine: 'lucene', space_type: 'l2', name: 'hnsw'},
		};
	}

	return {
		settings: {
			index: {knn: true},
			analysis: {analyzer, filter: TOKEN_FILTERS},
		},
		mappings: {
			dynamic: 'strict',
			properties,
		},
	};
}
