/**
 * Lexical clause: language-analyzed match plus a trigram match for
 * misspellings.
 */

import {
	FIELDS,
	LANGUAGE_ANALYZERS,
	type LanguageCode,
} from '../lib/constants.js';
import type {SearchConfig} from '../lib/config.js';
import type {Query} from '../store/types.js';
import {languageField, trigramField} from '../text/language.js';

/** Title matches weigh three times content matches */
const TITLE_BOOST = 3;

/**
 * Build the full-text clause.
 *
 * The first multi_match searches the language fields; when the query
 * language is known its analyzer is used for the query text. The second
 * searches the trigram sub-fields with a reduced boost and a minimum share
 * of matching trigrams, so near-miss spellings surface and noise does not.
 */
export function buildLexicalQuery(args: {
	text: string;
	languages: readonly LanguageCode[];
	queryLanguage?: LanguageCode;
	trigrams: SearchConfig['trigrams'];
	filters: Query[];
}): Query {
	const {text, languages, queryLanguage, trigrams, filters} = args;

	const textFields = [
		...languages.map(l => `${languageField(FIELDS.TITLE, l)}^${TITLE_BOOST}`),
		...languages.map(l => languageField(FIELDS.CONTENT, l)),
	];
	const trigramFields = [
		...languages.map(l => `${trigramField(FIELDS.TITLE, l)}^${TITLE_BOOST}`),
		...languages.map(l => trigramField(FIELDS.CONTENT, l)),
	];

	return {
		bool: {
			should: [
				{
					multi_match: {
						query: text,
						fields: textFields,
						...(queryLanguage
							? {analyzer: LANGUAGE_ANALYZERS[queryLanguage]}
							: {}),
					},
				},
				{
					multi_match: {
						query: text,
						fields: trigramFields,
						boost: trigrams.boost,
						minimum_should_match: trigrams.minimumShouldMatch,
					},
				},
			],
			minimum_should_match: 1,
			filter: filters,
		},
	};
}

/**
 * Every visible document, unscored.
 */
export function buildMatchAllQuery(filters: Query[]): Query {
	return {bool: {must: [{match_all: {}}], filter: filters}};
}
