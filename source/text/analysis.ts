/**
 * In-process analyzers.
 *
 * Mirrors the analyzer chain declared in the index settings (see
 * language.ts): standard-like tokenizer, lowercase, ASCII folding, then
 * either elision/stop/stem (language analyzers) or 3-grams (trigram analyzer).
 * Used by the in-memory store so tests rank with the same token streams the
 * real store produces.
 */

import fs from 'node:fs';
import path from 'node:path';
import {z} from 'zod';
import {
	getAnalysisDataDir,
	LANGUAGE_ANALYZERS,
	LANGUAGE_CODES,
	TRIGRAM_ANALYZER,
	type LanguageCode,
} from '../lib/constants.js';

// ============================================================================
// Word lists
// ============================================================================

const languageDataSchema = z.object({
	elision: z.array(z.string()),
	stopWords: z.array(z.string()),
	stemmer: z.object({
		minStemLength: z.number().int().positive(),
		rules: z.array(z.tuple([z.string().min(1), z.string()])),
	}),
});

interface LanguageData {
	elision: Set<string>;
	stopWords: Set<string>;
	minStemLength: number;
	/** Longest suffix first */
	rules: Array<[suffix: string, replacement: string]>;
}

const languageDataCache = new Map<LanguageCode, LanguageData>();

function loadLanguageData(language: LanguageCode): LanguageData {
	const cached = languageDataCache.get(language);
	if (cached) return cached;

	const file = path.join(getAnalysisDataDir(), `${language}.json`);
	const raw = languageDataSchema.parse(
		JSON.parse(fs.readFileSync(file, 'utf-8')),
	);
	const data: LanguageData = {
		elision: new Set(raw.elision),
		stopWords: new Set(raw.stopWords),
		minStemLength: raw.stemmer.minStemLength,
		rules: [...raw.stemmer.rules].sort((a, b) => b[0].length - a[0].length),
	};
	languageDataCache.set(language, data);
	return data;
}

// ============================================================================
// Token filters
// ============================================================================

const TOKEN_PATTERN = /[\p{L}\p{N}]+(?:['’][\p{L}\p{N}]+)*/gu;

/** Letters NFD does not decompose */
const FOLDING: Record<string, string> = {
	'æ': 'ae',
	'œ': 'oe',
	'ß': 'ss',
	'ø': 'o',
	'đ': 'd',
	'ł': 'l',
	'’': "'",
};

/**
 * Split on anything that is not a letter or digit; apostrophes inside a
 * word are kept (`l'eau` is one token until elision).
 */
export function tokenize(text: string): string[] {
	return text.match(TOKEN_PATTERN) ?? [];
}

/**
 * Lowercase and fold to ASCII.
 */
export function foldToken(token: string): string {
	return token
		.toLowerCase()
		.normalize('NFD')
		.replace(/\p{M}/gu, '')
		.replace(/[æœßøđł’]/g, char => FOLDING[char] ?? char);
}

function elide(token: string, articles: Set<string>): string {
	const apostrophe = token.indexOf("'");
	if (apostrophe <= 0) return token;
	return articles.has(token.slice(0, apostrophe))
		? token.slice(apostrophe + 1)
		: token;
}

/**
 * Light suffix stripping: the first (longest) matching rule wins, provided
 * the remaining stem keeps at least `minStemLength` characters.
 */
export function stem(token: string, language: LanguageCode): string {
	const {rules, minStemLength} = loadLanguageData(language);
	for (const [suffix, replacement] of rules) {
		if (!token.endsWith(suffix)) continue;
		const base = token.slice(0, token.length - suffix.length);
		if (base.length < minStemLength) return token;
		return base + replacement;
	}
	return token;
}

/**
 * All 3-character windows of a token; shorter tokens produce nothing.
 */
export function trigrams(token: string): string[] {
	const grams: string[] = [];
	for (let i = 0; i + 3 <= token.length; i++) {
		grams.push(token.slice(i, i + 3));
	}
	return grams;
}

// ============================================================================
// Analyzers
// ============================================================================

const ANALYZER_LANGUAGES = new Map<string, LanguageCode>(
	LANGUAGE_CODES.map(code => [LANGUAGE_ANALYZERS[code], code]),
);

export function isKnownAnalyzer(name: string): boolean {
	return name === TRIGRAM_ANALYZER || ANALYZER_LANGUAGES.has(name);
}

/**
 * Run a named analyzer over text and return its token stream.
 * Unknown analyzer names fall back to tokenize + fold.
 */
export function analyze(analyzerName: string, text: string): string[] {
	const folded = tokenize(text).map(foldToken);

	if (analyzerName === TRIGRAM_ANALYZER) {
		return folded.flatMap(trigrams);
	}

	const language = ANALYZER_LANGUAGES.get(analyzerName);
	if (!language) return folded;

	const data = loadLanguageData(language);
	const tokens: string[] = [];
	for (const token of folded) {
		const elided = elide(token, data.elision);
		if (!elided || data.stopWords.has(elided)) continue;
		tokens.push(stem(elided, language));
	}
	return tokens;
}
