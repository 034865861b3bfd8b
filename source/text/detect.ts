/**
 * Language detection for submissions that do not name their language.
 */

import {francAll} from 'franc';
import type {LanguageCode} from '../lib/constants.js';
import type {SearchConfig} from '../lib/config.js';

/** ISO 639-3 codes of the languages the engine analyzes */
const ISO_639_3: Record<LanguageCode, string> = {
	fr: 'fra',
	en: 'eng',
	de: 'deu',
	nl: 'nld',
};

/** Texts shorter than this are not classified */
const MIN_LENGTH = 10;

/** Prefix of the text used for classification */
const MAX_SAMPLE = 2048;

/**
 * Returns the detected language, or null when the text is too short, in
 * another language, or too ambiguous to tell.
 */
export type LanguageDetector = (text: string) => LanguageCode | null;

export interface Detection {
	language: LanguageCode | null;
	/** Margin of the best candidate over the runner-up, 0 to 1 */
	confidence: number;
}

/**
 * Classify `text` among `languages`. Confidence is the score gap between
 * the two best candidates.
 */
export function detectLanguage(
	text: string,
	languages: readonly LanguageCode[],
): Detection {
	const byIso = new Map(
		languages.map(language => [ISO_639_3[language], language] as const),
	);
	const ranked = francAll(text.slice(0, MAX_SAMPLE), {
		only: [...byIso.keys()],
		minLength: MIN_LENGTH,
	});

	const [best, runnerUp] = ranked;
	const language = best ? byIso.get(best[0]) : undefined;
	if (!best || !language) {
		return {language: null, confidence: 0};
	}
	return {language, confidence: best[1] - (runnerUp?.[1] ?? 0)};
}

/**
 * Detector for `config.languageDetection`; null while detection is off.
 */
export function createLanguageDetector(
	config: Pick<SearchConfig, 'languageDetection' | 'supportedLanguages'>,
): LanguageDetector | null {
	const {enabled, minConfidence} = config.languageDetection;
	if (!enabled) return null;

	return text => {
		const {language, confidence} = detectLanguage(
			text,
			config.supportedLanguages,
		);
		return language !== null && confidence >= minConfidence ? language : null;
	};
}
