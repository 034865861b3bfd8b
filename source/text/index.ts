export {analyze, foldToken, stem, tokenize, trigrams} from './analysis.js';
export {chunk, countTokens, formatEmbeddingInput} from './chunker.js';
export {
	createLanguageDetector,
	detectLanguage,
	type Detection,
	type LanguageDetector,
} from './detect.js';
export {
	buildIndexSettings,
	languageField,
	resolveLanguage,
	trigramField,
	type VectorFieldSpec,
} from './language.js';
