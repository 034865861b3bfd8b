/**
 * Config - Engine configuration loading and validation.
 *
 * Configuration is resolved once (defaults → optional JSON file → FIND_*
 * environment variables), validated, frozen, and then handed to every
 * component constructor. Nothing reads settings from a global at call time.
 */

import fs from 'node:fs/promises';
import {z} from 'zod';
import {ValidationError} from './errors.js';
import {LANGUAGE_CODES} from './constants.js';

// ============================================================================
// Schema
// ============================================================================

const languageSchema = z.enum(LANGUAGE_CODES);

const weightSchema = z.number().min(0).max(1);

const configSchema = z
	.object({
		/** Prepended to every index and pipeline name in a shared store */
		indexPrefix: z
			.string()
			.regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be lowercase [a-z0-9_-]'),
		defaultLanguage: languageSchema,
		supportedLanguages: z.array(languageSchema).min(1),
		chunking: z.object({
			maxTokens: z.number().int().positive(),
			overlapTokens: z.number().int().nonnegative(),
		}),
		hybrid: z.object({
			enabled: z.boolean(),
			weights: z.object({
				lexical: weightSchema,
				semantic: weightSchema,
			}),
		}),
		trigrams: z.object({
			boost: z.number().nonnegative(),
			/** OpenSearch syntax: "60%", "-25%" or an absolute count "2" */
			minimumShouldMatch: z.string().regex(/^-?\d+%?$/),
		}),
		languageDetection: z.object({
			/** Detect the language of submissions that name none */
			enabled: z.boolean(),
			/** Detections less certain than this fall back to defaultLanguage */
			minConfidence: z.number().min(0).max(1),
		}),
		embedding: z.object({
			/** `hashing` embeds locally, without any API */
			provider: z.enum(['api', 'hashing']),
			apiUrl: z.string(),
			apiKey: z.string(),
			model: z.string().min(1),
			dimension: z.number().int().positive(),
			timeoutMs: z.number().int().positive(),
			batchSize: z.number().int().positive(),
			maxRetries: z.number().int().nonnegative(),
		}),
		rerank: z.object({
			enabled: z.boolean(),
			apiKey: z.string(),
			model: z.string().min(1),
			baseUrl: z.string().optional(),
			timeoutMs: z.number().int().positive(),
		}),
		store: z.object({
			url: z.string(),
			username: z.string().optional(),
			password: z.string().optional(),
			timeoutMs: z.number().int().positive(),
		}),
		search: z.object({
			defaultSize: z.number().int().positive(),
			maxSize: z.number().int().positive(),
		}),
		logging: z.object({
			dir: z.string().optional(),
			level: z.enum(['debug', 'info', 'warn', 'error']),
		}),
	})
	.superRefine((config, ctx) => {
		const {lexical, semantic} = config.hybrid.weights;
		if (Math.abs(lexical + semantic - 1) > 1e-6) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['hybrid', 'weights'],
				message: `lexical + semantic must equal 1 (got ${lexical + semantic})`,
			});
		}
		if (config.chunking.overlapTokens >= config.chunking.maxTokens) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['chunking', 'overlapTokens'],
				message: 'must be lower than chunking.maxTokens',
			});
		}
		if (!config.supportedLanguages.includes(config.defaultLanguage)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['defaultLanguage'],
				message: 'must be one of supportedLanguages',
			});
		}
		if (config.search.defaultSize > config.search.maxSize) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['search', 'defaultSize'],
				message: 'must not exceed search.maxSize',
			});
		}
	});

type DeepReadonly<T> = T extends Array<infer U>
	? ReadonlyArray<DeepReadonly<U>>
	: T extends object
		? {readonly [K in keyof T]: DeepReadonly<T[K]>}
		: T;

type RawConfig = z.infer<typeof configSchema>;

export type SearchConfig = DeepReadonly<RawConfig>;

/**
 * Shape accepted for overrides (config file, tests): every section partial.
 */
export type ConfigOverrides = {
	[K in keyof RawConfig]?: RawConfig[K] extends unknown[]
		? RawConfig[K]
		: RawConfig[K] extends object
			? Partial<RawConfig[K]>
			: RawConfig[K];
};

// ============================================================================
// Defaults
// ============================================================================

const defaults: RawConfig = {
	indexPrefix: 'find-',
	defaultLanguage: 'fr',
	supportedLanguages: [...LANGUAGE_CODES],
	chunking: {
		maxTokens: 200,
		overlapTokens: 20,
	},
	hybrid: {
		enabled: false,
		weights: {lexical: 0.3, semantic: 0.7},
	},
	trigrams: {
		boost: 0.25,
		minimumShouldMatch: '60%',
	},
	languageDetection: {
		enabled: true,
		minConfidence: 0.05,
	},
	embedding: {
		provider: 'api',
		apiUrl: '',
		apiKey: '',
		model: 'text-embedding-3-small',
		dimension: 1024,
		timeoutMs: 5000,
		batchSize: 32,
		maxRetries: 2,
	},
	rerank: {
		enabled: false,
		apiKey: '',
		model: 'rerank-v3.5',
		timeoutMs: 5000,
	},
	store: {
		url: 'http://localhost:9200',
		timeoutMs: 50_000,
	},
	search: {
		defaultSize: 20,
		maxSize: 300,
	},
	logging: {
		level: 'info',
	},
};

export const DEFAULT_CONFIG: SearchConfig = deepFreeze(defaults);

// ============================================================================
// Resolution
// ============================================================================

/**
 * Build a validated, frozen config from defaults plus overrides.
 * Throws ValidationError listing every violated constraint.
 */
export function createConfig(overrides: ConfigOverrides = {}): SearchConfig {
	return parseConfig(mergeSection(DEFAULT_CONFIG, overrides));
}

function parseConfig(merged: unknown): SearchConfig {
	const parsed = configSchema.safeParse(merged);
	if (!parsed.success) {
		throw new ValidationError(
			parsed.error.issues.map(
				issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
			),
			'Invalid configuration',
		);
	}
	return deepFreeze(parsed.data);
}

/**
 * Read FIND_* environment variables into overrides.
 * Unset variables are left to lower layers.
 */
export function overridesFromEnv(
	env: Record<string, string | undefined>,
): Record<string, unknown> {
	const str = (name: string) => {
		const value = env[name]?.trim();
		return value ? value : undefined;
	};
	const num = (name: string) => {
		const value = str(name);
		return value === undefined ? undefined : Number(value);
	};
	const bool = (name: string) => {
		const value = str(name)?.toLowerCase();
		if (value === undefined) return undefined;
		return value === 'true' || value === '1' || value === 'yes';
	};
	const list = (name: string) =>
		str(name)
			?.split(',')
			.map(item => item.trim())
			.filter(Boolean);

	const overrides: Record<string, unknown> = compact({
		indexPrefix: str('FIND_INDEX_PREFIX'),
		defaultLanguage: str('FIND_DEFAULT_LANGUAGE'),
		supportedLanguages: list('FIND_SUPPORTED_LANGUAGES'),
	});

	overrides['chunking'] = compact({
		maxTokens: num('FIND_CHUNK_MAX_TOKENS'),
		overlapTokens: num('FIND_CHUNK_OVERLAP_TOKENS'),
	});

	const weights = list('FIND_HYBRID_WEIGHTS')?.map(Number);
	overrides['hybrid'] = compact({
		enabled: bool('FIND_HYBRID_ENABLED'),
		weights:
			weights && weights.length === 2
				? {lexical: weights[0], semantic: weights[1]}
				: undefined,
	});

	overrides['trigrams'] = compact({
		boost: num('FIND_TRIGRAMS_BOOST'),
		minimumShouldMatch: str('FIND_TRIGRAMS_MINIMUM_SHOULD_MATCH'),
	});

	overrides['languageDetection'] = compact({
		enabled: bool('FIND_LANGUAGE_DETECTION_ENABLED'),
		minConfidence: num('FIND_LANGUAGE_DETECTION_MIN_CONFIDENCE'),
	});

	overrides['embedding'] = compact({
		provider: str('FIND_EMBEDDING_PROVIDER'),
		apiUrl: str('FIND_EMBEDDING_API_URL'),
		apiKey: str('FIND_EMBEDDING_API_KEY'),
		model: str('FIND_EMBEDDING_MODEL'),
		dimension: num('FIND_EMBEDDING_DIMENSION'),
		timeoutMs: num('FIND_EMBEDDING_TIMEOUT_MS'),
		batchSize: num('FIND_EMBEDDING_BATCH_SIZE'),
		maxRetries: num('FIND_EMBEDDING_MAX_RETRIES'),
	});

	overrides['rerank'] = compact({
		enabled: bool('FIND_RERANK_ENABLED'),
		apiKey: str('FIND_RERANK_API_KEY'),
		model: str('FIND_RERANK_MODEL'),
		baseUrl: str('FIND_RERANK_BASE_URL'),
		timeoutMs: num('FIND_RERANK_TIMEOUT_MS'),
	});

	overrides['store'] = compact({
		url: str('FIND_STORE_URL'),
		username: str('FIND_STORE_USERNAME'),
		password: str('FIND_STORE_PASSWORD'),
		timeoutMs: num('FIND_STORE_TIMEOUT_MS'),
	});

	overrides['search'] = compact({
		defaultSize: num('FIND_SEARCH_DEFAULT_SIZE'),
		maxSize: num('FIND_SEARCH_MAX_SIZE'),
	});

	overrides['logging'] = compact({
		dir: str('FIND_LOG_DIR'),
		level: str('FIND_LOG_LEVEL'),
	});

	return overrides;
}

export interface LoadConfigOptions {
	/** Environment to read FIND_* variables from (default: process.env) */
	env?: Record<string, string | undefined>;
	/** Optional JSON config file; FIND_CONFIG_FILE is used when omitted */
	file?: string;
}

/**
 * Load config: defaults, then the JSON file (if any), then the environment.
 *
 * IMPORTANT: a config file that exists but cannot be parsed is an error,
 * never a silent fallback to defaults (the vector dimension must match the
 * indices already in the store).
 */
export async function loadConfig(
	options: LoadConfigOptions = {},
): Promise<SearchConfig> {
	const env = options.env ?? process.env;
	const file = options.file ?? env['FIND_CONFIG_FILE']?.trim();

	let fromFile: unknown = {};
	if (file) {
		const content = await fs.readFile(file, 'utf-8');
		try {
			fromFile = JSON.parse(content);
		} catch (parseError) {
			throw new ValidationError([
				`${file}: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
			]);
		}
	}

	return parseConfig(
		mergeSection(mergeSection(DEFAULT_CONFIG, fromFile), overridesFromEnv(env)),
	);
}

// ============================================================================
// Helpers
// ============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursive merge where arrays and scalars replace, objects merge.
 * The result is validated by the schema afterwards.
 */
function mergeSection(base: unknown, override: unknown): unknown {
	if (!isPlainObject(base) || !isPlainObject(override)) {
		return override === undefined ? base : override;
	}
	const result: Record<string, unknown> = {...base};
	for (const [key, value] of Object.entries(override)) {
		if (value === undefined) continue;
		result[key] = mergeSection(result[key], value);
	}
	return result;
}

function compact(value: Record<string, unknown>): Record<string, unknown> {
	return Object.fromEntries(
		Object.entries(value).filter(([, entry]) => entry !== undefined),
	);
}

function deepFreeze<T>(value: T): T {
	if (typeof value === 'object' && value !== null) {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}
