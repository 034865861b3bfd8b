/**
 * Search types.
 */

import type {LanguageCode} from '../lib/constants.js';
import type {Reach} from '../indexing/types.js';

/**
 * The user on whose behalf a search runs.
 */
export interface SearchUser {
	/** Identity (token `sub`); absent for anonymous contexts */
	sub?: string;
	/** Group slugs the user belongs to */
	groups?: string[];
	/** Ids of documents the user reached through a sharing link */
	visited?: string[];
}

export const ORDER_BY_VALUES = [
	'relevance',
	'created_at',
	'updated_at',
	'size',
] as const;

export type OrderBy = (typeof ORDER_BY_VALUES)[number];

export type OrderDirection = 'asc' | 'desc';

export interface SearchQuery {
	/** Query text; `*` matches every visible document */
	q: string;
	languageCode?: string;
	/** Path prefix filter */
	path?: string;
	/** Any-of tag filter */
	tags?: string[];
	/** Only documents with exactly this reach */
	reach?: Reach;
	/** Explicit target services; default is the caller plus its partners */
	services?: string[];
	user?: SearchUser;
	/** Hits scoring below this are dropped (default 0) */
	minScore?: number;
	size?: number;
	/** Default relevance */
	orderBy?: OrderBy;
	/** Default desc */
	orderDirection?: OrderDirection;
	/** Rerank the hits; the configured default when omitted */
	rerank?: boolean;
}

export type SearchMode = 'hybrid' | 'lexical' | 'match_all';

export interface SearchResultHit {
	/** External document id */
	id: string;
	/** Service the document belongs to */
	service: string;
	score: number;
	title: string;
	/** Text of the best matching chunk */
	chunk: string;
	chunkIndex: number;
	reach: Reach;
	tags: string[];
	path: string | null;
	language: LanguageCode;
	createdAt: string;
	updatedAt: string;
	/** Size in bytes of the source document */
	size: number;
	indexedAt: string;
	/** Reranker relevance, when the hits were reranked */
	rerankScore: number | null;
}

export interface SearchResponse {
	hits: SearchResultHit[];
	mode: SearchMode;
	/** Whether the hits were reordered by the reranker */
	reranked: boolean;
	/** Services searched, caller first */
	services: string[];
	elapsedMs: number;
}
