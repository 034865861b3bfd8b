/**
 * Indexing types.
 */

import type {LanguageCode} from '../lib/constants.js';

export const REACH_VALUES = [
	'public',
	'authenticated',
	'link',
	'restricted',
] as const;

/**
 * Who may retrieve a document:
 * - public: anyone, anonymous included
 * - authenticated: any user with an identity
 * - link: users who visited the document (its id is in their `visited` list)
 * - restricted: the owner only
 *
 * The owner, the listed users and members of the listed groups always see
 * the document, whatever the reach.
 */
export type Reach = (typeof REACH_VALUES)[number];

/**
 * A validated document submission.
 */
export interface DocumentSubmission {
	/** External id, unique within the service */
	id: string;
	title: string;
	content: string;
	reach: Reach;
	/** User id (token `sub`) of the owner */
	owner: string;
	/** User ids granted access besides the owner */
	users: string[];
	/** Group slugs granted access */
	groups: string[];
	/** Inactive documents stay indexed but never match a search */
	isActive: boolean;
	languageCode?: string;
	tags: string[];
	/** Hierarchical path used for prefix filtering */
	path?: string;
	/** UTC ISO timestamps; indexing time when omitted */
	createdAt?: string;
	updatedAt?: string;
	/** Size in bytes of the source document; UTF-8 length of content when omitted */
	size?: number;
}

export interface IndexResult {
	id: string;
	/** Chunk entries written */
	chunks: number;
	/** Stale chunk entries of a previous, longer version removed */
	chunksRemoved: number;
	/** Chunks that received at least one vector */
	embedded: number;
	language: LanguageCode;
	indexedAt: string;
}

export type BulkIndexResult =
	| {index: number; id: string; status: 'success'; result: IndexResult}
	| {index: number; id: string | null; status: 'error'; message: string};

/**
 * Documents to delete. Given selectors are ANDed; values within a selector
 * are ORed.
 */
export interface DeleteSelector {
	documentIds?: string[];
	tags?: string[];
}

export interface DeleteResult {
	/** Documents removed */
	deleted: number;
	/** Chunk entries removed with them */
	chunksDeleted: number;
}
