/**
 * Filter builder for store queries.
 *
 * Converts the access rules and optional search filters into the filter
 * clauses attached to every sub-query.
 */

import {FIELDS} from '../lib/constants.js';
import type {Reach} from '../indexing/types.js';
import type {Query} from '../store/types.js';
import type {SearchUser} from './types.js';

/**
 * Visibility predicate: a document is retrievable when ANY of these holds.
 * - reach is public
 * - reach is authenticated and the user has an identity
 * - reach is link and the user visited the document
 * - the user owns the document or is listed in its users
 * - one of the user's groups is listed in its groups
 */
export function buildVisibilityFilter(user: SearchUser = {}): Query {
	const should: Query[] = [{term: {[FIELDS.REACH]: 'public'}}];

	if (user.sub) {
		should.push({term: {[FIELDS.REACH]: 'authenticated'}});
		should.push({term: {[FIELDS.OWNER]: user.sub}});
		should.push({term: {[FIELDS.USERS]: user.sub}});
	}

	const groups = [...new Set(user.groups ?? [])].sort();
	if (groups.length > 0) {
		should.push({terms: {[FIELDS.GROUPS]: groups}});
	}

	const visited = [...new Set(user.visited ?? [])].sort();
	if (visited.length > 0) {
		should.push({
			bool: {
				filter: [
					{term: {[FIELDS.REACH]: 'link'}},
					{terms: {[FIELDS.DOCUMENT_ID]: visited}},
				],
			},
		});
	}

	return {bool: {should, minimum_should_match: 1}};
}

/**
 * Every filter of a search: active chunks only, visibility, then the
 * optional reach, path prefix and any-of tags.
 */
export function buildSearchFilters(args: {
	user?: SearchUser;
	reach?: Reach;
	path?: string;
	tags?: string[];
}): Query[] {
	const filters: Query[] = [
		{term: {[FIELDS.KIND]: 'chunk'}},
		{term: {[FIELDS.IS_ACTIVE]: true}},
		buildVisibilityFilter(args.user),
	];

	if (args.reach) {
		filters.push({term: {[FIELDS.REACH]: args.reach}});
	}

	if (args.path) {
		filters.push({prefix: {[FIELDS.PATH]: args.path}});
	}

	// Logical or: matching documents carry at least one of the tags
	if (args.tags && args.tags.length > 0) {
		filters.push({terms: {[FIELDS.TAGS]: args.tags}});
	}

	return filters;
}
