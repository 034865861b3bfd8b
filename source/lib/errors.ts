/**
 * Error taxonomy shared by the indexing and search paths.
 *
 * Every error carries a stable `code` and whether the caller may retry the
 * same request later. Authentication, authorisation and validation failures
 * are terminal; store outages are retryable; embedding and reranker outages
 * never reach callers (they degrade to lexical-only or unreranked results).
 */

export type FindErrorCode =
	| 'unauthenticated'
	| 'forbidden'
	| 'validation_error'
	| 'embedding_unavailable'
	| 'rerank_unavailable'
	| 'store_unavailable'
	| 'store_error';

export class FindError extends Error {
	readonly code: FindErrorCode;
	readonly retryable: boolean;

	constructor(
		code: FindErrorCode,
		message: string,
		options?: {retryable?: boolean; cause?: unknown},
	) {
		super(message, {cause: options?.cause});
		this.name = 'FindError';
		this.code = code;
		this.retryable = options?.retryable ?? false;
	}
}

/**
 * No credential, or a credential matching no active service.
 */
export class UnauthenticatedError extends FindError {
	constructor(message = 'Invalid token.') {
		super('unauthenticated', message);
		this.name = 'UnauthenticatedError';
	}
}

/**
 * Valid credential asking for something outside its allow-list.
 */
export class ForbiddenError extends FindError {
	readonly services: string[];

	constructor(message: string, services: string[] = []) {
		super('forbidden', message);
		this.name = 'ForbiddenError';
		this.services = services;
	}
}

/**
 * Malformed submission, query or configuration.
 * `issues` lists every violated constraint as "path: message".
 */
export class ValidationError extends FindError {
	readonly issues: string[];

	constructor(issues: string[], message?: string) {
		super('validation_error', message ?? issues.join('; '));
		this.name = 'ValidationError';
		this.issues = issues;
	}
}

export class EmbeddingUnavailableError extends FindError {
	constructor(message: string, options?: {cause?: unknown}) {
		super('embedding_unavailable', message, {cause: options?.cause});
		this.name = 'EmbeddingUnavailableError';
	}
}

export class RerankUnavailableError extends FindError {
	constructor(message: string, options?: {cause?: unknown}) {
		super('rerank_unavailable', message, {cause: options?.cause});
		this.name = 'RerankUnavailableError';
	}
}

/**
 * Network failure, timeout or 5xx from the search store.
 */
export class SearchStoreUnavailableError extends FindError {
	constructor(message: string, options?: {cause?: unknown}) {
		super('store_unavailable', message, {
			retryable: true,
			cause: options?.cause,
		});
		this.name = 'SearchStoreUnavailableError';
	}
}

/**
 * The store understood the request and rejected it (4xx).
 */
export class SearchStoreError extends FindError {
	readonly status: number;
	readonly type: string | null;

	constructor(args: {status: number; type: string | null; message: string}) {
		super('store_error', args.message);
		this.name = 'SearchStoreError';
		this.status = args.status;
		this.type = args.type;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
