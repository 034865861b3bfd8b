/**
 * API response shapes and error mapping.
 */

import {
	FindError,
	ForbiddenError,
	UnauthenticatedError,
	ValidationError,
} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';

export interface ApiResponse<T = unknown> {
	status: number;
	body: T;
}

export interface ErrorBody {
	detail: string;
	code: string;
	issues?: string[];
	services?: string[];
}

/**
 * Map an error to its HTTP response.
 * - 401 unauthenticated, 403 forbidden, 400 validation
 * - 503 for retryable failures (store outages)
 * - 500 for everything else; unexpected errors are logged and not echoed
 */
export function toErrorResponse(
	error: unknown,
	logger: Logger = createNullLogger(),
): ApiResponse<ErrorBody> {
	if (error instanceof UnauthenticatedError) {
		return {status: 401, body: {detail: error.message, code: error.code}};
	}
	if (error instanceof ForbiddenError) {
		return {
			status: 403,
			body: {detail: error.message, code: error.code, services: error.services},
		};
	}
	if (error instanceof ValidationError) {
		return {
			status: 400,
			body: {detail: error.message, code: error.code, issues: error.issues},
		};
	}
	if (error instanceof FindError) {
		if (!error.retryable) {
			logger.error('Api', 'Request failed', error);
		}
		return {
			status: error.retryable ? 503 : 500,
			body: {detail: error.message, code: error.code},
		};
	}

	logger.error(
		'Api',
		'Unexpected error',
		error instanceof Error ? error : new Error(String(error)),
	);
	return {
		status: 500,
		body: {detail: 'Internal server error', code: 'internal_error'},
	};
}
