/**
 * Shared utilities for API-based embedding providers.
 *
 * Provides retry with exponential backoff and bounded batch concurrency.
 */

import pLimit from 'p-limit';
import {errorMessage} from '../lib/errors.js';
import type {Logger} from '../lib/logger.js';

// ============================================================================
// Constants
// ============================================================================

/** Batches in flight at once */
export const CONCURRENCY = 5;

/** Initial backoff (ms) */
export const INITIAL_BACKOFF_MS = 500;

/** Maximum backoff (ms) */
export const MAX_BACKOFF_MS = 8000;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * The provider asked us to slow down (HTTP 429).
 */
export class RateLimitError extends Error {
	readonly status = 429;

	constructor(message: string) {
		super(message);
		this.name = 'RateLimitError';
	}
}

export interface RetryOptions {
	/** Retries after the first attempt */
	maxRetries: number;
	initialBackoffMs?: number;
	maxBackoffMs?: number;
	/** Which errors are worth another attempt (default: rate limits only) */
	isRetriable?: (error: unknown) => boolean;
	/** Epoch ms after which no retry is started; a backoff ending past it fails now */
	deadline?: number;
	onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Execute an async function, retrying retriable errors with exponential
 * backoff. The last error is rethrown once retries are exhausted or the
 * next attempt could not start before the deadline.
 */
export async function withRetry<T>(
	fn: () => Promise<T>,
	options: RetryOptions,
): Promise<T> {
	const isRetriable =
		options.isRetriable ?? ((error: unknown) => error instanceof RateLimitError);
	const maxBackoffMs = options.maxBackoffMs ?? MAX_BACKOFF_MS;
	let backoffMs = options.initialBackoffMs ?? INITIAL_BACKOFF_MS;
	let attempt = 0;

	while (true) {
		try {
			attempt++;
			return await fn();
		} catch (error) {
			if (attempt > options.maxRetries || !isRetriable(error)) {
				throw error;
			}
			if (
				options.deadline !== undefined &&
				Date.now() + backoffMs >= options.deadline
			) {
				throw error;
			}
			options.onRetry?.(attempt, backoffMs, error);
			await sleep(backoffMs);
			backoffMs = Math.min(backoffMs * 2, maxBackoffMs);
		}
	}
}

/**
 * Process batches with p-limit sliding window concurrency.
 *
 * A failed batch does not fail the others: its items come back as null and
 * the failure is logged.
 *
 * @returns Flattened results in input order (null entries for failed batches)
 */
export async function processBatchesWithLimit<T>(
	batches: T[][],
	processBatch: (batch: T[]) => Promise<number[][]>,
	options: {concurrency?: number; logger?: Logger; component?: string} = {},
): Promise<Array<number[] | null>> {
	const limit = pLimit(options.concurrency ?? CONCURRENCY);

	const batchResults = await Promise.all(
		batches.map((batch, batchIndex) =>
			limit(async (): Promise<Array<number[] | null>> => {
				try {
					return await processBatch(batch);
				} catch (error) {
					options.logger?.warn(
						options.component ?? 'Embeddings',
						'Batch failed, continuing without vectors',
						{batchIndex, batchSize: batch.length, error: errorMessage(error)},
					);
					return Array.from({length: batch.length}, () => null);
				}
			}),
		),
	);

	return batchResults.flat();
}

/**
 * Split an array into batches of a specified size.
 */
export function chunk<T>(array: T[], size: number): T[][] {
	const batches: T[][] = [];
	for (let i = 0; i < array.length; i += size) {
		batches.push(array.slice(i, i + size));
	}
	return batches;
}
