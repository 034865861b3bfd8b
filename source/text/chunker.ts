/**
 * Chunker - splits document content into overlapping, embeddable segments.
 *
 * Tokens are whitespace-delimited words. Content is split at paragraph
 * breaks first, then sentence ends, then word boundaries; the pieces are
 * packed greedily up to the chunk size and each chunk after the first
 * starts with the trailing tokens of its predecessor.
 *
 * Output depends only on the input and parameters, so re-indexing the
 * same content yields the same chunk ids.
 */

import {ValidationError} from '../lib/errors.js';
import type {LanguageCode} from '../lib/constants.js';

const PARAGRAPH_BREAK = /\n\s*\n/;

export function countTokens(text: string): number {
	return splitTokens(text).length;
}

function splitTokens(text: string): string[] {
	return text.split(/\s+/).filter(Boolean);
}

function splitSentences(text: string, languageCode: LanguageCode): string[] {
	const segmenter = new Intl.Segmenter(languageCode, {
		granularity: 'sentence',
	});
	return Array.from(segmenter.segment(text), s => s.segment.trim()).filter(
		Boolean,
	);
}

/**
 * Break text into pieces of at most `maxTokens` tokens, using the coarsest
 * boundary that works.
 */
function splitToFit(
	text: string,
	languageCode: LanguageCode,
	maxTokens: number,
): string[] {
	if (countTokens(text) <= maxTokens) return [text];

	const paragraphs = text
		.split(PARAGRAPH_BREAK)
		.map(p => p.trim())
		.filter(Boolean);
	if (paragraphs.length > 1) {
		return paragraphs.flatMap(p => splitToFit(p, languageCode, maxTokens));
	}

	const sentences = splitSentences(text, languageCode);
	if (sentences.length > 1) {
		return sentences.flatMap(s => splitToFit(s, languageCode, maxTokens));
	}

	const tokens = splitTokens(text);
	const pieces: string[] = [];
	for (let i = 0; i < tokens.length; i += maxTokens) {
		pieces.push(tokens.slice(i, i + maxTokens).join(' '));
	}
	return pieces;
}

/**
 * Split `text` into chunks of at most `maxChunkTokens` tokens.
 *
 * Text that fits in one chunk comes back as a single trimmed chunk; empty
 * text comes back as one empty chunk (the title then carries the document).
 */
export function chunk(
	text: string,
	languageCode: LanguageCode,
	maxChunkTokens: number,
	overlapTokens: number,
): string[] {
	if (!Number.isInteger(maxChunkTokens) || maxChunkTokens < 1) {
		throw new ValidationError([
			`maxChunkTokens: must be a positive integer (got ${maxChunkTokens})`,
		]);
	}
	if (!Number.isInteger(overlapTokens) || overlapTokens < 0) {
		throw new ValidationError([
			`overlapTokens: must be a non-negative integer (got ${overlapTokens})`,
		]);
	}
	if (overlapTokens >= maxChunkTokens) {
		throw new ValidationError([
			`overlapTokens: must be lower than maxChunkTokens (${overlapTokens} >= ${maxChunkTokens})`,
		]);
	}

	const trimmed = text.trim();
	if (countTokens(trimmed) <= maxChunkTokens) {
		return [trimmed];
	}

	const chunks: string[] = [];
	let current: string[] = [];

	for (const piece of splitToFit(trimmed, languageCode, maxChunkTokens)) {
		const pieceTokens = splitTokens(piece);

		if (
			current.length > 0 &&
			current.length + pieceTokens.length > maxChunkTokens
		) {
			chunks.push(current.join(' '));
			current = overlapTokens > 0 ? current.slice(-overlapTokens) : [];
			// Shorten the overlap when it would push the piece over the limit
			const excess = current.length + pieceTokens.length - maxChunkTokens;
			if (excess > 0) {
				current = current.slice(excess);
			}
		}

		current.push(...pieceTokens);
	}

	if (current.length > 0) {
		chunks.push(current.join(' '));
	}

	return chunks;
}

/**
 * Text sent to the embedding provider for a chunk, and to the reranker for
 * a hit: `<title>:<text>`.
 */
export function formatEmbeddingInput(title: string, text: string): string {
	return `<${title}>:<${text}>`;
}
