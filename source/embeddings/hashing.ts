/**
 * Local embedding provider using signed feature hashing.
 *
 * Each folded token adds ±1 to the slot its FNV-1a hash selects (the hash's
 * top bit picks the sign); the vector is then scaled to unit length. Texts
 * sharing words get close vectors, with no model and no network, which is
 * enough for offline evaluation runs and tests. Text without tokens embeds
 * to the zero vector.
 */

import {foldToken, tokenize} from '../text/analysis.js';
import type {EmbeddingProvider} from './types.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a over UTF-16 code units.
 */
export function fnv1a(value: string): number {
	let hash = FNV_OFFSET;
	for (let i = 0; i < value.length; i++) {
		hash ^= value.charCodeAt(i);
		hash = Math.imul(hash, FNV_PRIME) >>> 0;
	}
	return hash;
}

export class HashingEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;

	constructor(dimensions: number) {
		this.dimensions = dimensions;
	}

	async embed(texts: string[]): Promise<number[][]> {
		return texts.map(text => this.vectorize(text));
	}

	async embedSingle(text: string): Promise<number[]> {
		return this.vectorize(text);
	}

	close(): void {}

	private vectorize(text: string): number[] {
		const vector = Array.from({length: this.dimensions}, () => 0);
		for (const token of tokenize(text)) {
			const hash = fnv1a(foldToken(token));
			const slot = hash % this.dimensions;
			vector[slot] = (vector[slot] ?? 0) + (hash >= 0x80000000 ? -1 : 1);
		}

		const magnitude = Math.hypot(...vector);
		return magnitude > 0 ? vector.map(v => v / magnitude) : vector;
	}
}
