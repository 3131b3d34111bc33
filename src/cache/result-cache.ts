import { LRUCache } from "lru-cache";
import type { Citation } from "../pipeline/citation.js";
import type { CitationResult } from "../pipeline/index.js";

export interface CacheStats {
	size: number;
	hits: number;
	misses: number;
}

/** Surrounding whitespace does not change the result of text input. */
export function cacheKey(citation: Citation): string {
	return typeof citation === "string"
		? `text:${citation.trim()}`
		: `record:${JSON.stringify(citation)}`;
}

/**
 * Pipeline results for one batch, keyed by a canonical form of the input.
 * Results are mutable, so the cache keeps its own copy and every hit gets a
 * fresh one: editing one output slot never reaches another.
 */
export class ResultCache {
	private readonly cache: LRUCache<string, CitationResult>;
	private hitCount = 0;
	private missCount = 0;

	constructor(maxEntries = 1000) {
		this.cache = new LRUCache<string, CitationResult>({ max: maxEntries });
	}

	getOrCompute(citation: Citation, compute: () => CitationResult): CitationResult {
		const key = cacheKey(citation);
		const cached = this.cache.get(key);
		if (cached !== undefined) {
			this.hitCount++;
			return structuredClone(cached);
		}
		this.missCount++;
		const result = compute();
		this.cache.set(key, structuredClone(result));
		return result;
	}

	stats(): CacheStats {
		return { size: this.cache.size, hits: this.hitCount, misses: this.missCount };
	}
}
