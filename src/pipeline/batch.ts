import { ResultCache } from "../cache/result-cache.js";
import type { CategoryTag } from "../classifier/categories.js";
import type { Config } from "../config.js";
import { type Logger, createLogger } from "../logger.js";
import type { IssueCode, Standard } from "../types.js";
import type { Citation } from "./citation.js";
import { type CitationResult, type ProcessOptions, processCitation } from "./index.js";

export interface BatchReport {
	total: number;
	byTag: Partial<Record<CategoryTag, number>>;
	/** Mean confidence rounded to one decimal; 0 for an empty batch. */
	averageConfidence: number;
	issueCounts: Partial<Record<IssueCode, number>>;
	hits: number;
	misses: number;
}

export interface BatchOutcome {
	results: CitationResult[];
	report: BatchReport;
}

export interface BatchOptions extends ProcessOptions {
	cacheSize?: number;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
	counts[key] = (counts[key] ?? 0) + 1;
}

export function summarize(results: readonly CitationResult[], hits = 0, misses = 0): BatchReport {
	const byTag: Partial<Record<CategoryTag, number>> = {};
	const issueCounts: Partial<Record<IssueCode, number>> = {};
	let confidence = 0;
	for (const result of results) {
		increment(byTag, result.tag);
		for (const issue of result.issues) increment(issueCounts, issue.code);
		confidence += result.confidence;
	}
	const averageConfidence =
		results.length === 0 ? 0 : Math.round((confidence / results.length) * 10) / 10;
	return { total: results.length, byTag, averageConfidence, issueCounts, hits, misses };
}

/**
 * Like processAll, plus a report. Repeated inputs within the batch are
 * computed once; each output slot still gets its own copy.
 */
export function processBatch(
	citations: readonly Citation[],
	{ cacheSize = 1000, ...options }: BatchOptions = {},
): BatchOutcome {
	const cache = new ResultCache(cacheSize);
	const results = citations.map((citation) =>
		cache.getOrCompute(citation, () => processCitation(citation, options)),
	);
	const { hits, misses } = cache.stats();
	return { results, report: summarize(results, hits, misses) };
}

export interface Formatter {
	readonly standard: Standard;
	format(citation: Citation): CitationResult;
	formatAll(citations: readonly Citation[]): CitationResult[];
	formatBatch(citations: readonly Citation[]): BatchOutcome;
}

/** Bind the pipeline to a loaded configuration. */
export function createFormatter(
	config: Config,
	log: Logger = createLogger(config.LOG_LEVEL),
): Formatter {
	const standard = config.CITATION_STANDARD;
	return {
		standard,
		format(citation) {
			const result = processCitation(citation, { standard });
			log.debug(`Formatted citation as ${result.tag} (confidence ${result.confidence})`);
			return result;
		},
		formatAll(citations) {
			return citations.map((citation) => this.format(citation));
		},
		formatBatch(citations) {
			const outcome = processBatch(citations, { standard, cacheSize: config.BATCH_CACHE_SIZE });
			const { report } = outcome;
			log.info(
				`Formatted ${report.total} citation(s): average confidence ${report.averageConfidence}, cache hits ${report.hits}`,
			);
			const unknown = report.byTag.Unknown ?? 0;
			if (unknown > 0) log.warn(`${unknown} citation(s) matched no category`);
			return outcome;
		},
	};
}
