import { availableParallelism } from "node:os";
import { type Logger, logger as defaultLogger } from "../logger.js";
import type { Citation, CitationRecord } from "../pipeline/citation.js";
import { type CitationResult, type ProcessOptions, processCitation } from "../pipeline/index.js";

/**
 * Turns a free-text blob too loose for the extractor into structured guesses.
 * Its output is never trusted to be normalized; it goes through the full
 * pipeline like any other record.
 */
export interface StructuringModel {
	structure(text: string): Promise<CitationRecord[]>;
}

/** Resolves a DOI or ISBN to a record, or null when nothing is known. */
export interface MetadataLookup {
	lookup(identifier: string): Promise<CitationRecord | null>;
}

export type Identifier =
	| { kind: "doi"; value: string }
	| { kind: "isbn"; value: string }
	| { kind: "unknown"; value: string };

const DOI = /^10\.\d{4,}\/\S+$/;
const DOI_PREFIX = /^(?:https?:\/\/(?:dx\.)?doi\.org\/|doi:\s*)/i;
const ISBN_13 = /^97[89]\d{10}$/;
const ISBN_10 = /^\d{9}[\dX]$/;

export function detectIdentifier(text: string): Identifier {
	const trimmed = text.trim();
	const doi = trimmed.replace(DOI_PREFIX, "");
	if (DOI.test(doi)) return { kind: "doi", value: doi };
	const isbn = trimmed.replace(/^ISBN\s*:?\s*/i, "").replace(/[-\s]/g, "").toUpperCase();
	if (ISBN_13.test(isbn) || ISBN_10.test(isbn)) return { kind: "isbn", value: isbn };
	return { kind: "unknown", value: trimmed };
}

export type Resolution<T> =
	| { status: "ok"; request: T; results: CitationResult[] }
	| { status: "failed"; request: T; error: Error }
	| { status: "cancelled"; request: T };

/** What a collaborator yields for one request: nothing, one citation, or several. */
export type Resolved = Citation | readonly Citation[] | null;

export interface ResolveOptions extends ProcessOptions {
	concurrency?: number;
	signal?: AbortSignal;
	logger?: Logger;
}

function isCitationList(value: Citation | readonly Citation[]): value is readonly Citation[] {
	return Array.isArray(value);
}

function toCitations(resolved: Resolved): readonly Citation[] {
	if (resolved === null) return [];
	return isCitationList(resolved) ? resolved : [resolved];
}

function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/**
 * Await `resolve` for every request with at most `concurrency` in flight,
 * then run the pipeline on what came back. Output order matches input
 * order. Once `signal` aborts no new request starts; requests already
 * running finish and keep their result, the rest are "cancelled".
 * Rejects with a RangeError unless `concurrency` is a positive integer.
 */
export async function resolveAll<T>(
	requests: readonly T[],
	resolve: (request: T, signal?: AbortSignal) => Promise<Resolved>,
	options: ResolveOptions = {},
): Promise<Resolution<T>[]> {
	const {
		concurrency = availableParallelism(),
		signal,
		logger = defaultLogger,
		...processOptions
	} = options;
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
	}
	const results: Resolution<T>[] = requests.map(
		(request): Resolution<T> => ({ status: "cancelled", request }),
	);
	let nextIndex = 0;

	async function worker(): Promise<void> {
		while (nextIndex < requests.length && !signal?.aborted) {
			const index = nextIndex++;
			const request = requests[index];
			if (request === undefined) continue;
			try {
				const resolved = await resolve(request, signal);
				const citations = toCitations(resolved);
				results[index] = {
					status: "ok",
					request,
					results: citations.map((citation) => processCitation(citation, processOptions)),
				};
			} catch (err) {
				const error = toError(err);
				logger.warn(`Collaborator failed for item ${index}: ${error.message}`);
				results[index] = { status: "failed", request, error };
			}
		}
	}

	const workers = Array.from({ length: Math.min(concurrency, requests.length) }, () =>
		worker(),
	);
	await Promise.all(workers);

	if (signal?.aborted) {
		const cancelled = results.filter((r) => r.status === "cancelled").length;
		logger.info(`Resolution aborted; ${cancelled} of ${requests.length} item(s) cancelled`);
	}
	return results;
}

/** Structure each blob with the model, then format every record it proposes. */
export function structureAll(
	model: StructuringModel,
	blobs: readonly string[],
	options?: ResolveOptions,
): Promise<Resolution<string>[]> {
	return resolveAll(blobs, (blob) => model.structure(blob), options);
}

/** Look each identifier up; unknown identifiers and misses yield no results. */
export function lookupAll(
	lookup: MetadataLookup,
	identifiers: readonly string[],
	options?: ResolveOptions,
): Promise<Resolution<string>[]> {
	return resolveAll(
		identifiers,
		async (identifier) => {
			const detected = detectIdentifier(identifier);
			if (detected.kind === "unknown") return null;
			return lookup.lookup(detected.value);
		},
		options,
	);
}
