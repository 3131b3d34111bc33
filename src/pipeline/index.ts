import { type CategoryTag, classify } from "../classifier/index.js";
import { type ExtractedFields, NOT_FOUND, extract } from "../extractor/index.js";
import { normalizeWithReport } from "../normalizer/index.js";
import { render } from "../renderer/index.js";
import type { Issue, Standard } from "../types.js";
import {
	type Citation,
	parseCitationRecord,
	recordToFields,
	tagForRecord,
} from "./citation.js";
import { CONFIDENCE_FLOOR, hasValue, scoreConfidence } from "./confidence.js";
import { checkFieldPreservation, lintPunctuation, lostTokens } from "./validate.js";

export interface CitationResult {
	tag: CategoryTag;
	fields: ExtractedFields;
	/** Final, normalized citation string. */
	formatted: string;
	/** Template output before normalization; may hold `{{slot}}` gaps. */
	draft: string;
	confidence: number;
	issues: Issue[];
	input: "text" | "record";
}

export interface ProcessOptions {
	standard?: Standard;
}

const PENALIZED_FIELDS = ["authors", "title", "year"] as const;

function emptyFields(): ExtractedFields {
	return {
		authors: NOT_FOUND,
		title: NOT_FOUND,
		subtitle: NOT_FOUND,
		medium: NOT_FOUND,
		year: NOT_FOUND,
		edition: NOT_FOUND,
		city: NOT_FOUND,
		publisher: NOT_FOUND,
		pages: NOT_FOUND,
		journal: NOT_FOUND,
		volume: NOT_FOUND,
		issue: NOT_FOUND,
		url: NOT_FOUND,
		accessDate: NOT_FOUND,
		doi: NOT_FOUND,
		isbn: NOT_FOUND,
		registration: NOT_FOUND,
	};
}

function detectionIssues(tag: CategoryTag, fields: ExtractedFields): Issue[] {
	const issues: Issue[] = [];
	if (tag === "Unknown") {
		issues.push({
			code: "UnrecognizedType",
			severity: "warning",
			message: "No category marker matched; using the generic layout",
		});
	}
	for (const field of PENALIZED_FIELDS) {
		if (hasValue<unknown>(fields[field])) continue;
		issues.push({
			code: "FieldNotFound",
			severity: "info",
			field,
			message: `No ${field} detected`,
		});
	}
	return issues;
}

// The source and the rendered string can report the same range at different offsets.
function dedupe(issues: Issue[]): Issue[] {
	const seen = new Set<string>();
	return issues.filter((issue) => {
		const key =
			issue.code === "AmbiguousRange" ? `${issue.code}:${issue.match}` : JSON.stringify(issue);
		if (seen.has(key)) return false;
		seen.add(key);
		return true;
	});
}

interface Assembly {
	tag: CategoryTag;
	fields: ExtractedFields;
	/** Normalized source text; only text input has one. */
	source?: string;
	issues: Issue[];
	input: CitationResult["input"];
}

function assemble(
	{ tag, fields, source, issues, input }: Assembly,
	options: ProcessOptions,
): CitationResult {
	const rendering = render(tag, fields, options);
	const normalized = normalizeWithReport(rendering.draft);
	let formatted = normalized.text;
	const collected = [
		...issues,
		...detectionIssues(tag, fields),
		...rendering.issues,
		...normalized.issues,
	];

	if (source !== undefined) {
		const lost = lostTokens(source, formatted);
		if (lost.length > 0) {
			formatted = source;
			collected.push({
				code: "UnmappedContent",
				severity: "info",
				tokens: lost,
				message: `Template could not place ${lost.length} token(s); returning the normalized source`,
			});
		}
	}

	collected.push(...checkFieldPreservation(tag, fields, formatted), ...lintPunctuation(formatted));

	return {
		tag,
		fields,
		formatted,
		draft: rendering.draft,
		confidence: scoreConfidence(tag, fields),
		issues: dedupe(collected),
		input,
	};
}

/**
 * classify -> extract -> render -> normalize -> validate for one citation.
 * Never throws: every problem is reported in `issues`.
 */
export function processCitation(citation: Citation, options: ProcessOptions = {}): CitationResult {
	if (typeof citation === "string") {
		const text = citation.trim();
		const source = normalizeWithReport(text);
		return assemble(
			{
				tag: classify(text),
				fields: extract(text),
				source: source.text,
				issues: source.issues,
				input: "text",
			},
			options,
		);
	}

	const parsed = parseCitationRecord(citation);
	if (!parsed.ok) {
		return {
			tag: "Unknown",
			fields: emptyFields(),
			formatted: "",
			draft: "",
			confidence: CONFIDENCE_FLOOR,
			issues: [
				{
					code: "InvalidInput",
					severity: "error",
					details: parsed.error.details,
					message: parsed.error.message,
				},
			],
			input: "record",
		};
	}

	const fields = recordToFields(parsed.record);
	return assemble(
		{ tag: tagForRecord(parsed.record, fields), fields, issues: [], input: "record" },
		options,
	);
}

/** Order-preserving; each item is processed independently of the others. */
export function processAll(
	citations: readonly Citation[],
	options: ProcessOptions = {},
): CitationResult[] {
	return citations.map((citation) => processCitation(citation, options));
}
