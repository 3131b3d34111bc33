import { partial_ratio } from "fuzzball";

export interface FieldMatch {
	score: number; // 0-100
	classification: "high" | "medium" | "low"; // high: 90+, medium: 70-89, low: <70
	exact: boolean;
}

/**
 * Normalize text for fuzzy comparison: fold case, collapse whitespace,
 * normalize smart quotes, em/en dashes and non-breaking spaces.
 */
export function normalizeText(text: string): string {
	return (
		text
			// Smart single quotes -> straight
			.replace(/[\u2018\u2019\u201A\u201B]/g, "'")
			// Smart and angle double quotes -> straight
			.replace(/[\u201C\u201D\u201E\u201F\u00AB\u00BB]/g, '"')
			// Em-dash and en-dash -> hyphen
			.replace(/[\u2013\u2014]/g, "-")
			// Non-breaking space -> regular space
			.replace(/\u00A0/g, " ")
			.replace(/\s+/g, " ")
			.trim()
			.toLowerCase()
	);
}

function classify(score: number): FieldMatch["classification"] {
	if (score >= 90) return "high";
	if (score >= 70) return "medium";
	return "low";
}

/** Below this length a partial ratio says nothing: "2" is 100% of "2014". */
const MIN_FUZZY_LENGTH = 5;

function occursAsToken(needle: string, haystack: string): boolean {
	const escaped = needle.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
	return new RegExp(`(?<![\\p{L}\\p{N}])${escaped}(?![\\p{L}\\p{N}])`, "u").test(haystack);
}

/**
 * How well `value` survives inside `text`. A verbatim occurrence (after
 * normalization) that does not run into a neighbouring word or number scores
 * 100; otherwise the best partial ratio is used, for values long enough to
 * compare that way.
 */
export function matchFieldInText(value: string, text: string): FieldMatch {
	const needle = normalizeText(value);
	const haystack = normalizeText(text);
	if (!needle || occursAsToken(needle, haystack)) {
		return { score: 100, classification: "high", exact: true };
	}
	const score = needle.length < MIN_FUZZY_LENGTH ? 0 : partial_ratio(needle, haystack);
	return { score, classification: classify(score), exact: false };
}
