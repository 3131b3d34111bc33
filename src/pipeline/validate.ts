import type { CategoryTag } from "../classifier/categories.js";
import { FIELD_NAMES, type ExtractedFields, type FieldName } from "../extractor/types.js";
import { matchFieldInText } from "../matching/fuzzy-match.js";
import { isPlausibleYearRange } from "../normalizer/index.js";
import { toDirectName } from "../renderer/index.js";
import type { Issue, PunctuationCheck } from "../types.js";

/** Minimum partial ratio for a field value to count as carried into the output. */
export const PRESERVATION_THRESHOLD = 90;

interface LintRule {
	check: PunctuationCheck;
	pattern: RegExp;
	describe: string;
	accept?: (m: RegExpMatchArray) => boolean;
}

const URL_LIKE = /https?:\/\/\S+/g;

const LINT_RULES: readonly LintRule[] = [
	{ check: "missing_space_after_dash", pattern: /\. –[^\s\d]/g, describe: "no space after '. –'" },
	{ check: "missing_space_after_colon", pattern: /:[^\s/\d]/g, describe: "no space after ':'" },
	{
		check: "missing_space_after_initials",
		pattern: /(?<!\p{L})\p{L}\. \p{L}\.\p{L}/gu,
		describe: "no space between initials and surname",
	},
	{ check: "spaces_in_range", pattern: /\d(?: – |– | –)\d/g, describe: "spaces around a range dash" },
	{ check: "double_spaces", pattern: / {2,}/g, describe: "repeated spaces" },
	{
		check: "hyphen_instead_of_dash",
		pattern: /(?<!\d)(\d{4})-(\d{4})(?!\d)/g,
		describe: "hyphen in a year range",
		accept: (m) => isPlausibleYearRange(Number(m[1]), Number(m[2])),
	},
	{ check: "hyphen_in_page_range", pattern: /С\. \d+-\d+/g, describe: "hyphen in a page range" },
];

/** Punctuation checks for a finished citation. URLs are exempt. */
export function lintPunctuation(text: string): Issue[] {
	const subject = text.replace(URL_LIKE, "url");
	const issues: Issue[] = [];
	for (const rule of LINT_RULES) {
		for (const m of subject.matchAll(rule.pattern)) {
			if (rule.accept && !rule.accept(m)) continue;
			issues.push({
				code: "PunctuationViolation",
				severity: "warning",
				check: rule.check,
				match: m[0],
				message: `${rule.describe}: "${m[0]}"`,
			});
		}
	}
	return issues;
}

function expectedValues(tag: CategoryTag, field: FieldName, fields: ExtractedFields): string[] {
	const extraction = fields[field];
	if (!extraction.found) return [];
	const { value } = extraction;
	if (Array.isArray(value)) {
		const names = value.filter((v) => v.trim());
		// "[и др.]" stands in for everyone after the first author.
		return tag === "BookManyAuthors" ? names.slice(0, 1) : names;
	}
	const text = String(value).trim();
	return text ? [text] : [];
}

// A bare "2" or "5" is checked together with the marker that introduces it.
const MARKED: Partial<Record<FieldName, (value: string) => string[]>> = {
	volume: (v) => [`Т. ${v}`, `T. ${v}`, `Vol. ${v}`],
	issue: (v) => [`№ ${v}`, `No. ${v}`],
};

function candidatesFor(field: FieldName, value: string): string[] {
	if (field === "authors") return [value, toDirectName(value)];
	return MARKED[field]?.(value) ?? [value];
}

/**
 * Every found field must reach the output, verbatim or close to it. Author
 * names count in either inverted or direct order; volume and issue numbers
 * only verbatim and behind their marker.
 */
export function checkFieldPreservation(
	tag: CategoryTag,
	fields: ExtractedFields,
	output: string,
): Issue[] {
	const issues: Issue[] = [];
	for (const field of FIELD_NAMES) {
		for (const value of expectedValues(tag, field, fields)) {
			const matches = candidatesFor(field, value).map((c) => matchFieldInText(c, output));
			const kept = MARKED[field]
				? matches.some((m) => m.exact)
				: Math.max(...matches.map((m) => m.score)) >= PRESERVATION_THRESHOLD;
			if (kept) continue;
			issues.push({
				code: "FieldDropped",
				severity: "error",
				field,
				value,
				message: `${field} "${value}" does not appear in the formatted citation`,
			});
		}
	}
	return issues;
}

const TOKEN = /[\p{L}\p{N}]+/gu;

function tokens(text: string): string[] {
	return Array.from(text.toLowerCase().matchAll(TOKEN), (m) => m[0]);
}

/** Word and number tokens of `source` that never occur in `output`, in source order. */
export function lostTokens(source: string, output: string): string[] {
	const kept = new Set(tokens(output));
	const lost: string[] = [];
	for (const token of tokens(source)) {
		if (!kept.has(token) && !lost.includes(token)) lost.push(token);
	}
	return lost;
}
