import type { Issue } from "../types.js";

/** Private-use code point standing in for a protected "..." token. */
export const ELLIPSIS_SENTINEL = "\uE000";

export interface RuleMatch {
	match: string;
	groups: string[];
	offset: number;
	input: string;
}

/**
 * One ordered rewrite step. `pattern` must carry the `g` flag. When `guard`
 * rejects a match the text is left as is and `onSkip` may report why.
 */
export interface NormalizationRule {
	readonly name: string;
	readonly pattern: RegExp;
	readonly replacement: (m: RuleMatch) => string;
	readonly guard?: (m: RuleMatch) => boolean;
	readonly onSkip?: (m: RuleMatch) => Issue;
}

export function applyRule(rule: NormalizationRule, text: string, issues: Issue[] = []): string {
	return text.replace(rule.pattern, (match: string, ...rest: unknown[]) => {
		// replace() passes captures, then offset, then the whole input.
		const offset = rest[rest.length - 2];
		const groups = rest.slice(0, -2).map((g) => (typeof g === "string" ? g : ""));
		const m: RuleMatch = {
			match,
			groups,
			offset: typeof offset === "number" ? offset : -1,
			input: text,
		};
		if (rule.guard && !rule.guard(m)) {
			if (rule.onSkip) issues.push(rule.onSkip(m));
			return match;
		}
		return rule.replacement(m);
	});
}

// A URL's printable ASCII is shifted into the private-use block so no later rule matches it.
const URL_SHIFT = 0xf000;

export const protectUrls: NormalizationRule = {
	name: "protect-urls",
	pattern: /https?:\/\/[^\s<>"]*[^\s<>".,;:)]/g,
	replacement: ({ match }) =>
		match.replace(/[\x21-\x7e]/g, (c) => String.fromCharCode(c.charCodeAt(0) + URL_SHIFT)),
};

export const restoreUrls: NormalizationRule = {
	name: "restore-urls",
	pattern: /[\uf021-\uf07e]/g,
	replacement: ({ match }) => String.fromCharCode(match.charCodeAt(0) - URL_SHIFT),
};

export const protectEllipsis: NormalizationRule = {
	name: "protect-ellipsis",
	pattern: /(^|\s)\.\.\.(?!\.)/g,
	replacement: ({ groups }) => `${groups[0]}${ELLIPSIS_SENTINEL}`,
};

// "журн.." and "асвета.." collapse to one period; a third dot means an ellipsis.
export const collapseDoublePeriods: NormalizationRule = {
	name: "collapse-double-periods",
	pattern: /(\p{L})\.\.(?!\.)/gu,
	replacement: ({ groups }) => `${groups[0]}.`,
};

export const collapseSpaces: NormalizationRule = {
	name: "collapse-spaces",
	pattern: / {2,}/g,
	replacement: () => " ",
};

export const dashSeparatorSpace: NormalizationRule = {
	name: "dash-separator-space",
	pattern: /\. –(?=\S)(?!\d+ ?– ?\d)/g,
	replacement: () => ". – ",
};

// A shielded URL after the colon counts as a word.
export const colonSeparatorSpace: NormalizationRule = {
	name: "colon-separator-space",
	pattern: /:(?=[\p{L}\uf021-\uf07e])/gu,
	replacement: () => ": ",
};

export const MIN_RANGE_YEAR = 1990;
export const MAX_RANGE_YEAR = 2030;

export function isPlausibleYearRange(first: number, second: number): boolean {
	return MIN_RANGE_YEAR <= first && first < second && second <= MAX_RANGE_YEAR;
}

/**
 * "2015-2020" becomes "2015–2020". Anything else shaped like NNNN-NNNN
 * (catalog or standard numbers such as "7696-2024") stays as written.
 */
export const yearRangeHyphen: NormalizationRule = {
	name: "year-range-hyphen",
	pattern: /(?<![\p{L}\p{N}\/.\-–])(\d{4})-(\d{4})(?![\p{N}\-])/gu,
	guard: ({ groups }) => isPlausibleYearRange(Number(groups[0]), Number(groups[1])),
	replacement: ({ groups }) => `${groups[0]}–${groups[1]}`,
	onSkip: ({ match, offset }) => ({
		code: "AmbiguousRange",
		severity: "info",
		match,
		index: offset,
		message: `"${match}" may be a year range or a document number; left unchanged`,
	}),
};

export const tightenNumericRange: NormalizationRule = {
	name: "tighten-numeric-range",
	pattern: /(\d) ?– ?(\d)/g,
	replacement: ({ groups }) => `${groups[0]}–${groups[1]}`,
};

export const tightenPageRange: NormalizationRule = {
	name: "tighten-page-range",
	pattern: /(?<!\p{L})([СCP])\.\s*(\d+)\s*[–—-]\s*(\d+)/gu,
	replacement: ({ groups }) => `${groups[0]}. ${groups[1]}–${groups[2]}`,
};

export const initialsSpacing: NormalizationRule = {
	name: "initials-spacing",
	pattern: /(?<!\p{L})(\p{Lu})\.\s*(\p{Lu})\.\s*(?=\p{Lu}\p{Ll})/gu,
	replacement: ({ groups }) => `${groups[0]}. ${groups[1]}. `,
};

export const abbreviationSpacing: NormalizationRule = {
	name: "abbreviation-spacing",
	pattern: /(?<!\p{L})((?:[ТTС]|Вып|кн|Ч|Vol|No)\.|№)(?=\d)/gu,
	replacement: ({ groups }) => `${groups[0]} `,
};

export const stripSpaceBeforePunctuation: NormalizationRule = {
	name: "strip-space-before-punctuation",
	pattern: / +([.,])/g,
	replacement: ({ groups }) => groups[0],
};

export const restoreEllipsis: NormalizationRule = {
	name: "restore-ellipsis",
	pattern: new RegExp(ELLIPSIS_SENTINEL, "g"),
	replacement: () => "...",
};

/** Order matters: the rules do not commute. */
export const NORMALIZATION_RULES: readonly NormalizationRule[] = [
	protectUrls,
	protectEllipsis,
	collapseDoublePeriods,
	collapseSpaces,
	dashSeparatorSpace,
	colonSeparatorSpace,
	yearRangeHyphen,
	tightenNumericRange,
	tightenPageRange,
	initialsSpacing,
	abbreviationSpacing,
	stripSpaceBeforePunctuation,
	restoreEllipsis,
	restoreUrls,
];
