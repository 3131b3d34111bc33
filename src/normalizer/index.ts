import type { Issue } from "../types.js";
import { NORMALIZATION_RULES, applyRule } from "./rules.js";

export type { NormalizationRule, RuleMatch } from "./rules.js";
export { NORMALIZATION_RULES, applyRule, isPlausibleYearRange } from "./rules.js";

export interface NormalizationReport {
	text: string;
	issues: Issue[];
	/** Names of the rules that changed the text, in first-applied order. */
	applied: string[];
}

const MAX_PASSES = 5;

function runPass(text: string, applied: Set<string>, issues: Issue[]): string {
	let current = text;
	for (const rule of NORMALIZATION_RULES) {
		const next = applyRule(rule, current, issues);
		if (next !== current) applied.add(rule.name);
		current = next;
	}
	return current;
}

/**
 * Run the ordered rule list until the text stops changing. A late rule can
 * expose a pattern an earlier one handles ("А. А .Иванов" only reaches the
 * initials rule after spaces before periods are stripped), so one pass is not
 * always a fixed point.
 */
export function normalizeWithReport(text: string): NormalizationReport {
	const applied = new Set<string>();
	let issues: Issue[] = [];
	let current = text;
	for (let pass = 0; pass < MAX_PASSES; pass++) {
		issues = [];
		const next = runPass(current, applied, issues);
		if (next === current) break;
		current = next;
	}
	return { text: current, issues, applied: [...applied] };
}

export function normalize(text: string): string {
	return normalizeWithReport(text).text;
}
