import { normalize } from "../normalizer/index.js";
import type { CategoryTag } from "./categories.js";
import { CLASSIFICATION_RULES } from "./rules.js";

export type { CategorySlug, CategoryTag } from "./categories.js";
export { CATEGORY_SLUGS, CATEGORY_TAGS, parseCategoryTag, toSlug } from "./categories.js";
export type { ClassificationRule, ClassifierInput } from "./rules.js";
export { CLASSIFICATION_RULES, countDistinctAuthors } from "./rules.js";

export interface Classification {
	tag: CategoryTag;
	/** Name of the deciding rule, or "fallback" for Unknown. */
	rule: string;
}

/**
 * Rules run against the normalized form of the input, so classifying text
 * the normalizer already produced gives the same tag as the raw text.
 */
export function classifyWithTrace(text: string): Classification {
	const canonical = normalize(text);
	const input = { text: canonical, lower: canonical.toLowerCase() };
	for (const rule of CLASSIFICATION_RULES) {
		const tag = rule.match(input);
		if (tag) return { tag, rule: rule.name };
	}
	return { tag: "Unknown", rule: "fallback" };
}

export function classify(text: string): CategoryTag {
	return classifyWithTrace(text).tag;
}
