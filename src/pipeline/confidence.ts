import type { CategoryTag } from "../classifier/categories.js";
import type { ExtractedFields, Extraction } from "../extractor/types.js";

export const PENALTIES = {
	authors: 20,
	title: 30,
	year: 10,
	unrecognizedType: 70,
} as const;

export const MAX_CONFIDENCE = 100;
export const CONFIDENCE_FLOOR = 30;

/** Found and not blank. */
export function hasValue<T>(field: Extraction<T>): boolean {
	if (!field.found) return false;
	const { value } = field;
	if (Array.isArray(value)) return value.some((v) => String(v).trim() !== "");
	return String(value).trim() !== "";
}

export function scoreConfidence(tag: CategoryTag, fields: ExtractedFields): number {
	let score = MAX_CONFIDENCE;
	if (!hasValue(fields.authors)) score -= PENALTIES.authors;
	if (!hasValue(fields.title)) score -= PENALTIES.title;
	if (!hasValue(fields.year)) score -= PENALTIES.year;
	if (tag === "Unknown") score -= PENALTIES.unrecognizedType;
	return Math.max(CONFIDENCE_FLOOR, score);
}
