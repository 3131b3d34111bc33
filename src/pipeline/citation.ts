import { z } from "zod";
import { classify } from "../classifier/index.js";
import { type CategoryTag, parseCategoryTag } from "../classifier/categories.js";
import { type ExtractedFields, type Extraction, NOT_FOUND } from "../extractor/types.js";
import { renderTemplate, slotValues, templateFor } from "../renderer/index.js";
import { hasValue } from "./confidence.js";

const optionalText = z.string().optional();

/** Structured citation as produced by an upstream collaborator or a caller. */
export const CitationRecordSchema = z
	.object({
		type: z
			.string()
			.refine((value) => parseCategoryTag(value) !== null, {
				message: "Unknown citation type",
			})
			.optional(),
		authors: z.array(z.string()).optional(),
		title: optionalText,
		subtitle: optionalText,
		medium: optionalText,
		year: z
			.union([
				z.number().int().min(0),
				z.string().regex(/^\s*(?:\d{4})?\s*$/, "Year must be four digits"),
			])
			.optional(),
		edition: optionalText,
		city: optionalText,
		publisher: optionalText,
		pages: optionalText,
		journal: optionalText,
		volume: optionalText,
		issue: optionalText,
		registration: optionalText,
		url: optionalText,
		accessDate: optionalText,
		doi: optionalText,
		isbn: optionalText,
		language: optionalText,
	})
	.strict();

export type CitationRecord = z.infer<typeof CitationRecordSchema>;

/** Free text or a structured record. */
export type Citation = string | CitationRecord;

export type ParsedRecord =
	| { ok: true; record: CitationRecord }
	| { ok: false; error: { code: "INVALID_RECORD"; message: string; details: string[] } };

export function parseCitationRecord(input: unknown): ParsedRecord {
	const result = CitationRecordSchema.safeParse(input);
	if (result.success) return { ok: true, record: result.data };
	const details = result.error.issues.map(
		(i) => `${i.path.length > 0 ? i.path.join(".") : "record"}: ${i.message}`,
	);
	return {
		ok: false,
		error: { code: "INVALID_RECORD", message: `Invalid citation record: ${details.join(", ")}`, details },
	};
}

// Record fields have no position in any source text.
function given<T>(value: T | undefined): Extraction<T> {
	return value === undefined ? NOT_FOUND : { found: true, value, start: -1, end: -1 };
}

function givenYear(year: number | string | undefined): Extraction<number> {
	if (year === undefined) return NOT_FOUND;
	if (typeof year === "number") return given(year);
	const trimmed = year.trim();
	return trimmed ? given(Number(trimmed)) : NOT_FOUND;
}

export function recordToFields(record: CitationRecord): ExtractedFields {
	return {
		authors: given(record.authors),
		title: given(record.title),
		subtitle: given(record.subtitle),
		medium: given(record.medium),
		year: givenYear(record.year),
		edition: given(record.edition),
		city: given(record.city),
		publisher: given(record.publisher),
		pages: given(record.pages),
		journal: given(record.journal),
		volume: given(record.volume),
		issue: given(record.issue),
		registration: given(record.registration),
		url: given(record.url),
		accessDate: given(record.accessDate),
		doi: given(record.doi),
		isbn: given(record.isbn),
	};
}

function authorCount(fields: ExtractedFields): number {
	return fields.authors.found ? fields.authors.value.filter((a) => a.trim()).length : 0;
}

/**
 * An explicit `type` wins. Otherwise the record is laid out in the generic
 * template and classified like text; the generic layout names only the
 * first author in the heading and has no "[Электронный ресурс]" marker, so
 * author count and a bare URL are taken from the fields directly.
 */
export function tagForRecord(record: CitationRecord, fields: ExtractedFields): CategoryTag {
	const explicit = record.type === undefined ? null : parseCategoryTag(record.type);
	if (explicit) return explicit;
	const preview = renderTemplate(templateFor("Unknown"), slotValues("Unknown", fields)).draft;
	const tag = classify(preview);
	if (tag === "BookFewAuthors" && authorCount(fields) >= 4) return "BookManyAuthors";
	if (tag === "Unknown" && hasValue(fields.url)) return "ElectronicResource";
	return tag;
}
