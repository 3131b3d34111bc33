import {
	blankUrls,
	extractAccessDate,
	extractAuthors,
	extractCity,
	extractDoi,
	extractEdition,
	extractIsbn,
	extractIssue,
	extractJournal,
	extractPages,
	extractPublisher,
	extractRegistration,
	extractTitleParts,
	extractUrl,
	extractVolume,
	extractYear,
} from "./patterns.js";
import type { ExtractedFields } from "./types.js";

export type { ExtractedFields, Extraction, FieldName } from "./types.js";
export { FIELD_NAMES, NOT_FOUND } from "./types.js";
export { MAX_AUTHORS } from "./patterns.js";

/**
 * Pull every known field out of a citation string. Each field has its own
 * pattern, so one miss never blocks another. The source is not modified;
 * offsets in the result point into it. Numbers and markers inside a URL
 * ("/doc_2015/No.5") are not read as imprint or numbering data.
 */
export function extract(text: string): ExtractedFields {
	const { title, subtitle, medium } = extractTitleParts(text);
	const body = blankUrls(text);
	return {
		authors: extractAuthors(text),
		title,
		subtitle,
		medium,
		year: extractYear(body),
		edition: extractEdition(body),
		city: extractCity(body),
		publisher: extractPublisher(body),
		pages: extractPages(body),
		journal: extractJournal(text),
		volume: extractVolume(body),
		issue: extractIssue(body),
		registration: extractRegistration(body),
		url: extractUrl(text),
		accessDate: extractAccessDate(text),
		doi: extractDoi(text),
		isbn: extractIsbn(text),
	};
}
