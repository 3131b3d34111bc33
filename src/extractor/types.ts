export type Extraction<T> = { found: true; value: T; start: number; end: number } | { found: false };

export interface ExtractedFields {
	authors: Extraction<string[]>;
	title: Extraction<string>;
	subtitle: Extraction<string>;
	medium: Extraction<string>;
	year: Extraction<number>;
	edition: Extraction<string>;
	city: Extraction<string>;
	publisher: Extraction<string>;
	pages: Extraction<string>;
	journal: Extraction<string>;
	volume: Extraction<string>;
	issue: Extraction<string>;
	/** National register number of a legal act, e.g. "2/2565". */
	registration: Extraction<string>;
	url: Extraction<string>;
	accessDate: Extraction<string>;
	doi: Extraction<string>;
	isbn: Extraction<string>;
}

export type FieldName = keyof ExtractedFields;

export const FIELD_NAMES = [
	"authors",
	"title",
	"subtitle",
	"medium",
	"year",
	"edition",
	"city",
	"publisher",
	"pages",
	"journal",
	"volume",
	"issue",
	"registration",
	"url",
	"accessDate",
	"doi",
	"isbn",
] as const satisfies readonly FieldName[];

export const NOT_FOUND = { found: false } as const;
