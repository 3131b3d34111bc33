import type { CategoryTag } from "../classifier/categories.js";
import type { Standard } from "../types.js";

export type SlotName =
	| "heading"
	| "title"
	| "medium"
	| "subtitle"
	| "responsibility"
	| "journal"
	| "edition"
	| "city"
	| "publisher"
	| "year"
	| "volume"
	| "issue"
	| "registration"
	| "pageRange"
	| "extent"
	| "isbn"
	| "doi"
	| "url"
	| "accessDate";

export interface Slot {
	slot: SlotName;
	/** Written before the value only when something precedes it in the same area. */
	joiner?: string;
	prefix?: string;
	suffix?: string;
	required?: boolean;
}

/** Areas are joined with ". – "; an area with no values is dropped. */
export type Area = readonly Slot[];

export interface Template {
	tag: CategoryTag;
	areas: readonly Area[];
}

const titleArea = (opts: { heading: boolean; host?: "required" | "optional" }): Area => [
	...(opts.heading ? [{ slot: "heading" } as const] : []),
	{ slot: "title", joiner: " ", required: true },
	{ slot: "medium", joiner: " ", prefix: "[", suffix: "]" },
	{ slot: "subtitle", joiner: " : " },
	{ slot: "responsibility", joiner: " / " },
	...(opts.host
		? [{ slot: "journal", joiner: " // ", required: opts.host === "required" } as const]
		: []),
];

const EDITION: Area = [{ slot: "edition" }];
const PUBLICATION: Area = [
	{ slot: "city" },
	{ slot: "publisher", joiner: " : " },
	{ slot: "year", joiner: ", " },
];
const NUMBERING: Area = [
	{ slot: "volume", prefix: "Т. " },
	{ slot: "issue", joiner: ", ", prefix: "№ " },
];
const REGISTRATION: Area = [{ slot: "registration" }];
const PAGE_RANGE: Area = [{ slot: "pageRange", prefix: "С. " }];
const extent = (unit: string): Area => [{ slot: "extent", suffix: ` ${unit}` }];
const ISBN: Area = [{ slot: "isbn", prefix: "ISBN " }];
const DOI: Area = [{ slot: "doi", prefix: "DOI: " }];

const ACCESS: Record<Standard, readonly Area[]> = {
	VAK_RB: [
		[{ slot: "url", prefix: "Режим доступа: " }],
		[{ slot: "accessDate", prefix: "Дата доступа: " }],
	],
	GOST_2018: [
		[
			{ slot: "url", prefix: "URL: " },
			{ slot: "accessDate", joiner: " ", prefix: "(дата обращения: ", suffix: ")" },
		],
	],
};

// Every layout carries every area after the title, so no found field is lost;
// layouts differ in the title area and in what they require.
const details = (unit: string): readonly Area[] => [
	EDITION,
	PUBLICATION,
	NUMBERING,
	REGISTRATION,
	PAGE_RANGE,
	extent(unit),
	ISBN,
	DOI,
];

type Layout = (access: readonly Area[]) => readonly Area[];

const book =
	(heading: boolean, unit = "с."): Layout =>
	(access) => [titleArea({ heading, host: "optional" }), ...details(unit), ...access];

/** Journal, newspaper and collection articles: the host after "//" is required. */
const hosted: Layout = (access) => [
	titleArea({ heading: true, host: "required" }),
	...details("с."),
	...access,
];

const authorless: Layout = (access) => [
	titleArea({ heading: false, host: "optional" }),
	...details("с."),
	...access,
];

const electronic: Layout = (access) => [
	titleArea({ heading: true, host: "optional" }),
	...details("с."),
	...access.map((area) => area.map((slot) => (slot.slot === "url" ? { ...slot, required: true } : slot))),
];

const LAYOUTS: Record<CategoryTag, Layout> = {
	BookFewAuthors: book(true),
	BookManyAuthors: book(false),
	JournalArticle: hosted,
	CollectionArticle: hosted,
	Dissertation: book(true, "л."),
	Abstract: book(true),
	Law: authorless,
	Standard: authorless,
	Patent: authorless,
	Conference: authorless,
	ElectronicResource: electronic,
	NewspaperArticle: hosted,
	Preprint: book(true),
	Multimedia: book(true),
	Map: authorless,
	MusicScore: book(true),
	VisualMaterial: authorless,
	Archive: authorless,
	ResearchReport: authorless,
	Deposited: book(true),
	Multivolume: book(true, "т."),
	Review: hosted,
	Catalog: authorless,
	MethodicalGuide: authorless,
	Unknown: book(true),
};

export function templateFor(tag: CategoryTag, standard: Standard = "VAK_RB"): Template {
	return { tag, areas: LAYOUTS[tag](ACCESS[standard]) };
}
