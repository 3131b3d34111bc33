/**
 * Closed set of citation categories. Each tag also has the snake_case slug
 * used by dataset records (`book_1_3_authors`, `journal_article`, ...).
 */
export const CATEGORY_SLUGS = {
	BookFewAuthors: "book_1_3_authors",
	BookManyAuthors: "book_4plus_authors",
	JournalArticle: "journal_article",
	CollectionArticle: "collection_article",
	Dissertation: "dissertation",
	Abstract: "abstract",
	Law: "law",
	Standard: "standard",
	Patent: "patent",
	Conference: "conference",
	ElectronicResource: "electronic_resource",
	NewspaperArticle: "newspaper_article",
	Preprint: "preprint",
	Multimedia: "multimedia",
	Map: "map",
	MusicScore: "music_score",
	VisualMaterial: "visual_material",
	Archive: "archive",
	ResearchReport: "research_report",
	Deposited: "deposited",
	Multivolume: "multivolume",
	Review: "review",
	Catalog: "catalog",
	MethodicalGuide: "methodical_guide",
	Unknown: "unknown",
} as const;

export type CategoryTag = keyof typeof CATEGORY_SLUGS;
export type CategorySlug = (typeof CATEGORY_SLUGS)[CategoryTag];

function isCategoryTag(value: string): value is CategoryTag {
	return Object.hasOwn(CATEGORY_SLUGS, value);
}

export const CATEGORY_TAGS = Object.keys(CATEGORY_SLUGS).filter(isCategoryTag);

const TAG_BY_SLUG = new Map<string, CategoryTag>(
	CATEGORY_TAGS.map((tag) => [CATEGORY_SLUGS[tag], tag]),
);

/** Accepts either spelling ("JournalArticle" or "journal_article"). */
export function parseCategoryTag(value: string): CategoryTag | null {
	const trimmed = value.trim();
	if (isCategoryTag(trimmed)) return trimmed;
	return TAG_BY_SLUG.get(trimmed.toLowerCase()) ?? null;
}

export function toSlug(tag: CategoryTag): CategorySlug {
	return CATEGORY_SLUGS[tag];
}
