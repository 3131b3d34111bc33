import type { CategoryTag } from "./categories.js";

export interface ClassifierInput {
	text: string;
	lower: string;
}

/** One entry of the ordered check list; returns null when its signal is absent. */
export interface ClassificationRule {
	readonly name: string;
	readonly match: (input: ClassifierInput) => CategoryTag | null;
}

const PATENT = /пат\.\s*[A-Z]{2}|а\.\s*с\.\s*[A-Z]{2}|полез\.\s*модель/;
const DEGREE = /дис\.\s*\.{3}|дыс\.\s*\.{3}/;
const STANDARD_CODE = /(?<!\p{L})(?:гост|стб|ткп|тр\s*тс)\s*(?:р\s+)?\d/u;
const CODE_OR_CONSTITUTION = /конституц|(?<!\p{L})кодекс(?!\p{L})/u;
const LEGAL_ACT =
	/(?<!\p{L})(?:закон|указ|декрет)(?!\p{L})|(?<!\p{L})постановлени|приказ\s+[\p{L}\p{N}_]+\./u;
const PROCEEDINGS = /матер.*конф|тезис.*докл|чтения\s*:/;
const COLLECTION = /сб\.\s*(?:науч\.|ст\.|тр\.)/;
const PERIODICAL_SEPARATOR = /\s\/\/\s/;
const VOLUME_OR_ISSUE = /[ТT]\.\s*\d|№\s*\d/;
const NEWSPAPER = /\.by(?![\p{L}\p{N}])|газет/u;
const AUTHOR_ENTRY = /(\p{Lu}[\p{Ll}'’]+(?:-\p{Lu}[\p{Ll}'’]+)?),\s*\p{Lu}\./gu;

const REVIEW = /\[рецензия\]|(?<!\p{L})рец\.\s*на(?!\p{L})/u;
const DEPOSITED = /(?<!\p{L})деп\.\s*в\s/u;
const RESEARCH_REPORT = /отч[её]т\s+о\s+нир/;
const METHODICAL_GUIDE = /(?<![\p{L}.\-])метод\.\s*(?:указания|рекомендации|пособие)/u;
const CATALOG = /^\s*каталог/;
const MULTIVOLUME = /(?<!\p{L})[ув]\s+\d+\s+т\.(?!\p{L})/u;
const ARCHIVE = /(?<!\p{L})ф\.\s*\d+\.\s*оп\.\s*\d+|^[\p{L}\s]*архив(?!\p{L})/u;

export function countDistinctAuthors(text: string): number {
	const surnames = new Set<string>();
	for (const m of text.matchAll(AUTHOR_ENTRY)) {
		if (m[1]) surnames.add(m[1]);
	}
	return surnames.size;
}

function when(test: boolean, tag: CategoryTag): CategoryTag | null {
	return test ? tag : null;
}

/**
 * Narrow lexical markers come first, broad structural heuristics (the "//"
 * separator, author counting) last: a dissertation also looks like a book by
 * author count, a patent lists its inventors like authors, and so on.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
	{
		name: "bracketed-medium",
		match: ({ lower }) => {
			if (lower.includes("[звукозапись]") || lower.includes("[видеозапись]")) return "Multimedia";
			if (lower.includes("[изоматериал]") || lower.includes("плакат]")) return "VisualMaterial";
			if (lower.includes("[ноты]")) return "MusicScore";
			if (lower.includes("[карт")) return "Map";
			return null;
		},
	},
	{ name: "patent", match: ({ text }) => when(PATENT.test(text), "Patent") },
	// Abstracts carry "дис. ..." as well, so the narrower marker goes first.
	{ name: "abstract", match: ({ lower }) => when(lower.includes("автореф"), "Abstract") },
	{ name: "dissertation", match: ({ lower }) => when(DEGREE.test(lower), "Dissertation") },
	{ name: "preprint", match: ({ lower }) => when(lower.includes("препринт"), "Preprint") },
	{ name: "review", match: ({ lower }) => when(REVIEW.test(lower), "Review") },
	{ name: "deposited", match: ({ lower }) => when(DEPOSITED.test(lower), "Deposited") },
	{
		name: "research-report",
		match: ({ lower }) => when(RESEARCH_REPORT.test(lower), "ResearchReport"),
	},
	{ name: "standard", match: ({ lower }) => when(STANDARD_CODE.test(lower), "Standard") },
	{
		name: "law",
		match: ({ lower }) =>
			when(CODE_OR_CONSTITUTION.test(lower) || LEGAL_ACT.test(lower), "Law"),
	},
	{ name: "conference", match: ({ lower }) => when(PROCEEDINGS.test(lower), "Conference") },
	{ name: "collection", match: ({ lower }) => when(COLLECTION.test(lower), "CollectionArticle") },
	{
		name: "methodical-guide",
		match: ({ lower }) => when(METHODICAL_GUIDE.test(lower), "MethodicalGuide"),
	},
	{ name: "catalog", match: ({ lower }) => when(CATALOG.test(lower), "Catalog") },
	{ name: "multivolume", match: ({ lower }) => when(MULTIVOLUME.test(lower), "Multivolume") },
	{ name: "archive", match: ({ lower }) => when(ARCHIVE.test(lower), "Archive") },
	{
		name: "periodical",
		match: ({ text }) => {
			const parts = text.split(PERIODICAL_SEPARATOR);
			if (parts.length < 2) return null;
			const host = parts[1] ?? "";
			if (VOLUME_OR_ISSUE.test(host)) return "JournalArticle";
			if (NEWSPAPER.test(host.toLowerCase())) return "NewspaperArticle";
			return null;
		},
	},
	{
		name: "et-al",
		match: ({ text }) =>
			when(text.includes("[и др.]") || text.includes("[et al.]"), "BookManyAuthors"),
	},
	{
		name: "author-count",
		match: ({ text }) => {
			const count = countDistinctAuthors(text);
			if (count >= 4) return "BookManyAuthors";
			if (count >= 1) return "BookFewAuthors";
			return null;
		},
	},
	{
		name: "electronic-resource",
		match: ({ lower }) =>
			when(
				lower.includes("[электронный ресурс]") ||
					lower.includes("[сайт]") ||
					/(?<!\p{L})url:/u.test(lower),
				"ElectronicResource",
			),
	},
];
