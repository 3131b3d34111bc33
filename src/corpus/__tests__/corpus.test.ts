import { describe, expect, it } from "vitest";
import { BOOK, JOURNAL_ARTICLE } from "../../__tests__/fixtures.js";
import {
	type Corpus,
	checkCorpusLabels,
	cleanCorpus,
	parseCorpus,
	summarizeCorpus,
	validateCorpus,
} from "../index.js";

const MISSING_DASH_SPACE = "Минск. –Амалфея, 2013.";

function corpusOf(examples: Corpus["examples"], total = examples.length): Corpus {
	return { description: "test corpus", total_examples: total, examples };
}

describe("parseCorpus", () => {
	it("parses JSON text", () => {
		const parsed = parseCorpus(
			JSON.stringify({ description: "d", examples: [{ type: "journal_article", example: JOURNAL_ARTICLE }] }),
		);
		expect(parsed).toEqual({
			ok: true,
			corpus: { description: "d", examples: [{ type: "journal_article", example: JOURNAL_ARTICLE }] },
		});
	});

	it("reports malformed JSON", () => {
		const parsed = parseCorpus("{");
		expect(parsed.ok).toBe(false);
		if (!parsed.ok) expect(parsed.error.code).toBe("INVALID_JSON");
	});

	it("reports a missing examples list", () => {
		const parsed = parseCorpus({ description: "d" });
		expect(parsed.ok).toBe(false);
		if (!parsed.ok) {
			expect(parsed.error.code).toBe("INVALID_CORPUS");
			expect(parsed.error.details).toEqual(["examples: Required"]);
		}
	});
});

describe("summarizeCorpus", () => {
	it("counts examples per type and checks the declared total", () => {
		const corpus = corpusOf(
			[
				{ type: "book_1_3_authors", example: BOOK },
				{ type: "book_1_3_authors", example: BOOK },
				{ type: "journal_article", example: JOURNAL_ARTICLE },
			],
			5,
		);
		expect(summarizeCorpus(corpus)).toEqual({
			description: "test corpus",
			total: 3,
			byType: { book_1_3_authors: 2, journal_article: 1 },
			totalMismatch: true,
		});
	});
});

describe("validateCorpus", () => {
	it("accepts a clean corpus", () => {
		expect(validateCorpus(corpusOf([{ type: "book_1_3_authors", example: BOOK }]))).toEqual({
			valid: true,
			structureErrors: [],
			violations: [],
			checkCounts: {},
		});
	});

	it("reports punctuation violations per example", () => {
		const report = validateCorpus(
			corpusOf([
				{ type: "book_1_3_authors", example: BOOK },
				{ type: "book_1_3_authors", example: MISSING_DASH_SPACE },
			]),
		);
		expect(report.valid).toBe(false);
		expect(report.violations).toEqual([
			{ index: 1, example: MISSING_DASH_SPACE, checks: ["missing_space_after_dash"] },
		]);
		expect(report.checkCounts).toEqual({ missing_space_after_dash: 1 });
	});

	it("reports unknown types and a missing total", () => {
		const report = validateCorpus({
			description: "d",
			examples: [{ type: "novel", example: BOOK }],
		});
		expect(report.structureErrors).toEqual([
			"Missing required field: total_examples",
			'Example 0: unknown type "novel"',
		]);
	});

	it("reports a corpus it cannot parse", () => {
		const report = validateCorpus({ examples: [] });
		expect(report.valid).toBe(false);
		expect(report.structureErrors).toEqual(["description: Required"]);
	});
});

describe("cleanCorpus", () => {
	it("normalizes examples and refreshes the total", () => {
		const corpus = corpusOf(
			[
				{ type: "book_1_3_authors", example: BOOK },
				{ type: "book_1_3_authors", example: MISSING_DASH_SPACE },
			],
			7,
		);
		const { corpus: cleaned, changed } = cleanCorpus(corpus);

		expect(changed).toEqual([1]);
		expect(cleaned.total_examples).toBe(2);
		expect(cleaned.examples[1]?.example).toBe("Минск. – Амалфея, 2013.");
		expect(corpus.examples[1]?.example).toBe(MISSING_DASH_SPACE);
	});
});

describe("checkCorpusLabels", () => {
	it("measures agreement between labels and the classifier", () => {
		const check = checkCorpusLabels(
			corpusOf([
				{ type: "book_1_3_authors", example: BOOK },
				{ type: "journal_article", example: BOOK },
			]),
		);
		expect(check.agreement).toBe(0.5);
		expect(check.mismatches).toEqual([
			{ index: 1, example: BOOK, labelled: "JournalArticle", classified: "BookFewAuthors" },
		]);
	});

	it("agrees fully on an empty corpus", () => {
		expect(checkCorpusLabels(corpusOf([])).agreement).toBe(1);
	});
});
