import { describe, expect, it, vi } from "vitest";
import { BOOK, JOURNAL_ARTICLE, NO_MARKERS } from "../../__tests__/fixtures.js";
import type { Config } from "../../config.js";
import type { Logger } from "../../logger.js";
import { createFormatter, processBatch, summarize } from "../batch.js";

function stubLogger(): Logger {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const config: Config = {
	CITATION_STANDARD: "GOST_2018",
	LOG_LEVEL: "error",
	BATCH_CACHE_SIZE: 10,
	NODE_ENV: "test",
};

describe("processBatch", () => {
	it("computes repeated inputs once and reports the batch", () => {
		const { results, report } = processBatch([BOOK, JOURNAL_ARTICLE, BOOK, NO_MARKERS]);

		expect(results.map((r) => r.formatted)).toEqual([
			BOOK,
			JOURNAL_ARTICLE,
			BOOK,
			"просто какой-то текст без признаков.",
		]);
		expect(report).toEqual({
			total: 4,
			byTag: { BookFewAuthors: 2, JournalArticle: 1, Unknown: 1 },
			averageConfidence: 82.5,
			issueCounts: { UnrecognizedType: 1, FieldNotFound: 2 },
			hits: 1,
			misses: 3,
		});
	});

	it("gives each repeated slot its own copy", () => {
		const { results } = processBatch([BOOK, BOOK]);
		expect(results[1]).toEqual(results[0]);
		expect(results[1]).not.toBe(results[0]);
	});

	it("keeps no state between calls", () => {
		processBatch([BOOK]);
		const { report } = processBatch([BOOK]);
		expect(report.hits).toBe(0);
		expect(report.misses).toBe(1);
	});

	it("reports an empty batch", () => {
		expect(processBatch([]).report).toEqual({
			total: 0,
			byTag: {},
			averageConfidence: 0,
			issueCounts: {},
			hits: 0,
			misses: 0,
		});
	});

	it("summarizes results it did not compute", () => {
		expect(summarize([]).averageConfidence).toBe(0);
	});
});

describe("createFormatter", () => {
	const record = { title: "Белстат", url: "https://belstat.gov.by", accessDate: "01.02.2024" };

	it("applies the configured standard", () => {
		const formatter = createFormatter(config, stubLogger());
		expect(formatter.standard).toBe("GOST_2018");
		expect(formatter.format(record).formatted).toBe(
			"Белстат. – URL: https://belstat.gov.by (дата обращения: 01.02.2024).",
		);
	});

	it("formats lists in order", () => {
		const formatter = createFormatter(config, stubLogger());
		expect(formatter.formatAll([JOURNAL_ARTICLE, BOOK]).map((r) => r.tag)).toEqual([
			"JournalArticle",
			"BookFewAuthors",
		]);
	});

	it("logs a batch summary and warns about unrecognized citations", () => {
		const log = stubLogger();
		const formatter = createFormatter(config, log);
		const { report } = formatter.formatBatch([BOOK, NO_MARKERS]);

		expect(report.averageConfidence).toBe(65);
		expect(log.info).toHaveBeenCalledWith(
			"Formatted 2 citation(s): average confidence 65, cache hits 0",
		);
		expect(log.warn).toHaveBeenCalledWith("1 citation(s) matched no category");
	});

	it("does not warn when every citation is recognized", () => {
		const log = stubLogger();
		createFormatter(config, log).formatBatch([BOOK]);
		expect(log.warn).not.toHaveBeenCalled();
	});
});
