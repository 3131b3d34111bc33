import { describe, expect, it } from "vitest";
import { BOOK, JOURNAL_ARTICLE } from "../../__tests__/fixtures.js";
import { splitReferenceList } from "../reference-list.js";

describe("splitReferenceList", () => {
	it("splits one entry per line", () => {
		expect(splitReferenceList(`1. ${BOOK}\n2. ${JOURNAL_ARTICLE}`)).toEqual([BOOK, JOURNAL_ARTICLE]);
	});

	it("splits entries that run together", () => {
		expect(splitReferenceList(`1. ${BOOK} 2. ${JOURNAL_ARTICLE}`)).toEqual([BOOK, JOURNAL_ARTICLE]);
	});

	it("accepts parenthesis markers", () => {
		expect(splitReferenceList(`1) ${BOOK}\n2) ${JOURNAL_ARTICLE}`)).toEqual([BOOK, JOURNAL_ARTICLE]);
	});

	it("ignores numbers out of sequence", () => {
		expect(splitReferenceList("1. Первая книга. 3. Изд. второе")).toEqual([
			"Первая книга. 3. Изд. второе",
		]);
	});

	it("splits unnumbered text on non-empty lines", () => {
		expect(splitReferenceList(`${BOOK}\n\n  ${JOURNAL_ARTICLE}  \n`)).toEqual([BOOK, JOURNAL_ARTICLE]);
	});

	it("returns nothing for blank input", () => {
		expect(splitReferenceList("  \n ")).toEqual([]);
	});
});
