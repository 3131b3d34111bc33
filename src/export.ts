import type { CitationResult } from "./pipeline/index.js";

/** "1. …" per line, numbered from 1 in input order. */
export function toNumberedList(results: readonly CitationResult[]): string {
	return results.map((result, i) => `${i + 1}. ${result.formatted}`).join("\n");
}

function escapeBibtex(value: string): string {
	return value.replace(/[{}]/g, (brace) => `\\${brace}`);
}

/**
 * One `@misc` entry per result. The formatted citation is carried whole as
 * the title, since the target styles have no field-level BibTeX mapping.
 */
export function toBibtex(results: readonly CitationResult[]): string {
	return results
		.map((result, i) => {
			const year = result.fields.year.found ? String(result.fields.year.value) : "unknown";
			return [
				`@misc{ref${i + 1},`,
				`  title = {${escapeBibtex(result.formatted)}},`,
				`  year = {${year}}`,
				"}",
			].join("\n");
		})
		.join("\n\n");
}
