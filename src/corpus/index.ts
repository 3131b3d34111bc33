import { z } from "zod";
import { type CategoryTag, classify, parseCategoryTag } from "../classifier/index.js";
import { normalize } from "../normalizer/index.js";
import { lintPunctuation } from "../pipeline/validate.js";
import type { PunctuationCheck } from "../types.js";

/** One labelled example: `type` is a category slug or tag, `example` a canonical citation. */
export const DatasetRecordSchema = z.object({
	type: z.string().min(1),
	example: z.string().min(1),
});

export const CorpusSchema = z.object({
	description: z.string(),
	total_examples: z.number().int().nonnegative().optional(),
	examples: z.array(DatasetRecordSchema),
});

export type DatasetRecord = z.infer<typeof DatasetRecordSchema>;
export type Corpus = z.infer<typeof CorpusSchema>;

export type CorpusParseResult =
	| { ok: true; corpus: Corpus }
	| {
			ok: false;
			error: { code: "INVALID_JSON" | "INVALID_CORPUS"; message: string; details: string[] };
	  };

/** Parse a corpus from JSON text or an already-decoded value. Never throws. */
export function parseCorpus(input: unknown): CorpusParseResult {
	let data: unknown = input;
	if (typeof input === "string") {
		try {
			data = JSON.parse(input);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			return { ok: false, error: { code: "INVALID_JSON", message, details: [message] } };
		}
	}
	const result = CorpusSchema.safeParse(data);
	if (result.success) return { ok: true, corpus: result.data };
	const details = result.error.issues.map((i) => `${i.path.join(".") || "corpus"}: ${i.message}`);
	return {
		ok: false,
		error: { code: "INVALID_CORPUS", message: `Invalid corpus: ${details.join(", ")}`, details },
	};
}

export interface CorpusSummary {
	description: string;
	total: number;
	/** Count per `type` as written in the records. */
	byType: Record<string, number>;
	/** Declared `total_examples` disagrees with the number of examples. */
	totalMismatch: boolean;
}

export function summarizeCorpus(corpus: Corpus): CorpusSummary {
	const byType: Record<string, number> = {};
	for (const { type } of corpus.examples) byType[type] = (byType[type] ?? 0) + 1;
	return {
		description: corpus.description,
		total: corpus.examples.length,
		byType,
		totalMismatch:
			corpus.total_examples !== undefined && corpus.total_examples !== corpus.examples.length,
	};
}

export interface ExampleViolation {
	index: number;
	example: string;
	checks: PunctuationCheck[];
}

export interface CorpusValidation {
	valid: boolean;
	structureErrors: string[];
	violations: ExampleViolation[];
	checkCounts: Partial<Record<PunctuationCheck, number>>;
}

/**
 * Structure errors (missing fields, unknown types) plus punctuation
 * violations in each example. Accepts undecoded input so that a malformed
 * corpus still gets a report.
 */
export function validateCorpus(input: unknown): CorpusValidation {
	const parsed = parseCorpus(input);
	if (!parsed.ok) {
		return { valid: false, structureErrors: parsed.error.details, violations: [], checkCounts: {} };
	}
	const { corpus } = parsed;
	const structureErrors: string[] = [];
	if (corpus.total_examples === undefined) {
		structureErrors.push("Missing required field: total_examples");
	}
	const violations: ExampleViolation[] = [];
	const checkCounts: Partial<Record<PunctuationCheck, number>> = {};

	corpus.examples.forEach(({ type, example }, index) => {
		if (parseCategoryTag(type) === null) {
			structureErrors.push(`Example ${index}: unknown type "${type}"`);
		}
		const checks: PunctuationCheck[] = [];
		for (const issue of lintPunctuation(example)) {
			if (issue.code !== "PunctuationViolation" || checks.includes(issue.check)) continue;
			checks.push(issue.check);
			checkCounts[issue.check] = (checkCounts[issue.check] ?? 0) + 1;
		}
		if (checks.length > 0) violations.push({ index, example, checks });
	});

	return {
		valid: structureErrors.length === 0 && violations.length === 0,
		structureErrors,
		violations,
		checkCounts,
	};
}

export interface CleanedCorpus {
	corpus: Corpus;
	/** Indexes of the examples the normalizer changed. */
	changed: number[];
}

/** Normalize every example and refresh `total_examples`. The input is not modified. */
export function cleanCorpus(corpus: Corpus): CleanedCorpus {
	const changed: number[] = [];
	const examples = corpus.examples.map((record, index) => {
		const example = normalize(record.example);
		if (example !== record.example) changed.push(index);
		return { ...record, example };
	});
	return {
		corpus: { ...corpus, total_examples: examples.length, examples },
		changed,
	};
}

export interface LabelMismatch {
	index: number;
	example: string;
	labelled: CategoryTag | null;
	classified: CategoryTag;
}

export interface LabelCheck {
	agreement: number;
	mismatches: LabelMismatch[];
}

/** Compare each record's label with what the classifier says about its example. */
export function checkCorpusLabels(corpus: Corpus): LabelCheck {
	const mismatches: LabelMismatch[] = [];
	corpus.examples.forEach(({ type, example }, index) => {
		const labelled = parseCategoryTag(type);
		const classified = classify(example);
		if (labelled !== classified) mismatches.push({ index, example, labelled, classified });
	});
	const total = corpus.examples.length;
	return {
		agreement: total === 0 ? 1 : (total - mismatches.length) / total,
		mismatches,
	};
}
