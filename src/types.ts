import type { FieldName } from "./extractor/types.js";

export type Severity = "info" | "warning" | "error";

export type PunctuationCheck =
	| "missing_space_after_dash"
	| "missing_space_after_colon"
	| "missing_space_after_initials"
	| "spaces_in_range"
	| "double_spaces"
	| "hyphen_instead_of_dash"
	| "hyphen_in_page_range";

/**
 * Recoverable conditions reported alongside a result. None of these abort
 * the pipeline; each one is a value the caller can inspect.
 */
export type Issue =
	| { code: "UnrecognizedType"; severity: "warning"; message: string }
	| { code: "FieldNotFound"; severity: "info"; field: FieldName; message: string }
	| { code: "MissingRequiredField"; severity: "warning"; slot: string; message: string }
	| { code: "AmbiguousRange"; severity: "info"; match: string; index: number; message: string }
	| {
			code: "PunctuationViolation";
			severity: "warning";
			check: PunctuationCheck;
			match: string;
			message: string;
	  }
	| { code: "FieldDropped"; severity: "error"; field: FieldName; value: string; message: string }
	| { code: "UnmappedContent"; severity: "info"; tokens: string[]; message: string }
	| { code: "InvalidInput"; severity: "error"; details: string[]; message: string };

export type IssueCode = Issue["code"];

export type Standard = "VAK_RB" | "GOST_2018";
