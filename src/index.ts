export * from "./types.js";
export { type Config, ConfigSchema, loadConfig } from "./config.js";
export { type LogLevel, type Logger, createLogger, logger } from "./logger.js";

export {
	NORMALIZATION_RULES,
	type NormalizationReport,
	type NormalizationRule,
	applyRule,
	isPlausibleYearRange,
	normalize,
	normalizeWithReport,
} from "./normalizer/index.js";
export {
	type ExtractedFields,
	type Extraction,
	FIELD_NAMES,
	type FieldName,
	MAX_AUTHORS,
	NOT_FOUND,
	extract,
} from "./extractor/index.js";
export {
	CATEGORY_SLUGS,
	CATEGORY_TAGS,
	CLASSIFICATION_RULES,
	type CategorySlug,
	type CategoryTag,
	type Classification,
	type ClassificationRule,
	classify,
	classifyWithTrace,
	parseCategoryTag,
	toSlug,
} from "./classifier/index.js";
export {
	type RenderOptions,
	type Rendering,
	type SlotName,
	type Template,
	gapMarker,
	render,
	templateFor,
	toDirectName,
	toInvertedName,
} from "./renderer/index.js";

export {
	type CitationResult,
	type ProcessOptions,
	processAll,
	processCitation,
} from "./pipeline/index.js";
export {
	type Citation,
	type CitationRecord,
	CitationRecordSchema,
	parseCitationRecord,
} from "./pipeline/citation.js";
export { CONFIDENCE_FLOOR, PENALTIES, scoreConfidence } from "./pipeline/confidence.js";
export { checkFieldPreservation, lintPunctuation, lostTokens } from "./pipeline/validate.js";
export {
	type BatchOptions,
	type BatchOutcome,
	type BatchReport,
	type Formatter,
	createFormatter,
	processBatch,
} from "./pipeline/batch.js";
export { splitReferenceList } from "./pipeline/reference-list.js";

export {
	type Identifier,
	type MetadataLookup,
	type Resolution,
	type ResolveOptions,
	type Resolved,
	type StructuringModel,
	detectIdentifier,
	lookupAll,
	resolveAll,
	structureAll,
} from "./collaborators/index.js";
export {
	type Corpus,
	CorpusSchema,
	type DatasetRecord,
	DatasetRecordSchema,
	checkCorpusLabels,
	cleanCorpus,
	parseCorpus,
	summarizeCorpus,
	validateCorpus,
} from "./corpus/index.js";
export { toBibtex, toNumberedList } from "./export.js";
