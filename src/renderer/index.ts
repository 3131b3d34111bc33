import type { CategoryTag } from "../classifier/categories.js";
import type { ExtractedFields, Extraction } from "../extractor/types.js";
import type { Issue, Standard } from "../types.js";
import { type Area, type SlotName, type Template, templateFor } from "./templates.js";

export type { Area, Slot, SlotName, Template } from "./templates.js";
export { templateFor } from "./templates.js";

export interface Rendering {
	draft: string;
	/** Required slots that had no value and were written as a gap marker. */
	missing: SlotName[];
	issues: Issue[];
}

export interface RenderOptions {
	standard?: Standard;
}

const AREA_SEPARATOR = " – ";
const MANY_AUTHORS_MARK = "[и др.]";

export function gapMarker(slot: SlotName): string {
	return `{{${slot}}}`;
}

const INVERTED = /^(.+?),\s*(.+)$/u;
const DIRECT = /^((?:\p{Lu}\.\s*){1,3})(\p{Lu}[\p{L}'’\-]+)$/u;

/** "Дробышевский, Н. П." -> "Н. П. Дробышевский"; other shapes pass through. */
export function toDirectName(name: string): string {
	const m = INVERTED.exec(name.trim());
	return m ? `${m[2]} ${m[1]}` : name.trim();
}

/** "Н. П. Дробышевский" -> "Дробышевский, Н. П."; other shapes pass through. */
export function toInvertedName(name: string): string {
	const trimmed = name.trim();
	if (INVERTED.test(trimmed)) return trimmed;
	const m = DIRECT.exec(trimmed);
	return m?.[1] && m[2] ? `${m[2]}, ${m[1].trim()}` : trimmed;
}

function text<T>(field: Extraction<T>): string | undefined {
	if (!field.found) return undefined;
	const value = String(field.value).trim();
	return value || undefined;
}

function responsibility(tag: CategoryTag, authors: string[]): string | undefined {
	if (authors.length === 0) return undefined;
	const first = authors[0];
	if (tag === "BookManyAuthors" && first) return `${toDirectName(first)} ${MANY_AUTHORS_MARK}`;
	return authors.map(toDirectName).join(", ");
}

/** Page ranges belong after "С."; a bare count is the extent of the whole item. */
function isRange(pages: string): boolean {
	return /[–—-]/.test(pages);
}

export function slotValues(
	tag: CategoryTag,
	fields: ExtractedFields,
): Partial<Record<SlotName, string>> {
	const authors = fields.authors.found ? fields.authors.value.filter((a) => a.trim()) : [];
	const pages = text(fields.pages);
	const hosted = fields.journal.found || tag === "JournalArticle" || tag === "NewspaperArticle";
	const first = authors[0];
	return {
		heading: first ? toInvertedName(first) : undefined,
		title: text(fields.title),
		medium: text(fields.medium),
		subtitle: text(fields.subtitle),
		responsibility: responsibility(tag, authors),
		journal: text(fields.journal),
		edition: text(fields.edition),
		city: text(fields.city),
		publisher: text(fields.publisher),
		year: text(fields.year),
		volume: text(fields.volume),
		issue: text(fields.issue),
		registration: text(fields.registration),
		pageRange: pages && (hosted || isRange(pages)) ? pages : undefined,
		extent: pages && !(hosted || isRange(pages)) ? pages : undefined,
		isbn: text(fields.isbn),
		doi: text(fields.doi),
		url: text(fields.url),
		accessDate: text(fields.accessDate),
	};
}

function renderArea(
	area: Area,
	values: Partial<Record<SlotName, string>>,
	missing: SlotName[],
): string {
	let out = "";
	for (const slot of area) {
		let value = values[slot.slot];
		if (value === undefined) {
			if (!slot.required) continue;
			missing.push(slot.slot);
			value = gapMarker(slot.slot);
		}
		const piece = `${slot.prefix ?? ""}${value}${slot.suffix ?? ""}`;
		out = out ? `${out}${slot.joiner ?? " "}${piece}` : piece;
	}
	return out;
}

function terminate(area: string): string {
	return area.endsWith(".") ? area : `${area}.`;
}

export function renderTemplate(
	template: Template,
	values: Partial<Record<SlotName, string>>,
): Omit<Rendering, "issues"> {
	const missing: SlotName[] = [];
	const areas = template.areas
		.map((area) => renderArea(area, values, missing))
		.filter((area) => area.length > 0)
		.map(terminate);
	return { draft: areas.join(AREA_SEPARATOR), missing };
}

/**
 * Fill the category's template with extracted fields. Missing optional slots
 * vanish along with their joiner; missing required ones leave a `{{slot}}`
 * gap and a MissingRequiredField issue. Nothing absent from `fields` is
 * written.
 */
export function render(
	tag: CategoryTag,
	fields: ExtractedFields,
	options: RenderOptions = {},
): Rendering {
	const template = templateFor(tag, options.standard);
	const { draft, missing } = renderTemplate(template, slotValues(tag, fields));
	const issues: Issue[] = missing.map((slot) => ({
		code: "MissingRequiredField",
		severity: "warning",
		slot,
		message: `${tag} requires "${slot}" but no value was available`,
	}));
	return { draft, missing, issues };
}
