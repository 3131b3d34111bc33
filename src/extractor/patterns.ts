import { normalize } from "../normalizer/index.js";
import { type Extraction, NOT_FOUND } from "./types.js";

export const MAX_AUTHORS = 10;
const MAX_DIRECT_AUTHORS = 4;

const SURNAME = String.raw`\p{Lu}[\p{Ll}'’]+(?:-\p{Lu}[\p{Ll}'’]+)?`;
const INITIALS = String.raw`\p{Lu}\.(?:\s*\p{Lu}\.)?`;

// "Дробышевский, Н. П."
const INVERTED_AUTHOR = new RegExp(String.raw`(?<![\p{L}\-])(${SURNAME}),\s*(${INITIALS})`, "gu");
// "Н. П. Дробышевский"
const DIRECT_AUTHOR = new RegExp(String.raw`(?<!\p{L})(${INITIALS})\s+(${SURNAME})`, "gu");

const YEAR_AFTER_SEPARATOR = /[,–—]\s*((?:19[5-9]|20[0-2])\d)\s*[.–—]/du;
const ANY_YEAR = /(?<!\d)((?:19[5-9]|20[0-2])\d)(?!\d)/du;

// "URL:", "ISBN:" and "DOI:" open an area the same way "Минск:" does.
const NOT_A_CITY = String.raw`(?!(?:URL|ISBN|DOI)(?!\p{L}))`;
const PLACE = String.raw`\p{Lu}[\p{L}.\-]*(?:\s*;\s*\p{Lu}[\p{L}.\-]*)?`;
const CITY_WITH_PUBLISHER = new RegExp(String.raw`[–—]\s*${NOT_A_CITY}(${PLACE})\s*:`, "du");
const CITY_WITH_YEAR = /[–—]\s*(\p{Lu}[\p{L}.\-]*),\s*(?:19|20)\d{2}/du;
const PUBLISHER = new RegExp(String.raw`[–—]\s*${NOT_A_CITY}${PLACE}\s*:\s*([^,–—]+?),`, "du");

const PAGE_COUNT = /[–—]\s*(\d+)\s*[сcpл]\./du;
const PAGE_RANGE = /(?<!\p{L})[СCP]\.\s*(\d+(?:\s*[–—-]\s*\d+)?)/du;

const JOURNAL = /\s\/\/\s+(.+?)(?=\.\s+[–—]\s|\.?\s*$)/du;
const PERIODICAL_SPLIT = /\s\/\/\s/u;
const VOLUME = /(?<!\p{L})(?:[ТT]|Vol)\.\s*(\d+)/du;
const ISSUE = /(?:№|No\.)\s*(\d+)/du;
const REGISTRATION = /[–—]\s*(\d{1,2}\/\d+)(?=\.?\s*$|\.\s+[–—]\s)/du;

const URL = /https?:\/\/[^\s<>"]+/du;
const URL_BODY = /https?:\/\/[^\s<>"]*[^\s<>".,;:)]/gu;
const ACCESS_DATE = /(?:дата\s+обращения|дата\s+доступа)\s*:?\s*(\d{2}\.\d{2}\.\d{4})/diu;
const ACCESS_DATE_ALL = new RegExp(ACCESS_DATE.source, "giu");
const DOI = /(?<![\p{N}.])(10\.\d{4,}\/\S+)/du;
const ISBN = /ISBN\s*:?\s*([\dXx][\dXx\-]{8,15}[\dXx])/du;
const EDITION = /(?<!\p{L})(\d+-е\s*изд\.(?:,\s*(?:испр|доп|перераб|стер)\.)*|Изд\.\s*\d+-е)/du;

const MEDIUM = /\s*\[(?!и др\.\]|et al\.\])([^\]]+)\]/u;
const TITLE_SEPARATORS = [" / ", " // ", ". – "];

function found<T>(value: T, start: number, end: number): Extraction<T> {
	return { found: true, value, start, end };
}

/** First match of `pattern` (compiled with the `d` flag), group `group`, trimmed. */
function firstGroup(pattern: RegExp, text: string, group = 1, offset = 0): Extraction<string> {
	const m = pattern.exec(text);
	const span = m?.indices?.[group];
	const raw = m?.[group];
	if (!span || raw === undefined) return NOT_FOUND;
	const value = raw.trim();
	if (!value) return NOT_FOUND;
	const start = span[0] + (raw.length - raw.trimStart().length) + offset;
	return found(value, start, start + value.length);
}

function blank(text: string, pattern: RegExp): string {
	return text.replace(pattern, (m) => " ".repeat(m.length));
}

/** Same-length copy of `text` with every URL blanked, so offsets still point into the source. */
export function blankUrls(text: string): string {
	return blank(text, URL_BODY);
}

function formatInitials(initials: string): string {
	return initials.replace(/\.\s*(?=\p{Lu})/gu, ". ").trim();
}

function collectAuthors(pattern: RegExp, text: string, limit: number, direct: boolean) {
	const names: string[] = [];
	let start = -1;
	let end = -1;
	for (const m of text.matchAll(pattern)) {
		if (names.length >= limit) break;
		const surname = direct ? m[2] : m[1];
		const initials = direct ? m[1] : m[2];
		if (!surname || !initials) continue;
		const name = `${surname}, ${formatInitials(initials)}`;
		if (names.includes(name)) continue;
		names.push(name);
		const index = m.index ?? 0;
		if (start < 0) start = index;
		end = index + m[0].length;
	}
	return { names, start, end };
}

/**
 * Inverted "Surname, I. O." entries first; when there are none, direct
 * "I. O. Surname" entries re-inverted to the same form.
 */
export function extractAuthors(text: string): Extraction<string[]> {
	const inverted = collectAuthors(INVERTED_AUTHOR, text, MAX_AUTHORS, false);
	if (inverted.names.length > 0) return found(inverted.names, inverted.start, inverted.end);
	const direct = collectAuthors(DIRECT_AUTHOR, text, MAX_DIRECT_AUTHORS, true);
	if (direct.names.length > 0) return found(direct.names, direct.start, direct.end);
	return NOT_FOUND;
}

/** End offset of an inverted author block that opens the text, or 0. */
export function leadingAuthorBlockEnd(text: string): number {
	const m = new RegExp(INVERTED_AUTHOR.source, "u").exec(text);
	if (!m || m.index !== 0) return 0;
	return m[0].length;
}

/** The access date is when the resource was read, not when it was published. */
export function extractYear(text: string): Extraction<number> {
	const body = blank(text, ACCESS_DATE_ALL);
	const hit = firstGroup(YEAR_AFTER_SEPARATOR, body);
	const year = hit.found ? hit : firstGroup(ANY_YEAR, body);
	if (!year.found) return NOT_FOUND;
	return found(Number(year.value), year.start, year.end);
}

export interface TitleParts {
	title: Extraction<string>;
	subtitle: Extraction<string>;
	medium: Extraction<string>;
}

function locate(text: string, value: string, from: number): Extraction<string> {
	const cleaned = normalize(value);
	if (!cleaned) return NOT_FOUND;
	const start = text.indexOf(value, from);
	return start < 0 ? found(cleaned, from, from) : found(cleaned, start, start + value.length);
}

/**
 * The title area runs from the end of a leading author block (or the start
 * of an author-less record) to the first "/", "//" or ". –" separator.
 */
function titleArea(text: string): { start: number; end: number } {
	const start = leadingAuthorBlockEnd(text);
	let end = text.length;
	for (const sep of TITLE_SEPARATORS) {
		const at = text.indexOf(sep, start);
		if (at >= 0 && at < end) end = at;
	}
	return { start, end };
}

/** Within the title area, the first " : " splits title from other title information. */
export function extractTitleParts(text: string): TitleParts {
	const { start: areaStart, end: areaEnd } = titleArea(text);
	let area = text.slice(areaStart, areaEnd);
	if (areaEnd === text.length) area = area.replace(/\.\s*$/, "");

	let medium: Extraction<string> = NOT_FOUND;
	const gmd = MEDIUM.exec(area);
	if (gmd?.[1]) {
		const start = areaStart + gmd.index + gmd[0].indexOf("[") + 1;
		medium = found(gmd[1].trim(), start, start + gmd[1].length);
		area = area.replace(gmd[0], "").replace(/\s*:\s*$/, "");
	}

	const colon = area.indexOf(" : ");
	const titleText = (colon >= 0 ? area.slice(0, colon) : area).trim();
	const subtitleText = colon >= 0 ? area.slice(colon + 3).trim() : "";
	return {
		title: titleText ? locate(text, titleText, areaStart) : NOT_FOUND,
		subtitle: subtitleText ? locate(text, subtitleText, areaStart) : NOT_FOUND,
		medium,
	};
}

export function extractCity(text: string): Extraction<string> {
	const paired = firstGroup(CITY_WITH_PUBLISHER, text);
	return paired.found ? paired : firstGroup(CITY_WITH_YEAR, text);
}

export function extractPublisher(text: string): Extraction<string> {
	return firstGroup(PUBLISHER, text);
}

/** "415 с." (page count) wins over a "С. 88–91" range. */
export function extractPages(text: string): Extraction<string> {
	const count = firstGroup(PAGE_COUNT, text);
	if (count.found) return count;
	const range = firstGroup(PAGE_RANGE, text);
	if (!range.found) return NOT_FOUND;
	return { ...range, value: range.value.replace(/\s*[–—-]\s*/, "–") };
}

export function extractJournal(text: string): Extraction<string> {
	const journal = firstGroup(JOURNAL, text);
	return journal.found ? { ...journal, value: normalize(journal.value) } : NOT_FOUND;
}

export function extractVolume(text: string): Extraction<string> {
	return firstGroup(VOLUME, text);
}

/**
 * An issue number follows the title area: in the host part after "//" when
 * there is one. A "№" inside the title ("Закон … № 130-З") belongs to it.
 */
export function extractIssue(text: string): Extraction<string> {
	const split = PERIODICAL_SPLIT.exec(text);
	const offset = split ? split.index + split[0].length : titleArea(text).end;
	return firstGroup(ISSUE, text.slice(offset), 1, offset);
}

/** "– 2/2565" closing an area: a legal act's number in the National Register. */
export function extractRegistration(text: string): Extraction<string> {
	return firstGroup(REGISTRATION, text);
}

export function extractUrl(text: string): Extraction<string> {
	const m = URL.exec(text);
	if (!m) return NOT_FOUND;
	let value = m[0].replace(/[.,;]+$/, "");
	if (value.endsWith(")") && !value.includes("(")) value = value.slice(0, -1);
	return found(value, m.index, m.index + value.length);
}

export function extractAccessDate(text: string): Extraction<string> {
	return firstGroup(ACCESS_DATE, text);
}

export function extractDoi(text: string): Extraction<string> {
	const doi = firstGroup(DOI, text);
	if (!doi.found) return NOT_FOUND;
	const value = doi.value.replace(/[.,;]+$/, "");
	return found(value, doi.start, doi.start + value.length);
}

export function extractIsbn(text: string): Extraction<string> {
	return firstGroup(ISBN, text);
}

export function extractEdition(text: string): Extraction<string> {
	return firstGroup(EDITION, text);
}
