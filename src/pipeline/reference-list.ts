// "1. ", "12) " at the start of the text or after whitespace, before the entry's first character.
const MARKER = /(?<=^|\s)(\d{1,3})[.)]\s+(?=[\p{Lu}\[«"])/gu;

interface Marker {
	number: number;
	start: number;
	end: number;
}

/**
 * Split a numbered reference list into citation strings. Entries may sit on
 * their own lines or run together; markers are only accepted in sequence
 * (1, 2, 3, ...), so "№ 2. Изд." inside an entry does not start a new one.
 * Text without markers is split on non-empty lines.
 */
export function splitReferenceList(text: string): string[] {
	const markers: Marker[] = [];
	for (const m of text.matchAll(MARKER)) {
		const number = Number(m[1]);
		if (m.index === undefined) continue;
		const last = markers[markers.length - 1];
		// The first marker must open the text.
		if (!last && text.slice(0, m.index).trim() !== "") continue;
		if (last && number !== last.number + 1) continue;
		markers.push({ number, start: m.index, end: m.index + m[0].length });
	}

	if (markers.length === 0) {
		return text
			.split(/\r?\n/)
			.map((line) => line.trim())
			.filter((line) => line.length > 0);
	}

	return markers
		.map((marker, i) => text.slice(marker.end, markers[i + 1]?.start ?? text.length).trim())
		.filter((entry) => entry.length > 0);
}
