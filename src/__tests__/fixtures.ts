import { type ExtractedFields, NOT_FOUND } from "../extractor/types.js";

export const BOOK =
	"Дробышевский, Н. П. Ревизия и аудит : учеб.-метод. пособие / Н. П. Дробышевский. – Минск : Амалфея, 2013. – 415 с.";

export const JOURNAL_ARTICLE =
	"Валатоўская, Н. А. Традыцыйны вясельны абрад / Н. А. Валатоўская // Нар. асвета. – 2013. – № 5. – С. 88–91.";

export const DISSERTATION =
	"Врублеўскі, Ю. У. Гістарыяграфія гісторыі : дыс. ... канд. гіст. навук : 07.00.09 / Ю. У. Врублеўскі. – Мінск, 2013. – 148 л.";

export const ELECTRONIC_RESOURCE =
	"Национальный правовой Интернет-портал Республики Беларусь [Электронный ресурс]. – Режим доступа: http://www.pravo.by. – Дата доступа: 24.06.2024.";

export const LAW =
	"О нормативных правовых актах : Закон Респ. Беларусь от 17 июля 2018 г. № 130-З // Нац. правовой Интернет-портал Респ. Беларусь. – 2018. – 2/2565.";

export const NO_MARKERS = "просто какой-то текст без признаков";

type FieldValues = {
	[K in keyof ExtractedFields]?: Extract<ExtractedFields[K], { found: true }>["value"];
};

/** Build ExtractedFields from plain values; offsets are -1 as for record input. */
export function fieldsOf(values: FieldValues): ExtractedFields {
	const at = <T>(value: T | undefined) =>
		value === undefined ? NOT_FOUND : { found: true as const, value, start: -1, end: -1 };
	return {
		authors: at(values.authors),
		title: at(values.title),
		subtitle: at(values.subtitle),
		medium: at(values.medium),
		year: at(values.year),
		edition: at(values.edition),
		city: at(values.city),
		publisher: at(values.publisher),
		pages: at(values.pages),
		journal: at(values.journal),
		volume: at(values.volume),
		issue: at(values.issue),
		registration: at(values.registration),
		url: at(values.url),
		accessDate: at(values.accessDate),
		doi: at(values.doi),
		isbn: at(values.isbn),
	};
}
