import { describe, expect, it } from "vitest";
import {
	BOOK,
	DISSERTATION,
	ELECTRONIC_RESOURCE,
	JOURNAL_ARTICLE,
	LAW,
} from "../../__tests__/fixtures.js";
import { type Extraction, extract } from "../index.js";

function valueOf<T>(field: Extraction<T>): T | undefined {
	return field.found ? field.value : undefined;
}

describe("extract", () => {
	it("pulls book fields", () => {
		const fields = extract(BOOK);
		expect(valueOf(fields.authors)).toEqual(["Дробышевский, Н. П."]);
		expect(valueOf(fields.title)).toBe("Ревизия и аудит");
		expect(valueOf(fields.subtitle)).toBe("учеб.-метод. пособие");
		expect(valueOf(fields.city)).toBe("Минск");
		expect(valueOf(fields.publisher)).toBe("Амалфея");
		expect(valueOf(fields.year)).toBe(2013);
		expect(valueOf(fields.pages)).toBe("415");
		expect(fields.journal.found).toBe(false);
		expect(fields.url.found).toBe(false);
	});

	it("pulls journal article fields with offsets into the source", () => {
		const fields = extract(JOURNAL_ARTICLE);
		expect(valueOf(fields.authors)).toEqual(["Валатоўская, Н. А."]);
		expect(valueOf(fields.journal)).toBe("Нар. асвета");
		expect(valueOf(fields.issue)).toBe("5");
		expect(valueOf(fields.pages)).toBe("88–91");
		expect(valueOf(fields.year)).toBe(2013);
		expect(fields.city.found).toBe(false);

		for (const field of [fields.title, fields.journal, fields.issue, fields.pages]) {
			if (!field.found) throw new Error("expected field to be found");
			expect(JOURNAL_ARTICLE.slice(field.start, field.end)).toBe(field.value);
		}
		expect(fields.title.found && fields.title.start).toBe(19);
	});

	it("pulls dissertation fields, falling back to City, Year", () => {
		const fields = extract(DISSERTATION);
		expect(valueOf(fields.title)).toBe("Гістарыяграфія гісторыі");
		expect(valueOf(fields.subtitle)).toBe("дыс. ... канд. гіст. навук : 07.00.09");
		expect(valueOf(fields.city)).toBe("Мінск");
		expect(fields.publisher.found).toBe(false);
		expect(valueOf(fields.pages)).toBe("148");
	});

	it("lifts the material designation out of the title", () => {
		const fields = extract(ELECTRONIC_RESOURCE);
		expect(valueOf(fields.title)).toBe("Национальный правовой Интернет-портал Республики Беларусь");
		expect(valueOf(fields.medium)).toBe("Электронный ресурс");
		expect(valueOf(fields.url)).toBe("http://www.pravo.by");
		expect(valueOf(fields.accessDate)).toBe("24.06.2024");
		expect(fields.authors.found).toBe(false);
	});

	it("does not take the access date for the publication year", () => {
		expect(extract(ELECTRONIC_RESOURCE).year.found).toBe(false);
	});

	it("marks every field not found for empty input", () => {
		const fields = extract("");
		expect(Object.values(fields).every((f) => !f.found)).toBe(true);
	});

	describe("authors", () => {
		it("records the span of the author block", () => {
			const { authors } = extract(BOOK);
			expect(authors).toEqual({ found: true, value: ["Дробышевский, Н. П."], start: 0, end: 19 });
		});

		it("drops repeated names", () => {
			const { authors } = extract("Иванов, И. И., Иванов, И. И. Книга");
			expect(valueOf(authors)).toEqual(["Иванов, И. И."]);
		});

		it("falls back to direct-form names", () => {
			const { authors } = extract("Сборник задач / под ред. И. И. Иванова. – Минск, 2010.");
			expect(valueOf(authors)).toEqual(["Иванова, И. И."]);
		});

		it("spaces run-together initials", () => {
			const { authors } = extract("Иванов, И.И. Книга");
			expect(valueOf(authors)).toEqual(["Иванов, И. И."]);
		});
	});

	describe("other fields", () => {
		const text =
			"Иванов, И. И. Физика. – 2-е изд., испр. – Минск : Вышэйшая школа, 2015. – 300 с. – ISBN 978-985-06-1234-5.";

		it("reads edition, publisher and ISBN", () => {
			const fields = extract(text);
			expect(valueOf(fields.title)).toBe("Физика");
			expect(valueOf(fields.edition)).toBe("2-е изд., испр.");
			expect(valueOf(fields.city)).toBe("Минск");
			expect(valueOf(fields.publisher)).toBe("Вышэйшая школа");
			expect(valueOf(fields.year)).toBe(2015);
			expect(valueOf(fields.pages)).toBe("300");
			expect(valueOf(fields.isbn)).toBe("978-985-06-1234-5");
		});

		it("reads a DOI without its trailing period", () => {
			const { doi } = extract("Статья // Журнал. – 2020. – Т. 3. – DOI: 10.1234/abc.2020.5.");
			expect(valueOf(doi)).toBe("10.1234/abc.2020.5");
		});

		it("reads the volume", () => {
			const { volume } = extract("Статья // Журнал. – 2020. – Т. 3. – С. 1–2.");
			expect(valueOf(volume)).toBe("3");
		});

		it("trims closing punctuation from a URL", () => {
			const { url } = extract("Сайт (https://example.by/x).");
			expect(valueOf(url)).toBe("https://example.by/x");
		});

		it("reads the GOST access date", () => {
			const { accessDate } = extract("URL: https://example.by (дата обращения: 01.02.2024).");
			expect(valueOf(accessDate)).toBe("01.02.2024");
		});

		it("reads city and publisher with no space before the colon", () => {
			const fields = extract("Сидоров, С. С. Физика / С. С. Сидоров. – Минск: Наука, 2013. – 100 с.");
			expect(valueOf(fields.city)).toBe("Минск");
			expect(valueOf(fields.publisher)).toBe("Наука");
		});

		it("does not read URL: as a city", () => {
			const { city } = extract("Сайт. – URL: https://example.by (дата обращения: 01.02.2024).");
			expect(city.found).toBe(false);
		});

		it("reads nothing but the URL from a URL's path", () => {
			const fields = extract(
				"Документы [Электронный ресурс]. – Режим доступа: http://x.by/doc_2015-2020/No.5. – Дата доступа: 01.02.2024.",
			);
			expect(valueOf(fields.url)).toBe("http://x.by/doc_2015-2020/No.5");
			expect(fields.year.found).toBe(false);
			expect(fields.issue.found).toBe(false);
		});

		it("normalizes a spaced hyphen page range", () => {
			const { pages } = extract("Статья // Журнал. – 2020. – С. 88 - 91.");
			expect(valueOf(pages)).toBe("88–91");
		});
	});

	describe("legal acts", () => {
		it("keeps the act number in the title and reads the register number", () => {
			const fields = extract(LAW);
			expect(fields.authors.found).toBe(false);
			expect(valueOf(fields.title)).toBe("О нормативных правовых актах");
			expect(valueOf(fields.subtitle)).toBe("Закон Респ. Беларусь от 17 июля 2018 г. № 130-З");
			expect(valueOf(fields.journal)).toBe("Нац. правовой Интернет-портал Респ. Беларусь");
			expect(valueOf(fields.year)).toBe(2018);
			expect(fields.issue.found).toBe(false);
			expect(fields.registration).toEqual({
				found: true,
				value: "2/2565",
				start: LAW.length - 7,
				end: LAW.length - 1,
			});
			expect(fields.city.found).toBe(false);
			expect(fields.pages.found).toBe(false);
		});

		it("reads an issue number that follows the title area", () => {
			const { issue } = extract("Каталог изданий. – Минск, 2019. – № 4.");
			expect(valueOf(issue)).toBe("4");
		});
	});
});
