import { describe, it, expect } from "vitest";
import { escapeForMarkdown, escapeForTableCell, escapeForYaml, stripControlCodes } from "../../../src/render/escape";

describe("stripControlCodes", () => {
	it("strips terminal colour sequences", () => {
		expect(stripControlCodes("\x1B[1;31mred\x1B[0m")).toBe("red");
	});

	it("drops bell and backspace but keeps tabs", () => {
		expect(stripControlCodes("done\x07\x08\tok")).toBe("done\tok");
	});

	it("returns plain text unchanged", () => {
		expect(stripControlCodes("plain entry")).toBe("plain entry");
	});
});

describe("escapeForMarkdown", () => {
	it("escapes HTML angle brackets", () => {
		expect(escapeForMarkdown("<b>big day</b>")).toBe("&lt;b&gt;big day&lt;/b&gt;");
	});

	it("escapes hashtags at a word start", () => {
		expect(escapeForMarkdown("Feeling #grateful today")).toBe("Feeling \\#grateful today");
	});

	it("leaves numeric hashes and mid-word hashes alone", () => {
		expect(escapeForMarkdown("Ran lap #3 in C#")).toBe("Ran lap #3 in C#");
	});

	it("collapses line breaks so an entry stays in its bullet", () => {
		expect(escapeForMarkdown("First line\n\n- not a bullet")).toBe("First line - not a bullet");
	});
});

describe("escapeForTableCell", () => {
	it("escapes pipes", () => {
		expect(escapeForTableCell("this | that")).toBe("this \\| that");
	});
});

describe("escapeForYaml", () => {
	it("quotes values with YAML-special characters", () => {
		expect(escapeForYaml("2025-06-15T12:00:00.000Z")).toBe('"2025-06-15T12:00:00.000Z"');
	});

	it("escapes quotes inside a quoted value", () => {
		expect(escapeForYaml('say "hi"')).toBe('"say \\"hi\\""');
	});

	it("leaves plain values bare", () => {
		expect(escapeForYaml("2025-06-09 to 2025-06-15")).toBe("2025-06-09 to 2025-06-15");
	});
});
