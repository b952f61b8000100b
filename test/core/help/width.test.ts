// PURITY: CORE
// INVARIANT: Width is counted in terminal cells

import { describe, expect, it } from "vitest";

import { spaces, textWidth } from "../../../src/core/help/width.js";

describe("textWidth", () => {
	it("counts ASCII one cell per character", () => {
		expect(textWidth("")).toBe(0);
		expect(textWidth("--foo")).toBe(5);
	});

	it("counts East Asian wide characters as two cells", () => {
		expect(textWidth("日本")).toBe(4);
	});

	it("ignores ANSI escape sequences", () => {
		expect(textWidth("\u001B[31mred\u001B[39m")).toBe(3);
	});
});

describe("spaces", () => {
	it("clamps negative counts to the empty string", () => {
		expect(spaces(3)).toBe("   ");
		expect(spaces(-2)).toBe("");
	});
});
