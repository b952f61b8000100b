// PURITY: CORE
// INVARIANT: Empty name slots shift the title or widen the separator by 4 columns

import { describe, expect, it } from "vitest";

import { makeOptTitle } from "../../../src/core/help/title.js";
import { makeOptionConfig } from "../../../src/core/schema/option-config.js";

describe("makeOptTitle", () => {
	it("joins short and long names with commas", () => {
		expect(makeOptTitle(makeOptionConfig({ names: ["f", "b", "foo-bar"] }))).toEqual({
			firstIndent: 0,
			title: "-f, -b, --foo-bar",
		});
	});

	it("turns leading and inner empty names into alignment columns", () => {
		expect(makeOptTitle(makeOptionConfig({ names: ["", "f", "", "b", ""] }))).toEqual({
			firstIndent: 4,
			title: "-f,     -b",
		});
	});

	it("appends the argument display name", () => {
		expect(
			makeOptTitle(
				makeOptionConfig({
					names: ["", "", "f", "", "foo-bar", ""],
					argInHelp: "<num>",
				}),
			),
		).toEqual({ firstIndent: 8, title: "-f,     --foo-bar <num>" });
	});

	it("falls back to the storage key when there is no real name", () => {
		expect(makeOptTitle(makeOptionConfig({ storeKey: "FooBar", names: ["", ""] }))).toEqual(
			{ firstIndent: 8, title: "--FooBar" },
		);
		expect(makeOptTitle(makeOptionConfig({ storeKey: "x" }))).toEqual({
			firstIndent: 0,
			title: "-x",
		});
	});
});
