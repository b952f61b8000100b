// FORMAT THEOREM: ∀a: recognize(a) depends only on a
// PURITY: CORE
// INVARIANT: "-" is positional, "--" ends options, other "-"/"--" prefixes are options

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	isValidLongName,
	isValidShortName,
	recognize,
} from "../../../src/core/token/recognizer.js";

describe("recognize", () => {
	it("classifies the end-of-options marker and a bare dash", () => {
		expect(recognize("--")).toEqual({ kind: "endOfOptions" });
		expect(recognize("-")).toEqual({ kind: "positional", bareDash: true });
		expect(recognize("file.txt")).toEqual({ kind: "positional", bareDash: false });
	});

	it("splits a long option at the first equals sign", () => {
		expect(recognize("--foo-bar=123")).toEqual({
			kind: "long",
			name: "foo-bar",
			value: "123",
		});
		expect(recognize("--foo=a=b")).toEqual({ kind: "long", name: "foo", value: "a=b" });
	});

	it("gives an empty value for a trailing equals sign", () => {
		expect(recognize("--foo=")).toEqual({ kind: "long", name: "foo", value: "" });
	});

	it("has no value without an equals sign", () => {
		expect(recognize("--foo")).toEqual({ kind: "long", name: "foo", value: undefined });
	});

	it("reports the whole text after the dashes for an invalid long option", () => {
		expect(recognize("--1abc=x")).toEqual({ kind: "invalidLong", option: "1abc=x" });
		expect(recognize("--a_b")).toEqual({ kind: "invalidLong", option: "a_b" });
		expect(recognize("---aaa=123")).toEqual({ kind: "invalidLong", option: "-aaa=123" });
		expect(recognize("--ab%c=1")).toEqual({ kind: "invalidLong", option: "ab%c=1" });
	});

	it("reports the whole text when the long option starts with equals", () => {
		expect(recognize("--=x")).toEqual({ kind: "invalidLong", option: "=x" });
	});

	it("turns a short cluster into flags and a terminal", () => {
		expect(recognize("-abc")).toEqual({
			kind: "shortCluster",
			events: [
				{ kind: "flag", name: "a" },
				{ kind: "flag", name: "b" },
			],
			terminal: { name: "c", value: undefined },
		});
	});

	it("hands everything after the first equals sign to the last short name", () => {
		expect(recognize("-sa=b=c")).toEqual({
			kind: "shortCluster",
			events: [{ kind: "flag", name: "s" }],
			terminal: { name: "a", value: "b=c" },
		});
	});

	it("reports invalid characters inside a cluster and keeps scanning", () => {
		expect(recognize("-a1b")).toEqual({
			kind: "shortCluster",
			events: [
				{ kind: "flag", name: "a" },
				{ kind: "invalid", char: "1" },
			],
			terminal: { name: "b", value: undefined },
		});
	});

	it("treats a leading equals sign in a cluster as an invalid character", () => {
		expect(recognize("-=x")).toEqual({
			kind: "shortCluster",
			events: [{ kind: "invalid", char: "=" }],
			terminal: { name: "x", value: undefined },
		});
	});

	it("has no terminal when the character before equals is invalid", () => {
		expect(recognize("-a1=v")).toEqual({
			kind: "shortCluster",
			events: [
				{ kind: "flag", name: "a" },
				{ kind: "invalid", char: "1" },
			],
			terminal: undefined,
		});
	});

	it("classifies any text without a leading dash as positional", () => {
		fc.assert(
			fc.property(
				fc.string().filter((s) => !s.startsWith("-")),
				(arg) => {
					expect(recognize(arg)).toEqual({ kind: "positional", bareDash: false });
				},
			),
		);
	});

	it("accepts every valid long name with its value", () => {
		fc.assert(
			fc.property(
				fc.stringMatching(/^[A-Za-z][A-Za-z0-9-]{0,12}$/),
				fc.string(),
				(name, value) => {
					expect(recognize(`--${name}=${value}`)).toEqual({
						kind: "long",
						name,
						value,
					});
				},
			),
		);
	});
});

describe("name validity", () => {
	it("requires a leading letter for long names", () => {
		expect(isValidLongName("foo-bar2")).toBe(true);
		expect(isValidLongName("2foo")).toBe(false);
		expect(isValidLongName("")).toBe(false);
	});

	it("accepts exactly one ASCII letter as a short name", () => {
		expect(isValidShortName("f")).toBe(true);
		expect(isValidShortName("1")).toBe(false);
		expect(isValidShortName("é")).toBe(false);
	});
});
