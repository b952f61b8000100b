// PURITY: SHELL (each test owns its invocation)
// INVARIANT: Every parse operation starts from an empty result

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { opt } from "../../src/core/binding/fields.js";
import { defineOptStore } from "../../src/core/binding/store.js";
import {
	OptionContainsInvalidChar,
	OsArgsContainInvalidUnicode,
	UnconfiguredOption,
} from "../../src/core/errors.js";
import { makeOptionConfig } from "../../src/core/schema/option-config.js";
import { basename, Invocation } from "../../src/shell/invocation.js";

describe("basename", () => {
	it("keeps the text after the last separator", () => {
		expect(basename("/usr/local/bin/app")).toBe("app");
		expect(basename("C:\\tools\\app.exe")).toBe("app.exe");
		expect(basename("app")).toBe("app");
		expect(basename("")).toBe("");
	});
});

describe("Invocation", () => {
	it("parses without configurations", () => {
		const inv = Invocation.fromStrings(["/usr/bin/app", "--foo-bar=123", "bar", "-v"]);
		expect(inv.parse()).toEqual(Either.right(undefined));
		expect(inv.name).toBe("app");
		expect(inv.args).toEqual(["bar"]);
		expect(inv.hasOpt("foo-bar")).toBe(true);
		expect(inv.optArg("foo-bar")).toBe("123");
		expect(inv.optArgs("foo-bar")).toEqual(["123"]);
	});

	it("distinguishes an absent option from one given without a value", () => {
		const inv = Invocation.fromStrings(["app", "-v"]);
		inv.parse();
		expect(inv.optArgs("v")).toEqual([]);
		expect(inv.optArg("v")).toBeUndefined();
		expect(inv.optArgs("w")).toBeUndefined();
		expect(inv.hasOpt("w")).toBe(false);
	});

	it("has an empty name for an empty vector", () => {
		const inv = Invocation.fromStrings([]);
		expect(inv.parse()).toEqual(Either.right(undefined));
		expect(inv.name).toBe("");
		expect(inv.args).toEqual([]);
	});

	it("returns copies of its collections", () => {
		const inv = Invocation.fromStrings(["app", "--tag=a", "x"]);
		inv.parse();
		expect(inv.optArgs("tag")).not.toBe(inv.optArgs("tag"));
		expect(inv.args).not.toBe(inv.args);
		expect(inv.args).toEqual(["x"]);
	});

	it("retains the configurations of the last schema-driven parse", () => {
		const cfgs = [makeOptionConfig({ names: ["foo"], takesArg: true })];
		const inv = Invocation.fromStrings(["app", "--foo", "bar"]);
		expect(inv.parseWith(cfgs)).toEqual(Either.right(undefined));
		expect(inv.cfgs).toBe(cfgs);
		expect(inv.optArg("foo")).toBe("bar");

		inv.parse();
		expect(inv.cfgs).toEqual([]);
		expect(inv.optArgs("foo")).toEqual([]);
		expect(inv.args).toEqual(["bar"]);
	});

	it("reports an unconfigured option", () => {
		const inv = Invocation.fromStrings(["app", "--nope"]);
		expect(inv.parseWith([])).toEqual(
			Either.left(new UnconfiguredOption({ option: "nope" })),
		);
	});

	it("builds from raw bytes and rejects invalid UTF-8", () => {
		const valid = Invocation.fromOsArgs([new TextEncoder().encode("/bin/tool"), "-x"]);
		expect(Either.isRight(valid) && valid.right.name).toBe("tool");
		expect(Invocation.fromOsArgs(["app", Uint8Array.of(0x80)])).toEqual(
			Either.left(new OsArgsContainInvalidUnicode({ index: 1, osArg: "\uFFFD" })),
		);
	});

	it("reports the whole text of an invalid long option", () => {
		expect(Invocation.fromStrings(["app", "---aaa=123"]).parse()).toEqual(
			Either.left(new OptionContainsInvalidChar({ option: "-aaa=123" })),
		);
	});

	it("records that its last parse passed the end-of-options marker", () => {
		const inv = Invocation.fromStrings(["app", "--foo", "--", "x"]);
		expect(inv.isAfterEndOpt).toBe(false);
		inv.parse();
		expect(inv.isAfterEndOpt).toBe(true);
		expect(inv.args).toEqual(["x"]);

		inv.parseWith([makeOptionConfig({ names: ["foo"], takesArg: true })]);
		expect(inv.optArg("foo")).toBe("--");
		expect(inv.isAfterEndOpt).toBe(false);
	});

	it("serializes to a plain snapshot", () => {
		const inv = Invocation.fromStrings(["app", "--a=1", "--a=2", "x"]);
		inv.parse();
		expect(JSON.parse(JSON.stringify(inv))).toEqual({
			name: "app",
			args: ["x"],
			opts: { a: ["1", "2"] },
			isAfterEndOpt: false,
		});
	});
});

describe("subcommands", () => {
	it("hands the tail after the subcommand to a child invocation", () => {
		const inv = Invocation.fromStrings(["app", "--foo", "sub", "--bar", "x"]);
		const sub = inv.parseUntilSubCmdWith([makeOptionConfig({ names: ["foo"] })]);
		expect(inv.hasOpt("foo")).toBe(true);
		expect(inv.args).toEqual([]);
		expect(Either.isRight(sub)).toBe(true);
		if (Either.isRight(sub) && sub.right !== undefined) {
			const child = sub.right;
			expect(child.name).toBe("sub");
			expect(child.isAfterEndOpt).toBe(false);
			expect(child.parse()).toEqual(Either.right(undefined));
			expect(child.optArgs("bar")).toEqual([]);
			expect(child.args).toEqual(["x"]);
		}
	});

	it("marks a child created after the end-of-options marker", () => {
		const inv = Invocation.fromStrings(["app", "-v", "--", "sub/cmd", "--x"]);
		const sub = inv.parseUntilSubCmd();
		const child = Either.isRight(sub) ? sub.right : undefined;
		expect(child?.name).toBe("sub/cmd");
		expect(child?.isAfterEndOpt).toBe(true);
		child?.parse();
		expect(child?.args).toEqual(["--x"]);
		expect(child?.hasOpt("x")).toBe(false);
	});

	it("returns undefined when there is no subcommand", () => {
		expect(Invocation.fromStrings(["app", "-v"]).parseUntilSubCmd()).toEqual(
			Either.right(undefined),
		);
	});

	it("binds the parent's options before descending", () => {
		const store = defineOptStore({
			verbose: opt.boolean({ cfg: "v,verbose" }),
			dir: opt.string({ cfg: "C", arg: "<dir>" }),
		});
		const options = store.withDefaults({ verbose: false, dir: "" });
		const inv = Invocation.fromStrings(["git", "-v", "-C", "repo", "status", "-s"]);
		const sub = inv.parseUntilSubCmdFor(store, options);
		expect(options).toEqual({ verbose: true, dir: "repo" });
		const child = Either.isRight(sub) ? sub.right : undefined;
		expect(child?.name).toBe("status");
		child?.parse();
		expect(child?.hasOpt("s")).toBe(true);
	});
});
