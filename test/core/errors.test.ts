// PURITY: CORE
// INVARIANT: Every error carries a stable _tag and a message built from its fields

import { match } from "ts-pattern";
import { describe, expect, it } from "vitest";

import {
	ConfigHasDefaultsButHasNoArg,
	ConfigIsArrayButHasNoArg,
	type InvalidOption,
	OptionArgIsInvalid,
	OptionContainsInvalidChar,
	OptionIsNotArray,
	OptionNameIsDuplicated,
	OptionNeedsArg,
	OptionTakesNoArg,
	OptStoreDefinitionError,
	OsArgsContainInvalidUnicode,
	SchemaFileError,
	StoreKeyIsDuplicated,
	UnconfiguredOption,
} from "../../src/core/errors.js";

describe("error messages", () => {
	it("reports the index and lossy text of an undecodable argument", () => {
		const error = new OsArgsContainInvalidUnicode({ index: 2, osArg: "a�" });
		expect(error._tag).toBe("OsArgsContainInvalidUnicode");
		expect(error.message).toBe(
			'The command line arguments contain invalid unicode (index: 2, argument: "a�")',
		);
	});

	it("names the option for usage errors", () => {
		expect(new OptionContainsInvalidChar({ option: "a%" }).message).toBe(
			'The option contains invalid characters (option: "a%")',
		);
		expect(new UnconfiguredOption({ option: "foo" }).message).toBe(
			'The option is not specified in configurations (option: "foo")',
		);
		expect(new OptionNeedsArg({ option: "f", storeKey: "foo" }).message).toBe(
			'The option needs argument(s) (option: "f")',
		);
		expect(new OptionTakesNoArg({ option: "v", storeKey: "v" }).message).toBe(
			'The option takes no argument (option: "v")',
		);
		expect(new OptionIsNotArray({ option: "bar", storeKey: "bar" }).message).toBe(
			'The option cannot have multiple arguments (option: "bar")',
		);
	});

	it("includes argument and details of a rejected argument", () => {
		const error = new OptionArgIsInvalid({
			option: "n",
			storeKey: "num",
			optArg: "x",
			details: "invalid digit found in string",
		});
		expect(error.message).toBe(
			'The option argument is invalid (option: "n", argument: "x", details: invalid digit found in string)',
		);
	});

	it("names the storage key for schema errors", () => {
		expect(new StoreKeyIsDuplicated({ storeKey: "k", option: "a" }).message).toBe(
			'The store key is duplicated (store_key: "k")',
		);
		expect(
			new ConfigIsArrayButHasNoArg({ storeKey: "k", option: "a" }).message,
		).toBe(
			'The configuration is specified both having multiple arguments and having no argument (store_key: "k")',
		);
		expect(
			new ConfigHasDefaultsButHasNoArg({ storeKey: "k", option: "a" }).message,
		).toBe(
			'The configuration is specified both default argument(s) and having no argument (store_key: "k")',
		);
		expect(
			new OptionNameIsDuplicated({ storeKey: "k", option: "a" }).message,
		).toBe(
			'The option name in the configuration is duplicated (store_key: "k", name: "a")',
		);
	});

	it("describes definition and schema file failures", () => {
		expect(
			new OptStoreDefinitionError({ field: "verbose", reason: "bad" }).message,
		).toBe('Invalid option store definition (field: "verbose"): bad');
		expect(new SchemaFileError({ path: "x.json", detail: "missing" }).message).toBe(
			'Cannot load option schema (path: "x.json"): missing',
		);
	});

	it("keeps Error semantics", () => {
		const error = new UnconfiguredOption({ option: "foo" });
		expect(error).toBeInstanceOf(Error);
		expect(error.option).toBe("foo");
	});

	it("exposes the option on every parse error", () => {
		const errors: InvalidOption[] = [
			new UnconfiguredOption({ option: "a" }),
			new OptionNeedsArg({ option: "b", storeKey: "b" }),
			new StoreKeyIsDuplicated({ storeKey: "c", option: "c" }),
		];
		const tags = errors.map((error) =>
			match(error)
				.with({ _tag: "UnconfiguredOption" }, (e) => `unconfigured:${e.option}`)
				.with({ _tag: "OptionNeedsArg" }, (e) => `needs:${e.option}`)
				.otherwise((e) => `other:${e.option}`),
		);
		expect(tags).toEqual(["unconfigured:a", "needs:b", "other:c"]);
	});
});
