// PURITY: SHELL (reads fixture files)
// INVARIANT: Every decoding failure names the offending entry

import { fileURLToPath } from "node:url";

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import { decodeSchemaDocument, loadSchemaFile } from "../../../src/shell/config/loader.js";

const fixture = (name: string): string =>
	fileURLToPath(new URL(`../../fixtures/${name}`, import.meta.url));

describe("decodeSchemaDocument", () => {
	it("decodes entries with neutral defaults for omitted keys", () => {
		const decoded = decodeSchemaDocument({
			options: [{ names: ["f", "foo"], takesArg: true, type: "int32" }, {}],
		});
		expect(Either.isRight(decoded)).toBe(true);
		if (Either.isRight(decoded)) {
			const [first, second] = decoded.right;
			expect(first?.names).toEqual(["f", "foo"]);
			expect(first?.takesArg).toBe(true);
			expect(first?.defaults).toBeUndefined();
			expect(first !== undefined && Either.isLeft(first.validator("f", "f", "x"))).toBe(
				true,
			);
			expect(second?.storeKey).toBe("");
			expect(second?.names).toEqual([]);
		}
	});

	it("requires an object with an options array", () => {
		expect(decodeSchemaDocument([])).toEqual(Either.left("the document must be an object"));
		expect(decodeSchemaDocument({ option: [] })).toEqual(
			Either.left('the document must have an "options" array'),
		);
	});

	it("names the entry and key of a malformed field", () => {
		expect(decodeSchemaDocument({ options: [{}, 3] })).toEqual(
			Either.left("options[1]: must be an object"),
		);
		expect(decodeSchemaDocument({ options: [{ names: "f" }] })).toEqual(
			Either.left("options[0].names: must be an array of strings"),
		);
		expect(decodeSchemaDocument({ options: [{ takesArg: "yes" }] })).toEqual(
			Either.left("options[0].takesArg: must be a boolean"),
		);
		expect(decodeSchemaDocument({ options: [{ desc: 1 }] })).toEqual(
			Either.left("options[0].desc: must be a string"),
		);
	});

	it("rejects an unknown numeric type", () => {
		expect(decodeSchemaDocument({ options: [{ type: "int7" }] })).toEqual(
			Either.left('options[0].type: unknown numeric type "int7"'),
		);
	});
});

describe("loadSchemaFile", () => {
	it("loads configurations from a file", async () => {
		const cfgs = await Effect.runPromise(loadSchemaFile(fixture("schema.json")));
		expect(cfgs.map((cfg) => cfg.names)).toEqual([["n", "num"], ["v", "verbose"], ["m"]]);
		expect(cfgs[0]?.argInHelp).toBe("<n>");
		expect(cfgs[2]?.storeKey).toBe("mode");
		expect(cfgs[2]?.defaults).toEqual(["fast"]);
	});

	it("fails with the path of a missing file", async () => {
		const path = fixture("missing.json");
		const result = await Effect.runPromise(Effect.either(loadSchemaFile(path)));
		expect(Either.isLeft(result) && result.left._tag).toBe("SchemaFileError");
		expect(Either.isLeft(result) && result.left.path).toBe(path);
		expect(Either.isLeft(result) && result.left.detail).toContain("ENOENT");
	});

	it("fails on malformed JSON", async () => {
		const result = await Effect.runPromise(
			Effect.either(loadSchemaFile(fixture("broken-schema.json"))),
		);
		expect(Either.isLeft(result) && result.left._tag).toBe("SchemaFileError");
	});
});
