// PURITY: SHELL (reads the filesystem); decoding is pure
// EFFECT: Effect<readonly OptionConfig[], SchemaFileError>
// INVARIANT: Every decoded entry satisfies the OptionConfig field types
// COMPLEXITY: O(n) where n = |file|

import * as fs from "node:fs";

import { Effect, Either } from "effect";

import { SchemaFileError } from "../../core/errors.js";
import type { OptionConfig } from "../../core/models.js";
import { makeOptionConfig } from "../../core/schema/option-config.js";
import {
	isNumericKind,
	validateAny,
	validateNumber,
} from "../../core/validators/index.js";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isJSONArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return isJSONArray(value) && value.every((item) => typeof item === "string");
}

const fieldError = (at: string, detail: string): Either.Either<never, string> =>
	Either.left(`${at}: ${detail}`);

const optionalString = (
	entry: JSONObject,
	key: string,
	at: string,
): Either.Either<string | undefined, string> => {
	const value = entry[key];
	if (value === undefined || typeof value === "string") {
		return Either.right(value);
	}
	return fieldError(`${at}.${key}`, "must be a string");
};

const optionalBoolean = (
	entry: JSONObject,
	key: string,
	at: string,
): Either.Either<boolean | undefined, string> => {
	const value = entry[key];
	if (value === undefined || typeof value === "boolean") {
		return Either.right(value);
	}
	return fieldError(`${at}.${key}`, "must be a boolean");
};

const optionalStrings = (
	entry: JSONObject,
	key: string,
	at: string,
): Either.Either<readonly string[] | undefined, string> => {
	const value = entry[key];
	if (value === undefined || isStringArray(value)) {
		return Either.right(value);
	}
	return fieldError(`${at}.${key}`, "must be an array of strings");
};

/**
 * Decodes one entry of the `options` array.
 *
 * Recognized keys: storeKey, names, takesArg, isArray, defaults, desc,
 * argInHelp, and `type` (a numeric kind such as "int32" or "float64" that
 * selects the number validator).
 *
 * @pure true
 */
function decodeOption(
	value: JSONValue,
	index: number,
): Either.Either<OptionConfig, string> {
	const at = `options[${index}]`;
	if (!isJSONObject(value)) {
		return fieldError(at, "must be an object");
	}
	return Either.gen(function* () {
		const type = yield* optionalString(value, "type", at);
		if (type !== undefined && !isNumericKind(type)) {
			return yield* fieldError(`${at}.type`, `unknown numeric type "${type}"`);
		}
		return makeOptionConfig({
			storeKey: yield* optionalString(value, "storeKey", at),
			names: yield* optionalStrings(value, "names", at),
			takesArg: yield* optionalBoolean(value, "takesArg", at),
			isArray: yield* optionalBoolean(value, "isArray", at),
			defaults: yield* optionalStrings(value, "defaults", at),
			desc: yield* optionalString(value, "desc", at),
			argInHelp: yield* optionalString(value, "argInHelp", at),
			validator: type === undefined ? validateAny : validateNumber(type),
		});
	});
}

/**
 * Decodes a schema document `{ "options": [ ... ] }`.
 *
 * @pure true
 * @invariant Right(cfgs) ⇒ |cfgs| = |document.options|
 *
 * @example
 * ```ts
 * decodeSchemaDocument({ options: [{ names: ["f", "foo"], takesArg: true, type: "int32" }] });
 * // Right([OptionConfig{ storeKey: "", names: ["f", "foo"], takesArg: true, ... }])
 * ```
 */
export function decodeSchemaDocument(
	document: JSONValue,
): Either.Either<readonly OptionConfig[], string> {
	if (!isJSONObject(document)) {
		return Either.left("the document must be an object");
	}
	const options = document["options"];
	if (options === undefined || !isJSONArray(options)) {
		return Either.left('the document must have an "options" array');
	}
	return Either.all(options.map((entry, index) => decodeOption(entry, index)));
}

/**
 * Loads option configurations from a JSON schema file.
 *
 * @pure false (reads the filesystem)
 * @effect Effect<readonly OptionConfig[], SchemaFileError>
 */
export function loadSchemaFile(
	path: string,
): Effect.Effect<readonly OptionConfig[], SchemaFileError> {
	return Effect.gen(function* () {
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(path, "utf8"),
			catch: (error) =>
				new SchemaFileError({
					path,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		const document = yield* Effect.try({
			try: (): JSONValue => JSON.parse(raw),
			catch: (error) =>
				new SchemaFileError({
					path,
					detail: error instanceof Error ? error.message : String(error),
				}),
		});
		return yield* Either.mapLeft(
			decodeSchemaDocument(document),
			(detail) => new SchemaFileError({ path, detail }),
		);
	});
}
