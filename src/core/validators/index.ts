// PURITY: CORE
// INVARIANT: Validators never inspect anything but their arguments
// COMPLEXITY: O(n) per call where n = |optArg|

import { Either } from "effect";

import { OptionArgIsInvalid } from "../errors.js";
import type { Validator } from "../models.js";
import { type NumericKind, parseNumeric } from "./numeric.js";

export * from "./numeric.js";

/**
 * Accepts every argument. Default validator of a configuration.
 *
 * @pure true
 */
export const validateAny: Validator = () => Either.right(undefined);

/**
 * Builds a validator that accepts text parseable as `kind` over its full
 * range.
 *
 * @pure true
 * @invariant Left ⇒ error.details is the numeric parser's reason
 *
 * @example
 * ```ts
 * const v = validateNumber("int8");
 * v("level", "l", "127"); // Right(undefined)
 * v("level", "l", "128"); // Left(OptionArgIsInvalid{ details: "number too large to fit in target type" })
 * ```
 */
export const validateNumber =
	(kind: NumericKind): Validator =>
	(storeKey, option, optArg) =>
		Either.match(parseNumeric(kind, optArg), {
			onLeft: (details) =>
				Either.left(
					new OptionArgIsInvalid({ option, storeKey, optArg, details }),
				),
			onRight: () => Either.right(undefined),
		});
