// PURITY: SHELL (process boundary)
// INVARIANT: Right(args) ⇒ |args| = |raw| ∧ every element is well-formed text
// COMPLEXITY: O(n) where n = Σ|raw_i|

import { Either } from "effect";

import { OsArgsContainInvalidUnicode } from "../core/errors.js";

/**
 * An argument as the process may hand it over.
 */
export type OsArg = string | Uint8Array;

const LONE_SURROGATE = /\p{Cs}/u;
const LONE_SURROGATES = /\p{Cs}/gu;

const strictDecoder = new TextDecoder("utf-8", { fatal: true });
const lossyDecoder = new TextDecoder("utf-8");

/**
 * Lossy rendering of an undecodable argument, with U+FFFD in place of each
 * invalid sequence.
 */
export const lossy = (raw: OsArg): string =>
	typeof raw === "string"
		? raw.replace(LONE_SURROGATES, "�")
		: lossyDecoder.decode(raw);

const decodeOne = (
	raw: OsArg,
	index: number,
): Either.Either<string, OsArgsContainInvalidUnicode> => {
	const invalid = (): OsArgsContainInvalidUnicode =>
		new OsArgsContainInvalidUnicode({ index, osArg: lossy(raw) });
	if (typeof raw === "string") {
		return LONE_SURROGATE.test(raw) ? Either.left(invalid()) : Either.right(raw);
	}
	return Either.try({
		try: () => strictDecoder.decode(raw),
		catch: invalid,
	});
};

/**
 * Converts raw process arguments to text, failing on the first element that
 * is not valid UTF-8 (byte input) or holds a lone surrogate (string input).
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * decodeOsArgs(["app", Uint8Array.of(0x66, 0xff)]);
 * // Left(OsArgsContainInvalidUnicode{ index: 1, osArg: "f�" })
 * ```
 */
export function decodeOsArgs(
	raw: readonly OsArg[],
): Either.Either<string[], OsArgsContainInvalidUnicode> {
	const decoded: string[] = [];
	for (const [index, item] of raw.entries()) {
		const text = decodeOne(item, index);
		if (Either.isLeft(text)) {
			return Either.left(text.left);
		}
		decoded.push(text.right);
	}
	return Either.right(decoded);
}
