// PURITY: CORE
// INVARIANT: Accepted text ⇔ value lies in the full range of the target kind
// COMPLEXITY: O(n) where n = |text|

import { Either } from "effect";

/**
 * Integer kinds whose full range fits a JavaScript `number`.
 */
export type SmallIntegerKind =
	| "int8"
	| "int16"
	| "int32"
	| "uint8"
	| "uint16"
	| "uint32";

/**
 * Integer kinds represented as `bigint`. `isize`/`usize` are 64 bits wide.
 */
export type BigIntegerKind =
	| "int64"
	| "int128"
	| "isize"
	| "uint64"
	| "uint128"
	| "usize";

export type FloatKind = "float32" | "float64";

export type IntegerKind = SmallIntegerKind | BigIntegerKind;

export type NumberKind = SmallIntegerKind | FloatKind;

export type NumericKind = IntegerKind | FloatKind;

/**
 * Value produced for a kind: `bigint` for wide integers, `number` otherwise.
 */
export type NumericValue<K extends NumericKind> = K extends BigIntegerKind
	? bigint
	: number;

export const INT_EMPTY = "cannot parse integer from empty string";
export const INT_INVALID_DIGIT = "invalid digit found in string";
export const INT_POS_OVERFLOW = "number too large to fit in target type";
export const INT_NEG_OVERFLOW = "number too small to fit in target type";
export const FLOAT_EMPTY = "cannot parse float from empty string";
export const FLOAT_INVALID = "invalid float literal";

interface IntegerRange {
	readonly min: bigint;
	readonly max: bigint;
}

const signedRange = (bits: bigint): IntegerRange => ({
	min: -(1n << (bits - 1n)),
	max: (1n << (bits - 1n)) - 1n,
});

const unsignedRange = (bits: bigint): IntegerRange => ({
	min: 0n,
	max: (1n << bits) - 1n,
});

const INTEGER_RANGES: Readonly<Record<IntegerKind, IntegerRange>> = {
	int8: signedRange(8n),
	int16: signedRange(16n),
	int32: signedRange(32n),
	int64: signedRange(64n),
	int128: signedRange(128n),
	isize: signedRange(64n),
	uint8: unsignedRange(8n),
	uint16: unsignedRange(16n),
	uint32: unsignedRange(32n),
	uint64: unsignedRange(64n),
	uint128: unsignedRange(128n),
	usize: unsignedRange(64n),
};

const BIG_INTEGER_KINDS: ReadonlySet<string> = new Set<BigIntegerKind>([
	"int64",
	"int128",
	"isize",
	"uint64",
	"uint128",
	"usize",
]);

const FLOAT_KINDS: ReadonlySet<string> = new Set<FloatKind>([
	"float32",
	"float64",
]);

export const NUMERIC_KINDS: readonly NumericKind[] = [
	"int8",
	"int16",
	"int32",
	"int64",
	"int128",
	"isize",
	"uint8",
	"uint16",
	"uint32",
	"uint64",
	"uint128",
	"usize",
	"float32",
	"float64",
];

export const isBigIntegerKind = (kind: NumericKind): kind is BigIntegerKind =>
	BIG_INTEGER_KINDS.has(kind);

export const isFloatKind = (kind: NumericKind): kind is FloatKind =>
	FLOAT_KINDS.has(kind);

export const isNumericKind = (text: string): text is NumericKind =>
	NUMERIC_KINDS.some((kind) => kind === text);

const DIGITS = /^[0-9]+$/u;

/**
 * Parses an integer of the given kind into a `bigint` with range check.
 *
 * @pure true
 * @invariant Right(v) ⇒ min(kind) <= v <= max(kind)
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseIntegerText("uint8", "255"); // Right(255n)
 * parseIntegerText("uint8", "256"); // Left("number too large to fit in target type")
 * parseIntegerText("uint8", "-1");  // Left("invalid digit found in string")
 * ```
 */
export function parseIntegerText(
	kind: IntegerKind,
	text: string,
): Either.Either<bigint, string> {
	if (text.length === 0) {
		return Either.left(INT_EMPTY);
	}
	const range = INTEGER_RANGES[kind];
	const first = text.charAt(0);
	const negative = first === "-";
	if (negative && range.min === 0n) {
		return Either.left(INT_INVALID_DIGIT);
	}
	const digits = first === "+" || negative ? text.slice(1) : text;
	if (!DIGITS.test(digits)) {
		return Either.left(INT_INVALID_DIGIT);
	}
	const magnitude = BigInt(digits);
	const value = negative ? -magnitude : magnitude;
	if (value > range.max) {
		return Either.left(INT_POS_OVERFLOW);
	}
	if (value < range.min) {
		return Either.left(INT_NEG_OVERFLOW);
	}
	return Either.right(value);
}

export const parseSmallInteger = (
	kind: SmallIntegerKind,
	text: string,
): Either.Either<number, string> =>
	Either.map(parseIntegerText(kind, text), (value) => Number(value));

export const parseBigInteger = (
	kind: BigIntegerKind,
	text: string,
): Either.Either<bigint, string> => parseIntegerText(kind, text);

const FLOAT_LITERAL =
	/^[+-]?(?:inf|infinity|nan|(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?)$/iu;

/**
 * Parses a decimal float literal. Out-of-range magnitudes become ±Infinity.
 *
 * @pure true
 * @invariant Accepts `inf`, `infinity` and `nan` in any case, with sign
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parseFloatText("float64", "1e400"); // Right(Infinity)
 * parseFloatText("float32", "-INF");  // Right(-Infinity)
 * parseFloatText("float64", "0x0a");  // Left("invalid float literal")
 * ```
 */
export function parseFloatText(
	kind: FloatKind,
	text: string,
): Either.Either<number, string> {
	if (text.length === 0) {
		return Either.left(FLOAT_EMPTY);
	}
	if (!FLOAT_LITERAL.test(text)) {
		return Either.left(FLOAT_INVALID);
	}
	const negative = text.startsWith("-");
	const body = text.replace(/^[+-]/u, "").toLowerCase();
	const value =
		body === "nan"
			? Number.NaN
			: body === "inf" || body === "infinity"
				? negative
					? Number.NEGATIVE_INFINITY
					: Number.POSITIVE_INFINITY
				: Number(text);
	return Either.right(kind === "float32" ? Math.fround(value) : value);
}

export const parseNumberKind = (
	kind: NumberKind,
	text: string,
): Either.Either<number, string> =>
	isFloatKind(kind) ? parseFloatText(kind, text) : parseSmallInteger(kind, text);

/**
 * Parses text as any numeric kind.
 *
 * @pure true
 * @complexity O(n)
 */
export const parseNumeric = (
	kind: NumericKind,
	text: string,
): Either.Either<number | bigint, string> =>
	isBigIntegerKind(kind)
		? parseBigInteger(kind, text)
		: parseNumberKind(kind, text);
