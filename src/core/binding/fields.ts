// PURITY: CORE
// INVARIANT: A field's arity (takesArg, isArray) is fixed by its factory
// COMPLEXITY: O(|values|) per read

import { Either } from "effect";

import type { Validator } from "../models.js";
import {
	type BigIntegerKind,
	isBigIntegerKind,
	type NumberKind,
	type NumericKind,
	parseBigInteger,
	parseNumberKind,
	validateAny,
	validateNumber,
} from "../validators/index.js";

/**
 * Attribute keys accepted by every field factory.
 */
export interface OptAttrs {
	readonly cfg?: string;
	readonly desc?: string;
	readonly arg?: string;
}

export type FieldKind =
	| "boolean"
	| "string"
	| "number"
	| "strings"
	| "numbers"
	| "optionalString"
	| "optionalNumber";

/**
 * New value for a field; `undefined` from `read` keeps the current one.
 */
export interface Assigned<T> {
	readonly value: T;
}

/**
 * Argument a coercion rejected.
 */
export interface Rejected {
	readonly optArg: string;
	readonly details: string;
}

/**
 * Describes one option-bearing field of a bound record.
 *
 * @remarks
 * - initial: value before parsing, from the `cfg` default list; Left(reason)
 *   marks an unusable definition
 * - read: value after parsing, from the collected arguments of the field's
 *   storage key (undefined when the option is absent)
 */
export interface OptField<T> {
	readonly kind: FieldKind;
	readonly attrs: OptAttrs;
	readonly takesArg: boolean;
	readonly isArray: boolean;
	readonly validator: Validator;
	readonly initial: (
		defaults: readonly string[] | undefined,
	) => Either.Either<T, string>;
	readonly read: (
		values: readonly string[] | undefined,
	) => Either.Either<Assigned<T> | undefined, Rejected>;
}

type Coerce<T> = (text: string) => Either.Either<T, string>;

const KEEP: Either.Either<undefined, never> = Either.right(undefined);

const assign = <T>(value: T): Either.Either<Assigned<T> | undefined, Rejected> =>
	Either.right({ value });

const coerceFirst = <T>(
	values: readonly string[],
	coerce: Coerce<T>,
): Either.Either<Assigned<T> | undefined, Rejected> => {
	const first = values[0];
	if (first === undefined) {
		return KEEP;
	}
	return Either.match(coerce(first), {
		onLeft: (details) => Either.left({ optArg: first, details }),
		onRight: (value) => assign(value),
	});
};

const coerceAll = <T>(
	values: readonly string[],
	coerce: Coerce<T>,
): Either.Either<T[], Rejected> => {
	const out: T[] = [];
	for (const text of values) {
		const parsed = coerce(text);
		if (Either.isLeft(parsed)) {
			return Either.left({ optArg: text, details: parsed.left });
		}
		out.push(parsed.right);
	}
	return Either.right(out);
};

const describeDefault = (text: string, details: string): string =>
	`default "${text}" is invalid: ${details}`;

const coerceDefaults = <T>(
	defaults: readonly string[],
	coerce: Coerce<T>,
): Either.Either<T[], string> =>
	Either.mapLeft(coerceAll(defaults, coerce), (rejected) =>
		describeDefault(rejected.optArg, rejected.details),
	);

const identity: Coerce<string> = (text) => Either.right(text);

const numberCoerce = (kind: NumberKind): Coerce<number> => (text) =>
	parseNumberKind(kind, text);

const bigintCoerce = (kind: BigIntegerKind): Coerce<bigint> => (text) =>
	parseBigInteger(kind, text);

const scalar = <T>(
	kind: FieldKind,
	attrs: OptAttrs,
	validator: Validator,
	coerce: Coerce<T>,
	zero: T,
): OptField<T> => ({
	kind,
	attrs,
	takesArg: true,
	isArray: false,
	validator,
	initial: (defaults) => {
		const first = defaults?.[0];
		return first === undefined
			? Either.right(zero)
			: Either.mapLeft(coerce(first), (details) =>
					describeDefault(first, details),
				);
	},
	read: (values) => (values === undefined ? KEEP : coerceFirst(values, coerce)),
});

const array = <T>(
	kind: FieldKind,
	attrs: OptAttrs,
	validator: Validator,
	coerce: Coerce<T>,
): OptField<T[]> => ({
	kind,
	attrs,
	takesArg: true,
	isArray: true,
	validator,
	initial: (defaults) =>
		defaults === undefined ? Either.right([]) : coerceDefaults(defaults, coerce),
	read: (values) =>
		values === undefined
			? KEEP
			: Either.map(coerceAll(values, coerce), (value) => ({ value })),
});

const optional = <T>(
	kind: FieldKind,
	attrs: OptAttrs,
	validator: Validator,
	coerce: Coerce<T>,
	zero: T,
): OptField<T | undefined> => ({
	kind,
	attrs,
	takesArg: true,
	isArray: false,
	validator,
	initial: (defaults) => {
		if (defaults === undefined) {
			return Either.right(undefined);
		}
		const first = defaults[0];
		return first === undefined
			? Either.right(zero)
			: Either.mapLeft(coerce(first), (details) =>
					describeDefault(first, details),
				);
	},
	read: (values) => (values === undefined ? KEEP : coerceFirst(values, coerce)),
});

/**
 * Flag field: true when the option occurs.
 *
 * @invariant A boolean field has no default list
 */
function boolean(attrs: OptAttrs = {}): OptField<boolean> {
	return {
		kind: "boolean",
		attrs,
		takesArg: false,
		isArray: false,
		validator: validateAny,
		initial: (defaults) =>
			defaults === undefined
				? Either.right(false)
				: Either.left("a boolean option must not have defaults"),
		read: (values) => assign(values !== undefined),
	};
}

function string(attrs: OptAttrs = {}): OptField<string> {
	return scalar("string", attrs, validateAny, identity, "");
}

/**
 * Numeric field of the given kind; 64- and 128-bit kinds bind `bigint`.
 */
function number(kind: BigIntegerKind, attrs?: OptAttrs): OptField<bigint>;
function number(kind: NumberKind, attrs?: OptAttrs): OptField<number>;
function number(
	kind: NumericKind,
	attrs: OptAttrs = {},
): OptField<bigint> | OptField<number> {
	return isBigIntegerKind(kind)
		? scalar("number", attrs, validateNumber(kind), bigintCoerce(kind), 0n)
		: scalar("number", attrs, validateNumber(kind), numberCoerce(kind), 0);
}

function strings(attrs: OptAttrs = {}): OptField<string[]> {
	return array("strings", attrs, validateAny, identity);
}

function numbers(kind: BigIntegerKind, attrs?: OptAttrs): OptField<bigint[]>;
function numbers(kind: NumberKind, attrs?: OptAttrs): OptField<number[]>;
function numbers(
	kind: NumericKind,
	attrs: OptAttrs = {},
): OptField<bigint[]> | OptField<number[]> {
	return isBigIntegerKind(kind)
		? array("numbers", attrs, validateNumber(kind), bigintCoerce(kind))
		: array("numbers", attrs, validateNumber(kind), numberCoerce(kind));
}

function optionalString(attrs: OptAttrs = {}): OptField<string | undefined> {
	return optional("optionalString", attrs, validateAny, identity, "");
}

function optionalNumber(
	kind: BigIntegerKind,
	attrs?: OptAttrs,
): OptField<bigint | undefined>;
function optionalNumber(
	kind: NumberKind,
	attrs?: OptAttrs,
): OptField<number | undefined>;
function optionalNumber(
	kind: NumericKind,
	attrs: OptAttrs = {},
): OptField<bigint | undefined> | OptField<number | undefined> {
	return isBigIntegerKind(kind)
		? optional("optionalNumber", attrs, validateNumber(kind), bigintCoerce(kind), 0n)
		: optional("optionalNumber", attrs, validateNumber(kind), numberCoerce(kind), 0);
}

/**
 * Field descriptor factories for {@link defineOptStore}.
 *
 * @example
 * ```ts
 * const store = defineOptStore({
 *   verbose: opt.boolean({ cfg: "v,verbose", desc: "Print more." }),
 *   port: opt.number("uint16", { cfg: "p,port=8080", arg: "<n>" }),
 *   tags: opt.strings({ cfg: "t,tag=[a,b]" }),
 * });
 * ```
 */
export const opt = {
	boolean,
	string,
	number,
	strings,
	numbers,
	optionalString,
	optionalNumber,
};
