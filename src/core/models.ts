// PURITY: CORE
// INVARIANT: CORE defines no effects; configuration records are immutable
// COMPLEXITY: O(1)

import type { Either } from "effect";

import type { OptionArgIsInvalid } from "./errors.js";

/**
 * Checks one user-supplied option argument.
 *
 * @pure true
 * @invariant validator(storeKey, option, optArg) depends only on its inputs
 */
export type Validator = (
	storeKey: string,
	option: string,
	optArg: string,
) => Either.Either<void, OptionArgIsInvalid>;

/**
 * One recognized option (or the wildcard, when `storeKey` is `*`).
 *
 * @remarks
 * - @invariant isArray ⇒ takesArg
 * - @invariant (defaults ≠ undefined ∧ |defaults| > 0) ⇒ takesArg
 * - names of length 1 are short forms, longer names are long forms, empty
 *   names only take part in help alignment
 */
export interface OptionConfig {
	readonly storeKey: string;
	readonly names: readonly string[];
	readonly takesArg: boolean;
	readonly isArray: boolean;
	readonly defaults: readonly string[] | undefined;
	readonly desc: string;
	readonly argInHelp: string;
	readonly validator: Validator;
}

/**
 * Storage key → collected arguments, in insertion order.
 */
export type OptionMap = Map<string, string[]>;

/**
 * Storage key reserved for the configuration that accepts any option.
 */
export const WILDCARD_KEY = "*";

/**
 * Exit code of the inspect executable.
 *
 * @invariant 0 = parsed, 1 = usage or schema error, 2 = schema file error
 */
export type ExitCode = 0 | 1 | 2;
