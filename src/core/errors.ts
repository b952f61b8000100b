// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * An element of the raw argument vector could not be decoded as text.
 *
 * @pure true (Data class)
 * @invariant index >= 0
 */
export class OsArgsContainInvalidUnicode extends Data.TaggedError(
	"OsArgsContainInvalidUnicode",
)<{
	readonly index: number;
	readonly osArg: string;
}> {
	get message(): string {
		return `The command line arguments contain invalid unicode (index: ${this.index}, argument: "${this.osArg}")`;
	}
}

/**
 * An option name holds a character outside `[A-Za-z][A-Za-z0-9-]*`.
 *
 * @pure true (Data class)
 */
export class OptionContainsInvalidChar extends Data.TaggedError(
	"OptionContainsInvalidChar",
)<{
	readonly option: string;
}> {
	get message(): string {
		return `The option contains invalid characters (option: "${this.option}")`;
	}
}

/**
 * An option matched no configuration and no wildcard configuration exists.
 *
 * @pure true (Data class)
 */
export class UnconfiguredOption extends Data.TaggedError("UnconfiguredOption")<{
	readonly option: string;
}> {
	get message(): string {
		return `The option is not specified in configurations (option: "${this.option}")`;
	}
}

export class OptionNeedsArg extends Data.TaggedError("OptionNeedsArg")<{
	readonly option: string;
	readonly storeKey: string;
}> {
	get message(): string {
		return `The option needs argument(s) (option: "${this.option}")`;
	}
}

export class OptionTakesNoArg extends Data.TaggedError("OptionTakesNoArg")<{
	readonly option: string;
	readonly storeKey: string;
}> {
	get message(): string {
		return `The option takes no argument (option: "${this.option}")`;
	}
}

export class OptionIsNotArray extends Data.TaggedError("OptionIsNotArray")<{
	readonly option: string;
	readonly storeKey: string;
}> {
	get message(): string {
		return `The option cannot have multiple arguments (option: "${this.option}")`;
	}
}

/**
 * A validator or a field coercion rejected an option argument.
 *
 * @pure true (Data class)
 * @invariant details is the reason reported by the numeric parser
 */
export class OptionArgIsInvalid extends Data.TaggedError("OptionArgIsInvalid")<{
	readonly option: string;
	readonly storeKey: string;
	readonly optArg: string;
	readonly details: string;
}> {
	get message(): string {
		return `The option argument is invalid (option: "${this.option}", argument: "${this.optArg}", details: ${this.details})`;
	}
}

/**
 * Two configurations resolve to the same storage key.
 *
 * `option` is the first non-empty name of the later configuration
 * (its storage key when it has none).
 */
export class StoreKeyIsDuplicated extends Data.TaggedError(
	"StoreKeyIsDuplicated",
)<{
	readonly storeKey: string;
	readonly option: string;
}> {
	get message(): string {
		return `The store key is duplicated (store_key: "${this.storeKey}")`;
	}
}

export class ConfigIsArrayButHasNoArg extends Data.TaggedError(
	"ConfigIsArrayButHasNoArg",
)<{
	readonly storeKey: string;
	readonly option: string;
}> {
	get message(): string {
		return `The configuration is specified both having multiple arguments and having no argument (store_key: "${this.storeKey}")`;
	}
}

export class ConfigHasDefaultsButHasNoArg extends Data.TaggedError(
	"ConfigHasDefaultsButHasNoArg",
)<{
	readonly storeKey: string;
	readonly option: string;
}> {
	get message(): string {
		return `The configuration is specified both default argument(s) and having no argument (store_key: "${this.storeKey}")`;
	}
}

/**
 * A name is claimed by more than one configuration (or twice by one).
 * `option` is the duplicated name.
 */
export class OptionNameIsDuplicated extends Data.TaggedError(
	"OptionNameIsDuplicated",
)<{
	readonly storeKey: string;
	readonly option: string;
}> {
	get message(): string {
		return `The option name in the configuration is duplicated (store_key: "${this.storeKey}", name: "${this.option}")`;
	}
}

/**
 * A record-binding definition is inconsistent (raised once, while the
 * store is declared).
 *
 * @invariant field names the offending descriptor
 */
export class OptStoreDefinitionError extends Data.TaggedError(
	"OptStoreDefinitionError",
)<{
	readonly field: string;
	readonly reason: string;
}> {
	get message(): string {
		return `Invalid option store definition (field: "${this.field}"): ${this.reason}`;
	}
}

/**
 * An option schema file could not be read or did not describe option
 * configurations.
 */
export class SchemaFileError extends Data.TaggedError("SchemaFileError")<{
	readonly path: string;
	readonly detail: string;
}> {
	get message(): string {
		return `Cannot load option schema (path: "${this.path}"): ${this.detail}`;
	}
}

/**
 * Errors raised while traversing the argument vector.
 */
export type OptionUsageError =
	| OptionContainsInvalidChar
	| UnconfiguredOption
	| OptionNeedsArg
	| OptionTakesNoArg
	| OptionIsNotArray
	| OptionArgIsInvalid;

/**
 * Errors raised when a list of option configurations is inconsistent.
 */
export type SchemaError =
	| StoreKeyIsDuplicated
	| ConfigIsArrayButHasNoArg
	| ConfigHasDefaultsButHasNoArg
	| OptionNameIsDuplicated;

/**
 * Everything a parse operation can return on its error channel.
 *
 * @invariant ∀e ∈ InvalidOption: e.option is defined
 */
export type InvalidOption = OptionUsageError | SchemaError;

/**
 * Union of all errors produced by the library for Effect signatures.
 */
export type ArgsError = InvalidOption | OsArgsContainInvalidUnicode;
