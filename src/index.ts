// PURITY: Re-exports only (meta-module)
// INVARIANT: Exports the CORE API and the invocation shell; no APP orchestration
// COMPLEXITY: O(1) module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// INVOCATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Entry point for parsing a program's arguments.
 *
 * @example
 * ```ts
 * import { Either } from "effect";
 * import { Invocation, makeOptionConfig } from "argsmith";
 *
 * const inv = Invocation.fromStrings(["app", "--level", "3", "input.txt"]);
 * const parsed = inv.parseWith([
 *   makeOptionConfig({ names: ["l", "level"], takesArg: true }),
 * ]);
 * if (Either.isRight(parsed)) {
 *   inv.optArg("l"); // "3"
 *   inv.args;        // ["input.txt"]
 * }
 * ```
 */
export {
	basename,
	Invocation,
	type InvocationSnapshot,
} from "./shell/invocation.js";
export { decodeOsArgs, lossy, type OsArg } from "./shell/os-args.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

export {
	WILDCARD_KEY,
	type OptionConfig,
	type OptionMap,
	type Validator,
} from "./core/models.js";
export {
	displayName,
	effectiveStoreKey,
	firstRealName,
	isIgnored,
	isWildcard,
	makeOptionConfig,
	type OptionConfigParams,
} from "./core/schema/option-config.js";
export {
	buildSchema,
	resolveOption,
	type ResolvedOption,
	type Schema,
} from "./core/schema/schema.js";

// ═══════════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export {
	isValidLongName,
	isValidShortName,
	recognize,
	type Token,
} from "./core/token/recognizer.js";
export {
	parseFree,
	parseWithCfgs,
	traverse,
	type SubCmdStop,
	type TraverseOptions,
} from "./core/parse/engine.js";
export type { ParseTarget } from "./core/parse/collect.js";

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATORS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	isNumericKind,
	parseNumeric,
	validateAny,
	validateNumber,
	type BigIntegerKind,
	type NumberKind,
	type NumericKind,
} from "./core/validators/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// RECORD BINDING
// ═══════════════════════════════════════════════════════════════════════════════

export { opt, type OptAttrs, type OptField } from "./core/binding/fields.js";
export {
	defineOptStore,
	type OptFieldsFor,
	type OptStore,
	type OptStoreValues,
} from "./core/binding/store.js";

// ═══════════════════════════════════════════════════════════════════════════════
// HELP
// ═══════════════════════════════════════════════════════════════════════════════

export { Help, type HelpBlockOptions } from "./core/help/help.js";
export {
	createOptsHelp,
	type OptHelpEntry,
	type OptsHelp,
} from "./core/help/opts-help.js";
export { makeOptTitle, type OptTitle } from "./core/help/title.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/errors.js";
