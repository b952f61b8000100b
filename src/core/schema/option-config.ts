// PURITY: CORE
// INVARIANT: makeOptionConfig is total; every omitted field gets its neutral value
// COMPLEXITY: O(|names|)

import type { OptionConfig, Validator } from "../models.js";
import { WILDCARD_KEY } from "../models.js";
import { validateAny } from "../validators/index.js";

/**
 * Partial description of an option; omitted fields take neutral defaults.
 */
export interface OptionConfigParams {
	readonly storeKey?: string;
	readonly names?: readonly string[];
	readonly takesArg?: boolean;
	readonly isArray?: boolean;
	readonly defaults?: readonly string[];
	readonly desc?: string;
	readonly argInHelp?: string;
	readonly validator?: Validator;
}

/**
 * Builds an option configuration.
 *
 * @pure true
 * @postcondition result.validator = params.validator ?? validateAny
 *
 * @example
 * ```ts
 * makeOptionConfig({ names: ["foo-bar", "f"], takesArg: true, argInHelp: "<n>" });
 * ```
 */
export const makeOptionConfig = (params: OptionConfigParams): OptionConfig => ({
	storeKey: params.storeKey ?? "",
	names: params.names ?? [],
	takesArg: params.takesArg ?? false,
	isArray: params.isArray ?? false,
	defaults: params.defaults,
	desc: params.desc ?? "",
	argInHelp: params.argInHelp ?? "",
	validator: params.validator ?? validateAny,
});

/**
 * First name that is not empty, if any.
 *
 * @pure true
 */
export const firstRealName = (cfg: OptionConfig): string | undefined =>
	cfg.names.find((name) => name.length > 0);

/**
 * Storage key a configuration stores under: its explicit key, else its first
 * non-empty name, else "" (an ignored configuration).
 *
 * @pure true
 * @invariant effectiveStoreKey(cfg) = "" ⇔ cfg is ignored
 */
export const effectiveStoreKey = (cfg: OptionConfig): string =>
	cfg.storeKey.length > 0 ? cfg.storeKey : (firstRealName(cfg) ?? "");

export const isWildcard = (cfg: OptionConfig): boolean =>
	effectiveStoreKey(cfg) === WILDCARD_KEY;

export const isIgnored = (cfg: OptionConfig): boolean =>
	effectiveStoreKey(cfg).length === 0;

/**
 * Name that identifies a configuration in schema errors.
 *
 * @pure true
 */
export const displayName = (cfg: OptionConfig): string =>
	firstRealName(cfg) ?? effectiveStoreKey(cfg);
