// FORMAT THEOREM: ∀cfgs: buildSchema(cfgs) = Right(s) ⇒ keys and names of s are unique
// PURITY: CORE
// INVARIANT: Schema errors are detected in declaration order; the first one wins
// COMPLEXITY: O(n) where n = Σ|cfg.names|

import { Either } from "effect";

import {
	ConfigHasDefaultsButHasNoArg,
	ConfigIsArrayButHasNoArg,
	OptionNameIsDuplicated,
	type SchemaError,
	StoreKeyIsDuplicated,
} from "../errors.js";
import type { OptionConfig } from "../models.js";
import {
	displayName,
	effectiveStoreKey,
	isIgnored,
	isWildcard,
} from "./option-config.js";

/**
 * Verified, indexed view over a list of option configurations.
 *
 * @remarks
 * - @invariant byName.get(n) = i ⇒ cfgs[i] is neither ignored nor wildcard
 * - @invariant byStoreKey is injective
 */
export interface Schema {
	readonly cfgs: readonly OptionConfig[];
	readonly byName: ReadonlyMap<string, number>;
	readonly byStoreKey: ReadonlyMap<string, number>;
	readonly hasWildcard: boolean;
}

/**
 * Configuration matched for an option name, with its storage key.
 */
export interface ResolvedOption {
	readonly cfg: OptionConfig;
	readonly storeKey: string;
}

function checkArity(
	cfg: OptionConfig,
	storeKey: string,
): Either.Either<void, SchemaError> {
	if (cfg.takesArg) {
		return Either.right(undefined);
	}
	if (cfg.isArray) {
		return Either.left(
			new ConfigIsArrayButHasNoArg({ storeKey, option: displayName(cfg) }),
		);
	}
	if (cfg.defaults !== undefined && cfg.defaults.length > 0) {
		return Either.left(
			new ConfigHasDefaultsButHasNoArg({ storeKey, option: displayName(cfg) }),
		);
	}
	return Either.right(undefined);
}

/**
 * Verifies configuration invariants and builds the lookup indexes.
 *
 * Per configuration, in declaration order: storage key uniqueness, arity
 * consistency, then name uniqueness. A configuration without real names is
 * indexed by its storage key.
 *
 * @pure true
 * @invariant Ignored configurations never reach an index
 * @complexity O(n)
 *
 * @example
 * ```ts
 * buildSchema([
 *   makeOptionConfig({ names: ["foo"] }),
 *   makeOptionConfig({ names: ["foo"] }),
 * ]); // Left(StoreKeyIsDuplicated{ storeKey: "foo", option: "foo" })
 * ```
 */
export function buildSchema(
	cfgs: readonly OptionConfig[],
): Either.Either<Schema, SchemaError> {
	const byName = new Map<string, number>();
	const byStoreKey = new Map<string, number>();
	let hasWildcard = false;

	for (const [index, cfg] of cfgs.entries()) {
		if (isIgnored(cfg)) {
			continue;
		}
		if (isWildcard(cfg)) {
			hasWildcard = true;
			continue;
		}

		const storeKey = effectiveStoreKey(cfg);
		if (byStoreKey.has(storeKey)) {
			return Either.left(
				new StoreKeyIsDuplicated({ storeKey, option: displayName(cfg) }),
			);
		}
		byStoreKey.set(storeKey, index);

		const arity = checkArity(cfg, storeKey);
		if (Either.isLeft(arity)) {
			return Either.left(arity.left);
		}

		const realNames = cfg.names.filter((name) => name.length > 0);
		const keys = realNames.length > 0 ? realNames : [storeKey];
		for (const name of keys) {
			if (byName.has(name)) {
				return Either.left(
					new OptionNameIsDuplicated({ storeKey, option: name }),
				);
			}
			byName.set(name, index);
		}
	}

	return Either.right({ cfgs, byName, byStoreKey, hasWildcard });
}

/**
 * Looks up the configuration that recognizes `name`.
 *
 * @pure true
 * @complexity O(1)
 */
export function resolveOption(
	schema: Schema,
	name: string,
): ResolvedOption | undefined {
	const index = schema.byName.get(name);
	if (index === undefined) {
		return undefined;
	}
	const cfg = schema.cfgs[index];
	return cfg === undefined ? undefined : { cfg, storeKey: effectiveStoreKey(cfg) };
}

/**
 * Whether the option named `name` consumes a separated argument.
 *
 * @pure true
 */
export const takesArg = (schema: Schema, name: string): boolean =>
	resolveOption(schema, name)?.cfg.takesArg ?? false;
