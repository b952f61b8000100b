// PURITY: CORE (mutation confined to the ParseTarget owned by the caller)
// INVARIANT: Values are appended in input order; keys keep first-insertion order
// COMPLEXITY: O(1) amortized per collected option

import { Either } from "effect";

import {
	OptionIsNotArray,
	OptionNeedsArg,
	OptionTakesNoArg,
	type OptionUsageError,
	UnconfiguredOption,
} from "../errors.js";
import type { OptionMap } from "../models.js";
import { effectiveStoreKey, isIgnored, isWildcard } from "../schema/option-config.js";
import { resolveOption, type Schema, takesArg } from "../schema/schema.js";

/**
 * Accumulators filled while the engine walks the argument vector.
 */
export interface ParseTarget {
	readonly args: string[];
	readonly opts: OptionMap;
	/** Set once the walk reads the `--` marker. */
	passedEndOfOptions: boolean;
}

/**
 * Callbacks through which the engine stores what it recognizes.
 */
export interface Collector {
	readonly takesArg: (name: string) => boolean;
	readonly collectArg: (arg: string) => void;
	readonly endOfOptions: () => void;
	readonly collectOpt: (
		name: string,
		value: string | undefined,
	) => Either.Either<void, OptionUsageError>;
}

const ensureKey = (opts: OptionMap, key: string): string[] => {
	const existing = opts.get(key);
	if (existing !== undefined) {
		return existing;
	}
	const created: string[] = [];
	opts.set(key, created);
	return created;
};

const store = (
	opts: OptionMap,
	key: string,
	value: string | undefined,
): Either.Either<void, OptionUsageError> => {
	const values = ensureKey(opts, key);
	if (value !== undefined) {
		values.push(value);
	}
	return Either.right(undefined);
};

/**
 * Collector without configurations: every option is stored under its own
 * name and nothing takes a separated argument.
 *
 * @invariant collectOpt never fails
 */
export const schemaFreeCollector = (target: ParseTarget): Collector => ({
	takesArg: () => false,
	collectArg: (arg) => {
		target.args.push(arg);
	},
	endOfOptions: () => {
		target.passedEndOfOptions = true;
	},
	collectOpt: (name, value) => store(target.opts, name, value),
});

/**
 * Collector driven by a verified schema.
 *
 * @remarks
 * - unknown names fail with UnconfiguredOption unless a wildcard exists;
 *   wildcard matches are stored verbatim and skip validation
 * - a value for a flag fails with OptionTakesNoArg
 * - a second value for a non-array option fails with OptionIsNotArray
 * - a missing value for an argument-taking option fails with OptionNeedsArg
 *
 * @invariant Left ⇒ target is unchanged by that call
 */
export const schemaCollector = (
	schema: Schema,
	target: ParseTarget,
): Collector => ({
	takesArg: (name) => takesArg(schema, name),
	collectArg: (arg) => {
		target.args.push(arg);
	},
	endOfOptions: () => {
		target.passedEndOfOptions = true;
	},
	collectOpt: (name, value) => {
		const resolved = resolveOption(schema, name);
		if (resolved === undefined) {
			return schema.hasWildcard
				? store(target.opts, name, value)
				: Either.left(new UnconfiguredOption({ option: name }));
		}
		const { cfg, storeKey } = resolved;

		if (value === undefined) {
			if (cfg.takesArg) {
				return Either.left(new OptionNeedsArg({ option: name, storeKey }));
			}
			return store(target.opts, storeKey, undefined);
		}

		if (!cfg.takesArg) {
			return Either.left(new OptionTakesNoArg({ option: name, storeKey }));
		}
		const existing = target.opts.get(storeKey);
		if (existing !== undefined && existing.length > 0 && !cfg.isArray) {
			return Either.left(new OptionIsNotArray({ option: name, storeKey }));
		}
		return Either.flatMap(cfg.validator(storeKey, name, value), () =>
			store(target.opts, storeKey, value),
		);
	},
});

/**
 * Inserts configured defaults for every storage key the input left absent.
 * Defaults are not validated.
 *
 * @invariant Existing keys are never touched
 * @complexity O(Σ|defaults|)
 */
export function applyDefaults(schema: Schema, opts: OptionMap): void {
	for (const cfg of schema.cfgs) {
		if (isIgnored(cfg) || isWildcard(cfg)) {
			continue;
		}
		const key = effectiveStoreKey(cfg);
		if (opts.has(key) || cfg.defaults === undefined || cfg.defaults.length === 0) {
			continue;
		}
		opts.set(key, [...cfg.defaults]);
	}
}
