// FORMAT THEOREM: ∀store, v: parse(render(v)) bound through store reproduces v
// PURITY: CORE (setFieldValues mutates only the target it is given)
// INVARIANT: storeKey(field) = field name; definition errors surface at declaration
// COMPLEXITY: O(Σ|values|) per setFieldValues

import { Either } from "effect";

import { OptionArgIsInvalid, OptStoreDefinitionError } from "../errors.js";
import type { OptionConfig } from "../models.js";
import { makeOptionConfig } from "../schema/option-config.js";
import { parseCfgAttr } from "./cfg-attr.js";
import type { OptField } from "./fields.js";

/**
 * One descriptor per field of the bound record `V`.
 */
export type OptFieldsFor<V> = { readonly [K in keyof V]: OptField<V[K]> };

/**
 * Collected option arguments, keyed by storage key.
 */
export type OptValuesMap = ReadonlyMap<string, readonly string[]>;

/**
 * Schema and binder derived from a descriptor record.
 */
export interface OptStore<V> {
	readonly makeOptCfgs: () => OptionConfig[];
	readonly withDefaults: <T extends V>(target: T) => T;
	readonly setFieldValues: (
		target: V,
		opts: OptValuesMap,
	) => Either.Either<void, OptionArgIsInvalid>;
}

/**
 * Record type bound by a store.
 */
export type OptStoreValues<S> = S extends OptStore<infer V> ? V : never;

interface BoundField<V> {
	readonly cfg: OptionConfig;
	readonly reset: (target: V) => void;
	readonly apply: (
		target: V,
		opts: OptValuesMap,
	) => Either.Either<void, OptionArgIsInvalid>;
}

function bindField<V, K extends keyof V & string>(
	key: K,
	field: OptField<V[K]>,
): BoundField<V> {
	const { names, defaults } = parseCfgAttr(field.attrs.cfg);
	const initial = field.initial(defaults);
	if (Either.isLeft(initial)) {
		throw new OptStoreDefinitionError({ field: key, reason: initial.left });
	}
	const option = names.find((name) => name.length > 0) ?? key;

	return {
		cfg: makeOptionConfig({
			storeKey: key,
			names,
			takesArg: field.takesArg,
			isArray: field.isArray,
			defaults,
			desc: field.attrs.desc,
			argInHelp: field.attrs.arg,
			validator: field.validator,
		}),
		reset: (target) => {
			target[key] = Either.getOrElse(field.initial(defaults), () => initial.right);
		},
		apply: (target, opts) =>
			Either.match(field.read(opts.get(key)), {
				onLeft: ({ optArg, details }) =>
					Either.left(
						new OptionArgIsInvalid({ option, storeKey: key, optArg, details }),
					),
				onRight: (assigned) => {
					if (assigned !== undefined) {
						target[key] = assigned.value;
					}
					return Either.right(undefined);
				},
			}),
	};
}

/**
 * Derives an option schema from a descriptor record and binds parsed
 * options back onto records of the matching shape.
 *
 * Each field stores under its own name. Definition errors (a boolean with
 * defaults, an unparseable numeric default) are thrown here as
 * OptStoreDefinitionError.
 *
 * @pure true (apart from the definition check)
 * @invariant makeOptCfgs() lists fields in declaration order
 *
 * @example
 * ```ts
 * const store = defineOptStore({
 *   verbose: opt.boolean({ cfg: "v,verbose" }),
 *   level: opt.number("uint8", { cfg: "l,level=3", arg: "<n>" }),
 * });
 * const options = store.withDefaults({ verbose: true, level: 0 });
 * // { verbose: false, level: 3 }
 * ```
 */
export function defineOptStore<V>(fields: OptFieldsFor<V>): OptStore<V> {
	const isFieldKey = (key: string): key is keyof V & string =>
		Object.hasOwn(fields, key);
	const bound: BoundField<V>[] = Object.keys(fields)
		.filter(isFieldKey)
		.map((key) => bindField<V, keyof V & string>(key, fields[key]));

	return {
		makeOptCfgs: () => bound.map((field) => field.cfg),
		withDefaults: (target) => {
			for (const field of bound) {
				field.reset(target);
			}
			return target;
		},
		setFieldValues: (target, opts) => {
			for (const field of bound) {
				const applied = field.apply(target, opts);
				if (Either.isLeft(applied)) {
					return applied;
				}
			}
			return Either.right(undefined);
		},
	};
}
