// FORMAT THEOREM: ∀args: traverse(args) visits every argument at most once, left to right
// PURITY: CORE (writes only through the Collector it is given)
// INVARIANT: The first usage error is kept; traversal continues after it
// COMPLEXITY: O(n) where n = Σ|arg|

import { Either } from "effect";
import { match } from "ts-pattern";

import {
	type InvalidOption,
	OptionContainsInvalidChar,
	type OptionUsageError,
} from "../errors.js";
import type { OptionConfig } from "../models.js";
import { buildSchema } from "../schema/schema.js";
import { recognize } from "../token/recognizer.js";
import {
	applyDefaults,
	type Collector,
	type ParseTarget,
	schemaCollector,
	schemaFreeCollector,
} from "./collect.js";

/**
 * Engine state between two arguments.
 *
 * @invariant pending.name always takes an argument in the active schema
 */
export type EngineState =
	| { readonly kind: "normal" }
	| { readonly kind: "pending"; readonly name: string }
	| { readonly kind: "afterEndOfOptions" };

/**
 * Where an until-subcommand traversal stopped.
 *
 * @invariant index is relative to the traversed slice
 */
export interface SubCmdStop {
	readonly index: number;
	readonly isAfterEndOpt: boolean;
}

/**
 * How a traversal runs.
 */
export interface TraverseOptions {
	readonly untilSubCmd: boolean;
	readonly isAfterEndOpt: boolean;
}

type Step = EngineState | { readonly kind: "positional" };

const NORMAL: EngineState = { kind: "normal" };
const AFTER_END: EngineState = { kind: "afterEndOfOptions" };

/**
 * Walks `args` (the vector without the program path) and feeds the
 * collector.
 *
 * In until-subcommand mode the walk stops at the first positional (or at the
 * first argument after `--`) and reports its index; a usage error recorded
 * before that point is returned instead.
 *
 * @pure false (invokes collector callbacks)
 * @invariant Right(undefined) ⇔ no error ∧ no subcommand
 * @complexity O(n)
 *
 * @example
 * ```ts
 * const target = { args: [], opts: new Map(), passedEndOfOptions: false };
 * traverse(["--foo", "sub", "--bar"], schemaFreeCollector(target), {
 *   untilSubCmd: true,
 *   isAfterEndOpt: false,
 * }); // Right({ index: 1, isAfterEndOpt: false }), target.opts = {foo: []}
 * ```
 */
export function traverse(
	args: readonly string[],
	collector: Collector,
	options: TraverseOptions,
): Either.Either<SubCmdStop | undefined, OptionUsageError> {
	let firstError: OptionUsageError | undefined;
	let state: EngineState = options.isAfterEndOpt ? AFTER_END : NORMAL;

	const record = (result: Either.Either<void, OptionUsageError>): void => {
		if (Either.isLeft(result) && firstError === undefined) {
			firstError = result.left;
		}
	};

	const outcome = <A>(value: A): Either.Either<A, OptionUsageError> =>
		firstError === undefined ? Either.right(value) : Either.left(firstError);

	const offer = (
		name: string,
		value: string | undefined,
		hasNext: boolean,
	): EngineState => {
		if (value === undefined && hasNext && collector.takesArg(name)) {
			return { kind: "pending", name };
		}
		record(collector.collectOpt(name, value));
		return NORMAL;
	};

	for (const [index, arg] of args.entries()) {
		if (state.kind === "afterEndOfOptions") {
			if (options.untilSubCmd) {
				return outcome({ index, isAfterEndOpt: true });
			}
			collector.collectArg(arg);
			continue;
		}
		if (state.kind === "pending") {
			record(collector.collectOpt(state.name, arg));
			state = NORMAL;
			continue;
		}

		const hasNext = index < args.length - 1;
		const step: Step = match(recognize(arg))
			.with({ kind: "endOfOptions" }, (): Step => {
				collector.endOfOptions();
				return AFTER_END;
			})
			.with({ kind: "long" }, (token) => offer(token.name, token.value, hasNext))
			.with({ kind: "invalidLong" }, (token): Step => {
				record(
					Either.left(new OptionContainsInvalidChar({ option: token.option })),
				);
				return NORMAL;
			})
			.with({ kind: "shortCluster" }, (token): Step => {
				for (const event of token.events) {
					record(
						event.kind === "flag"
							? collector.collectOpt(event.name, undefined)
							: Either.left(new OptionContainsInvalidChar({ option: event.char })),
					);
				}
				return token.terminal === undefined
					? NORMAL
					: offer(token.terminal.name, token.terminal.value, hasNext);
			})
			.with({ kind: "positional" }, (): Step => ({ kind: "positional" }))
			.exhaustive();

		if (step.kind === "positional") {
			if (options.untilSubCmd) {
				return outcome({ index, isAfterEndOpt: false });
			}
			collector.collectArg(arg);
			continue;
		}
		state = step;
	}

	return outcome(undefined);
}

/**
 * Schema-free parse of `args` into `target`.
 *
 * @pure false (fills target)
 * @invariant Every option is stored under its own name
 */
export const parseFree = (
	args: readonly string[],
	target: ParseTarget,
	options: TraverseOptions,
): Either.Either<SubCmdStop | undefined, InvalidOption> =>
	traverse(args, schemaFreeCollector(target), options);

/**
 * Schema-driven parse of `args` into `target`.
 *
 * The schema is verified before any argument is read. Defaults are applied
 * only when the traversal recorded no error.
 *
 * @pure false (fills target)
 * @invariant Left(SchemaError) ⇒ target is untouched
 */
export const parseWithCfgs = (
	args: readonly string[],
	cfgs: readonly OptionConfig[],
	target: ParseTarget,
	options: TraverseOptions,
): Either.Either<SubCmdStop | undefined, InvalidOption> =>
	Either.flatMap(buildSchema(cfgs), (schema) =>
		Either.map(traverse(args, schemaCollector(schema, target), options), (stop) => {
			applyDefaults(schema, target.opts);
			return stop;
		}),
	);
