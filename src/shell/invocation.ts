// PURITY: SHELL (stateful object; parse operations mutate it)
// INVARIANT: Accessors never expose mutable internals
// INVARIANT: A child invocation starts at the subcommand argument of its parent
// COMPLEXITY: O(n) per parse where n = Σ|arg|

import { Either } from "effect";

import type { OptStore } from "../core/binding/store.js";
import type { InvalidOption, OsArgsContainInvalidUnicode } from "../core/errors.js";
import type { OptionConfig } from "../core/models.js";
import type { ParseTarget } from "../core/parse/collect.js";
import {
	parseFree,
	parseWithCfgs,
	type SubCmdStop,
	type TraverseOptions,
} from "../core/parse/engine.js";
import { decodeOsArgs, type OsArg } from "./os-args.js";

/**
 * Plain snapshot of an invocation, suitable for JSON output.
 */
export interface InvocationSnapshot {
	readonly name: string;
	readonly args: readonly string[];
	readonly opts: Readonly<Record<string, readonly string[]>>;
	readonly isAfterEndOpt: boolean;
}

const emptyTarget = (): ParseTarget => ({
	args: [],
	opts: new Map(),
	passedEndOfOptions: false,
});

/**
 * Text after the last `/` or `\`.
 *
 * @pure true
 */
export const basename = (programPath: string): string =>
	programPath.split(/[\\/]/u).at(-1) ?? "";

/**
 * One program call: its name, positional arguments and options.
 *
 * @remarks
 * Every parse operation starts from an empty result, so an invocation can be
 * parsed again with another schema.
 *
 * @example
 * ```ts
 * const inv = Invocation.fromStrings(["/usr/bin/app", "--foo-bar=123", "bar"]);
 * inv.parse();
 * inv.name;              // "app"
 * inv.args;              // ["bar"]
 * inv.optArg("foo-bar"); // "123"
 * ```
 */
export class Invocation {
	readonly name: string;

	private readonly argv: readonly string[];
	private readonly createdAfterEndOpt: boolean;
	private result: ParseTarget = emptyTarget();
	private configs: readonly OptionConfig[] = [];

	private constructor(
		argv: readonly string[],
		name: string,
		isAfterEndOpt: boolean,
	) {
		this.argv = argv;
		this.name = name;
		this.createdAfterEndOpt = isAfterEndOpt;
	}

	/**
	 * Invocation over already-decoded arguments; `argv[0]` is the program
	 * path.
	 */
	static fromStrings(argv: readonly string[]): Invocation {
		return new Invocation([...argv], basename(argv[0] ?? ""), false);
	}

	static fromOsArgs(
		raw: readonly OsArg[],
	): Either.Either<Invocation, OsArgsContainInvalidUnicode> {
		return Either.map(decodeOsArgs(raw), (argv) => Invocation.fromStrings(argv));
	}

	/**
	 * Invocation of the running script (`process.argv` without the runtime
	 * path).
	 */
	static fromProcess(): Either.Either<Invocation, OsArgsContainInvalidUnicode> {
		return Invocation.fromOsArgs(process.argv.slice(1));
	}

	get args(): readonly string[] {
		return [...this.result.args];
	}

	/**
	 * Whether the arguments of this invocation lie past a `--` marker: it
	 * was created after one, or its last parse read one.
	 */
	get isAfterEndOpt(): boolean {
		return this.createdAfterEndOpt || this.result.passedEndOfOptions;
	}

	get cfgs(): readonly OptionConfig[] {
		return this.configs;
	}

	hasOpt(storeKey: string): boolean {
		return this.result.opts.has(storeKey);
	}

	/**
	 * First argument stored under `storeKey`; undefined when the option is
	 * absent or was given without a value.
	 */
	optArg(storeKey: string): string | undefined {
		return this.result.opts.get(storeKey)?.[0];
	}

	/**
	 * All arguments stored under `storeKey`; undefined when absent, empty
	 * when given without a value.
	 */
	optArgs(storeKey: string): readonly string[] | undefined {
		const values = this.result.opts.get(storeKey);
		return values === undefined ? undefined : [...values];
	}

	/**
	 * Schema-free parse: every option is stored under its own name.
	 */
	parse(): Either.Either<void, InvalidOption> {
		return Either.map(
			parseFree(this.tail(), this.reset([]), this.traverseOptions(false)),
			() => undefined,
		);
	}

	/**
	 * Schema-driven parse. `cfgs` is retained for {@link Invocation.cfgs}.
	 */
	parseWith(cfgs: readonly OptionConfig[]): Either.Either<void, InvalidOption> {
		return Either.map(
			parseWithCfgs(this.tail(), cfgs, this.reset(cfgs), this.traverseOptions(false)),
			() => undefined,
		);
	}

	/**
	 * Schema-driven parse with the store's schema, then binds the options
	 * onto `target`. Fields are left untouched when parsing fails.
	 */
	parseFor<V>(store: OptStore<V>, target: V): Either.Either<void, InvalidOption> {
		return Either.flatMap(this.parseWith(store.makeOptCfgs()), () =>
			store.setFieldValues(target, this.result.opts),
		);
	}

	/**
	 * Schema-free parse up to the first positional argument, which names a
	 * subcommand. Returns the subcommand's invocation, or undefined when
	 * there is none.
	 */
	parseUntilSubCmd(): Either.Either<Invocation | undefined, InvalidOption> {
		return Either.map(
			parseFree(this.tail(), this.reset([]), this.traverseOptions(true)),
			(stop) => this.child(stop),
		);
	}

	parseUntilSubCmdWith(
		cfgs: readonly OptionConfig[],
	): Either.Either<Invocation | undefined, InvalidOption> {
		return Either.map(
			parseWithCfgs(this.tail(), cfgs, this.reset(cfgs), this.traverseOptions(true)),
			(stop) => this.child(stop),
		);
	}

	parseUntilSubCmdFor<V>(
		store: OptStore<V>,
		target: V,
	): Either.Either<Invocation | undefined, InvalidOption> {
		return Either.flatMap(this.parseUntilSubCmdWith(store.makeOptCfgs()), (sub) =>
			Either.map(store.setFieldValues(target, this.result.opts), () => sub),
		);
	}

	toJSON(): InvocationSnapshot {
		return {
			name: this.name,
			args: this.args,
			opts: Object.fromEntries(
				[...this.result.opts].map(([key, values]): [string, string[]] => [
					key,
					[...values],
				]),
			),
			isAfterEndOpt: this.isAfterEndOpt,
		};
	}

	private tail(): readonly string[] {
		return this.argv.slice(1);
	}

	private traverseOptions(untilSubCmd: boolean): TraverseOptions {
		return { untilSubCmd, isAfterEndOpt: this.createdAfterEndOpt };
	}

	private reset(cfgs: readonly OptionConfig[]): ParseTarget {
		this.result = emptyTarget();
		this.configs = cfgs;
		return this.result;
	}

	private child(stop: SubCmdStop | undefined): Invocation | undefined {
		if (stop === undefined) {
			return undefined;
		}
		const start = stop.index + 1;
		return new Invocation(
			this.argv.slice(start),
			this.argv[start] ?? "",
			stop.isAfterEndOpt,
		);
	}
}
