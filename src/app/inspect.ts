// PURITY: APP (no process.exit here; console output only)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(n) where n = Σ|arg| of the inspected vector

import { Effect, Either } from "effect";

import { defineOptStore, type OptStoreValues } from "../core/binding/store.js";
import { opt } from "../core/binding/fields.js";
import { computeExitCode } from "../core/decision.js";
import type { InvalidOption } from "../core/errors.js";
import { Help } from "../core/help/help.js";
import type { ExitCode, OptionConfig } from "../core/models.js";
import { loadSchemaFile } from "../shell/config/loader.js";
import { printHelp } from "../shell/help-printer.js";
import { Invocation, type InvocationSnapshot } from "../shell/invocation.js";

/**
 * Options of the inspect executable itself.
 */
export const inspectStore = defineOptStore<{
	schema: string | undefined;
	untilSubCmd: boolean;
	help: boolean;
}>({
	schema: opt.optionalString({
		cfg: "s,schema",
		arg: "<file>",
		desc: "Parse against the option configurations in a JSON file.",
	}),
	untilSubCmd: opt.boolean({
		cfg: "u,until-sub-cmd",
		desc: "Stop at the first positional and inspect each subcommand.",
	}),
	help: opt.boolean({ cfg: "h,help", desc: "Print this help." }),
});

export type InspectOptions = OptStoreValues<typeof inspectStore>;

/**
 * Help text of the inspect executable.
 *
 * @pure true
 */
export const makeInspectHelp = (programName: string): Help =>
	new Help()
		.addText(`Usage: ${programName} [options] -- <program> [args...]`)
		.addText("")
		.addText("Options:")
		.addOpts(inspectStore.makeOptCfgs(), { marginLeft: 2 });

/**
 * Snapshots of each parsed level and the error that stopped parsing.
 */
export interface InspectReport {
	readonly levels: readonly InvocationSnapshot[];
	readonly error: InvalidOption | undefined;
}

/**
 * Parses `target` and, in until-sub-cmd mode, each subcommand below it.
 * The configurations apply to the top level only; subcommands are parsed
 * schema-free.
 *
 * @pure false (mutates the invocations it parses)
 * @invariant levels[0] describes target
 */
export function inspectInvocation(
	target: Invocation,
	cfgs: readonly OptionConfig[] | undefined,
	untilSubCmd: boolean,
): InspectReport {
	if (!untilSubCmd) {
		const parsed = cfgs === undefined ? target.parse() : target.parseWith(cfgs);
		return {
			levels: [target.toJSON()],
			error: Either.isLeft(parsed) ? parsed.left : undefined,
		};
	}

	const levels: InvocationSnapshot[] = [];
	let current: Invocation | undefined = target;
	let levelCfgs = cfgs;
	while (current !== undefined) {
		const parsed: Either.Either<Invocation | undefined, InvalidOption> =
			levelCfgs === undefined
				? current.parseUntilSubCmd()
				: current.parseUntilSubCmdWith(levelCfgs);
		levels.push(current.toJSON());
		if (Either.isLeft(parsed)) {
			return { levels, error: parsed.left };
		}
		current = parsed.right;
		levelCfgs = undefined;
	}
	return { levels, error: undefined };
}

/**
 * Runs the inspect executable over an invocation of itself.
 *
 * @pure false (console output, reads the schema file)
 * @effect Effect<ExitCode, never>
 * @invariant exit code 2 ⇔ the schema file could not be loaded
 */
export function runInspect(inv: Invocation): Effect.Effect<ExitCode, never> {
	return Effect.gen(function* () {
		const options = inspectStore.withDefaults<InspectOptions>({
			schema: undefined,
			untilSubCmd: false,
			help: false,
		});
		const own = inv.parseFor(inspectStore, options);
		if (Either.isLeft(own)) {
			console.error(own.left.message);
			return computeExitCode({ parseFailed: true, schemaFileFailed: false });
		}
		if (options.help) {
			yield* printHelp(makeInspectHelp(inv.name));
			return computeExitCode({ parseFailed: false, schemaFileFailed: false });
		}

		const loaded =
			options.schema === undefined
				? undefined
				: yield* Effect.either(loadSchemaFile(options.schema));
		if (loaded !== undefined && Either.isLeft(loaded)) {
			console.error(loaded.left.message);
			return computeExitCode({ parseFailed: false, schemaFileFailed: true });
		}

		if (inv.args.length === 0) {
			console.error("No program to inspect; pass its arguments after --");
			return computeExitCode({ parseFailed: true, schemaFileFailed: false });
		}

		const report = inspectInvocation(
			Invocation.fromStrings(inv.args),
			loaded?.right,
			options.untilSubCmd,
		);
		for (const level of report.levels) {
			console.log(JSON.stringify(level));
		}
		if (report.error !== undefined) {
			console.error(report.error.message);
		}
		return computeExitCode({
			parseFailed: report.error !== undefined,
			schemaFileFailed: false,
		});
	});
}
