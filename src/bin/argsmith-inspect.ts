#!/usr/bin/env node

// FORMAT THEOREM: ∀run: returns exitCode ∈ {0,1,2} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { Effect, Either } from "effect";

import { runInspect } from "../app/inspect.js";
import { Invocation } from "../shell/invocation.js";

/**
 * CLI entry point for argsmith-inspect.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1,2}
 */
void (async (): Promise<void> => {
	try {
		const inv = Invocation.fromProcess();
		if (Either.isLeft(inv)) {
			console.error(inv.left.message);
			process.exit(1);
		}
		const code = await Effect.runPromise(runInspect(inv.right));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
