// PURITY: SHELL (console output)
// EFFECT: Effect<void, never>
// COMPLEXITY: O(n) where n = number of help lines

import { Effect } from "effect";

import type { Help } from "../core/help/help.js";

/**
 * Writes every line of a help text to stdout.
 *
 * @pure false (console output)
 * @effect Effect<void, never>
 */
export const printHelp = (help: Help): Effect.Effect<void> =>
	Effect.sync(() => {
		for (const line of help.lines()) {
			console.log(line);
		}
	});
