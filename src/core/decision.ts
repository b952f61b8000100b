// FORMAT THEOREM: ∀s: s.schemaFileFailed → 2; ¬s.schemaFileFailed ∧ s.parseFailed → 1; otherwise 0
// PURITY: CORE
// INVARIANT: Deterministic mapping InspectState → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { ExitCode } from "./models.js";

/**
 * Outcome flags of one inspect run.
 */
export interface InspectState {
	readonly parseFailed: boolean;
	readonly schemaFileFailed: boolean;
}

const toExitCode = (s: InspectState): ExitCode => {
	if (s.schemaFileFailed) {
		return 2;
	}
	return s.parseFailed ? 1 : 0;
};

/**
 * Computes the process exit code of the inspect executable.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1,2}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ parseFailed: true, schemaFileFailed: false }); // 1
 * ```
 */
export const computeExitCode = (state: InspectState): ExitCode =>
	pipe(state, toExitCode);
