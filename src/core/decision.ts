// CHANGE: Pure decision function computing the exit code from the pipeline outcome
// WHY: A run that delivered nothing must never look like success
// FORMAT THEOREM: ∀s: computeExitCode(s) = 0 ↔ ¬s.failed ∧ s.delivered > 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import type { ExitCode } from "./models.js";

/**
 * Outcome of one pipeline run.
 *
 * @remarks
 * - `delivered` counts images placed on the clipboard or written to disk
 */
export interface DecisionState {
	readonly failed: boolean;
	readonly delivered: number;
}

/**
 * Computes process exit code from the pipeline outcome (pure function).
 *
 * @returns 0 only when nothing failed and at least one image was delivered
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 *
 * @example
 * ```ts
 * computeExitCode({ failed: false, delivered: 0 }); // 1
 * computeExitCode({ failed: false, delivered: 1 }); // 0
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.failed || s.delivered === 0,
		(hasFailed): ExitCode => (hasFailed ? 1 : 0),
	);

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 */
export const computeExitCodeEffect = (
	state: DecisionState,
): Effect.Effect<ExitCode> => pipe(state, computeExitCode, Effect.succeed);
