// CHANGE: Specs for the exit code decision
// FORMAT THEOREM: ∀s: computeExitCode(s) = 0 ↔ ¬s.failed ∧ s.delivered > 0
// PURITY: CORE

import { Effect } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	computeExitCode,
	computeExitCodeEffect,
} from "../../src/core/decision.js";

describe("computeExitCode", () => {
	it("succeeds only when something was delivered", () => {
		expect(computeExitCode({ failed: false, delivered: 1 })).toBe(0);
		expect(computeExitCode({ failed: false, delivered: 0 })).toBe(1);
		expect(computeExitCode({ failed: true, delivered: 0 })).toBe(1);
	});

	it("matches the theorem for every state", () => {
		fc.assert(
			fc.property(fc.boolean(), fc.nat(10), (failed, delivered) => {
				const expected = !failed && delivered > 0 ? 0 : 1;
				expect(computeExitCode({ failed, delivered })).toBe(expected);
			}),
		);
	});

	it("is available as an Effect", async () => {
		await expect(
			Effect.runPromise(computeExitCodeEffect({ failed: false, delivered: 2 })),
		).resolves.toBe(0);
	});
});
