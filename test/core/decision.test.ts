// FORMAT THEOREM: ∀s ∈ State: (s.hasDiagnostics ∨ s.hasErrors) ↔ computeExitCode(s) = 1
// PURITY: CORE

import { Effect } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { computeExitCode, computeExitCodeEffect } from "../../src/core/decision.js";

describe("computeExitCode", () => {
	it("exits 0 only when nothing was found and nothing failed", () => {
		expect(computeExitCode({ hasDiagnostics: false, hasErrors: false })).toBe(0);
		expect(computeExitCode({ hasDiagnostics: true, hasErrors: false })).toBe(1);
		expect(computeExitCode({ hasDiagnostics: false, hasErrors: true })).toBe(1);
	});

	it("agrees with the Effect variant", () => {
		fc.assert(
			fc.property(fc.boolean(), fc.boolean(), (hasDiagnostics, hasErrors) => {
				const state = { hasDiagnostics, hasErrors };
				expect(Effect.runSync(computeExitCodeEffect(state))).toBe(computeExitCode(state));
			}),
		);
	});
});
