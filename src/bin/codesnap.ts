#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN runs the Effect and exits the process exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE

import { Effect } from "effect";

import { main } from "../main.js";

void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(main());
		process.exit(code);
	} catch (error) {
		// Defects only: typed failures are reported by the APP layer
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
