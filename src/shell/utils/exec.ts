// CHANGE: Generalise the execAsync + Effect pattern to argv-based tool invocation with stdin
// WHY: Every stage shells out; paths with spaces or markup on stdin must not pass through a shell
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<ToolOutput, ExternalToolError, never>
// INVARIANT: ∀ run: runTool(...) → ToolOutput ∨ ExternalToolError naming the tool
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { execFile, spawn } from "node:child_process";
import { promisify } from "node:util";
import { Effect } from "effect";

import { ExternalToolError, type ToolName } from "../../core/errors.js";

const execFileAsync = promisify(execFile);

const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

export interface ToolInvocation {
	readonly tool: ToolName;
	readonly command: string;
	readonly args: readonly string[];
	readonly input?: string;
	readonly maxBuffer?: number;
}

export interface ToolOutput {
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Quote an argv for logging so the line can be pasted back into a shell.
 *
 * @pure true
 */
export function formatCommand(command: string, args: readonly string[]): string {
	return [command, ...args]
		.map((part) =>
			/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, "'\\''")}'`,
		)
		.join(" ");
}

/**
 * Extract a readable reason from a failed child process.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeExecFailure(error: unknown): string {
	if (!(error instanceof Error)) return String(error);
	if ("code" in error && error.code === "ENOENT") {
		return "executable not found";
	}
	const stderr =
		"stderr" in error && typeof error.stderr === "string"
			? error.stderr.trim()
			: "";
	const status =
		"code" in error && typeof error.code === "number"
			? `exit code ${error.code}`
			: "signal" in error && typeof error.signal === "string"
				? `killed by ${error.signal}`
				: error.message;
	return stderr.length > 0 ? `${status}: ${stderr}` : status;
}

// EPIPE means the tool exited before reading stdin; its exit status carries the failure.
function isBrokenPipe(error: NodeJS.ErrnoException): boolean {
	return error.code === "EPIPE";
}

/**
 * Execute a tool with Effect pattern, optionally feeding `input` on stdin.
 *
 * @returns Effect with captured stdout/stderr or ExternalToolError
 *
 * @pure false (executes external command)
 * @effect Effect<ToolOutput, ExternalToolError>
 * @invariant non-zero exit → ExternalToolError
 */
export function runTool(
	invocation: ToolInvocation,
): Effect.Effect<ToolOutput, ExternalToolError> {
	return Effect.tryPromise({
		try: () =>
			new Promise<ToolOutput>((resolve, reject) => {
				const pending = execFileAsync(invocation.command, [...invocation.args], {
					encoding: "utf8",
					maxBuffer: invocation.maxBuffer ?? DEFAULT_MAX_BUFFER,
				});
				void pending.then(resolve, reject);
				const stdin = pending.child.stdin;
				if (stdin !== null) {
					stdin.on("error", (error: NodeJS.ErrnoException) => {
						if (!isBrokenPipe(error)) reject(error);
					});
					stdin.end(invocation.input ?? "");
				}
			}),
		catch: (error) =>
			new ExternalToolError({
				tool: invocation.tool,
				reason: describeExecFailure(error),
			}),
	});
}

/**
 * Run a tool that keeps a background process alive after it returns
 * (clipboard owners such as xclip and wl-copy).
 *
 * stdout/stderr are not captured: a forked owner inheriting our pipes would
 * keep them open and the call would never complete. Success is the exit
 * status of the foreground process.
 *
 * @pure false (executes external command)
 * @effect Effect<void, ExternalToolError>
 */
export function runToolDetached(invocation: {
	readonly tool: ToolName;
	readonly command: string;
	readonly args: readonly string[];
	readonly input?: Uint8Array;
}): Effect.Effect<void, ExternalToolError> {
	return Effect.async<void, ExternalToolError>((resume) => {
		const child = spawn(invocation.command, [...invocation.args], {
			stdio: [invocation.input === undefined ? "ignore" : "pipe", "ignore", "ignore"],
		});
		let settled = false;
		const settle = (result: Effect.Effect<void, ExternalToolError>): void => {
			if (settled) return;
			settled = true;
			resume(result);
		};
		child.once("error", (error) => {
			settle(
				Effect.fail(
					new ExternalToolError({
						tool: invocation.tool,
						reason: describeExecFailure(error),
					}),
				),
			);
		});
		child.once("exit", (code, signal) => {
			if (code === 0) {
				settle(Effect.void);
				return;
			}
			settle(
				Effect.fail(
					new ExternalToolError({
						tool: invocation.tool,
						reason:
							signal === null ? `exit code ${code ?? "unknown"}` : `killed by ${signal}`,
					}),
				),
			);
		});
		if (invocation.input !== undefined && child.stdin !== null) {
			child.stdin.on("error", (error: NodeJS.ErrnoException) => {
				if (isBrokenPipe(error)) return;
				settle(
					Effect.fail(
						new ExternalToolError({
							tool: invocation.tool,
							reason: describeExecFailure(error),
						}),
					),
				);
			});
			child.stdin.end(invocation.input);
		}
	});
}
