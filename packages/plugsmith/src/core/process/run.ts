import { execFile } from "node:child_process"
import { promisify } from "node:util"
import { formatError } from "@/src/utils/errors"

const execFileAsync = promisify(execFile)

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024

export interface CommandOutput {
	exitCode: number
	stdout: string
	stderr: string
}

export interface SpawnError {
	type: "spawn_error"
	message: string
	command: string
}

export type CommandResult =
	| { ok: true; value: CommandOutput }
	| { ok: false; error: SpawnError }

export interface CommandOptions {
	cwd?: string
}

/**
 * Runs an external command to completion. A non-zero exit is reported
 * through `exitCode`; only a process that could not be started is an error.
 */
export interface CommandRunner {
	run(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult>
}

export interface Invocation {
	file: string
	args: string[]
}

/**
 * Prepends the whitespace-split prefix (e.g. `sudo -u app`) to a command.
 */
export function buildInvocation(
	prefix: string | undefined,
	command: string,
	args: readonly string[],
): Invocation {
	const prefixParts = prefix?.trim() ? prefix.trim().split(/\s+/) : []
	const [file, ...prefixArgs] = prefixParts
	if (!file) {
		return { args: [...args], file: command }
	}

	return { args: [...prefixArgs, command, ...args], file }
}

export function formatInvocation(invocation: Invocation): string {
	return [invocation.file, ...invocation.args].join(" ")
}

export function createCommandRunner(prefix?: string): CommandRunner {
	return {
		async run(command, args, options = {}) {
			const invocation = buildInvocation(prefix, command, args)
			try {
				const { stdout, stderr } = await execFileAsync(invocation.file, invocation.args, {
					cwd: options.cwd,
					encoding: "utf8",
					maxBuffer: MAX_OUTPUT_BYTES,
				})
				return { ok: true, value: { exitCode: 0, stderr, stdout } }
			} catch (error) {
				const exited = readExitFailure(error)
				if (exited) {
					return { ok: true, value: exited }
				}

				return {
					error: {
						command: formatInvocation(invocation),
						message: formatError(error),
						type: "spawn_error",
					},
					ok: false,
				}
			}
		},
	}
}

function readExitFailure(error: unknown): CommandOutput | null {
	if (typeof error !== "object" || error === null || !("code" in error)) {
		return null
	}

	if (typeof error.code !== "number") {
		return null
	}

	return {
		exitCode: error.code,
		stderr: "stderr" in error && typeof error.stderr === "string" ? error.stderr : "",
		stdout: "stdout" in error && typeof error.stdout === "string" ? error.stdout : "",
	}
}
