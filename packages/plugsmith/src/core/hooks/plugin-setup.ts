import path from "node:path"
import type { ConsolaInstance } from "consola"
import { PLUGIN_DEPENDENCY_MANIFEST, PLUGIN_MIGRATIONS_DIR } from "@/src/constants"
import type { RuntimeConfig } from "@/src/core/extensions/types"
import { isNonEmptyDir, pathExists } from "@/src/core/io/fs"
import type { CommandRunner } from "@/src/core/process/run"
import type { AbsolutePath, ExtensionName } from "@/src/core/types/branded"

export interface HookError {
	type: "hook_failed"
	message: string
	command?: string
}

export type HookResult = { ok: true } | { ok: false; error: HookError }

/**
 * Post-install step for a plugin working copy: install its dependencies and
 * run its pending migrations.
 */
export interface PluginSetupHook {
	run(pluginDir: AbsolutePath, name: ExtensionName): Promise<HookResult>
}

interface SetupCommand {
	command: string
	args: string[]
	cwd: string
}

export function createPluginSetupHook(
	config: RuntimeConfig,
	runner: CommandRunner,
	logger: ConsolaInstance,
): PluginSetupHook {
	return {
		async run(pluginDir, name) {
			const planned = await planSetupCommands(config, pluginDir, name)
			if (!planned.ok) {
				return planned
			}

			for (const step of planned.value) {
				const display = [step.command, ...step.args].join(" ")
				logger.info(`Running ${display} for ${name}`)

				const result = await runner.run(step.command, step.args, { cwd: step.cwd })
				if (!result.ok) {
					return failure(result.error.message, display)
				}

				if (result.value.exitCode !== 0) {
					const stderr = result.value.stderr.trim()
					return failure(
						`${display} exited with code ${result.value.exitCode}${stderr ? `: ${stderr}` : "."}`,
						display,
					)
				}
			}

			return { ok: true }
		},
	}
}

export async function planSetupCommands(
	config: RuntimeConfig,
	pluginDir: AbsolutePath,
	name: ExtensionName,
): Promise<{ ok: true; value: SetupCommand[] } | { ok: false; error: HookError }> {
	const commands: SetupCommand[] = []

	const manifest = await pathExists(path.join(pluginDir, PLUGIN_DEPENDENCY_MANIFEST))
	if (!manifest.ok) {
		return failure(manifest.error.message)
	}

	if (manifest.value) {
		commands.push({ args: ["install"], command: "bundle", cwd: pluginDir })
	}

	const migrations = await isNonEmptyDir(path.join(pluginDir, ...PLUGIN_MIGRATIONS_DIR))
	if (!migrations.ok) {
		return failure(migrations.error.message)
	}

	if (migrations.value) {
		commands.push({
			args: ["exec", "rake", "redmine:plugins:migrate", `NAME=${name}`],
			command: "bundle",
			cwd: config.root,
		})
	}

	return { ok: true, value: commands }
}

function failure(message: string, command?: string): { ok: false; error: HookError } {
	return {
		error: {
			command,
			message,
			type: "hook_failed",
		},
		ok: false,
	}
}
