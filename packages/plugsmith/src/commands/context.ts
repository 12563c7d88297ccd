import { consola } from "consola"
import { installedStatePath } from "@/src/core/extensions/paths"
import type { RuntimeConfig } from "@/src/core/extensions/types"
import { createFetchBackend } from "@/src/core/git/backend"
import { createPluginSetupHook } from "@/src/core/hooks/plugin-setup"
import { createCommandRunner } from "@/src/core/process/run"
import { Reconciler } from "@/src/core/reconcile/reconciler"
import type { RunContext } from "@/src/core/reconcile/run"
import { StateStore } from "@/src/core/state/store"
import { coerceAbsolutePath, coerceNonEmpty } from "@/src/core/types/coerce"
import {
	PLUGSMITH_COMMAND_PREFIX,
	PLUGSMITH_HOSTED_BASE_URL,
	PLUGSMITH_ROOT,
} from "@/src/env"

export interface GlobalOptions {
	root?: string
}

/**
 * Root comes from `--root`, then PLUGSMITH_ROOT, then the working directory.
 */
export function resolveRuntimeConfig(options: GlobalOptions): RuntimeConfig {
	const cwd = process.cwd()
	const root = coerceAbsolutePath(options.root ?? PLUGSMITH_ROOT ?? cwd, cwd)
	if (!root) {
		throw new Error("Unable to resolve the application root.")
	}

	return {
		commandPrefix: coerceNonEmpty(PLUGSMITH_COMMAND_PREFIX ?? "") ?? undefined,
		hostedBaseUrl: PLUGSMITH_HOSTED_BASE_URL,
		root,
	}
}

export function createRunContext(config: RuntimeConfig): RunContext {
	const runner = createCommandRunner(config.commandPrefix)
	const reconciler = new Reconciler({
		backend: createFetchBackend(config, runner, consola.withTag("git")),
		config,
		hook: createPluginSetupHook(config, runner, consola.withTag("setup")),
		logger: consola,
	})

	return {
		config,
		reconciler,
		store: new StateStore(installedStatePath(config)),
	}
}
