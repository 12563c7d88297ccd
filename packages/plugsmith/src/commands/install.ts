import { consola } from "consola"
import { createRunContext, type GlobalOptions, resolveRuntimeConfig } from "@/src/commands/context"
import { reportFailure } from "@/src/commands/report"
import { runInstall } from "@/src/core/reconcile/run"
import type { ReconcileAction } from "@/src/core/reconcile/types"
import { formatError } from "@/src/utils/errors"

export async function installCommand(
	options: GlobalOptions & { dryRun: boolean },
): Promise<void> {
	consola.info("plugsmith install")

	try {
		const context = createRunContext(resolveRuntimeConfig(options))
		consola.start(options.dryRun ? "Planning install..." : "Installing extensions...")

		const result = await runInstall(context, { dryRun: options.dryRun })
		if (!result.ok) {
			reportFailure(result.error, "Install failed.")
			return
		}

		const { actions } = result.value
		if (actions.length === 0) {
			consola.success("Everything up to date.")
			return
		}

		if (result.value.dryRun) {
			for (const action of actions) {
				consola.info(describeAction(action))
			}
			consola.success(`Plan complete: ${actions.length} action(s).`)
			return
		}

		const { added, removed, sourceChanged } = result.value.diff
		consola.info(
			`Installed ${added.length}, updated ${sourceChanged.length}, removed ${removed.length} extension(s).`,
		)
		consola.success("Done.")
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Install failed.")
	}
}

export function describeAction(action: ReconcileAction): string {
	switch (action.type) {
		case "remove":
			return `Would uninstall ${action.previous.name}`
		case "replace":
			return `Would update ${action.extension.name} (source changed)`
		case "install":
			return action.reason === "missing"
				? `Would reinstall ${action.extension.name} (directory missing)`
				: `Would install ${action.extension.name}`
	}
}
