import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { createRunContext, type GlobalOptions, resolveRuntimeConfig } from "@/src/commands/context"
import { reportFailure } from "@/src/commands/report"
import { runUninstall } from "@/src/core/reconcile/run"
import { formatError } from "@/src/utils/errors"

export async function uninstallCommand(options: GlobalOptions & { yes: boolean }): Promise<void> {
	consola.info("plugsmith uninstall")

	try {
		const context = createRunContext(resolveRuntimeConfig(options))

		if (!options.yes) {
			const confirmed = await confirm({
				initialValue: false,
				message: `Remove every installed extension under ${context.config.root}?`,
			})
			if (isCancel(confirmed) || !confirmed) {
				consola.info("Canceled.")
				return
			}
		}

		consola.start("Uninstalling extensions...")
		const result = await runUninstall(context)
		if (!result.ok) {
			reportFailure(result.error, "Uninstall failed.")
			return
		}

		consola.info(`Removed ${result.value.length} extension(s).`)
		consola.success("Done.")
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Uninstall failed.")
	}
}
