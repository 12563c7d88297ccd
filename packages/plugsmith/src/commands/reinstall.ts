import { consola } from "consola"
import { createRunContext, type GlobalOptions, resolveRuntimeConfig } from "@/src/commands/context"
import { reportFailure } from "@/src/commands/report"
import { runReinstall } from "@/src/core/reconcile/run"
import { formatError } from "@/src/utils/errors"

export async function reinstallCommand(name: string, options: GlobalOptions): Promise<void> {
	consola.info("plugsmith reinstall")

	try {
		const context = createRunContext(resolveRuntimeConfig(options))
		const result = await runReinstall(context, name)
		if (!result.ok) {
			reportFailure(result.error, "Reinstall failed.")
			return
		}

		consola.success(`Reinstalled ${name}.`)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Reinstall failed.")
	}
}
