import { consola } from "consola"
import { createRunContext, type GlobalOptions, resolveRuntimeConfig } from "@/src/commands/context"
import { reportFailure } from "@/src/commands/report"
import { runUpdate } from "@/src/core/reconcile/run"
import { formatError } from "@/src/utils/errors"

export async function updateCommand(names: string[], options: GlobalOptions): Promise<void> {
	consola.info("plugsmith update")

	try {
		const context = createRunContext(resolveRuntimeConfig(options))
		consola.start("Updating extensions...")

		const result = await runUpdate(context, names)
		if (!result.ok) {
			reportFailure(result.error, "Update failed.")
			return
		}

		const { changed, checked } = result.value
		if (changed.length === 0) {
			consola.info(`Checked ${checked.length} extension(s); all up to date.`)
		} else {
			consola.info(`Updated: ${changed.join(", ")}`)
		}
		consola.success("Done.")
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Update failed.")
	}
}
