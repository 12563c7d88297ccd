import { consola } from "consola"
import { type GlobalOptions, resolveRuntimeConfig } from "@/src/commands/context"
import { extensionsFilePath } from "@/src/core/extensions/paths"
import { createExampleManifest } from "@/src/core/manifest/fs"
import { formatError } from "@/src/utils/errors"

export async function initCommand(options: GlobalOptions): Promise<void> {
	consola.info("plugsmith init")

	try {
		const manifestPath = extensionsFilePath(resolveRuntimeConfig(options))
		const created = await createExampleManifest(manifestPath)
		if (!created.ok) {
			throw new Error(created.error.message)
		}

		if (!created.value.created) {
			consola.info(`Extensions file already exists: ${manifestPath}`)
			return
		}

		consola.success("Extensions file created.")
		consola.info(`Extensions file: ${manifestPath}`)
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("Init failed.")
	}
}
