import { consola } from "consola"
import { createRunContext, type GlobalOptions, resolveRuntimeConfig } from "@/src/commands/context"
import { reportFailure } from "@/src/commands/report"
import { describeSource } from "@/src/core/extensions/source"
import {
	EXTENSION_KINDS,
	type ExtensionKind,
	type InstalledState,
} from "@/src/core/extensions/types"
import { runState } from "@/src/core/reconcile/run"
import { formatError } from "@/src/utils/errors"

const SHORT_COMMIT_LENGTH = 8

const KIND_HEADINGS: Record<ExtensionKind, string> = {
	plugin: "Plugins",
	theme: "Themes",
}

export async function stateCommand(options: GlobalOptions): Promise<void> {
	try {
		const context = createRunContext(resolveRuntimeConfig(options))
		const result = await runState(context)
		if (!result.ok) {
			reportFailure(result.error, "State check failed.")
			return
		}

		consola.log(renderState(result.value).join("\n"))
	} catch (error) {
		process.exitCode = 1
		consola.error(formatError(error))
		consola.error("State check failed.")
	}
}

export function renderState(state: InstalledState | null): string[] {
	if (!state || state.extensions.length === 0) {
		return ["No extensions installed"]
	}

	const lines: string[] = []
	for (const kind of EXTENSION_KINDS) {
		const entries = state.extensions.filter((entry) => entry.kind === kind)
		if (entries.length === 0) {
			continue
		}

		if (lines.length > 0) {
			lines.push("")
		}
		lines.push(`${KIND_HEADINGS[kind]}:`)
		for (const entry of entries) {
			const commit = entry.resolvedCommit
				? entry.resolvedCommit.slice(0, SHORT_COMMIT_LENGTH)
				: "unknown"
			lines.push(` * ${entry.name} (${describeSource(entry.source)}, installed: ${commit})`)
		}
	}

	return lines
}
