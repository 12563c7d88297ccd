import { consola } from "consola"
import type { ReconcileError } from "@/src/core/reconcile/types"

export function reportFailure(error: ReconcileError, summary: string): void {
	consola.error(`[${error.stage}] ${error.message}`)
	consola.error(summary)
	process.exitCode = 1
}
