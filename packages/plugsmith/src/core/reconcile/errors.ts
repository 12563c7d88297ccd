import type {
	ReconcileError,
	ReconcileErrorType,
	ReconcileResult,
	ReconcileStage,
} from "@/src/core/reconcile/types"
import type { ExtensionName } from "@/src/core/types/branded"

export function failReconcile(
	stage: ReconcileStage,
	type: ReconcileErrorType,
	message: string,
	name?: ExtensionName,
	details?: unknown,
): ReconcileResult<never> {
	return { error: toReconcileError(stage, type, message, name, details), ok: false }
}

function toReconcileError(
	stage: ReconcileStage,
	type: ReconcileErrorType,
	message: string,
	name?: ExtensionName,
	details?: unknown,
): ReconcileError {
	const resolved = message.trim() ? message : "Unexpected reconcile failure."
	return {
		details,
		message: name ? `${name}: ${resolved}` : resolved,
		name,
		stage,
		type,
	}
}
