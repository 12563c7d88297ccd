import type {
	ExtensionDescriptor,
	InstalledState,
	LockedExtension,
} from "@/src/core/extensions/types"
import type { ExtensionName } from "@/src/core/types/branded"

export type ReconcileStage = "load" | "plan" | "remove" | "fetch" | "hook" | "persist"

export type ReconcileErrorType =
	| "configuration"
	| "reference_not_found"
	| "fetch_failed"
	| "hook_failed"
	| "state_io"
	| "not_found"
	| "io"

export interface ReconcileError {
	type: ReconcileErrorType
	stage: ReconcileStage
	message: string
	name?: ExtensionName
	details?: unknown
}

export type ReconcileResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: ReconcileError }

export interface MatchedExtension {
	desired: ExtensionDescriptor
	previous: LockedExtension
}

export interface ExtensionDiff {
	added: ExtensionDescriptor[]
	sourceChanged: MatchedExtension[]
	removed: LockedExtension[]
	unchanged: MatchedExtension[]
}

export type ReconcileAction =
	| {
			type: "install"
			/** `missing`: recorded as installed but its directory is gone. */
			reason: "added" | "missing"
			extension: ExtensionDescriptor
			previous?: LockedExtension
	  }
	| { type: "replace"; extension: ExtensionDescriptor; previous: LockedExtension }
	| { type: "remove"; previous: LockedExtension }

export interface ReconcilePlan {
	diff: ExtensionDiff
	/** Removals, then replacements, then installs, each in declaration order. */
	actions: ReconcileAction[]
}

export interface ReconcileOutcome extends ReconcilePlan {
	state: InstalledState
}

export interface UpdateOutcome {
	state: InstalledState
	/** Names whose checked-out commit moved. */
	changed: ExtensionName[]
	checked: ExtensionName[]
}
