import { extensionsFilePath } from "@/src/core/extensions/paths"
import type {
	InstalledState,
	LockedExtension,
	RuntimeConfig,
} from "@/src/core/extensions/types"
import { loadExtensionsManifest } from "@/src/core/manifest/fs"
import { failReconcile } from "@/src/core/reconcile/errors"
import type { Reconciler } from "@/src/core/reconcile/reconciler"
import type {
	ReconcileOutcome,
	ReconcilePlan,
	ReconcileResult,
	UpdateOutcome,
} from "@/src/core/reconcile/types"
import type { StateStore } from "@/src/core/state/store"

export interface RunContext {
	config: RuntimeConfig
	reconciler: Reconciler
	store: StateStore
}

export type InstallSummary =
	| ({ dryRun: true } & ReconcilePlan)
	| ({ dryRun: false } & ReconcileOutcome)

/**
 * Reads the extensions file and the installed-state record, converges the
 * extension directories and persists the new record. With `dryRun` only the
 * plan is computed.
 */
export async function runInstall(
	context: RunContext,
	options: { dryRun: boolean },
): Promise<ReconcileResult<InstallSummary>> {
	const manifest = await loadExtensionsManifest(extensionsFilePath(context.config))
	if (!manifest.ok) {
		return failReconcile("load", "configuration", manifest.error.message, undefined, manifest.error)
	}

	const observed = await loadState(context)
	if (!observed.ok) {
		return observed
	}

	if (options.dryRun) {
		const planned = await context.reconciler.plan(manifest.value.extensions, observed.value)
		if (!planned.ok) {
			return planned
		}

		return { ok: true, value: { dryRun: true, ...planned.value } }
	}

	const outcome = await context.reconciler.reconcile(manifest.value.extensions, observed.value)
	if (!outcome.ok) {
		return outcome
	}

	const saved = await saveState(context, outcome.value.state)
	if (!saved.ok) {
		return saved
	}

	return { ok: true, value: { dryRun: false, ...outcome.value } }
}

/**
 * Removes every recorded extension directory, then the record itself.
 */
export async function runUninstall(
	context: RunContext,
): Promise<ReconcileResult<LockedExtension[]>> {
	const observed = await loadRecorded(context)
	if (!observed.ok) {
		return observed
	}

	const removed = await context.reconciler.uninstall(observed.value)
	if (!removed.ok) {
		return removed
	}

	const deleted = await context.store.delete()
	if (!deleted.ok) {
		return failReconcile("persist", "state_io", deleted.error.message, undefined, deleted.error)
	}

	return removed
}

export async function runReinstall(
	context: RunContext,
	name: string,
): Promise<ReconcileResult<InstalledState>> {
	const observed = await loadRecorded(context)
	if (!observed.ok) {
		return observed
	}

	const state = await context.reconciler.reinstall(observed.value, name)
	if (!state.ok) {
		return state
	}

	const saved = await saveState(context, state.value)
	if (!saved.ok) {
		return saved
	}

	return state
}

export async function runUpdate(
	context: RunContext,
	names: readonly string[],
): Promise<ReconcileResult<UpdateOutcome>> {
	const observed = await loadRecorded(context)
	if (!observed.ok) {
		return observed
	}

	const outcome = await context.reconciler.update(observed.value, names)
	if (!outcome.ok) {
		return outcome
	}

	if (outcome.value.changed.length > 0) {
		const saved = await saveState(context, outcome.value.state)
		if (!saved.ok) {
			return saved
		}
	}

	return outcome
}

/**
 * The installed-state record as stored; null when nothing was ever installed.
 */
export async function runState(
	context: RunContext,
): Promise<ReconcileResult<InstalledState | null>> {
	return loadState(context)
}

async function loadState(
	context: RunContext,
): Promise<ReconcileResult<InstalledState | null>> {
	const loaded = await context.store.load()
	if (!loaded.ok) {
		return failReconcile("load", "state_io", loaded.error.message, undefined, loaded.error)
	}

	return loaded
}

async function loadRecorded(context: RunContext): Promise<ReconcileResult<InstalledState>> {
	const loaded = await loadState(context)
	if (!loaded.ok) {
		return loaded
	}

	if (!loaded.value) {
		return failReconcile("load", "not_found", "No installed-state record found.")
	}

	return { ok: true, value: loaded.value }
}

async function saveState(
	context: RunContext,
	state: InstalledState,
): Promise<ReconcileResult<void>> {
	const saved = await context.store.save(state)
	if (!saved.ok) {
		return failReconcile("persist", "state_io", saved.error.message, undefined, saved.error)
	}

	return saved
}
