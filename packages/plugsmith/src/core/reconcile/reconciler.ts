import type { ConsolaInstance } from "consola"
import { extensionDir } from "@/src/core/extensions/paths"
import type {
	ExtensionDescriptor,
	InstalledState,
	LockedExtension,
	RuntimeConfig,
} from "@/src/core/extensions/types"
import type { FetchBackend } from "@/src/core/git/backend"
import type { PluginSetupHook } from "@/src/core/hooks/plugin-setup"
import { pathExists, removePath } from "@/src/core/io/fs"
import { diffExtensions } from "@/src/core/reconcile/diff"
import { failReconcile } from "@/src/core/reconcile/errors"
import type {
	ReconcileAction,
	ReconcileOutcome,
	ReconcilePlan,
	ReconcileResult,
	UpdateOutcome,
} from "@/src/core/reconcile/types"
import { buildInstalledState } from "@/src/core/state/store"
import type { AbsolutePath, ExtensionName, NonEmptyString } from "@/src/core/types/branded"
import { coerceNonEmpty } from "@/src/core/types/coerce"

export interface ReconcilerOptions {
	config: RuntimeConfig
	backend: FetchBackend
	hook: PluginSetupHook
	logger: ConsolaInstance
	now?: () => Date
}

/**
 * Converges the extension directories to a desired set. Work is sequential
 * and stops at the first failed action; callers persist the returned state
 * only on success, so a recorded entry always reflects a completed install.
 */
export class Reconciler {
	private readonly config: RuntimeConfig
	private readonly backend: FetchBackend
	private readonly hook: PluginSetupHook
	private readonly logger: ConsolaInstance
	private readonly now: () => Date

	constructor(options: ReconcilerOptions) {
		this.config = options.config
		this.backend = options.backend
		this.hook = options.hook
		this.logger = options.logger
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Computes the actions without touching any extension directory.
	 */
	async plan(
		desired: readonly ExtensionDescriptor[],
		observed: InstalledState | null,
	): Promise<ReconcileResult<ReconcilePlan>> {
		const diff = diffExtensions(desired, observed, this.config.hostedBaseUrl)
		const actions: ReconcileAction[] = [
			...diff.removed.map((previous): ReconcileAction => ({ previous, type: "remove" })),
			...diff.sourceChanged.map(
				({ desired: extension, previous }): ReconcileAction => ({
					extension,
					previous,
					type: "replace",
				}),
			),
			...diff.added.map(
				(extension): ReconcileAction => ({ extension, reason: "added", type: "install" }),
			),
		]

		for (const { desired: extension, previous } of diff.unchanged) {
			const present = await pathExists(extensionDir(this.config, previous.kind, previous.name))
			if (!present.ok) {
				return failReconcile("plan", "io", present.error.message, previous.name)
			}

			if (!present.value) {
				actions.push({ extension, previous, reason: "missing", type: "install" })
			}
		}

		return { ok: true, value: { actions, diff } }
	}

	async reconcile(
		desired: readonly ExtensionDescriptor[],
		observed: InstalledState | null,
	): Promise<ReconcileResult<ReconcileOutcome>> {
		const planned = await this.plan(desired, observed)
		if (!planned.ok) {
			return planned
		}

		const installed = new Map<string, LockedExtension>()
		for (const action of planned.value.actions) {
			switch (action.type) {
				case "remove": {
					this.logger.info(`Uninstalling ${action.previous.name}...`)
					const removed = await this.removeExtension(action.previous)
					if (!removed.ok) {
						return removed
					}
					break
				}
				case "replace": {
					this.logger.info(`Updating ${action.extension.name} (source changed)...`)
					const removed = await this.removeExtension(action.previous)
					if (!removed.ok) {
						return removed
					}

					const entry = await this.installExtension(action.extension)
					if (!entry.ok) {
						return entry
					}
					installed.set(entry.value.name, entry.value)
					break
				}
				case "install": {
					this.logger.info(
						action.reason === "missing"
							? `Reinstalling ${action.extension.name} (directory missing)...`
							: `Installing ${action.extension.name}...`,
					)
					// leftovers from a failed run would otherwise be updated in place
					const cleared = await this.removeExtension(action.extension)
					if (!cleared.ok) {
						return cleared
					}

					const entry = await this.installExtension(action.extension)
					if (!entry.ok) {
						return entry
					}
					installed.set(entry.value.name, entry.value)
					break
				}
			}
		}

		const carried = new Map<string, LockedExtension>()
		for (const { previous } of planned.value.diff.unchanged) {
			carried.set(previous.name, previous)
		}

		const extensions: LockedExtension[] = []
		for (const extension of desired) {
			const entry = installed.get(extension.name) ?? carried.get(extension.name)
			if (entry) {
				extensions.push(entry)
			}
		}

		return {
			ok: true,
			value: { ...planned.value, state: buildInstalledState(extensions) },
		}
	}

	/**
	 * Deletes every recorded extension directory. Returns the entries removed.
	 */
	async uninstall(observed: InstalledState): Promise<ReconcileResult<LockedExtension[]>> {
		const removed: LockedExtension[] = []
		for (const entry of observed.extensions) {
			this.logger.info(`Uninstalling ${entry.name}...`)
			const result = await this.removeExtension(entry)
			if (!result.ok) {
				return result
			}
			removed.push(entry)
		}

		return { ok: true, value: removed }
	}

	/**
	 * Deletes and fetches one recorded extension again from its recorded source.
	 */
	async reinstall(
		observed: InstalledState,
		name: string,
	): Promise<ReconcileResult<InstalledState>> {
		const previous = observed.extensions.find((entry) => entry.name === name)
		if (!previous) {
			return failReconcile("plan", "not_found", `Extension not found: ${name}`)
		}

		this.logger.info(`Reinstalling ${previous.name}...`)
		const removed = await this.removeExtension(previous)
		if (!removed.ok) {
			return removed
		}

		const entry = await this.installExtension(previous)
		if (!entry.ok) {
			return entry
		}

		return {
			ok: true,
			value: buildInstalledState(
				observed.extensions.map((current) =>
					current.name === entry.value.name ? entry.value : current,
				),
			),
		}
	}

	/**
	 * Fetches the latest commit for the recorded source of each named
	 * extension (all when `names` is empty) in its existing directory.
	 */
	async update(
		observed: InstalledState,
		names: readonly string[] = [],
	): Promise<ReconcileResult<UpdateOutcome>> {
		for (const name of names) {
			if (!observed.extensions.some((entry) => entry.name === name)) {
				return failReconcile("plan", "not_found", `Extension not found: ${name}`)
			}
		}

		const wanted = new Set(names)
		const targets =
			names.length === 0
				? observed.extensions
				: observed.extensions.filter((entry) => wanted.has(entry.name))

		const refreshed = new Map<string, LockedExtension>()
		const changed: ExtensionName[] = []
		for (const entry of targets) {
			const destination = extensionDir(this.config, entry.kind, entry.name)
			const present = await pathExists(destination)
			if (!present.ok) {
				return failReconcile("plan", "io", present.error.message, entry.name)
			}

			if (!present.value) {
				return failReconcile(
					"plan",
					"not_found",
					`Extension directory not found: ${destination}`,
					entry.name,
				)
			}

			this.logger.info(`Updating ${entry.name}...`)
			const commit = await this.fetchAndSetup(entry, destination)
			if (!commit.ok) {
				return commit
			}

			if (commit.value !== entry.resolvedCommit) {
				changed.push(entry.name)
				refreshed.set(entry.name, {
					...entry,
					installedAt: this.now().toISOString(),
					resolvedCommit: commit.value,
				})
			}
		}

		return {
			ok: true,
			value: {
				changed,
				checked: targets.map((entry) => entry.name),
				state: buildInstalledState(
					observed.extensions.map((entry) => refreshed.get(entry.name) ?? entry),
				),
			},
		}
	}

	private async installExtension(
		extension: ExtensionDescriptor,
	): Promise<ReconcileResult<LockedExtension>> {
		const destination = extensionDir(this.config, extension.kind, extension.name)
		const commit = await this.fetchAndSetup(extension, destination)
		if (!commit.ok) {
			return commit
		}

		return {
			ok: true,
			value: {
				installedAt: this.now().toISOString(),
				kind: extension.kind,
				name: extension.name,
				resolvedCommit: commit.value,
				source: extension.source,
			},
		}
	}

	private async fetchAndSetup(
		extension: ExtensionDescriptor,
		destination: AbsolutePath,
	): Promise<ReconcileResult<NonEmptyString>> {
		const fetched = await this.backend.cloneOrUpdate(extension.source, destination)
		if (!fetched.ok) {
			return failReconcile(
				"fetch",
				fetched.error.type,
				fetched.error.message,
				extension.name,
				fetched.error,
			)
		}

		const commit = coerceNonEmpty(fetched.value)
		if (!commit) {
			return failReconcile(
				"fetch",
				"fetch_failed",
				"git reported an empty commit id.",
				extension.name,
			)
		}

		if (extension.kind === "plugin") {
			const setup = await this.hook.run(destination, extension.name)
			if (!setup.ok) {
				return failReconcile(
					"hook",
					"hook_failed",
					setup.error.message,
					extension.name,
					setup.error,
				)
			}
		}

		return { ok: true, value: commit }
	}

	private async removeExtension(
		entry: Pick<LockedExtension, "kind" | "name">,
	): Promise<ReconcileResult<void>> {
		const removed = await removePath(extensionDir(this.config, entry.kind, entry.name))
		if (!removed.ok) {
			return failReconcile("remove", "io", removed.error.message, entry.name, removed.error)
		}

		return { ok: true, value: undefined }
	}
}
