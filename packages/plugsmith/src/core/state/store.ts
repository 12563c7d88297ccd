import { z } from "zod"
import {
	coerceSource,
	enforceSourceFields,
	serializeSource,
	sourceFieldsShape,
	trimmedString,
} from "@/src/core/extensions/source"
import {
	EXTENSION_KINDS,
	INSTALLED_STATE_VERSION,
	type InstalledState,
	type LockedExtension,
} from "@/src/core/extensions/types"
import {
	readTextFile,
	removePath,
	removeStaleTempFiles,
	safeStat,
	writeTextFileAtomic,
} from "@/src/core/io/fs"
import type { AbsolutePath } from "@/src/core/types/branded"
import { coerceExtensionName, coerceNonEmpty } from "@/src/core/types/coerce"

export interface StateStoreError {
	type: "state_io"
	message: string
	path: AbsolutePath
	operation: "load" | "save" | "delete"
}

export type StateStoreResult<T> =
	| { ok: true; value: T }
	| { ok: false; error: StateStoreError }

const lockedExtensionSchema = z
	.object({
		installedAt: trimmedString("installedAt").refine(
			(value) => !Number.isNaN(Date.parse(value)),
			{ message: "installedAt must be an ISO-8601 timestamp." },
		),
		kind: z.enum(["plugin", "theme"]),
		name: trimmedString("name"),
		resolvedCommit: trimmedString("resolvedCommit").nullable(),
		source: z.object(sourceFieldsShape).strict().superRefine(enforceSourceFields),
	})
	.strict()

const stateSchema = z
	.object({
		extensions: z.array(lockedExtensionSchema),
		version: z.literal(INSTALLED_STATE_VERSION),
	})
	.strict()

/**
 * Persists the installed-state record. Saves go through a temporary file and
 * a rename, so a reader sees the previous record or the new one, never a
 * partial write.
 */
export class StateStore {
	constructor(readonly statePath: AbsolutePath) {}

	/**
	 * Returns null when no record exists (a fresh install), which is distinct
	 * from a record with no extensions.
	 */
	async load(): Promise<StateStoreResult<InstalledState | null>> {
		const stats = await safeStat(this.statePath)
		if (!stats.ok) {
			return this.failure("load", stats.error.message)
		}

		if (!stats.value) {
			return { ok: true, value: null }
		}

		if (!stats.value.isFile()) {
			return this.failure("load", `Expected file at ${this.statePath}.`)
		}

		const contents = await readTextFile(this.statePath)
		if (!contents.ok) {
			return this.failure("load", contents.error.message)
		}

		let data: unknown
		try {
			data = JSON.parse(contents.value)
		} catch (error) {
			const detail = error instanceof Error ? ` ${error.message}` : ""
			return this.failure("load", `Invalid JSON in ${this.statePath}.${detail}`)
		}

		return this.parse(data)
	}

	async save(state: InstalledState): Promise<StateStoreResult<void>> {
		const swept = await removeStaleTempFiles(this.statePath)
		if (!swept.ok) {
			return this.failure("save", swept.error.message)
		}

		const output = JSON.stringify(serializeState(state), null, 2)
		const written = await writeTextFileAtomic(this.statePath, `${output}\n`)
		if (!written.ok) {
			return this.failure("save", written.error.message)
		}

		return { ok: true, value: undefined }
	}

	async delete(): Promise<StateStoreResult<void>> {
		const removed = await removePath(this.statePath)
		if (!removed.ok) {
			return this.failure("delete", removed.error.message)
		}

		return { ok: true, value: undefined }
	}

	private parse(data: unknown): StateStoreResult<InstalledState> {
		const parsed = stateSchema.safeParse(data)
		if (!parsed.success) {
			const issues = parsed.error.issues.map((issue) => {
				const key = issue.path.length > 0 ? issue.path.join(".") : "state"
				return `${key}: ${issue.message}`
			})
			return this.failure(
				"load",
				`Invalid state file ${this.statePath}: ${issues.join("; ")}`,
			)
		}

		const extensions: LockedExtension[] = []
		const seen = new Set<string>()
		for (const [index, entry] of parsed.data.extensions.entries()) {
			const name = coerceExtensionName(entry.name)
			if (!name) {
				return this.failure(
					"load",
					`Invalid state file ${this.statePath}: extensions.${index}.name "${entry.name}" is not a valid name.`,
				)
			}

			if (seen.has(name)) {
				return this.failure(
					"load",
					`Invalid state file ${this.statePath}: "${name}" is listed more than once.`,
				)
			}
			seen.add(name)

			const source = coerceSource(entry.source)
			if (!source.ok) {
				return this.failure(
					"load",
					`Invalid state file ${this.statePath}: extensions.${index}.source: ${source.error.message}`,
				)
			}

			const kind = EXTENSION_KINDS.find((candidate) => candidate === entry.kind)
			if (!kind) {
				return this.failure("load", `Unknown extension kind "${entry.kind}".`)
			}

			extensions.push({
				installedAt: entry.installedAt,
				kind,
				name,
				resolvedCommit:
					entry.resolvedCommit === null ? null : coerceNonEmpty(entry.resolvedCommit),
				source: source.value,
			})
		}

		return {
			ok: true,
			value: { extensions, version: INSTALLED_STATE_VERSION },
		}
	}

	private failure(
		operation: StateStoreError["operation"],
		message: string,
	): { ok: false; error: StateStoreError } {
		return {
			error: {
				message,
				operation,
				path: this.statePath,
				type: "state_io",
			},
			ok: false,
		}
	}
}

export function buildInstalledState(extensions: readonly LockedExtension[]): InstalledState {
	return { extensions: [...extensions], version: INSTALLED_STATE_VERSION }
}

function serializeState(state: InstalledState): Record<string, unknown> {
	return {
		extensions: state.extensions.map((entry) => ({
			installedAt: entry.installedAt,
			kind: entry.kind,
			name: entry.name,
			resolvedCommit: entry.resolvedCommit,
			source: serializeSource(entry.source),
		})),
		version: state.version,
	}
}
