import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises"
import path from "node:path"
import { formatError, isNotFound } from "@/src/utils/errors"

const TEMP_SUFFIX = ".tmp"

export interface IoError {
	type: "io_error"
	message: string
	path: string
	operation: "stat" | "mkdir" | "readdir" | "readFile" | "writeFile" | "rename" | "rm"
}

export type IoResult<T> = { ok: true; value: T } | { ok: false; error: IoError }

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(formatError(error), targetPath, "stat")
	}
}

export async function pathExists(targetPath: string): Promise<IoResult<boolean>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	return { ok: true, value: stats.value !== null }
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return ioFailure(`Expected directory at ${targetPath}.`, targetPath, "mkdir")
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(formatError(error), targetPath, "mkdir")
		}
	}

	return { ok: true, value: undefined }
}

export async function isNonEmptyDir(targetPath: string): Promise<IoResult<boolean>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value || !stats.value.isDirectory()) {
		return { ok: true, value: false }
	}

	try {
		const entries = await readdir(targetPath)
		return { ok: true, value: entries.length > 0 }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "readdir")
	}
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "readFile")
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "writeFile")
	}
}

/**
 * Write `contents` next to `targetPath` and rename it into place, so readers
 * see either the old file or the new one.
 */
export async function writeTextFileAtomic(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	const tempPath = path.join(
		path.dirname(targetPath),
		`${tempPrefix(targetPath)}${process.pid}.${Date.now()}${TEMP_SUFFIX}`,
	)

	const written = await writeTextFile(tempPath, contents)
	if (!written.ok) {
		await removePath(tempPath)
		return written
	}

	try {
		await rename(tempPath, targetPath)
		return { ok: true, value: undefined }
	} catch (error) {
		await removePath(tempPath)
		return ioFailure(formatError(error), targetPath, "rename")
	}
}

/**
 * Deletes temporary files a crashed `writeTextFileAtomic` left next to
 * `targetPath`.
 */
export async function removeStaleTempFiles(targetPath: string): Promise<IoResult<void>> {
	const dir = path.dirname(targetPath)
	const prefix = tempPrefix(targetPath)

	let entries: string[]
	try {
		entries = await readdir(dir)
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: undefined }
		}

		return ioFailure(formatError(error), dir, "readdir")
	}

	for (const entry of entries) {
		if (entry.startsWith(prefix) && entry.endsWith(TEMP_SUFFIX)) {
			const removed = await removePath(path.join(dir, entry))
			if (!removed.ok) {
				return removed
			}
		}
	}

	return { ok: true, value: undefined }
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(formatError(error), targetPath, "rm")
	}
}

function ioFailure(
	message: string,
	targetPath: string,
	operation: IoError["operation"],
): { ok: false; error: IoError } {
	return {
		error: { message, operation, path: targetPath, type: "io_error" },
		ok: false,
	}
}

function tempPrefix(targetPath: string): string {
	return `.${path.basename(targetPath)}.`
}
