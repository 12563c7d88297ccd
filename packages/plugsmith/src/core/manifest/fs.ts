import { type IoError, readTextFile, safeStat, writeTextFile } from "@/src/core/io/fs"
import { parseExtensionsManifest } from "@/src/core/manifest/parse"
import { EXAMPLE_EXTENSIONS_MANIFEST } from "@/src/core/manifest/template"
import type { ExtensionsManifest, ManifestParseError } from "@/src/core/manifest/types"
import type { AbsolutePath } from "@/src/core/types/branded"

export type ManifestLoadError =
	| ManifestParseError
	| IoError
	| { type: "missing"; message: string; sourcePath: AbsolutePath }

export type ManifestLoadResult =
	| { ok: true; value: ExtensionsManifest }
	| { ok: false; error: ManifestLoadError }

export async function loadExtensionsManifest(
	manifestPath: AbsolutePath,
): Promise<ManifestLoadResult> {
	const stats = await safeStat(manifestPath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value) {
		return {
			error: {
				message: `Extensions file not found: ${manifestPath}`,
				sourcePath: manifestPath,
				type: "missing",
			},
			ok: false,
		}
	}

	const contents = await readTextFile(manifestPath)
	if (!contents.ok) {
		return contents
	}

	return parseExtensionsManifest(contents.value, manifestPath)
}

export type CreateManifestResult =
	| { ok: true; value: { created: boolean } }
	| { ok: false; error: IoError }

/**
 * Write the example extensions file unless one already exists.
 */
export async function createExampleManifest(
	manifestPath: AbsolutePath,
): Promise<CreateManifestResult> {
	const stats = await safeStat(manifestPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value) {
		return { ok: true, value: { created: false } }
	}

	const written = await writeTextFile(manifestPath, EXAMPLE_EXTENSIONS_MANIFEST)
	if (!written.ok) {
		return written
	}

	return { ok: true, value: { created: true } }
}
