import type { ExtensionDescriptor } from "@/src/core/extensions/types"
import type { AbsolutePath } from "@/src/core/types/branded"

export interface ExtensionsManifest {
	readonly sourcePath: AbsolutePath
	/** Plugins first, then themes, each in declaration order. */
	readonly extensions: readonly ExtensionDescriptor[]
}

export type ManifestParseErrorType = "invalid_toml" | "invalid_manifest"

export interface ManifestParseError {
	type: ManifestParseErrorType
	message: string
	sourcePath: AbsolutePath
	key?: string
}

export type ManifestParseResult =
	| { ok: true; value: ExtensionsManifest }
	| { ok: false; error: ManifestParseError }
