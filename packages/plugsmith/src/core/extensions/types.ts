import type {
	AbsolutePath,
	ExtensionName,
	GithubRepo,
	GitReference,
	GitUrl,
	NonEmptyString,
} from "@/src/core/types/branded"

// =============================================================================
// EXTENSION KINDS
// =============================================================================

export type ExtensionKind = "plugin" | "theme"

export const EXTENSION_KINDS: readonly ExtensionKind[] = ["plugin", "theme"]

// =============================================================================
// SOURCE DESCRIPTORS
// =============================================================================

/**
 * The field a reference was declared under in the extensions file.
 * Only used to write the reference back in the same shape; checkout always
 * tries branch, remote branch, tag, then commit regardless of this field.
 */
export type ReferenceField = "branch" | "tag" | "commit"

export interface DeclaredReference {
	readonly field: ReferenceField
	readonly value: GitReference
}

export interface GitSource {
	readonly type: "git"
	readonly url: GitUrl
	readonly reference?: DeclaredReference
}

export interface GithubSource {
	readonly type: "github"
	readonly repo: GithubRepo
	readonly reference?: DeclaredReference
}

export type SourceDescriptor = GitSource | GithubSource

// =============================================================================
// DESIRED AND INSTALLED STATE
// =============================================================================

export interface ExtensionDescriptor {
	readonly name: ExtensionName
	readonly kind: ExtensionKind
	readonly source: SourceDescriptor
}

export interface LockedExtension {
	readonly name: ExtensionName
	readonly kind: ExtensionKind
	readonly source: SourceDescriptor
	readonly resolvedCommit: NonEmptyString | null
	readonly installedAt: string
}

export const INSTALLED_STATE_VERSION = 1

export interface InstalledState {
	readonly version: typeof INSTALLED_STATE_VERSION
	readonly extensions: readonly LockedExtension[]
}

// =============================================================================
// RUNTIME CONFIGURATION
// =============================================================================

export interface RuntimeConfig {
	/** Host application root; extension directories live below it. */
	readonly root: AbsolutePath
	/** Prepended to every external command, split on whitespace. */
	readonly commandPrefix?: NonEmptyString
	/** Base URL that owner/name shorthands expand against. */
	readonly hostedBaseUrl: string
}
