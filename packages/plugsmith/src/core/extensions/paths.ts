import path from "node:path"
import { EXTENSIONS_FILENAME, INSTALLED_STATE_FILENAME } from "@/src/constants"
import type { ExtensionKind, RuntimeConfig } from "@/src/core/extensions/types"
import type { AbsolutePath, ExtensionName } from "@/src/core/types/branded"
import { coerceAbsolutePath } from "@/src/core/types/coerce"

const KIND_DIRECTORIES: Record<ExtensionKind, string> = {
	plugin: "plugins",
	theme: "themes",
}

export function extensionsFilePath(config: RuntimeConfig): AbsolutePath {
	return resolveUnder(config.root, EXTENSIONS_FILENAME)
}

export function installedStatePath(config: RuntimeConfig): AbsolutePath {
	return resolveUnder(config.root, INSTALLED_STATE_FILENAME)
}

function kindRoot(config: RuntimeConfig, kind: ExtensionKind): AbsolutePath {
	return resolveUnder(config.root, KIND_DIRECTORIES[kind])
}

export function extensionDir(
	config: RuntimeConfig,
	kind: ExtensionKind,
	name: ExtensionName,
): AbsolutePath {
	return resolveUnder(kindRoot(config, kind), name)
}

function resolveUnder(base: AbsolutePath, segment: string): AbsolutePath {
	// base is absolute, so resolution cannot fail
	return coerceAbsolutePath(path.join(base, segment), base) ?? base
}
