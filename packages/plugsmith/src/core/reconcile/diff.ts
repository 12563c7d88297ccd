import { sourcesEqual } from "@/src/core/extensions/source"
import type {
	ExtensionDescriptor,
	InstalledState,
	LockedExtension,
} from "@/src/core/extensions/types"
import type { ExtensionDiff, MatchedExtension } from "@/src/core/reconcile/types"

/**
 * Splits desired and recorded extensions by name into added, removed,
 * source-changed and unchanged. Names are compared case-sensitively; a kind
 * change counts as a source change since the directory moves.
 */
export function diffExtensions(
	desired: readonly ExtensionDescriptor[],
	observed: InstalledState | null,
	hostedBaseUrl: string,
): ExtensionDiff {
	const recorded = new Map<string, LockedExtension>()
	for (const entry of observed?.extensions ?? []) {
		recorded.set(entry.name, entry)
	}

	const desiredNames = new Set<string>()
	const added: ExtensionDescriptor[] = []
	const sourceChanged: MatchedExtension[] = []
	const unchanged: MatchedExtension[] = []

	for (const extension of desired) {
		desiredNames.add(extension.name)
		const previous = recorded.get(extension.name)
		if (!previous) {
			added.push(extension)
			continue
		}

		const same =
			previous.kind === extension.kind &&
			sourcesEqual(previous.source, extension.source, hostedBaseUrl)
		if (same) {
			unchanged.push({ desired: extension, previous })
		} else {
			sourceChanged.push({ desired: extension, previous })
		}
	}

	const removed = [...recorded.values()].filter((entry) => !desiredNames.has(entry.name))

	return { added, removed, sourceChanged, unchanged }
}
