import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import {
	coerceSource,
	enforceSourceFields,
	sourceFieldsShape,
	trimmedString,
} from "@/src/core/extensions/source"
import type { ExtensionDescriptor, ExtensionKind } from "@/src/core/extensions/types"
import type {
	ExtensionsManifest,
	ManifestParseError,
	ManifestParseResult,
} from "@/src/core/manifest/types"
import type { AbsolutePath } from "@/src/core/types/branded"
import { coerceExtensionName } from "@/src/core/types/coerce"

type ParseResult<T> = { ok: true; value: T } | { ok: false; error: ManifestParseError }

const entrySchema = z
	.object({
		name: trimmedString("name"),
		...sourceFieldsShape,
	})
	.strict()
	.superRefine(enforceSourceFields)

type RawEntry = z.infer<typeof entrySchema>

const manifestSchema = z
	.object({
		plugins: z.array(entrySchema).optional(),
		themes: z.array(entrySchema).optional(),
	})
	.strict()

/**
 * Parse an extensions file with full validation and coercion.
 *
 * @param contents - Raw TOML content
 * @param sourcePath - Absolute path to the extensions file
 */
export function parseExtensionsManifest(
	contents: string,
	sourcePath: AbsolutePath,
): ManifestParseResult {
	let data: unknown

	try {
		data = parse(contents)
	} catch (error) {
		const message =
			error instanceof TomlError ? `Invalid TOML: ${error.message}` : "Invalid TOML."
		return failure("invalid_toml", message, sourcePath)
	}

	const parsed = manifestSchema.safeParse(data)
	if (!parsed.success) {
		return failure("invalid_manifest", formatZodError(parsed.error), sourcePath)
	}

	const extensions: ExtensionDescriptor[] = []
	const seen = new Set<string>()
	const groups: [ExtensionKind, string, RawEntry[]][] = [
		["plugin", "plugins", parsed.data.plugins ?? []],
		["theme", "themes", parsed.data.themes ?? []],
	]

	for (const [kind, key, entries] of groups) {
		for (const [index, entry] of entries.entries()) {
			const coerced = coerceEntry(entry, kind, `${key}.${index}`, sourcePath)
			if (!coerced.ok) {
				return coerced
			}

			if (seen.has(coerced.value.name)) {
				return failure(
					"invalid_manifest",
					`Extension "${coerced.value.name}" is declared more than once.`,
					sourcePath,
					`${key}.${index}.name`,
				)
			}

			seen.add(coerced.value.name)
			extensions.push(coerced.value)
		}
	}

	const manifest: ExtensionsManifest = { extensions, sourcePath }
	return { ok: true, value: manifest }
}

function coerceEntry(
	entry: RawEntry,
	kind: ExtensionKind,
	key: string,
	sourcePath: AbsolutePath,
): ParseResult<ExtensionDescriptor> {
	const name = coerceExtensionName(entry.name)
	if (!name) {
		return failure(
			"invalid_manifest",
			`Invalid extension name "${entry.name}": must be a single directory name.`,
			sourcePath,
			`${key}.name`,
		)
	}

	const source = coerceSource(entry)
	if (!source.ok) {
		return failure(
			"invalid_manifest",
			`${name}: ${source.error.message}`,
			sourcePath,
			`${key}.${source.error.field}`,
		)
	}

	return { ok: true, value: { kind, name, source: source.value } }
}

function formatZodError(error: z.ZodError): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : "manifest"
		return `${path}: ${issue.message}`
	})
	return `Invalid extensions file: ${issues.join("; ")}`
}

function failure(
	type: ManifestParseError["type"],
	message: string,
	sourcePath: AbsolutePath,
	key?: string,
): ParseResult<never> {
	return {
		error: {
			key,
			message,
			sourcePath,
			type,
		},
		ok: false,
	}
}
