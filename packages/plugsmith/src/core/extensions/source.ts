import { z } from "zod"
import type {
	DeclaredReference,
	ReferenceField,
	SourceDescriptor,
} from "@/src/core/extensions/types"
import type { GitReference } from "@/src/core/types/branded"
import {
	coerceGithubRepo,
	coerceGitReference,
	coerceGitUrl,
} from "@/src/core/types/coerce"

// =============================================================================
// SHARED SCHEMA (extensions file and installed-state file use one shape)
// =============================================================================

export const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

export const sourceFieldsShape = {
	branch: trimmedString("branch").optional(),
	commit: trimmedString("commit").optional(),
	repo: trimmedString("repo").optional(),
	tag: trimmedString("tag").optional(),
	url: trimmedString("url").optional(),
}

const REFERENCE_FIELDS: readonly ReferenceField[] = ["branch", "tag", "commit"]

export const enforceSourceFields = (
	value: Record<string, unknown>,
	ctx: z.RefinementCtx,
) => {
	const sources = ["url", "repo"].filter((key) => value[key] !== undefined)
	if (sources.length !== 1) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: "Exactly one of url or repo must be set.",
		})
	}

	const refs = REFERENCE_FIELDS.filter((key) => value[key] !== undefined)
	if (refs.length > 1) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: "Only one of branch, tag, or commit may be set.",
		})
	}
}

export interface RawSourceFields {
	url?: string
	repo?: string
	branch?: string
	tag?: string
	commit?: string
}

export type SourceCoercionResult =
	| { ok: true; value: SourceDescriptor }
	| { ok: false; error: { field: string; message: string } }

/**
 * Turn validated raw fields into a SourceDescriptor with branded values.
 */
export function coerceSource(raw: RawSourceFields): SourceCoercionResult {
	let reference: DeclaredReference | undefined
	for (const field of REFERENCE_FIELDS) {
		const rawValue = raw[field]
		if (rawValue === undefined) {
			continue
		}

		const value = coerceGitReference(rawValue)
		if (!value) {
			return invalid(field, `Invalid ${field} "${rawValue}".`)
		}

		reference = { field, value }
		break
	}

	if (raw.url !== undefined) {
		const url = coerceGitUrl(raw.url)
		if (!url) {
			return invalid("url", `Invalid git URL "${raw.url}".`)
		}

		return { ok: true, value: withReference({ type: "git", url }, reference) }
	}

	if (raw.repo !== undefined) {
		const repo = coerceGithubRepo(raw.repo)
		if (!repo) {
			return invalid("repo", `Repository "${raw.repo}" must be in the form owner/name.`)
		}

		return { ok: true, value: withReference({ repo, type: "github" }, reference) }
	}

	return invalid("source", "Exactly one of url or repo must be set.")
}

/**
 * Inverse of coerceSource: the flat field shape written to disk, keys sorted.
 */
export function serializeSource(source: SourceDescriptor): Record<string, string> {
	const fields: [string, string][] = [
		source.type === "git" ? ["url", source.url] : ["repo", source.repo],
	]

	if (source.reference) {
		fields.push([source.reference.field, source.reference.value])
	}

	return Object.fromEntries(fields.sort(([a], [b]) => a.localeCompare(b)))
}

// =============================================================================
// RESOLUTION AND EQUALITY
// =============================================================================

/**
 * The URL git clones from. Shorthands expand to `<base>/owner/name.git`;
 * a hosted repo written as a full URL is used as is.
 */
export function resolveSourceUrl(source: SourceDescriptor, hostedBaseUrl: string): string {
	if (source.type === "git") {
		return source.url
	}

	if (/^https?:\/\//.test(source.repo)) {
		return source.repo
	}

	const base = hostedBaseUrl.endsWith("/") ? hostedBaseUrl.slice(0, -1) : hostedBaseUrl
	return `${base}/${source.repo}.git`
}

export function sourceReference(source: SourceDescriptor): GitReference | undefined {
	return source.reference?.value
}

/**
 * Two sources are equal when they clone the same URL at the same reference.
 * The field a reference was declared under does not take part.
 */
export function sourcesEqual(
	left: SourceDescriptor,
	right: SourceDescriptor,
	hostedBaseUrl: string,
): boolean {
	return (
		resolveSourceUrl(left, hostedBaseUrl) === resolveSourceUrl(right, hostedBaseUrl) &&
		sourceReference(left) === sourceReference(right)
	)
}

export function describeSource(source: SourceDescriptor): string {
	const base = source.type === "git" ? `git: ${source.url}` : `github: ${source.repo}`
	if (!source.reference) {
		return base
	}

	const { field, value } = source.reference
	return field === "commit" ? `${base} at ${value}` : `${base} at ${field} ${value}`
}

function withReference<T extends SourceDescriptor>(
	source: T,
	reference: DeclaredReference | undefined,
): T {
	return reference ? { ...source, reference } : source
}

function invalid(field: string, message: string): SourceCoercionResult {
	return { error: { field, message }, ok: false }
}
