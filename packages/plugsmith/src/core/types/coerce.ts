/**
 * Coercion Functions for Branded Types
 *
 * These are the ONLY functions that should create branded type values.
 * They validate and transform raw strings into guaranteed-valid branded types.
 *
 * Pattern: Returns the branded value on success, null on failure.
 */

import path from "node:path"
import type {
	AbsolutePath,
	ExtensionName,
	GithubRepo,
	GitReference,
	GitUrl,
	NonEmptyString,
} from "@/src/core/types/branded"

// === NON-EMPTY STRING ===

/**
 * Coerce a string to NonEmptyString.
 * Trims whitespace and rejects empty strings.
 */
export function coerceNonEmpty(s: string): NonEmptyString | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

// === EXTENSION NAME ===

const NAME_INVALID_CHARS = /[/\\]/

/**
 * Coerce a string to ExtensionName.
 * Must be non-empty, contain no path separators, and not be "." or "..".
 */
export function coerceExtensionName(s: string): ExtensionName | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (trimmed === "." || trimmed === "..") return null
	if (NAME_INVALID_CHARS.test(trimmed)) return null
	return trimmed as ExtensionName
}

// === ABSOLUTE PATH ===

/**
 * Coerce a string to AbsolutePath.
 * If relative, resolves against the provided base path.
 */
export function coerceAbsolutePath(s: string, basePath?: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

/**
 * Coerce a known absolute path (no resolution needed).
 * Use when you have a path from a trusted source like process.cwd().
 */
export function coerceAbsolutePathDirect(s: string): AbsolutePath | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (!path.isAbsolute(trimmed)) return null
	return path.normalize(trimmed) as AbsolutePath
}

// === GIT URL ===

const SCHEME_GIT_PATTERN = /^(?:https?|ssh|git|file):\/\/\S+$/
const SCP_GIT_PATTERN = /^[\w.-]+@[\w.-]+:\S+$/

/**
 * Coerce a string to GitUrl. The URL is kept as written since it is handed
 * to git unchanged.
 */
export function coerceGitUrl(s: string): GitUrl | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (!SCHEME_GIT_PATTERN.test(trimmed) && !SCP_GIT_PATTERN.test(trimmed)) {
		return null
	}
	return trimmed as GitUrl
}

// === GITHUB REPO ===

const HTTP_URL_PATTERN = /^https?:\/\/\S+$/

/**
 * Coerce a string to GithubRepo.
 * Accepts owner/name (a trailing .git is dropped) or a full http(s) URL.
 */
export function coerceGithubRepo(s: string): GithubRepo | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (HTTP_URL_PATTERN.test(trimmed)) {
		return trimmed as GithubRepo
	}

	const [owner, repo, ...rest] = trimmed.split("/")
	if (!owner || !repo || rest.length > 0) return null
	if (/\s/.test(owner) || /\s/.test(repo)) return null

	const cleanedRepo = repo.endsWith(".git") ? repo.slice(0, -4) : repo
	if (!cleanedRepo) return null
	return `${owner}/${cleanedRepo}` as GithubRepo
}

// === GIT REFERENCE ===

/**
 * Coerce a string to GitReference.
 * Rejects whitespace and a leading dash so the value can never be read as a
 * command-line option.
 */
export function coerceGitReference(s: string): GitReference | null {
	const trimmed = s.trim()
	if (trimmed.length === 0) return null
	if (/\s/.test(trimmed)) return null
	if (trimmed.startsWith("-")) return null
	return trimmed as GitReference
}
