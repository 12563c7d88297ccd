import type { GitReference } from "@/src/core/types/branded"

export type StrategyName = "native" | "cli"

/**
 * What a strategy is asked to do. The backend decides clone vs update once,
 * before the first strategy runs, so a fallback repeats the same operation.
 */
export type CheckoutMode = "clone" | "update"

export interface CheckoutRequest {
	/** Resolved clone URL. */
	url: string
	destination: string
	reference?: GitReference
}

export type GitErrorType = "reference_not_found" | "git_error" | "io_error"

export interface GitError {
	type: GitErrorType
	message: string
	strategy: StrategyName
}

/** Full commit id of HEAD after the checkout. */
export type GitResult = { ok: true; value: string } | { ok: false; error: GitError }

export interface GitStrategy {
	readonly name: StrategyName
	clone(request: CheckoutRequest): Promise<GitResult>
	update(request: CheckoutRequest): Promise<GitResult>
}

export type FetchErrorType = "reference_not_found" | "fetch_failed"

export interface FetchError {
	type: FetchErrorType
	message: string
	url: string
	destination: string
	attempts: GitError[]
}

export type FetchResult = { ok: true; value: string } | { ok: false; error: FetchError }
