import path from "node:path"
import type { ConsolaInstance } from "consola"
import { resolveSourceUrl, sourceReference } from "@/src/core/extensions/source"
import type { RuntimeConfig, SourceDescriptor } from "@/src/core/extensions/types"
import { CliGitStrategy } from "@/src/core/git/cli"
import { NativeGitStrategy } from "@/src/core/git/native"
import type { FetchResult, GitError, GitStrategy } from "@/src/core/git/types"
import { ensureDir, pathExists, removePath } from "@/src/core/io/fs"
import type { CommandRunner } from "@/src/core/process/run"

export interface FetchBackend {
	/**
	 * Clones `source` into `destination` when it does not exist, otherwise
	 * fetches and moves the existing working copy to the source's reference.
	 * Resolves to the full commit id checked out.
	 */
	cloneOrUpdate(source: SourceDescriptor, destination: string): Promise<FetchResult>
}

/**
 * Runs the operation with each strategy in turn until one succeeds.
 */
export class FallbackGitBackend implements FetchBackend {
	constructor(
		private readonly strategies: readonly GitStrategy[],
		private readonly hostedBaseUrl: string,
		private readonly logger: ConsolaInstance,
	) {}

	async cloneOrUpdate(source: SourceDescriptor, destination: string): Promise<FetchResult> {
		const url = resolveSourceUrl(source, this.hostedBaseUrl)
		const request = { destination, reference: sourceReference(source), url }
		const attempts: GitError[] = []

		const exists = await pathExists(destination)
		if (!exists.ok) {
			return this.failure("fetch_failed", exists.error.message, url, destination, attempts)
		}

		const mode = exists.value ? "update" : "clone"
		if (mode === "clone") {
			const parent = await ensureDir(path.dirname(destination))
			if (!parent.ok) {
				return this.failure("fetch_failed", parent.error.message, url, destination, attempts)
			}
		}

		for (const [index, strategy] of this.strategies.entries()) {
			const result =
				mode === "clone" ? await strategy.clone(request) : await strategy.update(request)
			if (result.ok) {
				return result
			}

			attempts.push(result.error)

			// a half-written clone would turn the next attempt or run into an update
			if (mode === "clone") {
				const cleaned = await removePath(destination)
				if (!cleaned.ok) {
					return this.failure(
						"fetch_failed",
						cleaned.error.message,
						url,
						destination,
						attempts,
					)
				}
			}

			const next = this.strategies[index + 1]
			if (!next) {
				break
			}

			this.logger.warn(
				`${strategy.name} git ${mode} failed, falling back to ${next.name} git: ${result.error.message}`,
			)
		}

		const last = attempts.at(-1)
		if (last?.type === "reference_not_found") {
			return this.failure("reference_not_found", last.message, url, destination, attempts)
		}

		const messages = attempts.map((attempt) => `${attempt.strategy}: ${attempt.message}`)
		return this.failure(
			"fetch_failed",
			messages.length > 0
				? `Unable to ${mode} ${url}. ${messages.join(" | ")}`
				: `No git strategy available to ${mode} ${url}.`,
			url,
			destination,
			attempts,
		)
	}

	private failure(
		type: "reference_not_found" | "fetch_failed",
		message: string,
		url: string,
		destination: string,
		attempts: GitError[],
	): FetchResult {
		return {
			error: { attempts, destination, message, type, url },
			ok: false,
		}
	}
}

/**
 * Native isomorphic-git first, the git executable as the last resort.
 */
export function createFetchBackend(
	config: RuntimeConfig,
	runner: CommandRunner,
	logger: ConsolaInstance,
): FetchBackend {
	return new FallbackGitBackend(
		[new NativeGitStrategy(logger), new CliGitStrategy(runner, logger)],
		config.hostedBaseUrl,
		logger,
	)
}
