import type { ConsolaInstance } from "consola"
import type {
	CheckoutMode,
	CheckoutRequest,
	GitError,
	GitResult,
	GitStrategy,
} from "@/src/core/git/types"
import type { CommandRunner } from "@/src/core/process/run"
import type { GitReference } from "@/src/core/types/branded"

type ActionResult = { ok: true } | { ok: false; error: GitError }

type OutputResult = { ok: true; value: string } | { ok: false; error: GitError }

type ProbeResult = { ok: true; value: boolean } | { ok: false; error: GitError }

const DEFAULT_BRANCH_PATTERN = /^ref:\s+refs\/heads\/(\S+)\s+HEAD$/m

/**
 * Drives the `git` executable. Used as the last-resort strategy, so every
 * failure is reported with git's own stderr.
 */
export class CliGitStrategy implements GitStrategy {
	readonly name = "cli"

	constructor(
		private readonly runner: CommandRunner,
		private readonly logger: ConsolaInstance,
	) {}

	async clone(request: CheckoutRequest): Promise<GitResult> {
		this.logger.debug(`Cloning ${request.url} to ${request.destination} with git`)
		const cloned = await this.runGit(["clone", request.url, request.destination])
		if (!cloned.ok) {
			return cloned
		}

		if (request.reference) {
			const checkout = await this.checkoutReference(
				request.destination,
				request.reference,
				"clone",
			)
			if (!checkout.ok) {
				return checkout
			}
		}

		return this.headCommit(request.destination)
	}

	async update(request: CheckoutRequest): Promise<GitResult> {
		const repoDir = request.destination
		this.logger.debug(`Updating ${request.url} at ${repoDir} with git`)
		const fetched = await this.runGit([
			"-C",
			repoDir,
			"fetch",
			"--tags",
			"--force",
			"--prune",
			"origin",
		])
		if (!fetched.ok) {
			return fetched
		}

		const checkout = request.reference
			? await this.checkoutReference(repoDir, request.reference, "update")
			: await this.checkoutDefaultBranch(repoDir)
		if (!checkout.ok) {
			return checkout
		}

		return this.headCommit(repoDir)
	}

	/**
	 * Tries the reference as a local branch, a remote branch, a tag, then a
	 * commit. The first match wins.
	 */
	private async checkoutReference(
		repoDir: string,
		reference: GitReference,
		mode: CheckoutMode,
	): Promise<ActionResult> {
		const localBranch = await this.hasRef(repoDir, `refs/heads/${reference}`)
		if (!localBranch.ok) {
			return localBranch
		}

		if (localBranch.value) {
			this.logger.debug(`Found local branch: ${reference}`)
			const checkout = await this.runGit([
				"-C",
				repoDir,
				"checkout",
				"--force",
				reference,
				"--",
			])
			if (!checkout.ok || mode === "clone") {
				return checkout
			}

			return this.fastForward(repoDir, reference)
		}

		const remoteRef = `refs/remotes/origin/${reference}`
		const remoteBranch = await this.hasRef(repoDir, remoteRef)
		if (!remoteBranch.ok) {
			return remoteBranch
		}

		if (remoteBranch.value) {
			this.logger.debug(`Found remote branch: origin/${reference}`)
			return this.runGit([
				"-C",
				repoDir,
				"checkout",
				"--force",
				"-b",
				reference,
				"--track",
				remoteRef,
			])
		}

		const tag = await this.hasRef(repoDir, `refs/tags/${reference}`)
		if (!tag.ok) {
			return tag
		}

		if (tag.value) {
			this.logger.debug(`Found tag: ${reference}`)
			return this.runGit([
				"-C",
				repoDir,
				"checkout",
				"--force",
				"--detach",
				`refs/tags/${reference}`,
			])
		}

		const commit = await this.findCommit(repoDir, reference)
		if (!commit.ok) {
			return commit
		}

		if (commit.value) {
			this.logger.debug(`Found commit: ${commit.value}`)
			return this.runGit(["-C", repoDir, "checkout", "--force", "--detach", commit.value])
		}

		return failure("reference_not_found", `Reference '${reference}' not found.`)
	}

	private async fastForward(repoDir: string, branch: GitReference): Promise<ActionResult> {
		const remoteRef = `refs/remotes/origin/${branch}`
		const remote = await this.hasRef(repoDir, remoteRef)
		if (!remote.ok || !remote.value) {
			return remote
		}

		const behind = await this.probeGit([
			"-C",
			repoDir,
			"merge-base",
			"--is-ancestor",
			"HEAD",
			remoteRef,
		])
		if (!behind.ok) {
			return behind
		}

		if (!behind.value) {
			this.logger.debug(`Local branch ${branch} has diverged from origin; left as is`)
			return { ok: true }
		}

		return this.runGit(["-C", repoDir, "merge", "--ff-only", remoteRef])
	}

	private async checkoutDefaultBranch(repoDir: string): Promise<ActionResult> {
		const branch = await this.remoteDefaultBranch(repoDir)
		if (!branch.ok) {
			return branch
		}

		this.logger.debug(`Resetting to default branch: ${branch.value}`)
		return this.runGit([
			"-C",
			repoDir,
			"checkout",
			"--force",
			"-B",
			branch.value,
			`refs/remotes/origin/${branch.value}`,
		])
	}

	private async remoteDefaultBranch(repoDir: string): Promise<OutputResult> {
		const remoteHead = await this.runner.run("git", [
			"-C",
			repoDir,
			"ls-remote",
			"--symref",
			"origin",
			"HEAD",
		])
		if (remoteHead.ok && remoteHead.value.exitCode === 0) {
			const match = DEFAULT_BRANCH_PATTERN.exec(remoteHead.value.stdout)
			if (match?.[1]) {
				return { ok: true, value: match[1] }
			}
		}

		const trackedHead = await this.runner.run("git", [
			"-C",
			repoDir,
			"symbolic-ref",
			"--quiet",
			"--short",
			"refs/remotes/origin/HEAD",
		])
		if (trackedHead.ok && trackedHead.value.exitCode === 0) {
			const name = trackedHead.value.stdout.trim().replace(/^origin\//, "")
			if (name) {
				return { ok: true, value: name }
			}
		}

		return failure("git_error", "Unable to determine the default branch of origin.")
	}

	private async findCommit(repoDir: string, reference: GitReference): Promise<OutputResult> {
		const result = await this.runner.run("git", [
			"-C",
			repoDir,
			"rev-parse",
			"--verify",
			"--quiet",
			`${reference}^{commit}`,
		])
		if (!result.ok) {
			return failure("git_error", result.error.message)
		}

		const oid = result.value.stdout.trim()
		// rev-parse also accepts names like HEAD~1; only an id matching the reference counts
		if (result.value.exitCode !== 0 || !oid.startsWith(reference.toLowerCase())) {
			return { ok: true, value: "" }
		}

		return { ok: true, value: oid }
	}

	private async headCommit(repoDir: string): Promise<GitResult> {
		const result = await this.runGit(["-C", repoDir, "rev-parse", "HEAD"])
		if (!result.ok) {
			return result
		}

		return { ok: true, value: result.value.trim() }
	}

	private async hasRef(repoDir: string, ref: string): Promise<ProbeResult> {
		return this.probeGit(["-C", repoDir, "show-ref", "--verify", "--quiet", ref])
	}

	private async probeGit(args: string[]): Promise<ProbeResult> {
		const result = await this.runner.run("git", args)
		if (!result.ok) {
			return failure("git_error", result.error.message)
		}

		return { ok: true, value: result.value.exitCode === 0 }
	}

	private async runGit(args: string[]): Promise<OutputResult> {
		const result = await this.runner.run("git", args)
		if (!result.ok) {
			return failure("git_error", result.error.message)
		}

		if (result.value.exitCode !== 0) {
			const stderr = result.value.stderr.trim()
			return failure(
				"git_error",
				`git ${args.join(" ")} failed${stderr ? `: ${stderr}` : "."}`,
			)
		}

		return { ok: true, value: result.value.stdout }
	}
}

function failure(type: GitError["type"], message: string): { ok: false; error: GitError } {
	return {
		error: {
			message,
			strategy: "cli",
			type,
		},
		ok: false,
	}
}
