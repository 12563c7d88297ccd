import fs from "node:fs"
import path from "node:path"
import type { ConsolaInstance } from "consola"
import * as git from "isomorphic-git"
import http from "isomorphic-git/http/node"
import type {
	CheckoutMode,
	CheckoutRequest,
	GitError,
	GitResult,
	GitStrategy,
} from "@/src/core/git/types"
import type { GitReference } from "@/src/core/types/branded"
import { formatError } from "@/src/utils/errors"

const REMOTE = "origin"

type ActionResult = { ok: true } | { ok: false; error: GitError }

/**
 * In-process git through isomorphic-git. Only http(s) remotes are
 * reachable this way; anything else fails here and is left to the CLI
 * strategy.
 */
export class NativeGitStrategy implements GitStrategy {
	readonly name = "native"

	constructor(private readonly logger: ConsolaInstance) {}

	async clone(request: CheckoutRequest): Promise<GitResult> {
		const dir = request.destination
		this.logger.debug(`Cloning ${request.url} to ${dir} with isomorphic-git`)

		try {
			await fs.promises.mkdir(path.dirname(dir), { recursive: true })
			await git.clone({ dir, fs, http, url: request.url })
		} catch (error) {
			return failure("git_error", `Failed to clone ${request.url}: ${formatError(error)}`)
		}

		if (request.reference) {
			const checkout = await checkoutReference(dir, request.reference, "clone", this.logger)
			if (!checkout.ok) {
				return checkout
			}
		}

		return headCommit(dir)
	}

	async update(request: CheckoutRequest): Promise<GitResult> {
		const dir = request.destination
		this.logger.debug(`Updating ${request.url} at ${dir} with isomorphic-git`)

		let defaultBranch: string | null
		try {
			const fetched = await git.fetch({
				dir,
				fs,
				http,
				prune: true,
				pruneTags: true,
				remote: REMOTE,
				tags: true,
			})
			defaultBranch = fetched.defaultBranch
		} catch (error) {
			return failure("git_error", `Failed to fetch ${request.url}: ${formatError(error)}`)
		}

		const checkout = request.reference
			? await checkoutReference(dir, request.reference, "update", this.logger)
			: await checkoutDefaultBranch(dir, defaultBranch, this.logger)
		if (!checkout.ok) {
			return checkout
		}

		return headCommit(dir)
	}
}

/**
 * Tries the reference as a local branch, a remote branch, a tag, then a
 * commit. The first match wins; refs are always passed fully qualified so
 * isomorphic-git's own lookup order (tags before heads) never applies.
 */
export async function checkoutReference(
	dir: string,
	reference: GitReference,
	mode: CheckoutMode,
	logger: ConsolaInstance,
): Promise<ActionResult> {
	try {
		const localBranches = await git.listBranches({ dir, fs })
		if (localBranches.includes(reference)) {
			logger.debug(`Found local branch: ${reference}`)
			if (mode === "update") {
				await fastForward(dir, reference, logger)
			}
			await git.checkout({ dir, force: true, fs, ref: `refs/heads/${reference}` })
			return { ok: true }
		}

		const remoteBranches = await git.listBranches({ dir, fs, remote: REMOTE })
		if (remoteBranches.includes(reference)) {
			logger.debug(`Found remote branch: ${REMOTE}/${reference}`)
			await createTrackingBranch(dir, reference)
			await git.checkout({ dir, force: true, fs, ref: `refs/heads/${reference}` })
			return { ok: true }
		}

		const tags = await git.listTags({ dir, fs })
		if (tags.includes(reference)) {
			logger.debug(`Found tag: ${reference}`)
			const tagOid = await git.resolveRef({ dir, fs, ref: `refs/tags/${reference}` })
			// readCommit peels annotated tags down to the commit they point at
			const { oid } = await git.readCommit({ dir, fs, oid: tagOid })
			await git.checkout({ dir, force: true, fs, ref: oid })
			return { ok: true }
		}

		const commit = await findCommit(dir, reference)
		if (commit) {
			logger.debug(`Found commit: ${commit}`)
			await git.checkout({ dir, force: true, fs, ref: commit })
			return { ok: true }
		}
	} catch (error) {
		return failure(
			"git_error",
			`Failed to check out reference '${reference}': ${formatError(error)}`,
		)
	}

	return failure("reference_not_found", `Reference '${reference}' not found.`)
}

/**
 * Moves the local default branch to the remote's tip and checks it out.
 * Falls back to the current branch when the remote did not advertise one.
 */
export async function checkoutDefaultBranch(
	dir: string,
	advertised: string | null,
	logger: ConsolaInstance,
): Promise<ActionResult> {
	try {
		const branch = advertised
			? advertised.replace(/^refs\/heads\//, "")
			: await currentBranchName(dir)
		if (!branch) {
			return failure("git_error", `Unable to determine the default branch of ${REMOTE}.`)
		}

		logger.debug(`Resetting to default branch: ${branch}`)
		const remoteOid = await git.resolveRef({
			dir,
			fs,
			ref: `refs/remotes/${REMOTE}/${branch}`,
		})
		await git.writeRef({ dir, force: true, fs, ref: `refs/heads/${branch}`, value: remoteOid })
		await git.checkout({ dir, force: true, fs, ref: `refs/heads/${branch}` })
		return { ok: true }
	} catch (error) {
		return failure("git_error", `Failed to check out default branch: ${formatError(error)}`)
	}
}

export async function headCommit(dir: string): Promise<GitResult> {
	try {
		const oid = await git.resolveRef({ dir, fs, ref: "HEAD" })
		return { ok: true, value: oid }
	} catch (error) {
		return failure("git_error", `Failed to read HEAD: ${formatError(error)}`)
	}
}

async function currentBranchName(dir: string): Promise<string | null> {
	const branch = await git.currentBranch({ dir, fs })
	return typeof branch === "string" ? branch : null
}

async function fastForward(
	dir: string,
	branch: GitReference,
	logger: ConsolaInstance,
): Promise<void> {
	const remoteBranches = await git.listBranches({ dir, fs, remote: REMOTE })
	if (!remoteBranches.includes(branch)) {
		return
	}

	const localOid = await git.resolveRef({ dir, fs, ref: `refs/heads/${branch}` })
	const remoteOid = await git.resolveRef({ dir, fs, ref: `refs/remotes/${REMOTE}/${branch}` })
	if (localOid === remoteOid) {
		return
	}

	const behind = await git.isDescendent({ ancestor: localOid, dir, fs, oid: remoteOid })
	if (!behind) {
		logger.debug(`Local branch ${branch} has diverged from ${REMOTE}; left as is`)
		return
	}

	await git.writeRef({ dir, force: true, fs, ref: `refs/heads/${branch}`, value: remoteOid })
}

async function createTrackingBranch(dir: string, branch: GitReference): Promise<void> {
	const remoteOid = await git.resolveRef({ dir, fs, ref: `refs/remotes/${REMOTE}/${branch}` })
	await git.writeRef({ dir, fs, ref: `refs/heads/${branch}`, value: remoteOid })
	await git.setConfig({ dir, fs, path: `branch.${branch}.remote`, value: REMOTE })
	await git.setConfig({ dir, fs, path: `branch.${branch}.merge`, value: `refs/heads/${branch}` })
}

/**
 * Full id of the commit the reference names, or null. Abbreviated ids are
 * accepted when unambiguous.
 */
async function findCommit(dir: string, reference: GitReference): Promise<string | null> {
	let oid: string
	try {
		oid = await git.expandOid({ dir, fs, oid: reference.toLowerCase() })
	} catch {
		return null
	}

	try {
		const commit = await git.readCommit({ dir, fs, oid })
		return commit.oid === oid ? oid : null
	} catch {
		return null
	}
}

function failure(type: GitError["type"], message: string): { ok: false; error: GitError } {
	return {
		error: {
			message,
			strategy: "native",
			type,
		},
		ok: false,
	}
}
