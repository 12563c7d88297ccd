/**
 * In-process git fixtures built with isomorphic-git.
 *
 * Remote state is simulated by writing `refs/remotes/origin/*` directly, the
 * same refs a fetch would leave behind.
 */

import fs from "node:fs"
import { join } from "node:path"
import * as git from "isomorphic-git"
import { writeFixture } from "@/tests/helpers/fs"

export const FIXTURE_AUTHOR = { email: "dev@example.com", name: "Fixture Author" }

export async function initRepo(dir: string, defaultBranch = "main"): Promise<void> {
	await git.init({ defaultBranch, dir, fs })
}

/**
 * Writes a file, stages it and commits on the current branch.
 * Resolves to the new commit id.
 */
export async function commitFile(
	dir: string,
	filepath: string,
	contents: string,
	message = `Update ${filepath}`,
): Promise<string> {
	await writeFixture(join(dir, filepath), contents)
	await git.add({ dir, filepath, fs })
	return git.commit({ author: FIXTURE_AUTHOR, dir, fs, message })
}

/**
 * Records `oid` as origin's tip for `branch`.
 */
export async function setRemoteBranch(dir: string, branch: string, oid: string): Promise<void> {
	await git.writeRef({ dir, force: true, fs, ref: `refs/remotes/origin/${branch}`, value: oid })
}

/**
 * Commits on a throwaway branch and returns to `base`, so the commit is only
 * reachable from refs the caller writes.
 */
export async function commitDetached(
	dir: string,
	base: string,
	filepath: string,
	contents: string,
): Promise<string> {
	await git.branch({ checkout: true, dir, fs, ref: "fixture-scratch" })
	const oid = await commitFile(dir, filepath, contents)
	await git.checkout({ dir, force: true, fs, ref: base })
	await git.deleteBranch({ dir, fs, ref: "fixture-scratch" })
	return oid
}

export async function headOid(dir: string): Promise<string> {
	return git.resolveRef({ dir, fs, ref: "HEAD" })
}

export async function currentBranch(dir: string): Promise<string | undefined> {
	const branch = await git.currentBranch({ dir, fs })
	return typeof branch === "string" ? branch : undefined
}
