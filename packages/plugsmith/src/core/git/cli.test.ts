import { describe, expect, it } from "vitest"
import { CliGitStrategy } from "@/src/core/git/cli"
import type { GitReference } from "@/src/core/types/branded"
import { FakeCommandRunner, silentLogger } from "@/tests/helpers/fakes"

const DIR = "/srv/app/plugins/widgets"
const URL = "https://git.example.test/acme/widgets.git"
const HEAD = "4f2c1d0e9b8a7f6e5d4c3b2a1908f7e6d5c4b3a2"

type Refs = Record<string, boolean>

type Overrides = Record<string, { exitCode: number; stdout?: string; stderr?: string }>

/**
 * Answers `show-ref --verify` from `refs`, `rev-parse HEAD` with HEAD and
 * everything else with success.
 */
function gitRunner(refs: Refs, overrides: Overrides = {}): FakeCommandRunner {
	return new FakeCommandRunner((_command, args) => {
		const line = args.join(" ")
		const override = overrides[line]
		if (override) {
			return override
		}

		if (args.includes("show-ref")) {
			const ref = args.at(-1) ?? ""
			return { exitCode: refs[ref] ? 0 : 1 }
		}

		if (line === `-C ${DIR} rev-parse HEAD`) {
			return { stdout: `${HEAD}\n` }
		}

		return undefined
	})
}

function reference(value: string): GitReference {
	return value as GitReference
}

describe("CliGitStrategy.clone", () => {
	it("clones and reports HEAD when no reference is given", async () => {
		const runner = gitRunner({})
		const strategy = new CliGitStrategy(runner, silentLogger)

		const result = await strategy.clone({ destination: DIR, url: URL })

		expect(result).toEqual({ ok: true, value: HEAD })
		expect(runner.lines()).toEqual([
			`git clone ${URL} ${DIR}`,
			`git -C ${DIR} rev-parse HEAD`,
		])
	})

	it("prefers a local branch over a tag of the same name", async () => {
		const runner = gitRunner({ "refs/heads/v1": true, "refs/tags/v1": true })
		const strategy = new CliGitStrategy(runner, silentLogger)

		const result = await strategy.clone({
			destination: DIR,
			reference: reference("v1"),
			url: URL,
		})

		expect(result).toEqual({ ok: true, value: HEAD })
		expect(runner.lines()).toContain(`git -C ${DIR} checkout --force v1 --`)
		expect(runner.lines()).not.toContain(`git -C ${DIR} show-ref --verify --quiet refs/tags/v1`)
	})

	it("creates a tracking branch for a remote-only branch", async () => {
		const runner = gitRunner({ "refs/remotes/origin/develop": true })
		const strategy = new CliGitStrategy(runner, silentLogger)

		await strategy.clone({ destination: DIR, reference: reference("develop"), url: URL })

		expect(runner.lines()).toContain(
			`git -C ${DIR} checkout --force -b develop --track refs/remotes/origin/develop`,
		)
	})

	it("detaches at a tag", async () => {
		const runner = gitRunner({ "refs/tags/v2.0.0": true })
		const strategy = new CliGitStrategy(runner, silentLogger)

		await strategy.clone({ destination: DIR, reference: reference("v2.0.0"), url: URL })

		expect(runner.lines()).toContain(
			`git -C ${DIR} checkout --force --detach refs/tags/v2.0.0`,
		)
	})

	it("detaches at a commit whose id starts with the reference", async () => {
		const runner = gitRunner(
			{},
			{
				[`-C ${DIR} rev-parse --verify --quiet 4F2C1D0^{commit}`]: {
					exitCode: 0,
					stdout: `${HEAD}\n`,
				},
			},
		)
		const strategy = new CliGitStrategy(runner, silentLogger)

		const result = await strategy.clone({
			destination: DIR,
			reference: reference("4F2C1D0"),
			url: URL,
		})

		expect(result).toEqual({ ok: true, value: HEAD })
		expect(runner.lines()).toContain(`git -C ${DIR} checkout --force --detach ${HEAD}`)
	})

	it("does not accept revision expressions as commits", async () => {
		const runner = gitRunner(
			{},
			{
				[`-C ${DIR} rev-parse --verify --quiet HEAD~1^{commit}`]: {
					exitCode: 0,
					stdout: `${HEAD}\n`,
				},
			},
		)
		const strategy = new CliGitStrategy(runner, silentLogger)

		const result = await strategy.clone({
			destination: DIR,
			reference: reference("HEAD~1"),
			url: URL,
		})

		expect(result).toEqual({
			error: {
				message: "Reference 'HEAD~1' not found.",
				strategy: "cli",
				type: "reference_not_found",
			},
			ok: false,
		})
	})

	it("reports git's stderr when the clone fails", async () => {
		const runner = gitRunner(
			{},
			{
				[`clone ${URL} ${DIR}`]: {
					exitCode: 128,
					stderr: "fatal: repository not found\n",
				},
			},
		)
		const strategy = new CliGitStrategy(runner, silentLogger)

		const result = await strategy.clone({ destination: DIR, url: URL })

		expect(result).toEqual({
			error: {
				message: `git clone ${URL} ${DIR} failed: fatal: repository not found`,
				strategy: "cli",
				type: "git_error",
			},
			ok: false,
		})
	})
})

describe("CliGitStrategy.update", () => {
	it("fast-forwards a local branch that is behind origin", async () => {
		const runner = gitRunner({
			"refs/heads/main": true,
			"refs/remotes/origin/main": true,
		})
		const strategy = new CliGitStrategy(runner, silentLogger)

		const result = await strategy.update({
			destination: DIR,
			reference: reference("main"),
			url: URL,
		})

		expect(result).toEqual({ ok: true, value: HEAD })
		expect(runner.lines()).toEqual([
			`git -C ${DIR} fetch --tags --force --prune origin`,
			`git -C ${DIR} show-ref --verify --quiet refs/heads/main`,
			`git -C ${DIR} checkout --force main --`,
			`git -C ${DIR} show-ref --verify --quiet refs/remotes/origin/main`,
			`git -C ${DIR} merge-base --is-ancestor HEAD refs/remotes/origin/main`,
			`git -C ${DIR} merge --ff-only refs/remotes/origin/main`,
			`git -C ${DIR} rev-parse HEAD`,
		])
	})

	it("leaves a diverged local branch alone", async () => {
		const runner = gitRunner(
			{ "refs/heads/main": true, "refs/remotes/origin/main": true },
			{
				[`-C ${DIR} merge-base --is-ancestor HEAD refs/remotes/origin/main`]: {
					exitCode: 1,
				},
			},
		)
		const strategy = new CliGitStrategy(runner, silentLogger)

		const result = await strategy.update({
			destination: DIR,
			reference: reference("main"),
			url: URL,
		})

		expect(result).toEqual({ ok: true, value: HEAD })
		expect(runner.lines()).not.toContain(
			`git -C ${DIR} merge --ff-only refs/remotes/origin/main`,
		)
	})

	it("resets to origin's default branch when no reference is given", async () => {
		const runner = gitRunner(
			{},
			{
				[`-C ${DIR} ls-remote --symref origin HEAD`]: {
					exitCode: 0,
					stdout: `ref: refs/heads/trunk\tHEAD\n${HEAD}\tHEAD\n`,
				},
			},
		)
		const strategy = new CliGitStrategy(runner, silentLogger)

		await strategy.update({ destination: DIR, url: URL })

		expect(runner.lines()).toContain(
			`git -C ${DIR} checkout --force -B trunk refs/remotes/origin/trunk`,
		)
	})

	it("falls back to origin/HEAD when the remote cannot be asked", async () => {
		const runner = gitRunner(
			{},
			{
				[`-C ${DIR} ls-remote --symref origin HEAD`]: { exitCode: 128 },
				[`-C ${DIR} symbolic-ref --quiet --short refs/remotes/origin/HEAD`]: {
					exitCode: 0,
					stdout: "origin/main\n",
				},
			},
		)
		const strategy = new CliGitStrategy(runner, silentLogger)

		await strategy.update({ destination: DIR, url: URL })

		expect(runner.lines()).toContain(
			`git -C ${DIR} checkout --force -B main refs/remotes/origin/main`,
		)
	})

	it("fails when no default branch can be found", async () => {
		const runner = gitRunner(
			{},
			{
				[`-C ${DIR} ls-remote --symref origin HEAD`]: { exitCode: 128 },
				[`-C ${DIR} symbolic-ref --quiet --short refs/remotes/origin/HEAD`]: {
					exitCode: 1,
				},
			},
		)
		const strategy = new CliGitStrategy(runner, silentLogger)

		expect(await strategy.update({ destination: DIR, url: URL })).toEqual({
			error: {
				message: "Unable to determine the default branch of origin.",
				strategy: "cli",
				type: "git_error",
			},
			ok: false,
		})
	})
})
