/**
 * Integration tests for the installed-state record.
 *
 * Exercises load/save/delete against a real temporary directory.
 */

import { readdir, readFile, rename, writeFile } from "node:fs/promises"
import { join } from "node:path"
import { describe, expect, it, vi } from "vitest"
import type { InstalledState } from "@/src/core/extensions/types"
import { buildInstalledState, StateStore } from "@/src/core/state/store"
import type { AbsolutePath } from "@/src/core/types/branded"
import { coerceAbsolutePathDirect } from "@/src/core/types/coerce"
import { locked } from "@/tests/helpers/extensions"
import { withTempDir } from "@/tests/helpers/fs"

// Import assertions to register custom matchers
import "@/tests/helpers/assertions"

vi.mock("node:fs/promises", async (importOriginal) => {
	const actual = await importOriginal<typeof import("node:fs/promises")>()
	return { ...actual, rename: vi.fn(actual.rename) }
})

function statePathIn(dir: AbsolutePath): AbsolutePath {
	const resolved = coerceAbsolutePathDirect(join(dir, ".extensions.lock"))
	if (!resolved) {
		throw new Error("unreachable: temp dir is absolute")
	}
	return resolved
}

const plugin = locked(
	"issues_panel",
	"plugin",
	{ commit: "a1b2c3d", repo: "acme/issues_panel" },
	{
		installedAt: "2026-03-01T09:30:00.000Z",
		resolvedCommit: "a1b2c3d4e5f60718293a4b5c6d7e8f9012345678",
	},
)

const theme = locked(
	"minimal",
	"theme",
	{ url: "https://git.example.test/themes/minimal.git" },
	{ installedAt: "2026-03-01T09:31:00.000Z", resolvedCommit: null },
)

const sample: InstalledState = buildInstalledState([plugin, theme])

describe("StateStore", () => {
	it("returns null when no record exists", async () => {
		await withTempDir(async (dir) => {
			const store = new StateStore(statePathIn(dir))

			expect(await store.load()).toEqual({ ok: true, value: null })
		})
	})

	it("distinguishes an empty record from a missing one", async () => {
		await withTempDir(async (dir) => {
			const store = new StateStore(statePathIn(dir))
			await store.save(buildInstalledState([]))

			expect(await store.load()).toEqual({
				ok: true,
				value: { extensions: [], version: 1 },
			})
		})
	})

	it("reads back what it saved", async () => {
		await withTempDir(async (dir) => {
			const store = new StateStore(statePathIn(dir))

			expect(await store.save(sample)).toBeOk()
			expect(await store.load()).toEqual({ ok: true, value: sample })
		})
	})

	it("writes pretty-printed JSON with sorted keys and a trailing newline", async () => {
		await withTempDir(async (dir) => {
			const store = new StateStore(statePathIn(dir))
			const tagged = locked(
				"minimal",
				"theme",
				{ tag: "v2.0", url: "https://git.example.test/themes/minimal.git" },
				{ installedAt: "2026-03-01T09:31:00.000Z", resolvedCommit: null },
			)
			await store.save(buildInstalledState([tagged]))

			const contents = await readFile(statePathIn(dir), "utf8")
			expect(contents).toBe(
				`${[
					"{",
					'  "extensions": [',
					"    {",
					'      "installedAt": "2026-03-01T09:31:00.000Z",',
					'      "kind": "theme",',
					'      "name": "minimal",',
					'      "resolvedCommit": null,',
					'      "source": {',
					'        "tag": "v2.0",',
					'        "url": "https://git.example.test/themes/minimal.git"',
					"      }",
					"    }",
					"  ],",
					'  "version": 1',
					"}",
				].join("\n")}\n`,
			)
		})
	})

	it("rejects a record that is not JSON", async () => {
		await withTempDir(async (dir) => {
			await writeFile(statePathIn(dir), "{ not json")
			const store = new StateStore(statePathIn(dir))

			const result = await store.load()

			expect(result).toBeErr()
			if (!result.ok) {
				expect(result.error.message).toMatch(/^Invalid JSON in .*\.extensions\.lock\. /)
			}
		})
	})

	it("rejects an unsupported version", async () => {
		await withTempDir(async (dir) => {
			await writeFile(statePathIn(dir), JSON.stringify({ extensions: [], version: 2 }))
			const store = new StateStore(statePathIn(dir))

			const result = await store.load()

			expect(result).toBeErr()
			if (!result.ok) {
				expect(result.error.operation).toBe("load")
				expect(result.error.message).toMatch(/^Invalid state file .*: version: /)
			}
		})
	})

	it("rejects a name recorded twice", async () => {
		await withTempDir(async (dir) => {
			const entry = {
				installedAt: "2026-03-01T09:30:00.000Z",
				kind: "plugin",
				name: "twice",
				resolvedCommit: null,
				source: { repo: "acme/twice" },
			}
			await writeFile(
				statePathIn(dir),
				JSON.stringify({ extensions: [entry, entry], version: 1 }),
			)
			const store = new StateStore(statePathIn(dir))

			const result = await store.load()

			expect(result).toBeErr()
			if (!result.ok) {
				expect(result.error.message).toBe(
					`Invalid state file ${statePathIn(dir)}: "twice" is listed more than once.`,
				)
			}
		})
	})

	it("keeps the previous record when the rename fails", async () => {
		await withTempDir(async (dir) => {
			const store = new StateStore(statePathIn(dir))
			await store.save(sample)
			vi.mocked(rename).mockRejectedValueOnce(new Error("disk full"))

			const result = await store.save(buildInstalledState([]))

			expect(result).toBeErr()
			if (!result.ok) {
				expect(result.error.operation).toBe("save")
				expect(result.error.message).toBe("disk full")
			}
			expect(await store.load()).toEqual({ ok: true, value: sample })
			expect(await readdir(dir)).toEqual([".extensions.lock"])
		})
	})

	it("clears temporary files a crashed save left behind", async () => {
		await withTempDir(async (dir) => {
			await writeFile(join(dir, ".extensions.lock.4242.1767225600000.tmp"), "{")
			await writeFile(join(dir, ".other.lock.4242.1767225600000.tmp"), "{")
			const store = new StateStore(statePathIn(dir))

			expect(await store.save(sample)).toBeOk()
			expect((await readdir(dir)).sort()).toEqual([
				".extensions.lock",
				".other.lock.4242.1767225600000.tmp",
			])
		})
	})

	it("deletes the record", async () => {
		await withTempDir(async (dir) => {
			const store = new StateStore(statePathIn(dir))
			await store.save(sample)

			expect(await store.delete()).toBeOk()
			expect(await store.load()).toEqual({ ok: true, value: null })
		})
	})
})
