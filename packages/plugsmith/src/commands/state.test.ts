import { describe, expect, it } from "vitest"
import { renderState } from "@/src/commands/state"
import { buildInstalledState } from "@/src/core/state/store"
import { locked } from "@/tests/helpers/extensions"

describe("renderState", () => {
	it("reports an empty installation", () => {
		expect(renderState(null)).toEqual(["No extensions installed"])
		expect(renderState(buildInstalledState([]))).toEqual(["No extensions installed"])
	})

	it("groups entries by kind with a shortened commit", () => {
		const state = buildInstalledState([
			locked(
				"minimal",
				"theme",
				{ branch: "main", repo: "acme/minimal" },
				{ resolvedCommit: "fedcba9876543210fedcba9876543210fedcba98" },
			),
			locked(
				"issues_panel",
				"plugin",
				{ tag: "v1.0.2", url: "https://git.example.test/issues_panel.git" },
				{ resolvedCommit: "0123456789abcdef0123456789abcdef01234567" },
			),
			locked(
				"time_tracker",
				"plugin",
				{ repo: "acme/time_tracker" },
				{ resolvedCommit: null },
			),
		])

		expect(renderState(state)).toEqual([
			"Plugins:",
			" * issues_panel (git: https://git.example.test/issues_panel.git at tag v1.0.2, installed: 01234567)",
			" * time_tracker (github: acme/time_tracker, installed: unknown)",
			"",
			"Themes:",
			" * minimal (github: acme/minimal at branch main, installed: fedcba98)",
		])
	})
})
