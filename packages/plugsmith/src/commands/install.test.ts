import { describe, expect, it } from "vitest"
import { describeAction } from "@/src/commands/install"
import { descriptor, toLocked } from "@/tests/helpers/extensions"

const widget = descriptor("widget", "plugin", { repo: "acme/widget" })

describe("describeAction", () => {
	it("describes each planned action", () => {
		expect(describeAction({ previous: toLocked(widget), type: "remove" })).toBe(
			"Would uninstall widget",
		)
		expect(
			describeAction({ extension: widget, previous: toLocked(widget), type: "replace" }),
		).toBe("Would update widget (source changed)")
		expect(describeAction({ extension: widget, reason: "added", type: "install" })).toBe(
			"Would install widget",
		)
		expect(
			describeAction({
				extension: widget,
				previous: toLocked(widget),
				reason: "missing",
				type: "install",
			}),
		).toBe("Would reinstall widget (directory missing)")
	})
})
