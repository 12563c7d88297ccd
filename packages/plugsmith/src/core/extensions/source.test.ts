import { describe, expect, it } from "vitest"
import {
	coerceSource,
	describeSource,
	type RawSourceFields,
	resolveSourceUrl,
	serializeSource,
	sourcesEqual,
} from "@/src/core/extensions/source"
import type { SourceDescriptor } from "@/src/core/extensions/types"

const BASE = "https://git.example.test"

function source(raw: RawSourceFields): SourceDescriptor {
	const result = coerceSource(raw)
	if (!result.ok) {
		throw new Error(`Invalid source in test: ${result.error.message}`)
	}
	return result.value
}

describe("coerceSource", () => {
	it("builds a git source with its declared reference", () => {
		expect(coerceSource({ tag: "v2.0", url: "https://example.com/a/b.git" })).toEqual({
			ok: true,
			value: {
				reference: { field: "tag", value: "v2.0" },
				type: "git",
				url: "https://example.com/a/b.git",
			},
		})
	})

	it("builds a hosted source without a reference", () => {
		expect(coerceSource({ repo: "acme/widgets" })).toEqual({
			ok: true,
			value: { repo: "acme/widgets", type: "github" },
		})
	})

	it("reports the offending field", () => {
		expect(coerceSource({ url: "not a url" })).toEqual({
			error: { field: "url", message: 'Invalid git URL "not a url".' },
			ok: false,
		})
		expect(coerceSource({ repo: "widgets" })).toEqual({
			error: {
				field: "repo",
				message: 'Repository "widgets" must be in the form owner/name.',
			},
			ok: false,
		})
		expect(coerceSource({ branch: "-x", repo: "acme/widgets" })).toEqual({
			error: { field: "branch", message: 'Invalid branch "-x".' },
			ok: false,
		})
	})
})

describe("resolveSourceUrl", () => {
	it("expands owner/name against the hosted base", () => {
		expect(resolveSourceUrl(source({ repo: "acme/widgets" }), `${BASE}/`)).toBe(
			"https://git.example.test/acme/widgets.git",
		)
	})

	it("uses git URLs and full hosted URLs unchanged", () => {
		expect(resolveSourceUrl(source({ url: "git@example.com:a/b.git" }), BASE)).toBe(
			"git@example.com:a/b.git",
		)
		expect(resolveSourceUrl(source({ repo: "https://example.com/a/b" }), BASE)).toBe(
			"https://example.com/a/b",
		)
	})
})

describe("sourcesEqual", () => {
	it("treats a shorthand and its expanded URL as the same source", () => {
		expect(
			sourcesEqual(
				source({ repo: "acme/widgets" }),
				source({ url: "https://git.example.test/acme/widgets.git" }),
				BASE,
			),
		).toBe(true)
	})

	it("ignores which field declared the reference", () => {
		expect(
			sourcesEqual(
				source({ branch: "stable", repo: "acme/widgets" }),
				source({ repo: "acme/widgets", tag: "stable" }),
				BASE,
			),
		).toBe(true)
	})

	it("distinguishes references", () => {
		expect(
			sourcesEqual(
				source({ repo: "acme/widgets" }),
				source({ branch: "main", repo: "acme/widgets" }),
				BASE,
			),
		).toBe(false)
	})
})

describe("serializeSource", () => {
	it("writes the flat field shape", () => {
		expect(serializeSource(source({ commit: "abc1234", url: "https://e.com/x.git" }))).toEqual({
			commit: "abc1234",
			url: "https://e.com/x.git",
		})
	})

	it("orders the fields by name", () => {
		expect(Object.keys(serializeSource(source({ branch: "main", repo: "acme/widgets" })))).toEqual([
			"branch",
			"repo",
		])
		expect(Object.keys(serializeSource(source({ tag: "v1", url: "https://e.com/x.git" })))).toEqual([
			"tag",
			"url",
		])
	})
})

describe("describeSource", () => {
	it("names the reference field for branches and tags", () => {
		expect(describeSource(source({ branch: "main", repo: "acme/widgets" }))).toBe(
			"github: acme/widgets at branch main",
		)
	})

	it("shows a commit without a field name", () => {
		expect(describeSource(source({ commit: "abc1234", url: "https://e.com/x.git" }))).toBe(
			"git: https://e.com/x.git at abc1234",
		)
	})
})
