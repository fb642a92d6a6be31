/**
 * Unit tests for the staleness oracle decision table
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
	checkStaleness,
	compareDescriptors,
	type StalenessDeps,
} from "../../src/core/staleness.js"
import {
	loadMetadata,
	metadataPath,
	saveMetadata,
	sidecarStore,
} from "../../src/metadata.js"
import type { RemoteDescriptor } from "../../src/types.js"

const URL_A = "https://downloads.example.test/tool.exe"
const URL_B = "https://mirror.example.test/tool.exe"

function probing(remote: RemoteDescriptor | null): StalenessDeps & {
	probes: string[]
} {
	const probes: string[] = []
	return {
		store: sidecarStore,
		probes,
		probe: async url => {
			probes.push(url)
			return remote
		},
	}
}

describe("compareDescriptors", () => {
	it("prefers ETag over the other fields", () => {
		expect(
			compareDescriptors(
				{ etag: '"a"', lastModified: "Mon", contentLength: 1 },
				{ etag: '"a"', lastModified: "Tue", contentLength: 2 },
			),
		).toEqual({ result: "same", field: "etag" })
	})

	it("falls back to Last-Modified when ETag is one-sided", () => {
		expect(
			compareDescriptors(
				{ etag: '"a"', lastModified: "Mon" },
				{ lastModified: "Tue" },
			),
		).toEqual({ result: "different", field: "lastModified" })
	})

	it("falls back to Content-Length last", () => {
		expect(
			compareDescriptors({ contentLength: 5 }, { contentLength: 5 }),
		).toEqual({ result: "same", field: "contentLength" })
	})

	it("reports incomparable descriptors", () => {
		expect(compareDescriptors({ etag: '"a"' }, { contentLength: 5 })).toEqual({
			result: "incomparable",
		})
	})
})

describe("checkStaleness", () => {
	let tempDir: string
	let target: string

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "artifact-sync-stale-"))
		target = join(tempDir, "tool.exe")
	})

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Missing target
	// ─────────────────────────────────────────────────────────────────────────

	it("needs an update when the target is missing and drops its sidecar", async () => {
		writeFileSync(metadataPath(target), JSON.stringify({ url: URL_A }))
		const deps = probing({ etag: '"a"' })

		const result = await checkStaleness(
			URL_A,
			target,
			{ useContentLengthCheck: true },
			deps,
		)

		expect(result.kind).toBe("needs-update")
		expect(existsSync(metadataPath(target))).toBe(false)
		expect(deps.probes).toEqual([])
	})

	// ─────────────────────────────────────────────────────────────────────────
	// No cached metadata
	// ─────────────────────────────────────────────────────────────────────────

	describe("without cached metadata", () => {
		beforeEach(() => {
			writeFileSync(target, "123456")
		})

		it("needs an update when the length check is disabled", async () => {
			const deps = probing({ contentLength: 6 })
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: false },
				deps,
			)
			expect(result.kind).toBe("needs-update")
			expect(deps.probes).toEqual([])
		})

		it("is unknown when the HEAD fails", async () => {
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing(null),
			)
			expect(result.kind).toBe("unknown")
		})

		it("is unknown when the remote size is not reported", async () => {
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing({ etag: '"a"' }),
			)
			expect(result.kind).toBe("unknown")
		})

		it("is up to date and records metadata when sizes match", async () => {
			const remote = { etag: '"a"', contentLength: 6 }
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing(remote),
			)

			expect(result).toEqual({
				kind: "up-to-date",
				reason: "content length matches local size",
				remote,
			})
			const saved = await loadMetadata(target)
			expect(saved?.sourceUrl).toBe(URL_A)
			expect(saved?.descriptor).toEqual(remote)
		})

		it("needs an update when sizes differ", async () => {
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing({ contentLength: 7 }),
			)
			expect(result.kind).toBe("needs-update")
			expect(await loadMetadata(target)).toBeNull()
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Cached metadata
	// ─────────────────────────────────────────────────────────────────────────

	describe("with cached metadata", () => {
		beforeEach(async () => {
			writeFileSync(target, "123456")
			await saveMetadata(
				target,
				{ etag: '"v1"', lastModified: "Mon, 01 Jan 2024 00:00:00 GMT" },
				URL_A,
			)
		})

		it("needs an update when the source url changed", async () => {
			const deps = probing({ etag: '"v1"' })
			const result = await checkStaleness(
				URL_B,
				target,
				{ useContentLengthCheck: true },
				deps,
			)
			expect(result).toEqual({
				kind: "needs-update",
				reason: "source url changed",
			})
			expect(deps.probes).toEqual([])
		})

		it("is unknown when the HEAD fails", async () => {
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing(null),
			)
			expect(result.kind).toBe("unknown")
		})

		it("is up to date when the ETag is unchanged", async () => {
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing({ etag: '"v1"', lastModified: "Tue, 02 Jan 2024 00:00:00 GMT" }),
			)
			expect(result.kind).toBe("up-to-date")
			expect(result.reason).toBe("etag unchanged")
		})

		it("needs an update when the ETag changed", async () => {
			const remote = { etag: '"v2"' }
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing(remote),
			)
			expect(result).toEqual({
				kind: "needs-update",
				reason: "etag changed",
				remote,
			})
		})

		it("compares Last-Modified when the server stopped sending ETag", async () => {
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing({ lastModified: "Mon, 01 Jan 2024 00:00:00 GMT" }),
			)
			expect(result.kind).toBe("up-to-date")
			expect(result.reason).toBe("lastModified unchanged")
		})

		it("is unknown when nothing is comparable, never up to date", async () => {
			const result = await checkStaleness(
				URL_A,
				target,
				{ useContentLengthCheck: true },
				probing({ contentLength: 6 }),
			)
			expect(result.kind).toBe("unknown")
		})
	})
})
