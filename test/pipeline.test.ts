/**
 * Update pipeline tests
 *
 * Network, processes, launching and extraction are faked; the filesystem
 * and the sidecar store are real, inside a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import { createHash } from "node:crypto"
import {
	existsSync,
	mkdirSync,
	mkdtempSync,
	readdirSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from "node:fs"
import { rename, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { backupPath, runPipeline, type PipelineContext } from "../src/core/pipeline.js"
import type {
	EntryOutcome,
	PipelineEvent,
	PipelineState,
} from "../src/core/types.js"
import type { ExtractResult } from "../src/extract.js"
import { loadMetadata, saveMetadata, sidecarStore } from "../src/metadata.js"
import type { ProcessHandle } from "../src/processes.js"
import type { Entry } from "../src/types.js"
import {
	FakeDownloader,
	FakeProcessManager,
	RecordingLauncher,
	ScriptedExtractor,
	type FakeDownloaderOptions,
} from "./helpers/fakes.js"
import { makeEntry } from "./helpers/index.js"

const URL_TOOL = "https://downloads.example.test/tool.exe"
const URL_MD5 = "https://downloads.example.test/tool.exe.md5"
const EDITOR = "/opt/editor/editor.exe"

const md5 = (text: string): string => createHash("md5").update(text).digest("hex")

function states(events: PipelineEvent[]): PipelineState[] {
	return events.flatMap(event => (event.type === "transition" ? [event.to] : []))
}

function lockError(): NodeJS.ErrnoException {
	const err: NodeJS.ErrnoException = new Error("EBUSY: resource busy or locked")
	err.code = "EBUSY"
	return err
}

interface HarnessOptions {
	downloader?: FakeDownloaderOptions
	running?: ProcessHandle[]
	extracts?: ExtractResult[]
	onExtract?: (archivePath: string) => Promise<void>
	force?: boolean
	/** How many backup renames fail before they start succeeding */
	lockedRenames?: number
}

describe("update pipeline", () => {
	let tempDir: string
	let target: string

	let downloader: FakeDownloader
	let processes: FakeProcessManager
	let launcher: RecordingLauncher
	let extractor: ScriptedExtractor
	let events: PipelineEvent[]
	let renameAttempts: number

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "artifact-sync-pipeline-"))
		target = join(tempDir, "tool.exe")
	})

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	function run(entry: Entry, options: HarnessOptions = {}): Promise<EntryOutcome> {
		downloader = new FakeDownloader(options.downloader)
		processes = new FakeProcessManager(options.running)
		launcher = new RecordingLauncher()
		extractor = new ScriptedExtractor(options.extracts, options.onExtract)
		events = []
		renameAttempts = 0
		const lockedRenames = options.lockedRenames ?? 0

		const ctx: PipelineContext = {
			downloaderFor: () => downloader,
			store: sidecarStore,
			processes,
			launcher,
			extractor,
			force: options.force ?? false,
			tempRoot: join(tempDir, "scratch"),
			rename: async (from, to) => {
				renameAttempts++
				if (renameAttempts <= lockedRenames) throw lockError()
				await rename(from, to)
			},
		}
		return runPipeline(entry, ctx, event => events.push(event))
	}

	const editorProcess: ProcessHandle = {
		pid: 4242,
		name: "editor.exe",
		exePath: EDITOR,
		cmdline: [EDITOR],
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Fresh downloads
	// ─────────────────────────────────────────────────────────────────────────

	describe("missing target", () => {
		it("downloads, records metadata and launches", async () => {
			const outcome = await run(
				makeEntry({ target, launch: "/opt/tool/run.sh", arguments: "--fast" }),
				{
					downloader: {
						files: { [URL_TOOL]: "v2" },
						heads: { [URL_TOOL]: { etag: '"v2"' } },
					},
				},
			)

			expect(outcome.status).toBe("downloaded")
			expect(outcome.target).toBe(target)
			expect(readFileSync(target, "utf-8")).toBe("v2")
			expect((await loadMetadata(target))?.descriptor).toEqual({ etag: '"v2"' })
			expect(states(events)).toEqual([
				"check-existence",
				"download-fresh",
				"post-process",
				"end",
			])
			expect(launcher.launches).toEqual([
				{ command: "/opt/tool/run.sh", args: "--fast" },
			])
		})

		it("appends the url filename to a directory target", async () => {
			const outcome = await run(makeEntry({ target: tempDir }), {
				downloader: { files: { [URL_TOOL]: "v2" } },
			})

			expect(outcome.target).toBe(target)
			expect(readFileSync(target, "utf-8")).toBe("v2")
		})

		it("fails when the download fails", async () => {
			const outcome = await run(makeEntry({ target }))

			expect(outcome.status).toBe("failed")
			expect(outcome.error).toBe(`HTTP 404 for ${URL_TOOL}`)
			expect(existsSync(target)).toBe(false)
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Resolution
	// ─────────────────────────────────────────────────────────────────────────

	describe("resolution", () => {
		it("fails when no url can be resolved", async () => {
			const outcome = await run(makeEntry({ target }), {
				downloader: { resolved: null },
			})

			expect(outcome.status).toBe("failed")
			expect(states(events)).toEqual(["failed"])
		})

		it("fails when the url does not name a file", async () => {
			const outcome = await run(
				makeEntry({ target, url: "https://downloads.example.test/latest" }),
			)

			expect(outcome.status).toBe("failed")
			expect(outcome.error).toBe(
				"url https://downloads.example.test/latest does not name a file",
			)
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Existing target
	// ─────────────────────────────────────────────────────────────────────────

	describe("existing target", () => {
		beforeEach(() => {
			writeFileSync(target, "v1")
		})

		it("stops when the identity headers are unchanged", async () => {
			await saveMetadata(target, { etag: '"v1"' }, URL_TOOL)

			const outcome = await run(makeEntry({ target }), {
				downloader: {
					files: { [URL_TOOL]: "v2" },
					heads: { [URL_TOOL]: { etag: '"v1"' } },
				},
			})

			expect(outcome.status).toBe("up-to-date")
			expect(downloader.fetches).toEqual([])
			expect(readFileSync(target, "utf-8")).toBe("v1")
			expect(states(events)).toEqual([
				"check-existence",
				"check-staleness",
				"up-to-date",
				"end",
			])
		})

		it("keeps the target when the published md5 matches", async () => {
			const outcome = await run(
				makeEntry({ target, md5: URL_MD5, useContentLengthCheck: false }),
				{
					downloader: {
						texts: { [URL_MD5]: `${md5("v1").toUpperCase()}  tool.exe\n` },
						heads: { [URL_TOOL]: { etag: '"v1"' } },
					},
				},
			)

			expect(outcome.status).toBe("unchanged")
			expect(downloader.fetches).toEqual([])
			expect((await loadMetadata(target))?.descriptor).toEqual({ etag: '"v1"' })
			expect(states(events)).toEqual([
				"check-existence",
				"check-staleness",
				"resolve-via-hash",
				"no-change",
				"end",
			])
		})

		it("hashes a candidate download when the md5 reference is unreadable", async () => {
			const outcome = await run(
				makeEntry({ target, md5: URL_MD5, useContentLengthCheck: false }),
				{ downloader: { files: { [URL_TOOL]: "v1" } } },
			)

			expect(outcome.status).toBe("unchanged")
			expect(outcome.warnings).toEqual([
				`could not read hash reference ${URL_MD5}: HTTP 404 for ${URL_MD5}`,
			])
			expect(readdirSync(join(tempDir, "scratch"))).toEqual([])
		})

		it("replaces the target with the hashed candidate", async () => {
			const outcome = await run(
				makeEntry({ target, useContentLengthCheck: false }),
				{ downloader: { files: { [URL_TOOL]: "v2" } } },
			)

			expect(outcome.status).toBe("updated")
			expect(readFileSync(target, "utf-8")).toBe("v2")
			expect(readFileSync(backupPath(target), "utf-8")).toBe("v1")
			expect(downloader.fetches).toHaveLength(1)
			expect(downloader.fetches[0]?.destination).not.toBe(target)
			expect(readdirSync(join(tempDir, "scratch"))).toEqual([])
			expect(states(events)).toEqual([
				"check-existence",
				"check-staleness",
				"resolve-via-hash",
				"replace",
				"post-process",
				"end",
			])
		})

		it("downloads straight into place when the md5 reference differs", async () => {
			const outcome = await run(makeEntry({ target, md5: URL_MD5 }), {
				downloader: {
					files: { [URL_TOOL]: "v2" },
					texts: { [URL_MD5]: md5("v2") },
				},
			})

			expect(outcome.status).toBe("updated")
			expect(downloader.fetches.map(f => f.destination)).toEqual([target])
			expect(readFileSync(target, "utf-8")).toBe("v2")
		})

		it("restores the backup when the replacement download fails", async () => {
			const outcome = await run(makeEntry({ target }), { force: true })

			expect(outcome.status).toBe("failed")
			expect(readFileSync(target, "utf-8")).toBe("v1")
			expect(existsSync(backupPath(target))).toBe(false)
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Force mode
	// ─────────────────────────────────────────────────────────────────────────

	describe("force", () => {
		beforeEach(() => {
			writeFileSync(target, "v1")
		})

		it("replaces without consulting staleness or hashes", async () => {
			const outcome = await run(makeEntry({ target, md5: URL_MD5 }), {
				force: true,
				downloader: {
					files: { [URL_TOOL]: "v2" },
					texts: { [URL_MD5]: md5("v1") },
				},
			})

			expect(outcome.status).toBe("updated")
			expect(readFileSync(target, "utf-8")).toBe("v2")
			expect(states(events)).toEqual([
				"check-existence",
				"replace",
				"post-process",
				"end",
			])
		})

		it("honors the entry-level flag", async () => {
			const outcome = await run(makeEntry({ target, force: true }), {
				downloader: { files: { [URL_TOOL]: "v2" } },
			})

			expect(outcome.status).toBe("updated")
			expect(states(events)).toContain("replace")
			expect(states(events)).not.toContain("check-staleness")
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Locked targets
	// ─────────────────────────────────────────────────────────────────────────

	describe("locked target", () => {
		beforeEach(() => {
			writeFileSync(target, "v1")
		})

		it("fails without killing when no lock owner is configured", async () => {
			const outcome = await run(makeEntry({ target }), {
				force: true,
				lockedRenames: 1,
				running: [editorProcess],
				downloader: { files: { [URL_TOOL]: "v2" } },
			})

			expect(outcome.status).toBe("failed")
			expect(outcome.error).toContain("could not back up")
			expect(processes.killed).toEqual([])
			expect(downloader.fetches).toEqual([])
			expect(readFileSync(target, "utf-8")).toBe("v1")
		})

		it("kills the lock owner, replaces and relaunches it", async () => {
			const outcome = await run(
				makeEntry({
					target,
					killIfLocked: EDITOR,
					relaunch: true,
					arguments: "--restore",
					launch: "/opt/other/run.sh",
				}),
				{
					force: true,
					lockedRenames: 1,
					running: [editorProcess],
					downloader: { files: { [URL_TOOL]: "v2" } },
				},
			)

			expect(outcome.status).toBe("updated")
			expect(outcome.killed).toBe(true)
			expect(processes.killed.map(p => p.pid)).toEqual([4242])
			expect(renameAttempts).toBe(2)
			expect(readFileSync(target, "utf-8")).toBe("v2")
			expect(launcher.launches).toEqual([{ command: EDITOR, args: "--restore" }])
			expect(states(events)).toEqual([
				"check-existence",
				"replace",
				"retry-backup",
				"post-process",
				"end",
			])
		})

		it("gives up after one retry and leaves the target untouched", async () => {
			const outcome = await run(
				makeEntry({ target, killIfLocked: EDITOR, relaunch: true }),
				{
					force: true,
					lockedRenames: 2,
					running: [editorProcess],
					downloader: { files: { [URL_TOOL]: "v2" } },
				},
			)

			expect(outcome.status).toBe("failed")
			expect(outcome.error).toContain("after unlocking")
			expect(renameAttempts).toBe(2)
			expect(readFileSync(target, "utf-8")).toBe("v1")
			expect(launcher.launches).toEqual([])
		})

		it("does not relaunch when nothing was killed", async () => {
			const outcome = await run(
				makeEntry({
					target,
					killIfLocked: EDITOR,
					relaunch: true,
					launch: "/opt/other/run.sh",
				}),
				{
					force: true,
					lockedRenames: 1,
					downloader: { files: { [URL_TOOL]: "v2" } },
				},
			)

			expect(outcome.status).toBe("updated")
			expect(outcome.killed).toBe(false)
			expect(launcher.launches).toEqual([{ command: "/opt/other/run.sh" }])
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Post-processing
	// ─────────────────────────────────────────────────────────────────────────

	describe("archives", () => {
		const URL_MOD = "https://downloads.example.test/mod.zip"
		let unzipTarget: string
		let archive: string

		beforeEach(() => {
			unzipTarget = join(tempDir, "mods")
			mkdirSync(unzipTarget)
			archive = join(tempDir, "mod.zip")
		})

		it("extracts a downloaded zip with the entry's options", async () => {
			await run(
				makeEntry({
					url: URL_MOD,
					target: archive,
					unzipTarget,
					flatten: true,
					archivePassword: "test-secret",
				}),
				{ downloader: { files: { [URL_MOD]: "zip bytes" } } },
			)

			expect(extractor.calls).toEqual([
				{
					archivePath: archive,
					destDir: unzipTarget,
					options: { flatten: true, password: "test-secret" },
				},
			])
		})

		it("kills lock holders, retries extraction once and still launches", async () => {
			const outcome = await run(
				makeEntry({
					url: URL_MOD,
					target: archive,
					unzipTarget,
					killIfLocked: EDITOR,
					relaunch: true,
					launch: "/opt/game/run.sh",
				}),
				{
					running: [editorProcess],
					extracts: [
						{ success: false, extractedFiles: [], error: "file in use" },
					],
					downloader: { files: { [URL_MOD]: "zip bytes" } },
				},
			)

			expect(outcome.status).toBe("downloaded")
			expect(extractor.calls).toHaveLength(2)
			expect(processes.killed.map(p => p.pid)).toEqual([4242])
			expect(outcome.killed).toBe(false)
			expect(outcome.warnings).toEqual([
				`could not extract to ${unzipTarget}: file in use`,
			])
			expect(launcher.launches).toEqual([{ command: "/opt/game/run.sh" }])
		})

		it("restores the backup when the target disappears during extraction", async () => {
			writeFileSync(archive, "old zip")

			const outcome = await run(makeEntry({ url: URL_MOD, target: archive, unzipTarget }), {
				force: true,
				onExtract: path => rm(path, { force: true }),
				downloader: { files: { [URL_MOD]: "new zip" } },
			})

			expect(outcome.status).toBe("updated")
			expect(readFileSync(archive, "utf-8")).toBe("old zip")
			expect(existsSync(backupPath(archive))).toBe(false)
			expect(outcome.warnings).toEqual([
				`target missing after update, restored ${backupPath(archive)}`,
			])
		})

		it("stops post-processing after a second extraction failure", async () => {
			const failure = { success: false, extractedFiles: [], error: "corrupt" }
			const outcome = await run(
				makeEntry({
					url: URL_MOD,
					target: archive,
					unzipTarget,
					launch: "/opt/game/run.sh",
				}),
				{
					extracts: [failure, failure],
					downloader: { files: { [URL_MOD]: "zip bytes" } },
				},
			)

			expect(outcome.status).toBe("downloaded")
			expect(outcome.warnings).toHaveLength(2)
			expect(launcher.launches).toEqual([])
			expect(readFileSync(archive, "utf-8")).toBe("zip bytes")
		})

		it("skips extraction without an unzip target", async () => {
			await run(makeEntry({ url: URL_MOD, target: archive }), {
				downloader: { files: { [URL_MOD]: "zip bytes" } },
			})

			expect(extractor.calls).toEqual([])
		})
	})
})
