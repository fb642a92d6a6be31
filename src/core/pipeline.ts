/**
 * Update pipeline: one entry from "is there anything to do?" to "done"
 *
 * Pure business logic as an async generator. Every state change is yielded
 * as a PipelineEvent; the generator returns the entry's outcome.
 *
 * Usage:
 * ```ts
 * const outcome = await runPipeline(entry, context, event => {
 *   if (event.type === "transition") render(event)
 * })
 * ```
 */

import { existsSync } from "node:fs"
import { mkdir, mkdtemp, rename, rm, stat } from "node:fs/promises"
import { join } from "node:path"
import { BACKUP_SUFFIX } from "../constants.js"
import { type FetchOptions, moveFile } from "../download.js"
import { type ArchiveExtractor, isZipArchive } from "../extract.js"
import { hashFile, hashesMatch, parseHashReference } from "../hash.js"
import type { Launcher } from "../launch.js"
import { log } from "../logger.js"
import type { MetadataStore } from "../metadata.js"
import { killMatching, type ProcessManager } from "../processes.js"
import type { Entry, RemoteDescriptor } from "../types.js"
import { type Downloader, urlToFilename } from "./downloader.js"
import { checkStaleness } from "./staleness.js"
import type {
	EntryOutcome,
	OutcomeStatus,
	PipelineEvent,
	PipelineState,
} from "./types.js"

export interface PipelineContext {
	downloaderFor(entry: Entry): Downloader
	store: MetadataStore
	processes: ProcessManager
	launcher: Launcher
	extractor: ArchiveExtractor
	/** Run-level force; entry.force applies as well */
	force: boolean
	/** Parent of the per-entry scratch directory for candidate downloads */
	tempRoot: string
	/** Backup rename; replaceable to simulate a locked target */
	rename?: (from: string, to: string) => Promise<void>
}

type Steps<T = void> = AsyncGenerator<PipelineEvent, T>

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory()
	} catch {
		return false
	}
}

/** Path of the single backup kept for a target */
export function backupPath(target: string): string {
	return `${target}${BACKUP_SUFFIX}`
}

/**
 * Mutable bookkeeping for one pipeline run
 */
class PipelineRun {
	state: PipelineState = "start"
	killed = false
	target: string
	readonly warnings: string[] = []
	private readonly started = Date.now()

	constructor(
		readonly entry: Entry,
		readonly ctx: PipelineContext,
		readonly downloader: Downloader,
	) {
		this.target = entry.target
	}

	get fetchOptions(): FetchOptions {
		return {
			label: this.entry.name,
			...(this.entry.chunkedDownload !== undefined
				? { chunked: this.entry.chunkedDownload }
				: {}),
		}
	}

	transition(to: PipelineState, detail?: string): PipelineEvent {
		const event: PipelineEvent = {
			type: "transition",
			entry: this.entry.name,
			from: this.state,
			to,
			...(detail !== undefined ? { detail } : {}),
		}
		const fields = { entry: this.entry.name, from: this.state, to, detail }
		if (to === "failed") log.pipeline.warn(fields, "pipeline transition")
		else log.pipeline.debug(fields, "pipeline transition")
		this.state = to
		return event
	}

	warning(message: string): PipelineEvent {
		log.pipeline.warn({ entry: this.entry.name }, message)
		this.warnings.push(message)
		return { type: "warning", entry: this.entry.name, message }
	}

	outcome(status: OutcomeStatus, error?: string): EntryOutcome {
		return {
			entry: this.entry.name,
			target: this.target,
			status,
			killed: this.killed,
			warnings: this.warnings,
			...(error !== undefined ? { error } : {}),
			durationMs: Date.now() - this.started,
		}
	}

	async *fail(error: string): Steps<EntryOutcome> {
		yield this.transition("failed", error)
		return this.outcome("failed", error)
	}

	async *finish(status: OutcomeStatus): Steps<EntryOutcome> {
		yield this.transition("end")
		return this.outcome(status)
	}

	/** Kill the processes running killIfLocked. Returns how many died. */
	async killLockHolders(): Promise<number> {
		const exePath = this.entry.killIfLocked
		if (exePath === undefined) return 0
		return killMatching(this.ctx.processes, { exePath })
	}

	/**
	 * Kill lock holders of the target itself and mark the run, which turns
	 * the launch step into a relaunch.
	 */
	async breakLock(): Promise<number> {
		const killed = await this.killLockHolders()
		if (killed > 0) this.killed = true
		return killed
	}

	/**
	 * Persist the identity headers of url for the target: the descriptor the
	 * oracle already saw, else a fresh HEAD.
	 */
	async refreshMetadata(url: string, known?: RemoteDescriptor): Promise<void> {
		const descriptor = known ?? (await this.downloader.probe(url))
		if (descriptor === null) {
			log.pipeline.warn(
				{ entry: this.entry.name, target: this.target },
				"could not get headers to save metadata",
			)
			return
		}
		await this.ctx.store.save(this.target, descriptor, url)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Steps
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Expected digest of the remote artifact. Reads the md5 reference when one
 * is configured, otherwise downloads the candidate and hashes it.
 */
async function* resolveRemoteHash(
	run: PipelineRun,
	url: string,
	candidate: string,
): Steps<{ digest: string; candidate?: string } | { error: string }> {
	const reference = run.entry.md5
	if (reference !== undefined) {
		try {
			const digest = parseHashReference(
				await run.downloader.readText(reference),
			)
			if (digest !== null) return { digest }
			yield run.warning(`empty hash reference at ${reference}`)
		} catch (err) {
			yield run.warning(
				`could not read hash reference ${reference}: ${errorMessage(err)}`,
			)
		}
	}

	const result = await run.downloader.fetch(url, candidate, run.fetchOptions)
	if (!result.success) return { error: result.error }
	return { digest: await hashFile(candidate, "md5"), candidate }
}

/**
 * Back the target up, put the new artifact in place and refresh metadata.
 * Returns the failure message, or null on success. On failure the target is
 * untouched or restored from the backup.
 */
async function* replaceTarget(
	run: PipelineRun,
	url: string,
	candidate: string | undefined,
	known: RemoteDescriptor | undefined,
): Steps<string | null> {
	const renameFile = run.ctx.rename ?? rename
	const backup = backupPath(run.target)

	if (existsSync(backup)) {
		log.pipeline.debug({ backup }, "deleting old backup")
		await rm(backup, { force: true })
	}

	try {
		await renameFile(run.target, backup)
	} catch (err) {
		if (run.entry.killIfLocked === undefined) {
			return `could not back up ${run.target}: ${errorMessage(err)}`
		}
		const killed = await run.breakLock()
		yield run.transition(
			"retry-backup",
			`killed ${killed} process(es) locking ${run.entry.killIfLocked}`,
		)
		try {
			await renameFile(run.target, backup)
		} catch (retryErr) {
			return `could not back up ${run.target} after unlocking: ${errorMessage(retryErr)}`
		}
	}

	const restore = async (): Promise<void> => {
		await rm(run.target, { force: true })
		await rename(backup, run.target)
		log.pipeline.warn({ target: run.target }, "restored backup")
	}

	if (candidate !== undefined) {
		try {
			await moveFile(candidate, run.target)
		} catch (err) {
			await restore()
			return `could not move download into place: ${errorMessage(err)}`
		}
	} else {
		const result = await run.downloader.fetch(url, run.target, run.fetchOptions)
		if (!result.success) {
			await restore()
			return result.error
		}
	}

	await run.refreshMetadata(url, known)
	return null
}

async function* postProcess(run: PipelineRun): Steps {
	const { entry } = run
	const backup = backupPath(run.target)
	let extracted = true

	if (isZipArchive(run.target) && entry.unzipTarget !== undefined) {
		const options = {
			flatten: entry.flatten,
			...(entry.archivePassword !== undefined
				? { password: entry.archivePassword }
				: {}),
		}
		let result = await run.ctx.extractor.extract(
			run.target,
			entry.unzipTarget,
			options,
		)
		if (!result.success) {
			yield run.warning(
				`could not extract to ${entry.unzipTarget}: ${result.error ?? "unknown error"}`,
			)
			// Not a relaunch: the configured launch still runs afterwards
			await run.killLockHolders()
			result = await run.ctx.extractor.extract(
				run.target,
				entry.unzipTarget,
				options,
			)
			if (!result.success) {
				extracted = false
				yield run.warning(
					`could not extract to ${entry.unzipTarget} after unlocking: ${result.error ?? "unknown error"}`,
				)
			}
		}
	}

	if (!existsSync(run.target) && existsSync(backup)) {
		await rename(backup, run.target)
		yield run.warning(`target missing after update, restored ${backup}`)
	}

	if (!extracted) return

	if (run.killed) {
		if (entry.relaunch && entry.killIfLocked !== undefined) {
			run.ctx.launcher.launch(entry.killIfLocked, entry.arguments)
		}
	} else if (entry.launch !== undefined) {
		run.ctx.launcher.launch(entry.launch, entry.arguments)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline generator
// ─────────────────────────────────────────────────────────────────────────────

export async function* updateEntry(
	entry: Entry,
	ctx: PipelineContext,
): Steps<EntryOutcome> {
	const run = new PipelineRun(entry, ctx, ctx.downloaderFor(entry))
	log.pipeline.debug({ entry: entry.name, url: entry.url }, "processing entry")

	// start
	const url = await run.downloader.resolve(entry)
	if (url === null) {
		return yield* run.fail(`could not resolve a download url for ${entry.url}`)
	}
	const filename = urlToFilename(url)
	if (filename === null) {
		return yield* run.fail(`url ${url} does not name a file`)
	}
	if (await isDirectory(entry.target)) {
		run.target = join(entry.target, filename)
	}

	yield run.transition("check-existence")

	if (!existsSync(run.target)) {
		yield run.transition("download-fresh", "target missing")
		const result = await run.downloader.fetch(url, run.target, run.fetchOptions)
		if (!result.success) return yield* run.fail(result.error)
		await run.refreshMetadata(url)
		yield run.transition("post-process")
		yield* postProcess(run)
		return yield* run.finish("downloaded")
	}

	if (ctx.force || entry.force) {
		yield run.transition("replace", "forced")
		const error = yield* replaceTarget(run, url, undefined, undefined)
		if (error !== null) return yield* run.fail(error)
		yield run.transition("post-process")
		yield* postProcess(run)
		return yield* run.finish("updated")
	}

	yield run.transition("check-staleness")
	const staleness = await checkStaleness(
		url,
		run.target,
		{ useContentLengthCheck: entry.useContentLengthCheck },
		{ store: ctx.store, probe: probeUrl => run.downloader.probe(probeUrl) },
	)
	if (staleness.kind === "up-to-date") {
		yield run.transition("up-to-date", staleness.reason)
		return yield* run.finish("up-to-date")
	}

	yield run.transition("resolve-via-hash", staleness.reason)
	await mkdir(ctx.tempRoot, { recursive: true })
	const workDir = await mkdtemp(join(ctx.tempRoot, "entry-"))
	try {
		const remote = yield* resolveRemoteHash(run, url, join(workDir, filename))
		if ("error" in remote) return yield* run.fail(remote.error)

		const local = await hashFile(run.target, "md5")
		log.pipeline.debug(
			{ entry: entry.name, remote: remote.digest, local },
			"comparing md5",
		)
		if (hashesMatch(remote.digest, local)) {
			yield run.transition("no-change", "md5 matches")
			await run.refreshMetadata(url, staleness.remote)
			return yield* run.finish("unchanged")
		}

		yield run.transition("replace", "md5 differs")
		const error = yield* replaceTarget(
			run,
			url,
			remote.candidate,
			staleness.remote,
		)
		if (error !== null) return yield* run.fail(error)
	} finally {
		await rm(workDir, { recursive: true, force: true })
	}

	yield run.transition("post-process")
	yield* postProcess(run)
	return yield* run.finish("updated")
}

/**
 * Drive updateEntry to completion, forwarding every event
 */
export async function runPipeline(
	entry: Entry,
	ctx: PipelineContext,
	onEvent?: (event: PipelineEvent) => void,
): Promise<EntryOutcome> {
	const steps = updateEntry(entry, ctx)
	let step = await steps.next()
	while (!step.done) {
		onEvent?.(step.value)
		step = await steps.next()
	}
	return step.value
}
