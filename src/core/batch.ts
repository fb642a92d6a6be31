/**
 * Batch scheduler: runs the update pipeline for every entry on a bounded pool
 *
 * Entries are independent. Whatever happens inside one pipeline (thrown
 * errors included) is recorded as that entry's outcome and never reaches the
 * others.
 */

import { availableParallelism } from "node:os"
import type { Dispatcher } from "undici"
import { TEMP_ROOT } from "../constants.js"
import { TransferEngine } from "../download.js"
import { zipExtractor } from "../extract.js"
import { detachedLauncher } from "../launch.js"
import { log } from "../logger.js"
import { sidecarStore } from "../metadata.js"
import { runParallel } from "../parallel.js"
import { SystemProcessManager } from "../processes.js"
import { silentProgress, type ProgressSink } from "../progress.js"
import type { Entry } from "../types.js"
import { createDownloader } from "./downloader.js"
import { type PipelineContext, runPipeline } from "./pipeline.js"
import type { BatchReport, EntryOutcome, PipelineEvent } from "./types.js"

export interface BatchOptions {
	/** Pool size (default: available parallelism - 1, at least 1) */
	concurrency?: number
	/** Replace every existing target without checking */
	force?: boolean
	/** GitHub API token for release resolution */
	token?: string
	/** No spinner */
	quiet?: boolean
	progress?: ProgressSink
	dispatcher?: Dispatcher
	tempRoot?: string
	onEvent?: (event: PipelineEvent) => void
	/** Collaborator overrides (process manager, launcher, ...) */
	context?: Partial<PipelineContext>
}

export function defaultConcurrency(): number {
	return Math.max(1, availableParallelism() - 1)
}

export function createPipelineContext(options: BatchOptions): PipelineContext {
	const progress = options.progress ?? silentProgress
	const tempRoot = options.tempRoot ?? TEMP_ROOT
	const engine = new TransferEngine({
		progress,
		tempRoot,
		...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
	})
	const downloaderDeps = {
		engine,
		...(options.dispatcher ? { dispatcher: options.dispatcher } : {}),
		...(options.token ? { token: options.token } : {}),
	}

	return {
		downloaderFor: entry => createDownloader(entry, downloaderDeps),
		store: sidecarStore,
		processes: new SystemProcessManager(),
		launcher: detachedLauncher,
		extractor: zipExtractor,
		force: options.force ?? false,
		tempRoot,
		...options.context,
	}
}

function failedOutcome(entry: Entry, error: string): EntryOutcome {
	return {
		entry: entry.name,
		target: entry.target,
		status: "failed",
		killed: false,
		warnings: [],
		error,
		durationMs: 0,
	}
}

export async function runAll(
	entries: Entry[],
	options: BatchOptions = {},
): Promise<BatchReport> {
	const started = Date.now()
	const context = createPipelineContext(options)
	const concurrency = options.concurrency ?? defaultConcurrency()

	log.batch.info(
		{ entries: entries.length, concurrency, force: context.force },
		"batch started",
	)

	const { settled } = await runParallel(
		entries,
		async entry => {
			try {
				return await runPipeline(entry, context, options.onEvent)
			} catch (err) {
				const cause = err instanceof Error ? err.message : String(err)
				log.batch.error(
					{ entry: entry.name, url: entry.url, target: entry.target, err: cause },
					"entry failed",
				)
				return failedOutcome(entry, cause)
			}
		},
		{
			concurrency,
			label: "Updating",
			quiet: options.quiet ?? false,
			noSpinner: options.progress !== undefined && options.progress !== silentProgress,
		},
	)

	const outcomes = settled.map(result =>
		result.ok ? result.value : failedOutcome(result.item, result.error),
	)
	const failedCount = outcomes.filter(o => o.status === "failed").length
	const report: BatchReport = {
		outcomes,
		succeeded: outcomes.length - failedCount,
		failed: failedCount,
		durationMs: Date.now() - started,
	}

	log.batch.info(
		{ succeeded: report.succeeded, failed: report.failed, ms: report.durationMs },
		"batch finished",
	)
	return report
}
