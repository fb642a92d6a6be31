/**
 * Core module exports
 *
 * Update decision, pipeline and batch scheduling. The pipeline is an async
 * generator of PipelineEvents that callers can render however they like.
 */

// Pipeline
export { updateEntry, runPipeline, backupPath } from "./pipeline.js"
export type { PipelineContext } from "./pipeline.js"

// Batch scheduler
export { runAll, createPipelineContext, defaultConcurrency } from "./batch.js"
export type { BatchOptions } from "./batch.js"

// Staleness oracle
export { checkStaleness, compareDescriptors } from "./staleness.js"
export type {
	Staleness,
	StalenessDeps,
	StalenessOptions,
	DescriptorComparison,
} from "./staleness.js"

// Sources
export {
	createDownloader,
	HttpDownloader,
	GitHubDownloader,
	urlToFilename,
} from "./downloader.js"
export type { Downloader, DownloaderDeps } from "./downloader.js"

// Shared types
export type {
	PipelineState,
	PipelineEvent,
	PipelineTransitionEvent,
	PipelineWarningEvent,
	OutcomeStatus,
	EntryOutcome,
	BatchReport,
} from "./types.js"
