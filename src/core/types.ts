/**
 * Core types for the update pipeline and the batch scheduler
 *
 * The pipeline is an async generator: every state change is yielded as a
 * PipelineEvent, and the generator's return value is the entry's outcome.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline states
// ─────────────────────────────────────────────────────────────────────────────

export type PipelineState =
	| "start"
	| "check-existence"
	| "download-fresh"
	| "check-staleness"
	| "up-to-date"
	| "resolve-via-hash"
	| "no-change"
	| "replace"
	| "retry-backup"
	| "post-process"
	| "end"
	| "failed"

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline events
// ─────────────────────────────────────────────────────────────────────────────

export type PipelineEvent = PipelineTransitionEvent | PipelineWarningEvent

/** Emitted on every state change */
export interface PipelineTransitionEvent {
	type: "transition"
	entry: string
	from: PipelineState
	to: PipelineState
	/** Why the transition happened (staleness reason, error message, ...) */
	detail?: string
}

/** Recoverable problem that did not change the state */
export interface PipelineWarningEvent {
	type: "warning"
	entry: string
	message: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Outcomes
// ─────────────────────────────────────────────────────────────────────────────

/**
 * - downloaded: target was absent and has been fetched
 * - updated: target was replaced with a newer artifact
 * - up-to-date: identity headers matched, nothing was fetched
 * - unchanged: content hash matched, target left as is
 * - failed: the entry did not complete
 */
export type OutcomeStatus =
	| "downloaded"
	| "updated"
	| "up-to-date"
	| "unchanged"
	| "failed"

export interface EntryOutcome {
	entry: string
	/** Final target path (URL filename appended for directory targets) */
	target: string
	status: OutcomeStatus
	/** A locking process was killed during the run */
	killed: boolean
	warnings: string[]
	error?: string
	durationMs: number
}

export interface BatchReport {
	outcomes: EntryOutcome[]
	succeeded: number
	failed: number
	durationMs: number
}
