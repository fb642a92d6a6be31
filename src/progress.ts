/**
 * Download progress reporting
 *
 * Transfers report into a ProgressSink they are handed; nothing reaches for
 * a global. ProgressBoard renders a cli-progress multi-bar keyed by task name
 * and is shared by every entry and chunk worker of a run.
 */

import cliProgress from "cli-progress"
import chalk from "chalk"

export interface ProgressSink {
	/** Register a task. totalBytes may be unknown until the response arrives. */
	start(task: string, totalBytes?: number): void
	/** Report the bytes written so far for a task */
	update(task: string, current: number, total?: number): void
	complete(task: string, success: boolean): void
}

interface TaskState {
	bar: cliProgress.SingleBar | null
	current: number
	total: number
}

/** Sink that drops everything (quiet mode, library use) */
export const silentProgress: ProgressSink = {
	start: () => {},
	update: () => {},
	complete: () => {},
}

/**
 * Multi-bar board for concurrent downloads.
 *
 * All mutations happen through this object on the event loop, so the
 * name → task map is only ever touched by one update at a time.
 */
export class ProgressBoard implements ProgressSink {
	private readonly multibar: cliProgress.MultiBar
	private readonly tasks = new Map<string, TaskState>()
	private readonly maxVisible: number
	private stopped = false
	private completed = { success: 0, failed: 0 }

	constructor(options: { maxVisible?: number } = {}) {
		this.maxVisible = options.maxVisible ?? 4
		this.multibar = new cliProgress.MultiBar(
			{
				clearOnComplete: true,
				hideCursor: true,
				// 10 Hz keeps the redraws from flickering
				fps: 10,
				emptyOnZero: false,
				stopOnComplete: false,
				format: (options, params, payload: { task?: string }) => {
					const bar = (options.barCompleteString ?? "")
						.substring(0, Math.round(params.progress * 30))
						.padEnd(30, options.barIncompleteString || " ")
					const percentage = Math.round(params.progress * 100)
					const name = payload.task ?? ""
					const maxLen = 40
					const displayName =
						name.length > maxLen
							? name.slice(0, maxLen - 3) + "..."
							: name.padEnd(maxLen)
					const bytes = `${formatBytes(params.value)}/${formatBytes(params.total)}`
					return `${chalk.gray(displayName)} ${bar} ${chalk.yellow(percentage + "%")} ${chalk.cyan(bytes)}`
				},
			},
			cliProgress.Presets.shades_grey,
		)
	}

	start(task: string, totalBytes?: number): void {
		if (this.stopped || this.tasks.has(task)) return
		this.tasks.set(task, { bar: null, current: 0, total: totalBytes ?? 0 })
	}

	update(task: string, current: number, total?: number): void {
		if (this.stopped) return
		let state = this.tasks.get(task)
		if (!state) {
			state = { bar: null, current: 0, total: total ?? 0 }
			this.tasks.set(task, state)
		}
		if (total !== undefined && total > 0) state.total = total
		// Never move a bar backwards
		state.current = Math.max(state.current, current)

		// Lazy bar creation: only once there is something to show
		if (!state.bar && state.current > 0 && state.total > 0) {
			if (this.visibleCount() >= this.maxVisible) return
			state.bar = this.multibar.create(state.total, 0, { task })
		}
		if (state.bar) {
			state.bar.setTotal(state.total)
			state.bar.update(state.current, { task })
		}
	}

	complete(task: string, success: boolean): void {
		const state = this.tasks.get(task)
		if (state?.bar) {
			this.multibar.remove(state.bar)
		}
		this.tasks.delete(task)
		if (success) this.completed.success++
		else this.completed.failed++
	}

	/** Totals of finished tasks, for the run summary */
	summary(): { success: number; failed: number } {
		return { ...this.completed }
	}

	stop(): void {
		if (this.stopped) return
		this.stopped = true
		this.multibar.stop()
	}

	private visibleCount(): number {
		let count = 0
		for (const state of this.tasks.values()) {
			if (state.bar) count++
		}
		return count
	}
}

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
	if (bytes <= 0) return "0 B"
	const k = 1024
	const sizes = ["B", "KB", "MB", "GB", "TB"]
	const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1)
	return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`
}
