/**
 * Bounded-concurrency task runner with an optional ora spinner
 */

import pLimit from "p-limit"
import ora, { type Ora } from "ora"
import { log } from "./logger.js"

export type Settled<T, R> =
	| { ok: true; item: T; value: R }
	| { ok: false; item: T; error: string }

export interface ParallelResult<T, R> {
	/** One result per item, in input order */
	settled: Settled<T, R>[]
	succeeded: number
	failed: number
}

export interface ParallelOptions {
	concurrency: number
	label: string
	quiet: boolean
	/** Skip the spinner (progress bars own the terminal) */
	noSpinner?: boolean
}

// Spinner currently owning the terminal line, if any
let activeSpinner: Ora | null = null
let spinnerText = ""

// Serializes log writes so spinner stop/start pairs never interleave
let logLock = Promise.resolve()

/**
 * Print a line without tearing an active spinner: stop it, print, restart.
 */
export function spinnerSafeLog(message: string): void {
	log.parallel.debug(message)

	if (activeSpinner) {
		logLock = logLock.then(
			() =>
				new Promise<void>(resolve => {
					if (activeSpinner) {
						activeSpinner.stop()
						console.log(message)
						activeSpinner.start(spinnerText)
					} else {
						console.log(message)
					}
					setImmediate(resolve)
				}),
		)
	} else {
		console.log(message)
	}
}

/**
 * Run fn over items with at most `concurrency` in flight. A rejected task
 * lands in `failed` and never stops the others.
 */
export async function runParallel<T, R>(
	items: T[],
	fn: (item: T, index: number) => Promise<R>,
	options: ParallelOptions,
): Promise<ParallelResult<T, R>> {
	const { label, quiet, noSpinner } = options
	const concurrency = Math.max(1, Math.floor(options.concurrency))
	const limit = pLimit(concurrency)

	const results: (Settled<T, R> | undefined)[] = []
	let completed = 0
	const total = items.length

	let spinner: Ora | null = null
	if (!quiet && !noSpinner && total > 0) {
		spinnerText = `${label}: 0/${total}`
		spinner = ora({ text: spinnerText }).start()
		activeSpinner = spinner
	}

	log.parallel.debug({ label, total, concurrency }, "running tasks")

	await Promise.all(
		items.map((item, index) =>
			limit(async () => {
				try {
					results[index] = { ok: true, item, value: await fn(item, index) }
				} catch (err) {
					results[index] = {
						ok: false,
						item,
						error: err instanceof Error ? err.message : String(err),
					}
				} finally {
					completed++
					if (spinner) {
						spinnerText = `${label}: ${completed}/${total}`
						spinner.text = spinnerText
					}
				}
			}),
		),
	)

	await logLock
	activeSpinner = null

	const settled = items.map(
		(item, index): Settled<T, R> =>
			results[index] ?? { ok: false, item, error: "task did not run" },
	)
	const failed = settled.filter(result => !result.ok).length
	const succeeded = total - failed

	if (spinner) {
		if (failed === 0) {
			spinner.succeed(`${label}: ${total} completed`)
		} else {
			spinner.warn(`${label}: ${succeeded} completed, ${failed} failed`)
		}
	}

	return { settled, succeeded, failed }
}
