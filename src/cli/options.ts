/**
 * Command-line argument parsers
 */

import { InvalidArgumentError } from "commander"

export interface CliOptions {
	config?: string
	async: boolean
	threads?: number
	entries: string[]
	force: boolean
	verbose: boolean
	ghToken?: string
	quiet: boolean
}

export function parseThreads(value: string): number {
	const threads = Number(value)
	if (!Number.isInteger(threads) || threads < 1) {
		throw new InvalidArgumentError("must be a positive integer")
	}
	return threads
}

/** Comma-separated entry names; blanks and duplicates dropped */
export function parseEntryNames(value: string): string[] {
	const names = value
		.split(",")
		.map(name => name.trim())
		.filter(name => name.length > 0)
	return [...new Set(names)]
}

/**
 * Pool size: sequential without --async, else --threads, then the config
 * file's jobs, then the default.
 */
export function resolveConcurrency(
	options: Pick<CliOptions, "async" | "threads">,
	configJobs: number | undefined,
	fallback: number,
): number {
	if (!options.async) return 1
	return options.threads ?? configJobs ?? fallback
}
