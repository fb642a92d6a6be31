#!/usr/bin/env node
/**
 * artifact-sync CLI
 * Keeps locally cached files in sync with HTTP and GitHub release sources
 */

import { Command } from "commander"
import {
	type AppConfig,
	loadConfig,
	resolveGitHubToken,
	selectEntries,
} from "../config.js"
import { VERSION } from "../constants.js"
import { defaultConcurrency, runAll } from "../core/batch.js"
import type { BatchReport, PipelineEvent } from "../core/types.js"
import { ConfigError } from "../errors.js"
import { configureLogging, flushLogs, getLogFilePath, log } from "../logger.js"
import { ProgressBoard } from "../progress.js"
import { ui } from "../ui.js"
import {
	type CliOptions,
	parseEntryNames,
	parseThreads,
	resolveConcurrency,
} from "./options.js"

async function exitWithCode(code: number): Promise<void> {
	if (code === 0) return
	try {
		await flushLogs()
	} catch (err) {
		console.error(err instanceof Error ? err.message : String(err))
	}
	process.exitCode = code
}

function describeEvent(event: PipelineEvent): string {
	if (event.type === "warning") return `${event.entry}: ${event.message}`
	const detail = event.detail ? ` (${event.detail})` : ""
	return `${event.entry}: ${event.from} → ${event.to}${detail}`
}

async function run(options: CliOptions): Promise<void> {
	const { quiet, verbose, force } = options
	const showBars = !quiet && process.stdout.isTTY === true

	// Progress bars own the terminal; pino goes to a file meanwhile
	configureLogging({
		toFile: showBars,
		...(verbose ? { level: "debug" } : {}),
	})

	let config: AppConfig
	try {
		config = loadConfig(options.config)
	} catch (err) {
		if (err instanceof ConfigError) {
			ui.error(err.message)
			await exitWithCode(1)
			return
		}
		throw err
	}

	const entries = selectEntries(config.entries, options.entries)
	if (entries.length === 0) {
		ui.warn(
			options.entries.length > 0
				? `No matching entries found for: ${options.entries.join(", ")}`
				: `No entries configured in ${config.path}`,
		)
		return
	}

	const concurrency = resolveConcurrency(
		options,
		config.jobs,
		defaultConcurrency(),
	)
	const token = resolveGitHubToken(options.ghToken, config.githubToken)
	log.cli.debug(
		{ config: config.path, token: token ? "provided" : "not provided" },
		"starting",
	)

	if (!quiet) {
		ui.banner(VERSION, config.path, entries.length, concurrency, force)
	}

	const board = showBars ? new ProgressBoard() : undefined
	let report: BatchReport
	try {
		report = await runAll(entries, {
			concurrency,
			force,
			quiet,
			...(token ? { token } : {}),
			...(board ? { progress: board } : {}),
			...(verbose && !board
				? {
						onEvent: (event: PipelineEvent) =>
							ui.debug(describeEvent(event), true),
					}
				: {}),
		})
	} finally {
		board?.stop()
	}

	if (!quiet) {
		ui.outcomes(report.outcomes)
		ui.finalStatus(report.failed === 0)
		const logFile = getLogFilePath()
		if (logFile && verbose) ui.info(`Log written to ${logFile}`)
	}

	if (report.failed > 0) await exitWithCode(1)
}

// ─────────────────────────────────────────────────────────────────────────────
// CLI Definition
// ─────────────────────────────────────────────────────────────────────────────

const program = new Command()

program
	.name("artifact-sync")
	.version(VERSION)
	.description(
		"Download and update files from HTTP URLs and GitHub releases, replacing them safely",
	)
	.option(
		"-c, --config <path>",
		"Config file (default: ./artifact-sync.yaml, then ~/artifact-sync.yaml)",
	)
	.option("--async", "Process entries in parallel", true)
	.option("--no-async", "Process entries one at a time")
	.option(
		"-t, --threads <n>",
		"Parallel entries (default: CPU count - 1)",
		parseThreads,
	)
	.option(
		"-e, --entries <names>",
		"Only process these entries (comma-separated)",
		parseEntryNames,
		[],
	)
	.option("--force", "Re-download every existing target, skipping checks", false)
	.option("-v, --verbose", "Debug output", false)
	.option(
		"--gh-token <token>",
		"GitHub token (overrides github_token and GITHUB_TOKEN)",
	)
	.option("-q, --quiet", "No spinner, progress bars or summary", false)
	.action(async (options: CliOptions) => {
		await run(options)
	})

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

program.parseAsync().catch(async (err: unknown) => {
	ui.error(err instanceof Error ? err.message : String(err))
	await exitWithCode(1)
})
