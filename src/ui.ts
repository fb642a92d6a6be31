/**
 * Terminal output helpers with consistent styling
 *
 * Spinner-aware: when an ora spinner is active, all output goes through
 * spinnerSafeLog() to avoid conflicts (flickering, line overwrites).
 */

import chalk from "chalk"
import type { EntryOutcome, OutcomeStatus } from "./core/types.js"
import { spinnerSafeLog } from "./parallel.js"

const STATUS_LABELS: Record<OutcomeStatus, string> = {
	downloaded: "downloaded",
	updated: "updated",
	"up-to-date": "up to date",
	unchanged: "unchanged (md5)",
	failed: "failed",
}

export const ui = {
	/** Section header with decorative border */
	header(text: string): void {
		spinnerSafeLog(chalk.cyan.bold(`\n═══ ${text} ═══\n`))
	},

	/** Success message with checkmark */
	success(text: string): void {
		spinnerSafeLog(chalk.green("✓") + " " + text)
	},

	/** Error message with X mark */
	error(text: string): void {
		spinnerSafeLog(chalk.red("✗") + " " + text)
	},

	warn(text: string): void {
		spinnerSafeLog(chalk.yellow("⚠") + " " + text)
	},

	info(text: string): void {
		spinnerSafeLog(chalk.blue("ℹ") + " " + text)
	},

	/** Debug message (only shown if verbose) */
	debug(text: string, verbose: boolean): void {
		if (verbose) {
			spinnerSafeLog(chalk.dim("  → " + text))
		}
	},

	/** Banner for startup */
	banner(
		version: string,
		configPath: string,
		entries: number,
		jobs: number,
		force: boolean,
	): void {
		console.log(chalk.bold("artifact-sync") + ` v${version}`)
		console.log(`Config: ${chalk.cyan(configPath)}`)
		console.log(
			`Entries: ${chalk.cyan(String(entries))}, ${chalk.cyan(String(jobs))} at a time`,
		)
		if (force) {
			console.log(chalk.yellow("Force mode: existing targets are replaced"))
		}
		console.log()
	},

	/** Format a list of results for summary */
	summarySection(
		title: string,
		items: string[],
		color: "green" | "red" | "gray",
	): void {
		if (items.length === 0) return
		const colorFn =
			color === "green" ? chalk.green : color === "red" ? chalk.red : chalk.gray
		const symbol = color === "red" ? "✗" : color === "green" ? "✓" : "·"
		console.log(colorFn(`${title} (${items.length}):`))
		for (const item of items) {
			console.log(`  ${symbol} ${item}`)
		}
	},

	/** Per-entry results grouped by status */
	outcomes(outcomes: EntryOutcome[]): void {
		const describe = (o: EntryOutcome): string =>
			`${o.entry} → ${o.target}${o.killed ? chalk.yellow(" (lock broken)") : ""}`

		const changed = outcomes.filter(
			o => o.status === "downloaded" || o.status === "updated",
		)
		const current = outcomes.filter(
			o => o.status === "up-to-date" || o.status === "unchanged",
		)
		const failed = outcomes.filter(o => o.status === "failed")

		ui.summarySection(
			"Updated",
			changed.map(o => `${describe(o)} [${STATUS_LABELS[o.status]}]`),
			"green",
		)
		ui.summarySection(
			"Current",
			current.map(o => `${o.entry} [${STATUS_LABELS[o.status]}]`),
			"gray",
		)
		ui.summarySection(
			"Failed",
			failed.map(o => `${describe(o)}${o.error ? ` - ${o.error}` : ""}`),
			"red",
		)
		for (const o of outcomes) {
			for (const warning of o.warnings) {
				console.log(chalk.yellow(`  ⚠ ${o.entry}: ${warning}`))
			}
		}
	},

	/** Final status line */
	finalStatus(allSuccess: boolean): void {
		console.log()
		if (allSuccess) {
			console.log(chalk.green.bold("✓ All entries processed successfully!"))
		} else {
			console.log(
				chalk.yellow.bold("⚠ Some entries failed. See above for details."),
			)
		}
		console.log()
	},
}
