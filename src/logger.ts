/**
 * Centralized logging with pino
 *
 * Design: Dual-output architecture
 * - Pino handles structured JSON logging for debugging/files
 * - UI module (ui.ts) handles user-facing CLI output and progress bars
 *
 * Log levels:
 * - fatal: System crash
 * - error: Entry failed
 * - warn: Recoverable issue (lock conflict, chunk demotion, corrupt sidecar)
 * - info: Key milestones (default for production)
 * - debug: Pipeline transitions and HTTP probes (--verbose)
 * - trace: Per-chunk progress
 */

import { existsSync, mkdirSync } from "node:fs"
import { dirname, join } from "node:path"
import pino from "pino"

// Determine log level from environment or use sensible default
let level = process.env["LOG_LEVEL"] || (process.env["DEBUG"] ? "debug" : "info")

// Use pino-pretty for development, raw JSON for production/CI
const isDev = process.stdout.isTTY && !process.env["CI"]

export interface ConfigureLoggingOptions {
	/** When true, logs go to a file so they do not tear the progress bars. */
	toFile: boolean
	/** Optional explicit log file path. If omitted, a per-run file is created. */
	logFilePath?: string
	/** Overrides the environment-derived level (e.g. "debug" for --verbose). */
	level?: string
}

let currentMode: "console" | "file" = "console"
let currentLogFilePath: string | null = null

function ensureDirExists(path: string): void {
	const dir = dirname(path)
	if (!existsSync(dir)) {
		mkdirSync(dir, { recursive: true })
	}
}

function defaultLogFilePath(): string {
	const stamp = new Date().toISOString().replace(/[:.]/g, "-")
	return join(process.cwd(), ".log", `artifact-sync-${stamp}-${process.pid}.log`)
}

function createConsoleLogger() {
	return isDev
		? pino({
				level,
				transport: {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "HH:MM:ss",
						ignore: "pid,hostname",
						messageFormat: "{module}: {msg}",
					},
				},
			})
		: pino({
				level,
				base: { pid: undefined, hostname: undefined },
			})
}

function createFileLogger(path: string) {
	ensureDirExists(path)
	// process.exitCode is set right after the summary; sync writes keep the tail.
	const destination = pino.destination({ dest: path, sync: true })
	const fileLevel = process.env["LOG_LEVEL_FILE"] ?? level
	return pino(
		{
			level: fileLevel,
			base: { pid: undefined, hostname: undefined },
		},
		destination,
	)
}

/**
 * Root logger instance
 * In most cases, use createLogger() to get a module-specific child logger
 */
export let logger = createConsoleLogger()

/** Configure logging. With progress bars on screen, redirect pino to a file. */
export function configureLogging(options: ConfigureLoggingOptions): {
	logFilePath: string | null
} {
	if (options.level !== undefined && options.level !== level) {
		level = options.level
		logger.level = level
	}

	if (options.toFile) {
		const nextPath =
			options.logFilePath ?? currentLogFilePath ?? defaultLogFilePath()
		if (currentMode === "file" && currentLogFilePath === nextPath) {
			return { logFilePath: currentLogFilePath }
		}
		currentMode = "file"
		currentLogFilePath = nextPath
		logger = createFileLogger(nextPath)
		return { logFilePath: currentLogFilePath }
	}

	if (currentMode !== "console") {
		currentMode = "console"
		currentLogFilePath = null
		logger = createConsoleLogger()
	}

	return { logFilePath: currentLogFilePath }
}

/** Returns the current log file path if file logging is enabled. */
export function getLogFilePath(): string | null {
	return currentLogFilePath
}

/**
 * Create a child logger for a specific module
 * @example
 * const log = createLogger("pipeline")
 * log.debug({ entry: entry.name }, "checking staleness")
 */
export function createLogger(module: string) {
	return logger.child({ module })
}

/**
 * Flush pending log writes (call before process exit)
 */
export function flushLogs(): Promise<void> {
	return new Promise(resolve => {
		logger.flush(() => resolve())
	})
}

// Pre-created loggers for common modules (getters so they follow reconfiguration)
export const log = {
	get pipeline() {
		return createLogger("pipeline")
	},
	get transfer() {
		return createLogger("transfer")
	},
	get staleness() {
		return createLogger("staleness")
	},
	get metadata() {
		return createLogger("metadata")
	},
	get batch() {
		return createLogger("batch")
	},
	get parallel() {
		return createLogger("parallel")
	},
	get github() {
		return createLogger("github")
	},
	get process() {
		return createLogger("process")
	},
	get archive() {
		return createLogger("archive")
	},
	get config() {
		return createLogger("config")
	},
	get cli() {
		return createLogger("cli")
	},
} as const
