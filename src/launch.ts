/**
 * Fire-and-forget launching of external commands
 */

import { spawn } from "node:child_process"
import { log } from "./logger.js"
import { splitCommandLine } from "./processes.js"

export interface Launcher {
	/** Start command with a whitespace-separated argument string. No result is awaited. */
	launch(command: string, args?: string): void
}

/**
 * Spawns the command detached from this process, so it keeps running after
 * artifact-sync exits.
 */
export const detachedLauncher: Launcher = {
	launch(command: string, args?: string): void {
		const argv = args ? splitCommandLine(args) : []
		log.process.info({ command, args: argv }, "launching")
		const child = spawn(command, argv, {
			detached: true,
			stdio: "ignore",
		})
		child.on("error", err => {
			log.process.error({ command, err: err.message }, "launch failed")
		})
		child.unref()
	},
}
