/**
 * Process discovery and termination, used to break file locks
 */

import { execFile } from "node:child_process"
import { readFile, readdir, readlink } from "node:fs/promises"
import { basename, resolve } from "node:path"
import { promisify } from "node:util"
import { z } from "zod"
import { log } from "./logger.js"

const execFileAsync = promisify(execFile)

export interface ProcessHandle {
	pid: number
	name: string
	exePath?: string
	cmdline: string[]
}

/** All given criteria must match */
export interface ProcessQuery {
	/** Executable name, case-insensitive */
	name?: string
	/** Full executable path */
	exePath?: string
	/** Exact argument (path separators and case normalized) */
	cmdline?: string
}

export interface ProcessManager {
	findProcesses(query: ProcessQuery): Promise<ProcessHandle[]>
	kill(handle: ProcessHandle): Promise<void>
}

function normalizePath(path: string): string {
	const resolved = resolve(path)
	return process.platform === "win32" ? resolved.toLowerCase() : resolved
}

function normalizeArg(arg: string): string {
	return arg.toLowerCase().replace(/\\/g, "/").replace(/^\/+|\/+$/g, "")
}

export function matchesQuery(proc: ProcessHandle, query: ProcessQuery): boolean {
	if (
		query.name === undefined &&
		query.exePath === undefined &&
		query.cmdline === undefined
	) {
		return false
	}
	if (
		query.name !== undefined &&
		proc.name.toLowerCase() !== query.name.toLowerCase()
	) {
		return false
	}
	if (query.exePath !== undefined) {
		if (proc.exePath === undefined) return false
		if (normalizePath(proc.exePath) !== normalizePath(query.exePath)) return false
	}
	if (query.cmdline !== undefined) {
		const wanted = normalizeArg(query.cmdline)
		if (!proc.cmdline.some(arg => normalizeArg(arg) === wanted)) return false
	}
	return true
}

async function waitForProcessExit(pid: number, timeoutMs = 5000): Promise<void> {
	const start = Date.now()
	while (Date.now() - start < timeoutMs) {
		try {
			process.kill(pid, 0)
			await new Promise(resolve => setTimeout(resolve, 100))
		} catch (error) {
			if ((error as NodeJS.ErrnoException).code === "ESRCH") {
				return
			}
			throw error
		}
	}
	log.process.warn({ pid, timeoutMs }, "process still running after kill")
}

// ─────────────────────────────────────────────────────────────────────────────
// Platform listings
// ─────────────────────────────────────────────────────────────────────────────

async function listLinuxProcesses(): Promise<ProcessHandle[]> {
	const entries = await readdir("/proc")
	const handles: ProcessHandle[] = []

	for (const entry of entries) {
		if (!/^\d+$/.test(entry)) continue
		const pid = Number(entry)
		try {
			const [comm, cmdlineRaw] = await Promise.all([
				readFile(`/proc/${entry}/comm`, "utf-8"),
				readFile(`/proc/${entry}/cmdline`, "utf-8"),
			])
			// exe is unreadable for other users' processes
			const exePath = await readlink(`/proc/${entry}/exe`).catch(() => undefined)
			handles.push({
				pid,
				name: exePath ? basename(exePath) : comm.trim(),
				...(exePath ? { exePath } : {}),
				cmdline: cmdlineRaw.split("\0").filter(arg => arg.length > 0),
			})
		} catch {
			// Process exited while listing
		}
	}
	return handles
}

const WindowsProcessSchema = z.object({
	ProcessId: z.number(),
	Name: z.string().nullish(),
	ExecutablePath: z.string().nullish(),
	CommandLine: z.string().nullish(),
})

async function listWindowsProcesses(): Promise<ProcessHandle[]> {
	const { stdout } = await execFileAsync(
		"powershell.exe",
		[
			"-NoProfile",
			"-NonInteractive",
			"-Command",
			"Get-CimInstance Win32_Process | Select-Object ProcessId,Name,ExecutablePath,CommandLine | ConvertTo-Json -Compress",
		],
		{ maxBuffer: 64 * 1024 * 1024, windowsHide: true },
	)
	const raw = JSON.parse(stdout) as unknown
	const parsed = z
		.union([WindowsProcessSchema, z.array(WindowsProcessSchema)])
		.parse(raw)
	const rows = Array.isArray(parsed) ? parsed : [parsed]

	return rows.map(row => ({
		pid: row.ProcessId,
		name: row.Name ?? "",
		...(row.ExecutablePath ? { exePath: row.ExecutablePath } : {}),
		cmdline: splitCommandLine(row.CommandLine ?? ""),
	}))
}

/** Split a Windows command line on whitespace, honoring double quotes */
export function splitCommandLine(commandLine: string): string[] {
	const tokens = commandLine.match(/"[^"]*"|\S+/g) ?? []
	return tokens.map(token => token.replace(/^"|"$/g, ""))
}

async function listPosixProcesses(): Promise<ProcessHandle[]> {
	const { stdout } = await execFileAsync("ps", ["-axo", "pid=,comm="], {
		maxBuffer: 16 * 1024 * 1024,
	})
	const handles: ProcessHandle[] = []
	for (const line of stdout.split("\n")) {
		const match = /^\s*(\d+)\s+(.+)$/.exec(line)
		if (!match?.[1] || !match[2]) continue
		const command = match[2].trim()
		handles.push({
			pid: Number(match[1]),
			name: basename(command),
			...(command.startsWith("/") ? { exePath: command } : {}),
			cmdline: [command],
		})
	}
	return handles
}

/**
 * ProcessManager backed by the running OS: /proc on Linux, CIM on Windows,
 * `ps` elsewhere.
 */
export class SystemProcessManager implements ProcessManager {
	async findProcesses(query: ProcessQuery): Promise<ProcessHandle[]> {
		const all =
			process.platform === "linux"
				? await listLinuxProcesses()
				: process.platform === "win32"
					? await listWindowsProcesses()
					: await listPosixProcesses()
		return all.filter(proc => proc.pid !== process.pid && matchesQuery(proc, query))
	}

	async kill(handle: ProcessHandle): Promise<void> {
		log.process.warn({ pid: handle.pid, name: handle.name }, "killing process")
		try {
			process.kill(handle.pid, "SIGKILL")
		} catch (error) {
			if ((error as NodeJS.ErrnoException).code === "ESRCH") return
			throw error
		}
		await waitForProcessExit(handle.pid)
	}
}

/**
 * Kill every process matching the query. Returns how many were killed.
 */
export async function killMatching(
	manager: ProcessManager,
	query: ProcessQuery,
): Promise<number> {
	const running = await manager.findProcesses(query)
	for (const proc of running) {
		await manager.kill(proc)
	}
	return running.length
}
