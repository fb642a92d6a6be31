/**
 * Configuration management with Zod validation
 *
 * The YAML file is parsed and every entry validated before the batch starts;
 * any problem raises ConfigError.
 */

import { existsSync, readFileSync, statSync } from "node:fs"
import { homedir } from "node:os"
import { join, resolve } from "node:path"
import yaml from "js-yaml"
import { z } from "zod"
import { CONFIG_FILENAME } from "./constants.js"
import { ConfigError } from "./errors.js"
import { log } from "./logger.js"
import type { Entry } from "./types.js"
import {
	resolveChained,
	resolveVariables,
	type Variables,
} from "./variables.js"

function isHttpUrl(value: string): boolean {
	try {
		const url = new URL(value)
		return /^https?:$/.test(url.protocol) && url.host.length > 0
	} catch {
		return false
	}
}

const httpUrl = z.string().refine(isHttpUrl, {
	message: "must be an absolute http(s) URL",
})

const optionalString = z
	.string()
	.nullish()
	.transform(value => value ?? undefined)

const EntrySchema = z.object({
	url: httpUrl,
	target: z.string().min(1),
	md5: httpUrl.nullish().transform(value => value ?? undefined),
	git_asset: optionalString,
	unzip_target: optionalString,
	archive_password: optionalString,
	flatten: z.boolean().nullish().transform(value => value ?? false),
	// `false` is accepted as "not set"
	kill_if_locked: z
		.union([z.string(), z.literal(false)])
		.nullish()
		.transform(value => (typeof value === "string" ? value : undefined)),
	relaunch: z.boolean().nullish().transform(value => value ?? false),
	launch: optionalString,
	arguments: optionalString,
	chunked_download: z
		.boolean()
		.nullish()
		.transform(value => value ?? undefined),
	use_content_length_check: z
		.boolean()
		.nullish()
		.transform(value => value ?? true),
	force: z.boolean().nullish().transform(value => value ?? false),
	variables: z
		.record(z.string())
		.nullish()
		.transform(value => value ?? {}),
})

type RawEntry = z.infer<typeof EntrySchema>

const ConfigFileSchema = z.object({
	variables: z
		.record(z.string())
		.nullish()
		.transform(value => value ?? {}),
	github_token: optionalString,
	jobs: z.number().int().min(1).max(64).nullish(),
	entries: z
		.record(z.unknown())
		.nullish()
		.transform(value => value ?? {}),
})

export interface AppConfig {
	/** File the configuration was read from */
	path: string
	entries: Entry[]
	githubToken?: string
	/** Default concurrency when the command line gives none */
	jobs?: number
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(issue =>
			issue.path.length > 0
				? `${issue.path.join(".")}: ${issue.message}`
				: issue.message,
		)
		.join("; ")
}

/**
 * Candidate config locations: working directory first, then home directory
 */
export function defaultConfigPaths(): string[] {
	return [join(process.cwd(), CONFIG_FILENAME), join(homedir(), CONFIG_FILENAME)]
}

export function findConfigPath(explicit?: string): string {
	if (explicit !== undefined) {
		const path = resolve(explicit)
		if (!existsSync(path)) {
			throw new ConfigError("config file not found", path)
		}
		return path
	}
	const found = defaultConfigPaths().find(path => existsSync(path))
	if (found === undefined) {
		throw new ConfigError(
			`no ${CONFIG_FILENAME} in ${defaultConfigPaths().join(" or ")}`,
		)
	}
	return found
}

function isDirectory(path: string): boolean {
	try {
		return statSync(path).isDirectory()
	} catch {
		return false
	}
}

/**
 * Turn one validated file entry into an Entry: entry variables are layered
 * over the global ones and substituted into the path fields.
 */
function buildEntry(
	name: string,
	raw: RawEntry,
	globals: Variables,
	env: NodeJS.ProcessEnv,
): Entry {
	const context = `entry '${name}'`
	const variables = {
		...globals,
		...resolveVariables(raw.variables, globals, context, env),
	}
	const substitute = (value: string | undefined): string | undefined =>
		value === undefined
			? undefined
			: resolveChained(value, variables, context, env)

	const target = resolveChained(raw.target, variables, context, env)
	const unzipTarget = substitute(raw.unzip_target)
	if (unzipTarget !== undefined && !isDirectory(unzipTarget)) {
		throw new ConfigError(
			`unzip_target '${unzipTarget}' must be an existing directory`,
			`entries.${name}`,
		)
	}
	const killIfLocked = substitute(raw.kill_if_locked)
	const launch = substitute(raw.launch)
	const args = substitute(raw.arguments)

	return {
		name,
		url: raw.url,
		target,
		flatten: raw.flatten,
		relaunch: raw.relaunch,
		useContentLengthCheck: raw.use_content_length_check,
		force: raw.force,
		...(raw.md5 !== undefined ? { md5: raw.md5 } : {}),
		...(raw.git_asset !== undefined ? { gitAsset: raw.git_asset } : {}),
		...(unzipTarget !== undefined ? { unzipTarget } : {}),
		...(raw.archive_password !== undefined
			? { archivePassword: raw.archive_password }
			: {}),
		...(killIfLocked !== undefined ? { killIfLocked } : {}),
		...(launch !== undefined ? { launch } : {}),
		...(args !== undefined ? { arguments: args } : {}),
		...(raw.chunked_download !== undefined
			? { chunkedDownload: raw.chunked_download }
			: {}),
	}
}

/**
 * Parse and validate YAML configuration text
 */
export function parseConfig(
	text: string,
	path = "<inline>",
	env: NodeJS.ProcessEnv = process.env,
): AppConfig {
	let data: unknown
	try {
		data = yaml.load(text)
	} catch (err) {
		throw new ConfigError(
			`invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
			path,
		)
	}

	const file = ConfigFileSchema.safeParse(data ?? {})
	if (!file.success) {
		throw new ConfigError(formatIssues(file.error), path)
	}

	let globals: Variables
	try {
		globals = resolveVariables(file.data.variables, {}, "variables", env)
	} catch (err) {
		if (err instanceof ConfigError) throw new ConfigError(err.message, path)
		throw err
	}

	const entries: Entry[] = []
	for (const [name, value] of Object.entries(file.data.entries)) {
		const parsed = EntrySchema.safeParse(value ?? {})
		if (!parsed.success) {
			throw new ConfigError(
				`entry '${name}': ${formatIssues(parsed.error)}`,
				path,
			)
		}
		try {
			entries.push(buildEntry(name, parsed.data, globals, env))
		} catch (err) {
			if (err instanceof ConfigError) throw new ConfigError(err.message, path)
			throw err
		}
	}

	log.config.debug({ path, entries: entries.length }, "configuration loaded")
	return {
		path,
		entries,
		...(file.data.github_token !== undefined
			? { githubToken: file.data.github_token }
			: {}),
		...(file.data.jobs != null ? { jobs: file.data.jobs } : {}),
	}
}

/**
 * Load configuration from artifact-sync.yaml.
 * Checks the explicit path, else the current directory, then the home directory.
 */
export function loadConfig(explicitPath?: string): AppConfig {
	const path = findConfigPath(explicitPath)
	let text: string
	try {
		text = readFileSync(path, "utf-8")
	} catch (err) {
		throw new ConfigError(
			`cannot read: ${err instanceof Error ? err.message : String(err)}`,
			path,
		)
	}
	return parseConfig(text, path)
}

/**
 * Keep only the named entries. Unknown names are logged; an empty filter
 * keeps everything.
 */
export function selectEntries(entries: Entry[], names: string[]): Entry[] {
	if (names.length === 0) return entries
	const wanted = new Set(names)
	const known = new Set(entries.map(entry => entry.name))
	for (const name of wanted) {
		if (!known.has(name)) log.config.warn({ name }, "no entry with this name")
	}
	return entries.filter(entry => wanted.has(entry.name))
}

/** --gh-token, then github_token, then GITHUB_TOKEN */
export function resolveGitHubToken(
	cliToken: string | undefined,
	configToken: string | undefined,
	env: NodeJS.ProcessEnv = process.env,
): string | undefined {
	return cliToken || configToken || env["GITHUB_TOKEN"] || undefined
}
