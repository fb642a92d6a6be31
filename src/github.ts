/**
 * GitHub release asset resolution
 *
 * Turns a repository reference ("owner/repo" or any github.com URL inside
 * it) plus an asset-name pattern into the download URL of the newest
 * release's first matching asset.
 */

import type { Dispatcher } from "undici"
import { z } from "zod"
import { PROBE_TIMEOUT_MS } from "./constants.js"
import { HttpStatusError, httpRequest } from "./http.js"
import { log } from "./logger.js"

const GITHUB_API = "https://api.github.com"

const RepoSchema = z.object({
	full_name: z.string(),
})

const AssetSchema = z.object({
	name: z.string(),
	browser_download_url: z.string().url(),
})

const ReleaseSchema = z.object({
	tag_name: z.string(),
	html_url: z.string().optional(),
	assets: z.array(AssetSchema).default([]),
})

export type GitHubRelease = z.infer<typeof ReleaseSchema>

export interface GitHubClientOptions {
	/** Bearer token; lifts the anonymous 60 requests/hour limit */
	token?: string
	dispatcher?: Dispatcher
	apiBase?: string
}

/**
 * Extract "owner/repo" from a github.com URL or a bare reference
 */
export function parseRepository(reference: string): string | null {
	const trimmed = reference.trim()
	if (trimmed.includes("github")) {
		const match = /github\.com\/([^/\s]+\/[^/\s?#]+)/.exec(trimmed)
		return match?.[1] ? match[1].replace(/\.git$/, "") : null
	}
	return /^[\w.-]+\/[\w.-]+$/.test(trimmed) ? trimmed : null
}

/**
 * Pick the first asset whose name matches pattern, anchored at the start
 * of the name.
 */
export function findAssetUrl(
	release: GitHubRelease,
	pattern: string,
): string | null {
	let regex: RegExp
	try {
		regex = new RegExp(`^(?:${pattern})`)
	} catch (err) {
		log.github.warn(
			{ pattern, err: err instanceof Error ? err.message : String(err) },
			"invalid asset pattern",
		)
		return null
	}

	const asset = release.assets.find(a => regex.test(a.name))
	if (!asset) {
		log.github.warn(
			{ pattern, release: release.tag_name },
			"no asset matches pattern in release",
		)
		return null
	}
	log.github.debug(
		{ pattern, url: asset.browser_download_url },
		"resolved asset url",
	)
	return asset.browser_download_url
}

export class GitHubReleases {
	private readonly token: string | undefined
	private readonly dispatcher: Dispatcher | undefined
	private readonly apiBase: string

	constructor(options: GitHubClientOptions = {}) {
		this.token = options.token
		this.dispatcher = options.dispatcher
		this.apiBase = options.apiBase ?? GITHUB_API
	}

	/** Normalized "owner/repo" when the repository exists, else null */
	async validatePackage(reference: string): Promise<string | null> {
		const repo = parseRepository(reference)
		if (repo === null) {
			log.github.warn({ reference }, "could not extract owner/repo")
			return null
		}
		try {
			const data = RepoSchema.parse(await this.getJson(`/repos/${repo}`))
			return data.full_name
		} catch (err) {
			log.github.warn(
				{ repo, err: err instanceof Error ? err.message : String(err) },
				"not a valid GitHub repository",
			)
			return null
		}
	}

	/** Newest release (the API lists newest first), or null */
	async latestRelease(repo: string): Promise<GitHubRelease | null> {
		try {
			const releases = z
				.array(ReleaseSchema)
				.parse(await this.getJson(`/repos/${repo}/releases`))
			const latest = releases[0]
			if (!latest) {
				log.github.debug({ repo }, "no releases")
				return null
			}
			return latest
		} catch (err) {
			log.github.warn(
				{
					repo,
					authenticated: this.token !== undefined,
					err: err instanceof Error ? err.message : String(err),
				},
				"GitHub API error",
			)
			return null
		}
	}

	/**
	 * Full resolution: repository → newest release → matching asset URL.
	 * Null when any step finds nothing.
	 */
	async resolveAssetUrl(
		reference: string,
		assetPattern: string,
	): Promise<string | null> {
		const repo = await this.validatePackage(reference)
		if (repo === null) return null
		const release = await this.latestRelease(repo)
		if (release === null) return null
		return findAssetUrl(release, assetPattern)
	}

	private async getJson(path: string): Promise<unknown> {
		const url = `${this.apiBase}${path}`
		const res = await httpRequest(url, "GET", {
			timeoutMs: PROBE_TIMEOUT_MS,
			headers: {
				Accept: "application/vnd.github+json",
				"X-GitHub-Api-Version": "2022-11-28",
				...(this.token ? { Authorization: `Bearer ${this.token}` } : {}),
			},
			...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
		})
		if (!res.ok) {
			await res.body?.cancel()
			throw new HttpStatusError(url, res.status, res.statusText)
		}
		return (await res.json()) as unknown
	}
}
