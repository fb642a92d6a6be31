/**
 * Source capability: where an entry's bytes come from
 *
 * Two implementations share the transfer engine and differ only in how
 * they resolve an entry to a concrete file URL. createDownloader picks one
 * from the entry's shape.
 */

import { basename, extname } from "node:path"
import type { Dispatcher } from "undici"
import type { FetchOptions, TransferEngine, TransferResult } from "../download.js"
import { GitHubReleases } from "../github.js"
import { headRemote, readText } from "../http.js"
import { log } from "../logger.js"
import type { Entry, RemoteDescriptor } from "../types.js"

export interface Downloader {
	readonly kind: "http" | "github"
	/** Concrete file URL for the entry, or null when it cannot be resolved */
	resolve(entry: Entry): Promise<string | null>
	fetch(
		url: string,
		destination: string,
		options?: FetchOptions,
	): Promise<TransferResult>
	/** Fresh identity headers, or null when the HEAD fails */
	probe(url: string): Promise<RemoteDescriptor | null>
	/** Small text resource (hash references) */
	readText(url: string): Promise<string>
}

export interface DownloaderDeps {
	engine: TransferEngine
	dispatcher?: Dispatcher
	/** GitHub API token */
	token?: string
}

/**
 * Filename a URL points at, or null when its last path segment has no
 * extension (not a file). The segment is used as it appears in the URL:
 * percent escapes stay encoded so the name can never contain a separator.
 */
export function urlToFilename(url: string): string | null {
	let pathname: string
	try {
		pathname = new URL(url).pathname
	} catch {
		return null
	}
	const base = basename(pathname)
	if (extname(base) === "") {
		log.pipeline.warn({ url }, "cannot get filename from url")
		return null
	}
	return base
}

export class HttpDownloader implements Downloader {
	readonly kind: "http" | "github" = "http"

	constructor(protected readonly deps: DownloaderDeps) {}

	async resolve(entry: Entry): Promise<string | null> {
		return entry.url
	}

	fetch(
		url: string,
		destination: string,
		options?: FetchOptions,
	): Promise<TransferResult> {
		return this.deps.engine.fetch(url, destination, options)
	}

	async probe(url: string): Promise<RemoteDescriptor | null> {
		const probe = await headRemote(url, this.httpOptions())
		return probe?.descriptor ?? null
	}

	readText(url: string): Promise<string> {
		return readText(url, this.httpOptions())
	}

	protected httpOptions(): { dispatcher?: Dispatcher } {
		return this.deps.dispatcher ? { dispatcher: this.deps.dispatcher } : {}
	}
}

/**
 * Entries whose url is a repository reference and whose gitAsset names the
 * release asset to fetch.
 */
export class GitHubDownloader extends HttpDownloader {
	override readonly kind: "http" | "github" = "github"
	private readonly releases: GitHubReleases

	constructor(deps: DownloaderDeps) {
		super(deps)
		this.releases = new GitHubReleases({
			...(deps.token ? { token: deps.token } : {}),
			...(deps.dispatcher ? { dispatcher: deps.dispatcher } : {}),
		})
	}

	override async resolve(entry: Entry): Promise<string | null> {
		if (entry.gitAsset === undefined) return entry.url
		log.github.debug(
			{ entry: entry.name, asset: entry.gitAsset },
			"resolving release asset",
		)
		return this.releases.resolveAssetUrl(entry.url, entry.gitAsset)
	}
}

export function createDownloader(
	entry: Entry,
	deps: DownloaderDeps,
): Downloader {
	return entry.gitAsset !== undefined
		? new GitHubDownloader(deps)
		: new HttpDownloader(deps)
}
