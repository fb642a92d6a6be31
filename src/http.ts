/**
 * Shared HTTP plumbing on undici
 *
 * Every request goes through a dispatcher: HTTP_AGENT in production, or
 * whatever the caller passes (tests install a MockAgent).
 */

import { Agent, fetch as undiciFetch, type Dispatcher } from "undici"
import { BODY_TIMEOUT_MS, PROBE_TIMEOUT_MS, USER_AGENT } from "./constants.js"
import { log } from "./logger.js"
import type { RemoteDescriptor } from "./types.js"

export const HTTP_AGENT = new Agent({
	connect: { timeout: PROBE_TIMEOUT_MS },
	headersTimeout: 60_000,
	bodyTimeout: BODY_TIMEOUT_MS,
})

export interface HttpOptions {
	/** Defaults to HTTP_AGENT */
	dispatcher?: Dispatcher
	/** Extra request headers (Range, Authorization, ...) */
	headers?: Record<string, string>
	/** Abort after this many milliseconds (HEAD probes and text reads) */
	timeoutMs?: number
}

/** Result of one HEAD probe: identity headers plus byte-range support */
export interface RemoteProbe {
	descriptor: RemoteDescriptor
	acceptRanges: boolean
}

export class HttpStatusError extends Error {
	constructor(
		readonly url: string,
		readonly status: number,
		statusText: string,
	) {
		super(`HTTP ${status}${statusText ? `: ${statusText}` : ""} for ${url}`)
		this.name = "HttpStatusError"
	}
}

/**
 * Thin wrapper over undici fetch that applies the user agent, the dispatcher
 * and an optional timeout.
 */
export function httpRequest(
	url: string,
	method: "GET" | "HEAD",
	options: HttpOptions = {},
) {
	return undiciFetch(url, {
		method,
		headers: { "User-Agent": USER_AGENT, ...options.headers },
		dispatcher: options.dispatcher ?? HTTP_AGENT,
		redirect: "follow",
		...(options.timeoutMs !== undefined
			? { signal: AbortSignal.timeout(options.timeoutMs) }
			: {}),
	})
}

export function parseContentLength(value: string | null): number | undefined {
	if (value === null) return undefined
	const trimmed = value.trim()
	if (!/^\d+$/.test(trimmed)) return undefined
	const size = Number.parseInt(trimmed, 10)
	return Number.isSafeInteger(size) ? size : undefined
}

/**
 * HEAD a URL and capture its identity headers.
 * Returns null when the request fails or the server answers non-2xx.
 */
export async function headRemote(
	url: string,
	options: HttpOptions = {},
): Promise<RemoteProbe | null> {
	try {
		const res = await httpRequest(url, "HEAD", {
			timeoutMs: PROBE_TIMEOUT_MS,
			...options,
		})
		if (!res.ok) {
			log.transfer.debug({ url, status: res.status }, "HEAD request rejected")
			return null
		}

		const etag = res.headers.get("etag")
		const lastModified = res.headers.get("last-modified")
		const contentLength = parseContentLength(res.headers.get("content-length"))
		const acceptRanges =
			(res.headers.get("accept-ranges") ?? "none").trim().toLowerCase() ===
			"bytes"

		const descriptor: RemoteDescriptor = {
			...(etag !== null ? { etag } : {}),
			...(lastModified !== null ? { lastModified } : {}),
			...(contentLength !== undefined ? { contentLength } : {}),
		}
		log.transfer.debug({ url, ...descriptor, acceptRanges }, "HEAD request")
		return { descriptor, acceptRanges }
	} catch (err) {
		log.transfer.warn(
			{ url, err: err instanceof Error ? err.message : String(err) },
			"HEAD request failed",
		)
		return null
	}
}

/**
 * GET a small text resource (hash references) and return it trimmed.
 * Throws HttpStatusError on non-2xx.
 */
export async function readText(
	url: string,
	options: HttpOptions = {},
): Promise<string> {
	const res = await httpRequest(url, "GET", {
		timeoutMs: PROBE_TIMEOUT_MS,
		...options,
	})
	if (!res.ok) {
		throw new HttpStatusError(url, res.status, res.statusText)
	}
	return (await res.text()).trim()
}
