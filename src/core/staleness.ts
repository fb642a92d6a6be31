/**
 * Staleness oracle
 *
 * Decides, without downloading the artifact, whether the remote copy differs
 * from the local one. The answer is tri-state: "unknown" means no comparable
 * evidence was found and the caller must fall back to a content hash.
 */

import { existsSync } from "node:fs"
import { stat } from "node:fs/promises"
import { log } from "../logger.js"
import type { MetadataStore } from "../metadata.js"
import type { RemoteDescriptor } from "../types.js"

export type Staleness =
	| { kind: "needs-update"; reason: string; remote?: RemoteDescriptor }
	| { kind: "up-to-date"; reason: string; remote: RemoteDescriptor }
	| { kind: "unknown"; reason: string; remote?: RemoteDescriptor }

export interface StalenessOptions {
	/** Compare the remote Content-Length with the local size when no metadata exists */
	useContentLengthCheck: boolean
}

export interface StalenessDeps {
	store: MetadataStore
	/** Fresh identity headers for url, or null when the HEAD fails */
	probe(url: string): Promise<RemoteDescriptor | null>
}

export type DescriptorComparison =
	| { result: "same" | "different"; field: keyof RemoteDescriptor }
	| { result: "incomparable" }

/** Fields in comparison priority order */
const COMPARED_FIELDS = ["etag", "lastModified", "contentLength"] as const

/**
 * Compare on the first field present on both sides, in priority order:
 * ETag, then Last-Modified, then Content-Length.
 */
export function compareDescriptors(
	cached: RemoteDescriptor,
	remote: RemoteDescriptor,
): DescriptorComparison {
	for (const field of COMPARED_FIELDS) {
		const before = cached[field]
		const after = remote[field]
		if (before === undefined || after === undefined) continue
		return { result: before === after ? "same" : "different", field }
	}
	return { result: "incomparable" }
}

export async function checkStaleness(
	url: string,
	target: string,
	options: StalenessOptions,
	deps: StalenessDeps,
): Promise<Staleness> {
	const decide = (staleness: Staleness): Staleness => {
		log.staleness.debug(
			{ url, target, kind: staleness.kind, reason: staleness.reason },
			"staleness decided",
		)
		return staleness
	}

	if (!existsSync(target)) {
		await deps.store.delete(target)
		return decide({ kind: "needs-update", reason: "target missing" })
	}

	const cached = await deps.store.load(target)

	if (cached === null) {
		if (!options.useContentLengthCheck) {
			return decide({ kind: "needs-update", reason: "no cached metadata" })
		}
		const remote = await deps.probe(url)
		if (remote?.contentLength === undefined) {
			return decide({
				kind: "unknown",
				reason: "no cached metadata and remote size unavailable",
				...(remote ? { remote } : {}),
			})
		}
		const { size } = await stat(target)
		if (size === remote.contentLength) {
			await deps.store.save(target, remote, url)
			return decide({
				kind: "up-to-date",
				reason: "content length matches local size",
				remote,
			})
		}
		return decide({
			kind: "needs-update",
			reason: `content length ${remote.contentLength} differs from local size ${size}`,
			remote,
		})
	}

	if (cached.sourceUrl !== url) {
		return decide({ kind: "needs-update", reason: "source url changed" })
	}

	const remote = await deps.probe(url)
	if (remote === null) {
		return decide({ kind: "unknown", reason: "HEAD request failed" })
	}

	const comparison = compareDescriptors(cached.descriptor, remote)
	switch (comparison.result) {
		case "same":
			return decide({
				kind: "up-to-date",
				reason: `${comparison.field} unchanged`,
				remote,
			})
		case "different":
			return decide({
				kind: "needs-update",
				reason: `${comparison.field} changed`,
				remote,
			})
		case "incomparable":
			return decide({
				kind: "unknown",
				reason: "no comparable identity headers",
				remote,
			})
	}
}
