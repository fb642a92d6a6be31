/**
 * Sidecar metadata store
 *
 * Each target file gets a `<target>.meta.json` holding the identity headers
 * seen the last time it was downloaded or confirmed. A missing, dangling or
 * corrupt sidecar reads as "no metadata": the caller then refreshes.
 */

import { existsSync } from "node:fs"
import { readFile, unlink, writeFile } from "node:fs/promises"
import { z } from "zod"
import { METADATA_SUFFIX } from "./constants.js"
import { log } from "./logger.js"
import type { CachedMetadata, RemoteDescriptor } from "./types.js"

export interface MetadataStore {
	load(target: string): Promise<CachedMetadata | null>
	save(
		target: string,
		descriptor: RemoteDescriptor,
		url: string,
	): Promise<boolean>
	delete(target: string): Promise<boolean>
}

// Unknown keys are stripped, malformed optional values read as absent.
const SidecarSchema = z.object({
	url: z.string().min(1),
	etag: z.string().nullish().catch(undefined),
	last_modified: z.string().nullish().catch(undefined),
	content_length: z.number().int().nonnegative().nullish().catch(undefined),
	cached_at: z.string().nullish().catch(undefined),
})

type Sidecar = z.infer<typeof SidecarSchema>

export function metadataPath(target: string): string {
	return `${target}${METADATA_SUFFIX}`
}

function toCachedMetadata(sidecar: Sidecar): CachedMetadata {
	const cachedAt = sidecar.cached_at ? new Date(sidecar.cached_at) : new Date(0)
	return {
		sourceUrl: sidecar.url,
		descriptor: {
			...(sidecar.etag != null ? { etag: sidecar.etag } : {}),
			...(sidecar.last_modified != null
				? { lastModified: sidecar.last_modified }
				: {}),
			...(sidecar.content_length != null
				? { contentLength: sidecar.content_length }
				: {}),
		},
		cachedAt: Number.isNaN(cachedAt.getTime()) ? new Date(0) : cachedAt,
	}
}

export async function loadMetadata(
	target: string,
): Promise<CachedMetadata | null> {
	const path = metadataPath(target)

	if (!existsSync(path)) {
		log.metadata.debug({ path }, "no sidecar")
		return null
	}

	// A sidecar without its target describes nothing.
	if (!existsSync(target)) {
		log.metadata.debug({ path }, "dangling sidecar ignored")
		return null
	}

	try {
		const raw = JSON.parse(await readFile(path, "utf-8")) as unknown
		const parsed = SidecarSchema.safeParse(raw)
		if (!parsed.success) {
			log.metadata.warn(
				{ path, issues: parsed.error.issues.length },
				"invalid sidecar treated as absent",
			)
			return null
		}
		return toCachedMetadata(parsed.data)
	} catch (err) {
		log.metadata.warn(
			{ path, err: err instanceof Error ? err.message : String(err) },
			"unreadable sidecar treated as absent",
		)
		return null
	}
}

export async function saveMetadata(
	target: string,
	descriptor: RemoteDescriptor,
	url: string,
): Promise<boolean> {
	const path = metadataPath(target)
	const sidecar = {
		url,
		etag: descriptor.etag ?? null,
		last_modified: descriptor.lastModified ?? null,
		content_length: descriptor.contentLength ?? null,
		cached_at: new Date().toISOString(),
	}

	try {
		await writeFile(path, JSON.stringify(sidecar, null, 2), "utf-8")
		log.metadata.debug({ path }, "saved sidecar")
		return true
	} catch (err) {
		log.metadata.warn(
			{ path, err: err instanceof Error ? err.message : String(err) },
			"failed to save sidecar",
		)
		return false
	}
}

/** Idempotent: a sidecar that is already gone counts as deleted */
export async function deleteMetadata(target: string): Promise<boolean> {
	const path = metadataPath(target)
	try {
		await unlink(path)
		log.metadata.debug({ path }, "deleted sidecar")
		return true
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code === "ENOENT") {
			return true
		}
		log.metadata.warn(
			{ path, err: err instanceof Error ? err.message : String(err) },
			"failed to delete sidecar",
		)
		return false
	}
}

export const sidecarStore: MetadataStore = {
	load: loadMetadata,
	save: saveMetadata,
	delete: deleteMetadata,
}
