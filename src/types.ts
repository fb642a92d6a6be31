/**
 * Shared type definitions for artifact-sync
 */

// ─────────────────────────────────────────────────────────────────────────────
// Remote identity
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Snapshot of a remote artifact's identity headers. Servers vary: any field
 * may be missing, and occasionally all of them are.
 */
export interface RemoteDescriptor {
	readonly etag?: string
	readonly lastModified?: string
	readonly contentLength?: number
}

/** Sidecar record persisted next to a target file */
export interface CachedMetadata {
	sourceUrl: string
	descriptor: RemoteDescriptor
	cachedAt: Date
}

// ─────────────────────────────────────────────────────────────────────────────
// Transfers
// ─────────────────────────────────────────────────────────────────────────────

/** Inclusive byte range fetched by a single chunk worker */
export interface ChunkSpec {
	index: number
	startByte: number
	endByte: number
}

export type TransferStrategy = "single" | "chunked"

export interface TransferJob {
	url: string
	destination: string
	fileSize?: number
	strategy: TransferStrategy
}

// ─────────────────────────────────────────────────────────────────────────────
// Entries
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One configured (remote source → local target) synchronization unit, after
 * variable substitution and validation.
 */
export interface Entry {
	name: string
	/** Direct file URL, or a GitHub repository reference when gitAsset is set */
	url: string
	/** File path, or an existing directory the URL's filename is appended to */
	target: string
	/** URL of a text file whose first token is the artifact's MD5 */
	md5?: string
	/** Regex matched against asset names of the newest GitHub release */
	gitAsset?: string
	unzipTarget?: string
	archivePassword?: string
	/** Strip a single redundant top-level folder when extracting */
	flatten: boolean
	/** Executable path whose processes may be killed to release a lock */
	killIfLocked?: string
	/** Relaunch killIfLocked after the update when it had to be killed */
	relaunch: boolean
	launch?: string
	arguments?: string
	/** undefined = auto-detect by size, true = force, false = never */
	chunkedDownload?: boolean
	useContentLengthCheck: boolean
	force: boolean
}
