/**
 * Fixed values shared by the transfer engine, the metadata store and the pipeline
 */

import { tmpdir } from "node:os"
import { join } from "node:path"

export const VERSION = "1.0.0"

export const USER_AGENT = `artifact-sync/${VERSION}`

/** Chunk size for ranged downloads, also the auto-chunking threshold */
export const DEFAULT_CHUNK_SIZE = 10 * 1024 * 1024 // 10 MiB

/** HEAD probes, hash references and GitHub API calls */
export const PROBE_TIMEOUT_MS = 30_000

/** Idle timeout between body bytes on GET transfers */
export const BODY_TIMEOUT_MS = 5 * 60_000

export const METADATA_SUFFIX = ".meta.json"
export const BACKUP_SUFFIX = ".bak"
export const PART_SUFFIX = ".part"

export const CONFIG_FILENAME = "artifact-sync.yaml"

/** Root for per-job scratch directories (candidate downloads, chunk files) */
export const TEMP_ROOT = join(tmpdir(), "artifact-sync")
