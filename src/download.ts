/**
 * Transfer engine: single-stream or chunked-parallel downloads
 *
 * - Probes size and byte-range support once per job (one HEAD)
 * - Files >= chunkSize on range-capable servers are split into fixed-size
 *   chunks fetched concurrently into private temp files
 * - Any chunk failure discards every chunk file and demotes the job once to
 *   a single-stream download
 * - Bytes always land in `<destination>.part` first and are renamed into
 *   place only after the whole body was written
 */

import { createReadStream, createWriteStream } from "node:fs"
import {
	copyFile,
	mkdir,
	mkdtemp,
	rename,
	rm,
	unlink,
	writeFile,
} from "node:fs/promises"
import { basename, dirname, join } from "node:path"
import { Readable, Transform } from "node:stream"
import { pipeline } from "node:stream/promises"
import type { Dispatcher } from "undici"
import {
	ChunkProgress,
	calculateChunks,
	chunkLength,
	contentRangeMatches,
	rangeHeader,
} from "./chunks.js"
import { DEFAULT_CHUNK_SIZE, PART_SUFFIX, TEMP_ROOT } from "./constants.js"
import {
	HttpStatusError,
	headRemote,
	httpRequest,
	parseContentLength,
} from "./http.js"
import { log } from "./logger.js"
import { silentProgress, type ProgressSink } from "./progress.js"
import type { ChunkSpec, TransferJob, TransferStrategy } from "./types.js"

export interface TransferEngineOptions {
	/** Chunk size and auto-chunking threshold (default 10 MiB) */
	chunkSize?: number
	progress?: ProgressSink
	dispatcher?: Dispatcher
	/** Parent directory for chunk scratch directories */
	tempRoot?: string
}

export interface FetchOptions {
	/** undefined = decide from size and range support */
	chunked?: boolean
	/** Progress task name (defaults to the destination's basename) */
	label?: string
}

export type TransferResult =
	| {
			success: true
			path: string
			bytesDownloaded: number
			strategy: TransferStrategy
	  }
	| { success: false; error: string; strategy: TransferStrategy }

/**
 * Get the .part file path for a destination
 */
export function getPartPath(destPath: string): string {
	return `${destPath}${PART_SUFFIX}`
}

/**
 * Rename, falling back to copy + unlink across devices (temp dir on another
 * volume than the target).
 */
export async function moveFile(from: string, to: string): Promise<void> {
	try {
		await rename(from, to)
	} catch (err) {
		if ((err as NodeJS.ErrnoException).code !== "EXDEV") throw err
		await copyFile(from, to)
		await unlink(from)
	}
}

/** Pass-through stream that counts bytes and reports the running total */
function byteCounter(onBytes: (total: number) => void): Transform {
	let total = 0
	return new Transform({
		transform(chunk: Buffer, _encoding, callback) {
			total += chunk.length
			onBytes(total)
			callback(null, chunk)
		},
	})
}

export class TransferEngine {
	private readonly chunkSize: number
	private readonly progress: ProgressSink
	private readonly dispatcher: Dispatcher | undefined
	private readonly tempRoot: string

	constructor(options: TransferEngineOptions = {}) {
		this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE
		this.progress = options.progress ?? silentProgress
		this.dispatcher = options.dispatcher
		this.tempRoot = options.tempRoot ?? TEMP_ROOT
	}

	/**
	 * Download url to destination. Never leaves a partial file at
	 * destination: on failure the previous content (if any) is untouched.
	 */
	async fetch(
		url: string,
		destination: string,
		options: FetchOptions = {},
	): Promise<TransferResult> {
		const task = options.label ?? basename(destination)
		const partPath = getPartPath(destination)
		let strategy: TransferStrategy = "single"

		try {
			await mkdir(dirname(destination), { recursive: true })
			const job = await this.planJob(url, destination, options.chunked)
			strategy = job.strategy
			this.progress.start(task, job.fileSize)

			let bytes: number | null = null
			if (job.strategy === "chunked" && job.fileSize !== undefined) {
				bytes = await this.downloadChunked(job, job.fileSize, partPath, task)
				if (bytes === null) {
					log.transfer.warn(
						{ url, destination },
						"chunked download failed, falling back to single connection",
					)
					strategy = "single"
				}
			}
			if (bytes === null) {
				bytes = await this.downloadSingle(url, partPath, task)
			}

			await rename(partPath, destination)
			this.progress.complete(task, true)
			log.transfer.debug({ url, destination, bytes, strategy }, "downloaded")
			return { success: true, path: destination, bytesDownloaded: bytes, strategy }
		} catch (err) {
			await rm(partPath, { force: true })
			this.progress.complete(task, false)
			const error = err instanceof Error ? err.message : String(err)
			log.transfer.error({ url, destination, err: error }, "download failed")
			return { success: false, error, strategy }
		}
	}

	/**
	 * Pick the strategy for a job. Probe failures degrade to single-stream.
	 */
	async planJob(
		url: string,
		destination: string,
		chunked?: boolean,
	): Promise<TransferJob> {
		if (chunked === false) {
			return { url, destination, strategy: "single" }
		}

		const probe = await headRemote(url, this.httpOptions())
		const fileSize = probe?.descriptor.contentLength
		if (probe === null || fileSize === undefined) {
			log.transfer.debug({ url }, "size unknown, using single connection")
			return { url, destination, strategy: "single" }
		}

		if (chunked === undefined && fileSize < this.chunkSize) {
			return { url, destination, fileSize, strategy: "single" }
		}

		if (!probe.acceptRanges) {
			log.transfer.debug(
				{ url },
				"server does not accept byte ranges, using single connection",
			)
			return { url, destination, fileSize, strategy: "single" }
		}

		return { url, destination, fileSize, strategy: "chunked" }
	}

	/**
	 * Fetch every chunk concurrently, then concatenate them into partPath.
	 * Returns null when any chunk failed (all chunk files are discarded).
	 */
	private async downloadChunked(
		job: TransferJob,
		fileSize: number,
		partPath: string,
		task: string,
	): Promise<number | null> {
		const chunks = calculateChunks(fileSize, this.chunkSize)
		if (chunks.length === 0) {
			await writeFile(partPath, "")
			this.progress.update(task, 0, 0)
			return 0
		}

		log.transfer.debug(
			{ url: job.url, chunks: chunks.length, fileSize },
			"downloading in parallel chunks",
		)

		await mkdir(this.tempRoot, { recursive: true })
		const workDir = await mkdtemp(join(this.tempRoot, "chunks-"))
		const aggregate = new ChunkProgress(chunks.length)

		try {
			const results = await Promise.allSettled(
				chunks.map(chunk =>
					this.downloadChunk(job.url, chunk, workDir, bytesSoFar => {
						const total = aggregate.report(chunk.index, bytesSoFar)
						this.progress.update(task, total, fileSize)
					}),
				),
			)

			const files: { index: number; path: string }[] = []
			let failed = false
			results.forEach((result, i) => {
				if (result.status === "fulfilled") {
					files.push({ index: i, path: result.value })
				} else {
					failed = true
					log.transfer.warn(
						{
							url: job.url,
							chunk: i,
							err:
								result.reason instanceof Error
									? result.reason.message
									: String(result.reason),
						},
						"chunk failed",
					)
				}
			})
			if (failed) return null

			files.sort((a, b) => a.index - b.index)
			await this.reassemble(
				files.map(f => f.path),
				partPath,
			)
			return fileSize
		} finally {
			await rm(workDir, { recursive: true, force: true })
		}
	}

	private async downloadChunk(
		url: string,
		chunk: ChunkSpec,
		workDir: string,
		onBytes: (bytesSoFar: number) => void,
	): Promise<string> {
		const file = join(workDir, `chunk_${String(chunk.index).padStart(4, "0")}`)
		const res = await httpRequest(url, "GET", {
			...this.httpOptions(),
			headers: { Range: rangeHeader(chunk) },
		})

		if (res.status !== 206) {
			await res.body?.cancel()
			throw new Error(`expected 206 for ${rangeHeader(chunk)}, got ${res.status}`)
		}
		const contentRange = res.headers.get("content-range")
		if (!contentRangeMatches(contentRange, chunk)) {
			await res.body?.cancel()
			throw new Error(
				`server answered ${contentRange} for ${rangeHeader(chunk)}`,
			)
		}
		if (!res.body) {
			throw new Error("No response body")
		}

		let received = 0
		await pipeline(
			Readable.fromWeb(res.body),
			byteCounter(total => {
				received = total
				onBytes(total)
			}),
			createWriteStream(file),
		)

		const expected = chunkLength(chunk)
		if (received !== expected) {
			throw new Error(
				`chunk ${chunk.index} size mismatch: expected ${expected}, got ${received}`,
			)
		}
		return file
	}

	/** Concatenate chunk files in the given order into partPath */
	/** Concatenate chunk files in order through one pipeline */
	private async reassemble(files: string[], partPath: string): Promise<void> {
		async function* concatenated(): AsyncGenerator<Buffer> {
			for (const file of files) {
				yield* createReadStream(file)
			}
		}
		await pipeline(Readable.from(concatenated()), createWriteStream(partPath))
	}

	private async downloadSingle(
		url: string,
		partPath: string,
		task: string,
	): Promise<number> {
		const res = await httpRequest(url, "GET", this.httpOptions())
		if (!res.ok) {
			await res.body?.cancel()
			throw new HttpStatusError(url, res.status, res.statusText)
		}

		const total = parseContentLength(res.headers.get("content-length"))
		if (total === undefined || !res.body) {
			// No length: buffer the whole body to learn its size
			const buffer = Buffer.from(await res.arrayBuffer())
			await writeFile(partPath, buffer)
			this.progress.update(task, buffer.length, buffer.length)
			return buffer.length
		}

		let received = 0
		await pipeline(
			Readable.fromWeb(res.body),
			byteCounter(bytes => {
				received = bytes
				this.progress.update(task, bytes, total)
			}),
			createWriteStream(partPath),
		)

		// Content-Length counts encoded bytes when the body was compressed
		const encoded = res.headers.get("content-encoding")
		if ((encoded === null || encoded === "identity") && received !== total) {
			throw new Error(`Size mismatch: expected ${total}, got ${received}`)
		}
		return received
	}

	private httpOptions(): { dispatcher?: Dispatcher } {
		return this.dispatcher ? { dispatcher: this.dispatcher } : {}
	}
}
