/**
 * Byte-range partitioning for chunked transfers
 */

import { DEFAULT_CHUNK_SIZE } from "./constants.js"
import type { ChunkSpec } from "./types.js"

/**
 * Split [0, fileSize) into contiguous inclusive ranges of chunkSize bytes.
 * The last chunk may be shorter; a zero-byte file yields no chunks.
 */
export function calculateChunks(
	fileSize: number,
	chunkSize: number = DEFAULT_CHUNK_SIZE,
): ChunkSpec[] {
	if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
		throw new RangeError(`chunkSize must be a positive integer (got ${chunkSize})`)
	}
	if (!Number.isSafeInteger(fileSize) || fileSize <= 0) {
		return []
	}

	const chunks: ChunkSpec[] = []
	for (let start = 0, index = 0; start < fileSize; start += chunkSize, index++) {
		chunks.push({
			index,
			startByte: start,
			endByte: Math.min(start + chunkSize, fileSize) - 1,
		})
	}
	return chunks
}

export function chunkLength(chunk: ChunkSpec): number {
	return chunk.endByte - chunk.startByte + 1
}

/** `Range` header value for a chunk */
export function rangeHeader(chunk: ChunkSpec): string {
	return `bytes=${chunk.startByte}-${chunk.endByte}`
}

/**
 * Check a `Content-Range: bytes s-e/total` answer against the requested chunk.
 * A missing header is accepted (some servers omit it on 206).
 */
export function contentRangeMatches(
	header: string | null,
	chunk: ChunkSpec,
): boolean {
	if (header === null) return true
	const match = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(header.trim())
	if (!match) return false
	return (
		Number(match[1]) === chunk.startByte && Number(match[2]) === chunk.endByte
	)
}

/**
 * Aggregates per-chunk byte counts into one total that never decreases,
 * whatever order the workers report in.
 */
export class ChunkProgress {
	private readonly perChunk: number[]
	private total = 0

	constructor(chunkCount: number) {
		this.perChunk = new Array<number>(chunkCount).fill(0)
	}

	/** Record bytesSoFar for one chunk and return the aggregated total */
	report(chunkIndex: number, bytesSoFar: number): number {
		const previous = this.perChunk[chunkIndex]
		if (previous === undefined) {
			throw new RangeError(`Unknown chunk index ${chunkIndex}`)
		}
		if (bytesSoFar > previous) {
			this.perChunk[chunkIndex] = bytesSoFar
			this.total += bytesSoFar - previous
		}
		return this.total
	}

	get bytes(): number {
		return this.total
	}
}
