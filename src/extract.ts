/**
 * Streaming ZIP extraction using yauzl
 *
 * Extracts entries to .part files then atomically renames. With `flatten`,
 * an archive whose only top-level item is a single folder is unpacked
 * without that folder.
 */

import { createWriteStream, existsSync } from "node:fs"
import { mkdir, rename, rm } from "node:fs/promises"
import { pipeline } from "node:stream/promises"
import { dirname, extname, resolve, sep } from "node:path"
import { createInflateRaw } from "node:zlib"
import yauzl from "yauzl"
import { log } from "./logger.js"
import { Crc32Check, passwordCheckByte, ZipCryptoDecipher } from "./zipcrypto.js"

const METHOD_STORED = 0
const METHOD_DEFLATED = 8

export interface ExtractOptions {
	/** Strip a single redundant top-level folder */
	flatten: boolean
	/** ZipCrypto password for encrypted entries */
	password?: string
}

export interface ExtractResult {
	success: boolean
	extractedFiles: string[]
	error?: string
}

export interface ArchiveExtractor {
	extract(
		archivePath: string,
		destDir: string,
		options: ExtractOptions,
	): Promise<ExtractResult>
}

/**
 * Check if a file is a ZIP archive by extension
 */
export function isZipArchive(filename: string): boolean {
	return extname(filename).toLowerCase() === ".zip"
}

/**
 * Promisified yauzl.open
 */
function openZip(path: string): Promise<yauzl.ZipFile> {
	return new Promise((resolve, reject) => {
		yauzl.open(
			path,
			{ lazyEntries: true, autoClose: false },
			(err, zipFile) => {
				if (err) reject(err)
				else if (!zipFile) reject(new Error("Failed to open zip file"))
				else resolve(zipFile)
			},
		)
	})
}

/**
 * Get readable stream for a zip entry
 */
function openReadStream(
	zipFile: yauzl.ZipFile,
	entry: yauzl.Entry,
): Promise<NodeJS.ReadableStream> {
	return new Promise((resolve, reject) => {
		zipFile.openReadStream(entry, (err, stream) => {
			if (err) reject(err)
			else if (!stream) reject(new Error("Failed to open read stream"))
			else resolve(stream)
		})
	})
}

/** Still encrypted and compressed bytes of an encrypted entry */
function openRawStream(
	zipFile: yauzl.ZipFile,
	entry: yauzl.Entry,
): Promise<NodeJS.ReadableStream> {
	return new Promise((resolve, reject) => {
		zipFile.openReadStream(
			entry,
			{
				decrypt: false,
				decompress: entry.isCompressed() ? false : null,
				start: null,
				end: null,
			},
			(err, stream) => {
				if (err) reject(err)
				else if (!stream) reject(new Error("Failed to open read stream"))
				else resolve(stream)
			},
		)
	})
}

/**
 * Streams that turn an entry into its file content: straight from yauzl for
 * plain entries, decrypt + inflate + CRC check for encrypted ones.
 */
async function entryStreams(
	zipFile: yauzl.ZipFile,
	entry: yauzl.Entry,
	password: string | undefined,
): Promise<(NodeJS.ReadableStream | NodeJS.ReadWriteStream)[]> {
	if (!entry.isEncrypted()) return [await openReadStream(zipFile, entry)]

	if (password === undefined || password.length === 0) {
		throw new Error(`encrypted entry ${entry.fileName} needs a password`)
	}
	if (
		entry.compressionMethod !== METHOD_STORED &&
		entry.compressionMethod !== METHOD_DEFLATED
	) {
		throw new Error(
			`encrypted entry ${entry.fileName}: unsupported method ${entry.compressionMethod}`,
		)
	}

	const raw = await openRawStream(zipFile, entry)
	return [
		raw,
		new ZipCryptoDecipher(password, passwordCheckByte(entry)),
		...(entry.compressionMethod === METHOD_DEFLATED ? [createInflateRaw()] : []),
		new Crc32Check(entry.crc32, entry.fileName),
	]
}

/** Read the central directory without touching entry data */
function readEntries(zipFile: yauzl.ZipFile): Promise<yauzl.Entry[]> {
	return new Promise((resolve, reject) => {
		const entries: yauzl.Entry[] = []
		zipFile.on("error", reject)
		zipFile.on("end", () => resolve(entries))
		zipFile.on("entry", (entry: yauzl.Entry) => {
			entries.push(entry)
			zipFile.readEntry()
		})
		zipFile.readEntry()
	})
}

/**
 * Name of the single top-level folder when it is the only top-level item,
 * otherwise null.
 */
export function redundantRootFolder(fileNames: string[]): string | null {
	const roots = new Set<string>()
	let hasRootFile = false

	for (const name of fileNames) {
		const parts = name.split("/").filter(part => part.length > 0)
		const root = parts[0]
		if (root === undefined) continue
		if (parts.length === 1 && !name.endsWith("/")) {
			hasRootFile = true
		} else {
			roots.add(root)
		}
	}

	if (hasRootFile || roots.size !== 1) return null
	const [root] = roots
	return root ?? null
}

/**
 * Extract a ZIP archive using streaming (non-blocking)
 */
export async function extractZip(
	archivePath: string,
	destDir: string,
	options: ExtractOptions,
): Promise<ExtractResult> {
	const extractedFiles: string[] = []
	const destRoot = resolve(destDir)
	let zipFile: yauzl.ZipFile | null = null

	try {
		await mkdir(destRoot, { recursive: true })
		zipFile = await openZip(archivePath)
		const entries = await readEntries(zipFile)

		const root = options.flatten
			? redundantRootFolder(entries.map(e => e.fileName))
			: null
		if (options.flatten && root === null) {
			log.archive.debug(
				{ archivePath },
				"flatten requested but archive has no single root folder",
			)
		}

		for (const entry of entries) {
			if (entry.fileName.endsWith("/")) continue
			const relative =
				root !== null ? entry.fileName.slice(root.length + 1) : entry.fileName
			if (relative.length === 0) continue

			const outputPath = resolve(destRoot, relative)
			if (!outputPath.startsWith(destRoot + sep)) {
				throw new Error(`entry escapes destination: ${entry.fileName}`)
			}

			const partPath = `${outputPath}.part.${process.pid}`
			await mkdir(dirname(outputPath), { recursive: true })

			const streams = await entryStreams(zipFile, entry, options.password)
			try {
				await pipeline([...streams, createWriteStream(partPath)])
			} catch (err) {
				await rm(partPath, { force: true })
				throw err
			}

			// Atomic rename
			if (existsSync(outputPath)) {
				await rm(outputPath, { recursive: true, force: true })
			}
			await rename(partPath, outputPath)
			extractedFiles.push(relative)
		}

		log.archive.debug(
			{ archivePath, destDir, files: extractedFiles.length },
			"extracted",
		)
		return { success: true, extractedFiles }
	} catch (err) {
		return {
			success: false,
			extractedFiles,
			error: err instanceof Error ? err.message : String(err),
		}
	} finally {
		zipFile?.close()
	}
}

export const zipExtractor: ArchiveExtractor = {
	async extract(archivePath, destDir, options) {
		if (!isZipArchive(archivePath)) {
			return {
				success: false,
				extractedFiles: [],
				error: `unsupported archive format: ${extname(archivePath)}`,
			}
		}
		return extractZip(archivePath, destDir, options)
	},
}
