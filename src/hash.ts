/**
 * File hashing for the content-hash fallback of the update decision
 */

import { createReadStream, existsSync } from "node:fs"
import { createHash } from "node:crypto"

export type HashAlgorithm = "md5" | "sha1" | "sha256"

/**
 * Calculate the hex digest of a file
 * Uses streaming to handle large files efficiently
 */
export async function hashFile(
	filePath: string,
	algorithm: HashAlgorithm = "md5",
): Promise<string> {
	if (!existsSync(filePath)) {
		throw new Error(`File not found: ${filePath}`)
	}

	const hash = createHash(algorithm)
	const stream = createReadStream(filePath)

	for await (const chunk of stream) {
		hash.update(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
	}

	return hash.digest("hex")
}

/**
 * Extract the digest from a published hash reference.
 * Accepts `md5sum` output ("<hash>  <file>") or a bare hash; the first
 * whitespace-delimited token wins.
 */
export function parseHashReference(text: string): string | null {
	const token = text.trim().split(/\s+/)[0]
	if (!token) return null
	return token.toLowerCase()
}

/** Case-insensitive digest comparison */
export function hashesMatch(a: string, b: string): boolean {
	return a.trim().toLowerCase() === b.trim().toLowerCase()
}
