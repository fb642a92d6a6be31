/**
 * Traditional PKWARE ("ZipCrypto") decryption
 *
 * yauzl hands encrypted entries over as raw bytes (decrypt: false). The
 * transforms here turn them back into the stored or deflated payload and
 * verify the result against the entry's CRC-32.
 */

import { Transform, type TransformCallback } from "node:stream"

const ENCRYPTION_HEADER_SIZE = 12

const CRC_TABLE = (() => {
	const table = new Uint32Array(256)
	for (let n = 0; n < 256; n++) {
		let c = n
		for (let k = 0; k < 8; k++) {
			c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1
		}
		table[n] = c >>> 0
	}
	return table
})()

function crcByte(crc: number, byte: number): number {
	return ((CRC_TABLE[(crc ^ byte) & 0xff] ?? 0) ^ (crc >>> 8)) >>> 0
}

/** CRC-32 (IEEE) of a buffer */
export function crc32(data: Uint8Array): number {
	let crc = 0xffffffff
	for (const byte of data) crc = crcByte(crc, byte)
	return (crc ^ 0xffffffff) >>> 0
}

class CipherKeys {
	private k0 = 0x12345678
	private k1 = 0x23456789
	private k2 = 0x34567890

	constructor(password: string) {
		for (const byte of Buffer.from(password, "utf-8")) this.update(byte)
	}

	private update(byte: number): void {
		this.k0 = crcByte(this.k0, byte)
		this.k1 = (Math.imul((this.k1 + (this.k0 & 0xff)) >>> 0, 134775813) + 1) >>> 0
		this.k2 = crcByte(this.k2, this.k1 >>> 24)
	}

	decrypt(byte: number): number {
		const t = (this.k2 | 2) & 0xffff
		const plain = (byte ^ (Math.imul(t, t ^ 1) >>> 8)) & 0xff
		this.update(plain)
		return plain
	}
}

/**
 * Byte the last header byte must decrypt to: the high byte of the CRC, or of
 * the DOS mod time when sizes live in a data descriptor (flag bit 3).
 */
export function passwordCheckByte(entry: {
	generalPurposeBitFlag: number
	lastModFileTime: number
	crc32: number
}): number {
	return entry.generalPurposeBitFlag & 0x8
		? (entry.lastModFileTime >>> 8) & 0xff
		: entry.crc32 >>> 24
}

/**
 * Decrypts an entry's raw data. Fails on the 12-byte header when the
 * password is wrong.
 */
export class ZipCryptoDecipher extends Transform {
	private readonly keys: CipherKeys
	private headerLeft = ENCRYPTION_HEADER_SIZE

	constructor(
		password: string,
		private readonly checkByte: number,
	) {
		super()
		this.keys = new CipherKeys(password)
	}

	override _transform(
		chunk: Buffer,
		_encoding: BufferEncoding,
		callback: TransformCallback,
	): void {
		const out = Buffer.allocUnsafe(chunk.length)
		let written = 0
		for (const byte of chunk) {
			const plain = this.keys.decrypt(byte)
			if (this.headerLeft > 0) {
				this.headerLeft--
				if (this.headerLeft === 0 && plain !== this.checkByte) {
					callback(new Error("incorrect archive password"))
					return
				}
				continue
			}
			out[written++] = plain
		}
		callback(null, out.subarray(0, written))
	}

	override _flush(callback: TransformCallback): void {
		if (this.headerLeft > 0) callback(new Error("truncated encryption header"))
		else callback()
	}
}

/** Passes data through and fails at the end when the CRC-32 differs */
export class Crc32Check extends Transform {
	private crc = 0xffffffff

	constructor(
		private readonly expected: number,
		private readonly label: string,
	) {
		super()
	}

	override _transform(
		chunk: Buffer,
		_encoding: BufferEncoding,
		callback: TransformCallback,
	): void {
		for (const byte of chunk) this.crc = crcByte(this.crc, byte)
		callback(null, chunk)
	}

	override _flush(callback: TransformCallback): void {
		const actual = (this.crc ^ 0xffffffff) >>> 0
		if (actual !== this.expected >>> 0) {
			callback(new Error(`CRC mismatch for ${this.label}`))
		} else {
			callback()
		}
	}
}
