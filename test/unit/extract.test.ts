/**
 * Unit tests for archive extraction
 *
 * Archives are built with yazl so the suite needs no zip binary.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest"
import {
	existsSync,
	mkdirSync,
	mkdtempSync,
	readdirSync,
	readFileSync,
	rmSync,
	writeFileSync,
} from "node:fs"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { fileURLToPath } from "node:url"
import {
	extractZip,
	isZipArchive,
	redundantRootFolder,
	zipExtractor,
} from "../../src/extract.js"
import { crc32, passwordCheckByte } from "../../src/zipcrypto.js"
import { buildZip } from "../helpers/index.js"

// mod/readme.txt (stored) and mod/data.txt (deflated), password "test-secret"
const LOCKED_ZIP = fileURLToPath(new URL("../fixtures/locked.zip", import.meta.url))

describe("redundantRootFolder", () => {
	it("finds a single top-level folder", () => {
		expect(redundantRootFolder(["app/", "app/bin/tool", "app/readme.txt"])).toBe(
			"app",
		)
		expect(redundantRootFolder(["app/bin/tool", "app/readme.txt"])).toBe("app")
	})

	it("returns null for several top-level items", () => {
		expect(redundantRootFolder(["app/tool", "lib/helper"])).toBeNull()
		expect(redundantRootFolder(["app/tool", "readme.txt"])).toBeNull()
		expect(redundantRootFolder([])).toBeNull()
	})
})

describe("isZipArchive", () => {
	it("matches the extension case-insensitively", () => {
		expect(isZipArchive("mod.zip")).toBe(true)
		expect(isZipArchive("MOD.ZIP")).toBe(true)
		expect(isZipArchive("mod.7z")).toBe(false)
	})
})

describe("extractZip", () => {
	let tempDir: string

	beforeEach(() => {
		tempDir = mkdtempSync(join(tmpdir(), "artifact-sync-extract-"))
	})

	afterEach(() => {
		rmSync(tempDir, { recursive: true, force: true })
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Basic extraction
	// ─────────────────────────────────────────────────────────────────────────

	it("extracts every file and keeps the structure", async () => {
		const zipPath = join(tempDir, "mod.zip")
		await buildZip(zipPath, { "readme.txt": "docs", "bin/tool.exe": "exe" })
		const dest = join(tempDir, "out")

		const result = await extractZip(zipPath, dest, { flatten: false })

		expect(result).toEqual({
			success: true,
			extractedFiles: ["readme.txt", "bin/tool.exe"],
		})
		expect(readFileSync(join(dest, "bin", "tool.exe"), "utf-8")).toBe("exe")
		expect(readFileSync(join(dest, "readme.txt"), "utf-8")).toBe("docs")
	})

	it("overwrites existing files", async () => {
		const zipPath = join(tempDir, "mod.zip")
		await buildZip(zipPath, { "config.ini": "new" })
		const dest = join(tempDir, "out")
		mkdirSync(dest)
		writeFileSync(join(dest, "config.ini"), "old")

		const result = await extractZip(zipPath, dest, { flatten: false })

		expect(result.success).toBe(true)
		expect(readFileSync(join(dest, "config.ini"), "utf-8")).toBe("new")
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Flattening
	// ─────────────────────────────────────────────────────────────────────────

	it("strips a redundant root folder when flattening", async () => {
		const zipPath = join(tempDir, "mod.zip")
		await buildZip(zipPath, {
			"mod-1.2/": "",
			"mod-1.2/bin/tool.exe": "exe",
			"mod-1.2/readme.txt": "docs",
		})
		const dest = join(tempDir, "out")

		const result = await extractZip(zipPath, dest, { flatten: true })

		expect(result.extractedFiles).toEqual(["bin/tool.exe", "readme.txt"])
		expect(existsSync(join(dest, "bin", "tool.exe"))).toBe(true)
		expect(existsSync(join(dest, "mod-1.2"))).toBe(false)
	})

	it("keeps paths when there is more than one top-level item", async () => {
		const zipPath = join(tempDir, "mod.zip")
		await buildZip(zipPath, { "mod/tool.exe": "exe", "readme.txt": "docs" })
		const dest = join(tempDir, "out")

		const result = await extractZip(zipPath, dest, { flatten: true })

		expect(result.extractedFiles).toEqual(["mod/tool.exe", "readme.txt"])
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Failures
	// ─────────────────────────────────────────────────────────────────────────

	it("reports a corrupt archive", async () => {
		const zipPath = join(tempDir, "broken.zip")
		writeFileSync(zipPath, "this is not a zip file")

		const result = await extractZip(zipPath, join(tempDir, "out"), {
			flatten: false,
		})

		expect(result.success).toBe(false)
		expect(result.extractedFiles).toEqual([])
		expect(result.error).toBeDefined()
	})

	it("rejects formats other than zip", async () => {
		const result = await zipExtractor.extract(
			join(tempDir, "mod.7z"),
			join(tempDir, "out"),
			{ flatten: false },
		)
		expect(result).toEqual({
			success: false,
			extractedFiles: [],
			error: "unsupported archive format: .7z",
		})
	})

	// ─────────────────────────────────────────────────────────────────────────
	// Encrypted archives
	// ─────────────────────────────────────────────────────────────────────────

	it("decrypts stored and deflated entries with the password", async () => {
		const dest = join(tempDir, "out")

		const result = await extractZip(LOCKED_ZIP, dest, {
			flatten: true,
			password: "test-secret",
		})

		expect(result).toEqual({
			success: true,
			extractedFiles: ["readme.txt", "data.txt"],
		})
		expect(readFileSync(join(dest, "readme.txt"), "utf-8")).toBe("secret payload\n")
		expect(readFileSync(join(dest, "data.txt"), "utf-8")).toBe(
			"mod data line\n".repeat(200),
		)
	})

	it("fails on an encrypted entry without a password", async () => {
		const result = await extractZip(LOCKED_ZIP, join(tempDir, "out"), {
			flatten: false,
		})

		expect(result.success).toBe(false)
		expect(result.error).toBe("encrypted entry mod/readme.txt needs a password")
	})

	it("fails with the wrong password and leaves no partial file", async () => {
		const dest = join(tempDir, "out")

		const result = await extractZip(LOCKED_ZIP, dest, {
			flatten: true,
			password: "not-the-password",
		})

		expect(result.success).toBe(false)
		expect(result.extractedFiles).toEqual([])
		expect(readdirSync(dest)).toEqual([])
	})
})

describe("zipcrypto helpers", () => {
	it("computes the IEEE CRC-32", () => {
		expect(crc32(Buffer.from("123456789"))).toBe(0xcbf43926)
		expect(crc32(new Uint8Array())).toBe(0)
	})

	it("checks the CRC high byte unless sizes live in a data descriptor", () => {
		const entry = { generalPurposeBitFlag: 0x1, lastModFileTime: 0x2412, crc32: 0xd57e77cd }
		expect(passwordCheckByte(entry)).toBe(0xd5)
		expect(passwordCheckByte({ ...entry, generalPurposeBitFlag: 0x9 })).toBe(0x24)
	})
})
