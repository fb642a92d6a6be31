import { describe, it, expect } from "vitest"
import { runParallel } from "../../src/parallel.js"

const options = { concurrency: 2, label: "Testing", quiet: true }

describe("runParallel", () => {
	it("keeps failures in their input position", async () => {
		const result = await runParallel(
			["a", "b", "c"],
			async item => {
				if (item === "b") throw new Error("b broke")
				return item.toUpperCase()
			},
			options,
		)

		expect(result.settled).toEqual([
			{ ok: true, item: "a", value: "A" },
			{ ok: false, item: "b", error: "b broke" },
			{ ok: true, item: "c", value: "C" },
		])
		expect(result.succeeded).toBe(2)
		expect(result.failed).toBe(1)
	})

	it("never runs more tasks than the concurrency at once", async () => {
		let running = 0
		let peak = 0

		await runParallel(
			[1, 2, 3, 4, 5],
			async () => {
				running++
				peak = Math.max(peak, running)
				await new Promise(resolve => setTimeout(resolve, 5))
				running--
			},
			options,
		)

		expect(peak).toBe(2)
	})
})
