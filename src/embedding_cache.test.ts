import { describe, it, expect } from "vitest"
import { EmbeddingCache, type BatchEmbeddingProvider } from "./embedding_cache.js"

function countingProvider(options: { batch?: boolean; failOn?: string; failBatch?: boolean } = {}) {
	const single: string[] = []
	const batches: string[][] = []
	const provider: BatchEmbeddingProvider = {
		embedText: async (text) => {
			single.push(text)
			if (text === options.failOn) throw new Error("sidecar error")
			return [text.length, 0]
		},
	}
	if (options.batch) {
		provider.embedBatch = async (texts) => {
			batches.push(texts)
			if (options.failBatch) throw new Error("batch too large")
			return texts.map((t) => [t.length, 1])
		}
	}
	return { provider, single, batches }
}

describe("EmbeddingCache", () => {
	it("memoises by normalised column name", async () => {
		const { provider, single } = countingProvider()
		const cache = new EmbeddingCache(provider)
		await cache.get("customer_id")
		await cache.get("CUSTOMER_ID")
		await cache.get("customerid")
		expect(single).toEqual(["customer_id"])
		expect(cache.vectorFor("Customer_Id")).toEqual([11, 0])
	})

	it("returns null for names that were never warmed", () => {
		const { provider } = countingProvider()
		expect(new EmbeddingCache(provider).vectorFor("unknown")).toBeNull()
	})

	it("warms in batches and skips names already cached", async () => {
		const { provider, batches } = countingProvider({ batch: true })
		const cache = new EmbeddingCache(provider, undefined, 2)
		await expect(cache.warm(["order_id", "ORDER_ID", "amount", "price", "qty"])).resolves.toBe(4)
		expect(batches).toEqual([["order_id", "amount"], ["price", "qty"]])
		expect(cache.vectorFor("price")).toEqual([5, 1])

		await expect(cache.warm(["amount", "status"])).resolves.toBe(1)
		expect(batches[2]).toEqual(["status"])
		expect(cache.size).toBe(5)
	})

	it("falls back to single requests when a batch fails", async () => {
		const { provider, single } = countingProvider({ batch: true, failBatch: true })
		const cache = new EmbeddingCache(provider)
		await cache.warm(["a_col", "b_col"])
		expect(single).toEqual(["a_col", "b_col"])
		expect(cache.vectorFor("b_col")).toEqual([5, 0])
	})

	it("caches a failed name as null and does not retry it", async () => {
		const { provider, single } = countingProvider({ failOn: "broken" })
		const cache = new EmbeddingCache(provider)
		await cache.warm(["broken", "fine"])
		await cache.get("broken")
		expect(single).toEqual(["broken", "fine"])
		expect(cache.has("broken")).toBe(true)
		expect(cache.vectorFor("broken")).toBeNull()
		expect(cache.vectorFor("fine")).toEqual([4, 0])
	})
})
