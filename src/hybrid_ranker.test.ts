import { describe, it, expect } from "vitest"
import {
	HybridRanker,
	RANKING_PROFILES,
	computeStructuralScore,
	rankCandidates,
} from "./hybrid_ranker.js"
import { CatalogError } from "./config.js"
import type { RankingCandidate } from "./catalog_types.js"

function candidate(id: string, semantic: number, centrality = 0, rowCount = 0, neighbors: string[] = []): RankingCandidate {
	return { id, semantic_score: semantic, centrality, row_count: rowCount, neighbors }
}

describe("computeStructuralScore", () => {
	it("is 0 for isolated tables", () => {
		expect(computeStructuralScore(0)).toBe(0)
	})

	it("reaches 1 at the max expected centrality", () => {
		expect(computeStructuralScore(6, 6)).toBe(1)
	})

	it("is log-dampened below the max", () => {
		expect(computeStructuralScore(1, 6)).toBeCloseTo(Math.log(2) / Math.log(7), 12)
		// linear would give 0.5; log gives more credit to the first few edges
		expect(computeStructuralScore(3, 6)).toBeCloseTo(0.7124, 4)
	})

	it("saturates above the max", () => {
		expect(computeStructuralScore(40, 6)).toBe(1)
	})
})

describe("HybridRanker.rank", () => {
	it("combines semantic and structural scores with the default 0.8/0.2 weights", () => {
		const [result] = rankCandidates([candidate("OLIST_SALES.ORDERS", 0.9, 6)])
		expect(result.structural_score).toBe(1)
		expect(result.final_score).toBeCloseTo(0.92, 12)
		expect(result.reasoning).toBe("hybrid: semantic=0.90, structural=1.00 (centrality 6)")
	})

	it("keeps a hub table from outranking a clearly better semantic match", () => {
		const ranked = rankCandidates([
			candidate("hub", 0.5, 12),
			candidate("match", 0.8, 0),
		])
		// hub: 0.8*0.5 + 0.2*1 = 0.60; match: 0.8*0.8 = 0.64
		expect(ranked.map((r) => r.entity_id)).toEqual(["match", "hub"])
	})

	it("respects alternate weight profiles", () => {
		const ranker = new HybridRanker({ weights: RANKING_PROFILES.balanced })
		const ranked = ranker.rank([candidate("hub", 0.5, 12), candidate("match", 0.8, 0)])
		// hub: 0.6*0.5 + 0.4*1 = 0.70; match: 0.6*0.8 = 0.48
		expect(ranked[0].entity_id).toBe("hub")
		expect(ranked[0].final_score).toBeCloseTo(0.7, 12)
	})

	it("breaks exact ties by row count, then by id", () => {
		const ranked = rankCandidates([
			candidate("b_table", 0.5, 0, 100),
			candidate("c_table", 0.5, 0, 5000),
			candidate("a_table", 0.5, 0, 100),
		])
		expect(ranked.map((r) => r.entity_id)).toEqual(["c_table", "a_table", "b_table"])
	})

	it("clamps out-of-range semantic scores and truncates neighbors", () => {
		const [result] = rankCandidates([candidate("t", 1.4, 2, 10, ["a", "b", "c", "d"])])
		expect(result.semantic_score).toBe(1)
		expect(result.final_score).toBeLessThanOrEqual(1)
		expect(result.neighbors).toEqual(["a", "b", "c"])
	})

	it("names the source platform in the reasoning when known", () => {
		const [result] = rankCandidates([{ ...candidate("t", 0.25), source: "databricks" }])
		expect(result.reasoning).toBe("databricks: semantic=0.25, structural=0.00 (centrality 0)")
	})

	it("rejects weights that do not sum to 1", () => {
		expect(() => new HybridRanker({ weights: { semantic: 0.5, structural: 0.2 } })).toThrow(CatalogError)
		const ranker = new HybridRanker()
		expect(() => ranker.rank([], { semantic: 1, structural: 1 })).toThrow(/sum to 1/)
	})

	it("returns an empty list for no candidates", () => {
		expect(rankCandidates([])).toEqual([])
	})
})
