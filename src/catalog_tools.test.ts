import { describe, it, expect } from "vitest"
import { z } from "zod"
import {
	rankCandidatesShape,
	runClassifyQuestion,
	runDetectDuplicates,
	runPlanRoute,
	runRankCandidates,
	runScoreTables,
	scoreTablesShape,
	type CatalogToolContext,
} from "./catalog_tools.js"
import { DEFAULT_CONFIG, type CatalogConfig } from "./config/loadConfig.js"
import { CatalogError } from "./config.js"
import { toToolResult } from "./index.js"
import { CatalogQueryEngine } from "./query_engine.js"
import type { ExtractedTable, Platform, SimilarityEdge } from "./catalog_types.js"
import type { BatchEmbeddingProvider } from "./embedding_cache.js"

const TABLES: Record<Platform, ExtractedTable[]> = {
	databricks: [
		{
			table_id: "sales.customers",
			source: "databricks",
			schema: "sales",
			name: "customers",
			row_count: 500,
			column_count: 2,
			columns: [
				{ name: "customer_id", type: "BIGINT", ordinal: 1 },
				{ name: "email", type: "STRING", ordinal: 2 },
			],
		},
	],
	snowflake: [
		{
			table_id: "SALES.CUSTOMERS",
			source: "snowflake",
			schema: "SALES",
			name: "CUSTOMERS",
			row_count: 500,
			column_count: 2,
			columns: [
				{ name: "CUSTOMER_ID", type: "BIGINT", ordinal: 1 },
				{ name: "EMAIL", type: "STRING", ordinal: 2 },
			],
		},
	],
}

function fakeContext(config: CatalogConfig = DEFAULT_CONFIG) {
	const written: SimilarityEdge[][] = []
	// Texts mentioning email embed to [0, 1], everything else to [1, 0]
	const embedder: BatchEmbeddingProvider = {
		embedText: async (text) => (text.toLowerCase().includes("email") ? [0, 1] : [1, 0]),
	}
	const store: CatalogToolContext["store"] = {
		search: async () => [],
		getGraphContext: async () => new Map(),
		findTables: async () => [],
		tablesByRowCount: async () => [],
		relatedTables: async () => [],
		similarityEdges: async () => [],
		sensitiveTables: async () => [],
		extractTables: async (platform) => TABLES[platform],
		writeSimilarityEdges: async (edges) => {
			written.push(edges)
			return edges.length
		},
	}
	const ctx: CatalogToolContext = { config, store, embedder, engine: new CatalogQueryEngine(store, embedder) }
	return { ctx, written }
}

describe("runClassifyQuestion", () => {
	it("returns the intent and row threshold", () => {
		expect(runClassifyQuestion({ question: "Which tables have more than 100,000 rows?" }, fakeContext().ctx)).toEqual({
			question: "Which tables have more than 100,000 rows?",
			intent: "metadata_filter",
			row_threshold: { value: 100000, operator: "gt" },
		})
	})

	it("uses the configured platform keywords", () => {
		const config: CatalogConfig = { ...DEFAULT_CONFIG, routing: { ...DEFAULT_CONFIG.routing, platform_keywords: ["lakehouse"] } }
		expect(runClassifyQuestion({ question: "Find lakehouse tables" }, fakeContext(config).ctx).intent).toBe("databricks_discovery")
	})
})

describe("runRankCandidates", () => {
	const input = z.object(rankCandidatesShape).parse({ candidates: [{ id: "SALES.ORDERS", semantic_score: 0.9, centrality: 6 }] })

	it("ranks with the active profile and fills candidate defaults", () => {
		const [result] = runRankCandidates(input, fakeContext().ctx)
		expect(result.structural_score).toBe(1)
		expect(result.final_score).toBeCloseTo(0.92, 10)
		expect(result.row_count).toBe(0)
		expect(result.neighbors).toEqual([])
	})

	it("applies a named profile", () => {
		const [result] = runRankCandidates({ ...input, profile: "balanced" }, fakeContext().ctx)
		expect(result.final_score).toBeCloseTo(0.94, 10)
	})

	it("rejects an unknown profile", () => {
		expect(() => runRankCandidates({ ...input, profile: "aggressive" }, fakeContext().ctx)).toThrow(CatalogError)
	})
})

describe("runScoreTables", () => {
	it("scores identical tables as a high-confidence match and explains it", async () => {
		const input = z.object(scoreTablesShape).parse({
			table_a: { ...TABLES.databricks[0], column_embedding: [1, 0] },
			table_b: { ...TABLES.snowflake[0], column_embedding: [1, 0] },
		})
		const { score, explanation } = await runScoreTables(input, fakeContext().ctx)
		expect(score.total_score).toBeCloseTo(1, 10)
		expect(score.confidence).toBe("high")
		expect(score.matching_columns).toEqual([
			{ source_column: "customer_id", target_column: "CUSTOMER_ID", similarity: 1 },
			{ source_column: "email", target_column: "EMAIL", similarity: 1 },
		])
		expect(explanation).toBe(
			"The databricks table sales.customers is most similar to snowflake's SALES.CUSTOMERS with a 100.0% match score. " +
				"This similarity is driven by strong column name similarity, matching data type patterns, similar table sizes, common foreign key patterns. " +
				"Key matching columns include: customer_id↔CUSTOMER_ID, email↔EMAIL. " +
				"This high similarity suggests these may be duplicates or derived tables worth consolidating.",
		)
	})

	it("embeds each distinct column name once", async () => {
		const { ctx } = fakeContext()
		const texts: string[] = []
		const embedder: BatchEmbeddingProvider = {
			embedText: async (text) => {
				texts.push(text)
				return [1, 0]
			},
		}
		const input = z.object(scoreTablesShape).parse({
			table_a: { table_id: "a", source: "databricks", columns: [{ name: "order_id", type: "INT" }, { name: "Amount", type: "DECIMAL" }] },
			table_b: { table_id: "b", source: "snowflake", columns: [{ name: "ORDER_ID", type: "NUMBER" }] },
		})
		const { score } = await runScoreTables(input, { ...ctx, embedder })
		expect(texts).toEqual(["order_id", "Amount"])
		expect(score.matching_columns).toEqual([
			{ source_column: "order_id", target_column: "ORDER_ID", similarity: 1 },
			{ source_column: "Amount", target_column: "ORDER_ID", similarity: 1 },
		])
	})

	it("scores without column matches when names cannot be embedded", async () => {
		const { ctx } = fakeContext()
		const embedder: BatchEmbeddingProvider = {
			embedText: async () => {
				throw new Error("sidecar down")
			},
		}
		const input = z.object(scoreTablesShape).parse({
			table_a: { ...TABLES.databricks[0], column_embedding: [1, 0] },
			table_b: { ...TABLES.snowflake[0], column_embedding: [1, 0] },
		})
		const { score } = await runScoreTables(input, { ...ctx, embedder })
		expect(score.matching_columns).toEqual([])
		expect(score.failed_components).toEqual([])
		expect(score.total_score).toBeCloseTo(1, 10)
	})

	it("numbers columns without an ordinal by position", async () => {
		const input = z.object(scoreTablesShape).parse({
			table_a: { table_id: "a", source: "databricks", columns: [{ name: "id", type: "INT" }] },
			table_b: { table_id: "b", source: "snowflake", columns: [{ name: "id", type: "INT" }] },
		})
		const { score } = await runScoreTables(input, fakeContext().ctx)
		expect(score.type_overlap_score).toBe(1)
		expect(score.semantic_score).toBe(0)
	})
})

describe("runPlanRoute", () => {
	it("plans a single route above the configured threshold", () => {
		expect(runPlanRoute({ probabilities: { semantic_discovery: 0.9, metadata_filter: 0.1 } }, fakeContext().ctx)).toEqual({
			mode: "single",
			route: "semantic_discovery",
			confidence: 0.9,
		})
	})
})

describe("runDetectDuplicates", () => {
	it("sweeps the platforms and reports without writing by default", async () => {
		const { ctx, written } = fakeContext()
		const sweep = await runDetectDuplicates({}, ctx)

		expect(sweep.min_threshold).toBe(0.3)
		expect(sweep.matches).toHaveLength(1)
		expect(sweep.matches[0].confidence).toBe("high")
		expect(sweep.matches[0].matching_columns).toEqual([
			{ source_column: "customer_id", target_column: "CUSTOMER_ID", similarity: 1 },
			{ source_column: "email", target_column: "EMAIL", similarity: 1 },
		])
		expect(sweep.report.split("\n")[5]).toBe("Summary: 1 high, 0 medium, 0 low confidence matches")
		expect(sweep.edges_written).toBe(0)
		expect(written).toEqual([])
	})

	it("writes edges on request", async () => {
		const { ctx, written } = fakeContext()
		const sweep = await runDetectDuplicates({ write_edges: true }, ctx)
		expect(sweep.edges_written).toBe(1)
		expect(written[0].map((e) => [e.source_table, e.target_table])).toEqual([["sales.customers", "SALES.CUSTOMERS"]])
	})

	it("reports nothing above an unreachable threshold", async () => {
		const sweep = await runDetectDuplicates({ min_threshold: 1 }, fakeContext().ctx)
		expect(sweep.explanations).toHaveLength(sweep.matches.length)
		expect(sweep.matches.every((m) => m.total_score >= 1)).toBe(true)
	})
})

describe("toToolResult", () => {
	it("renders values as JSON text", async () => {
		await expect(toToolResult("plan_route", () => ({ mode: "single" }))).resolves.toEqual({
			content: [{ type: "text", text: '{\n  "mode": "single"\n}' }],
		})
	})

	it("renders catalog errors as tool errors", async () => {
		const result = await toToolResult("catalog_query", () => {
			throw new CatalogError("embedding", "Embedding sidecar unavailable", true)
		})
		expect(result).toEqual({
			content: [{ type: "text", text: '{"error":"embedding","message":"Embedding sidecar unavailable","recoverable":true}' }],
			isError: true,
		})
	})

	it("rethrows unexpected errors", async () => {
		await expect(
			toToolResult("catalog_query", () => {
				throw new Error("bug")
			}),
		).rejects.toThrow("bug")
	})
})
