import { describe, it, expect } from "vitest"
import {
	TableSimilarityScorer,
	columnCountSimilarity,
	combineComponents,
	confidenceFor,
	findColumnMatches,
	foreignKeyEntities,
	rowCountSimilarity,
	scoreTables,
	type ColumnVectorLookup,
} from "./table_similarity.js"
import { buildTableSignature } from "./table_signature.js"
import { CatalogError } from "./config.js"
import type { Logger } from "./logger.js"
import type { Platform, TableSignature } from "./catalog_types.js"

function table(
	id: string,
	source: Platform,
	columns: Array<[string, string]>,
	rowCount: number | null,
	embedding: number[] | null,
): TableSignature {
	return buildTableSignature(
		{
			table_id: id,
			source,
			schema: "SALES",
			name: id,
			row_count: rowCount,
			column_count: null,
			columns: columns.map(([name, type], i) => ({ name, type, ordinal: i + 1 })),
		},
		embedding,
	)
}

function lookupFrom(vectors: Record<string, number[]>): ColumnVectorLookup {
	return { vectorFor: (name) => vectors[name] ?? null }
}

function recordingLogger(): { logger: Logger; warnings: string[] } {
	const warnings: string[] = []
	const noop = () => {}
	return {
		warnings,
		logger: { debug: noop, info: noop, error: noop, warn: (message) => warnings.push(message) },
	}
}

const CUSTOMER_COLUMNS: Array<[string, string]> = [
	["customer_id", "NUMBER"],
	["name", "VARCHAR(100)"],
	["created_at", "TIMESTAMP_NTZ"],
]

describe("component functions", () => {
	it("scores equal row counts as 1 and three orders of magnitude apart as ~0", () => {
		expect(rowCountSimilarity(1000, 1000)).toBe(1)
		const far = rowCountSimilarity(1000, 1_000_000)
		expect(far).toBeCloseTo(1 - (Math.log10(1_000_001) - Math.log10(1001)) / 3, 12)
		expect(far).toBeGreaterThan(0)
		expect(far).toBeLessThan(0.001)
		expect(rowCountSimilarity(10, 1_000_000_000)).toBe(0)
	})

	it("scores missing row statistics as 0.5 against any count", () => {
		expect(rowCountSimilarity(0, 0)).toBe(0.5)
		expect(rowCountSimilarity(0, 1_000_000)).toBe(0.5)
		expect(rowCountSimilarity(1_000_000, 0)).toBe(0.5)
	})

	it("compares column counts as min/max", () => {
		expect(columnCountSimilarity(3, 6)).toBe(0.5)
		expect(columnCountSimilarity(6, 3)).toBe(0.5)
		expect(columnCountSimilarity(0, 0)).toBe(0)
	})

	it("infers foreign-key entities from _id and _key suffixes", () => {
		const entities = foreignKeyEntities([
			{ name: "customer_id", type: "NUMBER", ordinal: 1 },
			{ name: "ORDER_KEY", type: "NUMBER", ordinal: 2 },
			{ name: "id", type: "NUMBER", ordinal: 3 },
			{ name: "name", type: "TEXT", ordinal: 4 },
		])
		expect([...entities].sort()).toEqual(["customer", "order"])
	})

	it("combines components with the default weights", () => {
		expect(combineComponents({ semantic: 1, schema: 0, statistical: 0, relationship: 0 })).toBeCloseTo(0.4, 12)
		expect(combineComponents({ semantic: 0, schema: 1, statistical: 0, relationship: 0 })).toBeCloseTo(0.25, 12)
	})

	it("assigns confidence tiers at inclusive boundaries", () => {
		expect(confidenceFor(0.75)).toBe("high")
		expect(confidenceFor(0.749999)).toBe("medium")
		expect(confidenceFor(0.5)).toBe("medium")
		expect(confidenceFor(0.499999)).toBe("low")
	})
})

describe("findColumnMatches", () => {
	it("keeps each source column's best target at or above the threshold", () => {
		const a = table("A", "snowflake", CUSTOMER_COLUMNS, 10, [1, 0])
		const b = table("B", "databricks", CUSTOMER_COLUMNS, 10, [1, 0])
		const lookup = lookupFrom({ customer_id: [1, 0], name: [0, 1], created_at: [1, 1] })
		expect(findColumnMatches(a, b, lookup)).toEqual([
			{ source_column: "customer_id", target_column: "customer_id", similarity: 1 },
			{ source_column: "name", target_column: "name", similarity: 1 },
			{ source_column: "created_at", target_column: "created_at", similarity: 1 },
		])
	})

	it("lets two source columns claim the same target", () => {
		const a = table("A", "snowflake", [["cust_id", "NUMBER"], ["client_id", "NUMBER"]], 10, [1, 0])
		const b = table("B", "databricks", [["customer_id", "BIGINT"]], 10, [1, 0])
		const lookup = lookupFrom({ cust_id: [1, 0], client_id: [0.9, 0.1], customer_id: [1, 0] })
		expect(findColumnMatches(a, b, lookup)).toEqual([
			{ source_column: "cust_id", target_column: "customer_id", similarity: 1 },
			{ source_column: "client_id", target_column: "customer_id", similarity: 0.994 },
		])
	})

	it("drops pairs below the threshold and columns without vectors", () => {
		const a = table("A", "snowflake", [["x", "TEXT"], ["unknown", "TEXT"]], 10, [1, 0])
		const b = table("B", "databricks", [["y", "STRING"]], 10, [1, 0])
		const lookup = lookupFrom({ x: [1, 0], y: [0.6, 0.8] })
		expect(findColumnMatches(a, b, lookup)).toEqual([])
		expect(findColumnMatches(a, b, lookup, 0.5)).toEqual([
			{ source_column: "x", target_column: "y", similarity: 0.6 },
		])
	})
})

describe("TableSimilarityScorer.score", () => {
	it("scores a renamed copy as a high-confidence match", () => {
		const a = table("SALES.CUSTOMERS", "snowflake", CUSTOMER_COLUMNS, 1000, [0.6, 0.8])
		const b = table("workspace.sales.customers", "databricks", CUSTOMER_COLUMNS, 1000, [0.6, 0.8])
		const score = scoreTables(a, b)
		expect(score.semantic_score).toBeCloseTo(1, 12)
		expect(score.schema_score).toBe(1)
		expect(score.statistical_score).toBe(1)
		expect(score.relationship_score).toBe(1)
		expect(score.total_score).toBeCloseTo(1, 10)
		expect(score.confidence).toBe("high")
		expect(score.source_platform).toBe("snowflake")
		expect(score.target_platform).toBe("databricks")
		expect(score.failed_components).toEqual([])
	})

	it("computes each component of a partial match", () => {
		const a = table(
			"ORDERS",
			"snowflake",
			[["customer_id", "NUMBER"], ["order_id", "NUMBER"], ["amount", "DECIMAL(10,2)"]],
			1000,
			[1, 0],
		)
		const b = table("customers", "databricks", [["customer_id", "INT"], ["name", "STRING"]], 1000, [0, 1])
		const score = scoreTables(a, b)
		expect(score.semantic_score).toBe(0)
		expect(score.type_overlap_score).toBe(0.5)
		expect(score.name_overlap_score).toBe(0.25)
		expect(score.schema_score).toBe(0.375)
		expect(score.statistical_score).toBeCloseTo((1 + 2 / 3) / 2, 12)
		expect(score.relationship_score).toBe(0.5)
		// 0.25*0.375 + 0.20*0.8333 + 0.15*0.5
		expect(score.total_score).toBeCloseTo(0.3354167, 6)
		expect(score.confidence).toBe("low")
	})

	describe("symmetry and bounds", () => {
		const signatures: TableSignature[] = [
			table("ORDERS", "snowflake", [["customer_id", "NUMBER"], ["total", "FLOAT"]], 5000, [0.3, 0.9, 0.1]),
			table("sales", "databricks", [["customer_id", "BIGINT"], ["amount", "DOUBLE"], ["ts", "TIMESTAMP"]], 40, [0.5, 0.5, 0.7]),
			table("CUSTOMERS", "snowflake", CUSTOMER_COLUMNS, 1000, [0.6, 0.8, 0]),
			table("customers_raw", "databricks", CUSTOMER_COLUMNS, null, [0.2, 0.9, 0.4]),
			table("EMPTY", "snowflake", [], 0, null),
			table("order_lines", "databricks", [["order_id", "NUMBER"], ["line_key", "INT"]], 5_000_000, null),
		]
		const pairs = signatures.flatMap((a, i) =>
			signatures.slice(i).map((b): [string, string, TableSignature, TableSignature] => [a.table_id, b.table_id, a, b]),
		)

		it.each(pairs)("scores %s and %s the same in both directions", (_idA, _idB, a, b) => {
			const ab = scoreTables(a, b)
			const ba = scoreTables(b, a)
			expect(ba.semantic_score).toBe(ab.semantic_score)
			expect(ba.type_overlap_score).toBe(ab.type_overlap_score)
			expect(ba.name_overlap_score).toBe(ab.name_overlap_score)
			expect(ba.statistical_score).toBe(ab.statistical_score)
			expect(ba.relationship_score).toBe(ab.relationship_score)
			expect(ba.total_score).toBe(ab.total_score)
			expect(ba.confidence).toBe(ab.confidence)
		})

		it.each(pairs)("keeps every component of %s vs %s in [0, 1]", (_idA, _idB, a, b) => {
			const score = scoreTables(a, b)
			for (const value of [
				score.semantic_score,
				score.type_overlap_score,
				score.name_overlap_score,
				score.schema_score,
				score.statistical_score,
				score.relationship_score,
				score.total_score,
			]) {
				expect(value).toBeGreaterThanOrEqual(0)
				expect(value).toBeLessThanOrEqual(1)
			}
		})
	})

	it("scores unknown row counts as half similar", () => {
		const unknown = table("customers_raw", "databricks", CUSTOMER_COLUMNS, null, [1, 0])
		const large = table("CUSTOMERS", "snowflake", CUSTOMER_COLUMNS, 1_000_000, [1, 0])
		expect(unknown.row_count).toBe(0)
		expect(scoreTables(unknown, large).statistical_score).toBe(0.75)
	})

	it("stays in bounds for tables without columns", () => {
		const a = table("EMPTY_A", "snowflake", [], 0, null)
		const b = table("empty_b", "databricks", [], 0, null)
		const score = scoreTables(a, b)
		// statistical = (unknown rows 0.5 + no columns 0) / 2
		expect(score.statistical_score).toBe(0.25)
		expect(score.total_score).toBeCloseTo(0.05, 12)
		expect(score.confidence).toBe("low")
		expect(score.matching_columns).toEqual([])
	})

	it("honors per-call weights and rejects invalid ones", () => {
		const a = table("A", "snowflake", CUSTOMER_COLUMNS, 1000, [1, 0])
		const b = table("B", "databricks", CUSTOMER_COLUMNS, 10, [0, 1])
		const scorer = new TableSimilarityScorer()
		const semanticOnly = scorer.score(a, b, { semantic: 1, schema: 0, statistical: 0, relationship: 0 })
		expect(semanticOnly.total_score).toBe(0)
		expect(() => scorer.score(a, b, { semantic: 0.5, schema: 0.5, statistical: 0.5, relationship: 0 })).toThrow(CatalogError)
	})

	it("isolates a failing component, logs it and scores it 0", () => {
		const a = table("A", "snowflake", CUSTOMER_COLUMNS, 1000, [1, 0])
		const b = table("B", "databricks", CUSTOMER_COLUMNS, 1000, [1, 0])
		const failingLookup: ColumnVectorLookup = {
			vectorFor: () => {
				throw new Error("embedding cache unavailable")
			},
		}
		const { logger, warnings } = recordingLogger()
		const score = new TableSimilarityScorer({}, failingLookup, logger).score(a, b)
		expect(score.failed_components).toEqual(["matching"])
		expect(score.matching_columns).toEqual([])
		expect(score.total_score).toBeCloseTo(1, 10)
		expect(warnings).toEqual(["Similarity component failed, scoring it 0"])
	})

	it("drops only the semantic weight when the embedding read fails", () => {
		const base = table("A", "snowflake", CUSTOMER_COLUMNS, 1000, [1, 0])
		const broken: TableSignature = {
			...base,
			get column_embedding(): readonly number[] | null {
				throw new Error("corrupt vector")
			},
		}
		const score = scoreTables(broken, base)
		expect(score.failed_components).toEqual(["semantic"])
		expect(score.semantic_score).toBe(0)
		expect(score.total_score).toBeCloseTo(0.6, 10)
	})
})
