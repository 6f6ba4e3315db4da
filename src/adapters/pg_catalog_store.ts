/**
 * PostgreSQL Catalog Store
 *
 * pg + pgvector implementation of the catalog collaborators:
 * - ANN search over table embeddings (cosine distance, `<=>`)
 * - graph context: centrality = number of relationship edges; SIMILAR_TO
 *   edges are stored apart and never counted
 * - metadata extraction for the duplicate sweep
 * - SIMILAR_TO edge persistence (upsert)
 *
 * Tables live in the `catalog` schema; see sql/catalog_schema.sql.
 */

import { z } from "zod"
import {
	PLATFORMS,
	type CatalogStore,
	type CatalogTableRow,
	type EdgeRelationship,
	type ExtractedTable,
	type GraphContext,
	type MetadataExtractor,
	type Platform,
	type RelatedTableRow,
	type RowOrder,
	type RowThreshold,
	type SearchHit,
	type SensitiveTableRow,
	type SimilarityEdge,
	type SimilarityEdgeWriter,
	type StoredSimilarityRow,
	type ThresholdOperator,
} from "../catalog_types.js"
import { CatalogError } from "../config.js"
import { silentLogger, type Logger } from "../logger.js"
import { parseDatabricksType, parseSnowflakeType } from "../table_signature.js"

/** The slice of pg.Pool / pg.Client the store uses */
export interface SqlClient {
	query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>
}

export const MAX_CONTEXT_NEIGHBORS = 3
export const SENSITIVE_LEVELS = ["high", "critical", "confidential"]

// ============================================================================
// Row Schemas
// ============================================================================

// pg returns bigint and numeric columns as strings
const count = z.coerce.number().int().nonnegative()
const score = z.coerce.number()
const platform = z.enum(PLATFORMS)

const tableRowSchema = z.object({
	table_id: z.string(),
	source: platform,
	schema_name: z.string(),
	table_name: z.string(),
	row_count: count.nullable(),
	column_count: count.nullable(),
})

const searchRowSchema = z.object({
	table_id: z.string(),
	table_name: z.string(),
	source: platform,
	similarity: score,
})

const graphRowSchema = z.object({
	table_id: z.string(),
	row_count: count.nullable(),
	centrality: count,
	neighbors: z.array(z.string()).nullable(),
})

const extractedRowSchema = tableRowSchema.extend({
	columns: z.array(
		z.object({
			name: z.string().nullable(),
			type: z.string().nullable(),
			ordinal: count.nullable(),
		}),
	),
})

const relatedRowSchema = tableRowSchema.extend({
	relationship: z.enum(["FOREIGN_KEY", "DERIVES_FROM", "FEEDS_INTO"]),
	direction: z.enum(["outgoing", "incoming"]),
})

const similarityRowSchema = z.object({
	source_table: z.string(),
	target_table: z.string(),
	source_platform: platform,
	target_platform: platform,
	score,
	confidence: z.enum(["high", "medium", "low"]),
	matching_columns: z.string().nullable(),
})

const sensitiveRowSchema = tableRowSchema.extend({
	sensitive_columns: count,
})

function parseRow<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
	const parsed = schema.safeParse(raw)
	if (!parsed.success) {
		throw new CatalogError("validation", "Unexpected row shape from the catalog database", false, {
			issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
		})
	}
	return parsed.data
}

function toTableRow(row: z.infer<typeof tableRowSchema>): CatalogTableRow {
	return {
		table_id: row.table_id,
		source: row.source,
		schema: row.schema_name,
		name: row.table_name,
		row_count: row.row_count ?? 0,
		column_count: row.column_count ?? 0,
	}
}

const TABLE_COLUMNS = `t.table_id, t.source, t.schema_name, t.table_name, t.row_count, t.column_count`

const SQL_OPERATORS: Record<ThresholdOperator, string> = {
	gt: ">",
	gte: ">=",
	lt: "<",
	lte: "<=",
}

const TYPE_PARSERS: Record<Platform, (raw: string | null) => string> = {
	snowflake: parseSnowflakeType,
	databricks: parseDatabricksType,
}

// ============================================================================
// Store
// ============================================================================

export class PgCatalogStore implements CatalogStore, MetadataExtractor, SimilarityEdgeWriter {
	private client: SqlClient
	private logger: Logger

	constructor(client: SqlClient, logger: Logger = silentLogger) {
		this.client = client
		this.logger = logger
	}

	/**
	 * Nearest tables to the query embedding, most similar first.
	 */
	async search(queryEmbedding: number[], topK: number, platformFilter?: Platform): Promise<SearchHit[]> {
		// Format embedding as PostgreSQL vector literal
		const vectorLiteral = `[${queryEmbedding.join(",")}]`
		const rows = await this.read(
			"search",
			`
				SELECT
					t.table_id,
					t.table_name,
					t.source,
					1 - (t.embedding <=> $1::vector) AS similarity
				FROM catalog.tables t
				WHERE t.embedding IS NOT NULL
					AND ($3::text IS NULL OR t.source = $3)
				ORDER BY t.embedding <=> $1::vector
				LIMIT $2
			`,
			[vectorLiteral, topK, platformFilter ?? null],
		)

		return rows.map((raw) => {
			const row = parseRow(searchRowSchema, raw)
			return { entity_id: row.table_id, table_name: row.table_name, source: row.source, similarity: row.similarity }
		})
	}

	async getGraphContext(entityIds: string[]): Promise<Map<string, GraphContext>> {
		const context = new Map<string, GraphContext>()
		if (entityIds.length === 0) return context

		const rows = await this.read(
			"search",
			`
				SELECT
					t.table_id,
					t.row_count,
					(
						SELECT COUNT(*)
						FROM catalog.edges e
						WHERE e.source_id = t.table_id OR e.target_id = t.table_id
					) AS centrality,
					ARRAY(
						SELECT DISTINCT CASE WHEN e.source_id = t.table_id THEN e.target_id ELSE e.source_id END AS neighbor
						FROM catalog.edges e
						WHERE e.source_id = t.table_id OR e.target_id = t.table_id
						ORDER BY neighbor
						LIMIT $2
					) AS neighbors
				FROM catalog.tables t
				WHERE t.table_id = ANY($1)
			`,
			[entityIds, MAX_CONTEXT_NEIGHBORS],
		)

		for (const raw of rows) {
			const row = parseRow(graphRowSchema, raw)
			context.set(row.table_id, {
				row_count: row.row_count ?? 0,
				centrality: row.centrality,
				neighbors: (row.neighbors ?? []).slice(0, MAX_CONTEXT_NEIGHBORS),
			})
		}
		return context
	}

	async findTables(name: string): Promise<CatalogTableRow[]> {
		const rows = await this.read(
			"search",
			`
				SELECT ${TABLE_COLUMNS}
				FROM catalog.tables t
				WHERE lower(t.table_name) = lower($1) OR lower(t.table_id) = lower($1)
				ORDER BY t.table_id
			`,
			[name],
		)
		return rows.map((raw) => toTableRow(parseRow(tableRowSchema, raw)))
	}

	async tablesByRowCount(threshold: RowThreshold | null, order: RowOrder, limit: number): Promise<CatalogTableRow[]> {
		const direction = order === "asc" ? "ASC" : "DESC"
		const where = threshold ? `WHERE t.row_count ${SQL_OPERATORS[threshold.operator]} $2` : ""
		const values: unknown[] = threshold ? [limit, threshold.value] : [limit]

		const rows = await this.read(
			"search",
			`
				SELECT ${TABLE_COLUMNS}
				FROM catalog.tables t
				${where}
				ORDER BY t.row_count ${direction} NULLS LAST, t.table_id
				LIMIT $1
			`,
			values,
		)
		return rows.map((raw) => toTableRow(parseRow(tableRowSchema, raw)))
	}

	async relatedTables(tableId: string, relationships: readonly EdgeRelationship[], limit: number): Promise<RelatedTableRow[]> {
		const rows = await this.read(
			"search",
			`
				SELECT
					${TABLE_COLUMNS},
					e.relationship,
					CASE WHEN e.source_id = $1 THEN 'outgoing' ELSE 'incoming' END AS direction
				FROM catalog.edges e
				JOIN catalog.tables t
					ON t.table_id = CASE WHEN e.source_id = $1 THEN e.target_id ELSE e.source_id END
				WHERE (e.source_id = $1 OR e.target_id = $1)
					AND e.relationship = ANY($2)
				ORDER BY t.row_count DESC NULLS LAST, t.table_id
				LIMIT $3
			`,
			[tableId, [...relationships], limit],
		)
		return rows.map((raw) => {
			const row = parseRow(relatedRowSchema, raw)
			return { ...toTableRow(row), relationship: row.relationship, direction: row.direction }
		})
	}

	async similarityEdges(tableId: string | null, limit: number): Promise<StoredSimilarityRow[]> {
		const rows = await this.read(
			"search",
			`
				SELECT source_table, target_table, source_platform, target_platform, score, confidence, matching_columns
				FROM catalog.similarity_edges
				WHERE $1::text IS NULL OR source_table = $1 OR target_table = $1
				ORDER BY score DESC, source_table, target_table
				LIMIT $2
			`,
			[tableId, limit],
		)
		return rows.map((raw) => {
			const row = parseRow(similarityRowSchema, raw)
			return { ...row, matching_columns: row.matching_columns ?? "" }
		})
	}

	async sensitiveTables(limit: number): Promise<SensitiveTableRow[]> {
		const rows = await this.read(
			"search",
			`
				SELECT ${TABLE_COLUMNS}, COUNT(*) AS sensitive_columns
				FROM catalog.tables t
				JOIN catalog.columns c ON c.table_id = t.table_id
				WHERE lower(c.sensitivity) = ANY($1)
				GROUP BY t.table_id
				ORDER BY sensitive_columns DESC, t.table_id
				LIMIT $2
			`,
			[SENSITIVE_LEVELS, limit],
		)
		return rows.map((raw) => {
			const row = parseRow(sensitiveRowSchema, raw)
			return { ...toTableRow(row), sensitive_columns: row.sensitive_columns }
		})
	}

	/**
	 * Tables and columns of one platform, with raw types normalised the way
	 * that platform reports them.
	 */
	async extractTables(source: Platform): Promise<ExtractedTable[]> {
		const rows = await this.read(
			"extraction",
			`
				SELECT
					${TABLE_COLUMNS},
					COALESCE(
						json_agg(
							json_build_object('name', c.column_name, 'type', c.data_type, 'ordinal', c.ordinal)
							ORDER BY c.ordinal
						) FILTER (WHERE c.column_name IS NOT NULL),
						'[]'
					) AS columns
				FROM catalog.tables t
				LEFT JOIN catalog.columns c ON c.table_id = t.table_id
				WHERE t.source = $1
				GROUP BY t.table_id
				ORDER BY t.table_id
			`,
			[source],
		)

		const parseType = TYPE_PARSERS[source]
		const tables = rows.map((raw): ExtractedTable => {
			const row = parseRow(extractedRowSchema, raw)
			return {
				table_id: row.table_id,
				source: row.source,
				schema: row.schema_name,
				name: row.table_name,
				row_count: row.row_count,
				column_count: row.column_count,
				columns: row.columns.map((c, i) => ({
					name: c.name ?? "",
					type: parseType(c.type),
					ordinal: c.ordinal ?? i + 1,
				})),
			}
		})

		this.logger.debug("Extracted tables", { platform: source, tables: tables.length })
		return tables
	}

	/**
	 * Upsert SIMILAR_TO edges in a single statement. Returns the number of rows written.
	 */
	async writeSimilarityEdges(edges: SimilarityEdge[]): Promise<number> {
		if (edges.length === 0) return 0

		const column = <K extends keyof SimilarityEdge>(key: K): Array<SimilarityEdge[K]> => edges.map((e) => e[key])
		const sql = `
			INSERT INTO catalog.similarity_edges (
				source_table, target_table, source_platform, target_platform,
				score, confidence, semantic_score, type_overlap, name_overlap,
				statistical_score, relationship_score, matching_columns, algorithm, detected_at
			)
			SELECT *, now()
			FROM unnest(
				$1::text[], $2::text[], $3::text[], $4::text[],
				$5::float8[], $6::text[], $7::float8[], $8::float8[], $9::float8[],
				$10::float8[], $11::float8[], $12::text[], $13::text[]
			)
			ON CONFLICT (source_table, target_table) DO UPDATE SET
				score = EXCLUDED.score,
				confidence = EXCLUDED.confidence,
				semantic_score = EXCLUDED.semantic_score,
				type_overlap = EXCLUDED.type_overlap,
				name_overlap = EXCLUDED.name_overlap,
				statistical_score = EXCLUDED.statistical_score,
				relationship_score = EXCLUDED.relationship_score,
				matching_columns = EXCLUDED.matching_columns,
				algorithm = EXCLUDED.algorithm,
				detected_at = EXCLUDED.detected_at
		`
		const values = [
			column("source_table"),
			column("target_table"),
			column("source_platform"),
			column("target_platform"),
			column("score"),
			column("confidence"),
			column("semantic_score"),
			column("type_overlap"),
			column("name_overlap"),
			column("statistical_score"),
			column("relationship_score"),
			column("matching_columns"),
			column("algorithm"),
		]

		try {
			const result = await this.client.query(sql, values)
			const written = result.rowCount ?? edges.length
			this.logger.info("Upserted SIMILAR_TO edges", { edges: written })
			return written
		} catch (err) {
			throw new CatalogError("persistence", `Failed to write similarity edges: ${String(err)}`, true, {
				edges: edges.length,
			})
		}
	}

	private async read(
		kind: "search" | "extraction",
		sql: string,
		values: unknown[],
	): Promise<unknown[]> {
		try {
			const result = await this.client.query(sql, values)
			return result.rows
		} catch (err) {
			this.logger.error("Catalog query failed", { kind, error: String(err) })
			throw new CatalogError(kind, `Catalog query failed: ${String(err)}`, kind === "search", {
				originalError: String(err),
			})
		}
	}
}
