/**
 * Table Signatures
 *
 * Builds the order-independent fingerprints the duplicate detector compares:
 * - type_signature: sorted, comma-joined type families (STRING, NUMERIC, ...)
 * - name_signature: sorted, comma-joined column names, lower-cased, no underscores
 *
 * Also normalizes the raw type strings each platform's extractor reports.
 */

import type { ColumnInfo, ExtractedTable, TableSignature } from "./catalog_types.js"

// ============================================================================
// Type Normalization
// ============================================================================

const TYPE_FAMILIES: Record<string, string> = {
	TEXT: "STRING",
	VARCHAR: "STRING",
	CHAR: "STRING",
	CHARACTER: "STRING",
	STRING: "STRING",
	NVARCHAR: "STRING",
	NUMBER: "NUMERIC",
	FIXED: "NUMERIC",
	NUMERIC: "NUMERIC",
	INT: "NUMERIC",
	INTEGER: "NUMERIC",
	FLOAT: "NUMERIC",
	REAL: "NUMERIC",
	DOUBLE: "NUMERIC",
	DECIMAL: "NUMERIC",
	BIGINT: "NUMERIC",
	SMALLINT: "NUMERIC",
	TINYINT: "NUMERIC",
	LONG: "NUMERIC",
	SHORT: "NUMERIC",
	BYTE: "NUMERIC",
	DATE: "DATETIME",
	TIME: "DATETIME",
	TIMESTAMP: "DATETIME",
	DATETIME: "DATETIME",
	TIMESTAMP_NTZ: "DATETIME",
	TIMESTAMP_LTZ: "DATETIME",
	TIMESTAMP_TZ: "DATETIME",
	BOOLEAN: "BOOLEAN",
	BOOL: "BOOLEAN",
}

/**
 * Map a raw type token to its family. Length/precision arguments are dropped
 * ("VARCHAR(255)" → STRING); unmapped tokens pass through upper-cased.
 */
export function normalizeType(rawType: string): string {
	const base = rawType.trim().toUpperCase().replace(/\s*\(.*\)\s*$/, "")
	if (!base) return "UNKNOWN"
	return TYPE_FAMILIES[base] ?? base
}

/**
 * Snowflake reports column types either as a plain name or as a JSON document
 * such as {"type":"TEXT","length":16777216}.
 */
export function parseSnowflakeType(typeStr: string | null | undefined): string {
	if (!typeStr) return "UNKNOWN"
	if (typeStr.startsWith("{")) {
		try {
			const parsed: unknown = JSON.parse(typeStr)
			if (typeof parsed === "object" && parsed !== null && "type" in parsed && typeof parsed.type === "string") {
				return parsed.type.toUpperCase()
			}
			return "UNKNOWN"
		} catch {
			return typeStr.toUpperCase()
		}
	}
	return typeStr.toUpperCase()
}

/** Databricks SDK enums render as "ColumnTypeName.STRING" */
export function parseDatabricksType(typeStr: string | null | undefined): string {
	if (!typeStr) return "UNKNOWN"
	return typeStr.replace(/^ColumnTypeName\./, "").toUpperCase()
}

export function normalizeColumnName(name: string): string {
	return name.toLowerCase().replace(/_/g, "")
}

// ============================================================================
// Signatures
// ============================================================================

export function computeTypeSignature(columns: readonly ColumnInfo[]): string {
	return columns
		.map((c) => normalizeType(c.type))
		.sort()
		.join(",")
}

export function computeNameSignature(columns: readonly ColumnInfo[]): string {
	return columns
		.map((c) => normalizeColumnName(c.name))
		.sort()
		.join(",")
}

/** Split a signature back into its token set; empty tokens are dropped. */
export function signatureTokens(signature: string): Set<string> {
	return new Set(signature.split(",").filter((token) => token.length > 0))
}

/** Text embedded for a table: its column names, space-joined. */
export function columnEmbeddingText(columns: readonly ColumnInfo[]): string {
	return columns
		.map((c) => c.name)
		.join(" ")
		.trim()
}

/**
 * Build a frozen signature from extracted metadata.
 *
 * Columns without a name are dropped. Missing counts fall back to 0 rows and
 * to the number of named columns.
 */
export function buildTableSignature(table: ExtractedTable, columnEmbedding: readonly number[] | null): TableSignature {
	const columns = table.columns
		.filter((c) => c.name.trim().length > 0)
		.map((c) => Object.freeze({ ...c }))
	const rowCount = table.row_count !== null && table.row_count > 0 ? Math.floor(table.row_count) : 0
	const columnCount = table.column_count !== null && table.column_count > 0 ? Math.floor(table.column_count) : columns.length

	return Object.freeze({
		table_id: table.table_id,
		source: table.source,
		schema: table.schema,
		name: table.name,
		row_count: rowCount,
		column_count: columnCount,
		columns: Object.freeze(columns),
		column_embedding: columns.length > 0 && columnEmbedding ? Object.freeze([...columnEmbedding]) : null,
		type_signature: computeTypeSignature(columns),
		name_signature: computeNameSignature(columns),
	})
}

/**
 * Copy of a signature with new columns. Both derived signatures are rebuilt;
 * the caller supplies the embedding of the new column set.
 */
export function withColumns(
	signature: TableSignature,
	columns: readonly ColumnInfo[],
	columnEmbedding: readonly number[] | null,
): TableSignature {
	return buildTableSignature(
		{
			table_id: signature.table_id,
			source: signature.source,
			schema: signature.schema,
			name: signature.name,
			row_count: signature.row_count,
			column_count: null,
			columns: [...columns],
		},
		columnEmbedding,
	)
}
