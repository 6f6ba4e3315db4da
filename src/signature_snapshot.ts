/**
 * Signature Snapshot
 *
 * Extracts table metadata from both platforms, embeds each table's column
 * names, and freezes the result. The duplicate sweep reads only from a
 * snapshot, never from the extractors directly.
 *
 * Failure split:
 * - extractor failure on either platform → CatalogError("extraction"), fatal
 * - every embedding call failing → CatalogError("embedding"), fatal
 * - a single table's embedding failing → warn, table kept with a null embedding
 */

import {
	PLATFORMS,
	type EmbeddingProvider,
	type ExtractedTable,
	type MetadataExtractor,
	type Platform,
	type TableSignature,
} from "./catalog_types.js"
import { CatalogError } from "./config.js"
import { silentLogger, type Logger } from "./logger.js"
import { buildTableSignature, columnEmbeddingText } from "./table_signature.js"

export interface SignatureSnapshot {
	readonly tables: Readonly<Record<Platform, readonly TableSignature[]>>
	readonly created_at: string
}

export function createSignatureSnapshot(
	tables: Record<Platform, readonly TableSignature[]>,
	createdAt: Date = new Date(),
): SignatureSnapshot {
	return Object.freeze({
		tables: Object.freeze({
			snowflake: Object.freeze([...tables.snowflake]),
			databricks: Object.freeze([...tables.databricks]),
		}),
		created_at: createdAt.toISOString(),
	})
}

/** Every distinct column name in the snapshot, in first-seen order. */
export function snapshotColumnNames(snapshot: SignatureSnapshot): string[] {
	const names = new Set<string>()
	for (const platform of PLATFORMS) {
		for (const table of snapshot.tables[platform]) {
			for (const column of table.columns) names.add(column.name)
		}
	}
	return [...names]
}

async function extractPlatform(extractor: MetadataExtractor, platform: Platform): Promise<ExtractedTable[]> {
	try {
		return await extractor.extractTables(platform)
	} catch (err) {
		throw new CatalogError("extraction", `Metadata extraction failed for ${platform}: ${String(err)}`, false, {
			platform,
		})
	}
}

export async function buildSignatureSnapshot(
	extractor: MetadataExtractor,
	embedder: EmbeddingProvider,
	logger: Logger = silentLogger,
): Promise<SignatureSnapshot> {
	const startTime = Date.now()
	const tables: Record<Platform, TableSignature[]> = { snowflake: [], databricks: [] }
	let attempted = 0
	let failed = 0

	for (const platform of PLATFORMS) {
		const extracted = await extractPlatform(extractor, platform)

		for (const table of extracted) {
			const text = columnEmbeddingText(table.columns.filter((c) => c.name.trim().length > 0))
			let embedding: number[] | null = null

			if (text) {
				attempted++
				try {
					embedding = await embedder.embedText(text)
				} catch (err) {
					failed++
					logger.warn("Column embedding failed, table kept without one", {
						table_id: table.table_id,
						platform,
						error: String(err),
					})
				}
			}

			tables[platform].push(buildTableSignature(table, embedding))
		}

		logger.info("Extracted signatures", { platform, tables: tables[platform].length })
	}

	if (attempted > 0 && failed === attempted) {
		throw new CatalogError("embedding", `All ${attempted} column embedding calls failed`, false)
	}

	logger.info("Signature snapshot built", {
		snowflake: tables.snowflake.length,
		databricks: tables.databricks.length,
		embedding_failures: failed,
		duration_ms: Date.now() - startTime,
	})

	return createSignatureSnapshot(tables)
}
