/**
 * Cross-Source Duplicate Detector
 *
 * Scores every (source, target) table pair across the two platforms, keeps
 * pairs at or above the minimum threshold, and turns them into SIMILAR_TO
 * edges, a text report, or a template explanation.
 *
 * There is no one-to-one constraint: the same table may appear in several
 * pairs.
 */

import type { Platform, SimilarityEdge, SimilarityEdgeWriter, SimilarityScore, TableSignature } from "./catalog_types.js"
import { silentLogger, type Logger } from "./logger.js"
import { roundTo } from "./similarity_math.js"
import type { SignatureSnapshot } from "./signature_snapshot.js"
import { TableSimilarityScorer } from "./table_similarity.js"

export const DEFAULT_MIN_SIMILARITY_THRESHOLD = 0.3
export const SIMILARITY_ALGORITHM = "multi-factor-metadata"

const REPORT_MAX_COLUMN_MATCHES = 5
const EXPLANATION_MAX_COLUMN_MATCHES = 2

// ============================================================================
// Detection
// ============================================================================

export function compareScores(a: SimilarityScore, b: SimilarityScore): number {
	if (b.total_score !== a.total_score) return b.total_score - a.total_score
	if (a.source_table !== b.source_table) return a.source_table < b.source_table ? -1 : 1
	if (a.target_table !== b.target_table) return a.target_table < b.target_table ? -1 : 1
	return 0
}

/**
 * Score the full cross product (A as source, B as target) and keep pairs with
 * total_score ≥ minThreshold, best first.
 */
export function detectDuplicates(
	tablesA: readonly TableSignature[],
	tablesB: readonly TableSignature[],
	minThreshold: number = DEFAULT_MIN_SIMILARITY_THRESHOLD,
	scorer: TableSimilarityScorer = new TableSimilarityScorer(),
): SimilarityScore[] {
	const results: SimilarityScore[] = []
	for (const source of tablesA) {
		for (const target of tablesB) {
			const score = scorer.score(source, target)
			if (score.total_score >= minThreshold) results.push(score)
		}
	}
	return results.sort(compareScores)
}

// ============================================================================
// Edges
// ============================================================================

export function formatColumnMatches(score: SimilarityScore): string {
	return score.matching_columns.map((m) => `${m.source_column}->${m.target_column} (${m.similarity})`).join("; ")
}

export function similarityEdgesFrom(
	results: readonly SimilarityScore[],
	minThreshold: number = DEFAULT_MIN_SIMILARITY_THRESHOLD,
): SimilarityEdge[] {
	return results
		.filter((score) => score.total_score >= minThreshold)
		.map((score) => ({
			source_table: score.source_table,
			target_table: score.target_table,
			source_platform: score.source_platform,
			target_platform: score.target_platform,
			score: roundTo(score.total_score, 4),
			confidence: score.confidence,
			semantic_score: roundTo(score.semantic_score, 4),
			type_overlap: roundTo(score.type_overlap_score, 4),
			name_overlap: roundTo(score.name_overlap_score, 4),
			statistical_score: roundTo(score.statistical_score, 4),
			relationship_score: roundTo(score.relationship_score, 4),
			matching_columns: formatColumnMatches(score),
			algorithm: SIMILARITY_ALGORITHM,
		}))
}

// ============================================================================
// Report & Explanation
// ============================================================================

function percent(value: number, digits: number = 2): string {
	return `${(value * 100).toFixed(digits)}%`
}

export function formatSimilarityReport(results: readonly SimilarityScore[]): string {
	const count = (confidence: SimilarityScore["confidence"]) => results.filter((r) => r.confidence === confidence).length

	const lines: string[] = [
		"=".repeat(70),
		"Cross-Source Duplicate Detection Report",
		`Algorithm: ${SIMILARITY_ALGORITHM}`,
		"=".repeat(70),
		"",
		`Summary: ${count("high")} high, ${count("medium")} medium, ${count("low")} low confidence matches`,
		"",
	]

	for (const score of results) {
		lines.push("─".repeat(60))
		lines.push(`${score.source_table} (${score.source_platform})`)
		lines.push(`   ↔ ${score.target_table} (${score.target_platform})`)
		lines.push(`   Total Score: ${percent(score.total_score)} (${score.confidence.toUpperCase()})`)
		lines.push(`   ├─ Semantic (embeddings): ${percent(score.semantic_score)}`)
		lines.push(`   ├─ Type overlap:          ${percent(score.type_overlap_score)}`)
		lines.push(`   ├─ Name overlap:          ${percent(score.name_overlap_score)}`)
		lines.push(`   ├─ Statistical:           ${percent(score.statistical_score)}`)
		lines.push(`   └─ Relationship:          ${percent(score.relationship_score)}`)

		if (score.matching_columns.length > 0) {
			lines.push("   Column Matches:")
			for (const m of score.matching_columns.slice(0, REPORT_MAX_COLUMN_MATCHES)) {
				lines.push(`      • ${m.source_column} → ${m.target_column} (${percent(m.similarity, 0)})`)
			}
		}
		lines.push("")
	}

	return lines.join("\n")
}

export function matchDrivers(score: SimilarityScore): string[] {
	const drivers: string[] = []
	if (score.semantic_score > 0.3) {
		drivers.push("strong column name similarity")
	} else if (score.semantic_score > 0.15) {
		drivers.push("moderate column name overlap")
	}
	if (score.schema_score > 0.3) drivers.push("matching data type patterns")
	if (score.statistical_score > 0.3) drivers.push("similar table sizes")
	if (score.relationship_score > 0.2) drivers.push("common foreign key patterns")
	return drivers
}

/**
 * Template explanation of a single match, for when no language model is
 * available to write one.
 */
export function explainMatch(score: SimilarityScore): string {
	const drivers = matchDrivers(score)
	const reason = drivers.length > 0 ? drivers.join(", ") : "shared semantic characteristics"

	const parts = [
		`The ${score.source_platform} table ${score.source_table} is most similar to ` +
			`${score.target_platform}'s ${score.target_table} with a ${percent(score.total_score, 1)} match score.`,
		`This similarity is driven by ${reason}.`,
	]

	const examples = score.matching_columns
		.slice(0, EXPLANATION_MAX_COLUMN_MATCHES)
		.map((m) => `${m.source_column}↔${m.target_column}`)
	if (examples.length > 0) {
		parts.push(`Key matching columns include: ${examples.join(", ")}.`)
	}

	if (score.total_score > 0.35) {
		parts.push("This high similarity suggests these may be duplicates or derived tables worth consolidating.")
	} else if (score.total_score > 0.25) {
		parts.push("Consider reviewing these tables for potential federation or data lineage relationships.")
	}

	return parts.join(" ")
}

// ============================================================================
// Detector
// ============================================================================

export interface DuplicateDetectorConfig {
	minThreshold: number
	sourcePlatform: Platform
	targetPlatform: Platform
}

export const DEFAULT_DUPLICATE_DETECTOR_CONFIG: DuplicateDetectorConfig = {
	minThreshold: DEFAULT_MIN_SIMILARITY_THRESHOLD,
	sourcePlatform: "databricks",
	targetPlatform: "snowflake",
}

/**
 * Runs the sweep over one immutable signature snapshot.
 */
export class DuplicateDetector {
	private snapshot: SignatureSnapshot
	private scorer: TableSimilarityScorer
	private config: DuplicateDetectorConfig
	private logger: Logger

	constructor(
		snapshot: SignatureSnapshot,
		scorer: TableSimilarityScorer = new TableSimilarityScorer(),
		config?: Partial<DuplicateDetectorConfig>,
		logger: Logger = silentLogger,
	) {
		this.snapshot = snapshot
		this.scorer = scorer
		this.config = { ...DEFAULT_DUPLICATE_DETECTOR_CONFIG, ...config }
		this.logger = logger
	}

	detect(minThreshold: number = this.config.minThreshold): SimilarityScore[] {
		const sources = this.snapshot.tables[this.config.sourcePlatform]
		const targets = this.snapshot.tables[this.config.targetPlatform]

		this.logger.info("Comparing tables across platforms", {
			source_platform: this.config.sourcePlatform,
			source_tables: sources.length,
			target_platform: this.config.targetPlatform,
			target_tables: targets.length,
		})

		const results = detectDuplicates(sources, targets, minThreshold, this.scorer)
		const failedPairs = results.filter((r) => r.failed_components.length > 0).length

		this.logger.info("Duplicate detection complete", {
			matches: results.length,
			threshold: minThreshold,
			high: results.filter((r) => r.confidence === "high").length,
			pairs_with_failed_components: failedPairs,
		})

		return results
	}

	/**
	 * Write SIMILAR_TO edges for results at or above the threshold.
	 * Returns the number of edges the writer reports as written.
	 */
	async persist(
		writer: SimilarityEdgeWriter,
		results: readonly SimilarityScore[],
		minThreshold: number = this.config.minThreshold,
	): Promise<number> {
		const edges = similarityEdgesFrom(results, minThreshold)
		if (edges.length === 0) return 0
		const written = await writer.writeSimilarityEdges(edges)
		this.logger.info("Wrote SIMILAR_TO edges", { edges: written })
		return written
	}
}
