/**
 * Table Similarity Scorer
 *
 * Multi-factor, metadata-only similarity between two table signatures
 * (no access to row values):
 *
 *   semantic      cosine of the column-name embeddings             (0.40)
 *   schema        mean of type and name Jaccard overlap            (0.25)
 *   statistical   mean of log row-count and column-count closeness (0.20)
 *   relationship  Jaccard of inferred foreign-key entities         (0.15)
 *
 * Every component is a symmetric function of its two inputs, so the total
 * score is too. Each component runs inside its own failure boundary: a
 * failure is logged, scores 0, and is reported in `failed_components`.
 *
 * Column matching is greedy: each source column independently keeps its best
 * target above the threshold, so two source columns may claim the same target.
 */

import type {
	ColumnInfo,
	ColumnMatch,
	Confidence,
	SimilarityComponent,
	SimilarityScore,
	SimilarityWeights,
	TableSignature,
} from "./catalog_types.js"
import { assertWeightsSumToOne, type SimilaritySettings } from "./config.js"
import { silentLogger, type Logger } from "./logger.js"
import { clampUnit, cosineSimilarity, jaccardSimilarity, roundTo } from "./similarity_math.js"
import { signatureTokens } from "./table_signature.js"

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_SIMILARITY_WEIGHTS: SimilarityWeights = {
	semantic: 0.4,
	schema: 0.25,
	statistical: 0.2,
	relationship: 0.15,
}

export const DEFAULT_SIMILARITY_SETTINGS: SimilaritySettings = {
	weights: DEFAULT_SIMILARITY_WEIGHTS,
	highConfidence: 0.75,
	mediumConfidence: 0.5,
	columnMatchThreshold: 0.7,
	rowLogSpan: 3,
}

// ============================================================================
// Types
// ============================================================================

/** Synchronous access to pre-fetched column-name embeddings */
export interface ColumnVectorLookup {
	vectorFor(columnName: string): readonly number[] | null
}

export type ComponentResult<T> =
	| { ok: true; value: T }
	| { ok: false; component: SimilarityComponent; error: Error }

export interface ComponentScores {
	semantic: number
	schema: number
	statistical: number
	relationship: number
}

// ============================================================================
// Components
// ============================================================================

export function semanticSimilarity(a: TableSignature, b: TableSignature): number {
	return cosineSimilarity(a.column_embedding, b.column_embedding)
}

export function typeOverlap(a: TableSignature, b: TableSignature): number {
	return jaccardSimilarity(signatureTokens(a.type_signature), signatureTokens(b.type_signature))
}

export function nameOverlap(a: TableSignature, b: TableSignature): number {
	return jaccardSimilarity(signatureTokens(a.name_signature), signatureTokens(b.name_signature))
}

/** Row similarity when either table has no row statistics */
export const UNKNOWN_ROW_SIMILARITY = 0.5

/**
 * 1 within the same order of magnitude, falling linearly to 0 once the row
 * counts are `rowLogSpan` orders of magnitude apart. A count of 0 means the
 * platform reported none, so such pairs score UNKNOWN_ROW_SIMILARITY.
 */
export function rowCountSimilarity(rowsA: number, rowsB: number, rowLogSpan: number = 3): number {
	if (!(rowsA > 0) || !(rowsB > 0)) return UNKNOWN_ROW_SIMILARITY
	const distance = Math.abs(Math.log10(Math.max(0, rowsA) + 1) - Math.log10(Math.max(0, rowsB) + 1))
	return clampUnit(1 - distance / rowLogSpan)
}

export function columnCountSimilarity(columnsA: number, columnsB: number): number {
	const max = Math.max(columnsA, columnsB)
	const min = Math.min(columnsA, columnsB)
	return max > 0 ? clampUnit(min / max) : 0
}

export function statisticalSimilarity(a: TableSignature, b: TableSignature, rowLogSpan: number = 3): number {
	return (rowCountSimilarity(a.row_count, b.row_count, rowLogSpan) + columnCountSimilarity(a.column_count, b.column_count)) / 2
}

/** "customer_id" → "customer", "order_key" → "order"; other columns are ignored. */
export function foreignKeyEntities(columns: readonly ColumnInfo[]): Set<string> {
	const entities = new Set<string>()
	for (const column of columns) {
		const name = column.name.toLowerCase()
		if (name.endsWith("_id") || name.endsWith("_key")) {
			entities.add(name.slice(0, name.lastIndexOf("_")))
		}
	}
	return entities
}

export function relationshipSimilarity(a: TableSignature, b: TableSignature): number {
	return jaccardSimilarity(foreignKeyEntities(a.columns), foreignKeyEntities(b.columns))
}

export function findColumnMatches(
	a: TableSignature,
	b: TableSignature,
	lookup: ColumnVectorLookup,
	threshold: number = 0.7,
): ColumnMatch[] {
	const matches: ColumnMatch[] = []
	for (const sourceColumn of a.columns) {
		if (!sourceColumn.name) continue
		const sourceVector = lookup.vectorFor(sourceColumn.name)
		if (!sourceVector) continue

		let bestMatch: string | null = null
		let bestSimilarity = 0
		for (const targetColumn of b.columns) {
			if (!targetColumn.name) continue
			const similarity = cosineSimilarity(sourceVector, lookup.vectorFor(targetColumn.name))
			if (similarity > bestSimilarity && similarity >= threshold) {
				bestSimilarity = similarity
				bestMatch = targetColumn.name
			}
		}

		if (bestMatch !== null) {
			matches.push({
				source_column: sourceColumn.name,
				target_column: bestMatch,
				similarity: roundTo(bestSimilarity, 3),
			})
		}
	}
	return matches
}

export function combineComponents(components: ComponentScores, weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS): number {
	return clampUnit(
		weights.semantic * components.semantic +
			weights.schema * components.schema +
			weights.statistical * components.statistical +
			weights.relationship * components.relationship,
	)
}

export function confidenceFor(totalScore: number, high: number = 0.75, medium: number = 0.5): Confidence {
	if (totalScore >= high) return "high"
	if (totalScore >= medium) return "medium"
	return "low"
}

function runComponent<T>(component: SimilarityComponent, compute: () => T): ComponentResult<T> {
	try {
		return { ok: true, value: compute() }
	} catch (err) {
		return { ok: false, component, error: err instanceof Error ? err : new Error(String(err)) }
	}
}

// ============================================================================
// Scorer
// ============================================================================

export class TableSimilarityScorer {
	private settings: SimilaritySettings
	private columnVectors: ColumnVectorLookup | null
	private logger: Logger

	constructor(
		settings?: Partial<SimilaritySettings>,
		columnVectors: ColumnVectorLookup | null = null,
		logger: Logger = silentLogger,
	) {
		this.settings = { ...DEFAULT_SIMILARITY_SETTINGS, ...settings }
		assertWeightsSumToOne("similarity", this.settings.weights)
		this.columnVectors = columnVectors
		this.logger = logger
	}

	/**
	 * Compare two signatures. Never throws for empty tables or missing
	 * embeddings; `weights` overrides the configured weights for this call.
	 */
	score(a: TableSignature, b: TableSignature, weights?: SimilarityWeights): SimilarityScore {
		const w = weights ?? this.settings.weights
		if (weights) assertWeightsSumToOne("similarity", weights)

		const failed: SimilarityComponent[] = []
		const valueOf = <T>(result: ComponentResult<T>, fallback: T): T => {
			if (result.ok) return result.value
			failed.push(result.component)
			this.logger.warn("Similarity component failed, scoring it 0", {
				component: result.component,
				source_table: a.table_id,
				target_table: b.table_id,
				error: result.error.message,
			})
			return fallback
		}

		const semantic = clampUnit(valueOf(runComponent("semantic", () => semanticSimilarity(a, b)), 0))
		const types = clampUnit(valueOf(runComponent("type_overlap", () => typeOverlap(a, b)), 0))
		const names = clampUnit(valueOf(runComponent("name_overlap", () => nameOverlap(a, b)), 0))
		const statistical = clampUnit(
			valueOf(runComponent("statistical", () => statisticalSimilarity(a, b, this.settings.rowLogSpan)), 0),
		)
		const relationship = clampUnit(valueOf(runComponent("relationship", () => relationshipSimilarity(a, b)), 0))

		const lookup = this.columnVectors
		const matchingColumns = lookup
			? valueOf(
					runComponent("matching", () => findColumnMatches(a, b, lookup, this.settings.columnMatchThreshold)),
					[],
				)
			: []

		const schema = (types + names) / 2
		const total = combineComponents({ semantic, schema, statistical, relationship }, w)

		return {
			source_table: a.table_id,
			target_table: b.table_id,
			source_platform: a.source,
			target_platform: b.source,
			semantic_score: semantic,
			type_overlap_score: types,
			name_overlap_score: names,
			schema_score: schema,
			statistical_score: statistical,
			relationship_score: relationship,
			total_score: total,
			confidence: confidenceFor(total, this.settings.highConfidence, this.settings.mediumConfidence),
			matching_columns: matchingColumns,
			failed_components: failed,
		}
	}
}

/** Score with default settings; see TableSimilarityScorer.score. */
export function scoreTables(
	a: TableSignature,
	b: TableSignature,
	weights: SimilarityWeights = DEFAULT_SIMILARITY_WEIGHTS,
	columnVectors: ColumnVectorLookup | null = null,
): SimilarityScore {
	return new TableSimilarityScorer({ weights }, columnVectors).score(a, b)
}
