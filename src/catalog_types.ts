/**
 * Catalog Types
 *
 * Defines types for:
 * - Table signatures extracted from both platforms
 * - Cross-source similarity scores
 * - Hybrid-ranked retrieval results
 * - Query intents and route decisions
 */

// ============================================================================
// Platforms & Intents
// ============================================================================

export const PLATFORMS = ["snowflake", "databricks"] as const
export type Platform = (typeof PLATFORMS)[number]

/**
 * Intents in classifier priority order (highest first), followed by the
 * default. The order is also used to break probability ties between routes.
 */
export const INTENTS = [
	"sensitivity_query",
	"cross_source",
	"databricks_discovery",
	"duplicate_detection",
	"lineage_query",
	"relationship_traversal",
	"metadata_filter",
	"semantic_discovery",
] as const
export type Intent = (typeof INTENTS)[number]

export const DEFAULT_INTENT: Intent = "semantic_discovery"

export function isIntent(value: string): value is Intent {
	return (INTENTS as readonly string[]).includes(value)
}

export type ThresholdOperator = "gt" | "gte" | "lt" | "lte"

export interface RowThreshold {
	value: number
	operator: ThresholdOperator
}

export interface QueryAnalysis {
	question: string
	intent: Intent
	/** Only parsed for metadata_filter questions */
	row_threshold: RowThreshold | null
}

// ============================================================================
// Table Signatures
// ============================================================================

export interface ColumnInfo {
	name: string
	type: string
	ordinal: number
}

/**
 * One table on one platform, as seen by the duplicate detector.
 *
 * type_signature / name_signature are derived from `columns`; build and
 * rebuild them through table_signature.ts only.
 */
export interface TableSignature {
	readonly table_id: string
	readonly source: Platform
	readonly schema: string
	readonly name: string
	readonly row_count: number
	readonly column_count: number
	readonly columns: readonly ColumnInfo[]
	/** Embedding of the space-joined column names; null when the table has no columns */
	readonly column_embedding: readonly number[] | null
	readonly type_signature: string
	readonly name_signature: string
}

// ============================================================================
// Similarity
// ============================================================================

export type SimilarityWeights = {
	semantic: number
	schema: number
	statistical: number
	relationship: number
}

export type Confidence = "high" | "medium" | "low"

export type SimilarityComponent =
	| "semantic"
	| "type_overlap"
	| "name_overlap"
	| "statistical"
	| "relationship"
	| "matching"

export interface ColumnMatch {
	source_column: string
	target_column: string
	similarity: number
}

export interface SimilarityScore {
	source_table: string
	target_table: string
	source_platform: Platform
	target_platform: Platform

	// Component scores, all in [0, 1]
	semantic_score: number
	type_overlap_score: number
	name_overlap_score: number
	schema_score: number // (type_overlap + name_overlap) / 2
	statistical_score: number
	relationship_score: number

	total_score: number
	confidence: Confidence
	matching_columns: ColumnMatch[]

	/** Components that failed and were scored 0 */
	failed_components: SimilarityComponent[]
}

/** Payload of one SIMILAR_TO edge handed to the persistence layer */
export interface SimilarityEdge {
	source_table: string
	target_table: string
	source_platform: Platform
	target_platform: Platform
	score: number
	confidence: Confidence
	semantic_score: number
	type_overlap: number
	name_overlap: number
	statistical_score: number
	relationship_score: number
	matching_columns: string
	algorithm: string
}

// ============================================================================
// Hybrid Ranking
// ============================================================================

export type RankingWeights = {
	semantic: number
	structural: number
}

/**
 * A retrieval candidate: ANN hit joined with its graph context.
 */
export interface RankingCandidate {
	id: string
	semantic_score: number
	centrality: number
	row_count: number
	neighbors: string[]
	source?: Platform
}

export interface RankedResult {
	entity_id: string
	semantic_score: number
	structural_score: number
	final_score: number
	centrality: number
	row_count: number
	neighbors: string[]
	reasoning: string
	/** Routes that returned this entity (multi-route merges only) */
	routes?: Intent[]
}

// ============================================================================
// Routing
// ============================================================================

export type RouteProbabilities = Partial<Record<Intent, number>>

export interface RouteDecision {
	route: Intent
	confidence?: number
	probabilities?: RouteProbabilities
	method: "rules" | "classifier"
}

export interface WeightedRoute {
	route: Intent
	weight: number
}

export type ExecutionPlan =
	| { mode: "single"; route: Intent; confidence: number }
	| { mode: "multi"; routes: WeightedRoute[] }

// ============================================================================
// External Collaborators
// ============================================================================

/** Embedding provider (sidecar, model server, ...) */
export interface EmbeddingProvider {
	embedText(text: string): Promise<number[]>
}

/** Approximate nearest-neighbour hit */
export interface SearchHit {
	entity_id: string
	table_name: string
	source: Platform
	similarity: number
}

export interface VectorSearch {
	search(queryEmbedding: number[], topK: number): Promise<SearchHit[]>
}

export interface GraphContext {
	row_count: number
	centrality: number
	neighbors: string[]
}

export interface GraphContextProvider {
	getGraphContext(entityIds: string[]): Promise<Map<string, GraphContext>>
}

/** Raw table metadata as produced by a platform extractor */
export interface ExtractedTable {
	table_id: string
	source: Platform
	schema: string
	name: string
	row_count: number | null
	column_count: number | null
	columns: ColumnInfo[]
}

export interface MetadataExtractor {
	extractTables(platform: Platform): Promise<ExtractedTable[]>
}

export interface SimilarityEdgeWriter {
	writeSimilarityEdges(edges: SimilarityEdge[]): Promise<number>
}

/** Optional trained route classifier; a black box over a feature vector */
export interface RouteClassifier {
	readonly featureNames: readonly string[]
	predictProbabilities(features: number[]): Promise<Record<string, number>>
}

// ============================================================================
// Catalog Store
// ============================================================================

/** Relationship kinds stored between tables; SIMILAR_TO edges live apart */
export type EdgeRelationship = "FOREIGN_KEY" | "DERIVES_FROM" | "FEEDS_INTO"

export interface CatalogTableRow {
	table_id: string
	source: Platform
	schema: string
	name: string
	row_count: number
	column_count: number
}

export interface RelatedTableRow extends CatalogTableRow {
	relationship: EdgeRelationship
	direction: "outgoing" | "incoming"
}

export interface StoredSimilarityRow {
	source_table: string
	target_table: string
	source_platform: Platform
	target_platform: Platform
	score: number
	confidence: Confidence
	matching_columns: string
}

export interface SensitiveTableRow extends CatalogTableRow {
	sensitive_columns: number
}

export type RowOrder = "asc" | "desc"

/**
 * Everything the query engine reads from the catalog, on top of ANN search
 * and graph context.
 */
export interface CatalogStore extends VectorSearch, GraphContextProvider {
	search(queryEmbedding: number[], topK: number, platform?: Platform): Promise<SearchHit[]>
	findTables(name: string): Promise<CatalogTableRow[]>
	tablesByRowCount(threshold: RowThreshold | null, order: RowOrder, limit: number): Promise<CatalogTableRow[]>
	relatedTables(tableId: string, relationships: readonly EdgeRelationship[], limit: number): Promise<RelatedTableRow[]>
	similarityEdges(tableId: string | null, limit: number): Promise<StoredSimilarityRow[]>
	sensitiveTables(limit: number): Promise<SensitiveTableRow[]>
}
