/**
 * Catalog Tools
 *
 * Input schemas and handlers behind the MCP tools. Handlers return plain
 * JSON-ready values; index.ts wraps them as tool results.
 */

import { z } from "zod"
import {
	PLATFORMS,
	type CatalogStore,
	type ExecutionPlan,
	type MetadataExtractor,
	type QueryAnalysis,
	type RankedResult,
	type SimilarityEdgeWriter,
	type SimilarityScore,
	type TableSignature,
} from "./catalog_types.js"
import type { CatalogConfig } from "./config/loadConfig.js"
import { resolveRankingWeights, routingSettingsFrom, similaritySettingsFrom } from "./config.js"
import { DuplicateDetector, explainMatch, formatSimilarityReport } from "./duplicate_detector.js"
import { EmbeddingCache, type BatchEmbeddingProvider } from "./embedding_cache.js"
import { HybridRanker } from "./hybrid_ranker.js"
import { analyzeQuestion, buildIntentRules } from "./intent_classifier.js"
import { silentLogger, type Logger } from "./logger.js"
import type { CatalogQueryEngine, QueryResponse } from "./query_engine.js"
import { decideExecution } from "./route_confidence.js"
import { buildSignatureSnapshot, snapshotColumnNames } from "./signature_snapshot.js"
import { TableSimilarityScorer } from "./table_similarity.js"
import { buildTableSignature } from "./table_signature.js"

export interface CatalogToolContext {
	config: CatalogConfig
	store: CatalogStore & MetadataExtractor & SimilarityEdgeWriter
	embedder: BatchEmbeddingProvider
	engine: CatalogQueryEngine
	logger?: Logger
}

// ============================================================================
// Schemas
// ============================================================================

const unit = z.number().min(0).max(1)

const rankingWeightsSchema = z.object({ semantic: unit, structural: unit })

const similarityWeightsSchema = z.object({
	semantic: unit,
	schema: unit,
	statistical: unit,
	relationship: unit,
})

const columnSchema = z.object({
	name: z.string(),
	type: z.string(),
	ordinal: z.number().int().positive().optional(),
})

const tableSchema = z.object({
	table_id: z.string().min(1),
	source: z.enum(PLATFORMS),
	schema: z.string().default(""),
	name: z.string().default(""),
	row_count: z.number().nonnegative().nullable().default(null),
	column_count: z.number().int().nonnegative().nullable().default(null),
	columns: z.array(columnSchema),
	column_embedding: z.array(z.number()).nullable().default(null),
})

const candidateSchema = z.object({
	id: z.string().min(1),
	semantic_score: z.number(),
	centrality: z.number().nonnegative().default(0),
	row_count: z.number().nonnegative().default(0),
	neighbors: z.array(z.string()).default([]),
	source: z.enum(PLATFORMS).optional(),
})

export const catalogQueryShape = {
	question: z.string().min(1).max(2000).describe("Natural language question about the catalog"),
	force_multi: z.boolean().optional().describe("Merge the fallback routes instead of running one"),
	profile: z.string().optional().describe("Ranking weight profile (discovery, moderate, balanced)"),
}

export const classifyQuestionShape = {
	question: z.string().min(1).max(2000).describe("Natural language question about the catalog"),
}

export const rankCandidatesShape = {
	candidates: z.array(candidateSchema).describe("ANN hits joined with their graph context"),
	profile: z.string().optional().describe("Ranking weight profile"),
	weights: rankingWeightsSchema.optional().describe("Explicit weights; override the profile"),
}

export const scoreTablesShape = {
	table_a: tableSchema.describe("Source table metadata"),
	table_b: tableSchema.describe("Target table metadata"),
	weights: similarityWeightsSchema.optional().describe("Similarity component weights"),
}

export const planRouteShape = {
	probabilities: z.record(z.number()).describe("Route classifier probabilities keyed by intent"),
}

export const detectDuplicatesShape = {
	min_threshold: unit.optional().describe("Minimum total score to report"),
	write_edges: z.boolean().optional().describe("Persist SIMILAR_TO edges for the matches"),
}

type Input<Shape extends z.ZodRawShape> = z.infer<z.ZodObject<Shape>>

// ============================================================================
// Handlers
// ============================================================================

export async function runCatalogQuery(input: Input<typeof catalogQueryShape>, ctx: CatalogToolContext): Promise<QueryResponse> {
	const rankingWeights = resolveRankingWeights(ctx.config, { profile: input.profile })
	return ctx.engine.answer(input.question, { forceMulti: input.force_multi, rankingWeights })
}

export function runClassifyQuestion(input: Input<typeof classifyQuestionShape>, ctx: CatalogToolContext): QueryAnalysis {
	return analyzeQuestion(input.question, buildIntentRules(ctx.config.routing.platform_keywords))
}

export function runRankCandidates(input: Input<typeof rankCandidatesShape>, ctx: CatalogToolContext): RankedResult[] {
	const weights = resolveRankingWeights(ctx.config, { profile: input.profile, weights: input.weights })
	const ranker = new HybridRanker({ weights, maxExpectedCentrality: ctx.config.ranking.max_expected_centrality })
	return ranker.rank(input.candidates)
}

function signatureFrom(table: z.infer<typeof tableSchema>): TableSignature {
	return buildTableSignature(
		{
			table_id: table.table_id,
			source: table.source,
			schema: table.schema,
			name: table.name,
			row_count: table.row_count,
			column_count: table.column_count,
			columns: table.columns.map((c, i) => ({ name: c.name, type: c.type, ordinal: c.ordinal ?? i + 1 })),
		},
		table.column_embedding,
	)
}

/**
 * Score two tables. Column-name embeddings for both tables are fetched first
 * so the score carries its column matches.
 */
export async function runScoreTables(
	input: Input<typeof scoreTablesShape>,
	ctx: CatalogToolContext,
): Promise<{ score: SimilarityScore; explanation: string }> {
	const logger = ctx.logger ?? silentLogger
	const a = signatureFrom(input.table_a)
	const b = signatureFrom(input.table_b)

	const cache = new EmbeddingCache(ctx.embedder, logger)
	await cache.warm([...a.columns, ...b.columns].map((c) => c.name))

	const scorer = new TableSimilarityScorer(similaritySettingsFrom(ctx.config), cache, logger)
	const score = scorer.score(a, b, input.weights)
	return { score, explanation: explainMatch(score) }
}

export function runPlanRoute(input: Input<typeof planRouteShape>, ctx: CatalogToolContext): ExecutionPlan {
	return decideExecution(input.probabilities, routingSettingsFrom(ctx.config))
}

export interface DuplicateSweep {
	snapshot_created_at: string
	min_threshold: number
	matches: SimilarityScore[]
	explanations: string[]
	report: string
	edges_written: number
}

/**
 * Extract both platforms, warm the column cache, run the sweep and
 * optionally persist the matches as SIMILAR_TO edges.
 */
export async function runDetectDuplicates(
	input: Input<typeof detectDuplicatesShape>,
	ctx: CatalogToolContext,
): Promise<DuplicateSweep> {
	const logger = ctx.logger ?? silentLogger
	const minThreshold = input.min_threshold ?? ctx.config.similarity.min_threshold

	const snapshot = await buildSignatureSnapshot(ctx.store, ctx.embedder, logger)
	const cache = new EmbeddingCache(ctx.embedder, logger)
	await cache.warm(snapshotColumnNames(snapshot))

	const scorer = new TableSimilarityScorer(similaritySettingsFrom(ctx.config), cache, logger)
	const detector = new DuplicateDetector(snapshot, scorer, { minThreshold }, logger)
	const matches = detector.detect()
	const edgesWritten = input.write_edges ? await detector.persist(ctx.store, matches) : 0

	return {
		snapshot_created_at: snapshot.created_at,
		min_threshold: minThreshold,
		matches,
		explanations: matches.map(explainMatch),
		report: formatSimilarityReport(matches),
		edges_written: edgesWritten,
	}
}
