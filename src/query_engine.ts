/**
 * Catalog Query Engine
 *
 * Answers a catalog question end to end:
 *   1. route the question (classifier probabilities or rule table)
 *   2. plan execution (single route, or top routes merged)
 *   3. run each route's handler against the catalog store
 *   4. semantic routes: embed → ANN search → graph context → hybrid ranking
 *
 * Collaborator outages surface as CatalogError, never as an empty result.
 */

import { v4 as uuidv4 } from "uuid"
import type {
	CatalogStore,
	CatalogTableRow,
	EdgeRelationship,
	EmbeddingProvider,
	ExecutionPlan,
	Intent,
	Platform,
	RankedResult,
	RankingCandidate,
	RankingWeights,
	RouteDecision,
	RowOrder,
	RowThreshold,
	StoredSimilarityRow,
} from "./catalog_types.js"
import { CatalogError } from "./config.js"
import { DEFAULT_MAX_EXPECTED_CENTRALITY, DEFAULT_RANKING_WEIGHTS, HybridRanker } from "./hybrid_ranker.js"
import { parseRowThreshold } from "./intent_classifier.js"
import { silentLogger, type Logger } from "./logger.js"
import { RouteConfidenceAdapter, type RouteResults } from "./route_confidence.js"

// ============================================================================
// Types
// ============================================================================

export interface QueryEngineConfig {
	/** ANN candidates fetched per semantic search */
	topK: number
	/** Results returned per route and per answer */
	resultLimit: number
	rankingWeights: RankingWeights
	maxExpectedCentrality: number
}

export const DEFAULT_QUERY_ENGINE_CONFIG: QueryEngineConfig = {
	topK: 20,
	resultLimit: 10,
	rankingWeights: DEFAULT_RANKING_WEIGHTS,
	maxExpectedCentrality: DEFAULT_MAX_EXPECTED_CENTRALITY,
}

export interface QueryOptions {
	/** Merge the fallback routes when no classifier output exists */
	forceMulti?: boolean
	/** Override the hybrid ranking weights for this question */
	rankingWeights?: RankingWeights
}

export interface QueryResponse {
	query_id: string
	question: string
	decision: RouteDecision
	plan: ExecutionPlan
	/** Parsed only when the metadata filter route ran */
	row_threshold: RowThreshold | null
	results: RankedResult[]
	duration_ms: number
}

interface RouteContext {
	queryId: string
	question: string
	ranker: HybridRanker
	embedding: () => Promise<number[]>
}

type RouteHandler = (ctx: RouteContext) => Promise<RankedResult[]>

// ============================================================================
// Helpers
// ============================================================================

const IDENTIFIER = /[A-Za-z][A-Za-z0-9_.]*[A-Za-z0-9]/g

/**
 * Table names mentioned in a question: dotted or snake_case identifiers and
 * all-caps words of three or more letters ("ORDERS", "sales_transactions").
 */
export function extractTableMentions(question: string): string[] {
	const mentions: string[] = []
	for (const match of question.matchAll(IDENTIFIER)) {
		const token = match[0]
		const isQualified = token.includes("_") || token.includes(".")
		const isAllCaps = token.length >= 3 && token === token.toUpperCase()
		if ((isQualified || isAllCaps) && !mentions.includes(token)) mentions.push(token)
	}
	return mentions
}

export function rowOrderFor(question: string, threshold: RowThreshold | null): RowOrder {
	if (threshold) return threshold.operator === "lt" || threshold.operator === "lte" ? "asc" : "desc"
	return /smallest|fewest rows|least rows/.test(question.toLowerCase()) ? "asc" : "desc"
}

/** Result for a store row; scores decay with list position. */
function tableResult(table: CatalogTableRow, position: number, total: number, reasoning: string): RankedResult {
	return {
		entity_id: table.table_id,
		semantic_score: 0,
		structural_score: 0,
		final_score: total > 0 ? (total - position) / total : 0,
		centrality: 0,
		row_count: table.row_count,
		neighbors: [],
		reasoning,
	}
}

function similarityResult(edge: StoredSimilarityRow, anchorId: string | null): RankedResult {
	const other = anchorId === edge.source_table ? edge.target_table : edge.source_table
	const counterpart = other === edge.source_table ? edge.target_table : edge.source_table
	return {
		entity_id: other,
		semantic_score: 0,
		structural_score: 0,
		final_score: edge.score,
		centrality: 0,
		row_count: 0,
		neighbors: [counterpart],
		reasoning: `similar_to ${counterpart}: score=${edge.score.toFixed(2)} (${edge.confidence})`,
	}
}

function lineageDirection(relationship: EdgeRelationship, direction: "outgoing" | "incoming"): "upstream" | "downstream" {
	// anchor DERIVES_FROM t → t is upstream; anchor FEEDS_INTO t → t is downstream
	const anchorIsConsumer = relationship === "DERIVES_FROM"
	return (direction === "outgoing") === anchorIsConsumer ? "upstream" : "downstream"
}

// ============================================================================
// Engine
// ============================================================================

export class CatalogQueryEngine {
	private store: CatalogStore
	private embedder: EmbeddingProvider
	private router: RouteConfidenceAdapter
	private config: QueryEngineConfig
	private logger: Logger
	private handlers: Record<Intent, RouteHandler>

	constructor(
		store: CatalogStore,
		embedder: EmbeddingProvider,
		router: RouteConfidenceAdapter = new RouteConfidenceAdapter(),
		config?: Partial<QueryEngineConfig>,
		logger: Logger = silentLogger,
	) {
		this.store = store
		this.embedder = embedder
		this.router = router
		this.config = { ...DEFAULT_QUERY_ENGINE_CONFIG, ...config }
		this.logger = logger
		this.handlers = {
			semantic_discovery: (ctx) => this.semanticDiscovery(ctx),
			databricks_discovery: (ctx) => this.semanticDiscovery(ctx, "databricks"),
			metadata_filter: (ctx) => this.metadataFilter(ctx),
			duplicate_detection: (ctx) => this.similarTables(ctx, false),
			cross_source: (ctx) => this.similarTables(ctx, true),
			relationship_traversal: (ctx) => this.relatedTables(ctx, ["FOREIGN_KEY"]),
			lineage_query: (ctx) => this.relatedTables(ctx, ["DERIVES_FROM", "FEEDS_INTO"]),
			sensitivity_query: (ctx) => this.sensitiveTables(ctx),
		}
	}

	/**
	 * Answer a question. Main entry point.
	 */
	async answer(question: string, options: QueryOptions = {}): Promise<QueryResponse> {
		const queryId = uuidv4()
		const startTime = Date.now()
		const ranker = new HybridRanker({
			weights: options.rankingWeights ?? this.config.rankingWeights,
			maxExpectedCentrality: this.config.maxExpectedCentrality,
		})

		let embeddingPromise: Promise<number[]> | null = null
		const embedding = () => {
			embeddingPromise ??= this.embedQuestion(queryId, question)
			return embeddingPromise
		}
		const ctx: RouteContext = { queryId, question, ranker, embedding }

		this.logger.info("Starting catalog query", { query_id: queryId, question })

		let questionEmbedding: number[] | null = null
		if (this.router.hasClassifier) {
			try {
				questionEmbedding = await embedding()
			} catch (err) {
				this.logger.warn("Question embedding unavailable for routing features", { query_id: queryId, error: String(err) })
				embeddingPromise = null
			}
		}

		const { decision, plan } = await this.router.plan(question, {
			questionEmbedding,
			forceMulti: options.forceMulti,
		})
		this.logger.info("Route planned", { query_id: queryId, route: decision.route, method: decision.method, mode: plan.mode })

		let results: RankedResult[]
		let routesRun: Intent[]
		if (plan.mode === "single") {
			routesRun = [plan.route]
			results = await this.runRoute(plan.route, ctx)
		} else {
			routesRun = plan.routes.map((r) => r.route)
			const perRoute = await Promise.all(routesRun.map((route) => this.runRoute(route, ctx)))
			const routeResults: RouteResults = {}
			routesRun.forEach((route, i) => {
				routeResults[route] = perRoute[i]
			})
			results = this.router.merge(routeResults, plan.routes)
		}

		const response: QueryResponse = {
			query_id: queryId,
			question,
			decision,
			plan,
			row_threshold: routesRun.includes("metadata_filter") ? parseRowThreshold(question) : null,
			results: results.slice(0, this.config.resultLimit),
			duration_ms: Date.now() - startTime,
		}

		this.logger.info("Catalog query complete", {
			query_id: queryId,
			results: response.results.length,
			duration_ms: response.duration_ms,
		})
		return response
	}

	private async runRoute(route: Intent, ctx: RouteContext): Promise<RankedResult[]> {
		try {
			const results = await this.handlers[route](ctx)
			this.logger.debug("Route complete", { query_id: ctx.queryId, route, results: results.length })
			return results
		} catch (err) {
			if (err instanceof CatalogError) throw err
			throw new CatalogError("search", `Route ${route} failed: ${String(err)}`, true, {
				query_id: ctx.queryId,
				route,
			})
		}
	}

	private async embedQuestion(queryId: string, question: string): Promise<number[]> {
		try {
			return await this.embedder.embedText(question)
		} catch (err) {
			if (err instanceof CatalogError) throw err
			throw new CatalogError("embedding", `Failed to embed question: ${String(err)}`, true, { query_id: queryId })
		}
	}

	// ========================================================================
	// Route Handlers
	// ========================================================================

	private async semanticDiscovery(ctx: RouteContext, platform?: Platform): Promise<RankedResult[]> {
		const embedding = await ctx.embedding()
		const hits = await this.store.search(embedding, this.config.topK, platform)
		if (hits.length === 0) return []

		const graph = await this.store.getGraphContext(hits.map((h) => h.entity_id))
		const candidates = hits.map((hit): RankingCandidate => {
			const context = graph.get(hit.entity_id)
			return {
				id: hit.entity_id,
				semantic_score: hit.similarity,
				centrality: context?.centrality ?? 0,
				row_count: context?.row_count ?? 0,
				neighbors: context?.neighbors ?? [],
				source: hit.source,
			}
		})
		return ctx.ranker.rank(candidates).slice(0, this.config.resultLimit)
	}

	private async metadataFilter(ctx: RouteContext): Promise<RankedResult[]> {
		const threshold = parseRowThreshold(ctx.question)
		const order = rowOrderFor(ctx.question, threshold)
		const rows = await this.store.tablesByRowCount(threshold, order, this.config.resultLimit)
		return rows.map((table, i) =>
			tableResult(table, i, rows.length, `metadata: ${table.row_count.toLocaleString("en-US")} rows, ${table.column_count} columns`),
		)
	}

	/**
	 * The table the question is about: the first mentioned name the catalog
	 * knows, else the best semantic match.
	 */
	private async resolveAnchor(ctx: RouteContext): Promise<string | null> {
		for (const mention of extractTableMentions(ctx.question)) {
			const [table] = await this.store.findTables(mention)
			if (table) return table.table_id
		}
		const [hit] = await this.store.search(await ctx.embedding(), 1)
		return hit ? hit.entity_id : null
	}

	private async similarTables(ctx: RouteContext, requireAnchor: boolean): Promise<RankedResult[]> {
		let anchor: string | null = null
		if (requireAnchor) {
			anchor = await this.resolveAnchor(ctx)
			if (!anchor) return []
		} else {
			for (const mention of extractTableMentions(ctx.question)) {
				const [table] = await this.store.findTables(mention)
				if (table) {
					anchor = table.table_id
					break
				}
			}
		}

		const edges = await this.store.similarityEdges(anchor, this.config.resultLimit)
		const seen = new Set<string>()
		const results: RankedResult[] = []
		for (const edge of edges) {
			const result = similarityResult(edge, anchor)
			if (seen.has(result.entity_id)) continue
			seen.add(result.entity_id)
			results.push(result)
		}
		return results
	}

	private async relatedTables(ctx: RouteContext, relationships: EdgeRelationship[]): Promise<RankedResult[]> {
		const anchor = await this.resolveAnchor(ctx)
		if (!anchor) return []

		const rows = await this.store.relatedTables(anchor, relationships, this.config.resultLimit)
		return rows.map((row, i) => {
			const reasoning =
				row.relationship === "FOREIGN_KEY"
					? `relationship: ${row.direction === "outgoing" ? "referenced by" : "references"} ${anchor}`
					: `lineage: ${lineageDirection(row.relationship, row.direction)} of ${anchor}`
			return { ...tableResult(row, i, rows.length, reasoning), neighbors: [anchor] }
		})
	}

	private async sensitiveTables(_ctx: RouteContext): Promise<RankedResult[]> {
		const rows = await this.store.sensitiveTables(this.config.resultLimit)
		return rows.map((row) => ({
			...tableResult(row, 0, 1, `sensitivity: ${row.sensitive_columns} sensitive of ${row.column_count} columns`),
			final_score: row.column_count > 0 ? Math.min(1, row.sensitive_columns / row.column_count) : 0,
		}))
	}
}
