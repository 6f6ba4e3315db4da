/**
 * Catalog GraphRAG MCP Server
 *
 * Exposes the federated catalog over MCP:
 *   catalog_query      question → routed, ranked tables
 *   classify_question  rule-based intent and row threshold
 *   rank_candidates    hybrid semantic + structural ranking
 *   score_tables       multi-factor similarity of two tables
 *   plan_route         execution plan from classifier probabilities
 *   detect_duplicates  cross-platform duplicate sweep (optionally persisted)
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js"
import type { Pool } from "pg"
import { PgCatalogStore } from "./adapters/pg_catalog_store.js"
import {
	catalogQueryShape,
	classifyQuestionShape,
	detectDuplicatesShape,
	planRouteShape,
	rankCandidatesShape,
	runCatalogQuery,
	runClassifyQuestion,
	runDetectDuplicates,
	runPlanRoute,
	runRankCandidates,
	runScoreTables,
	scoreTablesShape,
	type CatalogToolContext,
} from "./catalog_tools.js"
import type { CatalogConfig } from "./config/loadConfig.js"
import { CatalogError, resolveRankingWeights, routingSettingsFrom } from "./config.js"
import { EmbeddingClient, embeddingClientConfigFrom } from "./embedding_client.js"
import { silentLogger, type Logger } from "./logger.js"
import { CatalogQueryEngine } from "./query_engine.js"
import { RouteConfidenceAdapter } from "./route_confidence.js"

export const SERVER_NAME = "catalog-graphrag"
export const SERVER_VERSION = "0.1.0"

export interface CreateServerOptions {
	config: CatalogConfig
	pool: Pool
	logger?: Logger
}

/**
 * Run a tool handler and render its value (or CatalogError) as a tool result.
 */
export async function toToolResult(name: string, run: () => unknown, logger: Logger = silentLogger): Promise<CallToolResult> {
	try {
		const value = await run()
		return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] }
	} catch (err) {
		if (err instanceof CatalogError) {
			logger.warn("Tool failed", { tool: name, type: err.type, recoverable: err.recoverable, error: err.message })
			return {
				content: [{ type: "text", text: JSON.stringify({ error: err.type, message: err.message, recoverable: err.recoverable }) }],
				isError: true,
			}
		}
		logger.error("Tool crashed", { tool: name, error: String(err) })
		throw err
	}
}

/**
 * Wire the catalog collaborators for a tool context.
 */
export function createToolContext(config: CatalogConfig, pool: Pool, logger: Logger = silentLogger): CatalogToolContext {
	const store = new PgCatalogStore(pool, logger)
	const embedder = new EmbeddingClient(embeddingClientConfigFrom(config))
	const router = new RouteConfidenceAdapter(routingSettingsFrom(config), null, config.routing.platform_keywords, logger)
	const engine = new CatalogQueryEngine(
		store,
		embedder,
		router,
		{
			rankingWeights: resolveRankingWeights(config),
			maxExpectedCentrality: config.ranking.max_expected_centrality,
		},
		logger,
	)
	return { config, store, embedder, engine, logger }
}

export function registerCatalogTools(server: McpServer, ctx: CatalogToolContext): void {
	const logger = ctx.logger ?? silentLogger

	server.tool(
		"catalog_query",
		"Answer a question about the federated catalog. Routes the question, runs the matching retrieval and returns ranked tables.",
		catalogQueryShape,
		async (args) => toToolResult("catalog_query", () => runCatalogQuery(args, ctx), logger),
	)

	server.tool(
		"classify_question",
		"Classify a catalog question into a retrieval route and extract its row-count threshold.",
		classifyQuestionShape,
		async (args) => toToolResult("classify_question", () => runClassifyQuestion(args, ctx), logger),
	)

	server.tool(
		"rank_candidates",
		"Rank candidate tables by semantic similarity fused with log-dampened graph centrality.",
		rankCandidatesShape,
		async (args) => toToolResult("rank_candidates", () => runRankCandidates(args, ctx), logger),
	)

	server.tool(
		"score_tables",
		"Score how likely two tables hold the same entity, with per-component scores and an explanation.",
		scoreTablesShape,
		async (args) => toToolResult("score_tables", () => runScoreTables(args, ctx), logger),
	)

	server.tool(
		"plan_route",
		"Turn route classifier probabilities into a single-route or weighted multi-route execution plan.",
		planRouteShape,
		async (args) => toToolResult("plan_route", () => runPlanRoute(args, ctx), logger),
	)

	server.tool(
		"detect_duplicates",
		"Compare every table of one platform with every table of the other and report likely duplicates.",
		detectDuplicatesShape,
		async (args) => toToolResult("detect_duplicates", () => runDetectDuplicates(args, ctx), logger),
	)
}

export default function createServer({ config, pool, logger = silentLogger }: CreateServerOptions): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })
	registerCatalogTools(server, createToolContext(config, pool, logger))
	logger.info("Catalog tools registered", { server: SERVER_NAME, version: SERVER_VERSION })
	return server
}
