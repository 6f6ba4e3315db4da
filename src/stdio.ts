#!/usr/bin/env node
/**
 * Stdio entry point for the Catalog GraphRAG MCP Server
 *
 * Configuration comes from config/config.yaml, config/config.local.yaml and
 * environment variables (see src/config/loadConfig.ts).
 *
 * Usage:
 *   DB_HOST=localhost DB_PASSWORD=... node dist/src/stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import pg from "pg"
import createServer from "./index.js"
import { getConfig } from "./config/loadConfig.js"
import { createLogger } from "./logger.js"

async function main(): Promise<void> {
	const config = getConfig()
	const logger = createLogger(config.logging.level)

	logger.info("Starting Catalog GraphRAG MCP Server with stdio transport")
	logger.info(`Database: ${config.database.user}@${config.database.host}:${config.database.port}/${config.database.name}`)
	logger.info(`Embedding sidecar: ${config.embedding.sidecar_url}`)

	const pool = new pg.Pool({
		host: config.database.host,
		port: config.database.port,
		database: config.database.name,
		user: config.database.user,
		password: config.database.password,
	})
	pool.on("error", (err) => logger.error("Idle database client error", { error: err.message }))

	const server = createServer({ config, pool, logger })
	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Catalog GraphRAG MCP Server running via stdio")

	const shutdown = async () => {
		logger.info("Shutting down...")
		await server.close()
		await pool.end()
		process.exit(0)
	}
	process.on("SIGINT", () => {
		shutdown().catch((err) => {
			logger.error("Shutdown failed", { error: String(err) })
			process.exit(1)
		})
	})
	process.on("SIGTERM", () => {
		shutdown().catch((err) => {
			logger.error("Shutdown failed", { error: String(err) })
			process.exit(1)
		})
	})
}

main().catch((error) => {
	console.error("[ERROR] Fatal error:", error)
	process.exit(1)
})
