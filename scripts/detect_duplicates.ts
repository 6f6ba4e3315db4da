#!/usr/bin/env node
/**
 * Cross-Platform Duplicate Detection Script
 *
 * Extracts table metadata for both platforms from the catalog database,
 * scores every cross-platform pair and prints the similarity report.
 *
 * Usage:
 *   node dist/scripts/detect_duplicates.js --min-threshold=0.5 --write
 *
 * Options:
 *   --min-threshold  Minimum total score to report (default: similarity.min_threshold)
 *   --write          Persist SIMILAR_TO edges for the reported matches
 *   --explain        Print a one-paragraph explanation per match
 */

import pg from "pg"
import { runDetectDuplicates } from "../src/catalog_tools.js"
import { getConfig } from "../src/config/loadConfig.js"
import { createToolContext } from "../src/index.js"
import { createLogger } from "../src/logger.js"

// ============================================================================
// Configuration
// ============================================================================

interface Options {
	minThreshold?: number
	write: boolean
	explain: boolean
}

function parseArgs(): Options {
	const options: Options = { write: false, explain: false }

	for (const arg of process.argv.slice(2)) {
		if (arg.startsWith("--min-threshold=")) {
			const value = parseFloat(arg.split("=")[1])
			if (isNaN(value) || value < 0 || value > 1) {
				console.error("Error: --min-threshold must be a number between 0 and 1")
				process.exit(1)
			}
			options.minThreshold = value
		} else if (arg === "--write") {
			options.write = true
		} else if (arg === "--explain") {
			options.explain = true
		}
	}

	return options
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
	const options = parseArgs()
	const config = getConfig()
	const logger = createLogger(config.logging.level)

	const pool = new pg.Pool({
		host: config.database.host,
		port: config.database.port,
		database: config.database.name,
		user: config.database.user,
		password: config.database.password,
	})

	try {
		const ctx = createToolContext(config, pool, logger)
		const sweep = await runDetectDuplicates({ min_threshold: options.minThreshold, write_edges: options.write }, ctx)

		console.log(sweep.report)
		if (options.explain) {
			for (const explanation of sweep.explanations) console.log(`\n${explanation}`)
		}
		if (options.write) {
			console.log(`\nWrote ${sweep.edges_written} SIMILAR_TO edges`)
		}
	} finally {
		await pool.end()
	}
}

main().catch((error) => {
	console.error("[ERROR] Duplicate detection failed:", error)
	process.exit(1)
})
