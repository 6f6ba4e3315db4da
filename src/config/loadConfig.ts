/**
 * Unified config loader for the catalog GraphRAG server.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > built-in defaults
 *
 * The merged document is validated with zod before it is cached.
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"
import { z } from "zod"

// ── Schema ───────────────────────────────────────────────────────────

const WEIGHT_SUM_TOLERANCE = 1e-6

const unitInterval = z.number().min(0).max(1)

const rankingWeightsSchema = z
	.object({
		semantic: unitInterval,
		structural: unitInterval,
	})
	.refine((w) => Math.abs(w.semantic + w.structural - 1) <= WEIGHT_SUM_TOLERANCE, {
		message: "ranking weights must sum to 1",
	})

const similarityWeightsSchema = z
	.object({
		semantic: unitInterval,
		schema: unitInterval,
		statistical: unitInterval,
		relationship: unitInterval,
	})
	.refine(
		(w) => Math.abs(w.semantic + w.schema + w.statistical + w.relationship - 1) <= WEIGHT_SUM_TOLERANCE,
		{ message: "similarity weights must sum to 1" },
	)

export const catalogConfigSchema = z.object({
	database: z.object({
		host: z.string(),
		port: z.number().int().positive(),
		name: z.string(),
		user: z.string(),
		password: z.string(),
	}),
	embedding: z.object({
		sidecar_url: z.string().url(),
		model: z.string(),
		timeout_ms: z.number().int().positive(),
	}),
	ranking: z
		.object({
			profile: z.string(),
			max_expected_centrality: z.number().int().positive(),
			profiles: z.record(rankingWeightsSchema),
		})
		.refine((r) => r.profile in r.profiles, { message: "ranking.profile must name an entry of ranking.profiles" }),
	similarity: z.object({
		weights: similarityWeightsSchema,
		high_confidence: unitInterval,
		medium_confidence: unitInterval,
		min_threshold: unitInterval,
		column_match_threshold: unitInterval,
		row_log_span: z.number().positive(),
	}),
	routing: z.object({
		high_confidence_threshold: unitInterval,
		multi_route_count: z.number().int().min(1),
		merge_depth: z.number().int().min(1),
		platform_keywords: z.array(z.string().min(1)),
	}),
	logging: z.object({
		level: z.enum(["debug", "info", "warn", "error"]),
	}),
})

export type CatalogConfig = z.infer<typeof catalogConfigSchema>

// ── Defaults ─────────────────────────────────────────────────────────

export const DEFAULT_CONFIG: CatalogConfig = {
	database: {
		host: "localhost",
		port: 5432,
		name: "catalog",
		user: "catalog",
		password: "",
	},
	embedding: {
		sidecar_url: "http://localhost:8001",
		model: "all-MiniLM-L6-v2",
		timeout_ms: 30000,
	},
	ranking: {
		profile: "discovery",
		max_expected_centrality: 6,
		profiles: {
			discovery: { semantic: 0.8, structural: 0.2 },
			moderate: { semantic: 0.7, structural: 0.3 },
			balanced: { semantic: 0.6, structural: 0.4 },
		},
	},
	similarity: {
		weights: { semantic: 0.4, schema: 0.25, statistical: 0.2, relationship: 0.15 },
		high_confidence: 0.75,
		medium_confidence: 0.5,
		min_threshold: 0.3,
		column_match_threshold: 0.7,
		row_log_span: 3,
	},
	routing: {
		high_confidence_threshold: 0.8,
		multi_route_count: 2,
		merge_depth: 5,
		platform_keywords: [
			"databricks",
			"unity catalog",
			"workspace.sample_data",
			"sales_transactions",
			"customer_feedback",
			"federated table",
			"federated column",
		],
	},
	logging: {
		level: "info",
	},
}

// ── YAML Loading ─────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
}

function findConfigDir(): string | null {
	// Walk up from cwd looking for config/config.yaml
	let dir = process.cwd()
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): Record<string, unknown> {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isPlainObject(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
	const result: Record<string, unknown> = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isPlainObject(right) && isPlainObject(left)) {
			result[key] = deepMerge(left, right)
		} else if (right !== undefined && right !== null) {
			result[key] = right
		}
	}
	return result
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}
function envFloat(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseFloat(v)
	return isNaN(n) ? undefined : n
}

function section(cfg: Record<string, unknown>, key: string): Record<string, unknown> {
	const existing = cfg[key]
	if (isPlainObject(existing)) return existing
	const created: Record<string, unknown> = {}
	cfg[key] = created
	return created
}

/** Apply env-var overrides on top of merged YAML. */
function applyEnvOverrides(cfg: Record<string, unknown>): void {
	// database
	const db = section(cfg, "database")
	db.host = env("DB_HOST") ?? db.host
	db.port = envInt("DB_PORT") ?? db.port
	db.name = env("DB_NAME") ?? db.name
	db.user = env("DB_USER") ?? db.user
	db.password = env("DB_PASSWORD") ?? db.password

	// embedding sidecar
	const e = section(cfg, "embedding")
	e.sidecar_url = env("EMBEDDING_SIDECAR_URL") ?? e.sidecar_url
	e.model = env("EMBEDDING_MODEL") ?? e.model
	e.timeout_ms = envInt("EMBEDDING_TIMEOUT_MS") ?? e.timeout_ms

	// ranking
	const r = section(cfg, "ranking")
	r.profile = env("RANKING_PROFILE") ?? r.profile
	r.max_expected_centrality = envInt("MAX_EXPECTED_CENTRALITY") ?? r.max_expected_centrality

	// similarity
	const s = section(cfg, "similarity")
	s.min_threshold = envFloat("SIMILARITY_MIN_THRESHOLD") ?? s.min_threshold
	s.column_match_threshold = envFloat("COLUMN_MATCH_THRESHOLD") ?? s.column_match_threshold
	s.row_log_span = envFloat("ROW_LOG_SPAN") ?? s.row_log_span

	// routing
	const rt = section(cfg, "routing")
	rt.high_confidence_threshold = envFloat("ROUTE_HIGH_CONFIDENCE") ?? rt.high_confidence_threshold

	// logging
	const l = section(cfg, "logging")
	l.level = env("LOG_LEVEL") ?? l.level
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: CatalogConfig | null = null

export function loadConfig(): CatalogConfig {
	if (_config) return _config

	const configDir = findConfigDir()
	let merged: Record<string, unknown> = structuredClone(DEFAULT_CONFIG)

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(deepMerge(merged, base), local)
	}

	applyEnvOverrides(merged)
	_config = catalogConfigSchema.parse(merged)
	return _config
}

export function getConfig(): CatalogConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
