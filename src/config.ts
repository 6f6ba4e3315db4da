/**
 * Configuration helpers and shared error type for the catalog server.
 *
 * Turns the loaded YAML/env config into the settings objects the ranking,
 * similarity and routing modules take.
 */

import type { CatalogConfig } from "./config/loadConfig.js"
import type { RankingWeights, SimilarityWeights } from "./catalog_types.js"

/**
 * Catalog error
 *
 * `recoverable` separates per-request outages (retry later) from failures
 * after which no partial result is meaningful.
 */
export class CatalogError extends Error {
	constructor(
		public type: "extraction" | "embedding" | "search" | "validation" | "timeout" | "persistence",
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "CatalogError"
	}
}

export const WEIGHT_SUM_TOLERANCE = 1e-6

export function assertWeightsSumToOne(label: string, weights: Record<string, number>): void {
	const values = Object.values(weights)
	const sum = values.reduce((acc, w) => acc + w, 0)
	if (values.some((w) => !Number.isFinite(w) || w < 0) || Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
		throw new CatalogError("validation", `${label} weights must be non-negative and sum to 1 (got ${sum})`, false, {
			weights,
		})
	}
}

/**
 * Resolve hybrid ranking weights: explicit override > named profile > active profile.
 */
export function resolveRankingWeights(
	config: CatalogConfig,
	override?: { profile?: string; weights?: RankingWeights },
): RankingWeights {
	if (override?.weights) {
		assertWeightsSumToOne("ranking", { ...override.weights })
		return override.weights
	}
	const name = override?.profile ?? config.ranking.profile
	const profile = config.ranking.profiles[name]
	if (!profile) {
		throw new CatalogError("validation", `Unknown ranking profile: ${name}`, false, {
			available: Object.keys(config.ranking.profiles),
		})
	}
	return profile
}

export interface SimilaritySettings {
	weights: SimilarityWeights
	highConfidence: number
	mediumConfidence: number
	columnMatchThreshold: number
	rowLogSpan: number
}

export function similaritySettingsFrom(config: CatalogConfig): SimilaritySettings {
	return {
		weights: config.similarity.weights,
		highConfidence: config.similarity.high_confidence,
		mediumConfidence: config.similarity.medium_confidence,
		columnMatchThreshold: config.similarity.column_match_threshold,
		rowLogSpan: config.similarity.row_log_span,
	}
}

export interface RoutingSettings {
	highConfidenceThreshold: number
	multiRouteCount: number
	mergeDepth: number
}

export function routingSettingsFrom(config: CatalogConfig): RoutingSettings {
	return {
		highConfidenceThreshold: config.routing.high_confidence_threshold,
		multiRouteCount: config.routing.multi_route_count,
		mergeDepth: config.routing.merge_depth,
	}
}
