/**
 * Route Confidence Adapter
 *
 * Turns route probabilities from the optional trained classifier into an
 * execution plan:
 * - max probability strictly above the threshold (0.80) → run that route alone
 * - otherwise → run the top routes (2) and merge their ranked results
 *
 * Merging uses linear rank decay over the first `mergeDepth` (5) results of
 * each route: rank r contributes (depth + 1 − r) / depth · route weight.
 *
 * Without classifier output the rule-based classifier picks the route.
 */

import {
	INTENTS,
	isIntent,
	type ExecutionPlan,
	type Intent,
	type RankedResult,
	type RouteClassifier,
	type RouteDecision,
	type RouteProbabilities,
	type WeightedRoute,
} from "./catalog_types.js"
import { CatalogError, type RoutingSettings } from "./config.js"
import { classifyIntent, type IntentRule, buildIntentRules } from "./intent_classifier.js"
import { silentLogger, type Logger } from "./logger.js"
import { extractQueryFeatures, toFeatureVector } from "./query_features.js"

export const DEFAULT_ROUTING_SETTINGS: RoutingSettings = {
	highConfidenceThreshold: 0.8,
	multiRouteCount: 2,
	mergeDepth: 5,
}

/** Weighting used when a merge is requested and no classifier output exists */
export const DEFAULT_FALLBACK_ROUTE_WEIGHTS: WeightedRoute[] = [
	{ route: "semantic_discovery", weight: 0.4 },
	{ route: "metadata_filter", weight: 0.25 },
	{ route: "duplicate_detection", weight: 0.2 },
	{ route: "relationship_traversal", weight: 0.15 },
]

export type RouteResults = Partial<Record<Intent, readonly RankedResult[]>>

/** Raw classifier output keyed by route name; unknown names are ignored */
export type ProbabilityMap = Readonly<Record<string, number | undefined>>

// ============================================================================
// Probabilities
// ============================================================================

/**
 * Keep known intents with finite, non-negative probabilities and renormalise
 * them to sum to 1. Returns null when nothing usable is left.
 */
export function normalizeProbabilities(raw: ProbabilityMap): RouteProbabilities | null {
	const kept: Array<[Intent, number]> = []
	for (const [name, p] of Object.entries(raw)) {
		if (isIntent(name) && typeof p === "number" && Number.isFinite(p) && p >= 0) kept.push([name, p])
	}
	const sum = kept.reduce((acc, [, p]) => acc + p, 0)
	if (kept.length === 0 || sum <= 0) return null

	const normalized: RouteProbabilities = {}
	for (const [intent, p] of kept) normalized[intent] = p / sum
	return normalized
}

/** Routes by probability desc; equal probabilities follow classifier priority order. */
export function rankRoutes(probabilities: RouteProbabilities): WeightedRoute[] {
	const routes: WeightedRoute[] = []
	for (const intent of INTENTS) {
		const weight = probabilities[intent]
		if (weight !== undefined) routes.push({ route: intent, weight })
	}
	// Array.prototype.sort is stable, so ties keep INTENTS order
	return routes.sort((a, b) => b.weight - a.weight)
}

// ============================================================================
// Decide & Merge
// ============================================================================

export function decideExecution(
	probabilities: ProbabilityMap,
	settings: Partial<RoutingSettings> = {},
): ExecutionPlan {
	const { highConfidenceThreshold, multiRouteCount } = { ...DEFAULT_ROUTING_SETTINGS, ...settings }
	const normalized = normalizeProbabilities(probabilities)
	if (!normalized) {
		throw new CatalogError("validation", "Route probabilities must contain at least one known intent with a positive value", false, {
			probabilities,
		})
	}

	const ranked = rankRoutes(normalized)
	const top = ranked[0]
	if (top.weight > highConfidenceThreshold) {
		return { mode: "single", route: top.route, confidence: top.weight }
	}
	return { mode: "multi", routes: ranked.slice(0, Math.max(1, multiRouteCount)) }
}

/**
 * Merge ranked lists from several routes. Each entity keeps the fields of the
 * first list it was seen in; `final_score` becomes the merged score and
 * `routes` lists every route that returned it.
 */
export function mergeRouteResults(
	routeResults: RouteResults,
	weights: readonly WeightedRoute[],
	mergeDepth: number = DEFAULT_ROUTING_SETTINGS.mergeDepth,
): RankedResult[] {
	const merged = new Map<string, { result: RankedResult; score: number; routes: Intent[] }>()

	for (const { route, weight } of weights) {
		const results = routeResults[route] ?? []
		const seen = new Set<string>()
		let rank = 0

		for (const result of results) {
			if (rank >= mergeDepth) break
			if (seen.has(result.entity_id)) continue
			seen.add(result.entity_id)
			rank++

			const contribution = ((mergeDepth + 1 - rank) / mergeDepth) * weight
			const entry = merged.get(result.entity_id)
			if (entry) {
				entry.score += contribution
				entry.routes.push(route)
			} else {
				merged.set(result.entity_id, { result, score: contribution, routes: [route] })
			}
		}
	}

	return [...merged.values()]
		.map(({ result, score, routes }) => ({ ...result, final_score: score, routes }))
		.sort((a, b) => {
			if (b.final_score !== a.final_score) return b.final_score - a.final_score
			if (a.entity_id < b.entity_id) return -1
			if (a.entity_id > b.entity_id) return 1
			return 0
		})
}

/**
 * Route a question. Unusable or missing classifier output falls back to the
 * rule table; this never throws.
 */
export function routeQuestion(
	question: string,
	probabilities?: ProbabilityMap | null,
	rules?: readonly IntentRule[],
): RouteDecision {
	const normalized = probabilities ? normalizeProbabilities(probabilities) : null
	if (!normalized) {
		return { route: classifyIntent(question, rules), method: "rules" }
	}
	const [top] = rankRoutes(normalized)
	return { route: top.route, confidence: top.weight, probabilities: normalized, method: "classifier" }
}

// ============================================================================
// Adapter
// ============================================================================

export interface RoutePlan {
	decision: RouteDecision
	plan: ExecutionPlan
}

export class RouteConfidenceAdapter {
	private settings: RoutingSettings
	private classifier: RouteClassifier | null
	private rules: IntentRule[]
	private logger: Logger

	constructor(
		settings?: Partial<RoutingSettings>,
		classifier: RouteClassifier | null = null,
		platformKeywords?: readonly string[],
		logger: Logger = silentLogger,
	) {
		this.settings = { ...DEFAULT_ROUTING_SETTINGS, ...settings }
		this.classifier = classifier
		this.rules = buildIntentRules(platformKeywords)
		this.logger = logger
	}

	get hasClassifier(): boolean {
		return this.classifier !== null
	}

	decide(probabilities: ProbabilityMap): ExecutionPlan {
		return decideExecution(probabilities, this.settings)
	}

	merge(routeResults: RouteResults, weights: readonly WeightedRoute[]): RankedResult[] {
		return mergeRouteResults(routeResults, weights, this.settings.mergeDepth)
	}

	/**
	 * Ask the classifier, if any, for route probabilities. A classifier failure
	 * is logged and treated as no output.
	 */
	async route(question: string, questionEmbedding?: readonly number[] | null): Promise<RouteDecision> {
		let probabilities: Record<string, number> | null = null
		if (this.classifier) {
			try {
				const features = toFeatureVector(
					extractQueryFeatures(question, questionEmbedding),
					this.classifier.featureNames,
				)
				probabilities = await this.classifier.predictProbabilities(features)
			} catch (err) {
				this.logger.warn("Route classifier failed, using rule-based routing", { error: String(err) })
			}
		}

		const decision = routeQuestion(question, probabilities, this.rules)
		this.logger.debug("Route decided", { route: decision.route, method: decision.method, confidence: decision.confidence })
		return decision
	}

	/**
	 * Plan execution for a question. Rule-based decisions run their route
	 * alone unless `forceMulti` asks for the fallback weighting.
	 */
	async plan(question: string, options: { questionEmbedding?: readonly number[] | null; forceMulti?: boolean } = {}): Promise<RoutePlan> {
		const decision = await this.route(question, options.questionEmbedding)

		if (decision.probabilities) {
			return { decision, plan: this.decide(decision.probabilities) }
		}
		if (options.forceMulti) {
			return { decision, plan: { mode: "multi", routes: DEFAULT_FALLBACK_ROUTE_WEIGHTS } }
		}
		return { decision, plan: { mode: "single", route: decision.route, confidence: 1 } }
	}
}
