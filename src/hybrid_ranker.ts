/**
 * Hybrid Ranker
 *
 * Fuses the semantic (ANN) score of each candidate table with a structural
 * score derived from its graph centrality:
 *
 *   structural = ln(centrality + 1) / ln(K + 1)      (0 when centrality = 0)
 *   final      = w_semantic * semantic + w_structural * structural
 *
 * The log keeps hub tables with many relationships from outranking
 * semantically better matches. K is the max expected centrality (default 6);
 * anything above it saturates at 1.
 *
 * Ordering: final score desc, then row count desc, then entity id asc.
 */

import type { RankedResult, RankingCandidate, RankingWeights } from "./catalog_types.js"
import { assertWeightsSumToOne } from "./config.js"
import { clampUnit } from "./similarity_math.js"

export const DEFAULT_MAX_EXPECTED_CENTRALITY = 6
export const MAX_NEIGHBORS = 3

export type RankingProfile = "discovery" | "moderate" | "balanced"

export const RANKING_PROFILES: Record<RankingProfile, RankingWeights> = {
	discovery: { semantic: 0.8, structural: 0.2 },
	moderate: { semantic: 0.7, structural: 0.3 },
	balanced: { semantic: 0.6, structural: 0.4 },
}

export const DEFAULT_RANKING_WEIGHTS: RankingWeights = RANKING_PROFILES.discovery

export function computeStructuralScore(
	centrality: number,
	maxExpectedCentrality: number = DEFAULT_MAX_EXPECTED_CENTRALITY,
): number {
	if (!(centrality > 0) || !(maxExpectedCentrality > 0)) return 0
	return clampUnit(Math.log(centrality + 1) / Math.log(maxExpectedCentrality + 1))
}

/** Total order used for ranked lists. */
export function compareRanked(a: RankedResult, b: RankedResult): number {
	if (b.final_score !== a.final_score) return b.final_score - a.final_score
	if (b.row_count !== a.row_count) return b.row_count - a.row_count
	if (a.entity_id < b.entity_id) return -1
	if (a.entity_id > b.entity_id) return 1
	return 0
}

function explainRanking(candidate: RankingCandidate, semantic: number, structural: number): string {
	const prefix = candidate.source ? `${candidate.source}: ` : "hybrid: "
	return `${prefix}semantic=${semantic.toFixed(2)}, structural=${structural.toFixed(2)} (centrality ${candidate.centrality})`
}

export interface HybridRankerConfig {
	weights: RankingWeights
	maxExpectedCentrality: number
}

export class HybridRanker {
	private config: HybridRankerConfig

	constructor(config?: Partial<HybridRankerConfig>) {
		this.config = {
			weights: DEFAULT_RANKING_WEIGHTS,
			maxExpectedCentrality: DEFAULT_MAX_EXPECTED_CENTRALITY,
			...config,
		}
		assertWeightsSumToOne("ranking", this.config.weights)
	}

	get weights(): RankingWeights {
		return this.config.weights
	}

	/**
	 * Rank candidates. `weights` overrides the configured weights for this call.
	 */
	rank(candidates: readonly RankingCandidate[], weights?: RankingWeights): RankedResult[] {
		const w = weights ?? this.config.weights
		if (weights) assertWeightsSumToOne("ranking", weights)

		const ranked = candidates.map((candidate): RankedResult => {
			const semantic = clampUnit(candidate.semantic_score)
			const centrality = Math.max(0, Math.floor(candidate.centrality))
			const structural = computeStructuralScore(centrality, this.config.maxExpectedCentrality)
			const finalScore = clampUnit(w.semantic * semantic + w.structural * structural)

			return {
				entity_id: candidate.id,
				semantic_score: semantic,
				structural_score: structural,
				final_score: finalScore,
				centrality,
				row_count: Math.max(0, candidate.row_count),
				neighbors: candidate.neighbors.slice(0, MAX_NEIGHBORS),
				reasoning: explainRanking(candidate, semantic, structural),
			}
		})

		return ranked.sort(compareRanked)
	}
}

/** Rank with default settings; see HybridRanker.rank. */
export function rankCandidates(
	candidates: readonly RankingCandidate[],
	weights: RankingWeights = DEFAULT_RANKING_WEIGHTS,
	maxExpectedCentrality: number = DEFAULT_MAX_EXPECTED_CENTRALITY,
): RankedResult[] {
	return new HybridRanker({ weights, maxExpectedCentrality }).rank(candidates)
}
