/**
 * Similarity primitives shared by the ranker and the table scorer.
 */

/** Clamp to [0, 1]; NaN becomes 0. */
export function clampUnit(value: number): number {
	if (Number.isNaN(value)) return 0
	return Math.min(1, Math.max(0, value))
}

export function roundTo(value: number, decimals: number): number {
	const factor = 10 ** decimals
	return Math.round(value * factor) / factor
}

/**
 * Cosine similarity of two vectors, clamped to [0, 1].
 *
 * Returns 0 when either vector is missing, empty, zero-norm, or the
 * dimensions disagree.
 */
export function cosineSimilarity(a: readonly number[] | null | undefined, b: readonly number[] | null | undefined): number {
	if (!a || !b || a.length === 0 || a.length !== b.length) return 0
	let dot = 0
	let normA = 0
	let normB = 0
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i]
		normA += a[i] * a[i]
		normB += b[i] * b[i]
	}
	if (normA === 0 || normB === 0) return 0
	return clampUnit(dot / (Math.sqrt(normA) * Math.sqrt(normB)))
}

/**
 * Jaccard similarity |A ∩ B| / |A ∪ B|.
 *
 * Two empty sets score 0, not 1.
 */
export function jaccardSimilarity<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
	if (a.size === 0 || b.size === 0) return 0
	let intersection = 0
	for (const item of a) {
		if (b.has(item)) intersection++
	}
	const union = a.size + b.size - intersection
	return union > 0 ? intersection / union : 0
}
