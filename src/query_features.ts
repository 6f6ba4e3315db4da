/**
 * Query Features
 *
 * Feature extraction for the optional trained route classifier. The
 * classifier itself is a black box; this module only turns a question into
 * the named features it was trained on.
 */

export type QueryFeatures = Record<string, number>

/** Leading embedding dimensions exposed as features (embed_dim_0 … embed_dim_9) */
export const EMBEDDING_FEATURE_DIMS = 10

const DUPLICATE_KEYWORDS = ["duplicate", "copy", "copies", "same as", "identical", "exact", "versions of", "renamed"]
const RELATIONSHIP_KEYWORDS = [
	"join", "connect", "link", "relate", "reference",
	"foreign key", "linked to", "upstream", "downstream",
]
const METADATA_KEYWORDS = ["rows", "large", "small", "size", "count", "most", "largest", "smallest", "columns", "schema"]
const DISCOVERY_KEYWORDS = ["find", "which", "show", "search", "contain", "where", "list", "get"]
const QUESTION_WORDS = ["which", "what", "where", "show", "find"]
const COMPARISON_OPERATORS = [">", "<", ">=", "<=", "="]

function flag(value: boolean): number {
	return value ? 1 : 0
}

function hasKeyword(text: string, keywords: readonly string[]): number {
	return flag(keywords.some((kw) => text.includes(kw)))
}

/** ORDERS, OLIST_SALES.ORDERS: has letters and none of them lower-case */
function isUpperToken(token: string): boolean {
	return /[A-Za-z]/.test(token) && token === token.toUpperCase()
}

function countOccurrences(text: string, needle: string): number {
	return text.split(needle).length - 1
}

export function extractQueryFeatures(question: string, embedding?: readonly number[] | null): QueryFeatures {
	const q = question.toLowerCase()
	const rawTokens = question.split(/\s+/).filter((t) => t.length > 0)
	const tokens = rawTokens.map((t) => t.toLowerCase())

	const features: QueryFeatures = {
		// Lexical
		query_length: tokens.length,
		char_length: question.length,
		avg_word_length: tokens.length > 0 ? tokens.reduce((sum, t) => sum + t.length, 0) / tokens.length : 0,
		has_question_mark: flag(question.includes("?")),

		// Keywords
		has_duplicate_kw: hasKeyword(q, DUPLICATE_KEYWORDS),
		has_relationship_kw: hasKeyword(q, RELATIONSHIP_KEYWORDS),
		has_metadata_kw: hasKeyword(q, METADATA_KEYWORDS),
		has_discovery_kw: hasKeyword(q, DISCOVERY_KEYWORDS),

		// Specificity
		mentions_table_name: flag(rawTokens.some(isUpperToken)),
		contains_number: flag(/\d+/.test(question)),
		has_comparison: flag(COMPARISON_OPERATORS.some((op) => question.includes(op))),

		// Complexity
		num_commas: countOccurrences(question, ","),
		num_and: countOccurrences(q, " and "),
		num_or: countOccurrences(q, " or "),
	}

	for (const word of QUESTION_WORDS) {
		features[`starts_with_${word}`] = flag(q.startsWith(word))
	}

	if (embedding) {
		const dims = Math.min(EMBEDDING_FEATURE_DIMS, embedding.length)
		for (let i = 0; i < dims; i++) {
			features[`embed_dim_${i}`] = embedding[i]
		}
	}

	return features
}

/**
 * Order features as the classifier expects. Features the question did not
 * produce (e.g. embedding dims without an embedding) are 0.
 */
export function toFeatureVector(features: QueryFeatures, featureNames: readonly string[]): number[] {
	return featureNames.map((name) => features[name] ?? 0)
}
