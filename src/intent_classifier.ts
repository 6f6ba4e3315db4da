/**
 * Query Intent Classifier
 *
 * Classifies a catalog question into one of the retrieval routes.
 *
 * Rules are evaluated in a fixed priority order and the first match wins, so
 * "Which columns are sensitive and duplicated?" is a sensitivity question even
 * though it also mentions duplicates. Anything unmatched is semantic discovery.
 */

import {
	DEFAULT_INTENT,
	type Intent,
	type QueryAnalysis,
	type RowThreshold,
	type ThresholdOperator,
} from "./catalog_types.js"

export interface IntentRule {
	intent: Intent
	matches: (questionLower: string) => boolean
}

const SENSITIVITY_KEYWORDS = [
	"sensitive", "sensitivity", "pii", "personal", "classified", "confidential",
	"private", "high sensitivity", "low sensitivity", "critical",
]

const CROSS_SOURCE_PATTERNS = [
	/similar.{0,20}(?:across|between|snowflake|databricks)/,
	/(?:snowflake|databricks).{0,20}similar/,
	/cross.{0,10}(?:source|platform|system)/,
	/match.{0,20}(?:between|across)/,
	/databricks.{0,20}(?:like|similar to|match).{0,20}snowflake/,
	/snowflake.{0,20}(?:like|similar to|match).{0,20}databricks/,
	/similar_to/,
	/same data.{0,10}(?:across|in both)/,
	/why.{0,20}similar/,
	/explain.{0,20}match/,
]

export const DEFAULT_PLATFORM_KEYWORDS = [
	"databricks", "unity catalog", "workspace.sample_data",
	"sales_transactions", "customer_feedback",
	"federated table", "federated column",
]

const DUPLICATE_KEYWORDS = [
	"duplicate", "duplicates", "exact cop", "same as", "versions of",
	"renamed", "copies", "copy of", "similar table",
]

const LINEAGE_KEYWORDS = [
	"derives from", "derived from", "derive from",
	"feeds into", "feed into", "upstream", "downstream",
	"lineage", "source of", "created from", "built from",
	"depends on", "dependency", "dependencies",
]

const RELATIONSHIP_KEYWORDS = [
	"connect to", "connects to", "connected to",
	"reference", "references", "referenced by",
	"foreign key", "fk", "linked to", "links to",
	"related to", "relates to",
]

const METADATA_PATTERNS = [
	/most rows/, /largest/, /biggest/,
	/smallest/, /fewest rows/, /least rows/,
	/more than \d+/, /greater than \d+/,
	/less than \d+/, /fewer than \d+/,
	/>=?\s*\d+k?\s*rows/, /<=?\s*\d+k?\s*rows/,
	/at least \d+/, /at most \d+/,
	/\d+k\+\s*rows/,
]

function containsAny(text: string, keywords: readonly string[]): boolean {
	return keywords.some((kw) => text.includes(kw))
}

function matchesAny(text: string, patterns: readonly RegExp[]): boolean {
	return patterns.some((p) => p.test(text))
}

function isSchemaMembershipQuestion(q: string): boolean {
	return (q.includes("tables in") || q.includes("tables are in")) && q.includes("schema")
}

/**
 * Build the ordered rule table. `platformKeywords` names the second
 * platform's catalog objects (workspace, catalog and table names).
 */
export function buildIntentRules(platformKeywords: readonly string[] = DEFAULT_PLATFORM_KEYWORDS): IntentRule[] {
	const platform = platformKeywords.map((kw) => kw.toLowerCase())
	return [
		{ intent: "sensitivity_query", matches: (q) => containsAny(q, SENSITIVITY_KEYWORDS) },
		{ intent: "cross_source", matches: (q) => matchesAny(q, CROSS_SOURCE_PATTERNS) },
		{ intent: "databricks_discovery", matches: (q) => containsAny(q, platform) },
		{ intent: "duplicate_detection", matches: (q) => containsAny(q, DUPLICATE_KEYWORDS) },
		{ intent: "lineage_query", matches: (q) => containsAny(q, LINEAGE_KEYWORDS) },
		{ intent: "relationship_traversal", matches: (q) => containsAny(q, RELATIONSHIP_KEYWORDS) },
		{
			intent: "metadata_filter",
			matches: (q) => matchesAny(q, METADATA_PATTERNS) || isSchemaMembershipQuestion(q),
		},
	]
}

const DEFAULT_RULES = buildIntentRules()

export function classifyIntent(question: string, rules: readonly IntentRule[] = DEFAULT_RULES): Intent {
	const q = question.toLowerCase()
	for (const rule of rules) {
		if (rule.matches(q)) return rule.intent
	}
	return DEFAULT_INTENT
}

// ============================================================================
// Row Thresholds
// ============================================================================

// "100,000" or "250"
const NUMBER = String.raw`(\d{1,3}(?:,\d{3})+|\d+)`

interface ThresholdPattern {
	pattern: RegExp
	operator: (comparator: string) => ThresholdOperator
	/** Capture group holding the number; the group right after it holds "k" */
	numberGroup: number
	/** "Nk+ rows" always carries the k */
	impliedK?: boolean
}

const THRESHOLD_PATTERNS: ThresholdPattern[] = [
	{ pattern: new RegExp(String.raw`(>=?)\s*${NUMBER}(k)?\s*rows?`), operator: (c) => (c === ">=" ? "gte" : "gt"), numberGroup: 2 },
	{ pattern: new RegExp(String.raw`(<=?)\s*${NUMBER}(k)?\s*rows?`), operator: (c) => (c === "<=" ? "lte" : "lt"), numberGroup: 2 },
	{ pattern: new RegExp(String.raw`()${NUMBER}k\+\s*rows?`), operator: () => "gt", numberGroup: 2, impliedK: true },
	{ pattern: new RegExp(String.raw`(more|greater) than ${NUMBER}(k)?`), operator: () => "gt", numberGroup: 2 },
	{ pattern: new RegExp(String.raw`(at least) ${NUMBER}(k)?`), operator: () => "gte", numberGroup: 2 },
	{ pattern: new RegExp(String.raw`(less|fewer) than ${NUMBER}(k)?`), operator: () => "lt", numberGroup: 2 },
	{ pattern: new RegExp(String.raw`(at most) ${NUMBER}(k)?`), operator: () => "lte", numberGroup: 2 },
]

/**
 * Parse a row-count threshold ("more than 100k rows" → 100000, gt).
 * Returns null when the question carries no numeric row phrase.
 */
export function parseRowThreshold(question: string): RowThreshold | null {
	const q = question.toLowerCase()
	for (const { pattern, operator, numberGroup, impliedK } of THRESHOLD_PATTERNS) {
		const match = pattern.exec(q)
		if (!match) continue
		const digits = match[numberGroup].replace(/,/g, "")
		const hasK = impliedK === true || match[numberGroup + 1] === "k"
		const value = parseInt(digits, 10) * (hasK ? 1000 : 1)
		return { value, operator: operator(match[1]) }
	}
	return null
}

export function matchesRowThreshold(rowCount: number, threshold: RowThreshold): boolean {
	switch (threshold.operator) {
		case "gt":
			return rowCount > threshold.value
		case "gte":
			return rowCount >= threshold.value
		case "lt":
			return rowCount < threshold.value
		case "lte":
			return rowCount <= threshold.value
	}
}

/**
 * Classify a question and, for metadata filters only, extract its row threshold.
 */
export function analyzeQuestion(question: string, rules: readonly IntentRule[] = DEFAULT_RULES): QueryAnalysis {
	const intent = classifyIntent(question, rules)
	return {
		question,
		intent,
		row_threshold: intent === "metadata_filter" ? parseRowThreshold(question) : null,
	}
}
