/**
 * Embedding Sidecar HTTP Client
 *
 * Talks to the embedding sidecar that hosts the sentence-embedding model.
 *
 * Responsibilities:
 * - POST /embed and /embed_batch
 * - Timeouts via AbortController
 * - Circuit breaker: a connection failure marks the sidecar unhealthy and
 *   later calls fail fast until a health check succeeds
 */

import { z } from "zod"
import type { EmbeddingProvider } from "./catalog_types.js"
import { CatalogError } from "./config.js"
import type { CatalogConfig } from "./config/loadConfig.js"

export interface EmbeddingClientConfig {
	baseUrl: string
	model: string
	timeoutMs: number
	/** Per-text allowance added to the batch timeout */
	batchTimeoutPerTextMs: number
	maxBatchTimeoutMs: number
}

export const DEFAULT_EMBEDDING_CLIENT_CONFIG: EmbeddingClientConfig = {
	baseUrl: "http://localhost:8001",
	model: "all-MiniLM-L6-v2",
	timeoutMs: 30000,
	batchTimeoutPerTextMs: 1000,
	maxBatchTimeoutMs: 300000,
}

export function embeddingClientConfigFrom(config: CatalogConfig): Partial<EmbeddingClientConfig> {
	return {
		baseUrl: config.embedding.sidecar_url,
		model: config.embedding.model,
		timeoutMs: config.embedding.timeout_ms,
	}
}

const embedResponseSchema = z.object({
	embedding: z.array(z.number()),
	model: z.string().optional(),
	dimensions: z.number().optional(),
})

const embedBatchResponseSchema = z.object({
	embeddings: z.array(z.array(z.number())),
	model: z.string().optional(),
	count: z.number().optional(),
})

type FetchFn = typeof fetch

export class EmbeddingClient implements EmbeddingProvider {
	private config: EmbeddingClientConfig
	private fetchFn: FetchFn
	private isHealthy: boolean = true

	constructor(config?: Partial<EmbeddingClientConfig>, fetchFn: FetchFn = fetch) {
		this.config = { ...DEFAULT_EMBEDDING_CLIENT_CONFIG, ...config }
		this.fetchFn = fetchFn
	}

	/**
	 * Embed a single text
	 */
	async embedText(text: string): Promise<number[]> {
		const body = await this.post("/embed", { text, model: this.config.model }, this.config.timeoutMs)
		const parsed = embedResponseSchema.safeParse(body)
		if (!parsed.success) {
			throw new CatalogError("embedding", "Embedding sidecar returned an unexpected response", false, {
				issues: parsed.error.issues.map((i) => i.message),
			})
		}
		return parsed.data.embedding
	}

	/**
	 * Embed several texts in one request. Output order matches input order.
	 */
	async embedBatch(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) return []
		const timeout = Math.min(
			this.config.timeoutMs + texts.length * this.config.batchTimeoutPerTextMs,
			this.config.maxBatchTimeoutMs,
		)
		const body = await this.post("/embed_batch", { texts, model: this.config.model }, timeout)
		const parsed = embedBatchResponseSchema.safeParse(body)
		if (!parsed.success || parsed.data.embeddings.length !== texts.length) {
			throw new CatalogError("embedding", "Embedding sidecar returned an unexpected batch response", false, {
				expected: texts.length,
			})
		}
		return parsed.data.embeddings
	}

	/**
	 * Returns true if the sidecar answers /health; updates the circuit breaker.
	 */
	async healthCheck(): Promise<boolean> {
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), 5000)
		try {
			const response = await this.fetchFn(`${this.config.baseUrl}/health`, { signal: controller.signal })
			this.isHealthy = response.ok
		} catch {
			this.isHealthy = false
		} finally {
			clearTimeout(timeoutId)
		}
		return this.isHealthy
	}

	isHealthyStatus(): boolean {
		return this.isHealthy
	}

	/**
	 * Force set health status (for testing)
	 */
	setHealthStatus(healthy: boolean): void {
		this.isHealthy = healthy
	}

	private async post(endpoint: string, payload: Record<string, unknown>, timeoutMs: number): Promise<unknown> {
		// Circuit breaker: if the sidecar is unhealthy, fail fast
		if (!this.isHealthy) {
			throw new CatalogError("embedding", "Embedding sidecar is unavailable. Please try again later.", true, {
				baseUrl: this.config.baseUrl,
			})
		}

		const url = `${this.config.baseUrl}${endpoint}`
		const controller = new AbortController()
		const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

		try {
			const response = await this.fetchFn(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify(payload),
				signal: controller.signal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new CatalogError(
					"embedding",
					`Embedding request failed: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			const body: unknown = await response.json()
			return body
		} catch (error) {
			if (error instanceof CatalogError) {
				throw error
			}
			if (error instanceof Error && error.name === "AbortError") {
				throw new CatalogError("timeout", `Embedding request timed out after ${timeoutMs}ms`, true, {
					timeout: timeoutMs,
					url,
				})
			}
			// fetch rejects with TypeError when the sidecar is unreachable
			if (error instanceof TypeError) {
				this.isHealthy = false
				throw new CatalogError(
					"embedding",
					`Cannot connect to embedding sidecar at ${this.config.baseUrl}. Is it running?`,
					true,
					{ baseUrl: this.config.baseUrl, originalError: error.message },
				)
			}
			throw new CatalogError("embedding", `Unexpected embedding error: ${String(error)}`, false, {
				originalError: String(error),
			})
		} finally {
			clearTimeout(timeoutId)
		}
	}
}
