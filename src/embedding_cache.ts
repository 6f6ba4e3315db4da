/**
 * Column Embedding Cache
 *
 * Memoises column-name embeddings across the N×M duplicate sweep, keyed by
 * the normalised column name (so CUSTOMER_ID and customerid share a vector).
 *
 * Warm the cache before the sweep; the scorer then reads it synchronously
 * through `vectorFor`.
 */

import type { EmbeddingProvider } from "./catalog_types.js"
import { silentLogger, type Logger } from "./logger.js"
import type { ColumnVectorLookup } from "./table_similarity.js"
import { normalizeColumnName } from "./table_signature.js"

/** Provider that may also embed in batches */
export interface BatchEmbeddingProvider extends EmbeddingProvider {
	embedBatch?(texts: string[]): Promise<number[][]>
}

export const DEFAULT_WARM_BATCH_SIZE = 64

export class EmbeddingCache implements ColumnVectorLookup {
	private provider: BatchEmbeddingProvider
	private logger: Logger
	private batchSize: number
	private vectors = new Map<string, readonly number[] | null>()

	constructor(provider: BatchEmbeddingProvider, logger: Logger = silentLogger, batchSize: number = DEFAULT_WARM_BATCH_SIZE) {
		this.provider = provider
		this.logger = logger
		this.batchSize = Math.max(1, batchSize)
	}

	get size(): number {
		return this.vectors.size
	}

	has(columnName: string): boolean {
		return this.vectors.has(normalizeColumnName(columnName))
	}

	/** Cached vector, or null when the name was never warmed or failed to embed. */
	vectorFor(columnName: string): readonly number[] | null {
		return this.vectors.get(normalizeColumnName(columnName)) ?? null
	}

	/**
	 * Embed one name, memoised. A failure is cached as null so the sweep does
	 * not retry it per pair.
	 */
	async get(columnName: string): Promise<readonly number[] | null> {
		const key = normalizeColumnName(columnName)
		if (this.vectors.has(key)) return this.vectors.get(key) ?? null

		let vector: readonly number[] | null = null
		try {
			vector = Object.freeze(await this.provider.embedText(columnName))
		} catch (err) {
			this.logger.warn("Column name embedding failed", { column: columnName, error: String(err) })
		}
		this.vectors.set(key, vector)
		return vector
	}

	/**
	 * Embed every name not yet cached. Uses batch requests when the provider
	 * supports them and falls back to single requests for a failed batch.
	 * Returns the number of names newly cached.
	 */
	async warm(columnNames: readonly string[]): Promise<number> {
		const pending = new Map<string, string>()
		for (const name of columnNames) {
			const key = normalizeColumnName(name)
			if (key && !this.vectors.has(key) && !pending.has(key)) pending.set(key, name)
		}
		const names = [...pending.values()]
		if (names.length === 0) return 0

		const startTime = Date.now()
		for (let i = 0; i < names.length; i += this.batchSize) {
			await this.warmBatch(names.slice(i, i + this.batchSize))
		}

		this.logger.info("Column embedding cache warmed", {
			names: names.length,
			cached: this.vectors.size,
			duration_ms: Date.now() - startTime,
		})
		return names.length
	}

	private async warmBatch(names: string[]): Promise<void> {
		if (this.provider.embedBatch) {
			try {
				const vectors = await this.provider.embedBatch(names)
				if (vectors.length !== names.length) {
					throw new Error(`expected ${names.length} vectors, got ${vectors.length}`)
				}
				names.forEach((name, i) => this.vectors.set(normalizeColumnName(name), Object.freeze(vectors[i])))
				return
			} catch (err) {
				this.logger.warn("Batch embedding failed, embedding names one by one", {
					batch_size: names.length,
					error: String(err),
				})
			}
		}
		for (const name of names) {
			await this.get(name)
		}
	}
}
