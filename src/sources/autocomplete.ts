/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                        Autocomplete Source                                ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Search suggestion lookups routed through the orchestrator.
 *
 * Operations:
 * - autocomplete.suggest: suggestions for one query
 * - autocomplete.variations: one query expanded with keyword categories,
 *   fetched in parallel through the concurrency gate
 * - autocomplete.batch: up to 50 independent queries in parallel
 *
 * Fan-out sub-queries that fail yield empty results and are reported
 * alongside the successes. If every sub-query fails, the whole operation
 * fails and nothing is cached.
 *
 * @packageDocumentation
 */

import { createLogger } from '../utils/logger.js'
import type { Orchestrator } from '../orchestrator.js'
import type { ConcurrencyGate } from '../utils/concurrency.js'
import type { PooledTransport } from '../utils/transport.js'
import {
	AUTOCOMPLETE_CACHE_TTL,
	BATCH_CACHE_TTL,
	VARIATIONS_CACHE_TTL,
} from '../config/cacheSettings.js'
import { buildVariations, type KeywordCatalog } from './keywords.js'
import type { ExecuteOptions, OperationDefinition } from '../types/core.js'

const logger = createLogger('Autocomplete')

/** Namespace of every autocomplete cache key. */
export const AUTOCOMPLETE_NAMESPACE = 'autocomplete'

export interface SuggestionResult {
	query: string
	suggestions: string[]
}

export interface VariationFailure {
	category: string
	keyword: string
	query: string
	error: string
}

export interface VariationsResult {
	query: string
	/** Suggestions per category, then per keyword */
	categories: Record<string, Record<string, string[]>>
	/** Number of sub-queries sent */
	totalQueries: number
	failures: VariationFailure[]
}

export type BatchItem =
	| { query: string; suggestions: string[] }
	| { query: string; error: string }

export interface BatchResult {
	results: BatchItem[]
	succeeded: number
	failed: number
}

export interface LocaleInput {
	/** Interface language, ISO 639 */
	hl: string
	/** Country, ISO 3166 */
	gl: string
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                          RESPONSE DECODING                                ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Extracts suggestions from an upstream body shaped `[query, [suggestion, ...], ...]`.
 * @throws Error when the body is not in that shape
 */
export function parseSuggestions(body: string): string[] {
	let parsed: unknown
	try {
		parsed = JSON.parse(body)
	} catch (error) {
		throw new Error('Autocomplete response is not valid JSON', { cause: error })
	}

	if (!Array.isArray(parsed) || parsed.length < 2 || !isStringArray(parsed[1])) {
		throw new Error('Autocomplete response has an unexpected shape')
	}

	return parsed[1]
}

export function decodeSuggestionResult(raw: unknown): SuggestionResult {
	if (!isRecord(raw) || typeof raw.query !== 'string' || !isStringArray(raw.suggestions)) {
		throw new Error('Not a suggestion result')
	}
	return { query: raw.query, suggestions: raw.suggestions }
}

export function decodeVariationsResult(raw: unknown): VariationsResult {
	if (
		!isRecord(raw) ||
		typeof raw.query !== 'string' ||
		typeof raw.totalQueries !== 'number' ||
		!isRecord(raw.categories) ||
		!Array.isArray(raw.failures)
	) {
		throw new Error('Not a variations result')
	}

	const categories: VariationsResult['categories'] = {}
	for (const [category, keywords] of Object.entries(raw.categories)) {
		if (!isRecord(keywords)) throw new Error('Not a variations result')
		const byKeyword: Record<string, string[]> = {}
		for (const [keyword, suggestions] of Object.entries(keywords)) {
			if (!isStringArray(suggestions)) throw new Error('Not a variations result')
			byKeyword[keyword] = suggestions
		}
		categories[category] = byKeyword
	}

	const failures = raw.failures.map((item: unknown): VariationFailure => {
		if (
			!isRecord(item) ||
			typeof item.category !== 'string' ||
			typeof item.keyword !== 'string' ||
			typeof item.query !== 'string' ||
			typeof item.error !== 'string'
		) {
			throw new Error('Not a variations result')
		}
		return {
			category: item.category,
			keyword: item.keyword,
			query: item.query,
			error: item.error,
		}
	})

	return { query: raw.query, categories, totalQueries: raw.totalQueries, failures }
}

export function decodeBatchResult(raw: unknown): BatchResult {
	if (
		!isRecord(raw) ||
		!Array.isArray(raw.results) ||
		typeof raw.succeeded !== 'number' ||
		typeof raw.failed !== 'number'
	) {
		throw new Error('Not a batch result')
	}

	const results = raw.results.map((item: unknown): BatchItem => {
		if (!isRecord(item) || typeof item.query !== 'string') {
			throw new Error('Not a batch result')
		}
		if (isStringArray(item.suggestions)) {
			return { query: item.query, suggestions: item.suggestions }
		}
		if (typeof item.error === 'string') {
			return { query: item.query, error: item.error }
		}
		throw new Error('Not a batch result')
	})

	return { results, succeeded: raw.succeeded, failed: raw.failed }
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                          OPERATION DEFINITIONS                            ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

export const suggestOperation: OperationDefinition<SuggestionResult> = {
	name: 'autocomplete.suggest',
	namespace: AUTOCOMPLETE_NAMESPACE,
	ttlMs: AUTOCOMPLETE_CACHE_TTL,
	decode: decodeSuggestionResult,
}

export const variationsOperation: OperationDefinition<VariationsResult> = {
	name: 'autocomplete.variations',
	namespace: AUTOCOMPLETE_NAMESPACE,
	ttlMs: VARIATIONS_CACHE_TTL,
	decode: decodeVariationsResult,
}

export const batchOperation: OperationDefinition<BatchResult> = {
	name: 'autocomplete.batch',
	namespace: AUTOCOMPLETE_NAMESPACE,
	ttlMs: BATCH_CACHE_TTL,
	decode: decodeBatchResult,
}

/*
╔═══════════════════════════════════════════════════════════════════════════╗
║                               SOURCE                                      ║
╚═══════════════════════════════════════════════════════════════════════════╝
*/

export interface AutocompleteSourceOptions {
	orchestrator: Orchestrator
	transport: PooledTransport
	gate: ConcurrencyGate
	catalog: KeywordCatalog
	/** Sub-requests per fan-out when a request does not ask for fewer */
	maxParallel: number
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * Autocomplete lookups, each one a single orchestrated operation.
 */
export class AutocompleteSource {
	readonly catalog: KeywordCatalog
	readonly maxParallel: number
	private readonly orchestrator: Orchestrator
	private readonly transport: PooledTransport
	private readonly gate: ConcurrencyGate

	constructor(options: AutocompleteSourceOptions) {
		this.orchestrator = options.orchestrator
		this.transport = options.transport
		this.gate = options.gate
		this.catalog = options.catalog
		this.maxParallel = options.maxParallel

		const { operations } = this.orchestrator
		operations.register(suggestOperation)
		operations.register(variationsOperation)
		operations.register(batchOperation)
	}

	/**
	 * Suggestions for one query.
	 */
	suggest(
		input: LocaleInput & { q: string },
		options: ExecuteOptions
	): Promise<SuggestionResult> {
		return this.orchestrator.execute(
			suggestOperation,
			{ q: input.q, hl: input.hl, gl: input.gl },
			async ({ signal }) => ({
				query: input.q,
				suggestions: await this.fetchSuggestions(input.q, input, signal),
			}),
			options
		)
	}

	/**
	 * Suggestions for a query expanded with the keywords of each category.
	 */
	variations(
		input: LocaleInput & { q: string; categories: string[]; maxParallel?: number },
		options: ExecuteOptions
	): Promise<VariationsResult> {
		const maxParallel = Math.min(input.maxParallel ?? this.maxParallel, this.maxParallel)

		return this.orchestrator.execute(
			variationsOperation,
			{
				q: input.q,
				hl: input.hl,
				gl: input.gl,
				categories: input.categories.join(','),
			},
			async ({ signal }) => {
				const variations = buildVariations(input.q, this.catalog, input.categories)
				logger.debug(
					`Fetching ${variations.length} variations of "${input.q}" with maxParallel=${maxParallel}`
				)

				const settled = await this.gate.runAll(
					variations.map(
						(variation) => (taskSignal: AbortSignal) =>
							this.fetchSuggestions(variation.query, input, taskSignal)
					),
					{ maxParallel, signal }
				)

				const categories: VariationsResult['categories'] = {}
				for (const category of input.categories) {
					categories[category] = {}
				}
				const failures: VariationFailure[] = []
				let firstFailure: unknown

				settled.forEach((outcome, index) => {
					const variation = variations[index]
					const byKeyword = categories[variation.category] ?? {}
					categories[variation.category] = byKeyword

					if (outcome.status === 'fulfilled') {
						byKeyword[variation.keyword] = outcome.value
						return
					}

					byKeyword[variation.keyword] = []
					firstFailure ??= outcome.reason
					failures.push({ ...variation, error: errorMessage(outcome.reason) })
				})

				if (variations.length > 0 && failures.length === variations.length) {
					throw firstFailure
				}
				if (failures.length > 0) {
					logger.warn(
						`${failures.length} of ${variations.length} variation queries failed for "${input.q}"`
					)
				}

				return {
					query: input.q,
					categories,
					totalQueries: variations.length,
					failures,
				}
			},
			options
		)
	}

	/**
	 * Suggestions for several independent queries.
	 */
	batch(
		input: LocaleInput & { queries: string[]; maxParallel?: number },
		options: ExecuteOptions
	): Promise<BatchResult> {
		const maxParallel = Math.min(input.maxParallel ?? this.maxParallel, this.maxParallel)

		return this.orchestrator.execute(
			batchOperation,
			{ queries: input.queries.join('\n'), hl: input.hl, gl: input.gl },
			async ({ signal }) => {
				const settled = await this.gate.runAll(
					input.queries.map(
						(query) => (taskSignal: AbortSignal) =>
							this.fetchSuggestions(query, input, taskSignal)
					),
					{ maxParallel, signal }
				)

				const results: BatchItem[] = settled.map((outcome, index) =>
					outcome.status === 'fulfilled'
						? { query: input.queries[index], suggestions: outcome.value }
						: { query: input.queries[index], error: errorMessage(outcome.reason) }
				)
				const failed = settled.filter((outcome) => outcome.status === 'rejected')

				if (failed.length > 0 && failed.length === settled.length) {
					const first = failed[0]
					throw first.status === 'rejected' ? first.reason : new Error('Batch failed')
				}

				return {
					results,
					succeeded: settled.length - failed.length,
					failed: failed.length,
				}
			},
			options
		)
	}

	private async fetchSuggestions(
		query: string,
		locale: LocaleInput,
		signal: AbortSignal
	): Promise<string[]> {
		const response = await this.transport.request({
			path: '/complete/search',
			query: { client: 'firefox', q: query, hl: locale.hl, gl: locale.gl },
			signal,
		})
		return parseSuggestions(response.body)
	}
}
