/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                         Keyword Categories                                ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Loads the keyword catalog used to expand a query into variations, and
 * builds the variation queries for a selection of categories.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs'

/** Catalog file shipped in data/, resolved from this module's location. */
export const DEFAULT_CATALOG_URL = new URL(
	'../../data/keywordCategories.json',
	import.meta.url
)

/** Categories whose keywords are appended to the query instead of prefixed. */
const SUFFIX_CATEGORIES: ReadonlySet<string> = new Set(['Alphabet'])

export interface KeywordCatalog {
	/** Keywords per category, in catalog order */
	categories: Record<string, string[]>
	/** Categories used when a request names none */
	defaultCategories: string[]
}

/**
 * One expanded query of a variations fan-out.
 */
export interface KeywordVariation {
	category: string
	keyword: string
	query: string
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

/**
 * Validates the parsed catalog file.
 * @throws Error naming the first problem found
 */
export function parseKeywordCatalog(raw: unknown): KeywordCatalog {
	if (typeof raw !== 'object' || raw === null) {
		throw new Error('Keyword catalog must be a JSON object')
	}
	if (!('categories' in raw) || typeof raw.categories !== 'object' || raw.categories === null) {
		throw new Error('Keyword catalog is missing "categories"')
	}

	const categories: Record<string, string[]> = {}
	for (const [name, keywords] of Object.entries(raw.categories)) {
		if (!isStringArray(keywords)) {
			throw new Error(`Keyword category ${name} must be a list of strings`)
		}
		categories[name] = keywords
	}

	const defaults =
		'defaultCategories' in raw && isStringArray(raw.defaultCategories)
			? raw.defaultCategories
			: Object.keys(categories)

	const missing = defaults.filter((name) => !(name in categories))
	if (missing.length > 0) {
		throw new Error(`Default keyword categories not in catalog: ${missing.join(', ')}`)
	}

	return { categories, defaultCategories: defaults }
}

/**
 * Reads and validates a keyword catalog file.
 */
export function loadKeywordCatalog(source: URL | string = DEFAULT_CATALOG_URL): KeywordCatalog {
	const raw: unknown = JSON.parse(readFileSync(source, 'utf8'))
	return parseKeywordCatalog(raw)
}

/**
 * Expands a query with every keyword of the selected categories.
 * Alphabet keywords follow the query; all others precede it.
 */
export function buildVariations(
	query: string,
	catalog: KeywordCatalog,
	selected: readonly string[]
): KeywordVariation[] {
	const variations: KeywordVariation[] = []

	for (const category of selected) {
		const keywords = catalog.categories[category] ?? []
		for (const keyword of keywords) {
			variations.push({
				category,
				keyword,
				query: SUFFIX_CATEGORIES.has(category)
					? `${query} ${keyword}`
					: `${keyword} ${query}`,
			})
		}
	}

	return variations
}
