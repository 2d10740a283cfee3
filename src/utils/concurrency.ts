/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Concurrency Gate                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Bounded-parallelism fan-out for batch sub-requests.
 *
 * Each batch gets its own p-limit queue capped at `maxParallel`, nested in a
 * process-wide queue that caps the sum of all batches. Results come back in
 * input order as settled outcomes; one failing task never cancels another.
 *
 * @packageDocumentation
 */

import pLimit, { type LimitFunction } from 'p-limit'
import { diagnostic } from './logger.js'

/** A unit of fan-out work. The signal aborts when the caller gives up. */
export type GateTask<T> = (signal: AbortSignal) => Promise<T>

export interface RunAllOptions {
	/** Tasks of this batch allowed to run at once */
	maxParallel?: number
	/** Aborting it settles every task that has not started yet as rejected */
	signal?: AbortSignal
}

export interface ConcurrencyGateOptions {
	/** Ceiling on tasks running across all batches */
	maxConcurrency: number
	/** `maxParallel` used when a batch does not give one */
	defaultMaxParallel: number
}

export interface ConcurrencyGateStats {
	maxConcurrency: number
	defaultMaxParallel: number
	/** Tasks currently running */
	active: number
	/** Tasks submitted and waiting for a slot */
	queued: number
	/** Batches completed since start */
	batches: number
}

function assertPositiveInteger(name: string, value: number): void {
	if (!Number.isInteger(value) || value < 1) {
		throw new RangeError(`${name} must be a positive integer, got ${value}`)
	}
}

/**
 * Runs batches of tasks with bounded parallelism.
 */
export class ConcurrencyGate {
	readonly maxConcurrency: number
	readonly defaultMaxParallel: number
	private readonly global: LimitFunction

	private active = 0
	private queued = 0
	private batches = 0

	constructor(options: ConcurrencyGateOptions) {
		assertPositiveInteger('maxConcurrency', options.maxConcurrency)
		assertPositiveInteger('defaultMaxParallel', options.defaultMaxParallel)
		this.maxConcurrency = options.maxConcurrency
		this.defaultMaxParallel = options.defaultMaxParallel
		this.global = pLimit(options.maxConcurrency)
	}

	/**
	 * Runs every task, never more than `maxParallel` of them at once.
	 *
	 * @returns One settled result per task, `result[i]` for `tasks[i]`
	 * @throws RangeError when `maxParallel` is not a positive integer
	 *
	 * @example
	 * ```typescript
	 * const results = await gate.runAll(
	 *   queries.map((q) => (signal) => fetchSuggestions(q, signal)),
	 *   { maxParallel: 3 }
	 * )
	 * ```
	 */
	async runAll<T>(
		tasks: ReadonlyArray<GateTask<T>>,
		options: RunAllOptions = {}
	): Promise<PromiseSettledResult<T>[]> {
		const maxParallel = options.maxParallel ?? this.defaultMaxParallel
		assertPositiveInteger('maxParallel', maxParallel)

		const signal = options.signal ?? new AbortController().signal
		const batch = pLimit(maxParallel)

		diagnostic.debug('Gate batch started', {
			tasks: tasks.length,
			maxParallel,
			active: this.active,
			queued: this.queued,
		})

		this.queued += tasks.length
		const results = await Promise.allSettled(
			tasks.map((task) =>
				batch(() =>
					this.global(async () => {
						this.queued--
						// Abandoned batches release their slots without running
						signal.throwIfAborted()
						this.active++
						try {
							return await task(signal)
						} finally {
							this.active--
						}
					})
				)
			)
		)
		this.batches++

		return results
	}

	getStats(): ConcurrencyGateStats {
		return {
			maxConcurrency: this.maxConcurrency,
			defaultMaxParallel: this.defaultMaxParallel,
			active: this.active,
			queued: this.queued,
			batches: this.batches,
		}
	}
}
