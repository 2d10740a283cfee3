/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                           ⇄  UPSTREAM RELAY  ⇄                            ║
 * ║                          Store Call Timeouts                              ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * Bounds calls to networked stores so a hung store turns into an ordinary
 * failure that the caller's fallback path can handle.
 *
 * @packageDocumentation
 */

/**
 * A store call that did not settle in time.
 */
export class StoreTimeoutError extends Error {
	constructor(
		readonly store: string,
		readonly timeoutMs: number
	) {
		super(`Store ${store} did not answer within ${timeoutMs}ms`)
		this.name = 'StoreTimeoutError'
	}
}

/**
 * Settles with `work`, or rejects with {@link StoreTimeoutError} once
 * `timeoutMs` passes. The work itself is not cancelled; a late rejection
 * is ignored.
 */
export function withTimeout<T>(
	work: Promise<T>,
	timeoutMs: number,
	store: string
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			reject(new StoreTimeoutError(store, timeoutMs))
		}, timeoutMs)

		work.then(
			(value) => {
				clearTimeout(timer)
				resolve(value)
			},
			(error: unknown) => {
				clearTimeout(timer)
				reject(error)
			}
		)
	})
}
