/**
 * Retry with exponential backoff.
 */
import { setTimeout as sleep } from 'node:timers/promises'

import { attempt } from './attempt.js'


export interface RetryOptions {

    /** Attempts after the first */
    retries: number

    /** Milliseconds before the first retry */
    delay: number

    /** Multiplier applied to the delay after each retry */
    backoff: number

    /** Random spread of each delay, as a fraction of it (0 to 1) */
    jitterFactor?: number

    /** Whether a failure is worth another attempt. Defaults to always. */
    shouldRetry?: (err: Error) => boolean
}


/**
 * Run `fn` until it resolves, the retries run out or `shouldRetry` refuses.
 * The last failure is thrown as is.
 *
 * @example
 * ```typescript
 * const db = await retry(() => openAndCheck(config), {
 *     retries: 3,
 *     delay: 1000,
 *     backoff: 2,  // 1s, 2s, 4s
 *     shouldRetry: isTransientConnectionError,
 * })
 * ```
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {

    const { retries, backoff, jitterFactor = 0, shouldRetry = () => true } = options

    let delay = options.delay

    for (let attemptNb = 0; ; attemptNb++) {

        const [result, err] = await attempt(fn)

        if (!err) return result

        if (attemptNb >= retries || !shouldRetry(err)) throw err

        const jitter = delay * jitterFactor * (Math.random() * 2 - 1)

        await sleep(Math.max(0, Math.round(delay + jitter)))

        delay *= backoff
    }
}
