/**
 * Error tuples.
 *
 * `attempt` turns a rejection into a value so a failure is handled where it
 * happens, in line, instead of in a distant catch block.
 *
 * @example
 * ```typescript
 * const [content, err] = await attempt(() => readFile(path, 'utf-8'))
 *
 * if (err) {
 *     throw new Error(`Failed to read config file: ${err.message}`)
 * }
 * ```
 */

export type ResultTuple<T> = [T, null] | [null, Error]


/**
 * Normalise a thrown value into an `Error`.
 */
export function toError(value: unknown): Error {

    if (value instanceof Error) return value

    return new Error(typeof value === 'string' ? value : String(value))
}


/**
 * Await `fn` and return `[value, null]`, or `[null, error]` if it rejects.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<ResultTuple<T>> {

    try {

        return [await fn(), null]
    }
    catch (err) {

        return [null, toError(err)]
    }
}


/**
 * Synchronous `attempt`.
 */
export function attemptSync<T>(fn: () => T): ResultTuple<T> {

    try {

        return [fn(), null]
    }
    catch (err) {

        return [null, toError(err)]
    }
}
