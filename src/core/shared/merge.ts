/**
 * Deep copy and merge of plain config objects.
 */


export type PlainObject = Record<string, unknown>


export function isPlainObject(value: unknown): value is PlainObject {

    if (typeof value !== 'object' || value === null) return false

    const proto: unknown = Object.getPrototypeOf(value)

    return proto === Object.prototype || proto === null
}


/**
 * Deep copy of a config value.
 */
export function clone<T>(value: T): T {

    return structuredClone(value)
}


/**
 * Merge `source` into a copy of `target`.
 *
 * Plain objects merge key by key; every other value in `source`, arrays
 * included, replaces the target's. `undefined` in `source` is skipped.
 *
 * @example
 * ```typescript
 * merge({ logging: { level: 'info', color: false } }, { logging: { level: 'verbose' } })
 * // { logging: { level: 'verbose', color: false } }
 * ```
 */
export function merge<T extends PlainObject>(target: T, source: PlainObject): T
export function merge(target: PlainObject, source: PlainObject): PlainObject {

    const result: PlainObject = { ...target }

    for (const [key, value] of Object.entries(source)) {

        if (value === undefined) continue

        const current = result[key]

        result[key] = isPlainObject(current) && isPlainObject(value)
            ? merge(current, value)
            : value
    }

    return result
}
