/**
 * Environment variable configuration.
 *
 * Every config property can be overridden with a VERSIONER_* variable. The
 * underscore separator maps directly to object nesting.
 *
 * @example
 * ```bash
 * VERSIONER_CONNECTION_DIALECT=postgres
 * VERSIONER_CONNECTION_HOST=localhost
 * VERSIONER_CONNECTION_PORT=5432
 * VERSIONER_CONNECTION_DATABASE=myapp
 * VERSIONER_LOGGING_LEVEL=verbose
 * VERSIONER_TRANSACTIONAL=false
 * VERSIONER_BOOTSTRAP_ENABLED=false
 * ```
 */
import { isPlainObject, type PlainObject } from '../shared/merge.js'
import type { VersionerConfigInput } from './types.js'
import { validateConfigInput } from './schema.js'


const PREFIX = 'VERSIONER_'


/**
 * Meta env vars that control runtime behavior, not config values.
 */
const META_ENV_VARS = new Set([
    'VERSIONER_CONFIG',    // Config file path
    'VERSIONER_DEBUG',     // Observer spy
    'VERSIONER_HEADLESS',  // Force CI output
])


/**
 * VERSIONER_* variables that carry config values.
 */
function configEnv(): Record<string, string> {

    const env: Record<string, string> = {}

    for (const [key, value] of Object.entries(process.env)) {

        if (value === undefined) continue
        if (!key.startsWith(PREFIX) || META_ENV_VARS.has(key)) continue

        env[key] = value
    }

    return env
}


/**
 * Booleans and numbers are converted; anything else stays a string.
 */
function convertValue(value: string): unknown {

    if (value === 'true') return true
    if (value === 'false') return false

    if (value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value)

    return value
}


/**
 * Nest variables by their underscore-separated, lowercased path.
 * Passwords are never converted.
 */
function nestEnv(env: Record<string, string>): PlainObject {

    const config: PlainObject = {}

    for (const [key, raw] of Object.entries(env)) {

        const path = key.slice(PREFIX.length).toLowerCase().split('_')
        const leaf = path.pop()

        if (!leaf) continue

        let node = config

        for (const segment of path) {

            const child = node[segment]

            if (isPlainObject(child)) {

                node = child
                continue
            }

            const created: PlainObject = {}

            node[segment] = created
            node = created
        }

        node[leaf] = key.toLowerCase().includes('password') ? raw : convertValue(raw)
    }

    return config
}


/**
 * Read config values from environment variables.
 *
 * @throws ConfigValidationError if a variable holds an invalid value
 *
 * @example
 * ```typescript
 * // With VERSIONER_LOGGING_LEVEL=verbose and VERSIONER_TRANSACTIONAL=false
 * const envConfig = getEnvConfig()
 * // { logging: { level: 'verbose' }, transactional: false }
 * ```
 */
export function getEnvConfig(): VersionerConfigInput {

    const config: unknown = nestEnv(configEnv())

    validateConfigInput(config)

    return config
}


/**
 * Config file path from the environment.
 *
 * Returns the value of VERSIONER_CONFIG if set.
 */
export function getEnvConfigPath(): string | undefined {

    return process.env['VERSIONER_CONFIG']
}
