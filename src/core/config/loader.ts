/**
 * Config loader - merges configuration from multiple sources.
 *
 * Priority order (highest to lowest):
 * 1. Explicit overrides
 * 2. Environment variables
 * 3. YAML config file
 * 4. Defaults
 */
import { access, readFile } from 'node:fs/promises'
import { join } from 'node:path'
import { parse as parseYaml } from 'yaml'

import { observer } from '../observer.js'
import { attempt, attemptSync } from '../shared/attempt.js'
import { clone, merge } from '../shared/merge.js'
import { getEnvConfig, getEnvConfigPath } from './env.js'
import { parseConfig, validateConfigInput } from './schema.js'
import type { VersionerConfig, VersionerConfigInput } from './types.js'


/**
 * File looked up in the working directory when no path is given.
 */
export const DEFAULT_CONFIG_FILE = 'versioner.yml'


/**
 * Default config values.
 */
const DEFAULTS: VersionerConfigInput = {

    logging: {
        enabled: true,
        level: 'info',
        color: false,
    },
    transactional: true,
    bootstrap: {
        enabled: true,
        version: 0,
    },
}


/**
 * Options for loading a config.
 */
export interface LoadConfigOptions {

    /** Config file path (overrides VERSIONER_CONFIG and the default file) */
    file?: string

    /** Directory searched for the default file */
    cwd?: string

    /** Values that win over every other source */
    overrides?: VersionerConfigInput
}


/**
 * Read and validate a YAML config file.
 *
 * An empty file yields an empty config.
 *
 * @throws Error if the file cannot be read or is not valid YAML
 * @throws ConfigValidationError if the content has invalid values
 */
export async function readConfigFile(path: string): Promise<VersionerConfigInput> {

    const [content, readErr] = await attempt(() => readFile(path, 'utf-8'))

    if (readErr) {

        throw new Error(`Failed to read config file: ${readErr.message}`)
    }

    const [parsed, yamlErr] = attemptSync((): unknown => parseYaml(content))

    if (yamlErr) {

        throw new Error(`Invalid YAML in config file: ${yamlErr.message}`)
    }

    if (parsed === null || parsed === undefined) {

        return {}
    }

    validateConfigInput(parsed)

    return parsed
}


/**
 * Find the config file to load, if any.
 */
async function resolveConfigPath(options: LoadConfigOptions): Promise<string | null> {

    const explicit = options.file ?? getEnvConfigPath()

    if (explicit) return explicit

    const candidate = join(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE)
    const [, missing] = await attempt(() => access(candidate))

    return missing ? null : candidate
}


/**
 * Load the config from all sources.
 *
 * @example
 * ```typescript
 * // versioner.yml in the working directory, plus VERSIONER_* env vars
 * const config = await loadConfig()
 *
 * // Explicit file and overrides
 * const config = await loadConfig({
 *     file: './config/versioner.yml',
 *     overrides: { logging: { level: 'verbose' } },
 * })
 * ```
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<VersionerConfig> {

    const path = await resolveConfigPath(options)
    const fileConfig = path ? await readConfigFile(path) : {}

    // Clone DEFAULTS to avoid mutation
    const merged = merge(
        merge(
            merge(clone(DEFAULTS), fileConfig),
            getEnvConfig()
        ),
        options.overrides ?? {}
    )

    const config = parseConfig(merged)

    observer.emit('config:loaded', { path, fromFile: path !== null })

    return config
}
