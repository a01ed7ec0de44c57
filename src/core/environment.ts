/**
 * Environment Detection
 *
 * Detects the runtime context so the logger and observer can adapt
 * their output.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'JENKINS_URL',
    'BUILDKITE',
    'TF_BUILD',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - VERSIONER_HEADLESS=true environment variable
 * - Common CI environment variables
 * - No TTY available
 *
 * @example
 * ```typescript
 * if (isCi()) {
 *     // Log to stdout without colors
 * }
 * ```
 */
export function isCi(): boolean {

    if (process.env['VERSIONER_HEADLESS'] === 'true') {

        return true;

    }

    for (const envVar of CI_ENV_VARS) {

        if (process.env[envVar]) {

            return true;

        }

    }

    // Piped output, non-interactive
    if (!process.stdout.isTTY) {

        return true;

    }

    return false;

}

/**
 * Check if observer debug output is enabled.
 *
 * @returns true if VERSIONER_DEBUG is set to `1` or `true`
 */
export function isDebug(): boolean {

    const value = process.env['VERSIONER_DEBUG'];

    return value === '1' || value === 'true';

}
