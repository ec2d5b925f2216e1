/**
 * Authorization Code Service - Environment Readers
 *
 * Building blocks for each module's `getEnvConfig()`. Every reader throws
 * on a missing or malformed value; handlers catch it and answer
 * `server_error`.
 */

export type Env = Record<string, string | undefined>;

/**
 * Read a required, non-empty variable.
 */
export function requireEnv(env: Env, name: string): string {
    const value = env[name];
    if (!value) {
        throw new Error(`${name} environment variable is required`);
    }
    return value;
}

/**
 * Read a positive integer, falling back to `defaultValue` when unset.
 */
export function readPositiveInt(env: Env, name: string, defaultValue: number): number {
    const raw = env[name];
    if (raw === undefined || raw === '') {
        return defaultValue;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${name} must be a positive integer`);
    }
    return value;
}

/**
 * Read a comma-separated list. Blank entries are dropped.
 */
export function readList(env: Env, name: string): string[] {
    return (env[name] ?? '')
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0);
}
