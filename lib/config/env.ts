/**
 * @format
 * Environment variable helpers (synth time)
 *
 * CI:    workflow env: block → process.env
 * Local: exported shell variables → process.env
 */

/**
 * Read a value from process.env at synth time.
 * Returns undefined if the variable is not set or empty.
 */
export function fromEnv(key: string): string | undefined {
    return process.env[key] || undefined;
}

export function fromEnvBoolean(key: string): boolean | undefined {
    const raw = fromEnv(key)?.toLowerCase();
    if (raw === undefined) return undefined;
    if (raw === 'true') return true;
    if (raw === 'false') return false;
    throw new Error(`${key} must be 'true' or 'false', got '${raw}'`);
}

export function fromEnvNumber(key: string): number | undefined {
    const raw = fromEnv(key);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${key} must be a positive integer, got '${raw}'`);
    }
    return value;
}
