import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

// $VAR or ${VAR}; `$$` escapes a literal dollar sign
const ENV_REFERENCE = /\$\$|\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

export function isTruthyEnv(name: string): boolean {
    const value = process.env[name];
    if (!value) return false;
    return TRUE_VALUES.has(value.trim().toLowerCase());
}

export function readBooleanEnv(name: string, defaultValue: boolean): boolean {
    const value = process.env[name];
    if (value === undefined) return defaultValue;
    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) return true;
    if (FALSE_VALUES.has(normalized)) return false;
    return defaultValue;
}

/**
 * Replace `$VAR` and `${VAR}` references with values from `env`.
 * Unset variables expand to an empty string.
 */
export function expandEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
    return value.replace(ENV_REFERENCE, (match, braced?: string, bare?: string) => {
        if (match === '$$') {
            return '$';
        }
        const name = braced ?? bare;
        return name ? (env[name] ?? '') : match;
    });
}

/**
 * String schema that expands environment references and trims the result.
 * Expansion happens at validation time, so raw configs keep their references.
 */
export const EnvExpandedString = () =>
    z.string().transform((value) => expandEnvVars(value).trim());

/**
 * Non-empty string after trimming
 */
export const NonEmptyTrimmed = z.string().trim().min(1, 'Must not be empty');
