import { describe, it, expect, afterEach } from 'vitest';
import { EnvExpandedString, expandEnvVars, isTruthyEnv, readBooleanEnv } from './env.js';

describe('expandEnvVars', () => {
    const env = { API_KEY: 'test-secret', HOST: 'localhost' };

    it('expands braced and bare references', () => {
        expect(expandEnvVars('${API_KEY}', env)).toBe('test-secret');
        expect(expandEnvVars('http://$HOST:8001', env)).toBe('http://localhost:8001');
    });

    it('expands unset variables to an empty string', () => {
        expect(expandEnvVars('key=${MISSING}', env)).toBe('key=');
    });

    it('treats $$ as a literal dollar sign', () => {
        expect(expandEnvVars('cost: $$5', env)).toBe('cost: $5');
    });

    it('leaves text without references untouched', () => {
        expect(expandEnvVars('plain value', env)).toBe('plain value');
    });
});

describe('EnvExpandedString', () => {
    afterEach(() => {
        delete process.env.BATON_ENV_TEST;
    });

    it('expands from process.env and trims the result', () => {
        process.env.BATON_ENV_TEST = '  test-secret  ';
        expect(EnvExpandedString().parse('$BATON_ENV_TEST')).toBe('test-secret');
    });
});

describe('boolean env helpers', () => {
    afterEach(() => {
        delete process.env.BATON_FLAG;
    });

    it('reads truthy values case-insensitively', () => {
        process.env.BATON_FLAG = 'YES';
        expect(isTruthyEnv('BATON_FLAG')).toBe(true);
    });

    it('falls back to the default for unrecognized values', () => {
        process.env.BATON_FLAG = 'maybe';
        expect(readBooleanEnv('BATON_FLAG', true)).toBe(true);
        process.env.BATON_FLAG = 'off';
        expect(readBooleanEnv('BATON_FLAG', true)).toBe(false);
    });

    it('returns false for unset flags', () => {
        expect(isTruthyEnv('BATON_FLAG')).toBe(false);
    });
});
