import { promises as fs } from 'fs';
import path from 'path';
import { config as loadDotenv } from 'dotenv';
import { parse as parseYaml } from 'yaml';
import { BatonConfigSchema } from './schemas.js';
import type { BatonConfig } from './schemas.js';
import { ConfigError } from './errors.js';
import { BatonValidationError, zodToIssues } from '../errors/BatonValidationError.js';
import { ErrorScope } from '../errors/types.js';
import { errorMessage } from '../utils/error-conversion.js';

export interface LoadConfigOptions {
    /**
     * .env file to load before validation. Defaults to `.env` beside the config file.
     * Variables already present in the environment are never overridden.
     */
    envFile?: string;
}

/**
 * Read and parse a YAML configuration file without validating it.
 * `$VAR` references are left untouched; the schema expands them.
 *
 * @throws {BatonRuntimeError} FILE_NOT_FOUND if the file does not exist
 * @throws {BatonRuntimeError} FILE_READ_ERROR if the file cannot be read
 * @throws {BatonRuntimeError} PARSE_ERROR if the content is not valid YAML
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    const absolutePath = path.resolve(configPath);

    try {
        await fs.access(absolutePath);
    } catch {
        throw ConfigError.fileNotFound(absolutePath);
    }

    let fileContent: string;
    try {
        fileContent = await fs.readFile(absolutePath, 'utf-8');
    } catch (error) {
        throw ConfigError.fileReadError(absolutePath, errorMessage(error));
    }

    try {
        return parseYaml(fileContent);
    } catch (error) {
        throw ConfigError.parseError(absolutePath, errorMessage(error));
    }
}

/**
 * Validate a raw configuration object, applying defaults and env expansion
 *
 * @throws {BatonValidationError} listing every schema violation
 */
export function parseConfig(raw: unknown): BatonConfig {
    const result = BatonConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        throw new BatonValidationError(zodToIssues(result.error, ErrorScope.CONFIG));
    }
    return result.data;
}

/**
 * Load `.env`, read the YAML file and validate it
 */
export async function loadConfig(
    configPath: string,
    options: LoadConfigOptions = {}
): Promise<BatonConfig> {
    const envFile = options.envFile ?? path.join(path.dirname(path.resolve(configPath)), '.env');
    loadDotenv({ path: envFile, override: false });

    const raw = await readConfigFile(configPath);
    return parseConfig(raw);
}
