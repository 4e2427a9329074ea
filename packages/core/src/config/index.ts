export { loadConfig, readConfigFile, parseConfig, type LoadConfigOptions } from './loader.js';
export {
    BatonConfigSchema,
    LlmConfigSchema,
    RetryConfigSchema,
    AgentEntrySchema,
    ProtocolConfigSchema,
    ConductorConfigSchema,
    LLM_PROVIDERS,
} from './schemas.js';
export type {
    BatonConfig,
    BatonConfigInput,
    LlmConfig,
    LlmProvider,
    RetryConfig,
    AgentEntry,
    ProtocolConfig,
    ConductorConfig,
} from './schemas.js';
export { ConfigError } from './errors.js';
export { ConfigErrorCode } from './error-codes.js';
