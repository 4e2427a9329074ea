/**
 * Registry-specific error codes
 */
export enum RegistryErrorCode {
    DUPLICATE_ALIAS = 'registry_duplicate_alias',
    INVALID_DESCRIPTOR = 'registry_invalid_descriptor',
    DISCOVERY_FAILED = 'registry_discovery_failed',
    AGENT_NOT_FOUND = 'registry_agent_not_found',
}
