import { BatonRuntimeError, ErrorScope, ErrorType } from '@baton/core';
import { RegistryErrorCode } from './error-codes.js';

/**
 * Agent registry error factory methods
 */
export class RegistryError {
    private constructor() {}

    static duplicateAlias(alias: string) {
        return new BatonRuntimeError(
            RegistryErrorCode.DUPLICATE_ALIAS,
            ErrorScope.REGISTRY,
            ErrorType.CONFLICT,
            `Agent alias '${alias}' is already registered`,
            { alias },
            'Give each agent a unique alias'
        );
    }

    static invalidDescriptor(alias: string, source: string, detail: string) {
        return new BatonRuntimeError(
            RegistryErrorCode.INVALID_DESCRIPTOR,
            ErrorScope.REGISTRY,
            ErrorType.USER,
            `Invalid descriptor for agent '${alias}' from ${source}: ${detail}`,
            { alias, source, detail }
        );
    }

    static discoveryFailed(alias: string, descriptorUrl: string, cause: string) {
        return new BatonRuntimeError(
            RegistryErrorCode.DISCOVERY_FAILED,
            ErrorScope.REGISTRY,
            ErrorType.THIRD_PARTY,
            `Failed to discover agent '${alias}' at ${descriptorUrl}: ${cause}`,
            { alias, descriptorUrl, cause },
            'Check that the agent is running and serves its descriptor'
        );
    }

    static agentNotFound(alias: string, available: string[]) {
        return new BatonRuntimeError(
            RegistryErrorCode.AGENT_NOT_FOUND,
            ErrorScope.REGISTRY,
            ErrorType.NOT_FOUND,
            `Agent '${alias}' not found in registry`,
            { alias, available }
        );
    }
}
