export { AgentRegistry, descriptorLocation } from './agent-registry.js';
export type {
    AgentRegistryOptions,
    DiscoverOptions,
    RegisterOptions,
    RegisteredAgent,
    TransportFactory,
} from './agent-registry.js';
export { AgentDescriptorSchema, AgentSkillSchema, AGENT_TRUST_LEVELS } from './schemas.js';
export type { AgentDescriptor, AgentDescriptorInput, AgentSkill, AgentTrust } from './schemas.js';
export { RegistryError } from './errors.js';
export { RegistryErrorCode } from './error-codes.js';
