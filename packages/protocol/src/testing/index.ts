export { InMemoryAgent } from './in-memory-agent.js';
export type { InMemoryAgentOptions, Responder, SeedTask, TaskScript } from './in-memory-agent.js';
