import type { BatonConfig, Logger } from '@baton/core';
import { AgentRegistry } from '@baton/protocol';
import type { TransportFactory } from '@baton/protocol';
import { Conductor } from './conductor.js';
import { LlmDirectiveGenerator } from './directive/llm-generator.js';
import type { DirectiveGenerator } from './directive/types.js';
import { Workflow } from './workflow.js';

export interface CreateRuntimeOptions {
    config: BatonConfig;
    logger: Logger;
    /** Defaults to an LLM generator built from `config.llm` */
    generator?: DirectiveGenerator;
    createTransport?: TransportFactory;
    fetch?: typeof fetch;
}

export interface BatonRuntime {
    registry: AgentRegistry;
    conductor: Conductor;
    workflow: Workflow;
}

/**
 * Wire a validated configuration into a ready workflow: registers or discovers
 * every configured agent, then builds the generator and conductor.
 */
export async function createRuntime(options: CreateRuntimeOptions): Promise<BatonRuntime> {
    const { config, logger } = options;

    const registry = new AgentRegistry({
        logger,
        requestTimeoutMs: config.protocol.requestTimeoutMs,
        acceptedOutputModes: config.protocol.acceptedOutputModes,
        ...(options.createTransport && { createTransport: options.createTransport }),
        ...(options.fetch && { fetch: options.fetch }),
    });
    await registry.loadFromConfig(config.agents);
    logger.debug(registry.view());

    const conductor = new Conductor({
        generator: options.generator ?? new LlmDirectiveGenerator(config.llm, logger),
        registry,
        logger,
        wait: {
            pollIntervalMs: config.protocol.pollIntervalMs,
            maxWaitMs: config.protocol.maxWaitMs,
        },
        settings: config.conductor,
    });

    return { registry, conductor, workflow: new Workflow(conductor, logger) };
}
