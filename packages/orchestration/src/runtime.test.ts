import { describe, it, expect } from 'vitest';
import { parseConfig } from '@baton/core';
import { createSilentMockLogger } from '@baton/core/test-utils';
import { InMemoryAgent } from '@baton/protocol/testing';
import { createRuntime } from './runtime.js';
import { ScriptedGenerator } from './testing/scripted-generator.js';

const config = parseConfig({
    llm: { provider: 'anthropic', model: 'claude-test', apiKey: 'test-secret' },
    agents: [
        {
            alias: 'research',
            url: 'http://research.test/rpc',
            name: 'Researcher',
            skills: [{ name: 'search' }],
        },
    ],
    protocol: { pollIntervalMs: 1, maxWaitMs: 1000 },
    conductor: { maxTurns: 4 },
});

describe('createRuntime', () => {
    it('should register configured agents and run a stage against them', async () => {
        const generator = new ScriptedGenerator([
            '<action type="query_agent"><agent_id>research</agent_id><query>Find X</query></action>',
            '<action type="finish_stage"><message>X is 42</message><summary>Asked once</summary></action>',
        ]);
        const runtime = await createRuntime({
            config,
            logger: createSilentMockLogger(),
            generator,
            createTransport: (descriptor) =>
                new InMemoryAgent({
                    endpoint: descriptor.url,
                    respond: (text) => `Answer to ${text}`,
                }),
        });

        const result = await runtime.workflow.run({ question: 'Find X', stages: ['research'] });

        expect(runtime.registry.list().map((agent) => agent.alias)).toEqual(['research']);
        expect(runtime.registry.bySkill('search')).toHaveLength(1);
        expect(result).toMatchObject({ success: true, researchOutput: 'X is 42' });
        expect(runtime.registry.tracker.completed()).toHaveLength(1);
        expect(generator.requests[1]?.prompt).toContain('Agent research responded:\nAnswer to Find X');
    });
});
