import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentMockLogger } from '@baton/core/test-utils';
import type { ConductorConfig } from '@baton/core';
import { AgentRegistry } from '@baton/protocol';
import { InMemoryAgent } from '@baton/protocol/testing';
import { Conductor } from './conductor.js';
import type { RunRequest } from './conductor.js';
import type { ConductorEventName } from './events.js';
import { ScriptedGenerator } from './testing/scripted-generator.js';
import type { DirectiveScript } from './testing/scripted-generator.js';
import type { Turn } from './types.js';

const note = (text: string) =>
    `<action type="update_scratchpad"><content>${text}</content></action>`;
const query = (agent: string, text: string) =>
    `<action type="query_agent"><agent_id>${agent}</agent_id><query>${text}</query></action>`;
const finish =
    '<action type="finish_stage"><message>All done</message><summary>Short</summary></action>';

const request: RunRequest = {
    title: 'Research Task',
    query: 'What is A2A?',
    instructions: 'Do it.',
};

describe('Conductor', () => {
    let registry: AgentRegistry;
    let generator: ScriptedGenerator;

    beforeEach(() => {
        const logger = createSilentMockLogger();
        const agent = new InMemoryAgent({ endpoint: 'http://research.test/rpc' });
        registry = new AgentRegistry({ logger, createTransport: () => agent });
        registry.register('research', {
            id: 'research-agent',
            name: 'Researcher',
            url: 'http://research.test/rpc',
        });
    });

    function conductor(script: DirectiveScript, settings: Partial<ConductorConfig> = {}) {
        generator = new ScriptedGenerator(script);
        return new Conductor({
            generator,
            registry,
            logger: createSilentMockLogger(),
            wait: { pollIntervalMs: 1, maxWaitMs: 1000 },
            settings,
        });
    }

    it('should run until a turn finishes the stage', async () => {
        const result = await conductor([note('note A'), finish]).run(request);

        expect(result).toEqual({
            completed: true,
            outcome: 'completed',
            finishMessage: 'All done',
            summary: 'Short',
            turnsExecuted: 2,
            scratchpad: 'note A',
            todo: [],
        });
    });

    it('should stop after maxTurns without a finish', async () => {
        const result = await conductor([note('x')], { maxTurns: 3 }).run(request);

        expect(result).toMatchObject({
            completed: false,
            outcome: 'max-turns',
            turnsExecuted: 3,
            scratchpad: 'x\nx\nx',
        });
        expect(result.finishMessage).toBeUndefined();
        expect(generator.requests).toHaveLength(3);
    });

    it('should stall after consecutive turns without actions', async () => {
        const result = await conductor(['Thinking about it...'], { stallThreshold: 2 }).run(
            request
        );

        expect(result).toMatchObject({ completed: false, outcome: 'stalled', turnsExecuted: 2 });
    });

    it('should reset the stall count when a turn attempts an action', async () => {
        const result = await conductor(['hmm', note('n'), 'hmm', 'hmm'], {
            stallThreshold: 2,
            maxTurns: 10,
        }).run(request);

        expect(result).toMatchObject({ outcome: 'stalled', turnsExecuted: 4 });
    });

    it('should not count an invalid action attempt as a stall', async () => {
        const result = await conductor(['<action type="update_todo"></action>'], {
            stallThreshold: 2,
            maxTurns: 3,
        }).run(request);

        expect(result).toMatchObject({ outcome: 'max-turns', turnsExecuted: 3 });
    });

    it('should build the first prompt from empty state', async () => {
        await conductor([finish]).run(request);

        expect(generator.requests[0]?.prompt).toBe(
            [
                '## Research Task\nWhat is A2A?',
                '## Scratchpad\n(empty)',
                '## Todo List (0/0 pending)\n(no items)',
                '## Conversation History\nNo previous interactions.',
                '## Instructions\nDo it.',
            ].join('\n\n')
        );
        expect(generator.requests[0]?.system).toContain('### Researcher (`research`)');
        expect(generator.requests[0]?.system).not.toContain('{AGENT_LIST_HERE}');
    });

    it('should carry state and history into later prompts', async () => {
        await conductor([note('note A'), finish]).run(request);

        const second = generator.requests[1]?.prompt ?? '';
        expect(second).toContain('## Scratchpad\nnote A');
        expect(second).toContain(`--- Turn 1 ---\nDirective:\n${note('note A')}`);
        expect(second).toContain('Responses:\nScratchpad updated (appended)');
    });

    it('should start every run from fresh state', async () => {
        const instance = conductor([note('first run'), finish]);
        await instance.run(request);
        const second = await instance.run(request);

        expect(second.scratchpad).toBe('');
        expect(second.turnsExecuted).toBe(1);
        expect(generator.requests[2]?.prompt).toContain('## Scratchpad\n(empty)');
    });

    it('should query agents and record the trajectory on the turn', async () => {
        const instance = conductor([query('research', 'What is A2A?'), finish]);
        const turns: Turn[] = [];
        instance.events.on('turn:completed', ({ turn }) => turns.push(turn));

        await instance.run(request);

        expect(turns[0]?.responses).toEqual(['Agent research responded:\nEcho: What is A2A?']);
        expect(turns[0]?.agentTrajectories.research?.[0]).toMatchObject({
            outcome: 'completed',
            response: 'Echo: What is A2A?',
        });
    });

    it('should hide agents from runs that do not use them', async () => {
        const instance = conductor([query('research', 'anything'), finish]);
        const turns: Turn[] = [];
        instance.events.on('turn:completed', ({ turn }) => turns.push(turn));

        await instance.run({ ...request, useAgents: false });

        expect(generator.requests[0]?.system).toContain('(No agents available)');
        expect(turns[0]?.responses).toEqual(["Agent 'research' not found in registry"]);
        expect(turns[0]?.hasError).toBe(true);
    });

    it('should let generator failures end the run', async () => {
        const instance = conductor(() => {
            throw new Error('provider down');
        });

        await expect(instance.run(request)).rejects.toThrow('provider down');
    });

    it('should emit run and turn events in order', async () => {
        const instance = conductor([note('a'), finish]);
        const seen: ConductorEventName[] = [];
        instance.events.on('run:started', () => seen.push('run:started'));
        instance.events.on('turn:completed', () => seen.push('turn:completed'));
        instance.events.on('run:finished', () => seen.push('run:finished'));

        await instance.run({ ...request, runId: 'run-1' });

        expect(seen).toEqual(['run:started', 'turn:completed', 'turn:completed', 'run:finished']);
    });

    it('should use the configured run id', async () => {
        const instance = conductor([finish]);
        const runIds: string[] = [];
        instance.events.on('run:finished', ({ runId }) => runIds.push(runId));

        await instance.run({ ...request, runId: 'run-1' });

        expect(runIds).toEqual(['run-1']);
    });

    it('should start each run with an empty task tracker', async () => {
        const runner = conductor([query('research', 'first'), finish]);

        await runner.run(request);
        expect(registry.tracker.size).toBe(1);

        // The script repeats its last directive, so this run finishes at once
        await runner.run(request);

        expect(registry.tracker.size).toBe(0);
    });
});
