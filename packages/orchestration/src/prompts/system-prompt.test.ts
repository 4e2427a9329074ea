import { describe, it, expect } from 'vitest';
import { AGENT_LIST_PLACEHOLDER, CONDUCTOR_SYSTEM_PROMPT, buildSystemPrompt } from './system-prompt.js';

describe('buildSystemPrompt', () => {
    it('should replace the placeholder with the agent list', () => {
        expect(buildSystemPrompt(`Agents:\n${AGENT_LIST_PLACEHOLDER}\nEnd`, '- a')).toBe(
            'Agents:\n- a\nEnd'
        );
    });

    it('should append the agent list when there is no placeholder', () => {
        expect(buildSystemPrompt('Base prompt', '- a')).toBe(
            'Base prompt\n\n## Available Agents\n\n- a'
        );
    });

    it('should describe every action in the default prompt', () => {
        for (const type of ['query_agent', 'update_scratchpad', 'update_todo', 'finish_stage']) {
            expect(CONDUCTOR_SYSTEM_PROMPT).toContain(`<action type="${type}">`);
        }
        expect(buildSystemPrompt(CONDUCTOR_SYSTEM_PROMPT, '(No agents available)')).toMatch(
            /## Available Agents\n\n\(No agents available\)$/
        );
    });
});
