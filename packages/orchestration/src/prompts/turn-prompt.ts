import type { RunContext } from '../run-context.js';

export interface TurnPromptInput {
    /** Section heading for the stage, e.g. "Research Task" */
    title: string;
    query: string;
    instructions: string;
    context: RunContext;
    /** Limit the history section to the most recent turns */
    maxRecentTurns?: number;
}

export function buildTurnPrompt(input: TurnPromptInput): string {
    const { context } = input;
    return [
        `## ${input.title}\n${input.query}`,
        context.scratchpad.toPrompt(),
        context.todo.toPrompt(),
        `## Conversation History\n${context.history.toPrompt(input.maxRecentTurns)}`,
        `## Instructions\n${input.instructions}`,
    ].join('\n\n');
}
