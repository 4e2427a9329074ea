import { OrchestrationError } from './errors.js';

export const STAGE_NAMES = ['research', 'plan', 'implement'] as const;
export type StageName = (typeof STAGE_NAMES)[number];

export function isStageName(value: string): value is StageName {
    return STAGE_NAMES.some((name) => name === value);
}

/**
 * What earlier stages handed forward
 */
export interface StageInput {
    question: string;
    researchOutput?: string;
    plan?: string;
}

export interface StageDefinition {
    name: StageName;
    /** Heading of the task section in the turn prompt */
    title: string;
    instructions: string;
    /** Whether query_agent may reach registered agents */
    usesAgents: boolean;
    buildQuery(input: StageInput): string;
}

const research: StageDefinition = {
    name: 'research',
    title: 'Research Task',
    usesAgents: true,
    instructions:
        'Use the available actions to research this question thoroughly. Query research agents, organize findings in the scratchpad, track remaining questions in the todo list. When you have sufficient information, use the finish_stage action to complete the research.',
    buildQuery: ({ question }) => question,
};

const plan: StageDefinition = {
    name: 'plan',
    title: 'Planning Task',
    usesAgents: false,
    instructions:
        'Write a step-by-step implementation plan. For each step name the agent to use, what to ask it and the output you expect. No agents can be queried in this stage. Finish the stage with the full plan as the message.',
    buildQuery: ({ question, researchOutput, plan: existing }) => {
        const parts = [question];
        if (researchOutput) {
            parts.push(`Research Findings:\n${researchOutput}`);
        }
        if (existing) {
            parts.push(`Existing Plan:\n${existing}`);
        }
        parts.push('Please create or update the implementation plan.');
        return parts.join('\n\n');
    },
};

const implement: StageDefinition = {
    name: 'implement',
    title: 'Implementation Task',
    usesAgents: true,
    instructions:
        'Execute the plan step by step by querying the agents it names. Record results in the scratchpad and track progress in the todo list. When every step is done, finish the stage with the combined result.',
    buildQuery: ({ plan: current }) => {
        if (!current) {
            throw OrchestrationError.planMissing();
        }
        return `Execute the following plan:\n\n${current}`;
    },
};

export const STAGES: Readonly<Record<StageName, StageDefinition>> = {
    research,
    plan,
    implement,
};
