import type { TaskState } from '@baton/protocol';
import type { Action } from './actions/types.js';
import type { TodoItem } from './state/todo.js';

/**
 * How a query_agent call ended: the task's terminal state, or why no terminal
 * state was reached
 */
export type QueryOutcome = TaskState | 'timeout' | 'error' | 'not-found';

/**
 * Audit record of one query_agent call
 */
export interface AgentTrajectoryEntry {
    query: string;
    taskId?: string;
    contextId?: string;
    outcome: QueryOutcome;
    response?: string;
    error?: string;
}

/** Trajectory entries keyed by agent alias, in call order */
export type AgentTrajectories = Record<string, AgentTrajectoryEntry[]>;

export type FrozenTrajectories = Readonly<
    Record<string, readonly Readonly<AgentTrajectoryEntry>[]>
>;

export interface ActionOutcome {
    output: string;
    isError: boolean;
}

export interface ExecutionResult {
    actionsExecuted: Action[];
    responses: string[];
    hasError: boolean;
    /** A finish_stage action ran */
    done: boolean;
    finishMessage?: string;
    summary?: string;
    agentTrajectories: AgentTrajectories;
    /** Pure narration: no action was attempted */
    noOp: boolean;
    /** Actions left unexecuted after finish_stage */
    skipped: number;
}

/**
 * One directive and what came of it. Frozen once appended to the history.
 */
export interface Turn {
    readonly number: number;
    readonly directiveText: string;
    readonly actionsExecuted: readonly Action[];
    readonly responses: readonly string[];
    readonly agentTrajectories: FrozenTrajectories;
    readonly hasError: boolean;
    readonly noOp: boolean;
}

export type RunOutcome = 'completed' | 'max-turns' | 'stalled';

export interface RunResult {
    completed: boolean;
    outcome: RunOutcome;
    finishMessage?: string;
    summary?: string;
    turnsExecuted: number;
    scratchpad: string;
    todo: TodoItem[];
}
