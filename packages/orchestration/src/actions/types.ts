/**
 * Directives the conductor can issue in one turn.
 *
 * The union is closed: the handler switches on `type` exhaustively, so a new
 * kind fails to compile until it is handled.
 */

export const ACTION_TYPES = [
    'query_agent',
    'update_scratchpad',
    'update_todo',
    'finish_stage',
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export const SCRATCHPAD_OPERATIONS = ['append', 'replace', 'clear'] as const;
export type ScratchpadOperation = (typeof SCRATCHPAD_OPERATIONS)[number];

export const TODO_OPERATIONS = ['add', 'complete', 'remove'] as const;
export type TodoOperation = (typeof TODO_OPERATIONS)[number];

export interface QueryAgentAction {
    readonly type: 'query_agent';
    /** Registry alias of the agent */
    readonly agentId: string;
    readonly query: string;
    /** Continue an existing remote conversation */
    readonly contextId?: string;
}

export interface UpdateScratchpadAction {
    readonly type: 'update_scratchpad';
    readonly content: string;
    readonly operation: ScratchpadOperation;
}

export interface UpdateTodoAction {
    readonly type: 'update_todo';
    readonly item: string;
    readonly operation: TodoOperation;
    /** Zero-based, required by complete and remove */
    readonly index?: number;
}

export interface FinishStageAction {
    readonly type: 'finish_stage';
    readonly message: string;
    readonly summary: string;
}

export type Action = QueryAgentAction | UpdateScratchpadAction | UpdateTodoAction | FinishStageAction;

export function isActionType(value: string): value is ActionType {
    return ACTION_TYPES.some((type) => type === value);
}

/**
 * One-line label for logs and history
 */
export function describeAction(action: Action): string {
    switch (action.type) {
        case 'query_agent':
            return `query_agent(${action.agentId})`;
        case 'update_scratchpad':
            return `update_scratchpad(${action.operation})`;
        case 'update_todo':
            return action.index === undefined
                ? `update_todo(${action.operation})`
                : `update_todo(${action.operation} #${action.index})`;
        case 'finish_stage':
            return 'finish_stage';
        default: {
            const _exhaustive: never = action;
            return _exhaustive;
        }
    }
}
