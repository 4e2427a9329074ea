import { nanoid } from 'nanoid';
import { ConversationHistory } from './state/conversation-history.js';
import { Scratchpad } from './state/scratchpad.js';
import { TodoList } from './state/todo.js';

export interface StageFinish {
    message: string;
    summary: string;
}

/**
 * Everything one conductor run mutates. Created fresh per run and passed
 * explicitly to the handler and executor.
 */
export interface RunContext {
    readonly runId: string;
    readonly scratchpad: Scratchpad;
    readonly todo: TodoList;
    readonly history: ConversationHistory;
    /** Set by the first finish_stage of the run */
    finish?: StageFinish;
}

export interface RunContextOptions {
    runId?: string;
    scratchpadMaxItems?: number;
    todoMaxItems?: number;
    maxHistoryTurns?: number;
}

export function createRunContext(options: RunContextOptions = {}): RunContext {
    return {
        runId: options.runId ?? nanoid(10),
        scratchpad: new Scratchpad(options.scratchpadMaxItems),
        todo: new TodoList(options.todoMaxItems),
        history: new ConversationHistory(options.maxHistoryTurns),
    };
}
