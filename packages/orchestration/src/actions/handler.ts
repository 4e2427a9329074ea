import type { Logger } from '@baton/core';
import {
    CommunicationError,
    ProtocolError,
    TaskTimeoutError,
    taskResponseText,
} from '@baton/protocol';
import type { AgentRegistry, WaitOptions } from '@baton/protocol';
import type { RunContext } from '../run-context.js';
import type { ActionOutcome, AgentTrajectories, AgentTrajectoryEntry } from '../types.js';
import type {
    Action,
    FinishStageAction,
    QueryAgentAction,
    UpdateScratchpadAction,
    UpdateTodoAction,
} from './types.js';

export interface ActionHandlerOptions {
    /** Only alias lookup is needed */
    registry: Pick<AgentRegistry, 'resolve'>;
    context: RunContext;
    /** Poll interval and deadline for every query_agent */
    wait: WaitOptions;
    logger: Logger;
}

function ok(output: string): ActionOutcome {
    return { output, isError: false };
}

function fail(output: string): ActionOutcome {
    return { output, isError: true };
}

/**
 * Executes one action against the agent registry and the run's state managers.
 *
 * Failures come back as error-flagged outputs; remote failures of a query never
 * escape. Trajectories of agent queries accumulate until `takeTrajectories()`.
 */
export class ActionHandler {
    private readonly registry: Pick<AgentRegistry, 'resolve'>;
    private readonly context: RunContext;
    private readonly wait: WaitOptions;
    private readonly logger: Logger;
    private trajectories: AgentTrajectories = {};

    constructor(options: ActionHandlerOptions) {
        this.registry = options.registry;
        this.context = options.context;
        this.wait = options.wait;
        this.logger = options.logger;
    }

    async handle(action: Action): Promise<ActionOutcome> {
        switch (action.type) {
            case 'query_agent':
                return this.queryAgent(action);
            case 'update_scratchpad':
                return this.updateScratchpad(action);
            case 'update_todo':
                return this.updateTodo(action);
            case 'finish_stage':
                return this.finishStage(action);
            default: {
                const _exhaustive: never = action;
                return _exhaustive;
            }
        }
    }

    /**
     * Trajectories recorded since the last call
     */
    takeTrajectories(): AgentTrajectories {
        const taken = this.trajectories;
        this.trajectories = {};
        return taken;
    }

    private record(agentId: string, entry: AgentTrajectoryEntry): void {
        const entries = this.trajectories[agentId] ?? [];
        entries.push(entry);
        this.trajectories[agentId] = entries;
    }

    private async queryAgent(action: QueryAgentAction): Promise<ActionOutcome> {
        const { agentId, query, contextId } = action;
        const base = { query, ...(contextId !== undefined && { contextId }) };

        const agent = this.registry.resolve(agentId);
        if (!agent) {
            const error = `Agent '${agentId}' not found in registry`;
            this.logger.warn(error);
            this.record(agentId, { ...base, outcome: 'not-found', error });
            return fail(error);
        }

        this.logger.info(`Querying agent ${agentId}: ${query.slice(0, 100)}`);
        let taskId: string | undefined;
        try {
            const submitted = await agent.client.send(
                query,
                contextId !== undefined ? { contextId } : {}
            );
            taskId = submitted.id;
            const task = await agent.client.waitFor(
                submitted.id,
                this.wait.pollIntervalMs,
                this.wait.maxWaitMs
            );
            const entry = { ...base, taskId: task.id, contextId: task.contextId };

            if (task.state === 'completed') {
                const response = taskResponseText(task) ?? 'No response';
                this.record(agentId, { ...entry, outcome: 'completed', response });
                return ok(`Agent ${agentId} responded:\n${response}`);
            }

            const error = task.error ?? task.statusMessage ?? 'no details given';
            this.logger.warn(`Agent ${agentId} task ${task.id} ended ${task.state}`, { error });
            this.record(agentId, { ...entry, outcome: task.state, error });
            return fail(`Agent ${agentId} task ${task.state}: ${error}`);
        } catch (error) {
            if (error instanceof TaskTimeoutError) {
                const message = `Agent ${agentId} gave no response within deadline (${this.wait.maxWaitMs}ms, last state: ${error.lastTask.state})`;
                this.logger.warn(message, { taskId });
                this.record(agentId, {
                    ...base,
                    taskId: error.lastTask.id,
                    outcome: 'timeout',
                    error: message,
                });
                return fail(message);
            }
            if (error instanceof CommunicationError || error instanceof ProtocolError) {
                this.logger.error(`Error querying agent ${agentId}: ${error.message}`, {
                    code: error.code,
                    taskId,
                });
                this.record(agentId, {
                    ...base,
                    ...(taskId !== undefined && { taskId }),
                    outcome: 'error',
                    error: error.message,
                });
                return fail(`Error querying agent ${agentId}: ${error.message}`);
            }
            throw error;
        }
    }

    private updateScratchpad(action: UpdateScratchpadAction): ActionOutcome {
        const { scratchpad } = this.context;
        switch (action.operation) {
            case 'append':
                scratchpad.append(action.content);
                return ok('Scratchpad updated (appended)');
            case 'replace':
                scratchpad.replace(action.content);
                return ok('Scratchpad updated (replaced)');
            case 'clear':
                scratchpad.clear();
                return ok('Scratchpad cleared');
            default: {
                const _exhaustive: never = action.operation;
                return _exhaustive;
            }
        }
    }

    private updateTodo(action: UpdateTodoAction): ActionOutcome {
        const { todo } = this.context;
        const { index } = action;
        switch (action.operation) {
            case 'add':
                todo.add(action.item);
                return ok(`Added todo item: ${action.item}`);
            case 'complete':
                if (index === undefined) return fail('Complete operation requires index');
                if (!todo.complete(index)) return fail(this.outOfRange(index));
                return ok(`Completed todo item ${index}`);
            case 'remove':
                if (index === undefined) return fail('Remove operation requires index');
                if (!todo.remove(index)) return fail(this.outOfRange(index));
                return ok(`Removed todo item ${index}`);
            default: {
                const _exhaustive: never = action.operation;
                return _exhaustive;
            }
        }
    }

    private outOfRange(index: number): string {
        return `Todo index ${index} is out of range (${this.context.todo.size} items)`;
    }

    private finishStage(action: FinishStageAction): ActionOutcome {
        if (this.context.finish === undefined) {
            this.context.finish = { message: action.message, summary: action.summary };
        }
        this.logger.info(`Stage finished: ${action.message}`);
        return ok(`Stage finished: ${action.message}`);
    }
}
