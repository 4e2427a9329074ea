import { nanoid } from 'nanoid';
import type { Logger } from '@baton/core';
import { ProtocolError, ProtocolErrors } from './errors.js';
import { A2AErrorCode, A2A_METHODS } from './jsonrpc/types.js';
import type { JsonRpcRequest } from './jsonrpc/types.js';
import { JsonRpcResponseSchema } from './jsonrpc/schemas.js';
import { ListTasksResultSchema, WireTaskSchema, toTask, unwrapTaskResult } from './schemas.js';
import { DEFAULT_TASK_SOURCE } from './task-tracker.js';
import type { TaskStateTracker } from './task-tracker.js';
import type { JsonRpcTransport } from './transport.js';
import { isTerminalState } from './types.js';
import type {
    ListTasksParams,
    Message,
    MessageSendParams,
    SendOptions,
    Task,
    TaskIdParams,
    WaitOptions,
} from './types.js';

export const DEFAULT_ACCEPTED_OUTPUT_MODES = ['application/json'];

export interface ProtocolClientOptions {
    acceptedOutputModes?: string[];
    /** Scopes this client's records in a tracker shared with other agents */
    source?: string;
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Task lifecycle client for one remote agent.
 *
 * `send` is fire-and-forget; `waitFor` is the only call that suspends, bounded
 * by the deadline the caller passes. Every task seen is recorded in the shared
 * tracker under this client's source, and a terminal record is served from it
 * without a remote call.
 */
export class ProtocolClient {
    readonly source: string;
    private readonly acceptedOutputModes: string[];

    constructor(
        private readonly transport: JsonRpcTransport,
        private readonly tracker: TaskStateTracker,
        private readonly logger: Logger,
        options: ProtocolClientOptions = {}
    ) {
        this.acceptedOutputModes = options.acceptedOutputModes ?? DEFAULT_ACCEPTED_OUTPUT_MODES;
        this.source = options.source ?? DEFAULT_TASK_SOURCE;
    }

    get endpoint(): string {
        return this.transport.endpoint;
    }

    /**
     * Send a text message. Returns the task as first reported, usually `submitted`.
     *
     * @throws {CommunicationError} on transport failure
     * @throws {ProtocolError} on a malformed response or a JSON-RPC error
     */
    async send(text: string, options: SendOptions = {}): Promise<Task> {
        const referenceTaskIds = options.referenceTaskIds ?? [];
        const message: Message = {
            kind: 'message',
            role: 'user',
            messageId: nanoid(),
            parts: [{ kind: 'text', text }],
            ...(options.contextId !== undefined && { contextId: options.contextId }),
            ...(options.taskId !== undefined && { taskId: options.taskId }),
            ...(referenceTaskIds.length > 0 && { referenceTaskIds }),
        };
        const params: MessageSendParams = {
            message,
            configuration: { acceptedOutputModes: this.acceptedOutputModes },
        };

        this.logger.info(`Sending message to ${this.endpoint}`, {
            contextId: options.contextId,
            taskId: options.taskId,
            length: text.length,
        });

        const result = await this.call(A2A_METHODS.SEND_MESSAGE, params);
        const task = this.tracker.observe(
            this.readTask(A2A_METHODS.SEND_MESSAGE, result, referenceTaskIds),
            this.source
        );
        this.logger.info(`Task ${task.id} created with state: ${task.state}`, {
            contextId: task.contextId,
        });
        return task;
    }

    /**
     * One-shot status read
     */
    async fetch(taskId: string): Promise<Task> {
        const known = this.tracker.get(taskId, this.source);
        if (known && isTerminalState(known.state)) {
            return known;
        }

        const params: TaskIdParams = { id: taskId };
        const result = await this.call(A2A_METHODS.GET_TASK, params);
        const task = this.readTask(A2A_METHODS.GET_TASK, result);
        if (task.id !== taskId) {
            throw ProtocolErrors.malformedResponse(
                A2A_METHODS.GET_TASK,
                `expected task ${taskId}, received ${task.id}`
            );
        }
        return this.tracker.observe(task, this.source);
    }

    /**
     * Poll until the task is terminal.
     *
     * @throws {TaskTimeoutError} carrying the last observed task when `maxWaitMs` elapses
     */
    async waitFor(taskId: string, pollIntervalMs: number, maxWaitMs: number): Promise<Task> {
        const deadline = Date.now() + maxWaitMs;
        let task = await this.fetch(taskId);

        while (!isTerminalState(task.state)) {
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                this.logger.warn(`Task ${taskId} still ${task.state} after ${maxWaitMs}ms`);
                throw ProtocolErrors.taskTimeout(task, maxWaitMs);
            }
            this.logger.debug(`Task ${taskId} is ${task.state}, polling again`);
            await sleep(Math.min(pollIntervalMs, remaining));
            task = await this.fetch(taskId);
        }

        this.logger.info(`Task ${taskId} reached terminal state: ${task.state}`);
        return task;
    }

    async sendAndWait(text: string, options: SendOptions & WaitOptions): Promise<Task> {
        const task = await this.send(text, options);
        return this.waitFor(task.id, options.pollIntervalMs, options.maxWaitMs);
    }

    /**
     * Request cancellation. Terminal tasks come back unchanged.
     */
    async cancel(taskId: string): Promise<Task> {
        const known = this.tracker.get(taskId, this.source);
        if (known && isTerminalState(known.state)) {
            return known;
        }

        const params: TaskIdParams = { id: taskId };
        try {
            const result = await this.call(A2A_METHODS.CANCEL_TASK, params);
            const task = this.tracker.observe(
                this.readTask(A2A_METHODS.CANCEL_TASK, result),
                this.source
            );
            this.logger.info(`Task ${taskId} cancel answered with state: ${task.state}`);
            return task;
        } catch (error) {
            if (
                error instanceof ProtocolError &&
                error.remoteCode === A2AErrorCode.TASK_NOT_CANCELABLE
            ) {
                this.logger.info(`Task ${taskId} is no longer cancelable, fetching final state`);
                return this.fetch(taskId);
            }
            throw error;
        }
    }

    /**
     * Tasks this client has tracked, optionally for one context. No remote call.
     */
    list(contextId?: string): Task[] {
        return contextId === undefined
            ? this.tracker.all(this.source)
            : this.tracker.byContext(contextId, this.source);
    }

    /**
     * Ask the agent for its tasks and record them
     */
    async listRemote(contextId?: string): Promise<Task[]> {
        const params: ListTasksParams = contextId === undefined ? {} : { contextId };
        const result = await this.call(A2A_METHODS.LIST_TASKS, params);
        const parsed = ListTasksResultSchema.safeParse(result);
        if (!parsed.success) {
            throw ProtocolErrors.malformedResponse(
                A2A_METHODS.LIST_TASKS,
                parsed.error.issues[0]?.message ?? 'invalid task list'
            );
        }
        return parsed.data.tasks.map((wire) => this.tracker.observe(toTask(wire), this.source));
    }

    private async call(method: string, params: object): Promise<unknown> {
        const request: JsonRpcRequest<object> = { jsonrpc: '2.0', id: nanoid(), method, params };
        const raw = await this.transport.send(request);

        const envelope = JsonRpcResponseSchema.safeParse(raw);
        if (!envelope.success) {
            throw ProtocolErrors.malformedResponse(
                method,
                envelope.error.issues[0]?.message ?? 'invalid JSON-RPC envelope'
            );
        }
        if ('error' in envelope.data) {
            this.logger.error(`JSON-RPC error from ${this.endpoint}`, {
                method,
                code: envelope.data.error.code,
                message: envelope.data.error.message,
            });
            throw ProtocolErrors.remoteError(method, envelope.data.error);
        }
        return envelope.data.result;
    }

    private readTask(
        method: string,
        result: unknown,
        fallbackReferenceTaskIds: readonly string[] = []
    ): Task {
        const parsed = WireTaskSchema.safeParse(unwrapTaskResult(result));
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
            throw ProtocolErrors.malformedResponse(
                method,
                `${issue?.message ?? 'invalid task'}${where}`
            );
        }
        return toTask(parsed.data, fallbackReferenceTaskIds);
    }
}
