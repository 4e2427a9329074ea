import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ErrorType } from '@baton/core';
import { createSilentMockLogger } from '@baton/core/test-utils';
import { ProtocolClient } from './client.js';
import { ProtocolErrorCode } from './error-codes.js';
import { CommunicationError, ProtocolError, ProtocolErrors, TaskTimeoutError } from './errors.js';
import { A2AErrorCode } from './jsonrpc/types.js';
import { taskResponseText } from './schemas.js';
import { TaskStateTracker } from './task-tracker.js';
import { InMemoryAgent } from './testing/in-memory-agent.js';

describe('ProtocolClient', () => {
    let agent: InMemoryAgent;
    let tracker: TaskStateTracker;
    let client: ProtocolClient;

    beforeEach(() => {
        agent = new InMemoryAgent();
        tracker = new TaskStateTracker();
        client = new ProtocolClient(agent, tracker, createSilentMockLogger());
    });

    describe('send', () => {
        it('should post message/send and record the submitted task', async () => {
            const task = await client.send('hello', { contextId: 'ctx-a' });

            expect(task).toMatchObject({ id: 'task-1', contextId: 'ctx-a', state: 'submitted' });
            expect(tracker.get('task-1')).toBe(task);
            expect(agent.requests[0]).toMatchObject({
                jsonrpc: '2.0',
                method: 'message/send',
                params: {
                    message: {
                        kind: 'message',
                        role: 'user',
                        parts: [{ kind: 'text', text: 'hello' }],
                        contextId: 'ctx-a',
                    },
                    configuration: { acceptedOutputModes: ['application/json'] },
                },
            });
        });

        it('should accept results wrapped as { task }', async () => {
            const wrapped = new InMemoryAgent({ wrapResults: true });
            const wrappedClient = new ProtocolClient(wrapped, tracker, createSilentMockLogger());

            const task = await wrappedClient.send('hello');

            expect(task).toMatchObject({ id: 'task-1', contextId: 'ctx-1', state: 'submitted' });
        });

        it('should send configured output modes', async () => {
            const custom = new ProtocolClient(agent, tracker, createSilentMockLogger(), {
                acceptedOutputModes: ['text/plain'],
            });

            await custom.send('hello');

            expect(agent.requests[0]?.params).toMatchObject({
                configuration: { acceptedOutputModes: ['text/plain'] },
            });
        });

        it('should keep reference task ids', async () => {
            const task = await client.send('follow up', { referenceTaskIds: ['task-0'] });
            expect(task.referenceTaskIds).toEqual(['task-0']);
        });

        it('should raise ProtocolError for a malformed task', async () => {
            agent.respondNext('message/send', { jsonrpc: '2.0', id: 1, result: { id: 't' } });

            await expect(client.send('hello')).rejects.toThrow(
                'Malformed response to message/send: Required at contextId'
            );
        });

        it('should raise ProtocolError for a response without result or error', async () => {
            agent.respondNext('message/send', { jsonrpc: '2.0', id: 1 });

            await expect(client.send('hello')).rejects.toBeInstanceOf(ProtocolError);
        });

        it('should let transport failures propagate as CommunicationError', async () => {
            agent.throwNext(
                'message/send',
                ProtocolErrors.requestFailed(agent.endpoint, 'message/send', 'connection refused')
            );

            await expect(client.send('hello')).rejects.toBeInstanceOf(CommunicationError);
        });
    });

    describe('fetch', () => {
        it('should return the retained record for a terminal task', async () => {
            agent.seedTask({ id: 't1', contextId: 'c1', states: ['completed'], output: 'done' });

            const first = await client.fetch('t1');
            const second = await client.fetch('t1');

            expect(second).toBe(first);
            expect(Object.isFrozen(first)).toBe(true);
            expect(agent.callCount('tasks/get')).toBe(1);
            expect(taskResponseText(first)).toBe('done');
        });

        it('should reject changes to a retained terminal record', async () => {
            agent.seedTask({ id: 't1', contextId: 'c1', states: ['completed'], output: 'done' });
            const first = await client.fetch('t1');
            const part = first.artifacts[0]?.parts[0];

            expect(() => {
                if (part?.kind === 'text') part.text = 'tampered';
            }).toThrow(TypeError);

            const second = await client.fetch('t1');
            expect(taskResponseText(second)).toBe('done');
        });

        it('should carry the remote error code for unknown tasks', async () => {
            const error = await client.fetch('missing').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProtocolError);
            expect(error).toMatchObject({
                code: ProtocolErrorCode.REMOTE_ERROR,
                type: ErrorType.NOT_FOUND,
                context: { method: 'tasks/get', remoteCode: A2AErrorCode.TASK_NOT_FOUND },
            });
        });

        it('should report failed tasks with their status message', async () => {
            agent.seedTask({ id: 't1', contextId: 'c1', states: ['failed'], error: 'quota exceeded' });

            const task = await client.fetch('t1');

            expect(task.state).toBe('failed');
            expect(task.error).toBe('quota exceeded');
        });
    });

    describe('waitFor', () => {
        beforeEach(() => {
            vi.useFakeTimers();
        });

        afterEach(() => {
            vi.useRealTimers();
        });

        it('should poll until the task is terminal', async () => {
            agent.seedTask({
                id: 't2',
                contextId: 'c1',
                states: ['working', 'working', 'completed'],
                output: 'result',
            });

            const promise = client.waitFor('t2', 1000, 10_000);
            await vi.advanceTimersByTimeAsync(2000);
            const task = await promise;

            expect(task.state).toBe('completed');
            expect(agent.callCount('tasks/get')).toBe(3);
        });

        it('should treat paused states as still running', async () => {
            agent.seedTask({
                id: 't2',
                contextId: 'c1',
                states: ['input-required', 'completed'],
            });

            const promise = client.waitFor('t2', 500, 10_000);
            await vi.advanceTimersByTimeAsync(500);

            await expect(promise).resolves.toMatchObject({ state: 'completed' });
        });

        it('should fail with TaskTimeoutError at the deadline', async () => {
            agent.seedTask({ id: 't3', contextId: 'c1', states: ['working'] });

            let settled = false;
            const outcome = client.waitFor('t3', 1, 2).then(
                () => 'resolved',
                (error: unknown) => error
            );
            void outcome.then(() => {
                settled = true;
            });

            await vi.advanceTimersByTimeAsync(1);
            expect(settled).toBe(false);

            await vi.advanceTimersByTimeAsync(1);
            const error = await outcome;

            expect(error).toBeInstanceOf(TaskTimeoutError);
            expect(error).toMatchObject({
                code: ProtocolErrorCode.TASK_TIMEOUT,
                type: ErrorType.TIMEOUT,
                lastTask: { id: 't3', state: 'working' },
                context: { taskId: 't3', maxWaitMs: 2, lastState: 'working' },
            });
            expect(agent.callCount('tasks/get')).toBe(3);
        });
    });

    describe('cancel', () => {
        it('should return a terminal task unchanged without a remote call', async () => {
            agent.seedTask({ id: 't4', contextId: 'c1', states: ['completed'] });
            const finished = await client.fetch('t4');

            const canceled = await client.cancel('t4');

            expect(canceled).toBe(finished);
            expect(agent.callCount('tasks/cancel')).toBe(0);
        });

        it('should fetch the final task when the agent says it is not cancelable', async () => {
            agent.seedTask({ id: 't5', contextId: 'c1', states: ['completed'], output: 'done' });

            const task = await client.cancel('t5');

            expect(task.state).toBe('completed');
            expect(agent.callCount('tasks/cancel')).toBe(1);
            expect(agent.callCount('tasks/get')).toBe(1);
        });

        it('should record a canceled task as terminal', async () => {
            agent.seedTask({ id: 't6', contextId: 'c1', states: ['working'] });

            const task = await client.cancel('t6');
            const again = await client.fetch('t6');

            expect(task.state).toBe('canceled');
            expect(again).toBe(task);
            expect(agent.callCount('tasks/get')).toBe(0);
        });

        it('should rethrow other remote errors', async () => {
            agent.seedTask({ id: 't7', contextId: 'c1', states: ['working'] });
            agent.failNext('tasks/cancel', { code: -32603, message: 'Internal error' });

            await expect(client.cancel('t7')).rejects.toMatchObject({
                code: ProtocolErrorCode.REMOTE_ERROR,
                context: { remoteCode: -32603, remoteMessage: 'Internal error' },
            });
        });
    });

    describe('list', () => {
        it('should project tracked tasks by context', async () => {
            await client.send('one', { contextId: 'ctx-a' });
            await client.send('two', { contextId: 'ctx-a' });
            await client.send('three', { contextId: 'ctx-b' });

            expect(client.list('ctx-a').map((t) => t.id)).toEqual(['task-1', 'task-2']);
            expect(client.list()).toHaveLength(3);
            expect(agent.callCount('tasks/list')).toBe(0);
        });

        it('should record remotely listed tasks', async () => {
            await client.send('one', { contextId: 'ctx-a' });
            await client.send('two', { contextId: 'ctx-b' });
            const otherTracker = new TaskStateTracker();
            const other = new ProtocolClient(agent, otherTracker, createSilentMockLogger());

            const tasks = await other.listRemote('ctx-a');

            expect(tasks.map((t) => t.id)).toEqual(['task-1']);
            expect(otherTracker.get('task-1')?.state).toBe('submitted');
            expect(agent.requests.at(-1)?.params).toEqual({ contextId: 'ctx-a' });
        });
    });

    describe('sendAndWait', () => {
        it('should return the completed task with its output', async () => {
            const task = await client.sendAndWait('hi', { pollIntervalMs: 10, maxWaitMs: 1000 });

            expect(task.state).toBe('completed');
            expect(taskResponseText(task)).toBe('Echo: hi');
        });
    });
});
