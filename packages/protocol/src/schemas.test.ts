import { describe, it, expect } from 'vitest';
import { WireTaskSchema, partsToText, taskResponseText, toTask, unwrapTaskResult } from './schemas.js';

function parseTask(raw: unknown) {
    return WireTaskSchema.parse(unwrapTaskResult(raw));
}

describe('unwrapTaskResult', () => {
    it('should unwrap { task } results and leave bare tasks alone', () => {
        const task = { id: 't1', contextId: 'c1', status: { state: 'working' } };

        expect(unwrapTaskResult({ task })).toBe(task);
        expect(unwrapTaskResult(task)).toBe(task);
        expect(unwrapTaskResult(null)).toBeNull();
    });
});

describe('partsToText', () => {
    it('should render text, data and file parts', () => {
        expect(
            partsToText([
                { kind: 'text', text: 'summary' },
                { kind: 'data', data: { count: 2 } },
                { kind: 'file', file: { name: 'report.pdf' } },
                { kind: 'text', text: '' },
            ])
        ).toBe('summary\n{"count":2}\n[file: report.pdf]');
    });
});

describe('toTask', () => {
    it('should normalize agent roles and failed status messages', () => {
        const task = toTask(
            parseTask({
                id: 't1',
                contextId: 'c1',
                status: {
                    state: 'failed',
                    timestamp: '2026-01-01T00:00:00Z',
                    message: {
                        role: 'assistant',
                        messageId: 'm1',
                        parts: [{ kind: 'text', text: 'rate limited' }],
                    },
                },
            })
        );

        expect(task).toEqual({
            id: 't1',
            contextId: 'c1',
            state: 'failed',
            artifacts: [],
            history: [],
            referenceTaskIds: [],
            error: 'rate limited',
            statusMessage: 'rate limited',
            updatedAt: '2026-01-01T00:00:00Z',
        });
    });

    it('should give failed tasks without a message a generic error', () => {
        const task = toTask(parseTask({ id: 't1', contextId: 'c1', status: { state: 'failed' } }));
        expect(task.error).toBe('Task failed without an error message');
    });

    it('should prefer echoed references over the fallback', () => {
        const wire = parseTask({
            id: 't1',
            contextId: 'c1',
            status: { state: 'working' },
            history: [
                {
                    role: 'user',
                    messageId: 'm1',
                    parts: [{ kind: 'text', text: 'go' }],
                    referenceTaskIds: ['t0'],
                },
            ],
        });

        expect(toTask(wire, ['other']).referenceTaskIds).toEqual(['t0']);
        expect(toTask({ ...wire, history: [] }, ['other']).referenceTaskIds).toEqual(['other']);
    });

    it('should reject unknown states', () => {
        expect(
            WireTaskSchema.safeParse({ id: 't1', contextId: 'c1', status: { state: 'paused' } })
                .success
        ).toBe(false);
    });
});

describe('taskResponseText', () => {
    it('should prefer artifacts, then the last agent message, then the status', () => {
        const base = toTask(
            parseTask({
                id: 't1',
                contextId: 'c1',
                status: {
                    state: 'completed',
                    message: {
                        role: 'agent',
                        messageId: 's1',
                        parts: [{ kind: 'text', text: 'status' }],
                    },
                },
                history: [
                    { role: 'agent', messageId: 'm1', parts: [{ kind: 'text', text: 'first' }] },
                    { role: 'agent', messageId: 'm2', parts: [{ kind: 'text', text: 'second' }] },
                    { role: 'user', messageId: 'm3', parts: [{ kind: 'text', text: 'thanks' }] },
                ],
                artifacts: [
                    { artifactId: 'a1', parts: [{ kind: 'text', text: 'part one' }] },
                    { artifactId: 'a2', parts: [{ kind: 'text', text: 'part two' }] },
                ],
            })
        );

        expect(taskResponseText(base)).toBe('part one\n\npart two');
        expect(taskResponseText({ ...base, artifacts: [] })).toBe('second');
        expect(taskResponseText({ ...base, artifacts: [], history: [] })).toBe('status');
    });
});
