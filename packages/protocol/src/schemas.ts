/**
 * Zod schemas for validating A2A responses and normalizing them into Tasks
 */

import { z } from 'zod';
import { TASK_STATES } from './types.js';
import type { Artifact, Message, Part, Task } from './types.js';

const MetadataSchema = z.record(z.unknown());

export const TextPartSchema = z.object({
    kind: z.literal('text'),
    text: z.string(),
    metadata: MetadataSchema.optional(),
});

export const FilePartSchema = z.object({
    kind: z.literal('file'),
    file: z.object({
        name: z.string().optional(),
        mimeType: z.string().optional(),
        bytes: z.string().optional(),
        uri: z.string().optional(),
    }),
    metadata: MetadataSchema.optional(),
});

export const DataPartSchema = z.object({
    kind: z.literal('data'),
    data: MetadataSchema,
    metadata: MetadataSchema.optional(),
});

export const PartSchema = z.discriminatedUnion('kind', [
    TextPartSchema,
    FilePartSchema,
    DataPartSchema,
]);

export const MessageSchema = z.object({
    kind: z.literal('message').default('message'),
    // some agents still answer with 'assistant'
    role: z
        .enum(['user', 'agent', 'assistant'])
        .transform((role): Message['role'] => (role === 'user' ? 'user' : 'agent')),
    parts: z.array(PartSchema),
    messageId: z.string(),
    taskId: z.string().optional(),
    contextId: z.string().optional(),
    referenceTaskIds: z.array(z.string()).optional(),
    metadata: MetadataSchema.optional(),
});

export const ArtifactSchema = z.object({
    artifactId: z.string(),
    name: z.string().optional(),
    description: z.string().optional(),
    parts: z.array(PartSchema),
    metadata: MetadataSchema.optional(),
});

export const TaskStateSchema = z.enum(TASK_STATES);

export const WireTaskSchema = z.object({
    kind: z.literal('task').optional(),
    id: z.string().min(1),
    contextId: z.string().min(1),
    status: z.object({
        state: TaskStateSchema,
        message: MessageSchema.optional(),
        timestamp: z.string().optional(),
    }),
    artifacts: z.array(ArtifactSchema).optional(),
    history: z.array(MessageSchema).optional(),
    metadata: MetadataSchema.optional(),
});

export type WireTask = z.output<typeof WireTaskSchema>;

/**
 * Task results arrive either as the task itself or wrapped in `{ task }`
 */
export function unwrapTaskResult(result: unknown): unknown {
    if (
        typeof result === 'object' &&
        result !== null &&
        !('id' in result) &&
        'task' in result
    ) {
        return result.task;
    }
    return result;
}

export const ListTasksResultSchema = z.object({
    tasks: z.array(WireTaskSchema),
});

/**
 * Join the readable content of message or artifact parts
 */
export function partsToText(parts: readonly Part[]): string {
    return parts
        .map((part) => {
            switch (part.kind) {
                case 'text':
                    return part.text;
                case 'data':
                    return JSON.stringify(part.data);
                case 'file':
                    return `[file: ${part.file.name ?? part.file.uri ?? 'unnamed'}]`;
            }
        })
        .filter((text) => text.length > 0)
        .join('\n');
}

function collectReferenceTaskIds(messages: readonly Message[]): string[] {
    const ids = new Set<string>();
    for (const message of messages) {
        for (const id of message.referenceTaskIds ?? []) {
            ids.add(id);
        }
    }
    return [...ids];
}

/**
 * Normalize a validated wire task.
 * `fallbackReferenceTaskIds` fills in references the agent did not echo back.
 * The task owns copies of the wire messages and artifacts.
 */
export function toTask(wire: WireTask, fallbackReferenceTaskIds: readonly string[] = []): Task {
    const history: Message[] = structuredClone(wire.history ?? []);
    const artifacts: Artifact[] = structuredClone(wire.artifacts ?? []);
    const statusText = wire.status.message ? partsToText(wire.status.message.parts) : '';
    const echoed = collectReferenceTaskIds(history);
    const referenceTaskIds = echoed.length > 0 ? echoed : [...fallbackReferenceTaskIds];

    return {
        id: wire.id,
        contextId: wire.contextId,
        state: wire.status.state,
        artifacts,
        history,
        referenceTaskIds,
        ...(wire.status.state === 'failed' && {
            error: statusText || 'Task failed without an error message',
        }),
        ...(statusText !== '' && { statusMessage: statusText }),
        ...(wire.status.timestamp !== undefined && { updatedAt: wire.status.timestamp }),
        ...(wire.metadata !== undefined && { metadata: structuredClone(wire.metadata) }),
    };
}

/**
 * Text of the task's result: artifacts first, then the last agent message
 */
export function taskResponseText(task: Task): string | undefined {
    const artifactText = task.artifacts
        .map((artifact) => partsToText(artifact.parts))
        .filter((text) => text.length > 0)
        .join('\n\n');
    if (artifactText) {
        return artifactText;
    }

    const agentMessages = task.history.filter((message) => message.role === 'agent');
    const last = agentMessages[agentMessages.length - 1];
    if (last) {
        const text = partsToText(last.parts);
        if (text) return text;
    }

    return task.statusMessage;
}
