/**
 * A2A Protocol Type Definitions
 *
 * Wire types follow A2A Protocol v0.3.0. The domain `Task` is the normalized,
 * read-only record the client hands out and the tracker retains.
 *
 * @see https://a2a-protocol.org/latest/specification
 */

/**
 * Task lifecycle state.
 *
 * submitted → working → (input-required | auth-required → working)* →
 * completed | failed | canceled | rejected
 */
export const TASK_STATES = [
    'submitted',
    'working',
    'input-required',
    'auth-required',
    'completed',
    'failed',
    'canceled',
    'rejected',
] as const;

export type TaskState = (typeof TASK_STATES)[number];

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
    'completed',
    'failed',
    'canceled',
    'rejected',
]);

/** Paused states still count as active */
export const PAUSED_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
    'input-required',
    'auth-required',
]);

export function isTerminalState(state: TaskState): boolean {
    return TERMINAL_STATES.has(state);
}

export type MessageRole = 'user' | 'agent';

export interface PartBase {
    metadata?: Record<string, unknown>;
}

export interface TextPart extends PartBase {
    readonly kind: 'text';
    text: string;
}

export interface FileContent {
    name?: string;
    mimeType?: string;
    /** Base64 encoded */
    bytes?: string;
    uri?: string;
}

export interface FilePart extends PartBase {
    readonly kind: 'file';
    file: FileContent;
}

export interface DataPart extends PartBase {
    readonly kind: 'data';
    data: Record<string, unknown>;
}

export type Part = TextPart | FilePart | DataPart;

export interface Message {
    readonly role: MessageRole;
    parts: Part[];
    messageId: string;
    taskId?: string;
    contextId?: string;
    referenceTaskIds?: string[];
    metadata?: Record<string, unknown>;
    readonly kind: 'message';
}

export interface Artifact {
    artifactId: string;
    name?: string;
    description?: string;
    parts: Part[];
    metadata?: Record<string, unknown>;
}

export interface MessageSendConfiguration {
    acceptedOutputModes?: string[];
    historyLength?: number;
    blocking?: boolean;
}

/** Params for message/send */
export interface MessageSendParams {
    message: Message;
    configuration?: MessageSendConfiguration;
    metadata?: Record<string, unknown>;
}

/** Params for tasks/get and tasks/cancel */
export interface TaskIdParams {
    id: string;
    metadata?: Record<string, unknown>;
}

/** Params for tasks/list */
export interface ListTasksParams {
    contextId?: string;
}

/**
 * Normalized remote task. Never mutated once `state` is terminal.
 */
export interface Task {
    readonly id: string;
    readonly contextId: string;
    readonly state: TaskState;
    readonly artifacts: readonly Artifact[];
    readonly history: readonly Message[];
    readonly referenceTaskIds: readonly string[];
    /** Present only when `state` is `failed` */
    readonly error?: string;
    /** Text of the current status message */
    readonly statusMessage?: string;
    /** Status timestamp reported by the agent */
    readonly updatedAt?: string;
    readonly metadata?: Readonly<Record<string, unknown>>;
}

export interface SendOptions {
    contextId?: string;
    taskId?: string;
    referenceTaskIds?: string[];
}

export interface WaitOptions {
    pollIntervalMs: number;
    maxWaitMs: number;
}

export type ContextSummary = Record<TaskState, number> & { total: number };
