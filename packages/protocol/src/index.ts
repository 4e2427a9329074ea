/**
 * @baton/protocol - A2A task lifecycle over JSON-RPC
 */

export * from './types.js';
export * from './jsonrpc/index.js';
export {
    ArtifactSchema,
    MessageSchema,
    PartSchema,
    TaskStateSchema,
    WireTaskSchema,
    ListTasksResultSchema,
    partsToText,
    taskResponseText,
    toTask,
    unwrapTaskResult,
} from './schemas.js';
export type { WireTask } from './schemas.js';
export { DEFAULT_TASK_SOURCE, TaskStateTracker } from './task-tracker.js';
export { ProtocolClient, DEFAULT_ACCEPTED_OUTPUT_MODES } from './client.js';
export type { ProtocolClientOptions } from './client.js';
export { HttpJsonRpcTransport } from './transport.js';
export type { HttpJsonRpcTransportOptions, JsonRpcTransport } from './transport.js';
export { CommunicationError, ProtocolError, ProtocolErrors, TaskTimeoutError } from './errors.js';
export type {
    CommunicationErrorContext,
    ProtocolErrorContext,
    TaskTimeoutErrorContext,
} from './errors.js';
export { ProtocolErrorCode } from './error-codes.js';
export * from './registry/index.js';
