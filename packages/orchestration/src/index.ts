/**
 * @baton/orchestration
 *
 * Turn-based conductor: directive text is parsed into actions, actions run
 * against remote agents and the run's state managers, and each turn is
 * recorded before the next prompt is built.
 *
 * Example usage:
 * ```typescript
 * const conductor = new Conductor({ generator, registry, logger, wait });
 * const workflow = new Workflow(conductor, logger);
 * const result = await workflow.run({ question: 'Which caching strategy fits?' });
 * ```
 */

// Conductor and workflow
export { Conductor, NO_AGENTS_PROMPT } from './conductor.js';
export type { ConductorOptions, RunRequest } from './conductor.js';
export { Workflow } from './workflow.js';
export type { WorkflowRequest, WorkflowResult, StageResult } from './workflow.js';
export { STAGES, STAGE_NAMES, isStageName } from './stages.js';
export type { StageDefinition, StageInput, StageName } from './stages.js';
export { ConductorEventBus } from './events.js';
export type { ConductorEventMap, ConductorEventName } from './events.js';

// Turn execution
export { TurnExecutor, NO_ACTIONS_RESPONSE } from './turn-executor.js';
export { ActionParser, decodeEntities, extractFields } from './actions/parser.js';
export type { ParseResult } from './actions/parser.js';
export { ActionHandler } from './actions/handler.js';
export type { ActionHandlerOptions } from './actions/handler.js';
export {
    ACTION_TYPES,
    SCRATCHPAD_OPERATIONS,
    TODO_OPERATIONS,
    describeAction,
    isActionType,
} from './actions/types.js';
export type {
    Action,
    ActionType,
    QueryAgentAction,
    UpdateScratchpadAction,
    UpdateTodoAction,
    FinishStageAction,
    ScratchpadOperation,
    TodoOperation,
} from './actions/types.js';

// State
export { createRunContext } from './run-context.js';
export type { RunContext, RunContextOptions, StageFinish } from './run-context.js';
export * from './state/index.js';

// Prompts
export * from './prompts/index.js';

// Directive generation
export * from './directive/index.js';

// Types and errors
export type {
    ActionOutcome,
    AgentTrajectories,
    AgentTrajectoryEntry,
    ExecutionResult,
    QueryOutcome,
    RunOutcome,
    RunResult,
    Turn,
} from './types.js';
export { OrchestrationError } from './errors.js';
export { OrchestrationErrorCode } from './error-codes.js';

// Wiring
export { createRuntime } from './runtime.js';
export type { BatonRuntime, CreateRuntimeOptions } from './runtime.js';
