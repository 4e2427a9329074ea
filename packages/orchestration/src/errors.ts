import { BatonRuntimeError, ErrorScope, ErrorType } from '@baton/core';
import { OrchestrationErrorCode } from './error-codes.js';

/**
 * Orchestration error factory methods
 */
export class OrchestrationError {
    private constructor() {}

    static planMissing() {
        return new BatonRuntimeError(
            OrchestrationErrorCode.PLAN_MISSING,
            ErrorScope.ORCHESTRATION,
            ErrorType.USER,
            'The implement stage needs a plan, but none was given or produced',
            {},
            'Run the plan stage first or pass an existing plan'
        );
    }

    static stageUnknown(stage: string, available: readonly string[]) {
        return new BatonRuntimeError(
            OrchestrationErrorCode.STAGE_UNKNOWN,
            ErrorScope.ORCHESTRATION,
            ErrorType.USER,
            `Unknown stage '${stage}'. Available stages: ${available.join(', ')}`,
            { stage, available: [...available] }
        );
    }

    static questionEmpty() {
        return new BatonRuntimeError(
            OrchestrationErrorCode.QUESTION_EMPTY,
            ErrorScope.ORCHESTRATION,
            ErrorType.USER,
            'A run needs a non-empty question'
        );
    }
}
