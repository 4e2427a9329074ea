/**
 * Orchestration-specific error codes
 * Covers conductor runs, stages and the workflow
 */
export enum OrchestrationErrorCode {
    PLAN_MISSING = 'orchestration_plan_missing',
    STAGE_UNKNOWN = 'orchestration_stage_unknown',
    QUESTION_EMPTY = 'orchestration_question_empty',
}
