import { LogComponent } from '@baton/core';
import type { Logger } from '@baton/core';
import type { Conductor } from './conductor.js';
import { OrchestrationError } from './errors.js';
import { STAGES, STAGE_NAMES, isStageName } from './stages.js';
import type { StageInput, StageName } from './stages.js';
import type { RunResult } from './types.js';

export interface WorkflowRequest {
    question: string;
    /** Defaults to research, plan, implement */
    stages?: readonly string[];
    /** Plan to refine in the plan stage, or to execute when the plan stage is skipped */
    existingPlan?: string;
}

export interface StageResult {
    stage: StageName;
    result: RunResult;
}

export interface WorkflowResult {
    /** Every requested stage completed */
    success: boolean;
    stages: StageResult[];
    researchOutput?: string;
    planOutput?: string;
    implementationOutput?: string;
    /** First stage that ended without finishing */
    failedStage?: StageName;
}

function resolveStages(requested: readonly string[]): StageName[] {
    return requested.map((stage) => {
        if (!isStageName(stage)) {
            throw OrchestrationError.stageUnknown(stage, STAGE_NAMES);
        }
        return stage;
    });
}

/**
 * Runs stages in order, each as an independent conductor run, passing each
 * completed stage's finish message forward. Stops at the first stage that
 * does not complete.
 */
export class Workflow {
    private readonly logger: Logger;

    constructor(
        private readonly conductor: Conductor,
        logger: Logger
    ) {
        this.logger = logger.createChild(LogComponent.WORKFLOW);
    }

    async run(request: WorkflowRequest): Promise<WorkflowResult> {
        const question = request.question.trim();
        if (question.length === 0) {
            throw OrchestrationError.questionEmpty();
        }

        const stages = resolveStages(request.stages ?? STAGE_NAMES);
        const implementAt = stages.indexOf('implement');
        const planned = stages.slice(0, implementAt).includes('plan');
        if (implementAt >= 0 && !request.existingPlan && !planned) {
            throw OrchestrationError.planMissing();
        }

        const input: StageInput = request.existingPlan
            ? { question, plan: request.existingPlan }
            : { question };
        const result: WorkflowResult = { success: true, stages: [] };

        for (const stage of stages) {
            const definition = STAGES[stage];
            const query = definition.buildQuery(input);

            this.logger.info(`Stage ${stage} started`);
            this.conductor.events.emit('stage:started', { stage, query });

            const runResult = await this.conductor.run({
                title: definition.title,
                query,
                instructions: definition.instructions,
                useAgents: definition.usesAgents,
            });
            result.stages.push({ stage, result: runResult });
            this.conductor.events.emit('stage:finished', { stage, result: runResult });

            if (!runResult.completed || runResult.finishMessage === undefined) {
                this.logger.warn(`Stage ${stage} did not complete: ${runResult.outcome}`);
                result.success = false;
                result.failedStage = stage;
                break;
            }

            const output = runResult.finishMessage;
            this.logger.info(`Stage ${stage} completed after ${runResult.turnsExecuted} turn(s)`);
            switch (stage) {
                case 'research':
                    result.researchOutput = output;
                    input.researchOutput = output;
                    break;
                case 'plan':
                    result.planOutput = output;
                    input.plan = output;
                    break;
                case 'implement':
                    result.implementationOutput = output;
                    break;
                default: {
                    const _exhaustive: never = stage;
                    throw new Error(`Unhandled stage: ${String(_exhaustive)}`);
                }
            }
        }

        return result;
    }
}
