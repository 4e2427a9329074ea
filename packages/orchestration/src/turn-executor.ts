import type { Logger } from '@baton/core';
import type { ActionHandler } from './actions/handler.js';
import type { ActionParser } from './actions/parser.js';
import { describeAction } from './actions/types.js';
import type { Action } from './actions/types.js';
import type { StageFinish } from './run-context.js';
import type { ExecutionResult } from './types.js';

export const NO_ACTIONS_RESPONSE = 'No actions were attempted.';

/**
 * Runs one turn: parse the directive, then execute its actions strictly in
 * order. Keeps no state of its own between turns.
 */
export class TurnExecutor {
    constructor(
        private readonly parser: ActionParser,
        private readonly handler: ActionHandler,
        private readonly logger: Logger
    ) {}

    async execute(directiveText: string): Promise<ExecutionResult> {
        const { actions, errors, foundActionAttempt } = this.parser.parse(directiveText);

        if (actions.length === 0 && !foundActionAttempt) {
            this.logger.warn('No actions attempted in directive');
            return {
                actionsExecuted: [],
                responses: [NO_ACTIONS_RESPONSE],
                hasError: false,
                done: false,
                agentTrajectories: {},
                noOp: true,
                skipped: 0,
            };
        }

        const responses = errors.map((error) => `[PARSE ERROR] ${error}`);
        const actionsExecuted: Action[] = [];
        let hasError = errors.length > 0;
        let finish: StageFinish | undefined;

        try {
            for (const action of actions) {
                this.logger.debug(`Executing ${describeAction(action)}`);
                const outcome = await this.handler.handle(action);
                actionsExecuted.push(action);
                responses.push(outcome.output);
                if (outcome.isError) {
                    hasError = true;
                }

                if (action.type === 'finish_stage') {
                    finish = { message: action.message, summary: action.summary };
                    break;
                }
            }
        } catch (error) {
            // A failed turn leaves no trajectories for the next one
            this.handler.takeTrajectories();
            throw error;
        }

        const skipped = actions.length - actionsExecuted.length;
        if (skipped > 0) {
            this.logger.warn(`Skipped ${skipped} action(s) after finish_stage`);
        }

        return {
            actionsExecuted,
            responses,
            hasError,
            done: finish !== undefined,
            ...(finish && { finishMessage: finish.message, summary: finish.summary }),
            agentTrajectories: this.handler.takeTrajectories(),
            noOp: false,
            skipped,
        };
    }
}
