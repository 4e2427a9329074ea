import { ConductorConfigSchema, LogComponent, errorMessage } from '@baton/core';
import type { ConductorConfig, Logger } from '@baton/core';
import type { AgentRegistry, WaitOptions } from '@baton/protocol';
import { ActionHandler } from './actions/handler.js';
import { ActionParser } from './actions/parser.js';
import type { DirectiveGenerator } from './directive/types.js';
import { ConductorEventBus } from './events.js';
import { CONDUCTOR_SYSTEM_PROMPT, buildSystemPrompt } from './prompts/system-prompt.js';
import { buildTurnPrompt } from './prompts/turn-prompt.js';
import { createRunContext } from './run-context.js';
import { TurnExecutor } from './turn-executor.js';
import type { RunOutcome, RunResult } from './types.js';

export const NO_AGENTS_PROMPT = '(No agents available)';

const NO_AGENTS: Pick<AgentRegistry, 'resolve'> = { resolve: () => undefined };

export interface ConductorOptions {
    generator: DirectiveGenerator;
    registry: AgentRegistry;
    logger: Logger;
    /** Poll interval and deadline for agent queries */
    wait: WaitOptions;
    settings?: Partial<ConductorConfig>;
    /** Base system prompt; the agent list goes at `{AGENT_LIST_HERE}` */
    systemPrompt?: string;
    events?: ConductorEventBus;
}

export interface RunRequest {
    /** Heading of the task section, e.g. "Research Task" */
    title: string;
    query: string;
    instructions: string;
    /** When false, no agent can be queried and the prompt lists none */
    useAgents?: boolean;
    runId?: string;
}

/**
 * Drives the turn loop: prompt, directive, execute, record, repeat.
 *
 * Each `run` starts from empty state managers and clears the registry's task
 * tracker. A run ends when a turn finishes the stage, after `maxTurns` turns,
 * or after `stallThreshold` consecutive turns without any action attempt.
 * Directive generation failures end the run by propagating; agent failures
 * never do.
 */
export class Conductor {
    readonly events: ConductorEventBus;
    private readonly generator: DirectiveGenerator;
    private readonly registry: AgentRegistry;
    private readonly logger: Logger;
    private readonly wait: WaitOptions;
    private readonly settings: ConductorConfig;
    private readonly systemPrompt: string;

    constructor(options: ConductorOptions) {
        this.generator = options.generator;
        this.registry = options.registry;
        this.logger = options.logger.createChild(LogComponent.ORCHESTRATION);
        this.wait = options.wait;
        this.settings = ConductorConfigSchema.parse(options.settings ?? {});
        this.systemPrompt = options.systemPrompt ?? CONDUCTOR_SYSTEM_PROMPT;
        this.events = options.events ?? new ConductorEventBus();
    }

    async run(request: RunRequest): Promise<RunResult> {
        const { maxTurns, stallThreshold } = this.settings;
        const useAgents = request.useAgents ?? true;
        const context = createRunContext({
            ...(request.runId !== undefined && { runId: request.runId }),
            scratchpadMaxItems: this.settings.scratchpadMaxItems,
            todoMaxItems: this.settings.todoMaxItems,
            maxHistoryTurns: this.settings.maxHistoryTurns,
        });
        const { runId } = context;

        // Task records are scoped to one run
        if (this.registry.tracker.size > 0) {
            this.logger.debug(`Dropping ${this.registry.tracker.size} task(s) from earlier runs`);
            this.registry.tracker.reset();
        }

        const executorLogger = this.logger.createChild(LogComponent.EXECUTOR);
        const executor = new TurnExecutor(
            new ActionParser(executorLogger),
            new ActionHandler({
                registry: useAgents ? this.registry : NO_AGENTS,
                context,
                wait: this.wait,
                logger: executorLogger,
            }),
            executorLogger
        );
        const system = buildSystemPrompt(
            this.systemPrompt,
            useAgents ? this.registry.toPrompt() : NO_AGENTS_PROMPT
        );

        this.logger.info(`${request.title} started`, { runId, maxTurns, useAgents });
        this.events.emit('run:started', { runId, title: request.title, maxTurns });

        let turnsExecuted = 0;
        let consecutiveNoOps = 0;
        let outcome: RunOutcome = 'max-turns';

        while (turnsExecuted < maxTurns) {
            turnsExecuted += 1;
            this.logger.info(`Turn ${turnsExecuted}/${maxTurns}`, { runId });

            const prompt = buildTurnPrompt({
                title: request.title,
                query: request.query,
                instructions: request.instructions,
                context,
            });

            let directive: string;
            try {
                directive = await this.generator.generate({ system, prompt });
            } catch (error) {
                this.logger.error(
                    `Directive generation failed on turn ${turnsExecuted}: ${errorMessage(error)}`,
                    { runId }
                );
                throw error;
            }

            const result = await executor.execute(directive);
            const turn = context.history.append({
                directiveText: directive,
                actionsExecuted: result.actionsExecuted,
                responses: result.responses,
                agentTrajectories: result.agentTrajectories,
                hasError: result.hasError,
                noOp: result.noOp,
            });
            this.events.emit('turn:completed', { runId, turn, result });

            if (result.done) {
                outcome = 'completed';
                break;
            }

            consecutiveNoOps = result.noOp ? consecutiveNoOps + 1 : 0;
            if (consecutiveNoOps >= stallThreshold) {
                this.logger.warn(
                    `Stalled after ${consecutiveNoOps} consecutive turns without actions`,
                    { runId }
                );
                outcome = 'stalled';
                break;
            }
        }

        const { finish } = context;
        const runResult: RunResult = {
            completed: outcome === 'completed',
            outcome,
            ...(finish && { finishMessage: finish.message, summary: finish.summary }),
            turnsExecuted,
            scratchpad: context.scratchpad.get(),
            todo: context.todo.list(),
        };

        this.logger.info(`${request.title} ended: ${outcome} after ${turnsExecuted} turn(s)`, {
            runId,
        });
        this.events.emit('run:finished', { runId, result: runResult });
        return runResult;
    }
}
