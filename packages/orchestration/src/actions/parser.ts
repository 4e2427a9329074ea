import { z } from 'zod';
import type { Logger } from '@baton/core';
import { SCRATCHPAD_OPERATIONS, TODO_OPERATIONS, isActionType } from './types.js';
import type {
    Action,
    ActionType,
    FinishStageAction,
    QueryAgentAction,
    UpdateScratchpadAction,
    UpdateTodoAction,
} from './types.js';

const ACTION_BLOCK = /<action\s+type="([^"]+)"\s*>([\s\S]*?)<\/action>/g;
const FIELD = /<([A-Za-z_][\w-]*)>([\s\S]*?)<\/\1>/g;
const ENTITY = /&(#x[0-9a-fA-F]+|#[0-9]+|lt|gt|quot|apos|amp);/g;
const MAX_CODE_POINT = 0x10ffff;

const NAMED_ENTITIES = new Map([
    ['lt', '<'],
    ['gt', '>'],
    ['quot', '"'],
    ['apos', "'"],
    ['amp', '&'],
]);

export interface ParseResult {
    /** In order of appearance */
    actions: Action[];
    errors: string[];
    /** At least one block carried a known action type, valid or not */
    foundActionAttempt: boolean;
}

export function decodeEntities(text: string): string {
    return text.replace(ENTITY, (match, entity: string) => {
        if (entity.startsWith('#')) {
            const code = entity.startsWith('#x')
                ? Number.parseInt(entity.slice(2), 16)
                : Number.parseInt(entity.slice(1), 10);
            return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
        }
        return NAMED_ENTITIES.get(entity) ?? match;
    });
}

/**
 * Child elements of an action block. The first non-empty occurrence of a field wins.
 */
export function extractFields(body: string): Map<string, string> {
    const fields = new Map<string, string>();
    for (const [, name, raw] of body.matchAll(FIELD)) {
        if (name === undefined || raw === undefined || fields.has(name)) continue;
        const value = decodeEntities(raw.trim()).trim();
        if (value.length > 0) {
            fields.set(name, value);
        }
    }
    return fields;
}

const required = (field: string) =>
    z.string({ required_error: `Required field '${field}' is missing or empty` });

const invalidOperation =
    (values: readonly string[]): z.ZodErrorMap =>
    (_issue, ctx) => ({
        message: `Invalid operation '${String(ctx.data)}'; expected one of ${values.join(', ')}`,
    });

const IndexSchema = z
    .string()
    .regex(/^-?\d+$/, "Field 'index' must be an integer")
    .transform((value) => Number.parseInt(value, 10));

const QueryAgentSchema = z
    .object({
        agent_id: required('agent_id'),
        query: required('query'),
        context_id: z.string().optional(),
    })
    .transform(
        (fields): QueryAgentAction => ({
            type: 'query_agent',
            agentId: fields.agent_id,
            query: fields.query,
            ...(fields.context_id !== undefined && { contextId: fields.context_id }),
        })
    );

const UpdateScratchpadSchema = z
    .object({
        content: required('content'),
        operation: z
            .enum(SCRATCHPAD_OPERATIONS, { errorMap: invalidOperation(SCRATCHPAD_OPERATIONS) })
            .default('append'),
    })
    .transform(
        (fields): UpdateScratchpadAction => ({
            type: 'update_scratchpad',
            content: fields.content,
            operation: fields.operation,
        })
    );

const UpdateTodoSchema = z
    .object({
        item: required('item'),
        operation: z
            .enum(TODO_OPERATIONS, { errorMap: invalidOperation(TODO_OPERATIONS) })
            .default('add'),
        index: IndexSchema.optional(),
    })
    .transform(
        (fields): UpdateTodoAction => ({
            type: 'update_todo',
            item: fields.item,
            operation: fields.operation,
            ...(fields.index !== undefined && { index: fields.index }),
        })
    );

const FinishStageSchema = z
    .object({
        message: required('message'),
        summary: required('summary'),
    })
    .transform(
        (fields): FinishStageAction => ({
            type: 'finish_stage',
            message: fields.message,
            summary: fields.summary,
        })
    );

const ACTION_SCHEMAS: Record<ActionType, z.ZodType<Action, z.ZodTypeDef, unknown>> = {
    query_agent: QueryAgentSchema,
    update_scratchpad: UpdateScratchpadSchema,
    update_todo: UpdateTodoSchema,
    finish_stage: FinishStageSchema,
};

/**
 * Extracts actions from directive text without executing anything.
 *
 * Narration outside `<action>` blocks is ignored, as are blocks of an unknown
 * type. A block that fails validation is reported in `errors` and parsing moves
 * on to the next block.
 */
export class ActionParser {
    constructor(private readonly logger: Logger) {}

    parse(text: string): ParseResult {
        const actions: Action[] = [];
        const errors: string[] = [];
        let foundActionAttempt = false;

        for (const [, kind = '', body = ''] of text.matchAll(ACTION_BLOCK)) {
            if (!isActionType(kind)) {
                this.logger.warn(`Ignoring unknown action type: ${kind}`);
                continue;
            }
            foundActionAttempt = true;

            const result = ACTION_SCHEMAS[kind].safeParse(Object.fromEntries(extractFields(body)));
            if (result.success) {
                actions.push(result.data);
            } else {
                const reason = result.error.issues.map((issue) => issue.message).join('; ');
                const error = `Failed to parse ${kind} action: ${reason}`;
                this.logger.warn(error);
                errors.push(error);
            }
        }

        this.logger.debug(`Parsed ${actions.length} action(s) with ${errors.length} error(s)`, {
            foundActionAttempt,
        });
        return { actions, errors, foundActionAttempt };
    }
}
