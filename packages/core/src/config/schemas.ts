/**
 * Baton configuration schemas
 *
 * String values accept `$VAR` / `${VAR}` references, expanded during validation.
 */

import { z } from 'zod';
import { EnvExpandedString, NonEmptyTrimmed } from '../utils/env.js';
import { LoggerConfigSchema } from '../logger/schemas.js';

export const LLM_PROVIDERS = ['anthropic', 'openai', 'openrouter'] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

const ExpandedUrl = EnvExpandedString().pipe(z.string().url('Must be a valid URL'));

export const RetryConfigSchema = z
    .object({
        maxAttempts: z.coerce
            .number()
            .int()
            .positive()
            .default(10)
            .describe('Total attempts including the first call'),
        baseDelayMs: z.coerce
            .number()
            .int()
            .nonnegative()
            .default(1000)
            .describe('Delay before the first retry; doubles each attempt'),
        maxDelayMs: z.coerce
            .number()
            .int()
            .positive()
            .default(60_000)
            .describe('Upper bound for a single delay'),
    })
    .strict();

export type RetryConfig = z.output<typeof RetryConfigSchema>;

export const LlmConfigSchema = z
    .object({
        provider: z.enum(LLM_PROVIDERS).describe("Directive model provider (e.g., 'anthropic')"),
        model: NonEmptyTrimmed.describe('Model name for the selected provider'),
        apiKey: EnvExpandedString()
            .pipe(z.string().min(1, 'API key is required; give it directly or as $ENV reference'))
            .describe('API key for provider'),
        baseURL: ExpandedUrl.optional().describe('Override the provider base URL'),
        temperature: z.coerce.number().min(0).max(2).default(0),
        maxOutputTokens: z.coerce.number().int().positive().default(4096),
        retry: RetryConfigSchema.default({}),
    })
    .strict()
    .describe('Directive generation model');

export type LlmConfig = z.output<typeof LlmConfigSchema>;

const SkillSchema = z
    .object({
        name: NonEmptyTrimmed,
        description: z.string().optional(),
    })
    .strict();

export const AgentEntrySchema = z
    .object({
        alias: z
            .string()
            .regex(
                /^[A-Za-z0-9][A-Za-z0-9._-]*$/,
                'Alias may contain letters, digits, dot, dash and underscore'
            )
            .describe('Operator-assigned name the conductor uses in query_agent actions'),
        url: ExpandedUrl.optional().describe('JSON-RPC endpoint of the agent'),
        descriptorUrl: ExpandedUrl.optional().describe('Where to fetch the agent descriptor'),
        authToken: EnvExpandedString().optional().describe('Bearer token for this agent'),
        name: z.string().optional(),
        description: z.string().optional(),
        skills: z.array(SkillSchema).default([]),
    })
    .strict()
    .superRefine((agent, ctx) => {
        if (!agent.url && !agent.descriptorUrl) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Agent '${agent.alias}' needs either url or descriptorUrl`,
                path: ['url'],
            });
        }
    });

export type AgentEntry = z.output<typeof AgentEntrySchema>;

export const ProtocolConfigSchema = z
    .object({
        requestTimeoutMs: z.coerce.number().int().positive().default(60_000),
        pollIntervalMs: z.coerce.number().int().positive().default(2_000),
        maxWaitMs: z.coerce.number().int().positive().default(120_000),
        acceptedOutputModes: z.array(z.string().min(1)).min(1).default(['application/json']),
    })
    .strict()
    .describe('Remote task polling and request limits');

export type ProtocolConfig = z.output<typeof ProtocolConfigSchema>;

export const ConductorConfigSchema = z
    .object({
        maxTurns: z.coerce.number().int().positive().default(20),
        stallThreshold: z.coerce
            .number()
            .int()
            .positive()
            .default(3)
            .describe('Consecutive turns without any action attempt before the run stalls'),
        maxHistoryTurns: z.coerce.number().int().positive().default(100),
        scratchpadMaxItems: z.coerce.number().int().positive().default(50),
        todoMaxItems: z.coerce.number().int().positive().default(100),
    })
    .strict();

export type ConductorConfig = z.output<typeof ConductorConfigSchema>;

export const BatonConfigSchema = z
    .object({
        llm: LlmConfigSchema,
        agents: z
            .array(AgentEntrySchema)
            .default([])
            .superRefine((agents, ctx) => {
                const seen = new Set<string>();
                agents.forEach((agent, index) => {
                    if (seen.has(agent.alias)) {
                        ctx.addIssue({
                            code: z.ZodIssueCode.custom,
                            message: `Duplicate agent alias '${agent.alias}'`,
                            path: [index, 'alias'],
                        });
                    }
                    seen.add(agent.alias);
                });
            }),
        protocol: ProtocolConfigSchema.default({}),
        conductor: ConductorConfigSchema.default({}),
        logger: LoggerConfigSchema.default({}),
    })
    .strict();

export type BatonConfig = z.output<typeof BatonConfigSchema>;
export type BatonConfigInput = z.input<typeof BatonConfigSchema>;
