/**
 * Logger configuration schemas (the `logger` section of a run config)
 */

import { z } from 'zod';
import { EnvExpandedString } from '../utils/env.js';

const MEGABYTE = 1024 * 1024;

const SilentTransportSchema = z
    .object({ type: z.literal('silent') })
    .strict()
    .describe('Drops every entry; useful for tests and embedding');

const ConsoleTransportSchema = z
    .object({
        type: z.literal('console'),
        colorize: z.boolean().default(true).describe('Color levels and components with chalk'),
    })
    .strict()
    .describe('Human-readable output; errors and warnings go to stderr');

const FileTransportSchema = z
    .object({
        type: z.literal('file'),
        path: EnvExpandedString()
            .pipe(z.string().min(1, 'Log file path is required'))
            .describe('JSON-lines log file; accepts $VAR references'),
        maxSize: z.coerce
            .number()
            .positive()
            .default(10 * MEGABYTE)
            .describe('Rotate once the file reaches this many bytes'),
        maxFiles: z.coerce
            .number()
            .int()
            .positive()
            .default(5)
            .describe('Rotated files to keep next to the active one'),
    })
    .strict();

export const LoggerTransportSchema = z.discriminatedUnion('type', [
    SilentTransportSchema,
    ConsoleTransportSchema,
    FileTransportSchema,
]);

export type LoggerTransportConfig = z.output<typeof LoggerTransportSchema>;

export const LoggerConfigSchema = z
    .object({
        level: z.enum(['error', 'warn', 'info', 'debug', 'silly']).default('info'),
        transports: z
            .array(LoggerTransportSchema)
            .min(1, 'Configure at least one transport, or a silent one')
            .default([{ type: 'console', colorize: true }]),
    })
    .strict()
    .describe('Run logging; BATON_LOG_LEVEL overrides the level');

export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type LoggerConfigInput = z.input<typeof LoggerConfigSchema>;
