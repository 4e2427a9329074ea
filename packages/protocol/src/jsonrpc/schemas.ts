import { z } from 'zod';

const JsonRpcIdSchema = z.union([z.string(), z.number(), z.null()]);

export const JsonRpcErrorSchema = z.object({
    code: z.number().int(),
    message: z.string(),
    data: z.unknown().optional(),
});

export const JsonRpcErrorResponseSchema = z.object({
    jsonrpc: z.literal('2.0'),
    id: JsonRpcIdSchema,
    error: JsonRpcErrorSchema,
});

export const JsonRpcSuccessResponseSchema = z
    .object({
        jsonrpc: z.literal('2.0'),
        id: JsonRpcIdSchema,
        result: z.unknown(),
    })
    .refine((response) => response.result !== undefined, {
        message: 'Response carries neither result nor error',
        path: ['result'],
    });

export const JsonRpcResponseSchema = z.union([
    JsonRpcErrorResponseSchema,
    JsonRpcSuccessResponseSchema,
]);
