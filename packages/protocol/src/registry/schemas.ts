import { z } from 'zod';

export const AGENT_TRUST_LEVELS = ['low', 'medium', 'high'] as const;
export type AgentTrust = (typeof AGENT_TRUST_LEVELS)[number];

export const AgentSkillSchema = z.object({
    id: z.string().optional(),
    name: z.string().min(1),
    description: z.string().optional(),
});

/**
 * Agent descriptor as served at `<agent>/get-info.json`.
 * Unknown fields are kept so operator views can show them.
 */
export const AgentDescriptorSchema = z
    .object({
        id: z.string().min(1),
        name: z.string().min(1),
        description: z.string().optional(),
        url: z.string().url(),
        version: z.string().optional(),
        protocolVersion: z.string().optional(),
        skills: z.array(AgentSkillSchema).default([]),
        capabilities: z.record(z.unknown()).optional(),
        agentTrust: z.enum(AGENT_TRUST_LEVELS).default('medium'),
    })
    .passthrough();

export type AgentSkill = z.output<typeof AgentSkillSchema>;
export type AgentDescriptor = z.output<typeof AgentDescriptorSchema>;
export type AgentDescriptorInput = z.input<typeof AgentDescriptorSchema>;
