import { BatonRuntimeError, LogComponent, errorMessage } from '@baton/core';
import type { AgentEntry, Logger } from '@baton/core';
import { untilAborted } from '../abort.js';
import { ProtocolClient, DEFAULT_ACCEPTED_OUTPUT_MODES } from '../client.js';
import { TaskStateTracker } from '../task-tracker.js';
import { HttpJsonRpcTransport } from '../transport.js';
import type { JsonRpcTransport } from '../transport.js';
import { RegistryError } from './errors.js';
import { AgentDescriptorSchema } from './schemas.js';
import type { AgentDescriptor, AgentDescriptorInput } from './schemas.js';

const DESCRIPTOR_FILE = 'get-info.json';
const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export interface RegisteredAgent {
    readonly alias: string;
    readonly descriptor: AgentDescriptor;
    readonly client: ProtocolClient;
}

export interface RegisterOptions {
    authToken?: string;
}

export interface DiscoverOptions extends RegisterOptions {
    /** Endpoint to use instead of the descriptor's `url` */
    url?: string;
}

export type TransportFactory = (
    descriptor: AgentDescriptor,
    options: RegisterOptions
) => JsonRpcTransport;

export interface AgentRegistryOptions {
    logger: Logger;
    /** Shared by every client the registry creates */
    tracker?: TaskStateTracker;
    requestTimeoutMs?: number;
    acceptedOutputModes?: string[];
    createTransport?: TransportFactory;
    /** Used for descriptor discovery. Defaults to the global fetch */
    fetch?: typeof fetch;
}

/**
 * Where to fetch a descriptor: URLs without a `.json` path get `/get-info.json`
 */
export function descriptorLocation(url: string): string {
    const parsed = new URL(url);
    if (parsed.pathname.endsWith('.json')) {
        return url;
    }
    return `${url.replace(/\/+$/, '')}/${DESCRIPTOR_FILE}`;
}

/**
 * Maps operator-assigned aliases to agent descriptors and protocol clients.
 * Every client records into `tracker` under its alias; the conductor clears it per run.
 */
export class AgentRegistry {
    readonly tracker: TaskStateTracker;
    private readonly agents = new Map<string, RegisteredAgent>();
    private readonly logger: Logger;
    private readonly protocolLogger: Logger;
    private readonly requestTimeoutMs: number;
    private readonly acceptedOutputModes: string[];
    private readonly createTransport: TransportFactory;
    private readonly fetchImpl: typeof fetch;

    constructor(options: AgentRegistryOptions) {
        this.logger = options.logger.createChild(LogComponent.REGISTRY);
        this.protocolLogger = options.logger.createChild(LogComponent.PROTOCOL);
        this.tracker = options.tracker ?? new TaskStateTracker();
        this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
        this.acceptedOutputModes = options.acceptedOutputModes ?? DEFAULT_ACCEPTED_OUTPUT_MODES;
        this.fetchImpl = options.fetch ?? fetch;
        this.createTransport =
            options.createTransport ??
            ((descriptor, { authToken }) =>
                new HttpJsonRpcTransport({
                    url: descriptor.url,
                    timeoutMs: this.requestTimeoutMs,
                    logger: this.protocolLogger,
                    ...(authToken !== undefined && { authToken }),
                }));
    }

    get size(): number {
        return this.agents.size;
    }

    register(
        alias: string,
        descriptor: AgentDescriptorInput,
        options: RegisterOptions = {}
    ): RegisteredAgent {
        if (this.agents.has(alias)) {
            throw RegistryError.duplicateAlias(alias);
        }

        const parsed = AgentDescriptorSchema.safeParse(descriptor);
        if (!parsed.success) {
            throw RegistryError.invalidDescriptor(
                alias,
                'registration',
                parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
            );
        }

        const transport = this.createTransport(parsed.data, options);
        const client = new ProtocolClient(transport, this.tracker, this.protocolLogger, {
            acceptedOutputModes: this.acceptedOutputModes,
            source: alias,
        });
        const agent: RegisteredAgent = { alias, descriptor: parsed.data, client };
        this.agents.set(alias, agent);

        this.logger.info(`Registered agent '${alias}': ${parsed.data.name}`, {
            url: parsed.data.url,
            skills: parsed.data.skills.map((s) => s.name),
        });
        return agent;
    }

    /**
     * Fetch an agent's descriptor and register it
     */
    async discover(
        alias: string,
        descriptorUrl: string,
        options: DiscoverOptions = {}
    ): Promise<RegisteredAgent> {
        const location = descriptorLocation(descriptorUrl);
        this.logger.info(`Fetching agent descriptor for '${alias}' from ${location}`);

        const headers: Record<string, string> = { Accept: 'application/json' };
        if (options.authToken) {
            headers.Authorization = `Bearer ${options.authToken}`;
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);
        let text: string;
        try {
            const response = await this.fetchImpl(location, {
                method: 'GET',
                headers,
                signal: controller.signal,
            });
            if (!response.ok) {
                throw RegistryError.discoveryFailed(
                    alias,
                    location,
                    `HTTP ${response.status}: ${response.statusText}`
                );
            }
            text = await untilAborted(response.text(), controller.signal);
        } catch (error) {
            if (error instanceof BatonRuntimeError) {
                throw error;
            }
            const cause = controller.signal.aborted
                ? `timed out after ${this.requestTimeoutMs}ms`
                : errorMessage(error);
            this.logger.error(`Failed to discover agent '${alias}'`, { location, cause });
            throw RegistryError.discoveryFailed(alias, location, cause);
        } finally {
            clearTimeout(timeoutId);
        }

        let body: unknown;
        try {
            body = JSON.parse(text);
        } catch (error) {
            throw RegistryError.invalidDescriptor(
                alias,
                location,
                `not valid JSON: ${errorMessage(error)}`
            );
        }

        const parsed = AgentDescriptorSchema.safeParse(body);
        if (!parsed.success) {
            throw RegistryError.invalidDescriptor(
                alias,
                location,
                parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
            );
        }

        const descriptor =
            options.url !== undefined ? { ...parsed.data, url: options.url } : parsed.data;
        return this.register(alias, descriptor, options);
    }

    /**
     * Register every configured agent, in order
     */
    async loadFromConfig(entries: readonly AgentEntry[]): Promise<RegisteredAgent[]> {
        const registered: RegisteredAgent[] = [];
        for (const entry of entries) {
            const auth: RegisterOptions =
                entry.authToken !== undefined ? { authToken: entry.authToken } : {};
            if (entry.descriptorUrl !== undefined) {
                registered.push(
                    await this.discover(entry.alias, entry.descriptorUrl, {
                        ...auth,
                        ...(entry.url !== undefined && { url: entry.url }),
                    })
                );
            } else if (entry.url !== undefined) {
                registered.push(
                    this.register(
                        entry.alias,
                        {
                            id: entry.alias,
                            name: entry.name ?? entry.alias,
                            url: entry.url,
                            skills: entry.skills,
                            ...(entry.description !== undefined && {
                                description: entry.description,
                            }),
                        },
                        auth
                    )
                );
            }
        }
        return registered;
    }

    resolve(alias: string): RegisteredAgent | undefined {
        return this.agents.get(alias);
    }

    /**
     * @throws {BatonRuntimeError} AGENT_NOT_FOUND for an unknown alias
     */
    require(alias: string): RegisteredAgent {
        const agent = this.agents.get(alias);
        if (!agent) {
            throw RegistryError.agentNotFound(alias, [...this.agents.keys()]);
        }
        return agent;
    }

    list(): RegisteredAgent[] {
        return [...this.agents.values()];
    }

    bySkill(skillName: string): RegisteredAgent[] {
        return this.list().filter((agent) =>
            agent.descriptor.skills.some((skill) => skill.name === skillName)
        );
    }

    /**
     * Markdown agent list for the conductor's system prompt
     */
    toPrompt(): string {
        if (this.agents.size === 0) {
            return '(No agents available)';
        }

        const lines: string[] = [];
        for (const { alias, descriptor } of this.agents.values()) {
            lines.push(`### ${descriptor.name} (\`${alias}\`)`);
            lines.push(`**Description**: ${descriptor.description ?? 'No description'}`);
            if (descriptor.skills.length > 0) {
                lines.push('**Skills**:');
                for (const skill of descriptor.skills) {
                    lines.push(
                        skill.description
                            ? `- ${skill.name}: ${skill.description}`
                            : `- ${skill.name}`
                    );
                }
            }
            lines.push('');
        }
        return lines.join('\n').trimEnd();
    }

    view(): string {
        if (this.agents.size === 0) {
            return 'No agents registered.';
        }

        const lines = ['Available Agents:'];
        for (const { alias, descriptor } of this.agents.values()) {
            lines.push(`  [${alias}] ${descriptor.name}`);
            lines.push(`      Description: ${descriptor.description ?? 'N/A'}`);
            lines.push(`      URL: ${descriptor.url}`);
            lines.push(
                `      Skills: ${descriptor.skills.map((s) => s.name).join(', ') || 'none'}`
            );
            lines.push(`      Trust Level: ${descriptor.agentTrust}`);
        }
        return lines.join('\n');
    }
}
