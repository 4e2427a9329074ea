export interface DirectiveRequest {
    /** System prompt, already carrying the agent list */
    system: string;
    /** Per-turn prompt with stage query, state and history */
    prompt: string;
}

/**
 * Produces the conductor's next directive: free text with embedded action blocks
 */
export interface DirectiveGenerator {
    generate(request: DirectiveRequest): Promise<string>;
}
