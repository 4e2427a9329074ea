import type { DirectiveGenerator, DirectiveRequest } from '../directive/types.js';

export type DirectiveScript = readonly string[] | ((request: DirectiveRequest, call: number) => string);

/**
 * Directive generator that replays a script. With a list, the last entry
 * repeats once the list runs out.
 */
export class ScriptedGenerator implements DirectiveGenerator {
    readonly requests: DirectiveRequest[] = [];

    constructor(private readonly script: DirectiveScript) {}

    async generate(request: DirectiveRequest): Promise<string> {
        const call = this.requests.length;
        this.requests.push(request);
        if (typeof this.script === 'function') {
            return this.script(request, call);
        }
        return this.script[Math.min(call, this.script.length - 1)] ?? '';
    }
}
