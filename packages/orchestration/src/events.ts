import { EventEmitter } from 'node:events';
import type { StageName } from './stages.js';
import type { ExecutionResult, RunResult, Turn } from './types.js';

export interface ConductorEventMap {
    'run:started': { runId: string; title: string; maxTurns: number };
    'turn:completed': { runId: string; turn: Turn; result: ExecutionResult };
    'run:finished': { runId: string; result: RunResult };
    'stage:started': { stage: StageName; query: string };
    'stage:finished': { stage: StageName; result: RunResult };
}

export type ConductorEventName = keyof ConductorEventMap;

type Listener<K extends ConductorEventName> = (payload: ConductorEventMap[K]) => void;

/**
 * Typed event bus for conductor runs and workflow stages.
 * Wraps an EventEmitter instead of extending it, so only the mapped events exist.
 */
export class ConductorEventBus {
    private readonly emitter = new EventEmitter();

    emit<K extends ConductorEventName>(event: K, payload: ConductorEventMap[K]): boolean {
        return this.emitter.emit(event, payload);
    }

    /**
     * Subscribe to an event. Returns the matching unsubscribe function.
     */
    on<K extends ConductorEventName>(
        event: K,
        listener: Listener<K>,
        options: { signal?: AbortSignal } = {}
    ): () => void {
        const { signal } = options;
        if (signal?.aborted) {
            return () => {};
        }

        this.emitter.on(event, listener);
        const unsubscribe = () => {
            this.emitter.off(event, listener);
            signal?.removeEventListener('abort', unsubscribe);
        };
        signal?.addEventListener('abort', unsubscribe, { once: true });
        return unsubscribe;
    }

    once<K extends ConductorEventName>(event: K, listener: Listener<K>): () => void {
        this.emitter.once(event, listener);
        return () => {
            this.emitter.off(event, listener);
        };
    }

    listenerCount(event: ConductorEventName): number {
        return this.emitter.listenerCount(event);
    }
}
