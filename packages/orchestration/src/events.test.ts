import { describe, it, expect, vi } from 'vitest';
import { ConductorEventBus } from './events.js';

describe('ConductorEventBus', () => {
    it('should deliver payloads to subscribers', () => {
        const bus = new ConductorEventBus();
        const listener = vi.fn();
        bus.on('stage:started', listener);

        bus.emit('stage:started', { stage: 'research', query: 'Q' });

        expect(listener).toHaveBeenCalledWith({ stage: 'research', query: 'Q' });
    });

    it('should stop delivering after unsubscribe', () => {
        const bus = new ConductorEventBus();
        const listener = vi.fn();
        const unsubscribe = bus.on('stage:started', listener);

        unsubscribe();
        bus.emit('stage:started', { stage: 'plan', query: 'Q' });

        expect(listener).not.toHaveBeenCalled();
        expect(bus.listenerCount('stage:started')).toBe(0);
    });

    it('should unsubscribe when the signal aborts', () => {
        const bus = new ConductorEventBus();
        const controller = new AbortController();
        const listener = vi.fn();
        bus.on('run:started', listener, { signal: controller.signal });

        controller.abort();
        bus.emit('run:started', { runId: 'r', title: 'T', maxTurns: 1 });

        expect(listener).not.toHaveBeenCalled();
    });

    it('should skip subscriptions on an aborted signal', () => {
        const bus = new ConductorEventBus();
        const controller = new AbortController();
        controller.abort();

        bus.on('run:started', vi.fn(), { signal: controller.signal });

        expect(bus.listenerCount('run:started')).toBe(0);
    });

    it('should deliver once-listeners a single time', () => {
        const bus = new ConductorEventBus();
        const listener = vi.fn();
        bus.once('stage:started', listener);

        bus.emit('stage:started', { stage: 'plan', query: 'a' });
        bus.emit('stage:started', { stage: 'plan', query: 'b' });

        expect(listener).toHaveBeenCalledTimes(1);
    });
});
