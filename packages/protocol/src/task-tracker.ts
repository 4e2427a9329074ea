import { isTerminalState } from './types.js';
import type { ContextSummary, Task } from './types.js';

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/** Source used when the caller does not scope its tasks */
export const DEFAULT_TASK_SOURCE = '';

interface TrackedTask {
    source: string;
    task: Task;
}

function trackingKey(source: string, taskId: string): string {
    return JSON.stringify([source, taskId]);
}

/**
 * In-memory index of every task observed during a run.
 *
 * Task ids are only unique per agent, so records are keyed by source (the agent
 * that issued the task) and task id, and grouped by context across sources.
 * A terminal record is deep-frozen and retained as-is: later observations of the
 * same task return the stored record. Tasks are only dropped by `reset()`.
 */
export class TaskStateTracker {
    private readonly tasks = new Map<string, TrackedTask>();
    private readonly contexts = new Map<string, string[]>();

    /**
     * Record a task and return the record now held for it
     */
    observe(task: Task, source: string = DEFAULT_TASK_SOURCE): Task {
        const key = trackingKey(source, task.id);
        const existing = this.tasks.get(key)?.task;
        if (existing && isTerminalState(existing.state)) {
            return existing;
        }

        // Agents do not always echo references on later polls
        const merged: Task =
            existing && task.referenceTaskIds.length === 0 && existing.referenceTaskIds.length > 0
                ? { ...task, referenceTaskIds: existing.referenceTaskIds }
                : task;

        const record = isTerminalState(merged.state) ? deepFreeze(merged) : merged;
        this.tasks.set(key, { source, task: record });

        const contextId = existing?.contextId ?? record.contextId;
        const keys = this.contexts.get(contextId) ?? [];
        if (!keys.includes(key)) {
            keys.push(key);
            this.contexts.set(contextId, keys);
        }

        return record;
    }

    get(taskId: string, source: string = DEFAULT_TASK_SOURCE): Task | undefined {
        return this.tasks.get(trackingKey(source, taskId))?.task;
    }

    get size(): number {
        return this.tasks.size;
    }

    /** Every tracked task, or only those one source issued */
    all(source?: string): Task[] {
        return [...this.tasks.values()]
            .filter((entry) => source === undefined || entry.source === source)
            .map((entry) => entry.task);
    }

    byContext(contextId: string, source?: string): Task[] {
        const keys = this.contexts.get(contextId) ?? [];
        return keys.flatMap((key) => {
            const entry = this.tasks.get(key);
            return entry && (source === undefined || entry.source === source) ? [entry.task] : [];
        });
    }

    /** Non-terminal tasks, paused ones included */
    active(): Task[] {
        return this.all().filter((task) => !isTerminalState(task.state));
    }

    terminal(): Task[] {
        return this.all().filter((task) => isTerminalState(task.state));
    }

    completed(): Task[] {
        return this.all().filter((task) => task.state === 'completed');
    }

    failed(): Task[] {
        return this.all().filter((task) => task.state === 'failed');
    }

    contextSummary(contextId: string): ContextSummary {
        const summary: ContextSummary = {
            submitted: 0,
            working: 0,
            'input-required': 0,
            'auth-required': 0,
            completed: 0,
            failed: 0,
            canceled: 0,
            rejected: 0,
            total: 0,
        };
        for (const task of this.byContext(contextId)) {
            summary[task.state] += 1;
            summary.total += 1;
        }
        return summary;
    }

    /** True when the context has tasks and all of them are terminal */
    isContextComplete(contextId: string): boolean {
        const tasks = this.byContext(contextId);
        return tasks.length > 0 && tasks.every((task) => isTerminalState(task.state));
    }

    reset(): void {
        this.tasks.clear();
        this.contexts.clear();
    }

    /**
     * Operator-facing dump of tracked tasks grouped by context
     */
    view(): string {
        if (this.tasks.size === 0) {
            return 'No tasks tracked.';
        }

        const lines = [
            `Tracked tasks: ${this.tasks.size} (active ${this.active().length}, terminal ${this.terminal().length})`,
        ];
        for (const [contextId, keys] of this.contexts) {
            lines.push(`Context ${contextId}:`);
            for (const key of keys) {
                const entry = this.tasks.get(key);
                if (!entry) continue;
                const { source, task } = entry;
                const from = source !== DEFAULT_TASK_SOURCE ? ` from ${source}` : '';
                const error = task.error ? ` - ${task.error}` : '';
                lines.push(`  ${task.id} [${task.state}]${from}${error}`);
            }
        }
        return lines.join('\n');
    }
}
