export const DEFAULT_TODO_MAX_ITEMS = 100;

export interface TodoItem {
    text: string;
    completed: boolean;
}

/**
 * Ordered task list for one run, addressed by zero-based index.
 * Past `maxItems`, completed items are pruned first, then the oldest.
 */
export class TodoList {
    private items: TodoItem[] = [];

    constructor(private readonly maxItems: number = DEFAULT_TODO_MAX_ITEMS) {}

    add(text: string): boolean {
        const entry = text.trim();
        if (!entry) {
            return false;
        }
        this.items.push({ text: entry, completed: false });
        if (this.items.length > this.maxItems) {
            this.prune();
        }
        return true;
    }

    complete(index: number): boolean {
        return this.setCompleted(index, true);
    }

    uncomplete(index: number): boolean {
        return this.setCompleted(index, false);
    }

    remove(index: number): boolean {
        if (!this.has(index)) {
            return false;
        }
        this.items.splice(index, 1);
        return true;
    }

    /** @returns number of items removed */
    clearCompleted(): number {
        const before = this.items.length;
        this.items = this.items.filter((item) => !item.completed);
        return before - this.items.length;
    }

    clear(): void {
        this.items = [];
    }

    has(index: number): boolean {
        return Number.isInteger(index) && index >= 0 && index < this.items.length;
    }

    /** Copies, safe to hand out */
    list(): TodoItem[] {
        return this.items.map((item) => ({ ...item }));
    }

    get size(): number {
        return this.items.length;
    }

    get pendingCount(): number {
        return this.items.filter((item) => !item.completed).length;
    }

    get completedCount(): number {
        return this.items.length - this.pendingCount;
    }

    isEmpty(): boolean {
        return this.items.length === 0;
    }

    toPrompt(): string {
        const body = this.isEmpty()
            ? '(no items)'
            : this.items
                  .map((item, i) => `${i}. [${item.completed ? 'x' : ' '}] ${item.text}`)
                  .join('\n');
        return `## Todo List (${this.pendingCount}/${this.size} pending)\n${body}`;
    }

    private setCompleted(index: number, completed: boolean): boolean {
        const item = this.has(index) ? this.items[index] : undefined;
        if (!item) {
            return false;
        }
        item.completed = completed;
        return true;
    }

    private prune(): void {
        if (this.items.some((item) => item.completed)) {
            this.items = this.items.filter((item) => !item.completed);
        }
        if (this.items.length > this.maxItems) {
            this.items = this.items.slice(-this.maxItems);
        }
    }
}
