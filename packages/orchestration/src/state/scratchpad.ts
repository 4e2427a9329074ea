export const DEFAULT_SCRATCHPAD_MAX_ITEMS = 50;

/**
 * Working notes for one run. Entries form a single document, oldest first;
 * past `maxItems` the oldest entries are dropped.
 */
export class Scratchpad {
    private items: string[] = [];

    constructor(private readonly maxItems: number = DEFAULT_SCRATCHPAD_MAX_ITEMS) {}

    /**
     * Add an entry. Blank text is ignored.
     * @returns whether an entry was added
     */
    append(text: string): boolean {
        const entry = text.trim();
        if (!entry) {
            return false;
        }
        this.items.push(entry);
        if (this.items.length > this.maxItems) {
            this.items = this.items.slice(-this.maxItems);
        }
        return true;
    }

    replace(text: string): void {
        this.items = [];
        this.append(text);
    }

    clear(): void {
        this.items = [];
    }

    remove(index: number): boolean {
        if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
            return false;
        }
        this.items.splice(index, 1);
        return true;
    }

    entries(): readonly string[] {
        return [...this.items];
    }

    get size(): number {
        return this.items.length;
    }

    isEmpty(): boolean {
        return this.items.length === 0;
    }

    get(): string {
        return this.items.join('\n');
    }

    toPrompt(): string {
        return `## Scratchpad\n${this.isEmpty() ? '(empty)' : this.get()}`;
    }
}
