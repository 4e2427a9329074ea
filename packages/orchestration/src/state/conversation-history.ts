import { describeAction } from '../actions/types.js';
import type { AgentTrajectoryEntry, FrozenTrajectories, Turn } from '../types.js';

export const DEFAULT_HISTORY_MAX_TURNS = 100;

const MAX_DIRECTIVE_CHARS = 2000;
const MAX_RESPONSE_CHARS = 1000;

export type TurnRecord = Omit<Turn, 'number'>;

function truncate(text: string, max: number): string {
    if (text.length <= max) {
        return text;
    }
    return `${text.slice(0, max)}... [truncated ${text.length - max} chars]`;
}

function freezeTrajectories(trajectories: FrozenTrajectories): FrozenTrajectories {
    const frozen: Record<string, readonly Readonly<AgentTrajectoryEntry>[]> = {};
    for (const [agentId, entries] of Object.entries(trajectories)) {
        frozen[agentId] = Object.freeze(entries.map((entry) => Object.freeze({ ...entry })));
    }
    return Object.freeze(frozen);
}

export function formatTurn(turn: Turn): string {
    const actions =
        turn.actionsExecuted.length > 0 ? turn.actionsExecuted.map(describeAction).join(', ') : 'none';
    const responses = turn.responses.map((response) => truncate(response, MAX_RESPONSE_CHARS));
    return [
        `Directive:\n${truncate(turn.directiveText, MAX_DIRECTIVE_CHARS)}`,
        `Actions: ${actions}`,
        `Responses:\n${responses.join('\n')}`,
    ].join('\n\n');
}

/**
 * Append-only record of the turns of one run.
 *
 * Only the most recent `maxTurns` turns are kept. Turn numbers keep counting
 * from the start of the run, so a dropped turn leaves a visible gap.
 */
export class ConversationHistory {
    private entries: Turn[] = [];
    private turnCount = 0;

    constructor(private readonly maxTurns: number = DEFAULT_HISTORY_MAX_TURNS) {}

    append(record: TurnRecord): Turn {
        this.turnCount += 1;
        const turn: Turn = Object.freeze({
            ...record,
            number: this.turnCount,
            actionsExecuted: Object.freeze([...record.actionsExecuted]),
            responses: Object.freeze([...record.responses]),
            agentTrajectories: freezeTrajectories(record.agentTrajectories),
        });
        this.entries.push(turn);
        if (this.entries.length > this.maxTurns) {
            this.entries = this.entries.slice(-this.maxTurns);
        }
        return turn;
    }

    turns(): readonly Turn[] {
        return [...this.entries];
    }

    get size(): number {
        return this.entries.length;
    }

    /** Turns appended over the whole run, dropped ones included */
    get totalTurns(): number {
        return this.turnCount;
    }

    toPrompt(maxRecent?: number): string {
        if (this.entries.length === 0) {
            return 'No previous interactions.';
        }
        const selected =
            maxRecent !== undefined ? this.entries.slice(-Math.max(maxRecent, 1)) : this.entries;
        return selected.map((turn) => `--- Turn ${turn.number} ---\n${formatTurn(turn)}`).join('\n\n');
    }
}
