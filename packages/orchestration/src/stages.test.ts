import { describe, it, expect } from 'vitest';
import { STAGES, isStageName } from './stages.js';

describe('stages', () => {
    it('should ask the research stage the question as is', () => {
        expect(STAGES.research.buildQuery({ question: 'Q' })).toBe('Q');
    });

    it('should build the plan query from what is available', () => {
        expect(STAGES.plan.buildQuery({ question: 'Q' })).toBe(
            'Q\n\nPlease create or update the implementation plan.'
        );
        expect(
            STAGES.plan.buildQuery({ question: 'Q', researchOutput: 'R', plan: 'P' })
        ).toBe(
            'Q\n\nResearch Findings:\nR\n\nExisting Plan:\nP\n\nPlease create or update the implementation plan.'
        );
    });

    it('should require a plan to implement', () => {
        expect(STAGES.implement.buildQuery({ question: 'Q', plan: 'P' })).toBe(
            'Execute the following plan:\n\nP'
        );
        expect(() => STAGES.implement.buildQuery({ question: 'Q' })).toThrow(
            'The implement stage needs a plan, but none was given or produced'
        );
    });

    it('should keep agents out of planning only', () => {
        expect(STAGES.research.usesAgents).toBe(true);
        expect(STAGES.plan.usesAgents).toBe(false);
        expect(STAGES.implement.usesAgents).toBe(true);
    });

    it('should recognise stage names', () => {
        expect(isStageName('plan')).toBe(true);
        expect(isStageName('deploy')).toBe(false);
    });
});
