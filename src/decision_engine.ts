/**
 * Decision Engine — skip or rebuild?
 *
 * Pure: every input is observed by the caller beforehand. Rules are checked
 * in table order and the first match wins.
 */

import type { PriorState } from './state_store';

export const Outcome = {
    NO_PRIOR_STATE: 'NO_PRIOR_STATE',
    STATE_UNREADABLE: 'STATE_UNREADABLE',
    INPUT_CHANGED: 'INPUT_CHANGED',
    OUTPUT_MISSING_OR_TAMPERED: 'OUTPUT_MISSING_OR_TAMPERED',
    UP_TO_DATE: 'UP_TO_DATE',
} as const;

export type Outcome = (typeof Outcome)[keyof typeof Outcome];

export interface DecisionInput {
    currentInputSignature: string;
    artifactExists: boolean;
    /** null when the artifact is missing and could not be hashed */
    currentOutputHash: string | null;
    prior: PriorState;
}

export interface Decision {
    outcome: Outcome;
    rebuild: boolean;
    /** position of the rule that fired, 1-based */
    rule: number;
}

interface Rule {
    outcome: Outcome;
    when: (input: DecisionInput) => boolean;
}

const RULES: readonly Rule[] = [
    { outcome: Outcome.NO_PRIOR_STATE, when: (i) => i.prior.kind === 'absent' },
    { outcome: Outcome.STATE_UNREADABLE, when: (i) => i.prior.kind === 'unreadable' },
    {
        outcome: Outcome.INPUT_CHANGED,
        when: (i) => i.prior.kind === 'present' && i.prior.record.inputSignatureHash !== i.currentInputSignature,
    },
    {
        outcome: Outcome.OUTPUT_MISSING_OR_TAMPERED,
        when: (i) =>
            !i.artifactExists ||
            i.currentOutputHash === null ||
            (i.prior.kind === 'present' && i.prior.record.outputSignatureHash !== i.currentOutputHash),
    },
];

const DESCRIPTIONS: Record<Outcome, string> = {
    NO_PRIOR_STATE: 'no prior state recorded',
    STATE_UNREADABLE: 'prior state unreadable',
    INPUT_CHANGED: 'input signature changed',
    OUTPUT_MISSING_OR_TAMPERED: 'artifact missing or modified since last build',
    UP_TO_DATE: 'input and artifact unchanged',
};

export function requiresRebuild(outcome: Outcome): boolean {
    return outcome !== Outcome.UP_TO_DATE;
}

export function describeOutcome(outcome: Outcome): string {
    return DESCRIPTIONS[outcome];
}

export function explainDecision(input: DecisionInput): Decision {
    for (let i = 0; i < RULES.length; i++) {
        if (RULES[i].when(input)) {
            return { outcome: RULES[i].outcome, rebuild: true, rule: i + 1 };
        }
    }
    return { outcome: Outcome.UP_TO_DATE, rebuild: false, rule: RULES.length + 1 };
}

export function decide(input: DecisionInput): Outcome {
    return explainDecision(input).outcome;
}
