/**
 * Change Coordinator Transition Table
 *
 * (state, input) -> outputs, next state. Pure data: the coordinator looks
 * cells up here and performs the listed outputs itself.
 *
 * IDLE never has an attempt outstanding, so an outcome arriving there is a
 * protocol violation and must not move the machine.
 */

import type { SnapshotIdentity } from './snapshotIdentity.js';

export type CoordinatorState = 'IDLE' | 'ATTEMPTING' | 'ATTEMPTING_WITH_PENDING';

export type CoordinatorInputKind = 'CHANGED' | 'SUCCEEDED' | 'FAILED';

export type CoordinatorOutput = 'START_SNAPSHOT';

export type FailureCause =
    | 'PROVIDER_FAILURE'   // Provider resolved with success: false
    | 'PROVIDER_ERROR'     // Provider rejected or threw
    | 'DEADLINE_EXCEEDED'; // Attempt outlived its deadline

export type CoordinatorInput =
    | { readonly type: 'CHANGED' }
    | { readonly type: 'SUCCEEDED'; readonly identity: SnapshotIdentity }
    | {
        readonly type: 'FAILED';
        readonly identity: SnapshotIdentity;
        readonly cause: FailureCause;
        readonly detail?: string;
    };

export type Transition =
    | {
        readonly legal: true;
        readonly outputs: readonly CoordinatorOutput[];
        readonly next: CoordinatorState;
    }
    | {
        readonly legal: false;
        readonly reason: string;
    };

export const FAILURE_CAUSE_DESCRIPTIONS: Record<FailureCause, string> = {
    PROVIDER_FAILURE: 'Snapshot provider reported failure',
    PROVIDER_ERROR: 'Snapshot provider raised an error',
    DEADLINE_EXCEEDED: 'Attempt exceeded its deadline and was cancelled'
};

const START: readonly CoordinatorOutput[] = Object.freeze(['START_SNAPSHOT']);
const NONE: readonly CoordinatorOutput[] = Object.freeze([]);

const OUTCOME_WHILE_IDLE: Transition = {
    legal: false,
    reason: 'No attempt is outstanding while IDLE'
};

export const TRANSITION_TABLE: Readonly<Record<CoordinatorState, Readonly<Record<CoordinatorInputKind, Transition>>>> = {
    IDLE: {
        CHANGED: { legal: true, outputs: START, next: 'ATTEMPTING' },
        SUCCEEDED: OUTCOME_WHILE_IDLE,
        FAILED: OUTCOME_WHILE_IDLE
    },
    ATTEMPTING: {
        CHANGED: { legal: true, outputs: NONE, next: 'ATTEMPTING_WITH_PENDING' },
        SUCCEEDED: { legal: true, outputs: NONE, next: 'IDLE' },
        FAILED: { legal: true, outputs: START, next: 'ATTEMPTING' }
    },
    ATTEMPTING_WITH_PENDING: {
        CHANGED: { legal: true, outputs: NONE, next: 'ATTEMPTING_WITH_PENDING' },
        SUCCEEDED: { legal: true, outputs: START, next: 'ATTEMPTING' },
        FAILED: { legal: true, outputs: START, next: 'ATTEMPTING' }
    }
};

export function transition(state: CoordinatorState, input: CoordinatorInputKind): Transition {
    return TRANSITION_TABLE[state][input];
}

export function hasOutstandingAttempt(state: CoordinatorState): boolean {
    return state !== 'IDLE';
}
