/**
 * Change Coordinator
 *
 * Turns a bursty stream of "filesystem changed" notifications into a
 * serialized sequence of snapshot attempts.
 *
 * Invariants:
 * 1. At most one attempt is outstanding; `create` is never called again
 *    before the previous attempt resolved, failed or timed out.
 * 2. Changes seen while an attempt is outstanding collapse into a single
 *    follow-up attempt.
 * 3. Every failure (including a deadline expiry) immediately re-issues an
 *    attempt. There is no backoff and no retry limit; only the throttle
 *    spaces launches.
 * 4. Outcomes tagged with any identity other than the current attempt's
 *    are discarded before they reach the transition table.
 *
 * All inputs, timer expiries and deferred launches run as tasks on one
 * SerialDispatcher, so state is never touched by two tasks at once.
 */

import type { Logger } from 'pino';
import { systemClock } from '../clock/systemClock.js';
import { describeError, SnapshotConfigError } from '../errors/snapshotErrors.js';
import { getComponentLogger } from '../logging/logger.js';
import { AttemptThrottle, DEFAULT_MIN_ATTEMPT_INTERVAL_MS } from './attemptThrottle.js';
import type { Clock, SnapshotProvider, SnapshotResult, TimerHandle, Timers } from './capabilities.js';
import { DeadlineController, DEFAULT_ATTEMPT_DEADLINE_MS } from './deadlineController.js';
import { SerialDispatcher } from './serialDispatcher.js';
import {
    createSnapshotIdentity,
    isSameAttempt,
    snapshotName,
    type SnapshotIdentity
} from './snapshotIdentity.js';
import {
    FAILURE_CAUSE_DESCRIPTIONS,
    hasOutstandingAttempt,
    transition,
    type CoordinatorInput,
    type CoordinatorOutput,
    type CoordinatorState
} from './transitions.js';

export interface CoordinatorConfig {
    /** Node name stamped into every SnapshotIdentity */
    readonly nodeIdentity: string;
    /** Maximum lifetime of one attempt */
    readonly attemptDeadlineMs?: number;
    /** Minimum spacing between attempt launches; 0 disables the throttle */
    readonly minAttemptIntervalMs?: number;
}

export interface CoordinatorStats {
    readonly attemptsStarted: number;
    readonly attemptsSucceeded: number;
    readonly attemptsFailed: number;
    readonly attemptsTimedOut: number;
    readonly changesCoalesced: number;
    readonly staleOutcomesDiscarded: number;
    readonly protocolViolations: number;
    readonly deferredStarts: number;
}

type MutableStats = { -readonly [K in keyof CoordinatorStats]: CoordinatorStats[K] };

export class ChangeCoordinator {
    private state: CoordinatorState = 'IDLE';
    private current: SnapshotIdentity | null = null;
    private deferredStart: TimerHandle | null = null;
    private sequence = 0;
    private stopped = false;
    private readonly stats: MutableStats = {
        attemptsStarted: 0,
        attemptsSucceeded: 0,
        attemptsFailed: 0,
        attemptsTimedOut: 0,
        changesCoalesced: 0,
        staleOutcomesDiscarded: 0,
        protocolViolations: 0,
        deferredStarts: 0
    };

    private readonly node: string;
    private readonly deadlines: DeadlineController;
    private readonly throttle: AttemptThrottle;
    private readonly dispatcher: SerialDispatcher;
    private readonly log: Logger;

    constructor(
        config: CoordinatorConfig,
        private readonly provider: SnapshotProvider,
        private readonly clock: Clock = systemClock,
        private readonly timers: Timers = systemClock
    ) {
        if (config.nodeIdentity.trim() === '') {
            throw new SnapshotConfigError('ChangeCoordinator', [
                { path: 'nodeIdentity', message: 'Node identity must not be empty' }
            ]);
        }

        this.node = config.nodeIdentity;
        this.deadlines = new DeadlineController(timers, config.attemptDeadlineMs ?? DEFAULT_ATTEMPT_DEADLINE_MS);
        this.throttle = new AttemptThrottle(config.minAttemptIntervalMs ?? DEFAULT_MIN_ATTEMPT_INTERVAL_MS);
        this.log = getComponentLogger('ChangeCoordinator', { node: this.node });
        this.dispatcher = new SerialDispatcher(error => {
            this.log.error({ error: describeError(error) }, 'Coordinator task failed');
        });
    }

    /**
     * Notification from the watcher that the filesystem changed.
     */
    public notifyChanged(): void {
        this.receive({ type: 'CHANGED' });
    }

    /**
     * Serialized entry point for every input. Never blocks; the outcome of
     * any attempt started here re-enters through this same method.
     */
    public receive(input: CoordinatorInput): void {
        this.dispatcher.run(() => this.handle(input));
    }

    /**
     * Stop reacting to inputs and cancel whatever is in flight.
     */
    public stop(): void {
        this.dispatcher.run(() => {
            if (this.stopped) return;
            this.stopped = true;

            this.deferredStart?.cancel();
            this.deferredStart = null;
            this.deadlines.disarmAll();
            if (this.current) {
                this.requestCancel(this.current);
                this.current = null;
            }
            this.log.info({ state: this.state, stats: this.getStats() }, 'ChangeCoordinator stopped');
        });
    }

    public getState(): CoordinatorState {
        return this.state;
    }

    public getCurrentAttempt(): SnapshotIdentity | null {
        return this.current;
    }

    public getStats(): CoordinatorStats {
        return Object.freeze({ ...this.stats });
    }

    public get isRunning(): boolean {
        return !this.stopped;
    }

    private handle(input: CoordinatorInput): void {
        if (this.stopped) {
            this.log.debug({ input: input.type }, 'Input ignored after stop');
            return;
        }

        if (input.type !== 'CHANGED' && (!this.current || !isSameAttempt(this.current, input.identity))) {
            this.stats.staleOutcomesDiscarded += 1;
            this.log.debug({
                input: input.type,
                snapshot: snapshotName(input.identity),
                state: this.state
            }, 'Discarded stale attempt outcome');
            return;
        }

        const result = transition(this.state, input.type);
        if (!result.legal) {
            this.stats.protocolViolations += 1;
            this.log.warn({ input: input.type, state: this.state, reason: result.reason }, 'Protocol violation discarded');
            return;
        }

        this.settle(input);
        this.state = result.next;
        for (const output of result.outputs) {
            this.perform(output);
        }
    }

    private settle(input: CoordinatorInput): void {
        switch (input.type) {
            case 'CHANGED': {
                if (hasOutstandingAttempt(this.state)) {
                    this.stats.changesCoalesced += 1;
                }
                return;
            }

            case 'SUCCEEDED': {
                this.deadlines.disarm(input.identity);
                this.current = null;
                this.stats.attemptsSucceeded += 1;
                this.log.info({
                    snapshot: snapshotName(input.identity),
                    durationMs: this.elapsedSince(input.identity)
                }, 'Snapshot attempt succeeded');
                return;
            }

            case 'FAILED': {
                this.deadlines.disarm(input.identity);
                this.current = null;
                this.stats.attemptsFailed += 1;
                this.log.warn({
                    snapshot: snapshotName(input.identity),
                    cause: input.cause,
                    detail: input.detail,
                    durationMs: this.elapsedSince(input.identity)
                }, FAILURE_CAUSE_DESCRIPTIONS[input.cause]);
                return;
            }
        }
    }

    private perform(output: CoordinatorOutput): void {
        switch (output) {
            case 'START_SNAPSHOT':
                this.startAttempt();
                return;
            default: {
                const unhandled: never = output;
                throw new Error(`Unhandled coordinator output: ${String(unhandled)}`);
            }
        }
    }

    private startAttempt(): void {
        if (this.deferredStart) return;

        const delayMs = this.throttle.delayBeforeStart(this.clock.now());
        if (delayMs > 0) {
            this.stats.deferredStarts += 1;
            this.log.debug({ delayMs }, 'Attempt start deferred by throttle');
            this.deferredStart = this.timers.setTimer(delayMs, () => {
                this.dispatcher.run(() => {
                    this.deferredStart = null;
                    this.launchAttempt();
                });
            });
            return;
        }

        this.launchAttempt();
    }

    private launchAttempt(): void {
        if (this.stopped) return;

        this.sequence += 1;
        const identity = createSnapshotIdentity(this.clock.now(), this.node, this.sequence);
        this.throttle.recordStart(identity.createdAt);
        this.current = identity;
        this.deadlines.arm(identity, expired => {
            this.dispatcher.run(() => this.expire(expired));
        });
        this.stats.attemptsStarted += 1;
        this.log.info({ snapshot: snapshotName(identity), sequence: identity.sequence }, 'Snapshot attempt started');

        let outcome: Promise<SnapshotResult>;
        try {
            outcome = this.provider.create(identity);
        } catch (error: unknown) {
            outcome = Promise.reject(error);
        }

        void outcome.then(
            result => this.receive(
                result.success
                    ? { type: 'SUCCEEDED', identity }
                    : { type: 'FAILED', identity, cause: 'PROVIDER_FAILURE', detail: result.errorMessage ?? result.errorCode }
            ),
            (error: unknown) => this.receive({
                type: 'FAILED',
                identity,
                cause: 'PROVIDER_ERROR',
                detail: describeError(error)
            })
        );
    }

    private expire(identity: SnapshotIdentity): void {
        if (this.stopped || !this.current || !isSameAttempt(this.current, identity)) return;

        this.stats.attemptsTimedOut += 1;
        this.log.warn({
            snapshot: snapshotName(identity),
            deadlineMs: this.deadlines.durationMs
        }, 'Snapshot attempt deadline exceeded');

        this.requestCancel(identity);
        this.handle({ type: 'FAILED', identity, cause: 'DEADLINE_EXCEEDED' });
    }

    private requestCancel(identity: SnapshotIdentity): void {
        if (!this.provider.cancel) {
            this.log.debug({ snapshot: snapshotName(identity) }, 'Provider does not support cancellation');
            return;
        }

        try {
            this.provider.cancel(identity);
        } catch (error: unknown) {
            this.log.warn({ snapshot: snapshotName(identity), error: describeError(error) }, 'Snapshot cancellation failed');
        }
    }

    private elapsedSince(identity: SnapshotIdentity): number {
        return this.clock.now().getTime() - identity.createdAt.getTime();
    }
}
