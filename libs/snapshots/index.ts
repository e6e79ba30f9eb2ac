/**
 * Snapshot coordination library.
 */

// Identity
export type { SnapshotIdentity } from './snapshotIdentity.js';
export { createSnapshotIdentity, isSameAttempt, snapshotName } from './snapshotIdentity.js';

// Capabilities
export type {
    Clock,
    SnapshotProvider,
    SnapshotResult,
    TimerHandle,
    Timers
} from './capabilities.js';

// State machine
export type {
    CoordinatorInput,
    CoordinatorInputKind,
    CoordinatorOutput,
    CoordinatorState,
    FailureCause,
    Transition
} from './transitions.js';
export {
    FAILURE_CAUSE_DESCRIPTIONS,
    TRANSITION_TABLE,
    hasOutstandingAttempt,
    transition
} from './transitions.js';

// Coordinator
export type { CoordinatorConfig, CoordinatorStats } from './changeCoordinator.js';
export { ChangeCoordinator } from './changeCoordinator.js';
export { DeadlineController, DEFAULT_ATTEMPT_DEADLINE_MS } from './deadlineController.js';
export { AttemptThrottle, DEFAULT_MIN_ATTEMPT_INTERVAL_MS } from './attemptThrottle.js';
export { SerialDispatcher } from './serialDispatcher.js';
export type { DispatchTask } from './serialDispatcher.js';
