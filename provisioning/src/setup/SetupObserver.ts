import type { Logger } from "checkout-common";
import type { RetryState } from "../util/Retry";
import { getLog } from "../util/Logger";
import type { RollbackStepResult } from "./RollbackCoordinator";
import type { ConflictRecord, SetupResult, SetupState, SetupStep } from "./SetupTypes";

const defaultLog = getLog(import.meta);

export interface StateChangeEvent {
	idempotencyKey: string;
	from: SetupState;
	to: SetupState;
}

export interface StepStartedEvent {
	idempotencyKey: string;
	step: SetupStep;
}

export interface StepCompletedEvent {
	idempotencyKey: string;
	step: SetupStep;
	resourceId: string;
	/** An existing resource was adopted instead of creating one */
	reused: boolean;
	attempts: number;
}

export interface RetryEvent {
	idempotencyKey: string;
	step: SetupStep;
	state: Readonly<RetryState>;
}

export interface ConflictResolvedEvent {
	idempotencyKey: string;
	step: SetupStep;
	conflict: ConflictRecord;
	resourceId: string;
}

/**
 * Instrumentation hooks for an organization setup. Every hook is optional. Hooks run synchronously
 * inside the setup; an exception from a hook is logged and does not affect the setup.
 */
export interface SetupObserver {
	onStateChange?(event: StateChangeEvent): void;
	onStepStarted?(event: StepStartedEvent): void;
	onStepCompleted?(event: StepCompletedEvent): void;
	onRetry?(event: RetryEvent): void;
	onConflictResolved?(event: ConflictResolvedEvent): void;
	onRollbackStep?(result: RollbackStepResult): void;
	/** Called once a fresh (not replayed) result has been stored */
	onCompleted?(result: SetupResult): void;
}

/**
 * Observer that writes every event to the log.
 */
export function createLoggingObserver(log: Logger = defaultLog): SetupObserver {
	return {
		onStateChange: ({ idempotencyKey, from, to }) => {
			log.debug({ idempotencyKey, from, to }, "Setup state %s -> %s", from, to);
		},
		onStepStarted: ({ idempotencyKey, step }) => {
			log.info({ idempotencyKey, step }, "Starting %s", step);
		},
		onStepCompleted: ({ idempotencyKey, step, resourceId, reused, attempts }) => {
			log.info({ idempotencyKey, step, resourceId, reused, attempts }, "Completed %s", step);
		},
		onRetry: ({ idempotencyKey, step, state }) => {
			log.warn(
				{ idempotencyKey, step, attempt: state.attempt, delayMs: state.nextDelayMs },
				"Retrying %s after attempt %d",
				step,
				state.attempt,
			);
		},
		onConflictResolved: ({ idempotencyKey, step, conflict, resourceId }) => {
			log.info(
				{ idempotencyKey, step, conflictType: conflict.conflictType, resourceId },
				"Resolved %s conflict with existing resource %s",
				conflict.conflictType,
				resourceId,
			);
		},
		onRollbackStep: result => {
			if (result.success) {
				log.info({ kind: result.kind, id: result.id, attempts: result.attempts }, "Compensated %s %s", result.kind, result.id);
			} else {
				log.error({ kind: result.kind, id: result.id, error: result.error }, "Failed to compensate %s %s", result.kind, result.id);
			}
		},
		onCompleted: result => {
			log.info(
				{ idempotencyKey: result.metadata.idempotencyKey, status: result.status, organizationId: result.organization.id },
				"Organization setup %s",
				result.status === "complete" ? "completed" : "completed partially",
			);
		},
	};
}

/**
 * Fans events out to several observers. A throwing observer is logged and skipped.
 */
export function combineObservers(observers: ReadonlyArray<SetupObserver>, log: Logger = defaultLog): SetupObserver {
	function notify<K extends keyof SetupObserver>(hook: K, invoke: (observer: SetupObserver) => void): void {
		for (const observer of observers) {
			if (!observer[hook]) {
				continue;
			}
			try {
				invoke(observer);
			} catch (error) {
				log.warn(error, "Setup observer %s threw", hook);
			}
		}
	}
	return {
		onStateChange: event => notify("onStateChange", observer => observer.onStateChange?.(event)),
		onStepStarted: event => notify("onStepStarted", observer => observer.onStepStarted?.(event)),
		onStepCompleted: event => notify("onStepCompleted", observer => observer.onStepCompleted?.(event)),
		onRetry: event => notify("onRetry", observer => observer.onRetry?.(event)),
		onConflictResolved: event => notify("onConflictResolved", observer => observer.onConflictResolved?.(event)),
		onRollbackStep: result => notify("onRollbackStep", observer => observer.onRollbackStep?.(result)),
		onCompleted: result => notify("onCompleted", observer => observer.onCompleted?.(result)),
	};
}
