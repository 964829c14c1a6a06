import type { ManualCleanupReport, RollbackOutcome } from "./RollbackCoordinator";
import type { ConflictRecord, ResourceHandle, SetupStep } from "./SetupTypes";
import { ApiError, NetworkError } from "checkout-common";

export interface ValidationIssue {
	path: string;
	message: string;
}

/**
 * Malformed setup input. Raised before anything is created.
 */
export class ValidationError extends Error {
	readonly issues: ReadonlyArray<ValidationIssue>;

	constructor(message: string, issues: ReadonlyArray<ValidationIssue> = []) {
		super(issues.length > 0 ? `${message}: ${issues.map(i => `${i.path || "request"}: ${i.message}`).join("; ")}` : message);
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/**
 * The idempotency store refused the execution. Nothing was created.
 */
export class SetupRejectedError extends Error {
	readonly idempotencyKey: string;

	constructor(message: string, idempotencyKey: string) {
		super(message);
		this.name = "SetupRejectedError";
		this.idempotencyKey = idempotencyKey;
	}
}

/**
 * The key was already used with a different request.
 */
export class IdempotencyKeyMismatchError extends SetupRejectedError {
	constructor(idempotencyKey: string) {
		super(`Idempotency key ${idempotencyKey} was already used with a different request`, idempotencyKey);
		this.name = "IdempotencyKeyMismatchError";
	}
}

/**
 * Another execution holds the reservation for this key.
 */
export class SetupInProgressError extends SetupRejectedError {
	constructor(idempotencyKey: string) {
		super(`Setup for idempotency key ${idempotencyKey} is already in progress`, idempotencyKey);
		this.name = "SetupInProgressError";
	}
}

export class SetupCancelledError extends Error {
	readonly step: SetupStep;

	constructor(step: SetupStep, cause?: unknown) {
		super(`Setup cancelled during ${step}`, { cause });
		this.name = "SetupCancelledError";
		this.step = step;
	}
}

/**
 * The idempotency lease lapsed and another execution now holds the key.
 */
export class ReservationLostError extends Error {
	readonly idempotencyKey: string;

	constructor(idempotencyKey: string) {
		super(`Idempotency key ${idempotencyKey} was taken over by another execution`);
		this.name = "ReservationLostError";
		this.idempotencyKey = idempotencyKey;
	}
}

export class StepTimeoutError extends Error {
	readonly step: SetupStep;
	readonly timeoutMs: number;

	constructor(step: SetupStep, timeoutMs: number) {
		super(`${step} timed out after ${timeoutMs}ms`);
		this.name = "StepTimeoutError";
		this.step = step;
		this.timeoutMs = timeoutMs;
	}
}

/**
 * A duplicate resource that could not be matched to this request.
 */
export class UnresolvableConflictError extends Error {
	readonly step: SetupStep;
	readonly conflict: ConflictRecord;

	constructor(step: SetupStep, conflict: ConflictRecord, reason: string, cause?: unknown) {
		super(`Conflict during ${step} (${conflict.conflictType}): ${reason}`, { cause });
		this.name = "UnresolvableConflictError";
		this.step = step;
		this.conflict = conflict;
	}

	get suggestions(): Array<string> {
		return this.conflict.suggestions;
	}
}

export type RecoveryOption =
	| { type: "retry_from_step"; step: SetupStep; description: string }
	| { type: "full_rollback_and_retry"; description: string; requiresConfirmation: true }
	| { type: "retry_with_backoff"; description: string; delayMs: number; maxAttempts: number };

export interface SetupErrorDetails {
	step: SetupStep;
	completedSteps: ReadonlyArray<SetupStep>;
	createdResources: ReadonlyArray<ResourceHandle>;
	idempotencyKey: string;
	/** Attempts made at the failing step */
	attempts: number;
	maxAttempts: number;
	rollback?: RollbackOutcome | undefined;
	manualCleanup?: ManualCleanupReport | undefined;
	cause: unknown;
}

/**
 * Terminal failure of a critical step.
 *
 * When `rollbackExecuted` is false and `manualCleanup` is set, the listed resources still exist
 * and should be cleaned up before retrying.
 */
export class SetupError extends Error {
	readonly step: SetupStep;
	readonly completedSteps: ReadonlyArray<SetupStep>;
	readonly createdResources: ReadonlyArray<ResourceHandle>;
	readonly idempotencyKey: string;
	readonly attempts: number;
	readonly maxAttempts: number;
	/** True when rollback ran and every compensation succeeded */
	readonly rollbackExecuted: boolean;
	readonly rollback: RollbackOutcome | undefined;
	readonly manualCleanup: ManualCleanupReport | undefined;

	constructor(details: SetupErrorDetails) {
		const reason = details.cause instanceof Error ? details.cause.message : String(details.cause);
		super(`Organization setup failed at ${details.step}: ${reason}`, { cause: details.cause });
		this.name = "SetupError";
		this.step = details.step;
		this.completedSteps = details.completedSteps;
		this.createdResources = details.createdResources;
		this.idempotencyKey = details.idempotencyKey;
		this.attempts = details.attempts;
		this.maxAttempts = details.maxAttempts;
		this.rollback = details.rollback;
		this.rollbackExecuted = details.rollback?.success ?? false;
		this.manualCleanup = details.manualCleanup;
	}

	isNetworkFailure(): boolean {
		const { cause } = this;
		return (
			cause instanceof NetworkError ||
			cause instanceof StepTimeoutError ||
			(cause instanceof ApiError && cause.status >= 500)
		);
	}

	isRecoverable(): boolean {
		return this.step === "ApiKeyGeneration" || this.isNetworkFailure();
	}

	/**
	 * Suggested wait before retrying, 0 when a retry is not expected to help.
	 */
	getRetryDelayMs(): number {
		if (!this.isRecoverable()) {
			return 0;
		}
		if (this.isNetworkFailure()) {
			return Math.min(300, 5 * 2 ** this.completedSteps.length) * 1000;
		}
		return 30000;
	}

	getRecoveryOptions(): Array<RecoveryOption> {
		const options: Array<RecoveryOption> = [];
		const resourcesRemain = !this.rollbackExecuted && this.createdResources.length > 0;

		if (this.step === "ApiKeyGeneration" && resourcesRemain) {
			options.push({
				type: "retry_from_step",
				step: "ApiKeyGeneration",
				description: "Retry API key generation with the existing organization, tenant and admin user",
			});
		}
		if (this.step === "TenantCreation" || this.step === "AdminUserCreation") {
			options.push({
				type: "full_rollback_and_retry",
				description: "Roll back all changes and retry the complete setup",
				requiresConfirmation: true,
			});
		}
		if (this.isNetworkFailure()) {
			options.push({
				type: "retry_with_backoff",
				description: "Retry after network connectivity is restored",
				delayMs: this.getRetryDelayMs(),
				maxAttempts: this.maxAttempts,
			});
		}
		return options;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			step: this.step,
			completedSteps: [...this.completedSteps],
			createdResources: this.createdResources.map(handle => ({ kind: handle.kind, id: handle.id })),
			idempotencyKey: this.idempotencyKey,
			attempts: this.attempts,
			rollbackExecuted: this.rollbackExecuted,
			rollback: this.rollback,
			manualCleanup: this.manualCleanup,
			recoverable: this.isRecoverable(),
			networkFailure: this.isNetworkFailure(),
			retryDelayMs: this.getRetryDelayMs(),
			recoveryOptions: this.getRecoveryOptions(),
			cause: this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : this.cause,
		};
	}
}
