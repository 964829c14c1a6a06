import type { Config } from "../config/Config";
import { getLog } from "../util/Logger";
import { withRetry } from "../util/Retry";
import { sleep as defaultSleep, withTimeout } from "../util/Timeout";
import { SetupError } from "./SetupErrors";
import type { SetupObserver } from "./SetupObserver";
import { type CompensationAction, type ResourceHandle, type ResourceKind, SETUP_STEPS, type SetupStep } from "./SetupTypes";
import { type Client, createRequestContext, type RequestContext, withContext } from "checkout-common";

const log = getLog(import.meta);

const MAX_ROLLBACK_LOG_ENTRIES = 100;

export interface RollbackStepResult {
	kind: ResourceKind;
	id: string;
	step: SetupStep;
	operation: CompensationAction["operation"];
	success: boolean;
	attempts: number;
	error?: string;
}

export interface RollbackOutcome {
	/** True when every compensation succeeded */
	success: boolean;
	/** One entry per handle, in the order they were compensated */
	steps: Array<RollbackStepResult>;
	/** Handles whose compensation failed; these still exist on the platform */
	failed: Array<ResourceHandle>;
	startedAt: string;
	completedAt: string;
}

export interface CleanupInstruction {
	resourceType: ResourceKind;
	resourceId: string;
	method: CompensationAction["method"];
	cleanupEndpoint: string;
	verificationEndpoint: string;
	procedure: string;
	verification: string;
}

/**
 * What an operator has to remove by hand, in the order it should be removed.
 */
export interface ManualCleanupReport {
	failurePoint: SetupStep | "unknown";
	organizationId?: string;
	cleanupRequired: Array<CleanupInstruction>;
}

export interface CleanupReportDetails {
	/** Defaults to the failed step of a {@link SetupError} */
	failurePoint?: SetupStep | undefined;
	/** The organization the resources belong to, when it is not among them */
	organizationId?: string | undefined;
}

export interface RollbackLogEntry {
	timestamp: string;
	idempotencyKey: string | undefined;
	success: boolean;
	compensated: number;
	failed: number;
	durationMs: number;
}

export interface RollbackStats {
	total: number;
	successful: number;
	failed: number;
	/** Percentage of rollbacks in which every compensation succeeded */
	successRate: number;
	/** Compensations that failed across all rollbacks */
	compensationsFailed: number;
}

export interface RollbackCoordinatorOptions {
	/** Attempts per compensation, including the first (default: 3) */
	maxAttempts?: number;
	/** Delay before the second attempt; doubles after that (default: 5000) */
	delayMs?: number;
	/** Cap for the delay (default: 60000) */
	maxDelayMs?: number;
	/** Upper bound for one compensating call; the call is aborted when it passes (default: 30000) */
	timeoutMs?: number;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
	now?: () => number;
}

export interface RollbackRunOptions {
	/** Source of the request ID and idempotency key. Its abort signal is not used. */
	context?: RequestContext;
	observer?: SetupObserver;
}

function verificationEndpoint(handle: ResourceHandle): string {
	const id = encodeURIComponent(handle.id);
	switch (handle.kind) {
		case "Organization":
			return `/organizations/${id}`;
		case "Tenant":
			return `/tenants/${id}`;
		case "AdminUser":
			return `/users/${id}`;
		case "ApiKey":
			return `/api-keys/${id}`;
		case "Domain":
			return `/tenants/${id}/domain`;
	}
}

function toInstruction(handle: ResourceHandle): CleanupInstruction {
	const endpoint = verificationEndpoint(handle);
	return {
		resourceType: handle.kind,
		resourceId: handle.id,
		method: handle.compensation.method,
		cleanupEndpoint: handle.compensation.endpoint,
		verificationEndpoint: endpoint,
		procedure: `${handle.compensation.method} ${handle.compensation.endpoint} (${handle.compensation.description})`,
		verification:
			handle.kind === "ApiKey" ? `GET ${endpoint} reports the key as revoked` : `GET ${endpoint} returns 404`,
	};
}

/**
 * Undoes the resources of a failed setup, newest first. A compensation that keeps failing is
 * reported and the walk continues with the next handle.
 */
export class RollbackCoordinator {
	private readonly client: Client;
	private readonly maxAttempts: number;
	private readonly delayMs: number;
	private readonly maxDelayMs: number;
	private readonly timeoutMs: number;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
	private readonly now: () => number;
	private readonly rollbackLog: Array<RollbackLogEntry> = [];

	constructor(client: Client, options: RollbackCoordinatorOptions = {}) {
		this.client = client;
		this.maxAttempts = options.maxAttempts ?? 3;
		this.delayMs = options.delayMs ?? 5000;
		this.maxDelayMs = options.maxDelayMs ?? 60000;
		this.timeoutMs = options.timeoutMs ?? 30000;
		this.sleep = options.sleep ?? defaultSleep;
		this.now = options.now ?? Date.now;
	}

	static fromConfig(client: Client, config: Config, options: RollbackCoordinatorOptions = {}): RollbackCoordinator {
		return new RollbackCoordinator(client, {
			maxAttempts: config.SETUP_ROLLBACK_MAX_ATTEMPTS,
			delayMs: config.SETUP_ROLLBACK_DELAY_MS,
			timeoutMs: config.SETUP_STEP_TIMEOUT_MS,
			...options,
		});
	}

	async rollback(snapshot: ReadonlyArray<ResourceHandle>, options: RollbackRunOptions = {}): Promise<RollbackOutcome> {
		const { observer } = options;
		const started = this.now();
		// Compensation must not be cut short by the caller's cancellation
		const context = createRequestContext({
			requestId: options.context?.requestId,
			organizationId: options.context?.organizationId,
			tenantId: options.context?.tenantId,
			idempotencyKey: options.context?.idempotencyKey,
		});
		const steps: Array<RollbackStepResult> = [];
		const failed: Array<ResourceHandle> = [];

		log.info({ resources: snapshot.length, idempotencyKey: context.idempotencyKey }, "Rolling back setup");

		for (const handle of [...snapshot].reverse()) {
			const result = await this.compensate(handle, context);
			steps.push(result);
			if (!result.success) {
				failed.push(handle);
			}
			observer?.onRollbackStep?.(result);
		}

		const completed = this.now();
		const outcome: RollbackOutcome = {
			success: failed.length === 0,
			steps,
			failed,
			startedAt: new Date(started).toISOString(),
			completedAt: new Date(completed).toISOString(),
		};
		this.record({
			timestamp: outcome.completedAt,
			idempotencyKey: context.idempotencyKey,
			success: outcome.success,
			compensated: steps.length - failed.length,
			failed: failed.length,
			durationMs: completed - started,
		});

		if (outcome.success) {
			log.info({ compensated: steps.length }, "Rollback completed");
		} else {
			log.error(
				{ failed: failed.map(handle => ({ kind: handle.kind, id: handle.id })) },
				"Rollback left %d resource(s) behind",
				failed.length,
			);
		}
		return outcome;
	}

	/**
	 * Cleanup instructions for whatever a failed setup left behind. For a {@link SetupError} that is
	 * the handles rollback could not compensate, or every created resource when rollback did not run.
	 */
	generateManualCleanupReport(
		source: SetupError | ReadonlyArray<ResourceHandle>,
		details: CleanupReportDetails = {},
	): ManualCleanupReport {
		let handles: ReadonlyArray<ResourceHandle>;
		let failurePoint = details.failurePoint;
		let createdResources: ReadonlyArray<ResourceHandle>;

		if (source instanceof SetupError) {
			handles = source.rollback ? source.rollback.failed : source.createdResources;
			failurePoint = failurePoint ?? source.step;
			createdResources = source.createdResources;
		} else {
			handles = source;
			createdResources = source;
		}

		const report: ManualCleanupReport = {
			failurePoint: failurePoint ?? "unknown",
			cleanupRequired: [...handles]
				.sort((a, b) => SETUP_STEPS.indexOf(b.step) - SETUP_STEPS.indexOf(a.step))
				.map(toInstruction),
		};
		const organizationId =
			details.organizationId ?? createdResources.find(handle => handle.kind === "Organization")?.id;
		if (organizationId) {
			report.organizationId = organizationId;
		}
		return report;
	}

	getRollbackLog(): ReadonlyArray<RollbackLogEntry> {
		return [...this.rollbackLog];
	}

	getRollbackStats(): RollbackStats {
		const total = this.rollbackLog.length;
		const successful = this.rollbackLog.filter(entry => entry.success).length;
		return {
			total,
			successful,
			failed: total - successful,
			successRate: total > 0 ? Math.round((successful / total) * 10000) / 100 : 0,
			compensationsFailed: this.rollbackLog.reduce((sum, entry) => sum + entry.failed, 0),
		};
	}

	clearRollbackLog(): void {
		this.rollbackLog.length = 0;
	}

	private async compensate(handle: ResourceHandle, context: RequestContext): Promise<RollbackStepResult> {
		const base = { kind: handle.kind, id: handle.id, step: handle.step, operation: handle.compensation.operation };
		let attempts = 0;
		try {
			await withRetry(
				attempt => {
					attempts = attempt;
					return this.attempt(handle, context);
				},
				{
					maxAttempts: this.maxAttempts,
					delayFor: attempt => Math.min(this.maxDelayMs, this.delayMs * 2 ** (attempt - 1)),
					label: `${handle.compensation.operation} ${handle.kind} ${handle.id}`,
					sleep: this.sleep,
				},
			);
			return { ...base, success: true, attempts };
		} catch (error) {
			return { ...base, success: false, attempts, error: error instanceof Error ? error.message : String(error) };
		}
	}

	/**
	 * One compensating call, aborted through its context once it runs past the timeout.
	 */
	private async attempt(handle: ResourceHandle, context: RequestContext): Promise<void> {
		const controller = new AbortController();
		await withTimeout(this.invoke(handle, withContext(context, { signal: controller.signal })), this.timeoutMs, () => {
			const timeout = new Error(
				`${handle.compensation.operation} ${handle.kind} ${handle.id} timed out after ${this.timeoutMs}ms`,
			);
			controller.abort(timeout);
			return timeout;
		});
	}

	private invoke(handle: ResourceHandle, context: RequestContext): Promise<void> {
		switch (handle.kind) {
			case "ApiKey":
				return this.client.apiKeys().revoke(handle.id, context);
			case "AdminUser":
				return this.client.adminUsers().delete(handle.id, context);
			case "Tenant":
				return this.client.tenants().delete(handle.id, context);
			case "Organization":
				return this.client.organizations().delete(handle.id, context);
			case "Domain":
				return this.client.domains().remove(handle.id, context);
		}
	}

	private record(entry: RollbackLogEntry): void {
		this.rollbackLog.push(entry);
		if (this.rollbackLog.length > MAX_ROLLBACK_LOG_ENTRIES) {
			this.rollbackLog.shift();
		}
	}
}
