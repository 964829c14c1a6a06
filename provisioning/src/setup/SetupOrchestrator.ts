import { getConfig } from "../config/Config";
import { type IdempotencyStore, initIdempotencyStore, type Reservation } from "../services/IdempotencyStore";
import { getLog } from "../util/Logger";
import { type RetryState, withRetry } from "../util/Retry";
import { abortReason, sleep as defaultSleep, withTimeout } from "../util/Timeout";
import { ConflictResolver } from "./ConflictResolver";
import { computeRequestHash, deriveIdempotencyKey } from "./IdempotencyKey";
import { createResourceHandle, ResourceRegistry } from "./ResourceRegistry";
import { RetryPolicy } from "./RetryPolicy";
import { type ManualCleanupReport, RollbackCoordinator, type RollbackOutcome } from "./RollbackCoordinator";
import {
	IdempotencyKeyMismatchError,
	ReservationLostError,
	SetupCancelledError,
	SetupError,
	SetupInProgressError,
	StepTimeoutError,
	ValidationError,
} from "./SetupErrors";
import { combineObservers, createLoggingObserver, type SetupObserver } from "./SetupObserver";
import { type NormalizedSetupRequest, normalizeSetupRequest, resolveApiKeyOptions, type SetupRequest } from "./SetupRequest";
import {
	type ConflictRecord,
	type PartialFailure,
	type SetupResult,
	type SetupState,
	type SetupStep,
	STEP_STATES,
	type StepOutcome,
} from "./SetupTypes";
import {
	type AdminUser,
	type ApiKey,
	type ApiKeyOptions,
	type Client,
	createClient,
	createRequestContext,
	type DomainConfiguration,
	type Organization,
	type RequestContext,
	type Tenant,
	withContext,
} from "checkout-common";

const log = getLog(import.meta);

const MAX_RETRY_HISTORY = 100;

export interface SetupOptions {
	/** Derived from the request when omitted */
	idempotencyKey?: string | undefined;
	/** Undo created resources when a critical step fails (default: true) */
	enableRollback?: boolean | undefined;
	/** Retry transient failures; when false every step gets a single attempt (default: true) */
	enableRetry?: boolean | undefined;
	/** Cancels the setup. Cancellation fails the setup like any other critical error. */
	signal?: AbortSignal | undefined;
	/** Deadline for the whole setup */
	timeoutMs?: number | undefined;
	/** Base context for every platform call, e.g. to carry the caller's request ID */
	context?: RequestContext | undefined;
	/** Overrides for the configured API key options */
	apiKey?: Partial<ApiKeyOptions> | undefined;
}

export interface SetupOrchestratorOptions {
	client: Client;
	store: IdempotencyStore;
	retryPolicy?: RetryPolicy;
	rollbackCoordinator?: RollbackCoordinator;
	conflictResolver?: ConflictResolver;
	/** Receives setup events in addition to the logging observer */
	observer?: SetupObserver;
	/** Parent domain for tenants without a custom domain */
	baseDomain: string;
	apiKeyDefaults: ApiKeyOptions;
	/** Upper bound for a single platform call (default: 30000) */
	stepTimeoutMs?: number;
	/** Time bucket for derived idempotency keys (default: 1 hour) */
	idempotencyWindowMs?: number;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
	now?: () => number;
}

export interface RetryHistoryEntry {
	idempotencyKey: string;
	step: SetupStep;
	attempt: number;
	delayMs: number;
	error: string;
	timestamp: string;
}

export interface RetryStats {
	totalRetries: number;
	byStep: Partial<Record<SetupStep, number>>;
	history: ReadonlyArray<RetryHistoryEntry>;
}

/**
 * Mutable state of one setup invocation.
 */
interface Execution {
	idempotencyKey: string;
	reservation: Reservation;
	requestHash: string;
	request: NormalizedSetupRequest;
	apiKeyOptions: ApiKeyOptions;
	context: RequestContext;
	signal: AbortSignal;
	abort: (reason: Error) => void;
	enableRetry: boolean;
	registry: ResourceRegistry;
	completedSteps: Array<SetupStep>;
	reusedResources: Array<SetupStep>;
	attempts: Partial<Record<SetupStep, number>>;
	notes: Array<string>;
	startedAt: string;
	state: SetupState;
	currentStep?: SetupStep;
	/** Cleared once the reservation is about to be committed or released */
	renewingLease: boolean;
}

interface StepResult<T> {
	value: T;
	reused: boolean;
}

/** What a step produces: a platform record with an ID, or a tenant's domain configuration */
type StepValue = { id: string } | DomainConfiguration;

type StepResolver<T> = (conflict: ConflictRecord, context: RequestContext) => Promise<T>;

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Provisions an organization with its tenant, admin user, API key and domain as a saga: each step
 * is retried or matched against an existing resource, and a failed critical step undoes what was
 * created before it. Results are stored under an idempotency key so a repeated call replays them.
 */
export class SetupOrchestrator {
	private readonly client: Client;
	private readonly store: IdempotencyStore;
	private readonly retryPolicy: RetryPolicy;
	private readonly rollbackCoordinator: RollbackCoordinator;
	private readonly conflictResolver: ConflictResolver;
	private readonly observer: SetupObserver;
	private readonly baseDomain: string;
	private readonly apiKeyDefaults: ApiKeyOptions;
	private readonly stepTimeoutMs: number;
	private readonly idempotencyWindowMs: number;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
	private readonly now: () => number;
	private readonly retryHistory: Array<RetryHistoryEntry> = [];
	private totalRetries = 0;
	private readonly retriesByStep: Partial<Record<SetupStep, number>> = {};

	constructor(options: SetupOrchestratorOptions) {
		this.client = options.client;
		this.store = options.store;
		this.sleep = options.sleep ?? defaultSleep;
		this.now = options.now ?? Date.now;
		this.stepTimeoutMs = options.stepTimeoutMs ?? 30000;
		this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
		this.rollbackCoordinator =
			options.rollbackCoordinator ??
			new RollbackCoordinator(options.client, { sleep: this.sleep, now: this.now, timeoutMs: this.stepTimeoutMs });
		this.conflictResolver = options.conflictResolver ?? new ConflictResolver(options.client);
		this.observer = combineObservers(
			options.observer ? [createLoggingObserver(), options.observer] : [createLoggingObserver()],
		);
		this.baseDomain = options.baseDomain;
		this.apiKeyDefaults = options.apiKeyDefaults;
		this.idempotencyWindowMs = options.idempotencyWindowMs ?? 3600000;
	}

	/**
	 * Runs the setup, or replays the stored result for the idempotency key.
	 *
	 * @throws ValidationError when the request is malformed; nothing is created
	 * @throws IdempotencyKeyMismatchError when the key was used with a different request
	 * @throws SetupInProgressError when another execution holds the key
	 * @throws SetupError when a critical step fails
	 */
	async setup(request: SetupRequest, options: SetupOptions = {}): Promise<SetupResult> {
		const normalized = normalizeSetupRequest(request);
		const apiKeyOptions = resolveApiKeyOptions(this.apiKeyDefaults, options.apiKey);
		if (options.idempotencyKey !== undefined && options.idempotencyKey.trim() === "") {
			throw new ValidationError("Invalid setup options", [
				{ path: "idempotencyKey", message: "Idempotency key must not be empty" },
			]);
		}
		const requestHash = computeRequestHash(normalized);
		const idempotencyKey =
			options.idempotencyKey ?? deriveIdempotencyKey(normalized, this.now(), this.idempotencyWindowMs);

		const replay = await this.checkExisting(idempotencyKey, requestHash);
		if (replay) {
			return replay;
		}

		const reservation = await this.store.reserve(idempotencyKey, requestHash);
		if (!reservation) {
			// Lost the race for the key; a result may have been committed in the meantime
			const raced = await this.checkExisting(idempotencyKey, requestHash);
			if (raced) {
				return raced;
			}
			throw new SetupInProgressError(idempotencyKey);
		}

		const controller = new AbortController();
		const onCallerAbort = () => controller.abort(options.signal ? abortReason(options.signal) : undefined);
		if (options.signal?.aborted) {
			onCallerAbort();
		} else {
			options.signal?.addEventListener("abort", onCallerAbort, { once: true });
		}
		const deadline =
			options.timeoutMs !== undefined
				? setTimeout(
						() => controller.abort(new Error(`Organization setup timed out after ${options.timeoutMs}ms`)),
						options.timeoutMs,
					)
				: undefined;

		const baseContext = options.context ?? createRequestContext();
		const execution: Execution = {
			idempotencyKey,
			reservation,
			requestHash,
			request: normalized,
			apiKeyOptions,
			context: withContext(baseContext, { idempotencyKey }),
			signal: controller.signal,
			abort: reason => controller.abort(reason),
			enableRetry: options.enableRetry ?? true,
			registry: new ResourceRegistry(),
			completedSteps: [],
			reusedResources: [],
			attempts: {},
			notes: [],
			startedAt: new Date(this.now()).toISOString(),
			state: "Idle",
			renewingLease: true,
		};

		const renewal = setInterval(() => void this.renewLease(execution), Math.max(1, Math.floor(reservation.leaseMs / 2)));
		renewal.unref();

		log.info({ idempotencyKey, subdomain: normalized.subdomain }, "Starting organization setup");
		try {
			return await this.execute(execution, reservation, options.enableRollback ?? true);
		} finally {
			clearInterval(renewal);
			clearTimeout(deadline);
			options.signal?.removeEventListener("abort", onCallerAbort);
		}
	}

	getRetryStats(): RetryStats {
		return {
			totalRetries: this.totalRetries,
			byStep: { ...this.retriesByStep },
			history: [...this.retryHistory],
		};
	}

	/**
	 * Replays a committed result, or rejects the call when the key cannot be used.
	 */
	private async checkExisting(idempotencyKey: string, requestHash: string): Promise<SetupResult | undefined> {
		const existing = await this.store.lookup(idempotencyKey);
		if (!existing) {
			return;
		}
		if (existing.requestHash !== requestHash) {
			throw new IdempotencyKeyMismatchError(idempotencyKey);
		}
		if (existing.status === "in_progress") {
			throw new SetupInProgressError(idempotencyKey);
		}
		log.info({ idempotencyKey }, "Replaying stored setup result");
		return { ...existing.result, metadata: { ...existing.result.metadata, replayed: true } };
	}

	private async execute(execution: Execution, reservation: Reservation, enableRollback: boolean): Promise<SetupResult> {
		const { request } = execution;
		const organizations = this.client.organizations();
		const tenants = this.client.tenants();
		const adminUsers = this.client.adminUsers();

		let organization: Organization;
		let tenant: Tenant;
		let admin: AdminUser;
		let apiKey: ApiKey;
		try {
			organization = await this.runStep(
				execution,
				"OrganizationCreation",
				context =>
					organizations.create(
						{
							name: request.name,
							slug: request.slug,
							subdomain: request.subdomain,
							customDomain: request.customDomain,
							settings: request.settings,
						},
						context,
					),
				(conflict, context) => this.conflictResolver.resolveOrganization(conflict, request, context),
			);
			execution.context = withContext(execution.context, { organizationId: organization.id });

			tenant = await this.runStep(
				execution,
				"TenantCreation",
				context =>
					tenants.create(
						organization.id,
						{ name: request.name, subdomain: request.subdomain, customDomain: request.customDomain },
						context,
					),
				(conflict, context) => this.conflictResolver.resolveTenant(conflict, organization, request, context),
			);
			execution.context = withContext(execution.context, { tenantId: tenant.id });

			admin = await this.runStep(
				execution,
				"AdminUserCreation",
				context =>
					adminUsers.create(
						tenant.id,
						{
							name: request.adminName,
							email: request.adminEmail,
							password: request.adminPassword,
							role: request.adminRole,
						},
						context,
					),
				(conflict, context) => this.conflictResolver.resolveAdminUser(conflict, tenant, request, context),
			);

			apiKey = await this.runStep(execution, "ApiKeyGeneration", context =>
				this.client.apiKeys().generate(admin.id, execution.apiKeyOptions, context),
			);
		} catch (error) {
			throw await this.fail(execution, reservation, enableRollback, error);
		}

		let domain: DomainConfiguration | undefined;
		let partialFailure: PartialFailure | undefined;
		const domainName = request.customDomain ?? `${request.subdomain}.${this.baseDomain}`;
		try {
			domain = await this.runStep(execution, "DomainConfiguration", context =>
				this.client.domains().configure(tenant.id, domainName, context),
			);
		} catch (error) {
			partialFailure = { step: "DomainConfiguration", message: errorMessage(error) };
			execution.notes.push(
				`Domain ${domainName} could not be configured. The organization, tenant, admin user and API key are ready to use; configure the domain later.`,
			);
			log.warn({ idempotencyKey: execution.idempotencyKey, domain: domainName }, "Domain configuration failed: %s", partialFailure.message);
		}

		this.transition(execution, "Completed");
		const result: SetupResult = {
			status: partialFailure ? "partial" : "complete",
			organization,
			tenant,
			admin,
			apiKey,
			domain,
			metadata: {
				idempotencyKey: execution.idempotencyKey,
				requestHash: execution.requestHash,
				completedSteps: [...execution.completedSteps],
				reusedResources: [...execution.reusedResources],
				replayed: false,
				attempts: { ...execution.attempts },
				notes: [...execution.notes],
				startedAt: execution.startedAt,
				completedAt: new Date(this.now()).toISOString(),
			},
		};
		if (partialFailure) {
			result.partialFailure = partialFailure;
		}
		if (execution.reusedResources.length > 0) {
			result.metadata.recoveryType = "reused_existing";
		}

		execution.renewingLease = false;
		await this.commit(reservation, result);
		this.observer.onCompleted?.(result);
		return result;
	}

	/**
	 * Runs one step with retries and conflict resolution. Resources the step creates are registered
	 * for rollback; reused ones are not.
	 */
	private async runStep<T extends StepValue>(
		execution: Execution,
		step: SetupStep,
		operation: (context: RequestContext) => Promise<T>,
		resolve?: StepResolver<T>,
	): Promise<T> {
		execution.currentStep = step;
		this.transition(execution, STEP_STATES[step]);
		this.observer.onStepStarted?.({ idempotencyKey: execution.idempotencyKey, step });

		let result: StepResult<T>;
		try {
			result = await withRetry(attempt => this.attemptStep(execution, step, attempt, operation, resolve), {
				maxAttempts: execution.enableRetry ? this.retryPolicy.maxAttempts : 1,
				isRetryable: error => this.retryPolicy.classify(error) === "retryable",
				delayFor: attempt => this.retryPolicy.nextDelay(attempt),
				signal: execution.signal,
				sleep: this.sleep,
				label: step,
				onRetry: state => this.recordRetry(execution, step, state),
			});
		} catch (error) {
			if (execution.signal.aborted && !(error instanceof SetupCancelledError)) {
				throw new SetupCancelledError(step, error);
			}
			throw error;
		}

		const resourceId = this.resourceIdOf(result.value);
		if (result.reused) {
			execution.reusedResources.push(step);
		} else {
			execution.registry.register(createResourceHandle(step, resourceId, new Date(this.now()).toISOString()));
		}
		execution.completedSteps.push(step);
		this.observer.onStepCompleted?.({
			idempotencyKey: execution.idempotencyKey,
			step,
			resourceId,
			reused: result.reused,
			attempts: execution.attempts[step] ?? 1,
		});
		return result.value;
	}

	/**
	 * One attempt of a step. Transient and fatal outcomes are thrown so the retry loop can
	 * classify them; a resolvable conflict is turned into the existing resource.
	 */
	private async attemptStep<T extends StepValue>(
		execution: Execution,
		step: SetupStep,
		attempt: number,
		operation: (context: RequestContext) => Promise<T>,
		resolve: StepResolver<T> | undefined,
	): Promise<StepResult<T>> {
		execution.attempts[step] = attempt;
		await this.renewLease(execution);
		if (execution.signal.aborted) {
			throw new SetupCancelledError(step, abortReason(execution.signal));
		}

		const outcome = await this.callStep(execution, step, operation, resolve);
		switch (outcome.kind) {
			case "success":
				return { value: outcome.value, reused: outcome.reused };
			case "conflict": {
				if (!resolve) {
					throw outcome.error;
				}
				const value = await resolve(outcome.conflict, this.stepContext(execution, step, execution.signal));
				const resourceId = this.resourceIdOf(value);
				this.observer.onConflictResolved?.({
					idempotencyKey: execution.idempotencyKey,
					step,
					conflict: outcome.conflict,
					resourceId,
				});
				return { value, reused: true };
			}
			case "transient":
			case "fatal":
				throw outcome.error;
		}
	}

	private async callStep<T extends StepValue>(
		execution: Execution,
		step: SetupStep,
		operation: (context: RequestContext) => Promise<T>,
		resolve: StepResolver<T> | undefined,
	): Promise<StepOutcome<T>> {
		const attemptController = new AbortController();
		const onAbort = () => attemptController.abort(abortReason(execution.signal));
		execution.signal.addEventListener("abort", onAbort, { once: true });
		try {
			const value = await withTimeout(
				operation(this.stepContext(execution, step, attemptController.signal)),
				this.stepTimeoutMs,
				() => {
					const timeout = new StepTimeoutError(step, this.stepTimeoutMs);
					attemptController.abort(timeout);
					return timeout;
				},
			);
			return { kind: "success", value, reused: false };
		} catch (error) {
			switch (this.retryPolicy.classify(error)) {
				case "conflict": {
					const conflict = this.conflictResolver.classify(error, step);
					return conflict && resolve ? { kind: "conflict", conflict, error } : { kind: "fatal", error };
				}
				case "retryable":
					return { kind: "transient", error };
				case "non_retryable":
					return { kind: "fatal", error };
			}
		} finally {
			execution.signal.removeEventListener("abort", onAbort);
		}
	}

	private stepContext(execution: Execution, step: SetupStep, signal: AbortSignal): RequestContext {
		return withContext(execution.context, { idempotencyKey: `${execution.idempotencyKey}:${step}`, signal });
	}

	/** Domains are identified by their tenant */
	private resourceIdOf(value: StepValue): string {
		return "id" in value ? value.id : value.tenantId;
	}

	/**
	 * Rolls back (when enabled), releases the key and builds the error for the caller.
	 */
	private async fail(
		execution: Execution,
		reservation: Reservation,
		enableRollback: boolean,
		cause: unknown,
	): Promise<SetupError> {
		const step = execution.currentStep ?? "OrganizationCreation";
		this.transition(execution, "Failed");
		const createdResources = execution.registry.snapshot();
		log.error(
			{ idempotencyKey: execution.idempotencyKey, step, completedSteps: execution.completedSteps },
			"Organization setup failed at %s: %s",
			step,
			errorMessage(cause),
		);

		let rollback: RollbackOutcome | undefined;
		let manualCleanup: ManualCleanupReport | undefined;
		const reportDetails = { failurePoint: step, organizationId: execution.context.organizationId };
		if (enableRollback) {
			this.transition(execution, "RollingBack");
			rollback = await this.rollbackCoordinator.rollback(createdResources, {
				context: execution.context,
				observer: this.observer,
			});
			this.transition(execution, "RolledBack");
			if (!rollback.success) {
				manualCleanup = this.rollbackCoordinator.generateManualCleanupReport(rollback.failed, reportDetails);
			}
		} else if (createdResources.length > 0) {
			manualCleanup = this.rollbackCoordinator.generateManualCleanupReport(createdResources, reportDetails);
		}

		execution.renewingLease = false;
		try {
			await this.store.release(reservation);
		} catch (releaseError) {
			log.error(releaseError, "Failed to release idempotency key %s", execution.idempotencyKey);
		}

		return new SetupError({
			step,
			completedSteps: [...execution.completedSteps],
			createdResources,
			idempotencyKey: execution.idempotencyKey,
			attempts: execution.attempts[step] ?? 0,
			maxAttempts: execution.enableRetry ? this.retryPolicy.maxAttempts : 1,
			rollback,
			manualCleanup,
			cause,
		});
	}

	/**
	 * Keeps the reservation alive while the setup runs. Losing the key to another execution
	 * cancels this one before it creates anything more.
	 */
	private async renewLease(execution: Execution): Promise<void> {
		if (!execution.renewingLease) {
			return;
		}
		let held: boolean;
		try {
			held = await this.store.extend(execution.reservation);
		} catch (error) {
			log.warn(error, "Failed to renew idempotency key %s", execution.idempotencyKey);
			return;
		}
		if (!held && execution.renewingLease && !execution.signal.aborted) {
			log.error({ idempotencyKey: execution.idempotencyKey }, "Idempotency key was taken over by another execution");
			execution.abort(new ReservationLostError(execution.idempotencyKey));
		}
	}

	private async commit(reservation: Reservation, result: SetupResult): Promise<void> {
		try {
			const committed = await this.store.commit(reservation, result);
			if (!committed) {
				log.warn({ idempotencyKey: reservation.key }, "Setup result was not stored: the reservation was taken over");
			}
		} catch (error) {
			log.error(error, "Failed to store setup result for %s", reservation.key);
		}
	}

	private transition(execution: Execution, to: SetupState): void {
		const from = execution.state;
		execution.state = to;
		this.observer.onStateChange?.({ idempotencyKey: execution.idempotencyKey, from, to });
	}

	private recordRetry(execution: Execution, step: SetupStep, state: Readonly<RetryState>): void {
		this.totalRetries++;
		this.retriesByStep[step] = (this.retriesByStep[step] ?? 0) + 1;
		this.retryHistory.push({
			idempotencyKey: execution.idempotencyKey,
			step,
			attempt: state.attempt,
			delayMs: state.nextDelayMs ?? 0,
			error: errorMessage(state.lastError),
			timestamp: new Date(this.now()).toISOString(),
		});
		if (this.retryHistory.length > MAX_RETRY_HISTORY) {
			this.retryHistory.shift();
		}
		this.observer.onRetry?.({ idempotencyKey: execution.idempotencyKey, step, state });
	}
}

/**
 * Creates an orchestrator wired from the environment: platform client, idempotency store,
 * retry and rollback settings.
 */
export async function createSetupOrchestrator(
	overrides: Partial<SetupOrchestratorOptions> = {},
): Promise<SetupOrchestrator> {
	const config = getConfig();
	const client = overrides.client ?? createClient(config.CHECKOUT_API_URL, config.CHECKOUT_API_TOKEN);
	const store = overrides.store ?? (await initIdempotencyStore()).store;
	return new SetupOrchestrator({
		client,
		store,
		retryPolicy: RetryPolicy.fromConfig(config),
		rollbackCoordinator: RollbackCoordinator.fromConfig(client, config, { sleep: overrides.sleep, now: overrides.now }),
		baseDomain: config.SETUP_BASE_DOMAIN,
		apiKeyDefaults: {
			scope: config.API_KEY_SCOPE,
			autoRotate: config.API_KEY_AUTO_ROTATE,
			maxKeyAgeDays: config.API_KEY_MAX_AGE_DAYS,
			gracePeriodHours: config.API_KEY_GRACE_PERIOD_HOURS,
			environment: config.API_KEY_ENVIRONMENT,
		},
		stepTimeoutMs: config.SETUP_STEP_TIMEOUT_MS,
		idempotencyWindowMs: config.SETUP_IDEMPOTENCY_WINDOW_MS,
		...overrides,
	});
}
