import type { AdminUser, ApiKey, ConflictType, DomainConfiguration, Organization, Tenant } from "checkout-common";

/** Steps of an organization setup, in execution order */
export const SETUP_STEPS = [
	"OrganizationCreation",
	"TenantCreation",
	"AdminUserCreation",
	"ApiKeyGeneration",
	"DomainConfiguration",
] as const;

export type SetupStep = (typeof SETUP_STEPS)[number];

export type SetupState =
	| "Idle"
	| "CreatingOrganization"
	| "CreatingTenant"
	| "CreatingAdminUser"
	| "GeneratingApiKey"
	| "ConfiguringDomain"
	| "Completed"
	| "Failed"
	| "RollingBack"
	| "RolledBack";

/** The state the orchestrator is in while a step runs */
export const STEP_STATES: Record<SetupStep, SetupState> = {
	OrganizationCreation: "CreatingOrganization",
	TenantCreation: "CreatingTenant",
	AdminUserCreation: "CreatingAdminUser",
	ApiKeyGeneration: "GeneratingApiKey",
	DomainConfiguration: "ConfiguringDomain",
};

export type ResourceKind = "Organization" | "Tenant" | "AdminUser" | "ApiKey" | "Domain";

export const STEP_RESOURCE_KINDS: Record<SetupStep, ResourceKind> = {
	OrganizationCreation: "Organization",
	TenantCreation: "Tenant",
	AdminUserCreation: "AdminUser",
	ApiKeyGeneration: "ApiKey",
	DomainConfiguration: "Domain",
};

/**
 * How to undo a created resource. `endpoint` is relative to the platform API.
 */
export interface CompensationAction {
	operation: "delete" | "revoke" | "remove";
	method: "DELETE" | "POST";
	endpoint: string;
	description: string;
}

/**
 * A resource created by the current execution.
 */
export interface ResourceHandle {
	kind: ResourceKind;
	/** Platform ID. For domains, the tenant the domain is bound to. */
	id: string;
	step: SetupStep;
	createdAt: string;
	compensation: CompensationAction;
}

/**
 * A duplicate-resource failure, classified.
 */
export interface ConflictRecord {
	conflictType: ConflictType;
	/** Colliding fields and values, e.g. `{ subdomain: "acme" }` */
	fields: Record<string, string>;
	existingResourceId?: string | undefined;
	existingValues: Record<string, unknown>;
	suggestions: Array<string>;
	/** Where the existing resource can be fetched, when its ID is known */
	retrievalEndpoint?: string | undefined;
}

/**
 * Result of one step attempt. Steps never throw for expected failures; the orchestrator
 * branches on `kind`.
 */
export type StepOutcome<T> =
	| { kind: "success"; value: T; reused: boolean }
	| { kind: "conflict"; conflict: ConflictRecord; error: unknown }
	| { kind: "transient"; error: unknown }
	| { kind: "fatal"; error: unknown };

export interface PartialFailure {
	step: SetupStep;
	message: string;
}

export interface SetupMetadata {
	idempotencyKey: string;
	requestHash: string;
	completedSteps: Array<SetupStep>;
	/** Steps satisfied by an existing resource instead of a new one */
	reusedResources: Array<SetupStep>;
	recoveryType?: "reused_existing";
	/** True when this result was returned from the idempotency store */
	replayed: boolean;
	/** Attempts per step, including the first */
	attempts: Partial<Record<SetupStep, number>>;
	notes: Array<string>;
	startedAt: string;
	completedAt: string;
}

export interface SetupResult {
	status: "complete" | "partial";
	organization: Organization;
	tenant: Tenant;
	admin: AdminUser;
	apiKey: ApiKey;
	/** Absent when domain configuration failed */
	domain?: DomainConfiguration | undefined;
	partialFailure?: PartialFailure;
	metadata: SetupMetadata;
}
