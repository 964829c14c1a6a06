/**
 * Errors raised by the provisioning clients.
 */

export type ConflictType =
	| "email_exists"
	| "domain_exists"
	| "subdomain_exists"
	| "user_exists"
	| "tenant_exists"
	| "organization_exists";

const CONFLICT_TYPES: ReadonlyArray<ConflictType> = [
	"email_exists",
	"domain_exists",
	"subdomain_exists",
	"user_exists",
	"tenant_exists",
	"organization_exists",
];

/**
 * Non-2xx response from the platform. `code` is the machine-readable error key when the body carries one.
 */
export class ApiError extends Error {
	readonly status: number;
	readonly code: string | undefined;

	constructor(status: number, message: string, code?: string) {
		super(message);
		this.name = "ApiError";
		this.status = status;
		this.code = code;
	}
}

export interface ConflictDetails {
	conflictType: ConflictType;
	/** Colliding fields and the values that collided, e.g. `{ subdomain: "acme" }` */
	conflictFields: Record<string, string>;
	existingResourceId?: string | undefined;
	existingValues?: Record<string, unknown>;
	suggestions?: Array<string>;
}

/**
 * 409 response: the resource (or one of its unique keys) already exists.
 */
export class ConflictError extends ApiError {
	readonly conflictType: ConflictType;
	readonly conflictFields: Record<string, string>;
	readonly existingResourceId: string | undefined;
	readonly existingValues: Record<string, unknown>;
	readonly suggestions: Array<string>;

	constructor(message: string, details: ConflictDetails) {
		super(409, message, details.conflictType);
		this.name = "ConflictError";
		this.conflictType = details.conflictType;
		this.conflictFields = details.conflictFields;
		this.existingResourceId = details.existingResourceId;
		this.existingValues = details.existingValues ?? {};
		this.suggestions =
			details.suggestions && details.suggestions.length > 0
				? details.suggestions
				: defaultSuggestions(details.conflictType, details.conflictFields);
	}

	static emailExists(email: string, existingUserId?: string): ConflictError {
		return new ConflictError(`User with email '${email}' already exists`, {
			conflictType: "email_exists",
			conflictFields: { email },
			existingResourceId: existingUserId,
		});
	}

	static subdomainExists(subdomain: string, existingResourceId?: string): ConflictError {
		return new ConflictError(`Subdomain '${subdomain}' is already in use`, {
			conflictType: "subdomain_exists",
			conflictFields: { subdomain },
			existingResourceId,
		});
	}

	static domainExists(domain: string, existingResourceId?: string): ConflictError {
		return new ConflictError(`Domain '${domain}' is already in use`, {
			conflictType: "domain_exists",
			conflictFields: { domain },
			existingResourceId,
		});
	}
}

/**
 * The request never produced a response: DNS failure, connection reset, timeout in the transport.
 */
export class NetworkError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = "NetworkError";
	}
}

export function isConflictType(value: unknown): value is ConflictType {
	return CONFLICT_TYPES.some(type => type === value);
}

/**
 * Suggested next actions for a conflict, shown to the caller when it cannot be resolved automatically.
 */
export function defaultSuggestions(conflictType: ConflictType, fields: Record<string, string>): Array<string> {
	switch (conflictType) {
		case "email_exists":
		case "user_exists":
			return [
				"Use checkExisting=true parameter to retrieve existing user",
				`Call GET /users/by-email/${encodeURIComponent(fields.email ?? "")}`,
				"Use idempotency key to safely retry operation",
			];
		case "domain_exists":
			return [
				"Use checkExisting=true parameter to retrieve existing tenant",
				`Call GET /tenants/check-domain/${encodeURIComponent(fields.domain ?? "")}`,
				"Try alternative domain suggestions",
			];
		case "subdomain_exists":
		case "tenant_exists":
			return [
				"Use checkExisting=true parameter to retrieve existing tenant",
				`Call GET /tenants/check-subdomain/${encodeURIComponent(fields.subdomain ?? "")}`,
				"Try alternative subdomain suggestions",
			];
		default:
			return [
				"Use checkExisting=true parameter to retrieve existing resource",
				"Add an idempotency key to safely retry the operation",
				"Check resource availability before attempting creation",
			];
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringRecord(value: unknown): Record<string, string> {
	const result: Record<string, string> = {};
	if (isRecord(value)) {
		for (const [key, entry] of Object.entries(value)) {
			if (typeof entry === "string") {
				result[key] = entry;
			}
		}
	}
	return result;
}

function stringArray(value: unknown): Array<string> {
	return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];
}

async function readBody(response: Response): Promise<Record<string, unknown>> {
	try {
		const body: unknown = await response.json();
		return isRecord(body) ? body : {};
	} catch {
		return {};
	}
}

/**
 * Converts a non-ok response into an {@link ApiError}, or a {@link ConflictError} for 409s.
 *
 * Error bodies look like `{ error, code?, conflictType?, conflictFields?, existingResourceId?, existingValues?, suggestions? }`.
 *
 * @param action what was being attempted, used in the message ("create tenant")
 */
export async function toApiError(response: Response, action: string): Promise<ApiError> {
	const body = await readBody(response);
	const detail = typeof body.error === "string" ? body.error : undefined;
	const code = typeof body.code === "string" ? body.code : undefined;
	const message = detail ? `Failed to ${action}: ${detail}` : `Failed to ${action}: ${response.status}`;

	if (response.status === 409) {
		const conflictType = isConflictType(body.conflictType) ? body.conflictType : isConflictType(code) ? code : undefined;
		return new ConflictError(message, {
			conflictType: conflictType ?? "organization_exists",
			conflictFields: stringRecord(body.conflictFields),
			existingResourceId: typeof body.existingResourceId === "string" ? body.existingResourceId : undefined,
			existingValues: isRecord(body.existingValues) ? body.existingValues : {},
			suggestions: stringArray(body.suggestions),
		});
	}
	return new ApiError(response.status, message, code);
}
