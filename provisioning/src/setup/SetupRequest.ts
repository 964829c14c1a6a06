import { ValidationError } from "./SetupErrors";
import { type ApiKeyOptions, generateSlug, isValidDomain, isValidSubdomain } from "checkout-common";
import { z } from "zod";

export const DEFAULT_ADMIN_ROLE = "organization_admin";

/**
 * Input to an organization setup.
 */
export interface SetupRequest {
	name: string;
	/** Defaults to a slug of `name` */
	subdomain?: string | undefined;
	customDomain?: string | undefined;
	/** Defaults to `name` */
	adminName?: string | undefined;
	adminEmail: string;
	/** When omitted the platform invites the admin instead */
	adminPassword?: string | undefined;
	/** Defaults to "organization_admin" */
	adminRole?: string | undefined;
	settings?: Record<string, unknown> | undefined;
}

/**
 * A validated request with every default applied. The email is lower-cased.
 */
export interface NormalizedSetupRequest {
	name: string;
	slug: string;
	subdomain: string;
	customDomain?: string | undefined;
	adminName: string;
	adminEmail: string;
	adminPassword?: string | undefined;
	adminRole: string;
	settings: Record<string, unknown>;
}

const SetupRequestSchema = z.object({
	name: z.string().trim().min(1, "Organization name is required").max(255),
	subdomain: z
		.string()
		.trim()
		.toLowerCase()
		.refine(isValidSubdomain, "Subdomain must be 1-63 lowercase letters, digits or inner hyphens")
		.optional(),
	customDomain: z.string().trim().toLowerCase().refine(isValidDomain, "Custom domain must be a valid host name").optional(),
	adminName: z.string().trim().min(1).max(255).optional(),
	adminEmail: z.string().trim().toLowerCase().email("Admin email must be a valid email address"),
	adminPassword: z.string().min(8, "Admin password must be at least 8 characters").optional(),
	adminRole: z.string().trim().min(1).optional(),
	settings: z.record(z.unknown()).optional(),
});

const ApiKeyOptionsSchema = z.object({
	scope: z.enum(["organization", "tenant", "user"]),
	autoRotate: z.boolean(),
	maxKeyAgeDays: z.number().int().min(1).max(3650),
	gracePeriodHours: z.number().int().min(0).max(720),
	environment: z.enum(["test", "live"]),
});

function toIssues(error: z.ZodError): Array<{ path: string; message: string }> {
	return error.issues.map(issue => ({ path: issue.path.join("."), message: issue.message }));
}

/**
 * Validates a setup request and applies defaults.
 *
 * @throws ValidationError listing every invalid field
 */
export function normalizeSetupRequest(request: SetupRequest): NormalizedSetupRequest {
	const parsed = SetupRequestSchema.safeParse(request);
	if (!parsed.success) {
		throw new ValidationError("Invalid setup request", toIssues(parsed.error));
	}
	const { name, subdomain, customDomain, adminName, adminEmail, adminPassword, adminRole, settings } = parsed.data;
	const slug = generateSlug(name);
	return {
		name,
		slug,
		subdomain: subdomain ?? slug,
		customDomain,
		adminName: adminName ?? name,
		adminEmail,
		adminPassword,
		adminRole: adminRole ?? DEFAULT_ADMIN_ROLE,
		settings: settings ?? {},
	};
}

/**
 * Merges API key overrides onto the defaults and validates the result.
 *
 * @throws ValidationError when an option is out of range
 */
export function resolveApiKeyOptions(defaults: ApiKeyOptions, overrides: Partial<ApiKeyOptions> = {}): ApiKeyOptions {
	const parsed = ApiKeyOptionsSchema.safeParse({ ...defaults, ...overrides });
	if (!parsed.success) {
		throw new ValidationError("Invalid API key options", toIssues(parsed.error));
	}
	return parsed.data;
}
