import { getLog } from "../util/Logger";
import { UnresolvableConflictError } from "./SetupErrors";
import type { NormalizedSetupRequest } from "./SetupRequest";
import { type ConflictRecord, type SetupStep, STEP_RESOURCE_KINDS } from "./SetupTypes";
import {
	type AdminUser,
	ApiError,
	type Client,
	ConflictError,
	type ConflictType,
	type Organization,
	type RequestContext,
	type Tenant,
} from "checkout-common";

const log = getLog(import.meta);

const RETRIEVAL_PATHS: Record<ConflictType, string> = {
	email_exists: "/users",
	user_exists: "/users",
	domain_exists: "/tenants",
	subdomain_exists: "/tenants",
	tenant_exists: "/tenants",
	organization_exists: "/organizations",
};

const STEP_RETRIEVAL_PATHS: Partial<Record<SetupStep, string>> = {
	OrganizationCreation: "/organizations",
	TenantCreation: "/tenants",
	AdminUserCreation: "/users",
};

/**
 * Turns duplicate-resource failures into reuse of the existing resource, when that resource is
 * provably the one this setup would have created.
 */
export class ConflictResolver {
	private readonly client: Client;

	constructor(client: Client) {
		this.client = client;
	}

	/**
	 * Describes a conflict, or returns undefined for any other error.
	 *
	 * @param step the step that hit the conflict; picks the retrieval endpoint when given
	 */
	classify(error: unknown, step?: SetupStep): ConflictRecord | undefined {
		if (!(error instanceof ConflictError)) {
			return;
		}
		const { existingResourceId } = error;
		const basePath = (step && STEP_RETRIEVAL_PATHS[step]) ?? RETRIEVAL_PATHS[error.conflictType];
		return {
			conflictType: error.conflictType,
			fields: { ...error.conflictFields },
			existingResourceId,
			existingValues: { ...error.existingValues },
			suggestions: [...error.suggestions],
			retrievalEndpoint: existingResourceId ? `${basePath}/${encodeURIComponent(existingResourceId)}` : undefined,
		};
	}

	async resolveOrganization(
		conflict: ConflictRecord,
		request: NormalizedSetupRequest,
		context: RequestContext,
	): Promise<Organization> {
		const step: SetupStep = "OrganizationCreation";
		const organizations = this.client.organizations();
		let existing: Organization | undefined;
		if (conflict.existingResourceId) {
			existing = await this.fetchById(step, conflict, id => organizations.get(id, context));
		} else if (conflict.conflictType === "domain_exists" && request.customDomain) {
			existing = await organizations.findByDomain(request.customDomain, context);
		} else {
			existing = await organizations.findBySubdomain(request.subdomain, context);
		}

		if (!existing) {
			throw new UnresolvableConflictError(step, conflict, "existing organization could not be found");
		}
		if (existing.subdomain !== request.subdomain) {
			throw new UnresolvableConflictError(
				step,
				conflict,
				`organization ${existing.id} has subdomain '${existing.subdomain}', not '${request.subdomain}'`,
			);
		}
		if (request.customDomain && existing.customDomain && existing.customDomain !== request.customDomain) {
			throw new UnresolvableConflictError(
				step,
				conflict,
				`organization ${existing.id} uses domain '${existing.customDomain}'`,
			);
		}
		this.logReuse(step, existing.id, conflict);
		return existing;
	}

	async resolveTenant(
		conflict: ConflictRecord,
		organization: Organization,
		request: NormalizedSetupRequest,
		context: RequestContext,
	): Promise<Tenant> {
		const step: SetupStep = "TenantCreation";
		const tenants = this.client.tenants();
		const existing = conflict.existingResourceId
			? await this.fetchById(step, conflict, id => tenants.get(id, context))
			: await tenants.findBySubdomain(request.subdomain, context);

		if (!existing) {
			throw new UnresolvableConflictError(step, conflict, "existing tenant could not be found");
		}
		if (existing.organizationId !== organization.id) {
			throw new UnresolvableConflictError(
				step,
				conflict,
				`tenant ${existing.id} belongs to organization ${existing.organizationId}`,
			);
		}
		if (existing.subdomain !== request.subdomain) {
			throw new UnresolvableConflictError(
				step,
				conflict,
				`tenant ${existing.id} has subdomain '${existing.subdomain}', not '${request.subdomain}'`,
			);
		}
		this.logReuse(step, existing.id, conflict);
		return existing;
	}

	async resolveAdminUser(
		conflict: ConflictRecord,
		tenant: Tenant,
		request: NormalizedSetupRequest,
		context: RequestContext,
	): Promise<AdminUser> {
		const step: SetupStep = "AdminUserCreation";
		const adminUsers = this.client.adminUsers();
		const existing = conflict.existingResourceId
			? await this.fetchById(step, conflict, id => adminUsers.get(id, context))
			: await adminUsers.findByEmail(request.adminEmail, context);

		if (!existing) {
			throw new UnresolvableConflictError(step, conflict, "existing user could not be found");
		}
		if (existing.tenantId !== tenant.id) {
			throw new UnresolvableConflictError(step, conflict, `user ${existing.id} belongs to tenant ${existing.tenantId}`);
		}
		if (existing.email.toLowerCase() !== request.adminEmail) {
			throw new UnresolvableConflictError(step, conflict, `user ${existing.id} has a different email address`);
		}
		this.logReuse(step, existing.id, conflict);
		return existing;
	}

	/**
	 * A 404 for the ID named in the conflict means there is nothing to reuse. Other errors propagate.
	 */
	private async fetchById<T>(
		step: SetupStep,
		conflict: ConflictRecord,
		fetch: (id: string) => Promise<T>,
	): Promise<T | undefined> {
		const id = conflict.existingResourceId;
		if (!id) {
			return;
		}
		try {
			return await fetch(id);
		} catch (error) {
			if (error instanceof ApiError && error.status === 404) {
				throw new UnresolvableConflictError(
					step,
					conflict,
					`existing ${STEP_RESOURCE_KINDS[step]} ${id} no longer exists`,
					error,
				);
			}
			throw error;
		}
	}

	private logReuse(step: SetupStep, id: string, conflict: ConflictRecord): void {
		log.info({ step, id, conflictType: conflict.conflictType }, "Reusing existing %s %s", STEP_RESOURCE_KINDS[step], id);
	}
}
