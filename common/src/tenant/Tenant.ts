/** Status of a tenant in the provisioning lifecycle */
export type TenantStatus = "provisioning" | "active" | "suspended" | "archived";

/**
 * Tenant record. Each tenant belongs to exactly one organization and is
 * addressed by its subdomain (or custom domain once one is configured).
 */
export interface Tenant {
	id: string;
	organizationId: string;
	name: string;
	subdomain: string;
	customDomain: string | null;
	status: TenantStatus;
	createdAt: string;
}

/** Data required to create a new tenant under an organization */
export interface NewTenant {
	name: string;
	subdomain: string;
	customDomain?: string;
	settings?: Record<string, unknown>;
}
