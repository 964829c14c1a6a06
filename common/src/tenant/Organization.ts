/** Status of an organization on the platform */
export type OrganizationStatus = "pending" | "active" | "suspended";

/**
 * Organization record. The root of a customer's resource graph.
 */
export interface Organization {
	id: string;
	name: string;
	slug: string;
	subdomain: string;
	customDomain: string | null;
	status: OrganizationStatus;
	settings: Record<string, unknown>;
	createdAt: string;
}

/** Data required to create a new organization */
export interface NewOrganization {
	name: string;
	slug: string;
	subdomain: string;
	customDomain?: string;
	settings?: Record<string, unknown>;
}
