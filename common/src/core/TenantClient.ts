/**
 * TenantClient - Client for tenant provisioning calls.
 */

import type { NewTenant, Tenant } from "../tenant/Tenant";
import type { ClientAuth } from "./Client";
import { send, sendLookup } from "./Http";
import type { RequestContext } from "./RequestContext";

export interface TenantClient {
	/**
	 * Create a tenant under an organization.
	 */
	create(organizationId: string, data: NewTenant, context: RequestContext): Promise<Tenant>;
	get(id: string, context: RequestContext): Promise<Tenant>;
	findBySubdomain(subdomain: string, context: RequestContext): Promise<Tenant | undefined>;
	/**
	 * Delete a tenant. Deleting one that no longer exists is a no-op.
	 */
	delete(id: string, context: RequestContext): Promise<void>;
}

export function createTenantClient(baseUrl: string, auth: ClientAuth): TenantClient {
	async function create(organizationId: string, data: NewTenant, context: RequestContext): Promise<Tenant> {
		const response = await send(
			auth,
			`${baseUrl}/organizations/${encodeURIComponent(organizationId)}/tenants`,
			auth.createRequest("POST", data, context),
			"create tenant",
		);
		return response.json() as Promise<Tenant>;
	}

	async function get(id: string, context: RequestContext): Promise<Tenant> {
		const response = await send(
			auth,
			`${baseUrl}/tenants/${encodeURIComponent(id)}`,
			auth.createRequest("GET", undefined, context),
			"get tenant",
		);
		return response.json() as Promise<Tenant>;
	}

	async function findBySubdomain(subdomain: string, context: RequestContext): Promise<Tenant | undefined> {
		const response = await sendLookup(
			auth,
			`${baseUrl}/tenants/by-subdomain/${encodeURIComponent(subdomain)}`,
			auth.createRequest("GET", undefined, context),
			"find tenant by subdomain",
		);
		return response ? (response.json() as Promise<Tenant>) : undefined;
	}

	async function deleteTenant(id: string, context: RequestContext): Promise<void> {
		await sendLookup(
			auth,
			`${baseUrl}/tenants/${encodeURIComponent(id)}`,
			auth.createRequest("DELETE", undefined, context),
			"delete tenant",
		);
	}

	return {
		create,
		get,
		findBySubdomain,
		delete: deleteTenant,
	};
}
