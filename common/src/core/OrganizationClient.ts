/**
 * OrganizationClient - Client for organization provisioning calls.
 */

import type { NewOrganization, Organization } from "../tenant/Organization";
import type { ClientAuth } from "./Client";
import { send, sendLookup } from "./Http";
import type { RequestContext } from "./RequestContext";

export interface OrganizationClient {
	/**
	 * Create an organization. Rejects with a ConflictError when the subdomain or custom domain is taken.
	 */
	create(data: NewOrganization, context: RequestContext): Promise<Organization>;
	get(id: string, context: RequestContext): Promise<Organization>;
	findBySubdomain(subdomain: string, context: RequestContext): Promise<Organization | undefined>;
	findByDomain(domain: string, context: RequestContext): Promise<Organization | undefined>;
	/**
	 * Delete an organization. Deleting one that no longer exists is a no-op.
	 */
	delete(id: string, context: RequestContext): Promise<void>;
}

export function createOrganizationClient(baseUrl: string, auth: ClientAuth): OrganizationClient {
	async function create(data: NewOrganization, context: RequestContext): Promise<Organization> {
		const response = await send(
			auth,
			`${baseUrl}/organizations`,
			auth.createRequest("POST", data, context),
			"create organization",
		);
		return response.json() as Promise<Organization>;
	}

	async function get(id: string, context: RequestContext): Promise<Organization> {
		const response = await send(
			auth,
			`${baseUrl}/organizations/${encodeURIComponent(id)}`,
			auth.createRequest("GET", undefined, context),
			"get organization",
		);
		return response.json() as Promise<Organization>;
	}

	async function findBySubdomain(subdomain: string, context: RequestContext): Promise<Organization | undefined> {
		const response = await sendLookup(
			auth,
			`${baseUrl}/organizations/by-subdomain/${encodeURIComponent(subdomain)}`,
			auth.createRequest("GET", undefined, context),
			"find organization by subdomain",
		);
		return response ? (response.json() as Promise<Organization>) : undefined;
	}

	async function findByDomain(domain: string, context: RequestContext): Promise<Organization | undefined> {
		const response = await sendLookup(
			auth,
			`${baseUrl}/organizations/by-domain/${encodeURIComponent(domain)}`,
			auth.createRequest("GET", undefined, context),
			"find organization by domain",
		);
		return response ? (response.json() as Promise<Organization>) : undefined;
	}

	async function deleteOrganization(id: string, context: RequestContext): Promise<void> {
		await sendLookup(
			auth,
			`${baseUrl}/organizations/${encodeURIComponent(id)}`,
			auth.createRequest("DELETE", undefined, context),
			"delete organization",
		);
	}

	return {
		create,
		get,
		findBySubdomain,
		findByDomain,
		delete: deleteOrganization,
	};
}
