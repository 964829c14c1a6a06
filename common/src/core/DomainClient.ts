/**
 * DomainClient - Binds domains to tenants.
 */

import type { DomainConfiguration } from "../tenant/Domain";
import type { ClientAuth } from "./Client";
import { send, sendLookup } from "./Http";
import type { RequestContext } from "./RequestContext";

export interface DomainClient {
	configure(tenantId: string, domain: string, context: RequestContext): Promise<DomainConfiguration>;
	/**
	 * Remove the tenant's domain binding. A tenant without one is left as it is.
	 */
	remove(tenantId: string, context: RequestContext): Promise<void>;
}

export function createDomainClient(baseUrl: string, auth: ClientAuth): DomainClient {
	async function configure(tenantId: string, domain: string, context: RequestContext): Promise<DomainConfiguration> {
		const response = await send(
			auth,
			`${baseUrl}/tenants/${encodeURIComponent(tenantId)}/domain`,
			auth.createRequest("PUT", { domain }, context),
			"configure domain",
		);
		return response.json() as Promise<DomainConfiguration>;
	}

	async function remove(tenantId: string, context: RequestContext): Promise<void> {
		await sendLookup(
			auth,
			`${baseUrl}/tenants/${encodeURIComponent(tenantId)}/domain`,
			auth.createRequest("DELETE", undefined, context),
			"remove domain",
		);
	}

	return {
		configure,
		remove,
	};
}
