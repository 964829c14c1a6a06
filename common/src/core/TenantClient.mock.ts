import type { Tenant } from "../tenant/Tenant";
import type { TenantClient } from "./TenantClient";

export function mockTenant(partial?: Partial<Tenant>): Tenant {
	return {
		id: "tenant-1",
		organizationId: "org-1",
		name: "Acme Corp",
		subdomain: "acme-corp",
		customDomain: null,
		status: "active",
		createdAt: "2026-01-01T00:00:00.000Z",
		...partial,
	};
}

export function mockTenantClient(partial?: Partial<TenantClient>): TenantClient {
	return {
		create: async (organizationId, data) =>
			mockTenant({
				organizationId,
				name: data.name,
				subdomain: data.subdomain,
				customDomain: data.customDomain ?? null,
			}),
		get: async id => mockTenant({ id }),
		findBySubdomain: async () => undefined,
		delete: async () => {
			// no-op
		},
		...partial,
	};
}
