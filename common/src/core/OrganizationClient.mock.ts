import type { Organization } from "../tenant/Organization";
import type { OrganizationClient } from "./OrganizationClient";

export function mockOrganization(partial?: Partial<Organization>): Organization {
	return {
		id: "org-1",
		name: "Acme Corp",
		slug: "acme-corp",
		subdomain: "acme-corp",
		customDomain: null,
		status: "active",
		settings: {},
		createdAt: "2026-01-01T00:00:00.000Z",
		...partial,
	};
}

export function mockOrganizationClient(partial?: Partial<OrganizationClient>): OrganizationClient {
	return {
		create: async data =>
			mockOrganization({
				name: data.name,
				slug: data.slug,
				subdomain: data.subdomain,
				customDomain: data.customDomain ?? null,
			}),
		get: async id => mockOrganization({ id }),
		findBySubdomain: async () => undefined,
		findByDomain: async () => undefined,
		delete: async () => {
			// no-op
		},
		...partial,
	};
}
