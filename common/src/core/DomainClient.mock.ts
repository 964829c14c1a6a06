import type { DomainConfiguration } from "../tenant/Domain";
import type { DomainClient } from "./DomainClient";

export function mockDomainConfiguration(partial?: Partial<DomainConfiguration>): DomainConfiguration {
	return {
		tenantId: "tenant-1",
		domain: "acme-corp.checkout.test",
		verified: false,
		sslStatus: "pending",
		configuredAt: "2026-01-01T00:00:00.000Z",
		...partial,
	};
}

export function mockDomainClient(partial?: Partial<DomainClient>): DomainClient {
	return {
		configure: async (tenantId, domain) => mockDomainConfiguration({ tenantId, domain }),
		remove: async () => {
			// no-op
		},
		...partial,
	};
}
