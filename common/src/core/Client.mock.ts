import { mockAdminUserClient } from "./AdminUserClient.mock";
import { mockApiKeyClient } from "./ApiKeyClient.mock";
import type { Client } from "./Client";
import { mockDomainClient } from "./DomainClient.mock";
import { mockOrganizationClient } from "./OrganizationClient.mock";
import { mockTenantClient } from "./TenantClient.mock";

export function mockClient(partial?: Partial<Client>): Client {
	const organizations = mockOrganizationClient();
	const tenants = mockTenantClient();
	const adminUsers = mockAdminUserClient();
	const apiKeys = mockApiKeyClient();
	const domains = mockDomainClient();
	return {
		organizations: () => organizations,
		tenants: () => tenants,
		adminUsers: () => adminUsers,
		apiKeys: () => apiKeys,
		domains: () => domains,
		...partial,
	};
}
