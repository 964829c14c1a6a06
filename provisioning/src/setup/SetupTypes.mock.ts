import type { SetupMetadata, SetupResult } from "./SetupTypes";
import { mockAdminUser, mockApiKey, mockDomainConfiguration, mockOrganization, mockTenant } from "checkout-common/testing";

export function mockSetupMetadata(partial?: Partial<SetupMetadata>): SetupMetadata {
	return {
		idempotencyKey: "setup-key-1",
		requestHash: "hash-1",
		completedSteps: [
			"OrganizationCreation",
			"TenantCreation",
			"AdminUserCreation",
			"ApiKeyGeneration",
			"DomainConfiguration",
		],
		reusedResources: [],
		replayed: false,
		attempts: {},
		notes: [],
		startedAt: "2026-01-01T00:00:00.000Z",
		completedAt: "2026-01-01T00:00:01.000Z",
		...partial,
	};
}

export function mockSetupResult(partial?: Partial<SetupResult>): SetupResult {
	return {
		status: "complete",
		organization: mockOrganization(),
		tenant: mockTenant(),
		admin: mockAdminUser(),
		apiKey: mockApiKey(),
		domain: mockDomainConfiguration(),
		metadata: mockSetupMetadata(),
		...partial,
	};
}
