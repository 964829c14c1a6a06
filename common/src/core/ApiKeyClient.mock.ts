import type { ApiKey } from "../tenant/ApiKey";
import type { ApiKeyClient } from "./ApiKeyClient";

export function mockApiKey(partial?: Partial<ApiKey>): ApiKey {
	return {
		id: "key-1",
		userId: "user-1",
		key: "test-api-key",
		scope: "organization",
		expiresAt: null,
		createdAt: "2026-01-01T00:00:00.000Z",
		...partial,
	};
}

export function mockApiKeyClient(partial?: Partial<ApiKeyClient>): ApiKeyClient {
	return {
		generate: async (userId, options) => mockApiKey({ userId, scope: options.scope }),
		revoke: async () => {
			// no-op
		},
		...partial,
	};
}
