/**
 * ApiKeyClient - Client for API key generation and revocation.
 */

import type { ApiKey, ApiKeyOptions } from "../tenant/ApiKey";
import type { ClientAuth } from "./Client";
import { send, sendLookup } from "./Http";
import type { RequestContext } from "./RequestContext";

export interface ApiKeyClient {
	/**
	 * Generate a key owned by the given user. The secret is only present in this response.
	 */
	generate(userId: string, options: ApiKeyOptions, context: RequestContext): Promise<ApiKey>;
	/**
	 * Revoke a key. Revoking an unknown key is a no-op.
	 */
	revoke(keyId: string, context: RequestContext): Promise<void>;
}

export function createApiKeyClient(baseUrl: string, auth: ClientAuth): ApiKeyClient {
	async function generate(userId: string, options: ApiKeyOptions, context: RequestContext): Promise<ApiKey> {
		const response = await send(
			auth,
			`${baseUrl}/users/${encodeURIComponent(userId)}/api-keys`,
			auth.createRequest("POST", options, context),
			"generate api key",
		);
		return response.json() as Promise<ApiKey>;
	}

	async function revoke(keyId: string, context: RequestContext): Promise<void> {
		await sendLookup(
			auth,
			`${baseUrl}/api-keys/${encodeURIComponent(keyId)}/revoke`,
			auth.createRequest("POST", undefined, context),
			"revoke api key",
		);
	}

	return {
		generate,
		revoke,
	};
}
