import { memoized } from "../util/ObjectUtils";
import { type AdminUserClient, createAdminUserClient } from "./AdminUserClient";
import { type ApiKeyClient, createApiKeyClient } from "./ApiKeyClient";
import { createDomainClient, type DomainClient } from "./DomainClient";
import { createOrganizationClient, type OrganizationClient } from "./OrganizationClient";
import { contextHeaders, type RequestContext } from "./RequestContext";
import { createTenantClient, type TenantClient } from "./TenantClient";

export interface Client {
	organizations(): OrganizationClient;
	tenants(): TenantClient;
	adminUsers(): AdminUserClient;
	apiKeys(): ApiKeyClient;
	domains(): DomainClient;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface ClientAuth {
	authToken?: string | undefined;
	/**
	 * Builds the fetch options for a call. The context's headers and abort signal are attached when given.
	 */
	createRequest(method: HttpMethod, body?: unknown, context?: RequestContext): RequestInit;
	/**
	 * Checks if response is a 401 and triggers the onUnauthorized callback if so.
	 * Returns true if unauthorized.
	 * Optional - if not provided, 401 responses are not specially handled.
	 */
	checkUnauthorized?(response: Response): boolean;
}

/**
 * Callbacks that can be triggered by client operations
 */
export interface ClientCallbacks {
	/**
	 * Called when a 401 Unauthorized response is received, e.g. to refresh the platform token.
	 */
	onUnauthorized?: () => void;
}

export function createClient(baseUrl = "", authToken?: string, callbacks?: ClientCallbacks): Client {
	const auth: ClientAuth = {
		authToken,
		createRequest,
		checkUnauthorized,
	};
	return {
		organizations: memoized(() => createOrganizationClient(baseUrl, auth)),
		tenants: memoized(() => createTenantClient(baseUrl, auth)),
		adminUsers: memoized(() => createAdminUserClient(baseUrl, auth)),
		apiKeys: memoized(() => createApiKeyClient(baseUrl, auth)),
		domains: memoized(() => createDomainClient(baseUrl, auth)),
	};

	function checkUnauthorized(response: Response): boolean {
		if (response.status === 401 && callbacks?.onUnauthorized) {
			callbacks.onUnauthorized();
			return true;
		}
		return false;
	}

	function createRequest(method: HttpMethod, body?: unknown, context?: RequestContext): RequestInit {
		const headers: Record<string, string> = context ? contextHeaders(context) : {};
		if (auth.authToken) {
			headers.Authorization = `Bearer ${auth.authToken}`;
		}
		if (body) {
			headers["Content-Type"] = "application/json";
		}

		return {
			method,
			headers,
			body: body ? JSON.stringify(body) : null,
			signal: context?.signal ?? null,
		};
	}
}
