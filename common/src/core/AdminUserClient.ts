/**
 * AdminUserClient - Client for tenant administrator accounts.
 */

import type { AdminUser, NewAdminUser } from "../tenant/AdminUser";
import type { ClientAuth } from "./Client";
import { send, sendLookup } from "./Http";
import type { RequestContext } from "./RequestContext";

export interface AdminUserClient {
	create(tenantId: string, data: NewAdminUser, context: RequestContext): Promise<AdminUser>;
	get(id: string, context: RequestContext): Promise<AdminUser>;
	findByEmail(email: string, context: RequestContext): Promise<AdminUser | undefined>;
	delete(id: string, context: RequestContext): Promise<void>;
}

export function createAdminUserClient(baseUrl: string, auth: ClientAuth): AdminUserClient {
	async function create(tenantId: string, data: NewAdminUser, context: RequestContext): Promise<AdminUser> {
		const response = await send(
			auth,
			`${baseUrl}/tenants/${encodeURIComponent(tenantId)}/users`,
			auth.createRequest("POST", data, context),
			"create admin user",
		);
		return response.json() as Promise<AdminUser>;
	}

	async function get(id: string, context: RequestContext): Promise<AdminUser> {
		const response = await send(
			auth,
			`${baseUrl}/users/${encodeURIComponent(id)}`,
			auth.createRequest("GET", undefined, context),
			"get admin user",
		);
		return response.json() as Promise<AdminUser>;
	}

	async function findByEmail(email: string, context: RequestContext): Promise<AdminUser | undefined> {
		const response = await sendLookup(
			auth,
			`${baseUrl}/users/by-email/${encodeURIComponent(email)}`,
			auth.createRequest("GET", undefined, context),
			"find admin user by email",
		);
		return response ? (response.json() as Promise<AdminUser>) : undefined;
	}

	async function deleteUser(id: string, context: RequestContext): Promise<void> {
		await sendLookup(
			auth,
			`${baseUrl}/users/${encodeURIComponent(id)}`,
			auth.createRequest("DELETE", undefined, context),
			"delete admin user",
		);
	}

	return {
		create,
		get,
		findByEmail,
		delete: deleteUser,
	};
}
