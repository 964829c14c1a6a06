import type { AdminUser } from "../tenant/AdminUser";
import type { AdminUserClient } from "./AdminUserClient";

export function mockAdminUser(partial?: Partial<AdminUser>): AdminUser {
	return {
		id: "user-1",
		tenantId: "tenant-1",
		name: "Ada Admin",
		email: "ada@acme.test",
		role: "organization_admin",
		createdAt: "2026-01-01T00:00:00.000Z",
		...partial,
	};
}

export function mockAdminUserClient(partial?: Partial<AdminUserClient>): AdminUserClient {
	return {
		create: async (tenantId, data) => mockAdminUser({ tenantId, name: data.name, email: data.email, role: data.role }),
		get: async id => mockAdminUser({ id }),
		findByEmail: async () => undefined,
		delete: async () => {
			// no-op
		},
		...partial,
	};
}
