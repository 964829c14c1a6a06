export interface AdminUser {
	id: string;
	tenantId: string;
	name: string;
	email: string;
	role: string;
	createdAt: string;
}

/** Data required to create the first administrator of a tenant */
export interface NewAdminUser {
	name: string;
	email: string;
	/** Omitted when the platform should send an invitation instead */
	password?: string;
	role: string;
}
