export type SslStatus = "pending" | "issued" | "failed";

/**
 * Domain bound to a tenant.
 */
export interface DomainConfiguration {
	tenantId: string;
	domain: string;
	verified: boolean;
	sslStatus: SslStatus;
	configuredAt: string;
}
