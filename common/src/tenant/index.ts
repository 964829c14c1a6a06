export type { AdminUser, NewAdminUser } from "./AdminUser";
export type { ApiKey, ApiKeyEnvironment, ApiKeyOptions, ApiKeyScope } from "./ApiKey";
export type { DomainConfiguration, SslStatus } from "./Domain";
export type { NewOrganization, Organization, OrganizationStatus } from "./Organization";
export type { NewTenant, Tenant, TenantStatus } from "./Tenant";
