export * from "./core/AdminUserClient.mock";
export * from "./core/ApiKeyClient.mock";
export * from "./core/Client.mock";
export * from "./core/DomainClient.mock";
export * from "./core/OrganizationClient.mock";
export * from "./core/TenantClient.mock";
