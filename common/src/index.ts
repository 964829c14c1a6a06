export * from "./core/AdminUserClient";
export * from "./core/ApiError";
export * from "./core/ApiKeyClient";
export * from "./core/Client";
export * from "./core/DomainClient";
export * from "./core/OrganizationClient";
export * from "./core/RequestContext";
export * from "./core/TenantClient";
export * from "./tenant";
export * from "./util/LoggerCommon";
export * from "./util/ObjectUtils";
export * from "./util/SlugUtils";
