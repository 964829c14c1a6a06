import { randomUUID } from "node:crypto";

/**
 * Per-call context sent with every provisioning request.
 * Contexts are frozen; derive a new one with {@link withContext}.
 */
export interface RequestContext {
	readonly requestId: string;
	readonly organizationId?: string | undefined;
	readonly tenantId?: string | undefined;
	readonly idempotencyKey?: string | undefined;
	readonly signal?: AbortSignal | undefined;
}

export function createRequestContext(init: Partial<RequestContext> = {}): RequestContext {
	return Object.freeze({ ...init, requestId: init.requestId ?? randomUUID() });
}

export function withContext(context: RequestContext, changes: Partial<Omit<RequestContext, "requestId">>): RequestContext {
	return Object.freeze({ ...context, ...changes });
}

/**
 * Header representation of a context. Unset fields are omitted.
 */
export function contextHeaders(context: RequestContext): Record<string, string> {
	const headers: Record<string, string> = { "X-Request-Id": context.requestId };
	if (context.organizationId) {
		headers["X-Organization-Id"] = context.organizationId;
	}
	if (context.tenantId) {
		headers["X-Tenant-Id"] = context.tenantId;
	}
	if (context.idempotencyKey) {
		headers["Idempotency-Key"] = context.idempotencyKey;
	}
	return headers;
}
