import { contextHeaders, createRequestContext, withContext } from "./RequestContext";
import { describe, expect, it } from "vitest";

describe("RequestContext", () => {
	it("should generate a request id when none is given", () => {
		const context = createRequestContext();

		expect(context.requestId).toMatch(/^[0-9a-f-]{36}$/);
	});

	it("should freeze contexts", () => {
		const context = createRequestContext({ requestId: "req-1" });

		expect(Object.isFrozen(context)).toBe(true);
	});

	it("should derive a new context without touching the original", () => {
		const context = createRequestContext({ requestId: "req-1", organizationId: "org-1" });
		const derived = withContext(context, { tenantId: "tenant-1" });

		expect(derived).toEqual({ requestId: "req-1", organizationId: "org-1", tenantId: "tenant-1" });
		expect(context.tenantId).toBeUndefined();
		expect(Object.isFrozen(derived)).toBe(true);
	});

	it("should only emit headers for set fields", () => {
		expect(contextHeaders(createRequestContext({ requestId: "req-1" }))).toEqual({ "X-Request-Id": "req-1" });
		expect(
			contextHeaders(
				createRequestContext({
					requestId: "req-2",
					organizationId: "org-1",
					tenantId: "tenant-1",
					idempotencyKey: "key-1",
				}),
			),
		).toEqual({
			"X-Request-Id": "req-2",
			"X-Organization-Id": "org-1",
			"X-Tenant-Id": "tenant-1",
			"Idempotency-Key": "key-1",
		});
	});
});
