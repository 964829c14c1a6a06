import { ApiError, ConflictError, defaultSuggestions, isConflictType, NetworkError, toApiError } from "./ApiError";
import { describe, expect, it } from "vitest";

function jsonResponse(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("ApiError", () => {
	it("should name each error class", () => {
		expect(new ApiError(500, "boom").name).toBe("ApiError");
		expect(ConflictError.emailExists("a@b.test").name).toBe("ConflictError");
		expect(new NetworkError("down").name).toBe("NetworkError");
	});

	it("should keep the cause of a network error", () => {
		const cause = new Error("ECONNRESET");
		expect(new NetworkError("down", cause).cause).toBe(cause);
	});

	describe("ConflictError factories", () => {
		it("should build an email conflict", () => {
			const error = ConflictError.emailExists("ada@acme.test", "user-4");

			expect(error.message).toBe("User with email 'ada@acme.test' already exists");
			expect(error.status).toBe(409);
			expect(error.code).toBe("email_exists");
			expect(error.conflictFields).toEqual({ email: "ada@acme.test" });
			expect(error.existingResourceId).toBe("user-4");
			expect(error.suggestions).toEqual([
				"Use checkExisting=true parameter to retrieve existing user",
				"Call GET /users/by-email/ada%40acme.test",
				"Use idempotency key to safely retry operation",
			]);
		});

		it("should build a domain conflict", () => {
			const error = ConflictError.domainExists("shop.acme.test");

			expect(error.message).toBe("Domain 'shop.acme.test' is already in use");
			expect(error.suggestions[1]).toBe("Call GET /tenants/check-domain/shop.acme.test");
		});

		it("should build a subdomain conflict", () => {
			const error = ConflictError.subdomainExists("acme", "tenant-2");

			expect(error.conflictType).toBe("subdomain_exists");
			expect(error.existingResourceId).toBe("tenant-2");
			expect(error.existingValues).toEqual({});
		});
	});

	it("should fall back to generic suggestions for organization conflicts", () => {
		expect(defaultSuggestions("organization_exists", {})).toEqual([
			"Use checkExisting=true parameter to retrieve existing resource",
			"Add an idempotency key to safely retry the operation",
			"Check resource availability before attempting creation",
		]);
	});

	it("should recognise conflict types", () => {
		expect(isConflictType("tenant_exists")).toBe(true);
		expect(isConflictType("exists")).toBe(false);
		expect(isConflictType(undefined)).toBe(false);
	});

	describe("toApiError", () => {
		it("should parse a conflict body", async () => {
			const error = await toApiError(
				jsonResponse(409, {
					error: "Organization exists",
					conflictType: "organization_exists",
					conflictFields: { subdomain: "acme", ignored: 3 },
					existingResourceId: "org-9",
					existingValues: { subdomain: "acme", name: "Acme" },
				}),
				"create organization",
			);

			expect(error).toBeInstanceOf(ConflictError);
			expect(error).toMatchObject({
				message: "Failed to create organization: Organization exists",
				conflictType: "organization_exists",
				conflictFields: { subdomain: "acme" },
				existingResourceId: "org-9",
				existingValues: { subdomain: "acme", name: "Acme" },
			});
		});

		it("should default an unknown conflict type to organization_exists", async () => {
			const error = await toApiError(jsonResponse(409, { error: "exists" }), "create organization");

			expect(error).toMatchObject({ conflictType: "organization_exists", conflictFields: {} });
		});

		it("should build a plain ApiError for other statuses", async () => {
			const error = await toApiError(jsonResponse(422, { error: "Invalid email", code: "invalid_email" }), "create admin user");

			expect(error).not.toBeInstanceOf(ConflictError);
			expect(error).toMatchObject({ status: 422, code: "invalid_email", message: "Failed to create admin user: Invalid email" });
		});

		it("should tolerate a non-JSON body", async () => {
			const error = await toApiError(new Response("Bad Gateway", { status: 502 }), "get tenant");

			expect(error).toMatchObject({ status: 502, code: undefined, message: "Failed to get tenant: 502" });
		});
	});
});
