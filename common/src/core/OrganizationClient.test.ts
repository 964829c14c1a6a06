import { ApiError, ConflictError, NetworkError } from "./ApiError";
import type { ClientAuth } from "./Client";
import { mockOrganization } from "./OrganizationClient.mock";
import { createOrganizationClient } from "./OrganizationClient";
import { createRequestContext } from "./RequestContext";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("OrganizationClient", () => {
	let mockAuth: ClientAuth;
	const context = createRequestContext({ requestId: "req-1" });

	beforeEach(() => {
		mockAuth = {
			authToken: undefined,
			createRequest: vi.fn((method, body): RequestInit => ({
				method,
				headers: body ? { "Content-Type": "application/json" } : {},
				body: body ? JSON.stringify(body) : null,
			})),
			checkUnauthorized: vi.fn().mockReturnValue(false),
		};
		global.fetch = vi.fn();
	});

	describe("create", () => {
		it("should post the new organization", async () => {
			const organization = mockOrganization({ id: "org-7" });
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({
				ok: true,
				status: 201,
				json: async () => organization,
			});

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			const result = await client.create({ name: "Acme Corp", slug: "acme-corp", subdomain: "acme-corp" }, context);

			expect(global.fetch).toHaveBeenCalledWith(
				"http://localhost:8080/organizations",
				expect.objectContaining({
					method: "POST",
					body: JSON.stringify({ name: "Acme Corp", slug: "acme-corp", subdomain: "acme-corp" }),
				}),
			);
			expect(mockAuth.createRequest).toHaveBeenCalledWith(
				"POST",
				{ name: "Acme Corp", slug: "acme-corp", subdomain: "acme-corp" },
				context,
			);
			expect(result).toEqual(organization);
		});

		it("should throw a ConflictError on 409", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({
				ok: false,
				status: 409,
				json: async () => ({
					error: "Subdomain taken",
					conflictType: "subdomain_exists",
					conflictFields: { subdomain: "acme-corp" },
					existingResourceId: "org-9",
				}),
			});

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			const error = await client
				.create({ name: "Acme Corp", slug: "acme-corp", subdomain: "acme-corp" }, context)
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(ConflictError);
			expect(error).toMatchObject({
				message: "Failed to create organization: Subdomain taken",
				status: 409,
				conflictType: "subdomain_exists",
				conflictFields: { subdomain: "acme-corp" },
				existingResourceId: "org-9",
			});
		});

		it("should throw an ApiError on other failures", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({
				ok: false,
				status: 503,
				json: async () => {
					throw new Error("not json");
				},
			});

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			const error = await client
				.create({ name: "Acme Corp", slug: "acme-corp", subdomain: "acme-corp" }, context)
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(ApiError);
			expect(error).not.toBeInstanceOf(ConflictError);
			expect(error).toMatchObject({ status: 503, message: "Failed to create organization: 503" });
		});

		it("should wrap transport failures in a NetworkError", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockRejectedValue(new TypeError("fetch failed"));

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			const error = await client
				.create({ name: "Acme Corp", slug: "acme-corp", subdomain: "acme-corp" }, context)
				.catch((e: unknown) => e);

			expect(error).toBeInstanceOf(NetworkError);
			expect(error).toMatchObject({ message: "Failed to create organization: fetch failed" });
		});

		it("should rethrow aborts untouched", async () => {
			const controller = new AbortController();
			controller.abort();
			const abortError = new DOMException("This operation was aborted", "AbortError");
			(global.fetch as ReturnType<typeof vi.fn>).mockRejectedValue(abortError);
			mockAuth.createRequest = vi.fn(() => ({ method: "POST", signal: controller.signal }));

			const client = createOrganizationClient("http://localhost:8080", mockAuth);

			await expect(
				client.create({ name: "Acme Corp", slug: "acme-corp", subdomain: "acme-corp" }, context),
			).rejects.toBe(abortError);
		});
	});

	describe("get", () => {
		it("should fetch an organization by id", async () => {
			const organization = mockOrganization({ id: "org/1" });
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({
				ok: true,
				status: 200,
				json: async () => organization,
			});

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			const result = await client.get("org/1", context);

			expect(global.fetch).toHaveBeenCalledWith(
				"http://localhost:8080/organizations/org%2F1",
				expect.objectContaining({ method: "GET" }),
			);
			expect(result).toEqual(organization);
		});

		it("should throw when the organization is missing", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({
				ok: false,
				status: 404,
				json: async () => ({ error: "Not found", code: "not_found" }),
			});

			const client = createOrganizationClient("http://localhost:8080", mockAuth);

			await expect(client.get("org-1", context)).rejects.toMatchObject({
				status: 404,
				code: "not_found",
				message: "Failed to get organization: Not found",
			});
		});
	});

	describe("findBySubdomain", () => {
		it("should return the organization when found", async () => {
			const organization = mockOrganization();
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({
				ok: true,
				status: 200,
				json: async () => organization,
			});

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			const result = await client.findBySubdomain("acme-corp", context);

			expect(global.fetch).toHaveBeenCalledWith(
				"http://localhost:8080/organizations/by-subdomain/acme-corp",
				expect.objectContaining({ method: "GET" }),
			);
			expect(result).toEqual(organization);
		});

		it("should return undefined on 404", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({ ok: false, status: 404 });

			const client = createOrganizationClient("http://localhost:8080", mockAuth);

			expect(await client.findBySubdomain("acme-corp", context)).toBeUndefined();
		});
	});

	describe("findByDomain", () => {
		it("should look the organization up by domain", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({ ok: false, status: 404 });

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			const result = await client.findByDomain("shop.acme.test", context);

			expect(global.fetch).toHaveBeenCalledWith(
				"http://localhost:8080/organizations/by-domain/shop.acme.test",
				expect.objectContaining({ method: "GET" }),
			);
			expect(result).toBeUndefined();
		});
	});

	describe("delete", () => {
		it("should delete the organization", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({ ok: true, status: 204 });

			const client = createOrganizationClient("http://localhost:8080", mockAuth);
			await client.delete("org-1", context);

			expect(global.fetch).toHaveBeenCalledWith(
				"http://localhost:8080/organizations/org-1",
				expect.objectContaining({ method: "DELETE" }),
			);
		});

		it("should treat a missing organization as deleted", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({ ok: false, status: 404 });

			const client = createOrganizationClient("http://localhost:8080", mockAuth);

			await expect(client.delete("org-1", context)).resolves.toBeUndefined();
		});

		it("should check for unauthorized response", async () => {
			(global.fetch as ReturnType<typeof vi.fn>).mockResolvedValue({
				ok: false,
				status: 401,
				json: async () => ({ error: "Unauthorized" }),
			});

			const client = createOrganizationClient("http://localhost:8080", mockAuth);

			await expect(client.delete("org-1", context)).rejects.toMatchObject({ status: 401 });
			expect(mockAuth.checkUnauthorized).toHaveBeenCalled();
		});
	});
});
