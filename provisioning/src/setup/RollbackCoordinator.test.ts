import { FakePlatform } from "../test/FakePlatform";
import { createResourceHandle } from "./ResourceRegistry";
import { RollbackCoordinator } from "./RollbackCoordinator";
import { SetupError } from "./SetupErrors";
import type { ResourceHandle } from "./SetupTypes";
import { ApiError, createRequestContext, NetworkError } from "checkout-common";
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";

const CREATED_AT = "2026-01-01T00:00:00.000Z";

const HANDLES: ReadonlyArray<ResourceHandle> = [
	createResourceHandle("OrganizationCreation", "org-1", CREATED_AT),
	createResourceHandle("TenantCreation", "tenant-1", CREATED_AT),
	createResourceHandle("AdminUserCreation", "user-1", CREATED_AT),
	createResourceHandle("ApiKeyGeneration", "key-1", CREATED_AT),
	createResourceHandle("DomainConfiguration", "tenant-1", CREATED_AT),
];

describe("RollbackCoordinator", () => {
	let platform: FakePlatform;
	let sleep: Mock<(ms: number, signal?: AbortSignal) => Promise<void>>;
	let now: number;
	let coordinator: RollbackCoordinator;

	beforeEach(() => {
		platform = new FakePlatform();
		sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(() => Promise.resolve());
		now = Date.parse(CREATED_AT);
		coordinator = new RollbackCoordinator(platform, { sleep, now: () => now });
	});

	describe("rollback", () => {
		it("should compensate every resource, newest first", async () => {
			const outcome = await coordinator.rollback(HANDLES);

			expect(outcome.success).toBe(true);
			expect(outcome.failed).toEqual([]);
			expect(platform.mutations()).toEqual([
				"domains.remove:tenant-1",
				"apiKeys.revoke:key-1",
				"adminUsers.delete:user-1",
				"tenants.delete:tenant-1",
				"organizations.delete:org-1",
			]);
			expect(outcome.steps.map(step => [step.kind, step.operation, step.success, step.attempts])).toEqual([
				["Domain", "remove", true, 1],
				["ApiKey", "revoke", true, 1],
				["AdminUser", "delete", true, 1],
				["Tenant", "delete", true, 1],
				["Organization", "delete", true, 1],
			]);
			expect(platform.revokedKeys.has("key-1")).toBe(true);
			expect(sleep).not.toHaveBeenCalled();
		});

		it("should succeed with nothing to compensate", async () => {
			const outcome = await coordinator.rollback([]);

			expect(outcome).toEqual({
				success: true,
				steps: [],
				failed: [],
				startedAt: CREATED_AT,
				completedAt: CREATED_AT,
			});
			expect(platform.calls).toEqual([]);
		});

		it("should retry a compensation with doubling delays", async () => {
			platform.fail("tenants.delete", new NetworkError("connection reset"), 2);

			const outcome = await coordinator.rollback(HANDLES.slice(0, 2));

			expect(outcome.success).toBe(true);
			expect(outcome.steps[0]).toMatchObject({ kind: "Tenant", success: true, attempts: 3 });
			expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 10000]);
		});

		it("should cap the delay", async () => {
			coordinator = new RollbackCoordinator(platform, { sleep, maxAttempts: 4, delayMs: 5000, maxDelayMs: 12000 });
			platform.failAlways("organizations.delete", new NetworkError("connection reset"));

			await coordinator.rollback(HANDLES.slice(0, 1));

			expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5000, 10000, 12000]);
		});

		it("should continue past a compensation that keeps failing", async () => {
			platform.failAlways("tenants.delete", new ApiError(500, "Failed to delete tenant: 500"));
			const onRollbackStep = vi.fn();

			const outcome = await coordinator.rollback(HANDLES.slice(0, 3), { observer: { onRollbackStep } });

			expect(outcome.success).toBe(false);
			expect(outcome.failed.map(handle => handle.id)).toEqual(["tenant-1"]);
			expect(outcome.steps[1]).toEqual({
				kind: "Tenant",
				id: "tenant-1",
				step: "TenantCreation",
				operation: "delete",
				success: false,
				attempts: 3,
				error: "Failed to delete tenant: 500",
			});
			expect(platform.organizationsById.size).toBe(0);
			expect(platform.callsTo("organizations.delete")).toBe(1);
			expect(onRollbackStep).toHaveBeenCalledTimes(3);
		});

		it("should abort a compensation that does not answer and move on", async () => {
			coordinator = new RollbackCoordinator(platform, { sleep, timeoutMs: 20 });
			platform.hang("tenants.delete");

			const outcome = await coordinator.rollback(HANDLES.slice(0, 2));

			expect(outcome.success).toBe(false);
			expect(outcome.failed.map(handle => handle.id)).toEqual(["tenant-1"]);
			expect(outcome.steps[0]).toEqual({
				kind: "Tenant",
				id: "tenant-1",
				step: "TenantCreation",
				operation: "delete",
				success: false,
				attempts: 3,
				error: "delete Tenant tenant-1 timed out after 20ms",
			});
			expect(platform.calls.filter(call => call.operation === "tenants.delete").map(call => call.context.signal?.aborted)).toEqual([
				true,
				true,
				true,
			]);
			expect(outcome.steps[1]).toMatchObject({ kind: "Organization", success: true });
			expect(platform.organizationsById.size).toBe(0);
		});

		it("should carry the request identity but not the abort signal", async () => {
			const controller = new AbortController();
			controller.abort();
			const context = createRequestContext({
				requestId: "req-1",
				organizationId: "org-1",
				idempotencyKey: "k1",
				signal: controller.signal,
			});

			await coordinator.rollback(HANDLES.slice(0, 1), { context });

			expect(platform.calls[0]?.context).toMatchObject({ requestId: "req-1", organizationId: "org-1", idempotencyKey: "k1" });
			expect(platform.calls[0]?.context.signal).not.toBe(controller.signal);
			expect(platform.calls[0]?.context.signal?.aborted).toBe(false);
		});
	});

	describe("generateManualCleanupReport", () => {
		it("should list handles newest step first", () => {
			const report = coordinator.generateManualCleanupReport(HANDLES.slice(0, 4));

			expect(report.failurePoint).toBe("unknown");
			expect(report.organizationId).toBe("org-1");
			expect(report.cleanupRequired.map(item => item.resourceType)).toEqual([
				"ApiKey",
				"AdminUser",
				"Tenant",
				"Organization",
			]);
			expect(report.cleanupRequired[0]).toEqual({
				resourceType: "ApiKey",
				resourceId: "key-1",
				method: "POST",
				cleanupEndpoint: "/api-keys/key-1/revoke",
				verificationEndpoint: "/api-keys/key-1",
				procedure: "POST /api-keys/key-1/revoke (Revoke API key key-1)",
				verification: "GET /api-keys/key-1 reports the key as revoked",
			});
		});

		it("should use the details it is given", () => {
			const report = coordinator.generateManualCleanupReport(HANDLES.slice(1, 2), {
				failurePoint: "AdminUserCreation",
				organizationId: "org-1",
			});

			expect(report).toEqual({
				failurePoint: "AdminUserCreation",
				organizationId: "org-1",
				cleanupRequired: [
					{
						resourceType: "Tenant",
						resourceId: "tenant-1",
						method: "DELETE",
						cleanupEndpoint: "/tenants/tenant-1",
						verificationEndpoint: "/tenants/tenant-1",
						procedure: "DELETE /tenants/tenant-1 (Delete tenant tenant-1)",
						verification: "GET /tenants/tenant-1 returns 404",
					},
				],
			});
		});

		it("should report what rollback left behind for a setup error", async () => {
			platform.failAlways("adminUsers.delete", new NetworkError("connection reset"));
			const rollback = await coordinator.rollback(HANDLES.slice(0, 3));
			const error = new SetupError({
				step: "ApiKeyGeneration",
				completedSteps: ["OrganizationCreation", "TenantCreation", "AdminUserCreation"],
				createdResources: HANDLES.slice(0, 3),
				idempotencyKey: "k1",
				attempts: 1,
				maxAttempts: 3,
				rollback,
				cause: new ApiError(400, "Failed to generate API key: invalid scope"),
			});

			const report = coordinator.generateManualCleanupReport(error);

			expect(report.failurePoint).toBe("ApiKeyGeneration");
			expect(report.organizationId).toBe("org-1");
			expect(report.cleanupRequired.map(item => item.resourceId)).toEqual(["user-1"]);
		});

		it("should report every created resource when rollback did not run", () => {
			const error = new SetupError({
				step: "ApiKeyGeneration",
				completedSteps: ["OrganizationCreation", "TenantCreation", "AdminUserCreation"],
				createdResources: HANDLES.slice(0, 3),
				idempotencyKey: "k1",
				attempts: 1,
				maxAttempts: 3,
				cause: new ApiError(400, "Failed to generate API key: invalid scope"),
			});

			const report = coordinator.generateManualCleanupReport(error);

			expect(report.cleanupRequired.map(item => item.resourceId)).toEqual(["user-1", "tenant-1", "org-1"]);
		});

		it("should describe domain removal", () => {
			const report = coordinator.generateManualCleanupReport(HANDLES.slice(4));

			expect(report.organizationId).toBeUndefined();
			expect(report.cleanupRequired[0]).toMatchObject({
				cleanupEndpoint: "/tenants/tenant-1/domain",
				verification: "GET /tenants/tenant-1/domain returns 404",
			});
		});
	});

	describe("rollback log", () => {
		it("should record each rollback and summarize them", async () => {
			await coordinator.rollback(HANDLES.slice(0, 2), { context: createRequestContext({ idempotencyKey: "k1" }) });
			platform.failAlways("organizations.delete", new NetworkError("connection reset"));
			await coordinator.rollback(HANDLES.slice(0, 1));
			await coordinator.rollback([]);

			expect(coordinator.getRollbackLog()).toEqual([
				{ timestamp: CREATED_AT, idempotencyKey: "k1", success: true, compensated: 2, failed: 0, durationMs: 0 },
				{ timestamp: CREATED_AT, idempotencyKey: undefined, success: false, compensated: 0, failed: 1, durationMs: 0 },
				{ timestamp: CREATED_AT, idempotencyKey: undefined, success: true, compensated: 0, failed: 0, durationMs: 0 },
			]);
			expect(coordinator.getRollbackStats()).toEqual({
				total: 3,
				successful: 2,
				failed: 1,
				successRate: 66.67,
				compensationsFailed: 1,
			});
		});

		it("should start empty after clearing", async () => {
			await coordinator.rollback([]);

			coordinator.clearRollbackLog();

			expect(coordinator.getRollbackLog()).toEqual([]);
			expect(coordinator.getRollbackStats()).toEqual({
				total: 0,
				successful: 0,
				failed: 0,
				successRate: 0,
				compensationsFailed: 0,
			});
		});
	});

	it("should read its settings from config", async () => {
		const config = { SETUP_ROLLBACK_MAX_ATTEMPTS: 2, SETUP_ROLLBACK_DELAY_MS: 100 } as never;
		coordinator = RollbackCoordinator.fromConfig(platform, config, { sleep });
		platform.failAlways("organizations.delete", new NetworkError("connection reset"));

		const outcome = await coordinator.rollback(HANDLES.slice(0, 1));

		expect(outcome.steps[0]?.attempts).toBe(2);
		expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100]);
	});
});
