import { combineObservers, createLoggingObserver, type SetupObserver } from "./SetupObserver";
import { mockSetupResult } from "./SetupTypes.mock";
import { describe, expect, it, vi } from "vitest";

function mockLogger() {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("combineObservers", () => {
	it("should call every observer that implements the hook", () => {
		const first = vi.fn();
		const second = vi.fn();
		const combined = combineObservers([{ onStateChange: first }, { onStepStarted: vi.fn() }, { onStateChange: second }]);
		const event = { idempotencyKey: "k1", from: "Idle", to: "CreatingOrganization" } as const;

		combined.onStateChange?.(event);

		expect(first).toHaveBeenCalledWith(event);
		expect(second).toHaveBeenCalledWith(event);
	});

	it("should log an observer that throws and keep notifying the rest", () => {
		const log = mockLogger();
		const failure = new Error("observer failed");
		const after = vi.fn();
		const observers: Array<SetupObserver> = [
			{
				onCompleted: () => {
					throw failure;
				},
			},
			{ onCompleted: after },
		];
		const combined = combineObservers(observers, log as never);
		const result = mockSetupResult();

		combined.onCompleted?.(result);

		expect(after).toHaveBeenCalledWith(result);
		expect(log.warn).toHaveBeenCalledWith(failure, "Setup observer %s threw", "onCompleted");
	});
});

describe("createLoggingObserver", () => {
	it("should log completed setups", () => {
		const log = mockLogger();
		const observer = createLoggingObserver(log as never);

		observer.onCompleted?.(mockSetupResult({ status: "partial" }));

		expect(log.info).toHaveBeenCalledWith(
			{ idempotencyKey: "setup-key-1", status: "partial", organizationId: "org-1" },
			"Organization setup %s",
			"completed partially",
		);
	});

	it("should log failed compensations as errors", () => {
		const log = mockLogger();
		const observer = createLoggingObserver(log as never);

		observer.onRollbackStep?.({
			kind: "Tenant",
			id: "tenant-1",
			step: "TenantCreation",
			operation: "delete",
			success: false,
			attempts: 3,
			error: "connection reset",
		});

		expect(log.error).toHaveBeenCalledWith(
			{ kind: "Tenant", id: "tenant-1", error: "connection reset" },
			"Failed to compensate %s %s",
			"Tenant",
			"tenant-1",
		);
	});
});
