import {
	type CompensationAction,
	type ResourceHandle,
	SETUP_STEPS,
	type SetupStep,
	STEP_RESOURCE_KINDS,
} from "./SetupTypes";

function compensationFor(step: SetupStep, id: string): CompensationAction {
	const encoded = encodeURIComponent(id);
	switch (step) {
		case "OrganizationCreation":
			return {
				operation: "delete",
				method: "DELETE",
				endpoint: `/organizations/${encoded}`,
				description: `Delete organization ${id}`,
			};
		case "TenantCreation":
			return { operation: "delete", method: "DELETE", endpoint: `/tenants/${encoded}`, description: `Delete tenant ${id}` };
		case "AdminUserCreation":
			return { operation: "delete", method: "DELETE", endpoint: `/users/${encoded}`, description: `Delete admin user ${id}` };
		case "ApiKeyGeneration":
			return {
				operation: "revoke",
				method: "POST",
				endpoint: `/api-keys/${encoded}/revoke`,
				description: `Revoke API key ${id}`,
			};
		case "DomainConfiguration":
			return {
				operation: "remove",
				method: "DELETE",
				endpoint: `/tenants/${encoded}/domain`,
				description: `Remove the domain of tenant ${id}`,
			};
	}
}

/**
 * Handle for a resource created at `step`. For the domain step `id` is the tenant ID.
 */
export function createResourceHandle(step: SetupStep, id: string, createdAt: string): ResourceHandle {
	return { kind: STEP_RESOURCE_KINDS[step], id, step, createdAt, compensation: compensationFor(step, id) };
}

/**
 * Resources created by one setup, in creation order. Owned by a single execution.
 */
export class ResourceRegistry {
	private readonly handles: Array<ResourceHandle> = [];

	/**
	 * @throws Error when the handle's step does not come after the last registered step
	 */
	register(handle: ResourceHandle): void {
		const last = this.handles.at(-1);
		if (last && SETUP_STEPS.indexOf(handle.step) <= SETUP_STEPS.indexOf(last.step)) {
			throw new Error(`Cannot register ${handle.step} after ${last.step}: resources must be registered in step order`);
		}
		this.handles.push({ ...handle, compensation: { ...handle.compensation } });
	}

	/**
	 * Frozen copy of the handles in creation order.
	 */
	snapshot(): ReadonlyArray<ResourceHandle> {
		return Object.freeze(
			this.handles.map(handle => Object.freeze({ ...handle, compensation: Object.freeze({ ...handle.compensation }) })),
		);
	}

	clear(): void {
		this.handles.length = 0;
	}

	get size(): number {
		return this.handles.length;
	}
}
