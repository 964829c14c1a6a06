import type { NormalizedSetupRequest } from "./SetupRequest";
import { createHash } from "node:crypto";
import { canonicalJson } from "checkout-common";

export const DERIVED_KEY_PREFIX = "org_setup_";

/**
 * Stable serialization of the fields that identify a setup. The password is left out so that
 * neither the key nor the stored hash depends on it.
 */
export function canonicalRequest(request: NormalizedSetupRequest): string {
	return canonicalJson({
		name: request.name,
		subdomain: request.subdomain,
		customDomain: request.customDomain,
		adminName: request.adminName,
		adminEmail: request.adminEmail.toLowerCase(),
		adminRole: request.adminRole,
		settings: request.settings,
	});
}

/**
 * Hash stored beside an idempotency key to detect reuse of the key with different input.
 */
export function computeRequestHash(request: NormalizedSetupRequest): string {
	return createHash("sha256").update(canonicalRequest(request)).digest("hex");
}

/**
 * Key for callers that do not supply one: identical requests within the same time window share a key.
 *
 * @param now epoch milliseconds
 * @param windowMs width of the time bucket
 */
export function deriveIdempotencyKey(request: NormalizedSetupRequest, now: number, windowMs: number): string {
	const bucket = Math.floor(now / windowMs);
	const digest = createHash("sha256").update(`${canonicalRequest(request)}|${bucket}`).digest("hex");
	return `${DERIVED_KEY_PREFIX}${digest.slice(0, 40)}`;
}
