import { NetworkError, toApiError } from "./ApiError";
import type { ClientAuth } from "./Client";

async function transmit(url: string, init: RequestInit, action: string): Promise<Response> {
	try {
		return await fetch(url, init);
	} catch (error) {
		// Aborts belong to the caller, not the network.
		if (init.signal?.aborted) {
			throw error;
		}
		const reason = error instanceof Error ? error.message : String(error);
		throw new NetworkError(`Failed to ${action}: ${reason}`, error);
	}
}

/**
 * Sends a request and returns the response when it is ok.
 * Transport failures become {@link NetworkError}, everything else non-ok an ApiError.
 */
export async function send(auth: ClientAuth, url: string, init: RequestInit, action: string): Promise<Response> {
	const response = await transmit(url, init, action);
	auth.checkUnauthorized?.(response);
	if (!response.ok) {
		throw await toApiError(response, action);
	}
	return response;
}

/**
 * Like {@link send}, but a 404 yields `undefined`.
 */
export async function sendLookup(
	auth: ClientAuth,
	url: string,
	init: RequestInit,
	action: string,
): Promise<Response | undefined> {
	const response = await transmit(url, init, action);
	auth.checkUnauthorized?.(response);
	if (response.status === 404) {
		return;
	}
	if (!response.ok) {
		throw await toApiError(response, action);
	}
	return response;
}
