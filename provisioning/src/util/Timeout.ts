/** Wraps a promise with a timeout. Rejects if the promise doesn't resolve within the specified time. */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	onTimeout: string | (() => Error) = "Operation timed out",
): Promise<T> {
	let timeoutId: ReturnType<typeof setTimeout>;

	const timeoutPromise = new Promise<T>((_resolve, reject) => {
		timeoutId = setTimeout(
			() => reject(typeof onTimeout === "string" ? new Error(onTimeout) : onTimeout()),
			timeoutMs,
		);
	});

	return Promise.race([promise, timeoutPromise]).finally(() => {
		clearTimeout(timeoutId);
	});
}

/** The reason an aborted signal carries, as an Error. */
export function abortReason(signal: AbortSignal): Error {
	return signal.reason instanceof Error ? signal.reason : new Error("The operation was aborted");
}

/**
 * Resolves after `ms` milliseconds. Rejects immediately with the abort reason when the signal fires,
 * or straight away if it already has.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}
		const onAbort = () => {
			clearTimeout(timeoutId);
			reject(signal ? abortReason(signal) : new Error("The operation was aborted"));
		};
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
