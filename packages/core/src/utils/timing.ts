import { ErrorCode, RunError } from "../domain/errors";

/**
 * Wait for `ms` milliseconds. Rejects with a CANCELLED RunError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (signal?.aborted) {
		return Promise.reject(new RunError(ErrorCode.CANCELLED, "Run cancelled"));
	}
	return new Promise((resolve, reject) => {
		const onAbort = () => {
			clearTimeout(timer);
			reject(new RunError(ErrorCode.CANCELLED, "Run cancelled"));
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, Math.max(0, ms));
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export function throwIfCancelled(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new RunError(ErrorCode.CANCELLED, "Run cancelled");
	}
}

export function secondsToMs(seconds: number): number {
	return Math.round(seconds * 1000);
}
