import { sleep } from "./timing";

/**
 * Options for launching tasks on a fixed timer.
 */
export interface PacingOptions<T> {
	/** Total number of tasks to launch */
	count: number;
	/** Fixed delay between two launches, in ms (0 = all at once) */
	delayMs: number;
	/** Starts one task (receives 0-based index) and returns its handle */
	onStart: (index: number) => T;
	signal?: AbortSignal;
}

/**
 * Launch tasks one `delayMs` apart without waiting for earlier ones to finish.
 *
 * Resolves with every handle once the last task has been launched. Rejects
 * with a CANCELLED RunError if `signal` aborts between two launches.
 */
export async function launchStaggered<T>(options: PacingOptions<T>): Promise<T[]> {
	const { count, delayMs, onStart, signal } = options;
	const launched: T[] = [];

	for (let i = 0; i < count; i++) {
		launched.push(onStart(i));

		// Pace launches (except after the last one)
		if (i < count - 1 && delayMs > 0) {
			await sleep(delayMs, signal);
		}
	}

	return launched;
}

/**
 * Launch rate for display (tasks per second).
 */
export function calculatePacingRate(delayMs: number): string {
	return delayMs > 0 ? (1000 / delayMs).toFixed(1) : "max";
}
