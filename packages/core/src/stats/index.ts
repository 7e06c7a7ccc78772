import { v4 as uuidv4 } from "uuid";
import type { ErrorKind } from "../domain/errors";
import type { ConnectionOutcome } from "../domain/outcome";
import type { BatchStats, LatencyStats, RunSummary, RunTotals, StoppedReason } from "../domain/stats";

/**
 * Calculate latency statistics from an array of timing measurements.
 * Returns null if the array is empty.
 */
export function calculateLatencyStats(samples: readonly number[]): LatencyStats | null {
	if (samples.length === 0) return null;
	const sorted = [...samples].sort((a, b) => a - b);
	// Sorted ascending, so min/max are the ends; no spread into Math.min/max (stack limits on huge arrays)
	return {
		min: sorted[0],
		max: sorted[sorted.length - 1],
		avg: sorted.reduce((a, b) => a + b, 0) / sorted.length,
		p50: sorted[Math.floor((sorted.length - 1) * 0.5)] ?? 0,
		p95: sorted[Math.floor((sorted.length - 1) * 0.95)] ?? 0,
		p99: sorted[Math.floor((sorted.length - 1) * 0.99)] ?? 0,
	};
}

export function percentage(part: number, whole: number): number {
	return whole > 0 ? (part / whole) * 100 : 0;
}

export interface BatchMeta {
	batchIndex: number;
	requestedCount: number;
	carriedOver?: number;
	poolSize?: number;
	durationMs?: number;
}

/**
 * Reduce the outcomes of the connections a batch opened into its statistics.
 * Pure: the same outcomes and meta always give the same result.
 */
export function computeBatchStats(outcomes: readonly ConnectionOutcome[], meta: BatchMeta): BatchStats {
	const succeeded = outcomes.filter((o) => o.succeeded);
	const errors: Partial<Record<ErrorKind, number>> = {};
	for (const outcome of outcomes) {
		if (outcome.succeeded) continue;
		const kind = outcome.errorKind ?? "connect_failed";
		errors[kind] = (errors[kind] ?? 0) + 1;
	}

	const latencies: number[] = [];
	for (const outcome of succeeded) {
		if (outcome.responseTimeMs !== undefined) latencies.push(outcome.responseTimeMs);
	}

	return {
		batchIndex: meta.batchIndex,
		requestedCount: meta.requestedCount,
		attempted: outcomes.length,
		succeeded: succeeded.length,
		failed: outcomes.length - succeeded.length,
		successRate: percentage(succeeded.length, outcomes.length),
		responseTime: calculateLatencyStats(latencies),
		errors,
		carriedOver: meta.carriedOver ?? 0,
		poolSize: meta.poolSize ?? 0,
		durationMs: meta.durationMs ?? 0,
	};
}

export function isStable(stats: Pick<BatchStats, "successRate">, threshold: number): boolean {
	return stats.successRate >= threshold;
}

/**
 * Start an empty summary for a run against `target`.
 */
export function createRunSummary(options: { target: string; threshold: number; runId?: string; startedAt?: Date }): RunSummary {
	return {
		runId: options.runId ?? uuidv4(),
		target: options.target,
		threshold: options.threshold,
		batches: [],
		totals: { attempted: 0, succeeded: 0, failed: 0, successRate: 0 },
		maxStableCount: null,
		startedAt: (options.startedAt ?? new Date()).toISOString(),
	};
}

/**
 * Fold one batch into the run summary. Returns a new summary; the input is left untouched.
 */
export function foldBatchStats(summary: RunSummary, stats: BatchStats): RunSummary {
	const attempted = summary.totals.attempted + stats.attempted;
	const succeeded = summary.totals.succeeded + stats.succeeded;
	const totals: RunTotals = {
		attempted,
		succeeded,
		failed: summary.totals.failed + stats.failed,
		successRate: percentage(succeeded, attempted),
	};

	let maxStableCount = summary.maxStableCount;
	if (isStable(stats, summary.threshold) && (maxStableCount === null || stats.requestedCount > maxStableCount)) {
		maxStableCount = stats.requestedCount;
	}

	return {
		...summary,
		batches: [...summary.batches, stats],
		totals,
		maxStableCount,
	};
}

/**
 * Stamp the terminal reason and timing onto a summary.
 */
export function finalizeRunSummary(
	summary: RunSummary,
	stoppedReason: StoppedReason,
	options: { error?: string; finishedAt?: Date } = {},
): RunSummary {
	const finishedAt = options.finishedAt ?? new Date();
	return {
		...summary,
		stoppedReason,
		...(options.error !== undefined ? { error: options.error } : {}),
		finishedAt: finishedAt.toISOString(),
		durationMs: finishedAt.getTime() - new Date(summary.startedAt).getTime(),
	};
}
