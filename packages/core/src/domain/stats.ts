import type { ErrorKind } from "./errors";

/**
 * Latency statistics for a set of measurements, in milliseconds.
 */
export interface LatencyStats {
	min: number;
	max: number;
	avg: number;
	p50: number;
	p95: number;
	p99: number;
}

/**
 * Statistics for one batch, built from the connections that batch opened.
 */
export interface BatchStats {
	/** 1-based batch number */
	batchIndex: number;
	/** Connection count the batch was asked to reach */
	requestedCount: number;
	attempted: number;
	succeeded: number;
	failed: number;
	/** succeeded / attempted * 100, or 0 when nothing was attempted */
	successRate: number;
	/** Probe round-trip times over succeeded connections; null when none succeeded */
	responseTime: LatencyStats | null;
	/** Failed connections per error kind */
	errors: Partial<Record<ErrorKind, number>>;
	/** Live connections carried in from earlier batches (cumulative mode) */
	carriedOver: number;
	/** Live pool size once the batch finished (always 0 outside cumulative mode) */
	poolSize: number;
	durationMs: number;
}

export type StoppedReason = "reached_max" | "unstable" | "error" | "cancelled";

export interface RunTotals {
	attempted: number;
	succeeded: number;
	failed: number;
	successRate: number;
}

/**
 * Accumulated result of a whole run.
 */
export interface RunSummary {
	runId: string;
	target: string;
	threshold: number;
	batches: BatchStats[];
	/** Sums over every batch, independent of cumulative connection mode */
	totals: RunTotals;
	/** Highest requested count whose batch met the threshold */
	maxStableCount: number | null;
	stoppedReason?: StoppedReason;
	/** Message of the error that stopped the run, if any */
	error?: string;
	startedAt: string;
	finishedAt?: string;
	durationMs?: number;
}
