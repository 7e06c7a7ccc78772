import type { BatchStartEvent, BatchStats, ConnectionOutcome, StabilityEvents } from "@socket-ceiling/core";
import chalk from "chalk";
import type cliProgress from "cli-progress";
import type EventEmitter from "eventemitter3";
import {
	type ConnectionProgress,
	createConnectionProgressBar,
	startProgressBar,
	stopProgressBar,
	updateProgressBar,
} from "../utils/progress.js";

export interface ReporterOptions {
	threshold: number;
	/** Print one line per connection once its batch completes */
	verbose?: boolean;
	/** Show a live progress bar (off when stdout is not a TTY) */
	progress?: boolean;
}

function tag(batchIndex: number): string {
	return chalk.cyan(`[batch ${batchIndex}]`);
}

export function formatOutcome(outcome: ConnectionOutcome): string {
	if (outcome.succeeded) {
		const echo = outcome.responseTimeMs === undefined ? "" : `, echo in ${outcome.responseTimeMs.toFixed(2)}ms`;
		return `connection ${outcome.id}: ok${echo}`;
	}
	return `connection ${outcome.id}: ${outcome.errorKind ?? "failed"}${outcome.error ? ` (${outcome.error})` : ""}`;
}

export function formatBatchResult(stats: BatchStats, threshold: number): string {
	const stable = stats.successRate >= threshold;
	const verdict = stable ? chalk.green("✓ stable") : chalk.red("✗ unstable");
	const avg = stats.responseTime ? `, avg echo ${stats.responseTime.avg.toFixed(2)}ms` : "";
	return `${stats.succeeded}/${stats.attempted} succeeded (${stats.successRate.toFixed(1)}%) ${verdict}${avg}`;
}

/**
 * Log run progress from engine events. Returns a function that detaches every listener.
 */
export function attachReporter(events: EventEmitter<StabilityEvents>, options: ReporterOptions): () => void {
	const { threshold, verbose = false, progress = false } = options;
	let bar: cliProgress.SingleBar | null = null;
	let counts: ConnectionProgress = { succeeded: 0, failed: 0 };

	const onBatchStart = (info: BatchStartEvent) => {
		const carried = info.carriedOver > 0 ? ` (${info.carriedOver} carried over)` : "";
		console.log(`${tag(info.batchIndex)} Target ${chalk.bold(info.requestedCount)} connection(s): opening ${info.toOpen}${carried}`);
		counts = { succeeded: 0, failed: 0 };
		if (progress && info.toOpen > 0) {
			bar = createConnectionProgressBar(`[batch ${info.batchIndex}]`);
			startProgressBar(bar, info.toOpen);
		}
	};

	const onSettled = (outcome: ConnectionOutcome) => {
		if (outcome.succeeded) {
			counts.succeeded++;
		} else {
			counts.failed++;
		}
		if (bar) updateProgressBar(bar, counts);
	};

	const onOutcome = (outcome: ConnectionOutcome) => {
		if (!verbose) return;
		const line = `  ${formatOutcome(outcome)}`;
		console.log(outcome.succeeded ? chalk.dim(line) : chalk.red(line));
	};

	const onBatchComplete = (stats: BatchStats) => {
		if (bar) {
			stopProgressBar(bar);
			bar = null;
		}
		console.log(`${tag(stats.batchIndex)} ${formatBatchResult(stats, threshold)}`);

		for (const [kind, count] of Object.entries(stats.errors)) {
			console.log(chalk.red(`  ${count}x ${kind}`));
		}
		console.log("");
	};

	const onRunComplete = () => {
		// A cancelled or failed batch never reaches batch:complete
		if (bar) {
			stopProgressBar(bar);
			bar = null;
		}
	};

	events.on("batch:start", onBatchStart);
	events.on("connection:settled", onSettled);
	events.on("connection:outcome", onOutcome);
	events.on("batch:complete", onBatchComplete);
	events.on("run:complete", onRunComplete);

	return () => {
		events.off("batch:start", onBatchStart);
		events.off("connection:settled", onSettled);
		events.off("connection:outcome", onOutcome);
		events.off("batch:complete", onBatchComplete);
		events.off("run:complete", onRunComplete);
	};
}
