import { type BatchStats, buildTargetUrl, calculatePacingRate, type RunConfig, type RunSummary, type StoppedReason } from "@socket-ceiling/core";
import chalk from "chalk";
import type { RunnerType, SystemInfo } from "../utils/metadata.js";

const RULE = "─".repeat(80);

export function formatRate(successRate: number, threshold: number): string {
	return `${successRate.toFixed(1)}% ${successRate >= threshold ? "✓" : "✗"}`;
}

export function formatTableHeader(): string {
	return `${"Batch".padEnd(7)}${"Target".padEnd(8)}${"Opened".padEnd(8)}${"OK".padEnd(6)}${"Rate".padEnd(9)}${"Avg".padEnd(10)}${"Min/Max".padEnd(16)}Pool`;
}

/**
 * One summary table row. Response times are "-" when no connection succeeded.
 */
export function formatBatchRow(batch: BatchStats, threshold: number): string {
	const { responseTime } = batch;
	const avg = responseTime ? `${responseTime.avg.toFixed(2)}ms` : "-";
	const range = responseTime ? `${responseTime.min.toFixed(2)}/${responseTime.max.toFixed(2)}` : "-";
	return [
		String(batch.batchIndex).padEnd(7),
		String(batch.requestedCount).padEnd(8),
		String(batch.attempted).padEnd(8),
		String(batch.succeeded).padEnd(6),
		formatRate(batch.successRate, threshold).padEnd(9),
		avg.padEnd(10),
		range.padEnd(16),
		String(batch.poolSize),
	].join("");
}

export function describeStopReason(reason: StoppedReason | undefined, error?: string): string {
	switch (reason) {
		case "reached_max":
			return "Reached the maximum connection count";
		case "unstable":
			return "Stopped at the first batch below the threshold";
		case "cancelled":
			return "Cancelled before the plan finished";
		case "error":
			return `Stopped on error: ${error ?? "unknown error"}`;
		default:
			return "Still running";
	}
}

/**
 * Plain-text capacity verdict: where the ceiling lies, if the run found one.
 */
export function describeVerdict(summary: RunSummary, increment: number): string[] {
	const { batches, threshold, maxStableCount } = summary;
	if (batches.length === 0) {
		return ["No batches completed."];
	}

	const unstable = batches.filter((b) => b.successRate < threshold);
	const stable = batches.filter((b) => b.successRate >= threshold && b.requestedCount === maxStableCount);
	const maxStable = stable[stable.length - 1];

	if (unstable.length === 0) {
		const highest = Math.max(...batches.map((b) => b.requestedCount));
		return [`All batches were stable up to ${highest} connections.`, "Raise the maximum count to find the limit."];
	}

	if (maxStable === undefined) {
		return [`No batch was stable. The target may not sustain even ${batches[0].requestedCount} connections.`];
	}

	const lines = [
		`Maximum stable: ${maxStable.requestedCount} connections (batch ${maxStable.batchIndex}, ${maxStable.successRate.toFixed(1)}% success)`,
	];

	const below = unstable.filter((b) => b.requestedCount < maxStable.requestedCount);
	if (below.length > 0) {
		lines.push(`Unstable below that: ${below.map((b) => `${b.requestedCount} (batch ${b.batchIndex})`).join(", ")}. Results were not monotonic.`);
	}

	const above = unstable.filter((b) => b.requestedCount > maxStable.requestedCount);
	if (above.length === 0) {
		lines.push("Raise the maximum count to find the limit.");
		return lines;
	}

	const minUnstable = above.reduce((lowest, b) => (b.requestedCount < lowest.requestedCount ? b : lowest));
	lines.push(`Minimum unstable: ${minUnstable.requestedCount} connections (batch ${minUnstable.batchIndex}, ${minUnstable.successRate.toFixed(1)}% success)`);

	if (minUnstable.requestedCount - maxStable.requestedCount <= increment) {
		lines.push(`The target appears to handle around ${maxStable.requestedCount} simultaneous connections.`);
	} else {
		lines.push(
			`The ceiling lies between ${maxStable.requestedCount} and ${minUnstable.requestedCount} connections.`,
			"Rerun that range with a smaller increment for a precise figure.",
		);
	}
	return lines;
}

/**
 * Print the run plan and host context before the first batch.
 */
export function printRunHeader(config: RunConfig, system: SystemInfo, runnerType: RunnerType): void {
	console.log(chalk.bold.blue("╔══════════════════════════════════════╗"));
	console.log(chalk.bold.blue("║     WEBSOCKET CAPACITY TEST          ║"));
	console.log(chalk.bold.blue("╚══════════════════════════════════════╝"));
	console.log("");
	console.log(chalk.bold("Configuration:"));
	console.log(`  Target:      ${chalk.dim(buildTargetUrl(config))}`);
	console.log(`  Plan:        ${config.startCount} → ${config.maxCount} connections, +${config.increment} per batch`);
	console.log(`  Hold:        ${config.batchDurationSec}s per batch`);
	console.log(`  Threshold:   ${config.stabilityThreshold}% (${config.stopPolicy})`);
	if (config.cumulative) {
		console.log(`  Mode:        ${chalk.cyan("cumulative")} (connections stay open across batches)`);
	}
	if (config.connectionDelaySec > 0) {
		const rate = calculatePacingRate(config.connectionDelaySec * 1000);
		console.log(`  Pacing:      ${config.connectionDelaySec}s between connections (${rate} conn/sec)`);
	}
	if (config.protocol === "wss" && config.insecure) {
		console.log(chalk.yellow("  TLS:         certificate checks disabled"));
	}
	console.log("");

	console.log(chalk.bold("System:"));
	console.log(`  OS:          ${system.os}`);
	console.log(`  Hostname:    ${system.hostname}`);
	console.log(`  CPUs:        ${system.cpuCount} (load ${system.loadAverage.toFixed(2)})`);
	console.log(`  Memory:      ${system.memoryUsage.toFixed(1)}% used`);
	console.log(`  Runner:      ${runnerType}`);
	for (const nic of system.networkInterfaces) {
		console.log(`  ${nic.name}: ${nic.address} (${nic.netmask})`);
	}
	console.log("");
}

/**
 * Print the final results: per-batch table, totals and verdict.
 */
export function printResults(summary: RunSummary, config: RunConfig): void {
	const { totals } = summary;

	console.log(chalk.gray(RULE));
	console.log(chalk.bold("         FINAL RESULTS"));
	console.log(chalk.gray(RULE));
	console.log(`Target:      ${summary.target}`);
	console.log(`Duration:    ${((summary.durationMs ?? 0) / 1000).toFixed(2)}s`);
	console.log(`Batches:     ${summary.batches.length}`);
	console.log("");

	console.log(chalk.bold(formatTableHeader()));
	for (const batch of summary.batches) {
		const row = formatBatchRow(batch, summary.threshold);
		console.log(batch.successRate >= summary.threshold ? row : chalk.red(row));
	}
	console.log(chalk.gray(RULE));

	const rateColor = totals.successRate >= summary.threshold ? chalk.green : chalk.red;
	console.log(`Totals:      ${totals.succeeded}/${totals.attempted} succeeded (${rateColor(`${totals.successRate.toFixed(1)}%`)})`);
	console.log(`Stopped:     ${describeStopReason(summary.stoppedReason, summary.error)}`);
	console.log("");

	const stableLabel = summary.maxStableCount === null ? chalk.red("none") : chalk.green(String(summary.maxStableCount));
	console.log(`${chalk.bold("Max stable count:")} ${stableLabel}`);
	for (const line of describeVerdict(summary, config.increment)) {
		console.log(`  ${line}`);
	}
}
