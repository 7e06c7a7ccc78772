import EventEmitter from "eventemitter3";
import { BatchRunner, type HostResolver } from "../batch/runner";
import type { SocketFactory } from "../connection/socket";
import { buildTargetUrl, type RunConfig } from "../domain/config";
import { ErrorCode, StabilityError } from "../domain/errors";
import type { StabilityEvents } from "../domain/events";
import type { RunSummary, StoppedReason } from "../domain/stats";
import { createRunSummary, finalizeRunSummary, foldBatchStats, isStable } from "../stats";

/**
 * Options for creating a StabilityEngine.
 */
export type StabilityEngineOptions = {
	/** Mainly for testing or non-Node environments. */
	socketFactory?: SocketFactory;
	/** Host reachability check run before every batch. */
	resolver?: HostResolver;
};

/**
 * Drives batches of increasing size against the target until one falls below
 * the stability threshold, the maximum count is reached, or the run cannot go on.
 *
 * `run()` never throws: every stop, including errors and cancellation, is
 * reported through `stoppedReason` on the returned summary.
 */
export class StabilityEngine extends EventEmitter<StabilityEvents> {
	private readonly config: RunConfig;
	private readonly options: StabilityEngineOptions;

	constructor(config: RunConfig, options: StabilityEngineOptions = {}) {
		super();
		this.config = config;
		this.options = options;
	}

	async run(signal?: AbortSignal): Promise<RunSummary> {
		const { config } = this;
		const target = buildTargetUrl(config);
		const runner = new BatchRunner(config, { ...this.options, events: this });

		let summary = createRunSummary({ target, threshold: config.stabilityThreshold });
		let stoppedReason: StoppedReason = "reached_max";
		let error: string | undefined;

		this.emit("run:start", { target, config });

		try {
			let batchIndex = 1;
			for (let targetCount = config.startCount; targetCount <= config.maxCount; targetCount += config.increment) {
				const stats = await runner.runBatch(batchIndex, targetCount, signal);
				summary = foldBatchStats(summary, stats);
				this.emit("batch:complete", stats);

				if (!isStable(stats, config.stabilityThreshold) && config.stopPolicy === "first-breach") {
					stoppedReason = "unstable";
					break;
				}
				batchIndex++;
			}
		} catch (err) {
			if (err instanceof StabilityError && err.code === ErrorCode.CANCELLED) {
				stoppedReason = "cancelled";
			} else {
				stoppedReason = "error";
			}
			error = err instanceof Error ? err.message : String(err);
		} finally {
			await runner.drain();
		}

		const finalSummary = finalizeRunSummary(summary, stoppedReason, { error });
		this.emit("run:complete", finalSummary);
		return finalSummary;
	}
}
