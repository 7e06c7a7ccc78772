import { lookup } from "node:dns/promises";
import { setMaxListeners } from "node:events";
import type EventEmitter from "eventemitter3";
import type { SocketFactory } from "../connection/socket";
import { ConnectionWorker } from "../connection/worker";
import { buildTargetUrl, type RunConfig } from "../domain/config";
import { ErrorCode, RunError, StabilityError } from "../domain/errors";
import type { StabilityEvents } from "../domain/events";
import type { BatchStats } from "../domain/stats";
import { computeBatchStats } from "../stats";
import { launchStaggered } from "../utils/pacing";
import { secondsToMs, sleep, throwIfCancelled } from "../utils/timing";
import { ConnectionPool } from "./pool";

/**
 * Checks that the target host can be resolved at all. Rejects when it cannot.
 */
export type HostResolver = (host: string) => Promise<void>;

export const dnsResolver: HostResolver = async (host) => {
	await lookup(host);
};

export interface BatchRunnerOptions {
	/** Mainly for testing; defaults to real `ws` sockets */
	socketFactory?: SocketFactory;
	/** Defaults to a DNS lookup */
	resolver?: HostResolver;
	/** Receives connection-level events */
	events?: EventEmitter<StabilityEvents>;
}

/**
 * Runs one batch at a time against the target and owns the live connection pool.
 *
 * Per batch:
 * 1. Make sure the host resolves (otherwise the run cannot proceed)
 * 2. Launch the connections needed to reach the target count, one delay apart
 * 3. Hold for the batch duration, counted from the last launch
 * 4. Wait for every probe to settle, then close (or, in cumulative mode, keep) the connections
 * 5. Compute stats over the connections this batch opened
 */
export class BatchRunner {
	private readonly config: RunConfig;
	private readonly url: string;
	private readonly pool = new ConnectionPool();
	private readonly resolver: HostResolver;
	private readonly socketFactory: SocketFactory | undefined;
	private readonly events: EventEmitter<StabilityEvents> | undefined;
	private nextConnectionId = 1;

	constructor(config: RunConfig, options: BatchRunnerOptions = {}) {
		this.config = config;
		this.url = buildTargetUrl(config);
		this.resolver = options.resolver ?? dnsResolver;
		this.socketFactory = options.socketFactory;
		this.events = options.events;
	}

	/** Live connections currently held between batches. */
	get poolSize(): number {
		return this.pool.size;
	}

	/**
	 * Run one batch up to `targetCount` connections.
	 *
	 * Throws a RunError when the target cannot be resolved (TARGET_UNRESOLVABLE)
	 * or the run is cancelled (CANCELLED); every connection is closed first in the latter case.
	 */
	async runBatch(batchIndex: number, targetCount: number, signal?: AbortSignal): Promise<BatchStats> {
		const { config } = this;
		const startedAt = performance.now();
		const closeGraceMs = secondsToMs(config.closeGraceSec);

		throwIfCancelled(signal);
		// Every worker, pooled ones included, listens on the run's signal
		if (signal) setMaxListeners(0, signal);
		await this.checkTarget();

		if (config.cumulative) {
			this.pool.prune();
		} else {
			await this.pool.closeAll(closeGraceMs);
		}

		const carriedOver = this.pool.size;
		const toOpen = config.cumulative ? Math.max(0, targetCount - carriedOver) : targetCount;
		this.events?.emit("batch:start", { batchIndex, requestedCount: targetCount, toOpen, carriedOver });

		const workers: ConnectionWorker[] = [];
		const probes: Promise<unknown>[] = [];

		try {
			await launchStaggered({
				count: toOpen,
				delayMs: secondsToMs(config.connectionDelaySec),
				signal,
				onStart: () => {
					const worker = this.createWorker(batchIndex, signal);
					workers.push(worker);
					probes.push(worker.start().then(() => this.events?.emit("connection:settled", worker.outcome())));
					return worker;
				},
			});

			await sleep(secondsToMs(config.batchDurationSec), signal);
			await Promise.all(probes);
			throwIfCancelled(signal);
		} catch (error) {
			await Promise.all(workers.map((worker) => worker.close(closeGraceMs)));
			await this.pool.closeAll(closeGraceMs);
			throw error;
		}

		if (config.cumulative) {
			for (const worker of workers) {
				if (worker.isOpen()) {
					this.pool.add(worker);
				} else {
					await worker.close(closeGraceMs);
				}
			}
		} else {
			await Promise.all(workers.map((worker) => worker.close(closeGraceMs)));
		}

		const outcomes = workers.map((worker) => worker.outcome());
		for (const outcome of outcomes) {
			this.events?.emit("connection:outcome", outcome);
		}

		return computeBatchStats(outcomes, {
			batchIndex,
			requestedCount: targetCount,
			carriedOver,
			poolSize: this.pool.size,
			durationMs: performance.now() - startedAt,
		});
	}

	/**
	 * Close every pooled connection. Called when the run ends.
	 */
	async drain(): Promise<void> {
		await this.pool.closeAll(secondsToMs(this.config.closeGraceSec));
	}

	private createWorker(batchIndex: number, signal: AbortSignal | undefined): ConnectionWorker {
		const { config } = this;
		return new ConnectionWorker({
			id: this.nextConnectionId++,
			batchIndex,
			url: this.url,
			connectTimeoutMs: secondsToMs(config.connectTimeoutSec),
			responseTimeoutMs: secondsToMs(config.responseTimeoutSec),
			closeGraceMs: secondsToMs(config.closeGraceSec),
			tls: { insecure: config.insecure, ...(config.ca !== undefined ? { ca: config.ca } : {}) },
			signal,
			socketFactory: this.socketFactory,
		});
	}

	private async checkTarget(): Promise<void> {
		try {
			await this.resolver(this.config.host);
		} catch (error) {
			if (error instanceof StabilityError) throw error;
			const reason = error instanceof Error ? error.message : String(error);
			throw new RunError(ErrorCode.TARGET_UNRESOLVABLE, `Cannot resolve ${this.config.host}: ${reason}`);
		}
	}
}
