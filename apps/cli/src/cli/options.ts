import * as fs from "node:fs";
import type { RunConfigInput, StoppedReason } from "@socket-ceiling/core";
import { InvalidArgumentError } from "commander";

export interface RunCliOptions {
	config?: string;
	host?: string;
	port?: number;
	protocol?: "ws" | "wss";
	path?: string;
	start?: number;
	max?: number;
	increment?: number;
	duration?: number;
	delay?: number;
	threshold?: number;
	cumulative?: boolean;
	verbose?: boolean;
	connectTimeout?: number;
	responseTimeout?: number;
	closeGrace?: number;
	stopPolicy?: "first-breach" | "full-scan";
	insecure?: boolean;
	ca?: string;
	output?: string;
	progress?: boolean;
}

export function parseInteger(value: string): number {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isInteger(parsed)) {
		throw new InvalidArgumentError("Not an integer.");
	}
	return parsed;
}

export function parseNumber(value: string): number {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isFinite(parsed)) {
		throw new InvalidArgumentError("Not a number.");
	}
	return parsed;
}

/**
 * Map parsed flags onto run config fields. Flags the user did not pass stay undefined.
 */
export function cliOptionsToOverrides(cli: RunCliOptions, readFile: (path: string) => string = readPem): Partial<RunConfigInput> {
	return {
		host: cli.host,
		port: cli.port,
		protocol: cli.protocol,
		path: cli.path,
		startCount: cli.start,
		maxCount: cli.max,
		increment: cli.increment,
		batchDurationSec: cli.duration,
		connectionDelaySec: cli.delay,
		stabilityThreshold: cli.threshold,
		cumulative: cli.cumulative,
		verbose: cli.verbose,
		connectTimeoutSec: cli.connectTimeout,
		responseTimeoutSec: cli.responseTimeout,
		closeGraceSec: cli.closeGrace,
		stopPolicy: cli.stopPolicy,
		insecure: cli.insecure,
		ca: cli.ca === undefined ? undefined : readFile(cli.ca),
	};
}

function readPem(filePath: string): string {
	return fs.readFileSync(filePath, "utf-8");
}

export function exitCodeFor(reason: StoppedReason | undefined): number {
	switch (reason) {
		case "reached_max":
		case "unstable":
			return 0;
		case "cancelled":
			return 130;
		default:
			return 1;
	}
}
