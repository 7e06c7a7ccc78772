import * as fs from "node:fs";
import * as path from "node:path";
import { buildTargetUrl, type RunConfig, type RunSummary } from "@socket-ceiling/core";
import chalk from "chalk";
import type { RunMetadata } from "../utils/metadata.js";
import type { RunResults } from "./types.js";

export function buildRunResults(config: RunConfig, summary: RunSummary, metadata: RunMetadata): RunResults {
	const { ca, ...rest } = config;
	return {
		timestamp: summary.finishedAt ?? new Date().toISOString(),
		target: buildTargetUrl(config),
		config: { ...rest, ca: ca !== undefined },
		metadata,
		summary,
	};
}

/**
 * Write run results to a JSON file, creating the directory if needed.
 */
export function writeResults(outputPath: string, results: RunResults): void {
	const dir = path.dirname(outputPath);
	if (dir && !fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}
	fs.writeFileSync(outputPath, JSON.stringify(results, null, 2));
	console.log(`${chalk.cyan("[output]")} Results written to ${outputPath}`);
}
