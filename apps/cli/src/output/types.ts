import type { RunConfig, RunSummary } from "@socket-ceiling/core";
import type { RunMetadata } from "../utils/metadata.js";

/**
 * JSON document written by --output.
 */
export interface RunResults {
	timestamp: string;
	target: string;
	/** Effective settings; the trust anchor is reduced to a flag */
	config: Omit<RunConfig, "ca"> & { ca: boolean };
	metadata: RunMetadata;
	summary: RunSummary;
}
