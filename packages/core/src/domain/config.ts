import { z } from "zod";
import { ConfigError, ErrorCode } from "./errors";

/**
 * What the engine does after the first batch that misses the threshold.
 * - first-breach: stop immediately (assumes stability only degrades with load)
 * - full-scan: keep probing up to maxCount
 */
export type StopPolicy = "first-breach" | "full-scan";

const RunConfigSchema = z
	.object({
		host: z.string().min(1),
		port: z.number().int().min(1).max(65535),
		protocol: z.enum(["ws", "wss"]).default("ws"),
		path: z.string().startsWith("/").default("/"),
		startCount: z.number().int().min(1).default(1),
		maxCount: z.number().int().min(1).default(10),
		increment: z.number().int().min(1).default(1),
		batchDurationSec: z.number().min(0).default(5),
		connectionDelaySec: z.number().min(0).default(0),
		stabilityThreshold: z.number().min(0).max(100).default(90),
		cumulative: z.boolean().default(false),
		verbose: z.boolean().default(false),
		connectTimeoutSec: z.number().positive().default(10),
		responseTimeoutSec: z.number().positive().default(3),
		closeGraceSec: z.number().min(0).default(2),
		stopPolicy: z.enum(["first-breach", "full-scan"]).default("first-breach"),
		insecure: z.boolean().default(false),
		ca: z.string().optional(),
	})
	.refine((config) => config.startCount <= config.maxCount, {
		message: "startCount must not exceed maxCount",
		path: ["startCount"],
	});

/**
 * Resolved, validated settings for one run. Frozen once created.
 */
export type RunConfig = Readonly<z.output<typeof RunConfigSchema>>;

/**
 * Loosely-typed settings accepted by {@link parseRunConfig}; omitted fields take their defaults.
 */
export type RunConfigInput = z.input<typeof RunConfigSchema>;

/**
 * Validate raw settings and produce an immutable RunConfig.
 * Throws a ConfigError listing every offending field.
 */
export function parseRunConfig(input: unknown): RunConfig {
	const parsed = RunConfigSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
		throw new ConfigError(ErrorCode.INVALID_CONFIG, `Invalid run configuration: ${details}`);
	}
	return Object.freeze(parsed.data);
}

export function buildTargetUrl(config: Pick<RunConfig, "protocol" | "host" | "port" | "path">): string {
	return `${config.protocol}://${config.host}:${config.port}${config.path}`;
}
