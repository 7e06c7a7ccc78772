import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, ErrorCode, parseRunConfig, type RunConfig, type RunConfigInput } from "@socket-ceiling/core";
import chalk from "chalk";
import { z } from "zod";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/** Env var naming a settings file, checked after the --config flag. */
export const SETTINGS_ENV_VAR = "SOCKET_CEILING_CONFIG";

export const DEFAULT_SETTINGS_PATH = path.join(__dirname, "../../config/settings.json");

/**
 * Used when no settings file exists. Everything else falls back to the
 * run config's own defaults.
 */
export const BUILT_IN_SETTINGS: RunConfigInput = {
	host: "localhost",
	port: 7070,
};

/**
 * On-disk layout: a `server` section and a `test` section, snake_case keys.
 * Unknown keys (e.g. a `display` section) are ignored; value ranges are
 * checked later by parseRunConfig.
 */
const SettingsFileSchema = z.object({
	server: z
		.object({
			host: z.string().optional(),
			port: z.number().optional(),
			protocol: z.enum(["ws", "wss"]).optional(),
			path: z.string().optional(),
		})
		.default({}),
	test: z
		.object({
			start_connections: z.number().optional(),
			max_connections: z.number().optional(),
			increment: z.number().optional(),
			batch_duration: z.number().optional(),
			connection_delay: z.number().optional(),
			stability_threshold: z.number().optional(),
			cumulative_mode: z.boolean().optional(),
			verbose_mode: z.boolean().optional(),
			connect_timeout: z.number().optional(),
			response_timeout: z.number().optional(),
			close_grace: z.number().optional(),
			stop_policy: z.enum(["first-breach", "full-scan"]).optional(),
		})
		.default({}),
});

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface SettingsLocation {
	path: string;
	/** Named by the user (flag or env var) rather than the default location */
	explicit: boolean;
}

export interface LoadedSettings {
	input: RunConfigInput;
	/** File the settings came from, or null for the built-in defaults */
	source: string | null;
}

/**
 * Drop keys whose value is undefined so they do not mask lower-priority values when spread.
 */
export function compact<T extends object>(record: T): Partial<T> {
	const result: Partial<T> = {};
	for (const key in record) {
		if (record[key] !== undefined) {
			result[key] = record[key];
		}
	}
	return result;
}

/**
 * Map the file layout onto run config fields.
 */
export function settingsFileToInput(file: SettingsFile): Partial<RunConfigInput> {
	const { server, test } = file;
	return compact({
		host: server.host,
		port: server.port,
		protocol: server.protocol,
		path: server.path,
		startCount: test.start_connections,
		maxCount: test.max_connections,
		increment: test.increment,
		batchDurationSec: test.batch_duration,
		connectionDelaySec: test.connection_delay,
		stabilityThreshold: test.stability_threshold,
		cumulative: test.cumulative_mode,
		verbose: test.verbose_mode,
		connectTimeoutSec: test.connect_timeout,
		responseTimeoutSec: test.response_timeout,
		closeGraceSec: test.close_grace,
		stopPolicy: test.stop_policy,
	});
}

/**
 * Work out which settings file to read.
 * Checks in order:
 * 1. The --config flag
 * 2. SOCKET_CEILING_CONFIG
 * 3. config/settings.json in the cli app directory
 */
export function resolveSettingsPath(
	flag?: string,
	env: NodeJS.ProcessEnv = process.env,
	defaultPath: string = DEFAULT_SETTINGS_PATH,
): SettingsLocation {
	if (flag) {
		return { path: path.resolve(flag), explicit: true };
	}
	const fromEnv = env[SETTINGS_ENV_VAR];
	if (fromEnv) {
		return { path: path.resolve(fromEnv), explicit: true };
	}
	return { path: defaultPath, explicit: false };
}

/**
 * Read and shape-check a settings file. Throws a ConfigError (SETTINGS_FILE_INVALID)
 * when it cannot be read, is not JSON, or has values of the wrong type.
 */
export function readSettingsFile(filePath: string): Partial<RunConfigInput> {
	let raw: unknown;
	try {
		raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ConfigError(ErrorCode.SETTINGS_FILE_INVALID, `Cannot read settings file ${filePath}: ${reason}`);
	}

	const parsed = SettingsFileSchema.safeParse(raw);
	if (!parsed.success) {
		const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
		throw new ConfigError(ErrorCode.SETTINGS_FILE_INVALID, `Invalid settings file ${filePath}: ${details}`);
	}
	return settingsFileToInput(parsed.data);
}

/**
 * Load settings for a run. A missing default file means built-in defaults
 * (with a warning); a missing or broken file the user asked for is an error.
 */
export function loadSettings(options: { configPath?: string; env?: NodeJS.ProcessEnv; defaultPath?: string } = {}): LoadedSettings {
	const location = resolveSettingsPath(options.configPath, options.env, options.defaultPath);

	if (!location.explicit && !fs.existsSync(location.path)) {
		console.warn(chalk.yellow(`[config] No settings file at ${location.path}, using built-in defaults`));
		return { input: { ...BUILT_IN_SETTINGS }, source: null };
	}

	const fromFile = readSettingsFile(location.path);
	return { input: { ...BUILT_IN_SETTINGS, ...fromFile }, source: location.path };
}

/**
 * Apply command-line overrides on top of file settings and validate the result.
 */
export function mergeRunConfig(settings: RunConfigInput, overrides: Partial<RunConfigInput>): RunConfig {
	return parseRunConfig({ ...settings, ...compact(overrides) });
}
