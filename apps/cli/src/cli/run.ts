#!/usr/bin/env tsx
import { ConfigError, type RunConfig, StabilityEngine } from "@socket-ceiling/core";
import chalk from "chalk";
import { Command, Option } from "commander";
import { loadSettings, mergeRunConfig } from "../config/settings.js";
import { printResults, printRunHeader } from "../output/formatter.js";
import { buildRunResults, writeResults } from "../output/writer.js";
import { attachReporter } from "../reporter/index.js";
import { collectMetadata } from "../utils/metadata.js";
import { cliOptionsToOverrides, exitCodeFor, parseInteger, parseNumber, type RunCliOptions } from "./options.js";

function resolveConfig(cli: RunCliOptions): RunConfig {
	const settings = loadSettings({ configPath: cli.config });
	if (settings.source) {
		console.log(`${chalk.cyan("[config]")} Loaded settings from ${chalk.dim(settings.source)}`);
	}
	return mergeRunConfig(settings.input, cliOptionsToOverrides(cli));
}

async function run(cli: RunCliOptions): Promise<number> {
	let config: RunConfig;
	try {
		config = resolveConfig(cli);
	} catch (error) {
		const message = error instanceof ConfigError ? error.message : `Cannot load settings: ${String(error)}`;
		console.error(chalk.red(`[config] ${message}`));
		return 1;
	}

	const metadata = collectMetadata();
	printRunHeader(config, metadata.system, metadata.runnerType);

	const engine = new StabilityEngine(config);
	const detach = attachReporter(engine, {
		threshold: config.stabilityThreshold,
		verbose: config.verbose,
		progress: cli.progress !== false && process.stdout.isTTY === true,
	});

	const controller = new AbortController();
	const onSignal = (signal: NodeJS.Signals) => {
		if (controller.signal.aborted) return;
		console.log("");
		console.log(chalk.yellow(`[run] ${signal} received, closing connections...`));
		controller.abort();
	};
	process.on("SIGINT", onSignal);
	process.on("SIGTERM", onSignal);

	console.log(chalk.bold("Running batches..."));
	console.log("");

	const summary = await engine.run(controller.signal);

	process.off("SIGINT", onSignal);
	process.off("SIGTERM", onSignal);
	detach();

	printResults(summary, config);

	if (cli.output) {
		console.log("");
		writeResults(cli.output, buildRunResults(config, summary, metadata));
	}

	console.log("");
	const code = exitCodeFor(summary.stoppedReason);
	console.log(code === 0 ? chalk.green("✓ Done") : chalk.red(`✗ Finished with exit code ${code}`));
	return code;
}

const program = new Command();

program
	.name("socket-ceiling")
	.description("Find how many simultaneous WebSocket connections a server sustains")
	.version("0.1.0")
	.option("--config <path>", "Settings file (JSON); defaults to $SOCKET_CEILING_CONFIG, then config/settings.json")
	.option("--host <host>", "Server hostname")
	.option("--port <number>", "Server port", parseInteger)
	.addOption(new Option("--protocol <protocol>", "WebSocket protocol").choices(["ws", "wss"]))
	.option("--path <path>", "Endpoint path, starting with /")
	.option("--start <number>", "Connections in the first batch", parseInteger)
	.option("--max <number>", "Largest batch to try", parseInteger)
	.option("--increment <number>", "Connections added per batch", parseInteger)
	.option("--duration <seconds>", "How long each batch is held open", parseNumber)
	.option("--delay <seconds>", "Delay between starting connections within a batch", parseNumber)
	.option("--threshold <percent>", "Success rate a batch needs to count as stable", parseNumber)
	.option("--cumulative", "Keep connections open across batches and only open the difference")
	.option("--no-cumulative", "Open every batch from scratch")
	.option("--verbose", "Print one line per connection")
	.option("--connect-timeout <seconds>", "Handshake timeout per connection", parseNumber)
	.option("--response-timeout <seconds>", "How long to wait for the echo", parseNumber)
	.option("--close-grace <seconds>", "How long a close may take before the connection is dropped", parseNumber)
	.addOption(new Option("--stop-policy <policy>", "What to do after an unstable batch").choices(["first-breach", "full-scan"]))
	.option("--insecure", "Accept self-signed or otherwise untrusted certificates (wss)")
	.option("--ca <file>", "Extra PEM trust anchor (wss)")
	.option("--output <path>", "Path to write JSON results")
	.option("--no-progress", "Disable the progress bar")
	.action(async (cli: RunCliOptions) => {
		process.exitCode = await run(cli);
	});

await program.parseAsync();
