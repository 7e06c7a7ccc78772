#!/usr/bin/env tsx
import * as fs from "node:fs";
import { createEchoServer, type EchoServerOptions } from "@socket-ceiling/core";
import chalk from "chalk";
import { Command } from "commander";
import { parseInteger } from "./options.js";

interface EchoCliOptions {
	host: string;
	port: number;
	cert?: string;
	key?: string;
	maxConnections?: number;
	quiet?: boolean;
}

const program = new Command();

program
	.name("echo-server")
	.description("Start a WebSocket echo server to test against")
	.version("0.1.0")
	.option("--host <host>", "Interface to bind", "0.0.0.0")
	.option("--port <number>", "Port to listen on", parseInteger, 7070)
	.option("--cert <file>", "PEM certificate; serves wss together with --key")
	.option("--key <file>", "PEM private key")
	.option("--max-connections <number>", "Reject clients with HTTP 503 beyond this many", parseInteger)
	.option("--quiet", "Do not log every connect and disconnect")
	.action(async (cli: EchoCliOptions) => {
		if ((cli.cert === undefined) !== (cli.key === undefined)) {
			console.error(chalk.red("[echo-server] --cert and --key must be given together"));
			process.exitCode = 1;
			return;
		}

		const options: EchoServerOptions = {
			host: cli.host,
			port: cli.port,
			maxConnections: cli.maxConnections,
			logger: cli.quiet
				? undefined
				: {
						info: (message) => console.log(`${chalk.cyan("[echo-server]")} ${message}`),
						warn: (message) => console.log(`${chalk.yellow("[echo-server]")} ${message}`),
					},
		};
		if (cli.cert !== undefined && cli.key !== undefined) {
			options.tls = { cert: fs.readFileSync(cli.cert), key: fs.readFileSync(cli.key) };
		}

		const server = await createEchoServer(options);
		console.log(`${chalk.cyan("[echo-server]")} Listening on ${chalk.bold(server.url)}`);
		if (cli.maxConnections !== undefined) {
			console.log(`${chalk.cyan("[echo-server]")} Capacity: ${cli.maxConnections} connection(s)`);
		}

		const shutdown = async () => {
			console.log("");
			console.log(`${chalk.cyan("[echo-server]")} Shutting down (${server.connectionCount()} connected)...`);
			try {
				await server.close();
				process.exit(0);
			} catch (error) {
				console.error(chalk.red(`[echo-server] Shutdown failed: ${error instanceof Error ? error.message : String(error)}`));
				process.exit(1);
			}
		};
		process.once("SIGINT", () => void shutdown());
		process.once("SIGTERM", () => void shutdown());
	});

await program.parseAsync();
