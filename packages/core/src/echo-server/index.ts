import { createServer as createHttpServer, type Server } from "node:http";
import { createServer as createHttpsServer } from "node:https";
import { type VerifyClientCallbackAsync, WebSocketServer } from "ws";

export interface EchoServerLogger {
	info(message: string): void;
	warn(message: string): void;
}

export interface EchoServerOptions {
	/** Interface to bind; defaults to 127.0.0.1 */
	host?: string;
	/** 0 (the default) picks a free port */
	port?: number;
	/** Serve wss with this PEM certificate/key pair */
	tls?: { cert: string | Buffer; key: string | Buffer };
	/** Reject upgrades (HTTP 503) once this many clients are connected */
	maxConnections?: number;
	logger?: EchoServerLogger;
}

export interface EchoServer {
	readonly host: string;
	readonly port: number;
	/** ws:// or wss:// URL of the server */
	readonly url: string;
	/** Clients currently connected */
	connectionCount(): number;
	close(): Promise<void>;
}

/**
 * Start a WebSocket server that sends every frame straight back to its sender.
 */
export async function createEchoServer(options: EchoServerOptions = {}): Promise<EchoServer> {
	const host = options.host ?? "127.0.0.1";
	const { logger, maxConnections } = options;
	const httpServer: Server = options.tls ? createHttpsServer({ cert: options.tls.cert, key: options.tls.key }) : createHttpServer();

	let connections = 0;

	const verifyClient: VerifyClientCallbackAsync | undefined =
		maxConnections === undefined
			? undefined
			: (_info, callback) => {
				if (connections >= maxConnections) {
					logger?.warn(`Rejecting client: at capacity (${connections}/${maxConnections})`);
					callback(false, 503, "At capacity");
					return;
				}
				callback(true);
			};

	const wss = new WebSocketServer({ server: httpServer, ...(verifyClient ? { verifyClient } : {}) });

	wss.on("connection", (socket) => {
		connections++;
		logger?.info(`Client connected (${connections} active)`);

		socket.on("message", (data, isBinary) => {
			socket.send(data, { binary: isBinary });
		});

		socket.on("error", (err) => {
			logger?.warn(`Client error: ${err.message}`);
		});

		socket.on("close", () => {
			connections--;
			logger?.info(`Client disconnected (${connections} active)`);
		});
	});

	await new Promise<void>((resolve, reject) => {
		httpServer.once("error", reject);
		httpServer.listen(options.port ?? 0, host, () => {
			httpServer.off("error", reject);
			resolve();
		});
	});

	const address = httpServer.address();
	if (address === null || typeof address === "string") {
		httpServer.close();
		throw new Error("Echo server did not bind to a TCP port");
	}
	const protocol = options.tls ? "wss" : "ws";
	const displayHost = host.includes(":") ? `[${host}]` : host;

	return {
		host,
		port: address.port,
		url: `${protocol}://${displayHost}:${address.port}/`,
		connectionCount: () => connections,
		close: async () => {
			for (const client of wss.clients) {
				client.terminate();
			}
			await new Promise<void>((resolve) => wss.close(() => resolve()));
			await new Promise<void>((resolve, reject) => {
				httpServer.close((err) => (err ? reject(err) : resolve()));
				httpServer.closeAllConnections();
			});
		},
	};
}
