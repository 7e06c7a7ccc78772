import WebSocket, { type RawData } from "ws";

/**
 * The subset of a `ws` client socket a ConnectionWorker relies on.
 * Anything with this shape (e.g. a test double) can stand in for a real socket.
 */
export interface ProbeSocket {
	on(event: "open", listener: () => void): unknown;
	on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
	on(event: "error", listener: (err: Error) => void): unknown;
	on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
	send(data: string): void;
	close(code?: number, reason?: string): void;
	terminate(): void;
}

/** TLS trust settings for wss targets. */
export interface TlsOptions {
	/** Accept certificates that fail verification (self-signed etc.) */
	insecure?: boolean;
	/** Extra PEM trust anchor */
	ca?: string;
}

export type SocketFactory = (url: string, tls: TlsOptions) => ProbeSocket;

/**
 * Default factory: a real `ws` client socket.
 */
export const createWebSocket: SocketFactory = (url, tls) => {
	return new WebSocket(url, {
		rejectUnauthorized: !tls.insecure,
		...(tls.ca !== undefined ? { ca: tls.ca } : {}),
	});
};

/**
 * Decode a received frame into text.
 */
export function rawDataToString(data: RawData): string {
	if (Buffer.isBuffer(data)) return data.toString("utf-8");
	if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
	return Buffer.from(data).toString("utf-8");
}
