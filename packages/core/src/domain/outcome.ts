import type { ErrorKind } from "./errors";

/**
 * Terminal result of one connection's lifecycle.
 * Exactly one is produced per ConnectionWorker.
 */
export interface ConnectionOutcome {
	/** Run-wide connection sequence number (1-based) */
	id: number;
	/** Batch that opened the connection */
	batchIndex: number;
	succeeded: boolean;
	/** Probe send → echo receipt, in ms. Only present when the round-trip completed. */
	responseTimeMs?: number;
	/** Dial → open, in ms */
	connectTimeMs?: number;
	errorKind?: ErrorKind;
	error?: string;
	/** Epoch ms when the WebSocket opened */
	openedAt?: number;
	/** Epoch ms when the socket closed */
	closedAt?: number;
}
