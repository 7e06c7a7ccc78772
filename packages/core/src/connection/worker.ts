import type { ErrorKind } from "../domain/errors";
import type { ConnectionOutcome } from "../domain/outcome";
import { classifyConnectionError } from "./classify";
import { createWebSocket, type ProbeSocket, rawDataToString, type SocketFactory, type TlsOptions } from "./socket";

/**
 * Options for creating a ConnectionWorker.
 */
export interface ConnectionWorkerOptions {
	/** Run-wide connection sequence number */
	id: number;
	batchIndex: number;
	url: string;
	/** Probe message; defaults to a per-connection text */
	payload?: string;
	/** Max wait for the WebSocket handshake */
	connectTimeoutMs: number;
	/** Max wait for the probe's echo */
	responseTimeoutMs: number;
	/** Default grace used by close() and by cancellation */
	closeGraceMs?: number;
	tls?: TlsOptions;
	/** Run-level cancellation */
	signal?: AbortSignal;
	/** Mainly for testing; defaults to a `ws` client socket */
	socketFactory?: SocketFactory;
}

type WorkerState = "idle" | "connecting" | "probing" | "open" | "closing" | "closed" | "failed";

const DEFAULT_CLOSE_GRACE_MS = 2000;

/**
 * Owns one WebSocket connection end-to-end: dial, send a probe, time the echo,
 * hold the connection idle, close on request.
 *
 * Every failure is recorded on the worker and surfaces through {@link outcome};
 * nothing is thrown to the caller.
 */
export class ConnectionWorker {
	readonly id: number;
	readonly batchIndex: number;

	private readonly options: ConnectionWorkerOptions;
	private readonly payload: string;
	private readonly socketFactory: SocketFactory;
	private socket: ProbeSocket | null = null;
	private socketClosed = false;
	private state: WorkerState = "idle";
	private failure: { kind: ErrorKind; message: string } | null = null;

	private dialedAt = 0;
	private sentAt = 0;
	private connectTimeMs?: number;
	private responseTimeMs?: number;
	private openedAt?: number;
	private closedAt?: number;

	private phaseTimer: ReturnType<typeof setTimeout> | null = null;
	private graceTimer: ReturnType<typeof setTimeout> | null = null;
	private probe: Promise<void> | null = null;
	private resolveProbe: (() => void) | null = null;
	private closing: Promise<void> | null = null;
	private resolveClosing: (() => void) | null = null;

	constructor(options: ConnectionWorkerOptions) {
		this.options = options;
		this.id = options.id;
		this.batchIndex = options.batchIndex;
		this.payload = options.payload ?? `Test message from connection ${options.id}`;
		this.socketFactory = options.socketFactory ?? createWebSocket;
	}

	/**
	 * Dial the target and run the probe.
	 * Resolves once the probe phase has settled, successfully or not. Never rejects.
	 */
	start(): Promise<void> {
		if (this.probe) return this.probe;
		this.probe = new Promise((resolve) => {
			this.resolveProbe = resolve;
		});

		const { signal, connectTimeoutMs } = this.options;
		if (signal?.aborted) {
			this.fail("cancelled", "Run cancelled before connecting");
			return this.probe;
		}
		signal?.addEventListener("abort", this.onAbort, { once: true });

		this.state = "connecting";
		this.dialedAt = performance.now();
		this.phaseTimer = setTimeout(() => this.fail("timeout", `Handshake timed out after ${connectTimeoutMs}ms`), connectTimeoutMs);

		let socket: ProbeSocket;
		try {
			socket = this.socketFactory(this.options.url, this.options.tls ?? {});
		} catch (error) {
			const err = error instanceof Error ? error : new Error(String(error));
			this.fail(classifyConnectionError(err, "connecting"), err.message);
			return this.probe;
		}

		this.socket = socket;
		socket.on("open", () => this.handleOpen());
		socket.on("message", (data) => this.handleMessage(rawDataToString(data)));
		socket.on("error", (err) => this.handleError(err));
		socket.on("close", (code) => this.handleClose(code));

		return this.probe;
	}

	/**
	 * Close the connection. If the peer does not acknowledge within `graceMs`
	 * the socket is terminated and the outcome becomes `forced_close_timeout`.
	 * Safe to call repeatedly; later calls share the first close.
	 */
	close(graceMs = this.options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS): Promise<void> {
		if (this.closing) return this.closing;

		if (this.state === "connecting" || this.state === "probing") {
			this.fail("timeout", "Closed before the probe completed");
		}

		if (this.state !== "open") {
			if (this.state === "idle") this.state = "closed";
			this.closing = Promise.resolve();
			this.detachSignal();
			return this.closing;
		}

		this.state = "closing";
		this.closing = new Promise((resolve) => {
			this.resolveClosing = resolve;
		});
		this.graceTimer = setTimeout(() => {
			if (this.failure === null) {
				this.fail("forced_close_timeout", `Close not acknowledged within ${graceMs}ms`);
			} else if (this.socket && !this.socketClosed) {
				this.socket.terminate();
			}
			this.finishClosing();
		}, graceMs);
		this.socket?.close(1000, "batch complete");

		return this.closing;
	}

	/**
	 * True while the connection is open and healthy.
	 */
	isOpen(): boolean {
		return this.state === "open" && !this.socketClosed;
	}

	/**
	 * Snapshot of this connection's outcome.
	 */
	outcome(): ConnectionOutcome {
		const outcome: ConnectionOutcome = {
			id: this.id,
			batchIndex: this.batchIndex,
			succeeded: this.failure === null && this.responseTimeMs !== undefined,
		};
		if (this.responseTimeMs !== undefined) outcome.responseTimeMs = this.responseTimeMs;
		if (this.connectTimeMs !== undefined) outcome.connectTimeMs = this.connectTimeMs;
		if (this.failure) {
			outcome.errorKind = this.failure.kind;
			outcome.error = this.failure.message;
		}
		if (this.openedAt !== undefined) outcome.openedAt = this.openedAt;
		if (this.closedAt !== undefined) outcome.closedAt = this.closedAt;
		return outcome;
	}

	private handleOpen(): void {
		if (this.state !== "connecting") return;
		this.clearPhaseTimer();
		this.connectTimeMs = performance.now() - this.dialedAt;
		this.openedAt = Date.now();
		this.state = "probing";

		const { responseTimeoutMs } = this.options;
		this.phaseTimer = setTimeout(() => this.fail("timeout", `No echo within ${responseTimeoutMs}ms`), responseTimeoutMs);
		this.sentAt = performance.now();
		try {
			this.socket?.send(this.payload);
		} catch (error) {
			const err = error instanceof Error ? error : new Error(String(error));
			this.fail(classifyConnectionError(err, "open"), err.message);
		}
	}

	private handleMessage(text: string): void {
		// Only the first echo is timed; anything after it is ignored
		if (this.state !== "probing") return;
		this.clearPhaseTimer();
		if (text !== this.payload) {
			this.fail("echo_mismatch", `Echo did not match the probe (got ${text.length} chars, sent ${this.payload.length})`);
			return;
		}
		this.responseTimeMs = performance.now() - this.sentAt;
		this.state = "open";
		this.settleProbe();
	}

	private handleError(err: Error): void {
		if (this.state === "connecting") {
			this.fail(classifyConnectionError(err, "connecting"), err.message);
		} else if (this.state === "probing" || this.state === "open") {
			this.fail(classifyConnectionError(err, "open"), err.message);
		}
	}

	private handleClose(code: number): void {
		this.socketClosed = true;
		this.closedAt ??= Date.now();
		this.clearPhaseTimer();

		if (this.state === "closing") {
			this.state = "closed";
			this.finishClosing();
			return;
		}
		if (this.state === "connecting" || this.state === "probing" || this.state === "open") {
			this.fail("closed_by_peer", `Connection closed by peer (code ${code})`);
		}
		this.finishClosing();
	}

	private readonly onAbort = (): void => {
		if (this.state === "open") {
			this.failure = { kind: "cancelled", message: "Run cancelled" };
			void this.close();
		} else if (this.state === "connecting" || this.state === "probing") {
			this.fail("cancelled", "Run cancelled");
		}
	};

	/**
	 * Record the first failure, tear the socket down and release any waiter.
	 */
	private fail(kind: ErrorKind, message: string): void {
		if (this.failure || this.state === "closed") return;
		this.failure = { kind, message };
		this.clearPhaseTimer();
		this.state = "failed";
		if (this.socket && !this.socketClosed) {
			this.socket.terminate();
		}
		this.settleProbe();
	}

	private settleProbe(): void {
		this.resolveProbe?.();
		this.resolveProbe = null;
	}

	private finishClosing(): void {
		if (this.graceTimer) {
			clearTimeout(this.graceTimer);
			this.graceTimer = null;
		}
		this.closedAt ??= Date.now();
		this.resolveClosing?.();
		this.resolveClosing = null;
		this.detachSignal();
	}

	private clearPhaseTimer(): void {
		if (this.phaseTimer) {
			clearTimeout(this.phaseTimer);
			this.phaseTimer = null;
		}
	}

	private detachSignal(): void {
		this.options.signal?.removeEventListener("abort", this.onAbort);
	}
}
