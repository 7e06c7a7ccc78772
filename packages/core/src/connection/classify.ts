import type { ErrorKind } from "../domain/errors";

/** Where in its lifecycle a connection was when the error surfaced. */
export type ConnectionPhase = "connecting" | "open";

const NETWORK_CODES = new Set([
	"ECONNREFUSED",
	"ENOTFOUND",
	"EAI_AGAIN",
	"EHOSTUNREACH",
	"ENETUNREACH",
	"EADDRNOTAVAIL",
	"ECONNRESET",
	"EPIPE",
]);

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT"]);

const TLS_CODES = new Set([
	"DEPTH_ZERO_SELF_SIGNED_CERT",
	"SELF_SIGNED_CERT_IN_CHAIN",
	"UNABLE_TO_VERIFY_LEAF_SIGNATURE",
	"UNABLE_TO_GET_ISSUER_CERT",
	"UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
	"CERT_HAS_EXPIRED",
	"CERT_NOT_YET_VALID",
	"CERT_UNTRUSTED",
	"EPROTO",
]);

export function errorCodeOf(err: Error): string | undefined {
	return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

/**
 * Map a socket error to the outcome taxonomy.
 *
 * Once the WebSocket is open, transport errors mean the peer went away.
 */
export function classifyConnectionError(err: Error, phase: ConnectionPhase): ErrorKind {
	const code = errorCodeOf(err);

	if (phase === "open") {
		return code !== undefined && TIMEOUT_CODES.has(code) ? "timeout" : "closed_by_peer";
	}

	if (code !== undefined) {
		if (TLS_CODES.has(code) || code.startsWith("ERR_TLS_") || code.startsWith("ERR_SSL_")) return "tls_failed";
		if (TIMEOUT_CODES.has(code)) return "timeout";
		if (NETWORK_CODES.has(code)) return "connect_failed";
	}

	// Upgrade rejected or malformed (e.g. "Unexpected server response: 503")
	return "handshake_failed";
}
