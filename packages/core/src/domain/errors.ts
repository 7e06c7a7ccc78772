export enum ErrorCode {
	// Configuration errors
	INVALID_CONFIG = "INVALID_CONFIG",
	SETTINGS_FILE_INVALID = "SETTINGS_FILE_INVALID",

	// Run errors
	TARGET_UNRESOLVABLE = "TARGET_UNRESOLVABLE",
	CANCELLED = "CANCELLED",

	// Generic fallback
	UNKNOWN = "UNKNOWN",
}

export class StabilityError extends Error {
	constructor(
		public readonly code: ErrorCode,
		message?: string,
	) {
		super(message || code);
		this.name = code;
	}
}

export class ConfigError extends StabilityError {}
export class RunError extends StabilityError {}

/**
 * Terminal classification of a failed connection.
 */
export type ErrorKind =
	| "connect_failed"
	| "handshake_failed"
	| "tls_failed"
	| "timeout"
	| "closed_by_peer"
	| "echo_mismatch"
	| "forced_close_timeout"
	| "cancelled";

export const ERROR_KINDS: readonly ErrorKind[] = [
	"connect_failed",
	"handshake_failed",
	"tls_failed",
	"timeout",
	"closed_by_peer",
	"echo_mismatch",
	"forced_close_timeout",
	"cancelled",
];
