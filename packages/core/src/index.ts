export { BatchRunner, type BatchRunnerOptions, dnsResolver, type HostResolver } from "./batch/runner";
export { ConnectionPool } from "./batch/pool";
export { classifyConnectionError, type ConnectionPhase } from "./connection/classify";
export { createWebSocket, type ProbeSocket, type SocketFactory, type TlsOptions } from "./connection/socket";
export { ConnectionWorker, type ConnectionWorkerOptions } from "./connection/worker";
export { buildTargetUrl, parseRunConfig, type RunConfig, type RunConfigInput, type StopPolicy } from "./domain/config";
export { ConfigError, ERROR_KINDS, ErrorCode, type ErrorKind, RunError, StabilityError } from "./domain/errors";
export type { BatchStartEvent, StabilityEvents } from "./domain/events";
export type { ConnectionOutcome } from "./domain/outcome";
export type { BatchStats, LatencyStats, RunSummary, RunTotals, StoppedReason } from "./domain/stats";
export { createEchoServer, type EchoServer, type EchoServerLogger, type EchoServerOptions } from "./echo-server";
export { StabilityEngine, type StabilityEngineOptions } from "./engine";
export {
	calculateLatencyStats,
	computeBatchStats,
	createRunSummary,
	finalizeRunSummary,
	foldBatchStats,
	isStable,
	percentage,
} from "./stats";
export { calculatePacingRate } from "./utils/pacing";
