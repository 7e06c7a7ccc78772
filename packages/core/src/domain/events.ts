import type { RunConfig } from "./config";
import type { ConnectionOutcome } from "./outcome";
import type { BatchStats, RunSummary } from "./stats";

export interface BatchStartEvent {
	batchIndex: number;
	requestedCount: number;
	/** Connections the batch will open */
	toOpen: number;
	/** Live connections carried in from earlier batches */
	carriedOver: number;
}

/**
 * Events emitted while a run progresses. Listeners must not throw.
 */
export type StabilityEvents = {
	"run:start": [info: { target: string; config: RunConfig }];
	"batch:start": [info: BatchStartEvent];
	/** A connection's probe phase finished (it may still be held open) */
	"connection:settled": [outcome: ConnectionOutcome];
	/** A connection's final outcome for its batch */
	"connection:outcome": [outcome: ConnectionOutcome];
	"batch:complete": [stats: BatchStats];
	"run:complete": [summary: RunSummary];
};
