import { type BatchStats, createRunSummary, foldBatchStats, type RunSummary } from "@socket-ceiling/core";
import * as t from "vitest";
import { describeStopReason, describeVerdict, formatBatchRow, formatRate, formatTableHeader } from "./formatter.js";

function batch(batchIndex: number, requestedCount: number, succeeded: number): BatchStats {
	return {
		batchIndex,
		requestedCount,
		attempted: requestedCount,
		succeeded,
		failed: requestedCount - succeeded,
		successRate: (succeeded / requestedCount) * 100,
		responseTime: succeeded > 0 ? { min: 10, max: 30, avg: 20, p50: 20, p95: 30, p99: 30 } : null,
		errors: succeeded < requestedCount ? { connect_failed: requestedCount - succeeded } : {},
		carriedOver: 0,
		poolSize: 0,
		durationMs: 100,
	};
}

function summaryOf(threshold: number, batches: BatchStats[]): RunSummary {
	return batches.reduce(foldBatchStats, createRunSummary({ target: "ws://localhost:7070/", threshold }));
}

t.describe("summary table", () => {
	t.test("should align the header columns", () => {
		t.expect(formatTableHeader()).toBe("Batch  Target  Opened  OK    Rate     Avg       Min/Max         Pool");
	});

	t.test("should format a batch with response times", () => {
		t.expect(formatBatchRow(batch(3, 3, 2), 90)).toBe("3      3       3       2     66.7% ✗  20.00ms   10.00/30.00     0");
	});

	t.test("should show dashes when no connection succeeded", () => {
		t.expect(formatBatchRow(batch(1, 5, 0), 90)).toBe("1      5       5       0     0.0% ✗   -         -               0");
	});

	t.test("should mark rates at the threshold as stable", () => {
		t.expect(formatRate(90, 90)).toBe("90.0% ✓");
		t.expect(formatRate(89.96, 90)).toBe("90.0% ✗");
	});
});

t.describe("describeVerdict", () => {
	t.test("should name the ceiling when the gap is one increment", () => {
		const summary = summaryOf(90, [batch(1, 1, 1), batch(2, 2, 2), batch(3, 3, 2)]);

		t.expect(describeVerdict(summary, 1)).toEqual([
			"Maximum stable: 2 connections (batch 2, 100.0% success)",
			"Minimum unstable: 3 connections (batch 3, 66.7% success)",
			"The target appears to handle around 2 simultaneous connections.",
		]);
	});

	t.test("should give a range when the gap is wider than one increment", () => {
		const summary = summaryOf(90, [batch(1, 10, 10), batch(2, 20, 10)]);

		t.expect(describeVerdict(summary, 5)).toEqual([
			"Maximum stable: 10 connections (batch 1, 100.0% success)",
			"Minimum unstable: 20 connections (batch 2, 50.0% success)",
			"The ceiling lies between 10 and 20 connections.",
			"Rerun that range with a smaller increment for a precise figure.",
		]);
	});

	t.test("should only compare against unstable batches above the ceiling in a non-monotonic scan", () => {
		const summary = summaryOf(90, [batch(1, 1, 1), batch(2, 2, 1), batch(3, 3, 3), batch(4, 4, 2)]);

		t.expect(describeVerdict(summary, 1)).toEqual([
			"Maximum stable: 3 connections (batch 3, 100.0% success)",
			"Unstable below that: 2 (batch 2). Results were not monotonic.",
			"Minimum unstable: 4 connections (batch 4, 50.0% success)",
			"The target appears to handle around 3 simultaneous connections.",
		]);
	});

	t.test("should not claim a ceiling when every unstable batch lies below the highest stable one", () => {
		const summary = summaryOf(90, [batch(1, 1, 1), batch(2, 2, 1), batch(3, 3, 3)]);

		t.expect(describeVerdict(summary, 1)).toEqual([
			"Maximum stable: 3 connections (batch 3, 100.0% success)",
			"Unstable below that: 2 (batch 2). Results were not monotonic.",
			"Raise the maximum count to find the limit.",
		]);
	});

	t.test("should report a run where every batch was stable", () => {
		const summary = summaryOf(50, [batch(1, 1, 1), batch(2, 3, 3)]);

		t.expect(describeVerdict(summary, 2)).toEqual(["All batches were stable up to 3 connections.", "Raise the maximum count to find the limit."]);
	});

	t.test("should report a run where no batch was stable", () => {
		const summary = summaryOf(90, [batch(1, 5, 1)]);

		t.expect(describeVerdict(summary, 1)).toEqual(["No batch was stable. The target may not sustain even 5 connections."]);
	});

	t.test("should handle a run without batches", () => {
		t.expect(describeVerdict(summaryOf(90, []), 1)).toEqual(["No batches completed."]);
	});
});

t.describe("describeStopReason", () => {
	t.test("should include the error message", () => {
		t.expect(describeStopReason("error", "Cannot resolve nowhere.invalid: getaddrinfo ENOTFOUND")).toBe(
			"Stopped on error: Cannot resolve nowhere.invalid: getaddrinfo ENOTFOUND",
		);
	});

	t.test("should describe the other reasons", () => {
		t.expect(describeStopReason("reached_max")).toBe("Reached the maximum connection count");
		t.expect(describeStopReason("unstable")).toBe("Stopped at the first batch below the threshold");
		t.expect(describeStopReason("cancelled")).toBe("Cancelled before the plan finished");
	});
});
