import * as t from "vitest";
import { parseRunConfig, type RunConfigInput } from "../domain/config";
import { createEchoServer, type EchoServer } from "../echo-server";
import { StabilityEngine } from "./index";

function createEngine(server: EchoServer, overrides: Partial<RunConfigInput>): StabilityEngine {
	const config = parseRunConfig({
		host: server.host,
		port: server.port,
		batchDurationSec: 0.05,
		closeGraceSec: 1,
		...overrides,
	});
	return new StabilityEngine(config);
}

t.describe("StabilityEngine against a live echo server", () => {
	let server: EchoServer;

	t.beforeEach(async () => {
		server = await createEchoServer();
	});

	t.afterEach(async () => {
		await server.close();
	});

	t.test("should hold a single batch of ten echoing connections", async () => {
		const engine = createEngine(server, { startCount: 10, maxCount: 10, stabilityThreshold: 50 });

		const summary = await engine.run();

		t.expect(summary.stoppedReason).toBe("reached_max");
		t.expect(summary.batches).toHaveLength(1);
		t.expect(summary.batches[0].succeeded).toBe(10);
		t.expect(summary.batches[0].successRate).toBe(100);
		t.expect(summary.batches[0].responseTime).not.toBeNull();
		t.expect(summary.maxStableCount).toBe(10);
	});

	t.test("should grow the server's connection count batch by batch in cumulative mode", async () => {
		const engine = createEngine(server, { startCount: 5, maxCount: 15, increment: 5, cumulative: true });
		const liveAtBatchEnd: number[] = [];
		engine.on("batch:complete", () => liveAtBatchEnd.push(server.connectionCount()));

		const summary = await engine.run();

		t.expect(summary.stoppedReason).toBe("reached_max");
		t.expect(summary.batches.map((b) => b.attempted)).toEqual([5, 5, 5]);
		t.expect(summary.batches.map((b) => b.poolSize)).toEqual([5, 10, 15]);
		t.expect(liveAtBatchEnd).toEqual([5, 10, 15]);
		t.expect(summary.maxStableCount).toBe(15);

		await t.vi.waitFor(() => t.expect(server.connectionCount()).toBe(0));
	});
});
