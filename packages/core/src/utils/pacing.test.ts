import * as t from "vitest";
import { ErrorCode, RunError } from "../domain/errors";
import { calculatePacingRate, launchStaggered } from "./pacing";
import { sleep } from "./timing";

t.describe("launchStaggered", () => {
	t.test("should launch every task and return handles in order", async () => {
		const started: number[] = [];

		const handles = await launchStaggered({
			count: 3,
			delayMs: 0,
			onStart: (index) => {
				started.push(index);
				return `task-${index}`;
			},
		});

		t.expect(started).toEqual([0, 1, 2]);
		t.expect(handles).toEqual(["task-0", "task-1", "task-2"]);
	});

	t.test("should not wait for earlier tasks before launching the next", async () => {
		const pending: Promise<void>[] = [];
		const startTime = Date.now();

		await launchStaggered({
			count: 3,
			delayMs: 10,
			onStart: () => {
				const task = sleep(500);
				pending.push(task);
				return task;
			},
		});

		// Two 10ms gaps, far below one 500ms task
		t.expect(Date.now() - startTime).toBeLessThan(400);
		t.expect(pending).toHaveLength(3);
		await Promise.all(pending);
	});

	t.test("should stop launching when cancelled", async () => {
		const controller = new AbortController();
		const started: number[] = [];

		const launch = launchStaggered({
			count: 5,
			delayMs: 50,
			signal: controller.signal,
			onStart: (index) => {
				started.push(index);
				if (index === 1) controller.abort();
				return index;
			},
		});

		await t.expect(launch).rejects.toBeInstanceOf(RunError);
		t.expect(started).toEqual([0, 1]);
	});
});

t.describe("sleep", () => {
	t.test("should reject with CANCELLED when aborted", async () => {
		const controller = new AbortController();
		const waiting = sleep(10_000, controller.signal);
		controller.abort();

		await t.expect(waiting).rejects.toMatchObject({ code: ErrorCode.CANCELLED });
	});
});

t.describe("calculatePacingRate", () => {
	t.test("should format launches per second", () => {
		t.expect(calculatePacingRate(250)).toBe("4.0");
		t.expect(calculatePacingRate(0)).toBe("max");
	});
});
