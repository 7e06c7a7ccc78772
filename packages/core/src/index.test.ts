import * as t from "vitest";
import * as core from "./index";

t.it("should expose the engine, the echo server and config parsing", () => {
	t.expect(core.StabilityEngine).toBeTypeOf("function");
	t.expect(core.createEchoServer).toBeTypeOf("function");
	t.expect(core.parseRunConfig({ host: "localhost", port: 7070 }).maxCount).toBe(10);
	t.expect(core.ERROR_KINDS).toHaveLength(8);
});
