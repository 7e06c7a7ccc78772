import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigError, ErrorCode } from "@socket-ceiling/core";
import * as t from "vitest";
import {
	BUILT_IN_SETTINGS,
	compact,
	DEFAULT_SETTINGS_PATH,
	loadSettings,
	mergeRunConfig,
	readSettingsFile,
	resolveSettingsPath,
	SETTINGS_ENV_VAR,
} from "./settings.js";

t.describe("settings", () => {
	let dir: string;

	function writeFile(name: string, content: string): string {
		const filePath = path.join(dir, name);
		fs.writeFileSync(filePath, content);
		return filePath;
	}

	t.beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "settings-test-"));
	});

	t.afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
		t.vi.restoreAllMocks();
	});

	t.describe("resolveSettingsPath", () => {
		t.test("should prefer the flag over the env var", () => {
			const location = resolveSettingsPath("/tmp/flag.json", { [SETTINGS_ENV_VAR]: "/tmp/env.json" });

			t.expect(location).toEqual({ path: "/tmp/flag.json", explicit: true });
		});

		t.test("should use the env var when no flag is given", () => {
			const location = resolveSettingsPath(undefined, { [SETTINGS_ENV_VAR]: "/tmp/env.json" });

			t.expect(location).toEqual({ path: "/tmp/env.json", explicit: true });
		});

		t.test("should fall back to the default location", () => {
			t.expect(resolveSettingsPath(undefined, {})).toEqual({ path: DEFAULT_SETTINGS_PATH, explicit: false });
		});
	});

	t.describe("readSettingsFile", () => {
		t.test("should map both sections onto run config fields", () => {
			const filePath = writeFile(
				"settings.json",
				JSON.stringify({
					server: { host: "example.test", port: 8080, protocol: "wss", path: "/echo" },
					test: {
						start_connections: 10,
						max_connections: 20,
						increment: 2,
						batch_duration: 10,
						connection_delay: 0.2,
						stability_threshold: 95,
						cumulative_mode: true,
						verbose_mode: false,
						stop_policy: "full-scan",
					},
					display: { show_system_info: false },
				}),
			);

			t.expect(readSettingsFile(filePath)).toEqual({
				host: "example.test",
				port: 8080,
				protocol: "wss",
				path: "/echo",
				startCount: 10,
				maxCount: 20,
				increment: 2,
				batchDurationSec: 10,
				connectionDelaySec: 0.2,
				stabilityThreshold: 95,
				cumulative: true,
				verbose: false,
				stopPolicy: "full-scan",
			});
		});

		t.test("should accept a file with missing sections", () => {
			const filePath = writeFile("partial.json", JSON.stringify({ test: { max_connections: 50 } }));

			t.expect(readSettingsFile(filePath)).toEqual({ maxCount: 50 });
		});

		t.test("should reject malformed JSON", () => {
			const filePath = writeFile("broken.json", "{ server:");

			t.expect(() => readSettingsFile(filePath)).toThrow(ConfigError);
		});

		t.test("should reject values of the wrong type", () => {
			const filePath = writeFile("wrong.json", JSON.stringify({ server: { port: "7070" } }));

			let caught: unknown;
			try {
				readSettingsFile(filePath);
			} catch (error) {
				caught = error;
			}

			t.expect(caught).toBeInstanceOf(ConfigError);
			t.expect(caught instanceof ConfigError && caught.code).toBe(ErrorCode.SETTINGS_FILE_INVALID);
			t.expect(caught instanceof ConfigError && caught.message).toContain("server.port");
		});
	});

	t.describe("loadSettings", () => {
		t.test("should use built-in defaults when the default file is missing", () => {
			const warn = t.vi.spyOn(console, "warn").mockImplementation(() => {});

			const loaded = loadSettings({ env: {}, defaultPath: path.join(dir, "missing.json") });

			t.expect(loaded).toEqual({ input: BUILT_IN_SETTINGS, source: null });
			t.expect(warn).toHaveBeenCalledOnce();
		});

		t.test("should read the default file when it exists", () => {
			const filePath = writeFile("settings.json", JSON.stringify({ server: { port: 9000 } }));

			const loaded = loadSettings({ env: {}, defaultPath: filePath });

			t.expect(loaded).toEqual({ input: { host: "localhost", port: 9000 }, source: filePath });
		});

		t.test("should fail when an explicitly named file is missing", () => {
			t.expect(() => loadSettings({ configPath: path.join(dir, "missing.json"), env: {} })).toThrow(ConfigError);
		});

		t.test("should layer the file over the built-in defaults", () => {
			const filePath = writeFile("settings.json", JSON.stringify({ test: { max_connections: 25 } }));

			const loaded = loadSettings({ configPath: filePath, env: {} });

			t.expect(loaded.source).toBe(filePath);
			t.expect(loaded.input).toEqual({ host: "localhost", port: 7070, maxCount: 25 });
		});
	});

	t.describe("mergeRunConfig", () => {
		t.test("should let flags override file settings", () => {
			const config = mergeRunConfig(
				{ host: "file.test", port: 7070, maxCount: 25, cumulative: true },
				{ host: "flag.test", maxCount: undefined, stabilityThreshold: 75 },
			);

			t.expect(config.host).toBe("flag.test");
			t.expect(config.maxCount).toBe(25);
			t.expect(config.cumulative).toBe(true);
			t.expect(config.stabilityThreshold).toBe(75);
		});

		t.test("should validate the merged settings", () => {
			t.expect(() => mergeRunConfig({ host: "x", port: 7070 }, { startCount: 11 })).toThrow(
				"Invalid run configuration: startCount: startCount must not exceed maxCount",
			);
		});
	});

	t.test("compact should drop undefined values only", () => {
		t.expect(compact({ a: 1, b: undefined, c: false, d: 0 })).toEqual({ a: 1, c: false, d: 0 });
	});
});
