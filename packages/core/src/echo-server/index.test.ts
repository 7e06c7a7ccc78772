import * as t from "vitest";
import WebSocket from "ws";
import { createEchoServer, type EchoServer } from "./index";

function connect(url: string): Promise<WebSocket> {
	return new Promise((resolve, reject) => {
		const socket = new WebSocket(url);
		socket.once("open", () => resolve(socket));
		socket.once("error", reject);
	});
}

function nextMessage(socket: WebSocket): Promise<{ text: string; isBinary: boolean }> {
	return new Promise((resolve) => {
		socket.once("message", (data, isBinary) => resolve({ text: data.toString(), isBinary }));
	});
}

t.describe("createEchoServer", () => {
	let server: EchoServer;

	t.afterEach(async () => {
		await server.close();
	});

	t.test("should bind a free port on the loopback interface", async () => {
		server = await createEchoServer();

		t.expect(server.host).toBe("127.0.0.1");
		t.expect(server.port).toBeGreaterThan(0);
		t.expect(server.url).toBe(`ws://127.0.0.1:${server.port}/`);
	});

	t.test("should send text frames back unchanged", async () => {
		server = await createEchoServer();
		const socket = await connect(server.url);

		const reply = nextMessage(socket);
		socket.send("Test message from connection 1");

		t.expect(await reply).toEqual({ text: "Test message from connection 1", isBinary: false });
		socket.close();
	});

	t.test("should keep binary frames binary", async () => {
		server = await createEchoServer();
		const socket = await connect(server.url);

		const reply = nextMessage(socket);
		socket.send(Buffer.from("abc"));

		t.expect(await reply).toEqual({ text: "abc", isBinary: true });
		socket.close();
	});

	t.test("should count connected clients", async () => {
		server = await createEchoServer();
		const first = await connect(server.url);
		const second = await connect(server.url);

		await t.vi.waitFor(() => t.expect(server.connectionCount()).toBe(2));

		first.close();
		await t.vi.waitFor(() => t.expect(server.connectionCount()).toBe(1));
		second.close();
	});

	t.test("should reject clients beyond maxConnections with a 503", async () => {
		const logger = { info: t.vi.fn(), warn: t.vi.fn() };
		server = await createEchoServer({ maxConnections: 1, logger });
		const first = await connect(server.url);
		await t.vi.waitFor(() => t.expect(server.connectionCount()).toBe(1));

		await t.expect(connect(server.url)).rejects.toThrow("Unexpected server response: 503");
		t.expect(logger.warn).toHaveBeenCalledWith("Rejecting client: at capacity (1/1)");
		t.expect(logger.info).toHaveBeenCalledWith("Client connected (1 active)");
		first.close();
	});
});
