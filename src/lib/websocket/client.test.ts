import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebSocketServer } from "ws";
import type ServerSocket from "ws";
import { WsClient } from "./client.js";
import type { WsConfig } from "./types.js";

function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
	const started = Date.now();
	return new Promise((resolve, reject) => {
		const poll = (): void => {
			if (predicate()) {
				resolve();
			} else if (Date.now() - started > timeoutMs) {
				reject(new Error("condition not met in time"));
			} else {
				setTimeout(poll, 10);
			}
		};
		poll();
	});
}

describe("WsClient", () => {
	let wss: WebSocketServer;
	let port: number;
	let peers: ServerSocket[];

	function testConfig(overrides: Partial<WsConfig> = {}): WsConfig {
		return {
			url: `ws://127.0.0.1:${port}`,
			pingIntervalMs: 30_000,
			pongTimeoutMs: 5_000,
			...overrides,
		};
	}

	beforeEach(async () => {
		peers = [];
		wss = new WebSocketServer({ port: 0, host: "127.0.0.1" });
		wss.on("connection", (socket) => {
			peers.push(socket);
			socket.on("message", (data) => socket.send(`echo:${data.toString()}`));
		});
		await new Promise<void>((resolve) => wss.once("listening", () => resolve()));
		const addr = wss.address();
		port = typeof addr === "object" && addr !== null ? addr.port : 0;
	});

	afterEach(async () => {
		for (const peer of peers) peer.terminate();
		await new Promise<void>((resolve) => wss.close(() => resolve()));
	});

	it("starts closed and opens on connect", async () => {
		const client = new WsClient(testConfig());
		expect(client.getState()).toBe("closed");
		await client.connect();
		expect(client.getState()).toBe("open");
		client.close();
		expect(client.getState()).toBe("closed");
	});

	it("delivers inbound messages to handlers", async () => {
		const client = new WsClient(testConfig());
		const received: string[] = [];
		client.onMessage((data) => received.push(data));
		await client.connect();

		expect(client.send("hello").ok).toBe(true);

		await waitFor(() => received.length === 1);
		expect(received).toEqual(["echo:hello"]);
		client.close();
	});

	it("refuses to send while closed", () => {
		const client = new WsClient(testConfig());
		const result = client.send("x");
		expect(result.ok).toBe(false);
		if (!result.ok) expect(result.error.code).toBe("NETWORK_ERROR");
	});

	it("rejects a second connect while open", async () => {
		const client = new WsClient(testConfig());
		await client.connect();
		await expect(client.connect()).rejects.toThrow("already connecting or open");
		client.close();
	});

	it("can reconnect after a local close", async () => {
		const client = new WsClient(testConfig());
		const received: string[] = [];
		client.onMessage((data) => received.push(data));

		await client.connect();
		client.close();
		await client.connect();
		client.send("again");

		await waitFor(() => received.length === 1);
		expect(received).toEqual(["echo:again"]);
		expect(peers).toHaveLength(2);
		client.close();
	});

	it("reports a server side close to close handlers", async () => {
		const client = new WsClient(testConfig());
		const closes: number[] = [];
		client.onClose((code) => closes.push(code));
		await client.connect();
		await waitFor(() => peers.length === 1);

		peers[0]?.close(4001, "bye");

		await waitFor(() => closes.length === 1);
		expect(closes).toEqual([4001]);
		expect(client.getState()).toBe("closed");
	});

	it("rejects connect when nothing is listening", async () => {
		const client = new WsClient({ ...testConfig(), url: "ws://127.0.0.1:1" });
		await expect(client.connect()).rejects.toThrow("WebSocket connection failed");
		expect(client.getState()).toBe("closed");
	});

	it("fires heartbeat handlers when pongs arrive", async () => {
		const client = new WsClient(testConfig({ pingIntervalMs: 20 }));
		let beats = 0;
		client.onHeartbeat(() => {
			beats += 1;
		});
		await client.connect();

		await waitFor(() => beats >= 2);
		expect(client.getState()).toBe("open");
		client.close();
	});
});
