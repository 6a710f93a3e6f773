import { afterEach, describe, expect, it } from "vitest";
import { createBackendProbe } from "../src/backend/probe.ts";
import { createBackendServer } from "../src/backend/server.ts";
import { createProtocolCodecs } from "../src/protocol/packets.ts";
import { TimeoutError } from "../src/util/async.ts";
import {
	closedPort,
	type FakeBackend,
	startFakeBackend,
	statusJson,
} from "./support.ts";

const codecs = createProtocolCodecs("1.21.4");

describe("backend probe", () => {
	let backend: FakeBackend | null = null;

	afterEach(async () => {
		await backend?.close();
		backend = null;
	});

	const serverAt = (port: number) =>
		createBackendServer({ address: `127.0.0.1:${port}`, name: "test" });

	it("returns players.online from the status response", async () => {
		backend = await startFakeBackend(codecs, { kind: "json", body: statusJson(42) });
		const probe = createBackendProbe({ codecs, timeout: 2000 });

		expect(await probe(serverAt(backend.port))).toBe(42);
		expect(backend.handshakes).toEqual([
			{
				protocolVersion: 769,
				serverHost: "127.0.0.1",
				serverPort: backend.port,
				nextState: 1,
			},
		]);
	});

	it("uses a pre-resolved endpoint without resolving the address", async () => {
		backend = await startFakeBackend(codecs, { kind: "json", body: statusJson(3) });
		const probe = createBackendProbe({ codecs, timeout: 2000 });
		const server = createBackendServer({
			address: "unresolvable.invalid",
			endpoint: {
				ip: "127.0.0.1",
				port: backend.port,
				originalInput: "unresolvable.invalid",
				resolvedHost: "lobby.example.com",
			},
		});

		expect(await probe(server)).toBe(3);
		expect(backend.handshakes[0]?.serverHost).toBe("lobby.example.com");
	});

	it("rejects a non-JSON payload", async () => {
		backend = await startFakeBackend(codecs, { kind: "json", body: "not json" });
		const probe = createBackendProbe({ codecs, timeout: 2000 });
		await expect(probe(serverAt(backend.port))).rejects.toThrow(SyntaxError);
	});

	it("rejects a payload without a numeric player count", async () => {
		backend = await startFakeBackend(codecs, {
			kind: "json",
			body: JSON.stringify({ players: { online: "many" } }),
		});
		const probe = createBackendProbe({ codecs, timeout: 2000 });
		await expect(probe(serverAt(backend.port))).rejects.toThrow();
	});

	it("rejects when the backend hangs up first", async () => {
		backend = await startFakeBackend(codecs, { kind: "close" });
		const probe = createBackendProbe({ codecs, timeout: 2000 });
		await expect(probe(serverAt(backend.port))).rejects.toThrow(
			"Connection closed before status response",
		);
	});

	it("times out on a silent backend", async () => {
		backend = await startFakeBackend(codecs, { kind: "hang" });
		const probe = createBackendProbe({ codecs, timeout: 100 });
		await expect(probe(serverAt(backend.port))).rejects.toThrow(TimeoutError);
	});

	it("rejects when nothing listens", async () => {
		const probe = createBackendProbe({ codecs, timeout: 2000 });
		const port = await closedPort();
		await expect(probe(serverAt(port))).rejects.toThrow();
	});
});
