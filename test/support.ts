import { createServer, type Socket } from "node:net";
import type { DecodedPacket } from "../src/protocol/codec.ts";
import type { ProtocolCodecs } from "../src/protocol/packets.ts";
import { Direction, ProtocolState } from "../src/protocol/states.ts";
import { createSocketStream, type PacketStream } from "../src/protocol/stream.ts";
import { readVarInt } from "../src/protocol/varint.ts";

// ── Loopback backend ──

export type FakeBackend = {
	readonly port: number;
	readonly handshakes: Record<string, unknown>[];
	readonly close: () => Promise<void>;
};

export type StatusReply =
	| { readonly kind: "json"; readonly body: string }
	| { readonly kind: "hang" }
	| { readonly kind: "close" };

/** A status-only backend on 127.0.0.1 answering every ping the same way. */
export const startFakeBackend = async (
	codecs: ProtocolCodecs,
	reply: StatusReply,
): Promise<FakeBackend> => {
	const handshakes: Record<string, unknown>[] = [];
	const sockets = new Set<Socket>();

	const serve = async (socket: Socket) => {
		const stream = createSocketStream(socket);
		const first = await stream.read();
		if (!first) return;
		handshakes.push(
			codecs.codec(ProtocolState.HANDSHAKING, Direction.TO_SERVER).read(first).params,
		);
		const request = await stream.read();
		if (!request) return;
		if (reply.kind === "close") {
			socket.destroy();
			return;
		}
		if (reply.kind === "hang") return;
		await stream.write(
			codecs.frame(ProtocolState.STATUS, Direction.TO_CLIENT, "server_info", {
				response: reply.body,
			}),
		);
	};

	const server = createServer((socket) => {
		sockets.add(socket);
		socket.on("close", () => sockets.delete(socket));
		serve(socket).catch(() => socket.destroy());
	});
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const address = server.address();
	if (!address || typeof address === "string") throw new Error("No port bound");

	return {
		port: address.port,
		handshakes,
		close: () =>
			new Promise<void>((resolve) => {
				for (const socket of sockets) socket.destroy();
				server.close(() => resolve());
			}),
	};
};

export const statusJson = (online: number): string =>
	JSON.stringify({
		version: { name: "1.21.4", protocol: 769 },
		players: { max: 100, online },
		description: "backend",
	});

/** A port with nothing listening on it. */
export const closedPort = async (): Promise<number> => {
	const server = createServer();
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const address = server.address();
	if (!address || typeof address === "string") throw new Error("No port bound");
	await new Promise<void>((resolve) => server.close(() => resolve()));
	return address.port;
};

// ── In-memory packet stream ──

export type MemoryStream = PacketStream & {
	/** Framed packets the code under test wrote. */
	readonly written: Buffer[];
	readonly closed: () => boolean;
	/** Frames consumed so far. */
	readonly reads: () => number;
};

/** Feeds `incoming` one frame per read, then reports end of stream. */
export const createMemoryStream = (
	incoming: readonly Buffer[],
	remoteAddress = "203.0.113.7",
): MemoryStream => {
	const queue = [...incoming];
	const written: Buffer[] = [];
	let closed = false;
	let reads = 0;
	return {
		remoteAddress,
		written,
		read: async () => {
			const next = queue.shift();
			if (next) reads++;
			return next ?? null;
		},
		write: async (frame) => {
			if (closed) throw new Error("Socket is not writable");
			written.push(frame);
		},
		close: () => {
			closed = true;
		},
		closed: () => closed,
		reads: () => reads,
	};
};

/** Strip the length prefix from a framed packet. */
export const unframe = (framed: Buffer): Buffer => {
	const { value, size } = readVarInt(framed, 0);
	return framed.subarray(size, size + value);
};

/** Decode what a connection wrote, given the state each packet was sent in. */
export const decodeWritten = (
	codecs: ProtocolCodecs,
	state: ProtocolState,
	framed: Buffer,
): DecodedPacket => codecs.codec(state, Direction.TO_CLIENT).read(unframe(framed));

/** Encode a client-to-server packet body (unframed, as a stream yields it). */
export const clientPacket = (
	codecs: ProtocolCodecs,
	state: ProtocolState,
	name: string,
	params: Record<string, unknown>,
): Buffer => codecs.codec(state, Direction.TO_SERVER).write(name, params);
