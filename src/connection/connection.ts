/**
 * Per-connection state machine.
 *
 * handshaking ─┬─> status                  (answer list pings, then the peer leaves)
 *              └─> login ──> configuration (pick a backend, send transfer, close)
 *
 * Nothing is relayed: a login ends with the client being told to reconnect
 * elsewhere.
 */

import { describeBackend, resolveBackend } from "../backend/server.ts";
import { describeError, type Logger, silentLogger } from "../logger/index.ts";
import {
	HandshakePacket,
	LoginStartPacket,
	PingPacket,
	type ProtocolCodecs,
} from "../protocol/packets.ts";
import {
	canTransition,
	Direction,
	ProtocolState,
	stateForIntent,
} from "../protocol/states.ts";
import type { PacketStream } from "../protocol/stream.ts";
import { readVarInt } from "../protocol/varint.ts";
import type { DnsClient } from "../resolver/index.ts";
import type { ServerSelector } from "../selector/index.ts";
import type { StatusCache } from "../status/index.ts";

/** Lowest protocol that understands the transfer packet (1.20.5). */
export const TRANSFER_PROTOCOL_FLOOR = 766;

export class ProtocolError extends Error {
	readonly state: ProtocolState;
	readonly packetId: number | null;

	constructor(message: string, state: ProtocolState, packetId: number | null = null) {
		super(message);
		this.name = "ProtocolError";
		this.state = state;
		this.packetId = packetId;
	}
}

/** How a connection's loop ended. */
export type ConnectionOutcome = "closed" | "transferred" | "failed";

export type Connection = {
	readonly id: number;
	readonly state: () => ProtocolState;
	/** Negotiated protocol version; 0 until the handshake arrives. */
	readonly protocolVersion: () => number;
	/** Drive the session to its end. Never rejects; the stream is closed on return. */
	readonly run: () => Promise<ConnectionOutcome>;
};

export type ConnectionOptions = {
	readonly stream: PacketStream;
	readonly codecs: ProtocolCodecs;
	readonly selector: ServerSelector;
	readonly statusCache: StatusCache;
	readonly contextId: number;
	readonly motd: string;
	readonly logger?: Logger;
	readonly dns?: DnsClient;
};

type Step = "continue" | "transferred";

/** Packet id of a frame body, or null when the varint is unreadable. */
const peekId = (frame: Buffer): number | null => {
	try {
		return readVarInt(frame, 0).value;
	} catch {
		return null;
	}
};

const formatId = (id: number | null): string =>
	id === null ? "-" : `0x${id.toString(16).padStart(2, "0")}`;

export const createConnection = (options: ConnectionOptions): Connection => {
	const { stream, codecs, selector, statusCache, contextId, motd } = options;
	const logger = (options.logger ?? silentLogger).child(`conn#${contextId}`);

	let state: ProtocolState = ProtocolState.HANDSHAKING;
	let protocolVersion = 0;

	const advance = (next: ProtocolState, packetId: number) => {
		if (!canTransition(state, next)) {
			throw new ProtocolError(
				`Illegal transition ${state} -> ${next}`,
				state,
				packetId,
			);
		}
		logger.debug(`${state} -> ${next}`);
		state = next;
	};

	const send = (
		at: ProtocolState,
		name: string,
		params: Record<string, unknown>,
	) => stream.write(codecs.frame(at, Direction.TO_CLIENT, name, params));

	const decode = (frame: Buffer) => {
		try {
			return codecs.codec(state, Direction.TO_SERVER).read(frame);
		} catch (err) {
			throw new ProtocolError(
				`Undecodable packet: ${describeError(err)}`,
				state,
				peekId(frame),
			);
		}
	};

	// ── Handlers per state ──

	const onHandshake = (frame: Buffer): Step => {
		const id = peekId(frame);
		const codec = codecs.codec(ProtocolState.HANDSHAKING, Direction.TO_SERVER);
		if (id === null || codec.packetNames.get(id) !== "set_protocol") {
			logger.warn(`Ignoring packet ${formatId(id)} during handshake`);
			return "continue";
		}
		const parsed = HandshakePacket.safeParse(decode(frame).params);
		if (!parsed.success) {
			throw new ProtocolError("Malformed handshake", state, id);
		}
		const next = stateForIntent(parsed.data.nextState);
		if (!next) {
			throw new ProtocolError(
				`Unknown handshake intent ${parsed.data.nextState}`,
				state,
				id,
			);
		}
		protocolVersion = parsed.data.protocolVersion;
		advance(next, id);
		return "continue";
	};

	const onStatus = async (frame: Buffer): Promise<Step> => {
		const { id, name, params } = decode(frame);
		switch (name) {
			case "ping_start": {
				const advertised = Math.max(TRANSFER_PROTOCOL_FLOOR, protocolVersion);
				const response = await statusCache.getStatus(motd, advertised);
				await send(ProtocolState.STATUS, "server_info", { response });
				return "continue";
			}
			case "ping": {
				const parsed = PingPacket.safeParse(params);
				if (!parsed.success) throw new ProtocolError("Malformed ping", state, id);
				await send(ProtocolState.STATUS, "ping", { time: parsed.data.time });
				return "continue";
			}
			default:
				throw new ProtocolError(`Unexpected packet ${name}`, state, id);
		}
	};

	const onLogin = async (frame: Buffer): Promise<Step> => {
		const { id, name, params } = decode(frame);
		switch (name) {
			case "login_start": {
				const parsed = LoginStartPacket.safeParse(params);
				if (!parsed.success) throw new ProtocolError("Malformed login start", state, id);
				const { username, playerUUID } = parsed.data;
				logger.info(`Login from ${username} (${playerUUID})`);
				await send(ProtocolState.LOGIN, "success", {
					uuid: playerUUID,
					username,
					properties: [],
					// Only present in 1.20.5 - 1.21.1; ignored by other layouts.
					strictErrorHandling: false,
				});
				return "continue";
			}
			case "login_acknowledged":
				advance(ProtocolState.CONFIGURATION, id);
				return transfer();
			default:
				throw new ProtocolError(`Unexpected packet ${name}`, state, id);
		}
	};

	const transfer = async (): Promise<Step> => {
		const server = await selector.findServer({ ip: stream.remoteAddress });
		const endpoint = await resolveBackend(server, { dns: options.dns });
		logger.info(
			`Transferring to ${describeBackend(server)} at ${endpoint.ip}:${endpoint.port}`,
		);
		await send(ProtocolState.CONFIGURATION, "transfer", {
			host: endpoint.ip,
			port: endpoint.port,
		});
		return "transferred";
	};

	const handle = (frame: Buffer): Step | Promise<Step> => {
		switch (state) {
			case ProtocolState.HANDSHAKING:
				return onHandshake(frame);
			case ProtocolState.STATUS:
				return onStatus(frame);
			case ProtocolState.LOGIN:
				return onLogin(frame);
			case ProtocolState.CONFIGURATION:
				throw new ProtocolError("Packet after transfer", state, peekId(frame));
		}
	};

	const loop = async (): Promise<ConnectionOutcome> => {
		for (;;) {
			const frame = await stream.read();
			if (!frame) {
				logger.debug(`Peer left during ${state}`);
				return "closed";
			}
			if ((await handle(frame)) === "transferred") return "transferred";
		}
	};

	return {
		id: contextId,
		state: () => state,
		protocolVersion: () => protocolVersion,
		run: async () => {
			try {
				return await loop();
			} catch (err) {
				if (err instanceof ProtocolError) {
					logger.error(
						`Protocol error in ${err.state} (packet ${formatId(err.packetId)}): ${err.message}`,
					);
				} else {
					logger.error(`Connection failed in ${state}: ${describeError(err)}`);
				}
				return "failed";
			} finally {
				stream.close();
			}
		},
	};
};
