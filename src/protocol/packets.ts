/**
 * Per-version codecs and typed views of the packets the router exchanges.
 */

import MinecraftData from "minecraft-data";
import { z } from "zod";
import { createPacketCodec, type PacketCodec } from "./codec.ts";
import { framePacket } from "./framing.ts";
import { Direction, ProtocolState } from "./states.ts";

export const DEFAULT_GAME_VERSION = "1.21.4";

export type ProtocolCodecs = {
	/** minecraft-data version string, e.g. "1.21.4". */
	readonly version: string;
	/** Protocol number of that version, sent in outgoing handshakes. */
	readonly protocolVersion: number;
	readonly codec: (state: ProtocolState, direction: Direction) => PacketCodec;
	/** Serialize and length-prefix one packet. */
	readonly frame: (
		state: ProtocolState,
		direction: Direction,
		name: string,
		params: Record<string, unknown>,
	) => Buffer;
};

type SectionData = Record<string, { types: Record<string, unknown> } | undefined>;

/** Build lazily-created codecs for every state and direction of one game version. */
export const createProtocolCodecs = (
	version: string = DEFAULT_GAME_VERSION,
): ProtocolCodecs => {
	const mcData = MinecraftData(version);
	if (!mcData) throw new Error(`Unsupported version: ${version}`);

	const protocol = mcData.protocol as Record<string, unknown>;
	const sharedTypes = protocol.types as Record<string, unknown>;
	const protocolVersion = (mcData.version as { version: number }).version;

	const cache = new Map<string, PacketCodec>();

	const codec = (state: ProtocolState, direction: Direction): PacketCodec => {
		const key = `${state}/${direction}`;
		const cached = cache.get(key);
		if (cached) return cached;

		const section = (protocol[state] as SectionData | undefined)?.[direction];
		if (!section) {
			throw new Error(`No ${direction} packets for state ${state} in ${version}`);
		}
		const created = createPacketCodec({
			types: { ...sharedTypes, ...section.types },
		});
		cache.set(key, created);
		return created;
	};

	return {
		version,
		protocolVersion,
		codec,
		frame: (state, direction, name, params) =>
			framePacket(codec(state, direction).write(name, params)),
	};
};

// ── Packet parameter schemas ──

export const HandshakePacket = z.object({
	protocolVersion: z.number().int(),
	serverHost: z.string(),
	serverPort: z.number().int().min(0).max(65535),
	nextState: z.number().int(),
});

export type HandshakePacket = z.infer<typeof HandshakePacket>;

export const PingPacket = z.object({
	time: z.bigint(),
});

export type PingPacket = z.infer<typeof PingPacket>;

export const LoginStartPacket = z.object({
	username: z.string().min(1).max(16),
	playerUUID: z.string(),
});

export type LoginStartPacket = z.infer<typeof LoginStartPacket>;

export const ServerInfoPacket = z.object({
	response: z.string(),
});

/** Fields of the status JSON the router reads back from a backend. */
export const StatusPayload = z.object({
	players: z.object({
		online: z.number().int().nonnegative(),
	}),
});
