export type {
	DecodedPacket,
	PacketCodec,
	Scope,
	TypeRegistry,
	WireReader,
	WireType,
	WireWriter,
} from "./codec.ts";
export {
	createPacketCodec,
	createTypeRegistry,
	createWireReader,
	createWireWriter,
	decodeValue,
	encodeValue,
} from "./codec.ts";
export type { Splitter } from "./framing.ts";
export { createSplitter, framePacket, MAX_FRAME_LENGTH } from "./framing.ts";
export type { ProtocolCodecs } from "./packets.ts";
export {
	createProtocolCodecs,
	DEFAULT_GAME_VERSION,
	HandshakePacket,
	LoginStartPacket,
	PingPacket,
	ServerInfoPacket,
	StatusPayload,
} from "./packets.ts";
export {
	canTransition,
	Direction,
	HandshakeIntent,
	ProtocolState,
	stateForIntent,
	TRANSITIONS,
} from "./states.ts";
export type { PacketStream } from "./stream.ts";
export { createSocketStream } from "./stream.ts";
export {
	encodeVarInt,
	IncompleteVarIntError,
	MAX_VARINT_SIZE,
	readVarInt,
	sizeOfVarInt,
	writeVarInt,
} from "./varint.ts";
