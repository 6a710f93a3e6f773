/**
 * Backend probe: a minimal server list ping that only wants `players.online`.
 * Uses the STATUS protocol state: handshake, status request, one response.
 */

import { type Socket, connect as tcpConnect } from "node:net";
import {
	type ProtocolCodecs,
	ServerInfoPacket,
	StatusPayload,
} from "../protocol/packets.ts";
import { Direction, HandshakeIntent, ProtocolState } from "../protocol/states.ts";
import { createSocketStream } from "../protocol/stream.ts";
import type { DnsClient } from "../resolver/index.ts";
import { withTimeout } from "../util/async.ts";
import { type BackendServer, resolveBackend } from "./server.ts";

/** Online player count of one backend; rejects when it cannot be obtained. */
export type PlayerCountProbe = (server: BackendServer) => Promise<number>;

export const DEFAULT_PROBE_TIMEOUT = 5000;

export type ProbeOptions = {
	readonly codecs: ProtocolCodecs;
	readonly timeout?: number;
	readonly dns?: DnsClient;
};

/** Create a probe bound to one protocol version. Each call has its own timeout. */
export const createBackendProbe = (options: ProbeOptions): PlayerCountProbe => {
	const { codecs } = options;
	const timeout = options.timeout ?? DEFAULT_PROBE_TIMEOUT;

	return (server) => {
		let socket: Socket | null = null;
		let abandoned = false;

		const attempt = async (): Promise<number> => {
			const endpoint = await resolveBackend(server, { dns: options.dns });
			if (abandoned) throw new Error("Probe abandoned before connect");

			socket = tcpConnect({ host: endpoint.ip, port: endpoint.port });
			socket.setNoDelay(true);
			const stream = createSocketStream(socket);

			await stream.write(
				codecs.frame(ProtocolState.HANDSHAKING, Direction.TO_SERVER, "set_protocol", {
					protocolVersion: codecs.protocolVersion,
					serverHost: endpoint.resolvedHost,
					serverPort: endpoint.port,
					nextState: HandshakeIntent.STATUS,
				}),
			);
			await stream.write(
				codecs.frame(ProtocolState.STATUS, Direction.TO_SERVER, "ping_start", {}),
			);

			const frame = await stream.read();
			if (!frame) throw new Error("Connection closed before status response");

			const { name, params } = codecs
				.codec(ProtocolState.STATUS, Direction.TO_CLIENT)
				.read(frame);
			if (name !== "server_info") {
				throw new Error(`Expected server_info, got ${name}`);
			}
			const { response } = ServerInfoPacket.parse(params);
			const payload: unknown = JSON.parse(response);
			return StatusPayload.parse(payload).players.online;
		};

		return withTimeout(attempt(), timeout, `Status probe of ${server.address}`).finally(
			() => {
				abandoned = true;
				socket?.destroy();
			},
		);
	};
};
