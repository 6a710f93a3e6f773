/**
 * TCP listener that hands every accepted socket to its own connection.
 */

import { createServer, type Server, type Socket } from "node:net";
import { describeError, type Logger, silentLogger } from "../logger/index.ts";
import type { ProtocolCodecs } from "../protocol/packets.ts";
import { createSocketStream } from "../protocol/stream.ts";
import type { DnsClient } from "../resolver/index.ts";
import type { ServerSelector } from "../selector/index.ts";
import type { StatusCache } from "../status/index.ts";
import { createSequence } from "../util/async.ts";
import { type ConnectionOutcome, createConnection } from "./connection.ts";

export type RouterOptions = {
	readonly codecs: ProtocolCodecs;
	readonly selector: ServerSelector;
	readonly statusCache: StatusCache;
	readonly motd: string;
	readonly logger?: Logger;
	readonly dns?: DnsClient;
	/** Called after each connection finishes. */
	readonly onSettled?: (id: number, outcome: ConnectionOutcome) => void;
};

export type Router = {
	/** Start listening; resolves with the bound port. */
	readonly listen: (port: number, host?: string) => Promise<number>;
	/** Stop accepting and destroy open sockets. */
	readonly close: () => Promise<void>;
	readonly connections: () => number;
};

export const createRouter = (options: RouterOptions): Router => {
	const logger = options.logger ?? silentLogger;
	const ids = createSequence(1);
	const sockets = new Set<Socket>();

	const accept = (socket: Socket) => {
		const id = ids.next();
		sockets.add(socket);
		socket.setNoDelay(true);
		logger.debug(`Accepted #${id} from ${socket.remoteAddress ?? "?"}`);

		const connection = createConnection({
			stream: createSocketStream(socket),
			codecs: options.codecs,
			selector: options.selector,
			statusCache: options.statusCache,
			contextId: id,
			motd: options.motd,
			logger,
			dns: options.dns,
		});

		socket.once("close", () => sockets.delete(socket));
		connection
			.run()
			.then((outcome) => {
				logger.debug(`Connection #${id} ${outcome}`);
				options.onSettled?.(id, outcome);
			})
			.catch((err: unknown) =>
				logger.error(`Connection #${id} settle hook failed: ${describeError(err)}`),
			);
	};

	const server: Server = createServer(accept);
	server.on("error", (err) => logger.error(`Listener error: ${err.message}`));

	return {
		listen: (port, host = "0.0.0.0") =>
			new Promise<number>((resolve, reject) => {
				const onError = (err: Error) => reject(err);
				server.once("error", onError);
				server.listen(port, host, () => {
					server.off("error", onError);
					const address = server.address();
					const bound = typeof address === "object" && address ? address.port : port;
					logger.info(`Listening on ${host}:${bound}`);
					resolve(bound);
				});
			}),

		close: () =>
			new Promise<void>((resolve, reject) => {
				for (const socket of sockets) socket.destroy();
				server.close((err) => (err ? reject(err) : resolve()));
			}),

		connections: () => sockets.size,
	};
};
