/**
 * Static pool strategies: round robin and lowest player count.
 */

import type { PlayerCountProbe } from "../backend/probe.ts";
import { type BackendServer, describeBackend } from "../backend/server.ts";
import { type Logger, silentLogger } from "../logger/index.ts";
import { probeAll, sumCounts } from "./fanout.ts";
import { SelectorError, type ServerSelector } from "./types.ts";

export const STATIC_CONCURRENCY = 5;

export type StaticSelectorOptions = {
	readonly servers: readonly BackendServer[];
	readonly probe: PlayerCountProbe;
	/** Per-probe timeout in milliseconds. */
	readonly timeout: number;
	readonly logger?: Logger;
};

/**
 * Round robin. The cursor holds the index of the last pick and starts on the
 * last slot, so advance-then-read hands out index 0 first and then walks the
 * pool in order, wrapping at its length.
 */
export const createRoundRobinSelector = (
	options: StaticSelectorOptions,
): ServerSelector => {
	const servers = [...options.servers];
	const logger = options.logger ?? silentLogger;
	let cursor = servers.length - 1;

	return {
		name: "round_robin",

		// Synchronous body: the cursor update cannot interleave with another caller.
		findServer: async () => {
			if (servers.length === 0) throw new SelectorError();
			cursor = (cursor + 1) % servers.length;
			return servers[cursor];
		},

		getPlayerCount: async () =>
			sumCounts(
				await probeAll(servers, {
					probe: options.probe,
					concurrency: STATIC_CONCURRENCY,
					timeout: options.timeout,
					logger,
				}),
			),
	};
};

/**
 * Lowest player count. Every backend is probed per selection; one that fails
 * or times out scores +Infinity, so it loses to any responsive backend but is
 * still returned when nothing answers. Ties go to the earlier pool entry.
 */
export const createLowestLoadSelector = (
	options: StaticSelectorOptions,
): ServerSelector => {
	const servers = [...options.servers];
	const logger = options.logger ?? silentLogger;

	const fanout = () =>
		probeAll(servers, {
			probe: options.probe,
			concurrency: STATIC_CONCURRENCY,
			timeout: options.timeout,
			logger,
		});

	return {
		name: "lowest_player_count",

		findServer: async () => {
			if (servers.length === 0) throw new SelectorError();
			const scores = (await fanout()).map(
				(count) => count ?? Number.POSITIVE_INFINITY,
			);

			let best = 0;
			for (let i = 1; i < servers.length; i++) {
				if (scores[i] < scores[best]) best = i;
			}
			logger.debug(
				`Lowest load: ${describeBackend(servers[best])} with score ${scores[best]}`,
			);
			return servers[best];
		},

		getPlayerCount: async () => sumCounts(await fanout()),
	};
};
