/**
 * Status cache: the JSON sent for server-list pings.
 *
 * The aggregate player count is refreshed at most once per interval, and only
 * when a ping arrives. Concurrent pings share one refresh. Rendered payloads
 * are kept per (motd, protocol, count) and never evicted.
 */

import { describeError, type Logger, silentLogger } from "../logger/index.ts";
import type { ServerSelector } from "../selector/index.ts";

export const STATUS_REFRESH_INTERVAL = 15_000;
export const STATUS_VERSION_NAME = "Handoff";
export const STATUS_MAX_PLAYERS = 1000;

export type StatusCache = {
	/** Status JSON for one ping. Never rejects. */
	readonly getStatus: (motd: string, protocol: number) => Promise<string>;
	/** Last known aggregate count. */
	readonly playerCount: () => number;
	/** Number of rendered payloads held. */
	readonly size: () => number;
};

export type StatusCacheOptions = {
	readonly refreshInterval?: number;
	readonly now?: () => number;
	readonly logger?: Logger;
};

/** Render the status document a vanilla client expects. */
export const renderStatus = (
	motd: string,
	protocol: number,
	online: number,
): string =>
	JSON.stringify({
		version: { name: STATUS_VERSION_NAME, protocol },
		players: { max: STATUS_MAX_PLAYERS, online, sample: [] },
		description: motd,
		enforceSecureChat: false,
	});

export const createStatusCache = (
	selector: ServerSelector,
	options: StatusCacheOptions = {},
): StatusCache => {
	const interval = options.refreshInterval ?? STATUS_REFRESH_INTERVAL;
	const now = options.now ?? Date.now;
	const logger = options.logger ?? silentLogger;

	let count = 0;
	let lastRefresh = Number.NEGATIVE_INFINITY;
	let refreshing: Promise<void> | null = null;
	const entries = new Map<string, string>();

	const refresh = (): Promise<void> => {
		if (!refreshing) {
			lastRefresh = now();
			refreshing = selector
				.getPlayerCount()
				.then(
					(next) => {
						count = next;
					},
					(err: unknown) => {
						logger.warn(`Player count refresh failed: ${describeError(err)}`);
					},
				)
				.finally(() => {
					refreshing = null;
				});
		}
		return refreshing;
	};

	return {
		getStatus: async (motd, protocol) => {
			if (now() - lastRefresh >= interval) await refresh();
			else if (refreshing) await refreshing;

			const key = `${motd}\u0000${protocol}\u0000${count}`;
			const hit = entries.get(key);
			if (hit !== undefined) return hit;
			const json = renderStatus(motd, protocol, count);
			entries.set(key, json);
			return json;
		},
		playerCount: () => count,
		size: () => entries.size,
	};
};
