/**
 * Geo strategy: route by the client's continent, then country, else fallback.
 */

import type { PlayerCountProbe } from "../backend/probe.ts";
import { type BackendServer, describeBackend } from "../backend/server.ts";
import type { GeoLocator } from "../geo/index.ts";
import { describeError, type Logger, silentLogger } from "../logger/index.ts";
import { withTimeout } from "../util/async.ts";
import { probeAll, sumCounts, uniqueBackends } from "./fanout.ts";
import type { ServerSelector } from "./types.ts";

export const GEO_CONCURRENCY = 8;

export type GeoSelectorOptions = {
	/** Region code (continent or country, any case) to backend. */
	readonly regions: Readonly<Record<string, BackendServer>>;
	readonly fallback: BackendServer;
	readonly locator: GeoLocator;
	readonly probe: PlayerCountProbe;
	readonly timeout: number;
	readonly logger?: Logger;
};

export const createGeoSelector = (
	options: GeoSelectorOptions,
): ServerSelector => {
	const logger = options.logger ?? silentLogger;
	const regions = new Map<string, BackendServer>(
		Object.entries(options.regions).map(([code, server]) => [
			code.toUpperCase(),
			server,
		]),
	);
	const everyBackend = uniqueBackends([
		...regions.values(),
		options.fallback,
	]);

	return {
		name: "geo",

		findServer: async ({ ip }) => {
			try {
				const record = await withTimeout(
					options.locator.locate(ip),
					options.timeout,
					"Geolocation",
				);
				const server =
					regions.get(record.continent_code.toUpperCase()) ??
					regions.get(record.country_code.toUpperCase());
				if (server) {
					logger.debug(
						`${ip} in ${record.country_code}/${record.continent_code} -> ${describeBackend(server)}`,
					);
					return server;
				}
				logger.debug(
					`${ip} in ${record.country_code}/${record.continent_code} has no region, using fallback`,
				);
			} catch (err) {
				logger.warn(
					`Geolocation of ${ip} failed, using fallback: ${describeError(err)}`,
				);
			}
			return options.fallback;
		},

		getPlayerCount: async () =>
			sumCounts(
				await probeAll(everyBackend, {
					probe: options.probe,
					concurrency: GEO_CONCURRENCY,
					timeout: options.timeout,
					logger,
				}),
			),
	};
};
