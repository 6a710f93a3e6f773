/**
 * Build the selector a router config asks for.
 */

import type { PlayerCountProbe } from "../backend/probe.ts";
import { type BackendServer, createBackendServer } from "../backend/server.ts";
import type { RouterConfig, ServerConfig } from "../config/index.ts";
import {
	createFileStore,
	createGeoLocator,
	type GeoLocator,
	type KeyValueStore,
} from "../geo/index.ts";
import { type Logger, silentLogger } from "../logger/index.ts";
import { createGeoSelector } from "./geo.ts";
import { createHttpSelector } from "./http.ts";
import { createLowestLoadSelector, createRoundRobinSelector } from "./static.ts";
import { SelectorError, type ServerSelector } from "./types.ts";

export type SelectorDeps = {
	readonly probe: PlayerCountProbe;
	readonly logger?: Logger;
	/** Overrides the ipinfo locator in geo mode. */
	readonly locator?: GeoLocator;
	/** Overrides the on-disk geo cache in geo mode. */
	readonly store?: KeyValueStore;
	readonly fetch?: typeof fetch;
};

const toBackend = (server: ServerConfig): BackendServer =>
	createBackendServer(server);

export const createServerSelector = (
	config: RouterConfig,
	deps: SelectorDeps,
): ServerSelector => {
	const logger = deps.logger ?? silentLogger;
	const timeout = config.timeout_seconds * 1000;

	switch (config.mode) {
		case "static": {
			if (!config.static) throw new SelectorError("Missing 'static' section");
			const options = {
				servers: config.static.servers.map(toBackend),
				probe: deps.probe,
				timeout,
				logger,
			};
			return config.static.algorithm === "round_robin"
				? createRoundRobinSelector(options)
				: createLowestLoadSelector(options);
		}
		case "geo": {
			const geo = config.geo;
			if (!geo) throw new SelectorError("Missing 'geo' section");
			const locator =
				deps.locator ??
				createGeoLocator({
					token: geo.token,
					store: deps.store ?? createFileStore(geo.cache_path),
					fetch: deps.fetch,
				});
			return createGeoSelector({
				regions: Object.fromEntries(
					Object.entries(geo.regions).map(([code, server]) => [
						code,
						toBackend(server),
					]),
				),
				fallback: toBackend(geo.fallback),
				locator,
				probe: deps.probe,
				timeout,
				logger,
			});
		}
		case "http": {
			const http = config.http;
			if (!http) throw new SelectorError("Missing 'http' section");
			return createHttpSelector({
				endpoint: http.endpoint,
				method: http.request_method,
				headers: http.headers,
				fallback: toBackend(http.fallback),
				probe: deps.probe,
				timeout,
				fetch: deps.fetch,
				logger,
			});
		}
	}
};
