/**
 * Wire a validated config into a listening router.
 */

import { createBackendProbe } from "./backend/probe.ts";
import type { RouterConfig } from "./config/index.ts";
import { createRouter, type Router } from "./connection/index.ts";
import type { GeoLocator, KeyValueStore } from "./geo/index.ts";
import { createLogger, type Logger } from "./logger/index.ts";
import { createProtocolCodecs } from "./protocol/packets.ts";
import type { DnsClient } from "./resolver/index.ts";
import { createServerSelector, type ServerSelector } from "./selector/index.ts";
import { createStatusCache, type StatusCache } from "./status/index.ts";

export type AppOverrides = {
	readonly logger?: Logger;
	readonly dns?: DnsClient;
	readonly fetch?: typeof fetch;
	readonly locator?: GeoLocator;
	readonly store?: KeyValueStore;
};

export type App = {
	readonly router: Router;
	readonly selector: ServerSelector;
	readonly statusCache: StatusCache;
	/** Port actually bound. */
	readonly port: number;
	readonly close: () => Promise<void>;
};

export const startApp = async (
	config: RouterConfig,
	overrides: AppOverrides = {},
): Promise<App> => {
	const logger = overrides.logger ?? createLogger({ level: config.log_level });
	const timeout = config.timeout_seconds * 1000;
	const codecs = createProtocolCodecs(config.version);

	const selector = createServerSelector(config, {
		probe: createBackendProbe({ codecs, timeout, dns: overrides.dns }),
		logger: logger.child(config.mode),
		locator: overrides.locator,
		store: overrides.store,
		fetch: overrides.fetch,
	});
	const statusCache = createStatusCache(selector, {
		logger: logger.child("status"),
	});
	const router = createRouter({
		codecs,
		selector,
		statusCache,
		motd: config.motd,
		logger,
		dns: overrides.dns,
	});

	logger.info(
		`Routing with ${selector.name} (game version ${codecs.version}, protocol ${codecs.protocolVersion})`,
	);
	const port = await router.listen(config.listen.port, config.listen.host);
	return { router, selector, statusCache, port, close: router.close };
};
