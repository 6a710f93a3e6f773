/**
 * Bounded probe fan-out. Failures and timeouts become `null`, never errors.
 */

import type { PlayerCountProbe } from "../backend/probe.ts";
import { type BackendServer, describeBackend, sameBackend } from "../backend/server.ts";
import { describeError, type Logger } from "../logger/index.ts";
import { mapConcurrent, withTimeout } from "../util/async.ts";

export type FanoutOptions = {
	readonly probe: PlayerCountProbe;
	/** Max probes in flight. */
	readonly concurrency: number;
	/** Per-probe limit in milliseconds. */
	readonly timeout: number;
	readonly logger: Logger;
};

/** Probe every server; result i is server i's count, or null if it failed. */
export const probeAll = (
	servers: readonly BackendServer[],
	options: FanoutOptions,
): Promise<(number | null)[]> =>
	mapConcurrent(servers, options.concurrency, async (server) => {
		try {
			return await withTimeout(
				options.probe(server),
				options.timeout,
				`Probe of ${server.address}`,
			);
		} catch (err) {
			options.logger.debug(
				`No player count from ${describeBackend(server)}: ${describeError(err)}`,
			);
			return null;
		}
	});

export const sumCounts = (counts: readonly (number | null)[]): number =>
	counts.reduce<number>((sum, count) => sum + (count ?? 0), 0);

/** Drop later servers that repeat an earlier backend. */
export const uniqueBackends = (
	servers: readonly BackendServer[],
): BackendServer[] =>
	servers.filter(
		(server, index) =>
			servers.findIndex((earlier) => sameBackend(earlier, server)) === index,
	);
