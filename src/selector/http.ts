/**
 * HTTP strategy: a remote endpoint names the backend for each client.
 * GET passes `?ip=`, POST sends `{"ip": ...}`; the reply must be
 * `{"address": string, "port"?: number}`. Any failure means the fallback.
 */

import { z } from "zod";
import type { PlayerCountProbe } from "../backend/probe.ts";
import {
	type BackendServer,
	createBackendServer,
	DEFAULT_PORT,
	describeBackend,
} from "../backend/server.ts";
import { describeError, type Logger, silentLogger } from "../logger/index.ts";
import { withTimeout } from "../util/async.ts";
import { probeAll, sumCounts } from "./fanout.ts";
import type { ServerSelector } from "./types.ts";

export const HttpSelection = z.object({
	address: z.string().min(1),
	port: z.number().int().min(1).max(65535).optional(),
	name: z.string().optional(),
});

export type HttpSelectorOptions = {
	readonly endpoint: string;
	readonly method: "GET" | "POST";
	readonly headers: Readonly<Record<string, string>>;
	readonly fallback: BackendServer;
	readonly probe: PlayerCountProbe;
	readonly timeout: number;
	readonly fetch?: typeof fetch;
	readonly logger?: Logger;
};

export const createHttpSelector = (
	options: HttpSelectorOptions,
): ServerSelector => {
	const logger = options.logger ?? silentLogger;
	const doFetch = options.fetch ?? fetch;

	const ask = async (ip: string): Promise<BackendServer> => {
		let response: Response;
		if (options.method === "GET") {
			const url = new URL(options.endpoint);
			url.searchParams.set("ip", ip);
			response = await doFetch(url, { method: "GET", headers: options.headers });
		} else {
			response = await doFetch(options.endpoint, {
				method: "POST",
				headers: { "Content-Type": "application/json", ...options.headers },
				body: JSON.stringify({ ip }),
			});
		}
		if (!response.ok) {
			throw new Error(`Selection endpoint answered ${response.status}`);
		}
		const selection = HttpSelection.parse(await response.json());
		return createBackendServer({
			address: selection.address,
			port: selection.port ?? DEFAULT_PORT,
			name: selection.name,
		});
	};

	return {
		name: "http",

		findServer: async ({ ip }) => {
			try {
				const server = await withTimeout(
					ask(ip),
					options.timeout,
					"Selection request",
				);
				logger.debug(`Endpoint chose ${describeBackend(server)} for ${ip}`);
				return server;
			} catch (err) {
				logger.warn(
					`Selection endpoint failed for ${ip}, using fallback: ${describeError(err)}`,
				);
				return options.fallback;
			}
		},

		getPlayerCount: async () =>
			sumCounts(
				await probeAll([options.fallback], {
					probe: options.probe,
					concurrency: 1,
					timeout: options.timeout,
					logger,
				}),
			),
	};
};
