/**
 * Backend servers: the routing targets a selector hands out.
 */

import {
	type ResolvedEndpoint,
	type ResolveOptions,
	resolveEndpoint,
} from "../resolver/index.ts";

export const DEFAULT_PORT = 25565;

export type BackendServer = {
	/** Address text as configured; also the backend's identity. */
	readonly address: string;
	/** Port used when the address names none and no SRV record applies. */
	readonly port: number;
	readonly name?: string;
	/** Skips resolution when present. */
	readonly endpoint?: ResolvedEndpoint;
};

export const createBackendServer = (options: {
	readonly address: string;
	readonly port?: number;
	readonly name?: string;
	readonly endpoint?: ResolvedEndpoint;
}): BackendServer =>
	Object.freeze({
		address: options.address,
		port: options.port ?? DEFAULT_PORT,
		...(options.name !== undefined ? { name: options.name } : {}),
		...(options.endpoint !== undefined ? { endpoint: options.endpoint } : {}),
	});

export const sameBackend = (a: BackendServer, b: BackendServer): boolean =>
	a.address === b.address;

/** Label for log lines. */
export const describeBackend = (server: BackendServer): string =>
	server.name ? `${server.name} (${server.address})` : server.address;

/** Resolve a backend's address via SRV/DNS, or return its pre-resolved endpoint. */
export const resolveBackend = (
	server: BackendServer,
	options: Omit<ResolveOptions, "fallbackPort"> = {},
): Promise<ResolvedEndpoint> =>
	server.endpoint
		? Promise.resolve(server.endpoint)
		: resolveEndpoint(server.address, { ...options, fallbackPort: server.port });
