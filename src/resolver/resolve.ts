/**
 * Endpoint resolution for server addresses.
 * Turns "host", "host:port", "[v6]:port", "[v6]" or a bare IPv6 literal into
 * a concrete address and port, consulting SRV records when no port is given.
 */

import { lookup, resolveSrv } from "node:dns/promises";
import { isIP } from "node:net";
import { EndpointError } from "./errors.ts";
import { pickSrvRecord, type RandomSource, type SrvRecord, srvQueryName } from "./srv.ts";

export type ResolvedEndpoint = {
	readonly ip: string;
	readonly port: number;
	readonly originalInput: string;
	readonly resolvedHost: string;
};

/** The two DNS queries the resolver makes; node:dns by default. */
export type DnsClient = {
	readonly lookupHost: (host: string) => Promise<readonly string[]>;
	readonly resolveSrv: (name: string) => Promise<readonly SrvRecord[]>;
};

export const systemDns: DnsClient = {
	lookupHost: async (host) => {
		const addresses = await lookup(host, { all: true });
		return addresses.map((a) => a.address);
	},
	resolveSrv: (name) => resolveSrv(name),
};

export type ResolveOptions = {
	readonly service?: string;
	readonly protocol?: string;
	readonly fallbackPort?: number;
	readonly dns?: DnsClient;
	readonly random?: RandomSource;
};

// ── Parsing ──

const parsePort = (text: string, input: string): number => {
	if (!/^\d{1,5}$/.test(text)) throw new EndpointError("InvalidHostPort", input);
	const port = Number(text);
	if (port > 65535) throw new EndpointError("InvalidHostPort", input);
	return port;
};

/**
 * Split an address into host and optional port.
 * Brackets are only legal around the whole host; a multi-colon string that
 * parses as IPv6 is a literal without a port.
 */
export const splitHostPort = (
	input: string,
): { host: string; port: number | null } => {
	if (input.startsWith("[")) {
		const end = input.indexOf("]");
		if (end < 0) throw new EndpointError("InvalidHostPort", input);
		const host = input.slice(1, end);
		if (host.length === 0 || host.includes("[")) {
			throw new EndpointError("InvalidHostPort", input);
		}
		const rest = input.slice(end + 1);
		if (rest.length === 0) return { host, port: null };
		if (!rest.startsWith(":")) throw new EndpointError("InvalidHostPort", input);
		return { host, port: parsePort(rest.slice(1), input) };
	}

	if (input.includes("[") || input.includes("]")) {
		throw new EndpointError("InvalidHostPort", input);
	}

	const colons = input.split(":").length - 1;
	if (colons === 0) return { host: input, port: null };
	if (colons > 1 && isIP(input) === 6) return { host: input, port: null };

	const idx = input.lastIndexOf(":");
	const host = input.slice(0, idx);
	const portText = input.slice(idx + 1);
	if (host.length === 0 || portText.length === 0) {
		throw new EndpointError("InvalidHostPort", input);
	}
	return { host, port: parsePort(portText, input) };
};

const stripRootDot = (host: string): string => {
	const trimmed = host.trim();
	return trimmed.endsWith(".") ? trimmed.slice(0, -1) : trimmed;
};

// ── Resolution ──

const firstAddress = async (
	dns: DnsClient,
	host: string,
): Promise<string> => {
	const [first] = await dns.lookupHost(host);
	if (first === undefined) throw new EndpointError("NoAddress", host);
	return first;
};

const lookupSrv = async (
	dns: DnsClient,
	name: string,
): Promise<readonly SrvRecord[]> => {
	try {
		return await dns.resolveSrv(name);
	} catch {
		// No SRV record is the common case; the plain lookup below decides.
		return [];
	}
};

/** Resolve an address to an ip and port. Never cached; SRV choice is re-drawn each call. */
export const resolveEndpoint = async (
	input: string,
	options: ResolveOptions = {},
): Promise<ResolvedEndpoint> => {
	const service = options.service ?? "minecraft";
	const protocol = options.protocol ?? "tcp";
	const fallbackPort = options.fallbackPort ?? 25565;
	const dns = options.dns ?? systemDns;

	const { host: rawHost, port } = splitHostPort(input.trim());

	if (port !== null) {
		const ip = isIP(rawHost) ? rawHost : await firstAddress(dns, rawHost);
		return { ip, port, originalInput: input, resolvedHost: rawHost };
	}

	const host = stripRootDot(rawHost);
	if (isIP(host)) {
		return { ip: host, port: fallbackPort, originalInput: input, resolvedHost: host };
	}

	if (!/[a-z]/i.test(host)) throw new EndpointError("NoSrvAndNoFallback", input);

	const records = await lookupSrv(dns, srvQueryName(service, protocol, host));
	const chosen = pickSrvRecord(records, options.random);
	const target = chosen ? stripRootDot(chosen.name) : "";
	if (chosen && target.length > 0) {
		return { ip: target, port: chosen.port, originalInput: input, resolvedHost: target };
	}

	const ip = await firstAddress(dns, host);
	return { ip, port: fallbackPort, originalInput: input, resolvedHost: host };
};
