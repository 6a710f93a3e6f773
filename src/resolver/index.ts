export type { EndpointErrorCode } from "./errors.ts";
export { EndpointError, isEndpointError } from "./errors.ts";
export type {
	DnsClient,
	ResolvedEndpoint,
	ResolveOptions,
} from "./resolve.ts";
export { resolveEndpoint, splitHostPort, systemDns } from "./resolve.ts";
export type { RandomSource, SrvRecord } from "./srv.ts";
export { pickSrvRecord, srvQueryName } from "./srv.ts";
