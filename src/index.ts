export type { App, AppOverrides } from "./app.ts";
export { startApp } from "./app.ts";
export type { PlayerCountProbe, ProbeOptions } from "./backend/probe.ts";
export { createBackendProbe, DEFAULT_PROBE_TIMEOUT } from "./backend/probe.ts";
export type { BackendServer } from "./backend/server.ts";
export {
	createBackendServer,
	DEFAULT_PORT,
	describeBackend,
	resolveBackend,
	sameBackend,
} from "./backend/server.ts";
export * from "./config/index.ts";
export * from "./connection/index.ts";
export * from "./geo/index.ts";
export * from "./logger/index.ts";
export * from "./protocol/index.ts";
export * from "./resolver/index.ts";
export * from "./selector/index.ts";
export * from "./status/index.ts";
