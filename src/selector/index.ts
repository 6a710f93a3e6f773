export type { SelectorDeps } from "./create.ts";
export { createServerSelector } from "./create.ts";
export type { FanoutOptions } from "./fanout.ts";
export { probeAll, sumCounts, uniqueBackends } from "./fanout.ts";
export type { GeoSelectorOptions } from "./geo.ts";
export { createGeoSelector, GEO_CONCURRENCY } from "./geo.ts";
export type { HttpSelectorOptions } from "./http.ts";
export { createHttpSelector, HttpSelection } from "./http.ts";
export type { StaticSelectorOptions } from "./static.ts";
export {
	createLowestLoadSelector,
	createRoundRobinSelector,
	STATIC_CONCURRENCY,
} from "./static.ts";
export type { SelectionContext, ServerSelector } from "./types.ts";
export { SelectorError } from "./types.ts";
