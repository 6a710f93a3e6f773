export type { GeoLocator, GeoLocatorOptions } from "./locator.ts";
export {
	createGeoLocator,
	GeoRecord,
	IPINFO_LITE_URL,
	normalizeClientIp,
} from "./locator.ts";
export type { KeyValueStore } from "./store.ts";
export { createFileStore, createMemoryStore } from "./store.ts";
