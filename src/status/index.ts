export type { StatusCache, StatusCacheOptions } from "./statusCache.ts";
export {
	createStatusCache,
	renderStatus,
	STATUS_MAX_PLAYERS,
	STATUS_REFRESH_INTERVAL,
	STATUS_VERSION_NAME,
} from "./statusCache.ts";
