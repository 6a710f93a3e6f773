export type { RouterConfigInput } from "./config.ts";
export {
	ConfigError,
	defaultConfig,
	GeoConfig,
	HttpConfig,
	loadConfig,
	parseConfig,
	RouterConfig,
	ServerConfig,
	StaticConfig,
} from "./config.ts";
