export type { Logger, LogLevel, LogSink } from "./logger.ts";
export {
	createLogger,
	describeError,
	LOG_LEVELS,
	silentLogger,
} from "./logger.ts";
