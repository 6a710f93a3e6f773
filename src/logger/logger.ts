/**
 * Leveled console logger with chalk-coloured level tags.
 */

import chalk from "chalk";

export const LOG_LEVELS = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type EmitLevel = Exclude<LogLevel, "silent">;

export type Logger = {
	readonly level: LogLevel;
	readonly trace: (message: string, data?: unknown) => void;
	readonly debug: (message: string, data?: unknown) => void;
	readonly info: (message: string, data?: unknown) => void;
	readonly warn: (message: string, data?: unknown) => void;
	readonly error: (message: string, data?: unknown) => void;
	/** Same level and sink, messages prefixed with `scope`. */
	readonly child: (scope: string) => Logger;
};

/** Where formatted lines go; console by default. */
export type LogSink = (level: EmitLevel, line: string, data?: unknown) => void;

const TAGS: Readonly<Record<EmitLevel, string>> = {
	trace: chalk.dim("[TRACE]"),
	debug: chalk.gray("[DEBUG]"),
	info: chalk.blue("[INFO]"),
	warn: chalk.yellow("[WARN]"),
	error: chalk.red("[ERROR]"),
};

const consoleSink: LogSink = (level, line, data) => {
	const write =
		level === "error"
			? console.error
			: level === "warn"
				? console.warn
				: console.log;
	if (data !== undefined) write(line, data);
	else write(line);
};

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

export const createLogger = (
	options: {
		readonly level?: LogLevel;
		readonly scope?: string;
		readonly sink?: LogSink;
	} = {},
): Logger => {
	const level = options.level ?? "info";
	const sink = options.sink ?? consoleSink;
	const prefix = options.scope ? `${chalk.cyan(options.scope)}: ` : "";

	const emitter =
		(at: EmitLevel) =>
		(message: string, data?: unknown): void => {
			if (rank(at) < rank(level)) return;
			sink(at, `${TAGS[at]} ${prefix}${message}`, data);
		};

	return {
		level,
		trace: emitter("trace"),
		debug: emitter("debug"),
		info: emitter("info"),
		warn: emitter("warn"),
		error: emitter("error"),
		child: (scope) =>
			createLogger({
				level,
				sink,
				scope: options.scope ? `${options.scope}/${scope}` : scope,
			}),
	};
};

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "silent" });

/** Render an unknown thrown value for a log line. */
export const describeError = (err: unknown): string =>
	err instanceof Error ? err.message : String(err);
