/**
 * Router configuration: JSON on disk, validated with zod.
 * Keys are snake_case.
 */

import { promises as fs } from "node:fs";
import { z } from "zod";
import { LOG_LEVELS } from "../logger/index.ts";
import { DEFAULT_GAME_VERSION } from "../protocol/packets.ts";

const Port = z.number().int().min(1).max(65535);

export const ServerConfig = z.object({
	name: z.string().optional(),
	address: z.string().trim().min(1, "address cannot be empty"),
	port: Port.default(25565),
});

export const StaticConfig = z.object({
	algorithm: z.enum(["round_robin", "lowest_player_count"]),
	servers: z
		.array(ServerConfig)
		.min(1, "static.servers must contain at least one server"),
});

export const GeoConfig = z.object({
	token: z.string().min(1),
	regions: z
		.record(ServerConfig)
		.refine((r) => Object.keys(r).length > 0, {
			message: "geo.regions must contain at least one region entry",
		}),
	fallback: ServerConfig,
	cache_path: z.string().default("cache/geo.json"),
});

export const HttpConfig = z.object({
	endpoint: z.string().trim().min(1, "http.endpoint cannot be empty").url(),
	request_method: z.enum(["GET", "POST"]).default("GET"),
	headers: z.record(z.string()).default({}),
	fallback: ServerConfig,
});

export const RouterConfig = z
	.object({
		mode: z.enum(["static", "geo", "http"]),
		static: StaticConfig.optional(),
		geo: GeoConfig.optional(),
		http: HttpConfig.optional(),
		listen: z
			.object({
				host: z.string().default("0.0.0.0"),
				port: Port.default(25565),
			})
			.default({}),
		motd: z.string().default("A Minecraft Server"),
		version: z.string().default(DEFAULT_GAME_VERSION),
		timeout_seconds: z.number().positive().default(5),
		log_level: z.enum(LOG_LEVELS).default("info"),
	})
	.superRefine((cfg, ctx) => {
		if (!cfg[cfg.mode]) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: [cfg.mode],
				message: `mode '${cfg.mode}' requires a '${cfg.mode}' section`,
			});
		}
	});

export type ServerConfig = z.infer<typeof ServerConfig>;
export type StaticConfig = z.infer<typeof StaticConfig>;
export type GeoConfig = z.infer<typeof GeoConfig>;
export type HttpConfig = z.infer<typeof HttpConfig>;
export type RouterConfig = z.infer<typeof RouterConfig>;
/** Config as written by hand: defaults may be left out. */
export type RouterConfigInput = z.input<typeof RouterConfig>;

export class ConfigError extends Error {
	readonly issues: readonly string[];

	constructor(message: string, issues: readonly string[] = []) {
		super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

const formatIssue = (issue: z.ZodIssue): string =>
	`${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`;

/** Validate an already-parsed document. */
export const parseConfig = (raw: unknown): RouterConfig => {
	const result = RouterConfig.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(
			"Invalid configuration",
			result.error.issues.map(formatIssue),
		);
	}
	return result.data;
};

export const loadConfig = async (path: string): Promise<RouterConfig> => {
	let text: string;
	try {
		text = await fs.readFile(path, "utf8");
	} catch (err) {
		throw new ConfigError(
			`Cannot read config ${path}: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch (err) {
		throw new ConfigError(
			`Config ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
		);
	}
	return parseConfig(raw);
};

/** Starter document written by `--init`. */
export const defaultConfig = (): RouterConfigInput => ({
	mode: "static",
	static: {
		algorithm: "round_robin",
		servers: [
			{ name: "US-East", address: "useast.example.com", port: 25565 },
			{ name: "EU-West", address: "euwest.example.com", port: 25565 },
			{ name: "Asia", address: "asia.example.com", port: 25565 },
		],
	},
	geo: {
		token: "YOUR-TOKEN",
		regions: {
			NA: { address: "us.example.com", port: 25565 },
			EU: { address: "eu.example.com", port: 25565 },
			AS: { address: "asia.example.com", port: 25565 },
		},
		fallback: { address: "fallback.example.com", port: 25565 },
	},
	http: {
		endpoint: "https://serverselector.example.com/getserver",
		request_method: "GET",
		headers: { Authorization: "Bearer YOUR_API_TOKEN" },
		fallback: { address: "fallback.example.com", port: 25565 },
	},
	listen: { host: "0.0.0.0", port: 25565 },
	motd: "A Minecraft Server",
	version: DEFAULT_GAME_VERSION,
	timeout_seconds: 5,
	log_level: "info",
});
