#!/usr/bin/env -S node --import tsx
/**
 * handoff CLI
 *
 *   handoff --config config.json          start the router
 *   handoff --config config.json --init   write a starter config and exit
 *   handoff --port 25577                  override listen.port
 */

import { promises as fs } from "node:fs";
import chalk from "chalk";
import yargs from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { startApp } from "./app.ts";
import {
	ConfigError,
	defaultConfig,
	loadConfig,
	parseConfig,
} from "./config/index.ts";
import { createLogger, describeError } from "./logger/index.ts";

const writeStarterConfig = async (path: string): Promise<boolean> => {
	try {
		await fs.writeFile(path, `${JSON.stringify(defaultConfig(), null, "\t")}\n`, {
			flag: "wx",
		});
		return true;
	} catch (err) {
		if (err instanceof Error && "code" in err && err.code === "EEXIST") return false;
		throw err;
	}
};

const main = async () => {
	const argv = await yargs(hideBin(process.argv))
		.scriptName("handoff")
		.usage("$0 [options]")
		.option("config", {
			alias: "c",
			type: "string",
			default: "config.json",
			desc: "Path to the JSON config file",
		})
		.option("port", {
			alias: "p",
			type: "number",
			desc: "Listen port (overrides listen.port)",
		})
		.option("init", {
			type: "boolean",
			default: false,
			desc: "Write a starter config to --config and exit",
		})
		.strict()
		.help()
		.alias("h", "help")
		.parse();

	if (argv.init) {
		const written = await writeStarterConfig(argv.config);
		console.log(
			written
				? chalk.green(`Wrote ${argv.config}`)
				: chalk.yellow(`${argv.config} already exists, left untouched`),
		);
		return;
	}

	const loaded = await loadConfig(argv.config);
	const config =
		argv.port === undefined
			? loaded
			: parseConfig({ ...loaded, listen: { ...loaded.listen, port: argv.port } });

	const logger = createLogger({ level: config.log_level });
	const app = await startApp(config, { logger });

	const shutdown = () => {
		logger.info("Shutting down");
		app
			.close()
			.then(() => process.exit(0))
			.catch((err: unknown) => {
				logger.error(`Shutdown failed: ${describeError(err)}`);
				process.exit(1);
			});
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);
};

main().catch((err: unknown) => {
	const prefix = err instanceof ConfigError ? "Config error" : "Failed to start";
	console.error(chalk.red(`${prefix}: ${describeError(err)}`));
	process.exit(1);
});
