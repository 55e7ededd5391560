#!/usr/bin/env node
import os from "node:os";
import { CommanderError } from "commander";

import { loadConfig } from "./lib/config";
import { asAppError, errorMessage, isFatal } from "./lib/errors";
import { createLogger } from "./lib/log";
import { run } from "./run";

async function main(): Promise<void> {
	const config = loadConfig();

	const logger = createLogger({
		serviceName: "onewire-exporter",
		level: config.log.level,
		format: config.log.format,
		logDir: config.log.dir
	});

	// SIGINT stops at once, even during startup
	process.on("SIGINT", () => {
		logger.info("Immediate stop requested", { signal: "SIGINT" });
		process.exit(0);
	});

	const exporter = await run(config, { logger, hostname: os.hostname() });

	process.on("SIGTERM", () => {
		logger.info("Stopping exporter", { signal: "SIGTERM" });
		exporter
			.stop()
			.then(() => process.exit(0))
			.catch(err => {
				logger.error("Shutdown failed", { error: errorMessage(err) });
				process.exit(1);
			});
	});

	await exporter.polling;
}

main().catch(err => {
	if (err instanceof CommanderError && err.exitCode === 0) {
		process.exit(0);
	}

	const e = asAppError(err);
	console.error(
		JSON.stringify({
			level: isFatal(e) ? "fatal" : "error",
			code: e.code,
			message: e.message,
			cause: e.cause instanceof Error ? e.cause.message : undefined
		})
	);
	process.exit(1);
});
