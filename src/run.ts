import type { Server } from "node:http";
import type winston from "winston";

import type { AppConfig } from "./lib/config";
import type { Sleep } from "./lib/sleep";
import { createApp } from "./http/app";
import { close, listen } from "./http/server";
import { TemperatureMetrics } from "./metrics";
import { listDevices } from "./onewire/devices";
import type { ReadDir } from "./onewire/devices";
import { PayloadReader } from "./onewire/reader";
import type { ReadFile } from "./onewire/reader";
import { Poller } from "./poller";
import { SnapshotStore } from "./state/snapshot";

export interface RunDeps {
	logger: winston.Logger;
	hostname: string;
	defaultMetrics?: boolean;
	readdir?: ReadDir;
	readFile?: ReadFile;
	sleep?: Sleep;
}

export interface RunningExporter {
	server: Server;
	store: SnapshotStore;
	metrics: TemperatureMetrics;
	/** Settles when the poll loop has stopped. */
	polling: Promise<void>;
	/** Aborts the poll loop, then waits for it and for the server to close. */
	stop(): Promise<void>;
}

/**
 * Discovers devices, starts polling and binds the HTTP listener, in that
 * order. Rejects with DEVICE_LIST_ERROR before anything listens, or with
 * LISTEN_ERROR once the poll loop has been stopped again.
 */
export async function run(config: AppConfig, deps: RunDeps): Promise<RunningExporter> {
	const { logger, hostname } = deps;

	logger.info("Started", {
		hostname,
		devicePath: config.onewire.devicePath,
		intervalMs: config.poll.intervalMs,
		fahrenheit: config.export.fahrenheit
	});

	const devices = await listDevices(config.onewire.devicePath, { logger, readdir: deps.readdir });
	if (devices.length === 0) {
		logger.warn("No devices found", { devicePath: config.onewire.devicePath });
	}

	const store = SnapshotStore.allocate(devices);
	const metrics = new TemperatureMetrics({
		hostname,
		fahrenheit: config.export.fahrenheit,
		defaultMetrics: deps.defaultMetrics
	});

	const poller = new Poller({
		devices,
		reader: new PayloadReader({
			root: config.onewire.devicePath,
			hostname,
			logger,
			readFile: deps.readFile,
			sleep: deps.sleep
		}),
		store,
		metrics,
		logger,
		hostname,
		intervalMs: config.poll.intervalMs,
		sleep: deps.sleep
	});

	const abort = new AbortController();
	const polling = poller.start(abort.signal);

	const app = createApp({
		metrics,
		store,
		logger,
		telemetryPath: config.web.telemetryPath,
		jsonPath: config.web.jsonPath
	});

	let server: Server;
	try {
		server = await listen(app, config.web.listen, config.web.listenAddress);
	} catch (err) {
		abort.abort();
		await polling;
		throw err;
	}
	logger.info("Exporter listening", { httpListen: config.web.listenAddress });

	return {
		server,
		store,
		metrics,
		polling,
		async stop() {
			abort.abort();
			await Promise.all([close(server), polling]);
		}
	};
}
