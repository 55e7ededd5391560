import fs from "node:fs";
import path from "node:path";

import { boundPort } from "./http/server";
import type { AppConfig } from "./lib/config";
import { run } from "./run";
import type { RunningExporter } from "./run";
import { parseSnapshot } from "./schema";
import { payload, silentLogger, tempDir, writeDevice } from "./test/helpers";

function config(devicePath: string, port = 0): AppConfig {
	return {
		web: {
			listenAddress: `127.0.0.1:${port}`,
			listen: { host: "127.0.0.1", port },
			telemetryPath: "/metrics",
			jsonPath: "/json"
		},
		export: { fahrenheit: true },
		onewire: { devicePath },
		poll: { intervalMs: 60_000 },
		log: { level: "error", format: "json" }
	};
}

describe("run", () => {
	let root: string;
	let running: RunningExporter[];

	async function start(cfg: AppConfig): Promise<RunningExporter> {
		const exporter = await run(cfg, { logger: silentLogger(), hostname: "test-host", defaultMetrics: false });
		running.push(exporter);
		return exporter;
	}

	beforeEach(() => {
		root = tempDir();
		running = [];
	});

	afterEach(async () => {
		await Promise.all(running.map(exporter => exporter.stop()));
		fs.rmSync(root, { recursive: true, force: true });
	});

	it("serves the first pass once it is published", async () => {
		writeDevice(root, "28-000001", payload(21500));
		fs.mkdirSync(path.join(root, "w1_bus_master1"));

		const exporter = await start(config(root));
		await vi.waitFor(() => expect(exporter.store.generation).toBeGreaterThanOrEqual(1));
		const base = `http://127.0.0.1:${boundPort(exporter.server)}`;

		const json = await fetch(`${base}/json`);
		expect(parseSnapshot(await json.text())).toEqual([{ sensorid: "28-000001", type: "temperature", value: 21.5 }]);

		const body = await (await fetch(`${base}/metrics`)).text();
		expect(body).toContain('onewire_temperature_c{device_id="28-000001",hostname="test-host"} 21.5\n');
		expect(body).toContain('onewire_temperature_f{device_id="28-000001",hostname="test-host"} 70.7\n');
	});

	it("keeps serving with no devices", async () => {
		const exporter = await start(config(root));
		await vi.waitFor(() => expect(exporter.store.generation).toBeGreaterThanOrEqual(1));

		const res = await fetch(`http://127.0.0.1:${boundPort(exporter.server)}/json`);

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual([]);
	});

	it("rejects with DEVICE_LIST_ERROR when the device directory is missing", async () => {
		const missing = path.join(root, "absent");

		await expect(start(config(missing))).rejects.toMatchObject({
			code: "DEVICE_LIST_ERROR",
			message: `Can't read device directory ${missing}`
		});
		expect(running).toHaveLength(0);
	});

	it("rejects with LISTEN_ERROR and stops polling when the port is taken", async () => {
		writeDevice(root, "28-000001", payload(21500));
		const first = await start(config(root));
		const port = boundPort(first.server);

		await expect(start(config(root, port))).rejects.toMatchObject({
			code: "LISTEN_ERROR",
			message: `Can't listen on 127.0.0.1:${port}`
		});
		expect(running).toHaveLength(1);
	});

	it("stops the poll loop and closes the server", async () => {
		const exporter = await start(config(root));
		running = [];

		await exporter.stop();

		expect(exporter.server.listening).toBe(false);
		await expect(exporter.polling).resolves.toBeUndefined();
	});
});
