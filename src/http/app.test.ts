import type { Server } from "node:http";

import { parseSnapshot } from "../schema";
import { TemperatureMetrics } from "../metrics";
import { SnapshotStore } from "../state/snapshot";
import { silentLogger } from "../test/helpers";
import { createApp } from "./app";
import type { AppOptions } from "./app";
import { boundPort, close, listen } from "./server";

describe("HTTP endpoints", () => {
	let server: Server | undefined;
	let store: SnapshotStore;
	let metrics: TemperatureMetrics;

	async function start(overrides: Partial<AppOptions> = {}): Promise<string> {
		const app = createApp({
			metrics,
			store,
			logger: silentLogger(),
			telemetryPath: "/metrics",
			jsonPath: "/json",
			...overrides
		});
		server = await listen(app, { host: "127.0.0.1", port: 0 }, "127.0.0.1:0");
		return `http://127.0.0.1:${boundPort(server)}`;
	}

	beforeEach(() => {
		store = SnapshotStore.allocate(["28-000001", "28-000002"]);
		metrics = new TemperatureMetrics({ hostname: "test-host", fahrenheit: true, defaultMetrics: false });
	});

	afterEach(async () => {
		if (server) {
			await close(server);
			server = undefined;
		}
	});

	it("serves a landing page linking both endpoints", async () => {
		const base = await start();

		const res = await fetch(`${base}/`);

		expect(res.status).toBe(200);
		expect(res.headers.get("content-type")).toMatch(/^text\/html/);
		const body = await res.text();
		expect(body).toContain('<p><a href="/metrics">Metrics</a></p>');
		expect(body).toContain('<p><a href="/json">JSON Metrics</a></p>');
	});

	it("serves the current snapshot as JSON", async () => {
		const builder = store.beginPass();
		builder.set("28-000001", 21.5);
		builder.set("28-000002", -0.625);
		store.publish(builder);
		const base = await start();

		const res = await fetch(`${base}/json`);

		expect(res.status).toBe(200);
		expect(res.headers.get("content-type")).toMatch(/^application\/json/);
		expect(parseSnapshot(await res.text())).toEqual([
			{ sensorid: "28-000001", type: "temperature", value: 21.5 },
			{ sensorid: "28-000002", type: "temperature", value: -0.625 }
		]);
	});

	it("answers 200 before any device has reported", async () => {
		const base = await start();

		const res = await fetch(`${base}/json`);

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual([
			{ sensorid: "28-000001", type: "temperature", value: 0 },
			{ sensorid: "28-000002", type: "temperature", value: 0 }
		]);
	});

	it("serves the gauges in the Prometheus text format", async () => {
		metrics.record("28-000001", 21.5);
		const base = await start();

		const res = await fetch(`${base}/metrics`);

		expect(res.status).toBe(200);
		expect(res.headers.get("content-type")).toBe(metrics.contentType);
		expect(res.headers.get("content-type")).toMatch(/^text\/plain; version=0\.0\.4/);
		const body = await res.text();
		expect(body).toContain('onewire_temperature_c{device_id="28-000001",hostname="test-host"} 21.5\n');
		expect(body).toContain('onewire_temperature_f{device_id="28-000001",hostname="test-host"} 70.7\n');
	});

	it("mounts the endpoints on the configured paths", async () => {
		const base = await start({ telemetryPath: "/sensors/metrics", jsonPath: "/sensors/json" });

		expect((await fetch(`${base}/sensors/metrics`)).status).toBe(200);
		expect((await fetch(`${base}/sensors/json`)).status).toBe(200);
		expect((await fetch(`${base}/metrics`)).status).toBe(404);
		expect(await (await fetch(`${base}/`)).text()).toContain('<a href="/sensors/json">');
	});

	it("answers unknown paths with a JSON 404", async () => {
		const base = await start();

		const res = await fetch(`${base}/nope`);

		expect(res.status).toBe(404);
		expect(await res.json()).toEqual({ error: { code: "NOT_FOUND", message: "Not found" } });
	});

	it("turns a failing metrics render into a 500", async () => {
		vi.spyOn(metrics, "render").mockRejectedValue(new Error("collector failed"));
		const base = await start();

		const res = await fetch(`${base}/metrics`);

		expect(res.status).toBe(500);
		expect(await res.json()).toEqual({ error: { code: "INTERNAL_ERROR", message: "collector failed" } });
	});

	it("rejects with LISTEN_ERROR when the port is taken", async () => {
		const base = await start();
		const port = Number(new URL(base).port);
		const app = createApp({ metrics, store, logger: silentLogger(), telemetryPath: "/metrics", jsonPath: "/json" });

		await expect(listen(app, { host: "127.0.0.1", port }, `127.0.0.1:${port}`)).rejects.toMatchObject({
			code: "LISTEN_ERROR",
			message: `Can't listen on 127.0.0.1:${port}`
		});
	});
});
