import type winston from "winston";

import { errorMessage } from "./lib/errors";
import { sleep as defaultSleep } from "./lib/sleep";
import type { Sleep } from "./lib/sleep";
import type { TemperatureMetrics } from "./metrics";
import type { DeviceId } from "./onewire/devices";
import type { SnapshotStore } from "./state/snapshot";

export interface DeviceReader {
	read(deviceId: DeviceId): Promise<number>;
}

export interface PollerOptions {
	devices: readonly DeviceId[];
	reader: DeviceReader;
	store: SnapshotStore;
	metrics: TemperatureMetrics;
	logger: winston.Logger;
	hostname: string;
	intervalMs: number;
	sleep?: Sleep;
}

export interface PassResult {
	succeeded: DeviceId[];
	failed: DeviceId[];
}

export type PollerState = "idle" | "polling";

export class Poller {
	private readonly opts: PollerOptions;
	private readonly sleep: Sleep;
	private currentState: PollerState = "idle";

	constructor(opts: PollerOptions) {
		this.opts = opts;
		this.sleep = opts.sleep ?? defaultSleep;
	}

	get state(): PollerState {
		return this.currentState;
	}

	/**
	 * Reads every device in discovery order. A failing device keeps its
	 * previous gauge value and snapshot slot; the snapshot is published
	 * once, after the last device.
	 */
	async runPass(): Promise<PassResult> {
		const { devices, reader, store, metrics, logger, hostname } = this.opts;
		const result: PassResult = { succeeded: [], failed: [] };
		const builder = store.beginPass();

		this.currentState = "polling";
		try {
			for (const deviceId of devices) {
				let celsius: number;
				try {
					celsius = await reader.read(deviceId);
				} catch (err) {
					logger.error("Error reading from device", { deviceId, error: errorMessage(err) });
					result.failed.push(deviceId);
					continue;
				}

				const recorded = metrics.record(deviceId, celsius);
				logger.info("Value read from device", {
					deviceId,
					value: recorded.celsius,
					...(recorded.fahrenheit !== undefined ? { fahrenheit: recorded.fahrenheit } : {}),
					hostname
				});

				builder.set(deviceId, celsius);
				result.succeeded.push(deviceId);
			}

			store.publish(builder);
		} finally {
			this.currentState = "idle";
		}

		logger.debug("Pass complete", {
			generation: store.generation,
			succeeded: result.succeeded.length,
			failed: result.failed.length
		});

		return result;
	}

	/**
	 * First pass runs immediately, then one pass every `intervalMs`. Without
	 * a signal the loop never ends.
	 */
	async start(signal?: AbortSignal): Promise<void> {
		const { logger, intervalMs } = this.opts;

		while (!signal?.aborted) {
			try {
				await this.runPass();
			} catch (err) {
				logger.error("Polling pass failed", { error: errorMessage(err) });
			}

			if (signal?.aborted) {
				break;
			}
			await this.sleep(intervalMs, signal);
		}

		logger.info("Poll loop stopped");
	}
}
