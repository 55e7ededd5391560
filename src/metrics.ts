import { Gauge, Registry, collectDefaultMetrics } from "prom-client";

import { celsiusToFahrenheit } from "./lib/units";
import type { DeviceId } from "./onewire/devices";

export const CELSIUS_GAUGE = "onewire_temperature_c";
export const FAHRENHEIT_GAUGE = "onewire_temperature_f";

const LABELS = ["device_id", "hostname"] as const;

export interface MetricsOptions {
	hostname: string;
	fahrenheit: boolean;
	/** Process and Node.js runtime metrics next to the gauges. */
	defaultMetrics?: boolean;
}

export interface TemperatureRecord {
	celsius: number;
	/** Only set when Fahrenheit export is enabled. */
	fahrenheit?: number;
}

/**
 * Owns the registry behind the metrics endpoint. Gauges are updated one
 * device at a time, so a scrape during a pass may mix old and new values.
 */
export class TemperatureMetrics {
	readonly registry: Registry;
	private readonly hostname: string;
	private readonly celsius: Gauge<(typeof LABELS)[number]>;
	private readonly fahrenheit?: Gauge<(typeof LABELS)[number]>;

	constructor(opts: MetricsOptions) {
		this.hostname = opts.hostname;
		this.registry = new Registry();

		this.celsius = new Gauge({
			name: CELSIUS_GAUGE,
			help: "Onewire Temperature Sensor Value in Celsius.",
			labelNames: LABELS,
			registers: [this.registry]
		});

		if (opts.fahrenheit) {
			this.fahrenheit = new Gauge({
				name: FAHRENHEIT_GAUGE,
				help: "Onewire Temperature Sensor Value in Fahrenheit.",
				labelNames: LABELS,
				registers: [this.registry]
			});
		}

		if (opts.defaultMetrics ?? true) {
			collectDefaultMetrics({ register: this.registry });
		}
	}

	get fahrenheitEnabled(): boolean {
		return this.fahrenheit !== undefined;
	}

	record(deviceId: DeviceId, celsius: number): TemperatureRecord {
		const labels = { device_id: deviceId, hostname: this.hostname };
		this.celsius.set(labels, celsius);

		if (!this.fahrenheit) {
			return { celsius };
		}

		const fahrenheit = celsiusToFahrenheit(celsius);
		this.fahrenheit.set(labels, fahrenheit);
		return { celsius, fahrenheit };
	}

	render(): Promise<string> {
		return this.registry.metrics();
	}

	get contentType(): string {
		return this.registry.contentType;
	}
}
