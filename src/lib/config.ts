import "dotenv/config";
import { Command, CommanderError, Option } from "commander";

import { configError } from "./errors";
import { LOG_LEVELS } from "./log";
import type { LogFormat, LogLevel } from "./log";

export interface ListenAddress {
	/** Undefined binds every interface, as in ":8105". */
	host?: string;
	port: number;
}

export interface AppConfig {
	web: {
		listenAddress: string;
		listen: ListenAddress;
		telemetryPath: string;
		jsonPath: string;
	};

	export: {
		fahrenheit: boolean;
	};

	onewire: {
		devicePath: string;
	};

	poll: {
		intervalMs: number;
	};

	log: {
		level: LogLevel;
		format: LogFormat;
		dir?: string;
	};
}

/* ---------- defaults ---------- */

export const DEFAULT_LISTEN_ADDRESS = ":8105";
export const DEFAULT_TELEMETRY_PATH = "/metrics";
export const DEFAULT_JSON_PATH = "/json";
export const DEFAULT_DEVICE_PATH = "/sys/bus/w1/devices";
export const DEFAULT_POLL_INTERVAL_MS = 60_000;

/** Largest delay a Node.js timer accepts; longer ones fire after 1 ms. */
export const MAX_POLL_INTERVAL_MS = 2_147_483_647;

type CliOptions = {
	"web.listenAddress": string;
	"web.telemetryPath": string;
	"web.jsonPath": string;
	"export.fahrenheit": boolean | string;
	"onewire.devicePath": string;
	"poll.interval": string;
	"log.level": string;
	"log.format": string;
	"log.dir"?: string;
};

function buildProgram(): Command {
	const program = new Command();

	program
		.name("onewire-exporter")
		.description("Exports 1-Wire temperature sensors as Prometheus gauges and JSON")
		.addOption(
			new Option("--web.listen-address <address>", "Address and port to expose metrics")
				.env("WEB_LISTEN_ADDRESS")
				.default(DEFAULT_LISTEN_ADDRESS)
		)
		.addOption(
			new Option("--web.telemetry-path <path>", "Path under which to expose metrics")
				.env("WEB_TELEMETRY_PATH")
				.default(DEFAULT_TELEMETRY_PATH)
		)
		.addOption(
			new Option("--web.json-path <path>", "Path under which to expose json metrics")
				.env("WEB_JSON_PATH")
				.default(DEFAULT_JSON_PATH)
		)
		.addOption(
			new Option("--export.fahrenheit [enabled]", "Include Fahrenheit in export")
				.env("EXPORT_FAHRENHEIT")
				.default(false)
		)
		.addOption(
			new Option("--onewire.device-path <dir>", "Directory holding the 1-Wire device folders")
				.env("ONEWIRE_DEVICE_PATH")
				.default(DEFAULT_DEVICE_PATH)
		)
		.addOption(
			new Option("--poll.interval <ms>", "Pause between two polling passes in milliseconds")
				.env("POLL_INTERVAL_MS")
				.default(String(DEFAULT_POLL_INTERVAL_MS))
		)
		.addOption(new Option("--log.level <level>", "Minimum log level").env("LOG_LEVEL").default("info"))
		.addOption(new Option("--log.format <format>", "Log line format (json|text)").env("LOG_FORMAT").default("json"))
		.addOption(new Option("--log.dir <dir>", "Also write rotated log files to this directory").env("LOG_DIR"))
		.allowExcessArguments(false)
		.exitOverride();

	return program;
}

/* ---------- parsing helpers ---------- */

export function parseBoolean(value: boolean | string): boolean {
	if (typeof value === "boolean") {
		return value;
	}

	switch (value.trim().toLowerCase()) {
		case "1":
		case "t":
		case "true":
		case "yes":
			return true;
		case "0":
		case "f":
		case "false":
		case "no":
		case "":
			return false;
		default:
			throw configError(`Invalid boolean value '${value}'`);
	}
}

export function parseListenAddress(address: string): ListenAddress {
	const match = /^(?:\[([^\]]+)\]|([^:[\]]*)):(\d+)$/.exec(address.trim());
	if (!match) {
		throw configError(`Invalid listen address '${address}' (expected [host]:port)`);
	}

	const host = match[1] ?? (match[2] || undefined);
	const port = Number(match[3]);
	if (!Number.isInteger(port) || port < 0 || port > 65535) {
		throw configError(`Invalid port in listen address '${address}'`);
	}

	return host ? { host, port } : { port };
}

function parseInterval(raw: string): number {
	const ms = Number(raw);
	if (!Number.isInteger(ms) || ms <= 0) {
		throw configError(`poll.interval must be a positive integer number of milliseconds, got '${raw}'`);
	}
	if (ms > MAX_POLL_INTERVAL_MS) {
		throw configError(`poll.interval must not exceed ${MAX_POLL_INTERVAL_MS} ms, got '${raw}'`);
	}
	return ms;
}

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some(l => l === value);
}

function isLogFormat(value: string): value is LogFormat {
	return value === "json" || value === "text";
}

/**
 * Accepts the single-dash long flags older invocations use
 * (`-web.listen-address=:9000`, `-export.fahrenheit`) by adding the
 * second dash commander expects.
 */
export function normalizeArgv(argv: readonly string[]): string[] {
	return argv.map((arg, i) => (i >= 2 && /^-[a-z][\w-]*\.[\w.-]+(=|$)/.test(arg) ? `-${arg}` : arg));
}

/* ---------- validation ---------- */

function validatePath(name: string, value: string): void {
	if (!value.startsWith("/")) {
		throw configError(`${name} must start with '/', got '${value}'`);
	}
	if (value === "/") {
		throw configError(`${name} must not be '/', the landing page lives there`);
	}
}

function validateConfig(cfg: AppConfig): void {
	validatePath("web.telemetry-path", cfg.web.telemetryPath);
	validatePath("web.json-path", cfg.web.jsonPath);

	if (cfg.web.telemetryPath === cfg.web.jsonPath) {
		throw configError("web.telemetry-path and web.json-path must differ");
	}

	if (!cfg.onewire.devicePath.trim()) {
		throw configError("onewire.device-path must not be empty");
	}

	if (!Number.isFinite(cfg.poll.intervalMs) || cfg.poll.intervalMs <= 0) {
		throw configError("poll.interval must be a positive number");
	}
	if (cfg.poll.intervalMs > MAX_POLL_INTERVAL_MS) {
		throw configError(`poll.interval must not exceed ${MAX_POLL_INTERVAL_MS} ms`);
	}
}

/* ---------- public API ---------- */

/**
 * Reads flags (and their environment fallbacks) from `argv`.
 * Commander's help and version exits surface as a `CommanderError`
 * with exit code 0; every other problem is a CONFIG_ERROR.
 */
export function loadConfig(argv: readonly string[] = process.argv): AppConfig {
	const program = buildProgram();

	try {
		program.parse(normalizeArgv(argv));
	} catch (err) {
		if (err instanceof CommanderError && err.exitCode === 0) {
			throw err;
		}
		throw configError(err instanceof Error ? err.message : String(err));
	}

	const opts = program.opts<CliOptions>();

	const level = opts["log.level"].toLowerCase();
	if (!isLogLevel(level)) {
		throw configError(`log.level must be one of: ${LOG_LEVELS.join(", ")}`);
	}

	const format = opts["log.format"].toLowerCase();
	if (!isLogFormat(format)) {
		throw configError("log.format must be one of: json, text");
	}

	const listen = parseListenAddress(opts["web.listenAddress"]);
	if (listen.port === 0) {
		throw configError("web.listen-address needs a non-zero port");
	}

	const cfg: AppConfig = {
		web: {
			listenAddress: opts["web.listenAddress"],
			listen,
			telemetryPath: opts["web.telemetryPath"],
			jsonPath: opts["web.jsonPath"]
		},
		export: {
			fahrenheit: parseBoolean(opts["export.fahrenheit"])
		},
		onewire: {
			devicePath: opts["onewire.devicePath"]
		},
		poll: {
			intervalMs: parseInterval(opts["poll.interval"])
		},
		log: {
			level,
			format,
			dir: opts["log.dir"]
		}
	};

	validateConfig(cfg);

	return cfg;
}
