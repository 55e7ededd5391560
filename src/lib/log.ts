import fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";

export type LogFormat = "json" | "text";

export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug" | "silly";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

export interface LoggerOptions {
	serviceName: string;
	level?: LogLevel;
	format?: LogFormat;
	/** Also write daily-rotated files here when set. */
	logDir?: string;
	console?: boolean;
}

function ensureDir(dir: string): void {
	fs.mkdirSync(dir, { recursive: true });
}

export function buildFormat(format: LogFormat, serviceName: string): winston.Logform.Format {
	if (format === "json") {
		return winston.format.combine(
			winston.format.timestamp(),
			winston.format.errors({ stack: true }),
			winston.format.splat(),
			winston.format(info => {
				info.service = serviceName;
				return info;
			})(),
			winston.format.json()
		);
	}

	return winston.format.combine(
		winston.format.timestamp(),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.printf(info => {
			const { timestamp, level, message, stack, ...fields } = info;
			const extra = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : "";
			const trace = typeof stack === "string" ? `\n${stack}` : "";
			return `${String(timestamp)} [${serviceName}] ${level}: ${String(message)}${extra}${trace}`;
		})
	);
}

export function createLogger(opts: LoggerOptions): winston.Logger {
	const level = opts.level ?? "info";
	const format = buildFormat(opts.format ?? "json", opts.serviceName);

	const transports: winston.transport[] = [];

	if (opts.console ?? true) {
		transports.push(
			new winston.transports.Console({
				level,
				format
			})
		);
	}

	if (opts.logDir) {
		ensureDir(opts.logDir);

		transports.push(
			new DailyRotateFile({
				level,
				format,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "14d",
				zippedArchive: false
			})
		);

		transports.push(
			new DailyRotateFile({
				level: "error",
				format,
				dirname: opts.logDir,
				filename: `${opts.serviceName}.error.%DATE%.log`,
				datePattern: "YYYY-MM-DD",
				maxFiles: "30d",
				zippedArchive: false
			})
		);
	}

	return winston.createLogger({
		level,
		format,
		transports,
		// Without transports winston warns on every write
		silent: transports.length === 0
	});
}
