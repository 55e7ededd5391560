import fs from "node:fs/promises";
import type winston from "winston";

import { deviceIoError, deviceReadFailed, errorMessage } from "../lib/errors";
import type { AppError } from "../lib/errors";
import { sleep as defaultSleep } from "../lib/sleep";
import type { Sleep } from "../lib/sleep";
import type { DeviceId } from "./devices";
import { devicePayloadPath, parsePayload } from "./payload";

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

export type ReadFile = (file: string) => Promise<string>;

export type ReadState =
	| { kind: "reading"; attempt: number }
	| { kind: "retrying"; attempt: number }
	| { kind: "succeeded"; attempt: number; celsius: number }
	| { kind: "failed"; attempt: number; error: AppError };

/** What one attempt produced: file contents that did or did not parse, or an I/O error. */
export type AttemptResult =
	| { kind: "parsed"; celsius: number }
	| { kind: "unparsable" }
	| { kind: "io-error"; error: unknown };

export interface TransitionContext {
	deviceId: DeviceId;
	devicePayloadFile: string;
	maxAttempts: number;
}

export function initialState(): ReadState {
	return { kind: "reading", attempt: 1 };
}

/**
 * Moves the per-device read forward. An I/O error ends the read at once;
 * only an unparsable payload is retried, until `maxAttempts` is used up.
 */
export function transition(state: ReadState, ctx: TransitionContext, result?: AttemptResult): ReadState {
	switch (state.kind) {
		case "reading": {
			if (!result) {
				return state;
			}
			if (result.kind === "io-error") {
				return {
					kind: "failed",
					attempt: state.attempt,
					error: deviceIoError(ctx.deviceId, ctx.devicePayloadFile, result.error)
				};
			}
			if (result.kind === "parsed") {
				return { kind: "succeeded", attempt: state.attempt, celsius: result.celsius };
			}
			if (state.attempt >= ctx.maxAttempts) {
				return { kind: "failed", attempt: state.attempt, error: deviceReadFailed(ctx.deviceId, state.attempt) };
			}
			return { kind: "retrying", attempt: state.attempt };
		}
		case "retrying":
			return { kind: "reading", attempt: state.attempt + 1 };
		case "succeeded":
		case "failed":
			return state;
	}
}

export interface PayloadReaderOptions {
	root: string;
	hostname: string;
	logger: winston.Logger;
	maxAttempts?: number;
	retryDelayMs?: number;
	readFile?: ReadFile;
	sleep?: Sleep;
}

export class PayloadReader {
	private readonly root: string;
	private readonly hostname: string;
	private readonly logger: winston.Logger;
	private readonly maxAttempts: number;
	private readonly retryDelayMs: number;
	private readonly readFile: ReadFile;
	private readonly sleep: Sleep;

	constructor(opts: PayloadReaderOptions) {
		this.root = opts.root;
		this.hostname = opts.hostname;
		this.logger = opts.logger;
		this.maxAttempts = opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
		this.retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
		this.readFile = opts.readFile ?? (file => fs.readFile(file, "utf8"));
		this.sleep = opts.sleep ?? defaultSleep;

		if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
			throw new RangeError("maxAttempts must be a positive integer");
		}
	}

	/** Degrees Celsius for `deviceId`; rejects with an AppError once the read has failed. */
	async read(deviceId: DeviceId): Promise<number> {
		const ctx: TransitionContext = {
			deviceId,
			devicePayloadFile: devicePayloadPath(this.root, deviceId),
			maxAttempts: this.maxAttempts
		};

		let state = initialState();

		for (;;) {
			switch (state.kind) {
				case "reading":
					state = transition(state, ctx, await this.attempt(ctx.devicePayloadFile));
					break;

				case "retrying":
					this.logger.warn("Retrying read", {
						deviceId,
						devicePayloadFile: ctx.devicePayloadFile,
						hostname: this.hostname,
						attempt: state.attempt
					});
					await this.sleep(this.retryDelayMs);
					state = transition(state, ctx);
					break;

				case "succeeded":
					return state.celsius;

				case "failed":
					if (state.error.code === "DEVICE_IO_ERROR") {
						this.logger.error("Error reading device", {
							deviceId,
							devicePayloadFile: ctx.devicePayloadFile,
							error: errorMessage(state.error.cause)
						});
					}
					throw state.error;
			}
		}
	}

	private async attempt(file: string): Promise<AttemptResult> {
		let text: string;
		try {
			text = await this.readFile(file);
		} catch (error) {
			return { kind: "io-error", error };
		}

		const celsius = parsePayload(text);
		return celsius === null ? { kind: "unparsable" } : { kind: "parsed", celsius };
	}
}
