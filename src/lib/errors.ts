export type ErrorCode =
	| "CONFIG_ERROR"
	| "DEVICE_LIST_ERROR"
	| "DEVICE_IO_ERROR"
	| "DEVICE_READ_FAILED"
	| "LISTEN_ERROR"
	| "INTERNAL_ERROR";

const FATAL_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>(["CONFIG_ERROR", "DEVICE_LIST_ERROR", "LISTEN_ERROR"]);

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause !== undefined ? { cause: params.cause } : undefined);
		this.name = "AppError";
		this.code = params.code;
		this.details = params.details;
	}
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		message: "Unknown error",
		details: err
	});
}

/**
 * Startup errors the process cannot recover from: bad configuration,
 * an unreadable device root or a listener that cannot bind.
 */
export function isFatal(err: unknown): boolean {
	return err instanceof AppError && FATAL_CODES.has(err.code);
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		message,
		details
	});
}

export function deviceListError(root: string, cause?: unknown): AppError {
	return new AppError({
		code: "DEVICE_LIST_ERROR",
		message: `Can't read device directory ${root}`,
		details: { root },
		cause
	});
}

export function deviceIoError(deviceId: string, devicePayloadFile: string, cause?: unknown): AppError {
	return new AppError({
		code: "DEVICE_IO_ERROR",
		message: `Error reading device ${deviceId}`,
		details: { deviceId, devicePayloadFile },
		cause
	});
}

export function deviceReadFailed(deviceId: string, attempts: number): AppError {
	return new AppError({
		code: "DEVICE_READ_FAILED",
		message: `Failed to read device ${deviceId} after ${attempts} attempts`,
		details: { deviceId, attempts }
	});
}

export function listenError(address: string, cause?: unknown): AppError {
	return new AppError({
		code: "LISTEN_ERROR",
		message: `Can't listen on ${address}`,
		details: { address },
		cause
	});
}

export function toSafeErrorResponse(err: unknown): { status: number; body: { error: { code: ErrorCode; message: string } } } {
	const e = asAppError(err);

	// Internal details stay in the logs
	return {
		status: 500,
		body: {
			error: {
				code: e.code,
				message: e.message
			}
		}
	};
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
