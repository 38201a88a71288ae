/**
 * Error taxonomy shared by the stores, the coordinator and the adapters.
 *
 * @module errors
 */

/**
 * A remote call failed to complete (timeout, connection reset, auth failure).
 * Always retryable by the caller.
 */
export class TransportError extends Error {
	public readonly operation: string;
	public readonly timedOut: boolean;

	constructor(operation: string, message: string, options: { timedOut?: boolean; cause?: unknown } = {}) {
		super(`${operation}: ${message}`, { cause: options.cause });
		this.name = "TransportError";
		this.operation = operation;
		this.timedOut = options.timedOut ?? false;
	}
}

/**
 * A local durable write or read failed. Nothing was committed for the call,
 * and the same call is safe to repeat.
 */
export class StoreError extends Error {
	public readonly operation: string;

	constructor(operation: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Store operation '${operation}' failed: ${reason}`, { cause });
		this.name = "StoreError";
		this.operation = operation;
	}
}

/** Rejected operation input. Thrown before any side effect happens. */
export class ValidationError extends Error {
	public readonly field: string;

	constructor(field: string, message: string) {
		super(message);
		this.name = "ValidationError";
		this.field = field;
	}
}

/** Missing or malformed configuration detected at startup. */
export class ConfigError extends Error {
	public readonly key: string;

	constructor(key: string, message: string) {
		super(message);
		this.name = "ConfigError";
		this.key = key;
	}
}

/** Normalises anything thrown into a message suitable for reports. */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
