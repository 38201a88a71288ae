/**
 * Bounded remote calls.
 *
 * @module utils/remoteCall
 */

import { TransportError } from "../errors";

/**
 * Runs `call` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with a timed-out TransportError at the deadline even if the
 * callee ignores the signal. Other rejections that are not TransportErrors are
 * wrapped into one.
 *
 * @example
 * ```typescript
 * const users = await withTimeout("listRemoteUsers", 15000, (signal) =>
 *   directory.listRemoteUsers(signal),
 * );
 * ```
 */
export function withTimeout<T>(
	operation: string,
	timeoutMs: number,
	call: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
	const controller = new AbortController();

	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			controller.abort();
			reject(new TransportError(operation, `timed out after ${timeoutMs}ms`, { timedOut: true }));
		}, timeoutMs);

		let pending: Promise<T>;
		try {
			pending = call(controller.signal);
		} catch (error) {
			clearTimeout(timer);
			reject(asTransportError(operation, error));
			return;
		}

		pending.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(asTransportError(operation, error));
			},
		);
	});
}

export function asTransportError(operation: string, error: unknown): TransportError {
	if (error instanceof TransportError) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	return new TransportError(operation, message, { cause: error });
}
