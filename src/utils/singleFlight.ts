/**
 * Single-flight guard keyed by task name. A second run for a key that is
 * still in flight is skipped instead of queued.
 */

export type FlightResult<T> = { ran: true; value: T } | { ran: false };

export class SingleFlight {
	private readonly inFlight = new Set<string>();

	isRunning(key: string): boolean {
		return this.inFlight.has(key);
	}

	/**
	 * Runs `work` unless a run for `key` has not settled yet. Rejections
	 * propagate to the caller; the key is released either way.
	 */
	async run<T>(key: string, work: () => Promise<T>): Promise<FlightResult<T>> {
		if (this.inFlight.has(key)) {
			return { ran: false };
		}

		this.inFlight.add(key);
		try {
			const value = await work();
			return { ran: true, value };
		} finally {
			this.inFlight.delete(key);
		}
	}
}
