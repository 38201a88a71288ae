/**
 * Periodic Task
 * Runs a job on a fixed interval. Overlapping ticks are skipped through a
 * shared single-flight registry, and failures are logged without stopping
 * the schedule.
 *
 * @module services/periodicTask
 */

import { errorMessage } from "../errors";
import { StructuredLogger, logger } from "../utils/logger";
import type { SingleFlight } from "../utils/singleFlight";

export interface PeriodicTaskOptions<T> {
	name: string;
	intervalMs: number;
	/** Run once immediately when started */
	runOnStart: boolean;
	job: () => Promise<T>;
}

export type TickOutcome<T> =
	| { status: "completed"; value: T }
	| { status: "skipped" }
	| { status: "failed"; error: string };

export interface PeriodicTaskStatus {
	name: string;
	isRunning: boolean;
	inFlight: boolean;
	lastRunAt: number | null;
	lastError: string | null;
	skippedTicks: number;
	intervalMs: number;
}

export class PeriodicTask<T> {
	private intervalId: NodeJS.Timeout | null = null;
	private lastRunAt: number | null = null;
	private lastError: string | null = null;
	private skippedTicks = 0;

	constructor(
		private readonly flights: SingleFlight,
		private readonly options: PeriodicTaskOptions<T>,
	) {}

	get name(): string {
		return this.options.name;
	}

	start(): void {
		if (this.intervalId) {
			logger.warn(`${this.options.name} already running`);
			return;
		}

		this.intervalId = setInterval(() => {
			void this.tick();
		}, this.options.intervalMs);

		if (this.options.runOnStart) {
			void this.tick();
		}

		logger.info(`${this.options.name} started`, { intervalMs: this.options.intervalMs });
	}

	stop(): void {
		if (this.intervalId) {
			clearInterval(this.intervalId);
			this.intervalId = null;
		}
		logger.info(`${this.options.name} stopped`);
	}

	/**
	 * Runs the job once under the single-flight guard. Never rejects: a job
	 * failure is logged and returned as a `failed` outcome.
	 */
	async tick(): Promise<TickOutcome<T>> {
		try {
			const result = await this.flights.run(this.options.name, this.options.job);
			if (!result.ran) {
				this.skippedTicks++;
				StructuredLogger.logTask("Tick skipped, previous run still in flight", {
					operation: this.options.name,
				});
				return { status: "skipped" };
			}
			this.lastRunAt = Math.floor(Date.now() / 1000);
			this.lastError = null;
			return { status: "completed", value: result.value };
		} catch (error) {
			this.lastRunAt = Math.floor(Date.now() / 1000);
			this.lastError = errorMessage(error);
			StructuredLogger.logError(error, { operation: this.options.name });
			return { status: "failed", error: this.lastError };
		}
	}

	getStatus(): PeriodicTaskStatus {
		return {
			name: this.options.name,
			isRunning: this.intervalId !== null,
			inFlight: this.flights.isRunning(this.options.name),
			lastRunAt: this.lastRunAt,
			lastError: this.lastError,
			skippedTicks: this.skippedTicks,
			intervalMs: this.options.intervalMs,
		};
	}
}
