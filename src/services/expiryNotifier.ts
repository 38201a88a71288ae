/**
 * Expiry Notification Scheduler
 * One pass scans records expiring within the lookahead window, notifies the
 * ones due today and marks them, then publishes a summary.
 *
 * @module services/expiryNotifier
 */

import type { NotificationSettings } from "../config";
import { errorMessage } from "../errors";
import { type Clock, type InviteRecord, type NotificationDelivery, type SummarySink, TRIAL_PLAN } from "../types";
import { StructuredLogger, logger } from "../utils/logger";
import { DAY_SECONDS, daysUntil, formatUtc, nowSeconds } from "../utils/time";
import type { InviteStore } from "./inviteStore";

export type ExpiryOutcome = "notified" | "failed" | "skipped_recent" | "not_due";

export interface ExpiryEntry {
	chatId: string;
	chatUsername: string;
	plan: string;
	expiresAt: number;
	daysRemaining: number;
	outcome: ExpiryOutcome;
	reason?: string;
}

export interface ExpiryPassReport {
	ranAt: number;
	scanned: number;
	notified: number;
	failed: number;
	skippedRecent: number;
	notDue: number;
	entries: ExpiryEntry[];
}

export interface ExpiryNotifierDeps {
	store: InviteStore;
	delivery: NotificationDelivery;
	summary?: SummarySink;
	settings: Pick<NotificationSettings, "lookaheadDays" | "dedupIntervalDays" | "notifyDays">;
	clock?: Clock;
}

/** Text sent to the account holder. */
export function formatExpiryMessage(record: InviteRecord, expiresAt: number, daysRemaining: number): string {
	const plan = record.plan.toLowerCase() === TRIAL_PLAN ? "trial" : `${record.plan} plan`;
	const remaining =
		daysRemaining <= 0 ? "expires today" : daysRemaining === 1 ? "expires in 1 day" : `expires in ${daysRemaining} days`;
	return [
		`Hi ${record.chatUsername}, your ${plan} access ${remaining}.`,
		`Expiry: ${formatUtc(expiresAt)}`,
		"Contact an administrator to extend it.",
	].join("\n");
}

export function formatPassSummary(report: ExpiryPassReport): string {
	const lines = [
		`Expiry check ${formatUtc(report.ranAt)}`,
		`Scanned: ${report.scanned} | Notified: ${report.notified} | Failed: ${report.failed} | Skipped (recent): ${report.skippedRecent} | Not due: ${report.notDue}`,
	];
	for (const entry of report.entries) {
		if (entry.outcome === "notified" || entry.outcome === "failed") {
			const suffix = entry.reason ? ` (${entry.reason})` : "";
			lines.push(`- ${entry.chatUsername} [${entry.chatId}] ${entry.daysRemaining}d: ${entry.outcome}${suffix}`);
		}
	}
	return lines.join("\n");
}

export class ExpiryNotifier {
	private readonly clock: Clock;

	constructor(private readonly deps: ExpiryNotifierDeps) {
		this.clock = deps.clock ?? nowSeconds;
	}

	/**
	 * Runs one notification pass. Delivery failures are counted and leave the
	 * record unmarked so a later pass retries it.
	 *
	 * @throws {StoreError} If the expiring records cannot be listed
	 */
	async runPass(): Promise<ExpiryPassReport> {
		const now = this.clock();
		const { lookaheadDays, dedupIntervalDays, notifyDays } = this.deps.settings;
		const dedupSeconds = dedupIntervalDays * DAY_SECONDS;
		const records = this.deps.store.listExpiringBefore(now + lookaheadDays * DAY_SECONDS);

		const report: ExpiryPassReport = {
			ranAt: now,
			scanned: records.length,
			notified: 0,
			failed: 0,
			skippedRecent: 0,
			notDue: 0,
			entries: [],
		};

		for (const record of records) {
			if (record.accountExpiresAt === null) {
				continue;
			}
			const expiresAt = record.accountExpiresAt;
			const daysRemaining = daysUntil(expiresAt, now);
			const entry: ExpiryEntry = {
				chatId: record.chatId,
				chatUsername: record.chatUsername,
				plan: record.plan,
				expiresAt,
				daysRemaining,
				outcome: "not_due",
			};
			report.entries.push(entry);

			if (!notifyDays.includes(daysRemaining)) {
				report.notDue++;
				continue;
			}
			if (record.lastNotifiedAt !== null && now - record.lastNotifiedAt < dedupSeconds) {
				entry.outcome = "skipped_recent";
				report.skippedRecent++;
				continue;
			}

			const failure = await this.notify(record, expiresAt, daysRemaining, now);
			if (failure === null) {
				entry.outcome = "notified";
				report.notified++;
			} else {
				entry.outcome = "failed";
				entry.reason = failure;
				report.failed++;
			}
		}

		StructuredLogger.logTask("Expiry pass completed", {
			operation: "expiry-check",
			scanned: report.scanned,
			notified: report.notified,
			failed: report.failed,
			skippedRecent: report.skippedRecent,
			notDue: report.notDue,
		});
		await this.publishSummary(report);
		return report;
	}

	/** @returns null when delivered and marked, otherwise the failure reason */
	private async notify(record: InviteRecord, expiresAt: number, daysRemaining: number, now: number): Promise<string | null> {
		try {
			const delivery = await this.deps.delivery.send(record.chatId, formatExpiryMessage(record, expiresAt, daysRemaining));
			if (delivery.status === "unreachable") {
				logger.warn("Expiry notification not delivered", { chatId: record.chatId, reason: delivery.reason });
				return delivery.reason;
			}
			this.deps.store.setLastNotified(record.chatId, now);
			return null;
		} catch (error) {
			StructuredLogger.logError(error, { operation: "expiry-notify", chatId: record.chatId });
			return errorMessage(error);
		}
	}

	private async publishSummary(report: ExpiryPassReport): Promise<void> {
		if (!this.deps.summary) {
			return;
		}
		try {
			await this.deps.summary.sendSummary(formatPassSummary(report));
		} catch (error) {
			StructuredLogger.logError(error, { operation: "expiry-summary" });
		}
	}
}
