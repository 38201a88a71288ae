/**
 * Lifecycle Coordinator
 * Applies issue, extend and remove to both the provisioning service and the
 * local store. Remote calls are bounded by the configured timeout. Every
 * step of a multi-step operation is failure-isolated and reported; nothing
 * after input validation throws.
 *
 * @module services/lifecycleCoordinator
 */

import type { InviteSettings } from "../config";
import { StoreError, TransportError, ValidationError, errorMessage } from "../errors";
import {
	type Actor,
	type AdminActionKind,
	type Clock,
	type CreateInviteRequest,
	type InviteRecord,
	type PlanName,
	type RemoteMutation,
	type RemoteResult,
	type SummarySink,
	TRIAL_PLAN,
} from "../types";
import { StructuredLogger } from "../utils/logger";
import { withTimeout } from "../utils/remoteCall";
import {
	DAY_SECONDS,
	type DurationParts,
	MONTH_SECONDS,
	durationFromParts,
	formatDate,
	nowSeconds,
} from "../utils/time";
import type { AuditLog } from "./auditLog";
import type { DirectoryCache } from "./directoryCache";
import type { IdentityCandidate, IdentityResolver, ResolveHints } from "./identityResolver";
import type { InviteStore } from "./inviteStore";

export type StepFailureReason = "not_found" | "rejected" | "transport" | "store" | "missing_record";

export type StepOutcome =
	| { status: "succeeded"; detail?: string }
	| { status: "failed"; reason: StepFailureReason; message: string }
	| { status: "not_attempted"; reason: string };

export interface IssueRequest {
	actor: Actor;
	chatId: string;
	chatUsername: string;
	plan: PlanName;
	/** 0 issues a non-expiring account */
	accountDurationDays: number;
	linkDurationDays: number;
	profile: string;
	/** Defaults to the configured label format for the plan */
	label?: string;
}

export interface TrialRequest {
	actor: Actor;
	chatId: string;
	chatUsername: string;
}

/** Paid plans are named after the provisioning profile they issue against. */
export interface PaidRequest {
	actor: Actor;
	chatId: string;
	chatUsername: string;
	plan: PlanName;
	months?: number;
	days?: number;
	label?: string;
}

export interface SupersededInvite {
	previousInviteCode: string;
	previousPlan: PlanName;
	inviteDeletion: StepOutcome;
}

export interface IssueReport {
	chatId: string;
	plan: PlanName;
	label: string;
	inviteCode: string | null;
	/** Code appended to the configured link base; null without one */
	inviteLink: string | null;
	remoteCreate: StepOutcome;
	localWrite: StepOutcome;
	/** Active unclaimed invite replaced by this one */
	superseded: SupersededInvite | null;
	record: InviteRecord | null;
	audited: boolean;
}

export interface ExtendRequest {
	actor: Actor;
	remoteUsername: string;
	chatId?: string | null;
	duration: DurationParts;
}

export interface ExtendReport {
	remoteUsername: string;
	chatId: string | null;
	durationSeconds: number;
	newExpiresAt: number | null;
	remoteExtend: StepOutcome;
	localUpdate: StepOutcome;
	audited: boolean;
}

export interface RemoveRequest {
	actor: Actor;
	identifier: string;
	hints?: ResolveHints;
}

export interface RemovalReport {
	identifier: string;
	candidates: IdentityCandidate[];
	chatId: string | null;
	/** Remote username whose deletion decided the account step, if any */
	remoteUsername: string | null;
	remoteAccount: StepOutcome;
	inviteCode: StepOutcome;
	localDisable: StepOutcome;
	audited: boolean;
}

export interface LifecycleCoordinatorDeps {
	store: InviteStore;
	cache: DirectoryCache;
	audit: AuditLog;
	resolver: IdentityResolver;
	remote: RemoteMutation;
	invites: InviteSettings;
	/** Bound applied to each remote call */
	timeoutMs: number;
	/** Receives a short report of every admin action */
	adminLog?: SummarySink;
	clock?: Clock;
}

/**
 * Fills `{chat_username}`, `{chat_id}`, `{plan}` and `{date}` in a label
 * template. Unknown placeholders are left as written.
 */
export function formatLabel(
	template: string,
	values: { chatUsername: string; chatId: string; plan: PlanName; date: string },
): string {
	const table: Record<string, string> = {
		chat_username: values.chatUsername,
		chat_id: values.chatId,
		plan: values.plan,
		date: values.date,
	};
	return template.replace(/\{(\w+)\}/g, (match, key: string) => table[key] ?? match);
}

/**
 * Renders an admin action for the admin log: a title line, the actor, the
 * target and the step outcomes.
 */
export function formatAdminAction(
	actor: Actor,
	action: AdminActionKind,
	targetChatId: string | null,
	targetRemoteUsername: string | null,
	details: Record<string, unknown>,
): string {
	const detailText = Object.entries(details)
		.map(([key, value]) => `${key}=${String(value)}`)
		.join(", ");
	return [
		`Admin action: ${action}`,
		`By: ${actor.name} [${actor.id}]`,
		`Chat: ${targetChatId ?? "-"} | Remote: ${targetRemoteUsername ?? "-"}`,
		detailText,
	].join("\n");
}

const succeeded = (detail?: string): StepOutcome => (detail === undefined ? { status: "succeeded" } : { status: "succeeded", detail });

const failed = (reason: StepFailureReason, message: string): StepOutcome => ({ status: "failed", reason, message });

const notAttempted = (reason: string): StepOutcome => ({ status: "not_attempted", reason });

/** Maps a non-ok remote result to a failed step. */
const remoteFailure = (result: Exclude<RemoteResult<unknown>, { status: "ok" }>): StepOutcome =>
	result.status === "not_found" ? failed("not_found", result.message) : failed("rejected", result.message);

/** Maps a thrown error to a failed step; store failures keep their reason. */
const thrownFailure = (error: unknown): StepOutcome => {
	if (error instanceof StoreError) {
		return failed("store", error.message);
	}
	if (error instanceof TransportError) {
		return failed("transport", error.message);
	}
	return failed("transport", errorMessage(error));
};

const requireText = (field: string, value: string | null | undefined): string => {
	const trimmed = value?.trim() ?? "";
	if (!trimmed) {
		throw new ValidationError(field, `${field} is required`);
	}
	return trimmed;
};

const requireWholeDays = (field: string, value: number): void => {
	if (!Number.isInteger(value) || value < 0) {
		throw new ValidationError(field, `${field} must be a non-negative integer`);
	}
};

export class LifecycleCoordinator {
	private readonly clock: Clock;

	constructor(private readonly deps: LifecycleCoordinatorDeps) {
		this.clock = deps.clock ?? nowSeconds;
	}

	/**
	 * Issues a trial invite using the configured trial profile, durations and
	 * label format.
	 *
	 * @throws {ValidationError} If the chat id or username is empty
	 */
	async issueTrial(request: TrialRequest): Promise<IssueReport> {
		const { invites } = this.deps;
		return this.issue({
			actor: request.actor,
			chatId: request.chatId,
			chatUsername: request.chatUsername,
			plan: TRIAL_PLAN,
			accountDurationDays: invites.trialAccountDays,
			linkDurationDays: invites.trialLinkDays,
			profile: invites.trialProfile,
		});
	}

	/**
	 * Issues a paid invite against the profile named by the plan. The account
	 * lasts `months` * 30 + `days` days; the link uses the paid validity and
	 * label format.
	 *
	 * @throws {ValidationError} If the duration is not positive or the plan is the trial plan
	 */
	async issuePaid(request: PaidRequest): Promise<IssueReport> {
		const plan = requireText("plan", request.plan);
		if (plan.toLowerCase() === TRIAL_PLAN) {
			throw new ValidationError("plan", "trial invites are issued with issueTrial");
		}
		const months = request.months ?? 0;
		const days = request.days ?? 0;
		requireWholeDays("months", months);
		requireWholeDays("days", days);
		const accountDurationDays = (months * MONTH_SECONDS) / DAY_SECONDS + days;
		if (accountDurationDays <= 0) {
			throw new ValidationError("duration", "A duration greater than zero is required");
		}

		return this.issue({
			actor: request.actor,
			chatId: request.chatId,
			chatUsername: request.chatUsername,
			plan,
			accountDurationDays,
			linkDurationDays: this.deps.invites.paidLinkDays,
			profile: plan,
			label: request.label,
		});
	}

	/**
	 * Creates a remote invite, then records it locally. A failed create
	 * leaves the store untouched, and so does a profile the service does not
	 * offer. An existing active, unexpired invite that was never
	 * claimed is superseded and its code deleted remotely (best effort).
	 *
	 * @throws {ValidationError} On bad input, before any side effect
	 * @throws {StoreError} If the existing record cannot be read, before any side effect
	 */
	async issue(request: IssueRequest): Promise<IssueReport> {
		const chatId = requireText("chatId", request.chatId);
		const chatUsername = requireText("chatUsername", request.chatUsername);
		const plan = requireText("plan", request.plan);
		const profile = requireText("profile", request.profile);
		requireWholeDays("accountDurationDays", request.accountDurationDays);
		requireWholeDays("linkDurationDays", request.linkDurationDays);

		const now = this.clock();
		const isTrial = plan.toLowerCase() === TRIAL_PLAN;
		const template = isTrial ? this.deps.invites.trialLabelFormat : this.deps.invites.paidLabelFormat;
		const label =
			request.label?.trim() || formatLabel(template, { chatUsername, chatId, plan, date: formatDate(now) });

		const existing = this.deps.store.get(chatId);
		const supersedable = existing && this.isSupersedable(existing, now) ? existing : null;

		const report: IssueReport = {
			chatId,
			plan,
			label,
			inviteCode: null,
			inviteLink: null,
			remoteCreate: notAttempted("pending"),
			localWrite: notAttempted("remote invite was not created"),
			superseded: null,
			record: null,
			audited: false,
		};

		const rejection = await this.checkProfile(profile);
		if (rejection) {
			report.remoteCreate = rejection;
		} else {
			const created = await this.createRemoteInvite({
				profile,
				accountDurationDays: request.accountDurationDays,
				linkDurationDays: request.linkDurationDays,
				label,
			});
			report.remoteCreate = created.outcome;
			report.inviteCode = created.inviteCode;
			const base = this.deps.invites.inviteLinkBaseUrl;
			report.inviteLink = base && created.inviteCode ? `${base}${created.inviteCode}` : null;
		}

		if (report.inviteCode !== null) {
			const inviteCode = report.inviteCode;
			try {
				report.record = this.deps.store.upsert({
					chatId,
					chatUsername,
					inviteCode,
					plan,
					accountExpiresAt: request.accountDurationDays > 0 ? now + request.accountDurationDays * DAY_SECONDS : null,
				});
				report.localWrite = succeeded();
			} catch (error) {
				StructuredLogger.logError(error, { operation: "issue", chatId });
				report.localWrite = thrownFailure(error);
			}

			if (supersedable?.inviteCode && supersedable.inviteCode !== inviteCode) {
				report.superseded = {
					previousInviteCode: supersedable.inviteCode,
					previousPlan: supersedable.plan,
					inviteDeletion: await this.deleteInvite(supersedable.inviteCode),
				};
			}
		}

		report.audited = await this.audit(request.actor, "issue", chatId, null, {
			plan,
			label,
			remoteCreate: report.remoteCreate.status,
			localWrite: report.localWrite.status,
			superseded: report.superseded !== null,
		});

		StructuredLogger.logAdminAction("Invite issue processed", {
			actorId: request.actor.id,
			chatId,
			operation: "issue",
			plan,
			remoteCreate: report.remoteCreate.status,
			localWrite: report.localWrite.status,
		});
		return report;
	}

	/**
	 * Extends a remote account, then moves the local expiry when the chat
	 * account is known. Remote failure leaves the store untouched.
	 *
	 * @throws {ValidationError} If the username is empty or the duration is not positive
	 */
	async extend(request: ExtendRequest): Promise<ExtendReport> {
		const remoteUsername = requireText("remoteUsername", request.remoteUsername);
		const durationSeconds = durationFromParts(request.duration);
		const now = this.clock();

		const report: ExtendReport = {
			remoteUsername,
			chatId: request.chatId?.trim() || null,
			durationSeconds,
			newExpiresAt: null,
			remoteExtend: notAttempted("pending"),
			localUpdate: notAttempted("remote extension did not succeed"),
			audited: false,
		};

		let reportedExpiry: number | null = null;
		try {
			const extended = await withTimeout("extendAccount", this.deps.timeoutMs, (signal) =>
				this.deps.remote.extendAccount(remoteUsername, durationSeconds, signal),
			);
			if (extended.status === "ok") {
				reportedExpiry = extended.value.expiresAt;
				report.remoteExtend = succeeded();
			} else {
				report.remoteExtend = remoteFailure(extended);
			}
		} catch (error) {
			report.remoteExtend = thrownFailure(error);
		}

		if (report.remoteExtend.status === "succeeded") {
			try {
				report.chatId = report.chatId ?? this.deps.cache.findByRemoteUsername(remoteUsername)?.linkedChatId ?? null;
				const record = report.chatId ? this.deps.store.get(report.chatId) : undefined;
				report.newExpiresAt =
					reportedExpiry ?? Math.max(now, record?.accountExpiresAt ?? now) + durationSeconds;

				if (!report.chatId) {
					report.localUpdate = notAttempted("no chat account linked to the remote username");
				} else if (this.deps.store.updateExpiry(report.chatId, report.newExpiresAt)) {
					report.localUpdate = succeeded();
				} else {
					report.localUpdate = failed("missing_record", `no local record for chat id ${report.chatId}`);
				}
			} catch (error) {
				StructuredLogger.logError(error, { operation: "extend", remoteUsername });
				report.localUpdate = thrownFailure(error);
			}
		}

		report.audited = await this.audit(request.actor, "extend", report.chatId, remoteUsername, {
			durationSeconds,
			newExpiresAt: report.newExpiresAt,
			remoteExtend: report.remoteExtend.status,
			localUpdate: report.localUpdate.status,
		});

		StructuredLogger.logAdminAction("Account extension processed", {
			actorId: request.actor.id,
			chatId: report.chatId,
			remoteUsername,
			operation: "extend",
			remoteExtend: report.remoteExtend.status,
			localUpdate: report.localUpdate.status,
		});
		return report;
	}

	/**
	 * Resolves the identifier, then in order: deletes the remote account,
	 * deletes the stored invite code remotely and disables the local record.
	 * Each step runs regardless of the outcome of the previous ones.
	 */
	async remove(request: RemoveRequest): Promise<RemovalReport> {
		const report: RemovalReport = {
			identifier: request.identifier,
			candidates: [],
			chatId: null,
			remoteUsername: null,
			remoteAccount: notAttempted("no remote username resolved"),
			inviteCode: notAttempted("no chat account resolved"),
			localDisable: notAttempted("no chat account resolved"),
			audited: false,
		};

		try {
			report.candidates = this.deps.resolver.resolve(request.identifier, request.hints);
		} catch (error) {
			StructuredLogger.logError(error, { operation: "remove", identifier: request.identifier });
			const lookup = thrownFailure(error);
			report.remoteAccount = lookup;
			report.inviteCode = lookup;
			report.localDisable = lookup;
		}

		// Ambiguous local matches are reported but never acted on
		const usable = report.candidates.filter((candidate) => !candidate.ambiguous);

		const usernames = [
			...new Set(usable.map((candidate) => candidate.remoteUsername).filter((name): name is string => name !== null)),
		];
		if (usernames.length > 0) {
			report.remoteAccount = await this.deleteAccount(usernames, report);
		}

		// Prefer the chat account paired with the remote account just deleted
		const paired = usable.find(
			(candidate) => candidate.chatId !== null && candidate.remoteUsername === report.remoteUsername,
		);
		report.chatId = paired?.chatId ?? usable.find((candidate) => candidate.chatId !== null)?.chatId ?? null;

		if (report.chatId) {
			report.inviteCode = await this.deleteStoredInvite(report.chatId);

			const clearInviteCode =
				report.inviteCode.status === "succeeded" ||
				(report.inviteCode.status === "failed" && report.inviteCode.reason === "not_found");
			try {
				report.localDisable = this.deps.store.setStatus(report.chatId, "disabled", { clearInviteCode })
					? succeeded()
					: failed("missing_record", `no local record for chat id ${report.chatId}`);
			} catch (error) {
				StructuredLogger.logError(error, { operation: "remove", chatId: report.chatId });
				report.localDisable = thrownFailure(error);
			}
		}

		report.audited = await this.audit(request.actor, "remove", report.chatId, report.remoteUsername, {
			identifier: request.identifier,
			candidates: report.candidates.length,
			remoteAccount: report.remoteAccount.status,
			inviteCode: report.inviteCode.status,
			localDisable: report.localDisable.status,
		});

		StructuredLogger.logAdminAction("Account removal processed", {
			actorId: request.actor.id,
			chatId: report.chatId,
			remoteUsername: report.remoteUsername,
			operation: "remove",
			remoteAccount: report.remoteAccount.status,
			inviteCode: report.inviteCode.status,
			localDisable: report.localDisable.status,
		});
		return report;
	}

	/** Tries each username in order; the first answer other than not-found decides. */
	private async deleteAccount(usernames: string[], report: RemovalReport): Promise<StepOutcome> {
		for (const username of usernames) {
			let outcome: StepOutcome;
			try {
				const result = await withTimeout("deleteAccount", this.deps.timeoutMs, (signal) =>
					this.deps.remote.deleteAccount(username, signal),
				);
				outcome = result.status === "ok" ? succeeded(username) : remoteFailure(result);
			} catch (error) {
				outcome = thrownFailure(error);
			}

			if (outcome.status === "failed" && outcome.reason === "not_found") {
				continue;
			}
			report.remoteUsername = username;
			return outcome;
		}
		return failed("not_found", `no remote account found for ${usernames.join(", ")}`);
	}

	private async deleteStoredInvite(chatId: string): Promise<StepOutcome> {
		let record: InviteRecord | undefined;
		try {
			record = this.deps.store.get(chatId);
		} catch (error) {
			return thrownFailure(error);
		}

		if (!record) {
			return notAttempted("no local record");
		}
		if (!record.inviteCode) {
			return notAttempted("no stored invite code");
		}
		return this.deleteInvite(record.inviteCode);
	}

	private async deleteInvite(inviteCode: string): Promise<StepOutcome> {
		try {
			const result = await withTimeout("deleteInvite", this.deps.timeoutMs, (signal) =>
				this.deps.remote.deleteInvite(inviteCode, signal),
			);
			return result.status === "ok" ? succeeded() : remoteFailure(result);
		} catch (error) {
			return thrownFailure(error);
		}
	}

	private async createRemoteInvite(
		request: CreateInviteRequest,
	): Promise<{ inviteCode: string | null; outcome: StepOutcome }> {
		try {
			const created = await withTimeout("createInvite", this.deps.timeoutMs, (signal) =>
				this.deps.remote.createInvite(request, signal),
			);
			return created.status === "ok"
				? { inviteCode: created.value, outcome: succeeded() }
				: { inviteCode: null, outcome: remoteFailure(created) };
		} catch (error) {
			return { inviteCode: null, outcome: thrownFailure(error) };
		}
	}

	/**
	 * Returns a failed step when the service does not offer the profile, or
	 * the profile list cannot be read; null when issuing may go ahead.
	 */
	private async checkProfile(profile: string): Promise<StepOutcome | null> {
		try {
			const profiles = await withTimeout("listProfiles", this.deps.timeoutMs, (signal) =>
				this.deps.remote.listProfiles(signal),
			);
			if (profiles.status !== "ok") {
				return remoteFailure(profiles);
			}
			if (!profiles.value.includes(profile)) {
				const available = profiles.value.length > 0 ? profiles.value.join(", ") : "none";
				return failed("rejected", `profile '${profile}' is not offered (available: ${available})`);
			}
			return null;
		} catch (error) {
			return thrownFailure(error);
		}
	}

	/** Active, unexpired, still holding an invite code, and not yet consumed into a remote account. */
	private isSupersedable(record: InviteRecord, now: number): boolean {
		if (record.status === "disabled" || !record.inviteCode || record.remoteUserId) {
			return false;
		}
		if (record.accountExpiresAt !== null && record.accountExpiresAt <= now) {
			return false;
		}
		return this.deps.cache.findByChatId(record.chatId) === undefined;
	}

	/** Appends to the audit trail and posts to the admin log. Returns whether the trail was written. */
	private async audit(
		actor: Actor,
		action: AdminActionKind,
		targetChatId: string | null,
		targetRemoteUsername: string | null,
		details: Record<string, unknown>,
	): Promise<boolean> {
		if (this.deps.adminLog) {
			try {
				await this.deps.adminLog.sendSummary(
					formatAdminAction(actor, action, targetChatId, targetRemoteUsername, details),
				);
			} catch (error) {
				StructuredLogger.logError(error, { operation: `adminLog.${action}`, chatId: targetChatId });
			}
		}

		try {
			this.deps.audit.append({
				actorId: actor.id,
				actorName: actor.name,
				action,
				targetChatId,
				targetRemoteUsername,
				details: JSON.stringify(details),
				performedAt: this.clock(),
			});
			return true;
		} catch (error) {
			StructuredLogger.logError(error, { operation: `audit.${action}`, chatId: targetChatId });
			return false;
		}
	}
}
