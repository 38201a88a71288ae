/** Domain and capability types. Row shapes (snake_case) live beside the stores. */

export type InviteStatus = "trial" | "paid" | "disabled";

/** Plan label: "trial" or the name of a paid plan. */
export type PlanName = string;

export const TRIAL_PLAN = "trial";

export interface InviteRecord {
	chatId: string;
	chatUsername: string;
	inviteCode: string | null;
	remoteUserId: string | null;
	plan: PlanName;
	accountExpiresAt: number | null; // null = non-expiring or unknown
	lastNotifiedAt: number | null;
	status: InviteStatus;
	createdAt: number;
	updatedAt: number;
}

export interface InviteUpsert {
	chatId: string;
	chatUsername: string;
	inviteCode: string | null;
	/** undefined keeps the stored link */
	remoteUserId?: string | null;
	plan: PlanName;
	accountExpiresAt: number | null;
	/** Only honoured on insert; updates keep or clear the stored value */
	lastNotifiedAt?: number | null;
}

export interface DirectoryCacheEntry {
	remoteUserId: string;
	remoteUsername: string;
	linkedChatId: string | null;
	email: string | null;
	expiresAt: number | null;
	disabled: boolean | null;
	isAdmin: boolean | null;
	lastSyncedAt: number;
}

export type AdminActionKind = "issue" | "extend" | "remove";

export interface Actor {
	id: string;
	name: string;
}

export interface AdminActionRecord {
	id: number;
	actorId: string;
	actorName: string;
	action: AdminActionKind;
	targetChatId: string | null;
	targetRemoteUsername: string | null;
	details: string | null;
	performedAt: number;
}

export type NewAdminAction = Omit<AdminActionRecord, "id">;

// ---------------------------------------------------------------------------
// Capabilities consumed from the outer layers
// ---------------------------------------------------------------------------

/** A user as reported by the provisioning service's directory. */
export interface RemoteUser {
	remoteUserId: string;
	remoteUsername: string;
	linkedChatId?: string | null;
	email?: string | null;
	expiresAt?: number | null;
	disabled: boolean;
	isAdmin: boolean;
}

export type RemoteResult<T = undefined> =
	| { status: "ok"; value: T }
	| { status: "not_found"; message: string }
	| { status: "failed"; message: string };

export interface CreateInviteRequest {
	profile: string;
	accountDurationDays: number;
	linkDurationDays: number;
	label: string;
}

export interface ExtendOutcome {
	/** New expiry when the service reports it; null leaves the caller to compute one */
	expiresAt: number | null;
}

export interface DirectoryFetch {
	/** @throws {TransportError} on network or auth failure */
	listRemoteUsers(signal?: AbortSignal): Promise<RemoteUser[]>;
}

export interface RemoteMutation {
	/** Names of the account profiles invites can be issued against */
	listProfiles(signal?: AbortSignal): Promise<RemoteResult<string[]>>;
	createInvite(request: CreateInviteRequest, signal?: AbortSignal): Promise<RemoteResult<string>>;
	extendAccount(remoteUsername: string, durationSeconds: number, signal?: AbortSignal): Promise<RemoteResult<ExtendOutcome>>;
	deleteAccount(remoteUsername: string, signal?: AbortSignal): Promise<RemoteResult>;
	deleteInvite(inviteCode: string, signal?: AbortSignal): Promise<RemoteResult>;
}

export type DeliveryResult = { status: "delivered" } | { status: "unreachable"; reason: string };

export interface NotificationDelivery {
	send(chatId: string, message: string): Promise<DeliveryResult>;
}

/** Free-text report channel: pass summaries, admin action log. First line is the title. */
export interface SummarySink {
	sendSummary(text: string): Promise<void>;
}

/** Returns the current time in epoch seconds. */
export type Clock = () => number;
