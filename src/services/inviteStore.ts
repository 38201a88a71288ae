/**
 * Local Invite Store
 * Durable lifecycle record per chat account. Rows are never deleted; removal
 * is a transition to `disabled`.
 *
 * @module services/inviteStore
 */

import { type DatabaseHandle, execute, get, query } from "../database";
import { StoreError, ValidationError } from "../errors";
import {
	type Clock,
	type InviteRecord,
	type InviteStatus,
	type InviteUpsert,
	type PlanName,
	TRIAL_PLAN,
} from "../types";
import { wildcardToLike } from "../utils/namePattern";
import { nowSeconds } from "../utils/time";

interface InviteRecordRow {
	chat_id: string;
	chat_username: string;
	invite_code: string | null;
	remote_user_id: string | null;
	plan: string;
	account_expires_at: number | null;
	last_notified_at: number | null;
	status: InviteStatus;
	created_at: number;
	updated_at: number;
}

const toRecord = (row: InviteRecordRow): InviteRecord => ({
	chatId: row.chat_id,
	chatUsername: row.chat_username,
	inviteCode: row.invite_code,
	remoteUserId: row.remote_user_id,
	plan: row.plan,
	accountExpiresAt: row.account_expires_at,
	lastNotifiedAt: row.last_notified_at,
	status: row.status,
	createdAt: row.created_at,
	updatedAt: row.updated_at,
});

/** Status implied by a plan label: "trial" for the trial plan, "paid" otherwise. */
export const statusForPlan = (plan: PlanName): InviteStatus =>
	plan.toLowerCase() === TRIAL_PLAN ? "trial" : "paid";

/**
 * Exact (case-insensitive) matches sort first, prefix matches next, then the
 * rest; ties go to the most recently updated row.
 */
const DISPLAY_NAME_ORDER = `
  ORDER BY
    CASE
      WHEN LOWER(chat_username) = LOWER(?) THEN 0
      WHEN LOWER(chat_username) LIKE LOWER(?) ESCAPE '\\' THEN 1
      ELSE 2
    END,
    updated_at DESC,
    chat_id ASC
`;

export class InviteStore {
	constructor(
		private readonly db: DatabaseHandle,
		private readonly clock: Clock = nowSeconds,
	) {}

	/**
	 * Inserts a record or merges it into the existing row for the chat id.
	 *
	 * A change of plan, expiry or invite code resets the status to the
	 * plan-derived value and clears `last_notified_at`; otherwise both are
	 * kept. One statement, so the row is never partially written.
	 *
	 * @throws {StoreError} If the write fails
	 */
	upsert(input: InviteUpsert): InviteRecord {
		if (!input.chatId) {
			throw new ValidationError("chatId", "chatId is required");
		}

		const now = this.clock();
		const status = statusForPlan(input.plan);
		const keepRemoteLink = input.remoteUserId === undefined ? 1 : 0;

		execute(
			this.db,
			`INSERT INTO invite_records (
        chat_id, chat_username, invite_code, remote_user_id, plan,
        account_expires_at, last_notified_at, status, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(chat_id) DO UPDATE SET
        status = CASE
          WHEN invite_records.plan IS NOT excluded.plan
            OR invite_records.account_expires_at IS NOT excluded.account_expires_at
            OR invite_records.invite_code IS NOT excluded.invite_code
          THEN excluded.status
          ELSE invite_records.status
        END,
        last_notified_at = CASE
          WHEN invite_records.plan IS NOT excluded.plan
            OR invite_records.account_expires_at IS NOT excluded.account_expires_at
            OR invite_records.invite_code IS NOT excluded.invite_code
          THEN NULL
          ELSE invite_records.last_notified_at
        END,
        chat_username = excluded.chat_username,
        invite_code = excluded.invite_code,
        remote_user_id = CASE WHEN ? = 1 THEN invite_records.remote_user_id ELSE excluded.remote_user_id END,
        plan = excluded.plan,
        account_expires_at = excluded.account_expires_at,
        updated_at = excluded.updated_at`,
			[
				input.chatId,
				input.chatUsername,
				input.inviteCode,
				input.remoteUserId ?? null,
				input.plan,
				input.accountExpiresAt,
				input.lastNotifiedAt ?? null,
				status,
				now,
				now,
				keepRemoteLink,
			],
		);

		const stored = this.get(input.chatId);
		if (!stored) {
			throw new StoreError("upsert", new Error(`record ${input.chatId} missing after write`));
		}
		return stored;
	}

	get(chatId: string): InviteRecord | undefined {
		const row = get<InviteRecordRow>(this.db, "SELECT * FROM invite_records WHERE chat_id = ?", [chatId]);
		return row ? toRecord(row) : undefined;
	}

	/**
	 * Case-insensitive match against the stored chat username. Without
	 * wildcards the pattern is a substring; `*` and `?` behave as in shell
	 * globs.
	 */
	findByDisplayName(pattern: string): InviteRecord[] {
		const trimmed = pattern.trim();
		if (!trimmed) {
			return [];
		}
		const like = wildcardToLike(trimmed);
		const prefix = `${wildcardToLike(trimmed, { anchored: true })}%`;
		const rows = query<InviteRecordRow>(
			this.db,
			`SELECT * FROM invite_records
       WHERE LOWER(chat_username) LIKE LOWER(?) ESCAPE '\\'
       ${DISPLAY_NAME_ORDER}`,
			[like, trimmed, prefix],
		);
		return rows.map(toRecord);
	}

	/** Case-insensitive equality on the stored chat username. */
	findByExactDisplayName(name: string): InviteRecord[] {
		const trimmed = name.trim();
		if (!trimmed) {
			return [];
		}
		const rows = query<InviteRecordRow>(
			this.db,
			"SELECT * FROM invite_records WHERE LOWER(chat_username) = LOWER(?) ORDER BY updated_at DESC, chat_id ASC",
			[trimmed],
		);
		return rows.map(toRecord);
	}

	/**
	 * @returns true when a row was updated; false when no record exists
	 */
	setStatus(chatId: string, status: InviteStatus, options: { clearInviteCode?: boolean } = {}): boolean {
		const clear = options.clearInviteCode ? 1 : 0;
		const result = execute(
			this.db,
			`UPDATE invite_records
       SET status = ?,
           invite_code = CASE WHEN ? = 1 THEN NULL ELSE invite_code END,
           updated_at = ?
       WHERE chat_id = ?`,
			[status, clear, this.clock(), chatId],
		);
		return result.changes > 0;
	}

	setLastNotified(chatId: string, timestamp: number): boolean {
		const result = execute(this.db, "UPDATE invite_records SET last_notified_at = ?, updated_at = ? WHERE chat_id = ?", [
			timestamp,
			this.clock(),
			chatId,
		]);
		return result.changes > 0;
	}

	/** Moves the expiry and clears `last_notified_at`; status is kept. */
	updateExpiry(chatId: string, accountExpiresAt: number | null): boolean {
		const result = execute(
			this.db,
			"UPDATE invite_records SET account_expires_at = ?, last_notified_at = NULL, updated_at = ? WHERE chat_id = ?",
			[accountExpiresAt, this.clock(), chatId],
		);
		return result.changes > 0;
	}

	/** Records the remote account confirmed as linked to this chat id. */
	linkRemoteUser(chatId: string, remoteUserId: string): boolean {
		const result = execute(
			this.db,
			`UPDATE invite_records SET remote_user_id = ?, updated_at = ?
       WHERE chat_id = ? AND remote_user_id IS NOT ?`,
			[remoteUserId, this.clock(), chatId, remoteUserId],
		);
		return result.changes > 0;
	}

	/**
	 * Records with a known expiry at or before `timestamp` that are not
	 * disabled, soonest first.
	 */
	listExpiringBefore(timestamp: number): InviteRecord[] {
		const rows = query<InviteRecordRow>(
			this.db,
			`SELECT * FROM invite_records
       WHERE account_expires_at IS NOT NULL
         AND account_expires_at <= ?
         AND status != 'disabled'
       ORDER BY account_expires_at ASC, chat_id ASC`,
			[timestamp],
		);
		return rows.map(toRecord);
	}
}
