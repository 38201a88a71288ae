/**
 * Audit Log
 * Append-only record of administrative lifecycle actions.
 *
 * @module services/auditLog
 */

import { type DatabaseHandle, execute, query } from "../database";
import type { AdminActionKind, AdminActionRecord, NewAdminAction } from "../types";

interface AdminActionRow {
	id: number;
	actor_id: string;
	actor_name: string;
	action: AdminActionKind;
	target_chat_id: string | null;
	target_remote_username: string | null;
	details: string | null;
	performed_at: number;
}

const toRecord = (row: AdminActionRow): AdminActionRecord => ({
	id: row.id,
	actorId: row.actor_id,
	actorName: row.actor_name,
	action: row.action,
	targetChatId: row.target_chat_id,
	targetRemoteUsername: row.target_remote_username,
	details: row.details,
	performedAt: row.performed_at,
});

export class AuditLog {
	constructor(private readonly db: DatabaseHandle) {}

	/**
	 * @returns the id of the new entry
	 * @throws {StoreError} If the insert fails
	 */
	append(action: NewAdminAction): number {
		const result = execute(
			this.db,
			`INSERT INTO admin_actions (
        actor_id, actor_name, action, target_chat_id,
        target_remote_username, details, performed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
			[
				action.actorId,
				action.actorName,
				action.action,
				action.targetChatId,
				action.targetRemoteUsername,
				action.details,
				action.performedAt,
			],
		);
		return Number(result.lastInsertRowid);
	}

	/** Newest first. */
	listRecent(limit = 50): AdminActionRecord[] {
		return query<AdminActionRow>(this.db, "SELECT * FROM admin_actions ORDER BY performed_at DESC, id DESC LIMIT ?", [
			limit,
		]).map(toRecord);
	}

	listForChatId(chatId: string): AdminActionRecord[] {
		return query<AdminActionRow>(
			this.db,
			"SELECT * FROM admin_actions WHERE target_chat_id = ? ORDER BY performed_at DESC, id DESC",
			[chatId],
		).map(toRecord);
	}
}
