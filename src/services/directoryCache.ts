/**
 * Remote Directory Cache
 * Derived mirror of the provisioning service's user list, used for identity
 * lookup only. Written by the directory sync task alone.
 *
 * @module services/directoryCache
 */

import { type DatabaseHandle, execute, get, query, transaction } from "../database";
import type { DirectoryCacheEntry, RemoteUser } from "../types";

interface DirectoryCacheRow {
	remote_user_id: string;
	remote_username: string;
	linked_chat_id: string | null;
	email: string | null;
	expires_at: number | null;
	disabled_flag: number | null;
	is_admin_flag: number | null;
	last_synced_at: number;
}

const toFlag = (value: number | null): boolean | null => (value === null ? null : value !== 0);

const toEntry = (row: DirectoryCacheRow): DirectoryCacheEntry => ({
	remoteUserId: row.remote_user_id,
	remoteUsername: row.remote_username,
	linkedChatId: row.linked_chat_id,
	email: row.email,
	expiresAt: row.expires_at,
	disabled: toFlag(row.disabled_flag),
	isAdmin: toFlag(row.is_admin_flag),
	lastSyncedAt: row.last_synced_at,
});

export interface DirectoryCacheOptions {
	/** Age after which an entry is unconfirmed (twice the sync interval) */
	staleAfterSeconds: number;
}

export class DirectoryCache {
	constructor(
		private readonly db: DatabaseHandle,
		private readonly options: DirectoryCacheOptions,
	) {}

	/**
	 * Upserts every observed remote user in one transaction. Rows absent from
	 * `users` are left untouched: an incomplete fetch cannot prove a removal.
	 * A username now held by a different id is released from its previous
	 * holder so names stay unique.
	 *
	 * @returns number of rows written
	 * @throws {StoreError} If the batch fails; nothing is committed
	 */
	replaceAll(users: RemoteUser[], syncedAt: number): number {
		return transaction(this.db, "directory_cache.replaceAll", () => {
			for (const user of users) {
				execute(this.db, "UPDATE directory_cache SET remote_username = NULL WHERE remote_username = ? AND remote_user_id != ?", [
					user.remoteUsername,
					user.remoteUserId,
				]);
				execute(
					this.db,
					`INSERT INTO directory_cache (
            remote_user_id, remote_username, linked_chat_id, email,
            expires_at, disabled_flag, is_admin_flag, last_synced_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
          ON CONFLICT(remote_user_id) DO UPDATE SET
            remote_username = excluded.remote_username,
            linked_chat_id = excluded.linked_chat_id,
            email = excluded.email,
            expires_at = excluded.expires_at,
            disabled_flag = excluded.disabled_flag,
            is_admin_flag = excluded.is_admin_flag,
            last_synced_at = excluded.last_synced_at`,
					[
						user.remoteUserId,
						user.remoteUsername,
						user.linkedChatId ?? null,
						user.email ?? null,
						user.expiresAt ?? null,
						user.disabled ? 1 : 0,
						user.isAdmin ? 1 : 0,
						syncedAt,
					],
				);
			}
			return users.length;
		});
	}

	/** Exact, case-sensitive match on the authoritative remote username. */
	findByRemoteUsername(name: string): DirectoryCacheEntry | undefined {
		const row = get<DirectoryCacheRow>(this.db, "SELECT * FROM directory_cache WHERE remote_username = ?", [name]);
		return row ? toEntry(row) : undefined;
	}

	/** Entry whose remote side reports this chat id as linked; most recently synced wins. */
	findByChatId(chatId: string): DirectoryCacheEntry | undefined {
		const row = get<DirectoryCacheRow>(
			this.db,
			`SELECT * FROM directory_cache
       WHERE linked_chat_id = ? AND remote_username IS NOT NULL
       ORDER BY last_synced_at DESC, remote_user_id ASC
       LIMIT 1`,
			[chatId],
		);
		return row ? toEntry(row) : undefined;
	}

	get(remoteUserId: string): DirectoryCacheEntry | undefined {
		const row = get<DirectoryCacheRow>(
			this.db,
			"SELECT * FROM directory_cache WHERE remote_user_id = ? AND remote_username IS NOT NULL",
			[remoteUserId],
		);
		return row ? toEntry(row) : undefined;
	}

	/** Every named entry, ordered by username. */
	list(): DirectoryCacheEntry[] {
		return query<DirectoryCacheRow>(
			this.db,
			"SELECT * FROM directory_cache WHERE remote_username IS NOT NULL ORDER BY remote_username ASC",
		).map(toEntry);
	}

	/** True when the entry was last confirmed longer ago than the staleness bound. */
	isStale(entry: DirectoryCacheEntry, now: number): boolean {
		return now - entry.lastSyncedAt > this.options.staleAfterSeconds;
	}
}
