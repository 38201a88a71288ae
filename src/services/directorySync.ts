/**
 * Directory Sync Task
 * Mirrors the provisioning service's user list into the directory cache and
 * links local records to the remote accounts that report their chat id.
 *
 * @module services/directorySync
 */

import { errorMessage } from "../errors";
import type { Clock, DirectoryFetch, RemoteUser } from "../types";
import { StructuredLogger } from "../utils/logger";
import { withTimeout } from "../utils/remoteCall";
import { nowSeconds } from "../utils/time";
import type { DirectoryCache } from "./directoryCache";
import type { InviteStore } from "./inviteStore";

export type SyncReport =
	| { status: "succeeded"; syncedAt: number; fetched: number; written: number; linked: number; linkFailures: number }
	| { status: "failed"; syncedAt: number; stage: "fetch" | "write"; error: string };

export interface DirectorySyncDeps {
	directory: DirectoryFetch;
	cache: DirectoryCache;
	store: InviteStore;
	timeoutMs: number;
	clock?: Clock;
}

export class DirectorySync {
	private readonly clock: Clock;

	constructor(private readonly deps: DirectorySyncDeps) {
		this.clock = deps.clock ?? nowSeconds;
	}

	/** Never rejects: fetch and write failures come back as a failed report. */
	async run(): Promise<SyncReport> {
		const syncedAt = this.clock();

		let users: RemoteUser[];
		try {
			users = await withTimeout("listRemoteUsers", this.deps.timeoutMs, (signal) =>
				this.deps.directory.listRemoteUsers(signal),
			);
		} catch (error) {
			StructuredLogger.logError(error, { operation: "directory-sync" });
			return { status: "failed", syncedAt, stage: "fetch", error: errorMessage(error) };
		}

		let written: number;
		try {
			written = this.deps.cache.replaceAll(users, syncedAt);
		} catch (error) {
			StructuredLogger.logError(error, { operation: "directory-sync" });
			return { status: "failed", syncedAt, stage: "write", error: errorMessage(error) };
		}

		let linked = 0;
		let linkFailures = 0;
		for (const user of users) {
			if (!user.linkedChatId) {
				continue;
			}
			try {
				if (this.deps.store.linkRemoteUser(user.linkedChatId, user.remoteUserId)) {
					linked++;
				}
			} catch (error) {
				linkFailures++;
				StructuredLogger.logError(error, {
					operation: "directory-sync.link",
					chatId: user.linkedChatId,
					remoteUsername: user.remoteUsername,
				});
			}
		}

		StructuredLogger.logTask("Directory sync completed", {
			operation: "directory-sync",
			fetched: users.length,
			written,
			linked,
			linkFailures,
		});
		return { status: "succeeded", syncedAt, fetched: users.length, written, linked, linkFailures };
	}
}
