/**
 * Identity Resolver
 * Turns an arbitrary identifier (chat id, mention, remote username, display
 * name) into ranked pairings of chat account and remote account. Evidence is
 * gathered from the directory cache and the local store in a fixed order;
 * ambiguity produces several candidates, never an error.
 *
 * @module services/identityResolver
 */

import type { Clock, DirectoryCacheEntry } from "../types";
import { cleanIdentifier, parseChatId } from "../utils/identifiers";
import { StructuredLogger } from "../utils/logger";
import { hasWildcards, sanitizePattern } from "../utils/namePattern";
import { nowSeconds } from "../utils/time";
import type { DirectoryCache } from "./directoryCache";
import type { InviteStore } from "./inviteStore";

export type Confidence = "confirmed-direct" | "name-match" | "local-reverse" | "forced";

/** Most confident first */
export const CONFIDENCE_ORDER: readonly Confidence[] = ["confirmed-direct", "name-match", "local-reverse", "forced"];

export type CandidateSource = "chat-id" | "directory-cache" | "remote-username" | "local-record" | "force";

export interface IdentityCandidate {
	chatId: string | null;
	remoteUsername: string | null;
	remoteUserId: string | null;
	confidence: Confidence;
	source: CandidateSource;
	/** Pairing taken from a cache row older than the staleness bound */
	stale: boolean;
	/** Set when the local lookup that produced this candidate matched several records */
	ambiguous?: boolean;
}

/** Chat-side names known to the caller, e.g. from the message that mentioned the account. */
export interface ResolveHints {
	handle?: string | null;
	displayName?: string | null;
}

const rank = (confidence: Confidence): number => CONFIDENCE_ORDER.indexOf(confidence);

const candidateKey = (candidate: IdentityCandidate): string =>
	`${candidate.chatId ?? ""}\u0000${candidate.remoteUsername ?? ""}`;

/** Collects candidates, keeping the most confident one per (chat id, remote username). */
class CandidateSet {
	private readonly byKey = new Map<string, IdentityCandidate>();

	add(candidate: IdentityCandidate): void {
		const key = candidateKey(candidate);
		const existing = this.byKey.get(key);
		if (!existing) {
			this.byKey.set(key, candidate);
			return;
		}
		if (rank(candidate.confidence) < rank(existing.confidence)) {
			// Map keeps first-insertion position; discovery order survives the replacement
			this.byKey.set(key, candidate);
		}
	}

	hasConfirmedRemote(): boolean {
		for (const candidate of this.byKey.values()) {
			if (candidate.remoteUsername !== null && !candidate.stale && !candidate.ambiguous) {
				return true;
			}
		}
		return false;
	}

	toList(): IdentityCandidate[] {
		// Array.prototype.sort is stable, so discovery order holds within a level
		return [...this.byKey.values()].sort((a, b) => rank(a.confidence) - rank(b.confidence));
	}
}

const uniqueNames = (names: Array<string | null | undefined>): string[] => {
	const seen = new Set<string>();
	const result: string[] = [];
	for (const name of names) {
		const cleaned = name ? cleanIdentifier(sanitizePattern(name)) : "";
		if (cleaned && !seen.has(cleaned)) {
			seen.add(cleaned);
			result.push(cleaned);
		}
	}
	return result;
};

export class IdentityResolver {
	constructor(
		private readonly store: InviteStore,
		private readonly cache: DirectoryCache,
		private readonly clock: Clock = nowSeconds,
	) {}

	/**
	 * Resolves an identifier to candidate pairings, most confident first.
	 * An empty identifier yields an empty list.
	 *
	 * @throws {StoreError} If a store lookup fails
	 */
	resolve(identifier: string, hints: ResolveHints = {}): IdentityCandidate[] {
		const raw = sanitizePattern(identifier);
		if (!raw) {
			return [];
		}

		const now = this.clock();
		const candidates = new CandidateSet();
		const cleanedRaw = cleanIdentifier(raw);
		let chatId = parseChatId(raw);
		let record = chatId ? this.store.get(chatId) : undefined;
		let pairedFresh = false;

		// Chat ids are opaque: any identifier naming a stored record is one
		if (!chatId) {
			record = this.store.get(cleanedRaw);
			chatId = record ? record.chatId : null;
		}

		// Chat id given directly: look for the remote account the directory links to it
		if (chatId) {
			const linked = this.cache.findByChatId(chatId);
			if (linked && !this.cache.isStale(linked, now)) {
				candidates.add(this.fromCache(linked, chatId, "confirmed-direct", "directory-cache", now));
				pairedFresh = true;
			} else {
				if (linked) {
					candidates.add(this.fromCache(linked, chatId, "forced", "directory-cache", now));
				}
				candidates.add({
					chatId,
					remoteUsername: null,
					remoteUserId: null,
					confidence: "confirmed-direct",
					source: "chat-id",
					stale: false,
				});
			}
		}

		const namesWithoutChat: string[] = [];

		if (!pairedFresh) {
			const names = uniqueNames([cleanedRaw, hints.handle, hints.displayName, record?.chatUsername]);
			for (const name of names) {
				const entry = this.cache.findByRemoteUsername(name);
				if (!entry) {
					continue;
				}
				const pairedChatId = chatId ?? entry.linkedChatId;
				candidates.add(this.fromCache(entry, pairedChatId, "name-match", "remote-username", now));
				if (!pairedChatId) {
					namesWithoutChat.push(entry.remoteUsername);
				}
			}

			const reverseTargets =
				namesWithoutChat.length > 0 ? namesWithoutChat : !chatId && !candidates.hasConfirmedRemote() ? [cleanedRaw] : [];
			for (const target of reverseTargets) {
				this.reverseLookup(target, candidates, now);
			}
		}

		if (!candidates.hasConfirmedRemote()) {
			if (chatId) {
				const [handle] = uniqueNames([hints.handle, record?.chatUsername]);
				if (handle) {
					candidates.add({
						chatId,
						remoteUsername: handle,
						remoteUserId: null,
						confidence: "forced",
						source: "force",
						stale: false,
					});
				}
			} else if (!hasWildcards(cleanedRaw)) {
				candidates.add({
					chatId: null,
					remoteUsername: cleanedRaw,
					remoteUserId: null,
					confidence: "forced",
					source: "force",
					stale: false,
				});
			}
		}

		const result = candidates.toList();
		StructuredLogger.logDebug("Identity resolved", {
			identifier: raw,
			candidates: result.length,
			top: result[0]?.confidence ?? null,
		});
		return result;
	}

	/**
	 * Local records whose display name matches: exact first, then the
	 * wildcard pattern when the name carries one. Plain names never fall back
	 * to substring matching. Several matches are all returned, flagged
	 * ambiguous.
	 */
	private reverseLookup(name: string, candidates: CandidateSet, now: number): void {
		const wildcard = hasWildcards(name);
		let records = this.store.findByExactDisplayName(name);
		if (records.length === 0 && wildcard) {
			records = this.store.findByDisplayName(name);
		}
		const ambiguous = records.length > 1;

		for (const record of records) {
			const linked = record.remoteUserId ? this.cache.get(record.remoteUserId) : undefined;
			const candidate: IdentityCandidate = linked
				? this.fromCache(linked, record.chatId, "local-reverse", "local-record", now)
				: {
						chatId: record.chatId,
						remoteUsername: wildcard ? record.chatUsername : name,
						remoteUserId: record.remoteUserId,
						confidence: "local-reverse",
						source: "local-record",
						stale: false,
					};
			candidates.add(ambiguous ? { ...candidate, ambiguous } : candidate);
		}
	}

	private fromCache(
		entry: DirectoryCacheEntry,
		chatId: string | null,
		confidence: Confidence,
		source: CandidateSource,
		now: number,
	): IdentityCandidate {
		return {
			chatId,
			remoteUsername: entry.remoteUsername,
			remoteUserId: entry.remoteUserId,
			confidence,
			source,
			stale: this.cache.isStale(entry, now),
		};
	}
}
