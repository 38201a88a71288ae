/**
 * Provisioning Client
 * HTTP adapter for the provisioning service's REST API. Implements the
 * directory fetch and remote mutation capabilities the engine consumes.
 * Authenticates with basic credentials once and reuses the bearer token; a
 * 401 drops the token so the next call logs in again.
 *
 * @module services/provisioningClient
 */

import { TransportError } from "../errors";
import type {
	Clock,
	CreateInviteRequest,
	DirectoryFetch,
	ExtendOutcome,
	RemoteMutation,
	RemoteResult,
	RemoteUser,
} from "../types";
import { StructuredLogger } from "../utils/logger";
import { asTransportError } from "../utils/remoteCall";
import { DAY_SECONDS, HOUR_SECONDS, MINUTE_SECONDS, nowSeconds } from "../utils/time";

export interface ProvisioningClientOptions {
	baseUrl: string;
	username: string;
	password: string;
	/** Field of a remote user object holding the linked chat id */
	chatLinkField: string;
	clock?: Clock;
}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (source: JsonObject, key: string): string | null => {
	const value = source[key];
	if (typeof value === "string" && value.trim() !== "") {
		return value;
	}
	if (typeof value === "number" && Number.isFinite(value)) {
		return String(value);
	}
	return null;
};

const readTimestamp = (source: JsonObject, key: string): number | null => {
	const value = source[key];
	return typeof value === "number" && value > 0 ? Math.floor(value) : null;
};

const readJson = async (response: Response): Promise<unknown> => {
	const text = await response.text();
	if (!text) {
		return null;
	}
	try {
		return JSON.parse(text);
	} catch {
		return text;
	}
};

const describeFailure = async (response: Response): Promise<string> => {
	const body = await readJson(response);
	const detail = isObject(body) ? (readString(body, "error") ?? readString(body, "message")) : typeof body === "string" ? body : null;
	return detail ? `HTTP ${response.status}: ${detail.slice(0, 200)}` : `HTTP ${response.status}`;
};

/** Splits seconds into the day/hour/minute fields the extend endpoint takes. */
export const splitDuration = (seconds: number): { days: number; hours: number; minutes: number } => {
	const days = Math.floor(seconds / DAY_SECONDS);
	const hours = Math.floor((seconds % DAY_SECONDS) / HOUR_SECONDS);
	const minutes = Math.floor((seconds % HOUR_SECONDS) / MINUTE_SECONDS);
	return { days, hours, minutes };
};

export class ProvisioningClient implements DirectoryFetch, RemoteMutation {
	private token: string | null = null;
	private readonly baseUrl: string;
	private readonly clock: Clock;

	constructor(private readonly options: ProvisioningClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.clock = options.clock ?? nowSeconds;
	}

	/** Profile names from `GET /profiles`, whose body maps each name to its settings. */
	async listProfiles(signal?: AbortSignal): Promise<RemoteResult<string[]>> {
		const response = await this.request("listProfiles", "GET", "/profiles", { signal });
		if (!response.ok) {
			return { status: "failed", message: await describeFailure(response) };
		}

		const body = await readJson(response);
		if (!isObject(body) || !isObject(body.profiles)) {
			return { status: "failed", message: "response did not contain a profile map" };
		}
		return { status: "ok", value: Object.keys(body.profiles) };
	}

	/**
	 * Lists every user in the provisioning directory.
	 *
	 * @throws {TransportError} On network, auth or unexpected response failure
	 */
	async listRemoteUsers(signal?: AbortSignal): Promise<RemoteUser[]> {
		const response = await this.request("listRemoteUsers", "GET", "/users", { signal });
		if (!response.ok) {
			throw new TransportError("listRemoteUsers", await describeFailure(response));
		}

		const body = await readJson(response);
		const list = Array.isArray(body) ? body : isObject(body) && Array.isArray(body.users) ? body.users : null;
		if (list === null) {
			throw new TransportError("listRemoteUsers", "response did not contain a user list");
		}

		const users: RemoteUser[] = [];
		for (const item of list) {
			const user = isObject(item) ? this.toRemoteUser(item) : null;
			if (user) {
				users.push(user);
			}
		}
		return users;
	}

	/** Creates an invite, then looks its code up by label. */
	async createInvite(request: CreateInviteRequest, signal?: AbortSignal): Promise<RemoteResult<string>> {
		const userExpiry = request.accountDurationDays > 0;
		const response = await this.request("createInvite", "POST", "/invites", {
			signal,
			body: {
				days: request.linkDurationDays,
				label: request.label,
				"multiple-uses": false,
				"no-limit": false,
				profile: request.profile,
				"remaining-uses": 1,
				"send-to": "",
				"user-days": request.accountDurationDays,
				"user-expiry": userExpiry,
			},
		});
		if (!response.ok) {
			return { status: "failed", message: await describeFailure(response) };
		}

		const code = await this.findInviteCode(request.label, signal);
		if (!code) {
			return { status: "failed", message: `invite created but no code found for label '${request.label}'` };
		}
		StructuredLogger.logDebug("Invite created", { operation: "createInvite", label: request.label });
		return { status: "ok", value: code };
	}

	/**
	 * Extends by user id. The service adds the duration to the current expiry,
	 * or to now when the account has none or it already passed; the reported
	 * expiry is computed the same way from the expiry seen before the call.
	 */
	async extendAccount(remoteUsername: string, durationSeconds: number, signal?: AbortSignal): Promise<RemoteResult<ExtendOutcome>> {
		const user = await this.findUser(remoteUsername, signal);
		if (!user) {
			return { status: "not_found", message: `remote user '${remoteUsername}' not found` };
		}

		const response = await this.request("extendAccount", "POST", "/users/extend", {
			signal,
			body: { users: [user.remoteUserId], months: 0, ...splitDuration(durationSeconds), notify: false },
		});
		if (response.status === 404) {
			return { status: "not_found", message: await describeFailure(response) };
		}
		if (!response.ok) {
			return { status: "failed", message: await describeFailure(response) };
		}
		const now = this.clock();
		return { status: "ok", value: { expiresAt: Math.max(user.expiresAt ?? now, now) + durationSeconds } };
	}

	async deleteAccount(remoteUsername: string, signal?: AbortSignal): Promise<RemoteResult> {
		const user = await this.findUser(remoteUsername, signal);
		if (!user) {
			return { status: "not_found", message: `remote user '${remoteUsername}' not found` };
		}

		const response = await this.request("deleteAccount", "DELETE", "/users", {
			signal,
			body: { users: [user.remoteUserId], notify: false },
		});
		if (response.status === 404) {
			return { status: "not_found", message: await describeFailure(response) };
		}
		if (!response.ok) {
			return { status: "failed", message: await describeFailure(response) };
		}
		return { status: "ok", value: undefined };
	}

	async deleteInvite(inviteCode: string, signal?: AbortSignal): Promise<RemoteResult> {
		const response = await this.request("deleteInvite", "DELETE", "/invites", {
			signal,
			body: { code: inviteCode },
		});
		if (response.status === 404) {
			return { status: "not_found", message: await describeFailure(response) };
		}
		if (!response.ok) {
			return { status: "failed", message: await describeFailure(response) };
		}
		return { status: "ok", value: undefined };
	}

	private toRemoteUser(item: JsonObject): RemoteUser | null {
		const remoteUserId = readString(item, "id");
		const remoteUsername = readString(item, "name");
		if (!remoteUserId || !remoteUsername) {
			return null;
		}
		return {
			remoteUserId,
			remoteUsername,
			linkedChatId: readString(item, this.options.chatLinkField),
			email: readString(item, "email"),
			expiresAt: readTimestamp(item, "expiry"),
			disabled: item.disabled === true,
			isAdmin: item.admin === true,
		};
	}

	/** Exact username match; the remote name is authoritative and case-sensitive. */
	private async findUser(remoteUsername: string, signal?: AbortSignal): Promise<RemoteUser | undefined> {
		const users = await this.listRemoteUsers(signal);
		return users.find((user) => user.remoteUsername === remoteUsername);
	}

	private async findInviteCode(label: string, signal?: AbortSignal): Promise<string | null> {
		const response = await this.request("listInvites", "GET", `/invites?label=${encodeURIComponent(label)}`, { signal });
		if (!response.ok) {
			throw new TransportError("listInvites", await describeFailure(response));
		}

		const body = await readJson(response);
		const invites = isObject(body) && Array.isArray(body.invites) ? body.invites : Array.isArray(body) ? body : [];
		let code: string | null = null;
		for (const invite of invites) {
			if (isObject(invite) && invite.label === label) {
				code = readString(invite, "code") ?? code;
			}
		}
		return code;
	}

	private async login(signal?: AbortSignal): Promise<string> {
		const credentials = Buffer.from(`${this.options.username}:${this.options.password}`).toString("base64");
		let response: Response;
		try {
			response = await fetch(`${this.baseUrl}/token/login`, {
				method: "GET",
				headers: { Authorization: `Basic ${credentials}` },
				signal,
			});
		} catch (error) {
			throw asTransportError("login", error);
		}

		if (!response.ok) {
			throw new TransportError("login", await describeFailure(response));
		}
		const body = await readJson(response);
		const token = isObject(body) ? readString(body, "token") : null;
		if (!token) {
			throw new TransportError("login", "response did not contain a token");
		}
		this.token = token;
		return token;
	}

	private async request(
		operation: string,
		method: "GET" | "POST" | "DELETE",
		path: string,
		init: { signal?: AbortSignal; body?: JsonObject },
	): Promise<Response> {
		const token = this.token ?? (await this.login(init.signal));
		const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
		if (init.body) {
			headers["Content-Type"] = "application/json";
		}

		let response: Response;
		try {
			response = await fetch(`${this.baseUrl}${path}`, {
				method,
				headers,
				body: init.body ? JSON.stringify(init.body) : undefined,
				signal: init.signal,
			});
		} catch (error) {
			throw asTransportError(operation, error);
		}

		if (response.status === 401) {
			this.token = null;
			throw new TransportError(operation, "authentication rejected (HTTP 401)");
		}
		return response;
	}
}
