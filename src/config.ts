/**
 * Configuration module for the invite reconciler.
 * Loads environment variables and provides a typed configuration object.
 * Components never import this module; the entry point hands them the slices
 * they need.
 *
 * @module config
 */

import { resolve } from "node:path";
import * as dotenv from "dotenv";
import { ConfigError } from "./errors";
import { logger } from "./utils/logger";

// Load environment variables from .env file
dotenv.config({ path: resolve(__dirname, "../.env") });

/**
 * Settings used when issuing invites.
 */
export interface InviteSettings {
	/** Provisioning profile applied to trial accounts */
	trialProfile: string;
	/** Lifetime of a trial account in days */
	trialAccountDays: number;
	/** Validity of a trial invite link in days */
	trialLinkDays: number;
	/** Label template; placeholders: {chat_username} {chat_id} {plan} {date} */
	trialLabelFormat: string;
	/** Validity of a paid invite link in days */
	paidLinkDays: number;
	paidLabelFormat: string;
	/** Prefix the invite code is appended to; empty when links are not handed out */
	inviteLinkBaseUrl: string;
}

export interface NotificationSettings {
	/** How many days ahead each pass looks for expiring accounts */
	lookaheadDays: number;
	/** Minimum spacing between two notifications to one account */
	dedupIntervalDays: number;
	/** Days-before-expiry on which a notification is due */
	notifyDays: number[];
	/** Interval between expiry passes */
	checkIntervalHours: number;
}

/**
 * Configuration interface defining all settings.
 */
export interface Config {
	/** Telegram bot API token, used to deliver notifications */
	botToken: string;
	/** Telegram chat receiving per-pass expiry summaries (optional) */
	summaryChatId?: string;
	/** Telegram chat receiving a line per admin action (optional) */
	adminLogChatId?: string;

	provisioning: {
		baseUrl: string;
		username: string;
		password: string;
		/** Bound applied to every remote call */
		timeoutMs: number;
		/** Field of a remote user object holding the linked chat id */
		chatLinkField: string;
	};

	/** File path to SQLite database */
	databasePath: string;

	/** Logging level (error, warn, info, debug) */
	logLevel: string;

	/** Directory sync interval; cache rows older than twice this are unconfirmed */
	syncIntervalHours: number;

	invites: InviteSettings;
	notifications: NotificationSettings;
}

const readNumber = (key: string, fallback: number): number => {
	const raw = process.env[key];
	if (raw === undefined || raw.trim() === "") {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value < 0) {
		throw new ConfigError(key, `${key} must be a non-negative number, got '${raw}'`);
	}
	return value;
};

const readNumberList = (key: string, fallback: number[]): number[] => {
	const raw = process.env[key];
	if (raw === undefined || raw.trim() === "") {
		return fallback;
	}
	return raw.split(",").map((part) => {
		const value = Number.parseInt(part.trim(), 10);
		if (Number.isNaN(value)) {
			throw new ConfigError(key, `${key} must be a comma-separated list of integers, got '${raw}'`);
		}
		return value;
	});
};

/**
 * Builds the configuration from process.env.
 * Falls back to default values where appropriate.
 *
 * @throws {ConfigError} If a numeric setting cannot be parsed
 */
export function loadConfig(): Config {
	return {
		botToken: process.env.BOT_TOKEN || "",
		summaryChatId: process.env.SUMMARY_CHAT_ID || undefined,
		adminLogChatId: process.env.ADMIN_LOG_CHAT_ID || undefined,
		provisioning: {
			baseUrl: (process.env.PROVISIONING_URL || "").replace(/\/+$/, ""),
			username: process.env.PROVISIONING_USERNAME || "",
			password: process.env.PROVISIONING_PASSWORD || "",
			timeoutMs: readNumber("PROVISIONING_TIMEOUT_MS", 15000),
			chatLinkField: process.env.PROVISIONING_CHAT_LINK_FIELD || "telegram_id",
		},
		databasePath: process.env.DATABASE_PATH || "./data/invites.db",
		logLevel: process.env.LOG_LEVEL || "info",
		syncIntervalHours: readNumber("SYNC_INTERVAL_HOURS", 12),
		invites: {
			trialProfile: process.env.TRIAL_PROFILE || "Default Profile",
			trialAccountDays: readNumber("TRIAL_ACCOUNT_DAYS", 3),
			trialLinkDays: readNumber("TRIAL_LINK_DAYS", 1),
			trialLabelFormat: process.env.TRIAL_LABEL_FORMAT || "{chat_username}-Trial-{date}",
			paidLinkDays: readNumber("PAID_LINK_DAYS", 7),
			paidLabelFormat: process.env.PAID_LABEL_FORMAT || "{chat_username}-{plan}-{date}",
			inviteLinkBaseUrl: process.env.INVITE_LINK_BASE_URL || "",
		},
		notifications: {
			lookaheadDays: readNumber("EXPIRY_LOOKAHEAD_DAYS", 4),
			dedupIntervalDays: readNumber("EXPIRY_DEDUP_INTERVAL_DAYS", 2),
			notifyDays: readNumberList("EXPIRY_NOTIFY_DAYS", [3, 0]),
			checkIntervalHours: readNumber("EXPIRY_CHECK_INTERVAL_HOURS", 6),
		},
	};
}

/**
 * Validates that all required configuration values are present and valid.
 * Called at startup before anything is wired.
 *
 * @throws {ConfigError} If BOT_TOKEN or a provisioning credential is missing
 */
export function validateConfig(config: Config): void {
	if (!config.botToken) {
		throw new ConfigError("BOT_TOKEN", "BOT_TOKEN is required in environment variables");
	}
	if (!config.provisioning.baseUrl) {
		throw new ConfigError("PROVISIONING_URL", "PROVISIONING_URL is required in environment variables");
	}
	if (!config.provisioning.username || !config.provisioning.password) {
		throw new ConfigError(
			"PROVISIONING_USERNAME",
			"PROVISIONING_USERNAME and PROVISIONING_PASSWORD are required in environment variables",
		);
	}
	if (config.syncIntervalHours <= 0) {
		throw new ConfigError("SYNC_INTERVAL_HOURS", "SYNC_INTERVAL_HOURS must be greater than zero");
	}
	if (config.notifications.checkIntervalHours <= 0) {
		throw new ConfigError("EXPIRY_CHECK_INTERVAL_HOURS", "EXPIRY_CHECK_INTERVAL_HOURS must be greater than zero");
	}
	if (config.notifications.notifyDays.length === 0) {
		throw new ConfigError("EXPIRY_NOTIFY_DAYS", "EXPIRY_NOTIFY_DAYS must name at least one day");
	}

	if (!config.summaryChatId) {
		logger.warn("SUMMARY_CHAT_ID not configured - expiry pass summaries will only be logged");
	}
	if (!config.adminLogChatId) {
		logger.warn("ADMIN_LOG_CHAT_ID not configured - admin actions will only be audited locally");
	}
	if (!config.invites.inviteLinkBaseUrl) {
		logger.warn("INVITE_LINK_BASE_URL not configured - issue reports will carry the code only");
	}
}
