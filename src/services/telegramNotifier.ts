/**
 * Telegram Notifier
 * Delivers expiry notifications and pass summaries through the Telegram Bot
 * API, and posts summaries and admin log entries to a configured chat.
 * Chats the bot cannot reach are reported, not thrown.
 *
 * @module services/telegramNotifier
 */

import { TelegramError } from "telegraf";
import { type FmtString, bold, fmt } from "telegraf/format";
import type { DeliveryResult, NotificationDelivery, SummarySink } from "../types";
import { logger } from "../utils/logger";

/** The part of Telegraf's `Telegram` client this adapter uses. */
export interface MessageSender {
	sendMessage(chatId: string, text: string | FmtString): Promise<unknown>;
}

/** 403: blocked by the user or kicked; 400: chat not found or deactivated. */
const UNREACHABLE_CODES = new Set([400, 403]);

export class TelegramNotifier implements NotificationDelivery, SummarySink {
	constructor(
		private readonly telegram: MessageSender,
		private readonly summaryChatId?: string,
	) {}

	/**
	 * @throws {TelegramError} For API failures other than an unreachable chat
	 */
	async send(chatId: string, message: string): Promise<DeliveryResult> {
		try {
			await this.telegram.sendMessage(chatId, message);
			return { status: "delivered" };
		} catch (error) {
			if (error instanceof TelegramError && UNREACHABLE_CODES.has(error.code)) {
				logger.warn("Chat unreachable", { chatId, code: error.code, description: error.description });
				return { status: "unreachable", reason: error.description };
			}
			throw error;
		}
	}

	/** Posts a summary to the summary chat; a no-op when none is configured. */
	async sendSummary(text: string): Promise<void> {
		if (!this.summaryChatId) {
			logger.debug("Summary chat not configured, skipping summary delivery");
			return;
		}
		const [title, ...rest] = text.split("\n");
		await this.telegram.sendMessage(this.summaryChatId, fmt`${bold(title ?? "")}\n${rest.join("\n")}`);
	}
}
