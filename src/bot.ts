/**
 * Main entry point for the invite reconciler.
 * Wires configuration, the database, the provisioning and Telegram adapters
 * into the engine, starts the periodic tasks and handles graceful shutdown.
 *
 * @module bot
 */

import { Telegraf } from "telegraf";
import { loadConfig, validateConfig } from "./config";
import { openDatabase } from "./database";
import { createEngine } from "./engine";
import { ProvisioningClient } from "./services/provisioningClient";
import { TelegramNotifier } from "./services/telegramNotifier";
import { logger, updateLogLevel } from "./utils/logger";

/**
 * Startup sequence:
 * 1. Loads and validates configuration from environment variables
 * 2. Opens the SQLite database (schema is created by the engine)
 * 3. Creates the provisioning client, the Telegram notifier and the admin log
 * 4. Starts the directory sync and expiry check tasks
 * 5. Registers SIGINT/SIGTERM handlers that stop the tasks and close the database
 *
 * @throws {ConfigError} If configuration validation fails
 */
async function main(): Promise<void> {
	const config = loadConfig();
	validateConfig(config);
	updateLogLevel(config.logLevel);

	const db = openDatabase(config.databasePath);

	const bot = new Telegraf(config.botToken);
	const me = await bot.telegram.getMe();
	logger.info("Connected to Telegram", { username: me.username });

	const notifier = new TelegramNotifier(bot.telegram, config.summaryChatId);
	const adminLog = new TelegramNotifier(bot.telegram, config.adminLogChatId);
	const provisioning = new ProvisioningClient({
		baseUrl: config.provisioning.baseUrl,
		username: config.provisioning.username,
		password: config.provisioning.password,
		chatLinkField: config.provisioning.chatLinkField,
	});

	const engine = createEngine({
		db,
		directory: provisioning,
		remote: provisioning,
		delivery: notifier,
		summary: notifier,
		adminLog,
		settings: {
			syncIntervalHours: config.syncIntervalHours,
			timeoutMs: config.provisioning.timeoutMs,
			invites: config.invites,
			notifications: config.notifications,
		},
	});

	const shutdown = (signal: string) => {
		logger.info(`Received ${signal}, shutting down`);
		engine.stop();
		db.close();
	};
	process.once("SIGINT", () => shutdown("SIGINT"));
	process.once("SIGTERM", () => shutdown("SIGTERM"));

	engine.start();
	logger.info("Invite reconciler started");
}

main().catch((error: unknown) => {
	logger.error("Failed to start invite reconciler", error);
	console.error("Failed to start invite reconciler:", error);
	process.exit(1);
});
