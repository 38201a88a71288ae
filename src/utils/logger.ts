/**
 * Logger utility module for the invite reconciler.
 * Provides structured logging with Winston: console output, rotating log
 * files, and a helper that redacts sensitive context keys.
 *
 * @module utils/logger
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as winston from "winston";

/**
 * Directory path for log files.
 * Logs are stored in the 'logs' directory at the project root.
 */
const logDir = process.env.LOG_DIR || path.join(__dirname, "../../logs");

/** Test runs keep every transport silent and never touch the log directory. */
const silent = process.env.NODE_ENV === "test";

if (!silent && !fs.existsSync(logDir)) {
	fs.mkdirSync(logDir, { recursive: true });
}

/**
 * Custom format for log entries.
 * Combines timestamp, error stack traces, and metadata into a readable format.
 */
const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.errors({ stack: true }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		let msg = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
		if (Object.keys(meta).length > 0 && meta.stack) {
			msg += `\n${meta.stack}`;
		} else if (Object.keys(meta).length > 0) {
			msg += ` ${JSON.stringify(meta)}`;
		}
		return msg;
	}),
);

/**
 * Reads directly from process.env to avoid a circular dependency with the
 * config module.
 */
const getLogLevel = (): string => {
	return process.env.LOG_LEVEL || "info";
};

const fileTransports = (): winston.transports.FileTransportInstance[] => {
	if (silent) {
		return [];
	}
	return [
		new winston.transports.File({
			filename: path.join(logDir, "combined.log"),
			maxsize: 10485760, // 10MB
			maxFiles: 5,
			tailable: true,
		}),
		new winston.transports.File({
			filename: path.join(logDir, "error.log"),
			level: "error",
			maxsize: 10485760, // 10MB
			maxFiles: 5,
			tailable: true,
		}),
	];
};

/**
 * Main Winston logger instance.
 *
 * @example
 * ```typescript
 * logger.info("Directory sync finished", { fetched: 42 });
 * logger.error("Invite creation failed", { error, chatId: "1234" });
 * ```
 */
export const logger = winston.createLogger({
	level: getLogLevel(),
	format: logFormat,
	silent,
	transports: [
		new winston.transports.Console({
			format: winston.format.combine(winston.format.colorize(), logFormat),
		}),
		...fileTransports(),
	],
});

/**
 * Updates the logger's level at runtime.
 *
 * @param level - The new log level (error, warn, info, debug)
 */
export const updateLogLevel = (level: string): void => {
	logger.level = level;
};

/**
 * Context metadata for structured logging.
 */
export interface LogContext {
	/** Chat-platform account id */
	chatId?: string | null;
	/** Remote (media server) username */
	remoteUsername?: string | null;
	/** Acting administrator */
	actorId?: string;
	/** Operation type */
	operation?: string;
	/** Additional metadata */
	[key: string]: unknown;
}

const SENSITIVE_KEYS = ["password", "token", "secret", "inviteCode", "authorization"];

/**
 * Helper class for structured logging with consistent context.
 */
export class StructuredLogger {
	/**
	 * Logs an administrative lifecycle action (issue, extend, remove).
	 *
	 * @example
	 * ```typescript
	 * StructuredLogger.logAdminAction("Invite issued", {
	 *   chatId: "1234",
	 *   actorId: "42",
	 *   operation: "issue",
	 * });
	 * ```
	 */
	static logAdminAction(action: string, context: LogContext): void {
		logger.info(`[ADMIN] ${action}`, StructuredLogger.sanitizeContext(context));
	}

	/** Logs a periodic task event (directory sync, expiry pass). */
	static logTask(event: string, context: LogContext): void {
		logger.info(`[TASK] ${event}`, StructuredLogger.sanitizeContext(context));
	}

	/**
	 * Logs an error with full context and stack trace.
	 */
	static logError(error: unknown, context: LogContext = {}): void {
		if (error instanceof Error) {
			logger.error(error.message, {
				...StructuredLogger.sanitizeContext(context),
				stack: error.stack,
			});
		} else {
			logger.error(String(error), StructuredLogger.sanitizeContext(context));
		}
	}

	/** Logs a debug message (only in debug log level). */
	static logDebug(message: string, context: LogContext = {}): void {
		logger.debug(message, StructuredLogger.sanitizeContext(context));
	}

	/**
	 * Removes sensitive values (credentials, invite codes) from a context.
	 */
	static sanitizeContext(context: LogContext): LogContext {
		const sanitized = { ...context };

		for (const key of SENSITIVE_KEYS) {
			if (key in sanitized) {
				sanitized[key] = "[REDACTED]";
			}
		}

		return sanitized;
	}
}
