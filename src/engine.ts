/**
 * Engine composition root.
 * Owns the store instances, the lifecycle services and the periodic tasks.
 * Adapters for the provisioning service and the chat platform are passed
 * in, so the engine runs against fakes in tests and real clients in the bot.
 *
 * @module engine
 */

import type { InviteSettings, NotificationSettings } from "./config";
import { type DatabaseHandle, initSchema } from "./database";
import { AuditLog } from "./services/auditLog";
import { DirectoryCache } from "./services/directoryCache";
import { DirectorySync, type SyncReport } from "./services/directorySync";
import { type ExpiryPassReport, ExpiryNotifier } from "./services/expiryNotifier";
import { IdentityResolver } from "./services/identityResolver";
import { InviteStore } from "./services/inviteStore";
import { LifecycleCoordinator } from "./services/lifecycleCoordinator";
import { PeriodicTask, type PeriodicTaskStatus } from "./services/periodicTask";
import type { Clock, DirectoryFetch, NotificationDelivery, RemoteMutation, SummarySink } from "./types";
import { logger } from "./utils/logger";
import { SingleFlight } from "./utils/singleFlight";
import { HOUR_SECONDS, nowSeconds } from "./utils/time";

export const DIRECTORY_SYNC_TASK = "directory-sync";
export const EXPIRY_CHECK_TASK = "expiry-check";

export interface EngineSettings {
	syncIntervalHours: number;
	/** Bound applied to each remote call */
	timeoutMs: number;
	invites: InviteSettings;
	notifications: NotificationSettings;
	/** Run both tasks once as soon as the engine starts */
	runTasksOnStart?: boolean;
}

export interface EngineOptions {
	db: DatabaseHandle;
	directory: DirectoryFetch;
	remote: RemoteMutation;
	delivery: NotificationDelivery;
	summary?: SummarySink;
	/** Receives a report of every issue, extend and remove */
	adminLog?: SummarySink;
	settings: EngineSettings;
	clock?: Clock;
}

export interface Engine {
	store: InviteStore;
	cache: DirectoryCache;
	audit: AuditLog;
	resolver: IdentityResolver;
	coordinator: LifecycleCoordinator;
	notifier: ExpiryNotifier;
	directorySync: DirectorySync;
	tasks: {
		directorySync: PeriodicTask<SyncReport>;
		expiryCheck: PeriodicTask<ExpiryPassReport>;
	};
	start(): void;
	stop(): void;
	getStatus(): PeriodicTaskStatus[];
}

/**
 * Wires every component around one database handle. The schema is created
 * if missing. Tasks are not scheduled until `start()`.
 */
export function createEngine(options: EngineOptions): Engine {
	const { db, settings } = options;
	const clock = options.clock ?? nowSeconds;

	initSchema(db);

	const store = new InviteStore(db, clock);
	const cache = new DirectoryCache(db, { staleAfterSeconds: 2 * settings.syncIntervalHours * HOUR_SECONDS });
	const audit = new AuditLog(db);
	const resolver = new IdentityResolver(store, cache, clock);
	const coordinator = new LifecycleCoordinator({
		store,
		cache,
		audit,
		resolver,
		remote: options.remote,
		invites: settings.invites,
		timeoutMs: settings.timeoutMs,
		adminLog: options.adminLog,
		clock,
	});
	const notifier = new ExpiryNotifier({
		store,
		delivery: options.delivery,
		summary: options.summary,
		settings: settings.notifications,
		clock,
	});
	const directorySync = new DirectorySync({
		directory: options.directory,
		cache,
		store,
		timeoutMs: settings.timeoutMs,
		clock,
	});

	const flights = new SingleFlight();
	const runOnStart = settings.runTasksOnStart ?? true;
	const tasks = {
		directorySync: new PeriodicTask(flights, {
			name: DIRECTORY_SYNC_TASK,
			intervalMs: settings.syncIntervalHours * HOUR_SECONDS * 1000,
			runOnStart,
			job: () => directorySync.run(),
		}),
		expiryCheck: new PeriodicTask(flights, {
			name: EXPIRY_CHECK_TASK,
			intervalMs: settings.notifications.checkIntervalHours * HOUR_SECONDS * 1000,
			runOnStart,
			job: () => notifier.runPass(),
		}),
	};

	return {
		store,
		cache,
		audit,
		resolver,
		coordinator,
		notifier,
		directorySync,
		tasks,
		start() {
			tasks.directorySync.start();
			tasks.expiryCheck.start();
			logger.info("Engine started");
		},
		stop() {
			tasks.directorySync.stop();
			tasks.expiryCheck.stop();
			logger.info("Engine stopped");
		},
		getStatus() {
			return [tasks.directorySync.getStatus(), tasks.expiryCheck.getStatus()];
		},
	};
}
