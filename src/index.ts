/**
 * Public API of the invite reconciler library.
 *
 * @module index
 */

export { type Config, type InviteSettings, type NotificationSettings, loadConfig, validateConfig } from "./config";
export { type DatabaseHandle, initSchema, openDatabase } from "./database";
export { type Engine, type EngineOptions, type EngineSettings, createEngine } from "./engine";
export { ConfigError, StoreError, TransportError, ValidationError } from "./errors";
export { AuditLog } from "./services/auditLog";
export { DirectoryCache } from "./services/directoryCache";
export { DirectorySync, type SyncReport } from "./services/directorySync";
export { type ExpiryPassReport, ExpiryNotifier, formatExpiryMessage, formatPassSummary } from "./services/expiryNotifier";
export {
	CONFIDENCE_ORDER,
	type Confidence,
	type IdentityCandidate,
	IdentityResolver,
	type ResolveHints,
} from "./services/identityResolver";
export { InviteStore } from "./services/inviteStore";
export {
	type ExtendReport,
	type IssueReport,
	LifecycleCoordinator,
	type PaidRequest,
	type RemovalReport,
	type StepOutcome,
	formatAdminAction,
	formatLabel,
} from "./services/lifecycleCoordinator";
export { PeriodicTask } from "./services/periodicTask";
export { ProvisioningClient } from "./services/provisioningClient";
export { TelegramNotifier } from "./services/telegramNotifier";
export type * from "./types";
