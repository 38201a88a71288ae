/**
 * In-process stand-ins for the provisioning service and the chat platform.
 */

import type {
  Clock,
  CreateInviteRequest,
  DeliveryResult,
  DirectoryFetch,
  ExtendOutcome,
  NotificationDelivery,
  RemoteMutation,
  RemoteResult,
  RemoteUser,
  SummarySink,
} from '../../src/types';
import { nowSeconds } from '../../src/utils/time';

export type FakeFailure = 'throw' | 'failed' | 'hang';

/**
 * Provisioning service holding users and invites in memory.
 * `failNext` makes the next call of an operation misbehave.
 */
export class FakeProvisioning implements DirectoryFetch, RemoteMutation {
  users = new Map<string, RemoteUser>();
  invites = new Map<string, CreateInviteRequest>();
  profiles = new Set(['Trial Profile', 'Paid Profile', 'monthly']);
  calls: string[] = [];
  /** When false, extendAccount leaves the new expiry for the caller to compute */
  reportExpiry = true;
  private nextCode = 1;
  private failures = new Map<string, FakeFailure>();

  constructor(private readonly clock: Clock = nowSeconds) {}

  addUser(user: Partial<RemoteUser> & { remoteUsername: string }): RemoteUser {
    const stored: RemoteUser = {
      remoteUserId: user.remoteUserId ?? `id-${user.remoteUsername}`,
      remoteUsername: user.remoteUsername,
      linkedChatId: user.linkedChatId ?? null,
      email: user.email ?? null,
      expiresAt: user.expiresAt ?? null,
      disabled: user.disabled ?? false,
      isAdmin: user.isAdmin ?? false,
    };
    this.users.set(stored.remoteUsername, stored);
    return stored;
  }

  failNext(operation: string, failure: FakeFailure): void {
    this.failures.set(operation, failure);
  }

  async listRemoteUsers(): Promise<RemoteUser[]> {
    await this.misbehave('listRemoteUsers');
    return [...this.users.values()].map((user) => ({ ...user }));
  }

  async listProfiles(): Promise<RemoteResult<string[]>> {
    const failure = await this.misbehave('listProfiles');
    if (failure) {
      return failure;
    }
    return { status: 'ok', value: [...this.profiles] };
  }

  async createInvite(request: CreateInviteRequest): Promise<RemoteResult<string>> {
    const failure = await this.misbehave('createInvite');
    if (failure) {
      return failure;
    }
    const code = `code-${this.nextCode++}`;
    this.invites.set(code, request);
    return { status: 'ok', value: code };
  }

  async extendAccount(remoteUsername: string, durationSeconds: number): Promise<RemoteResult<ExtendOutcome>> {
    const failure = await this.misbehave('extendAccount');
    if (failure) {
      return failure;
    }
    const user = this.users.get(remoteUsername);
    if (!user) {
      return { status: 'not_found', message: `no user ${remoteUsername}` };
    }
    this.calls.push(`extend:${remoteUsername}:${durationSeconds}`);
    const now = this.clock();
    user.expiresAt = Math.max(user.expiresAt ?? now, now) + durationSeconds;
    return { status: 'ok', value: { expiresAt: this.reportExpiry ? user.expiresAt : null } };
  }

  async deleteAccount(remoteUsername: string): Promise<RemoteResult> {
    const failure = await this.misbehave('deleteAccount');
    if (failure) {
      return failure;
    }
    this.calls.push(`deleteAccount:${remoteUsername}`);
    if (!this.users.delete(remoteUsername)) {
      return { status: 'not_found', message: `no user ${remoteUsername}` };
    }
    return { status: 'ok', value: undefined };
  }

  async deleteInvite(inviteCode: string): Promise<RemoteResult> {
    const failure = await this.misbehave('deleteInvite');
    if (failure) {
      return failure;
    }
    this.calls.push(`deleteInvite:${inviteCode}`);
    if (!this.invites.delete(inviteCode)) {
      return { status: 'not_found', message: `no invite ${inviteCode}` };
    }
    return { status: 'ok', value: undefined };
  }

  private async misbehave(operation: string): Promise<{ status: 'failed'; message: string } | null> {
    const failure = this.failures.get(operation);
    if (!failure) {
      return null;
    }
    this.failures.delete(operation);
    if (failure === 'throw') {
      throw new Error(`${operation} connection reset`);
    }
    if (failure === 'hang') {
      await new Promise<never>(() => undefined);
    }
    return { status: 'failed', message: `${operation} rejected` };
  }
}

export class FakeDelivery implements NotificationDelivery {
  sent: Array<{ chatId: string; message: string }> = [];
  unreachable = new Set<string>();

  async send(chatId: string, message: string): Promise<DeliveryResult> {
    if (this.unreachable.has(chatId)) {
      return { status: 'unreachable', reason: 'Forbidden: bot was blocked by the user' };
    }
    this.sent.push({ chatId, message });
    return { status: 'delivered' };
  }
}

export class FakeSummarySink implements SummarySink {
  summaries: string[] = [];

  async sendSummary(text: string): Promise<void> {
    this.summaries.push(text);
  }
}

export const ADMIN = { id: '42', name: 'test-admin' };
