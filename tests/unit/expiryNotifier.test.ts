/**
 * Unit Tests for the Expiry Notification Scheduler
 *
 * Tests cover:
 * - src/services/expiryNotifier.ts
 *   - runPass() - due selection, dedup interval, failure counting, summary
 *   - formatExpiryMessage() / formatPassSummary()
 */

import { ExpiryNotifier, formatExpiryMessage } from '../../src/services/expiryNotifier';
import type { NotificationDelivery } from '../../src/types';
import { DAY_SECONDS } from '../../src/utils/time';
import { FakeDelivery, FakeSummarySink } from '../helpers/fakes';
import { TEST_NOW, type TestStores, createTestStores } from '../helpers/testDatabase';

const SETTINGS = { lookaheadDays: 4, dedupIntervalDays: 2, notifyDays: [3, 0] };

describe('ExpiryNotifier', () => {
  let ctx: TestStores;
  let delivery: FakeDelivery;
  let summary: FakeSummarySink;
  let notifier: ExpiryNotifier;

  const record = (chatId: string, chatUsername: string, accountExpiresAt: number | null, plan = 'trial') =>
    ctx.store.upsert({ chatId, chatUsername, inviteCode: `code-${chatId}`, plan, accountExpiresAt });

  beforeEach(() => {
    ctx = createTestStores();
    delivery = new FakeDelivery();
    summary = new FakeSummarySink();
    notifier = new ExpiryNotifier({ store: ctx.store, delivery, summary, settings: SETTINGS, clock: ctx.clock.now });
  });

  afterEach(() => {
    ctx.db.close();
  });

  describe('runPass', () => {
    beforeEach(() => {
      record('1', 'Ann', TEST_NOW + 3 * DAY_SECONDS + 100);
      record('2', 'Ben', TEST_NOW + 3 * DAY_SECONDS - 100);
      record('3', 'Cat', TEST_NOW + 600);
      record('4', 'Dan', TEST_NOW + 3 * DAY_SECONDS + 50);
      ctx.store.setLastNotified('4', TEST_NOW - DAY_SECONDS);
      record('5', 'Eve', TEST_NOW + 10 * DAY_SECONDS);
      record('6', 'Finn', TEST_NOW + 700);
      delivery.unreachable.add('6');
    });

    it('should notify due records and count every outcome', async () => {
      const report = await notifier.runPass();

      expect(report).toMatchObject({ ranAt: TEST_NOW, scanned: 5, notified: 2, failed: 1, skippedRecent: 1, notDue: 1 });
      expect(report.entries.map((e) => [e.chatId, e.daysRemaining, e.outcome])).toEqual([
        ['3', 0, 'notified'],
        ['6', 0, 'failed'],
        ['2', 2, 'not_due'],
        ['4', 3, 'skipped_recent'],
        ['1', 3, 'notified'],
      ]);
      expect(delivery.sent.map((s) => s.chatId)).toEqual(['3', '1']);
    });

    it('should mark delivered records and leave failed ones unmarked', async () => {
      await notifier.runPass();

      expect(ctx.store.get('1')?.lastNotifiedAt).toBe(TEST_NOW);
      expect(ctx.store.get('3')?.lastNotifiedAt).toBe(TEST_NOW);
      expect(ctx.store.get('6')?.lastNotifiedAt).toBeNull();
      expect(ctx.store.get('4')?.lastNotifiedAt).toBe(TEST_NOW - DAY_SECONDS);
    });

    it('should not notify twice inside the dedup interval', async () => {
      await notifier.runPass();
      const second = await notifier.runPass();

      expect(second.notified).toBe(0);
      expect(second.skippedRecent).toBe(3);
      expect(delivery.sent).toHaveLength(2);
    });

    it('should publish one summary per pass', async () => {
      await notifier.runPass();

      expect(summary.summaries).toEqual([
        [
          'Expiry check 2023-11-14 22:13 UTC',
          'Scanned: 5 | Notified: 2 | Failed: 1 | Skipped (recent): 1 | Not due: 1',
          '- Cat [3] 0d: notified',
          '- Finn [6] 0d: failed (Forbidden: bot was blocked by the user)',
          '- Ann [1] 3d: notified',
        ].join('\n'),
      ]);
    });
  });

  it('should notify again once the dedup interval has passed', async () => {
    record('1', 'Ann', TEST_NOW + 600);
    ctx.store.setLastNotified('1', TEST_NOW - 2 * DAY_SECONDS);
    record('2', 'Ben', TEST_NOW + 600);
    ctx.store.setLastNotified('2', TEST_NOW - 2 * DAY_SECONDS + 1);

    const report = await notifier.runPass();

    expect(report.entries.map((e) => [e.chatId, e.outcome])).toEqual([
      ['1', 'notified'],
      ['2', 'skipped_recent'],
    ]);
  });

  it('should send a summary even when nothing is due', async () => {
    const report = await notifier.runPass();

    expect(report.scanned).toBe(0);
    expect(summary.summaries).toEqual([
      'Expiry check 2023-11-14 22:13 UTC\nScanned: 0 | Notified: 0 | Failed: 0 | Skipped (recent): 0 | Not due: 0',
    ]);
  });

  it('should count an account that already expired as not due', async () => {
    record('1', 'Ann', TEST_NOW - 600);

    const report = await notifier.runPass();

    expect(report.entries.map((e) => [e.chatId, e.daysRemaining, e.outcome])).toEqual([['1', -1, 'not_due']]);
    expect(report.notDue).toBe(1);
    expect(delivery.sent).toEqual([]);
  });

  it('should count a throwing delivery as failed', async () => {
    record('1', 'Ann', TEST_NOW + 600);
    const broken: NotificationDelivery = { send: vi.fn().mockRejectedValue(new Error('502 Bad Gateway')) };
    const withBrokenDelivery = new ExpiryNotifier({ store: ctx.store, delivery: broken, settings: SETTINGS, clock: ctx.clock.now });

    const report = await withBrokenDelivery.runPass();

    expect(report.failed).toBe(1);
    expect(report.entries[0]).toMatchObject({ outcome: 'failed', reason: '502 Bad Gateway' });
    expect(ctx.store.get('1')?.lastNotifiedAt).toBeNull();
  });

  it('should finish the pass when the summary cannot be sent', async () => {
    const failingSummary = { sendSummary: vi.fn().mockRejectedValue(new Error('chat not found')) };
    const withFailingSummary = new ExpiryNotifier({
      store: ctx.store,
      delivery,
      summary: failingSummary,
      settings: SETTINGS,
      clock: ctx.clock.now,
    });

    await expect(withFailingSummary.runPass()).resolves.toMatchObject({ scanned: 0 });
    expect(failingSummary.sendSummary).toHaveBeenCalledTimes(1);
  });

  describe('formatExpiryMessage', () => {
    it('should state plan, expiry and days remaining', () => {
      const stored = record('1', 'Ann', TEST_NOW + 3 * DAY_SECONDS + 100);

      expect(formatExpiryMessage(stored, TEST_NOW + 3 * DAY_SECONDS + 100, 3)).toBe(
        'Hi Ann, your trial access expires in 3 days.\nExpiry: 2023-11-17 22:15 UTC\nContact an administrator to extend it.',
      );
    });

    it('should name paid plans and the last day', () => {
      const stored = record('2', 'Ben', TEST_NOW + 600, 'monthly');

      expect(formatExpiryMessage(stored, TEST_NOW + 600, 0)).toBe(
        'Hi Ben, your monthly plan access expires today.\nExpiry: 2023-11-14 22:23 UTC\nContact an administrator to extend it.',
      );
      expect(formatExpiryMessage(stored, TEST_NOW + DAY_SECONDS, 1).split('\n')[0]).toBe(
        'Hi Ben, your monthly plan access expires in 1 day.',
      );
    });
  });
});
