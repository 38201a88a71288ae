/**
 * Unit Tests for the engine composition root
 *
 * Tests cover:
 * - src/engine.ts
 *   - createEngine() wiring around one database handle
 *   - start()/stop() scheduling of both periodic tasks
 *   - getStatus()
 */

import { type DatabaseHandle, openDatabase } from '../../src/database';
import { type EngineSettings, createEngine } from '../../src/engine';
import { FakeDelivery, FakeProvisioning, FakeSummarySink } from '../helpers/fakes';
import { ManualClock } from '../helpers/testDatabase';

const HOUR_MS = 60 * 60 * 1000;

const settings = (overrides: Partial<EngineSettings> = {}): EngineSettings => ({
  syncIntervalHours: 12,
  timeoutMs: 1000,
  invites: {
    trialProfile: 'Trial Profile',
    trialAccountDays: 3,
    trialLinkDays: 1,
    trialLabelFormat: '{chat_username}-Trial-{date}',
    paidLinkDays: 7,
    paidLabelFormat: '{chat_username}-{plan}-{date}',
    inviteLinkBaseUrl: '',
  },
  notifications: { lookaheadDays: 4, dedupIntervalDays: 2, notifyDays: [3, 0], checkIntervalHours: 6 },
  runTasksOnStart: false,
  ...overrides,
});

describe('createEngine', () => {
  let db: DatabaseHandle;
  let provisioning: FakeProvisioning;
  let summary: FakeSummarySink;
  let clock: ManualClock;

  const build = (overrides: Partial<EngineSettings> = {}) =>
    createEngine({
      db,
      directory: provisioning,
      remote: provisioning,
      delivery: new FakeDelivery(),
      summary,
      settings: settings(overrides),
      clock: clock.now,
    });

  beforeEach(() => {
    db = openDatabase(':memory:');
    provisioning = new FakeProvisioning();
    provisioning.addUser({ remoteUsername: 'alice', linkedChatId: '1001' });
    summary = new FakeSummarySink();
    clock = new ManualClock();
  });

  afterEach(() => {
    vi.useRealTimers();
    db.close();
  });

  it('should create the schema and share the stores between services', async () => {
    const engine = build();

    const report = await engine.directorySync.run();

    expect(report.status).toBe('succeeded');
    expect(engine.resolver.resolve('1001')[0]).toMatchObject({ remoteUsername: 'alice', confidence: 'confirmed-direct' });
  });

  it('should report both tasks idle before start', () => {
    const engine = build();

    expect(engine.getStatus()).toEqual([
      {
        name: 'directory-sync',
        isRunning: false,
        inFlight: false,
        lastRunAt: null,
        lastError: null,
        skippedTicks: 0,
        intervalMs: 12 * HOUR_MS,
      },
      {
        name: 'expiry-check',
        isRunning: false,
        inFlight: false,
        lastRunAt: null,
        lastError: null,
        skippedTicks: 0,
        intervalMs: 6 * HOUR_MS,
      },
    ]);
  });

  it('should run both tasks immediately when asked to', async () => {
    vi.useFakeTimers();
    const engine = build({ runTasksOnStart: true });

    engine.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(engine.cache.findByChatId('1001')?.remoteUsername).toBe('alice');
    expect(summary.summaries).toHaveLength(1);
    engine.stop();
  });

  it('should schedule each task on its own interval', async () => {
    vi.useFakeTimers();
    const engine = build();

    engine.start();
    expect(engine.getStatus().map((s) => s.isRunning)).toEqual([true, true]);

    await vi.advanceTimersByTimeAsync(6 * HOUR_MS);
    expect(summary.summaries).toHaveLength(1);
    expect(engine.cache.findByChatId('1001')).toBeUndefined();

    await vi.advanceTimersByTimeAsync(6 * HOUR_MS);
    expect(summary.summaries).toHaveLength(2);
    expect(engine.cache.findByChatId('1001')?.remoteUsername).toBe('alice');

    engine.stop();
    expect(engine.getStatus().map((s) => s.isRunning)).toEqual([false, false]);

    await vi.advanceTimersByTimeAsync(12 * HOUR_MS);
    expect(summary.summaries).toHaveLength(2);
  });
});
