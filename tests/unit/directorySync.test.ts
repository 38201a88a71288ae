/**
 * Unit Tests for the Directory Sync Task
 */

import { DirectorySync } from '../../src/services/directorySync';
import { DAY_SECONDS } from '../../src/utils/time';
import { FakeProvisioning } from '../helpers/fakes';
import { TEST_NOW, type TestStores, createTestStores } from '../helpers/testDatabase';

describe('DirectorySync', () => {
  let ctx: TestStores;
  let directory: FakeProvisioning;
  let sync: DirectorySync;

  beforeEach(() => {
    ctx = createTestStores();
    directory = new FakeProvisioning();
    sync = new DirectorySync({ directory, cache: ctx.cache, store: ctx.store, timeoutMs: 50, clock: ctx.clock.now });
  });

  afterEach(() => {
    ctx.db.close();
  });

  it('should mirror the directory and link local records', async () => {
    ctx.store.upsert({
      chatId: '1001',
      chatUsername: 'Alice',
      inviteCode: 'code-1',
      plan: 'trial',
      accountExpiresAt: TEST_NOW + 3 * DAY_SECONDS,
    });
    directory.addUser({ remoteUserId: 'r1', remoteUsername: 'alice', linkedChatId: '1001' });
    directory.addUser({ remoteUserId: 'r2', remoteUsername: 'bob', linkedChatId: '2002' });
    directory.addUser({ remoteUserId: 'r3', remoteUsername: 'carol' });

    const report = await sync.run();

    expect(report).toEqual({ status: 'succeeded', syncedAt: TEST_NOW, fetched: 3, written: 3, linked: 1, linkFailures: 0 });
    expect(ctx.cache.findByRemoteUsername('carol')?.lastSyncedAt).toBe(TEST_NOW);
    expect(ctx.store.get('1001')?.remoteUserId).toBe('r1');
  });

  it('should not count links that were already in place', async () => {
    ctx.store.upsert({ chatId: '1001', chatUsername: 'Alice', inviteCode: null, remoteUserId: 'r1', plan: 'monthly', accountExpiresAt: null });
    directory.addUser({ remoteUserId: 'r1', remoteUsername: 'alice', linkedChatId: '1001' });

    const report = await sync.run();

    expect(report).toMatchObject({ status: 'succeeded', linked: 0 });
  });

  it('should leave the cache untouched when the fetch fails', async () => {
    directory.addUser({ remoteUserId: 'r1', remoteUsername: 'alice' });
    directory.failNext('listRemoteUsers', 'throw');

    const report = await sync.run();

    expect(report).toEqual({
      status: 'failed',
      syncedAt: TEST_NOW,
      stage: 'fetch',
      error: 'listRemoteUsers: listRemoteUsers connection reset',
    });
    expect(ctx.cache.list()).toEqual([]);
  });

  it('should time out a hanging fetch', async () => {
    directory.failNext('listRemoteUsers', 'hang');

    const report = await sync.run();

    expect(report).toMatchObject({ status: 'failed', stage: 'fetch', error: 'listRemoteUsers: timed out after 50ms' });
  });

  it('should report a failed write', async () => {
    directory.addUser({ remoteUserId: 'r1', remoteUsername: 'alice' });
    ctx.db.exec('DROP TABLE directory_cache');

    const report = await sync.run();

    expect(report).toMatchObject({ status: 'failed', stage: 'write' });
  });
});
