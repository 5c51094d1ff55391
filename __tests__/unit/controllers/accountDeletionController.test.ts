import { beforeEach, describe, expect, it, vi } from 'vitest';
import { AccountDeletionController } from '../../../src/controllers/accountDeletionController';
import { RolePolicyAuthorizer } from '../../../src/services/accountAuthorizer';
import type { DeletionResult, RequesterIdentity } from '../../../src/types/account';
import { InMemoryAccountStore } from '../../helpers/inMemoryAccountStore';

describe('AccountDeletionController', () => {
  let store: InMemoryAccountStore;
  let controller: AccountDeletionController;

  const owner = (id: string): RequesterIdentity => ({ id, role: 'user' });
  const admin: RequesterIdentity = { id: 'admin-1', role: 'admin' };

  beforeEach(() => {
    store = new InMemoryAccountStore();
    controller = new AccountDeletionController({
      store,
      authorizer: new RolePolicyAuthorizer(),
      leaseTtlMs: 60_000,
    });
  });

  it('deletes an active account when the owner asks', async () => {
    store.seed('acct-1');

    const result = await controller.delete(owner('acct-1'), 'acct-1');

    expect(result.status).toBe('success');
    expect(result.accountId).toBe('acct-1');
    expect(result.resumed).toBe(false);
    expect(result.purged).toEqual({ salesUploads: 3 });
    expect(result.error).toBeUndefined();
    expect(store.get('acct-1')?.status).toBe('deleted');
    expect(store.get('acct-1')?.email).toBeNull();
    expect(store.get('acct-1')?.leaseExpiresAt).toBeNull();
  });

  it('rejects an unrelated user and leaves the account untouched', async () => {
    store.seed('acct-2');

    const result = await controller.delete(owner('acct-9'), 'acct-2');

    expect(result.status).toBe('unauthorized');
    expect(result.error?.code).toBe('FORBIDDEN');
    expect(store.get('acct-2')?.status).toBe('active');
    expect(store.purgeCalls).toBe(0);
  });

  it('reports not_found for an account that does not exist', async () => {
    const result = await controller.delete(admin, 'acct-3');

    expect(result.status).toBe('not_found');
    expect(result.error?.code).toBe('ACCOUNT_NOT_FOUND');
  });

  it('lets an admin delete someone else\'s account', async () => {
    store.seed('acct-4');

    const result = await controller.delete(admin, 'acct-4');

    expect(result.status).toBe('success');
    expect(store.get('acct-4')?.status).toBe('deleted');
  });

  it.each(['', 'Not An Id'])('treats malformed id %j as not_found', async (accountId) => {
    const result = await controller.delete(admin, accountId);

    expect(result.status).toBe('not_found');
    expect(result.error?.code).toBe('INVALID_ACCOUNT_ID');
  });

  it('is idempotent: a second call reports already deleted without cleaning again', async () => {
    store.seed('acct-1');

    const first = await controller.delete(owner('acct-1'), 'acct-1');
    const second = await controller.delete(owner('acct-1'), 'acct-1');

    expect(first.status).toBe('success');
    expect(second.status).toBe('not_found');
    expect(second.error?.code).toBe('ACCOUNT_ALREADY_DELETED');
    expect(store.purgeCalls).toBe(1);
    expect(store.get('acct-1')?.status).toBe('deleted');
  });

  it('runs the cleanup once for two simultaneous calls', async () => {
    store.seed('acct-5');
    store.purgeDelayMs = 10;

    const results = await Promise.all([
      controller.delete(owner('acct-5'), 'acct-5'),
      controller.delete(admin, 'acct-5'),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(['not_found', 'success']);
    expect(store.purgeCalls).toBe(1);
    expect(store.get('acct-5')?.status).toBe('deleted');
  });

  it.each(['active', 'pending_deletion'] as const)(
    'does not clean again when another process finishes a %s account first',
    async (status) => {
      store.seed('acct-5', { status });
      const otherProcess = new AccountDeletionController({
        store,
        authorizer: new RolePolicyAuthorizer(),
        leaseTtlMs: 60_000,
      });
      const readAccount = store.find.bind(store);
      let otherResult: DeletionResult | undefined;
      vi.spyOn(store, 'find').mockImplementationOnce(async (accountId) => {
        const snapshot = await readAccount(accountId);
        otherResult = await otherProcess.delete(admin, accountId);
        return snapshot;
      });

      const result = await controller.delete(owner('acct-5'), 'acct-5');

      expect(otherResult?.status).toBe('success');
      expect(result.status).toBe('not_found');
      expect(result.error?.code).toBe('ACCOUNT_ALREADY_DELETED');
      expect(store.purgeCalls).toBe(1);
      expect(store.get('acct-5')?.status).toBe('deleted');
      expect(store.get('acct-5')?.leaseExpiresAt).toBeNull();
    }
  );

  it('leaves the account pending_deletion when cleanup fails and resumes on retry', async () => {
    store.seed('acct-6');
    store.failNextPurge = new Error('disk unavailable');

    const failed = await controller.delete(owner('acct-6'), 'acct-6');

    expect(failed.status).toBe('failed');
    expect(failed.error).toEqual({ code: 'CLEANUP_FAILED', message: 'disk unavailable' });
    expect(store.get('acct-6')?.status).toBe('pending_deletion');
    expect(store.get('acct-6')?.deletionAttempts).toBe(1);
    expect(store.get('acct-6')?.lastDeletionError).toBe('disk unavailable');
    expect(store.get('acct-6')?.leaseExpiresAt).toBeNull();

    const retried = await controller.delete(owner('acct-6'), 'acct-6');

    expect(retried.status).toBe('success');
    expect(retried.resumed).toBe(true);
    expect(store.purgeCalls).toBe(2);
    expect(store.get('acct-6')?.status).toBe('deleted');
    expect(store.get('acct-6')?.lastDeletionError).toBeNull();
  });

  it('does not start while another process holds the deletion lease', async () => {
    store.seed('acct-7');
    store.holdLease('acct-7', 30_000);

    const result = await controller.delete(owner('acct-7'), 'acct-7');

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('DELETION_IN_PROGRESS');
    expect(store.get('acct-7')?.status).toBe('active');
    expect(store.purgeCalls).toBe(0);
  });

  it('takes over an expired lease', async () => {
    store.seed('acct-7');
    store.holdLease('acct-7', 30_000);
    store.clock += 31_000;

    const result = await controller.delete(owner('acct-7'), 'acct-7');

    expect(result.status).toBe('success');
  });

  it('reports a failed status transition without purging', async () => {
    store.seed('acct-8');
    vi.spyOn(store, 'setStatus').mockResolvedValue(false);

    const result = await controller.delete(owner('acct-8'), 'acct-8');

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('STATUS_TRANSITION_REJECTED');
    expect(store.purgeCalls).toBe(0);
    expect(store.get('acct-8')?.leaseExpiresAt).toBeNull();
  });

  it('turns storage errors into a failed result', async () => {
    store.seed('acct-1');
    vi.spyOn(store, 'find').mockRejectedValue(new Error('connection reset'));

    const result = await controller.delete(owner('acct-1'), 'acct-1');

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({ code: 'STORAGE_ERROR', message: 'connection reset' });
  });

  it('turns authorizer errors into a failed result', async () => {
    store.seed('acct-1');
    const broken = new AccountDeletionController({
      store,
      authorizer: { isAuthorized: vi.fn().mockRejectedValue(new Error('policy service down')) },
    });

    const result = await broken.delete(owner('acct-1'), 'acct-1');

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('AUTHORIZATION_ERROR');
    expect(store.get('acct-1')?.status).toBe('active');
  });

  it('still succeeds when releasing the lease fails', async () => {
    store.seed('acct-1');
    vi.spyOn(store, 'releaseDeletionLease').mockRejectedValue(new Error('write timeout'));

    const result = await controller.delete(owner('acct-1'), 'acct-1');

    expect(result.status).toBe('success');
    expect(store.get('acct-1')?.status).toBe('deleted');
  });

  it('returns frozen results stamped with the completion time', async () => {
    const completedAt = new Date('2026-03-01T12:00:00.000Z');
    const clocked = new AccountDeletionController({
      store,
      authorizer: new RolePolicyAuthorizer(),
      now: () => completedAt,
    });
    store.seed('acct-1');

    const result = await clocked.delete(owner('acct-1'), 'acct-1');

    expect(Object.isFrozen(result)).toBe(true);
    expect(result.completedAt).toBe(completedAt);
  });
});
