/**
 * Lock → transaction → post-commit fence, shared by every write path.
 */

import type { RbacSession, RbacStore } from '../storage/types.js';
import type { KeyedLock, LockRequest } from '../locking/keyed-lock.js';
import type { CacheInvalidationCoordinator } from '../cache/invalidation-coordinator.js';
import { ConcurrentModificationError, toStoreError } from '../errors/index.js';
import { Logger } from '../utils/logger.js';

export const LOCK_KEYS = {
  HIERARCHY: 'hierarchy',
  ROLE_NAMES: 'role-names',
  CATALOG: 'catalog',
  USER_EMAILS: 'user-emails',
  role: (roleId: string) => `role:${roleId}`,
  user: (userId: string) => `user:${userId}`,
} as const;

export interface TransactionOutcome<T> {
  result: T;
  /** Roles evicted inside the transaction; fenced and evicted again after commit */
  evicted: string[];
  /** Fence and clear the whole cache after commit */
  clearAll?: boolean;
}

// statement_timeout, lock_not_available
const PG_LOCK_TIMEOUT_CODES = new Set(['57014', '55P03']);

function isLockTimeout(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    PG_LOCK_TIMEOUT_CODES.has(error.code)
  );
}

export class MutationRunner {
  private logger: Logger;

  constructor(
    private readonly store: RbacStore,
    private readonly lock: KeyedLock,
    private readonly coordinator: CacheInvalidationCoordinator,
    private readonly lockTimeoutMs: number,
    logger: Logger = new Logger('rolegraph'),
  ) {
    this.logger = logger.child({ component: 'mutations' });
  }

  /**
   * Run `work` in one transaction while holding `locks` (in the order given).
   * Any failure discards every change `work` made.
   *
   * @throws ConcurrentModificationError when a lock is not granted in time
   */
  async run<T>(
    operation: string,
    locks: LockRequest[],
    work: (session: RbacSession) => Promise<TransactionOutcome<T>>,
  ): Promise<T> {
    const release = await this.lock.acquireAll(locks, this.lockTimeoutMs);
    try {
      let outcome: TransactionOutcome<T>;
      try {
        outcome = await this.store.transaction(work, { locks });
      } catch (error) {
        this.logger.error(`${operation} rolled back`, error);
        if (isLockTimeout(error)) {
          throw new ConcurrentModificationError(locks.map((l) => l.key).join(','), this.lockTimeoutMs);
        }
        throw toStoreError(operation, error);
      }

      // Both run before the locks are released
      if (outcome.clearAll) {
        await this.clearAfterCommit(operation);
      }
      await this.coordinator.fenceAndEvict(outcome.evicted);
      return outcome.result;
    } finally {
      release();
    }
  }

  // The global fence is set before the clear, so a failed clear only leaves fenced entries behind
  private async clearAfterCommit(operation: string): Promise<void> {
    try {
      await this.coordinator.invalidateAll();
    } catch (error) {
      this.logger.warn(`Cache clear after ${operation} failed; entries remain fenced`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
