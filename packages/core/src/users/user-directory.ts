/**
 * User Directory
 *
 * Maps users to their single role and answers permission checks for them.
 * Account lifecycle (credentials, registration flows) lives outside the
 * engine; this module only keeps the rows the resolver needs.
 */

import { v4 as uuidv4 } from 'uuid';
import type { Permission, User } from '../types/rbac.types.js';
import type { RbacReader, RbacStore } from '../storage/types.js';
import type { CacheInvalidationCoordinator } from '../cache/invalidation-coordinator.js';
import type { PermissionResolver } from '../resolver/permission-resolver.js';
import { NotFoundError, ValidationError, toStoreError } from '../errors/index.js';
import { UserInputSchema, parseInput, type UserInput } from '../validation/schemas.js';
import { Logger } from '../utils/logger.js';
import { withSpan, SPAN_NAMES } from '../telemetry/index.js';
import { LOCK_KEYS, type MutationRunner } from '../mutation/mutation-runner.js';
import type { LockRequest } from '../locking/keyed-lock.js';

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class UserDirectory {
  private logger: Logger;

  constructor(
    private readonly store: RbacStore,
    private readonly resolver: PermissionResolver,
    private readonly coordinator: CacheInvalidationCoordinator,
    private readonly runner: MutationRunner,
    private readonly now: () => Date = () => new Date(),
    logger: Logger = new Logger('rolegraph'),
  ) {
    this.logger = logger.child({ component: 'users' });
  }

  /**
   * Create a user, or update the one with the given id.
   *
   * @throws ValidationError on a malformed input or an email owned by another user
   * @throws NotFoundError for an unknown role
   */
  async registerUser(input: UserInput): Promise<User> {
    const parsed = parseInput(UserInputSchema, input, 'user');

    const locks: LockRequest[] = [
      { key: LOCK_KEYS.HIERARCHY, mode: 'shared' },
      { key: LOCK_KEYS.USER_EMAILS, mode: 'exclusive' },
    ];
    if (parsed.id) {
      locks.push({ key: LOCK_KEYS.user(parsed.id), mode: 'exclusive' });
    }

    const user = await this.runner.run('registerUser', locks, async (session) => {
      if (parsed.roleId !== null && !(await session.getRole(parsed.roleId))) {
        throw new NotFoundError('role', [parsed.roleId]);
      }

      const existing = parsed.id ? await session.getUser(parsed.id) : null;
      // Role changes go through assignUserRole, which emits user:role-changed
      if (existing && existing.roleId !== parsed.roleId) {
        throw new ValidationError(`Role of existing user ${existing.id} can only change through assignUserRole`);
      }
      const owner = await session.getUserByEmail(parsed.email);
      if (owner && owner.id !== existing?.id) {
        throw new ValidationError(`Email already registered: ${parsed.email}`);
      }

      const timestamp = this.now();
      const stored: User = {
        id: existing?.id ?? parsed.id ?? uuidv4(),
        email: parsed.email,
        roleId: parsed.roleId,
        isActive: parsed.isActive,
        isSuperuser: parsed.isSuperuser,
        lastLoginIp: parsed.lastLoginIp,
        createdAt: existing?.createdAt ?? timestamp,
        updatedAt: timestamp,
      };
      await session.upsertUser(stored);
      return { result: stored, evicted: [] };
    });

    this.logger.info('User registered', { userId: user.id, roleId: user.roleId });
    return user;
  }

  /**
   * @throws NotFoundError for an unknown user
   */
  async getUser(userId: string): Promise<User> {
    const user = await this.read('getUser', (reader) => reader.getUser(userId));
    if (!user) {
      throw new NotFoundError('user', [userId]);
    }
    return user;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.read('findByEmail', (reader) => reader.getUserByEmail(normalizeEmail(email)));
  }

  /**
   * Effective permissions of a user: those of their role. Roleless and
   * inactive users hold nothing.
   *
   * @throws NotFoundError for an unknown user
   */
  async userPermissions(userId: string): Promise<Permission[]> {
    return withSpan(
      SPAN_NAMES.USER_PERMISSIONS,
      async () => {
        const readEpoch = this.coordinator.beginRead();
        return this.read('userPermissions', async (reader) => {
          const user = await this.requireUser(reader, userId);
          return this.permissionsOf(user, reader, readEpoch);
        });
      },
      { 'rbac.user_id': userId },
    );
  }

  /**
   * Active superusers pass every check.
   *
   * @throws NotFoundError for an unknown user
   */
  async hasPermission(userId: string, codename: string): Promise<boolean> {
    return this.hasAllPermissions(userId, [codename]);
  }

  /**
   * @throws NotFoundError for an unknown user
   */
  async hasAllPermissions(userId: string, codenames: string[]): Promise<boolean> {
    const readEpoch = this.coordinator.beginRead();
    return this.read('hasAllPermissions', async (reader) => {
      const user = await this.requireUser(reader, userId);
      if (!user.isActive) return false;
      if (user.isSuperuser) return true;

      const held = new Set((await this.permissionsOf(user, reader, readEpoch)).map((p) => p.codename));
      return codenames.every((codename) => held.has(codename));
    });
  }

  /**
   * @throws NotFoundError for an unknown role
   */
  async usersWithRole(roleId: string): Promise<User[]> {
    return this.read('usersWithRole', async (reader) => {
      if (!(await reader.getRole(roleId))) {
        throw new NotFoundError('role', [roleId]);
      }
      return reader.usersWithRole(roleId);
    });
  }

  private async permissionsOf(user: User, reader: RbacReader, readEpoch: number): Promise<Permission[]> {
    if (!user.isActive || user.roleId === null) {
      return [];
    }
    const set = await this.resolver.resolve(user.roleId, reader, readEpoch);
    return set.permissions;
  }

  private async requireUser(reader: RbacReader, userId: string): Promise<User> {
    const user = await reader.getUser(userId);
    if (!user) {
      throw new NotFoundError('user', [userId]);
    }
    return user;
  }

  private async read<T>(operation: string, fn: (reader: RbacReader) => Promise<T>): Promise<T> {
    try {
      return await this.store.read(fn);
    } catch (error) {
      throw toStoreError(operation, error);
    }
  }
}
