import { Database } from 'sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { exec, get, isBusyError, run } from '../store/sqlite';
import { describeError, RunLockError, toError } from './errors';
import { StructuredLogger } from './StructuredLogger';

export interface InstanceLock {
  lockKey: string;
  instanceId: string;
  acquiredAtUtc: string;
}

export interface RunLockOptions {
  lockKey?: string;
  staleAfterMs: number;
  now?: () => Date;
}

interface LockRow {
  lock_key: string;
  instance_id: string;
  acquired_at_utc: string;
}

/**
 * Verrou d'import dans la base du catalogue: un seul run à la fois par fichier.
 * Un verrou plus vieux que staleAfterMs est repris (run précédent mort).
 */
export class RunLock {
  private readonly instanceId: string = uuidv4();
  private readonly lockKey: string;
  private readonly staleAfterMs: number;
  private readonly now: () => Date;
  private held: boolean = false;

  constructor(
    private readonly db: Database,
    private readonly logger: StructuredLogger,
    options: RunLockOptions
  ) {
    this.lockKey = options.lockKey ?? 'import';
    this.staleAfterMs = options.staleAfterMs;
    this.now = options.now ?? (() => new Date());
  }

  async acquire(): Promise<void> {
    const context = { component: 'RunLock', instanceId: this.instanceId };

    // IMMEDIATE: deux instances ne peuvent pas lire "libre" en même temps
    try {
      await exec(this.db, 'BEGIN IMMEDIATE');
    } catch (error) {
      throw isBusyError(error) ? await this.busyLockError(error) : error;
    }

    try {
      const existing = await this.getExistingLock();
      const now = this.now();

      if (existing) {
        const lockAge = now.getTime() - new Date(existing.acquiredAtUtc).getTime();
        if (lockAge <= this.staleAfterMs) {
          throw new RunLockError(existing.instanceId, existing.acquiredAtUtc);
        }

        this.logger.warn(`⚠️ Verrou expiré (${Math.round(lockAge / 1000)}s), reprise`, {
          ...context,
          previousHolder: existing.instanceId
        });
        await run(this.db, 'DELETE FROM run_lock WHERE lock_key = ?', [this.lockKey]);
      }

      await run(
        this.db,
        'INSERT INTO run_lock (lock_key, instance_id, acquired_at_utc) VALUES (?, ?, ?)',
        [this.lockKey, this.instanceId, now.toISOString()]
      );
      await exec(this.db, 'COMMIT');
    } catch (error) {
      try {
        await exec(this.db, 'ROLLBACK');
      } catch (rollbackError) {
        this.logger.error('❌ ROLLBACK du verrou impossible', toError(rollbackError), context);
      }
      throw isBusyError(error) ? await this.busyLockError(error) : error;
    }

    this.held = true;
    this.logger.debug('🔒 Verrou d\'import acquis', context);
  }

  /**
   * Libère seulement si cette instance détient encore le verrou
   */
  async release(): Promise<void> {
    if (!this.held) {
      return;
    }

    await run(this.db, 'DELETE FROM run_lock WHERE lock_key = ? AND instance_id = ?', [this.lockKey, this.instanceId]);
    this.held = false;
    this.logger.debug('🔓 Verrou d\'import libéré', { component: 'RunLock', instanceId: this.instanceId });
  }

  isHeld(): boolean {
    return this.held;
  }

  getInstanceId(): string {
    return this.instanceId;
  }

  async getCurrentHolder(): Promise<InstanceLock | null> {
    return this.getExistingLock();
  }

  /**
   * Base occupée par un run en cours: le détenteur est relu hors transaction
   * quand c'est possible
   */
  private async busyLockError(cause: unknown): Promise<RunLockError> {
    try {
      const holder = await this.getExistingLock();
      if (holder) {
        return new RunLockError(holder.instanceId, holder.acquiredAtUtc, cause);
      }
    } catch (error) {
      this.logger.debug('Détenteur du verrou illisible', {
        component: 'RunLock',
        instanceId: this.instanceId,
        error: describeError(error)
      });
    }
    return new RunLockError('inconnu', 'inconnu', cause);
  }

  private async getExistingLock(): Promise<InstanceLock | null> {
    const row = await get<LockRow>(
      this.db,
      'SELECT lock_key, instance_id, acquired_at_utc FROM run_lock WHERE lock_key = ?',
      [this.lockKey]
    );
    return row ? { lockKey: row.lock_key, instanceId: row.instance_id, acquiredAtUtc: row.acquired_at_utc } : null;
  }
}
