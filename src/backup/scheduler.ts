import {
  applyRetention,
  latestBackupTime,
  listBackups,
  restoreSnapshot,
  snapshot,
} from './archive.js';
import type { BackupInfo, RestoreResult } from './archive.js';
import { BackupClock } from './clock.js';
import { BackupError } from '../errors.js';

export interface BackupSchedulerOptions {
  dataDir: string;
  backupDir: string;
  intervalHours: number;
  retentionCount: number;
  /** When false, runIfDue never creates anything; forced backups still work. */
  enabled?: boolean;
  clock?: BackupClock;
  /** Runs before each snapshot, e.g. flushing the SQLite WAL. */
  prepare?: () => void | Promise<void>;
  now?: () => Date;
}

export class BackupScheduler {
  readonly clock: BackupClock;
  private now: () => Date;

  constructor(private options: BackupSchedulerOptions) {
    this.clock = options.clock ?? new BackupClock(() => latestBackupTime(options.backupDir));
    this.now = options.now ?? (() => new Date());
  }

  get backupDir(): string {
    return this.options.backupDir;
  }

  /**
   * Create a backup when the interval since the last one has elapsed.
   * The check and the snapshot share one critical section, so concurrent
   * callers produce at most one backup per interval. Never throws.
   */
  async runIfDue(): Promise<string | null> {
    if (this.options.enabled === false) return null;

    try {
      return await this.clock.locked(async () => {
        const last = await this.clock.get();
        const intervalMs = this.options.intervalHours * 60 * 60 * 1000;
        if (last && this.now().getTime() - last.getTime() < intervalMs) return null;
        return this.snapshotUnlocked();
      });
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      console.error(`Automatic backup failed: ${detail}`);
      return null;
    }
  }

  /** Create a backup regardless of the interval. */
  createBackup(): Promise<string> {
    return this.clock.locked(() => this.snapshotUnlocked());
  }

  listBackups(): Promise<BackupInfo[]> {
    return listBackups(this.options.backupDir);
  }

  /** Restore the given snapshot, or the newest one when no path is given. */
  restoreBackup(snapshotPath?: string): Promise<RestoreResult> {
    return this.clock.locked(async () => {
      let source = snapshotPath;
      if (!source) {
        const [latest] = await listBackups(this.options.backupDir);
        if (!latest) throw new BackupError(`No backups found in ${this.options.backupDir}`);
        source = latest.path;
      }

      await this.options.prepare?.();
      const result = await restoreSnapshot(source, this.options.dataDir, this.options.backupDir, this.now());
      this.clock.invalidate();
      console.log(`Restored ${result.restored_from} into ${this.options.dataDir}`);
      return result;
    });
  }

  private async snapshotUnlocked(): Promise<string> {
    await this.options.prepare?.();
    const time = this.now();
    const created = await snapshot(this.options.dataDir, this.options.backupDir, time);
    this.clock.set(time);
    console.log(`Backup created: ${created}`);
    await applyRetention(this.options.backupDir, this.options.retentionCount);
    return created;
  }
}
