import path from 'node:path';
import { cp, mkdir, readdir, rm, stat } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { BackupError } from '../errors.js';

export const BACKUP_PREFIX = 'memory_backup_';
export const SAFETY_PREFIX = 'safety_backup_';

// ISO time with ":" and "." replaced, e.g. 2026-02-11T05-06-07-123Z
const STAMP_PATTERN = /^(\d{4}-\d{2}-\d{2})T(\d{2})-(\d{2})-(\d{2})-(\d{3})Z$/;

export interface BackupInfo {
  name: string;
  path: string;
  created_at: string;
  size_mb: number;
}

export function formatBackupName(time: Date, prefix = BACKUP_PREFIX): string {
  return `${prefix}${time.toISOString().replace(/[:.]/g, '-')}`;
}

/** Time encoded in a backup name, or null when the name does not follow the format. */
export function parseBackupName(name: string, prefix = BACKUP_PREFIX): Date | null {
  if (!name.startsWith(prefix)) return null;
  const m = name.slice(prefix.length).match(STAMP_PATTERN);
  if (!m) return null;
  const ms = Date.parse(`${m[1]}T${m[2]}:${m[3]}:${m[4]}.${m[5]}Z`);
  return Number.isFinite(ms) ? new Date(ms) : null;
}

function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

async function dirSize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) total += await dirSize(full);
    else if (entry.isFile()) total += (await stat(full)).size;
  }
  return total;
}

/** Copy the storage root into `<backupDir>/<prefix><stamp>`. */
export async function snapshot(
  dataDir: string,
  backupDir: string,
  time: Date,
  prefix = BACKUP_PREFIX,
): Promise<string> {
  const source = path.resolve(dataDir);
  const target = path.join(path.resolve(backupDir), formatBackupName(time, prefix));
  if (isInside(target, source)) {
    throw new BackupError(`Backup path ${backupDir} must be outside the storage root ${dataDir}`);
  }

  try {
    await mkdir(target, { recursive: true });
    if (existsSync(source)) {
      await cp(source, target, { recursive: true });
    }
  } catch (err) {
    throw new BackupError(`Failed to snapshot ${source} into ${target}`, err);
  }
  return target;
}

async function parsedEntries(backupDir: string): Promise<{ name: string; time: Date }[]> {
  if (!existsSync(backupDir)) return [];
  const entries = await readdir(backupDir, { withFileTypes: true });
  const parsed: { name: string; time: Date }[] = [];
  for (const entry of entries) {
    if (!entry.isDirectory() || !entry.name.startsWith(BACKUP_PREFIX)) continue;
    const time = parseBackupName(entry.name);
    if (!time) {
      console.warn(`Skipping backup with unrecognized name: ${entry.name}`);
      continue;
    }
    parsed.push({ name: entry.name, time });
  }
  return parsed.sort((a, b) => b.time.getTime() - a.time.getTime());
}

/** Backups newest first, ordered by the time in their names. */
export async function listBackups(backupDir: string): Promise<BackupInfo[]> {
  const entries = await parsedEntries(backupDir);
  const infos: BackupInfo[] = [];
  for (const { name, time } of entries) {
    const full = path.join(backupDir, name);
    const bytes = await dirSize(full);
    infos.push({
      name,
      path: full,
      created_at: time.toISOString(),
      size_mb: Math.round((bytes / (1024 * 1024)) * 100) / 100,
    });
  }
  return infos;
}

export async function latestBackupTime(backupDir: string): Promise<Date | null> {
  const entries = await parsedEntries(backupDir);
  return entries[0]?.time ?? null;
}

/** Delete all but the `keep` newest backups; returns the removed names. */
export async function applyRetention(backupDir: string, keep: number): Promise<string[]> {
  const entries = await parsedEntries(backupDir);
  const removed: string[] = [];
  for (const { name } of entries.slice(keep)) {
    await rm(path.join(backupDir, name), { recursive: true, force: true });
    console.log(`Deleted old backup: ${name}`);
    removed.push(name);
  }
  return removed;
}

export interface RestoreResult {
  restored_from: string;
  safety_backup: string | null;
}

/**
 * Replace the storage root with a snapshot. The current root is first copied
 * to a `safety_backup_` snapshot so the restore itself can be undone.
 */
export async function restoreSnapshot(
  snapshotPath: string,
  dataDir: string,
  backupDir: string,
  time: Date,
): Promise<RestoreResult> {
  if (!existsSync(snapshotPath)) {
    throw new BackupError(`Backup not found: ${snapshotPath}`);
  }
  if (isInside(path.resolve(backupDir), path.resolve(dataDir))) {
    throw new BackupError(`Backup path ${backupDir} lies inside ${dataDir}; refusing to replace it`);
  }

  const safety = existsSync(dataDir) ? await snapshot(dataDir, backupDir, time, SAFETY_PREFIX) : null;

  try {
    await rm(dataDir, { recursive: true, force: true });
    await mkdir(dataDir, { recursive: true });
    await cp(snapshotPath, dataDir, { recursive: true });
  } catch (err) {
    throw new BackupError(`Failed to restore ${snapshotPath} into ${dataDir}`, err);
  }

  return { restored_from: snapshotPath, safety_backup: safety };
}
