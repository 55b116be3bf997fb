import path from 'node:path';
import os from 'node:os';
import { getConfig } from './config.js';

/**
 * Normalize a path to forward slashes, resolve to absolute, remove trailing slash.
 * Called at every boundary where a configured path enters the system.
 */
export function normalizePath(inputPath: string): string {
  let resolved = inputPath;
  if (resolved.startsWith('~')) {
    resolved = path.join(os.homedir(), resolved.slice(1));
  }
  resolved = path.resolve(resolved);
  resolved = resolved.replace(/\\/g, '/');
  if (resolved.length > 1 && resolved.endsWith('/')) {
    resolved = resolved.slice(0, -1);
  }
  return resolved;
}

export function getDataDir(): string {
  return normalizePath(getConfig().dataDir);
}

export function getRecordDbPath(): string {
  return `${getDataDir()}/memory.sqlite`;
}

export function getQdrantDataDir(): string {
  return `${getDataDir()}/qdrant-data`;
}

export function getBackupDir(): string {
  return normalizePath(getConfig().backupPath);
}

export function collectionName(prefix: string, logical: string): string {
  const safe = logical
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '');
  return `${prefix}_${safe}`;
}
