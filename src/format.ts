import type { BackupInfo } from './backup/archive.js';

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text' as const, text }] };
}

export function errorResult(text: string): ToolResult {
  return { ...textResult(text), isError: true };
}

/**
 * Pretty-printed JSON body. Operation results carrying `status: 'error'`
 * are flagged so the client sees the failure without parsing the text.
 */
export function jsonResult(value: unknown): ToolResult {
  const text = JSON.stringify(value, null, 2);
  return isFailure(value) ? errorResult(text) : textResult(text);
}

function isFailure(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'status' in value && value.status === 'error';
}

export function formatBackupList(backups: BackupInfo[], backupDir: string): string {
  if (backups.length === 0) return `No backups found in ${backupDir}.`;

  const lines = [`Backups in ${backupDir} (${backups.length}, newest first):`, ''];
  for (const b of backups) {
    lines.push(`  ${b.name}  ${b.created_at}  ${b.size_mb.toFixed(2)} MB`);
  }
  return lines.join('\n');
}
