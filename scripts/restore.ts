import { loadConfig } from '../src/config.js';
import { BackupScheduler } from '../src/backup/scheduler.js';
import { getBackupDir, getDataDir } from '../src/paths.js';

// Stop the MCP server first: the record store must not be open while its files are replaced.
const args = process.argv.slice(2);
const fileIdx = args.indexOf('--file');
const file = fileIdx >= 0 ? args[fileIdx + 1] : undefined;
if (fileIdx >= 0 && !file) {
  console.error('Usage: restore [--file <backup directory>]');
  process.exit(1);
}

const config = loadConfig();
const scheduler = new BackupScheduler({
  dataDir: getDataDir(),
  backupDir: getBackupDir(),
  intervalHours: config.backupIntervalHours,
  retentionCount: config.backupRetentionCount,
});

const result = await scheduler.restoreBackup(file);
console.log(`Restored ${getDataDir()} from ${result.restored_from}`);
console.log(`Previous contents saved to ${result.safety_backup}`);
console.log('Run `npm run reindex` to bring the vector index in line with the restored records.');
