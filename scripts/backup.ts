import { loadConfig } from '../src/config.js';
import { BackupScheduler } from '../src/backup/scheduler.js';
import { RecordStore } from '../src/records/store.js';
import { formatBackupList } from '../src/format.js';
import { getBackupDir, getDataDir, getRecordDbPath } from '../src/paths.js';

const args = process.argv.slice(2);
const command = args[0] ?? 'list';

const config = loadConfig();
const scheduler = new BackupScheduler({
  dataDir: getDataDir(),
  backupDir: getBackupDir(),
  intervalHours: config.backupIntervalHours,
  retentionCount: config.backupRetentionCount,
  prepare: () => {
    const records = new RecordStore(getRecordDbPath());
    try {
      records.checkpoint();
    } finally {
      records.close();
    }
  },
});

switch (command) {
  case 'list':
    console.log(formatBackupList(await scheduler.listBackups(), scheduler.backupDir));
    break;
  case 'create': {
    const target = await scheduler.createBackup();
    console.log(`Backup written to ${target}`);
    break;
  }
  default:
    console.error(`Unknown command "${command}". Usage: backup [list|create]`);
    process.exit(1);
}
