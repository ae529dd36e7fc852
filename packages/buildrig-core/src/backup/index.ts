export { BackupStore, BACKUP_SUFFIX } from './backup-store.js';
export type { EnsureBackupOutcome, PrepareOutcome, PreparedFile } from './backup-store.js';
