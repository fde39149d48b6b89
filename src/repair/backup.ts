import fs from 'node:fs/promises';
import { constants } from 'node:fs';

export const BACKUP_SUFFIX = '.bak';

export type BackupResult = {
  backupPath: string;
  /** False when a backup already existed; it is never overwritten. */
  created: boolean;
};

/**
 * Copy `filePath` to `<filePath>.bak` unless that backup already exists, so the backup always
 * holds the content from before the first repair of the run.
 */
export async function ensureBackup(filePath: string): Promise<BackupResult> {
  const backupPath = filePath + BACKUP_SUFFIX;
  try {
    await fs.copyFile(filePath, backupPath, constants.COPYFILE_EXCL);
    return { backupPath, created: true };
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'EEXIST') return { backupPath, created: false };
    throw e;
  }
}
