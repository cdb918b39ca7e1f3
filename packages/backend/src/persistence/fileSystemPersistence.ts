import fs from 'node:fs/promises';
import path from 'node:path';
import { createEmptyStoreSnapshot, validateStoreSnapshot } from '@switchyard/domain';
import type { PersistenceAdapter } from './index.js';

const isMissingFileError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

const toTimestamp = (date: Date) => date.toISOString().replace(/[:]/g, '-');

let backupSequence = 0;
let tempSequence = 0;

const nextBackupName = () => {
  backupSequence += 1;
  return `store-backup-${toTimestamp(new Date())}-${String(backupSequence).padStart(6, '0')}.json`;
};

const pruneBackups = async (backupDir: string, maxBackups: number) => {
  if (maxBackups <= 0) {
    return;
  }

  const files = await fs.readdir(backupDir).catch((error: unknown) => {
    if (isMissingFileError(error)) {
      return [];
    }

    throw error;
  });

  const fullPaths = files
    .filter((file) => file.endsWith('.json'))
    .map((file) => path.join(backupDir, file));

  if (fullPaths.length <= maxBackups) {
    return;
  }

  // Backup names embed an ISO timestamp and a sequence number, so lexical order is creation order.
  const stale = fullPaths.sort().slice(0, fullPaths.length - maxBackups);

  await Promise.all(
    stale.map(async (file) => {
      try {
        await fs.unlink(file);
      } catch (error) {
        if (!isMissingFileError(error)) {
          throw error;
        }
      }
    })
  );
};

const createBackup = async (source: string, backupDir: string, maxBackups: number) => {
  try {
    await fs.access(source);
  } catch (error) {
    if (isMissingFileError(error)) {
      return;
    }

    throw error;
  }

  await fs.mkdir(backupDir, { recursive: true });
  const backupFile = path.join(backupDir, nextBackupName());
  await fs.copyFile(source, backupFile);
  await pruneBackups(backupDir, maxBackups);
};

type FileSystemPersistenceOptions = {
  dataFile: string;
  backupDir?: string;
  maxBackups?: number;
};

export const createFileSystemPersistence = ({
  dataFile,
  backupDir,
  maxBackups = 10
}: FileSystemPersistenceOptions): PersistenceAdapter => ({
  async load() {
    try {
      const raw = await fs.readFile(dataFile, 'utf-8');
      return validateStoreSnapshot(JSON.parse(raw));
    } catch (error) {
      if (isMissingFileError(error)) {
        return createEmptyStoreSnapshot();
      }

      throw error;
    }
  },
  async save(snapshot) {
    const payload = JSON.stringify(validateStoreSnapshot(snapshot), null, 2);
    await fs.mkdir(path.dirname(dataFile), { recursive: true });

    if (backupDir) {
      await createBackup(dataFile, backupDir, maxBackups);
    }

    tempSequence += 1;
    const tempFile = `${dataFile}.tmp-${process.pid}-${Date.now()}-${tempSequence}`;
    await fs.writeFile(tempFile, payload, 'utf-8');
    await fs.rename(tempFile, dataFile);
  }
});
