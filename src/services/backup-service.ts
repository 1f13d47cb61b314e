import { readdir, rm } from "node:fs/promises";
import path from "node:path";
import { IOError } from "../errors";
import { fileStamp } from "../utils/time";
import { loadConfigDocument } from "./config-store";
import {
  copyFileContents,
  readFileBytes,
  verifyFileDigest,
  writeFileBytes
} from "./file-transfer";

const HISTORY_SUFFIX = /^\.\d{8}T\d{9}Z$/;

export type BackupResult = {
  backupPath: string;
  bytes: number;
  digest: string;
  historyPath: string | null;
  deletedHistory: string[];
};

export type RestoreResult = {
  backupPath: string;
  restoredPath: string;
  bytes: number;
  entryCount: number;
};

function historyFilesFor(backupFile: string, names: string[]): string[] {
  const base = path.basename(backupFile);
  return names
    .filter((name) => name.startsWith(`${base}.`) && HISTORY_SUFFIX.test(name.slice(base.length)))
    .sort((a, b) => b.localeCompare(a));
}

class BackupService {
  async createBackup(params: {
    liveFile: string;
    backupFile: string;
    retentionCount: number;
    now?: Date;
  }): Promise<BackupResult> {
    const copy = await copyFileContents(params.liveFile, params.backupFile, "backup", { createDir: true });
    await verifyFileDigest(params.backupFile, copy.digest, "backup_verification_failed");

    let historyPath: string | null = null;
    let deletedHistory: string[] = [];
    if (params.retentionCount > 0) {
      historyPath = `${params.backupFile}.${fileStamp(params.now)}`;
      const contents = await readFileBytes(params.backupFile, "backup_history_read_failed");
      await writeFileBytes(historyPath, contents, "backup_history_write_failed");
      deletedHistory = await this.pruneHistory(params.backupFile, params.retentionCount);
    }

    return {
      backupPath: params.backupFile,
      bytes: copy.bytes,
      digest: copy.digest,
      historyPath,
      deletedHistory
    };
  }

  async restoreBackup(params: { backupFile: string; liveFile: string }): Promise<RestoreResult> {
    const contents = await readFileBytes(params.backupFile, "restore_read_failed");
    const document = loadConfigDocument(contents);
    await writeFileBytes(params.liveFile, contents, "restore_write_failed");
    return {
      backupPath: params.backupFile,
      restoredPath: params.liveFile,
      bytes: contents.length,
      entryCount: document.data.entries.length
    };
  }

  private async pruneHistory(backupFile: string, retentionCount: number): Promise<string[]> {
    const directory = path.dirname(path.resolve(backupFile));
    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error) {
      throw new IOError("backup_history_list_failed", "list", directory, error);
    }

    const deleted: string[] = [];
    for (const name of historyFilesFor(backupFile, names).slice(retentionCount)) {
      const candidate = path.join(directory, name);
      try {
        await rm(candidate, { force: true });
      } catch (error) {
        throw new IOError("backup_history_prune_failed", "delete", candidate, error);
      }
      deleted.push(name);
    }
    return deleted;
  }
}

export const backupService = new BackupService();
