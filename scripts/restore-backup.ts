import { loadConfig } from "../src/config/env";
import { backupService } from "../src/services/backup-service";

async function main(): Promise<void> {
  const config = loadConfig();
  const result = await backupService.restoreBackup({
    backupFile: process.argv[2] ?? config.paths.backupFile,
    liveFile: config.paths.liveConfigFile
  });
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
  // eslint-disable-next-line no-console
  console.error(error);
  process.exitCode = 1;
});
