import { config } from "dotenv";
import { runInteractiveSync } from "./interactive";
import { runSync } from "@/sync";
import { getEnv } from "@/sync/config/env";
import { createDependencies, optionsFromEnv } from "@/sync/config/runtime";
import { exitCodeFor } from "@/sync/report";
import { logger } from "@/sync/logger";
import { errorMessage } from "@/sync/errors";

config({ path: ".env.local" });
config();

const args = process.argv.slice(2);
const isAuto = args.includes("--auto") || args.includes("--once");
const dryRunFlag = args.includes("--dry-run");

async function main(): Promise<number> {
  if (isAuto) {
    // Headless mode for the scheduler: sync everything, no prompts
    const env = getEnv();
    logger.level = env.SYNC_LOG_LEVEL;

    const deps = createDependencies(env);
    const options = optionsFromEnv(env);
    const report = await runSync(deps, { ...options, dryRun: dryRunFlag || options.dryRun });
    console.log(JSON.stringify(report, null, 2));
    return exitCodeFor(report);
  }

  // Interactive mode: friendly prompts
  return runInteractiveSync(dryRunFlag);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Sync failed:", errorMessage(err));
    process.exit(1);
  });
