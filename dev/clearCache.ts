// dev/clearCache.ts

/*
 Usage:
   npx tsx dev/clearCache.ts            (remove every cached verdict)
   npx tsx dev/clearCache.ts --expired  (only entries past their TTL)

 Only meaningful with CACHE_BACKEND=supabase; the memory cache starts empty each run.
*/

import "dotenv/config";
import { loadConfig } from "../lib/config";
import { createJobChecker } from "../lib/service";

async function main() {
  const expiredOnly = process.argv.includes("--expired");
  const checker = createJobChecker(loadConfig());

  const before = await checker.cacheStats();
  console.log("Cache before:");
  console.dir(before, { depth: 2 });

  const removed = expiredOnly ? await checker.clearExpired() : await checker.clearCache();
  console.log(`Removed ${removed} ${expiredOnly ? "expired " : ""}cached results.`);
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
