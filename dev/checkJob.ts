// dev/checkJob.ts

/*
 Analyzes one job posting end-to-end, the way the chat layer would.

 Usage:
   npx tsx dev/checkJob.ts "<job url>"
   npx tsx dev/checkJob.ts "<job url>" "message text that came with the link"
   npx tsx dev/checkJob.ts --twice "<job url>"     (second run should be a cache hit)

 Notes:
  - Does real network requests (the posting, and OpenAI when OPENAI_API_KEY is set). Run sparingly.
  - Settings come from .env (see .env.example).
*/

import "dotenv/config";
import { loadConfig } from "../lib/config";
import { createJobChecker } from "../lib/service";
import { renderReply } from "../lib/format";
import { extractUrls, isJobUrl } from "../lib/links";
import { ContractError } from "../lib/verdict/types";

async function main() {
  const args = process.argv.slice(2);
  const twice = args[0] === "--twice";
  const [target, ...rest] = twice ? args.slice(1) : args;

  if (!target) {
    console.error('Usage: tsx dev/checkJob.ts [--twice] <job-url> ["message text"]');
    process.exitCode = 1;
    return;
  }

  // accept either a bare URL or a whole chat message containing one
  const url = extractUrls(target)[0] ?? target;
  if (!isJobUrl(url)) {
    console.warn(`Note: ${url} is not on a known job site; analyzing anyway.`);
  }
  const messageText = [target, ...rest].join(" ");

  const checker = createJobChecker(loadConfig());

  const runs = twice ? 2 : 1;
  for (let i = 0; i < runs; i++) {
    const result = await checker.analyze(messageText, url);
    console.log(`\n${renderReply(result)}\n(source: ${result.source})`);
  }
}

main().catch((e: unknown) => {
  if (e instanceof ContractError) {
    console.error(`Invalid input: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exitCode = 1;
});
