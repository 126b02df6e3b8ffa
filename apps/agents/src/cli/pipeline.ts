import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { runCreativeAgent } from "../runCreativeAgent";
import { parseArgs } from "./args";

loadDotenv({ path: resolve(__dirname, "../../../../.env") });

async function main() {
  const { runId, fresh, retryFailedVariants, edits } = parseArgs(process.argv.slice(2));
  const report = await runCreativeAgent(runId, { fresh, retryFailedVariants, edits });
  if (report.status.state === "failed") {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
