import { ConfigurationError, UpdaterError } from "./errors.js";
import { runCli } from "./run.js";

async function main(): Promise<void> {
  await runCli(process.argv.slice(2), process.env);
}

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`[main] Configuration error: ${err.message}`);
  } else if (err instanceof UpdaterError) {
    console.error(`[main] ${err.name}: ${err.message}`);
  } else {
    console.error("[main] Fatal error:", err);
  }
  process.exit(1);
});
