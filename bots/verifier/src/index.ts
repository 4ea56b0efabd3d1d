import { ENV_VARS, VERSION, parsePositiveInt, requireEnv } from "@fairdraw/shared";
import { VerifierBot } from "./bot.js";

async function main(): Promise<void> {
  console.log(`Verifier bot v${VERSION}`);

  const bot = new VerifierBot({
    dealerUrl: requireEnv(ENV_VARS.DEALER_URL),
    tableId: process.env[ENV_VARS.TABLE_ID] || "1",
    pollIntervalMs: parsePositiveInt(ENV_VARS.POLL_INTERVAL_MS, 2000),
  });

  const shutdown = (): void => {
    console.log("\n[Verifier] shutdown requested");
    bot.stop();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await bot.run();
}

main().catch((error) => {
  console.error("[Verifier] fatal error:", error);
  process.exit(1);
});
