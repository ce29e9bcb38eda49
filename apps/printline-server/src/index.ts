import { initDb, closeDb } from "./db/database.js";
import { buildApp } from "./app.js";
import { countPending } from "./messages/store.js";
import config from "./config.js";

async function main() {
  initDb();
  console.log(`[db] Queue database ready in ${config.dataDir} (${countPending()} pending)`);
  if (config.submitRateLimit > 0) {
    console.log(
      `[messages] Submit limit: ${config.submitRateLimit} per ${config.submitRateWindowMs}ms per client`
    );
  }

  const app = await buildApp();

  await app.listen({ port: config.port, host: config.host });
  console.log(`[server] Listening on ${config.host}:${config.port}`);

  // Graceful shutdown
  const shutdown = async () => {
    console.log("\n[server] Shutting down...");
    await app.close();
    closeDb();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error("[server] Shutdown failed:", err);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("[server] Fatal error:", err);
  process.exit(1);
});
