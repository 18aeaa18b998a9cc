import type { Server } from "http";
import { buildApp } from "./app";
import { createServices, type Services } from "./bootstrap";
import { getHistoryCleanupIntervalMs, getPort } from "./config";
import { closePool, getPool } from "./db";
import { runMigrations } from "./migrations";
import { startHistoryCleanup, type HistoryCleanupHandle } from "./modules/history/history.service";
import { describeError, logError, logInfo } from "./observability/logger";
import { installProcessHandlers } from "./observability/processHandlers";

type Running = {
  server: Server;
  services: Services;
  cleanup: HistoryCleanupHandle;
};

let running: Running | null = null;
let stopping = false;

/** Stops accepting requests, lets queued jobs drain, then closes the pool. */
function shutdown(reason: string): void {
  if (stopping) {
    return;
  }
  stopping = true;
  logInfo("server_shutdown_started", { reason });
  if (!running) {
    process.exit(1);
  }
  const { server, services, cleanup } = running;
  cleanup.stop();
  server.close(() => {
    services.jobs
      .onIdle()
      .then(() => closePool())
      .then(() => {
        logInfo("server_shutdown_completed", { reason });
      })
      .catch((err: unknown) => {
        logError("server_shutdown_failed", { error: describeError(err) });
        process.exitCode = 1;
      });
  });
}

async function main(): Promise<void> {
  installProcessHandlers({ onFatal: shutdown });

  const pool = getPool();
  const applied = await runMigrations(pool);
  logInfo("migrations_checked", { applied: applied.length });

  const services = createServices(pool);
  const cleanup = startHistoryCleanup(services.history, getHistoryCleanupIntervalMs());
  const port = getPort();
  const server = buildApp(services).listen(port, () => {
    logInfo("server_listening", { port });
  });
  running = { server, services, cleanup };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logError("server_start_failed", { error: describeError(err) });
  process.exit(1);
});
