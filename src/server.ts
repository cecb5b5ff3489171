// src/server.ts
// ============================================================================
// Prozessstart des Tenant-Auth-Service
// ----------------------------------------------------------------------------
// buildApp() mit Produktions-Abhängigkeiten (pg-Store, Redis, SMTP, Twilio),
// listen(), Readiness beim Shutdown zurücknehmen, dann app.close()
// (onClose schließt Store und Cache).
// ============================================================================

import type { FastifyInstance } from "fastify";
import { buildApp, setReady } from "./app.js";
import { env, logEnvSummary } from "./libs/env.js";

const SHUTDOWN_GRACE_MS = 10_000;

function installShutdown(app: FastifyInstance) {
  let closing: Promise<void> | undefined;

  const shutdown = (reason: string, exitCode = 0) => {
    closing ??= (async () => {
      app.log.info({ reason }, "shutdown_started");
      setReady(false);

      const forced = setTimeout(() => {
        app.log.error({ reason, graceMs: SHUTDOWN_GRACE_MS }, "shutdown_forced");
        process.exit(1);
      }, SHUTDOWN_GRACE_MS);
      forced.unref();

      try {
        await app.close();
        app.log.info({ reason }, "shutdown_complete");
        process.exitCode = exitCode;
      } catch (err) {
        app.log.error({ err, reason }, "shutdown_failed");
        process.exitCode = 1;
      } finally {
        clearTimeout(forced);
      }
    })();
    return closing;
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => void shutdown(signal));
  }

  process.on("unhandledRejection", (reason) => {
    app.log.error({ reason }, "unhandled_rejection");
  });

  process.on("uncaughtException", (err) => {
    app.log.fatal({ err }, "uncaught_exception");
    void shutdown("uncaughtException", 1);
  });
}

async function main() {
  const app = await buildApp();
  logEnvSummary((msg, extra) => app.log.info({ config: extra }, msg));
  installShutdown(app);

  await app.listen({ host: env.HOST, port: env.PORT });
  app.log.info(
    { env: env.NODE_ENV, pid: process.pid, node: process.version },
    "tenant_auth_listening",
  );
}

main().catch((err: unknown) => {
  console.error("server_start_failed", err);
  process.exitCode = 1;
});
