// src/server.ts
// ============================================================================
// Bootstrap für den Signup-/OTP-Service
// ----------------------------------------------------------------------------
// Aufgaben:
//  - Prozessstart: buildApp() + listen()
//  - Prozessweite Fehlerwächter (unhandledRejection / uncaughtException)
//  - Geordneter Shutdown mit Timeout-Guard (SIGINT, SIGTERM, SIGUSR2)
//  - Node-HTTP Low-Level Timeouts (gegen Slowloris / hängende Verbindungen)
// ============================================================================

import type { FastifyInstance } from "fastify";
import { buildApp, setReady } from "./app.js";
import { env, logEnvSummary } from "./libs/env.js";
import { createLogger } from "./libs/logger.js";

// Shutdown-Konfiguration
// Maximale Wartezeit für geordnetes Beenden, bevor hart terminiert wird.
const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS ?? 10_000);

// HTTP-Timeouts (Node-Server-Ebene, zusätzlich zu Fastify-Optionen)
const REQUEST_TIMEOUT_MS = Number(process.env.REQUEST_TIMEOUT_MS ?? 30_000);
const HEADERS_TIMEOUT_MS = Number(process.env.HEADERS_TIMEOUT_MS ?? 61_000);
const KEEPALIVE_TIMEOUT_MS = Number(process.env.KEEPALIVE_TIMEOUT_MS ?? 65_000);

const log = createLogger(env.LOG_LEVEL);

// Doppel-Start/Mehrfach-Shutdown verhindern
let app: FastifyInstance | undefined;
let startingUp = false;
let shuttingDown = false;

// ============================================================================
// Prozessweite Fehlerwächter
// ============================================================================

process.on("unhandledRejection", (reason) => {
  log.error({ ctx: "server", reason }, "unhandled_rejection");
  // Kein harter Exit → Shutdown wird bewusst über Signal ausgelöst.
});

process.on("uncaughtException", (err) => {
  log.error({ ctx: "server", err }, "uncaught_exception");
  void shutdown("uncaughtException");
});

// ============================================================================
// Start & Listen
// ============================================================================

async function start() {
  if (startingUp) return;
  startingUp = true;

  try {
    app = await buildApp({ logger: log });

    app.server.requestTimeout = REQUEST_TIMEOUT_MS;
    app.server.headersTimeout = HEADERS_TIMEOUT_MS;
    app.server.keepAliveTimeout = KEEPALIVE_TIMEOUT_MS;

    logEnvSummary((obj, msg) => log.info(obj, msg));

    await app.listen({ host: env.HOST, port: env.PORT });
    app.log.info({ address: app.server.address(), pid: process.pid }, "service_listening");
  } catch (err) {
    // Startfehler → sauberer Exit, damit Orchestrator (Docker/K8s) neu starten kann.
    log.error({ err }, "server_start_failed");
    process.exitCode = 1;
    setTimeout(() => process.exit(1), 50).unref();
  }
}

// ============================================================================
// Geordneter Shutdown
// ============================================================================

async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  // Fail-Safe: falls irgendwas hängt, nach Timeout hart beenden
  const killTimer = setTimeout(() => {
    log.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS, reason }, "shutdown_forced_exit");
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  killTimer.unref();

  try {
    log.info({ reason }, "shutdown_received");

    // Readiness sofort degradieren → Loadbalancer nimmt Instanz aus Rotation
    setReady(false);

    if (app) {
      await app.close(); // triggert onClose-Hooks (closeDb)
      log.info("server_closed");
    }

    clearTimeout(killTimer);
    process.exit(0);
  } catch (err) {
    log.error({ err }, "shutdown_error");
    clearTimeout(killTimer);
    process.exit(1);
  }
}

// ============================================================================
// Signal-Handler (einmalig registriert)
// ============================================================================

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGUSR2", () => void shutdown("SIGUSR2"));

void start();
