// src/app.ts
// ============================================================================
// Signup-/OTP-Service (Fastify)
// ----------------------------------------------------------------------------
// Verantwortlichkeiten:
//  - Zentrales Fastify-Setup (Logger, Timeouts, CORS, Security-Header)
//  - Abhaengigkeiten bauen (DB, Cipher, Gateways, JWT) oder aus Tests uebernehmen
//  - /health, /healthz, /readyz, /metrics
//  - Registrierung der Module mit Tenant-Kontext
//  - Zentrales Mapping AuthCoreError → HTTP
//  - Graceful Shutdown (DB via onClose)
// ============================================================================

import Fastify, {
  type FastifyInstance,
  type FastifyServerOptions,
} from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import tenantContextPlugin from "./plugins/tenant-context.js";

import { hashPassword } from "./libs/crypto.js";
import { closeDb, dbHealth, pool } from "./libs/db.js";
import { buildSignupConfig, env } from "./libs/env.js";
import { apiError, sendAuthError } from "./libs/error-response.js";
import { DeliveryError, ThrottledError, isAuthCoreError } from "./libs/errors.js";
import { getRouteId } from "./libs/http.js";
import { createAccessTokenSigner } from "./libs/jwt.js";
import type { Logger } from "./libs/logger.js";
import { createMailGateway, createMailTransport, mailHealth } from "./libs/mail.js";
import {
  recordDeliveryFailed,
  recordHttpRequest,
  recordOtpThrottled,
  renderPrometheusMetrics,
} from "./libs/metrics.js";
import { createSecretCipher } from "./libs/secret-cipher.js";
import { createSmsGateway, smsConfigFromEnv } from "./libs/sms.js";
import { createPgUnitOfWork } from "./libs/unit-of-work.js";

import otpRoutes from "./modules/otp/routes.js";
import signupRoutes, { type HealthCheck } from "./modules/signup/routes.js";
import type { SignupDeps } from "./modules/signup/types.js";

// ---------------------------------------------------------------------------
// Readiness-Flag (von server.ts über setReady() manipulierbar)
// ---------------------------------------------------------------------------

let isReady = false;

export function setReady(ready: boolean) {
  isReady = ready;
}

// ---------------------------------------------------------------------------
// Abhaengigkeiten
// ---------------------------------------------------------------------------

export type AppDeps = {
  signup: SignupDeps;
  health: {
    db: HealthCheck;
    smtp: () => Promise<{ ok: boolean; reason?: string }>;
  };
  /** Ressourcen freigeben (onClose) */
  close: () => Promise<void>;
};

export function createDefaultDeps(log: Logger): AppDeps {
  const mailTransport = createMailTransport(env);

  return {
    signup: {
      uow: createPgUnitOfWork(pool, log),
      cipher: createSecretCipher({ passphrase: env.SECRET_PASSPHRASE }),
      delivery: {
        email: createMailGateway(mailTransport, env.SMTP_FROM),
        phone: createSmsGateway(smsConfigFromEnv(env), log, env.NODE_ENV),
      },
      tokens: createAccessTokenSigner({
        secret: env.JWT_SECRET_ACTIVE,
        issuer: env.JWT_ISSUER,
        ttlSec: env.JWT_ACCESS_TTL,
      }),
      hashPassword,
      config: buildSignupConfig(env),
      log,
      now: () => new Date(),
    },
    health: {
      db: dbHealth,
      smtp: () => mailHealth(mailTransport),
    },
    close: closeDb,
  };
}

// Optionale Start-Parameter für Tests / spezielle Umgebungen
type AppOptions = FastifyServerOptions & {
  deps?: AppDeps;
  enableCors?: boolean;
};

// ---------------------------------------------------------------------------
// Hilfsfunktion: Health- und Observability-Routen registrieren
// ---------------------------------------------------------------------------

async function registerHealthRoutes(app: FastifyInstance, deps: AppDeps) {
  // Prometheus endpoint (optional per config)
  app.get("/metrics", async (_req, reply) => {
    if (!env.METRICS_ENABLED) {
      return reply.code(404).send(apiError(404, "NOT_FOUND", "Not found."));
    }
    reply.type("text/plain; version=0.0.4; charset=utf-8");
    return reply.send(renderPrometheusMetrics());
  });

  // Liveness-Check – lebt der Prozess?
  app.get("/healthz", async () => ({ status: "alive", pid: process.pid }));

  // Zentrales Health-Aggregat – Docker-Healthcheck hängt an /health
  app.get("/health", async (_req, reply) => {
    const services: Record<"db" | "smtp", "ok" | "degraded" | "down"> = {
      db: "down",
      smtp: "degraded",
    };

    let overall: "ok" | "degraded" | "down" = isReady ? "ok" : "degraded";

    const dh = await deps.health.db();
    services.db = dh.ok ? "ok" : "down";
    if (!dh.ok) overall = "down";

    const sh = await deps.health.smtp();
    if (sh.ok) {
      services.smtp = "ok";
    } else if (overall === "ok") {
      overall = "degraded";
    }

    return reply.code(overall === "down" ? 503 : 200).send({
      status: overall,
      env: env.NODE_ENV,
      ready: isReady,
      services,
      ts: new Date().toISOString(),
    });
  });

  // Readiness – für Loadbalancer/K8s
  app.get("/readyz", async (_req, reply) => {
    if (!isReady) {
      return reply.code(503).send({ status: "starting", ready: false });
    }

    const dh = await deps.health.db();
    if (!dh.ok) {
      return reply.code(503).send({ status: "degraded", db: dh, ready: false });
    }

    return reply.send({ status: "ready", ready: true });
  });
}

// ---------------------------------------------------------------------------
// Haupt-Fabrikfunktion: baut eine Fastify-Instanz
// ---------------------------------------------------------------------------

export async function buildApp(opts: AppOptions = {}): Promise<FastifyInstance> {
  const {
    deps: depsFromOpts,
    enableCors = true,
    logger = { level: env.LOG_LEVEL },
    ...rest
  } = opts;

  const app = Fastify({
    logger,
    trustProxy: env.TRUST_PROXY,
    requestIdHeader: env.REQUEST_ID_HEADER,
    requestIdLogLabel: "request_id",
    genReqId: () => randomUUID(),
    requestTimeout: 30_000,
    connectionTimeout: 10_000,
    keepAliveTimeout: 65_000,
    ...rest,
  });

  const deps = depsFromOpts ?? createDefaultDeps(app.log);

  app.addHook("onRequest", async (request, reply) => {
    request.requestStartedAtNs = process.hrtime.bigint();
    reply.header(env.REQUEST_ID_HEADER, request.id);
  });

  app.addHook("onSend", async (_request, reply, payload) => {
    // Baseline Security Headers for auth endpoints.
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("Referrer-Policy", "no-referrer");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Cache-Control", "no-store");
    reply.header("Content-Security-Policy", "frame-ancestors 'none'");
    return payload;
  });

  app.addHook("onResponse", async (request, reply) => {
    const started = request.requestStartedAtNs;
    if (!started) return;

    const durationSeconds = Number(process.hrtime.bigint() - started) / 1_000_000_000;
    recordHttpRequest(request.method, getRouteId(request), reply.statusCode, durationSeconds);
  });

  if (enableCors) {
    const corsAllowlist =
      env.CORS_ORIGIN === "*"
        ? "*"
        : env.CORS_ORIGIN.split(",")
            .map((o) => o.trim())
            .filter(Boolean);

    await app.register(cors, {
      origin: (origin, cb) => {
        if (!origin || corsAllowlist === "*") return cb(null, true);
        return cb(null, corsAllowlist.includes(origin));
      },
      methods: ["GET", "POST", "OPTIONS"],
      credentials: true,
      maxAge: 86_400,
    });
  }

  app.addHook("onReady", async () => {
    isReady = true;
  });

  // Module mit Tenant-Kontext
  await app.register(async (instance) => {
    await instance.register(tenantContextPlugin);
    await instance.register(signupRoutes, {
      prefix: "/auth",
      deps: deps.signup,
      dbHealth: deps.health.db,
    });
    await instance.register(otpRoutes, { prefix: "/auth", deps: deps.signup });
  });

  // Health & Observability
  await registerHealthRoutes(app, deps);

  // Error-/NotFound-Handler
  app.setErrorHandler((err, req, reply) => {
    if (isAuthCoreError(err)) {
      if (err instanceof ThrottledError) recordOtpThrottled(err.channel);
      if (err instanceof DeliveryError) recordDeliveryFailed(err.channel);

      if (err.statusCode >= 500) {
        req.log.error({ err, code: err.code }, "auth_request_failed");
      } else {
        req.log.info({ code: err.code, msg: err.message }, "auth_request_rejected");
      }
      return sendAuthError(reply, err);
    }

    req.log.error({ err }, "unhandled_error");

    const status = err.statusCode ?? (err.validation ? 400 : 500);
    const code =
      status === 400
        ? "VALIDATION_FAILED"
        : status === 404
          ? "NOT_FOUND"
          : status === 413
            ? "PAYLOAD_TOO_LARGE"
            : status === 415
              ? "UNSUPPORTED_MEDIA_TYPE"
              : "INTERNAL";
    const message = status >= 500 ? "Internal server error." : err.message;

    return reply
      .code(status)
      .type("application/json")
      .send(apiError(status, code, message));
  });

  app.setNotFoundHandler((req, reply) => {
    reply
      .code(404)
      .send(apiError(404, "NOT_FOUND", `Route ${req.method}:${req.url} not found`));
  });

  // Graceful Shutdown Hooks (werden von server.ts via app.close() getriggert)
  app.addHook("onClose", async () => {
    try {
      await deps.close();
      app.log.info("resources_closed");
    } catch (err) {
      app.log.warn({ err }, "resources_close_failed");
    }
  });

  return app;
}
