import Fastify, { type FastifyServerOptions, type FastifyError } from "fastify";
import cors from "@fastify/cors";
import { randomUUID } from "node:crypto";

import { loadConfig, type ExplorerConfig } from "./config.js";
import { MetricsExplorer, ScrapeError, exporterMetricsUrl } from "./metrics/index.js";
import { healthRoutes } from "./routes/health.js";
import { metricsRoutes } from "./routes/metrics.js";

/**
 * Longest path parameter the router accepts. Fastify's default (100) is
 * shorter than some real metric names reaching `/details/:name`.
 */
const MAX_PARAM_LENGTH = 2048;

export interface BuildAppOptions extends FastifyServerOptions {
  /** Override the configuration (defaults to the environment) */
  config?: ExplorerConfig;
  /** Override the explorer instance (for testing) */
  explorer?: MetricsExplorer;
}

/**
 * Build and configure the Fastify application.
 * Exported separately from the server start so tests can use `app.inject()`.
 */
export async function buildApp(opts?: BuildAppOptions) {
  const {
    config = loadConfig(),
    explorer: customExplorer,
    ...fastifyOpts
  } = opts ?? {};

  const serverOpts: FastifyServerOptions =
    Object.keys(fastifyOpts).length > 0
      ? fastifyOpts
      : {
          logger: config.isDev
            ? {
                transport: {
                  target: "pino-pretty",
                  options: { colorize: true },
                },
              }
            : true,
          // Generate unique request IDs for tracing
          genReqId: (req) => {
            const header = req.headers["x-request-id"];
            return typeof header === "string" && header ? header : randomUUID();
          },
        };
  const app = Fastify({ maxParamLength: MAX_PARAM_LENGTH, ...serverOpts });

  // Explorer (decorated so routes can access it)
  const explorer =
    customExplorer ??
    new MetricsExplorer({
      metricsUrl: exporterMetricsUrl({
        host: config.exporterHost,
        port: config.exporterPort,
      }),
      timeoutMs: config.scrapeTimeoutMs,
      logger: app.log,
    });
  app.decorate("explorer", explorer);

  // ---------------------------------------------------------------------------
  // Plugins
  // ---------------------------------------------------------------------------

  await app.register(cors, {
    origin: config.corsOrigin ?? false,
  });

  // ---------------------------------------------------------------------------
  // Global error handler — normalise error responses
  // ---------------------------------------------------------------------------
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Validation errors from Typebox schemas (Fastify AJV)
    if (error.validation) {
      const details = error.validation.map((v) => ({
        field: v.instancePath || v.schemaPath,
        message: v.message ?? "Invalid value",
      }));
      reply.status(400).send({ error: "Validation failed", details });
      return;
    }

    // Exporter unreachable or answered with a non-2xx status
    if (error instanceof ScrapeError) {
      request.log.warn({ url: error.url, status: error.status }, error.message);
      reply.status(502).send({ error: error.message });
      return;
    }

    // Known HTTP errors (4xx)
    if (error.statusCode && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        error: error.message,
      });
      return;
    }

    // Unexpected errors — log full details, return generic message
    request.log.error(error);
    reply.status(error.statusCode ?? 500).send({
      error: config.isDev ? error.message : "Internal server error",
    });
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await app.register(healthRoutes, { prefix: "/api/health" });
  await app.register(metricsRoutes, { prefix: "/api/metrics" });

  return app;
}
