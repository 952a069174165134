import "fastify";
import type { MetricsExplorer } from "../metrics/metrics-explorer.js";

declare module "fastify" {
  interface FastifyInstance {
    explorer: MetricsExplorer;
  }
}
