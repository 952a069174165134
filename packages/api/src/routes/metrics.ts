/**
 * Metrics API routes — prefix groups, search, details and refresh over the
 * explorer's current snapshot.
 *
 * Reads populate the snapshot on first use; only POST /refresh replaces it.
 */

import type { FastifyPluginAsync } from "fastify";
import type {
  DetailsResponse,
  GroupsResponse,
  NamesResponse,
  RefreshResponse,
  SearchResponse,
} from "@metrics-explorer/shared";
import { formatSampleValue } from "../exposition/sample-encoder.js";
import { SearchQuery, MetricNameParams } from "./metrics.schemas.js";

export const metricsRoutes: FastifyPluginAsync = async (app) => {
  // -------------------------------------------------------------------------
  // GET /api/metrics/groups
  // -------------------------------------------------------------------------
  app.get("/groups", async (_request, reply) => {
    const groups = await app.explorer.listGroups();
    const body: GroupsResponse = { groups: Object.fromEntries(groups) };
    return reply.send(body);
  });

  // -------------------------------------------------------------------------
  // GET /api/metrics/search?q=cpu
  // -------------------------------------------------------------------------
  app.get<{ Querystring: SearchQuery }>(
    "/search",
    { schema: { querystring: SearchQuery } },
    async (request, reply) => {
      const term = request.query.q;
      const results = await app.explorer.search(term);
      const body: SearchResponse = {
        term,
        results: results.map((r) => ({ ...r, value: formatSampleValue(r.value) })),
      };
      return reply.send(body);
    },
  );

  // -------------------------------------------------------------------------
  // GET /api/metrics/names
  // -------------------------------------------------------------------------
  app.get("/names", async (_request, reply) => {
    const body: NamesResponse = { names: await app.explorer.names() };
    return reply.send(body);
  });

  // -------------------------------------------------------------------------
  // GET /api/metrics/details/:name
  // Unknown names are not an error: type/help come back null, values empty.
  // -------------------------------------------------------------------------
  app.get<{ Params: MetricNameParams }>(
    "/details/:name",
    { schema: { params: MetricNameParams } },
    async (request, reply) => {
      const details = await app.explorer.details(request.params.name);
      const body: DetailsResponse = {
        ...details,
        values: details.values.map((v) => ({
          value: formatSampleValue(v.value),
          labels: v.labels,
        })),
      };
      return reply.send(body);
    },
  );

  // -------------------------------------------------------------------------
  // POST /api/metrics/refresh
  // -------------------------------------------------------------------------
  app.post("/refresh", async (_request, reply) => {
    const { index, fetchedAt } = await app.explorer.refresh();
    const body: RefreshResponse = {
      stats: index.stats,
      fetchedAt: fetchedAt.toISOString(),
    };
    return reply.send(body);
  });
};
