import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import {
  analysisQuerySchema,
  clustersQuerySchema,
  heatmapQuerySchema,
  overviewQuerySchema,
  pointsQuerySchema,
} from "@shared/schema";
import { InvalidArgumentError, isAbortError } from "@shared/errors";
import { FLAGS } from "../config/flags";
import { logger } from "../lib/logger";
import type { MapResponse } from "../types/map";
import { memoize, type StateStore } from "./cache";
import type { MapRequest, MapService } from "./mapService";

const log = logger.child("routes");

export interface RouteDeps {
  mapService: MapService;
  /** Omitted when response caching is off */
  cache?: StateStore<MapResponse>;
  cacheTtlMs: number;
}

function toBody(response: MapResponse): object {
  if (response.kind === "heatmap-geojson") return response.body;
  const { kind: _kind, ...body } = response;
  return body;
}

function handleRouteError(res: Response, error: unknown, route: string): void {
  if (error instanceof InvalidArgumentError) {
    res.status(400).json({ message: error.message, argument: error.argument });
    return;
  }
  if (isAbortError(error)) {
    // Client went away; nobody is left to answer
    log.debug(`Request to ${route} aborted by client`);
    return;
  }
  log.error(`Error serving ${route}`, error);
  res.status(500).json({ message: "Internal server error" });
}

export async function registerRoutes(app: Express, deps: RouteDeps): Promise<Server> {
  const { mapService, cache, cacheTtlMs } = deps;
  const useCache = FLAGS.responseCache && cache !== undefined;

  function mapRoute<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    toRequest: (query: T) => MapRequest
  ): void {
    app.get(path, async (req, res) => {
      const parsed = schema.safeParse(req.query);
      if (!parsed.success) {
        res.status(400).json({ message: "Invalid query parameters", errors: parsed.error.errors });
        return;
      }

      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableEnded) controller.abort();
      });

      try {
        const request = toRequest(parsed.data);
        const run = () => mapService.aggregate(request, controller.signal);
        const response = useCache && cache
          ? await memoize(cache, request.mode, request.query, cacheTtlMs, run)
          : await run();
        res.json(toBody(response));
      } catch (error) {
        handleRouteError(res, error, path);
      }
    });
  }

  mapRoute("/api/map/points", pointsQuerySchema, query => ({ mode: "points", query }));
  mapRoute("/api/map/clusters", clustersQuerySchema, query => ({ mode: "clusters", query }));
  mapRoute("/api/map/overview", overviewQuerySchema, query => ({ mode: "overview", query }));
  mapRoute("/api/map/heatmap", heatmapQuerySchema, query => ({ mode: "heatmap", query }));
  mapRoute("/api/map/analysis", analysisQuerySchema, query => ({ mode: "analysis", query }));

  app.get("/api/cache/stats", (_req, res) => {
    if (!cache) {
      res.json({ enabled: false });
      return;
    }
    res.json({ enabled: useCache, ...cache.stats() });
  });

  app.delete("/api/cache", (_req, res) => {
    cache?.clear();
    log.info("Response cache cleared");
    res.json({ message: "Cache cleared" });
  });

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  const httpServer = createServer(app);
  return httpServer;
}
