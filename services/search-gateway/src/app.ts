import express, { Express, NextFunction, Request, Response } from "express";
import cors from "cors";
import pinoHttp from "pino-http";
import type pino from "pino";
import type { GatewayConfig } from "./config";
import { SearchGateway } from "./modules/searchGateway";
import { NewsApiClient } from "./modules/newsApiClient";

export interface AppDeps {
  config: GatewayConfig;
  logger: pino.Logger;
  gateway?: SearchGateway;
}

export function createApp({ config, logger, gateway }: AppDeps): Express {
  const searchGateway =
    gateway ??
    new SearchGateway({
      config,
      client: new NewsApiClient(config),
      logger,
    });

  const app = express();
  app.set("trust proxy", true);

  app.use(cors({ origin: config.corsOrigin }));
  app.use(pinoHttp({ logger }));

  // -------------------------------------------------
  // Routes
  // -------------------------------------------------
  app.get("/health", (_req: Request, res: Response) => {
    res.json(searchGateway.health());
  });

  app.get("/count", async (req: Request, res: Response) => {
    res.json(await searchGateway.count(req.query));
  });

  app.get("/search", async (req: Request, res: Response) => {
    res.json(await searchGateway.search(req.query));
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: "Not found" });
  });

  // Last resort: the gateway already turns its own failures into envelopes
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ err }, "Unhandled request error");
    res.status(500).json({ ok: false, error: err.message });
  });

  return app;
}
