import express, { type NextFunction, type Request, type Response } from "express";
import rateLimit from "express-rate-limit";
import { logger } from "../src/engine/logger";
import {
  eventNumbers,
  hitPrediction,
  listEvents,
  waveGeoJson,
  type EventCatalogue,
  type HandlerResult,
} from "./handlers";

type Handler = (req: Request) => Promise<HandlerResult>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req)
      .then(({ status, body }) => {
        res.status(status).json(body);
      })
      .catch(next);
  };
}

export function createApp(events: EventCatalogue) {
  const app = express();

  const apiLimiter = rateLimit({
    windowMs: 60_000,
    limit: 120,
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use("/api", apiLimiter);

  app.get("/api/events", route(() => listEvents(events)));
  app.get("/api/events/:id/numbers", route((req) => eventNumbers(events, req.params.id)));
  app.get("/api/events/:id/wave.geojson", route((req) => waveGeoJson(events, req.params.id)));
  app.get(
    "/api/events/:id/hit",
    route((req) => hitPrediction(events, req.params.id, { lat: req.query.lat, lng: req.query.lng })),
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error("server", "Request failed", err);
    res.status(500).json({ error: "Internal error" });
  });

  return app;
}
