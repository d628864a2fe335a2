import express from "express";
import { resolveDomain, UnknownDomainError } from "./models";
import { assess, getModelInfo, predictDomain } from "./predictor";
import { screenSession } from "./screening";
import { isRecord } from "./traces";
import type { Domain } from "./types";

const BODY_LIMIT = "5mb";

function domainParam(req: express.Request): Domain {
  const raw = req.params.domain ?? "";
  const domain = resolveDomain(raw);
  if (!domain) throw new UnknownDomainError(raw);
  return domain;
}

/**
 * HTTP status for an error thrown inside a route or by the body parser.
 */
function statusFor(err: unknown): number {
  if (err instanceof UnknownDomainError) return 404;
  if (isRecord(err) && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

/**
 * Builds the JSON service. Handlers are synchronous; the engine never throws
 * on bad session data, so only malformed bodies and unknown domains fail.
 */
export function createApp(): express.Express {
  const app = express();
  app.use(express.json({ limit: BODY_LIMIT }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/model-info", (_req, res) => {
    res.json(getModelInfo());
  });

  // POST /assess -> { dyslexia?: session, dyscalculia?: session, dysgraphia?: session }
  app.post("/assess", (req, res) => {
    res.json(assess(req.body));
  });

  app.post("/predict/:domain", (req, res) => {
    res.json(predictDomain(domainParam(req), req.body));
  });

  app.post("/screen/:domain", (req, res) => {
    res.json(screenSession(domainParam(req), req.body));
  });

  const onError: express.ErrorRequestHandler = (err, _req, res, _next) => {
    const status = statusFor(err);
    const message = err instanceof Error ? err.message : "Request failed";
    if (status >= 500) console.error("Request failed:", err);
    res.status(status).json({ error: message });
  };
  app.use(onError);

  return app;
}
