import express, { type Express } from "express";
import type { HandlerResponse } from "./deployment.mts";
import { health } from "./health.ts";
import type { WebhookEvent } from "./webhook.mts";

/**
 * Builds the HTTP application around a webhook handler. The body is read raw
 * so the handler verifies the signature over the exact bytes GitHub signed.
 */
export function createApp(
  handler: (event: WebhookEvent) => Promise<HandlerResponse>
): Express {
  const app = express();
  app.disable("x-powered-by");

  app.get("/health", health);

  app.all("/", express.raw({ type: () => true, limit: "1mb" }), (req, res, next) => {
    const headers: Record<string, string | undefined> = {};
    for (const [name, value] of Object.entries(req.headers)) {
      headers[name] = Array.isArray(value) ? value.join(", ") : value;
    }

    handler({
      httpMethod: req.method,
      headers,
      body: Buffer.isBuffer(req.body) ? req.body : null,
    })
      .then(({ statusCode, body }) => {
        res.status(statusCode).type("text/plain").send(body);
      })
      .catch(next);
  });

  app.use(
    (
      err: Error & { status?: number },
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      const status = err.status != null && err.status >= 400 ? err.status : 500;
      console.error(`Request failed with ${status}: ${err.message}`);
      res.status(status).type("text/plain").send(err.message);
    }
  );

  return app;
}
