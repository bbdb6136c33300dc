import type { Request, Response } from "express";

/**
 * A simple health check endpoint.
 * It confirms the receiver is running and reachable.
 */
export function health(_req: Request, res: Response) {
  res.status(200).json({
    status: "ok",
    timestamp: new Date().toISOString(),
  });
}
